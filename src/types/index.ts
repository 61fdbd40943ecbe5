/**
 * Core type definitions for objbench
 */

// ============================================
// Operation Types
// ============================================

/**
 * Storage operation exercised by a user-supplied command template
 */
export type Operation = 'PUT' | 'GET' | 'DELETE';

export const OPERATIONS: readonly Operation[] = ['PUT', 'GET', 'DELETE'];

export type ResultStatus = 'success' | 'fail';

// ============================================
// Dataset Types
// ============================================

export interface ManifestEntry {
  /** Path as handed to the command template */
  path: string;
  /** Base name, recorded in results */
  name: string;
  sizeBytes: number;
}

/**
 * Ordered list of files a run operates over.
 * Order is the order commands are issued in.
 */
export type FileManifest = readonly ManifestEntry[];

// ============================================
// Result Types
// ============================================

/**
 * One record per command invocation
 */
export interface BenchmarkResult {
  /** Monotonic clock reading taken right after the command completed */
  readonly timestampNs: bigint;
  readonly operation: Operation;
  readonly filename: string;
  readonly sizeBytes: number;
  readonly latencyNs: bigint;
  readonly status: ResultStatus;
  /** Empty on success */
  readonly error: string;
  readonly warmup: boolean;
}

/**
 * Outcome of a single external command
 */
export interface CommandOutcome {
  success: boolean;
  error: string;
  latencyNs: bigint;
}

/**
 * Summary returned by a benchmark-mode run
 */
export interface BenchmarkReport {
  operation: Operation;
  manifest: FileManifest;
  results: readonly BenchmarkResult[];
}

/**
 * Acknowledgement returned by the full-cycle placeholder
 */
export interface FullCycleReport {
  mode: 'full-cycle';
  executed: false;
}
