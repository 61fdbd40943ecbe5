/**
 * Benchmark Runner
 *
 * Drives the warmup and measured phases over a file manifest.
 */

import { CommandExecutionFailureError, MissingCommandTemplateError } from '../errors/index.js';
import { commandTemplateFor, DEFAULT_WARMUP, type CommandTemplates } from '../config/index.js';
import type { BenchmarkResult, FileManifest, ManifestEntry, Operation } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { ShellCommandExecutor, TemplatedCommand, type CommandExecutor } from './command-executor.js';

const logger = createLogger('BenchmarkRunner');

export interface BenchmarkRunnerConfig {
  /** Number of warmup invocations (capped to the manifest length) */
  warmup?: number;
  commands: Readonly<CommandTemplates>;
}

/**
 * BenchmarkRunner
 *
 * Commands run strictly one at a time in manifest order. Warmup and measured
 * results share a single log in execution order, each tagged with its phase.
 */
export class BenchmarkRunner {
  private readonly warmup: number;
  private readonly commands: Readonly<CommandTemplates>;
  private readonly executor: CommandExecutor;
  private readonly results: BenchmarkResult[] = [];

  constructor(config: BenchmarkRunnerConfig, executor?: CommandExecutor) {
    this.warmup = config.warmup ?? DEFAULT_WARMUP;
    this.commands = config.commands;
    this.executor = executor ?? new ShellCommandExecutor();
  }

  // ============================================
  // Phases
  // ============================================

  /**
   * Prime the target system with the first `warmup` files.
   * Failures are recorded but never abort the run.
   */
  async runWarmup(operation: Operation, manifest: FileManifest): Promise<void> {
    if (this.warmup <= 0) {
      return;
    }

    const command = this.resolveCommand(operation);
    const warmupFiles = manifest.slice(0, this.warmup);

    logger.info({ operation, files: warmupFiles.length }, 'Warmup phase started');

    let failures = 0;
    for (const entry of warmupFiles) {
      const result = await this.execute(operation, command, entry, true);
      if (result.status === 'fail') {
        failures++;
        logger.warn({ operation, file: entry.name, error: result.error }, 'Warmup command failed');
      }
    }

    logger.info({ operation, files: warmupFiles.length, failures }, 'Warmup phase complete');
  }

  /**
   * Run the measured phase over every file.
   *
   * @throws CommandExecutionFailureError on the first failing command, after its result is recorded
   */
  async runOperation(operation: Operation, manifest: FileManifest): Promise<void> {
    const command = this.resolveCommand(operation);

    logger.info({ operation, files: manifest.length }, 'Measured phase started');

    for (const entry of manifest) {
      const result = await this.execute(operation, command, entry, false);
      if (result.status === 'fail') {
        logger.error({ operation, file: entry.name, error: result.error }, 'Measured phase aborted');
        throw new CommandExecutionFailureError(result);
      }
    }

    logger.info({ operation, files: manifest.length }, 'Measured phase complete');
  }

  // ============================================
  // Accessors
  // ============================================

  /**
   * All results recorded so far, in execution order
   */
  getResults(): readonly BenchmarkResult[] {
    return [...this.results];
  }

  getWarmup(): number {
    return this.warmup;
  }

  // ============================================
  // Internals
  // ============================================

  private resolveCommand(operation: Operation): TemplatedCommand {
    const template = commandTemplateFor(this.commands, operation);
    if (!template) {
      throw new MissingCommandTemplateError([operation]);
    }
    return new TemplatedCommand(template);
  }

  private async execute(
    operation: Operation,
    command: TemplatedCommand,
    entry: ManifestEntry,
    warmup: boolean
  ): Promise<BenchmarkResult> {
    const outcome = await this.executor.execute(command.render(entry.path));

    const result: BenchmarkResult = {
      timestampNs: process.hrtime.bigint(),
      operation,
      filename: entry.name,
      sizeBytes: entry.sizeBytes,
      latencyNs: outcome.latencyNs,
      status: outcome.success ? 'success' : 'fail',
      error: outcome.success ? '' : outcome.error,
      warmup,
    };
    Object.freeze(result);

    this.results.push(result);
    return result;
  }
}
