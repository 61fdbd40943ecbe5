/**
 * Output Writer
 *
 * Buffers benchmark results and appends them to a CSV or JSON Lines sink.
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { dirname, extname } from 'node:path';
import type { BenchmarkResult } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('OutputWriter');

/** Buffered records that trigger an automatic flush */
export const FLUSH_THRESHOLD = 100;

/**
 * Column order shared by both sink formats
 */
export const RESULT_COLUMNS = [
  'timestamp_ns',
  'operation',
  'filename',
  'size_bytes',
  'latency_ns',
  'status',
  'error',
  'warmup',
] as const;

export type ResultColumn = (typeof RESULT_COLUMNS)[number];

export type OutputFormat = 'csv' | 'jsonl';

type ResultRow = Record<ResultColumn, string | number | bigint | boolean>;

const CSV_LINE_END = '\r\n';

export interface OutputWriterOptions {
  /** Disable all output (for runs where I/O must not perturb timing) */
  noLog?: boolean;
}

/**
 * Sink format for a path: `.csv` (any case) is CSV, everything else JSON Lines
 */
export function outputFormatFor(outputPath: string): OutputFormat {
  return extname(outputPath).toLowerCase() === '.csv' ? 'csv' : 'jsonl';
}

function toRow(result: BenchmarkResult): ResultRow {
  return {
    timestamp_ns: result.timestampNs,
    operation: result.operation,
    filename: result.filename,
    size_bytes: result.sizeBytes,
    latency_ns: result.latencyNs,
    status: result.status,
    error: result.error,
    warmup: result.warmup,
  };
}

/**
 * Quote a CSV field only when it contains a delimiter, quote or line break
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsvRow(result: BenchmarkResult): string {
  const row = toRow(result);
  return RESULT_COLUMNS.map((column) => escapeCsvField(String(row[column]))).join(',');
}

/**
 * Compact JSON object; bigint fields are written as exact integer literals
 */
export function formatJsonLine(result: BenchmarkResult): string {
  const row = toRow(result);
  const members = RESULT_COLUMNS.map((column) => {
    const value = row[column];
    const encoded = typeof value === 'bigint' ? value.toString() : JSON.stringify(value);
    return `${JSON.stringify(column)}:${encoded}`;
  });
  return `{${members.join(',')}}`;
}

/**
 * OutputWriter
 *
 * Append-only: prior content is never truncated or rewritten, and records
 * keep the order they were written in.
 */
export class OutputWriter {
  private readonly outputPath: string;
  private readonly noLog: boolean;
  private readonly format: OutputFormat;
  private buffer: BenchmarkResult[] = [];
  private flushCount = 0;

  constructor(outputPath: string, options: OutputWriterOptions = {}) {
    this.outputPath = outputPath;
    this.noLog = options.noLog ?? false;
    this.format = outputFormatFor(outputPath);
  }

  /**
   * Buffer a result, flushing once FLUSH_THRESHOLD records are pending
   */
  async write(result: BenchmarkResult): Promise<void> {
    if (this.noLog) {
      return;
    }

    this.buffer.push(result);

    if (this.buffer.length >= FLUSH_THRESHOLD) {
      await this.flush();
    }
  }

  /**
   * Persist every pending record. Callers flush once more at end of run.
   */
  async flush(): Promise<void> {
    if (this.noLog || this.buffer.length === 0) {
      return;
    }

    const pending = this.buffer;

    await mkdir(dirname(this.outputPath), { recursive: true });

    const content = this.format === 'csv' ? this.renderCsv(pending) : this.renderJsonLines(pending);
    await appendFile(this.outputPath, content, 'utf-8');

    // Cleared only after a successful append so a failed flush can be retried
    this.buffer = [];
    this.flushCount++;
    logger.debug({ path: this.outputPath, records: pending.length, format: this.format }, 'Results flushed');
  }

  getFormat(): OutputFormat {
    return this.format;
  }

  getFlushCount(): number {
    return this.flushCount;
  }

  getPendingCount(): number {
    return this.buffer.length;
  }

  private renderCsv(results: readonly BenchmarkResult[]): string {
    // Header only for a file that does not exist yet, so appends across runs share one header
    const lines: string[] = existsSync(this.outputPath) ? [] : [RESULT_COLUMNS.join(',')];
    for (const result of results) {
      lines.push(formatCsvRow(result));
    }
    return lines.join(CSV_LINE_END) + CSV_LINE_END;
  }

  private renderJsonLines(results: readonly BenchmarkResult[]): string {
    return results.map((result) => `${formatJsonLine(result)}\n`).join('');
  }
}
