/**
 * Custom Error classes for objbench
 */

import type { BenchmarkResult, Operation } from '../types/index.js';

export interface ErrorOptions {
  code: string;
  cause?: Error;
}

type SubclassOptions = Omit<ErrorOptions, 'code'> & Partial<Pick<ErrorOptions, 'code'>>;

/**
 * Base error class for all objbench errors
 */
export class BenchError extends Error {
  public readonly code: string;
  public override readonly cause?: Error;

  constructor(message: string, options: ErrorOptions) {
    super(message);
    this.name = this.constructor.name;
    this.code = options.code;
    this.cause = options.cause;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      stack: this.stack,
      cause: this.cause?.message,
    };
  }
}

/**
 * Size expression could not be parsed into a byte count
 */
export class InvalidSizeFormatError extends BenchError {
  public readonly expression: string;

  constructor(expression: string, options: SubclassOptions = {}) {
    super(`Invalid size format: ${expression}`, {
      code: options.code ?? 'INVALID_SIZE_FORMAT',
      cause: options.cause,
    });
    this.expression = expression;
  }
}

/**
 * Not enough free space on the target filesystem for the requested dataset
 */
export class InsufficientDiskSpaceError extends BenchError {
  public readonly requiredBytes: number;
  public readonly availableBytes: number;

  constructor(requiredBytes: number, availableBytes: number, options: SubclassOptions = {}) {
    super(
      `Insufficient disk space. Required: ${requiredBytes.toLocaleString('en-US')} bytes, ` +
        `Available: ${availableBytes.toLocaleString('en-US')} bytes`,
      {
        code: options.code ?? 'INSUFFICIENT_DISK_SPACE',
        cause: options.cause,
      }
    );
    this.requiredBytes = requiredBytes;
    this.availableBytes = availableBytes;
  }
}

/**
 * Configuration/initialization error
 */
export class InvalidConfigurationError extends BenchError {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, {
      code: options.code ?? 'INVALID_CONFIGURATION',
      cause: options.cause,
    });
  }
}

/**
 * No command template configured for one or more operations
 */
export class MissingCommandTemplateError extends BenchError {
  public readonly operations: readonly Operation[];

  constructor(operations: readonly Operation[], options: SubclassOptions = {}) {
    const names = operations.map((op) => op.toLowerCase()).join(', ');
    super(
      operations.length === 1
        ? `No command template provided for ${names} operation`
        : `No command template provided for operations: ${names}`,
      {
        code: options.code ?? 'MISSING_COMMAND_TEMPLATE',
        cause: options.cause,
      }
    );
    this.operations = operations;
  }
}

/**
 * A measured-phase command failed; the run was aborted after recording it
 */
export class CommandExecutionFailureError extends BenchError {
  public readonly result: BenchmarkResult;

  constructor(result: BenchmarkResult, options: SubclassOptions = {}) {
    super(`Command failed: ${result.error}`, {
      code: options.code ?? 'COMMAND_EXECUTION_FAILURE',
      cause: options.cause,
    });
    this.result = result;
  }
}

/**
 * Benchmark input directory is missing or holds no dataset files
 */
export class NoInputFilesError extends BenchError {
  public readonly inputDir: string | undefined;

  constructor(message: string, inputDir: string | undefined, options: SubclassOptions = {}) {
    super(message, {
      code: options.code ?? 'NO_INPUT_FILES',
      cause: options.cause,
    });
    this.inputDir = inputDir;
  }
}
