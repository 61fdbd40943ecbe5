/**
 * Benchmark Orchestrator
 *
 * Composes FileGenerator, BenchmarkRunner and OutputWriter into the run modes.
 */

import { existsSync, statSync } from 'node:fs';
import { stat } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { glob } from 'glob';
import { MissingCommandTemplateError, NoInputFilesError } from '../errors/index.js';
import { commandTemplateFor, type BenchConfig } from '../config/index.js';
import {
  OPERATIONS,
  type BenchmarkReport,
  type BenchmarkResult,
  type FileManifest,
  type FullCycleReport,
  type ManifestEntry,
  type Operation,
} from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { sleep } from '../utils/sleep.js';
import { BenchmarkRunner } from './benchmark-runner.js';
import type { CommandExecutor } from './command-executor.js';
import { FileGenerator, type DiskSpaceProbe } from './file-generator.js';
import { OutputWriter } from './output-writer.js';

const logger = createLogger('BenchmarkOrchestrator');

/** Files picked up from an existing dataset directory */
export const DATASET_GLOB = '*.bin';

/**
 * Collaborators that tests (or embedding code) may replace
 */
export interface OrchestratorDependencies {
  executor?: CommandExecutor;
  diskSpaceProbe?: DiskSpaceProbe;
  sleep?: (ms: number) => Promise<void>;
}

export class BenchmarkOrchestrator {
  private readonly config: BenchConfig;
  private readonly fileGenerator: FileGenerator;
  private readonly outputWriter: OutputWriter | null;
  private readonly executor: CommandExecutor | undefined;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(config: BenchConfig, deps: OrchestratorDependencies = {}) {
    this.config = config;
    this.fileGenerator = new FileGenerator(config, { diskSpaceProbe: deps.diskSpaceProbe });
    this.outputWriter = config.outFile
      ? new OutputWriter(config.outFile, { noLog: config.noLog })
      : null;
    this.executor = deps.executor;
    this.sleep = deps.sleep ?? sleep;
  }

  // ============================================
  // Run Modes
  // ============================================

  /**
   * Generate mode: write the dataset, run nothing
   */
  async runGenerate(): Promise<FileManifest> {
    return this.fileGenerator.generate();
  }

  /**
   * Benchmark mode: warmup then measured phase over an existing dataset.
   *
   * Results are persisted even when the measured phase aborts; the abort
   * is then rethrown to the caller.
   */
  async runBenchmark(operation: Operation): Promise<BenchmarkReport> {
    const manifest = await this.discoverManifest();
    const runner = new BenchmarkRunner(
      { warmup: this.config.warmup, commands: this.config.commands },
      this.executor
    );

    logger.info(
      { operation, files: manifest.length, inputDir: this.config.inputDir },
      `Running ${operation.toLowerCase()} benchmark on ${manifest.length} files`
    );

    try {
      await runner.runWarmup(operation, manifest);

      if (runner.getResults().length > 0 && this.config.waitSeconds > 0) {
        logger.info({ waitSeconds: this.config.waitSeconds }, 'Waiting before measured phase');
        await this.sleep(this.config.waitSeconds * 1000);
      }

      await runner.runOperation(operation, manifest);
    } catch (err) {
      await this.persistAfterFailure(runner.getResults());
      throw err;
    }

    const results = runner.getResults();
    await this.persist(results);

    logger.info({ operation, results: results.length }, `Completed ${operation.toLowerCase()} benchmark`);

    return { operation, manifest, results };
  }

  /**
   * Full-cycle mode (generate → PUT → GET → DELETE).
   *
   * Placeholder: validates the command set and acknowledges the request.
   * Phase sequencing, inter-phase waits and dataset reuse are not designed yet.
   */
  async runFullCycle(): Promise<FullCycleReport> {
    this.validateCommands();

    logger.warn(
      {
        outputDir: this.config.outputDir,
        inputDir: this.config.inputDir,
        reuseFiles: this.config.reuseFiles,
        waitSeconds: this.config.waitSeconds,
      },
      'Full benchmark cycle requested; this mode is not implemented yet and performs no operations'
    );

    return { mode: 'full-cycle', executed: false };
  }

  /**
   * Require a command template for every operation
   *
   * @throws MissingCommandTemplateError naming each missing operation
   */
  validateCommands(): void {
    const missing = OPERATIONS.filter((op) => !commandTemplateFor(this.config.commands, op));
    if (missing.length > 0) {
      throw new MissingCommandTemplateError(missing);
    }
  }

  // ============================================
  // Internals
  // ============================================

  /**
   * Dataset files in the input directory, sorted by path
   */
  private async discoverManifest(): Promise<FileManifest> {
    const { inputDir } = this.config;

    if (!inputDir || !existsSync(inputDir) || !statSync(inputDir).isDirectory()) {
      throw new NoInputFilesError(`Input directory does not exist: ${inputDir ?? '(not set)'}`, inputDir);
    }

    const names = await glob(DATASET_GLOB, { cwd: inputDir, nodir: true });
    if (names.length === 0) {
      throw new NoInputFilesError(`No ${DATASET_GLOB} files found in input directory: ${inputDir}`, inputDir);
    }

    const paths = names.map((name) => join(inputDir, name)).sort();

    const manifest: ManifestEntry[] = [];
    for (const path of paths) {
      const stats = await stat(path);
      manifest.push({ path, name: basename(path), sizeBytes: stats.size });
    }
    return manifest;
  }

  private async persist(results: readonly BenchmarkResult[]): Promise<void> {
    if (!this.outputWriter) {
      return;
    }
    for (const result of results) {
      await this.outputWriter.write(result);
    }
    await this.outputWriter.flush();
  }

  /**
   * Persist what was collected before an abort without masking the abort itself
   */
  private async persistAfterFailure(results: readonly BenchmarkResult[]): Promise<void> {
    try {
      await this.persist(results);
    } catch (err) {
      logger.error({ err, results: results.length }, 'Failed to persist results after aborted run');
    }
  }
}
