import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { BenchmarkOrchestrator } from '../../../src/core/orchestrator.js';
import { createConfig, type BenchConfigInput } from '../../../src/config/index.js';
import {
  CommandExecutionFailureError,
  MissingCommandTemplateError,
  NoInputFilesError,
} from '../../../src/errors/index.js';
import {
  createFakeExecutor,
  createTempDir,
  removeTempDir,
  unlimitedDiskSpace,
} from '../../utils/fakes.js';

const allCommands = {
  put: 'upload {file}',
  get: 'download {file}',
  delete: 'remove {file}',
};

describe('BenchmarkOrchestrator', () => {
  let tempDir: string;
  let inputDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
    inputDir = join(tempDir, 'data');
    await mkdir(inputDir);
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  function config(overrides: BenchConfigInput = {}) {
    return createConfig({ inputDir, warmup: 0, waitSeconds: 0, commands: allCommands, ...overrides });
  }

  async function writeDataset(files: Record<string, number>): Promise<void> {
    for (const [name, size] of Object.entries(files)) {
      await writeFile(join(inputDir, name), Buffer.alloc(size));
    }
  }

  describe('runBenchmark', () => {
    it('should benchmark *.bin files sorted by path with their on-disk sizes', async () => {
      await writeDataset({ 'file_0003.bin': 30, 'file_0001.bin': 10, 'notes.txt': 5, 'file_0002.bin': 20 });
      const executor = createFakeExecutor();
      const orchestrator = new BenchmarkOrchestrator(config(), { executor });

      const report = await orchestrator.runBenchmark('GET');

      expect(executor.commands).toEqual([
        `download ${join(inputDir, 'file_0001.bin')}`,
        `download ${join(inputDir, 'file_0002.bin')}`,
        `download ${join(inputDir, 'file_0003.bin')}`,
      ]);
      expect(report.operation).toBe('GET');
      expect(report.manifest.map((entry) => [entry.name, entry.sizeBytes])).toEqual([
        ['file_0001.bin', 10],
        ['file_0002.bin', 20],
        ['file_0003.bin', 30],
      ]);
      expect(report.results.map((result) => result.sizeBytes)).toEqual([10, 20, 30]);
    });

    it('should fail when the input directory does not exist', async () => {
      const missing = join(tempDir, 'missing');
      const orchestrator = new BenchmarkOrchestrator(config({ inputDir: missing }), {
        executor: createFakeExecutor(),
      });

      await expect(orchestrator.runBenchmark('GET')).rejects.toThrow(NoInputFilesError);
      await expect(orchestrator.runBenchmark('GET')).rejects.toThrow(
        `Input directory does not exist: ${missing}`
      );
    });

    it('should fail when no dataset files are present', async () => {
      await writeFile(join(inputDir, 'readme.txt'), 'x');
      const orchestrator = new BenchmarkOrchestrator(config(), { executor: createFakeExecutor() });

      await expect(orchestrator.runBenchmark('PUT')).rejects.toThrow(
        `No *.bin files found in input directory: ${inputDir}`
      );
    });

    it('should wait between the warmup and measured phases', async () => {
      await writeDataset({ 'file_0001.bin': 8, 'file_0002.bin': 8 });
      const sleep = vi.fn(async (_ms: number) => {});
      const orchestrator = new BenchmarkOrchestrator(config({ warmup: 1, waitSeconds: 2 }), {
        executor: createFakeExecutor(),
        sleep,
      });

      const report = await orchestrator.runBenchmark('PUT');

      expect(sleep).toHaveBeenCalledTimes(1);
      expect(sleep).toHaveBeenCalledWith(2000);
      expect(report.results.map((result) => result.warmup)).toEqual([true, false, false]);
    });

    it('should not wait when there was no warmup', async () => {
      await writeDataset({ 'file_0001.bin': 8 });
      const sleep = vi.fn(async (_ms: number) => {});
      const orchestrator = new BenchmarkOrchestrator(config({ warmup: 0, waitSeconds: 2 }), {
        executor: createFakeExecutor(),
        sleep,
      });

      await orchestrator.runBenchmark('PUT');

      expect(sleep).not.toHaveBeenCalled();
    });

    it('should persist every result to the output file', async () => {
      await writeDataset({ 'file_0001.bin': 8, 'file_0002.bin': 8 });
      const outFile = join(tempDir, 'results.csv');
      const orchestrator = new BenchmarkOrchestrator(config({ outFile, warmup: 1 }), {
        executor: createFakeExecutor(),
      });

      await orchestrator.runBenchmark('DELETE');

      const lines = (await readFile(outFile, 'utf-8')).trimEnd().split('\r\n');
      expect(lines).toHaveLength(4);
      expect(lines[1]).toMatch(/^\d+,DELETE,file_0001\.bin,8,1500,success,,true$/);
      expect(lines[3]).toMatch(/^\d+,DELETE,file_0002\.bin,8,1500,success,,false$/);
    });

    it('should persist collected results before rethrowing an abort', async () => {
      await writeDataset({ 'file_0001.bin': 8, 'file_0002.bin': 8, 'file_0003.bin': 8 });
      const outFile = join(tempDir, 'results.csv');
      // call 0 is warmup, calls 1 and 2 are the first two measured files
      const executor = createFakeExecutor((call) => call === 2);
      const orchestrator = new BenchmarkOrchestrator(config({ outFile, warmup: 1 }), { executor });

      await expect(orchestrator.runBenchmark('PUT')).rejects.toThrow(CommandExecutionFailureError);

      expect(executor.execute).toHaveBeenCalledTimes(3);
      const lines = (await readFile(outFile, 'utf-8')).trimEnd().split('\r\n');
      expect(lines).toHaveLength(4);
      expect(lines[3]).toMatch(/^\d+,PUT,file_0002\.bin,8,1500,fail,simulated failure,false$/);
    });

    it('should write nothing when logging is disabled', async () => {
      await writeDataset({ 'file_0001.bin': 8 });
      const outFile = join(tempDir, 'results.csv');
      const orchestrator = new BenchmarkOrchestrator(config({ outFile, noLog: true }), {
        executor: createFakeExecutor(),
      });

      const report = await orchestrator.runBenchmark('GET');

      expect(report.results).toHaveLength(1);
      expect(existsSync(outFile)).toBe(false);
    });

    it('should reject an operation without a template', async () => {
      await writeDataset({ 'file_0001.bin': 8 });
      const orchestrator = new BenchmarkOrchestrator(config({ commands: { put: 'x {file}' } }), {
        executor: createFakeExecutor(),
      });

      await expect(orchestrator.runBenchmark('DELETE')).rejects.toThrow(
        'No command template provided for delete operation'
      );
    });
  });

  describe('runGenerate', () => {
    it('should generate the configured dataset', async () => {
      const outputDir = join(tempDir, 'generated');
      const orchestrator = new BenchmarkOrchestrator(
        createConfig({ outputDir, fileSize: '1KB', totalSize: '3KB' }),
        { diskSpaceProbe: unlimitedDiskSpace }
      );

      const manifest = await orchestrator.runGenerate();

      expect(manifest.map((entry) => entry.name)).toEqual(['file_0001.bin', 'file_0002.bin', 'file_0003.bin']);
    });
  });

  describe('validateCommands', () => {
    it('should pass when every operation has a template', () => {
      expect(() => new BenchmarkOrchestrator(config()).validateCommands()).not.toThrow();
    });

    it('should name every missing operation', () => {
      const orchestrator = new BenchmarkOrchestrator(config({ commands: { put: 'x {file}' } }));

      expect(() => orchestrator.validateCommands()).toThrow(MissingCommandTemplateError);
      expect(() => orchestrator.validateCommands()).toThrow(
        'No command template provided for operations: get, delete'
      );
    });
  });

  describe('runFullCycle', () => {
    it('should acknowledge the request without running anything', async () => {
      const executor = createFakeExecutor();
      const orchestrator = new BenchmarkOrchestrator(config(), { executor });

      await expect(orchestrator.runFullCycle()).resolves.toEqual({ mode: 'full-cycle', executed: false });
      expect(executor.execute).not.toHaveBeenCalled();
    });

    it('should require all command templates', async () => {
      const orchestrator = new BenchmarkOrchestrator(config({ commands: {} }));

      await expect(orchestrator.runFullCycle()).rejects.toThrow(
        'No command template provided for operations: put, get, delete'
      );
    });
  });
});
