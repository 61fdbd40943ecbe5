import { describe, it, expect } from 'vitest';
import { BenchmarkRunner } from '../../../src/core/benchmark-runner.js';
import {
  CommandExecutionFailureError,
  MissingCommandTemplateError,
} from '../../../src/errors/index.js';
import { createFakeExecutor, FAKE_LATENCY_NS, makeManifest } from '../../utils/fakes.js';

const commands = {
  put: 'upload {file}',
  get: 'download {file}',
  delete: 'remove {file}',
};

describe('BenchmarkRunner', () => {
  describe('constructor', () => {
    it('should default to three warmup operations', () => {
      const runner = new BenchmarkRunner({ commands }, createFakeExecutor());
      expect(runner.getWarmup()).toBe(3);
    });

    it('should start with no results', () => {
      const runner = new BenchmarkRunner({ commands }, createFakeExecutor());
      expect(runner.getResults()).toEqual([]);
    });
  });

  describe('runWarmup', () => {
    it('should run the first N files tagged as warmup', async () => {
      const executor = createFakeExecutor();
      const runner = new BenchmarkRunner({ warmup: 2, commands }, executor);

      await runner.runWarmup('PUT', makeManifest(5));

      expect(executor.commands).toEqual(['upload /data/file_0001.bin', 'upload /data/file_0002.bin']);
      const results = runner.getResults();
      expect(results).toHaveLength(2);
      expect(results.every((result) => result.warmup)).toBe(true);
    });

    it('should cap warmup at the manifest length', async () => {
      const executor = createFakeExecutor();
      const runner = new BenchmarkRunner({ warmup: 10, commands }, executor);

      await runner.runWarmup('GET', makeManifest(3));

      expect(executor.execute).toHaveBeenCalledTimes(3);
    });

    it('should do nothing when warmup is zero', async () => {
      const executor = createFakeExecutor();
      const runner = new BenchmarkRunner({ warmup: 0, commands: {} }, executor);

      await runner.runWarmup('GET', makeManifest(3));

      expect(executor.execute).not.toHaveBeenCalled();
      expect(runner.getResults()).toEqual([]);
    });

    it('should record failures without aborting', async () => {
      const executor = createFakeExecutor((call) => call === 0);
      const runner = new BenchmarkRunner({ warmup: 3, commands }, executor);

      await runner.runWarmup('DELETE', makeManifest(3));

      const results = runner.getResults();
      expect(results.map((result) => result.status)).toEqual(['fail', 'success', 'success']);
      expect(results[0].error).toBe('simulated failure');
      expect(results[1].error).toBe('');
    });

    it('should record a command that cannot be launched as a failed warmup', async () => {
      const oversized = `true ${'x'.repeat(200_000)} {file}`;
      const runner = new BenchmarkRunner({ warmup: 2, commands: { get: oversized } });

      await expect(runner.runWarmup('GET', makeManifest(2))).resolves.toBeUndefined();

      const results = runner.getResults();
      expect(results.map((result) => [result.status, result.warmup])).toEqual([
        ['fail', true],
        ['fail', true],
      ]);
      expect(results[0].error).toBe('spawn E2BIG');
    });

    it('should require a template for the operation', async () => {
      const runner = new BenchmarkRunner({ warmup: 1, commands: { put: 'x {file}' } }, createFakeExecutor());

      await expect(runner.runWarmup('GET', makeManifest(1))).rejects.toThrow(MissingCommandTemplateError);
      await expect(runner.runWarmup('GET', makeManifest(1))).rejects.toThrow(
        'No command template provided for get operation'
      );
    });
  });

  describe('runOperation', () => {
    it('should run every file in manifest order', async () => {
      const executor = createFakeExecutor();
      const runner = new BenchmarkRunner({ warmup: 0, commands }, executor);

      await runner.runOperation('GET', makeManifest(3, 2048));

      expect(executor.commands).toEqual([
        'download /data/file_0001.bin',
        'download /data/file_0002.bin',
        'download /data/file_0003.bin',
      ]);
      const results = runner.getResults();
      expect(results).toHaveLength(3);
      expect(results[2]).toMatchObject({
        operation: 'GET',
        filename: 'file_0003.bin',
        sizeBytes: 2048,
        latencyNs: FAKE_LATENCY_NS,
        status: 'success',
        error: '',
        warmup: false,
      });
    });

    it('should append measured results after warmup results', async () => {
      const runner = new BenchmarkRunner({ warmup: 2, commands }, createFakeExecutor());
      const manifest = makeManifest(3);

      await runner.runWarmup('PUT', manifest);
      await runner.runOperation('PUT', manifest);

      const results = runner.getResults();
      expect(results.map((result) => [result.filename, result.warmup])).toEqual([
        ['file_0001.bin', true],
        ['file_0002.bin', true],
        ['file_0001.bin', false],
        ['file_0002.bin', false],
        ['file_0003.bin', false],
      ]);
    });

    it('should run to completion after an always-failing warmup', async () => {
      const executor = createFakeExecutor((call) => call < 2);
      const runner = new BenchmarkRunner({ warmup: 2, commands }, executor);
      const manifest = makeManifest(3);

      await runner.runWarmup('GET', manifest);
      await runner.runOperation('GET', manifest);

      expect(runner.getResults().map((result) => result.status)).toEqual([
        'fail',
        'fail',
        'success',
        'success',
        'success',
      ]);
    });

    it('should stop at the first failure after recording it', async () => {
      const executor = createFakeExecutor((call) => call === 1);
      const runner = new BenchmarkRunner({ warmup: 0, commands }, executor);

      const error = await runner.runOperation('PUT', makeManifest(4)).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(CommandExecutionFailureError);
      expect(error).toHaveProperty('message', 'Command failed: simulated failure');
      expect(executor.execute).toHaveBeenCalledTimes(2);

      const results = runner.getResults();
      expect(results.map((result) => result.status)).toEqual(['success', 'fail']);
      if (error instanceof CommandExecutionFailureError) {
        expect(error.result).toBe(results[1]);
      }
    });

    it('should stamp results with non-decreasing timestamps', async () => {
      const runner = new BenchmarkRunner({ warmup: 0, commands }, createFakeExecutor());

      await runner.runOperation('GET', makeManifest(5));

      const stamps = runner.getResults().map((result) => result.timestampNs);
      for (let i = 1; i < stamps.length; i++) {
        expect(stamps[i] >= stamps[i - 1]).toBe(true);
      }
    });

    it('should treat a whitespace-only template as missing', async () => {
      const runner = new BenchmarkRunner({ warmup: 0, commands: { get: '   ' } }, createFakeExecutor());

      await expect(runner.runOperation('GET', makeManifest(1))).rejects.toThrow(MissingCommandTemplateError);
    });
  });

  describe('getResults', () => {
    it('should return frozen results and a defensive copy', async () => {
      const runner = new BenchmarkRunner({ warmup: 0, commands }, createFakeExecutor());
      await runner.runOperation('GET', makeManifest(1));

      const first = runner.getResults();
      expect(Object.isFrozen(first[0])).toBe(true);

      expect(runner.getResults()).not.toBe(first);
      expect(runner.getResults()).toEqual(first);
    });
  });
});
