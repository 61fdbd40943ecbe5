/**
 * File Generator
 *
 * Writes a reproducible dataset of equally sized binary files.
 */

import { mkdir, open, stat, statfs } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { basename, dirname, join, resolve } from 'node:path';
import { InsufficientDiskSpaceError, InvalidConfigurationError } from '../errors/index.js';
import type { BenchConfig } from '../config/index.js';
import type { FileManifest, ManifestEntry } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { parseSize } from './size-parser.js';
import { SeededRandom } from './seeded-random.js';

const logger = createLogger('FileGenerator');

/** Seed used for every generation run */
export const GENERATION_SEED = 42;

/** Upper bound for a single random draw + write */
const CHUNK_SIZE = 1024 * 1024;

/**
 * Returns free bytes on the filesystem holding `dir`
 */
export type DiskSpaceProbe = (dir: string) => Promise<number>;

export interface FileGeneratorOptions {
  diskSpaceProbe?: DiskSpaceProbe;
}

/**
 * Name of the n-th generated file (1-indexed)
 */
export function datasetFileName(index: number): string {
  return `file_${String(index).padStart(4, '0')}.bin`;
}

/**
 * Free space available to unprivileged users, via statfs
 */
export const statfsDiskSpace: DiskSpaceProbe = async (dir) => {
  const stats = await statfs(dir);
  return stats.bavail * stats.bsize;
};

/**
 * Nearest ancestor of `dir` (inclusive) that exists on disk
 */
function nearestExistingDir(dir: string): string {
  let current = resolve(dir);
  while (!existsSync(current)) {
    const parent = dirname(current);
    if (parent === current) break;
    current = parent;
  }
  return current;
}

export class FileGenerator {
  private readonly config: BenchConfig;
  private readonly diskSpaceProbe: DiskSpaceProbe;

  constructor(config: BenchConfig, options: FileGeneratorOptions = {}) {
    this.config = config;
    this.diskSpaceProbe = options.diskSpaceProbe ?? statfsDiskSpace;
  }

  /**
   * Generate `floor(totalSize / fileSize)` files of exactly `fileSize` bytes.
   *
   * Every call starts a fresh stream from GENERATION_SEED and draws from it in
   * file order, so file N depends on everything generated before it and
   * identical parameters give byte-identical output.
   *
   * @returns Manifest of written files in generation order
   */
  async generate(): Promise<FileManifest> {
    const { outputDir, fileSize, totalSize } = this.config;
    if (!outputDir || !fileSize || !totalSize) {
      throw new InvalidConfigurationError(
        'Missing required parameters for file generation (outputDir, fileSize, totalSize)'
      );
    }

    const fileSizeBytes = parseSize(fileSize);
    const totalSizeBytes = parseSize(totalSize);

    if (fileSizeBytes <= 0) {
      throw new InvalidConfigurationError(`File size must be greater than zero bytes: ${fileSize}`);
    }

    const numFiles = Math.floor(totalSizeBytes / fileSizeBytes);
    if (numFiles === 0) {
      throw new InvalidConfigurationError(
        `File size (${fileSize}) is larger than total size (${totalSize})`
      );
    }

    await this.ensureDiskSpace(outputDir, totalSizeBytes);

    await mkdir(outputDir, { recursive: true });

    const rng = new SeededRandom(GENERATION_SEED);
    const manifest: ManifestEntry[] = [];

    logger.info(
      { outputDir, files: numFiles, fileSizeBytes },
      `Generating ${numFiles} files of ${fileSizeBytes.toLocaleString('en-US')} bytes each`
    );

    for (let index = 1; index <= numFiles; index++) {
      const filePath = join(outputDir, datasetFileName(index));
      await this.writeFile(filePath, fileSizeBytes, rng);
      manifest.push({ path: filePath, name: basename(filePath), sizeBytes: fileSizeBytes });
      logger.debug({ file: filePath }, 'File written');
    }

    let actualTotal = 0;
    for (const entry of manifest) {
      actualTotal += (await stat(entry.path)).size;
    }

    logger.info(
      { files: manifest.length, bytes: actualTotal },
      `Generated ${manifest.length} files, total size: ${actualTotal.toLocaleString('en-US')} bytes`
    );

    return manifest;
  }

  /**
   * Advisory check against the filesystem holding the output directory's parent
   */
  private async ensureDiskSpace(outputDir: string, requiredBytes: number): Promise<void> {
    const probeDir = nearestExistingDir(dirname(resolve(outputDir)));
    const availableBytes = await this.diskSpaceProbe(probeDir);

    if (availableBytes < requiredBytes) {
      throw new InsufficientDiskSpaceError(requiredBytes, availableBytes);
    }
  }

  private async writeFile(filePath: string, size: number, rng: SeededRandom): Promise<void> {
    const handle = await open(filePath, 'w');
    try {
      let remaining = size;
      while (remaining > 0) {
        const chunk = rng.nextBytes(Math.min(CHUNK_SIZE, remaining));
        let offset = 0;
        while (offset < chunk.length) {
          const { bytesWritten } = await handle.write(chunk, offset, chunk.length - offset);
          offset += bytesWritten;
        }
        remaining -= chunk.length;
      }
    } finally {
      await handle.close();
    }
  }
}
