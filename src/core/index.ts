/**
 * Core module exports
 */

export { parseSize } from './size-parser.js';

export { SeededRandom } from './seeded-random.js';

export {
  FileGenerator,
  GENERATION_SEED,
  datasetFileName,
  statfsDiskSpace,
} from './file-generator.js';
export type { DiskSpaceProbe, FileGeneratorOptions } from './file-generator.js';

export { TemplatedCommand, ShellCommandExecutor } from './command-executor.js';
export type { CommandExecutor } from './command-executor.js';

export { BenchmarkRunner } from './benchmark-runner.js';
export type { BenchmarkRunnerConfig } from './benchmark-runner.js';

export {
  OutputWriter,
  FLUSH_THRESHOLD,
  RESULT_COLUMNS,
  outputFormatFor,
  escapeCsvField,
  formatCsvRow,
  formatJsonLine,
} from './output-writer.js';
export type { OutputFormat, OutputWriterOptions, ResultColumn } from './output-writer.js';

export { BenchmarkOrchestrator, DATASET_GLOB } from './orchestrator.js';
export type { OrchestratorDependencies } from './orchestrator.js';

export { parseOperation } from './operation.js';
