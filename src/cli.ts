#!/usr/bin/env node
/**
 * objbench CLI
 *
 * Command-line entry point: parses arguments, builds the immutable
 * configuration and dispatches to BenchmarkOrchestrator. This module is the
 * single place where errors are turned into messages and exit codes.
 */

import 'dotenv/config';
import { Command, InvalidArgumentError, Option } from 'commander';
import {
  ConfigLoader,
  DEFAULT_OUT_FILE,
  loadEnvDefaults,
  mergeConfigLayers,
  parseConfig,
  type BenchConfig,
  type ConfigLayer,
} from './config/index.js';
import { BenchmarkOrchestrator } from './core/orchestrator.js';
import { parseOperation } from './core/operation.js';
import { isLogLevel, setLogLevel, type LogLevel } from './utils/logger.js';

const VERSION = '0.1.0';

interface CommonOptions {
  config?: string;
  logLevel?: LogLevel;
}

interface TemplateOptions extends CommonOptions {
  putCmd?: string;
  getCmd?: string;
  delCmd?: string;
  out?: string;
  warmup?: number;
  wait?: number;
  /** false when --no-log is given */
  log: boolean;
}

interface GenerateOptions extends CommonOptions {
  outputDir: string;
  fileSize: string;
  totalSize: string;
}

interface BenchmarkOptions extends TemplateOptions {
  op: string;
  inputDir: string;
}

interface RootOptions extends TemplateOptions {
  all?: boolean;
  outputDir?: string;
  inputDir?: string;
  fileSize?: string;
  totalSize?: string;
  reuseFiles?: boolean;
}

// ============================================
// Option parsing
// ============================================

function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return parsed;
}

function parseNonNegativeNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be a non-negative number.');
  }
  return parsed;
}

function parseLogLevel(value: string): LogLevel {
  const normalized = value.toLowerCase();
  if (!isLogLevel(normalized)) {
    throw new InvalidArgumentError('Must be one of fatal, error, warn, info, debug, trace, silent.');
  }
  return normalized;
}

function addCommonOptions(command: Command): Command {
  return command
    .option('--config <file>', 'YAML file with benchmark settings')
    .option('--log-level <level>', 'Diagnostic log level (default: info)', parseLogLevel);
}

function addTemplateOptions(command: Command): Command {
  return addCommonOptions(command)
    .option('--put-cmd <template>', 'PUT command template; {file} is replaced by the file path')
    .option('--get-cmd <template>', 'GET command template')
    .option('--del-cmd <template>', 'DELETE command template')
    .option('--out <path>', `Output file, CSV or JSON Lines (default: ${DEFAULT_OUT_FILE})`)
    .option('--warmup <n>', 'Number of warm-up operations (default: 3)', parseNonNegativeInt)
    .option('--wait <seconds>', 'Wait time between phases in seconds (default: 5)', parseNonNegativeNumber)
    .option('--no-log', 'Disable result output for ultra-low-overhead timing');
}

// ============================================
// Configuration
// ============================================

function templateLayer(options: TemplateOptions): ConfigLayer {
  return {
    outFile: options.out,
    warmup: options.warmup,
    waitSeconds: options.wait,
    noLog: options.log === false ? true : undefined,
    commands: {
      put: options.putCmd,
      get: options.getCmd,
      delete: options.delCmd,
    },
  };
}

/**
 * Flags > config file > environment > defaults
 */
function buildConfig(flags: ConfigLayer, configFile: string | undefined): BenchConfig {
  const fileLayer = configFile ? new ConfigLoader().load(configFile) : {};
  return parseConfig(
    mergeConfigLayers({ outFile: DEFAULT_OUT_FILE }, loadEnvDefaults(), fileLayer, flags)
  );
}

function applyLogLevel(level: LogLevel | undefined): void {
  if (level) {
    setLogLevel(level);
  }
}

// ============================================
// Error boundary
// ============================================

async function runAction(task: () => Promise<void>): Promise<void> {
  try {
    await task();
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}

// ============================================
// Commands
// ============================================

const program = new Command();

program
  .name('objbench')
  .description('Object storage micro-benchmark harness')
  .version(VERSION)
  .enablePositionalOptions()
  .addHelpText(
    'after',
    `
Examples:
  # Generate test files
  $ objbench generate --output-dir ./testfiles --file-size 10MB --total-size 1GB

  # Benchmark PUT operations
  $ objbench benchmark --op put --input-dir ./testfiles --put-cmd "aws s3 cp {file} s3://bucket/"

  # Full benchmark cycle
  $ objbench --all --output-dir ./testfiles --file-size 10MB --total-size 1GB`
  );

addCommonOptions(
  program
    .command('generate')
    .description('Generate test files')
    .requiredOption('--output-dir <dir>', 'Directory for generated files')
    .requiredOption('--file-size <size>', 'Size per file (e.g., 10MB)')
    .requiredOption('--total-size <size>', 'Total dataset size (e.g., 1GB)')
).action((options: GenerateOptions) =>
  runAction(async () => {
    applyLogLevel(options.logLevel);
    const config = buildConfig(
      { outputDir: options.outputDir, fileSize: options.fileSize, totalSize: options.totalSize },
      options.config
    );

    const manifest = await new BenchmarkOrchestrator(config).runGenerate();
    console.log(`Generated ${manifest.length} files in ${config.outputDir ?? options.outputDir}`);
  })
);

addTemplateOptions(
  program
    .command('benchmark')
    .description('Run benchmark operations')
    .addOption(
      new Option('--op <operation>', 'Operation type to benchmark')
        .choices(['put', 'get', 'delete'])
        .makeOptionMandatory()
    )
    .requiredOption('--input-dir <dir>', 'Directory containing test files')
).action((options: BenchmarkOptions) =>
  runAction(async () => {
    applyLogLevel(options.logLevel);
    const operation = parseOperation(options.op);
    const config = buildConfig({ ...templateLayer(options), inputDir: options.inputDir }, options.config);

    const report = await new BenchmarkOrchestrator(config).runBenchmark(operation);
    const destination = config.outFile && !config.noLog ? ` -> ${config.outFile}` : '';
    console.log(`Completed ${options.op} benchmark: ${report.results.length} results${destination}`);
  })
);

addTemplateOptions(
  program
    .option('--all', 'Run full benchmark cycle (generate → PUT → GET → DELETE)')
    .option('--output-dir <dir>', 'Directory for generated files (--all mode)')
    .option('--input-dir <dir>', 'Directory with existing files (--all mode, skips generation)')
    .option('--file-size <size>', 'Size per file (--all mode)')
    .option('--total-size <size>', 'Total dataset size (--all mode)')
    .option('--reuse-files', 'Skip file generation if files exist (--all mode)')
).action((options: RootOptions) =>
  runAction(async () => {
    if (!options.all) {
      throw new Error('Must specify either --all or a subcommand (generate/benchmark)');
    }
    applyLogLevel(options.logLevel);
    const config = buildConfig(
      {
        ...templateLayer(options),
        outputDir: options.outputDir,
        inputDir: options.inputDir,
        fileSize: options.fileSize,
        totalSize: options.totalSize,
        reuseFiles: options.reuseFiles ? true : undefined,
      },
      options.config
    );

    await new BenchmarkOrchestrator(config).runFullCycle();
    console.log('Full benchmark cycle is not implemented yet; no operations were run.');
  })
);

process.once('SIGINT', () => {
  console.error('\nBenchmark interrupted by user');
  process.exit(1);
});

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
