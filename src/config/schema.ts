/**
 * Benchmark configuration schema
 *
 * A BenchConfig is validated once, frozen, and then passed by reference to every
 * component. Nothing mutates it after createConfig() returns.
 */

import { z } from 'zod';
import { InvalidConfigurationError } from '../errors/index.js';
import type { Operation } from '../types/index.js';

export const DEFAULT_WARMUP = 3;
export const DEFAULT_WAIT_SECONDS = 5;

/**
 * Token replaced with the target file's path in command templates
 */
export const FILE_PLACEHOLDER = '{file}';

export const CommandTemplatesSchema = z
  .object({
    put: z.string().optional(),
    get: z.string().optional(),
    delete: z.string().optional(),
  })
  .strict();

export const BenchConfigSchema = z
  .object({
    /** Directory for generated files */
    outputDir: z.string().min(1).optional(),
    /** Directory holding an existing dataset */
    inputDir: z.string().min(1).optional(),
    /** Size expression per file, e.g. "10MB" */
    fileSize: z.string().min(1).optional(),
    /** Size expression for the whole dataset, e.g. "1GB" */
    totalSize: z.string().min(1).optional(),
    warmup: z.number().int().min(0).default(DEFAULT_WARMUP),
    /** Pause between the warmup and measured phases */
    waitSeconds: z.number().min(0).default(DEFAULT_WAIT_SECONDS),
    /** Result sink; `.csv` selects CSV, anything else JSON Lines */
    outFile: z.string().min(1).optional(),
    /** Drop all result output */
    noLog: z.boolean().default(false),
    /** Reuse an existing dataset in full-cycle mode */
    reuseFiles: z.boolean().default(false),
    commands: CommandTemplatesSchema.default({}),
  })
  .strict();

export type CommandTemplates = z.infer<typeof CommandTemplatesSchema>;

/**
 * Shape accepted by createConfig (defaults may be omitted)
 */
export type BenchConfigInput = z.input<typeof BenchConfigSchema>;

export type BenchConfig = Readonly<
  Omit<z.output<typeof BenchConfigSchema>, 'commands'> & {
    commands: Readonly<CommandTemplates>;
  }
>;

/**
 * Validate raw input and return a frozen configuration
 *
 * @throws InvalidConfigurationError listing every failing field
 */
export function createConfig(input: BenchConfigInput = {}): BenchConfig {
  return parseConfig(input);
}

/**
 * Same as createConfig for input of unknown shape (YAML files, merged CLI layers)
 */
export function parseConfig(raw: unknown): BenchConfig {
  const parsed = BenchConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'config'}: ${issue.message}`)
      .join('; ');
    throw new InvalidConfigurationError(`Invalid configuration: ${details}`);
  }

  const commands = Object.freeze({ ...parsed.data.commands });
  return Object.freeze({ ...parsed.data, commands });
}

/**
 * Look up the template for an operation; empty strings count as absent
 */
export function commandTemplateFor(
  commands: Readonly<CommandTemplates>,
  operation: Operation
): string | undefined {
  const template =
    operation === 'PUT' ? commands.put : operation === 'GET' ? commands.get : commands.delete;
  return template && template.trim().length > 0 ? template : undefined;
}
