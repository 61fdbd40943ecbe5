/**
 * Configuration Module
 *
 * All run parameters are resolved and validated through this module.
 */

export {
  type BenchConfig,
  type BenchConfigInput,
  type CommandTemplates,
  BenchConfigSchema,
  CommandTemplatesSchema,
  DEFAULT_WARMUP,
  DEFAULT_WAIT_SECONDS,
  FILE_PLACEHOLDER,
  createConfig,
  parseConfig,
  commandTemplateFor,
} from './schema.js';

export { type ConfigLayer, ConfigLoader, mergeConfigLayers } from './loader.js';

export { DEFAULT_OUT_FILE, loadEnvDefaults } from './defaults.js';
