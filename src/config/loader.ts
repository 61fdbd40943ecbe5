/**
 * Configuration Loader
 *
 * Loads benchmark settings from YAML files and merges configuration layers.
 *
 * Resolution order (highest to lowest priority):
 * 1. CLI flags
 * 2. YAML config file (--config)
 * 3. Environment variables (see defaults.ts)
 * 4. Schema defaults
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { InvalidConfigurationError } from '../errors/index.js';

/**
 * Unvalidated configuration fragment
 */
export type ConfigLayer = Record<string, unknown>;

export class ConfigLoader {
  /**
   * Load a configuration layer from a YAML file
   *
   * Field validation is left to parseConfig so that every layer is checked together.
   */
  load(configPath: string): ConfigLayer {
    const absolutePath = resolve(process.cwd(), configPath);

    if (!existsSync(absolutePath)) {
      throw new InvalidConfigurationError(`Config file not found: ${absolutePath}`);
    }

    const content = readFileSync(absolutePath, 'utf-8');

    let raw: unknown;
    try {
      raw = parseYaml(content);
    } catch (err) {
      throw new InvalidConfigurationError(`Config file is not valid YAML: ${absolutePath}`, {
        cause: err instanceof Error ? err : undefined,
      });
    }

    // An empty document contributes nothing
    if (raw === null || raw === undefined) {
      return {};
    }

    if (!isRecord(raw)) {
      throw new InvalidConfigurationError(`Invalid config: ${absolutePath} must contain a mapping`);
    }

    return raw;
  }
}

/**
 * Merge configuration layers, lowest priority first.
 * Undefined values never override; command templates merge per operation.
 */
export function mergeConfigLayers(...layers: ConfigLayer[]): ConfigLayer {
  const merged: ConfigLayer = {};
  const commands: Record<string, unknown> = {};
  let sawCommands = false;

  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value === undefined) continue;

      if (key === 'commands' && isRecord(value)) {
        sawCommands = true;
        for (const [op, template] of Object.entries(value)) {
          if (template !== undefined) {
            commands[op] = template;
          }
        }
        continue;
      }

      merged[key] = value;
    }
  }

  if (sawCommands) {
    merged.commands = commands;
  }

  return merged;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
