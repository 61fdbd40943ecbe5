/**
 * Environment-provided defaults
 *
 * Environment variables:
 * - OBJBENCH_WARMUP: Warmup invocations before measurement (integer >= 0)
 * - OBJBENCH_WAIT_SECONDS: Pause between warmup and measured phases (>= 0)
 * - OBJBENCH_OUT: Result sink path
 *
 * Unset or invalid variables contribute nothing, leaving the schema defaults in place.
 */

import { getEnvNumber, getEnvOptional } from '../utils/env.js';
import type { ConfigLayer } from './loader.js';

/**
 * Default result sink used by the CLI when nothing else names one
 */
export const DEFAULT_OUT_FILE = 'results.csv';

export function loadEnvDefaults(): ConfigLayer {
  const layer: ConfigLayer = {};

  const warmup = getEnvNumber('OBJBENCH_WARMUP', Number.NaN, { integer: true, min: 0 });
  if (!Number.isNaN(warmup)) {
    layer.warmup = warmup;
  }

  const waitSeconds = getEnvNumber('OBJBENCH_WAIT_SECONDS', Number.NaN, { min: 0 });
  if (!Number.isNaN(waitSeconds)) {
    layer.waitSeconds = waitSeconds;
  }

  const outFile = getEnvOptional('OBJBENCH_OUT');
  if (outFile) {
    layer.outFile = outFile;
  }

  return layer;
}
