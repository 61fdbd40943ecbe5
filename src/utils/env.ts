/**
 * Environment Variable Utilities
 *
 * Typed access to environment variables.
 */

/**
 * Get an optional environment variable (returns undefined if not set or empty)
 */
export function getEnvOptional(key: string): string | undefined {
  const value = process.env[key];
  return value ? value : undefined;
}

/**
 * Check if an environment variable is set (non-empty)
 */
export function hasEnv(key: string): boolean {
  return !!process.env[key];
}

/**
 * Get an environment variable as a number
 *
 * Values that are not finite numbers, or are below `min`, fall back to the default.
 *
 * @example
 * const warmup = getEnvNumber('OBJBENCH_WARMUP', 3, { integer: true, min: 0 });
 */
export function getEnvNumber(
  key: string,
  defaultValue: number,
  options: { integer?: boolean; min?: number } = {}
): number {
  const value = process.env[key];
  if (!value) {
    return defaultValue;
  }
  const parsed = options.integer ? Number.parseInt(value, 10) : Number.parseFloat(value);
  if (!Number.isFinite(parsed)) {
    return defaultValue;
  }
  if (options.min !== undefined && parsed < options.min) {
    return defaultValue;
  }
  return parsed;
}
