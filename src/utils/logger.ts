/**
 * Structured logging for objbench (pino)
 *
 * Diagnostics only. Benchmark results never go through the logger; they are
 * persisted by OutputWriter so that log volume cannot perturb timings.
 */

import pino from 'pino';
import { createRequire } from 'module';
import { getEnvOptional, hasEnv } from './env.js';

const require = createRequire(import.meta.url);

export type LogLevel = pino.LevelWithSilent;

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * LOG_LEVEL wins; otherwise silent under test and info everywhere else
 */
function resolveLogLevel(): LogLevel {
  const fromEnv = getEnvOptional('LOG_LEVEL')?.toLowerCase();
  if (fromEnv && isLogLevel(fromEnv)) {
    return fromEnv;
  }
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

function usePrettyTransport(): boolean {
  const env = process.env.NODE_ENV || '';
  if (env === 'production' || env === 'test' || hasEnv('CI')) {
    return false;
  }
  // pino-pretty is a dev dependency and may be absent in installed builds
  try {
    require.resolve('pino-pretty');
    return true;
  } catch {
    return false;
  }
}

const pretty = usePrettyTransport();
const children = new Set<pino.Logger>();

/**
 * Root logger. Writes to stderr so stdout stays free for command output.
 */
export const logger = pino(
  {
    level: resolveLogLevel(),
    base: { service: 'objbench' },
    ...(pretty
      ? {
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname,service',
              destination: 2,
            },
          },
        }
      : {}),
  },
  pretty ? undefined : pino.destination(2)
);

/**
 * Create a child logger bound to a module name
 *
 * @example
 * const log = createLogger('FileGenerator');
 * log.info({ files: 4, bytes: 4096 }, 'Generation complete');
 */
export function createLogger(context: string): pino.Logger {
  const child = logger.child({ context });
  children.add(child);
  return child;
}

/**
 * Change the level of the root logger and of every module logger.
 * pino children copy the level at creation, so they are updated explicitly.
 */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
  for (const child of children) {
    child.level = level;
  }
}
