/**
 * Utility functions and helpers
 */

export { logger, createLogger, setLogLevel, isLogLevel, type LogLevel } from './logger.js';

export { getEnvOptional, hasEnv, getEnvNumber } from './env.js';

export { sleep } from './sleep.js';
