/**
 * objbench - object storage micro-benchmark harness
 *
 * Library entry point. The command-line interface lives in cli.ts.
 */

export * from './types/index.js';
export * from './errors/index.js';
export * from './config/index.js';
export * from './core/index.js';
export * from './utils/index.js';
