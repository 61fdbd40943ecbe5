import { InvalidConfigurationError } from '../errors/index.js';
import { OPERATIONS, type Operation } from '../types/index.js';

/**
 * Accepts `put`, `get` or `delete` in any case
 */
export function parseOperation(value: string): Operation {
  const normalized = value.trim().toUpperCase();
  const match = OPERATIONS.find((op) => op === normalized);
  if (!match) {
    throw new InvalidConfigurationError(
      `Invalid operation: "${value}". Valid operations: ${OPERATIONS.map((op) => op.toLowerCase()).join(', ')}`
    );
  }
  return match;
}
