/**
 * Size expression parsing ("10MB", "1.5GB", "512")
 */

import { InvalidSizeFormatError } from '../errors/index.js';

/**
 * Binary units, longest suffix first so that "B" never matches inside "MB"
 */
const UNITS: ReadonlyArray<readonly [suffix: string, multiplier: number]> = [
  ['TB', 1024 ** 4],
  ['GB', 1024 ** 3],
  ['MB', 1024 ** 2],
  ['KB', 1024],
  ['B', 1],
];

const DECIMAL_PATTERN = /^(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_PATTERN = /^\d+$/;

/**
 * Convert a size expression to an exact byte count
 *
 * The numeric part may be fractional; the product is truncated toward zero.
 * Without a unit the whole expression must be an integer byte count.
 *
 * @throws InvalidSizeFormatError when no number can be read
 *
 * @example
 * parseSize('10MB');  // 10485760
 * parseSize('1.5kb'); // 1536
 * parseSize('512');   // 512
 */
export function parseSize(expression: string): number {
  const normalized = expression.trim().toUpperCase();

  for (const [suffix, multiplier] of UNITS) {
    if (normalized.endsWith(suffix)) {
      const numberPart = normalized.slice(0, -suffix.length).trim();
      if (!DECIMAL_PATTERN.test(numberPart)) {
        throw new InvalidSizeFormatError(normalized);
      }
      return toByteCount(Number.parseFloat(numberPart) * multiplier, normalized);
    }
  }

  if (!INTEGER_PATTERN.test(normalized)) {
    throw new InvalidSizeFormatError(normalized);
  }
  return toByteCount(Number.parseInt(normalized, 10), normalized);
}

function toByteCount(value: number, expression: string): number {
  const bytes = Math.trunc(value);
  if (!Number.isSafeInteger(bytes)) {
    throw new InvalidSizeFormatError(expression);
  }
  return bytes;
}
