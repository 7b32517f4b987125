/**
 * Final ordering and truncation of scored candidates.
 */

import { InvalidArgumentError } from '../utils/errors.js';

/**
 * Check a result or candidate cap, throwing `InvalidArgumentError`
 * with `code` unless it is a positive integer.
 */
export function assertPositiveInteger(value: unknown, name: string, code: string): asserts value is number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new InvalidArgumentError(`${name} must be a positive integer, got ${String(value)}`, code);
  }
}

/**
 * Sort by score descending and keep the first `limit`.
 *
 * Ties keep their input order, so identical inputs always produce the
 * same output. Returns a new array; the input is left untouched.
 */
export function select<T extends { score: number }>(scored: readonly T[], limit: number): T[] {
  assertPositiveInteger(limit, 'limit', 'INVALID_LIMIT');

  return scored
    .map((entry, index) => ({ entry, index }))
    .sort((a, b) => b.entry.score - a.entry.score || a.index - b.index)
    .slice(0, limit)
    .map(({ entry }) => entry);
}
