/**
 * Readers for untrusted request fields.
 *
 * Each throws `InvalidArgumentError` naming the field, which the error
 * middleware turns into a 400.
 */

import { InvalidArgumentError } from '../utils/errors.js';

export type Body = Record<string, unknown>;

export function readBody(input: unknown): Body {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    throw new InvalidArgumentError('request body must be a JSON object', 'INVALID_REQUEST');
  }
  const body: Body = {};
  for (const [key, value] of Object.entries(input)) {
    body[key] = value;
  }
  return body;
}

export function requireText(body: Body, key: string, code: string = 'INVALID_QUERY'): string {
  const value = body[key];
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new InvalidArgumentError(`${key} must be a non-empty string`, code);
  }
  return value;
}

export function optionalNumber(body: Body, key: string, code: string): number | undefined {
  const value = body[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number') {
    throw new InvalidArgumentError(`${key} must be a number`, code);
  }
  return value;
}

export function requireStringList(body: Body, key: string, code: string): string[] {
  const value = body[key];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new InvalidArgumentError(`${key} must be an array of strings`, code);
  }
  return value;
}
