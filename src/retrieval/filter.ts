/**
 * Hard-filter expressions over item attributes.
 *
 * A filter is a tree: leaves compare one attribute against a value,
 * combinators join child results with AND / OR / NOT.
 *
 * ```
 * and(
 *   eq('cuisine', 'Italian'),
 *   lte('prepTime', 30),
 *   not(contains('ingredients', 'peanuts')),
 * )
 * ```
 *
 * ## Evaluation rules
 *
 * - A leaf over a missing attribute is false, for every operator
 *   (`ne` and `nin` included). This is a non-match, not an error.
 * - `eq` / `ne` compare scalars strictly; strings are case-sensitive and a
 *   list attribute never equals a scalar.
 * - Numeric operators coerce both sides (numbers and numeric strings);
 *   anything else makes the leaf false.
 * - `contains` requires a list attribute holding the value.
 * - `in` / `nin` test a scalar attribute against a list of values.
 * - `and([])` is true, `or([])` is false (vacuous truth).
 *
 * Evaluation is pure, so candidates can be checked in any order.
 *
 * Malformed trees (unknown kind or operator, wrong value type) are
 * rejected by `parseFilter` / `validateFilter` with an
 * `InvalidArgumentError` before any item is evaluated.
 *
 * @module retrieval/filter
 */

import { InvalidArgumentError } from '../utils/errors.js';
import type { AttributeValue, Attributes } from '../storage/types.js';

export type ScalarValue = string | number | boolean;

export type EqualityOperator = 'eq' | 'ne';
export type NumericOperator = 'lt' | 'lte' | 'gt' | 'gte';
export type MembershipOperator = 'in' | 'nin';
export type ComparisonOperator = EqualityOperator | NumericOperator | 'contains' | MembershipOperator;

export const COMPARISON_OPERATORS: readonly ComparisonOperator[] = [
  'eq',
  'ne',
  'lt',
  'lte',
  'gt',
  'gte',
  'contains',
  'in',
  'nin',
];

/** Any value a leaf may compare against. */
export type FilterValue = ScalarValue | ScalarValue[];

export type LeafFilter =
  | { kind: 'leaf'; attribute: string; operator: EqualityOperator; value: ScalarValue }
  | { kind: 'leaf'; attribute: string; operator: NumericOperator; value: number | string }
  | { kind: 'leaf'; attribute: string; operator: 'contains'; value: string }
  | { kind: 'leaf'; attribute: string; operator: MembershipOperator; value: ScalarValue[] };

export interface AndFilter {
  kind: 'and';
  children: FilterExpression[];
}

export interface OrFilter {
  kind: 'or';
  children: FilterExpression[];
}

export interface NotFilter {
  kind: 'not';
  child: FilterExpression;
}

export type FilterExpression = LeafFilter | AndFilter | OrFilter | NotFilter;

/** Nesting limit for trees arriving over the wire. */
export const MAX_FILTER_DEPTH = 32;

// ─── Builders ────────────────────────────────────────────────────────────────

export function eq(attribute: string, value: ScalarValue): LeafFilter {
  return { kind: 'leaf', attribute, operator: 'eq', value };
}

export function ne(attribute: string, value: ScalarValue): LeafFilter {
  return { kind: 'leaf', attribute, operator: 'ne', value };
}

export function lt(attribute: string, value: number): LeafFilter {
  return { kind: 'leaf', attribute, operator: 'lt', value };
}

export function lte(attribute: string, value: number): LeafFilter {
  return { kind: 'leaf', attribute, operator: 'lte', value };
}

export function gt(attribute: string, value: number): LeafFilter {
  return { kind: 'leaf', attribute, operator: 'gt', value };
}

export function gte(attribute: string, value: number): LeafFilter {
  return { kind: 'leaf', attribute, operator: 'gte', value };
}

export function contains(attribute: string, value: string): LeafFilter {
  return { kind: 'leaf', attribute, operator: 'contains', value };
}

export function oneOf(attribute: string, values: ScalarValue[]): LeafFilter {
  return { kind: 'leaf', attribute, operator: 'in', value: values };
}

export function noneOf(attribute: string, values: ScalarValue[]): LeafFilter {
  return { kind: 'leaf', attribute, operator: 'nin', value: values };
}

export function and(...children: FilterExpression[]): AndFilter {
  return { kind: 'and', children };
}

export function or(...children: FilterExpression[]): OrFilter {
  return { kind: 'or', children };
}

export function not(child: FilterExpression): NotFilter {
  return { kind: 'not', child };
}

// ─── Evaluation ──────────────────────────────────────────────────────────────

/**
 * Coerce a value to a finite number, or undefined when it is not numeric.
 */
export function toNumber(value: AttributeValue | ScalarValue[]): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

function compareNumeric(operator: NumericOperator, a: number, b: number): boolean {
  switch (operator) {
    case 'lt':
      return a < b;
    case 'lte':
      return a <= b;
    case 'gt':
      return a > b;
    case 'gte':
      return a >= b;
  }
}

/**
 * Evaluate a single leaf against an attribute map.
 */
export function evaluateLeaf(attributes: Attributes, leaf: LeafFilter): boolean {
  if (!Object.hasOwn(attributes, leaf.attribute)) {
    return false;
  }
  const actual = attributes[leaf.attribute];

  switch (leaf.operator) {
    case 'eq':
      return !Array.isArray(actual) && actual === leaf.value;
    case 'ne':
      return !Array.isArray(actual) && actual !== leaf.value;
    case 'lt':
    case 'lte':
    case 'gt':
    case 'gte': {
      const a = toNumber(actual);
      const b = toNumber(leaf.value);
      if (a === undefined || b === undefined) return false;
      return compareNumeric(leaf.operator, a, b);
    }
    case 'contains':
      return Array.isArray(actual) && actual.includes(leaf.value);
    case 'in':
      return !Array.isArray(actual) && leaf.value.includes(actual);
    case 'nin':
      return !Array.isArray(actual) && !leaf.value.includes(actual);
  }
}

/**
 * Evaluate a filter tree against an item's attributes.
 *
 * An absent filter places no constraint and matches every item.
 */
export function matches(
  item: { attributes: Attributes },
  filter: FilterExpression | undefined,
): boolean {
  if (!filter) return true;
  return evaluate(item.attributes, filter);
}

function evaluate(attributes: Attributes, node: FilterExpression): boolean {
  switch (node.kind) {
    case 'leaf':
      return evaluateLeaf(attributes, node);
    case 'and':
      return node.children.every((child) => evaluate(attributes, child));
    case 'or':
      return node.children.some((child) => evaluate(attributes, child));
    case 'not':
      return !evaluate(attributes, node.child);
  }
}

// ─── Validation ──────────────────────────────────────────────────────────────

function invalid(path: string, message: string, code: string): InvalidArgumentError {
  return new InvalidArgumentError(`${path}: ${message}`, code);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isScalar(value: unknown): value is ScalarValue {
  return (
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value))
  );
}

function isComparisonOperator(value: unknown): value is ComparisonOperator {
  return COMPARISON_OPERATORS.some((op) => op === value);
}

/**
 * Build a validated leaf from loosely typed parts.
 *
 * Shared by filter parsing and attribute preferences so both reject the
 * same malformed comparisons. `code` names the error raised.
 */
export function buildLeaf(
  attribute: unknown,
  operator: unknown,
  value: unknown,
  path: string,
  code: string = 'INVALID_FILTER',
): LeafFilter {
  if (typeof attribute !== 'string' || attribute.length === 0) {
    throw invalid(path, 'attribute must be a non-empty string', code);
  }
  if (!isComparisonOperator(operator)) {
    throw invalid(path, `unsupported operator ${JSON.stringify(operator)}`, code);
  }

  switch (operator) {
    case 'eq':
    case 'ne':
      if (!isScalar(value)) {
        throw invalid(path, `${operator} expects a string, number or boolean`, code);
      }
      return { kind: 'leaf', attribute, operator, value };
    case 'lt':
    case 'lte':
    case 'gt':
    case 'gte':
      if (typeof value !== 'number' && typeof value !== 'string') {
        throw invalid(path, `${operator} expects a numeric value`, code);
      }
      if (toNumber(value) === undefined) {
        throw invalid(path, `${operator} expects a numeric value, got ${JSON.stringify(value)}`, code);
      }
      return { kind: 'leaf', attribute, operator, value };
    case 'contains':
      if (typeof value !== 'string') {
        throw invalid(path, 'contains expects a string', code);
      }
      return { kind: 'leaf', attribute, operator, value };
    case 'in':
    case 'nin': {
      if (!Array.isArray(value)) {
        throw invalid(path, `${operator} expects an array of values`, code);
      }
      const values: ScalarValue[] = [];
      for (const entry of value) {
        if (!isScalar(entry)) {
          throw invalid(path, `${operator} values must be strings, numbers or booleans`, code);
        }
        values.push(entry);
      }
      return { kind: 'leaf', attribute, operator, value: values };
    }
  }
}

/**
 * Validate an untrusted filter tree (for example a JSON request body)
 * and return it as a typed expression.
 */
export function parseFilter(input: unknown, path: string = 'filter', depth: number = 0): FilterExpression {
  if (depth > MAX_FILTER_DEPTH) {
    throw invalid(path, `nesting deeper than ${MAX_FILTER_DEPTH}`, 'INVALID_FILTER');
  }
  if (!isRecord(input)) {
    throw invalid(path, 'must be an object', 'INVALID_FILTER');
  }

  switch (input.kind) {
    case 'leaf':
      return buildLeaf(input.attribute, input.operator, input.value, path);
    case 'and':
      return { kind: 'and', children: parseChildren(input.children, path, depth) };
    case 'or':
      return { kind: 'or', children: parseChildren(input.children, path, depth) };
    case 'not':
      return { kind: 'not', child: parseFilter(input.child, `${path}.child`, depth + 1) };
    default:
      throw invalid(path, `unknown node kind ${JSON.stringify(input.kind)}`, 'INVALID_FILTER');
  }
}

function parseChildren(children: unknown, path: string, depth: number): FilterExpression[] {
  if (!Array.isArray(children)) {
    throw invalid(path, 'combinator requires a children array', 'INVALID_FILTER');
  }
  return children.map((child, i) => parseFilter(child, `${path}.children[${i}]`, depth + 1));
}

/**
 * Check a filter tree, throwing `InvalidArgumentError` when malformed.
 *
 * Typed trees can still be malformed when built from casts or
 * deserialized data; this runs the same checks as `parseFilter`.
 */
export function validateFilter(filter: FilterExpression): void {
  parseFilter(filter);
}
