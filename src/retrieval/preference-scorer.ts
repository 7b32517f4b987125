/**
 * Soft preferences: score adjustments that re-rank without excluding.
 *
 * A preference is either an attribute comparison
 * (`{ attribute: 'cuisine', value: 'Thai', weight: 0.2 }`, operator `eq`
 * unless given) or a predicate over the whole attribute map
 * (`{ when: lte('prepTime', 30), weight: 0.15 }`).
 *
 * Scoring starts from the retrieval similarity and adds the weight of every
 * matching preference. Weights may be negative (penalties) and all matches
 * apply, so two matching preferences on one item both count.
 */

import { InvalidArgumentError } from '../utils/errors.js';
import {
  buildLeaf,
  matches,
  parseFilter,
  type ComparisonOperator,
  type FilterExpression,
  type FilterValue,
} from './filter.js';
import type { Attributes } from '../storage/types.js';

export interface AttributePreference {
  attribute: string;
  value: FilterValue;
  /** Defaults to `eq` */
  operator?: ComparisonOperator;
  /** Signed adjustment added when the comparison holds */
  weight: number;
}

export interface PredicatePreference {
  when: FilterExpression;
  /** Signed adjustment added when the predicate holds */
  weight: number;
  /** Human-readable name for explanations */
  label?: string;
}

export type Preference = AttributePreference | PredicatePreference;

/**
 * A preference reduced to a predicate, ready to evaluate.
 */
export interface CompiledPreference {
  predicate: FilterExpression;
  weight: number;
  label: string;
}

function isPredicatePreference(pref: Preference): pref is PredicatePreference {
  return 'when' in pref;
}

/**
 * Validate preferences and reduce each to a predicate.
 *
 * Throws `InvalidArgumentError` (`INVALID_PREFERENCE`) on a non-finite
 * weight or a malformed comparison.
 */
export function compilePreferences(preferences: readonly Preference[]): CompiledPreference[] {
  return preferences.map((pref, i) => {
    const path = `preferences[${i}]`;
    if (typeof pref.weight !== 'number' || !Number.isFinite(pref.weight)) {
      throw new InvalidArgumentError(`${path}: weight must be a finite number`, 'INVALID_PREFERENCE');
    }

    if (isPredicatePreference(pref)) {
      let predicate: FilterExpression;
      try {
        predicate = parseFilter(pref.when, `${path}.when`);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new InvalidArgumentError(message, 'INVALID_PREFERENCE', error);
      }
      return { predicate, weight: pref.weight, label: pref.label ?? `${path}.when` };
    }

    const operator = pref.operator ?? 'eq';
    const predicate = buildLeaf(pref.attribute, operator, pref.value, path, 'INVALID_PREFERENCE');
    return {
      predicate,
      weight: pref.weight,
      label: `${pref.attribute} ${operator} ${JSON.stringify(pref.value)}`,
    };
  });
}

/**
 * Turn an untrusted preference list (for example a JSON request body)
 * into typed preferences. Comparison details are checked by
 * `compilePreferences`; this only checks the shape.
 */
export function parsePreferences(input: unknown, path: string = 'preferences'): Preference[] {
  if (!Array.isArray(input)) {
    throw new InvalidArgumentError(`${path}: must be an array`, 'INVALID_PREFERENCE');
  }
  return input.map((entry: unknown, i): Preference => {
    const at = `${path}[${i}]`;
    if (typeof entry !== 'object' || entry === null || Array.isArray(entry)) {
      throw new InvalidArgumentError(`${at}: must be an object`, 'INVALID_PREFERENCE');
    }
    const weight = 'weight' in entry ? entry.weight : undefined;
    if (typeof weight !== 'number') {
      throw new InvalidArgumentError(`${at}: weight must be a finite number`, 'INVALID_PREFERENCE');
    }

    if ('when' in entry) {
      let when: FilterExpression;
      try {
        when = parseFilter(entry.when, `${at}.when`);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new InvalidArgumentError(message, 'INVALID_PREFERENCE', error);
      }
      const label = 'label' in entry && typeof entry.label === 'string' ? entry.label : undefined;
      return { when, weight, label };
    }

    const attribute = 'attribute' in entry ? entry.attribute : undefined;
    const operator = 'operator' in entry && entry.operator !== undefined ? entry.operator : 'eq';
    const value = 'value' in entry ? entry.value : undefined;
    const leaf = buildLeaf(attribute, operator, value, at, 'INVALID_PREFERENCE');
    return { attribute: leaf.attribute, operator: leaf.operator, value: leaf.value, weight };
  });
}

/**
 * Check preferences without keeping the compiled form.
 */
export function validatePreferences(preferences: readonly Preference[]): void {
  compilePreferences(preferences);
}

/**
 * Sum of weights of the compiled preferences matching the attributes.
 */
export function preferenceAdjustment(
  attributes: Attributes,
  compiled: readonly CompiledPreference[],
): number {
  let delta = 0;
  for (const pref of compiled) {
    if (matches({ attributes }, pref.predicate)) {
      delta += pref.weight;
    }
  }
  return delta;
}

/**
 * Labels of the preferences that apply to an item, in declaration order.
 */
export function matchedPreferences(
  attributes: Attributes,
  compiled: readonly CompiledPreference[],
): string[] {
  return compiled.filter((pref) => matches({ attributes }, pref.predicate)).map((p) => p.label);
}

/**
 * Final score of one item: similarity plus every matching weight.
 */
export function score(
  item: { attributes: Attributes },
  similarity: number,
  preferences: readonly Preference[],
): number {
  return similarity + preferenceAdjustment(item.attributes, compilePreferences(preferences));
}
