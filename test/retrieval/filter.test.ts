/**
 * Tests for hard-filter evaluation and validation.
 */

import { describe, it, expect } from 'vitest';
import {
  and,
  buildLeaf,
  contains,
  eq,
  gt,
  gte,
  lt,
  lte,
  matches,
  MAX_FILTER_DEPTH,
  ne,
  noneOf,
  not,
  oneOf,
  or,
  parseFilter,
  toNumber,
  validateFilter,
  type FilterExpression,
} from '../../src/retrieval/filter.js';
import { InvalidArgumentError } from '../../src/utils/errors.js';
import type { Attributes } from '../../src/storage/types.js';

const pasta: { attributes: Attributes } = {
  attributes: {
    cuisine: 'Italian',
    prepTime: 25,
    servings: 4,
    quick: true,
    ingredients: ['pasta', 'tomatoes', 'basil'],
    rating: '4.5',
  },
};

describe('matches', () => {
  it('gives the same answer on repeated calls and leaves the item unchanged', () => {
    const filter = and(eq('cuisine', 'Italian'), contains('ingredients', 'basil'), not(lte('prepTime', 10)));
    const before = JSON.stringify(pasta);

    const results = [matches(pasta, filter), matches(pasta, filter), matches(pasta, filter)];

    expect(results).toEqual([true, true, true]);
    expect(JSON.stringify(pasta)).toBe(before);
  });

  it('an absent filter matches everything', () => {
    expect(matches(pasta, undefined)).toBe(true);
  });

  describe('eq / ne', () => {
    it('compares strings case-sensitively', () => {
      expect(matches(pasta, eq('cuisine', 'Italian'))).toBe(true);
      expect(matches(pasta, eq('cuisine', 'italian'))).toBe(false);
    });

    it('compares booleans and numbers strictly', () => {
      expect(matches(pasta, eq('quick', true))).toBe(true);
      expect(matches(pasta, eq('prepTime', '25'))).toBe(false);
    });

    it('a list attribute never equals a scalar', () => {
      expect(matches(pasta, eq('ingredients', 'pasta'))).toBe(false);
      expect(matches(pasta, ne('ingredients', 'pasta'))).toBe(false);
    });

    it('ne is true for a different value', () => {
      expect(matches(pasta, ne('cuisine', 'Thai'))).toBe(true);
    });
  });

  describe('numeric operators', () => {
    it('compare numbers', () => {
      expect(matches(pasta, lte('prepTime', 25))).toBe(true);
      expect(matches(pasta, lt('prepTime', 25))).toBe(false);
      expect(matches(pasta, gte('servings', 4))).toBe(true);
      expect(matches(pasta, gt('servings', 4))).toBe(false);
    });

    it('coerce numeric strings on either side', () => {
      expect(matches(pasta, gte('rating', 4))).toBe(true);
      expect(matches(pasta, { kind: 'leaf', attribute: 'prepTime', operator: 'lt', value: '30' })).toBe(true);
    });

    it('are false for non-numeric attributes', () => {
      expect(matches(pasta, lt('cuisine', 100))).toBe(false);
      expect(matches(pasta, lt('ingredients', 100))).toBe(false);
    });
  });

  describe('contains', () => {
    it('checks list membership', () => {
      expect(matches(pasta, contains('ingredients', 'basil'))).toBe(true);
      expect(matches(pasta, contains('ingredients', 'peanuts'))).toBe(false);
    });

    it('is false for scalar attributes', () => {
      expect(matches(pasta, contains('cuisine', 'Italian'))).toBe(false);
    });
  });

  describe('in / nin', () => {
    it('test a scalar against a value list', () => {
      expect(matches(pasta, oneOf('cuisine', ['Thai', 'Italian']))).toBe(true);
      expect(matches(pasta, oneOf('cuisine', ['Thai']))).toBe(false);
      expect(matches(pasta, noneOf('cuisine', ['Thai']))).toBe(true);
      expect(matches(pasta, noneOf('cuisine', ['Italian']))).toBe(false);
    });
  });

  describe('missing attributes', () => {
    it('make every operator false, ne and nin included', () => {
      const leaves: FilterExpression[] = [
        eq('spice', 'hot'),
        ne('spice', 'hot'),
        lt('spice', 3),
        contains('spice', 'hot'),
        oneOf('spice', ['hot']),
        noneOf('spice', ['hot']),
      ];
      for (const leaf of leaves) {
        expect(matches(pasta, leaf)).toBe(false);
      }
    });

    it('do not match inherited properties', () => {
      expect(matches(pasta, eq('constructor', 'x'))).toBe(false);
    });
  });

  describe('combinators', () => {
    it('and requires every child', () => {
      expect(matches(pasta, and(eq('cuisine', 'Italian'), lte('prepTime', 30)))).toBe(true);
      expect(matches(pasta, and(eq('cuisine', 'Italian'), lte('prepTime', 20)))).toBe(false);
    });

    it('or requires one child', () => {
      expect(matches(pasta, or(eq('cuisine', 'Thai'), lte('prepTime', 30)))).toBe(true);
      expect(matches(pasta, or(eq('cuisine', 'Thai'), lte('prepTime', 20)))).toBe(false);
    });

    it('not negates', () => {
      expect(matches(pasta, not(contains('ingredients', 'peanuts')))).toBe(true);
      expect(matches(pasta, not(contains('ingredients', 'basil')))).toBe(false);
    });

    it('not over a missing attribute is true', () => {
      expect(matches(pasta, not(eq('spice', 'hot')))).toBe(true);
    });

    it('empty and is true, empty or is false', () => {
      expect(matches(pasta, and())).toBe(true);
      expect(matches(pasta, or())).toBe(false);
    });
  });
});

describe('toNumber', () => {
  it('accepts finite numbers and numeric strings', () => {
    expect(toNumber(3)).toBe(3);
    expect(toNumber(' 2.5 ')).toBe(2.5);
  });

  it('rejects everything else', () => {
    expect(toNumber('')).toBeUndefined();
    expect(toNumber('abc')).toBeUndefined();
    expect(toNumber(true)).toBeUndefined();
    expect(toNumber(['1'])).toBeUndefined();
    expect(toNumber(Number.NaN)).toBeUndefined();
  });
});

describe('parseFilter', () => {
  it('parses a nested tree', () => {
    const parsed = parseFilter({
      kind: 'and',
      children: [
        { kind: 'leaf', attribute: 'cuisine', operator: 'eq', value: 'Italian' },
        { kind: 'not', child: { kind: 'leaf', attribute: 'ingredients', operator: 'contains', value: 'nuts' } },
      ],
    });

    expect(parsed).toEqual(and(eq('cuisine', 'Italian'), not(contains('ingredients', 'nuts'))));
  });

  it('rejects an unknown kind', () => {
    expect(() => parseFilter({ kind: 'xor', children: [] })).toThrow('filter: unknown node kind "xor"');
  });

  it('rejects an unknown operator with INVALID_FILTER', () => {
    try {
      parseFilter({ kind: 'leaf', attribute: 'a', operator: 'like', value: 'x' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidArgumentError);
      expect(error).toMatchObject({ code: 'INVALID_FILTER', message: 'filter: unsupported operator "like"' });
    }
  });

  it('reports the path of a bad child', () => {
    expect(() =>
      parseFilter({ kind: 'or', children: [eq('a', 1), { kind: 'leaf', attribute: 'b', operator: 'lt', value: 'x' }] }),
    ).toThrow('filter.children[1]: lt expects a numeric value, got "x"');
  });

  it('rejects a combinator without children', () => {
    expect(() => parseFilter({ kind: 'and' })).toThrow('filter: combinator requires a children array');
  });

  it('rejects non-objects', () => {
    expect(() => parseFilter('cuisine = Italian')).toThrow('filter: must be an object');
    expect(() => parseFilter(null)).toThrow('filter: must be an object');
  });

  it('rejects trees deeper than the nesting limit', () => {
    let tree: FilterExpression = eq('a', 1);
    for (let i = 0; i <= MAX_FILTER_DEPTH; i++) {
      tree = not(tree);
    }
    expect(() => parseFilter(tree)).toThrow(InvalidArgumentError);
  });
});

describe('buildLeaf', () => {
  it('rejects an empty attribute', () => {
    expect(() => buildLeaf('', 'eq', 1, 'p')).toThrow('p: attribute must be a non-empty string');
  });

  it('rejects non-scalar eq values', () => {
    expect(() => buildLeaf('a', 'eq', ['x'], 'p')).toThrow('p: eq expects a string, number or boolean');
  });

  it('rejects a non-string contains value', () => {
    expect(() => buildLeaf('a', 'contains', 3, 'p')).toThrow('p: contains expects a string');
  });

  it('rejects non-array in values and nested lists', () => {
    expect(() => buildLeaf('a', 'in', 'x', 'p')).toThrow('p: in expects an array of values');
    expect(() => buildLeaf('a', 'nin', [['x']], 'p')).toThrow('p: nin values must be strings, numbers or booleans');
  });

  it('uses the given error code', () => {
    expect(() => buildLeaf('a', 'bad', 1, 'p', 'INVALID_PREFERENCE')).toThrow(
      expect.objectContaining({ code: 'INVALID_PREFERENCE' }),
    );
  });
});

describe('validateFilter', () => {
  it('accepts well-formed trees', () => {
    expect(() => validateFilter(and(eq('a', 1), or(lt('b', 2), oneOf('c', ['x']))))).not.toThrow();
  });
});
