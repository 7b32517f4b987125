/**
 * Tests for recipe ⇄ item mapping, criteria and profile translation.
 */

import { describe, it, expect } from 'vitest';
import {
  buildRecipeFilter,
  itemToRecipe,
  parseSearchFilters,
  parseUserProfile,
  preferencesFromProfile,
  recipeContent,
  recipeToItem,
} from '../../src/recipes/recipe-mapping.js';
import { matches } from '../../src/retrieval/filter.js';
import { compilePreferences, preferenceAdjustment } from '../../src/retrieval/preference-scorer.js';
import { InvalidArgumentError, StorageError } from '../../src/utils/errors.js';
import { RECIPES } from './fixtures.js';

const [pasta, curry] = RECIPES;

describe('recipeContent', () => {
  it('joins name, description, cuisine and ingredients', () => {
    expect(recipeContent(pasta)).toBe(
      'Tomato Basil Pasta\nQuick weeknight pasta\nCuisine: Italian\nIngredients: Pasta, Tomatoes, Basil, Garlic',
    );
  });
});

describe('recipeToItem', () => {
  it('lowercases ingredients and dietary tags and flags quick recipes', () => {
    const item = recipeToItem(pasta, [1, 0]);

    expect(item.id).toBe('pasta');
    expect(item.embedding).toEqual([1, 0]);
    expect(item.attributes).toEqual({
      name: 'Tomato Basil Pasta',
      description: 'Quick weeknight pasta',
      cuisine: 'Italian',
      difficulty: 'easy',
      prepTime: 20,
      servings: 2,
      rating: 4.5,
      quick: true,
      dietary: ['vegetarian'],
      ingredients: ['pasta', 'tomatoes', 'basil', 'garlic'],
      instructions: ['Boil pasta', 'Make sauce', 'Combine'],
    });
  });

  it('marks recipes over 30 minutes as not quick', () => {
    expect(recipeToItem(curry, [1]).attributes.quick).toBe(false);
  });
});

describe('itemToRecipe', () => {
  it('rebuilds the stored recipe', () => {
    expect(itemToRecipe(recipeToItem(curry, [1]))).toEqual(curry);
  });

  it('rejects an item missing recipe attributes', () => {
    const item = { id: 'x', content: 'c', embedding: [1], attributes: { name: 'X' } };
    expect(() => itemToRecipe(item)).toThrow(StorageError);
    expect(() => itemToRecipe(item)).toThrow('Item x is not a recipe: bad "description"');
  });
});

describe('buildRecipeFilter', () => {
  const pastaItem = recipeToItem(pasta, [1]);
  const curryItem = recipeToItem(curry, [1]);

  it('returns undefined without criteria', () => {
    expect(buildRecipeFilter({})).toBeUndefined();
    expect(buildRecipeFilter()).toBeUndefined();
  });

  it('matches cuisine exactly', () => {
    const filter = buildRecipeFilter({ cuisine: 'Italian' });
    expect(matches(pastaItem, filter)).toBe(true);
    expect(matches(curryItem, filter)).toBe(false);
    expect(matches(pastaItem, buildRecipeFilter({ cuisine: 'italian' }))).toBe(false);
  });

  it('bounds prep time inclusively', () => {
    expect(matches(pastaItem, buildRecipeFilter({ maxPrepTime: 20 }))).toBe(true);
    expect(matches(pastaItem, buildRecipeFilter({ maxPrepTime: 19 }))).toBe(false);
  });

  it('requires every dietary tag, case-insensitively', () => {
    expect(matches(pastaItem, buildRecipeFilter({ dietary: ['VEGETARIAN'] }))).toBe(true);
    expect(matches(pastaItem, buildRecipeFilter({ dietary: ['vegetarian', 'gluten-free'] }))).toBe(false);
  });

  it('applies required and excluded ingredients', () => {
    expect(matches(pastaItem, buildRecipeFilter({ requiredIngredients: ['basil'] }))).toBe(true);
    expect(matches(pastaItem, buildRecipeFilter({ excludedIngredients: ['Garlic'] }))).toBe(false);
    expect(matches(curryItem, buildRecipeFilter({ excludedIngredients: ['peanuts'] }))).toBe(true);
  });

  it('bounds servings and rating', () => {
    expect(matches(curryItem, buildRecipeFilter({ minServings: 4, maxServings: 4 }))).toBe(true);
    expect(matches(pastaItem, buildRecipeFilter({ minServings: 3 }))).toBe(false);
    expect(matches(pastaItem, buildRecipeFilter({ minRating: 4.6 }))).toBe(false);
  });
});

describe('preferencesFromProfile', () => {
  it('returns nothing for an empty profile', () => {
    expect(preferencesFromProfile({})).toEqual([]);
  });

  it('weights each signal', () => {
    const preferences = preferencesFromProfile({
      favoriteCuisines: ['Thai'],
      prefersQuickRecipes: true,
      skillLevel: 'easy',
      dislikedIngredients: ['Garlic'],
    });

    expect(preferences.map((p) => [p.label, p.weight])).toEqual([
      ['favorite cuisine', 0.2],
      ['quick recipe', 0.15],
      ['matches skill level', 0.1],
      ['contains disliked garlic', -0.1],
    ]);
  });

  it('adds up the matching adjustments', () => {
    const compiled = compilePreferences(
      preferencesFromProfile({ favoriteCuisines: ['Italian'], prefersQuickRecipes: true, dislikedIngredients: ['garlic'] }),
    );

    expect(preferenceAdjustment(recipeToItem(pasta, [1]).attributes, compiled)).toBeCloseTo(0.25, 10);
    expect(preferenceAdjustment(recipeToItem(curry, [1]).attributes, compiled)).toBeCloseTo(-0.1, 10);
  });
});

describe('parseSearchFilters', () => {
  it('reads known fields', () => {
    expect(parseSearchFilters({ cuisine: 'Thai', maxPrepTime: 30, dietary: ['vegan'] })).toEqual({
      cuisine: 'Thai',
      maxPrepTime: 30,
      difficulty: undefined,
      dietary: ['vegan'],
      requiredIngredients: undefined,
      excludedIngredients: undefined,
      minServings: undefined,
      maxServings: undefined,
      minRating: undefined,
    });
  });

  it('treats null as no criteria', () => {
    expect(buildRecipeFilter(parseSearchFilters(null))).toBeUndefined();
  });

  it('rejects malformed fields', () => {
    expect(() => parseSearchFilters('Thai')).toThrow('filters: must be an object');
    expect(() => parseSearchFilters({ maxPrepTime: -5 })).toThrow(
      'filters.maxPrepTime: must be a non-negative number',
    );
    expect(() => parseSearchFilters({ dietary: 'vegan' })).toThrow(
      'filters.dietary: must be an array of strings',
    );
    expect(() => parseSearchFilters({ cuisine: '' })).toThrow(InvalidArgumentError);
  });

  it('rejects an inverted servings range', () => {
    expect(() => parseSearchFilters({ minServings: 6, maxServings: 2 })).toThrow(
      'filters: minServings exceeds maxServings',
    );
  });
});

describe('parseUserProfile', () => {
  it('reads a profile', () => {
    expect(parseUserProfile({ favoriteCuisines: ['Thai'], prefersQuickRecipes: true })).toEqual({
      favoriteCuisines: ['Thai'],
      dislikedIngredients: undefined,
      skillLevel: undefined,
      prefersQuickRecipes: true,
    });
  });

  it('rejects a non-boolean quick flag', () => {
    expect(() => parseUserProfile({ prefersQuickRecipes: 'yes' })).toThrow(
      'profile.prefersQuickRecipes: must be a boolean',
    );
  });

  it('uses INVALID_PREFERENCE as the code', () => {
    expect(() => parseUserProfile({ skillLevel: 3 })).toThrow(
      expect.objectContaining({ code: 'INVALID_PREFERENCE' }),
    );
  });
});
