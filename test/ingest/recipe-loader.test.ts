/**
 * Tests for recipe file loading and validation.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadRecipesFile, parseRecipe, parseRecipes } from '../../src/ingest/recipe-loader.js';
import { IngestionError } from '../../src/utils/errors.js';

function validEntry(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 'omelette',
    name: 'Omelette',
    cuisine: 'French',
    difficulty: 'easy',
    prepTime: 10,
    servings: 1,
    rating: 4,
    ingredients: ['eggs', 'butter'],
    ...overrides,
  };
}

describe('parseRecipe', () => {
  it('fills optional fields', () => {
    expect(parseRecipe(validEntry())).toEqual({
      id: 'omelette',
      name: 'Omelette',
      description: '',
      cuisine: 'French',
      difficulty: 'easy',
      prepTime: 10,
      servings: 1,
      rating: 4,
      dietary: [],
      ingredients: ['eggs', 'butter'],
      instructions: [],
    });
  });

  it('rejects a non-object', () => {
    expect(() => parseRecipe('omelette')).toThrow('recipe: must be an object');
  });

  it('requires string fields', () => {
    expect(() => parseRecipe(validEntry({ name: ' ' }))).toThrow('recipe: "name" must be a non-empty string');
  });

  it('checks numeric ranges', () => {
    expect(() => parseRecipe(validEntry({ prepTime: -1 }))).toThrow('recipe: "prepTime" must be a number >= 0');
    expect(() => parseRecipe(validEntry({ servings: 0 }))).toThrow('recipe: "servings" must be a number >= 1');
    expect(() => parseRecipe(validEntry({ rating: 6 }))).toThrow(
      'recipe: "rating" must be a number between 0 and 5',
    );
  });

  it('requires a non-empty ingredient list', () => {
    expect(() => parseRecipe(validEntry({ ingredients: [] }))).toThrow('recipe: "ingredients" must not be empty');
    expect(() => parseRecipe(validEntry({ ingredients: ['eggs', 2] }))).toThrow(
      'recipe: "ingredients" must be an array of strings',
    );
  });

  it('uses INVALID_RECIPE as the code', () => {
    expect(() => parseRecipe(validEntry({ dietary: 'vegan' }))).toThrow(
      expect.objectContaining({ code: 'INVALID_RECIPE' }),
    );
  });
});

describe('parseRecipes', () => {
  it('requires an array', () => {
    expect(() => parseRecipes({ recipes: [] })).toThrow('Recipe file must contain a JSON array');
  });

  it('reports the position of a bad entry', () => {
    expect(() => parseRecipes([validEntry(), validEntry({ id: 'b', cuisine: 3 })])).toThrow(
      'recipes[1]: "cuisine" must be a non-empty string',
    );
  });

  it('rejects duplicate ids', () => {
    expect(() => parseRecipes([validEntry(), validEntry()])).toThrow('recipes[1]: duplicate id "omelette"');
  });
});

describe('loadRecipesFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'recipe-finder-recipes-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('loads a valid file', async () => {
    const path = join(dir, 'recipes.json');
    writeFileSync(path, JSON.stringify([validEntry(), validEntry({ id: 'toast', name: 'Toast' })]));

    const recipes = await loadRecipesFile(path);

    expect(recipes.map((r) => r.id)).toEqual(['omelette', 'toast']);
  });

  it('loads the bundled sample collection', async () => {
    const recipes = await loadRecipesFile(join(process.cwd(), 'data', 'recipes.sample.json'));

    expect(recipes).toHaveLength(12);
    expect(recipes[0].id).toBe('tomato-basil-pasta');
  });

  it('reports a missing file', async () => {
    await expect(loadRecipesFile(join(dir, 'absent.json'))).rejects.toMatchObject({
      code: 'FILE_READ_FAILED',
    });
  });

  it('reports invalid JSON', async () => {
    const path = join(dir, 'broken.json');
    writeFileSync(path, '[{');

    await expect(loadRecipesFile(path)).rejects.toThrow(IngestionError);
    await expect(loadRecipesFile(path)).rejects.toMatchObject({ code: 'PARSE_FAILED' });
  });
});
