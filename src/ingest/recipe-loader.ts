/**
 * Reads recipe collections from JSON files.
 *
 * A file holds an array of recipe objects. Every entry is checked before
 * anything is embedded, so one bad entry rejects the whole file.
 */

import { readFile } from 'node:fs/promises';
import { IngestionError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { Recipe } from '../recipes/types.js';

const log = createLogger('recipe-loader');

type Fields = Record<string, unknown>;

function isFields(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(path: string, message: string): IngestionError {
  return new IngestionError(`${path}: ${message}`, 'INVALID_RECIPE');
}

function requireString(fields: Fields, key: string, path: string): string {
  const value = fields[key];
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw invalid(path, `"${key}" must be a non-empty string`);
  }
  return value;
}

function requireNumber(fields: Fields, key: string, path: string, min: number, max = Infinity): number {
  const value = fields[key];
  if (typeof value !== 'number' || !Number.isFinite(value) || value < min || value > max) {
    const range = max === Infinity ? `>= ${min}` : `between ${min} and ${max}`;
    throw invalid(path, `"${key}" must be a number ${range}`);
  }
  return value;
}

function stringList(fields: Fields, key: string, path: string, required: boolean): string[] {
  const value = fields[key];
  if (value === undefined && !required) return [];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw invalid(path, `"${key}" must be an array of strings`);
  }
  if (required && value.length === 0) {
    throw invalid(path, `"${key}" must not be empty`);
  }
  return value;
}

/**
 * Validate one untrusted recipe entry.
 */
export function parseRecipe(input: unknown, path: string = 'recipe'): Recipe {
  if (!isFields(input)) {
    throw invalid(path, 'must be an object');
  }
  return {
    id: requireString(input, 'id', path),
    name: requireString(input, 'name', path),
    description: typeof input.description === 'string' ? input.description : '',
    cuisine: requireString(input, 'cuisine', path),
    difficulty: requireString(input, 'difficulty', path),
    prepTime: requireNumber(input, 'prepTime', path, 0),
    servings: requireNumber(input, 'servings', path, 1),
    rating: requireNumber(input, 'rating', path, 0, 5),
    dietary: stringList(input, 'dietary', path, false),
    ingredients: stringList(input, 'ingredients', path, true),
    instructions: stringList(input, 'instructions', path, false),
  };
}

/**
 * Validate a parsed recipe collection. Ids must be unique.
 */
export function parseRecipes(input: unknown): Recipe[] {
  if (!Array.isArray(input)) {
    throw new IngestionError('Recipe file must contain a JSON array', 'INVALID_RECIPE');
  }
  const seen = new Set<string>();
  return input.map((entry: unknown, i) => {
    const recipe = parseRecipe(entry, `recipes[${i}]`);
    if (seen.has(recipe.id)) {
      throw invalid(`recipes[${i}]`, `duplicate id "${recipe.id}"`);
    }
    seen.add(recipe.id);
    return recipe;
  });
}

/**
 * Read and validate a recipes JSON file.
 */
export async function loadRecipesFile(path: string): Promise<Recipe[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new IngestionError(`Cannot read ${path}: ${message}`, 'FILE_READ_FAILED', error);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new IngestionError(`${path} is not valid JSON: ${message}`, 'PARSE_FAILED', error);
  }

  const recipes = parseRecipes(parsed);
  log.debug(`Loaded ${recipes.length} recipes`, { path });
  return recipes;
}
