/**
 * Mapping between recipes and the generic retrieval model.
 *
 * - `recipeToItem` / `itemToRecipe`: recipe ⇄ indexed item
 * - `buildRecipeFilter`: search criteria → hard-filter tree
 * - `preferencesFromProfile`: user profile → weighted preferences
 *
 * Ingredient names and dietary tags are stored lowercase and criteria are
 * lowercased the same way, so list membership is case-insensitive.
 * Cuisine and difficulty compare exactly.
 */

import {
  and,
  contains,
  eq,
  gte,
  lte,
  not,
  oneOf,
  type FilterExpression,
} from '../retrieval/filter.js';
import type { Preference } from '../retrieval/preference-scorer.js';
import type { Attributes, Item } from '../storage/types.js';
import { InvalidArgumentError, StorageError } from '../utils/errors.js';
import type { Recipe, SearchFilters, UserProfile } from './types.js';

/** Recipes at or under this many minutes count as quick. */
export const QUICK_PREP_MINUTES = 30;

export const PREFERENCE_WEIGHTS = {
  favoriteCuisine: 0.2,
  quickRecipe: 0.15,
  skillMatch: 0.1,
  dislikedIngredient: -0.1,
} as const;

export function normalizeName(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Text that is embedded for a recipe.
 */
export function recipeContent(recipe: Recipe): string {
  return [
    recipe.name,
    recipe.description,
    `Cuisine: ${recipe.cuisine}`,
    `Ingredients: ${recipe.ingredients.join(', ')}`,
  ].join('\n');
}

export function recipeToItem(recipe: Recipe, embedding: number[]): Item {
  return {
    id: recipe.id,
    content: recipeContent(recipe),
    embedding,
    attributes: {
      name: recipe.name,
      description: recipe.description,
      cuisine: recipe.cuisine,
      difficulty: recipe.difficulty,
      prepTime: recipe.prepTime,
      servings: recipe.servings,
      rating: recipe.rating,
      quick: recipe.prepTime <= QUICK_PREP_MINUTES,
      dietary: recipe.dietary.map(normalizeName),
      ingredients: recipe.ingredients.map(normalizeName),
      instructions: [...recipe.instructions],
    },
  };
}

function corrupt(id: string, attribute: string): StorageError {
  return new StorageError(`Item ${id} is not a recipe: bad "${attribute}"`, 'CORRUPT_ITEM');
}

function textAttribute(attributes: Attributes, id: string, name: string): string {
  const value = attributes[name];
  if (typeof value !== 'string') throw corrupt(id, name);
  return value;
}

function numberAttribute(attributes: Attributes, id: string, name: string): number {
  const value = attributes[name];
  if (typeof value !== 'number') throw corrupt(id, name);
  return value;
}

function listAttribute(attributes: Attributes, id: string, name: string): string[] {
  const value = attributes[name];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw corrupt(id, name);
  }
  return [...value];
}

/**
 * Rebuild a recipe from a stored item.
 */
export function itemToRecipe(item: Item): Recipe {
  const { id, attributes } = item;
  return {
    id,
    name: textAttribute(attributes, id, 'name'),
    description: textAttribute(attributes, id, 'description'),
    cuisine: textAttribute(attributes, id, 'cuisine'),
    difficulty: textAttribute(attributes, id, 'difficulty'),
    prepTime: numberAttribute(attributes, id, 'prepTime'),
    servings: numberAttribute(attributes, id, 'servings'),
    rating: numberAttribute(attributes, id, 'rating'),
    dietary: listAttribute(attributes, id, 'dietary'),
    ingredients: listAttribute(attributes, id, 'ingredients'),
    instructions: listAttribute(attributes, id, 'instructions'),
  };
}

/**
 * Translate search criteria into a filter tree; every criterion must hold.
 * Returns undefined when no criterion is set.
 */
export function buildRecipeFilter(filters: SearchFilters = {}): FilterExpression | undefined {
  const clauses: FilterExpression[] = [];

  if (filters.cuisine !== undefined) {
    clauses.push(eq('cuisine', filters.cuisine));
  }
  if (filters.maxPrepTime !== undefined) {
    clauses.push(lte('prepTime', filters.maxPrepTime));
  }
  if (filters.difficulty !== undefined) {
    clauses.push(eq('difficulty', filters.difficulty));
  }
  for (const tag of filters.dietary ?? []) {
    clauses.push(contains('dietary', normalizeName(tag)));
  }
  for (const ingredient of filters.requiredIngredients ?? []) {
    clauses.push(contains('ingredients', normalizeName(ingredient)));
  }
  for (const ingredient of filters.excludedIngredients ?? []) {
    clauses.push(not(contains('ingredients', normalizeName(ingredient))));
  }
  if (filters.minServings !== undefined) {
    clauses.push(gte('servings', filters.minServings));
  }
  if (filters.maxServings !== undefined) {
    clauses.push(lte('servings', filters.maxServings));
  }
  if (filters.minRating !== undefined) {
    clauses.push(gte('rating', filters.minRating));
  }

  return clauses.length > 0 ? and(...clauses) : undefined;
}

/**
 * Translate a user profile into weighted preferences.
 *
 * | Signal                         | Weight |
 * |--------------------------------|--------|
 * | cuisine is a favorite          | +0.2   |
 * | quick recipe (≤ 30 min) wanted | +0.15  |
 * | difficulty equals skill level  | +0.1   |
 * | each disliked ingredient       | −0.1   |
 */
export function preferencesFromProfile(profile: UserProfile = {}): Preference[] {
  const preferences: Preference[] = [];

  const favorites = profile.favoriteCuisines ?? [];
  if (favorites.length > 0) {
    preferences.push({
      when: oneOf('cuisine', favorites),
      weight: PREFERENCE_WEIGHTS.favoriteCuisine,
      label: 'favorite cuisine',
    });
  }
  if (profile.prefersQuickRecipes) {
    preferences.push({
      when: lte('prepTime', QUICK_PREP_MINUTES),
      weight: PREFERENCE_WEIGHTS.quickRecipe,
      label: 'quick recipe',
    });
  }
  if (profile.skillLevel !== undefined) {
    preferences.push({
      when: eq('difficulty', profile.skillLevel),
      weight: PREFERENCE_WEIGHTS.skillMatch,
      label: 'matches skill level',
    });
  }
  for (const ingredient of profile.dislikedIngredients ?? []) {
    const name = normalizeName(ingredient);
    preferences.push({
      when: contains('ingredients', name),
      weight: PREFERENCE_WEIGHTS.dislikedIngredient,
      label: `contains disliked ${name}`,
    });
  }

  return preferences;
}

// ─── Untrusted input ─────────────────────────────────────────────────────────

type Fields = Record<string, unknown>;

function asFields(input: unknown, path: string, code: string): Fields {
  if (input === undefined || input === null) return {};
  if (typeof input !== 'object' || Array.isArray(input)) {
    throw new InvalidArgumentError(`${path}: must be an object`, code);
  }
  const fields: Fields = {};
  for (const [key, value] of Object.entries(input)) {
    fields[key] = value;
  }
  return fields;
}

function optionalString(fields: Fields, key: string, path: string, code: string): string | undefined {
  const value = fields[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new InvalidArgumentError(`${path}.${key}: must be a non-empty string`, code);
  }
  return value;
}

function optionalNumber(fields: Fields, key: string, path: string, code: string): number | undefined {
  const value = fields[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new InvalidArgumentError(`${path}.${key}: must be a non-negative number`, code);
  }
  return value;
}

function optionalList(fields: Fields, key: string, path: string, code: string): string[] | undefined {
  const value = fields[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new InvalidArgumentError(`${path}.${key}: must be an array of strings`, code);
  }
  return value;
}

/**
 * Read search criteria from an untrusted object (request body, tool call).
 */
export function parseSearchFilters(input: unknown, path: string = 'filters'): SearchFilters {
  const code = 'INVALID_FILTER';
  const fields = asFields(input, path, code);
  const filters: SearchFilters = {
    cuisine: optionalString(fields, 'cuisine', path, code),
    maxPrepTime: optionalNumber(fields, 'maxPrepTime', path, code),
    difficulty: optionalString(fields, 'difficulty', path, code),
    dietary: optionalList(fields, 'dietary', path, code),
    requiredIngredients: optionalList(fields, 'requiredIngredients', path, code),
    excludedIngredients: optionalList(fields, 'excludedIngredients', path, code),
    minServings: optionalNumber(fields, 'minServings', path, code),
    maxServings: optionalNumber(fields, 'maxServings', path, code),
    minRating: optionalNumber(fields, 'minRating', path, code),
  };
  if (
    filters.minServings !== undefined &&
    filters.maxServings !== undefined &&
    filters.minServings > filters.maxServings
  ) {
    throw new InvalidArgumentError(`${path}: minServings exceeds maxServings`, code);
  }
  return filters;
}

/**
 * Read a user profile from an untrusted object.
 */
export function parseUserProfile(input: unknown, path: string = 'profile'): UserProfile {
  const code = 'INVALID_PREFERENCE';
  const fields = asFields(input, path, code);
  const quick = fields.prefersQuickRecipes;
  if (quick !== undefined && typeof quick !== 'boolean') {
    throw new InvalidArgumentError(`${path}.prefersQuickRecipes: must be a boolean`, code);
  }
  return {
    favoriteCuisines: optionalList(fields, 'favoriteCuisines', path, code),
    dislikedIngredients: optionalList(fields, 'dislikedIngredients', path, code),
    skillLevel: optionalString(fields, 'skillLevel', path, code),
    prefersQuickRecipes: quick,
  };
}
