/**
 * Shared recipe fixtures: a small collection, a fixed-vector encoder and
 * a store seeded in memory.
 *
 * Against the query vector [1, 0, 0] the seeded recipes score:
 *
 * | id       | embedding   | similarity |
 * |----------|-------------|------------|
 * | pasta    | [1, 0, 0]   | 1          |
 * | curry    | [1, 0.5, 0] | 0.894      |
 * | risotto  | [1, 1.5, 0] | 0.555      |
 * | salad    | [0, 1, 0]   | 0          |
 */

import { vi } from 'vitest';
import type Database from 'better-sqlite3-multiple-ciphers';
import { ItemStore } from '../../src/storage/item-store.js';
import { recipeToItem } from '../../src/recipes/recipe-mapping.js';
import type { Recipe } from '../../src/recipes/types.js';

export const QUERY_VECTOR = [1, 0, 0];

export const RECIPES: Recipe[] = [
  {
    id: 'pasta',
    name: 'Tomato Basil Pasta',
    description: 'Quick weeknight pasta',
    cuisine: 'Italian',
    difficulty: 'easy',
    prepTime: 20,
    servings: 2,
    rating: 4.5,
    dietary: ['Vegetarian'],
    ingredients: ['Pasta', 'Tomatoes', 'Basil', 'Garlic'],
    instructions: ['Boil pasta', 'Make sauce', 'Combine'],
  },
  {
    id: 'curry',
    name: 'Green Curry',
    description: 'Fragrant coconut curry',
    cuisine: 'Thai',
    difficulty: 'medium',
    prepTime: 45,
    servings: 4,
    rating: 4.8,
    dietary: ['gluten-free'],
    ingredients: ['coconut milk', 'chicken', 'garlic', 'basil'],
    instructions: ['Fry paste', 'Simmer'],
  },
  {
    id: 'risotto',
    name: 'Mushroom Risotto',
    description: 'Creamy arborio rice',
    cuisine: 'Italian',
    difficulty: 'hard',
    prepTime: 50,
    servings: 4,
    rating: 4.2,
    dietary: ['vegetarian', 'gluten-free'],
    ingredients: ['arborio rice', 'mushrooms', 'butter', 'onion'],
    instructions: ['Toast rice', 'Add stock slowly'],
  },
  {
    id: 'salad',
    name: 'Greek Salad',
    description: '',
    cuisine: 'Greek',
    difficulty: 'easy',
    prepTime: 10,
    servings: 2,
    rating: 4,
    dietary: ['vegetarian'],
    ingredients: ['tomatoes', 'cucumber', 'feta'],
    instructions: [],
  },
];

export const EMBEDDINGS: Record<string, number[]> = {
  pasta: [1, 0, 0],
  curry: [1, 0.5, 0],
  risotto: [1, 1.5, 0],
  salad: [0, 1, 0],
};

/**
 * Encoder that maps every query to the same vector.
 */
export function fixedEncoder(vector: number[] = QUERY_VECTOR) {
  return {
    embed: vi.fn(async (_text: string) => [...vector]),
    embedDocuments: vi.fn(async (texts: string[]) => texts.map(() => [...vector])),
  };
}

/**
 * Item store over `db` holding the fixture recipes.
 */
export async function seededStore(db: Database.Database): Promise<ItemStore> {
  const store = new ItemStore(() => db);
  await store.upsertBatch(RECIPES.map((r) => recipeToItem(r, EMBEDDINGS[r.id])));
  return store;
}
