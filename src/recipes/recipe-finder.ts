/**
 * Recipe search service.
 *
 * Wraps the hybrid search pipeline with recipe-shaped entry points:
 *
 * | Operation               | topK   | threshold | limit  |
 * |-------------------------|--------|-----------|--------|
 * | searchRecipes           | config | config    | config |
 * | multiStageSearch        | 50     | 0.5       | 10     |
 * | searchWithPreferences   | 30     | 0.6       | 10     |
 * | findFavoriteRecipes     | config | 0.7       | config |
 *
 * Multi-stage search casts a wide semantic net first so restrictive filters
 * still leave something to choose from.
 */

import { HybridSearchPipeline, type SearchResult } from '../retrieval/pipeline.js';
import type { QueryEncoder } from '../models/embedder.js';
import type { Item, ItemSource } from '../storage/types.js';
import { DEFAULT_SEARCH, type SearchDefaults } from '../config/recipe-config.js';
import { InvalidArgumentError, NotFoundError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { assertPositiveInteger } from '../retrieval/result-selector.js';
import {
  buildRecipeFilter,
  itemToRecipe,
  normalizeName,
  preferencesFromProfile,
} from './recipe-mapping.js';
import type {
  Recipe,
  RecipeSearchResult,
  SearchFilters,
  ShoppingList,
  ShoppingListItem,
  UserProfile,
} from './types.js';

const log = createLogger('recipe-finder');

export const MULTI_STAGE = { topK: 50, similarityThreshold: 0.5, limit: 10 } as const;
export const PREFERENCE_SEARCH = { topK: 30, similarityThreshold: 0.6, limit: 10 } as const;
export const FAVORITES_THRESHOLD = 0.7;

/**
 * Item store the service reads from: similarity search plus lookup by id.
 */
export interface RecipeStore extends ItemSource {
  get(id: string): Promise<Item | null>;
}

export interface RecipeFinderOptions {
  encoder: QueryEncoder;
  store: RecipeStore;
  /** Search defaults (usually from config) */
  defaults?: Partial<SearchDefaults>;
  /** Ingredients currently in the fridge */
  fridgeIngredients?: string[];
}

function toRecipeResult(result: SearchResult): RecipeSearchResult {
  return {
    matches: result.hits.map((hit) => ({
      recipe: itemToRecipe({
        id: hit.id,
        content: hit.content,
        embedding: [],
        attributes: hit.attributes,
      }),
      score: hit.score,
      similarity: hit.similarity,
      matchedPreferences: hit.matchedPreferences,
    })),
    candidates: result.candidates,
    eligible: result.eligible,
    durationMs: result.durationMs,
  };
}

export class RecipeFinder {
  private readonly pipeline: HybridSearchPipeline;
  private readonly store: RecipeStore;
  private readonly defaults: SearchDefaults;
  private readonly fridge: string[];

  constructor(options: RecipeFinderOptions) {
    this.defaults = { ...DEFAULT_SEARCH, ...options.defaults };
    this.pipeline = new HybridSearchPipeline({
      encoder: options.encoder,
      source: options.store,
      defaults: this.defaults,
    });
    this.store = options.store;
    this.fridge = (options.fridgeIngredients ?? []).map(normalizeName);
  }

  /**
   * Semantic search narrowed by hard criteria.
   */
  async searchRecipes(
    query: string,
    filters: SearchFilters = {},
    limit: number = this.defaults.limit,
  ): Promise<RecipeSearchResult> {
    log.info('Searching recipes', { query, limit });
    const result = await this.pipeline.search({
      text: query,
      filter: buildRecipeFilter(filters),
      limit,
    });
    return toRecipeResult(result);
  }

  /**
   * Broad semantic search (topK 50, threshold 0.5), then the criteria,
   * keeping the best 10.
   */
  async multiStageSearch(query: string, filters: SearchFilters = {}): Promise<RecipeSearchResult> {
    log.info('Multi-stage recipe search', { query });
    const result = await this.pipeline.search({
      text: query,
      filter: buildRecipeFilter(filters),
      ...MULTI_STAGE,
    });
    return toRecipeResult(result);
  }

  /**
   * Semantic search re-ranked by a user's profile (topK 30, threshold 0.6,
   * best 10). Optional criteria still exclude.
   */
  async searchWithPreferences(
    query: string,
    profile: UserProfile,
    filters: SearchFilters = {},
  ): Promise<RecipeSearchResult> {
    log.info('Preference-ranked recipe search', { query });
    const result = await this.pipeline.search({
      text: query,
      filter: buildRecipeFilter(filters),
      preferences: preferencesFromProfile(profile),
      ...PREFERENCE_SEARCH,
    });
    return toRecipeResult(result);
  }

  /**
   * Recipes closely matching a set of ingredients (similarity ≥ 0.7).
   * The ingredients joined by "," form the query.
   */
  async findFavoriteRecipes(ingredients: string[]): Promise<RecipeSearchResult> {
    const names = ingredients.map((i) => i.trim()).filter((i) => i.length > 0);
    if (names.length === 0) {
      throw new InvalidArgumentError('at least one ingredient is required', 'INVALID_INGREDIENTS');
    }
    log.info('Fetching favorite recipes for ingredients', { ingredients: names });
    const result = await this.pipeline.search({
      text: names.join(','),
      similarityThreshold: FAVORITES_THRESHOLD,
      limit: this.defaults.limit,
    });
    log.info(`${result.hits.length} recipes found for ingredients`);
    return toRecipeResult(result);
  }

  /**
   * Look up a recipe by id. Throws `NotFoundError` when absent.
   */
  async getRecipe(id: string): Promise<Recipe> {
    if (id.trim().length === 0) {
      throw new InvalidArgumentError('recipe id must not be empty', 'INVALID_RECIPE_ID');
    }
    const item = await this.store.get(id);
    if (!item) {
      throw new NotFoundError(`Recipe not found: ${id}`, 'RECIPE_NOT_FOUND');
    }
    return itemToRecipe(item);
  }

  /**
   * Merge the ingredients of several recipes into one list.
   *
   * `servings` scales every recipe to that many servings (reported as
   * `scale`); unknown ids are listed in `missing` rather than failing.
   */
  async generateShoppingList(recipeIds: string[], servings?: number): Promise<ShoppingList> {
    if (recipeIds.length === 0) {
      throw new InvalidArgumentError('at least one recipe id is required', 'INVALID_RECIPE_ID');
    }
    if (servings !== undefined) {
      assertPositiveInteger(servings, 'servings', 'INVALID_SERVINGS');
    }

    const fridge = new Set(this.fridge);
    const byIngredient = new Map<string, ShoppingListItem>();
    const recipes: ShoppingList['recipes'] = [];
    const missing: string[] = [];

    for (const id of new Set(recipeIds)) {
      const item = await this.store.get(id);
      if (!item) {
        missing.push(id);
        continue;
      }
      const recipe = itemToRecipe(item);
      const target = servings ?? recipe.servings;
      recipes.push({
        id: recipe.id,
        name: recipe.name,
        servings: target,
        scale: recipe.servings > 0 ? target / recipe.servings : 1,
      });

      for (const ingredient of recipe.ingredients) {
        const name = normalizeName(ingredient);
        const entry = byIngredient.get(name);
        if (entry) {
          entry.recipes.push(recipe.name);
        } else {
          byIngredient.set(name, { ingredient: name, recipes: [recipe.name], inFridge: fridge.has(name) });
        }
      }
    }

    const items = [...byIngredient.values()].sort((a, b) => a.ingredient.localeCompare(b.ingredient));
    log.debug('Shopping list generated', { recipes: recipes.length, items: items.length, missing });
    return { items, recipes, missing };
  }

  /**
   * Ingredients currently available in the fridge.
   */
  fridgeIngredients(): string[] {
    return [...this.fridge];
  }
}
