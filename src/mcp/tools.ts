/**
 * MCP tool definitions for recipe operations.
 */

import type { RecipeFinder } from '../recipes/recipe-finder.js';
import { parseSearchFilters, parseUserProfile } from '../recipes/recipe-mapping.js';
import type { Recipe, RecipeSearchResult, ShoppingList } from '../recipes/types.js';
import { InvalidArgumentError } from '../utils/errors.js';

/**
 * Tool definition for MCP.
 */
export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, { type: string; description: string }>;
    required: string[];
  };
  handler: (args: Record<string, unknown>) => Promise<string>;
}

function requireString(args: Record<string, unknown>, key: string): string {
  const value = args[key];
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new InvalidArgumentError(`"${key}" must be a non-empty string`, 'INVALID_ARGUMENT');
  }
  return value;
}

function optionalInteger(args: Record<string, unknown>, key: string): number | undefined {
  const value = args[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new InvalidArgumentError(`"${key}" must be an integer`, 'INVALID_ARGUMENT');
  }
  return value;
}

/**
 * Accepts `["a", "b"]` or `"a, b"`.
 */
function stringList(args: Record<string, unknown>, key: string): string[] {
  const value = args[key];
  if (typeof value === 'string') {
    return value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
  }
  if (Array.isArray(value) && value.every((v): v is string => typeof v === 'string')) {
    return value;
  }
  throw new InvalidArgumentError(`"${key}" must be a list of strings`, 'INVALID_ARGUMENT');
}

/**
 * Format ranked matches as text output.
 */
export function formatMatches(result: RecipeSearchResult): string {
  if (result.matches.length === 0) {
    return 'No matching recipes found.';
  }

  const lines = result.matches.map((m, i) => {
    const r = m.recipe;
    let line = `${i + 1}. ${r.name} [${r.id}] (${r.cuisine}, ${r.difficulty}, ${r.prepTime} min) score ${m.score.toFixed(2)}`;
    if (m.matchedPreferences.length > 0) {
      line += `\n   matched: ${m.matchedPreferences.join(', ')}`;
    }
    return line;
  });
  return `Found ${result.matches.length} recipes (${result.eligible} of ${result.candidates} candidates passed filters):\n\n${lines.join('\n')}`;
}

export function formatRecipe(recipe: Recipe): string {
  const parts = [
    `# ${recipe.name}`,
    recipe.description,
    `Cuisine: ${recipe.cuisine} | Difficulty: ${recipe.difficulty} | Prep: ${recipe.prepTime} min | Serves: ${recipe.servings} | Rating: ${recipe.rating}`,
  ];
  if (recipe.dietary.length > 0) {
    parts.push(`Dietary: ${recipe.dietary.join(', ')}`);
  }
  parts.push('', 'Ingredients:', ...recipe.ingredients.map((i) => `- ${i}`));
  if (recipe.instructions.length > 0) {
    parts.push('', 'Instructions:', ...recipe.instructions.map((s, i) => `${i + 1}. ${s}`));
  }
  return parts.filter((p, i) => i !== 1 || p.length > 0).join('\n');
}

export function formatShoppingList(list: ShoppingList): string {
  const lines: string[] = [];
  const recipes = list.recipes.map((r) => `${r.name} (${r.servings} servings)`).join(', ');
  lines.push(`Shopping list for: ${recipes || 'no recipes'}`);
  lines.push('');
  for (const item of list.items) {
    const mark = item.inFridge ? '[x]' : '[ ]';
    lines.push(`${mark} ${item.ingredient} (${item.recipes.join(', ')})`);
  }
  if (list.missing.length > 0) {
    lines.push('', `Unknown recipes: ${list.missing.join(', ')}`);
  }
  return lines.join('\n');
}

/**
 * Build the tool set over a recipe finder.
 */
export function createTools(finder: RecipeFinder): ToolDefinition[] {
  const searchRecipesTool: ToolDefinition = {
    name: 'search_recipes',
    description:
      'Search recipes by meaning, narrowed by hard criteria and optionally re-ranked by a user profile. Set mode to "multi-stage" to search broadly before filtering.',
    inputSchema: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'What to cook, in natural language.' },
        filters: {
          type: 'object',
          description:
            'Optional criteria: cuisine, maxPrepTime, difficulty, dietary[], requiredIngredients[], excludedIngredients[], minServings, maxServings, minRating.',
        },
        profile: {
          type: 'object',
          description:
            'Optional user profile: favoriteCuisines[], dislikedIngredients[], skillLevel, prefersQuickRecipes.',
        },
        mode: { type: 'string', description: '"standard" (default) or "multi-stage".' },
        limit: {
          type: 'number',
          description: 'Maximum recipes to return. Standard mode without a profile only; other searches return at most 10.',
        },
      },
      required: ['query'],
    },
    handler: async (args) => {
      const query = requireString(args, 'query');
      const filters = parseSearchFilters(args.filters);
      const mode = args.mode ?? 'standard';
      if (mode !== 'standard' && mode !== 'multi-stage') {
        throw new InvalidArgumentError('"mode" must be "standard" or "multi-stage"', 'INVALID_MODE');
      }
      if (args.limit !== undefined && (mode !== 'standard' || args.profile !== undefined)) {
        throw new InvalidArgumentError('"limit" applies to standard mode without a profile only', 'INVALID_LIMIT');
      }
      if (args.profile !== undefined) {
        return formatMatches(await finder.searchWithPreferences(query, parseUserProfile(args.profile), filters));
      }
      if (mode === 'multi-stage') {
        return formatMatches(await finder.multiStageSearch(query, filters));
      }
      return formatMatches(await finder.searchRecipes(query, filters, optionalInteger(args, 'limit')));
    },
  };

  const getRecipeDetailsTool: ToolDefinition = {
    name: 'get_recipe_details',
    description: 'Get the full recipe (ingredients and instructions) for a recipe id.',
    inputSchema: {
      type: 'object',
      properties: {
        recipeId: { type: 'string', description: 'Recipe id as shown in search results.' },
      },
      required: ['recipeId'],
    },
    handler: async (args) => formatRecipe(await finder.getRecipe(requireString(args, 'recipeId'))),
  };

  const generateShoppingListTool: ToolDefinition = {
    name: 'generate_shopping_list',
    description:
      'Merge the ingredients of several recipes into one shopping list, marking what is already in the fridge.',
    inputSchema: {
      type: 'object',
      properties: {
        recipeIds: { type: 'array', description: 'Recipe ids to shop for.' },
        servings: { type: 'number', description: 'Scale every recipe to this many servings.' },
      },
      required: ['recipeIds'],
    },
    handler: async (args) =>
      formatShoppingList(
        await finder.generateShoppingList(stringList(args, 'recipeIds'), optionalInteger(args, 'servings')),
      ),
  };

  const fetchFridgeIngredientsTool: ToolDefinition = {
    name: 'fetch_fridge_ingredients',
    description: 'List the ingredients currently in the fridge.',
    inputSchema: { type: 'object', properties: {}, required: [] },
    handler: async () => {
      const ingredients = finder.fridgeIngredients();
      if (ingredients.length === 0) return 'The fridge is empty.';
      return `Fridge contains: ${ingredients.join(', ')}`;
    },
  };

  const fetchFavoriteRecipesTool: ToolDefinition = {
    name: 'fetch_favorite_recipes',
    description: 'Find recipes that closely match a set of ingredients.',
    inputSchema: {
      type: 'object',
      properties: {
        ingredients: { type: 'array', description: 'Ingredient names (or one comma-separated string).' },
      },
      required: ['ingredients'],
    },
    handler: async (args) => formatMatches(await finder.findFavoriteRecipes(stringList(args, 'ingredients'))),
  };

  return [
    searchRecipesTool,
    getRecipeDetailsTool,
    generateShoppingListTool,
    fetchFridgeIngredientsTool,
    fetchFavoriteRecipesTool,
  ];
}
