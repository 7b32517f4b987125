import type { Command } from '../types.js';
import type { SearchFilters } from '../../recipes/types.js';
import type { ParsedArgs } from '../types.js';
import { exitWithUsage, integerOption, parseArgs } from '../utils.js';

const SEARCH_USAGE =
  'recipe-finder search <query> [--cuisine <c>] [--max-prep <min>] [--difficulty <d>] [--diet <tag>] [--exclude <ingredient>] [--limit <n>] [--multi-stage] [--json]';

function filtersFrom(parsed: ParsedArgs): SearchFilters {
  const diet = parsed.options.get('--diet');
  const exclude = parsed.options.get('--exclude');
  return {
    cuisine: parsed.options.get('--cuisine'),
    maxPrepTime: integerOption(parsed, '--max-prep'),
    difficulty: parsed.options.get('--difficulty'),
    dietary: diet === undefined ? undefined : diet.split(','),
    excludedIngredients: exclude === undefined ? undefined : exclude.split(','),
  };
}

export const searchCommand: Command = {
  name: 'search',
  description: 'Search recipes by meaning and criteria',
  usage: SEARCH_USAGE,
  handler: async (args) => {
    const parsed = parseArgs(args, ['--cuisine', '--max-prep', '--difficulty', '--diet', '--exclude', '--limit']);
    if (parsed.positional.length === 0) {
      exitWithUsage('Query required', SEARCH_USAGE);
      return;
    }
    if (parsed.flags.has('--multi-stage') && parsed.options.has('--limit')) {
      exitWithUsage('--limit cannot be combined with --multi-stage', SEARCH_USAGE);
      return;
    }
    const query = parsed.positional.join(' ');
    const filters = filtersFrom(parsed);

    const { openRuntime } = await import('../runtime.js');
    const { formatMatches } = await import('../../mcp/tools.js');
    const { finder } = openRuntime();

    const result = parsed.flags.has('--multi-stage')
      ? await finder.multiStageSearch(query, filters)
      : await finder.searchRecipes(query, filters, integerOption(parsed, '--limit'));

    console.log(parsed.flags.has('--json') ? JSON.stringify(result, null, 2) : formatMatches(result));
  },
};

const RECIPE_USAGE = 'recipe-finder recipe <id> [--json]';

export const recipeCommand: Command = {
  name: 'recipe',
  description: 'Show a recipe',
  usage: RECIPE_USAGE,
  handler: async (args) => {
    const parsed = parseArgs(args);
    const [id] = parsed.positional;
    if (!id) {
      exitWithUsage('Recipe id required', RECIPE_USAGE);
      return;
    }

    const { openRuntime } = await import('../runtime.js');
    const { formatRecipe } = await import('../../mcp/tools.js');
    const recipe = await openRuntime().finder.getRecipe(id);
    console.log(parsed.flags.has('--json') ? JSON.stringify(recipe, null, 2) : formatRecipe(recipe));
  },
};

const FAVORITES_USAGE = 'recipe-finder favorites <ingredient>... [--json]';

export const favoritesCommand: Command = {
  name: 'favorites',
  description: 'Find recipes closely matching a set of ingredients',
  usage: FAVORITES_USAGE,
  handler: async (args) => {
    const parsed = parseArgs(args);
    const ingredients = parsed.positional.flatMap((p) => p.split(',')).filter((p) => p.trim().length > 0);
    if (ingredients.length === 0) {
      exitWithUsage('At least one ingredient required', FAVORITES_USAGE);
      return;
    }

    const { openRuntime } = await import('../runtime.js');
    const { formatMatches } = await import('../../mcp/tools.js');
    const result = await openRuntime().finder.findFavoriteRecipes(ingredients);
    console.log(parsed.flags.has('--json') ? JSON.stringify(result, null, 2) : formatMatches(result));
  },
};

const SHOPPING_USAGE = 'recipe-finder shopping-list <id>... [--servings <n>] [--json]';

export const shoppingListCommand: Command = {
  name: 'shopping-list',
  description: 'Merge the ingredients of recipes into a shopping list',
  usage: SHOPPING_USAGE,
  handler: async (args) => {
    const parsed = parseArgs(args, ['--servings']);
    if (parsed.positional.length === 0) {
      exitWithUsage('At least one recipe id required', SHOPPING_USAGE);
      return;
    }

    const { openRuntime } = await import('../runtime.js');
    const { formatShoppingList } = await import('../../mcp/tools.js');
    const list = await openRuntime().finder.generateShoppingList(
      parsed.positional,
      integerOption(parsed, '--servings'),
    );
    console.log(parsed.flags.has('--json') ? JSON.stringify(list, null, 2) : formatShoppingList(list));
  },
};
