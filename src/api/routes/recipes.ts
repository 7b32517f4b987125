import { Router } from 'express';
import type { RecipeFinder } from '../../recipes/recipe-finder.js';
import { parseSearchFilters, parseUserProfile } from '../../recipes/recipe-mapping.js';
import { InvalidArgumentError } from '../../utils/errors.js';
import { asyncHandler } from '../middleware/async-handler.js';
import { optionalNumber, readBody, requireStringList, requireText } from '../request.js';

const SEARCH_MODES = ['standard', 'multi-stage', 'preferences'] as const;
type SearchMode = (typeof SEARCH_MODES)[number];

function readMode(value: unknown, hasProfile: boolean): SearchMode {
  if (value === undefined) return hasProfile ? 'preferences' : 'standard';
  const mode = SEARCH_MODES.find((m) => m === value);
  if (!mode) {
    throw new InvalidArgumentError(`mode must be one of ${SEARCH_MODES.join(', ')}`, 'INVALID_MODE');
  }
  return mode;
}

/**
 * Recipe search and lookup, mounted at /api/recipes.
 */
export function createRecipesRouter(finder: RecipeFinder): Router {
  const router = Router();

  /**
   * POST /api/recipes/search
   * `{ query, filters?, profile?, mode?, limit? }`
   *
   * `limit` applies to standard mode only; multi-stage and preference
   * searches always return at most 10 and reject a `limit`.
   */
  router.post(
    '/search',
    asyncHandler(async (req, res) => {
      const body = readBody(req.body);
      const query = requireText(body, 'query');
      const filters = parseSearchFilters(body.filters);
      const mode = readMode(body.mode, body.profile !== undefined);
      if (mode !== 'standard' && body.limit !== undefined) {
        throw new InvalidArgumentError(`limit cannot be set in ${mode} mode`, 'INVALID_LIMIT');
      }

      switch (mode) {
        case 'standard':
          res.json(await finder.searchRecipes(query, filters, optionalNumber(body, 'limit', 'INVALID_LIMIT')));
          return;
        case 'multi-stage':
          res.json(await finder.multiStageSearch(query, filters));
          return;
        case 'preferences':
          res.json(await finder.searchWithPreferences(query, parseUserProfile(body.profile), filters));
          return;
      }
    }),
  );

  /**
   * GET /api/recipes/:id
   */
  router.get(
    '/:id',
    asyncHandler(async (req, res) => {
      res.json(await finder.getRecipe(req.params.id));
    }),
  );

  return router;
}

/**
 * Favorite recipes by ingredients, mounted at /api/v1/recipes.
 *
 * GET /api/v1/recipes?ingredients=eggs,spinach
 */
export function createFavoritesRouter(finder: RecipeFinder): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const raw = req.query.ingredients;
      const values = Array.isArray(raw) ? raw : [raw];
      const ingredients = values
        .flatMap((v) => (typeof v === 'string' ? v.split(',') : []))
        .map((i) => i.trim())
        .filter((i) => i.length > 0);
      const result = await finder.findFavoriteRecipes(ingredients);
      res.json({ ingredients, ...result });
    }),
  );

  return router;
}

/**
 * Shopping lists and fridge contents.
 *
 * POST /api/shopping-list `{ recipeIds, servings? }`
 * GET  /api/fridge
 */
export function createPantryRouter(finder: RecipeFinder): Router {
  const router = Router();

  router.post(
    '/shopping-list',
    asyncHandler(async (req, res) => {
      const body = readBody(req.body);
      const recipeIds = requireStringList(body, 'recipeIds', 'INVALID_RECIPE_ID');
      const servings = optionalNumber(body, 'servings', 'INVALID_SERVINGS');
      res.json(await finder.generateShoppingList(recipeIds, servings));
    }),
  );

  router.get('/fridge', (_req, res) => {
    res.json({ ingredients: finder.fridgeIngredients() });
  });

  return router;
}
