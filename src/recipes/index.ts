/**
 * Recipe domain exports.
 */

export { RecipeFinder, MULTI_STAGE, PREFERENCE_SEARCH, FAVORITES_THRESHOLD } from './recipe-finder.js';
export type { RecipeFinderOptions, RecipeStore } from './recipe-finder.js';

export {
  recipeToItem,
  itemToRecipe,
  recipeContent,
  buildRecipeFilter,
  preferencesFromProfile,
  parseSearchFilters,
  parseUserProfile,
  normalizeName,
  QUICK_PREP_MINUTES,
  PREFERENCE_WEIGHTS,
} from './recipe-mapping.js';

export type {
  Recipe,
  RecipeMatch,
  RecipeSearchResult,
  SearchFilters,
  ShoppingList,
  ShoppingListItem,
  UserProfile,
} from './types.js';
