/**
 * Recipe domain types.
 */

/**
 * A recipe as ingested and returned to clients.
 */
export interface Recipe {
  id: string;
  name: string;
  description: string;
  /** e.g. "Italian" (compared case-sensitively) */
  cuisine: string;
  /** e.g. "easy" | "medium" | "hard" */
  difficulty: string;
  /** Preparation time in minutes */
  prepTime: number;
  servings: number;
  /** Average rating, 0-5 */
  rating: number;
  /** Dietary tags such as "vegetarian", "gluten-free" (lowercase) */
  dietary: string[];
  /** Ingredient names (lowercase) */
  ingredients: string[];
  instructions: string[];
}

/**
 * Hard search criteria. Every field is optional; unset fields place no
 * constraint.
 */
export interface SearchFilters {
  cuisine?: string;
  maxPrepTime?: number;
  difficulty?: string;
  /** All must be present */
  dietary?: string[];
  /** All must be present */
  requiredIngredients?: string[];
  /** None may be present */
  excludedIngredients?: string[];
  minServings?: number;
  maxServings?: number;
  minRating?: number;
}

/**
 * Soft preferences of a user, turned into score adjustments.
 */
export interface UserProfile {
  favoriteCuisines?: string[];
  dislikedIngredients?: string[];
  skillLevel?: string;
  prefersQuickRecipes?: boolean;
}

/**
 * A recipe in a ranked result list.
 */
export interface RecipeMatch {
  recipe: Recipe;
  score: number;
  similarity: number;
  matchedPreferences: string[];
}

export interface RecipeSearchResult {
  matches: RecipeMatch[];
  /** Candidates returned by retrieval */
  candidates: number;
  /** Candidates that passed the filters */
  eligible: number;
  durationMs: number;
}

export interface ShoppingListItem {
  ingredient: string;
  /** Names of the recipes that need it */
  recipes: string[];
  /** Whether the fridge already holds it */
  inFridge: boolean;
}

export interface ShoppingList {
  /** Merged ingredients, alphabetical */
  items: ShoppingListItem[];
  /** Requested recipes that were found */
  recipes: Array<{ id: string; name: string; servings: number; scale: number }>;
  /** Requested ids that do not exist */
  missing: string[];
}
