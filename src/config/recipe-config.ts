/**
 * Centralized runtime configuration for recipe search.
 */

/**
 * Search defaults applied when a query leaves them unset.
 */
export interface SearchDefaults {
  /** Candidate pool size before filtering */
  topK: number;
  /** Minimum cosine similarity for a candidate */
  similarityThreshold: number;
  /** Results returned */
  limit: number;
  /** Item store time budget in ms; 0 = no limit */
  timeoutMs: number;
}

export const DEFAULT_SEARCH: SearchDefaults = {
  topK: 20,
  similarityThreshold: 0.65,
  limit: 10,
  timeoutMs: 5000,
};

/**
 * Complete recipe finder configuration.
 */
export interface RecipeFinderConfig {
  search: SearchDefaults;

  // Embedding
  /** OpenAI-compatible API base URL */
  embeddingBaseUrl: string;
  /** Embedding model name as served */
  embeddingModel: string;
  /** Per-request embedding timeout in ms */
  embeddingTimeoutMs: number;
  /** Client retries for transient embedding failures */
  embeddingMaxRetries: number;

  // Storage
  /** Path to SQLite database file */
  dbPath: string;

  // Surfaces
  /** HTTP API port */
  serverPort: number;
  /** Fridge contents offered by fetch_fridge_ingredients */
  fridgeIngredients: string[];
}

export const DEFAULT_CONFIG: RecipeFinderConfig = {
  search: DEFAULT_SEARCH,

  embeddingBaseUrl: 'http://localhost:11434/v1',
  embeddingModel: 'nomic-embed-text',
  embeddingTimeoutMs: 30000,
  embeddingMaxRetries: 2,

  dbPath: '~/.recipe-finder/recipes.db',

  serverPort: 8080,
  fridgeIngredients: ['eggs', 'milk', 'butter', 'cheese', 'tomatoes', 'onion', 'garlic'],
};

/**
 * Get configuration with overrides applied.
 */
export function getConfig(overrides: Partial<RecipeFinderConfig> = {}): RecipeFinderConfig {
  return { ...DEFAULT_CONFIG, ...overrides };
}

/**
 * Resolve ~ to home directory in paths.
 */
export function resolvePath(path: string): string {
  if (path.startsWith('~')) {
    const home = process.env.HOME ?? process.env.USERPROFILE ?? '';
    return path.replace('~', home);
  }
  return path;
}
