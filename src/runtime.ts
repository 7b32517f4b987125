/**
 * Wires configuration into the running services shared by the CLI, the
 * HTTP API and the MCP server.
 */

import { Embedder } from './models/embedder.js';
import { ItemStore } from './storage/item-store.js';
import { getDb } from './storage/db.js';
import { HybridSearchPipeline } from './retrieval/pipeline.js';
import { RecipeFinder } from './recipes/recipe-finder.js';
import type { RecipeFinderConfig } from './config/recipe-config.js';

/** Env var holding the embedding API key, for hosted OpenAI-compatible servers. */
export const EMBEDDING_API_KEY_ENV = 'RECIPE_FINDER_EMBEDDING_API_KEY';

export interface Runtime {
  config: RecipeFinderConfig;
  encoder: Embedder;
  store: ItemStore;
  pipeline: HybridSearchPipeline;
  finder: RecipeFinder;
}

export function createRuntime(config: RecipeFinderConfig): Runtime {
  const encoder = new Embedder({
    baseUrl: config.embeddingBaseUrl,
    model: config.embeddingModel,
    apiKey: process.env[EMBEDDING_API_KEY_ENV],
    timeoutMs: config.embeddingTimeoutMs,
    maxRetries: config.embeddingMaxRetries,
  });
  const store = new ItemStore(() => getDb(config.dbPath));

  return {
    config,
    encoder,
    store,
    pipeline: new HybridSearchPipeline({ encoder, source: store, defaults: config.search }),
    finder: new RecipeFinder({
      encoder,
      store,
      defaults: config.search,
      fridgeIngredients: config.fridgeIngredients,
    }),
  };
}
