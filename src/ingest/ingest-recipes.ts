/**
 * Recipe ingestion: embed recipe text and write items to the store.
 *
 * Embedding runs in batches; each batch is retried with exponential
 * backoff while the encoder reports retryable failures. Items are written
 * in one transaction once every batch is embedded, so a failed run leaves
 * the store untouched.
 */

import type { DocumentEncoder } from '../models/embedder.js';
import type { Item } from '../storage/types.js';
import { recipeContent, recipeToItem } from '../recipes/recipe-mapping.js';
import type { Recipe } from '../recipes/types.js';
import { IngestionError, RecipeFinderError } from '../utils/errors.js';
import { withRetry, type RetryOptions } from '../utils/resilience.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('ingest');

/**
 * Where ingested items go.
 */
export interface ItemSink {
  upsertBatch(items: readonly Item[]): Promise<void>;
}

/**
 * Progress information passed to callback.
 */
export interface IngestProgress {
  /** Recipes embedded so far */
  done: number;
  total: number;
}

export interface IngestOptions {
  encoder: DocumentEncoder;
  store: ItemSink;
  /** Recipes per embedding call. Default: 16 */
  batchSize?: number;
  /** Retry policy for embedding calls */
  retry?: RetryOptions;
  /** Progress callback (called after each batch). */
  progressCallback?: (progress: IngestProgress) => void;
}

export interface IngestResult {
  /** Recipes written */
  ingested: number;
  /** Embedding calls made (excluding retries) */
  batches: number;
  durationMs: number;
}

const DEFAULT_BATCH_SIZE = 16;

export async function ingestRecipes(
  recipes: readonly Recipe[],
  options: IngestOptions,
): Promise<IngestResult> {
  const startTime = Date.now();
  const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw new IngestionError(`batchSize must be a positive integer, got ${batchSize}`, 'INVALID_OPTIONS');
  }

  const items: Item[] = [];
  let batches = 0;

  for (let i = 0; i < recipes.length; i += batchSize) {
    const batch = recipes.slice(i, i + batchSize);
    let embeddings: number[][];
    try {
      embeddings = await withRetry(
        'embed recipes',
        () => options.encoder.embedDocuments(batch.map(recipeContent)),
        options.retry,
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const ids = batch.map((r) => r.id).join(', ');
      throw new IngestionError(`Embedding failed for [${ids}]: ${message}`, 'EMBED_FAILED', error);
    }
    if (embeddings.length !== batch.length) {
      throw new IngestionError(
        `Encoder returned ${embeddings.length} embeddings for ${batch.length} recipes`,
        'EMBED_FAILED',
      );
    }

    batch.forEach((recipe, j) => items.push(recipeToItem(recipe, embeddings[j])));
    batches++;
    options.progressCallback?.({ done: items.length, total: recipes.length });
  }

  try {
    await options.store.upsertBatch(items);
  } catch (error) {
    if (error instanceof RecipeFinderError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new IngestionError(`Failed to store recipes: ${message}`, 'STORE_FAILED', error);
  }

  const durationMs = Date.now() - startTime;
  log.info(`Ingested ${items.length} recipes`, { batches, durationMs });
  return { ingested: items.length, batches, durationMs };
}
