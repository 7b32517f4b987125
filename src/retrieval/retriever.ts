/**
 * Candidate retrieval by cosine similarity.
 *
 * Returns at most `topK` items whose similarity clears the threshold,
 * closest first. Fewer qualifying items means a shorter list; results
 * are never padded.
 *
 * The item store is the only collaborator here that may block on I/O, so
 * every call runs under the caller's time budget and store failures are
 * reported as retryable `RetrievalError`s:
 *
 * - `RETRIEVAL_UNAVAILABLE`: the store rejected or threw
 * - `RETRIEVAL_TIMEOUT`: the store did not answer within `timeoutMs`
 *
 * Search is brute force over `getAll()` unless the store offers
 * `findNearest`. Threshold, ordering and truncation are applied here in
 * both cases so an index cannot loosen the contract.
 */

import { InvalidArgumentError, RetrievalError } from '../utils/errors.js';
import { isUsableVector, similarityScore } from '../utils/similarity.js';
import { withTimeout } from '../utils/resilience.js';
import { createLogger } from '../utils/logger.js';
import { assertPositiveInteger } from './result-selector.js';
import type { Item, ItemSource, NearestItem } from '../storage/types.js';

const log = createLogger('retriever');

/**
 * An item with its retrieval similarity and adjusted score.
 * `score` equals `similarity` until preferences are applied.
 */
export interface ScoredItem {
  item: Item;
  /** Cosine similarity to the query, in [0, 1] */
  similarity: number;
  /** Similarity plus preference adjustments */
  score: number;
}

export interface RetrieveOptions {
  /** Abort with RETRIEVAL_TIMEOUT after this many ms. Unset = no limit. */
  timeoutMs?: number;
}

/**
 * Check a similarity threshold, throwing `InvalidArgumentError` unless it
 * is a number in [0, 1].
 */
export function assertThreshold(threshold: unknown): asserts threshold is number {
  if (typeof threshold !== 'number' || !Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw new InvalidArgumentError(
      `similarityThreshold must be within [0, 1], got ${String(threshold)}`,
      'INVALID_THRESHOLD',
    );
  }
}

export class CandidateRetriever {
  constructor(private readonly source: ItemSource) {}

  /**
   * Find the nearest stored items to a query vector.
   */
  async retrieve(
    queryVector: number[],
    topK: number,
    similarityThreshold: number,
    options: RetrieveOptions = {},
  ): Promise<ScoredItem[]> {
    assertPositiveInteger(topK, 'topK', 'INVALID_TOP_K');
    assertThreshold(similarityThreshold);
    if (!isUsableVector(queryVector)) {
      throw new InvalidArgumentError(
        'query vector must be a non-empty array of finite numbers',
        'INVALID_VECTOR',
      );
    }

    const { timeoutMs } = options;
    const nearest = await withTimeout(
      this.fetchNearest(queryVector, topK),
      timeoutMs,
      () =>
        new RetrievalError(`Item store did not respond within ${timeoutMs}ms`, 'RETRIEVAL_TIMEOUT'),
    );

    const scored: ScoredItem[] = [];
    for (const { item, similarity } of nearest) {
      if (similarity >= similarityThreshold) {
        scored.push({ item, similarity, score: similarity });
      }
    }

    // Array sort is stable: equal similarities keep store order
    scored.sort((a, b) => b.similarity - a.similarity);
    const results = scored.slice(0, topK);

    log.debug('Retrieved candidates', {
      considered: nearest.length,
      aboveThreshold: scored.length,
      returned: results.length,
    });

    return results;
  }

  private async fetchNearest(query: number[], topK: number): Promise<NearestItem[]> {
    let nearest: NearestItem[];
    try {
      if (this.source.findNearest) {
        nearest = await this.source.findNearest(query, topK);
      } else {
        nearest = rankBySimilarity(query, await this.source.getAll());
      }
    } catch (error) {
      if (error instanceof InvalidArgumentError || error instanceof RetrievalError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      log.warn('Item store unavailable', { error: message });
      throw new RetrievalError(`Item store unavailable: ${message}`, 'RETRIEVAL_UNAVAILABLE', error);
    }
    return nearest;
  }
}

/**
 * Score every item against the query, closest first.
 *
 * Throws `DIMENSION_MISMATCH` when a stored vector has a different
 * length than the query: such a store cannot be compared against.
 */
export function rankBySimilarity(query: number[], items: readonly Item[]): NearestItem[] {
  const ranked: NearestItem[] = [];
  for (const item of items) {
    if (item.embedding.length !== query.length) {
      throw new InvalidArgumentError(
        `item ${item.id} has ${item.embedding.length} dimensions, query has ${query.length}`,
        'DIMENSION_MISMATCH',
      );
    }
    ranked.push({ item, similarity: similarityScore(query, item.embedding) });
  }
  ranked.sort((a, b) => b.similarity - a.similarity);
  return ranked;
}
