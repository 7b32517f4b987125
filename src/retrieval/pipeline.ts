/**
 * Hybrid search pipeline.
 *
 * Pipeline: validate → embed → retrieve (broad pool) → hard filter →
 * preference scoring → select top-N
 *
 * ```
 * Encoding → Retrieving → Filtering → Scoring → Selecting → Done
 * ```
 *
 * The run is linear with no retries. Every input is validated before the
 * encoder or the item store is touched, and any collaborator failure aborts
 * the run with no partial results:
 *
 * - `InvalidArgumentError`: malformed limit, topK, threshold, filter or
 *   preferences
 * - `EncodingError`: the query could not be embedded
 * - `RetrievalError` (`RETRIEVAL_UNAVAILABLE` / `RETRIEVAL_TIMEOUT`): the
 *   store failed or exceeded its budget
 *
 * Filtering and scoring are pure per candidate; results meet only in the
 * selector once every candidate is scored.
 */

import { CandidateRetriever, assertThreshold, type ScoredItem } from './retriever.js';
import { matches, validateFilter, type FilterExpression } from './filter.js';
import {
  compilePreferences,
  matchedPreferences,
  preferenceAdjustment,
  type Preference,
} from './preference-scorer.js';
import { assertPositiveInteger, select } from './result-selector.js';
import type { QueryEncoder } from '../models/embedder.js';
import type { Attributes, ItemSource } from '../storage/types.js';
import { copyAttributes } from '../storage/item-copy.js';
import { DEFAULT_SEARCH, type SearchDefaults } from '../config/recipe-config.js';
import { EncodingError, InvalidArgumentError, RecipeFinderError } from '../utils/errors.js';
import { isUsableVector } from '../utils/similarity.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('pipeline');

export type PipelineStage = 'encoding' | 'retrieving' | 'filtering' | 'scoring' | 'selecting' | 'done';

/**
 * A single search request.
 */
export interface SearchQuery {
  /** Free-text query */
  text: string;
  /** Hard constraints; omitted = match everything */
  filter?: FilterExpression;
  /** Soft re-ranking adjustments */
  preferences?: Preference[];
  /** Maximum results returned */
  limit: number;
  /** Candidate pool size before filtering (default from config) */
  topK?: number;
  /** Minimum similarity for a candidate (default from config) */
  similarityThreshold?: number;
  /** Time budget for the item store in ms (default from config) */
  timeoutMs?: number;
}

export interface SearchHit {
  id: string;
  /** Similarity plus preference adjustments */
  score: number;
  /** Cosine similarity to the query */
  similarity: number;
  content: string;
  attributes: Attributes;
  /** Labels of the preferences that applied */
  matchedPreferences: string[];
}

export interface SearchResult {
  hits: SearchHit[];
  /** Candidates returned by retrieval */
  candidates: number;
  /** Candidates that passed the hard filter */
  eligible: number;
  durationMs: number;
}

export interface PipelineOptions {
  encoder: QueryEncoder;
  source: ItemSource;
  /** Overrides for topK / threshold / timeout defaults */
  defaults?: Partial<SearchDefaults>;
  /** Observer for stage transitions */
  onStage?: (stage: PipelineStage) => void;
}

export class HybridSearchPipeline {
  private readonly encoder: QueryEncoder;
  private readonly retriever: CandidateRetriever;
  private readonly defaults: SearchDefaults;
  private readonly onStage?: (stage: PipelineStage) => void;

  constructor(options: PipelineOptions) {
    this.encoder = options.encoder;
    this.retriever = new CandidateRetriever(options.source);
    this.defaults = { ...DEFAULT_SEARCH, ...options.defaults };
    this.onStage = options.onStage;
  }

  /**
   * Run the pipeline for one query.
   */
  async search(query: SearchQuery): Promise<SearchResult> {
    const startTime = Date.now();

    // Validate everything up front
    if (typeof query.text !== 'string' || query.text.trim().length === 0) {
      throw new InvalidArgumentError('query text must be a non-empty string', 'INVALID_QUERY');
    }
    assertPositiveInteger(query.limit, 'limit', 'INVALID_LIMIT');
    const topK = query.topK ?? this.defaults.topK;
    assertPositiveInteger(topK, 'topK', 'INVALID_TOP_K');
    const threshold = query.similarityThreshold ?? this.defaults.similarityThreshold;
    assertThreshold(threshold);
    const timeoutMs = query.timeoutMs ?? this.defaults.timeoutMs;
    if (!Number.isFinite(timeoutMs) || timeoutMs < 0) {
      throw new InvalidArgumentError(
        `timeoutMs must be a non-negative number, got ${String(timeoutMs)}`,
        'INVALID_TIMEOUT',
      );
    }
    if (query.filter) {
      validateFilter(query.filter);
    }
    const compiled = compilePreferences(query.preferences ?? []);

    // 1. Encode
    this.enter('encoding');
    const queryVector = await this.encode(query.text);

    // 2. Retrieve a broad pool
    this.enter('retrieving');
    const candidates = await this.retriever.retrieve(queryVector, topK, threshold, { timeoutMs });

    // 3. Hard filter
    this.enter('filtering');
    const eligible = candidates.filter((c) => matches(c.item, query.filter));

    // 4. Preference scoring
    this.enter('scoring');
    const scored: Array<ScoredItem & { matched: string[] }> = eligible.map((c) => ({
      ...c,
      score: c.similarity + preferenceAdjustment(c.item.attributes, compiled),
      matched: matchedPreferences(c.item.attributes, compiled),
    }));

    // 5. Select
    this.enter('selecting');
    const selected = select(scored, query.limit);

    this.enter('done');
    const durationMs = Date.now() - startTime;
    log.debug('Search complete', {
      candidates: candidates.length,
      eligible: eligible.length,
      returned: selected.length,
      durationMs,
    });

    return {
      hits: selected.map((s) => ({
        id: s.item.id,
        score: s.score,
        similarity: s.similarity,
        content: s.item.content,
        attributes: copyAttributes(s.item.attributes),
        matchedPreferences: s.matched,
      })),
      candidates: candidates.length,
      eligible: eligible.length,
      durationMs,
    };
  }

  private enter(stage: PipelineStage): void {
    log.debug(`Stage: ${stage}`);
    this.onStage?.(stage);
  }

  private async encode(text: string): Promise<number[]> {
    let vector: number[];
    try {
      vector = await this.encoder.embed(text);
    } catch (error) {
      if (error instanceof RecipeFinderError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new EncodingError(`Query encoding failed: ${message}`, 'ENCODING_FAILED', error);
    }
    if (!isUsableVector(vector)) {
      throw new EncodingError('Encoder returned an unusable vector', 'EMPTY_EMBEDDING');
    }
    return vector;
  }
}
