/**
 * Text embedding through an OpenAI-compatible `/v1/embeddings` endpoint.
 *
 * Defaults target a locally hosted Ollama server
 * (`http://localhost:11434/v1`, model `nomic-embed-text`); any server
 * speaking the same API works by changing `baseUrl`.
 *
 * Applies the model's task prefixes and checks the returned
 * dimensionality against the registry. Transport failures and empty
 * responses surface as `EncodingError`.
 */

import OpenAI from 'openai';
import { resolveModel, type ModelConfig } from './model-registry.js';
import { EncodingError, InvalidArgumentError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('embedder');

/**
 * Turns query text into a fixed-length vector.
 */
export interface QueryEncoder {
  embed(text: string): Promise<number[]>;
}

/**
 * Encoder that can also embed documents at ingestion time.
 */
export interface DocumentEncoder extends QueryEncoder {
  embedDocuments(texts: string[]): Promise<number[][]>;
}

export interface EmbedderOptions {
  /** Base URL of the OpenAI-compatible API. */
  baseUrl: string;
  /** Model name as served. */
  model: string;
  /** API key; local servers accept any placeholder. */
  apiKey?: string;
  /** Per-request timeout in ms. */
  timeoutMs?: number;
  /** Client-level retries for transient HTTP failures. */
  maxRetries?: number;
  /** Texts per embeddings request during ingestion. */
  batchSize?: number;
}

const DEFAULT_BATCH_SIZE = 16;

export class Embedder implements DocumentEncoder {
  private readonly client: OpenAI;
  private readonly config: ModelConfig;
  private readonly batchSize: number;

  constructor(options: EmbedderOptions) {
    this.config = resolveModel(options.model);
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.client = new OpenAI({
      baseURL: options.baseUrl,
      apiKey: options.apiKey ?? 'ollama',
      timeout: options.timeoutMs,
      maxRetries: options.maxRetries ?? 2,
    });
  }

  get model(): ModelConfig {
    return this.config;
  }

  /**
   * Embed query text. Applies the model's query prefix.
   */
  async embed(text: string): Promise<number[]> {
    if (text.trim().length === 0) {
      throw new InvalidArgumentError('query text must not be empty', 'INVALID_QUERY');
    }
    const [embedding] = await this.request([this.prefixed(text, true)]);
    return embedding;
  }

  /**
   * Embed documents in order, batching requests.
   */
  async embedDocuments(texts: string[]): Promise<number[][]> {
    const results: number[][] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize).map((t) => this.prefixed(t, false));
      results.push(...(await this.request(batch)));
    }
    return results;
  }

  private prefixed(text: string, isQuery: boolean): string {
    if (!this.config.usesPrefix) return text;
    return (isQuery ? this.config.queryPrefix : this.config.documentPrefix) + text;
  }

  private async request(input: string[]): Promise<number[][]> {
    const start = performance.now();
    let data: Array<{ embedding: number[]; index: number }>;
    try {
      const response = await this.client.embeddings.create({ model: this.config.id, input });
      data = response.data;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.warn('Embedding request failed', { model: this.config.id, error: message });
      throw new EncodingError(`Embedding request failed: ${message}`, 'ENCODING_FAILED', error);
    }

    const ordered = [...data].sort((a, b) => a.index - b.index);
    if (ordered.length !== input.length) {
      throw new EncodingError(
        `Expected ${input.length} embeddings, received ${ordered.length}`,
        'EMPTY_EMBEDDING',
      );
    }

    const embeddings = ordered.map((d) => d.embedding);
    for (const embedding of embeddings) {
      if (embedding.length === 0) {
        throw new EncodingError('Encoder returned an empty vector', 'EMPTY_EMBEDDING');
      }
      if (this.config.dims > 0 && embedding.length !== this.config.dims) {
        throw new EncodingError(
          `${this.config.id} returned ${embedding.length} dimensions, expected ${this.config.dims}`,
          'DIMENSION_MISMATCH',
        );
      }
    }

    log.debug('Embedded texts', {
      count: input.length,
      ms: Math.round(performance.now() - start),
    });
    return embeddings;
  }
}
