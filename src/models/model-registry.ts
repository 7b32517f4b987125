/**
 * Embedding models known to work with the local model server.
 */

import { ConfigError } from '../utils/errors.js';

export interface ModelConfig {
  /** Model name as served (e.g. by Ollama). */
  id: string;
  /** Embedding dimensions; 0 when unknown. */
  dims: number;
  /** Whether the model uses task prefixes (e.g. nomic). */
  usesPrefix: boolean;
  /** Prefix for document embedding (if usesPrefix). */
  documentPrefix: string;
  /** Prefix for query embedding (if usesPrefix). */
  queryPrefix: string;
  /** Notes about the model. */
  notes: string;
}

export const MODEL_REGISTRY: Record<string, ModelConfig> = {
  'nomic-embed-text': {
    id: 'nomic-embed-text',
    dims: 768,
    usesPrefix: true,
    documentPrefix: 'search_document: ',
    queryPrefix: 'search_query: ',
    notes: 'Default. 8k context, needs task prefixes.',
  },
  'mxbai-embed-large': {
    id: 'mxbai-embed-large',
    dims: 1024,
    usesPrefix: true,
    documentPrefix: '',
    queryPrefix: 'Represent this sentence for searching relevant passages: ',
    notes: 'Query-side instruction prefix only.',
  },
  'all-minilm': {
    id: 'all-minilm',
    dims: 384,
    usesPrefix: false,
    documentPrefix: '',
    queryPrefix: '',
    notes: 'Smallest, 256 token context.',
  },
};

export function getModel(id: string): ModelConfig {
  const config = MODEL_REGISTRY[id];
  if (!config) {
    throw new ConfigError(
      `Unknown model: ${id}. Available: ${Object.keys(MODEL_REGISTRY).join(', ')}`,
      'INVALID_VALUE',
    );
  }
  return config;
}

/**
 * Registry entry for a model, or a prefix-less entry of unknown size
 * for models the registry does not list.
 */
export function resolveModel(id: string): ModelConfig {
  return (
    MODEL_REGISTRY[id] ?? {
      id,
      dims: 0,
      usesPrefix: false,
      documentPrefix: '',
      queryPrefix: '',
      notes: 'Not in registry.',
    }
  );
}

export function getAllModelIds(): string[] {
  return Object.keys(MODEL_REGISTRY);
}
