/**
 * Retrieval system exports.
 */

// Pipeline
export { HybridSearchPipeline } from './pipeline.js';
export type {
  PipelineOptions,
  PipelineStage,
  SearchHit,
  SearchQuery,
  SearchResult,
} from './pipeline.js';

// Candidate retrieval
export { CandidateRetriever, rankBySimilarity, assertThreshold } from './retriever.js';
export type { RetrieveOptions, ScoredItem } from './retriever.js';

// Filter evaluation
export {
  matches,
  parseFilter,
  validateFilter,
  eq,
  ne,
  lt,
  lte,
  gt,
  gte,
  contains,
  oneOf,
  noneOf,
  and,
  or,
  not,
  COMPARISON_OPERATORS,
  MAX_FILTER_DEPTH,
} from './filter.js';
export type {
  AndFilter,
  ComparisonOperator,
  FilterExpression,
  FilterValue,
  LeafFilter,
  NotFilter,
  OrFilter,
  ScalarValue,
} from './filter.js';

// Preference scoring
export {
  score,
  compilePreferences,
  parsePreferences,
  validatePreferences,
  preferenceAdjustment,
  matchedPreferences,
} from './preference-scorer.js';
export type {
  AttributePreference,
  CompiledPreference,
  Preference,
  PredicatePreference,
} from './preference-scorer.js';

// Selection
export { select, assertPositiveInteger } from './result-selector.js';
