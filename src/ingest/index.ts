/**
 * Recipe ingestion exports.
 */

// Loading
export { loadRecipesFile, parseRecipe, parseRecipes } from './recipe-loader.js';

// Embedding and storage
export { ingestRecipes } from './ingest-recipes.js';
export type { IngestOptions, IngestProgress, IngestResult, ItemSink } from './ingest-recipes.js';
