/**
 * Recipe Finder
 *
 * Hybrid recipe search: semantic retrieval, hard filters and preference
 * scoring over a local recipe index.
 *
 * @packageDocumentation
 */

// Configuration
export * from './config/recipe-config.js';
export {
  loadConfig,
  validateExternalConfig,
  toRuntimeConfig,
  getResolvedPaths,
  readExternalConfig,
  EXTERNAL_DEFAULTS,
  CIPHERS,
} from './config/loader.js';
export type { ExternalConfig, LoadConfigOptions, Cipher } from './config/loader.js';

// Storage
export * from './storage/index.js';

// Models
export { Embedder } from './models/embedder.js';
export type { QueryEncoder, DocumentEncoder, EmbedderOptions } from './models/embedder.js';
export { getModel, resolveModel, getAllModelIds, MODEL_REGISTRY } from './models/model-registry.js';
export type { ModelConfig } from './models/model-registry.js';

// Retrieval
export * from './retrieval/index.js';

// Recipes
export * from './recipes/index.js';

// Ingestion
export * from './ingest/index.js';

// Services
export { createRuntime } from './runtime.js';
export type { Runtime } from './runtime.js';
export { createApp, startServer } from './api/server.js';
export type { AppDeps } from './api/server.js';
export { McpServer, startMcpServer, createTools } from './mcp/index.js';
export type { McpServerConfig, ToolDefinition } from './mcp/index.js';

// Utils
export * from './utils/errors.js';
export { createLogger, setLogLevel, setJsonMode } from './utils/logger.js';
export { withRetry, withTimeout } from './utils/resilience.js';
export type { RetryOptions } from './utils/resilience.js';
export { VERSION } from './utils/version.js';
