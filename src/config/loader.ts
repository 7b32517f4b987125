/**
 * Configuration loader with priority-based resolution.
 *
 * Priority (highest to lowest):
 * 1. CLI flags (passed directly)
 * 2. Environment variables (RECIPE_FINDER_*)
 * 3. Project config file (./recipe-finder.config.json)
 * 4. User config file (~/.recipe-finder/config.json)
 * 5. Built-in defaults
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { resolvePath, DEFAULT_CONFIG, type RecipeFinderConfig } from './recipe-config.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config-loader');

export const CIPHERS = ['chacha20', 'sqlcipher'] as const;
export type Cipher = (typeof CIPHERS)[number];

/** External config file structure (matches config.schema.json) */
export interface ExternalConfig {
  retrieval?: {
    /** Candidate pool size before filtering. Default: 20 */
    topK?: number;
    /** Minimum cosine similarity in [0, 1]. Default: 0.65 */
    similarityThreshold?: number;
    /** Results returned. Default: 10 */
    limit?: number;
    /** Item store time budget in ms; 0 = no limit. Default: 5000 */
    timeoutMs?: number;
  };
  embedding?: {
    baseUrl?: string;
    model?: string;
    timeoutMs?: number;
    maxRetries?: number;
  };
  storage?: {
    dbPath?: string;
  };
  encryption?: {
    enabled?: boolean;
    cipher?: Cipher;
  };
  server?: {
    port?: number;
  };
  fridge?: {
    ingredients?: string[];
  };
}

/** Default external config values */
const EXTERNAL_DEFAULTS: Required<ExternalConfig> = {
  retrieval: {
    topK: DEFAULT_CONFIG.search.topK,
    similarityThreshold: DEFAULT_CONFIG.search.similarityThreshold,
    limit: DEFAULT_CONFIG.search.limit,
    timeoutMs: DEFAULT_CONFIG.search.timeoutMs,
  },
  embedding: {
    baseUrl: DEFAULT_CONFIG.embeddingBaseUrl,
    model: DEFAULT_CONFIG.embeddingModel,
    timeoutMs: DEFAULT_CONFIG.embeddingTimeoutMs,
    maxRetries: DEFAULT_CONFIG.embeddingMaxRetries,
  },
  storage: {
    dbPath: DEFAULT_CONFIG.dbPath,
  },
  encryption: {
    enabled: false,
    cipher: 'chacha20',
  },
  server: {
    port: DEFAULT_CONFIG.serverPort,
  },
  fridge: {
    ingredients: DEFAULT_CONFIG.fridgeIngredients,
  },
};

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCipher(value: unknown): value is Cipher {
  return CIPHERS.some((c) => c === value);
}

function numberField(section: JsonObject, key: string): number | undefined {
  const value = section[key];
  return typeof value === 'number' ? value : undefined;
}

function stringField(section: JsonObject, key: string): string | undefined {
  const value = section[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Keep only the known, correctly typed fields of a parsed config file.
 * Anything else is reported and dropped.
 */
export function readExternalConfig(raw: unknown, source: string): ExternalConfig {
  const config: ExternalConfig = {};
  if (!isObject(raw)) {
    log.warn(`Ignoring config file ${source}: not a JSON object`);
    return config;
  }

  const section = (name: string): JsonObject | undefined => {
    const value = raw[name];
    if (value === undefined) return undefined;
    if (!isObject(value)) {
      log.warn(`Ignoring "${name}" in ${source}: not an object`);
      return undefined;
    }
    return value;
  };

  const retrieval = section('retrieval');
  if (retrieval) {
    config.retrieval = {};
    const topK = numberField(retrieval, 'topK');
    if (topK !== undefined) config.retrieval.topK = topK;
    const threshold = numberField(retrieval, 'similarityThreshold');
    if (threshold !== undefined) config.retrieval.similarityThreshold = threshold;
    const limit = numberField(retrieval, 'limit');
    if (limit !== undefined) config.retrieval.limit = limit;
    const timeoutMs = numberField(retrieval, 'timeoutMs');
    if (timeoutMs !== undefined) config.retrieval.timeoutMs = timeoutMs;
  }

  const embedding = section('embedding');
  if (embedding) {
    config.embedding = {};
    const baseUrl = stringField(embedding, 'baseUrl');
    if (baseUrl !== undefined) config.embedding.baseUrl = baseUrl;
    const model = stringField(embedding, 'model');
    if (model !== undefined) config.embedding.model = model;
    const timeoutMs = numberField(embedding, 'timeoutMs');
    if (timeoutMs !== undefined) config.embedding.timeoutMs = timeoutMs;
    const maxRetries = numberField(embedding, 'maxRetries');
    if (maxRetries !== undefined) config.embedding.maxRetries = maxRetries;
  }

  const storage = section('storage');
  if (storage) {
    config.storage = {};
    const dbPath = stringField(storage, 'dbPath');
    if (dbPath !== undefined) config.storage.dbPath = dbPath;
  }

  const encryption = section('encryption');
  if (encryption) {
    config.encryption = {};
    if (typeof encryption.enabled === 'boolean') config.encryption.enabled = encryption.enabled;
    if (encryption.cipher !== undefined) {
      if (isCipher(encryption.cipher)) {
        config.encryption.cipher = encryption.cipher;
      } else {
        log.warn(`Ignoring unknown cipher in ${source}`, { cipher: String(encryption.cipher) });
      }
    }
  }

  const server = section('server');
  if (server) {
    config.server = {};
    const port = numberField(server, 'port');
    if (port !== undefined) config.server.port = port;
  }

  const fridge = section('fridge');
  if (fridge) {
    config.fridge = {};
    const ingredients = fridge.ingredients;
    if (Array.isArray(ingredients)) {
      config.fridge.ingredients = ingredients.filter((i): i is string => typeof i === 'string');
    }
  }

  return config;
}

/**
 * Load config from a JSON file.
 */
function loadConfigFile(path: string): ExternalConfig | null {
  const resolvedPath = resolvePath(path);
  if (!existsSync(resolvedPath)) {
    return null;
  }

  try {
    const content = readFileSync(resolvedPath, 'utf-8');
    return readExternalConfig(JSON.parse(content), path);
  } catch (error) {
    log.warn(`Failed to parse config file ${path}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}

/**
 * Load config from environment variables.
 * Variables are prefixed with RECIPE_FINDER_ and use underscores for nesting.
 * Examples:
 *   RECIPE_FINDER_RETRIEVAL_TOP_K=30
 *   RECIPE_FINDER_EMBEDDING_BASE_URL=http://ollama:11434/v1
 *   RECIPE_FINDER_FRIDGE_INGREDIENTS=eggs,milk,spinach
 */
function loadEnvConfig(): ExternalConfig {
  const config: ExternalConfig = {};
  const env = process.env;

  // Retrieval
  if (env.RECIPE_FINDER_RETRIEVAL_TOP_K) {
    config.retrieval = config.retrieval ?? {};
    config.retrieval.topK = parseInt(env.RECIPE_FINDER_RETRIEVAL_TOP_K, 10);
  }
  if (env.RECIPE_FINDER_RETRIEVAL_SIMILARITY_THRESHOLD) {
    config.retrieval = config.retrieval ?? {};
    config.retrieval.similarityThreshold = parseFloat(
      env.RECIPE_FINDER_RETRIEVAL_SIMILARITY_THRESHOLD,
    );
  }
  if (env.RECIPE_FINDER_RETRIEVAL_LIMIT) {
    config.retrieval = config.retrieval ?? {};
    config.retrieval.limit = parseInt(env.RECIPE_FINDER_RETRIEVAL_LIMIT, 10);
  }
  if (env.RECIPE_FINDER_RETRIEVAL_TIMEOUT_MS) {
    config.retrieval = config.retrieval ?? {};
    config.retrieval.timeoutMs = parseInt(env.RECIPE_FINDER_RETRIEVAL_TIMEOUT_MS, 10);
  }

  // Embedding
  if (env.RECIPE_FINDER_EMBEDDING_BASE_URL) {
    config.embedding = config.embedding ?? {};
    config.embedding.baseUrl = env.RECIPE_FINDER_EMBEDDING_BASE_URL;
  }
  if (env.RECIPE_FINDER_EMBEDDING_MODEL) {
    config.embedding = config.embedding ?? {};
    config.embedding.model = env.RECIPE_FINDER_EMBEDDING_MODEL;
  }
  if (env.RECIPE_FINDER_EMBEDDING_TIMEOUT_MS) {
    config.embedding = config.embedding ?? {};
    config.embedding.timeoutMs = parseInt(env.RECIPE_FINDER_EMBEDDING_TIMEOUT_MS, 10);
  }
  if (env.RECIPE_FINDER_EMBEDDING_MAX_RETRIES) {
    config.embedding = config.embedding ?? {};
    config.embedding.maxRetries = parseInt(env.RECIPE_FINDER_EMBEDDING_MAX_RETRIES, 10);
  }

  // Storage
  if (env.RECIPE_FINDER_STORAGE_DB_PATH) {
    config.storage = config.storage ?? {};
    config.storage.dbPath = env.RECIPE_FINDER_STORAGE_DB_PATH;
  }

  // Encryption
  if (env.RECIPE_FINDER_ENCRYPTION_ENABLED) {
    config.encryption = config.encryption ?? {};
    config.encryption.enabled = env.RECIPE_FINDER_ENCRYPTION_ENABLED === 'true';
  }
  const cipher = env.RECIPE_FINDER_ENCRYPTION_CIPHER;
  if (cipher) {
    if (isCipher(cipher)) {
      config.encryption = config.encryption ?? {};
      config.encryption.cipher = cipher;
    } else {
      log.warn('Ignoring unknown RECIPE_FINDER_ENCRYPTION_CIPHER', { cipher });
    }
  }

  // Server
  if (env.RECIPE_FINDER_SERVER_PORT) {
    config.server = config.server ?? {};
    config.server.port = parseInt(env.RECIPE_FINDER_SERVER_PORT, 10);
  }

  // Fridge
  if (env.RECIPE_FINDER_FRIDGE_INGREDIENTS) {
    config.fridge = config.fridge ?? {};
    config.fridge.ingredients = env.RECIPE_FINDER_FRIDGE_INGREDIENTS.split(',')
      .map((i) => i.trim())
      .filter((i) => i.length > 0);
  }

  return config;
}

/**
 * Deep merge two config objects, with source overriding target.
 * Sections merge field by field; arrays are replaced whole.
 */
function deepMerge(target: Required<ExternalConfig>, source: ExternalConfig): Required<ExternalConfig> {
  return {
    retrieval: { ...target.retrieval, ...source.retrieval },
    embedding: { ...target.embedding, ...source.embedding },
    storage: { ...target.storage, ...source.storage },
    encryption: { ...target.encryption, ...source.encryption },
    server: { ...target.server, ...source.server },
    fridge: { ...target.fridge, ...source.fridge },
  };
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/**
 * Validate the external config structure.
 */
export function validateExternalConfig(config: ExternalConfig): string[] {
  const errors: string[] = [];

  // Retrieval validation
  const retrieval = config.retrieval;
  if (retrieval?.topK !== undefined && !isPositiveInteger(retrieval.topK)) {
    errors.push('retrieval.topK must be a positive integer');
  }
  if (retrieval?.similarityThreshold !== undefined) {
    const t = retrieval.similarityThreshold;
    if (!Number.isFinite(t) || t < 0 || t > 1) {
      errors.push('retrieval.similarityThreshold must be between 0 and 1 (inclusive)');
    }
  }
  if (retrieval?.limit !== undefined && !isPositiveInteger(retrieval.limit)) {
    errors.push('retrieval.limit must be a positive integer');
  }
  if (retrieval?.timeoutMs !== undefined) {
    if (!Number.isFinite(retrieval.timeoutMs) || retrieval.timeoutMs < 0) {
      errors.push('retrieval.timeoutMs must be >= 0 (0 = no limit)');
    }
  }

  // Embedding validation
  const embedding = config.embedding;
  if (embedding?.baseUrl !== undefined && !URL.canParse(embedding.baseUrl)) {
    errors.push('embedding.baseUrl must be an absolute URL');
  }
  if (embedding?.model !== undefined && embedding.model.trim().length === 0) {
    errors.push('embedding.model must not be empty');
  }
  if (embedding?.timeoutMs !== undefined && !isPositiveInteger(embedding.timeoutMs)) {
    errors.push('embedding.timeoutMs must be a positive integer');
  }
  if (embedding?.maxRetries !== undefined) {
    if (!Number.isInteger(embedding.maxRetries) || embedding.maxRetries < 0) {
      errors.push('embedding.maxRetries must be a non-negative integer');
    }
  }

  // Server validation
  if (config.server?.port !== undefined) {
    const port = config.server.port;
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
      errors.push('server.port must be an integer between 0 and 65535');
    }
  }

  // Fridge validation
  if (config.fridge?.ingredients?.some((i) => i.trim().length === 0)) {
    errors.push('fridge.ingredients must not contain empty names');
  }

  return errors;
}

export interface LoadConfigOptions {
  /** CLI overrides (highest priority) */
  cliOverrides?: ExternalConfig;
  /** Skip loading environment variables */
  skipEnv?: boolean;
  /** Skip loading project config file */
  skipProjectConfig?: boolean;
  /** Skip loading user config file */
  skipUserConfig?: boolean;
  /** Custom project config path */
  projectConfigPath?: string;
  /** Custom user config path */
  userConfigPath?: string;
}

/**
 * Load configuration with priority-based resolution.
 *
 * Priority (highest to lowest):
 * 1. CLI flags (cliOverrides)
 * 2. Environment variables (RECIPE_FINDER_*)
 * 3. Project config file (./recipe-finder.config.json)
 * 4. User config file (~/.recipe-finder/config.json)
 * 5. Built-in defaults
 */
export function loadConfig(options: LoadConfigOptions = {}): Required<ExternalConfig> {
  let config = EXTERNAL_DEFAULTS;

  // 4. User config file
  if (!options.skipUserConfig) {
    const userConfigPath = options.userConfigPath ?? '~/.recipe-finder/config.json';
    const userConfig = loadConfigFile(userConfigPath);
    if (userConfig) {
      config = deepMerge(config, userConfig);
    }
  }

  // 3. Project config file
  if (!options.skipProjectConfig) {
    const projectConfigPath =
      options.projectConfigPath ?? join(process.cwd(), 'recipe-finder.config.json');
    const projectConfig = loadConfigFile(projectConfigPath);
    if (projectConfig) {
      config = deepMerge(config, projectConfig);
    }
  }

  // 2. Environment variables
  if (!options.skipEnv) {
    config = deepMerge(config, loadEnvConfig());
  }

  // 1. CLI overrides
  if (options.cliOverrides) {
    config = deepMerge(config, options.cliOverrides);
  }

  return config;
}

/**
 * Get the resolved storage paths.
 */
export function getResolvedPaths(config: Required<ExternalConfig>): { dbPath: string } {
  return {
    dbPath: resolvePath(config.storage.dbPath ?? DEFAULT_CONFIG.dbPath),
  };
}

/**
 * Convert ExternalConfig to RecipeFinderConfig (the runtime format).
 */
export function toRuntimeConfig(external: Required<ExternalConfig>): RecipeFinderConfig {
  const defaults = DEFAULT_CONFIG;
  return {
    search: {
      topK: external.retrieval.topK ?? defaults.search.topK,
      similarityThreshold:
        external.retrieval.similarityThreshold ?? defaults.search.similarityThreshold,
      limit: external.retrieval.limit ?? defaults.search.limit,
      timeoutMs: external.retrieval.timeoutMs ?? defaults.search.timeoutMs,
    },

    embeddingBaseUrl: external.embedding.baseUrl ?? defaults.embeddingBaseUrl,
    embeddingModel: external.embedding.model ?? defaults.embeddingModel,
    embeddingTimeoutMs: external.embedding.timeoutMs ?? defaults.embeddingTimeoutMs,
    embeddingMaxRetries: external.embedding.maxRetries ?? defaults.embeddingMaxRetries,

    dbPath: external.storage.dbPath ?? defaults.dbPath,

    serverPort: external.server.port ?? defaults.serverPort,
    fridgeIngredients: external.fridge.ingredients ?? defaults.fridgeIngredients,
  };
}

// Re-export for convenience
export { EXTERNAL_DEFAULTS };
