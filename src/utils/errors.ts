/**
 * Standardized error types for recipe-finder.
 *
 * All errors extend from RecipeFinderError, providing:
 * - Error code for programmatic handling
 * - Cause chaining for debugging
 * - A retryable flag callers use to decide on backoff
 *
 * ## Usage
 *
 * ```typescript
 * import { InvalidArgumentError, RetrievalError } from './errors.js';
 *
 * // Reject bad input before touching any collaborator
 * throw new InvalidArgumentError('topK must be a positive integer', 'INVALID_TOP_K');
 *
 * // Chain errors
 * try {
 *   await source.getAll();
 * } catch (err) {
 *   throw new RetrievalError('Item store unavailable', 'RETRIEVAL_UNAVAILABLE', err);
 * }
 * ```
 *
 * @module utils/errors
 */

/**
 * Base error class for all recipe-finder errors.
 *
 * Provides:
 * - `code`: Programmatic error identifier (e.g., 'INVALID_TOP_K')
 * - `cause`: Original error that caused this one (for chaining)
 * - `name`: Error class name (e.g., 'RetrievalError')
 */
export class RecipeFinderError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  /** Original error that caused this one */
  readonly cause?: Error;

  constructor(message: string, code: string, cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;

    // Normalize cause to Error
    if (cause instanceof Error) {
      this.cause = cause;
    } else if (cause !== undefined) {
      this.cause = new Error(String(cause));
    }

    // Capture stack trace (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /** Whether the caller may retry the failed operation. */
  get retryable(): boolean {
    return false;
  }

  /**
   * Get a formatted string including cause chain.
   */
  toDetailedString(): string {
    let result = `${this.name} [${this.code}]: ${this.message}`;

    if (this.cause) {
      result += `\n  Caused by: ${this.cause.message}`;
      if (this.cause instanceof RecipeFinderError) {
        result += ` [${this.cause.code}]`;
      }
    }

    return result;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Input Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Malformed caller input. Reported immediately, never retried.
 *
 * Common codes:
 * - `INVALID_LIMIT`: Result limit is not a positive integer
 * - `INVALID_TOP_K`: Candidate cap is not a positive integer
 * - `INVALID_THRESHOLD`: Similarity threshold outside [0, 1]
 * - `INVALID_VECTOR`: Query vector empty or non-finite
 * - `DIMENSION_MISMATCH`: Stored vector has a different dimensionality
 * - `INVALID_FILTER`: Filter tree has an unknown kind, operator or value type
 * - `INVALID_PREFERENCE`: Preference weight or predicate is malformed
 * - `INVALID_QUERY`: Query text missing or empty
 */
export class InvalidArgumentError extends RecipeFinderError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

/**
 * A requested entity does not exist.
 *
 * Common codes:
 * - `RECIPE_NOT_FOUND`: No recipe stored under the given id
 */
export class NotFoundError extends RecipeFinderError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Retrieval Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The backing item/vector store could not serve a retrieval.
 *
 * Common codes:
 * - `RETRIEVAL_UNAVAILABLE`: Store unreachable or the read failed
 * - `RETRIEVAL_TIMEOUT`: Store did not answer within the caller's budget
 *
 * Both are retryable; the pipeline itself never retries.
 */
export class RetrievalError extends RecipeFinderError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }

  override get retryable(): boolean {
    return this.code === 'RETRIEVAL_UNAVAILABLE' || this.code === 'RETRIEVAL_TIMEOUT';
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Encoding Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The query could not be embedded.
 *
 * Common codes:
 * - `ENCODING_FAILED`: Encoder service call failed
 * - `EMPTY_EMBEDDING`: Encoder answered without a vector
 */
export class EncodingError extends RecipeFinderError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }

  /** Only transport failures are retryable. */
  override get retryable(): boolean {
    return this.code === 'ENCODING_FAILED';
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Storage Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors from the storage layer (database, item index).
 *
 * Common codes:
 * - `DB_OPEN_FAILED`: Cannot open database
 * - `DB_KEY_MISSING`: Encryption enabled without a key
 * - `ITEM_INSERT_FAILED`: Failed to write an item
 * - `CORRUPT_ITEM`: Stored row cannot be decoded
 */
export class StorageError extends RecipeFinderError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors in configuration loading or validation.
 *
 * Common codes:
 * - `CONFIG_INVALID`: Configuration validation failed
 * - `INVALID_VALUE`: Field value is invalid
 */
export class ConfigError extends RecipeFinderError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Ingestion Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors while loading and indexing recipes.
 *
 * Common codes:
 * - `FILE_READ_FAILED`: Cannot read the recipes file
 * - `PARSE_FAILED`: File is not valid JSON
 * - `INVALID_RECIPE`: A recipe entry is missing required fields
 * - `EMBED_FAILED`: Embedding a recipe failed after retries
 */
export class IngestionError extends RecipeFinderError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Check if an error is a recipe-finder error with a specific code.
 */
export function isErrorWithCode(error: unknown, code: string): boolean {
  return error instanceof RecipeFinderError && error.code === code;
}

export function isInvalidArgumentError(error: unknown): error is InvalidArgumentError {
  return error instanceof InvalidArgumentError;
}

export function isRetrievalError(error: unknown): error is RetrievalError {
  return error instanceof RetrievalError;
}

export function isEncodingError(error: unknown): error is EncodingError {
  return error instanceof EncodingError;
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

/**
 * Whether an error is safe to retry at the caller layer.
 */
export function isRetryable(error: unknown): boolean {
  return error instanceof RecipeFinderError && error.retryable;
}

/**
 * Extract a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
