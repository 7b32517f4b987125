/**
 * Tests for error types.
 */

import { describe, it, expect } from 'vitest';
import {
  RecipeFinderError,
  InvalidArgumentError,
  NotFoundError,
  RetrievalError,
  EncodingError,
  StorageError,
  ConfigError,
  IngestionError,
  isErrorWithCode,
  isInvalidArgumentError,
  isRetrievalError,
  isEncodingError,
  isNotFoundError,
  isRetryable,
  errorMessage,
} from '../../src/utils/errors.js';

describe('errors', () => {
  describe('RecipeFinderError', () => {
    it('has message, code, and name', () => {
      const error = new RecipeFinderError('Something failed', 'TEST_ERROR');

      expect(error.message).toBe('Something failed');
      expect(error.code).toBe('TEST_ERROR');
      expect(error.name).toBe('RecipeFinderError');
      expect(error).toBeInstanceOf(Error);
    });

    it('keeps an Error cause as is', () => {
      const cause = new Error('disk full');
      const error = new RecipeFinderError('Write failed', 'WRITE', cause);

      expect(error.cause).toBe(cause);
    });

    it('wraps a non-Error cause', () => {
      const error = new RecipeFinderError('Write failed', 'WRITE', 'boom');

      expect(error.cause).toBeInstanceOf(Error);
      expect(error.cause?.message).toBe('boom');
    });

    it('is not retryable by default', () => {
      expect(new RecipeFinderError('x', 'X').retryable).toBe(false);
    });

    it('formats the cause chain', () => {
      const inner = new StorageError('table missing', 'DB_OPEN_FAILED');
      const outer = new RetrievalError('store down', 'RETRIEVAL_UNAVAILABLE', inner);

      expect(outer.toDetailedString()).toBe(
        'RetrievalError [RETRIEVAL_UNAVAILABLE]: store down\n  Caused by: table missing [DB_OPEN_FAILED]',
      );
    });

    it('formats without a cause', () => {
      const error = new InvalidArgumentError('limit must be positive', 'INVALID_LIMIT');

      expect(error.toDetailedString()).toBe('InvalidArgumentError [INVALID_LIMIT]: limit must be positive');
    });
  });

  describe('subclasses', () => {
    it('set their own name', () => {
      expect(new InvalidArgumentError('m', 'C').name).toBe('InvalidArgumentError');
      expect(new NotFoundError('m', 'C').name).toBe('NotFoundError');
      expect(new EncodingError('m', 'C').name).toBe('EncodingError');
      expect(new StorageError('m', 'C').name).toBe('StorageError');
      expect(new ConfigError('m', 'C').name).toBe('ConfigError');
      expect(new IngestionError('m', 'C').name).toBe('IngestionError');
    });

    it('all extend RecipeFinderError', () => {
      expect(new NotFoundError('m', 'C')).toBeInstanceOf(RecipeFinderError);
      expect(new IngestionError('m', 'C')).toBeInstanceOf(RecipeFinderError);
    });
  });

  describe('retryable', () => {
    it('is true for retrieval unavailability and timeouts', () => {
      expect(new RetrievalError('m', 'RETRIEVAL_UNAVAILABLE').retryable).toBe(true);
      expect(new RetrievalError('m', 'RETRIEVAL_TIMEOUT').retryable).toBe(true);
    });

    it('is false for other retrieval codes', () => {
      expect(new RetrievalError('m', 'OTHER').retryable).toBe(false);
    });

    it('is true only for encoder transport failures', () => {
      expect(new EncodingError('m', 'ENCODING_FAILED').retryable).toBe(true);
      expect(new EncodingError('m', 'EMPTY_EMBEDDING').retryable).toBe(false);
    });

    it('is false for invalid arguments', () => {
      expect(new InvalidArgumentError('m', 'INVALID_LIMIT').retryable).toBe(false);
    });
  });

  describe('helpers', () => {
    it('isErrorWithCode matches code on recipe-finder errors only', () => {
      expect(isErrorWithCode(new StorageError('m', 'CORRUPT_ITEM'), 'CORRUPT_ITEM')).toBe(true);
      expect(isErrorWithCode(new StorageError('m', 'CORRUPT_ITEM'), 'OTHER')).toBe(false);
      expect(isErrorWithCode(new Error('m'), 'CORRUPT_ITEM')).toBe(false);
    });

    it('type guards discriminate', () => {
      expect(isInvalidArgumentError(new InvalidArgumentError('m', 'C'))).toBe(true);
      expect(isInvalidArgumentError(new NotFoundError('m', 'C'))).toBe(false);
      expect(isRetrievalError(new RetrievalError('m', 'C'))).toBe(true);
      expect(isEncodingError(new EncodingError('m', 'C'))).toBe(true);
      expect(isNotFoundError(new NotFoundError('m', 'C'))).toBe(true);
      expect(isNotFoundError('not found')).toBe(false);
    });

    it('isRetryable ignores plain errors', () => {
      expect(isRetryable(new RetrievalError('m', 'RETRIEVAL_TIMEOUT'))).toBe(true);
      expect(isRetryable(new Error('timeout'))).toBe(false);
      expect(isRetryable(undefined)).toBe(false);
    });

    it('errorMessage handles anything thrown', () => {
      expect(errorMessage(new Error('bad'))).toBe('bad');
      expect(errorMessage('text')).toBe('text');
      expect(errorMessage(42)).toBe('42');
    });
  });
});
