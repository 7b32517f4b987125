/**
 * Express error middleware for the recipe API.
 *
 * Maps errors to HTTP statuses and a JSON body
 * `{ error, code, retryable }`:
 *
 * | Error                                  | Status |
 * |----------------------------------------|--------|
 * | InvalidArgumentError                   | 400    |
 * | NotFoundError                          | 404    |
 * | RetrievalError (unavailable), Encoding | 503    |
 * | RetrievalError (timeout)               | 504    |
 * | anything else                          | 500    |
 *
 * Errors raised by Express itself (malformed JSON, oversized body) keep
 * their own status.
 */

import type { Request, Response, NextFunction } from 'express';
import {
  EncodingError,
  InvalidArgumentError,
  NotFoundError,
  RecipeFinderError,
  RetrievalError,
} from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('api');

export interface ErrorBody {
  error: string;
  code: string;
  retryable: boolean;
}

function httpStatusOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

export function statusFor(err: unknown): number {
  if (err instanceof InvalidArgumentError) return 400;
  if (err instanceof NotFoundError) return 404;
  if (err instanceof RetrievalError) {
    return err.code === 'RETRIEVAL_TIMEOUT' ? 504 : 503;
  }
  if (err instanceof EncodingError) return 503;
  if (err instanceof RecipeFinderError) return 500;
  const status = httpStatusOf(err);
  return status !== undefined && status >= 400 && status < 600 ? status : 500;
}

export function errorBody(err: unknown): ErrorBody {
  if (err instanceof RecipeFinderError) {
    return { error: err.message, code: err.code, retryable: err.retryable };
  }
  const message = err instanceof Error ? err.message : String(err);
  const status = httpStatusOf(err);
  if (status === 400) {
    return { error: message, code: 'INVALID_REQUEST', retryable: false };
  }
  return { error: message, code: 'INTERNAL_ERROR', retryable: false };
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  const status = statusFor(err);
  if (status >= 500) {
    log.error(err instanceof RecipeFinderError ? err.toDetailedString() : String(err));
  } else {
    log.debug(`Request rejected (${status})`, { error: err instanceof Error ? err.message : String(err) });
  }
  res.status(status).json(errorBody(err));
}
