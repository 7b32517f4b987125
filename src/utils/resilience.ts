/**
 * Time limits and retries for calls to external collaborators.
 *
 * Provides:
 * - `withTimeout`: fail fast when a call exceeds its budget
 * - `withRetry`: exponential backoff, used by callers of the pipeline
 *   (ingestion, CLI). The pipeline itself never retries.
 */

import { createLogger } from './logger.js';
import { errorMessage, isRetryable } from './errors.js';

const log = createLogger('resilience');

/** Retry options */
export interface RetryOptions {
  /** Maximum number of retries. Default: 3 */
  maxRetries?: number;
  /** Initial delay in ms. Default: 500 */
  initialDelayMs?: number;
  /** Maximum delay in ms. Default: 5000 */
  maxDelayMs?: number;
  /** Backoff multiplier. Default: 2 */
  backoffFactor?: number;
  /** Errors to retry on. Default: errors flagged retryable */
  retryOn?: (error: unknown) => boolean;
  /** Injected for tests. */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Calculate exponential backoff delay.
 */
export function calculateBackoff(
  attempt: number,
  initialDelayMs: number,
  maxDelayMs: number,
  backoffFactor: number,
): number {
  const delay = initialDelayMs * Math.pow(backoffFactor, attempt);
  return Math.min(delay, maxDelayMs);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute a function with retry logic.
 *
 * Rethrows the last error unchanged once retries are exhausted or the
 * error is not retryable.
 */
export async function withRetry<T>(
  operation: string,
  fn: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxRetries = 3,
    initialDelayMs = 500,
    maxDelayMs = 5000,
    backoffFactor = 2,
    retryOn = isRetryable,
    sleep: wait = sleep,
  } = options;

  for (let attempt = 0; ; attempt++) {
    if (attempt > 0) {
      const delay = calculateBackoff(attempt - 1, initialDelayMs, maxDelayMs, backoffFactor);
      log.info(`Retrying ${operation}`, { attempt, delay, maxRetries });
      await wait(delay);
    }

    try {
      return await fn();
    } catch (error) {
      const exhausted = attempt >= maxRetries;
      if (exhausted || !retryOn(error)) {
        log.warn(`${operation} failed`, { attempt, error: errorMessage(error) });
        throw error;
      }
      log.debug(`${operation} attempt failed`, { attempt, error: errorMessage(error) });
    }
  }
}

/**
 * Race a promise against a timer.
 *
 * On expiry the returned promise rejects with the error built by
 * `onTimeout`; the timer is always cleared so nothing keeps the
 * process alive. A non-positive or infinite budget disables the limit.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number | undefined,
  onTimeout: () => Error,
): Promise<T> {
  if (timeoutMs === undefined || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return promise;
  }

  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });

  try {
    return await Promise.race([promise, expiry]);
  } finally {
    clearTimeout(timer);
  }
}
