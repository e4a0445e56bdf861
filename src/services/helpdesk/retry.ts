/**
 * Retry Logic with Exponential Backoff for the helpdesk API.
 *
 * Handles transient failures (rate limits, network errors, 5xx) with
 * exponential backoff and jitter. A 401 gets one immediate re-attempt after
 * the token is refreshed; every other failure surfaces at once.
 */

import { logger } from '../../lib/logger.js';
import { ApiError } from './errors.js';
import { sleep, throwIfAborted } from './abort.js';

/**
 * Configuration for retry behavior.
 */
export interface RetryConfig {
  /** Maximum number of attempts (including first try) */
  maxAttempts: number;
  /** Base delay in milliseconds */
  baseDelayMs: number;
  /** Maximum delay in milliseconds */
  maxDelayMs: number;
  /** Jitter factor (0.2 = +-20%) */
  jitterFactor: number;
}

const DEFAULT_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 300_000,
  jitterFactor: 0.2,
};

/**
 * Details passed to `onRetry` before each backoff sleep.
 */
export interface RetryEvent {
  /** Zero-based index of the attempt that failed */
  attempt: number;
  delayMs: number;
  error: ApiError;
}

export interface RetryOptions {
  /** Aborts backoff sleeps and prevents further attempts */
  signal?: AbortSignal;
  /** Forces a token refresh; enables the one-shot 401 recovery */
  onAuthenticationError?: (error: ApiError) => Promise<void>;
  onRetry?: (event: RetryEvent) => void;
  /** Random source for jitter, in [0, 1) */
  random?: () => number;
}

/**
 * Calculates delay for a given attempt with exponential backoff and jitter.
 *
 * min(maxDelay, baseDelay * 2^attempt), then +- jitterFactor.
 *
 * @param attempt - Zero-based attempt number
 */
export function calculateDelay(
  attempt: number,
  config: RetryConfig,
  random: () => number = Math.random
): number {
  const exponentialDelay = config.baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs);
  const jitter = cappedDelay * config.jitterFactor * (random() * 2 - 1);

  return Math.max(0, Math.round(cappedDelay + jitter));
}

/**
 * Delay before the attempt following `error`. A Retry-After hint on a
 * rate-limit error overrides the computed backoff.
 */
function delayFor(
  error: ApiError,
  attempt: number,
  config: RetryConfig,
  random: () => number
): number {
  if (error.kind === 'RateLimit' && error.retryAfterSeconds !== undefined) {
    return Math.round(error.retryAfterSeconds * 1000);
  }
  return calculateDelay(attempt, config, random);
}

/**
 * Executes `fn` with retry logic.
 *
 * - RateLimit, Network and ServerFault errors are retried until
 *   `maxAttempts` attempts have been made; the last error is then thrown
 *   tagged with `retriesExhausted`.
 * - Authentication errors trigger `onAuthenticationError` once per call and
 *   an immediate re-attempt that does not count against `maxAttempts`.
 * - Everything else (including RequestCancelledError and foreign errors)
 *   is thrown unchanged.
 *
 * @param fn - Performs one attempt; receives the zero-based attempt number
 * @param config - Partial retry configuration (merged with defaults)
 * @returns Promise with function result
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config?: Partial<RetryConfig>,
  options: RetryOptions = {}
): Promise<T> {
  const cfg = { ...DEFAULT_CONFIG, ...config };
  const random = options.random ?? Math.random;
  let authRecoveryUsed = false;
  let attempt = 0;

  for (;;) {
    throwIfAborted(options.signal);

    try {
      return await fn(attempt);
    } catch (error) {
      if (!(error instanceof ApiError)) {
        throw error;
      }

      if (
        error.kind === 'Authentication' &&
        options.onAuthenticationError &&
        !authRecoveryUsed
      ) {
        authRecoveryUsed = true;
        logger.warn('Authentication rejected, refreshing token and re-attempting', {
          attempt: attempt + 1,
          code: error.code,
        });
        await options.onAuthenticationError(error);
        continue;
      }

      if (!error.isRetryable) {
        throw error;
      }

      if (attempt >= cfg.maxAttempts - 1) {
        logger.warn('Retries exhausted', {
          attempts: attempt + 1,
          kind: error.kind,
          code: error.code,
        });
        throw error.withRetriesExhausted(attempt + 1);
      }

      const delay = delayFor(error, attempt, cfg, random);
      logger.warn('Retrying request', {
        attempt: attempt + 1,
        maxAttempts: cfg.maxAttempts,
        delayMs: delay,
        kind: error.kind,
        retryAfterSeconds: error.retryAfterSeconds,
      });
      options.onRetry?.({ attempt, delayMs: delay, error });

      await sleep(delay, options.signal);
      attempt++;
    }
  }
}

export { DEFAULT_CONFIG as RETRY_DEFAULT_CONFIG };
