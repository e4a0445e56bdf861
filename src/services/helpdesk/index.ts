/**
 * Helpdesk API client module.
 *
 * Provides a pre-configured API client instance using environment credentials.
 *
 * Usage:
 *   import { createHelpdeskClient } from './services/helpdesk/index.js';
 *   const client = createHelpdeskClient();
 *   const open = await client.resource('Tickets').list({ filter: "status eq 'Open'" });
 */

import { getEnv } from '../../lib/env.js';
import { HelpdeskClient } from './client.js';

// Re-export all types
export * from './types.js';

// Re-export client classes and errors
export { HelpdeskClient } from './client.js';
export type { HelpdeskClientConfig, ClientStats, RequestOptions } from './client.js';
export { ResourceClient, parsePayload } from './resource.js';
export type { CallOptions, ListAllOptions } from './resource.js';
export {
  ApiError,
  RequestCancelledError,
  isApiError,
  DEFAULT_ERROR_CODES,
  type ApiErrorKind,
  type ApiErrorOptions,
} from './errors.js';
export { buildFilter, toListQuery } from './filters.js';

// Re-export resilience utilities (for advanced usage or testing)
export {
  SlidingWindowRateLimiter,
  createRateLimiter,
  type RateLimiterConfig,
  type ServerBudget,
} from './rate-limiter.js';
export { RequestQueue, createRequestQueue } from './request-queue.js';
export { withRetry, calculateDelay, type RetryConfig, type RetryEvent } from './retry.js';
export {
  CircuitBreaker,
  createCircuitBreaker,
  type CircuitBreakerConfig,
} from './circuit-breaker.js';
export { TokenProvider, isTokenExpired, refreshDeadline } from './token-provider.js';
export type { TokenProviderConfig } from './token-provider.js';
export { HttpTransport, classifyResponse, kindForStatus, parseRetryAfter } from './transport.js';

/**
 * Memoized client instance.
 * Created once on first call to createHelpdeskClient().
 */
let clientInstance: HelpdeskClient | null = null;

/**
 * Creates or returns the memoized helpdesk API client.
 *
 * Uses credentials and tuning from environment variables (via getEnv()).
 *
 * @throws Error if environment variables are not set
 */
export function createHelpdeskClient(): HelpdeskClient {
  if (!clientInstance) {
    const env = getEnv();

    clientInstance = new HelpdeskClient({
      clientId: env.HELPDESK_CLIENT_ID,
      clientSecret: env.HELPDESK_CLIENT_SECRET,
      baseUrl: env.HELPDESK_BASE_URL,
      maxRetries: env.HELPDESK_MAX_RETRIES,
      baseDelaySeconds: env.HELPDESK_BASE_DELAY_SECONDS,
      maxConcurrency: env.HELPDESK_MAX_CONCURRENCY,
      rateLimitPerMinute: env.HELPDESK_RATE_LIMIT_PER_MINUTE,
      tokenSafetyMarginSeconds: env.HELPDESK_TOKEN_SAFETY_MARGIN_SECONDS,
      timeoutMs: env.HELPDESK_TIMEOUT_MS,
    });
  }

  return clientInstance;
}

/**
 * Resets the memoized client instance.
 * Primarily used for testing purposes.
 */
export function resetHelpdeskClient(): void {
  clientInstance = null;
}
