/**
 * Helpdesk REST API client.
 *
 * Uses native fetch (Node 18+) with OAuth2 client-credentials bearer tokens.
 * All logging goes to stderr via the logger module.
 *
 * Includes resilience features:
 * - Sliding window rate limiter (600 requests per rolling minute)
 * - Request queue (max 3 concurrent requests)
 * - Retry with exponential backoff (on 429, 5xx, network errors)
 * - One-shot token refresh on 401
 * - Circuit breaker (5 failures opens, 30s timeout)
 */

import { z } from 'zod';
import { logger } from '../../lib/logger.js';
import { SlidingWindowRateLimiter, createRateLimiter } from './rate-limiter.js';
import { RequestQueue, createRequestQueue } from './request-queue.js';
import { withRetry, type RetryConfig } from './retry.js';
import { CircuitBreaker, createCircuitBreaker } from './circuit-breaker.js';
import { HttpTransport } from './transport.js';
import { TokenProvider } from './token-provider.js';
import { ResourceClient, parsePayload } from './resource.js';
import {
  ResourceRecordSchema,
  type HttpResponse,
  type RequestDescriptor,
  type ResourceRecord,
  type Schema,
  type Token,
} from './types.js';

const clientConfigSchema = z.object({
  clientId: z.string().min(1, 'clientId is required'),
  clientSecret: z.string().min(1, 'clientSecret is required'),
  baseUrl: z
    .string()
    .url('baseUrl must be a valid URL')
    .transform((url) => url.replace(/\/+$/, '')),
  tokenUrl: z.string().url('tokenUrl must be a valid URL').optional(),
  maxRetries: z.number().int().positive().default(3),
  baseDelaySeconds: z.number().nonnegative().default(1),
  maxDelaySeconds: z.number().nonnegative().default(300),
  jitterFactor: z.number().min(0).max(1).default(0.2),
  maxConcurrency: z.number().int().positive().default(3),
  rateLimitPerMinute: z.number().int().positive().default(600),
  tokenSafetyMarginSeconds: z.number().nonnegative().default(30),
  tokenRateLimitPerMinute: z.number().int().positive().optional(),
  timeoutMs: z.number().int().positive().default(30_000),
  circuitBreakerEnabled: z.boolean().default(true),
});

/**
 * Helpdesk API client configuration.
 */
export type HelpdeskClientConfig = z.input<typeof clientConfigSchema>;

type ResolvedConfig = z.output<typeof clientConfigSchema>;

/**
 * Counters for diagnostics.
 */
export interface ClientStats {
  /** Logical calls started */
  requests: number;
  /** Backoff retries across all calls */
  retries: number;
  /** Completed token exchanges */
  tokenRefreshes: number;
  /** HTTP attempts currently holding a concurrency slot */
  inFlight: number;
  /** Attempts waiting for a concurrency slot */
  queued: number;
}

export interface RequestOptions<T> {
  signal?: AbortSignal;
  /** Validates the response body; a mismatch raises INVALID_RESPONSE */
  schema?: Schema<T>;
}

const TOKEN_EXCHANGE_CODES: ReadonlySet<string> = new Set([
  'TOKEN_EXCHANGE_FAILED',
  'TOKEN_NETWORK_ERROR',
  'TOKEN_RESPONSE_INVALID',
]);

function parseConfig(config: HelpdeskClientConfig): ResolvedConfig {
  const result = clientConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new Error(`Invalid helpdesk client configuration:\n  - ${issues.join('\n  - ')}`);
  }
  return result.data;
}

function freezeDescriptor(descriptor: RequestDescriptor): RequestDescriptor {
  return Object.freeze({
    ...descriptor,
    query: descriptor.query ? Object.freeze({ ...descriptor.query }) : undefined,
  });
}

/**
 * Helpdesk REST API client.
 *
 * Every request goes through the resilience stack:
 * circuit breaker -> retry -> rate limiter -> queue -> token -> fetch
 *
 * Retries re-enter the rate limiter and the queue, so they count against
 * the window and do not hold a concurrency slot while backing off.
 */
export class HelpdeskClient {
  readonly baseUrl: string;

  private readonly rateLimiter: SlidingWindowRateLimiter;
  private readonly queue: RequestQueue;
  private readonly circuitBreaker: CircuitBreaker | null;
  private readonly tokenProvider: TokenProvider;
  private readonly transport: HttpTransport;
  private readonly retryConfig: RetryConfig;

  private requests = 0;
  private retries = 0;

  /**
   * Creates a new helpdesk API client.
   *
   * @throws Error when the configuration is invalid
   */
  constructor(config: HelpdeskClientConfig) {
    const cfg = parseConfig(config);
    this.baseUrl = cfg.baseUrl;

    this.rateLimiter = createRateLimiter({ limit: cfg.rateLimitPerMinute, name: 'api' });
    this.queue = createRequestQueue(cfg.maxConcurrency);
    this.circuitBreaker = cfg.circuitBreakerEnabled ? createCircuitBreaker() : null;
    this.retryConfig = {
      maxAttempts: cfg.maxRetries,
      baseDelayMs: cfg.baseDelaySeconds * 1000,
      maxDelayMs: cfg.maxDelaySeconds * 1000,
      jitterFactor: cfg.jitterFactor,
    };

    this.tokenProvider = new TokenProvider({
      clientId: cfg.clientId,
      clientSecret: cfg.clientSecret,
      tokenUrl: cfg.tokenUrl ?? `${cfg.baseUrl}/oauth/token`,
      safetyMarginSeconds: cfg.tokenSafetyMarginSeconds,
      timeoutMs: cfg.timeoutMs,
      exchangeLimiter:
        cfg.tokenRateLimitPerMinute === undefined
          ? undefined
          : createRateLimiter({ limit: cfg.tokenRateLimitPerMinute, name: 'token' }),
    });

    this.transport = new HttpTransport({
      baseUrl: cfg.baseUrl,
      timeoutMs: cfg.timeoutMs,
      onHeaders: (headers) => this.rateLimiter.recalibrate(headers),
    });
  }

  /**
   * Runs one logical call through the full pipeline.
   *
   * @returns The parsed JSON body, validated when a schema is given
   * @throws ApiError on failure, RequestCancelledError when `signal` aborts
   */
  request(descriptor: RequestDescriptor, options?: { signal?: AbortSignal }): Promise<unknown>;
  request<T>(
    descriptor: RequestDescriptor,
    options: { signal?: AbortSignal; schema: Schema<T> }
  ): Promise<T>;
  async request<T>(
    descriptor: RequestDescriptor,
    options: RequestOptions<T> = {}
  ): Promise<unknown> {
    const response = await this.execute(freezeDescriptor(descriptor), options.signal);
    if (options.schema) {
      return parsePayload(options.schema, response.body, descriptor.path);
    }
    return response.body;
  }

  /**
   * Operations on one resource collection, e.g. `client.resource('Tickets')`.
   */
  resource(name: string): ResourceClient<ResourceRecord>;
  resource<T>(name: string, schema: Schema<T>): ResourceClient<T>;
  resource<T>(
    name: string,
    schema?: Schema<T>
  ): ResourceClient<T> | ResourceClient<ResourceRecord> {
    if (schema) {
      return new ResourceClient(this, name, schema);
    }
    return new ResourceClient(this, name, ResourceRecordSchema);
  }

  getStats(): ClientStats {
    return {
      requests: this.requests,
      retries: this.retries,
      tokenRefreshes: this.tokenProvider.getExchangeCount(),
      inFlight: this.queue.getActiveCount(),
      queued: this.queue.getQueueDepth(),
    };
  }

  private async execute(
    descriptor: RequestDescriptor,
    signal?: AbortSignal
  ): Promise<HttpResponse> {
    this.requests++;
    logger.debug('Request started', { method: descriptor.method, path: descriptor.path });

    // Token used by the latest attempt, so a 401 invalidates exactly that one.
    let lastToken: Token | null = null;

    const run = () =>
      withRetry(
        async () => {
          await this.rateLimiter.admit(signal);
          return this.queue.enqueue(async () => {
            const token = await this.tokenProvider.getToken(signal);
            lastToken = token;
            return this.transport.send(descriptor, token, signal);
          }, signal);
        },
        this.retryConfig,
        {
          signal,
          onAuthenticationError: async (error) => {
            // A failed credential exchange is final; only a rejected bearer token is refreshed.
            if (TOKEN_EXCHANGE_CODES.has(error.code)) {
              throw error;
            }
            this.tokenProvider.invalidate(lastToken?.accessToken);
          },
          onRetry: () => {
            this.retries++;
          },
        }
      );

    if (this.circuitBreaker) {
      return this.circuitBreaker.execute(run);
    }
    return run();
  }
}
