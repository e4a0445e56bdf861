/**
 * OAuth2 client-credentials token provider.
 *
 * Caches the bearer token and refreshes it a safety margin before expiry.
 * Concurrent callers that find the cache stale share a single exchange.
 */

import { logger } from '../../lib/logger.js';
import { ApiError } from './errors.js';
import { raceAbort } from './abort.js';
import { classifyResponse } from './transport.js';
import type { SlidingWindowRateLimiter } from './rate-limiter.js';
import { TokenResponseSchema, type Token } from './types.js';

/**
 * Token provider configuration.
 */
export interface TokenProviderConfig {
  clientId: string;
  clientSecret: string;
  /** Token endpoint, e.g. https://api.helpdesk.example.com/oauth/token */
  tokenUrl: string;
  /** Refresh this many seconds before the token expires */
  safetyMarginSeconds: number;
  /** Timeout for the exchange request in milliseconds */
  timeoutMs: number;
  /** Optional limiter for the token endpoint's own rate limit */
  exchangeLimiter?: SlidingWindowRateLimiter;
}

/**
 * True once the token must no longer be sent.
 */
export function isTokenExpired(token: Token, now: number): boolean {
  return now >= token.issuedAt + token.expiresIn * 1000;
}

/**
 * Epoch milliseconds from which the provider replaces the token.
 */
export function refreshDeadline(token: Token, safetyMarginSeconds: number): number {
  return token.issuedAt + (token.expiresIn - safetyMarginSeconds) * 1000;
}

export class TokenProvider {
  private readonly config: TokenProviderConfig;
  private token: Token | null = null;
  private inFlight: Promise<Token> | null = null;
  private exchanges = 0;

  constructor(config: TokenProviderConfig) {
    this.config = config;
  }

  /**
   * Returns a token that is valid now, exchanging credentials when the cached
   * one is missing or inside the safety margin.
   *
   * Cancelling `signal` only detaches this caller; a shared exchange keeps
   * running for the others.
   *
   * @throws ApiError (Authentication) when the exchange fails
   */
  async getToken(signal?: AbortSignal): Promise<Token> {
    const cached = this.token;
    if (cached && Date.now() < refreshDeadline(cached, this.config.safetyMarginSeconds)) {
      return cached;
    }

    if (!this.inFlight) {
      logger.debug('Token missing or near expiry, starting exchange', {
        hadToken: cached !== null,
      });
      this.inFlight = this.exchange().finally(() => {
        this.inFlight = null;
      });
    }

    return raceAbort(this.inFlight, signal);
  }

  /**
   * Drops the cached token. When `accessToken` is given, the cache is only
   * cleared if it still holds that token.
   */
  invalidate(accessToken?: string): void {
    if (!this.token) {
      return;
    }
    if (accessToken !== undefined && this.token.accessToken !== accessToken) {
      return;
    }
    logger.info('Cached access token invalidated');
    this.token = null;
  }

  getCachedToken(): Token | null {
    return this.token;
  }

  /**
   * Number of completed credential exchanges.
   */
  getExchangeCount(): number {
    return this.exchanges;
  }

  private async exchange(): Promise<Token> {
    if (this.config.exchangeLimiter) {
      await this.config.exchangeLimiter.admit();
    }

    const form = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: this.config.clientId,
      client_secret: this.config.clientSecret,
    });

    let response: Response;
    let rawBody: string;
    try {
      response = await fetch(this.config.tokenUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body: form.toString(),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
      rawBody = await response.text();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Token exchange request failed', { error: message });
      throw new ApiError({
        kind: 'Authentication',
        code: 'TOKEN_NETWORK_ERROR',
        message: `Token exchange failed: ${message}`,
        cause: error,
      });
    }

    if (!response.ok) {
      const upstream = classifyResponse(
        response.status,
        response.statusText,
        response.headers,
        rawBody
      );
      logger.error('Token exchange rejected', {
        status: response.status,
        code: upstream.code,
        requestId: upstream.requestId,
      });
      throw new ApiError({
        kind: 'Authentication',
        code: 'TOKEN_EXCHANGE_FAILED',
        status: response.status,
        message: `Token exchange failed: ${upstream.message}`,
        requestId: upstream.requestId,
        retryAfterSeconds: upstream.retryAfterSeconds,
        cause: upstream,
      });
    }

    let payload: unknown;
    try {
      payload = JSON.parse(rawBody);
    } catch {
      payload = undefined;
    }

    const parsed = TokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      logger.error('Token exchange returned an invalid body', {
        status: response.status,
        issues: parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
      });
      throw new ApiError({
        kind: 'Authentication',
        code: 'TOKEN_RESPONSE_INVALID',
        status: response.status,
        message: 'Token exchange returned an invalid response',
      });
    }

    const token: Token = {
      accessToken: parsed.data.access_token,
      tokenType: parsed.data.token_type,
      issuedAt: Date.now(),
      expiresIn: parsed.data.expires_in,
    };

    this.token = token;
    this.exchanges++;
    logger.info('Access token acquired', {
      expiresIn: token.expiresIn,
      refreshInSeconds: Math.max(0, token.expiresIn - this.config.safetyMarginSeconds),
    });

    return token;
  }
}
