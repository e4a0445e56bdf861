/**
 * Unit tests for the OAuth2 client-credentials token provider.
 *
 * Uses vitest-fetch-mock for the token endpoint.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import createFetchMock from 'vitest-fetch-mock';
import {
  TokenProvider,
  isTokenExpired,
  refreshDeadline,
  type TokenProviderConfig,
} from './token-provider.js';
import { createRateLimiter } from './rate-limiter.js';
import { ApiError, RequestCancelledError } from './errors.js';

const fetchMocker = createFetchMock(vi);

const T0 = new Date('2026-03-02T09:00:00Z').getTime();

const CONFIG: TokenProviderConfig = {
  clientId: 'test-client',
  clientSecret: 'test-secret',
  tokenUrl: 'https://api.helpdesk.test/v1/oauth/token',
  safetyMarginSeconds: 30,
  timeoutMs: 30_000,
};

function tokenBody(accessToken: string, expiresIn = 3600): string {
  return JSON.stringify({ access_token: accessToken, token_type: 'Bearer', expires_in: expiresIn });
}

describe('TokenProvider', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
    fetchMocker.enableMocks();
    fetchMocker.resetMocks();
  });

  afterEach(() => {
    fetchMocker.disableMocks();
    vi.useRealTimers();
  });

  describe('token helpers', () => {
    const token = { accessToken: 'abc', tokenType: 'Bearer', issuedAt: T0, expiresIn: 3600 };

    it('computes the refresh deadline from the safety margin', () => {
      expect(refreshDeadline(token, 30)).toBe(T0 + 3_570_000);
    });

    it('treats the token as expired from issuedAt + expiresIn', () => {
      expect(isTokenExpired(token, T0 + 3_599_999)).toBe(false);
      expect(isTokenExpired(token, T0 + 3_600_000)).toBe(true);
    });
  });

  describe('exchange', () => {
    it('posts client credentials as a form', async () => {
      fetchMocker.mockResponseOnce(tokenBody('token-1'));
      const provider = new TokenProvider(CONFIG);

      const token = await provider.getToken();

      expect(token).toEqual({
        accessToken: 'token-1',
        tokenType: 'Bearer',
        issuedAt: T0,
        expiresIn: 3600,
      });

      const [input, init] = fetchMocker.mock.calls[0];
      expect(String(input)).toBe('https://api.helpdesk.test/v1/oauth/token');
      expect(init?.method).toBe('POST');
      expect(new Headers(init?.headers).get('content-type')).toBe(
        'application/x-www-form-urlencoded'
      );
      expect(String(init?.body)).toBe(
        'grant_type=client_credentials&client_id=test-client&client_secret=test-secret'
      );
    });

    it('defaults token_type to Bearer and accepts a string expires_in', async () => {
      fetchMocker.mockResponseOnce(JSON.stringify({ access_token: 'token-1', expires_in: '120' }));
      const provider = new TokenProvider(CONFIG);

      const token = await provider.getToken();

      expect(token.tokenType).toBe('Bearer');
      expect(token.expiresIn).toBe(120);
    });
  });

  describe('caching and refresh', () => {
    it('reuses the cached token until the safety margin', async () => {
      fetchMocker.mockResponseOnce(tokenBody('token-1'));
      fetchMocker.mockResponseOnce(tokenBody('token-2'));
      const provider = new TokenProvider(CONFIG);

      await provider.getToken();

      vi.setSystemTime(T0 + 3_569_000);
      expect((await provider.getToken()).accessToken).toBe('token-1');
      expect(fetchMocker.mock.calls).toHaveLength(1);

      vi.setSystemTime(T0 + 3_590_000);
      expect((await provider.getToken()).accessToken).toBe('token-2');
      expect(fetchMocker.mock.calls).toHaveLength(2);
      expect(provider.getExchangeCount()).toBe(2);
    });

    it('returns a token shorter-lived than the margin once, then refreshes', async () => {
      fetchMocker.mockResponseOnce(tokenBody('short-lived', 10));
      fetchMocker.mockResponseOnce(tokenBody('token-2'));
      const provider = new TokenProvider(CONFIG);

      expect((await provider.getToken()).accessToken).toBe('short-lived');
      expect((await provider.getToken()).accessToken).toBe('token-2');
    });

    it('coalesces concurrent refreshes into one exchange', async () => {
      fetchMocker.mockResponseOnce(tokenBody('token-1'));
      const provider = new TokenProvider(CONFIG);

      const tokens = await Promise.all(Array.from({ length: 10 }, () => provider.getToken()));

      expect(fetchMocker.mock.calls).toHaveLength(1);
      expect(new Set(tokens.map((token) => token.accessToken))).toEqual(new Set(['token-1']));
      expect(provider.getExchangeCount()).toBe(1);
    });

    it('coalesces concurrent refreshes of a token past its refresh point', async () => {
      fetchMocker.mockResponseOnce(tokenBody('token-1'));
      fetchMocker.mockResponseOnce(tokenBody('token-2'));
      const provider = new TokenProvider(CONFIG);
      await provider.getToken();

      vi.setSystemTime(T0 + 3_590_000);
      const tokens = await Promise.all(Array.from({ length: 10 }, () => provider.getToken()));

      expect(fetchMocker.mock.calls).toHaveLength(2);
      expect(new Set(tokens.map((token) => token.accessToken))).toEqual(new Set(['token-2']));
      expect(provider.getExchangeCount()).toBe(2);
    });
  });

  describe('failures', () => {
    it('reports a rejected exchange as an Authentication error', async () => {
      fetchMocker.mockResponseOnce(
        JSON.stringify({ error: { code: 'invalid_client', message: 'Client authentication failed' } }),
        { status: 401 }
      );
      const provider = new TokenProvider(CONFIG);

      const error = await provider.getToken().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiError);
      expect(error).toMatchObject({
        kind: 'Authentication',
        code: 'TOKEN_EXCHANGE_FAILED',
        status: 401,
        message: 'Token exchange failed: Client authentication failed',
      });
    });

    it('reports network failures with TOKEN_NETWORK_ERROR', async () => {
      fetchMocker.mockRejectOnce(new Error('connect ECONNREFUSED'));
      const provider = new TokenProvider(CONFIG);

      await expect(provider.getToken()).rejects.toMatchObject({
        kind: 'Authentication',
        code: 'TOKEN_NETWORK_ERROR',
        message: 'Token exchange failed: connect ECONNREFUSED',
      });
    });

    it.each([
      ['a body without access_token', JSON.stringify({ token: 'x', expires_in: 3600 })],
      ['a non-JSON body', 'not json'],
      ['a non-positive lifetime', JSON.stringify({ access_token: 'x', expires_in: 0 })],
    ])('rejects %s with TOKEN_RESPONSE_INVALID', async (_label, body) => {
      fetchMocker.mockResponseOnce(body);
      const provider = new TokenProvider(CONFIG);

      await expect(provider.getToken()).rejects.toMatchObject({
        kind: 'Authentication',
        code: 'TOKEN_RESPONSE_INVALID',
      });
      expect(provider.getCachedToken()).toBeNull();
    });

    it('does not cache a failure', async () => {
      fetchMocker.mockResponseOnce('', { status: 503 });
      fetchMocker.mockResponseOnce(tokenBody('token-1'));
      const provider = new TokenProvider(CONFIG);

      await expect(provider.getToken()).rejects.toMatchObject({ status: 503 });
      expect((await provider.getToken()).accessToken).toBe('token-1');
      expect(fetchMocker.mock.calls).toHaveLength(2);
    });

    it('shares one failed exchange between concurrent callers', async () => {
      fetchMocker.mockResponseOnce('', { status: 500 });
      const provider = new TokenProvider(CONFIG);

      const results = await Promise.allSettled([provider.getToken(), provider.getToken()]);

      expect(results.map((result) => result.status)).toEqual(['rejected', 'rejected']);
      expect(fetchMocker.mock.calls).toHaveLength(1);
    });
  });

  describe('invalidate', () => {
    it('only drops the cache when it still holds the given token', async () => {
      fetchMocker.mockResponseOnce(tokenBody('token-1'));
      const provider = new TokenProvider(CONFIG);
      await provider.getToken();

      provider.invalidate('some-older-token');
      expect(provider.getCachedToken()?.accessToken).toBe('token-1');

      provider.invalidate('token-1');
      expect(provider.getCachedToken()).toBeNull();
    });

    it('forces a new exchange on the next call', async () => {
      fetchMocker.mockResponseOnce(tokenBody('token-1'));
      fetchMocker.mockResponseOnce(tokenBody('token-2'));
      const provider = new TokenProvider(CONFIG);
      await provider.getToken();

      provider.invalidate();

      expect((await provider.getToken()).accessToken).toBe('token-2');
    });
  });

  describe('cancellation', () => {
    it('detaches a cancelled caller without stopping the shared exchange', async () => {
      fetchMocker.mockResponseOnce(
        () => new Promise<string>((resolve) => setTimeout(() => resolve(tokenBody('token-1')), 100))
      );
      const provider = new TokenProvider(CONFIG);
      const controller = new AbortController();

      const cancelled = provider.getToken(controller.signal);
      const assertion = expect(cancelled).rejects.toBeInstanceOf(RequestCancelledError);
      const other = provider.getToken();

      controller.abort();
      await assertion;

      await vi.advanceTimersByTimeAsync(100);
      expect((await other).accessToken).toBe('token-1');
      expect(fetchMocker.mock.calls).toHaveLength(1);
    });
  });

  describe('exchange rate limit', () => {
    it('spaces exchanges through the exchange limiter', async () => {
      fetchMocker.mockResponseOnce(tokenBody('token-1'));
      fetchMocker.mockResponseOnce(tokenBody('token-2'));
      const provider = new TokenProvider({
        ...CONFIG,
        exchangeLimiter: createRateLimiter({ limit: 1, windowMs: 60_000, name: 'token' }),
      });

      await provider.getToken();
      provider.invalidate();

      const next = provider.getToken();
      await vi.advanceTimersByTimeAsync(59_999);
      expect(fetchMocker.mock.calls).toHaveLength(1);

      await vi.advanceTimersByTimeAsync(1);
      expect((await next).accessToken).toBe('token-2');
      expect(fetchMocker.mock.calls).toHaveLength(2);
    });
  });
});
