/**
 * HTTP transport for the helpdesk REST API.
 *
 * Uses native fetch (Node 18+). Sends exactly one HTTP request per call and
 * classifies the outcome: 2xx bodies are returned parsed, everything else is
 * turned into an ApiError at this boundary.
 */

import { logger } from '../../lib/logger.js';
import { ApiError, RequestCancelledError, type ApiErrorKind } from './errors.js';
import {
  ErrorEnvelopeSchema,
  type ErrorEnvelope,
  type HttpResponse,
  type QueryValue,
  type RequestDescriptor,
  type Token,
} from './types.js';

/**
 * HTTP transport configuration.
 */
export interface HttpTransportConfig {
  /** API root, e.g. https://api.helpdesk.example.com/v1 */
  baseUrl: string;
  /** Per-request timeout in milliseconds */
  timeoutMs: number;
  /** Receives the headers of every response, successful or not */
  onHeaders?: (headers: Headers) => void;
}

/**
 * Maps an HTTP status to an error kind.
 */
export function kindForStatus(status: number): ApiErrorKind {
  if (status === 400 || status === 422) return 'Validation';
  if (status === 401) return 'Authentication';
  if (status === 403) return 'Authorization';
  if (status === 404) return 'NotFound';
  if (status === 429) return 'RateLimit';
  if (status >= 500) return 'ServerFault';
  return 'Unknown';
}

/**
 * Parses a Retry-After header (delta-seconds or HTTP-date) into seconds.
 */
export function parseRetryAfter(value: string | null): number | undefined {
  if (value === null || value.trim() === '') {
    return undefined;
  }

  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds);
  }

  const date = Date.parse(value);
  if (!Number.isNaN(date)) {
    return Math.max(0, Math.ceil((date - Date.now()) / 1000));
  }

  return undefined;
}

/**
 * Joins base URL, path and defined query values.
 */
export function buildUrl(
  baseUrl: string,
  path: string,
  query?: Readonly<Record<string, QueryValue>>
): string {
  const url = new URL(`${baseUrl.replace(/\/+$/, '')}${path.startsWith('/') ? path : `/${path}`}`);

  if (query) {
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
  }

  return url.toString();
}

function parseJson(rawBody: string): unknown {
  try {
    return JSON.parse(rawBody);
  } catch {
    return undefined;
  }
}

/**
 * Builds the ApiError for a non-2xx response.
 *
 * A malformed or missing error envelope still yields a typed error from the
 * status alone.
 */
export function classifyResponse(
  status: number,
  statusText: string,
  headers: Headers,
  rawBody: string
): ApiError {
  const kind = kindForStatus(status);

  let envelope: ErrorEnvelope['error'] | undefined;
  if (rawBody) {
    const parsed = ErrorEnvelopeSchema.safeParse(parseJson(rawBody));
    envelope = parsed.success ? parsed.data.error : undefined;
  }

  const fallbackMessage = statusText ? `HTTP ${status} ${statusText}` : `HTTP ${status}`;

  return new ApiError({
    kind,
    status,
    code: envelope?.code,
    message: envelope?.message || fallbackMessage,
    details: envelope?.details,
    requestId: envelope?.requestId ?? headers.get('x-request-id') ?? undefined,
    retryAfterSeconds: parseRetryAfter(headers.get('retry-after')) ?? envelope?.retryAfter,
  });
}

/**
 * Sends single HTTP requests to the helpdesk API.
 */
export class HttpTransport {
  private readonly config: HttpTransportConfig;

  constructor(config: HttpTransportConfig) {
    this.config = config;
  }

  /**
   * Sends one request with the given bearer token.
   *
   * @param descriptor - Method, path, query and body
   * @param token - Token placed in the Authorization header
   * @param signal - Caller cancellation; rejects with RequestCancelledError
   * @returns Status, headers and parsed JSON body
   * @throws ApiError for non-2xx responses, timeouts and network failures
   */
  async send(
    descriptor: RequestDescriptor,
    token: Token,
    signal?: AbortSignal
  ): Promise<HttpResponse> {
    const { method, path, query, body } = descriptor;
    const url = buildUrl(this.config.baseUrl, path, query);

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.timeoutMs);
    const onCallerAbort = () => controller.abort(signal?.reason);

    if (signal?.aborted) {
      clearTimeout(timer);
      throw new RequestCancelledError('Request was cancelled', signal.reason);
    }
    signal?.addEventListener('abort', onCallerAbort, { once: true });

    logger.debug('Helpdesk API request', { method, path, query });
    const startTime = Date.now();

    let response: Response;
    let rawBody: string;
    try {
      const init: RequestInit = {
        method,
        headers: {
          Authorization: `Bearer ${token.accessToken}`,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        signal: controller.signal,
      };
      if (body !== undefined) {
        init.body = JSON.stringify(body);
      }

      response = await fetch(url, init);
      rawBody = await response.text();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);

      if (signal?.aborted) {
        logger.debug('Helpdesk API request cancelled', { method, path });
        throw new RequestCancelledError('Request was cancelled', signal.reason);
      }

      if (timedOut) {
        logger.warn('Helpdesk API request timed out', {
          method,
          path,
          timeoutMs: this.config.timeoutMs,
        });
        throw new ApiError({
          kind: 'Network',
          code: 'TIMEOUT',
          message: `Request timed out after ${this.config.timeoutMs}ms`,
          cause: error,
        });
      }

      logger.warn('Helpdesk API request failed', { method, path, error: message });
      throw new ApiError({
        kind: 'Network',
        code: 'NETWORK_ERROR',
        message: `Request failed: ${message}`,
        cause: error,
      });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onCallerAbort);
    }

    const duration = Date.now() - startTime;
    this.config.onHeaders?.(response.headers);

    if (!response.ok) {
      const apiError = classifyResponse(
        response.status,
        response.statusText,
        response.headers,
        rawBody
      );
      const log = apiError.isRetryable ? logger.warn : logger.error;
      log('Helpdesk API error', {
        method,
        path,
        status: response.status,
        kind: apiError.kind,
        code: apiError.code,
        requestId: apiError.requestId,
        duration,
      });
      throw apiError;
    }

    let parsedBody: unknown;
    if (rawBody) {
      parsedBody = parseJson(rawBody);
      if (parsedBody === undefined) {
        logger.error('Helpdesk API response is not JSON', {
          method,
          path,
          status: response.status,
          rawBody: rawBody.slice(0, 500),
        });
        throw new ApiError({
          kind: 'Unknown',
          code: 'INVALID_RESPONSE',
          status: response.status,
          message: 'Response body is not valid JSON',
        });
      }
    }

    logger.debug('Helpdesk API response', {
      method,
      path,
      status: response.status,
      duration,
    });

    return {
      status: response.status,
      headers: response.headers,
      body: parsedBody,
    };
  }
}
