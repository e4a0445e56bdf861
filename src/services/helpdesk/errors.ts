/**
 * Error types for the helpdesk REST API.
 *
 * Every failed call surfaces as a single ApiError class tagged by `kind`,
 * except caller cancellation, which is a RequestCancelledError.
 */

/**
 * Classification of a failed call.
 */
export type ApiErrorKind =
  | 'Authentication'
  | 'Authorization'
  | 'Validation'
  | 'RateLimit'
  | 'NotFound'
  | 'Network'
  | 'ServerFault'
  | 'Unknown';

const RETRYABLE_KINDS: ReadonlySet<ApiErrorKind> = new Set<ApiErrorKind>([
  'RateLimit',
  'Network',
  'ServerFault',
]);

/**
 * Machine code used when the server did not send one.
 */
export const DEFAULT_ERROR_CODES: Record<ApiErrorKind, string> = {
  Authentication: 'UNAUTHENTICATED',
  Authorization: 'FORBIDDEN',
  Validation: 'VALIDATION_FAILED',
  RateLimit: 'RATE_LIMITED',
  NotFound: 'NOT_FOUND',
  Network: 'NETWORK_ERROR',
  ServerFault: 'SERVER_ERROR',
  Unknown: 'UNKNOWN_ERROR',
};

export interface ApiErrorOptions {
  kind: ApiErrorKind;
  message: string;
  /** Machine code; defaults per kind */
  code?: string;
  /** HTTP status (0 when no response was received) */
  status?: number;
  /** Field-level details from the error envelope */
  details?: Record<string, unknown>;
  /** Correlation id from the error envelope or X-Request-Id */
  requestId?: string;
  /** Server hint for the next attempt, in seconds */
  retryAfterSeconds?: number;
  retriesExhausted?: boolean;
  attempts?: number;
  cause?: unknown;
}

/**
 * Error thrown for every failed helpdesk API call.
 */
export class ApiError extends Error {
  public readonly kind: ApiErrorKind;
  public readonly code: string;
  public readonly status: number;
  public readonly details?: Readonly<Record<string, unknown>>;
  public readonly requestId?: string;
  public readonly retryAfterSeconds?: number;
  public readonly isRetryable: boolean;
  /** True when the call failed after using every allowed attempt */
  public readonly retriesExhausted: boolean;
  public readonly attempts: number;

  constructor(options: ApiErrorOptions) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ApiError';
    this.kind = options.kind;
    this.code = options.code ?? DEFAULT_ERROR_CODES[options.kind];
    this.status = options.status ?? 0;
    this.details = options.details ? Object.freeze({ ...options.details }) : undefined;
    this.requestId = options.requestId;
    this.retryAfterSeconds = options.retryAfterSeconds;
    this.isRetryable = RETRYABLE_KINDS.has(options.kind);
    this.retriesExhausted = options.retriesExhausted ?? false;
    this.attempts = options.attempts ?? 1;
  }

  /**
   * Returns a copy tagged as the final failure after `attempts` tries.
   */
  withRetriesExhausted(attempts: number): ApiError {
    return new ApiError({
      kind: this.kind,
      message: this.message,
      code: this.code,
      status: this.status,
      details: this.details,
      requestId: this.requestId,
      retryAfterSeconds: this.retryAfterSeconds,
      retriesExhausted: true,
      attempts,
      cause: this.cause,
    });
  }

  toJSON(): Record<string, unknown> {
    return {
      kind: this.kind,
      code: this.code,
      message: this.message,
      status: this.status,
      details: this.details,
      requestId: this.requestId,
      retryAfterSeconds: this.retryAfterSeconds,
      retriesExhausted: this.retriesExhausted,
      attempts: this.attempts,
    };
  }
}

/**
 * Thrown when the caller's AbortSignal fires while a call is waiting or in flight.
 */
export class RequestCancelledError extends Error {
  constructor(message = 'Request was cancelled', cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'RequestCancelledError';
  }
}

export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}
