/**
 * Centralized error handling utilities for MCP tools.
 *
 * Provides LLM-readable error messages that are actionable and helpful.
 * Separates user-facing messages from internal debugging details.
 */

import { logger } from './logger.js';

/**
 * Error class for MCP tool errors.
 *
 * Provides both user-facing messages (for LLM consumption) and internal
 * details (for debugging/logging).
 */
export class McpToolError extends Error {
  /** LLM-friendly error message (returned to the user) */
  public readonly userMessage: string;

  /** Internal details for debugging (logged, not returned) */
  public readonly internalDetails?: string;

  /** Whether the LLM should retry the operation */
  public readonly isRetryable: boolean;

  /** Suggested action the LLM can take */
  public readonly suggestedAction?: string;

  /** Machine-readable error code */
  public readonly errorCode?: string;

  constructor(options: {
    userMessage: string;
    internalDetails?: string;
    isRetryable?: boolean;
    suggestedAction?: string;
    errorCode?: string;
  }) {
    super(options.userMessage);
    this.name = 'McpToolError';
    this.userMessage = options.userMessage;
    this.internalDetails = options.internalDetails;
    this.isRetryable = options.isRetryable ?? false;
    this.suggestedAction = options.suggestedAction;
    this.errorCode = options.errorCode;
  }
}

/**
 * Creates a rate limit error with retry guidance.
 *
 * @param retryAfterSeconds - Optional seconds until retry is allowed
 */
export function createRateLimitError(retryAfterSeconds?: number): McpToolError {
  const retryMessage = retryAfterSeconds
    ? `Try again in ${retryAfterSeconds} seconds.`
    : 'Try again in a few seconds.';

  return new McpToolError({
    userMessage: `Rate limit exceeded. ${retryMessage}`,
    isRetryable: true,
    suggestedAction: 'Wait and retry the request.',
    errorCode: 'RATE_LIMITED',
  });
}

/**
 * Creates a service unavailable error (5xx or open circuit).
 */
export function createServiceUnavailableError(retryAfterSeconds?: number): McpToolError {
  const retryMessage = retryAfterSeconds
    ? `Try again in ${retryAfterSeconds} seconds.`
    : 'Try again later.';

  return new McpToolError({
    userMessage: `The helpdesk service is temporarily unavailable. ${retryMessage}`,
    isRetryable: true,
    suggestedAction: 'Wait a moment and retry the request.',
    errorCode: 'SERVICE_UNAVAILABLE',
  });
}

/**
 * Creates a network error (timeout or connection failure).
 */
export function createNetworkError(internalDetails?: string): McpToolError {
  return new McpToolError({
    userMessage: 'Could not reach the helpdesk API.',
    internalDetails,
    isRetryable: true,
    suggestedAction: 'Check connectivity and retry the request.',
    errorCode: 'NETWORK_ERROR',
  });
}

/**
 * Creates an authentication error.
 */
export function createAuthenticationError(): McpToolError {
  return new McpToolError({
    userMessage: 'Authentication failed. The API credentials may be invalid or expired.',
    isRetryable: false,
    suggestedAction: 'Check that HELPDESK_CLIENT_ID and HELPDESK_CLIENT_SECRET are correct.',
    errorCode: 'AUTH_ERROR',
  });
}

/**
 * Creates an authorization error (authenticated, but not allowed).
 */
export function createAuthorizationError(): McpToolError {
  return new McpToolError({
    userMessage: 'The API client is not allowed to perform this operation.',
    isRetryable: false,
    suggestedAction: 'Ask an administrator to grant the required permission.',
    errorCode: 'FORBIDDEN',
  });
}

/**
 * Creates a resource not found error.
 *
 * @param resource - Description of the resource that was not found
 */
export function createNotFoundError(resource: string): McpToolError {
  return new McpToolError({
    userMessage: `The ${resource} was not found.`,
    isRetryable: false,
    suggestedAction: 'Verify the ID or search criteria is correct.',
    errorCode: 'NOT_FOUND',
  });
}

/**
 * Creates a validation error reported by the API (400/422).
 *
 * @param message - Message from the error envelope
 * @param details - Field-level details from the error envelope
 */
export function createApiValidationError(
  message: string,
  details?: Readonly<Record<string, unknown>>
): McpToolError {
  const fields = details && Object.keys(details).length > 0
    ? ` (${Object.entries(details)
        .map(([key, value]) => `${key}: ${typeof value === 'string' ? value : JSON.stringify(value)}`)
        .join('; ')})`
    : '';

  return new McpToolError({
    userMessage: `The helpdesk API rejected the request: ${message}${fields}`,
    isRetryable: false,
    suggestedAction: 'Correct the request parameters and try again.',
    errorCode: 'VALIDATION_ERROR',
  });
}

/**
 * Creates an error for a request that was cancelled before it completed.
 */
export function createCancelledError(): McpToolError {
  return new McpToolError({
    userMessage: 'The request was cancelled before it completed.',
    isRetryable: true,
    suggestedAction: 'Retry the request if the result is still needed.',
    errorCode: 'CANCELLED',
  });
}

/**
 * Creates an error for unexpected/unknown errors.
 *
 * Logs internal details but returns a generic user message.
 */
export function createUnexpectedError(error: unknown): McpToolError {
  const internalDetails = error instanceof Error ? error.message : String(error);

  logger.error('Unexpected error occurred', { internalDetails });

  return new McpToolError({
    userMessage: 'An unexpected error occurred. Please try again.',
    internalDetails,
    isRetryable: false,
    suggestedAction: 'If the problem persists, contact support.',
    errorCode: 'UNEXPECTED_ERROR',
  });
}

/**
 * Formats an McpToolError into an MCP-compatible error response.
 *
 * @returns MCP tool result with isError: true
 */
export function formatErrorForMcp(
  error: McpToolError
): { content: { type: 'text'; text: string }[]; isError: true } {
  let text = error.userMessage;

  if (error.suggestedAction) {
    text += `\n\nSuggestion: ${error.suggestedAction}`;
  }

  return {
    content: [{ type: 'text' as const, text }],
    isError: true,
  };
}
