/**
 * Shared error handler for MCP tools.
 * Converts various error types into LLM-friendly MCP responses.
 */

import { ApiError, RequestCancelledError } from '../../services/helpdesk/index.js';
import {
  createRateLimitError,
  createServiceUnavailableError,
  createNetworkError,
  createAuthenticationError,
  createAuthorizationError,
  createNotFoundError,
  createApiValidationError,
  createCancelledError,
  createUnexpectedError,
  formatErrorForMcp,
  logger,
  type McpToolError,
} from '../../lib/index.js';

function toToolError(error: ApiError, resource: string): McpToolError {
  switch (error.kind) {
    case 'Validation':
      return createApiValidationError(error.message, error.details);
    case 'RateLimit':
      return createRateLimitError(error.retryAfterSeconds);
    case 'ServerFault':
      return createServiceUnavailableError(error.retryAfterSeconds);
    case 'Network':
      return createNetworkError(error.message);
    case 'Authentication':
      return createAuthenticationError();
    case 'Authorization':
      return createAuthorizationError();
    case 'NotFound':
      return createNotFoundError(resource);
    case 'Unknown':
      return createUnexpectedError(error);
  }
}

/**
 * Handles errors from tool execution and returns MCP-compatible error response.
 *
 * @param error - The caught error
 * @param toolName - Name of the tool for logging
 * @param resource - Description used in not-found messages
 * @returns MCP tool result with isError: true
 */
export function handleToolError(
  error: unknown,
  toolName: string,
  resource = 'requested resource'
): { content: { type: 'text'; text: string }[]; isError: true } {
  if (error instanceof ApiError) {
    logger.error(`${toolName} error`, {
      kind: error.kind,
      code: error.code,
      status: error.status,
      requestId: error.requestId,
      attempts: error.attempts,
      retriesExhausted: error.retriesExhausted,
    });
    return formatErrorForMcp(toToolError(error, resource));
  }

  logger.error(`${toolName} error`, {
    error: error instanceof Error ? error.message : String(error),
  });

  if (error instanceof RequestCancelledError) {
    return formatErrorForMcp(createCancelledError());
  }

  return formatErrorForMcp(createUnexpectedError(error));
}
