/**
 * MCP Tool Response Utilities
 *
 * Standardized response formatting for MCP tools.
 */

import { ErrorHandler } from '../types/errors.js';

/**
 * Formats data as JSON with consistent indentation
 */
function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Creates a standardized MCP tool response
 *
 * @example
 * return createResponse({ tasks, count: tasks.length });
 */
export function createResponse(data: unknown) {
  return {
    content: [
      {
        type: 'text' as const,
        text: formatJson(data),
      },
    ],
  };
}

/**
 * Creates an error response for MCP tools
 *
 * @example
 * return createErrorResponse('Validation failed', { type: 'InvalidTaskInput' });
 */
export function createErrorResponse(
  message: string,
  additionalData?: Record<string, unknown>
) {
  return {
    ...createResponse({
      error: true,
      message,
      ...additionalData,
    }),
    isError: true,
  };
}

/**
 * Extracts error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
}

/**
 * Creates an error response from a caught error, keeping its named type
 * so the caller can tell a missing task from a transport failure
 *
 * @example
 * catch (error) {
 *   return createErrorFromCatch('Failed to update task', error);
 * }
 */
export function createErrorFromCatch(prefix: string, error: unknown) {
  const info = ErrorHandler.handle(error);
  return createErrorResponse(`${prefix}: ${info.message}`, {
    type: info.type,
    details: info.details,
    recoverable: info.recoverable,
    suggestions: info.suggestions,
  });
}
