/**
 * @fileoverview Converts errors raised below the tool boundary into the
 * `{ success: false, error }` payload every RadFlow tool returns.
 * @module src/mcp-server/tools/utils/toolFailure
 */
import { McpError } from '../../../types-global/errors.js';
import { logger, type RequestContext } from '../../../utils/index.js';

export interface FailurePayload {
  success: false;
  error: string;
}

/**
 * @param operation - Phrase completing "Failed to ...", used for non-`McpError` values
 */
export function toFailurePayload(
  error: unknown,
  operation: string,
  context: RequestContext,
): FailurePayload {
  const message =
    error instanceof McpError
      ? error.message
      : `Failed to ${operation}: ${error instanceof Error ? error.message : String(error)}`;

  logger.error(`Failed to ${operation}`, {
    ...context,
    reason: message,
    ...(error instanceof McpError && { errorCode: error.code }),
  });

  return { success: false, error: message };
}
