/**
 * @fileoverview Creates the per-operation context object threaded through logs.
 * @module src/utils/internal/requestContext
 */
import { randomUUID } from 'node:crypto';

export interface RequestContext {
  requestId: string;
  timestamp: string;
  [key: string]: unknown;
}

export const requestContextService = {
  /**
   * Creates a context with a fresh request id. Fields in `additionalContext`
   * are carried over; `requestId` and `timestamp` are always generated.
   */
  createRequestContext(
    additionalContext: Record<string, unknown> = {},
  ): RequestContext {
    return {
      ...additionalContext,
      requestId: randomUUID(),
      timestamp: new Date().toISOString(),
    };
  },
};
