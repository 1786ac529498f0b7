/**
 * @fileoverview `fetch` with an abort-based timeout covering the whole exchange,
 * body included. Timeouts and connection failures surface as distinct
 * `McpError` codes; HTTP status handling is left to the caller.
 * @module src/utils/network/fetchWithTimeout
 */
import { JsonRpcErrorCode, McpError } from '../../types-global/errors.js';
import { logger } from '../internal/logger.js';
import type { RequestContext } from '../internal/requestContext.js';

const isAbortError = (error: unknown): boolean =>
  typeof error === 'object' &&
  error !== null &&
  'name' in error &&
  error.name === 'AbortError';

/** Statuses a `Response` may not be constructed with a body for. */
const NULL_BODY_STATUSES = new Set([101, 204, 205, 304]);

/**
 * @param url - Target URL
 * @param timeoutMs - Milliseconds before the request is aborted
 * @param context - Request context for logging
 * @param options - Standard `fetch` init; `signal` is replaced
 * @returns The response with its body already read, so consuming it cannot stall
 * @throws {McpError} `Timeout` when aborted, `ServiceUnavailable` on network failure
 */
export async function fetchWithTimeout(
  url: string,
  timeoutMs: number,
  context: RequestContext,
  options?: RequestInit,
): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  const method = options?.method ?? 'GET';
  const operationDescription = `${method} ${url}`;

  logger.debug(
    `Attempting ${operationDescription} with ${timeoutMs}ms timeout.`,
    context,
  );

  try {
    const response = await fetch(url, {
      ...options,
      signal: controller.signal,
    });
    const body = NULL_BODY_STATUSES.has(response.status)
      ? null
      : await response.text();
    logger.debug(
      `${operationDescription} responded with status ${response.status}.`,
      context,
    );
    return new Response(body, {
      status: response.status,
      statusText: response.statusText,
      headers: response.headers,
    });
  } catch (error) {
    if (controller.signal.aborted || isAbortError(error)) {
      logger.error(`${operationDescription} timed out after ${timeoutMs}ms.`, {
        ...context,
        url,
      });
      throw new McpError(
        JsonRpcErrorCode.Timeout,
        `API request timed out after ${timeoutMs / 1000} seconds`,
        { url, timeoutMs },
        { cause: error },
      );
    }

    const reason = error instanceof Error ? error.message : String(error);
    logger.error(`Network error during ${operationDescription}: ${reason}`, {
      ...context,
      url,
    });
    throw new McpError(
      JsonRpcErrorCode.ServiceUnavailable,
      `Connection error: ${reason}`,
      { url },
      { cause: error },
    );
  } finally {
    clearTimeout(timeoutId);
  }
}
