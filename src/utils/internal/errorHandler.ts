/**
 * @fileoverview Central error normalization and logging.
 * Converts arbitrary thrown values into `McpError` instances with a consistent
 * code, logs them once, and optionally rethrows.
 * @module src/utils/internal/errorHandler
 */
import { ZodError } from 'zod';

import { JsonRpcErrorCode, McpError } from '../../types-global/errors.js';
import { logger, type LogContext } from './logger.js';

export interface ErrorHandlerOptions {
  /** Name of the operation that failed, used in the log line and wrapped message. */
  operation: string;
  context?: LogContext;
  input?: unknown;
  /** Code applied when the error is not already an `McpError`. */
  errorCode?: JsonRpcErrorCode;
  /** Logs at `crit` instead of `error`. */
  critical?: boolean;
  rethrow?: boolean;
}

export class ErrorHandler {
  /**
   * Derives a JSON-RPC code from an arbitrary error value.
   */
  public static determineErrorCode(error: unknown): JsonRpcErrorCode {
    if (error instanceof McpError) return error.code;
    if (error instanceof ZodError) return JsonRpcErrorCode.ValidationError;
    return JsonRpcErrorCode.InternalError;
  }

  public static getErrorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    if (typeof error === 'string') return error;
    return String(error);
  }

  public static handleError(
    error: unknown,
    options: ErrorHandlerOptions,
  ): McpError {
    const { operation, context, input, errorCode, critical, rethrow } =
      options;

    const mcpError =
      error instanceof McpError
        ? error
        : new McpError(
            errorCode ?? ErrorHandler.determineErrorCode(error),
            `Error in ${operation}: ${ErrorHandler.getErrorMessage(error)}`,
            {
              originalErrorType:
                error instanceof Error ? error.name : typeof error,
            },
            { cause: error },
          );

    const logContext: LogContext = {
      ...context,
      operation,
      errorCode: mcpError.code,
      ...(input !== undefined && { input }),
    };

    if (critical) {
      logger.crit(`Error in ${operation}: ${mcpError.message}`, mcpError, logContext);
    } else {
      logger.error(`Error in ${operation}: ${mcpError.message}`, mcpError, logContext);
    }

    if (rethrow) {
      throw mcpError;
    }
    return mcpError;
  }

  /**
   * Runs `fn`; on failure the error is handled (logged, normalized) and rethrown.
   */
  public static async tryCatch<T>(
    fn: () => Promise<T> | T,
    options: Omit<ErrorHandlerOptions, 'rethrow'>,
  ): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw ErrorHandler.handleError(error, { ...options, rethrow: false });
    }
  }
}
