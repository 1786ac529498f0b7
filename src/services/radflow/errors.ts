/**
 * @fileoverview Error types raised by the RadFlow service layer.
 * @module src/services/radflow/errors
 */

import { JsonRpcErrorCode, McpError } from '../../types-global/errors.js';

const AUTH_MESSAGE_PREFIX = 'Could not retrieve authentication token';

/**
 * Partner token could not be issued or read. The token cache is left untouched.
 */
export class AuthenticationError extends McpError {
  constructor(
    reason: string,
    data?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(
      JsonRpcErrorCode.Unauthorized,
      `${AUTH_MESSAGE_PREFIX}: ${reason}`,
      data,
      options,
    );
    this.name = 'AuthenticationError';
  }
}

/** RadFlow answered with a non-2xx status. */
export class UpstreamHttpError extends McpError {
  public readonly status: number;

  constructor(status: number, data?: Record<string, unknown>) {
    super(
      JsonRpcErrorCode.ServiceUnavailable,
      `API request failed with status ${status}`,
      { status, ...data },
    );
    this.status = status;
    this.name = 'UpstreamHttpError';
  }
}

/** Response body was not the JSON shape expected. */
export class MalformedResponseError extends McpError {
  constructor(message: string, data?: Record<string, unknown>) {
    super(JsonRpcErrorCode.ValidationError, message, data);
    this.name = 'MalformedResponseError';
  }
}
