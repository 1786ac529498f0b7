/**
 * @fileoverview Defines the project-wide error type and the JSON-RPC error codes it carries.
 * Every error raised inside the server is, or is wrapped into, an `McpError`.
 * @module src/types-global/errors
 */

/**
 * Standard JSON-RPC 2.0 codes plus implementation-defined server codes
 * (the -32000 to -32099 range is reserved for these).
 */
export enum JsonRpcErrorCode {
  ParseError = -32700,
  InvalidRequest = -32600,
  MethodNotFound = -32601,
  InvalidParams = -32602,
  InternalError = -32603,

  ServiceUnavailable = -32000,
  NotFound = -32001,
  Conflict = -32002,
  RateLimited = -32003,
  Timeout = -32004,
  Forbidden = -32005,
  Unauthorized = -32006,
  ValidationError = -32007,
  ConfigurationError = -32008,
  InitializationFailed = -32009,
  UnknownError = -32099,
}

/**
 * Error carrying a JSON-RPC code and optional structured data.
 */
export class McpError extends Error {
  public readonly code: JsonRpcErrorCode;
  public readonly data?: Record<string, unknown> | undefined;

  constructor(
    code: JsonRpcErrorCode,
    message?: string,
    data?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.code = code;
    this.data = data;
    this.name = 'McpError';

    Object.setPrototypeOf(this, new.target.prototype);
  }
}
