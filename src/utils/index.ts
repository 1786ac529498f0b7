/**
 * @fileoverview Barrel file for shared utilities.
 * @module src/utils/index
 */
export { ErrorHandler, type ErrorHandlerOptions } from './internal/errorHandler.js';
export { logger, Logger, type LogContext } from './internal/logger.js';
export {
  requestContextService,
  type RequestContext,
} from './internal/requestContext.js';
export { fetchWithTimeout } from './network/fetchWithTimeout.js';
