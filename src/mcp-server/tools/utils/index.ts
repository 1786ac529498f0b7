/**
 * @fileoverview Barrel file for tool utilities.
 * @module src/mcp-server/tools/utils
 */
export * from './toolDefinition.js';
export * from './toolFailure.js';
export * from './toolHandlerFactory.js';
