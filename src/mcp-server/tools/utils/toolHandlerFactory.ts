/**
 * @fileoverview Builds the MCP callback for a tool definition.
 * The callback owns the request context, input validation, formatting, and
 * conversion of thrown errors into `isError` results that still carry the
 * `{ success: false, error }` payload every tool returns.
 * @module src/mcp-server/tools/utils/toolHandlerFactory
 */
import type {
  CallToolResult,
  ContentBlock,
} from '@modelcontextprotocol/sdk/types.js';

import {
  ErrorHandler,
  logger,
  requestContextService,
} from '../../../utils/index.js';
import type { AnyToolDefinition, SdkContext } from './toolDefinition.js';
import type { FailurePayload } from './toolFailure.js';

const defaultResponseFormatter = (result: unknown): ContentBlock[] => [
  { type: 'text', text: JSON.stringify(result, null, 2) },
];

export type McpToolHandler = (
  input: unknown,
  sdkContext: SdkContext,
) => Promise<CallToolResult>;

export function createMcpToolHandler(tool: AnyToolDefinition): McpToolHandler {
  const format = tool.responseFormatter ?? defaultResponseFormatter;

  return async (input, sdkContext) => {
    const appContext = requestContextService.createRequestContext({
      operation: 'HandleToolRequest',
      toolName: tool.name,
      sessionId: sdkContext.sessionId,
    });

    try {
      const validated = tool.inputSchema.parse(input);
      const result = await tool.logic(validated, appContext, sdkContext);

      logger.debug(`Tool '${tool.name}' completed.`, appContext);

      return {
        structuredContent: result,
        content: format(result),
      };
    } catch (error) {
      const mcpError = ErrorHandler.handleError(error, {
        operation: `tool:${tool.name}`,
        context: appContext,
        input,
      });

      const failure: FailurePayload = {
        success: false,
        error: mcpError.message,
      };

      return {
        isError: true,
        structuredContent: { ...failure },
        content: [{ type: 'text', text: `Error: ${mcpError.message}` }],
      };
    }
  };
}
