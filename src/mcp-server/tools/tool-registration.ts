/**
 * @fileoverview Registry that applies the resolved tool definitions to an
 * McpServer instance.
 * @module src/mcp-server/tools/tool-registration
 */
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import { JsonRpcErrorCode } from '../../types-global/errors.js';
import {
  ErrorHandler,
  logger,
  requestContextService,
} from '../../utils/index.js';
import {
  createMcpToolHandler,
  type AnyToolDefinition,
} from './utils/index.js';

export const deriveTitleFromName = (name: string): string =>
  name.replace(/_/g, ' ').replace(/\b\w/g, (char) => char.toUpperCase());

export class ToolRegistry {
  constructor(private readonly toolDefs: AnyToolDefinition[]) {}

  public get toolNames(): string[] {
    return this.toolDefs.map((tool) => tool.name);
  }

  /**
   * Registers all resolved tool definitions with the provided server.
   */
  public async registerAll(server: McpServer): Promise<void> {
    const context = requestContextService.createRequestContext({
      operation: 'ToolRegistry.registerAll',
    });
    logger.info(`Registering ${this.toolDefs.length} tool(s)...`, context);
    for (const toolDef of this.toolDefs) {
      await this.registerTool(server, toolDef);
    }
  }

  private async registerTool(
    server: McpServer,
    tool: AnyToolDefinition,
  ): Promise<void> {
    const registrationContext = requestContextService.createRequestContext({
      operation: 'ToolRegistry.registerTool',
      toolName: tool.name,
    });

    logger.debug(`Registering tool: '${tool.name}'`, registrationContext);

    await ErrorHandler.tryCatch(
      () => {
        const handler = createMcpToolHandler(tool);

        const title =
          tool.title ?? tool.annotations?.title ?? deriveTitleFromName(tool.name);

        server.registerTool(
          tool.name,
          {
            title,
            description: tool.description,
            inputSchema: tool.inputSchema.shape,
            outputSchema: tool.outputSchema.shape,
            ...(tool.annotations && { annotations: tool.annotations }),
          },
          handler,
        );

        logger.notice(
          `Tool '${tool.name}' registered successfully.`,
          registrationContext,
        );
      },
      {
        operation: `RegisteringTool_${tool.name}`,
        context: registrationContext,
        errorCode: JsonRpcErrorCode.InitializationFailed,
        critical: true,
      },
    );
  }
}
