/**
 * @fileoverview Builds a configured McpServer with every tool and resource registered.
 * Transports call the factory; the HTTP transport builds one server per request.
 * @module src/mcp-server/server
 */
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import { config } from '../config/index.js';
import {
  container,
  ResourceRegistryToken,
  ToolRegistryToken,
} from '../container/index.js';
import { logger, requestContextService } from '../utils/index.js';

export async function createMcpServerInstance(): Promise<McpServer> {
  const context = requestContextService.createRequestContext({
    operation: 'createMcpServerInstance',
  });
  logger.info('Initializing MCP server instance', context);

  const server = new McpServer(
    { name: config.mcpServerName, version: config.mcpServerVersion },
    {
      capabilities: {
        logging: {},
        tools: { listChanged: true },
        resources: { listChanged: true },
      },
    },
  );

  await container.resolve(ToolRegistryToken).registerAll(server);
  await container.resolve(ResourceRegistryToken).registerAll(server);

  logger.info('MCP server instance configured.', context);
  return server;
}
