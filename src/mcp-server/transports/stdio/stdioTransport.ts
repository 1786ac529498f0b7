/**
 * @fileoverview Serves one McpServer over stdin/stdout.
 * @module src/mcp-server/transports/stdio/stdioTransport
 */
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { logger, requestContextService } from '../../../utils/index.js';
import type { ITransport } from '../ITransport.js';

export class StdioTransport implements ITransport {
  private server: McpServer | undefined;

  constructor(private readonly createServer: () => Promise<McpServer>) {}

  async start(): Promise<McpServer> {
    const context = requestContextService.createRequestContext({
      operation: 'StdioTransport.start',
    });
    const server = await this.createServer();
    await server.connect(new StdioServerTransport());
    this.server = server;
    logger.info('MCP server listening on stdio.', context);
    return server;
  }

  async stop(): Promise<void> {
    if (!this.server) return;
    await this.server.close();
    this.server = undefined;
  }
}
