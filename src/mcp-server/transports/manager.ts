/**
 * @fileoverview Starts and stops the transport selected by configuration.
 * @module src/mcp-server/transports/manager
 */
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import type { AppConfig } from '../../config/index.js';
import type { Logger } from '../../utils/index.js';
import { requestContextService } from '../../utils/index.js';
import { HttpTransport } from './http/httpTransport.js';
import type { ITransport, TransportServer } from './ITransport.js';
import { StdioTransport } from './stdio/stdioTransport.js';

export class TransportManager {
  private transport: ITransport | undefined;

  constructor(
    private readonly config: AppConfig,
    private readonly logger: Logger,
    private readonly createServer: () => Promise<McpServer>,
  ) {}

  async start(): Promise<TransportServer> {
    const context = requestContextService.createRequestContext({
      operation: 'TransportManager.start',
      transport: this.config.mcpTransportType,
    });
    this.logger.info(
      `Starting ${this.config.mcpTransportType} transport.`,
      context,
    );

    this.transport =
      this.config.mcpTransportType === 'http'
        ? new HttpTransport(this.config, this.createServer)
        : new StdioTransport(this.createServer);

    return this.transport.start();
  }

  async stop(): Promise<void> {
    if (!this.transport) return;
    const context = requestContextService.createRequestContext({
      operation: 'TransportManager.stop',
    });
    this.logger.info('Stopping transport.', context);
    await this.transport.stop();
    this.transport = undefined;
  }
}
