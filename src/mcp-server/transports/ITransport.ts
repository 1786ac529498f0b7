/**
 * @fileoverview Transport lifecycle contract.
 * @module src/mcp-server/transports/ITransport
 */
import type { ServerType } from '@hono/node-server';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

/** What a started transport holds on to: the HTTP listener or the stdio-bound server. */
export type TransportServer = ServerType | McpServer;

export interface ITransport {
  start(): Promise<TransportServer>;
  stop(): Promise<void>;
}
