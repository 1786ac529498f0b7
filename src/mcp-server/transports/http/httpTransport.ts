/**
 * @fileoverview Stateless streamable HTTP transport on Hono.
 * Each POST gets a fresh McpServer and transport, closed when the response ends.
 * @module src/mcp-server/transports/http/httpTransport
 */
import { serve, type HttpBindings, type ServerType } from '@hono/node-server';
import { RESPONSE_ALREADY_SENT } from '@hono/node-server/utils/response';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { Hono } from 'hono';

import type { AppConfig } from '../../../config/index.js';
import { JsonRpcErrorCode } from '../../../types-global/errors.js';
import {
  ErrorHandler,
  logger,
  requestContextService,
  type RequestContext,
} from '../../../utils/index.js';
import type { ITransport } from '../ITransport.js';

type HttpEnv = { Bindings: HttpBindings };

const jsonRpcError = (code: number, message: string) => ({
  jsonrpc: '2.0' as const,
  error: { code, message },
  id: null,
});

const closeQuietly = (
  label: string,
  close: () => Promise<void>,
  context: RequestContext,
): void => {
  close().catch((error: unknown) => {
    logger.warning(`Failed to close ${label}`, {
      ...context,
      reason: ErrorHandler.getErrorMessage(error),
    });
  });
};

/**
 * Builds the Hono app. Exposed separately from the listener so it can be
 * exercised with `app.request` in-process.
 */
export function createHttpApp(
  createServer: () => Promise<McpServer>,
  endpointPath: string,
): Hono<HttpEnv> {
  const app = new Hono<HttpEnv>();

  app.get('/healthz', (c) => c.json({ status: 'ok' }));

  app.post(endpointPath, async (c) => {
    const context = requestContextService.createRequestContext({
      operation: 'HttpTransport.handlePost',
    });

    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json(
        jsonRpcError(JsonRpcErrorCode.ParseError, 'Parse error: Invalid JSON'),
        400,
      );
    }

    const server = await createServer();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
    });

    c.env.outgoing.on('close', () => {
      closeQuietly('HTTP transport', () => transport.close(), context);
      closeQuietly('MCP server', () => server.close(), context);
    });

    await server.connect(transport);
    await transport.handleRequest(c.env.incoming, c.env.outgoing, body);
    return RESPONSE_ALREADY_SENT;
  });

  // Stateless mode has no SSE stream or session to delete.
  app.all(endpointPath, (c) =>
    c.json(
      jsonRpcError(JsonRpcErrorCode.ServiceUnavailable, 'Method not allowed.'),
      405,
    ),
  );

  return app;
}

export class HttpTransport implements ITransport {
  private server: ServerType | undefined;

  constructor(
    private readonly config: AppConfig,
    private readonly createServer: () => Promise<McpServer>,
  ) {}

  start(): Promise<ServerType> {
    const { mcpHttpHost, mcpHttpPort, mcpHttpEndpointPath } = this.config;
    const app = createHttpApp(this.createServer, mcpHttpEndpointPath);
    const context = requestContextService.createRequestContext({
      operation: 'HttpTransport.start',
    });

    return new Promise((resolve) => {
      const server = serve(
        { fetch: app.fetch, hostname: mcpHttpHost, port: mcpHttpPort },
        (info) => {
          logger.info(
            `MCP server listening on http://${mcpHttpHost}:${info.port}${mcpHttpEndpointPath}`,
            context,
          );
          resolve(server);
        },
      );
      this.server = server;
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = undefined;
    await new Promise<void>((resolve, reject) => {
      server.close((error?: Error) => (error ? reject(error) : resolve()));
    });
  }
}
