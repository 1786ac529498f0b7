#!/usr/bin/env node
/**
 * @fileoverview Application entry point: composes the container, starts the
 * configured transport, and shuts down on SIGINT/SIGTERM.
 * @module src/index
 */
import {
  composeContainer,
  container,
  TransportManagerToken,
} from './container/index.js';
import { ErrorHandler, logger, requestContextService } from './utils/index.js';

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;

  const context = requestContextService.createRequestContext({
    operation: 'shutdown',
    signal,
  });
  logger.info(`Received ${signal}, shutting down.`, context);

  try {
    await container.resolve(TransportManagerToken).stop();
    logger.info('Shutdown complete.', context);
    process.exit(0);
  } catch (error) {
    ErrorHandler.handleError(error, {
      operation: 'shutdown',
      context,
      critical: true,
    });
    process.exit(1);
  }
}

async function start(): Promise<void> {
  const context = requestContextService.createRequestContext({
    operation: 'startup',
  });

  composeContainer();
  await container.resolve(TransportManagerToken).start();
  logger.notice('RadFlow MCP server started.', context);

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      void shutdown(signal);
    });
  }
}

start().catch((error: unknown) => {
  ErrorHandler.handleError(error, {
    operation: 'startup',
    critical: true,
  });
  process.exit(1);
});
