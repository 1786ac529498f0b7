/**
 * @fileoverview Registers MCP services with the DI container: tool and resource
 * definitions, their registries, the server factory, and the transport manager.
 * @module src/container/registrations/mcp
 */
import { allResourceDefinitions } from '../../mcp-server/resources/definitions/index.js';
import { ResourceRegistry } from '../../mcp-server/resources/resource-registration.js';
import { createMcpServerInstance } from '../../mcp-server/server.js';
import { allToolDefinitions } from '../../mcp-server/tools/definitions/index.js';
import { ToolRegistry } from '../../mcp-server/tools/tool-registration.js';
import { TransportManager } from '../../mcp-server/transports/manager.js';
import { logger } from '../../utils/index.js';
import { container } from '../core/container.js';
import {
  AppConfig,
  CreateMcpServerInstance,
  Logger,
  ResourceDefinitions,
  ResourceRegistryToken,
  ToolDefinitions,
  ToolRegistryToken,
  TransportManagerToken,
} from '../core/tokens.js';

/**
 * Registers MCP-related services and factories with the container.
 */
export const registerMcpServices = () => {
  for (const tool of allToolDefinitions) {
    container.registerMulti(ToolDefinitions, tool);
  }

  for (const resource of allResourceDefinitions) {
    container.registerMulti(ResourceDefinitions, resource);
  }

  container.registerSingleton(
    ToolRegistryToken,
    (c) => new ToolRegistry(c.resolveAll(ToolDefinitions)),
  );

  container.registerSingleton(
    ResourceRegistryToken,
    (c) => new ResourceRegistry(c.resolveAll(ResourceDefinitions)),
  );

  container.registerValue(CreateMcpServerInstance, createMcpServerInstance);

  container.registerSingleton(
    TransportManagerToken,
    (c) =>
      new TransportManager(
        c.resolve(AppConfig),
        c.resolve(Logger),
        c.resolve(CreateMcpServerInstance),
      ),
  );

  logger.info('MCP services and factories registered with the DI container.');
};
