/**
 * @fileoverview Registry that applies the resolved resource definitions to an
 * McpServer instance.
 * @module src/mcp-server/resources/resource-registration
 */
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ReadResourceResult } from '@modelcontextprotocol/sdk/types.js';

import { JsonRpcErrorCode } from '../../types-global/errors.js';
import {
  ErrorHandler,
  logger,
  requestContextService,
} from '../../utils/index.js';
import type { ResourceDefinition } from './utils/resourceDefinition.js';

/**
 * Builds the read callback for a resource: one text content item per read.
 */
export const createResourceHandler =
  (resource: ResourceDefinition) =>
  async (uri: URL): Promise<ReadResourceResult> => {
    const context = requestContextService.createRequestContext({
      operation: 'HandleResourceRead',
      resourceName: resource.name,
      uri: uri.href,
    });

    const text = await ErrorHandler.tryCatch(
      () => resource.logic(uri, context),
      { operation: `resource:${resource.name}`, context },
    );

    return {
      contents: [{ uri: uri.href, mimeType: resource.mimeType, text }],
    };
  };

export class ResourceRegistry {
  constructor(private readonly resourceDefs: ResourceDefinition[]) {}

  public async registerAll(server: McpServer): Promise<void> {
    const context = requestContextService.createRequestContext({
      operation: 'ResourceRegistry.registerAll',
    });
    logger.info(
      `Registering ${this.resourceDefs.length} resource(s)...`,
      context,
    );

    for (const resource of this.resourceDefs) {
      await ErrorHandler.tryCatch(
        () => {
          server.registerResource(
            resource.name,
            resource.uri,
            {
              title: resource.title ?? resource.name,
              description: resource.description,
              mimeType: resource.mimeType,
            },
            createResourceHandler(resource),
          );
          logger.notice(
            `Resource '${resource.name}' registered successfully.`,
            context,
          );
        },
        {
          operation: `RegisteringResource_${resource.name}`,
          context,
          errorCode: JsonRpcErrorCode.InitializationFailed,
          critical: true,
        },
      );
    }
  }
}
