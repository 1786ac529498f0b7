/**
 * @fileoverview Typed DI tokens for the application.
 * Each token carries its resolved type via the `Token<T>` parameter.
 * @module src/container/core/tokens
 */
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import type { AppConfig as AppConfigShape } from '../../config/index.js';
import type { ResourceRegistry } from '../../mcp-server/resources/resource-registration.js';
import type { ResourceDefinition } from '../../mcp-server/resources/utils/resourceDefinition.js';
import type { ToolRegistry } from '../../mcp-server/tools/tool-registration.js';
import type { AnyToolDefinition } from '../../mcp-server/tools/utils/toolDefinition.js';
import type { TransportManager } from '../../mcp-server/transports/manager.js';
import type { PartnerTokenService } from '../../services/radflow/auth/partnerTokenService.js';
import type { TokenCache } from '../../services/radflow/auth/tokenCache.js';
import type { IRadFlowProvider } from '../../services/radflow/core/IRadFlowProvider.js';
import type { logger } from '../../utils/internal/logger.js';
import { token } from './container.js';

// --- Core service tokens ---
export const AppConfig = token<AppConfigShape>('AppConfig');
export const Logger = token<typeof logger>('Logger');

// --- RadFlow service tokens ---
export const TokenCacheToken = token<TokenCache>('TokenCache');
export const PartnerTokenServiceToken = token<PartnerTokenService>(
  'PartnerTokenService',
);
export const RadFlowProvider = token<IRadFlowProvider>('IRadFlowProvider');

// --- MCP server tokens ---
export const CreateMcpServerInstance = token<() => Promise<McpServer>>(
  'CreateMcpServerInstance',
);
export const TransportManagerToken =
  token<TransportManager>('TransportManager');

// --- Registry tokens ---
export const ToolRegistryToken = token<ToolRegistry>('ToolRegistry');
export const ResourceRegistryToken =
  token<ResourceRegistry>('ResourceRegistry');

// --- Multi-registration tokens ---
export const ToolDefinitions = token<AnyToolDefinition>('ToolDefinitions');
export const ResourceDefinitions =
  token<ResourceDefinition>('ResourceDefinitions');
