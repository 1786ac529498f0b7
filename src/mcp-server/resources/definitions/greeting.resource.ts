/**
 * @fileoverview The `hello://greeting` resource: a plain-text greeting naming the server.
 * @module src/mcp-server/resources/definitions/greeting.resource
 */
import { config } from '../../../config/index.js';
import type { ResourceDefinition } from '../utils/resourceDefinition.js';

export const greetingResource: ResourceDefinition = {
  name: 'greeting',
  title: 'Greeting',
  description: 'A simple greeting from the server. Useful as a connectivity check.',
  uri: 'hello://greeting',
  mimeType: 'text/plain',
  logic: () => `Hello from ${config.mcpServerName}! 🚀`,
};
