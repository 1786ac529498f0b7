/**
 * @fileoverview Barrel file for all resource definitions.
 * @module src/mcp-server/resources/definitions
 */
import type { ResourceDefinition } from '../utils/resourceDefinition.js';
import { greetingResource } from './greeting.resource.js';

/**
 * Every resource the server exposes, discovered by the registration system.
 */
export const allResourceDefinitions: ResourceDefinition[] = [greetingResource];
