/**
 * @fileoverview Declarative shape for a fixed-URI resource.
 * @module src/mcp-server/resources/utils/resourceDefinition
 */
import type { RequestContext } from '../../../utils/index.js';

export interface ResourceDefinition {
  /** Registration name. */
  name: string;
  title?: string;
  description: string;
  /** Fixed resource URI, e.g. `hello://greeting`. */
  uri: string;
  mimeType: string;
  /** Produces the resource body. */
  logic(uri: URL, appContext: RequestContext): string | Promise<string>;
}
