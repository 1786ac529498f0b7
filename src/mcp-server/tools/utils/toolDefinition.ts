/**
 * @fileoverview Declarative shape shared by every tool definition.
 * A definition bundles metadata, zod schemas, pure logic, and an optional
 * formatter; the registry turns it into an MCP tool.
 * @module src/mcp-server/tools/utils/toolDefinition
 */
import type { RequestHandlerExtra } from '@modelcontextprotocol/sdk/shared/protocol.js';
import type {
  ContentBlock,
  ServerNotification,
  ServerRequest,
  ToolAnnotations,
} from '@modelcontextprotocol/sdk/types.js';
import type { AnyZodObject, z } from 'zod';

import type { RequestContext } from '../../../utils/index.js';

export type { ToolAnnotations };

/** Per-call context supplied by the MCP SDK (abort signal, session id, notifications). */
export type SdkContext = RequestHandlerExtra<ServerRequest, ServerNotification>;

export interface ToolDefinition<
  TInputSchema extends AnyZodObject,
  TOutputSchema extends AnyZodObject,
> {
  /** Programmatic name, snake_case with the `radflow_` prefix. */
  name: string;
  /** Human-readable title; derived from `name` when omitted. */
  title?: string;
  /** Shown to the model. Should say when to use the tool. */
  description: string;
  inputSchema: TInputSchema;
  outputSchema: TOutputSchema;
  annotations?: ToolAnnotations;

  /**
   * Core behaviour. Receives validated input and returns the structured payload.
   * Expected upstream failures are returned as payloads; anything thrown is
   * turned into an MCP error result by the handler.
   */
  logic(
    input: z.infer<TInputSchema>,
    appContext: RequestContext,
    sdkContext: SdkContext,
  ): Promise<z.infer<TOutputSchema>>;

  /** Maps the payload to content blocks. Defaults to pretty-printed JSON. */
  responseFormatter?(result: z.infer<TOutputSchema>): ContentBlock[];
}

export type AnyToolDefinition = ToolDefinition<AnyZodObject, AnyZodObject>;
