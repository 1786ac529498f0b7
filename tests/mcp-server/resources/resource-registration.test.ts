/**
 * @fileoverview Tests for resource registration and the greeting resource.
 * @module tests/mcp-server/resources/resource-registration.test
 */
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { afterEach, describe, expect, it } from 'vitest';

import { config } from '@/config/index.js';
import { greetingResource } from '@/mcp-server/resources/definitions/greeting.resource.js';
import {
  createResourceHandler,
  ResourceRegistry,
} from '@/mcp-server/resources/resource-registration.js';
import type { ResourceDefinition } from '@/mcp-server/resources/utils/resourceDefinition.js';

describe('createResourceHandler', () => {
  it('wraps the text in a single content item', async () => {
    const read = createResourceHandler(greetingResource);

    await expect(read(new URL('hello://greeting'))).resolves.toEqual({
      contents: [
        {
          uri: 'hello://greeting',
          mimeType: 'text/plain',
          text: `Hello from ${config.mcpServerName}! 🚀`,
        },
      ],
    });
  });

  it('rejects with a wrapped error when the logic throws', async () => {
    const broken: ResourceDefinition = {
      name: 'broken',
      description: 'Always fails.',
      uri: 'test://broken',
      mimeType: 'text/plain',
      logic: () => {
        throw new Error('nope');
      },
    };

    await expect(
      createResourceHandler(broken)(new URL('test://broken')),
    ).rejects.toThrow('Error in resource:broken: nope');
  });
});

describe('ResourceRegistry', () => {
  let client: Client | undefined;
  let server: McpServer | undefined;

  afterEach(async () => {
    await client?.close();
    await server?.close();
  });

  it('serves the greeting to a client', async () => {
    server = new McpServer({ name: 'test-server', version: '0.0.0' });
    await new ResourceRegistry([greetingResource]).registerAll(server);
    const [clientTransport, serverTransport] =
      InMemoryTransport.createLinkedPair();
    client = new Client({ name: 'test-client', version: '0.0.0' });
    await server.connect(serverTransport);
    await client.connect(clientTransport);

    const { resources } = await client.listResources();
    const read = await client.readResource({ uri: 'hello://greeting' });

    expect(resources.map((r) => r.uri)).toEqual(['hello://greeting']);
    expect(read.contents).toEqual([
      {
        uri: 'hello://greeting',
        mimeType: 'text/plain',
        text: `Hello from ${config.mcpServerName}! 🚀`,
      },
    ]);
  });
});
