/**
 * @fileoverview Tests for the composed container and the server factory.
 * @module tests/mcp-server/server.test
 */
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { afterEach, describe, expect, it } from 'vitest';

import {
  composeContainer,
  container,
  CreateMcpServerInstance,
  resetContainer,
  ToolDefinitions,
  ToolRegistryToken,
} from '@/container/index.js';

describe('createMcpServerInstance', () => {
  afterEach(() => {
    resetContainer();
  });

  it('registers definitions once however often composition runs', () => {
    composeContainer();
    composeContainer();

    expect(container.resolveAll(ToolDefinitions)).toHaveLength(8);
    expect(container.resolve(ToolRegistryToken).toolNames).toHaveLength(8);
  });

  it('exposes every tool and the greeting resource', async () => {
    composeContainer();
    const server = await container.resolve(CreateMcpServerInstance)();
    const [clientTransport, serverTransport] =
      InMemoryTransport.createLinkedPair();
    const client = new Client({ name: 'test-client', version: '0.0.0' });
    await server.connect(serverTransport);
    await client.connect(clientTransport);

    try {
      const { tools } = await client.listTools();
      const { resources } = await client.listResources();

      expect(tools.map((tool) => tool.name)).toContain(
        'radflow_get_patient_todo_status',
      );
      expect(tools).toHaveLength(8);
      expect(resources.map((resource) => resource.uri)).toEqual([
        'hello://greeting',
      ]);
    } finally {
      await client.close();
      await server.close();
    }
  });
});
