/**
 * Tests for tool dispatch and the MCP request handlers
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { docs_v1, drive_v3 } from 'googleapis';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';

vi.mock('./utils/logger.js', () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

import { error as logError } from './utils/logger.js';
import { callTool, createServer } from './server.js';
import { textResponse, type RegisteredTool, type ToolContext } from './tools/types.js';

const context: ToolContext = {
  google: {
    getDriveService: vi.fn(async () => ({}) as unknown as drive_v3.Drive),
    getDocsService: vi.fn(async () => ({}) as unknown as docs_v1.Docs),
  },
};

const greet: RegisteredTool = {
  name: 'greet',
  description: 'Says hello',
  inputSchema: { type: 'object', properties: {}, required: [] },
  run: vi.fn(async () => textResponse('hello')),
};

const broken: RegisteredTool = {
  name: 'broken',
  description: 'Always fails',
  inputSchema: { type: 'object', properties: {}, required: [] },
  run: vi.fn(async () => {
    throw new Error('Drive unavailable');
  }),
};

const registry = [greet, broken];

describe('callTool', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('dispatches to the named tool', async () => {
    const result = await callTool(context, 'greet', { a: 1 }, registry);

    expect(greet.run).toHaveBeenCalledWith(context, { a: 1 });
    expect(result).toEqual({ content: [{ type: 'text', text: 'hello' }], isError: false });
  });

  it('answers unknown tools with an error response', async () => {
    const result = await callTool(context, 'delete_everything', {}, registry);

    expect(result).toEqual({
      content: [{ type: 'text', text: 'Unknown tool: delete_everything' }],
      isError: true,
    });
  });

  it('logs and rethrows tool failures', async () => {
    await expect(callTool(context, 'broken', {}, registry)).rejects.toThrow('Drive unavailable');

    expect(logError).toHaveBeenCalledWith('Tool call failed', {
      module: 'server',
      tool: 'broken',
      error: 'Drive unavailable',
    });
  });
});

describe('createServer', () => {
  async function connect(): Promise<Client> {
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    const server = createServer(context, registry);
    const client = new Client({ name: 'test-client', version: '1.0.0' });

    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
    return client;
  }

  it('lists the registered tools', async () => {
    const client = await connect();

    const result = await client.listTools();

    expect(result.tools.map((tool) => tool.name)).toEqual(['greet', 'broken']);
    expect(result.tools[0]).toEqual({
      name: 'greet',
      description: 'Says hello',
      inputSchema: { type: 'object', properties: {}, required: [] },
    });
    await client.close();
  });

  it('returns tool responses to the client', async () => {
    const client = await connect();

    const result = await client.callTool({ name: 'greet', arguments: {} });

    expect(result.content).toEqual([{ type: 'text', text: 'hello' }]);
    expect(result.isError).toBe(false);
    await client.close();
  });

  it('reports unknown tools to the client', async () => {
    const client = await connect();

    const result = await client.callTool({ name: 'nope', arguments: {} });

    expect(result.content).toEqual([{ type: 'text', text: 'Unknown tool: nope' }]);
    expect(result.isError).toBe(true);
    await client.close();
  });
});
