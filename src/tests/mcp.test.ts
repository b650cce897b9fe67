import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { z } from 'zod';
import { McpManager, detectTransport, flattenContent } from '../mcp/mcp-manager.js';
import { ToolRegistry, type LocalTool } from '../tools/tool-registry.js';

function localTool(registry: ToolRegistry, name: string): LocalTool {
  const tool = registry.lookup(name);
  if (tool.kind !== 'local') throw new Error(`${name} is not local`);
  return tool;
}

describe('detectTransport', () => {
  it('infers the transport from the fields present', () => {
    expect(detectTransport({ command: 'npx' })).toBe('stdio');
    expect(detectTransport({ url: 'https://mcp.test/sse' })).toBe('sse');
    expect(detectTransport({ url: 'https://mcp.test/mcp' })).toBe('http');
    expect(detectTransport({ transport: 'sse', url: 'https://mcp.test/x' })).toBe('sse');
    expect(() => detectTransport({})).toThrow('Cannot detect transport');
  });
});

describe('flattenContent', () => {
  it('joins text parts and serialises anything else', () => {
    expect(flattenContent([{ type: 'text', text: 'a' }, { type: 'image', data: 'x' }, { type: 'text', text: 'b' }])).toBe('a\nb');
    expect(flattenContent([{ type: 'image', data: 'x' }])).toBe('[{"type":"image","data":"x"}]');
    expect(flattenContent(undefined)).toBe('null');
  });
});

describe('McpManager', () => {
  let server: McpServer;
  let registry: ToolRegistry;
  let mcp: McpManager;

  beforeEach(async () => {
    server = new McpServer({ name: 'calc', version: '1.0.0' });
    server.tool('add', 'Add two numbers', { a: z.number(), b: z.number() }, async ({ a, b }) => ({
      content: [{ type: 'text', text: String(a + b) }],
    }));
    server.tool('divide_by_zero', 'Always fails', {}, async () => ({
      content: [{ type: 'text', text: 'cannot divide by zero' }],
      isError: true,
    }));

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);

    registry = new ToolRegistry();
    mcp = new McpManager(registry);
    await mcp.attach('calc', clientTransport);
  });

  afterEach(async () => {
    await mcp.disconnectAll();
    await server.close();
  });

  it('registers discovered tools under the server name', () => {
    expect(registry.has('mcp_calc_add')).toBe(true);
    expect(localTool(registry, 'mcp_calc_add').definition.description).toBe('[MCP: calc] Add two numbers');
    expect(mcp.statuses()).toEqual([{
      id: 'calc',
      transport: 'custom',
      status: 'connected',
      error: undefined,
      toolCount: 2,
      tools: ['mcp_calc_add', 'mcp_calc_divide_by_zero'],
    }]);
  });

  it('calls a tool through the registry', async () => {
    const result = await registry.invoke(localTool(registry, 'mcp_calc_add'), {
      correlationId: 'corr-1',
      toolName: 'mcp_calc_add',
      arguments: { a: 2, b: 3 },
      conversationKey: 'C1:1',
      deadline: Date.now() + 5_000,
    });
    expect(result.outcome).toEqual({ kind: 'success', payload: '5' });
  });

  it('turns an error result into a tool failure', async () => {
    const result = await registry.invoke(localTool(registry, 'mcp_calc_divide_by_zero'), {
      correlationId: 'corr-2',
      toolName: 'mcp_calc_divide_by_zero',
      arguments: {},
      conversationKey: 'C1:1',
      deadline: Date.now() + 5_000,
    });
    expect(result.outcome).toEqual({ kind: 'failure', reason: 'Tool "mcp_calc_divide_by_zero" failed: cannot divide by zero' });
  });

  it('removes the tools when the server disconnects', async () => {
    await mcp.disconnectServer('calc');
    expect(registry.has('mcp_calc_add')).toBe(false);
    expect(mcp.statuses()).toEqual([]);
    await expect(mcp.callTool('calc', 'add', { a: 1, b: 1 })).rejects.toThrow('MCP server "calc" is not connected');
  });
});
