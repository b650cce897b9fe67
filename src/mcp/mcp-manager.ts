import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type { McpServerConfig } from '../core/config.js';
import type { ToolDefinition } from '../models/provider.js';
import { toToolName, type ToolRegistry } from '../tools/tool-registry.js';
import { ToolExecutionError, describeError } from '../core/errors.js';
import { log } from '../core/logger.js';

interface McpConnection {
  id: string;
  transportType: 'stdio' | 'http' | 'sse' | 'custom';
  client: Client;
  tools: ToolDefinition[];
  status: 'connected' | 'error';
  error?: string;
}

export interface McpStatus {
  id: string;
  transport: string;
  status: string;
  error?: string;
  toolCount: number;
  tools: string[];
}

export function detectTransport(config: McpServerConfig): 'stdio' | 'http' | 'sse' {
  if (config.transport) return config.transport;
  if (config.command) return 'stdio';
  if (config.url) {
    return config.url.endsWith('/sse') ? 'sse' : 'http';
  }
  throw new Error('Cannot detect transport: provide command (stdio) or url (http/sse)');
}

function childEnv(extra: Record<string, string> | undefined): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [k, v] of Object.entries(process.env)) {
    if (v !== undefined) env[k] = v;
  }
  return { ...env, ...(extra ?? {}) };
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === 'object' && !Array.isArray(v);
}

/** Join the text parts of a tool result; anything else comes back as JSON. */
export function flattenContent(content: unknown): string {
  if (Array.isArray(content)) {
    const texts: string[] = [];
    for (const item of content) {
      if (isRecord(item) && item.type === 'text' && typeof item.text === 'string') texts.push(item.text);
    }
    if (texts.length > 0) return texts.join('\n');
  }
  return JSON.stringify(content ?? null);
}

/**
 * Connects configured MCP servers and exposes each discovered tool in the
 * registry as a local tool named `mcp_<server>_<tool>`.
 */
export class McpManager {
  private readonly connections = new Map<string, McpConnection>();

  constructor(private readonly registry: ToolRegistry) {}

  async connectAll(servers: Record<string, McpServerConfig>): Promise<void> {
    const entries = Object.entries(servers).filter(([, cfg]) => cfg.enabled !== false);
    if (entries.length === 0) return;

    log('info', `Connecting to ${entries.length} MCP server(s)...`);
    await Promise.all(entries.map(([id, cfg]) => this.connectServer(id, cfg)));
  }

  /** Failures are logged and recorded in the status; they never throw. */
  async connectServer(id: string, config: McpServerConfig): Promise<void> {
    let transport: Transport;
    let transportType: 'stdio' | 'http' | 'sse';
    try {
      transportType = detectTransport(config);
      transport = this.createTransport(id, transportType, config);
    } catch (err) {
      log('warn', `MCP server "${id}" skipped`, { error: describeError(err) });
      return;
    }
    await this.attach(id, transport, transportType);
  }

  /** Connect over an already-built transport. */
  async attach(id: string, transport: Transport, transportType: McpConnection['transportType'] = 'custom'): Promise<void> {
    const client = new Client({ name: 'coralbridge', version: '0.1.0' });
    const conn: McpConnection = { id, transportType, client, tools: [], status: 'error' };

    try {
      await client.connect(transport);
      conn.status = 'connected';

      const result = await client.listTools();
      for (const tool of result.tools) {
        const name = toToolName('mcp', id, tool.name);
        const inputSchema: Record<string, unknown> = { ...tool.inputSchema };
        const def: ToolDefinition = {
          name,
          description: `[MCP: ${id}] ${tool.description ?? ''}`,
          input_schema: inputSchema,
        };
        conn.tools.push(def);
        this.registry.register(def, (input, ctx) => this.callTool(id, tool.name, input, ctx.signal));
      }

      this.connections.set(id, conn);
      log('info', `MCP server "${id}" connected`, { tools: conn.tools.length });
    } catch (err) {
      conn.error = describeError(err);
      this.connections.set(id, conn);
      log('error', `MCP server "${id}" failed to connect`, { error: conn.error });
    }
  }

  async callTool(serverId: string, toolName: string, args: Record<string, unknown>, signal?: AbortSignal): Promise<string> {
    const qualified = toToolName('mcp', serverId, toolName);
    const conn = this.connections.get(serverId);
    if (!conn || conn.status !== 'connected') {
      throw new ToolExecutionError(qualified, `MCP server "${serverId}" is not connected`);
    }

    const result = await conn.client.callTool({ name: toolName, arguments: args }, undefined, { signal });
    const content: unknown = result.content;
    const text = flattenContent(content);
    if (result.isError === true) throw new ToolExecutionError(qualified, text);
    return text;
  }

  async disconnectServer(id: string): Promise<void> {
    const conn = this.connections.get(id);
    if (!conn) return;

    for (const tool of conn.tools) this.registry.unregister(tool.name);

    try {
      await conn.client.close();
    } catch (err) {
      log('warn', `Error closing MCP server "${id}"`, { error: describeError(err) });
    }

    this.connections.delete(id);
    log('info', `MCP server "${id}" disconnected`);
  }

  async disconnectAll(): Promise<void> {
    await Promise.all([...this.connections.keys()].map(id => this.disconnectServer(id)));
  }

  statuses(): McpStatus[] {
    return [...this.connections.values()].map(conn => ({
      id: conn.id,
      transport: conn.transportType,
      status: conn.status,
      error: conn.error,
      toolCount: conn.tools.length,
      tools: conn.tools.map(t => t.name),
    }));
  }

  private createTransport(id: string, type: 'stdio' | 'http' | 'sse', config: McpServerConfig): Transport {
    switch (type) {
      case 'stdio':
        if (!config.command) throw new Error(`MCP server "${id}" detected as stdio but no command`);
        return new StdioClientTransport({
          command: config.command,
          args: config.args ?? [],
          env: childEnv(config.env),
          cwd: config.cwd,
        });
      case 'sse':
        if (!config.url) throw new Error(`MCP server "${id}" detected as sse but no url`);
        return new SSEClientTransport(
          new URL(config.url),
          config.headers ? { requestInit: { headers: config.headers } } : undefined,
        );
      case 'http':
        if (!config.url) throw new Error(`MCP server "${id}" detected as http but no url`);
        return new StreamableHTTPClientTransport(
          new URL(config.url),
          config.headers ? { requestInit: { headers: config.headers } } : undefined,
        );
    }
  }
}
