import type { ToolDefinition } from '../models/provider.js';
import { UnknownToolError, describeError } from '../core/errors.js';
import { log } from '../core/logger.js';

export interface ToolContext {
  conversationKey: string;
  correlationId: string;
  /** Epoch milliseconds. */
  deadline: number;
  /** Aborted when the deadline passes. */
  signal: AbortSignal;
}

export type ToolHandler = (input: Record<string, unknown>, ctx: ToolContext) => Promise<string> | string;

export interface ToolCallRequest {
  correlationId: string;
  toolName: string;
  arguments: Record<string, unknown>;
  conversationKey: string;
  /** Epoch milliseconds. */
  deadline: number;
}

export type ToolOutcome =
  | { kind: 'success'; payload: string }
  | { kind: 'failure'; reason: string }
  | { kind: 'timeout' };

export interface ToolCallResult {
  correlationId: string;
  toolName: string;
  outcome: ToolOutcome;
  durationMs: number;
}

export interface LocalTool {
  kind: 'local';
  definition: ToolDefinition;
  handler: ToolHandler;
}

/** A capability another agent on the coordination network exposes. */
export interface PeerTool {
  kind: 'peer';
  definition: ToolDefinition;
  agentId: string;
  remoteName: string;
}

export type RegisteredTool = LocalTool | PeerTool;

/** Model-facing tool names allow [a-zA-Z0-9_-], at most 64 characters. */
export function toToolName(...parts: string[]): string {
  return parts.join('_').replace(/[^a-zA-Z0-9_-]/g, '_').slice(0, 64);
}

export class ToolRegistry {
  private readonly local = new Map<string, LocalTool>();
  private peer = new Map<string, PeerTool>();

  register(definition: ToolDefinition, handler: ToolHandler): void {
    if (this.local.has(definition.name)) {
      log('warn', 'Replacing registered tool', { tool: definition.name });
    }
    this.local.set(definition.name, { kind: 'local', definition, handler });
  }

  unregister(name: string): boolean {
    return this.local.delete(name);
  }

  /** Replace the whole peer catalogue. Names already taken locally are skipped. */
  setPeerTools(tools: Array<{ agentId: string; name: string; description: string; inputSchema: Record<string, unknown> }>): void {
    const next = new Map<string, PeerTool>();
    for (const t of tools) {
      const name = toToolName('peer', t.agentId, t.name);
      if (this.local.has(name)) {
        log('warn', 'Peer tool shadowed by local tool', { tool: name, agentId: t.agentId });
        continue;
      }
      next.set(name, {
        kind: 'peer',
        agentId: t.agentId,
        remoteName: t.name,
        definition: { name, description: `[agent ${t.agentId}] ${t.description}`, input_schema: t.inputSchema },
      });
    }
    this.peer = next;
    log('debug', 'Peer tool catalogue updated', { count: next.size });
  }

  has(name: string): boolean {
    return this.local.has(name) || this.peer.has(name);
  }

  isLocal(name: string): boolean {
    return this.local.has(name);
  }

  /** Local registrations win over peer-exposed tools of the same name. */
  lookup(name: string): RegisteredTool {
    const tool = this.local.get(name) ?? this.peer.get(name);
    if (!tool) throw new UnknownToolError(name);
    return tool;
  }

  definitions(): ToolDefinition[] {
    return [...this.local.values(), ...this.peer.values()].map(t => t.definition);
  }

  localDefinitions(): ToolDefinition[] {
    return [...this.local.values()].map(t => t.definition);
  }

  get size(): number {
    return this.local.size + this.peer.size;
  }

  /**
   * Run a local tool under its deadline. Handler failures come back as a
   * `failure` outcome, a missed deadline as `timeout`; this never rejects.
   */
  async invoke(tool: LocalTool, request: ToolCallRequest): Promise<ToolCallResult> {
    const start = Date.now();
    const finish = (outcome: ToolOutcome): ToolCallResult => ({
      correlationId: request.correlationId,
      toolName: request.toolName,
      outcome,
      durationMs: Date.now() - start,
    });

    const remaining = request.deadline - start;
    if (remaining <= 0) return finish({ kind: 'timeout' });

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<ToolOutcome>(resolve => {
      timer = setTimeout(() => {
        controller.abort();
        resolve({ kind: 'timeout' });
      }, remaining);
    });

    const run = (async (): Promise<ToolOutcome> => {
      try {
        const payload = await tool.handler(request.arguments, {
          conversationKey: request.conversationKey,
          correlationId: request.correlationId,
          deadline: request.deadline,
          signal: controller.signal,
        });
        return { kind: 'success', payload };
      } catch (err) {
        return { kind: 'failure', reason: describeError(err) };
      }
    })();

    try {
      const outcome = await Promise.race([run, expired]);
      const result = finish(outcome);
      if (outcome.kind === 'success') {
        log('debug', 'Tool succeeded', { tool: request.toolName, correlationId: request.correlationId, durationMs: result.durationMs });
      } else {
        log('warn', `Tool ${outcome.kind}`, {
          tool: request.toolName,
          correlationId: request.correlationId,
          durationMs: result.durationMs,
          reason: outcome.kind === 'failure' ? outcome.reason : undefined,
        });
      }
      return result;
    } finally {
      clearTimeout(timer);
    }
  }
}
