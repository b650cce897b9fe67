import type { ChannelAdapter, InboundHandler } from './adapter.js';
import type { RequestFrame } from '../peer/protocol.js';
import { requestText } from '../peer/protocol.js';
import type { PeerRequestHandler, PeerSessionState } from '../peer/peer-session.js';
import type { RegisteredTool, ToolRegistry } from '../tools/tool-registry.js';
import { UnknownToolError, describeError } from '../core/errors.js';
import { log } from '../core/logger.js';
import { BUSY_REPLY } from '../const/constants.js';

/** The slice of PeerSessionClient the coordination surface drives. */
export interface PeerEndpoint {
  readonly state: PeerSessionState;
  onRequest(handler: PeerRequestHandler): void;
  respond(correlationId: string, outcome: { ok: true; payload: string } | { ok: false; error: string }): boolean;
  connect(): Promise<void>;
  close(): void;
}

export interface CoralChannelOptions {
  session: PeerEndpoint;
  handler: InboundHandler;
  registry: ToolRegistry;
  toolTimeoutMs: number;
}

/** A fresh conversation per request unless the peer names a thread. */
export function peerConversationKey(frame: RequestFrame): string {
  return `peer:${frame.senderAgentId}:${frame.threadId ?? frame.correlationId}`;
}

function toolArguments(payload: unknown): Record<string, unknown> {
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) return {};
  const args: unknown = Reflect.get(payload, 'arguments');
  if (typeof args !== 'object' || args === null || Array.isArray(args)) return {};
  return Object.fromEntries(Object.entries(args));
}

/**
 * Inbound side of the coordination network. A request naming one of our
 * tools runs that tool directly; any other request is a message and runs a
 * full orchestration cycle. Either way exactly one response frame goes back
 * under the request's correlation id.
 */
export class CoralChannel implements ChannelAdapter {
  readonly id = 'coral';

  constructor(private readonly opts: CoralChannelOptions) {}

  async connect(): Promise<void> {
    this.opts.session.onRequest(frame => {
      this.handleRequest(frame).catch((err: unknown) => {
        log('error', 'Peer request handling failed', { correlationId: frame.correlationId, error: describeError(err) });
        this.opts.session.respond(frame.correlationId, { ok: false, error: describeError(err) });
      });
    });
    await this.opts.session.connect();
    log('info', 'Coral adapter connected');
  }

  async disconnect(): Promise<void> {
    this.opts.session.close();
    log('info', 'Coral adapter disconnected');
  }

  async isHealthy(): Promise<boolean> {
    return this.opts.session.state === 'open';
  }

  async handleRequest(frame: RequestFrame): Promise<void> {
    if (frame.toolName) {
      await this.runTool(frame, frame.toolName);
      return;
    }

    let answered = false;
    const respond = (outcome: { ok: true; payload: string } | { ok: false; error: string }): void => {
      if (answered) return;
      answered = true;
      this.opts.session.respond(frame.correlationId, outcome);
    };

    log('debug', 'Peer request received', { correlationId: frame.correlationId, sender: frame.senderAgentId, threadId: frame.threadId });
    const outcome = await this.opts.handler(
      {
        conversationKey: peerConversationKey(frame),
        sender: frame.senderAgentId,
        text: requestText(frame.payload),
        surface: 'peer',
      },
      {
        send: async reply => respond({ ok: true, payload: reply }),
        busy: async () => respond({ ok: false, error: BUSY_REPLY }),
      },
    );

    if (!answered) respond({ ok: false, error: `request ended without a reply (${outcome.status})` });
  }

  private async runTool(frame: RequestFrame, toolName: string): Promise<void> {
    const { registry, session, toolTimeoutMs } = this.opts;
    let tool: RegisteredTool;
    try {
      tool = registry.lookup(toolName);
    } catch (err) {
      if (!(err instanceof UnknownToolError)) throw err;
      session.respond(frame.correlationId, { ok: false, error: err.message });
      return;
    }
    if (tool.kind !== 'local') {
      session.respond(frame.correlationId, { ok: false, error: `Tool "${toolName}" is not offered by this agent` });
      return;
    }

    const result = await registry.invoke(tool, {
      correlationId: frame.correlationId,
      toolName,
      arguments: toolArguments(frame.payload),
      conversationKey: peerConversationKey(frame),
      deadline: Date.now() + toolTimeoutMs,
    });

    switch (result.outcome.kind) {
      case 'success':
        session.respond(frame.correlationId, { ok: true, payload: result.outcome.payload });
        break;
      case 'failure':
        session.respond(frame.correlationId, { ok: false, error: result.outcome.reason });
        break;
      case 'timeout':
        session.respond(frame.correlationId, { ok: false, error: `Tool "${toolName}" did not finish within ${toolTimeoutMs}ms` });
        break;
    }
  }
}
