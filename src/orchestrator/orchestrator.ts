import { randomUUID } from 'node:crypto';
import { log } from '../core/logger.js';
import { backoffDelay, sleep } from '../core/backoff.js';
import { ConversationLockTimeoutError, ModelUnavailableError, UnknownToolError, describeError } from '../core/errors.js';
import { APOLOGY_REPLY, BUSY_REPLY } from '../const/constants.js';
import type { ToolDefinition } from '../models/provider.js';
import type { SessionManager, ConversationHandle } from '../session/session-manager.js';
import type { Conversation } from '../session/conversation.js';
import type { ToolCallResult, ToolOutcome, ToolRegistry } from '../tools/tool-registry.js';
import type { PeerCaller } from '../peer/peer-session.js';
import { assembleContext, type AssembledContext } from './context.js';
import type { Decision, ToolInvocation } from './decision.js';
import { resolveTarget, dispatch, type DispatchTarget } from './tool-handlers.js';

// ─── Types ───

export type Surface = 'slack' | 'peer' | 'gateway' | 'cli';

export interface InboundEvent {
  conversationKey: string;
  /** Slack user id, peer agent id, ... */
  sender: string;
  text: string;
  surface: Surface;
  attachments?: Array<{ name: string; url?: string }>;
}

/** Where a cycle's reply goes: a Slack thread, a correlated peer response, an HTTP body. */
export interface ReplySink {
  send(reply: string): Promise<void>;
  /** The conversation stayed locked past the wait limit. Defaults to sending a try-again reply. */
  busy?(): Promise<void>;
}

export type CycleStatus =
  | 'answered'
  | 'degraded'
  | 'iteration-cap'
  | 'timeout'
  | 'failed'
  | 'busy'
  | 'superseded';

export interface CycleOutcome {
  status: CycleStatus;
  reply: string | null;
  rounds: number;
  parseDegraded: boolean;
}

/** The one thing the loop needs from the decision engine. */
export interface Decider {
  decide(context: AssembledContext, tools: ToolDefinition[], signal?: AbortSignal): Promise<Decision>;
}

export interface OrchestratorOptions {
  maxIterations: number;
  toolTimeoutMs: number;
  cycleTimeoutMs: number;
  decisionRetries: number;
  decisionRetryBaseMs: number;
  lockTimeoutMs: number;
  maxContextTurns: number;
  maxContextTokens: number;
}

export interface OrchestratorDeps {
  sessions: SessionManager;
  registry: ToolRegistry;
  decider: Decider;
  peer: PeerCaller | null;
  systemPrompt: () => string;
  options: OrchestratorOptions;
}

const DECISION_RETRY_MAX_MS = 10_000;

export const MODEL_UNAVAILABLE_REPLY = "I couldn't reach my language model just now, so I can't answer this properly. Please try again in a few minutes.";

// ─── Orchestrator ───

export class Orchestrator {
  constructor(private readonly deps: OrchestratorDeps) {}

  /**
   * Run one inbound event to completion: acquire the conversation, loop
   * assemble → decide → dispatch → fold until a final answer, emit the reply
   * to `sink`, release. The handle is released on every path.
   */
  async handleInboundMessage(event: InboundEvent, sink: ReplySink): Promise<CycleOutcome> {
    const { sessions, options } = this.deps;
    const key = event.conversationKey;

    let handle: ConversationHandle;
    try {
      handle = await sessions.acquire(key, options.lockTimeoutMs);
    } catch (err) {
      if (!(err instanceof ConversationLockTimeoutError)) throw err;
      await this.deliver(key, () => sink.busy ? sink.busy() : sink.send(BUSY_REPLY));
      return { status: 'busy', reply: null, rounds: 0, parseDegraded: false };
    }

    log('info', '>>> Cycle started', { conversationKey: key, surface: event.surface, sender: event.sender, textLength: event.text.length });
    const start = Date.now();
    try {
      let outcome: CycleOutcome;
      try {
        outcome = await this.runCycle(handle, event);
      } catch (err) {
        log('error', 'Cycle failed', { conversationKey: key, error: describeError(err), stack: err instanceof Error ? err.stack : undefined });
        outcome = { status: 'failed', reply: APOLOGY_REPLY, rounds: 0, parseDegraded: false };
      }

      if (sessions.isSuperseded(handle)) {
        log('info', 'Cycle superseded: reply discarded', { conversationKey: key });
        return { ...outcome, status: 'superseded', reply: null };
      }

      const reply = outcome.reply;
      if (reply !== null) await this.deliver(key, () => sink.send(reply));
      log('info', '<<< Cycle done', { conversationKey: key, status: outcome.status, rounds: outcome.rounds, durationMs: Date.now() - start });
      return outcome;
    } finally {
      sessions.release(handle);
    }
  }

  // ─── State machine ───

  private async runCycle(handle: ConversationHandle, event: InboundEvent): Promise<CycleOutcome> {
    const { sessions, registry, options } = this.deps;
    const conversation = handle.conversation;
    const cycleDeadline = Date.now() + options.cycleTimeoutMs;
    const controller = new AbortController();
    const cycleTimer = setTimeout(() => controller.abort(), options.cycleTimeoutMs);

    try {
      // Start
      conversation.append({ role: 'user', content: inboundText(event), sender: event.sender });
      let parseDegraded = false;
      const lastResults: ToolCallResult[] = [];

      for (let round = 1; round <= options.maxIterations; round++) {
        if (Date.now() >= cycleDeadline) {
          log('warn', 'Cycle deadline reached', { conversationKey: handle.key, round });
          return this.finish(conversation, 'timeout', progressSummary('I ran out of time', round - 1, lastResults), round - 1, parseDegraded);
        }

        // Assembling
        conversation.status = 'running';
        const tools = registry.definitions();
        const context = assembleContext(conversation.turns, this.deps.systemPrompt(), {
          maxTurns: options.maxContextTurns,
          maxTokens: options.maxContextTokens,
        });

        // Deciding
        const decision = await this.decideWithRetry(handle.key, context, tools, controller.signal, round);
        if (sessions.isSuperseded(handle)) {
          return { status: 'superseded', reply: null, rounds: round, parseDegraded };
        }
        if (!decision && controller.signal.aborted) {
          log('warn', 'Cycle deadline reached while deciding', { conversationKey: handle.key, round });
          return this.finish(conversation, 'timeout', progressSummary('I ran out of time', round - 1, lastResults), round - 1, parseDegraded);
        }
        if (!decision) {
          return this.finish(conversation, 'degraded', MODEL_UNAVAILABLE_REPLY, round, parseDegraded);
        }
        if (decision.kind === 'final') {
          parseDegraded = parseDegraded || decision.parseDegraded;
          return this.finish(conversation, decision.parseDegraded ? 'degraded' : 'answered', decision.text, round, parseDegraded);
        }

        // Dispatching
        conversation.append({ role: 'agent', content: decision.content, toolCalls: decision.toolCalls });
        log('debug', `Round ${round}: dispatching`, { conversationKey: handle.key, tools: decision.invocations.map(i => i.toolName).join(', ') });
        const results = await this.dispatchAll(handle, decision.invocations, cycleDeadline);

        if (sessions.isSuperseded(handle)) {
          log('info', 'Conversation superseded during dispatch: results discarded', { conversationKey: handle.key, results: results.length });
          return { status: 'superseded', reply: null, rounds: round, parseDegraded };
        }

        // Folding
        conversation.status = 'running';
        for (const { invocation, target, result } of results) {
          conversation.append({
            role: target === 'peer' ? 'peer' : 'tool',
            content: renderOutcome(result.outcome, result.toolName, options.toolTimeoutMs),
            correlationId: result.correlationId,
            callId: invocation.callId,
            toolName: result.toolName,
          });
        }
        lastResults.splice(0, lastResults.length, ...results.map(r => r.result));
      }

      log('warn', 'Iteration cap reached', { conversationKey: handle.key, maxIterations: options.maxIterations });
      return this.finish(
        conversation,
        'iteration-cap',
        progressSummary(`I reached my limit of ${options.maxIterations} tool rounds before finishing`, options.maxIterations, lastResults),
        options.maxIterations,
        parseDegraded,
      );
    } finally {
      clearTimeout(cycleTimer);
    }
  }

  private finish(conversation: Conversation, status: CycleStatus, text: string, rounds: number, parseDegraded: boolean): CycleOutcome {
    conversation.append({ role: 'agent', content: text });
    return { status, reply: text, rounds, parseDegraded };
  }

  /** Null once ModelUnavailable outlasts the retry bound. */
  private async decideWithRetry(
    conversationKey: string,
    context: AssembledContext,
    tools: ToolDefinition[],
    signal: AbortSignal,
    round: number,
  ): Promise<Decision | null> {
    const { decider, options } = this.deps;
    for (let attempt = 0; ; attempt++) {
      try {
        return await decider.decide(context, tools, signal);
      } catch (err) {
        if (!(err instanceof ModelUnavailableError)) throw err;
        if (attempt >= options.decisionRetries || signal.aborted) {
          log('warn', 'Model unavailable: giving up', { conversationKey, round, attempts: attempt + 1, error: err.message });
          return null;
        }
        const delay = backoffDelay(attempt, {
          baseDelayMs: options.decisionRetryBaseMs,
          maxDelayMs: DECISION_RETRY_MAX_MS,
          multiplier: 2,
          jitter: 0.2,
        });
        log('warn', 'Model unavailable: retrying', { conversationKey, round, attempt: attempt + 1, delayMs: delay, error: err.message });
        await sleep(delay, signal);
      }
    }
  }

  /**
   * Run every invocation concurrently. Each settles by its own deadline, so
   * the join is bounded; one result per invocation, in invocation order.
   */
  private async dispatchAll(
    handle: ConversationHandle,
    invocations: ToolInvocation[],
    cycleDeadline: number,
  ): Promise<Array<{ invocation: ToolInvocation; target: DispatchTarget['kind'] | 'unknown'; result: ToolCallResult }>> {
    const { registry, peer, options } = this.deps;
    const deadline = Math.min(Date.now() + options.toolTimeoutMs, cycleDeadline);

    const planned = invocations.map(invocation => {
      try {
        return { invocation, target: resolveTarget(registry, invocation.toolName) };
      } catch (err) {
        if (!(err instanceof UnknownToolError)) throw err;
        return { invocation, target: null };
      }
    });
    handle.conversation.status = planned.some(p => p.target?.kind === 'peer') ? 'awaiting-peer' : 'awaiting-tool';

    return Promise.all(planned.map(async ({ invocation, target }) => {
      const correlationId = randomUUID();
      if (!target) {
        log('warn', 'Model requested an unknown tool', { conversationKey: handle.key, tool: invocation.toolName });
        return {
          invocation,
          target: 'unknown' as const,
          result: {
            correlationId,
            toolName: invocation.toolName,
            outcome: { kind: 'failure' as const, reason: new UnknownToolError(invocation.toolName).message },
            durationMs: 0,
          },
        };
      }
      const request = {
        correlationId,
        toolName: invocation.toolName,
        arguments: invocation.arguments,
        conversationKey: handle.key,
        deadline,
      };
      const result = await withDeadline(dispatch(target, request, { registry, peer }), request);
      return { invocation, target: target.kind, result };
    }));
  }

  private async deliver(conversationKey: string, send: () => Promise<void>): Promise<void> {
    try {
      await send();
    } catch (err) {
      log('error', 'Reply delivery failed', { conversationKey, error: describeError(err) });
    }
  }
}

// ─── Helpers ───

function inboundText(event: InboundEvent): string {
  if (!event.attachments || event.attachments.length === 0) return event.text;
  const listed = event.attachments.map(a => `- ${a.name}${a.url ? ` (${a.url})` : ''}`).join('\n');
  return `${event.text}\n\n[Attachments]\n${listed}`;
}

/** Backstop for a dispatch that ignores its deadline. */
function withDeadline(
  pending: Promise<ToolCallResult>,
  request: { correlationId: string; toolName: string; deadline: number },
): Promise<ToolCallResult> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<ToolCallResult>(resolve => {
    timer = setTimeout(() => resolve({
      correlationId: request.correlationId,
      toolName: request.toolName,
      outcome: { kind: 'timeout' },
      durationMs: Math.max(request.deadline - Date.now(), 0),
    }), Math.max(request.deadline - Date.now(), 0));
  });
  return Promise.race([pending, expired]).finally(() => clearTimeout(timer));
}

/** What the model sees for a result: the payload, or a JSON error object. */
export function renderOutcome(outcome: ToolOutcome, toolName: string, timeoutMs: number): string {
  switch (outcome.kind) {
    case 'success':
      return outcome.payload;
    case 'failure':
      return JSON.stringify({ error: outcome.reason });
    case 'timeout':
      return JSON.stringify({ error: `Tool "${toolName}" did not answer within ${timeoutMs}ms` });
  }
}

function shorten(text: string, maxLen: number): string {
  return text.length > maxLen ? text.slice(0, maxLen) + '...' : text;
}

/** Synthesized final answer when the loop is cut short. */
export function progressSummary(lead: string, rounds: number, lastResults: ToolCallResult[]): string {
  const lines = [`${lead} (${rounds} round${rounds === 1 ? '' : 's'} of tool calls).`];
  if (lastResults.length > 0) {
    lines.push('', 'Latest results:');
    for (const r of lastResults) {
      const detail = r.outcome.kind === 'success' ? shorten(r.outcome.payload.replace(/\s+/g, ' ').trim(), 200)
        : r.outcome.kind === 'failure' ? `failed: ${shorten(r.outcome.reason, 200)}`
        : 'timed out';
      lines.push(`- ${r.toolName}: ${detail}`);
    }
  }
  lines.push('', 'Ask me to continue if you want me to keep going.');
  return lines.join('\n');
}
