import { randomUUID } from 'node:crypto';
import type { ModelProvider, ModelResponse, ToolCall, ToolDefinition } from '../models/provider.js';
import type { AssembledContext } from './context.js';
import { ModelUnavailableError, describeError } from '../core/errors.js';
import { log } from '../core/logger.js';

// ─── Types ───

export interface ToolInvocation {
  /** The model's id for this call; echoed on the result turn */
  callId: string;
  toolName: string;
  arguments: Record<string, unknown>;
}

export type Decision =
  | { kind: 'final'; text: string; parseDegraded: boolean }
  | { kind: 'tools'; content: string; invocations: ToolInvocation[]; toolCalls: ToolCall[] };

export interface DecisionEngineOptions {
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

export const EMPTY_RESPONSE_REPLY = "I couldn't come up with a response to that. Could you rephrase?";

const TEXT_TOOL_CALLS_MARKER = '[TOOL_CALLS]';

// ─── Engine ───

export class DecisionEngine {
  constructor(
    private readonly provider: ModelProvider,
    private readonly opts: DecisionEngineOptions,
  ) {}

  /**
   * One model round-trip. Transport failures and timeouts raise
   * ModelUnavailableError; malformed output never throws.
   */
  async decide(context: AssembledContext, tools: ToolDefinition[], signal?: AbortSignal): Promise<Decision> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.opts.timeoutMs);
    const onOuterAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onOuterAbort, { once: true });

    let response: ModelResponse;
    const start = Date.now();
    try {
      response = await this.provider.chat({
        model: this.opts.model,
        systemPrompt: context.systemPrompt,
        messages: context.messages,
        tools,
        maxTokens: this.opts.maxTokens,
        temperature: this.opts.temperature,
        signal: controller.signal,
      });
    } catch (err) {
      const reason = controller.signal.aborted && !signal?.aborted
        ? `model call timed out after ${this.opts.timeoutMs}ms`
        : describeError(err);
      throw new ModelUnavailableError(`Model ${this.opts.model} unavailable: ${reason}`, { cause: err });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onOuterAbort);
    }

    log('debug', 'Decision received', {
      model: this.opts.model,
      durationMs: Date.now() - start,
      stopReason: response.stopReason,
      toolCalls: response.toolCalls.length,
      inputTokens: response.usage.inputTokens,
      outputTokens: response.usage.outputTokens,
    });

    return parseDecision(response, new Set(tools.map(t => t.name)));
  }
}

// ─── Parsing ───

/**
 * Turn a model response into a Decision. Tool calls whose arguments are not a
 * JSON object, or a text tool-call block that does not parse, degrade to a
 * final answer carrying the raw output.
 */
export function parseDecision(response: ModelResponse, knownTools: ReadonlySet<string>): Decision {
  let content = response.content.trim();
  let calls = response.toolCalls;

  if (calls.length === 0 && content.startsWith(TEXT_TOOL_CALLS_MARKER)) {
    const fromText = parseTextToolCalls(content.slice(TEXT_TOOL_CALLS_MARKER.length), knownTools);
    if (!fromText) return degraded(content, 'unparseable text tool-call block');
    calls = fromText;
    content = '';
  }

  if (calls.length === 0) {
    if (!content) return degraded('', 'empty response');
    return { kind: 'final', text: content, parseDegraded: false };
  }

  const invocations: ToolInvocation[] = [];
  const toolCalls: ToolCall[] = [];
  for (const call of calls) {
    const args = parseArguments(call.arguments);
    if (!args) return degraded(content || renderRawCalls(calls), `invalid arguments for ${call.name}`);
    const callId = call.id || newCallId();
    invocations.push({ callId, toolName: call.name, arguments: args });
    toolCalls.push({ id: callId, name: call.name, arguments: call.arguments || '{}' });
  }
  return { kind: 'tools', content, invocations, toolCalls };
}

/** Raw argument text → object. Empty text means no arguments. */
export function parseArguments(raw: string): Record<string, unknown> | null {
  if (raw.trim() === '') return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/** `[{"name": ..., "arguments": {...}}]` as some models print it into content. */
function parseTextToolCalls(text: string, knownTools: ReadonlySet<string>): ToolCall[] | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text.trim());
  } catch {
    return null;
  }
  const items = Array.isArray(parsed) ? parsed : [parsed];
  const calls: ToolCall[] = [];
  for (const item of items) {
    if (!isRecord(item) || typeof item.name !== 'string' || !knownTools.has(item.name)) return null;
    const args = item.arguments;
    const raw = typeof args === 'string' ? args : JSON.stringify(args ?? {});
    calls.push({ id: newCallId(), name: item.name, arguments: raw });
  }
  return calls.length > 0 ? calls : null;
}

function degraded(raw: string, reason: string): Decision {
  log('warn', 'Model output degraded to a plain answer', { reason, rawLength: raw.length });
  return { kind: 'final', text: raw || EMPTY_RESPONSE_REPLY, parseDegraded: true };
}

function renderRawCalls(calls: ToolCall[]): string {
  return calls.map(c => `${c.name}(${c.arguments})`).join('\n');
}

/** 9 alphanumerics: the strictest id shape hosted endpoints accept. */
function newCallId(): string {
  return randomUUID().replace(/-/g, '').slice(0, 9);
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === 'object' && !Array.isArray(v);
}
