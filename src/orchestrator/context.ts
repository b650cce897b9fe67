import { log } from '../core/logger.js';
import {
  DEFAULT_CHARS_PER_TOKEN,
  MIN_TOOL_RESULT_CHARS,
  MAX_TOOL_RESULT_CHARS,
} from '../const/constants.js';
import type { ChatMessage } from '../models/provider.js';
import type { Turn } from '../session/conversation.js';

// ─── Types ───

export interface ContextBudget {
  maxTurns: number;
  maxTokens: number;
  charsPerToken?: number;
  /** Per tool result cap before budgeting */
  maxToolResultChars?: number;
}

export interface AssembledContext {
  systemPrompt: string;
  messages: ChatMessage[];
  /** Turns left out because the budget ran out */
  omittedTurns: number;
  estimatedTokens: number;
}

interface TurnGroup {
  messages: ChatMessage[];
  turnCount: number;
  /** True for the group holding a user turn */
  isUser: boolean;
}

// ─── Public API ───

/**
 * Build the bounded model context for a conversation.
 *
 * The system prompt and the most recent user turn are always present. The rest
 * is filled backward from the newest turn until the turn or token budget runs
 * out; everything older is dropped and noted in the system prompt. An agent turn
 * that requested tools travels with its result turns, so the model never sees a
 * tool result without the call that produced it. Pure: same turns and budget,
 * same output.
 */
export function assembleContext(turns: readonly Turn[], systemPrompt: string, budget: ContextBudget): AssembledContext {
  const charsPerToken = budget.charsPerToken ?? DEFAULT_CHARS_PER_TOKEN;
  const maxResult = budget.maxToolResultChars ?? MAX_TOOL_RESULT_CHARS;
  const groups = groupTurns(turns, maxResult);

  let mandatory = -1;
  for (let g = groups.length - 1; g >= 0; g--) {
    if (groups[g].isUser) {
      mandatory = g;
      break;
    }
  }

  const systemTokens = estimateTokens(systemPrompt.length, charsPerToken);
  let tokensLeft = Math.max(budget.maxTokens - systemTokens, 0);
  let turnsLeft = budget.maxTurns;
  const included = new Set<number>();

  if (mandatory !== -1) {
    included.add(mandatory);
    tokensLeft -= groupTokens(groups[mandatory], charsPerToken);
    turnsLeft -= groups[mandatory].turnCount;
  }

  for (let g = groups.length - 1; g >= 0; g--) {
    if (g === mandatory) continue;
    let cost = groupTokens(groups[g], charsPerToken);
    // The round the next decision has to react to is never dropped, only cut down
    const currentRound = g === groups.length - 1 && g > mandatory;
    if (currentRound && cost > tokensLeft) {
      groups[g] = shrinkResults(groups[g], Math.floor(Math.max(tokensLeft, 0) * charsPerToken));
      cost = groupTokens(groups[g], charsPerToken);
      log('debug', 'Current tool results shrunk to fit the context', { results: groups[g].turnCount - 1, estimatedTokens: cost });
    } else if (!currentRound && (cost > tokensLeft || groups[g].turnCount > turnsLeft)) {
      break;
    }
    included.add(g);
    tokensLeft -= cost;
    turnsLeft -= groups[g].turnCount;
  }

  const messages: ChatMessage[] = [];
  let omittedTurns = 0;
  groups.forEach((group, g) => {
    if (included.has(g)) messages.push(...group.messages);
    else omittedTurns += group.turnCount;
  });

  const prompt = omittedTurns > 0
    ? `${systemPrompt}\n\n[${omittedTurns} earlier turn${omittedTurns === 1 ? '' : 's'} of this conversation omitted to fit the context window]`
    : systemPrompt;

  const estimatedTokens = estimateTokens(prompt.length + messagesChars(messages), charsPerToken);
  if (omittedTurns > 0) {
    log('debug', 'Context trimmed', { omittedTurns, keptMessages: messages.length, estimatedTokens });
  }

  return { systemPrompt: prompt, messages, omittedTurns, estimatedTokens };
}

/** Cap a tool result, keeping its shape where possible. */
export function truncateToolResult(result: string, limit: number = MAX_TOOL_RESULT_CHARS): string {
  const bounded = Math.max(limit, MIN_TOOL_RESULT_CHARS);
  if (result.length <= bounded) return result;
  return smartTruncate(result, bounded);
}

// ─── Grouping ───

function toolMessage(turn: Turn, maxResult: number): ChatMessage {
  return { role: 'tool', content: truncateToolResult(turn.content, maxResult), tool_call_id: turn.callId ?? '' };
}

function orphanResult(turn: Turn, maxResult: number): ChatMessage {
  const label = turn.toolName ?? (turn.role === 'peer' ? 'peer call' : 'tool');
  return { role: 'user', content: `[Result of ${label}]: ${truncateToolResult(turn.content, maxResult)}` };
}

function groupTurns(turns: readonly Turn[], maxResult: number): TurnGroup[] {
  const groups: TurnGroup[] = [];
  let i = 0;
  while (i < turns.length) {
    const turn = turns[i];
    if (turn.role === 'agent' && turn.toolCalls && turn.toolCalls.length > 0) {
      const callIds = new Set(turn.toolCalls.map(tc => tc.id));
      const group: TurnGroup = {
        messages: [{ role: 'assistant', content: turn.content, tool_calls: [...turn.toolCalls] }],
        turnCount: 1,
        isUser: false,
      };
      i++;
      while (i < turns.length && isResult(turns[i]) && callIds.has(turns[i].callId ?? '')) {
        group.messages.push(toolMessage(turns[i], maxResult));
        group.turnCount++;
        i++;
      }
      groups.push(group);
      continue;
    }

    if (turn.role === 'agent') {
      groups.push({ messages: [{ role: 'assistant', content: turn.content }], turnCount: 1, isUser: false });
    } else if (turn.role === 'user') {
      groups.push({ messages: [{ role: 'user', content: turn.content }], turnCount: 1, isUser: true });
    } else {
      groups.push({ messages: [orphanResult(turn, maxResult)], turnCount: 1, isUser: false });
    }
    i++;
  }
  return groups;
}

/** Split what is left of the budget evenly across a group's tool results. */
function shrinkResults(group: TurnGroup, charsAvailable: number): TurnGroup {
  const results = group.messages.filter(m => m.role === 'tool').length;
  if (results === 0) return group;
  const fixed = messagesChars(group.messages.filter(m => m.role !== 'tool'));
  const share = Math.floor(Math.max(charsAvailable - fixed, 0) / results);
  return {
    ...group,
    messages: group.messages.map(m => m.role === 'tool' ? { ...m, content: truncateToolResult(m.content, share) } : m),
  };
}

function isResult(turn: Turn): boolean {
  return turn.role === 'tool' || turn.role === 'peer';
}

// ─── Estimation ───

function estimateTokens(chars: number, charsPerToken: number): number {
  return Math.ceil(chars / charsPerToken);
}

function messageChars(m: ChatMessage): number {
  let chars = m.content.length;
  if (m.tool_calls && m.tool_calls.length > 0) chars += JSON.stringify(m.tool_calls).length;
  return chars;
}

function messagesChars(messages: ChatMessage[]): number {
  return messages.reduce((sum, m) => sum + messageChars(m), 0);
}

function groupTokens(group: TurnGroup, charsPerToken: number): number {
  return estimateTokens(messagesChars(group.messages), charsPerToken);
}

// ─── Truncation ───

/**
 * Smart truncation: preserves structure based on content type.
 * - JSON arrays → keep head + tail items
 * - Multi-line → keep 60% head + 30% tail
 * - Fallback → hard cut with notice
 */
export function smartTruncate(text: string, limit: number): string {
  const notice = `\n...(truncated from ${text.length} chars)`;
  const usable = limit - notice.length;
  if (usable <= 0) return text.slice(0, limit);

  if (text.trimStart().startsWith('[')) {
    const arr = parseJsonArray(text);
    if (arr && arr.length > 2) {
      const headCount = Math.ceil(arr.length * 0.6);
      const tailCount = Math.max(1, Math.floor(arr.length * 0.3));
      const result = JSON.stringify([...arr.slice(0, headCount), `... (${arr.length - headCount - tailCount} items omitted)`, ...arr.slice(-tailCount)]);
      if (result.length <= limit) return result;
      const minHead = Math.min(3, arr.length);
      const minTail = Math.min(2, arr.length - minHead);
      const small = JSON.stringify([
        ...arr.slice(0, minHead),
        `... (${arr.length - minHead - minTail} items omitted)`,
        ...arr.slice(arr.length - minTail),
      ]);
      if (small.length <= limit) return small;
    }
  }

  const lines = text.split('\n');
  if (lines.length > 5) {
    const headLines = Math.ceil(lines.length * 0.6);
    const tailLines = Math.max(1, Math.floor(lines.length * 0.3));
    const combined = lines.slice(0, headLines).join('\n')
      + `\n... (${lines.length - headLines - tailLines} lines omitted)\n`
      + lines.slice(-tailLines).join('\n');
    if (combined.length <= limit) return combined;
  }

  return text.slice(0, usable) + notice;
}

function parseJsonArray(text: string): unknown[] | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return Array.isArray(parsed) ? parsed : null;
  } catch {
    return null;
  }
}
