import type { ToolDefinition } from '../models/provider.js';
import { worldClock } from './clock.js';
import { log } from '../core/logger.js';

const MAX_TOOL_ENTRIES = 40;
const MAX_DESCRIPTION_LENGTH = 100;

function coreInstructions(name: string): string {
  return `You are a versatile AI assistant named ${name}.
Provide concise, relevant assistance tailored to each request.

This is a private thread between you and the person (or agent) writing to you.

Context is sent in order, with the most recent message last.
Do not respond to earlier messages in the context; they have already been answered.

Use the appropriate tools to give more accurate and helpful answers. You can call several
tools in parallel, and plan to call more in later steps when one result feeds the next.
Pick the right tool for each task. If a tool fails, read its error and adapt rather than
repeating the same call.

When discussing times or scheduling, be aware of the user's likely time zone and give
conversions when they help.

Be professional and friendly.
Don't ask for clarification unless absolutely necessary.
Don't ask questions in your response.
Don't use user names in your response.`;
}

const PEER_RULES = `## Coordination Network
You are one agent on a network of cooperating agents.
- Tools named \`peer_<agent>_<tool>\` run on another agent; \`ask_agent\` sends another agent a plain message and waits for its answer.
- When another agent asks you for something, your final answer is sent back to it directly. Answer the request; do not greet or address the network.`;

/** First line of each description, shortened. */
export function toolSection(tools: ToolDefinition[]): string {
  if (tools.length === 0) return '';
  const entries = tools.slice(0, MAX_TOOL_ENTRIES).map(t => {
    const firstLine = t.description.split('\n')[0].trim();
    const desc = firstLine.length > MAX_DESCRIPTION_LENGTH ? firstLine.slice(0, MAX_DESCRIPTION_LENGTH) + '...' : firstLine;
    return `- \`${t.name}\`: ${desc}`;
  });
  const overflow = tools.length > MAX_TOOL_ENTRIES ? `\n(${tools.length - MAX_TOOL_ENTRIES} more)` : '';
  return `## Available Tools\n${entries.join('\n')}${overflow}`;
}

export interface PromptInputs {
  agentName: string;
  instructions?: string;
  tools: ToolDefinition[];
  peerEnabled: boolean;
  now?: Date;
}

/** Rebuilt per round: the clock moves and the peer catalogue can change. */
export function buildSystemPrompt(inputs: PromptInputs): string {
  const extra = inputs.instructions?.trim() ?? '';
  const parts = [
    coreInstructions(inputs.agentName),
    `## Current times around the world\n${worldClock(inputs.now)}`,
    toolSection(inputs.tools),
    inputs.peerEnabled ? PEER_RULES : '',
    extra ? `## Additional Instructions\n${extra}` : '',
  ].filter(Boolean);

  const prompt = parts.join('\n\n');
  log('debug', 'System prompt assembled', { totalLength: prompt.length, tools: inputs.tools.length });
  return prompt;
}
