import type { AgentConfig } from '../core/config.js';
import { PeerUnavailableError } from '../core/errors.js';
import { log } from '../core/logger.js';
import type { PeerCaller } from '../peer/peer-session.js';
import type { ToolDefinition } from '../models/provider.js';
import type { ToolHandler, ToolRegistry } from './tool-registry.js';
import { ASK_AGENT_TOOL, GITHUB_TOOLS, SEARCH_TOOLS, WEB_TOOLS, requireString } from './tools.js';
import { createSearchHandlers, createWebHandlers, type FetchLike } from './web.js';
import { createGitHubHandlers } from './github.js';

// ═══════════════════════════════════════════════════════════════════
// ask_agent: plain message to another agent, answer awaited
// ═══════════════════════════════════════════════════════════════════

export function createAskAgentHandler(getPeer: () => PeerCaller | null): ToolHandler {
  return async (input, ctx) => {
    const agentId = requireString('ask_agent', input, 'agentId');
    const message = requireString('ask_agent', input, 'message');
    const peer = getPeer();
    if (!peer) throw new PeerUnavailableError('No coordination network connection is configured');

    const call = peer.call({ agentId }, { message, conversationKey: ctx.conversationKey }, ctx.deadline);
    const outcome = await call.result;
    switch (outcome.kind) {
      case 'success':
        return outcome.payload;
      case 'failure':
        throw new Error(`agent "${agentId}" failed: ${outcome.reason}`);
      case 'timeout':
        throw new Error(`agent "${agentId}" did not answer in time`);
    }
  };
}

// ═══════════════════════════════════════════════════════════════════
// REGISTRATION
// ═══════════════════════════════════════════════════════════════════

function registerAll(registry: ToolRegistry, defs: ToolDefinition[], handlers: Record<string, ToolHandler>): void {
  for (const def of defs) {
    const handler = handlers[def.name];
    if (!handler) throw new Error(`No handler for built-in tool "${def.name}"`);
    registry.register(def, handler);
  }
}

/** Register every built-in capability the configuration enables. */
export function registerBuiltinTools(
  registry: ToolRegistry,
  config: Readonly<AgentConfig>,
  deps: { getPeer: () => PeerCaller | null; fetch?: FetchLike },
): string[] {
  const { tools } = config;

  if (tools.search.enabled) {
    registerAll(registry, SEARCH_TOOLS, createSearchHandlers({ timeoutMs: tools.web.timeoutMs, maxResults: tools.search.maxResults, fetch: deps.fetch }));
  }
  if (tools.web.enabled) {
    registerAll(registry, WEB_TOOLS, createWebHandlers({ timeoutMs: tools.web.timeoutMs, maxLength: tools.web.maxLength, fetch: deps.fetch }));
  }
  if (tools.github.token) {
    registerAll(registry, GITHUB_TOOLS, createGitHubHandlers(tools.github.token));
  }
  if (config.peer.enabled) {
    registry.register(ASK_AGENT_TOOL, createAskAgentHandler(deps.getPeer));
  }

  const names = registry.localDefinitions().map(d => d.name);
  log('info', 'Built-in tools registered', { count: names.length, tools: names.join(', ') });
  return names;
}
