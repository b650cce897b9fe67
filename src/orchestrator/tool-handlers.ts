import type { LocalTool, PeerTool, ToolCallRequest, ToolCallResult, ToolRegistry } from '../tools/tool-registry.js';
import type { PeerCaller } from '../peer/peer-session.js';
import { describeError } from '../core/errors.js';
import { log } from '../core/logger.js';

/** Where an invocation goes, decided once by registry lookup. */
export type DispatchTarget =
  | { kind: 'local'; tool: LocalTool }
  | { kind: 'peer'; tool: PeerTool };

/** Throws UnknownToolError for names neither registered locally nor offered by a peer. */
export function resolveTarget(registry: ToolRegistry, toolName: string): DispatchTarget {
  const tool = registry.lookup(toolName);
  switch (tool.kind) {
    case 'local':
      return { kind: 'local', tool };
    case 'peer':
      return { kind: 'peer', tool };
  }
}

/**
 * Run one invocation against its target. Always resolves with a result for
 * `request.correlationId`; peer unavailability and handler errors become
 * failure outcomes.
 */
export async function dispatch(
  target: DispatchTarget,
  request: ToolCallRequest,
  deps: { registry: ToolRegistry; peer: PeerCaller | null },
): Promise<ToolCallResult> {
  if (target.kind === 'local') {
    return deps.registry.invoke(target.tool, request);
  }

  const start = Date.now();
  const finish = (outcome: ToolCallResult['outcome']): ToolCallResult => ({
    correlationId: request.correlationId,
    toolName: request.toolName,
    outcome,
    durationMs: Date.now() - start,
  });

  if (!deps.peer) {
    return finish({ kind: 'failure', reason: 'no peer session configured' });
  }

  try {
    const call = deps.peer.call(
      { agentId: target.tool.agentId, tool: target.tool.remoteName },
      { arguments: request.arguments },
      request.deadline,
    );
    log('debug', 'Dispatched to peer', {
      tool: request.toolName,
      correlationId: request.correlationId,
      peerCorrelationId: call.correlationId,
      agentId: target.tool.agentId,
    });
    return finish(await call.result);
  } catch (err) {
    log('warn', 'Peer dispatch refused', { tool: request.toolName, correlationId: request.correlationId, error: describeError(err) });
    return finish({ kind: 'failure', reason: describeError(err) });
  }
}
