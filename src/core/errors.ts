// ─── Error taxonomy ─────────────────────────────────────────────────
// Every failure the orchestration loop can meet has a class here. Only
// PeerSessionFatalError (and ConfigError, in config.ts) ever leaves the
// process entry point; the rest end as a reply or a failed ToolCallResult.

export type AgentErrorCode =
  | 'MODEL_UNAVAILABLE'
  | 'UNKNOWN_TOOL'
  | 'TOOL_EXECUTION_FAILURE'
  | 'PEER_UNAVAILABLE'
  | 'PEER_SESSION_FATAL'
  | 'CONVERSATION_LOCK_TIMEOUT';

export abstract class AgentError extends Error {
  abstract readonly code: AgentErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Model endpoint timed out or failed at the transport level. Transient. */
export class ModelUnavailableError extends AgentError {
  readonly code = 'MODEL_UNAVAILABLE';
}

export class UnknownToolError extends AgentError {
  readonly code = 'UNKNOWN_TOOL';

  constructor(readonly toolName: string) {
    super(`Unknown tool: ${toolName}`);
  }
}

export class ToolExecutionError extends AgentError {
  readonly code = 'TOOL_EXECUTION_FAILURE';

  constructor(readonly toolName: string, reason: string, options?: { cause?: unknown }) {
    super(`Tool "${toolName}" failed: ${reason}`, options);
  }
}

/** Outbound peer call refused because the session is not open. */
export class PeerUnavailableError extends AgentError {
  readonly code = 'PEER_UNAVAILABLE';
}

/** Auth rejected or reconnect attempts exhausted. */
export class PeerSessionFatalError extends AgentError {
  readonly code = 'PEER_SESSION_FATAL';
}

export class ConversationLockTimeoutError extends AgentError {
  readonly code = 'CONVERSATION_LOCK_TIMEOUT';

  constructor(readonly conversationKey: string, readonly waitedMs: number) {
    super(`Conversation "${conversationKey}" stayed busy for ${waitedMs}ms`);
  }
}

export function isAgentError(err: unknown): err is AgentError {
  return err instanceof AgentError;
}

/** One-line reason string for any thrown value. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}
