import type { ToolCall } from '../models/provider.js';

export type ConversationStatus = 'idle' | 'running' | 'awaiting-tool' | 'awaiting-peer' | 'closed';

export type TurnRole = 'user' | 'agent' | 'tool' | 'peer';

export interface Turn {
  readonly role: TurnRole;
  readonly content: string;
  readonly timestamp: number;
  /** Links a tool/peer result to the request that produced it. */
  readonly correlationId?: string;
  /** The model's own id for the call, echoed back so results pair with requests. */
  readonly callId?: string;
  readonly toolName?: string;
  /** Set on agent turns that requested tools. */
  readonly toolCalls?: readonly ToolCall[];
  /** Sender identity (Slack user, peer agent id). */
  readonly sender?: string;
}

export type NewTurn = Omit<Turn, 'timestamp'> & { timestamp?: number };

export class Conversation {
  readonly createdAt: number;
  lastActivityAt: number;
  status: ConversationStatus = 'idle';
  private readonly history: Turn[] = [];

  constructor(readonly key: string, now: number = Date.now()) {
    this.createdAt = now;
    this.lastActivityAt = now;
  }

  get turns(): readonly Turn[] {
    return this.history;
  }

  /** Only the holder of the conversation's handle appends; turns are frozen once in. */
  append(turn: NewTurn): Turn {
    if (this.status === 'idle' || this.status === 'closed') {
      throw new Error(`Cannot append to ${this.status} conversation "${this.key}"`);
    }
    const frozen: Turn = Object.freeze({
      ...turn,
      timestamp: turn.timestamp ?? Date.now(),
      ...(turn.toolCalls && { toolCalls: Object.freeze([...turn.toolCalls]) }),
    });
    this.history.push(frozen);
    this.lastActivityAt = frozen.timestamp;
    return frozen;
  }

  touch(now: number = Date.now()): void {
    this.lastActivityAt = now;
  }
}
