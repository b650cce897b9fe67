import { randomUUID } from 'node:crypto';
import WebSocket from 'ws';
import type { RawData } from 'ws';
import {
  decodeFrame,
  encodeFrame,
  type PeerFrame,
  type PeerToolInfo,
  type RequestFrame,
} from './protocol.js';
import type { ToolOutcome } from '../tools/tool-registry.js';
import type { ReconnectConfig } from '../core/config.js';
import { backoffDelay } from '../core/backoff.js';
import { PeerSessionFatalError, PeerUnavailableError, describeError } from '../core/errors.js';
import { log } from '../core/logger.js';
import { PEER_AUTH_FAILURE_CLOSE_CODE } from '../const/constants.js';

// ─── Socket seam ───

export interface PeerSocket {
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

export interface PeerSocketHandlers {
  onOpen(): void;
  onMessage(data: string): void;
  onClose(code: number, reason: string): void;
  onError(err: Error): void;
}

export type PeerSocketFactory = (url: string, handlers: PeerSocketHandlers) => PeerSocket;

function rawToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

export const wsSocketFactory: PeerSocketFactory = (url, handlers) => {
  const ws = new WebSocket(url);
  ws.on('open', () => handlers.onOpen());
  ws.on('message', (data: RawData) => handlers.onMessage(rawToString(data)));
  ws.on('close', (code: number, reason: Buffer) => handlers.onClose(code, reason.toString('utf8')));
  ws.on('error', (err: Error) => handlers.onError(err));
  return {
    send: data => ws.send(data),
    close: (code, reason) => ws.close(code, reason),
  };
};

// ─── Types ───

export type PeerSessionState = 'connecting' | 'open' | 'degraded' | 'closed';

export interface PeerTarget {
  agentId: string;
  /** Omitted for a plain message to the agent */
  tool?: string;
}

export interface PeerCall {
  correlationId: string;
  /** Resolves exactly once; never rejects */
  result: Promise<ToolOutcome>;
}

/** What the rest of the agent needs from the session to call peers. */
export interface PeerCaller {
  readonly state: PeerSessionState;
  call(target: PeerTarget, payload: unknown, deadline: number): PeerCall;
}

export type PeerRequestHandler = (request: RequestFrame) => void;

export interface PeerSessionOptions {
  url: string;
  agentId: string;
  runtime?: string | null;
  connectTimeoutMs: number;
  heartbeatIntervalMs: number;
  heartbeatTimeoutMs: number;
  reconnect: ReconnectConfig;
  socketFactory?: PeerSocketFactory;
  /** Local tools announced to the network in the hello frame */
  localTools?: () => PeerToolInfo[];
}

interface PendingCall {
  target: PeerTarget;
  resolve: (outcome: ToolOutcome) => void;
  timer: NodeJS.Timeout;
}

// ─── Client ───

/**
 * The single connection to the coordination network. Only this class touches
 * the socket: callers go through `call()` / `respond()`, and inbound frames are
 * demultiplexed by correlation id onto the pending map.
 */
export class PeerSessionClient implements PeerCaller {
  private _state: PeerSessionState = 'connecting';
  private socket: PeerSocket | null = null;
  /** Bumped per socket so late events from a replaced socket are ignored */
  private generation = 0;
  private reconnectAttempt = 0;
  private everOpened = false;

  private readonly pending = new Map<string, PendingCall>();
  private peerTools: PeerToolInfo[] = [];

  private connectTimer: NodeJS.Timeout | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private pongTimer: NodeJS.Timeout | null = null;

  private requestHandler: PeerRequestHandler | null = null;
  private readonly stateListeners: Array<(state: PeerSessionState) => void> = [];
  private readonly toolListeners: Array<(tools: PeerToolInfo[]) => void> = [];
  private readonly fatalListeners: Array<(err: PeerSessionFatalError) => void> = [];

  private openWaiters: Array<{ resolve: () => void; reject: (err: Error) => void }> = [];
  private readonly socketFactory: PeerSocketFactory;

  constructor(private readonly opts: PeerSessionOptions) {
    this.socketFactory = opts.socketFactory ?? wsSocketFactory;
  }

  get state(): PeerSessionState {
    return this._state;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  get tools(): readonly PeerToolInfo[] {
    return this.peerTools;
  }

  onRequest(handler: PeerRequestHandler): void {
    this.requestHandler = handler;
  }

  onStateChange(listener: (state: PeerSessionState) => void): void {
    this.stateListeners.push(listener);
  }

  onTools(listener: (tools: PeerToolInfo[]) => void): void {
    this.toolListeners.push(listener);
  }

  onFatal(listener: (err: PeerSessionFatalError) => void): void {
    this.fatalListeners.push(listener);
  }

  /** Resolves once the handshake succeeds; rejects if the session goes fatal first. */
  connect(): Promise<void> {
    if (this._state === 'open') return Promise.resolve();
    if (this._state === 'closed') return Promise.reject(new PeerUnavailableError('Peer session is closed'));
    const opened = new Promise<void>((resolve, reject) => {
      this.openWaiters.push({ resolve, reject });
    });
    if (!this.socket && !this.reconnectTimer) this.openSocket();
    return opened;
  }

  /**
   * Send a call to a peer. Fails fast with PeerUnavailableError unless the
   * session is open; otherwise the returned result settles on the matching
   * result frame, the deadline, or connection loss, whichever comes first.
   */
  call(target: PeerTarget, payload: unknown, deadline: number): PeerCall {
    const socket = this.socket;
    if (this._state !== 'open' || !socket) {
      throw new PeerUnavailableError(`Peer session is ${this._state}; cannot call agent "${target.agentId}"`);
    }

    const correlationId = randomUUID();
    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      return { correlationId, result: Promise.resolve<ToolOutcome>({ kind: 'timeout' }) };
    }

    const result = new Promise<ToolOutcome>(resolve => {
      const timer = setTimeout(() => {
        if (this.settle(correlationId, { kind: 'timeout' })) {
          log('warn', 'Peer call timed out', { correlationId, agentId: target.agentId, tool: target.tool });
        }
      }, remaining);
      this.pending.set(correlationId, { target, resolve, timer });
    });

    try {
      socket.send(encodeFrame({ type: 'call', correlationId, target: target.agentId, tool: target.tool, payload, deadline }));
      log('debug', 'Peer call sent', { correlationId, agentId: target.agentId, tool: target.tool });
    } catch (err) {
      this.settle(correlationId, { kind: 'failure', reason: `send failed: ${describeError(err)}` });
    }
    return { correlationId, result };
  }

  /** Answer an inbound request. Returns false when the session cannot carry it. */
  respond(correlationId: string, outcome: { ok: true; payload: string } | { ok: false; error: string }): boolean {
    if (this._state !== 'open' || !this.socket) {
      log('warn', 'Peer response dropped: session not open', { correlationId, state: this._state });
      return false;
    }
    if (!this.send({ type: 'response', correlationId, ...outcome })) return false;
    log('debug', 'Peer response sent', { correlationId, ok: outcome.ok });
    return true;
  }

  /** Explicit shutdown. Pending calls settle as failures. */
  close(): void {
    if (this._state === 'closed') return;
    this.teardownSocket(1000, 'shutdown');
    this.setState('closed');
    this.failPending('peer session closed');
    this.rejectOpenWaiters(new PeerUnavailableError('Peer session closed before it opened'));
    log('info', 'Peer session closed', { agentId: this.opts.agentId });
  }

  // ─── Connection lifecycle ───

  private openSocket(): void {
    const generation = ++this.generation;
    const current = (): boolean => generation === this.generation;

    log('debug', 'Peer session connecting', { url: this.opts.url, attempt: this.reconnectAttempt });
    this.connectTimer = setTimeout(() => {
      if (!current()) return;
      this.connectionLost('handshake timed out');
    }, this.opts.connectTimeoutMs);

    this.socket = this.socketFactory(this.opts.url, {
      onOpen: () => {
        if (!current()) return;
        this.send({
          type: 'hello',
          agentId: this.opts.agentId,
          ...(this.opts.runtime ? { runtime: this.opts.runtime } : {}),
          tools: this.opts.localTools?.() ?? [],
        });
      },
      onMessage: data => {
        if (!current()) return;
        this.handleFrame(data);
      },
      onClose: (code, reason) => {
        if (!current()) return;
        if (code === PEER_AUTH_FAILURE_CLOSE_CODE) {
          this.fatal(`authentication rejected by coordination server${reason ? `: ${reason}` : ''}`);
          return;
        }
        this.connectionLost(`socket closed (${code}${reason ? ` ${reason}` : ''})`);
      },
      onError: err => {
        if (!current()) return;
        log('warn', 'Peer socket error', { error: err.message });
        this.connectionLost(`socket error: ${err.message}`);
      },
    });
  }

  private handleFrame(data: string): void {
    const frame = decodeFrame(data);
    if (!frame) {
      log('warn', 'Peer frame ignored: unrecognised', { preview: data.slice(0, 120) });
      return;
    }

    switch (frame.type) {
      case 'welcome':
        this.handshakeComplete(frame.sessionId, frame.tools);
        return;
      case 'result': {
        const outcome: ToolOutcome = frame.ok
          ? { kind: 'success', payload: frame.payload ?? '' }
          : { kind: 'failure', reason: frame.error ?? 'peer reported failure' };
        if (!this.settle(frame.correlationId, outcome)) {
          log('warn', 'Peer result with no pending call: dropped', { correlationId: frame.correlationId });
        }
        return;
      }
      case 'request':
        if (!this.requestHandler) {
          log('warn', 'Peer request with no handler: refusing', { correlationId: frame.correlationId });
          this.respond(frame.correlationId, { ok: false, error: 'agent is not accepting requests' });
          return;
        }
        this.requestHandler(frame);
        return;
      case 'tools':
        this.updateTools(frame.tools);
        return;
      case 'ping':
        this.send({ type: 'pong', ts: frame.ts });
        return;
      case 'pong':
        if (this.pongTimer) clearTimeout(this.pongTimer);
        this.pongTimer = null;
        return;
      case 'error':
        if (frame.fatal) {
          this.fatal(frame.message);
        } else if (frame.correlationId) {
          if (!this.settle(frame.correlationId, { kind: 'failure', reason: frame.message })) {
            log('warn', 'Peer error for unknown call: dropped', { correlationId: frame.correlationId, error: frame.message });
          }
        } else {
          log('warn', 'Peer error frame', { error: frame.message });
        }
        return;
      default:
        log('debug', 'Peer frame ignored', { type: frame.type });
    }
  }

  private handshakeComplete(sessionId: string, tools: PeerToolInfo[]): void {
    if (this.connectTimer) clearTimeout(this.connectTimer);
    this.connectTimer = null;
    const wasReconnect = this.everOpened;
    this.everOpened = true;
    this.reconnectAttempt = 0;
    this.setState('open');
    this.startHeartbeat();
    this.updateTools(tools);
    log('info', wasReconnect ? 'Peer session reconnected' : 'Peer session open', { agentId: this.opts.agentId, sessionId, peerTools: tools.length });

    const waiters = this.openWaiters;
    this.openWaiters = [];
    for (const w of waiters) w.resolve();
  }

  private startHeartbeat(): void {
    this.stopHeartbeat();
    this.heartbeatTimer = setInterval(() => {
      if (this._state !== 'open' || this.pongTimer) return;
      this.send({ type: 'ping', ts: Date.now() });
      this.pongTimer = setTimeout(() => {
        this.pongTimer = null;
        this.connectionLost('missed heartbeat');
      }, this.opts.heartbeatTimeoutMs);
    }, this.opts.heartbeatIntervalMs);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) clearInterval(this.heartbeatTimer);
    if (this.pongTimer) clearTimeout(this.pongTimer);
    this.heartbeatTimer = null;
    this.pongTimer = null;
  }

  /** Stream error, close, missed heartbeat or handshake timeout. */
  private connectionLost(reason: string): void {
    if (this._state === 'closed') return;
    this.teardownSocket(1001, 'reconnecting');
    this.failPending(`peer connection lost: ${reason}`);
    if (this.everOpened) this.setState('degraded');
    log('warn', 'Peer connection lost', { reason, state: this._state, attempt: this.reconnectAttempt });
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    const policy = this.opts.reconnect;
    if (this.reconnectAttempt >= policy.maxAttempts) {
      this.fatal(`reconnect attempts exhausted after ${policy.maxAttempts}`);
      return;
    }
    const delay = backoffDelay(this.reconnectAttempt, policy);
    this.reconnectAttempt++;
    log('info', 'Peer reconnect scheduled', { attempt: this.reconnectAttempt, maxAttempts: policy.maxAttempts, delayMs: delay });
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this._state === 'closed') return;
      this.openSocket();
    }, delay);
  }

  private fatal(reason: string): void {
    if (this._state === 'closed') return;
    const err = new PeerSessionFatalError(`Peer session failed: ${reason}`);
    this.teardownSocket(1000, 'fatal');
    this.setState('closed');
    this.failPending(reason);
    log('error', 'Peer session fatal', { agentId: this.opts.agentId, reason });
    this.rejectOpenWaiters(err);
    for (const listener of this.fatalListeners) listener(err);
  }

  private teardownSocket(code: number, reason: string): void {
    this.generation++;
    this.stopHeartbeat();
    if (this.connectTimer) clearTimeout(this.connectTimer);
    if (this.reconnectTimer) clearTimeout(this.reconnectTimer);
    this.connectTimer = null;
    this.reconnectTimer = null;
    const socket = this.socket;
    this.socket = null;
    if (!socket) return;
    try {
      socket.close(code, reason);
    } catch (err) {
      log('debug', 'Peer socket close failed', { error: describeError(err) });
    }
  }

  // ─── Pending map ───

  /** Remove and resolve a pending call. False when the id is not pending. */
  private settle(correlationId: string, outcome: ToolOutcome): boolean {
    const entry = this.pending.get(correlationId);
    if (!entry) return false;
    this.pending.delete(correlationId);
    clearTimeout(entry.timer);
    entry.resolve(outcome);
    return true;
  }

  private failPending(reason: string): void {
    for (const id of [...this.pending.keys()]) {
      this.settle(id, { kind: 'failure', reason });
    }
  }

  // ─── Helpers ───

  private send(frame: PeerFrame): boolean {
    if (!this.socket) return false;
    try {
      this.socket.send(encodeFrame(frame));
      return true;
    } catch (err) {
      log('warn', 'Peer frame send failed', { type: frame.type, error: describeError(err) });
      return false;
    }
  }

  private updateTools(tools: PeerToolInfo[]): void {
    this.peerTools = tools.filter(t => t.agentId !== this.opts.agentId);
    for (const listener of this.toolListeners) listener(this.peerTools);
  }

  private setState(next: PeerSessionState): void {
    if (this._state === next) return;
    const prev = this._state;
    this._state = next;
    log('debug', 'Peer session state', { from: prev, to: next });
    for (const listener of this.stateListeners) listener(next);
  }

  private rejectOpenWaiters(err: Error): void {
    const waiters = this.openWaiters;
    this.openWaiters = [];
    for (const w of waiters) w.reject(err);
  }
}
