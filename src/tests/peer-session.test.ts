import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  PeerSessionClient,
  type PeerSessionOptions,
  type PeerSessionState,
  type PeerSocketFactory,
  type PeerSocketHandlers,
} from '../peer/peer-session.js';
import type { PeerToolInfo, RequestFrame } from '../peer/protocol.js';
import { PeerSessionFatalError, PeerUnavailableError } from '../core/errors.js';

interface FakeSocket {
  url: string;
  handlers: PeerSocketHandlers;
  sent: string[];
  closed: { code?: number; reason?: string } | null;
  failSends: boolean;
}

const LOCAL_TOOL: PeerToolInfo = { agentId: 'slack-agent', name: 'web_search', description: 'Search', inputSchema: { type: 'object' } };

function harness(overrides: Partial<PeerSessionOptions> = {}) {
  const sockets: FakeSocket[] = [];
  const socketFactory: PeerSocketFactory = (url, handlers) => {
    const socket: FakeSocket = { url, handlers, sent: [], closed: null, failSends: false };
    sockets.push(socket);
    return {
      send: data => {
        if (socket.failSends) throw new Error('socket not writable');
        socket.sent.push(data);
      },
      close: (code, reason) => { socket.closed = { code, reason }; },
    };
  };
  const client = new PeerSessionClient({
    url: 'ws://coral.test/ws',
    agentId: 'slack-agent',
    connectTimeoutMs: 1_000,
    heartbeatIntervalMs: 60_000,
    heartbeatTimeoutMs: 1_000,
    reconnect: { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 5, multiplier: 1, jitter: 0 },
    socketFactory,
    localTools: () => [LOCAL_TOOL],
    ...overrides,
  });
  return { client, sockets };
}

function frames(socket: FakeSocket): unknown[] {
  return socket.sent.map((text): unknown => JSON.parse(text));
}

function lastFrame(socket: FakeSocket): unknown {
  const text = socket.sent[socket.sent.length - 1];
  return text === undefined ? undefined : JSON.parse(text);
}

function socketAt(sockets: FakeSocket[], index: number): FakeSocket {
  const socket = sockets[index];
  if (!socket) throw new Error(`no socket #${index}`);
  return socket;
}

async function openSession(h: ReturnType<typeof harness>, tools: PeerToolInfo[] = []): Promise<FakeSocket> {
  const opened = h.client.connect();
  const socket = socketAt(h.sockets, 0);
  socket.handlers.onOpen();
  socket.handlers.onMessage(JSON.stringify({ type: 'welcome', sessionId: 'sess-1', tools }));
  await opened;
  return socket;
}

describe('PeerSessionClient', () => {
  let clients: PeerSessionClient[] = [];

  function track(h: ReturnType<typeof harness>): ReturnType<typeof harness> {
    clients.push(h.client);
    return h;
  }

  afterEach(() => {
    for (const c of clients) c.close();
    clients = [];
  });

  describe('handshake', () => {
    it('announces itself with its local tools once the socket opens', async () => {
      const h = track(harness());
      const socket = await openSession(h);

      expect(socket.url).toBe('ws://coral.test/ws');
      expect(frames(socket)[0]).toEqual({ type: 'hello', agentId: 'slack-agent', tools: [LOCAL_TOOL] });
      expect(h.client.state).toBe('open');
    });

    it('includes the runtime when configured', async () => {
      const h = track(harness({ runtime: 'docker' }));
      const socket = await openSession(h);
      expect(frames(socket)[0]).toMatchObject({ type: 'hello', runtime: 'docker' });
    });

    it('publishes the peer catalogue without its own tools', async () => {
      const h = track(harness());
      const seen: PeerToolInfo[][] = [];
      h.client.onTools(tools => seen.push(tools));
      const calc: PeerToolInfo = { agentId: 'calc', name: 'add', description: 'Add', inputSchema: { type: 'object' } };

      await openSession(h, [calc, LOCAL_TOOL]);

      expect(h.client.tools).toEqual([calc]);
      expect(seen).toEqual([[calc]]);
    });

    it('replaces the catalogue on a tools frame', async () => {
      const h = track(harness());
      const socket = await openSession(h);
      socket.handlers.onMessage(JSON.stringify({ type: 'tools', tools: [{ agentId: 'gh', name: 'search' }] }));
      expect(h.client.tools).toEqual([
        { agentId: 'gh', name: 'search', description: '', inputSchema: { type: 'object', properties: {} } },
      ]);
    });

    it('goes fatal when the server rejects the credentials', async () => {
      const h = track(harness());
      const fatal: PeerSessionFatalError[] = [];
      h.client.onFatal(err => fatal.push(err));

      const opened = h.client.connect();
      socketAt(h.sockets, 0).handlers.onClose(4401, 'bad token');

      await expect(opened).rejects.toBeInstanceOf(PeerSessionFatalError);
      expect(h.client.state).toBe('closed');
      expect(fatal.map(e => e.message)).toEqual([
        'Peer session failed: authentication rejected by coordination server: bad token',
      ]);
    });

    it('goes fatal on a fatal error frame', async () => {
      const h = track(harness());
      const socket = await openSession(h);
      socket.handlers.onMessage(JSON.stringify({ type: 'error', message: 'kicked', fatal: true }));
      expect(h.client.state).toBe('closed');
      expect(socket.closed).toEqual({ code: 1000, reason: 'fatal' });
    });
  });

  describe('calls', () => {
    it('refuses to call before the session is open', () => {
      const h = track(harness());
      expect(() => h.client.call({ agentId: 'calc', tool: 'add' }, {}, Date.now() + 1_000)).toThrow(PeerUnavailableError);
    });

    it('sends a call frame and settles it on the matching result', async () => {
      const h = track(harness());
      const socket = await openSession(h);
      const deadline = Date.now() + 5_000;

      const call = h.client.call({ agentId: 'calc', tool: 'add' }, { arguments: { a: 1, b: 2 } }, deadline);

      expect(lastFrame(socket)).toEqual({
        type: 'call',
        correlationId: call.correlationId,
        target: 'calc',
        tool: 'add',
        payload: { arguments: { a: 1, b: 2 } },
        deadline,
      });
      expect(h.client.pendingCount).toBe(1);

      socket.handlers.onMessage(JSON.stringify({ type: 'result', correlationId: call.correlationId, ok: true, payload: { sum: 3 } }));

      await expect(call.result).resolves.toEqual({ kind: 'success', payload: '{"sum":3}' });
      expect(h.client.pendingCount).toBe(0);
    });

    it('turns a failed result into a failure outcome', async () => {
      const h = track(harness());
      const socket = await openSession(h);
      const call = h.client.call({ agentId: 'calc' }, 'hi', Date.now() + 5_000);

      socket.handlers.onMessage(JSON.stringify({ type: 'result', correlationId: call.correlationId, ok: false, error: 'division by zero' }));

      await expect(call.result).resolves.toEqual({ kind: 'failure', reason: 'division by zero' });
    });

    it('settles a call from a non-fatal error frame carrying its id', async () => {
      const h = track(harness());
      const socket = await openSession(h);
      const call = h.client.call({ agentId: 'calc' }, 'hi', Date.now() + 5_000);

      socket.handlers.onMessage(JSON.stringify({ type: 'error', message: 'unknown agent', correlationId: call.correlationId }));

      await expect(call.result).resolves.toEqual({ kind: 'failure', reason: 'unknown agent' });
      expect(h.client.state).toBe('open');
    });

    it('drops a result nobody is waiting for', async () => {
      const h = track(harness());
      const socket = await openSession(h);
      const call = h.client.call({ agentId: 'calc' }, 'hi', Date.now() + 5_000);

      socket.handlers.onMessage(JSON.stringify({ type: 'result', correlationId: 'someone-else', ok: true, payload: 'x' }));

      expect(h.client.pendingCount).toBe(1);
      socket.handlers.onMessage(JSON.stringify({ type: 'result', correlationId: call.correlationId, ok: true, payload: 'mine' }));
      await expect(call.result).resolves.toEqual({ kind: 'success', payload: 'mine' });
    });

    it('times out a call at its deadline', async () => {
      const h = track(harness());
      await openSession(h);
      const call = h.client.call({ agentId: 'slow' }, 'hi', Date.now() + 20);

      await expect(call.result).resolves.toEqual({ kind: 'timeout' });
      expect(h.client.pendingCount).toBe(0);
    });

    it('times out at once when the deadline already passed', async () => {
      const h = track(harness());
      const socket = await openSession(h);
      const sentBefore = socket.sent.length;

      const call = h.client.call({ agentId: 'calc' }, 'hi', Date.now() - 1);

      await expect(call.result).resolves.toEqual({ kind: 'timeout' });
      expect(socket.sent).toHaveLength(sentBefore);
    });

    it('leaves no pending entry behind after concurrent calls that succeed or time out', async () => {
      const h = track(harness());
      const socket = await openSession(h);

      const calls = [0, 1, 2, 3, 4, 5].map(i =>
        h.client.call({ agentId: 'calc' }, `q${i}`, Date.now() + (i % 2 === 0 ? 5_000 : 20)));
      expect(new Set(calls.map(c => c.correlationId)).size).toBe(6);
      expect(h.client.pendingCount).toBe(6);

      calls.filter((_, i) => i % 2 === 0).forEach(c => {
        socket.handlers.onMessage(JSON.stringify({ type: 'result', correlationId: c.correlationId, ok: true, payload: 'ok' }));
      });
      const outcomes = await Promise.all(calls.map(c => c.result));

      expect(outcomes.map(o => o.kind)).toEqual(['success', 'timeout', 'success', 'timeout', 'success', 'timeout']);
      expect(h.client.pendingCount).toBe(0);
    });

    it('fails pending calls when the session closes', async () => {
      const h = track(harness());
      await openSession(h);
      const call = h.client.call({ agentId: 'calc' }, 'hi', Date.now() + 5_000);

      h.client.close();

      await expect(call.result).resolves.toEqual({ kind: 'failure', reason: 'peer session closed' });
      expect(h.client.state).toBe('closed');
    });
  });

  describe('inbound requests', () => {
    it('hands requests to the registered handler', async () => {
      const h = track(harness());
      const seen: RequestFrame[] = [];
      h.client.onRequest(frame => seen.push(frame));
      const socket = await openSession(h);

      socket.handlers.onMessage(JSON.stringify({ type: 'request', correlationId: 'r1', senderAgentId: 'planner', payload: { message: 'hi' } }));

      expect(seen).toEqual([{
        type: 'request',
        correlationId: 'r1',
        senderAgentId: 'planner',
        payload: { message: 'hi' },
        toolName: undefined,
        threadId: undefined,
      }]);
    });

    it('refuses requests when no handler is registered', async () => {
      const h = track(harness());
      const socket = await openSession(h);

      socket.handlers.onMessage(JSON.stringify({ type: 'request', correlationId: 'r1', senderAgentId: 'planner', payload: 'hi' }));

      expect(lastFrame(socket)).toEqual({ type: 'response', correlationId: 'r1', ok: false, error: 'agent is not accepting requests' });
    });

    it('sends responses only while open', async () => {
      const h = track(harness());
      expect(h.client.respond('r0', { ok: true, payload: 'early' })).toBe(false);

      const socket = await openSession(h);
      expect(h.client.respond('r1', { ok: true, payload: 'done' })).toBe(true);
      expect(lastFrame(socket)).toEqual({ type: 'response', correlationId: 'r1', ok: true, payload: 'done' });
    });

    it('reports a response it could not write', async () => {
      const h = track(harness());
      const socket = await openSession(h);
      socket.failSends = true;

      expect(h.client.respond('r1', { ok: true, payload: 'done' })).toBe(false);
      expect(h.client.state).toBe('open');
    });

    it('answers a ping with a pong', async () => {
      const h = track(harness());
      const socket = await openSession(h);
      socket.handlers.onMessage(JSON.stringify({ type: 'ping', ts: 42 }));
      expect(lastFrame(socket)).toEqual({ type: 'pong', ts: 42 });
    });

    it('ignores frames it cannot decode', async () => {
      const h = track(harness());
      const socket = await openSession(h);
      const sentBefore = socket.sent.length;
      socket.handlers.onMessage('not json');
      socket.handlers.onMessage(JSON.stringify({ type: 'mystery' }));
      expect(socket.sent).toHaveLength(sentBefore);
      expect(h.client.state).toBe('open');
    });
  });

  describe('connection loss', () => {
    it('degrades, reconnects and reopens', async () => {
      const h = track(harness());
      const states: PeerSessionState[] = [];
      h.client.onStateChange(s => states.push(s));
      const first = await openSession(h);
      const call = h.client.call({ agentId: 'calc' }, 'hi', Date.now() + 5_000);

      first.handlers.onClose(1006, '');

      expect(h.client.state).toBe('degraded');
      expect(first.closed).toEqual({ code: 1001, reason: 'reconnecting' });
      await expect(call.result).resolves.toEqual({ kind: 'failure', reason: 'peer connection lost: socket closed (1006)' });
      expect(() => h.client.call({ agentId: 'calc' }, 'hi', Date.now() + 1_000)).toThrow(PeerUnavailableError);

      await vi.waitFor(() => expect(h.sockets).toHaveLength(2));
      const second = socketAt(h.sockets, 1);
      second.handlers.onOpen();
      second.handlers.onMessage(JSON.stringify({ type: 'welcome', sessionId: 'sess-2', tools: [] }));

      expect(h.client.state).toBe('open');
      expect(states).toEqual(['open', 'degraded', 'open']);
    });

    it('degrades when a ping goes unanswered', async () => {
      const h = track(harness({ heartbeatIntervalMs: 10, heartbeatTimeoutMs: 10 }));
      const socket = await openSession(h);

      await vi.waitFor(() => expect(h.client.state).toBe('degraded'));

      expect(frames(socket)).toContainEqual({ type: 'ping', ts: expect.any(Number) });
      expect(socket.closed).toEqual({ code: 1001, reason: 'reconnecting' });
      expect(() => h.client.call({ agentId: 'calc' }, 'hi', Date.now() + 1_000)).toThrow(PeerUnavailableError);
    });

    it('stays open while pings are answered', async () => {
      const h = track(harness({ heartbeatIntervalMs: 10, heartbeatTimeoutMs: 30 }));
      const socket = await openSession(h);
      const answered = new Set<number>();

      const pongs = setInterval(() => {
        socket.sent.forEach((text, index) => {
          if (answered.has(index)) return;
          const frame: unknown = JSON.parse(text);
          if (typeof frame === 'object' && frame !== null && Reflect.get(frame, 'type') === 'ping') {
            answered.add(index);
            socket.handlers.onMessage(JSON.stringify({ type: 'pong', ts: Reflect.get(frame, 'ts') }));
          }
        });
      }, 2);
      await new Promise(resolve => setTimeout(resolve, 80));
      clearInterval(pongs);

      expect(answered.size).toBeGreaterThan(0);
      expect(h.client.state).toBe('open');
    });

    it('ignores late events from a replaced socket', async () => {
      const h = track(harness());
      const first = await openSession(h);
      first.handlers.onClose(1006, '');
      await vi.waitFor(() => expect(h.sockets).toHaveLength(2));

      first.handlers.onMessage(JSON.stringify({ type: 'welcome', sessionId: 'stale', tools: [] }));

      expect(h.client.state).toBe('degraded');
    });

    it('goes fatal once reconnect attempts are exhausted', async () => {
      const h = track(harness({ reconnect: { maxAttempts: 0, baseDelayMs: 1, maxDelayMs: 5, multiplier: 1, jitter: 0 } }));
      const fatal: string[] = [];
      h.client.onFatal(err => fatal.push(err.message));
      const socket = await openSession(h);

      socket.handlers.onError(new Error('ECONNRESET'));

      expect(h.client.state).toBe('closed');
      expect(fatal).toEqual(['Peer session failed: reconnect attempts exhausted after 0']);
    });
  });
});
