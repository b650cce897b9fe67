import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SessionManager } from '../session/session-manager.js';
import { ConversationLockTimeoutError } from '../core/errors.js';

describe('SessionManager', () => {
  let clock: number;
  let sessions: SessionManager;

  beforeEach(() => {
    clock = 1_000;
    sessions = new SessionManager({ idleTimeoutMs: 1_000, sweepIntervalMs: 60_000, lockTimeoutMs: 200, now: () => clock });
  });

  afterEach(() => {
    sessions.stop();
  });

  describe('acquire / release', () => {
    it('grants a free conversation immediately and marks it running', async () => {
      const handle = await sessions.acquire('C1:100');
      expect(handle.key).toBe('C1:100');
      expect(handle.conversation.status).toBe('running');
      expect(sessions.isLocked('C1:100')).toBe(true);

      sessions.release(handle);
      expect(sessions.isLocked('C1:100')).toBe(false);
      expect(sessions.get('C1:100')?.status).toBe('idle');
    });

    it('hands the conversation to waiters in arrival order', async () => {
      const first = await sessions.acquire('k');
      const order: string[] = [];
      const second = sessions.acquire('k').then(h => { order.push('second'); return h; });
      const third = sessions.acquire('k').then(h => { order.push('third'); return h; });

      expect(sessions.list()[0]?.queued).toBe(2);

      sessions.release(first);
      const h2 = await second;
      expect(order).toEqual(['second']);

      sessions.release(h2);
      const h3 = await third;
      expect(order).toEqual(['second', 'third']);
      expect(h3.conversation).toBe(first.conversation);
      sessions.release(h3);
    });

    it('keeps different keys independent', async () => {
      const a = await sessions.acquire('a');
      const b = await sessions.acquire('b');
      expect(sessions.isLocked('a')).toBe(true);
      expect(sessions.isLocked('b')).toBe(true);
      sessions.release(a);
      sessions.release(b);
    });

    it('rejects a waiter whose wait runs out', async () => {
      const held = await sessions.acquire('k');
      await expect(sessions.acquire('k', 20)).rejects.toBeInstanceOf(ConversationLockTimeoutError);
      expect(sessions.list()[0]?.queued).toBe(0);
      sessions.release(held);
    });

    it('rejects at once with a zero wait when busy', async () => {
      const held = await sessions.acquire('k');
      const err = await sessions.acquire('k', 0).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ConversationLockTimeoutError);
      expect(err).toMatchObject({ code: 'CONVERSATION_LOCK_TIMEOUT', conversationKey: 'k', waitedMs: 0 });
      sessions.release(held);
    });

    it('ignores a repeated or stale release', async () => {
      const first = await sessions.acquire('k');
      sessions.release(first);
      const second = await sessions.acquire('k');

      sessions.release(first);
      expect(sessions.isLocked('k')).toBe(true);

      sessions.release(second);
      sessions.release(second);
      expect(sessions.isLocked('k')).toBe(false);
    });

    it('withConversation releases when the callback throws', async () => {
      await expect(sessions.withConversation('k', async () => {
        throw new Error('boom');
      })).rejects.toThrow('boom');
      expect(sessions.isLocked('k')).toBe(false);
    });
  });

  describe('close', () => {
    it('supersedes the holder and drops the conversation on release', async () => {
      const handle = await sessions.acquire('k');
      expect(sessions.close('k')).toBe(true);
      expect(sessions.isSuperseded(handle)).toBe(true);

      sessions.release(handle);
      expect(sessions.get('k')).toBeUndefined();
      expect(sessions.size).toBe(0);
    });

    it('gives a queued waiter a fresh conversation', async () => {
      const handle = await sessions.acquire('k');
      handle.conversation.append({ role: 'user', content: 'old' });
      const next = sessions.acquire('k');

      sessions.close('k');
      sessions.release(handle);
      const fresh = await next;

      expect(fresh.conversation).not.toBe(handle.conversation);
      expect(fresh.conversation.turns).toHaveLength(0);
      expect(sessions.isSuperseded(fresh)).toBe(false);
      sessions.release(fresh);
    });

    it('returns false for an unknown key', () => {
      expect(sessions.close('nope')).toBe(false);
    });
  });

  describe('sweep', () => {
    it('evicts conversations idle past the timeout', async () => {
      const handle = await sessions.acquire('k');
      sessions.release(handle);

      expect(sessions.sweep(clock + 999)).toBe(0);
      expect(sessions.sweep(clock + 1_000)).toBe(1);
      expect(sessions.get('k')).toBeUndefined();
    });

    it('never evicts a held conversation', async () => {
      const handle = await sessions.acquire('k');
      expect(sessions.sweep(clock + 10_000)).toBe(0);
      expect(sessions.isSuperseded(handle)).toBe(false);
      sessions.release(handle);
    });
  });

  it('summarises live conversations', async () => {
    const handle = await sessions.acquire('C9:42');
    handle.conversation.append({ role: 'user', content: 'hi' });

    expect(sessions.list()).toEqual([
      expect.objectContaining({ key: 'C9:42', status: 'running', turns: 1, locked: true, queued: 0 }),
    ]);
    sessions.release(handle);
  });
});
