import { Conversation, type ConversationStatus } from './conversation.js';
import { ConversationLockTimeoutError } from '../core/errors.js';
import { log } from '../core/logger.js';

// ─── Types ───

export interface ConversationHandle {
  readonly id: number;
  readonly key: string;
  readonly conversation: Conversation;
  readonly acquiredAt: number;
}

export interface ConversationSummary {
  key: string;
  status: ConversationStatus;
  turns: number;
  locked: boolean;
  queued: number;
  createdAt: string;
  lastActivityAt: string;
}

export interface SessionManagerOptions {
  idleTimeoutMs: number;
  sweepIntervalMs: number;
  lockTimeoutMs: number;
  now?: () => number;
}

interface Waiter {
  resolve: (handle: ConversationHandle) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout | null;
}

interface Slot {
  conversation: Conversation;
  holder: ConversationHandle | null;
  queue: Waiter[];
}

// ─── Manager ───

/**
 * Owns every live conversation. At most one handle per key is out at a time;
 * later acquirers queue FIFO until release or their wait times out.
 */
export class SessionManager {
  private readonly slots = new Map<string, Slot>();
  private nextHandleId = 1;
  private sweepTimer: NodeJS.Timeout | null = null;
  private readonly now: () => number;

  constructor(private readonly opts: SessionManagerOptions) {
    this.now = opts.now ?? Date.now;
  }

  start(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => this.sweep(), this.opts.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  stop(): void {
    if (this.sweepTimer) clearInterval(this.sweepTimer);
    this.sweepTimer = null;
    for (const [key, slot] of this.slots) {
      for (const waiter of slot.queue.splice(0)) {
        if (waiter.timer) clearTimeout(waiter.timer);
        waiter.reject(new ConversationLockTimeoutError(key, 0));
      }
    }
  }

  acquire(key: string, timeoutMs: number = this.opts.lockTimeoutMs): Promise<ConversationHandle> {
    const slot = this.slotFor(key);

    if (!slot.holder && slot.queue.length === 0) {
      return Promise.resolve(this.grant(slot));
    }
    if (timeoutMs <= 0) {
      return Promise.reject(new ConversationLockTimeoutError(key, 0));
    }

    log('debug', 'Conversation busy: queued', { conversationKey: key, queued: slot.queue.length + 1 });
    return new Promise<ConversationHandle>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, timer: null };
      waiter.timer = setTimeout(() => {
        const idx = slot.queue.indexOf(waiter);
        if (idx !== -1) slot.queue.splice(idx, 1);
        log('warn', 'Conversation lock wait timed out', { conversationKey: key, waitedMs: timeoutMs });
        reject(new ConversationLockTimeoutError(key, timeoutMs));
      }, timeoutMs);
      slot.queue.push(waiter);
    });
  }

  /** Idempotent: a stale or repeated handle is ignored. */
  release(handle: ConversationHandle): void {
    const slot = this.slots.get(handle.key);
    if (!slot || slot.holder?.id !== handle.id) {
      log('warn', 'Release of a handle that is not held', { conversationKey: handle.key, handleId: handle.id });
      return;
    }

    slot.holder = null;
    const conversation = slot.conversation;
    if (conversation.status === 'closed') {
      if (slot.queue.length === 0) {
        this.slots.delete(handle.key);
        log('debug', 'Closed conversation dropped on release', { conversationKey: handle.key });
        return;
      }
      slot.conversation = new Conversation(handle.key, this.now());
    } else {
      conversation.status = 'idle';
      conversation.touch(this.now());
    }

    const next = slot.queue.shift();
    if (next) {
      if (next.timer) clearTimeout(next.timer);
      next.resolve(this.grant(slot));
    }
  }

  async withConversation<T>(key: string, fn: (handle: ConversationHandle) => Promise<T>, timeoutMs?: number): Promise<T> {
    const handle = await this.acquire(key, timeoutMs);
    try {
      return await fn(handle);
    } finally {
      this.release(handle);
    }
  }

  /**
   * Supersede a conversation. A cycle holding it keeps running, but sees
   * `isSuperseded` and discards whatever its calls return.
   */
  close(key: string): boolean {
    const slot = this.slots.get(key);
    if (!slot) return false;
    slot.conversation.status = 'closed';
    if (!slot.holder && slot.queue.length === 0) this.slots.delete(key);
    log('info', 'Conversation closed', { conversationKey: key });
    return true;
  }

  isSuperseded(handle: ConversationHandle): boolean {
    const slot = this.slots.get(handle.key);
    return handle.conversation.status === 'closed' || slot?.conversation !== handle.conversation;
  }

  /** Evict idle conversations. Held or contended ones wait for a later sweep. */
  sweep(now: number = this.now()): number {
    let evicted = 0;
    for (const [key, slot] of this.slots) {
      if (slot.holder || slot.queue.length > 0) continue;
      if (now - slot.conversation.lastActivityAt < this.opts.idleTimeoutMs) continue;
      slot.conversation.status = 'closed';
      this.slots.delete(key);
      evicted++;
    }
    if (evicted > 0) log('debug', 'Idle conversations evicted', { evicted, remaining: this.slots.size });
    return evicted;
  }

  get(key: string): Conversation | undefined {
    return this.slots.get(key)?.conversation;
  }

  isLocked(key: string): boolean {
    return this.slots.get(key)?.holder != null;
  }

  list(): ConversationSummary[] {
    return [...this.slots.entries()].map(([key, slot]) => ({
      key,
      status: slot.conversation.status,
      turns: slot.conversation.turns.length,
      locked: slot.holder !== null,
      queued: slot.queue.length,
      createdAt: new Date(slot.conversation.createdAt).toISOString(),
      lastActivityAt: new Date(slot.conversation.lastActivityAt).toISOString(),
    }));
  }

  get size(): number {
    return this.slots.size;
  }

  // ─── Internals ───

  private slotFor(key: string): Slot {
    const existing = this.slots.get(key);
    if (existing) return existing;
    const slot: Slot = { conversation: new Conversation(key, this.now()), holder: null, queue: [] };
    this.slots.set(key, slot);
    return slot;
  }

  private grant(slot: Slot): ConversationHandle {
    const handle: ConversationHandle = {
      id: this.nextHandleId++,
      key: slot.conversation.key,
      conversation: slot.conversation,
      acquiredAt: this.now(),
    };
    slot.holder = handle;
    slot.conversation.status = 'running';
    slot.conversation.touch(handle.acquiredAt);
    log('debug', 'Conversation acquired', { conversationKey: handle.key, handleId: handle.id });
    return handle;
  }
}
