import type { ChannelAdapter } from './adapter.js';
import { log } from '../core/logger.js';
import { describeError } from '../core/errors.js';

export class ChannelManager {
  private readonly adapters = new Map<string, ChannelAdapter>();

  register(adapter: ChannelAdapter): void {
    this.adapters.set(adapter.id, adapter);
  }

  get(id: string): ChannelAdapter | undefined {
    return this.adapters.get(id);
  }

  ids(): string[] {
    return [...this.adapters.keys()];
  }

  /**
   * Connect in registration order. A channel listed in `required` rethrows
   * its failure; any other is logged and left disconnected.
   */
  async connectAll(required: ReadonlySet<string> = new Set()): Promise<void> {
    for (const adapter of this.adapters.values()) {
      try {
        await adapter.connect();
        log('info', `Channel connected: ${adapter.id}`);
      } catch (err) {
        log('error', `Channel failed to connect: ${adapter.id}`, { error: describeError(err) });
        if (required.has(adapter.id)) throw err;
      }
    }
  }

  /** Reverse registration order. */
  async disconnectAll(): Promise<void> {
    for (const adapter of [...this.adapters.values()].reverse()) {
      try {
        await adapter.disconnect();
      } catch (err) {
        log('error', `Channel failed to disconnect: ${adapter.id}`, { error: describeError(err) });
      }
    }
    this.adapters.clear();
  }

  async health(): Promise<Record<string, boolean>> {
    const health: Record<string, boolean> = {};
    for (const adapter of this.adapters.values()) {
      health[adapter.id] = await adapter.isHealthy();
    }
    return health;
  }
}
