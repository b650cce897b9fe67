import { describe, it, expect, afterEach } from 'vitest';
import { bootstrap, type Agent } from '../core/bootstrap.js';
import { resolveConfig } from '../core/config.js';
import type { ChatParams, ModelProvider, ModelResponse } from '../models/provider.js';
import type { PeerSocketFactory } from '../peer/peer-session.js';
import type { FetchLike } from '../tools/web.js';

class StubProvider implements ModelProvider {
  readonly id = 'stub';
  readonly requests: ChatParams[] = [];

  async chat(params: ChatParams): Promise<ModelResponse> {
    this.requests.push(params);
    return { content: 'Hi there', toolCalls: [], stopReason: 'end_turn', usage: { inputTokens: 1, outputTokens: 1 } };
  }

  async ping(): Promise<boolean> {
    return true;
  }
}

const offline: FetchLike = async () => {
  throw new Error('offline');
};

const silentSockets: PeerSocketFactory = () => ({ send: () => {}, close: () => {} });

describe('bootstrap', () => {
  let agent: Agent | null = null;

  afterEach(async () => {
    await agent?.shutdown();
    agent = null;
  });

  it('wires a local-only agent that answers through the orchestrator', async () => {
    const provider = new StubProvider();
    const config = resolveConfig(
      { logs: { level: 'silent' } },
      { MODEL_API_KEY: 'test-secret', CORAL_CONNECTION_URL: 'ws://coral.test/ws', CORAL_AGENT_ID: 'slack-agent' },
    );
    agent = await bootstrap(config, { localOnly: true, provider, fetch: offline });

    expect(agent.gateway).toBeNull();
    expect(agent.peer).toBeNull();
    expect(agent.channels.ids()).toEqual([]);
    expect(agent.registry.isLocal('ask_agent')).toBe(false);

    const sent: string[] = [];
    const outcome = await agent.handle(
      { conversationKey: 'cli', sender: 'cli', text: 'hello', surface: 'gateway' },
      { send: async reply => { sent.push(reply); } },
    );

    expect(outcome.status).toBe('answered');
    expect(sent).toEqual(['Hi there']);
    expect(provider.requests).toHaveLength(1);
  });

  it('shuts down twice without complaint', async () => {
    const config = resolveConfig({ logs: { level: 'silent' } }, { MODEL_API_KEY: 'test-secret' });
    const local = await bootstrap(config, { localOnly: true, provider: new StubProvider(), fetch: offline });

    await local.shutdown();
    await expect(local.shutdown()).resolves.toBeUndefined();
  });

  it('builds the peer session, coral channel and gateway when networked', async () => {
    const config = resolveConfig(
      { logs: { level: 'silent' } },
      { MODEL_API_KEY: 'test-secret', CORAL_CONNECTION_URL: 'ws://coral.test/ws', CORAL_AGENT_ID: 'slack-agent' },
    );
    agent = await bootstrap(config, { provider: new StubProvider(), peerSocketFactory: silentSockets, fetch: offline });

    expect(agent.peer?.state).toBe('connecting');
    expect(agent.channels.ids()).toEqual(['coral']);
    expect(agent.registry.localDefinitions().map(d => d.name)).toContain('ask_agent');

    const res = await agent.gateway?.inject({ method: 'GET', url: '/health' });
    expect(res?.json()).toMatchObject({ status: 'degraded', peer: 'connecting', channels: { coral: false } });
  });
});
