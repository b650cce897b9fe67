import type { FastifyInstance } from 'fastify';
import type { AgentConfig } from './config.js';
import { initLogger, initLogFile, closeLogFile, log } from './logger.js';
import { describeError, type PeerSessionFatalError } from './errors.js';
import type { ModelProvider } from '../models/provider.js';
import { createProvider } from '../models/registry.js';
import { ToolRegistry } from '../tools/tool-registry.js';
import { registerBuiltinTools } from '../tools/tool-impl.js';
import type { FetchLike } from '../tools/web.js';
import { McpManager } from '../mcp/mcp-manager.js';
import { PeerSessionClient, type PeerSocketFactory } from '../peer/peer-session.js';
import type { PeerToolInfo } from '../peer/protocol.js';
import { SessionManager } from '../session/session-manager.js';
import { DecisionEngine } from '../orchestrator/decision.js';
import { Orchestrator } from '../orchestrator/orchestrator.js';
import { buildSystemPrompt } from '../prompt/builder.js';
import type { InboundHandler } from '../channels/adapter.js';
import { ChannelManager } from '../channels/manager.js';
import { CoralChannel } from '../channels/coral.js';
import { SlackChannel } from '../channels/slack.js';
import { buildGateway, listenGateway } from '../gateway/server.js';

export interface BootstrapOptions {
  /** No coordination network, Slack or gateway: one-shot runs from the CLI */
  localOnly?: boolean;
  /** Replaces the provider built from `config.model` */
  provider?: ModelProvider;
  peerSocketFactory?: PeerSocketFactory;
  fetch?: FetchLike;
  onPeerFatal?: (err: PeerSessionFatalError) => void;
}

export interface Agent {
  config: Readonly<AgentConfig>;
  registry: ToolRegistry;
  sessions: SessionManager;
  orchestrator: Orchestrator;
  peer: PeerSessionClient | null;
  mcp: McpManager;
  channels: ChannelManager;
  gateway: FastifyInstance | null;
  handle: InboundHandler;
  /** Connect channels and open the gateway port. */
  start(): Promise<void>;
  /** Tear down in reverse start order. Safe to call twice. */
  shutdown(): Promise<void>;
}

const LOG_FILE_NAME = 'coralbridge.log';

export async function bootstrap(config: Readonly<AgentConfig>, options: BootstrapOptions = {}): Promise<Agent> {
  // ── Logger ──
  initLogger(config.logs);
  if (config.logs.dir) {
    const file = initLogFile(config.logs.dir, LOG_FILE_NAME);
    log('info', 'Logging to file', { file });
  }

  const networked = !options.localOnly;
  const peerEnabled = networked && config.peer.enabled;

  // ── Model ──
  const provider = options.provider ?? createProvider({
    provider: config.model.provider,
    apiKey: config.model.apiKey,
    baseUrl: config.model.baseUrl,
    timeoutMs: config.model.timeoutMs,
  });

  // ── Tools ──
  const registry = new ToolRegistry();
  let peer: PeerSessionClient | null = null;
  registerBuiltinTools(
    registry,
    peerEnabled ? config : { ...config, peer: { ...config.peer, enabled: false } },
    { getPeer: () => peer, fetch: options.fetch },
  );

  const mcp = new McpManager(registry);
  await mcp.connectAll(config.mcpServers);

  // ── Coordination network ──
  if (peerEnabled) {
    const session = new PeerSessionClient({
      url: config.peer.url,
      agentId: config.peer.agentId,
      runtime: config.peer.runtime,
      connectTimeoutMs: config.peer.connectTimeoutMs,
      heartbeatIntervalMs: config.peer.heartbeatIntervalMs,
      heartbeatTimeoutMs: config.peer.heartbeatTimeoutMs,
      reconnect: config.peer.reconnect,
      socketFactory: options.peerSocketFactory,
      localTools: () => registry.localDefinitions().map((d): PeerToolInfo => ({
        agentId: config.peer.agentId,
        name: d.name,
        description: d.description,
        inputSchema: d.input_schema,
      })),
    });
    session.onTools(tools => {
      registry.setPeerTools(tools);
      log('info', 'Peer tool catalogue updated', { count: tools.length });
    });
    session.onStateChange(state => log('info', `Peer session ${state}`, { agentId: config.peer.agentId }));
    session.onFatal(err => {
      log('error', 'Peer session failed permanently', { error: err.message });
      options.onPeerFatal?.(err);
    });
    peer = session;
  }

  // ── Orchestration ──
  const sessions = new SessionManager({
    idleTimeoutMs: config.sessions.idleTimeoutMs,
    sweepIntervalMs: config.sessions.sweepIntervalMs,
    lockTimeoutMs: config.orchestrator.lockTimeoutMs,
  });
  sessions.start();

  const decider = new DecisionEngine(provider, {
    model: config.model.name,
    temperature: config.model.temperature,
    maxTokens: config.model.maxTokens,
    timeoutMs: config.model.timeoutMs,
  });

  const orchestrator = new Orchestrator({
    sessions,
    registry,
    decider,
    peer,
    systemPrompt: () => buildSystemPrompt({
      agentName: config.agent.name,
      instructions: config.agent.instructions,
      tools: registry.definitions(),
      peerEnabled,
    }),
    options: config.orchestrator,
  });

  const handle: InboundHandler = (event, sink) => orchestrator.handleInboundMessage(event, sink);

  // ── Channels ──
  const channels = new ChannelManager();
  if (peer) {
    channels.register(new CoralChannel({ session: peer, handler: handle, registry, toolTimeoutMs: config.orchestrator.toolTimeoutMs }));
  }
  if (networked && config.slack.enabled) {
    channels.register(new SlackChannel(config.slack, handle, key => sessions.get(key) !== undefined));
  }

  // ── Gateway ──
  const gatewayPeer = peer;
  const gateway = networked && config.gateway.enabled
    ? await buildGateway({
      config,
      handler: handle,
      sessions,
      registry,
      channels,
      mcp,
      peerState: () => gatewayPeer?.state ?? null,
    })
    : null;

  let stopped = false;

  return {
    config,
    registry,
    sessions,
    orchestrator,
    peer,
    mcp,
    channels,
    gateway,
    handle,

    async start(): Promise<void> {
      if (!(await provider.ping(config.model.name))) {
        log('warn', 'Model endpoint did not answer a ping; cycles will degrade until it does', { provider: provider.id, model: config.model.name });
      }

      // The agent is useless on the network without its session
      await channels.connectAll(new Set(['coral']));

      if (gateway) {
        const { host, port, authType, authValue } = config.gateway;
        await listenGateway(gateway, host, port);
        if ((authType === 'none' || !authValue) && host !== '127.0.0.1' && host !== 'localhost') {
          log('warn', '!!! Gateway is listening without authentication on a non-localhost address. Set GATEWAY_AUTH_TOKEN. !!!');
        }
      }
      log('info', `${config.agent.name} is ready`, {
        tools: registry.size,
        channels: channels.ids().join(', '),
        gateway: gateway ? `${config.gateway.host}:${config.gateway.port}` : 'disabled',
      });
    },

    async shutdown(): Promise<void> {
      if (stopped) return;
      stopped = true;
      log('info', 'Shutting down...');
      try {
        if (gateway) await gateway.close();
        await channels.disconnectAll();
        sessions.stop();
        await mcp.disconnectAll();
      } catch (err) {
        log('error', 'Error during shutdown', { error: describeError(err) });
      }
      closeLogFile();
    },
  };
}
