import Fastify, { type FastifyInstance, type FastifyRequest } from 'fastify';
import rateLimit from '@fastify/rate-limit';
import { log } from '../core/logger.js';
import type { AgentConfig } from '../core/config.js';
import type { InboundHandler } from '../channels/adapter.js';
import type { ChannelManager } from '../channels/manager.js';
import type { SessionManager } from '../session/session-manager.js';
import type { ToolRegistry } from '../tools/tool-registry.js';
import type { McpManager } from '../mcp/mcp-manager.js';
import type { PeerSessionState } from '../peer/peer-session.js';
import { registerAuthHook } from './auth.js';
import { registerChatRoutes } from '../api/chat.js';
import { registerSystemRoutes } from '../api/system.js';

export interface GatewayDeps {
  config: Readonly<AgentConfig>;
  handler: InboundHandler;
  sessions: SessionManager;
  registry: ToolRegistry;
  channels: ChannelManager | null;
  mcp: McpManager | null;
  /** Null when the coordination network is disabled */
  peerState: () => PeerSessionState | null;
}

export async function buildGateway(deps: GatewayDeps): Promise<FastifyInstance> {
  const server = Fastify({ logger: false });
  const { gateway } = deps.config;

  // Only /api/* is rate limited
  await server.register(rateLimit, {
    max: 100,
    timeWindow: '1 minute',
    allowList: (req: FastifyRequest) => !(req.url.split('?')[0] ?? '').startsWith('/api'),
  });

  server.addHook('onRequest', async (_request, reply) => {
    reply.header('X-Content-Type-Options', 'nosniff');
    reply.header('X-Frame-Options', 'DENY');
    reply.header('Referrer-Policy', 'strict-origin-when-cross-origin');
    reply.header('X-XSS-Protection', '0');
  });

  server.addHook('onRequest', async (request, reply) => {
    if (gateway.cors.length === 0) return;
    const origin = request.headers.origin;
    if (origin && (gateway.cors.includes('*') || gateway.cors.includes(origin))) {
      reply.header('Access-Control-Allow-Origin', gateway.cors.includes('*') ? '*' : origin);
      reply.header('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
      reply.header('Access-Control-Allow-Headers', 'Content-Type, Authorization');
    }
    if (request.method === 'OPTIONS') {
      return reply.status(204).send();
    }
  });

  registerAuthHook(server, gateway);
  registerSystemRoutes(server, deps);
  registerChatRoutes(server, deps);

  return server;
}

export async function listenGateway(server: FastifyInstance, host: string, port: number): Promise<void> {
  await server.listen({ host, port });
  log('info', `Gateway listening on ${host}:${port}`);
}
