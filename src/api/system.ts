import type { FastifyInstance } from 'fastify';
import type { GatewayDeps } from '../gateway/server.js';
import { redactConfig } from '../core/config.js';

export function registerSystemRoutes(server: FastifyInstance, deps: GatewayDeps): void {
  server.get('/health', async () => {
    const peer = deps.peerState();
    const channels = deps.channels ? await deps.channels.health() : {};
    const degraded = (peer !== null && peer !== 'open') || Object.values(channels).some(healthy => !healthy);

    return {
      status: degraded ? 'degraded' : 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      peer: peer ?? 'disabled',
      conversations: deps.sessions.size,
      channels,
    };
  });

  server.get('/api/config', async () => {
    return redactConfig(deps.config);
  });

  server.get('/api/tools', async () => {
    return {
      tools: deps.registry.definitions().map(t => ({ name: t.name, description: t.description })),
      mcpServers: deps.mcp?.statuses() ?? [],
    };
  });
}
