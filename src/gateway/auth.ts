import type { FastifyInstance } from 'fastify';
import { timingSafeEqual } from 'node:crypto';
import type { AgentConfig } from '../core/config.js';

/** Constant-time comparison; padding keeps the token length from leaking. */
export function tokensMatch(given: string, expected: string): boolean {
  const givenBuf = Buffer.from(given);
  const expectedBuf = Buffer.from(expected);
  const maxLen = Math.max(givenBuf.length, expectedBuf.length);
  const padded1 = Buffer.alloc(maxLen);
  const padded2 = Buffer.alloc(maxLen);
  givenBuf.copy(padded1);
  expectedBuf.copy(padded2);
  return timingSafeEqual(padded1, padded2) && givenBuf.length === expectedBuf.length;
}

export function registerAuthHook(server: FastifyInstance, gateway: Pick<AgentConfig['gateway'], 'authType' | 'authValue'>): void {
  server.addHook('onRequest', async (request, reply) => {
    const { authType, authValue } = gateway;
    if (authType === 'none' || !authValue) return;

    const url = request.url.split('?')[0] ?? '';
    if (!url.startsWith('/api')) return;

    const header = request.headers.authorization;
    const token = header?.startsWith('Bearer ') ? header.slice(7) : null;

    if (!token || !tokensMatch(token, authValue)) {
      return reply.status(401).send({ error: 'Unauthorized' });
    }
  });
}
