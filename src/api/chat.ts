import type { FastifyInstance } from 'fastify';
import type { GatewayDeps } from '../gateway/server.js';
import { BUSY_REPLY, GATEWAY_CONVERSATION_KEY } from '../const/constants.js';

export interface ChatRequest {
  text: string;
  conversationKey?: string;
}

/** Null when the body has no usable `text`. */
export function parseChatBody(body: unknown): ChatRequest | null {
  if (typeof body !== 'object' || body === null) return null;
  const text: unknown = Reflect.get(body, 'text');
  if (typeof text !== 'string' || text.trim().length === 0) return null;
  const key: unknown = Reflect.get(body, 'conversationKey');
  return typeof key === 'string' && key.length > 0 ? { text, conversationKey: key } : { text };
}

/** Caller-chosen keys live under their own prefix so they never collide with Slack threads. */
export function gatewayConversationKey(requested: string | undefined): string {
  return requested ? `${GATEWAY_CONVERSATION_KEY}:${requested}` : GATEWAY_CONVERSATION_KEY;
}

export function registerChatRoutes(server: FastifyInstance, deps: GatewayDeps): void {
  // POST /api/chat runs one orchestration cycle and answers with its reply
  server.post('/api/chat', async (request, reply) => {
    const body = parseChatBody(request.body);
    if (!body) return reply.status(400).send({ error: 'text is required' });

    const conversationKey = gatewayConversationKey(body.conversationKey);
    const captured: { reply: string | null } = { reply: null };

    const outcome = await deps.handler(
      { conversationKey, sender: request.ip, text: body.text, surface: 'gateway' },
      {
        send: async text => { captured.reply = text; },
        busy: async () => {},
      },
    );

    if (outcome.status === 'busy') {
      return reply.status(409).send({ error: BUSY_REPLY, conversationKey });
    }
    return { reply: captured.reply, status: outcome.status, conversationKey };
  });

  server.get('/api/conversations', async () => {
    return { conversations: deps.sessions.list() };
  });

  // Closing a conversation supersedes any cycle still running on it
  server.delete<{ Params: { key: string } }>('/api/conversations/:key', async (request, reply) => {
    const closed = deps.sessions.close(request.params.key);
    if (!closed) return reply.status(404).send({ error: 'Conversation not found' });
    return { closed: true, conversationKey: request.params.key };
  });
}
