import type { ModelProvider } from './provider.js';
import { createOpenAiCompatibleProvider } from './providers/openai-compatible.js';
import { ConfigError } from '../core/config.js';

/** Endpoints for the providers that speak the chat-completions format. */
export const PROVIDER_BASE_URLS: Record<string, string> = {
  mistral: 'https://api.mistral.ai/v1',
  openai: 'https://api.openai.com/v1',
  groq: 'https://api.groq.com/openai/v1',
  together: 'https://api.together.xyz/v1',
};

export function createProvider(opts: { provider: string; apiKey: string; baseUrl: string | null; timeoutMs: number }): ModelProvider {
  const baseUrl = opts.baseUrl ?? PROVIDER_BASE_URLS[opts.provider];
  if (!baseUrl) {
    const hint = opts.provider === 'openai-compatible' ? ' (set MODEL_BASE_URL)' : '';
    throw new ConfigError(`Unknown model provider "${opts.provider}"${hint}`);
  }
  return createOpenAiCompatibleProvider(opts.provider, opts.apiKey, baseUrl, opts.timeoutMs);
}
