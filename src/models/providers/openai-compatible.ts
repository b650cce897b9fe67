import OpenAI from 'openai';
import type { ChatMessage, ModelProvider, ModelResponse } from '../provider.js';
import { log } from '../../core/logger.js';

type CompletionMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;

function toOpenAiMessage(m: ChatMessage): CompletionMessage {
  if (m.role === 'tool') {
    return { role: 'tool', content: m.content, tool_call_id: m.tool_call_id ?? '' };
  }
  if (m.role === 'assistant') {
    if (m.tool_calls && m.tool_calls.length > 0) {
      return {
        role: 'assistant',
        content: m.content || null,
        tool_calls: m.tool_calls.map(tc => ({
          id: tc.id,
          type: 'function' as const,
          function: { name: tc.name, arguments: tc.arguments },
        })),
      };
    }
    return { role: 'assistant', content: m.content };
  }
  return { role: 'user', content: m.content };
}

/** Strip <think>...</think> reasoning blocks some hosted models prepend. */
export function stripReasoning(text: string): string {
  return text.replace(/<think>[\s\S]*?<\/think>/g, '').trim();
}

/**
 * Chat-completions provider for any endpoint speaking the OpenAI wire format
 * (Mistral, OpenAI, Groq, Together, self-hosted gateways).
 */
export function createOpenAiCompatibleProvider(id: string, apiKey: string, baseUrl: string, timeoutMs: number): ModelProvider {
  // Retries belong to the decision engine, not the transport
  const client = new OpenAI({ apiKey, baseURL: baseUrl, timeout: timeoutMs, maxRetries: 0 });

  return {
    id,

    async chat({ model, systemPrompt, messages, tools, maxTokens, temperature, signal }): Promise<ModelResponse> {
      const openaiMessages: CompletionMessage[] = [
        { role: 'system', content: systemPrompt },
        ...messages.map(toOpenAiMessage),
      ];

      const openaiTools = tools && tools.length > 0
        ? tools.map(t => ({
          type: 'function' as const,
          function: { name: t.name, description: t.description, parameters: t.input_schema },
        }))
        : undefined;

      log('debug', 'Model API call', { provider: id, model, messageCount: openaiMessages.length, toolCount: openaiTools?.length ?? 0, maxTokens, temperature });
      const startTime = Date.now();
      const response = await client.chat.completions.create({
        model,
        messages: openaiMessages,
        tools: openaiTools,
        max_tokens: maxTokens,
        temperature,
      }, { signal });
      const choice = response.choices[0];
      log('debug', 'Model API response', { provider: id, model, durationMs: Date.now() - startTime, finishReason: choice?.finish_reason, promptTokens: response.usage?.prompt_tokens, completionTokens: response.usage?.completion_tokens });

      if (!choice) {
        return { content: '', toolCalls: [], stopReason: 'error', usage: { inputTokens: 0, outputTokens: 0 } };
      }

      const content = stripReasoning(choice.message.content ?? '');
      const toolCalls: ModelResponse['toolCalls'] = (choice.message.tool_calls ?? []).map(tc => ({
        id: tc.id,
        name: tc.function.name,
        arguments: tc.function.arguments,
      }));

      const stopReason = choice.finish_reason === 'tool_calls' ? 'tool_use'
        : choice.finish_reason === 'length' ? 'max_tokens'
        : 'end_turn';

      return {
        content,
        toolCalls,
        stopReason,
        usage: {
          inputTokens: response.usage?.prompt_tokens ?? 0,
          outputTokens: response.usage?.completion_tokens ?? 0,
        },
      };
    },

    async ping(model: string): Promise<boolean> {
      try {
        await client.chat.completions.create({
          model,
          max_tokens: 1,
          messages: [{ role: 'user', content: 'ping' }],
        });
        return true;
      } catch (err) {
        log('debug', 'Model ping failed', { provider: id, model, error: String(err) });
        return false;
      }
    },
  };
}
