import { describe, it, expect } from 'vitest';
import { assembleContext, truncateToolResult } from '../orchestrator/context.js';
import type { Turn } from '../session/conversation.js';

const user = (content: string): Turn => ({ role: 'user', content, timestamp: 0 });
const agent = (content: string): Turn => ({ role: 'agent', content, timestamp: 0 });

const ROOMY = { maxTurns: 40, maxTokens: 100_000 };

describe('assembleContext', () => {
  it('keeps a short history whole and in order', () => {
    const ctx = assembleContext([user('hello'), agent('hi there'), user('weather?')], 'SYS', ROOMY);

    expect(ctx.systemPrompt).toBe('SYS');
    expect(ctx.omittedTurns).toBe(0);
    expect(ctx.messages).toEqual([
      { role: 'user', content: 'hello' },
      { role: 'assistant', content: 'hi there' },
      { role: 'user', content: 'weather?' },
    ]);
  });

  it('keeps a tool request together with its results', () => {
    const turns: Turn[] = [
      user('search for vitest'),
      {
        role: 'agent',
        content: '',
        timestamp: 0,
        toolCalls: [{ id: 'abc123XYZ', name: 'web_search', arguments: '{"query":"vitest"}' }],
      },
      { role: 'tool', content: 'Search results', timestamp: 0, callId: 'abc123XYZ', toolName: 'web_search' },
    ];

    const ctx = assembleContext(turns, 'SYS', ROOMY);

    expect(ctx.messages).toEqual([
      { role: 'user', content: 'search for vitest' },
      { role: 'assistant', content: '', tool_calls: [{ id: 'abc123XYZ', name: 'web_search', arguments: '{"query":"vitest"}' }] },
      { role: 'tool', content: 'Search results', tool_call_id: 'abc123XYZ' },
    ]);
  });

  it('drops the oldest turns past the turn budget and says so', () => {
    const turns = [user('u1'), agent('a1'), user('u2'), agent('a2'), user('u3')];

    const ctx = assembleContext(turns, 'SYS', { maxTurns: 3, maxTokens: 100_000 });

    expect(ctx.messages.map(m => m.content)).toEqual(['u2', 'a2', 'u3']);
    expect(ctx.omittedTurns).toBe(2);
    expect(ctx.systemPrompt).toBe('SYS\n\n[2 earlier turns of this conversation omitted to fit the context window]');
  });

  it('always includes the newest user turn, even over the token budget', () => {
    const ctx = assembleContext([user('a'.repeat(100)), user('latest')], 'SYS', { maxTurns: 40, maxTokens: 1 });

    expect(ctx.messages).toEqual([{ role: 'user', content: 'latest' }]);
    expect(ctx.omittedTurns).toBe(1);
    expect(ctx.systemPrompt).toBe('SYS\n\n[1 earlier turn of this conversation omitted to fit the context window]');
  });

  it('cuts down the current round of results instead of dropping it', () => {
    const calls = ['c1', 'c2', 'c3', 'c4'].map(id => ({ id, name: 'scrape_website', arguments: '{"url":"https://site.test"}' }));
    const turns: Turn[] = [
      user('compare these pages'),
      { role: 'agent', content: '', timestamp: 0, toolCalls: calls },
      ...calls.map((c): Turn => ({ role: 'tool', content: 'x'.repeat(7_000), timestamp: 0, callId: c.id, toolName: c.name })),
    ];

    const ctx = assembleContext(turns, 'SYS', { maxTurns: 40, maxTokens: 6_000 });

    expect(ctx.messages.map(m => m.role)).toEqual(['user', 'assistant', 'tool', 'tool', 'tool', 'tool']);
    expect(ctx.omittedTurns).toBe(0);
    for (const m of ctx.messages.filter(m => m.role === 'tool')) {
      expect(m.content.length).toBeLessThan(7_000);
      expect(m.content.endsWith('\n...(truncated from 7000 chars)')).toBe(true);
    }
  });

  it('still drops older rounds that do not fit', () => {
    const big = 'y'.repeat(7_000);
    const turns: Turn[] = [
      user('first'),
      { role: 'agent', content: '', timestamp: 0, toolCalls: [{ id: 'old', name: 'web_search', arguments: '{}' }] },
      { role: 'tool', content: big, timestamp: 0, callId: 'old', toolName: 'web_search' },
      agent('done'),
      user('second'),
    ];

    const ctx = assembleContext(turns, 'SYS', { maxTurns: 40, maxTokens: 100 });

    expect(ctx.messages.map(m => m.content)).toEqual(['done', 'second']);
    expect(ctx.omittedTurns).toBe(3);
  });

  it('renders a result with no matching request as a labelled user message', () => {
    const turns: Turn[] = [
      { role: 'tool', content: 'data', timestamp: 0, callId: 'zzz', toolName: 'web_search' },
      user('next'),
    ];

    const ctx = assembleContext(turns, 'SYS', ROOMY);

    expect(ctx.messages[0]).toEqual({ role: 'user', content: '[Result of web_search]: data' });
  });

  it('is deterministic', () => {
    const turns = [user('u1'), agent('a1'), user('u2')];
    expect(assembleContext(turns, 'SYS', ROOMY)).toEqual(assembleContext(turns, 'SYS', ROOMY));
  });
});

describe('truncateToolResult', () => {
  it('leaves short results alone', () => {
    expect(truncateToolResult('ok', 500)).toBe('ok');
  });

  it('cuts plain text to the limit with a notice', () => {
    const out = truncateToolResult('x'.repeat(1000), 500);
    expect(out).toHaveLength(500);
    expect(out.endsWith('\n...(truncated from 1000 chars)')).toBe(true);
  });

  it('keeps the head and tail of a JSON array', () => {
    const big = JSON.stringify(Array.from({ length: 300 }, (_, i) => i));
    expect(truncateToolResult(big, 500)).toBe('[0,1,2,"... (295 items omitted)",298,299]');
  });
});
