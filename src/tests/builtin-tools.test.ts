import { describe, it, expect } from 'vitest';
import { Octokit } from '@octokit/rest';
import { createAskAgentHandler, registerBuiltinTools } from '../tools/tool-impl.js';
import { createGitHubHandlers, formatIssues, formatPullDetails, formatPulls, formatRepositories } from '../tools/github.js';
import { ToolRegistry, type ToolContext, type ToolOutcome } from '../tools/tool-registry.js';
import type { PeerCaller, PeerTarget } from '../peer/peer-session.js';
import { resolveConfig } from '../core/config.js';
import { createProvider } from '../models/registry.js';
import { stripReasoning } from '../models/providers/openai-compatible.js';

const ctx = (): ToolContext => ({
  conversationKey: 'C1:1',
  correlationId: 'corr-1',
  deadline: Date.now() + 1_000,
  signal: new AbortController().signal,
});

function peerAnswering(outcome: ToolOutcome, seen: Array<{ target: PeerTarget; payload: unknown }> = []): PeerCaller {
  return {
    state: 'open',
    call: (target, payload) => {
      seen.push({ target, payload });
      return { correlationId: 'p1', result: Promise.resolve(outcome) };
    },
  };
}

describe('registerBuiltinTools', () => {
  it('registers search and web tools by default', () => {
    const registry = new ToolRegistry();
    const names = registerBuiltinTools(registry, resolveConfig({}, { MODEL_API_KEY: 'test-secret' }), { getPeer: () => null });
    expect(names).toEqual(['web_search', 'search_news', 'scrape_website', 'extract_links', 'get_page_title', 'get_website_summary']);
  });

  it('adds GitHub tools with a token and ask_agent with a peer session', () => {
    const registry = new ToolRegistry();
    const config = resolveConfig({}, {
      MODEL_API_KEY: 'test-secret',
      GITHUB_TOKEN: 'test-github-token',
      CORAL_CONNECTION_URL: 'ws://coral.test/ws',
      CORAL_AGENT_ID: 'slack-agent',
    });

    const names = registerBuiltinTools(registry, config, { getPeer: () => null });

    expect(names).toContain('github_search_repositories');
    expect(names).toContain('github_search_issues');
    expect(names).toContain('github_get_pr_details');
    expect(names[names.length - 1]).toBe('ask_agent');
  });

  it('skips disabled groups', () => {
    const registry = new ToolRegistry();
    const config = resolveConfig({ tools: { search: { enabled: false }, web: { enabled: false } } }, { MODEL_API_KEY: 'test-secret' });
    expect(registerBuiltinTools(registry, config, { getPeer: () => null })).toEqual([]);
  });
});

describe('ask_agent', () => {
  it('sends a plain message and returns the answer', async () => {
    const seen: Array<{ target: PeerTarget; payload: unknown }> = [];
    const handler = createAskAgentHandler(() => peerAnswering({ kind: 'success', payload: 'All good.' }, seen));

    await expect(handler({ agentId: 'planner', message: 'Status?' }, ctx())).resolves.toBe('All good.');
    expect(seen).toEqual([{ target: { agentId: 'planner' }, payload: { message: 'Status?', conversationKey: 'C1:1' } }]);
  });

  it('fails without a peer session', async () => {
    const handler = createAskAgentHandler(() => null);
    await expect(handler({ agentId: 'planner', message: 'Status?' }, ctx())).rejects.toThrow('No coordination network connection is configured');
  });

  it('turns peer failures and timeouts into errors', async () => {
    const failing = createAskAgentHandler(() => peerAnswering({ kind: 'failure', reason: 'busy' }));
    await expect(failing({ agentId: 'planner', message: 'x' }, ctx())).rejects.toThrow('agent "planner" failed: busy');

    const silent = createAskAgentHandler(() => peerAnswering({ kind: 'timeout' }));
    await expect(silent({ agentId: 'planner', message: 'x' }, ctx())).rejects.toThrow('agent "planner" did not answer in time');
  });
});

describe('github formatting', () => {
  it('lists repositories', () => {
    expect(formatRepositories('reef', [
      { full_name: 'octo/reef', description: 'Reef tools', stargazers_count: 42, language: 'TypeScript', html_url: 'https://github.test/octo/reef' },
      { full_name: 'octo/sea', description: null, stargazers_count: 1, language: null, html_url: 'https://github.test/octo/sea' },
    ])).toBe([
      "Repositories matching 'reef':",
      '',
      '1. octo/reef (★ 42, TypeScript)',
      '   Reef tools',
      '   https://github.test/octo/reef',
      '2. octo/sea (★ 1)',
      '   No description',
      '   https://github.test/octo/sea',
    ].join('\n'));
    expect(formatRepositories('reef', [])).toBe('No repositories found for query: reef');
  });

  it('lists pull requests and issues', () => {
    expect(formatPulls('octo', 'reef', [{
      number: 7, title: 'Fix tides', state: 'open', html_url: 'https://github.test/octo/reef/pull/7', updated_at: '2024-01-15', user: { login: 'dev' },
    }])).toBe('Pull requests in octo/reef:\n\n#7 Fix tides [open] by dev (updated 2024-01-15)\n   https://github.test/octo/reef/pull/7');

    expect(formatIssues('tides', [
      { number: 3, title: 'Tides wrong', state: 'open', html_url: 'https://github.test/i/3' },
      { number: 7, title: 'Fix tides', state: 'open', html_url: 'https://github.test/p/7', pull_request: {} },
    ])).toBe("Issues matching 'tides':\n\n#3 Tides wrong [open]\n   https://github.test/i/3\n#7 [PR] Fix tides [open]\n   https://github.test/p/7");
  });

  it('describes one pull request and cuts a long description', () => {
    const pull = {
      number: 12,
      title: 'Add tide tables',
      state: 'closed',
      html_url: 'https://github.test/octo/reef/pull/12',
      created_at: '2024-03-01T09:05:00Z',
      updated_at: '2024-03-02T17:45:30Z',
      user: { login: 'dev' },
    };

    expect(formatPullDetails({ ...pull, body: 'b'.repeat(600) })).toBe([
      '**Pull Request #12: Add tide tables**',
      '',
      'Status: 🔴 Closed',
      'Author: dev',
      'Created: 2024-03-01 09:05',
      'Updated: 2024-03-02 17:45',
      'URL: https://github.test/octo/reef/pull/12',
      '',
      'Description:',
      `${'b'.repeat(500)}...`,
    ].join('\n'));
    expect(formatPullDetails({ ...pull, state: 'open', body: null }).split('\n').slice(2)).toEqual([
      'Status: 🟢 Open',
      'Author: dev',
      'Created: 2024-03-01 09:05',
      'Updated: 2024-03-02 17:45',
      'URL: https://github.test/octo/reef/pull/12',
    ]);
  });
});

describe('github handlers', () => {
  function octokitServing(status: number, body: unknown, urls: string[]): Octokit {
    const fakeFetch: typeof fetch = async input => {
      urls.push(input instanceof Request ? input.url : input.toString());
      return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
    };
    return new Octokit({ request: { fetch: fakeFetch } });
  }

  it('fetches a repository', async () => {
    const urls: string[] = [];
    const handlers = createGitHubHandlers('test-github-token', octokitServing(200, {
      full_name: 'octo/reef',
      description: 'Reef tools',
      stargazers_count: 42,
      language: 'TypeScript',
      html_url: 'https://github.test/octo/reef',
      forks_count: 3,
      open_issues_count: 1,
      default_branch: 'main',
      updated_at: '2024-01-15T12:00:00Z',
      license: { name: 'MIT License' },
    }, urls));

    const result = await handlers.github_get_repository({ owner: 'octo', repo: 'reef' }, ctx());

    expect(urls).toEqual(['https://api.github.com/repos/octo/reef']);
    expect(result).toBe([
      'octo/reef',
      'Reef tools',
      'Language: TypeScript',
      'Stars: 42 · Forks: 3 · Open issues: 1',
      'Default branch: main',
      'License: MIT License',
      'Last updated: 2024-01-15T12:00:00Z',
      'URL: https://github.test/octo/reef',
    ].join('\n'));
  });

  it('fetches one pull request by number', async () => {
    const urls: string[] = [];
    const handlers = createGitHubHandlers('test-github-token', octokitServing(200, {
      number: 12,
      title: 'Add tide tables',
      state: 'open',
      html_url: 'https://github.test/octo/reef/pull/12',
      created_at: '2024-03-01T09:05:00Z',
      updated_at: '2024-03-02T17:45:30Z',
      user: { login: 'dev' },
      body: 'Adds a table per port.',
    }, urls));

    const result = await handlers.github_get_pr_details({ owner: 'octo', repo: 'reef', pr_number: '12' }, ctx());

    expect(urls).toEqual(['https://api.github.com/repos/octo/reef/pulls/12']);
    expect(result).toBe([
      '**Pull Request #12: Add tide tables**',
      '',
      'Status: 🟢 Open',
      'Author: dev',
      'Created: 2024-03-01 09:05',
      'Updated: 2024-03-02 17:45',
      'URL: https://github.test/octo/reef/pull/12',
      '',
      'Description:',
      'Adds a table per port.',
    ].join('\n'));
  });

  it('requires a pull request number', () => {
    const handlers = createGitHubHandlers('test-github-token', octokitServing(200, {}, []));
    expect(() => handlers.github_get_pr_details({ owner: 'octo', repo: 'reef' }, ctx()))
      .toThrow('Tool "github_get_pr_details" failed: missing required integer argument "pr_number"');
  });

  it('wraps API errors as tool failures', async () => {
    const handlers = createGitHubHandlers('test-github-token', octokitServing(404, { message: 'Not Found' }, []));
    await expect(handlers.github_get_repository({ owner: 'octo', repo: 'missing' }, ctx()))
      .rejects.toThrow(/^Tool "github_get_repository" failed: /);
  });
});

describe('model providers', () => {
  it('knows the hosted chat-completions endpoints', () => {
    expect(createProvider({ provider: 'mistral', apiKey: 'test-secret', baseUrl: null, timeoutMs: 1_000 }).id).toBe('mistral');
    expect(createProvider({ provider: 'openai-compatible', apiKey: 'test-secret', baseUrl: 'http://localhost:8080/v1', timeoutMs: 1_000 }).id)
      .toBe('openai-compatible');
  });

  it('rejects providers it cannot reach', () => {
    expect(() => createProvider({ provider: 'acme', apiKey: 'test-secret', baseUrl: null, timeoutMs: 1_000 }))
      .toThrow('Unknown model provider "acme"');
    expect(() => createProvider({ provider: 'openai-compatible', apiKey: 'test-secret', baseUrl: null, timeoutMs: 1_000 }))
      .toThrow('Unknown model provider "openai-compatible" (set MODEL_BASE_URL)');
  });

  it('strips reasoning blocks', () => {
    expect(stripReasoning('<think>plan\nsteps</think>\nHello')).toBe('Hello');
  });
});
