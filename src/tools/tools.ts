import type { ToolDefinition } from '../models/provider.js';
import { ToolExecutionError } from '../core/errors.js';

// ═══════════════════════════════════════════════════════════════════
// SCHEMA BUILDER HELPERS
// ═══════════════════════════════════════════════════════════════════

type Prop = { type: string; description?: string; enum?: string[]; items?: unknown };

export function schema(props: Record<string, Prop | string>, required?: string[]): Record<string, unknown> {
  const properties: Record<string, Prop> = {};
  for (const [k, v] of Object.entries(props))
    properties[k] = typeof v === 'string' ? { type: 'string', description: v } : v;
  return { type: 'object', properties, ...(required && { required }) };
}

export function tool(name: string, description: string, input?: Record<string, unknown>): ToolDefinition {
  return { name, description, input_schema: input ?? { type: 'object', properties: {} } };
}

export const STR = (d: string): Prop => ({ type: 'string', description: d });
export const NUM = (d: string): Prop => ({ type: 'number', description: d });
export const ENUM = (d: string, values: string[]): Prop => ({ type: 'string', description: d, enum: values });

// ═══════════════════════════════════════════════════════════════════
// ARGUMENT READERS: a bad argument fails the call, not the loop
// ═══════════════════════════════════════════════════════════════════

export function requireString(toolName: string, input: Record<string, unknown>, key: string): string {
  const v = input[key];
  if (typeof v !== 'string' || v.trim() === '') {
    throw new ToolExecutionError(toolName, `missing required string argument "${key}"`);
  }
  return v.trim();
}

export function optionalString(input: Record<string, unknown>, key: string): string | undefined {
  const v = input[key];
  return typeof v === 'string' && v.trim() !== '' ? v.trim() : undefined;
}

export function requireInt(toolName: string, input: Record<string, unknown>, key: string, min = 1): number {
  const n = optionalInt(input, key, NaN, min, Number.MAX_SAFE_INTEGER);
  if (Number.isNaN(n)) throw new ToolExecutionError(toolName, `missing required integer argument "${key}"`);
  return n;
}

/** Accepts numbers and numeric strings; clamps to [min, max]. */
export function optionalInt(input: Record<string, unknown>, key: string, fallback: number, min = 1, max = 100): number {
  const v = input[key];
  const n = typeof v === 'number' ? v : typeof v === 'string' && v.trim() !== '' ? Number(v) : NaN;
  if (!Number.isFinite(n)) return fallback;
  return Math.min(Math.max(Math.trunc(n), min), max);
}

// ═══════════════════════════════════════════════════════════════════
// BUILT-IN TOOL DEFINITIONS
// ═══════════════════════════════════════════════════════════════════

export const SEARCH_TOOLS: ToolDefinition[] = [
  tool('web_search', 'Search the web (DuckDuckGo) and return matching summaries and links', schema({
    query: 'Search query',
    max_results: NUM('Maximum results (default 5)'),
  }, ['query'])),
  tool('search_news', 'Search for recent news on a topic', schema({
    query: 'News topic',
    max_results: NUM('Maximum results (default 5)'),
  }, ['query'])),
];

export const WEB_TOOLS: ToolDefinition[] = [
  tool('scrape_website', 'Fetch a web page and return its readable text', schema({
    url: 'Absolute http(s) URL',
    max_length: NUM('Maximum characters of text to return (default 2000)'),
  }, ['url'])),
  tool('extract_links', 'List the links on a web page', schema({
    url: 'Absolute http(s) URL',
    max_links: NUM('Maximum links to return (default 10)'),
  }, ['url'])),
  tool('get_page_title', 'Get the title of a web page', schema({
    url: 'Absolute http(s) URL',
  }, ['url'])),
  tool('get_website_summary', 'Summarise a web page: title, meta description and a preview of its main content', schema({
    url: 'Absolute http(s) URL',
  }, ['url'])),
];

export const GITHUB_TOOLS: ToolDefinition[] = [
  tool('github_search_repositories', 'Search GitHub repositories', schema({
    query: 'GitHub search query (e.g. "language:typescript stars:>1000 agent")',
  }, ['query'])),
  tool('github_get_repository', 'Get details of a GitHub repository', schema({
    owner: 'Repository owner (user or organisation)',
    repo: 'Repository name',
  }, ['owner', 'repo'])),
  tool('github_list_pull_requests', 'List recent pull requests of a repository', schema({
    owner: 'Repository owner',
    repo: 'Repository name',
    state: ENUM('Pull request state (default open)', ['open', 'closed', 'all']),
    limit: NUM('Maximum pull requests (default 5)'),
  }, ['owner', 'repo'])),
  tool('github_get_pr_details', 'Get the details of one pull request', schema({
    owner: 'Repository owner',
    repo: 'Repository name',
    pr_number: NUM('Pull request number'),
  }, ['owner', 'repo', 'pr_number'])),
  tool('github_search_issues', 'Search issues and pull requests on GitHub', schema({
    query: 'Search terms',
    owner: STR('Restrict to this owner (with repo)'),
    repo: STR('Restrict to this repository (with owner)'),
    state: ENUM('Issue state (default open)', ['open', 'closed']),
  }, ['query'])),
];

export const ASK_AGENT_TOOL: ToolDefinition = tool(
  'ask_agent',
  'Send a message to another agent on the coordination network and wait for its answer',
  schema({
    agentId: 'Id of the agent to ask',
    message: 'What to ask or tell the agent',
  }, ['agentId', 'message']),
);
