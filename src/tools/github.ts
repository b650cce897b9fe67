import { Octokit } from '@octokit/rest';
import { ToolExecutionError, describeError } from '../core/errors.js';
import { GITHUB_RESULT_LIMIT } from '../const/constants.js';
import { optionalInt, optionalString, requireInt, requireString } from './tools.js';
import type { ToolHandler } from './tool-registry.js';

// ─── Formatting ───

export interface RepoSummary {
  full_name: string;
  description: string | null;
  stargazers_count: number;
  language?: string | null;
  html_url: string;
}

export interface RepoDetails extends RepoSummary {
  forks_count: number;
  open_issues_count: number;
  default_branch: string;
  updated_at: string;
  license?: { name: string } | null;
}

export interface PullSummary {
  number: number;
  title: string;
  state: string;
  html_url: string;
  updated_at: string;
  user: { login: string } | null;
}

export interface PullDetails extends PullSummary {
  body?: string | null;
  created_at: string;
}

export interface IssueSummary {
  number: number;
  title: string;
  state: string;
  html_url: string;
  pull_request?: unknown;
}

export function formatRepositories(query: string, repos: RepoSummary[]): string {
  if (repos.length === 0) return `No repositories found for query: ${query}`;
  const lines = repos.map((r, i) =>
    `${i + 1}. ${r.full_name} (★ ${r.stargazers_count}${r.language ? `, ${r.language}` : ''})\n   ${r.description ?? 'No description'}\n   ${r.html_url}`);
  return `Repositories matching '${query}':\n\n${lines.join('\n')}`;
}

export function formatRepository(r: RepoDetails): string {
  return [
    `${r.full_name}`,
    `${r.description ?? 'No description'}`,
    `Language: ${r.language ?? 'unknown'}`,
    `Stars: ${r.stargazers_count} · Forks: ${r.forks_count} · Open issues: ${r.open_issues_count}`,
    `Default branch: ${r.default_branch}`,
    `License: ${r.license?.name ?? 'none'}`,
    `Last updated: ${r.updated_at}`,
    `URL: ${r.html_url}`,
  ].join('\n');
}

export function formatPulls(owner: string, repo: string, pulls: PullSummary[]): string {
  if (pulls.length === 0) return `No pull requests found in ${owner}/${repo}`;
  const lines = pulls.map(p => `#${p.number} ${p.title} [${p.state}] by ${p.user?.login ?? 'unknown'} (updated ${p.updated_at})\n   ${p.html_url}`);
  return `Pull requests in ${owner}/${repo}:\n\n${lines.join('\n')}`;
}

const PR_BODY_PREVIEW_CHARS = 500;

/** `2024-05-01T12:34:56Z` as `2024-05-01 12:34`. */
function shortTimestamp(iso: string): string {
  return iso.slice(0, 16).replace('T', ' ');
}

export function formatPullDetails(p: PullDetails): string {
  const lines = [
    `**Pull Request #${p.number}: ${p.title}**`,
    '',
    `Status: ${p.state === 'open' ? '🟢 Open' : '🔴 Closed'}`,
    `Author: ${p.user?.login ?? 'unknown'}`,
    `Created: ${shortTimestamp(p.created_at)}`,
    `Updated: ${shortTimestamp(p.updated_at)}`,
    `URL: ${p.html_url}`,
  ];
  if (p.body) {
    const cut = p.body.length > PR_BODY_PREVIEW_CHARS;
    lines.push('', 'Description:', p.body.slice(0, PR_BODY_PREVIEW_CHARS) + (cut ? '...' : ''));
  }
  return lines.join('\n');
}

export function formatIssues(query: string, issues: IssueSummary[]): string {
  if (issues.length === 0) return `No issues found for query: ${query}`;
  const lines = issues.map(i => `#${i.number} ${i.pull_request ? '[PR] ' : ''}${i.title} [${i.state}]\n   ${i.html_url}`);
  return `Issues matching '${query}':\n\n${lines.join('\n')}`;
}

// ─── Handlers ───

function pullState(v: string | undefined): 'open' | 'closed' | 'all' {
  return v === 'closed' || v === 'all' ? v : 'open';
}

export function createGitHubHandlers(token: string, octokit: Octokit = new Octokit({ auth: token, userAgent: 'coralbridge' })): Record<string, ToolHandler> {
  const guarded = <T>(toolName: string, run: () => Promise<T>): Promise<T> =>
    run().catch((err: unknown) => {
      throw new ToolExecutionError(toolName, describeError(err), { cause: err });
    });

  return {
    github_search_repositories: (input, ctx) => {
      const query = requireString('github_search_repositories', input, 'query');
      return guarded('github_search_repositories', async () => {
        const { data } = await octokit.rest.search.repos({ q: query, per_page: GITHUB_RESULT_LIMIT, request: { signal: ctx.signal } });
        return formatRepositories(query, data.items);
      });
    },
    github_get_repository: (input, ctx) => {
      const owner = requireString('github_get_repository', input, 'owner');
      const repo = requireString('github_get_repository', input, 'repo');
      return guarded('github_get_repository', async () => {
        const { data } = await octokit.rest.repos.get({ owner, repo, request: { signal: ctx.signal } });
        return formatRepository(data);
      });
    },
    github_list_pull_requests: (input, ctx) => {
      const owner = requireString('github_list_pull_requests', input, 'owner');
      const repo = requireString('github_list_pull_requests', input, 'repo');
      const state = pullState(optionalString(input, 'state'));
      const limit = optionalInt(input, 'limit', GITHUB_RESULT_LIMIT, 1, 30);
      return guarded('github_list_pull_requests', async () => {
        const { data } = await octokit.rest.pulls.list({
          owner, repo, state, per_page: limit, sort: 'updated', direction: 'desc', request: { signal: ctx.signal },
        });
        return formatPulls(owner, repo, data);
      });
    },
    github_get_pr_details: (input, ctx) => {
      const owner = requireString('github_get_pr_details', input, 'owner');
      const repo = requireString('github_get_pr_details', input, 'repo');
      const pullNumber = requireInt('github_get_pr_details', input, 'pr_number');
      return guarded('github_get_pr_details', async () => {
        const { data } = await octokit.rest.pulls.get({ owner, repo, pull_number: pullNumber, request: { signal: ctx.signal } });
        return formatPullDetails(data);
      });
    },
    github_search_issues: (input, ctx) => {
      const terms = requireString('github_search_issues', input, 'query');
      const owner = optionalString(input, 'owner');
      const repo = optionalString(input, 'repo');
      const state = optionalString(input, 'state') === 'closed' ? 'closed' : 'open';
      const q = [terms, owner && repo ? `repo:${owner}/${repo}` : '', `state:${state}`].filter(Boolean).join(' ');
      return guarded('github_search_issues', async () => {
        const { data } = await octokit.rest.search.issuesAndPullRequests({ q, per_page: GITHUB_RESULT_LIMIT, request: { signal: ctx.signal } });
        return formatIssues(terms, data.items);
      });
    },
  };
}
