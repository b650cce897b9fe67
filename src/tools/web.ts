import { Readability } from '@mozilla/readability';
import { JSDOM, VirtualConsole } from 'jsdom';
import { ToolExecutionError, describeError } from '../core/errors.js';
import { log } from '../core/logger.js';
import { DEFAULT_SCRAPE_MAX_LENGTH, DEFAULT_SEARCH_RESULTS } from '../const/constants.js';
import { optionalInt, requireString } from './tools.js';
import type { ToolContext, ToolHandler } from './tool-registry.js';

const DDG_API = 'https://api.duckduckgo.com/';
const USER_AGENT = 'Mozilla/5.0 (compatible; coralbridge/0.1; +https://api.duckduckgo.com)';

export type FetchLike = (url: string, init: { signal: AbortSignal; headers: Record<string, string> }) => Promise<Response>;

export interface WebToolOptions {
  timeoutMs: number;
  maxLength?: number;
  maxResults?: number;
  fetch?: FetchLike;
}

// ─── HTML ───

/** Below this much text a Readability pass is treated as having found no article. */
const MIN_READABLE_CHARS = 200;
const SUMMARY_PREVIEW_CHARS = 1000;
const HIDDEN_ELEMENTS = 'script, style, noscript, template';
// NodeFilter.SHOW_TEXT; the global only exists inside a jsdom window
const NODE_FILTER_SHOW_TEXT = 0x4;

function parseHtml(html: string, url?: string): Document {
  return new JSDOM(html, { url, virtualConsole: new VirtualConsole() }).window.document;
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** Text nodes under `root`, joined by spaces so adjacent blocks don't run together. */
function visibleText(root: Element): string {
  root.querySelectorAll(HIDDEN_ELEMENTS).forEach(el => el.remove());
  const doc = root.ownerDocument;
  const walker = doc.createTreeWalker(root, NODE_FILTER_SHOW_TEXT);
  const parts: string[] = [];
  for (let node = walker.nextNode(); node !== null; node = walker.nextNode()) {
    if (node.textContent) parts.push(node.textContent);
  }
  return collapse(parts.join(' '));
}

/**
 * Readable text of a page. Readability picks the article when there is one;
 * otherwise every visible text node of the body is kept.
 */
export function htmlToText(html: string, url?: string): string {
  try {
    const article = new Readability(parseHtml(html, url)).parse();
    const text = collapse(article?.textContent ?? '');
    if (text.length >= MIN_READABLE_CHARS) return text;
  } catch (err) {
    log('debug', 'Readability could not parse the page', { url, error: describeError(err) });
  }
  const body = parseHtml(html, url).body;
  return body ? visibleText(body) : '';
}

export function extractTitle(html: string): string | null {
  return collapse(parseHtml(html).title) || null;
}

export function extractAnchors(html: string, baseUrl: string): Array<{ text: string; url: string }> {
  const links: Array<{ text: string; url: string }> = [];
  for (const a of parseHtml(html, baseUrl).querySelectorAll('a[href]')) {
    const raw = (a.getAttribute('href') ?? '').trim();
    if (!raw || raw.startsWith('#')) continue;
    let url: URL;
    try {
      url = new URL(raw, baseUrl);
    } catch {
      continue;
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') continue;
    const text = collapse(a.textContent ?? '');
    links.push({ text: text || url.toString(), url: url.toString() });
  }
  return links;
}

export interface PageSummary {
  title: string | null;
  description: string | null;
  content: string | null;
}

/** Title, meta description and the first main/article/div.content block of a page. */
export function summarizePage(html: string, url: string): PageSummary {
  const doc = parseHtml(html, url);
  const description = collapse(doc.querySelector('meta[name="description"]')?.getAttribute('content') ?? '');
  const main = ['main', 'article', 'div.content']
    .map(selector => doc.querySelector(selector))
    .find((el): el is Element => el !== null);
  return {
    title: collapse(doc.title) || null,
    description: description || null,
    content: main ? visibleText(main) : null,
  };
}

export function formatPageSummary(url: string, page: PageSummary): string {
  let content = page.content ?? 'No main content found';
  if (content.length > SUMMARY_PREVIEW_CHARS) content = content.slice(0, SUMMARY_PREVIEW_CHARS) + '...';
  return `**${page.title ?? 'No title found'}**\n\n`
    + `URL: ${url}\n\n`
    + `Description: ${page.description ?? 'No description found'}\n\n`
    + `Content Preview:\n${content}`;
}

// ─── Fetch ───

/** Only absolute http(s) URLs reach the network. */
export function validateUrl(toolName: string, raw: string): URL {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ToolExecutionError(toolName, `invalid URL "${raw}"`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ToolExecutionError(toolName, `unsupported URL scheme "${url.protocol}"`);
  }
  return url;
}

async function fetchText(toolName: string, url: string, ctx: ToolContext, opts: WebToolOptions): Promise<string> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), opts.timeoutMs);
  const onAbort = (): void => controller.abort();
  ctx.signal.addEventListener('abort', onAbort, { once: true });
  const doFetch: FetchLike = opts.fetch ?? ((u, init) => fetch(u, init));
  try {
    const res = await doFetch(url, { signal: controller.signal, headers: { 'User-Agent': USER_AGENT, Accept: 'text/html,application/json;q=0.9,*/*;q=0.8' } });
    if (!res.ok) throw new ToolExecutionError(toolName, `HTTP ${res.status} from ${url}`);
    return await res.text();
  } catch (err) {
    if (err instanceof ToolExecutionError) throw err;
    throw new ToolExecutionError(toolName, `error accessing ${url}: ${describeError(err)}`, { cause: err });
  } finally {
    clearTimeout(timer);
    ctx.signal.removeEventListener('abort', onAbort);
  }
}

// ─── Search ───

interface SearchHit {
  text: string;
  url: string;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === 'object' && !Array.isArray(v);
}

/** Flatten a DuckDuckGo Instant Answer payload into hits, abstract first. */
export function parseInstantAnswer(body: unknown): SearchHit[] {
  if (!isRecord(body)) return [];
  const hits: SearchHit[] = [];
  if (typeof body.AbstractText === 'string' && body.AbstractText) {
    hits.push({ text: body.AbstractText, url: typeof body.AbstractURL === 'string' ? body.AbstractURL : '' });
  }
  if (Array.isArray(body.Results)) collectTopics(body.Results, hits);
  if (Array.isArray(body.RelatedTopics)) collectTopics(body.RelatedTopics, hits);
  return hits;
}

function collectTopics(topics: unknown[], out: SearchHit[]): void {
  for (const topic of topics) {
    if (!isRecord(topic)) continue;
    if (typeof topic.Text === 'string' && topic.Text) {
      out.push({ text: topic.Text, url: typeof topic.FirstURL === 'string' ? topic.FirstURL : '' });
    } else if (Array.isArray(topic.Topics)) {
      collectTopics(topic.Topics, out);
    }
  }
}

export function formatHits(heading: string, query: string, hits: SearchHit[], max: number): string {
  if (hits.length === 0) return `No results found for query: ${query}`;
  const lines = hits.slice(0, max).map((h, i) => `${i + 1}. ${h.text}${h.url ? `\n   ${h.url}` : ''}`);
  return `${heading} for '${query}':\n\n${lines.join('\n')}`;
}

// ─── Handlers ───

export function createSearchHandlers(opts: WebToolOptions): Record<string, ToolHandler> {
  const search = async (toolName: string, heading: string, query: string, max: number, ctx: ToolContext): Promise<string> => {
    const url = `${DDG_API}?${new URLSearchParams({ q: query, format: 'json', no_html: '1', skip_disambig: '1' }).toString()}`;
    const body = await fetchText(toolName, url, ctx, opts);
    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch {
      throw new ToolExecutionError(toolName, 'search service returned a non-JSON response');
    }
    const hits = parseInstantAnswer(parsed);
    log('debug', 'Search done', { tool: toolName, query, hits: hits.length });
    return formatHits(heading, query, hits, max);
  };

  return {
    web_search: (input, ctx) => {
      const query = requireString('web_search', input, 'query');
      const max = optionalInt(input, 'max_results', opts.maxResults ?? DEFAULT_SEARCH_RESULTS, 1, 20);
      return search('web_search', 'Web search results', query, max, ctx);
    },
    search_news: (input, ctx) => {
      const query = requireString('search_news', input, 'query');
      const max = optionalInt(input, 'max_results', opts.maxResults ?? DEFAULT_SEARCH_RESULTS, 1, 20);
      return search('search_news', 'News search results', `${query} news`, max, ctx);
    },
  };
}

export function createWebHandlers(opts: WebToolOptions): Record<string, ToolHandler> {
  const defaultMax = opts.maxLength ?? DEFAULT_SCRAPE_MAX_LENGTH;

  return {
    scrape_website: async (input, ctx) => {
      const url = validateUrl('scrape_website', requireString('scrape_website', input, 'url')).toString();
      const maxLength = optionalInt(input, 'max_length', defaultMax, 100, 50_000);
      let text = htmlToText(await fetchText('scrape_website', url, ctx, opts), url);
      if (text.length > maxLength) text = text.slice(0, maxLength) + '...';
      return `Content from ${url}:\n\n${text}`;
    },
    extract_links: async (input, ctx) => {
      const url = validateUrl('extract_links', requireString('extract_links', input, 'url')).toString();
      const maxLinks = optionalInt(input, 'max_links', 10, 1, 100);
      const links = extractAnchors(await fetchText('extract_links', url, ctx, opts), url);
      if (links.length === 0) return `No links found on ${url}`;
      const lines = links.slice(0, maxLinks).map((l, i) => `${i + 1}. ${l.text}\n   ${l.url}`);
      return `Links found on ${url}:\n\n${lines.join('\n')}`;
    },
    get_page_title: async (input, ctx) => {
      const url = validateUrl('get_page_title', requireString('get_page_title', input, 'url')).toString();
      const title = extractTitle(await fetchText('get_page_title', url, ctx, opts));
      return title ? `Title of ${url}: ${title}` : `No title found for ${url}`;
    },
    get_website_summary: async (input, ctx) => {
      const url = validateUrl('get_website_summary', requireString('get_website_summary', input, 'url')).toString();
      return formatPageSummary(url, summarizePage(await fetchText('get_website_summary', url, ctx, opts), url));
    },
  };
}
