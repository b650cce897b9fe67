import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { log } from './logger.js';
import {
  CONFIG_FILE_ENV,
  DEFAULT_CONFIG_FILE,
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_TOOL_TIMEOUT_MS,
  DEFAULT_CYCLE_TIMEOUT_MS,
  DEFAULT_DECISION_RETRIES,
  DEFAULT_DECISION_RETRY_BASE_MS,
  DEFAULT_LOCK_TIMEOUT_MS,
  DEFAULT_MAX_CONTEXT_TURNS,
  DEFAULT_MAX_CONTEXT_TOKENS,
  DEFAULT_IDLE_TIMEOUT_MS,
  DEFAULT_SWEEP_INTERVAL_MS,
  DEFAULT_MODEL_PROVIDER,
  DEFAULT_MODEL_NAME,
  DEFAULT_TEMPERATURE,
  DEFAULT_MAX_TOKENS,
  DEFAULT_MODEL_TIMEOUT_MS,
  DEFAULT_HEARTBEAT_INTERVAL_MS,
  DEFAULT_HEARTBEAT_TIMEOUT_MS,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_RECONNECT_ATTEMPTS,
  DEFAULT_RECONNECT_BASE_MS,
  DEFAULT_RECONNECT_MAX_MS,
  DEFAULT_RECONNECT_MULTIPLIER,
  DEFAULT_RECONNECT_JITTER,
  SLACK_TEXT_CHUNK_LIMIT,
  DEFAULT_GATEWAY_HOST,
  DEFAULT_GATEWAY_PORT,
  DEFAULT_SCRAPE_MAX_LENGTH,
  DEFAULT_FETCH_TIMEOUT_MS,
} from '../const/constants.js';

// ─── Error ──────────────────────────────────────────────────────────

export class ConfigError extends Error {
  readonly code = 'CONFIG_INVALID';

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ─── Types ──────────────────────────────────────────────────────────

export interface McpServerConfig {
  // Transport: auto-detected from fields if omitted
  transport?: 'stdio' | 'http' | 'sse';

  // stdio
  command?: string;
  args?: string[];
  env?: Record<string, string>;
  cwd?: string;

  // http / sse
  url?: string;
  headers?: Record<string, string>;

  // Common (defaults to true)
  enabled?: boolean;
}

export interface ReconnectConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  /** Fraction of the delay randomised either way, 0–1 */
  jitter: number;
}

export interface AgentConfig {
  agent: {
    name: string;
    /** Extra instructions appended to the built-in system prompt */
    instructions: string;
  };
  model: {
    provider: string;
    name: string;
    apiKey: string;
    baseUrl: string | null;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
  };
  orchestrator: {
    maxIterations: number;
    toolTimeoutMs: number;
    cycleTimeoutMs: number;
    decisionRetries: number;
    decisionRetryBaseMs: number;
    lockTimeoutMs: number;
    maxContextTurns: number;
    maxContextTokens: number;
  };
  sessions: {
    idleTimeoutMs: number;
    sweepIntervalMs: number;
  };
  peer: {
    enabled: boolean;
    url: string;
    agentId: string;
    /** Set when launched by the coordination runtime rather than by hand */
    runtime: string | null;
    connectTimeoutMs: number;
    heartbeatIntervalMs: number;
    heartbeatTimeoutMs: number;
    reconnect: ReconnectConfig;
  };
  slack: {
    enabled: boolean;
    botToken: string;
    appToken: string;
    signingSecret: string;
    port: number;
    textChunkLimit: number;
  };
  gateway: {
    enabled: boolean;
    host: string;
    port: number;
    authType: 'none' | 'bearer';
    authValue: string | null;
    cors: string[];
  };
  logs: { level: string; format: string; dir: string | null };
  tools: {
    search: { enabled: boolean; maxResults: number };
    web: { enabled: boolean; maxLength: number; timeoutMs: number };
    github: { token: string };
  };
  mcpServers: Record<string, McpServerConfig>;
}

// ─── Defaults ───────────────────────────────────────────────────────

export const CONFIG_DEFAULTS: AgentConfig = {
  agent: { name: 'Coralbridge', instructions: '' },
  model: {
    provider: DEFAULT_MODEL_PROVIDER,
    name: DEFAULT_MODEL_NAME,
    apiKey: '',
    baseUrl: null,
    temperature: DEFAULT_TEMPERATURE,
    maxTokens: DEFAULT_MAX_TOKENS,
    timeoutMs: DEFAULT_MODEL_TIMEOUT_MS,
  },
  orchestrator: {
    maxIterations: DEFAULT_MAX_ITERATIONS,
    toolTimeoutMs: DEFAULT_TOOL_TIMEOUT_MS,
    cycleTimeoutMs: DEFAULT_CYCLE_TIMEOUT_MS,
    decisionRetries: DEFAULT_DECISION_RETRIES,
    decisionRetryBaseMs: DEFAULT_DECISION_RETRY_BASE_MS,
    lockTimeoutMs: DEFAULT_LOCK_TIMEOUT_MS,
    maxContextTurns: DEFAULT_MAX_CONTEXT_TURNS,
    maxContextTokens: DEFAULT_MAX_CONTEXT_TOKENS,
  },
  sessions: {
    idleTimeoutMs: DEFAULT_IDLE_TIMEOUT_MS,
    sweepIntervalMs: DEFAULT_SWEEP_INTERVAL_MS,
  },
  peer: {
    enabled: false,
    url: '',
    agentId: '',
    runtime: null,
    connectTimeoutMs: DEFAULT_CONNECT_TIMEOUT_MS,
    heartbeatIntervalMs: DEFAULT_HEARTBEAT_INTERVAL_MS,
    heartbeatTimeoutMs: DEFAULT_HEARTBEAT_TIMEOUT_MS,
    reconnect: {
      maxAttempts: DEFAULT_RECONNECT_ATTEMPTS,
      baseDelayMs: DEFAULT_RECONNECT_BASE_MS,
      maxDelayMs: DEFAULT_RECONNECT_MAX_MS,
      multiplier: DEFAULT_RECONNECT_MULTIPLIER,
      jitter: DEFAULT_RECONNECT_JITTER,
    },
  },
  slack: {
    enabled: false,
    botToken: '',
    appToken: '',
    signingSecret: '',
    port: 3001,
    textChunkLimit: SLACK_TEXT_CHUNK_LIMIT,
  },
  gateway: {
    enabled: true,
    host: DEFAULT_GATEWAY_HOST,
    port: DEFAULT_GATEWAY_PORT,
    authType: 'none',
    authValue: null,
    cors: [],
  },
  logs: { level: 'info', format: 'text', dir: null },
  tools: {
    search: { enabled: true, maxResults: 5 },
    web: { enabled: true, maxLength: DEFAULT_SCRAPE_MAX_LENGTH, timeoutMs: DEFAULT_FETCH_TIMEOUT_MS },
    github: { token: '' },
  },
  mcpServers: {},
};

// ─── Deep Merge ─────────────────────────────────────────────────────

/** Keys whose values are dynamic records or arrays: kept as-is from loaded data */
const DYNAMIC_KEYS = new Set(['mcpServers', 'cors']);

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === 'object' && !Array.isArray(v);
}

/** Recursively fill missing keys from defaults. Dynamic keys keep loaded value as-is. */
export function deepMerge(loaded: Record<string, unknown>, defaults: object): Record<string, unknown> {
  const result: Record<string, unknown> = { ...loaded };
  for (const [key, value] of Object.entries(defaults)) {
    const fallback: unknown = value;
    if (DYNAMIC_KEYS.has(key)) {
      if (!(key in result)) result[key] = fallback;
      continue;
    }
    const current = result[key];
    if (isPlainObject(fallback) && isPlainObject(current)) {
      result[key] = deepMerge(current, fallback);
    } else if (!(key in result)) {
      result[key] = isPlainObject(fallback) ? structuredClone(fallback) : fallback;
    }
  }
  return result;
}

// ─── Environment overrides ──────────────────────────────────────────

type Env = Record<string, string | undefined>;

function section(root: Record<string, unknown>, key: string): Record<string, unknown> {
  const existing = root[key];
  if (isPlainObject(existing)) return existing;
  const created: Record<string, unknown> = {};
  root[key] = created;
  return created;
}

function setString(target: Record<string, unknown>, key: string, value: string | undefined): void {
  if (value !== undefined && value !== '') target[key] = value;
}

function setNumber(target: Record<string, unknown>, key: string, value: string | undefined, envName: string): void {
  if (value === undefined || value === '') return;
  const n = Number(value);
  if (Number.isNaN(n)) throw new ConfigError(`${envName} must be a number, got "${value}"`);
  target[key] = n;
}

/**
 * Overlay the environment variables the agent has always been launched with.
 * Presence of a Coral connection URL or Slack bot token switches that surface on.
 */
export function applyEnvOverrides(raw: Record<string, unknown>, env: Env): Record<string, unknown> {
  const out = structuredClone(raw);

  const model = section(out, 'model');
  setString(model, 'name', env.MODEL_NAME);
  setString(model, 'provider', env.MODEL_PROVIDER);
  setString(model, 'apiKey', env.MODEL_API_KEY);
  setString(model, 'baseUrl', env.MODEL_BASE_URL);
  setNumber(model, 'temperature', env.MODEL_TEMPERATURE, 'MODEL_TEMPERATURE');
  setNumber(model, 'maxTokens', env.MODEL_MAX_TOKENS, 'MODEL_MAX_TOKENS');
  setNumber(model, 'timeoutMs', env.TIMEOUT_MS, 'TIMEOUT_MS');

  const peer = section(out, 'peer');
  setString(peer, 'url', env.CORAL_CONNECTION_URL);
  setString(peer, 'agentId', env.CORAL_AGENT_ID);
  setString(peer, 'runtime', env.CORAL_ORCHESTRATION_RUNTIME);
  if (env.CORAL_CONNECTION_URL) peer.enabled = true;

  const slack = section(out, 'slack');
  setString(slack, 'botToken', env.SLACK_BOT_TOKEN);
  setString(slack, 'appToken', env.SLACK_APP_TOKEN);
  setString(slack, 'signingSecret', env.SLACK_SIGNING_SECRET);
  if (env.SLACK_BOT_TOKEN) slack.enabled = true;

  const gateway = section(out, 'gateway');
  setNumber(gateway, 'port', env.GATEWAY_PORT, 'GATEWAY_PORT');
  if (env.GATEWAY_AUTH_TOKEN) {
    gateway.authType = 'bearer';
    gateway.authValue = env.GATEWAY_AUTH_TOKEN;
  }

  const logs = section(out, 'logs');
  setString(logs, 'level', env.LOG_LEVEL);
  setString(logs, 'format', env.LOG_FORMAT);

  const tools = section(out, 'tools');
  setString(section(tools, 'github'), 'token', env.GITHUB_TOKEN);

  return out;
}

// ─── Validation ─────────────────────────────────────────────────────

function requirePositive(value: unknown, path: string): void {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`${path} must be a positive number`);
  }
}

function requireNonNegative(value: unknown, path: string): void {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new ConfigError(`${path} must be a non-negative number`);
  }
}

function requireObject(value: unknown, path: string): Record<string, unknown> {
  if (!isPlainObject(value)) throw new ConfigError(`Missing or invalid "${path}" section`);
  return value;
}

export function validateConfig(config: unknown): asserts config is AgentConfig {
  const c = requireObject(config, 'config');

  const agent = requireObject(c.agent, 'agent');
  if (typeof agent.name !== 'string' || agent.name.length === 0) throw new ConfigError('agent.name must be a non-empty string');

  // model
  const model = requireObject(c.model, 'model');
  if (typeof model.provider !== 'string' || !model.provider) throw new ConfigError('model.provider must be a non-empty string');
  if (typeof model.name !== 'string' || !model.name) throw new ConfigError('model.name must be a non-empty string');
  if (typeof model.apiKey !== 'string' || !model.apiKey) throw new ConfigError('model.apiKey is required (set MODEL_API_KEY)');
  if (typeof model.temperature !== 'number' || model.temperature < 0 || model.temperature > 2) {
    throw new ConfigError(`model.temperature must be between 0 and 2, got ${String(model.temperature)}`);
  }
  requirePositive(model.maxTokens, 'model.maxTokens');
  requirePositive(model.timeoutMs, 'model.timeoutMs');

  // orchestrator
  const orch = requireObject(c.orchestrator, 'orchestrator');
  for (const key of ['maxIterations', 'toolTimeoutMs', 'cycleTimeoutMs', 'decisionRetryBaseMs', 'lockTimeoutMs', 'maxContextTurns', 'maxContextTokens']) {
    requirePositive(orch[key], `orchestrator.${key}`);
  }
  requireNonNegative(orch.decisionRetries, 'orchestrator.decisionRetries');

  // sessions
  const sessions = requireObject(c.sessions, 'sessions');
  requirePositive(sessions.idleTimeoutMs, 'sessions.idleTimeoutMs');
  requirePositive(sessions.sweepIntervalMs, 'sessions.sweepIntervalMs');

  // peer
  const peer = requireObject(c.peer, 'peer');
  if (peer.enabled === true) {
    if (typeof peer.url !== 'string' || !peer.url) throw new ConfigError('peer.url is required when the peer session is enabled (set CORAL_CONNECTION_URL)');
    if (typeof peer.agentId !== 'string' || !peer.agentId) throw new ConfigError('peer.agentId is required when the peer session is enabled (set CORAL_AGENT_ID)');
  }
  requirePositive(peer.connectTimeoutMs, 'peer.connectTimeoutMs');
  requirePositive(peer.heartbeatIntervalMs, 'peer.heartbeatIntervalMs');
  requirePositive(peer.heartbeatTimeoutMs, 'peer.heartbeatTimeoutMs');
  const reconnect = requireObject(peer.reconnect, 'peer.reconnect');
  requireNonNegative(reconnect.maxAttempts, 'peer.reconnect.maxAttempts');
  requirePositive(reconnect.baseDelayMs, 'peer.reconnect.baseDelayMs');
  requirePositive(reconnect.maxDelayMs, 'peer.reconnect.maxDelayMs');
  requirePositive(reconnect.multiplier, 'peer.reconnect.multiplier');
  if (typeof reconnect.jitter !== 'number' || reconnect.jitter < 0 || reconnect.jitter > 1) {
    throw new ConfigError('peer.reconnect.jitter must be between 0 and 1');
  }

  // slack
  const slack = requireObject(c.slack, 'slack');
  if (slack.enabled === true) {
    if (typeof slack.botToken !== 'string' || !slack.botToken) throw new ConfigError('slack.botToken is required when Slack is enabled (set SLACK_BOT_TOKEN)');
    const hasAppToken = typeof slack.appToken === 'string' && slack.appToken.length > 0;
    const hasSecret = typeof slack.signingSecret === 'string' && slack.signingSecret.length > 0;
    if (!hasAppToken && !hasSecret) {
      throw new ConfigError('Slack needs SLACK_APP_TOKEN (socket mode) or SLACK_SIGNING_SECRET (HTTP mode)');
    }
  }
  requirePositive(slack.textChunkLimit, 'slack.textChunkLimit');

  // gateway
  const gw = requireObject(c.gateway, 'gateway');
  if (typeof gw.port !== 'number') throw new ConfigError('gateway.port must be a number');
  if (gw.authType !== 'none' && gw.authType !== 'bearer') throw new ConfigError('gateway.authType must be "none" or "bearer"');
  if (!Array.isArray(gw.cors)) throw new ConfigError('gateway.cors must be an array');

  // logs
  const logs = requireObject(c.logs, 'logs');
  if (typeof logs.level !== 'string') throw new ConfigError('logs.level must be a string');

  requireObject(c.tools, 'tools');
  requireObject(c.mcpServers, 'mcpServers');
}

// ─── Load ───────────────────────────────────────────────────────────

/** Merge file contents and environment over the defaults, then validate. Pure. */
export function resolveConfig(fileConfig: Record<string, unknown>, env: Env): AgentConfig {
  const withEnv = applyEnvOverrides(fileConfig, env);
  const merged = deepMerge(withEnv, structuredClone(CONFIG_DEFAULTS));
  validateConfig(merged);
  return merged;
}

function readConfigFile(path: string): Record<string, unknown> {
  if (!existsSync(path)) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch {
    throw new ConfigError(`Config file ${path} is not valid JSON`);
  }
  if (!isPlainObject(parsed)) throw new ConfigError(`Config file ${path} must hold a JSON object`);
  return parsed;
}

/** Read the config file (if any) and the environment. A missing file means defaults. */
export function loadConfig(opts: { path?: string; env?: Env } = {}): AgentConfig {
  const env = opts.env ?? process.env;
  const path = resolve(opts.path ?? env[CONFIG_FILE_ENV] ?? DEFAULT_CONFIG_FILE);
  const config = resolveConfig(readConfigFile(path), env);

  log('info', 'Config loaded', {
    file: existsSync(path) ? path : '(none)',
    provider: config.model.provider,
    model: config.model.name,
    peer: config.peer.enabled ? config.peer.url : 'disabled',
    slack: config.slack.enabled ? (config.slack.appToken ? 'socket' : 'http') : 'disabled',
    mcpServers: Object.keys(config.mcpServers).join(', '),
    logLevel: config.logs.level,
  });

  return config;
}

// ─── Redact ──────────────────────────────────────────────────────────

/** Deep clone with secrets masked. Safe to print or return from the API. */
export function redactConfig(config: Readonly<AgentConfig>): AgentConfig {
  const clone: AgentConfig = structuredClone(config);
  if (clone.model.apiKey) clone.model.apiKey = '***';
  if (clone.slack.botToken) clone.slack.botToken = '***';
  if (clone.slack.appToken) clone.slack.appToken = '***';
  if (clone.slack.signingSecret) clone.slack.signingSecret = '***';
  if (clone.gateway.authValue) clone.gateway.authValue = '***';
  if (clone.tools.github.token) clone.tools.github.token = '***';
  for (const server of Object.values(clone.mcpServers)) {
    if (server.headers) {
      for (const name of Object.keys(server.headers)) server.headers[name] = '***';
    }
    if (server.env) {
      for (const name of Object.keys(server.env)) server.env[name] = '***';
    }
  }
  return clone;
}
