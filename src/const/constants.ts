// ─── Logging ───

/** Metadata strings longer than this are cut in text-format log lines. */
export const LOG_META_TRUNCATE = 200;

// ─── Config ───

export const CONFIG_FILE_ENV = 'CORALBRIDGE_CONFIG';
export const DEFAULT_CONFIG_FILE = 'coralbridge.json';

// ─── Orchestrator (milliseconds unless noted) ───

/** Deciding↔Dispatching round-trips allowed per inbound event. */
export const DEFAULT_MAX_ITERATIONS = 8;

/** Per tool/peer invocation deadline. */
export const DEFAULT_TOOL_TIMEOUT_MS = 30_000;

/** Whole-cycle deadline for one inbound event. */
export const DEFAULT_CYCLE_TIMEOUT_MS = 120_000;

/** Extra attempts after a ModelUnavailable failure. */
export const DEFAULT_DECISION_RETRIES = 2;

export const DEFAULT_DECISION_RETRY_BASE_MS = 500;

/** How long a second event for a busy conversation waits for the lock. */
export const DEFAULT_LOCK_TIMEOUT_MS = 30_000;

// ─── Context ───

export const DEFAULT_MAX_CONTEXT_TURNS = 40;
export const DEFAULT_MAX_CONTEXT_TOKENS = 24_000;

/** Approximate characters per token (heuristic). */
export const DEFAULT_CHARS_PER_TOKEN = 3.5;

export const MIN_TOOL_RESULT_CHARS = 500;
export const MAX_TOOL_RESULT_CHARS = 8_000;

// ─── Sessions ───

export const DEFAULT_IDLE_TIMEOUT_MS = 30 * 60_000;
export const DEFAULT_SWEEP_INTERVAL_MS = 60_000;

// ─── Model ───

export const DEFAULT_MODEL_PROVIDER = 'mistral';
export const DEFAULT_MODEL_NAME = 'mistral-large-latest';
export const DEFAULT_TEMPERATURE = 0.3;
export const DEFAULT_MAX_TOKENS = 16_000;
export const DEFAULT_MODEL_TIMEOUT_MS = 60_000;

// ─── Peer session ───

export const DEFAULT_HEARTBEAT_INTERVAL_MS = 15_000;
export const DEFAULT_HEARTBEAT_TIMEOUT_MS = 5_000;
export const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;
export const DEFAULT_RECONNECT_ATTEMPTS = 5;
export const DEFAULT_RECONNECT_BASE_MS = 1_000;
export const DEFAULT_RECONNECT_MAX_MS = 30_000;
export const DEFAULT_RECONNECT_MULTIPLIER = 2;
export const DEFAULT_RECONNECT_JITTER = 0.2;

/** WebSocket close code the coordination server uses for rejected credentials. */
export const PEER_AUTH_FAILURE_CLOSE_CODE = 4401;

// ─── Slack ───

export const SLACK_TEXT_CHUNK_LIMIT = 4_000;

// ─── Gateway ───

export const DEFAULT_GATEWAY_HOST = '127.0.0.1';
export const DEFAULT_GATEWAY_PORT = 3000;
export const GATEWAY_CONVERSATION_KEY = 'gateway';

// ─── Tools ───

export const DEFAULT_SCRAPE_MAX_LENGTH = 2_000;
export const DEFAULT_FETCH_TIMEOUT_MS = 10_000;
export const DEFAULT_SEARCH_RESULTS = 5;
export const GITHUB_RESULT_LIMIT = 5;

// ─── User-facing fallbacks ───

export const APOLOGY_REPLY = 'Something went wrong on my end. Please try again.';
export const BUSY_REPLY = "I'm still working on your previous message in this thread. Please try again in a moment.";
export const ASSISTANT_GREETING = 'Hi! How can I help you today?';
export const ASSISTANT_LOADING_TEXT = 'working on it...';
export const ASSISTANT_START_FAILED = ':warning: Looks like I had some trouble starting up. Please try again';
export const ASSISTANT_PROCESSING_FAILED = ':warning: Looks like I had some trouble processing. Please try again.';
export const ASSISTANT_PROMPTS: ReadonlyArray<{ title: string; message: string }> = [
  { title: 'Web research', message: 'Search the web for the latest news on coral reef restoration' },
  { title: 'Page summary', message: 'Give me a summary of https://example.com' },
  { title: 'Developer assistant', message: 'Tell me about recently opened pull requests in octocat/Hello-World' },
];
export const MENTION_WITHOUT_TEXT = "Hi there! You didn't provide a message with your mention. Mention me again in this thread so that I can help you out!";
