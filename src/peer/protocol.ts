// Wire format: one JSON object per WebSocket text message, discriminated by `type`.

export interface PeerToolInfo {
  agentId: string;
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

export interface HelloFrame {
  type: 'hello';
  agentId: string;
  runtime?: string;
  tools: PeerToolInfo[];
}

export interface WelcomeFrame {
  type: 'welcome';
  sessionId: string;
  tools: PeerToolInfo[];
}

/** Outbound: this agent calls a peer. */
export interface CallFrame {
  type: 'call';
  correlationId: string;
  target: string;
  tool?: string;
  payload: unknown;
  deadline: number;
}

/** Inbound answer to a CallFrame. */
export interface ResultFrame {
  type: 'result';
  correlationId: string;
  ok: boolean;
  payload?: string;
  error?: string;
}

/** Inbound: a peer asks this agent to do work. */
export interface RequestFrame {
  type: 'request';
  correlationId: string;
  senderAgentId: string;
  payload: unknown;
  toolName?: string;
  threadId?: string;
}

/** Outbound answer to a RequestFrame. */
export interface ResponseFrame {
  type: 'response';
  correlationId: string;
  ok: boolean;
  payload?: string;
  error?: string;
}

export interface ToolsFrame {
  type: 'tools';
  tools: PeerToolInfo[];
}

export interface PingFrame {
  type: 'ping';
  ts: number;
}

export interface PongFrame {
  type: 'pong';
  ts: number;
}

export interface ErrorFrame {
  type: 'error';
  message: string;
  correlationId?: string;
  fatal?: boolean;
}

export type PeerFrame =
  | HelloFrame
  | WelcomeFrame
  | CallFrame
  | ResultFrame
  | RequestFrame
  | ResponseFrame
  | ToolsFrame
  | PingFrame
  | PongFrame
  | ErrorFrame;

// ─── Decoding ───

function isRecord(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === 'object' && !Array.isArray(v);
}

function optionalString(v: unknown): string | undefined {
  return typeof v === 'string' ? v : undefined;
}

function parseToolInfo(v: unknown): PeerToolInfo | null {
  if (!isRecord(v)) return null;
  if (typeof v.agentId !== 'string' || typeof v.name !== 'string') return null;
  return {
    agentId: v.agentId,
    name: v.name,
    description: typeof v.description === 'string' ? v.description : '',
    inputSchema: isRecord(v.inputSchema) ? v.inputSchema : { type: 'object', properties: {} },
  };
}

/** Malformed catalogue entries are dropped, not fatal. */
export function parseToolList(v: unknown): PeerToolInfo[] {
  if (!Array.isArray(v)) return [];
  const out: PeerToolInfo[] = [];
  for (const item of v) {
    const info = parseToolInfo(item);
    if (info) out.push(info);
  }
  return out;
}

/** Frames this agent can receive. Anything else, or invalid JSON, is null. */
export function decodeFrame(text: string): PeerFrame | null {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return null;
  }
  if (!isRecord(raw) || typeof raw.type !== 'string') return null;

  switch (raw.type) {
    case 'welcome':
      return { type: 'welcome', sessionId: optionalString(raw.sessionId) ?? '', tools: parseToolList(raw.tools) };
    case 'result':
      if (typeof raw.correlationId !== 'string' || typeof raw.ok !== 'boolean') return null;
      return {
        type: 'result',
        correlationId: raw.correlationId,
        ok: raw.ok,
        payload: typeof raw.payload === 'string' ? raw.payload : raw.payload === undefined ? undefined : JSON.stringify(raw.payload),
        error: optionalString(raw.error),
      };
    case 'request':
      if (typeof raw.correlationId !== 'string' || typeof raw.senderAgentId !== 'string') return null;
      return {
        type: 'request',
        correlationId: raw.correlationId,
        senderAgentId: raw.senderAgentId,
        payload: raw.payload,
        toolName: optionalString(raw.toolName),
        threadId: optionalString(raw.threadId),
      };
    case 'tools':
      return { type: 'tools', tools: parseToolList(raw.tools) };
    case 'ping':
      return { type: 'ping', ts: typeof raw.ts === 'number' ? raw.ts : 0 };
    case 'pong':
      return { type: 'pong', ts: typeof raw.ts === 'number' ? raw.ts : 0 };
    case 'error':
      return {
        type: 'error',
        message: optionalString(raw.message) ?? 'unspecified error',
        correlationId: optionalString(raw.correlationId),
        fatal: raw.fatal === true,
      };
    default:
      return null;
  }
}

export function encodeFrame(frame: PeerFrame): string {
  return JSON.stringify(frame);
}

/** Text a peer request carries: a plain string, or `{ message }` / `{ text }`. */
export function requestText(payload: unknown): string {
  if (typeof payload === 'string') return payload;
  if (isRecord(payload)) {
    if (typeof payload.message === 'string') return payload.message;
    if (typeof payload.text === 'string') return payload.text;
  }
  return JSON.stringify(payload ?? null);
}
