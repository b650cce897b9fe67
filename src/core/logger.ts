import { createWriteStream, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import type { WriteStream } from 'node:fs';
import { LOG_META_TRUNCATE } from '../const/constants.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogThreshold = LogLevel | 'silent';

const LEVEL_PRIORITY: Record<LogThreshold, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',   // gray
  info: '\x1b[36m',    // cyan
  warn: '\x1b[33m',    // yellow
  error: '\x1b[31m',   // red
};
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

let currentLevel: LogThreshold = 'info';
let format: 'json' | 'text' = 'text';
let fileStream: WriteStream | null = null;

function isThreshold(value: string): value is LogThreshold {
  return value in LEVEL_PRIORITY;
}

export function initLogger(config: { level: string; format: string }): void {
  currentLevel = isThreshold(config.level) ? config.level : 'info';
  format = config.format === 'json' ? 'json' : 'text';
}

/** Open a log file for writing. All log output is tee'd to it, without ANSI colors. */
export function initLogFile(logDir: string, filename: string): string {
  mkdirSync(logDir, { recursive: true });
  const logFile = join(logDir, filename);
  fileStream = createWriteStream(logFile, { flags: 'a' });
  return logFile;
}

export function closeLogFile(): void {
  fileStream?.end();
  fileStream = null;
}

export function log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[currentLevel]) return;

  const now = new Date();
  const timestamp = `${String(now.getHours()).padStart(2, '0')}:${String(now.getMinutes()).padStart(2, '0')}:${String(now.getSeconds()).padStart(2, '0')}.${String(now.getMilliseconds()).padStart(3, '0')}`;
  const stream = level === 'error' ? process.stderr : process.stdout;

  if (format === 'json') {
    const entry = {
      timestamp: now.toISOString(),
      level,
      message,
      ...meta,
    };
    const line = JSON.stringify(entry) + '\n';
    stream.write(line);
    fileStream?.write(line);
    return;
  }

  const color = LEVEL_COLORS[level];
  const tag = level.toUpperCase().padEnd(5);
  const hasMeta = meta !== undefined && Object.keys(meta).length > 0;
  const metaStr = hasMeta ? ` ${DIM}${formatMeta(meta)}${RESET}` : '';
  stream.write(`${DIM}${timestamp}${RESET} ${color}${tag}${RESET} ${message}${metaStr}\n`);
  // File copy carries no ANSI codes
  const plainMeta = hasMeta ? ` ${formatMeta(meta)}` : '';
  fileStream?.write(`${timestamp} ${tag} ${message}${plainMeta}\n`);
}

export function formatMeta(meta: Record<string, unknown>): string {
  const parts: string[] = [];
  for (const [key, value] of Object.entries(meta)) {
    if (value === undefined || value === null) continue;
    if (typeof value === 'string') {
      const display = value.length > LOG_META_TRUNCATE ? value.slice(0, LOG_META_TRUNCATE) + '...' : value;
      parts.push(`${key}="${display}"`);
    } else if (typeof value === 'object') {
      parts.push(`${key}=${JSON.stringify(value)}`);
    } else {
      parts.push(`${key}=${String(value)}`);
    }
  }
  return parts.join(' ');
}
