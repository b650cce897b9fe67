import { App, Assistant } from '@slack/bolt';
import type { ChannelAdapter, InboundHandler } from './adapter.js';
import { RecentIds, chunkText } from './adapter.js';
import { formatSlack } from './format.js';
import type { InboundEvent, ReplySink } from '../orchestrator/orchestrator.js';
import { log } from '../core/logger.js';
import { describeError } from '../core/errors.js';
import {
  ASSISTANT_GREETING,
  ASSISTANT_LOADING_TEXT,
  ASSISTANT_PROCESSING_FAILED,
  ASSISTANT_PROMPTS,
  ASSISTANT_START_FAILED,
  BUSY_REPLY,
  MENTION_WITHOUT_TEXT,
} from '../const/constants.js';

export interface SlackChannelConfig {
  botToken: string;
  appToken: string;
  signingSecret: string;
  port: number;
  textChunkLimit: number;
}

/** The one Web API call replies need. */
export interface SlackPoster {
  post(channel: string, threadTs: string, text: string): Promise<void>;
}

export interface SlackMessage {
  channel: string;
  ts: string;
  threadTs?: string;
  channelType?: string;
  user?: string;
  botId?: string;
  subtype?: string;
  text: string;
  files: Array<{ name: string; url?: string }>;
}

// ─── Event parsing ───

function stringField(obj: object, key: string): string | undefined {
  const value: unknown = Reflect.get(obj, key);
  return typeof value === 'string' ? value : undefined;
}

function readFiles(obj: object): SlackMessage['files'] {
  const files: unknown = Reflect.get(obj, 'files');
  if (!Array.isArray(files)) return [];
  const out: SlackMessage['files'] = [];
  for (const file of files) {
    if (typeof file !== 'object' || file === null) continue;
    const name = stringField(file, 'name') ?? stringField(file, 'title') ?? 'file';
    const url = stringField(file, 'url_private');
    out.push(url ? { name, url } : { name });
  }
  return out;
}

/** Pull the fields the agent uses out of a `message` or `app_mention` payload. */
export function readSlackMessage(event: object): SlackMessage | null {
  const channel = stringField(event, 'channel');
  const ts = stringField(event, 'ts');
  if (!channel || !ts) return null;
  return {
    channel,
    ts,
    threadTs: stringField(event, 'thread_ts'),
    channelType: stringField(event, 'channel_type'),
    user: stringField(event, 'user'),
    botId: stringField(event, 'bot_id'),
    subtype: stringField(event, 'subtype'),
    text: stringField(event, 'text') ?? '',
    files: readFiles(event),
  };
}

/** One conversation per Slack thread; a top-level message starts its own. */
export function slackConversationKey(channel: string, threadTs: string | undefined, ts: string): string {
  return `${channel}:${threadTs ?? ts}`;
}

export function stripMentions(text: string): string {
  return text.replace(/<@[A-Z0-9]+(?:\|[^>]*)?>/g, '').replace(/\s+/g, ' ').trim();
}

// ─── Dispatch ───

export interface SuggestedPrompt {
  title: string;
  message: string;
}

/** What an assistant thread exposes besides plain posting. */
export interface AssistantThreadUi {
  say(text: string): Promise<void>;
  suggest(prompts: SuggestedPrompt[]): Promise<void>;
}

export interface SlackDispatcherOptions {
  handler: InboundHandler;
  poster: SlackPoster;
  textChunkLimit: number;
  /** Whether a thread already has a live conversation with the agent */
  isActive: (conversationKey: string) => boolean;
}

/**
 * Decides which Slack events start a cycle and routes replies back into the
 * originating thread. Kept apart from the Bolt app so it runs without a socket.
 */
export class SlackDispatcher {
  private readonly recent = new RecentIds();
  private botUserId: string | null = null;

  constructor(private readonly opts: SlackDispatcherOptions) {}

  setBotUserId(id: string | null): void {
    this.botUserId = id;
  }

  /**
   * Direct messages and replies in a thread the agent already holds a
   * conversation for. Everything else in a channel needs a mention.
   */
  async onMessage(message: SlackMessage): Promise<void> {
    if (message.subtype || message.botId) return;
    if (this.botUserId && message.user === this.botUserId) return;

    const key = slackConversationKey(message.channel, message.threadTs, message.ts);
    const direct = message.channelType === 'im';
    if (!direct && !(message.threadTs && this.opts.isActive(key))) return;
    if (!direct && this.botUserId && message.text.includes(`<@${this.botUserId}>`)) return; // app_mention covers it

    await this.start(message, key);
  }

  async onMention(message: SlackMessage): Promise<void> {
    if (message.botId) return;
    const key = slackConversationKey(message.channel, message.threadTs, message.ts);
    if (stripMentions(message.text).length === 0 && message.files.length === 0) {
      if (!this.recent.admit(`${message.channel}:${message.ts}`)) return;
      log('debug', 'Slack: mention without text', { channel: message.channel });
      await this.postChunks(message.channel, message.threadTs ?? message.ts, MENTION_WITHOUT_TEXT);
      return;
    }
    await this.start(message, key);
  }

  /** A user opened the assistant pane: greet and offer starting points. */
  async startAssistantThread(ui: AssistantThreadUi): Promise<void> {
    try {
      await ui.say(ASSISTANT_GREETING);
      await ui.suggest([...ASSISTANT_PROMPTS]);
    } catch (err) {
      log('error', 'Slack: could not start assistant thread', { error: describeError(err) });
      await ui.say(ASSISTANT_START_FAILED);
    }
  }

  /** Every user message in an assistant thread is for the agent; no mention needed. */
  async onAssistantMessage(message: SlackMessage, setStatus: (text: string) => Promise<void>): Promise<void> {
    if (message.subtype || message.botId) return;
    const key = slackConversationKey(message.channel, message.threadTs, message.ts);
    try {
      await this.start(message, key, async () => {
        try {
          await setStatus(ASSISTANT_LOADING_TEXT);
        } catch (err) {
          log('warn', 'Slack: could not set assistant status', { conversationKey: key, error: describeError(err) });
        }
      });
    } catch (err) {
      log('error', 'Slack: assistant message failed', { conversationKey: key, error: describeError(err) });
      await this.postChunks(message.channel, message.threadTs ?? message.ts, ASSISTANT_PROCESSING_FAILED);
    }
  }

  private async start(message: SlackMessage, conversationKey: string, onAccepted?: () => Promise<void>): Promise<void> {
    if (!this.recent.admit(`${message.channel}:${message.ts}`)) {
      log('debug', 'Slack: duplicate event skipped', { channel: message.channel, ts: message.ts });
      return;
    }

    const text = stripMentions(message.text);
    if (!text && message.files.length === 0) return;
    if (onAccepted) await onAccepted();

    const threadTs = message.threadTs ?? message.ts;
    const event: InboundEvent = {
      conversationKey,
      sender: message.user ?? 'unknown',
      text: text || `[Sent ${message.files.length} file(s)]`,
      surface: 'slack',
      ...(message.files.length > 0 ? { attachments: message.files } : {}),
    };
    const sink: ReplySink = {
      send: reply => this.postChunks(message.channel, threadTs, reply),
      busy: () => this.postChunks(message.channel, threadTs, BUSY_REPLY),
    };

    log('debug', 'Slack: received message', { conversationKey, textLength: text.length, files: message.files.length });
    await this.opts.handler(event, sink);
  }

  private async postChunks(channel: string, threadTs: string, text: string): Promise<void> {
    const chunks = chunkText(text, this.opts.textChunkLimit);
    for (const chunk of chunks) {
      await this.opts.poster.post(channel, threadTs, formatSlack(chunk));
    }
    log('debug', 'Slack: reply sent', { channel, threadTs, chunks: chunks.length });
  }
}

// ─── Bolt adapter ───

export class SlackChannel implements ChannelAdapter {
  readonly id = 'slack';

  private readonly app: App;
  private readonly dispatcher: SlackDispatcher;
  private readonly socketMode: boolean;

  constructor(
    private readonly config: SlackChannelConfig,
    handler: InboundHandler,
    isActive: (conversationKey: string) => boolean,
  ) {
    this.socketMode = config.appToken.length > 0;
    this.app = this.socketMode
      ? new App({ token: config.botToken, appToken: config.appToken, socketMode: true })
      : new App({ token: config.botToken, signingSecret: config.signingSecret });

    this.dispatcher = new SlackDispatcher({
      handler,
      textChunkLimit: config.textChunkLimit,
      isActive,
      poster: {
        post: async (channel, threadTs, text) => {
          await this.app.client.chat.postMessage({ channel, thread_ts: threadTs, text });
        },
      },
    });
  }

  async connect(): Promise<void> {
    this.app.message(async ({ message }) => {
      const parsed = readSlackMessage(message);
      if (!parsed) return;
      try {
        await this.dispatcher.onMessage(parsed);
      } catch (err) {
        log('error', 'Slack message handler error', { error: describeError(err) });
      }
    });

    this.app.event('app_mention', async ({ event }) => {
      const parsed = readSlackMessage(event);
      if (!parsed) return;
      try {
        await this.dispatcher.onMention(parsed);
      } catch (err) {
        log('error', 'Slack mention handler error', { error: describeError(err) });
      }
    });

    this.app.assistant(new Assistant({
      threadStarted: async ({ say, setSuggestedPrompts }) => {
        await this.dispatcher.startAssistantThread({
          say: async text => {
            await say(text);
          },
          suggest: async prompts => {
            const [first, ...rest] = prompts;
            if (first) await setSuggestedPrompts({ prompts: [first, ...rest] });
          },
        });
      },
      userMessage: async ({ payload, setStatus }) => {
        const parsed = readSlackMessage(payload);
        if (!parsed) return;
        await this.dispatcher.onAssistantMessage(parsed, async text => {
          await setStatus(text);
        });
      },
    }));

    this.app.error(async (err) => {
      log('error', 'Slack app error', { error: describeError(err) });
    });

    if (this.socketMode) {
      await this.app.start();
    } else {
      await this.app.start(this.config.port);
    }

    const auth = await this.app.client.auth.test();
    this.dispatcher.setBotUserId(auth.user_id ?? null);
    log('info', 'Slack adapter connected', {
      mode: this.socketMode ? 'socket' : 'http',
      botUserId: auth.user_id,
      ...(this.socketMode ? {} : { port: this.config.port }),
    });
  }

  async disconnect(): Promise<void> {
    await this.app.stop();
    log('info', 'Slack adapter disconnected');
  }

  async isHealthy(): Promise<boolean> {
    try {
      const res = await this.app.client.auth.test();
      return res.ok === true;
    } catch (err) {
      log('debug', 'Slack health check failed', { error: describeError(err) });
      return false;
    }
  }
}
