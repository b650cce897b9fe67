import type { CycleOutcome, InboundEvent, ReplySink } from '../orchestrator/orchestrator.js';

/** Entry point a surface hands its inbound events to. */
export type InboundHandler = (event: InboundEvent, sink: ReplySink) => Promise<CycleOutcome>;

export interface ChannelAdapter {
  readonly id: string;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  isHealthy(): Promise<boolean>;
}

/**
 * Remembers the last `capacity` ids. Slack redelivers events on slow acks,
 * and a channel mention arrives both as `message` and as `app_mention`.
 */
export class RecentIds {
  private readonly seen = new Set<string>();

  constructor(private readonly capacity = 1000) {}

  /** True the first time `id` is seen. */
  admit(id: string): boolean {
    if (this.seen.has(id)) return false;
    this.seen.add(id);
    if (this.seen.size > this.capacity) {
      const oldest = this.seen.values().next();
      if (!oldest.done) this.seen.delete(oldest.value);
    }
    return true;
  }
}

export function chunkText(text: string, maxLength: number): string[] {
  if (text.length <= maxLength) return [text];

  const chunks: string[] = [];
  let remaining = text;

  while (remaining.length > 0) {
    if (remaining.length <= maxLength) {
      chunks.push(remaining);
      break;
    }

    // Paragraph, then line, then word boundary; hard split if none is past halfway
    let splitIndex = remaining.lastIndexOf('\n\n', maxLength);
    if (splitIndex < maxLength / 2) splitIndex = remaining.lastIndexOf('\n', maxLength);
    if (splitIndex < maxLength / 2) splitIndex = remaining.lastIndexOf(' ', maxLength);
    if (splitIndex < maxLength / 2) splitIndex = maxLength;

    chunks.push(remaining.substring(0, splitIndex));
    remaining = remaining.substring(splitIndex).trimStart();
  }

  return chunks;
}
