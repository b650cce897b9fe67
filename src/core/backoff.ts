export interface BackoffOptions {
  baseDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  /** Fraction of the delay randomised either way, 0–1 */
  jitter: number;
}

/**
 * Delay before retry `attempt` (0-based): base × multiplier^attempt, ± jitter,
 * clamped to [0, maxDelayMs].
 */
export function backoffDelay(attempt: number, opts: BackoffOptions, random: () => number = Math.random): number {
  const delay = opts.baseDelayMs * Math.pow(opts.multiplier, attempt);
  const jitter = delay * opts.jitter * (random() * 2 - 1);
  return Math.max(0, Math.min(Math.round(delay + jitter), opts.maxDelayMs));
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
