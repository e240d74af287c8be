export type Sleep = (ms: number) => Promise<void>;
export type RandomSource = () => number;

export const sleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

export interface BackoffOptions {
  baseDelayMs: number;
  /** Jitter window in ms, drawn uniformly from `[min, max)`. */
  jitterMs: readonly [number, number];
  random?: RandomSource;
}

/**
 * Delay before retry number `attempt` (1-based):
 * `base * 2^(attempt-1) + uniform(jitter)`.
 */
export function backoffDelay(attempt: number, opts: BackoffOptions): number {
  const random = opts.random ?? Math.random;
  const [min, max] = opts.jitterMs;
  return opts.baseDelayMs * 2 ** (attempt - 1) + min + random() * (max - min);
}

export interface RetryOptions {
  /** Retries after the first attempt; 0 means a single attempt. */
  retries: number;
  delay: (attempt: number) => number;
  retryIf?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: Sleep;
}

/**
 * Run `fn` until it resolves or the retries run out. `fn` receives the
 * 0-based attempt index.
 */
export async function retry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  const wait = opts.sleep ?? sleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= opts.retries) throw error;
      if (opts.retryIf && !opts.retryIf(error)) throw error;

      const delayMs = opts.delay(attempt + 1);
      opts.onRetry?.(error, attempt + 1, delayMs);
      await wait(delayMs);
    }
  }
}
