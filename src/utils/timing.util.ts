/**
 * Sleep and backoff helpers
 */

export interface BackoffConfig {
  /** Base delay in ms for exponential backoff */
  baseDelayMs: number;
  /** Maximum delay in ms */
  maxDelayMs: number;
  /** Jitter factor (0-1) for randomization */
  jitterFactor: number;
}

export const DEFAULT_BACKOFF_CONFIG: Readonly<BackoffConfig> = {
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0.3,
};

/**
 * Exponential backoff with jitter: base * 2^attempt, capped
 */
export function calculateBackoff(
  attempt: number,
  config: BackoffConfig = DEFAULT_BACKOFF_CONFIG,
  random: () => number = Math.random,
): number {
  const { baseDelayMs, maxDelayMs, jitterFactor } = config;
  const exponentialDelay = Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);
  const jitter = exponentialDelay * jitterFactor * random();
  return Math.round(exponentialDelay + jitter);
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Sleep for `ms`, resolving early (never rejecting) when `signal` aborts
 */
export const sleep: SleepFn = (ms, signal) =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
