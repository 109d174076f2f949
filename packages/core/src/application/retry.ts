export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export interface RetryContext {
  readonly attempt: number;
  readonly maxAttempts: number;
  readonly delayMs: number;
  readonly error: unknown;
}

export interface RetryOptions {
  /** Max attempts after the initial try (3 means up to 4 tries). */
  readonly retries: number;
  /** Base delay of the exponential backoff. */
  readonly minDelayMs: number;
  readonly maxDelayMs: number;
  readonly shouldRetry: (err: unknown) => RetryDecision;
  readonly onRetry?: (ctx: RetryContext) => void;
  readonly onGiveUp?: (ctx: Omit<RetryContext, 'delayMs'>) => void;
  readonly randomFn?: () => number;
  /** Fraction of the backoff added as random jitter. Default: `0.2`. */
  readonly jitterRatio?: number;
  readonly sleepFn?: (ms: number) => Promise<void>;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/** Backoff for a zero-based attempt, before jitter. */
export const backoffDelay = (attempt: number, minDelayMs: number, maxDelayMs: number): number =>
  Math.min(maxDelayMs, minDelayMs * Math.pow(2, attempt));

/**
 * Run `fn`, retrying failures that `shouldRetry` accepts with exponential
 * backoff plus jitter, up to `retries` extra attempts.
 */
export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const {
    retries,
    minDelayMs,
    maxDelayMs,
    shouldRetry,
    onRetry,
    onGiveUp,
    randomFn = Math.random,
    jitterRatio = 0.2,
    sleepFn = sleep,
  } = opts;

  const maxAttempts = retries + 1;
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      const decision = shouldRetry(err);
      const normalized = typeof decision === 'boolean' ? { retry: decision, delayMs: undefined } : decision;
      if (attempt >= retries || !normalized.retry) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err });
        throw err;
      }

      const customDelayMs =
        typeof normalized.delayMs === 'number' && Number.isFinite(normalized.delayMs) && normalized.delayMs >= 0
          ? normalized.delayMs
          : undefined;
      const backoff =
        customDelayMs !== undefined ? Math.min(maxDelayMs, customDelayMs) : backoffDelay(attempt, minDelayMs, maxDelayMs);
      // jitter spreads out synchronized retries of parallel workers
      const normalizedJitterRatio = Math.min(1, Math.max(0, jitterRatio));
      const normalizedRandom = Math.min(1, Math.max(0, randomFn()));
      const jitter = Math.floor(backoff * normalizedJitterRatio * normalizedRandom);
      const waitMs = backoff + jitter;
      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs: waitMs, error: err });
      await sleepFn(waitMs);
    }
  }
};
