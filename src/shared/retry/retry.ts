export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export type RetryOptions = {
  retries: number;          // attempts after the initial try (3 means up to 4 in total)
  minDelayMs: number;       // base delay for backoff, 0 retries immediately
  maxDelayMs: number;       // max delay cap
  shouldRetry?: (err: unknown) => RetryDecision;
  onRetry?: (ctx: { attempt: number; maxAttempts: number; delayMs: number; error: unknown }) => void;
  onGiveUp?: (ctx: { attempt: number; maxAttempts: number; error: unknown; exhausted: boolean }) => void;
  randomFn?: () => number;
  jitterRatio?: number;
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

/**
 * Raised once every attempt of a retried operation has failed.
 * `cause` holds the error of the final attempt.
 */
export class RetryExhaustedError extends Error {
  readonly attempts: number;
  readonly cause: unknown;

  constructor(attempts: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Gave up after ${attempts} attempt(s): ${reason}`);
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
    this.cause = cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Errors may opt out of retries by carrying `retryable: false`. */
export const isRetryableError = (err: unknown): boolean => {
  if (typeof err !== "object" || err == null || !("retryable" in err)) return true;
  return err.retryable !== false;
};

/** Resolves after `ms`, or as soon as `signal` aborts. */
export const sleepUnlessAborted = (ms: number, signal?: AbortSignal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) return resolve();
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const {
    retries,
    minDelayMs,
    maxDelayMs,
    shouldRetry = isRetryableError,
    onRetry,
    onGiveUp,
    randomFn = Math.random,
    jitterRatio = 0.2,
    signal,
    sleep = sleepUnlessAborted
  } = opts;

  if (!Number.isInteger(retries) || retries < 0) {
    throw new Error(`retries=${String(retries)} must be an integer >= 0`);
  }

  let attempt = 0;
  const maxAttempts = retries + 1;
  // attempt=0 is first try, then up to retries extra
  while (true) {
    try {
      return await fn();
    } catch (err) {
      const decision = shouldRetry(err);
      const normalized =
        typeof decision === "boolean"
          ? { retry: decision, delayMs: undefined }
          : decision;

      if (!normalized.retry || signal?.aborted) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err, exhausted: false });
        throw err;
      }
      if (attempt >= retries) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err, exhausted: true });
        throw new RetryExhaustedError(attempt + 1, err);
      }

      const customDelayMs =
        typeof normalized.delayMs === "number" && Number.isFinite(normalized.delayMs) && normalized.delayMs >= 0
          ? normalized.delayMs
          : undefined;
      const backoff = customDelayMs != null
        ? Math.min(maxDelayMs, customDelayMs)
        : Math.min(maxDelayMs, minDelayMs * Math.pow(2, attempt));
      const normalizedJitterRatio = Math.min(1, Math.max(0, jitterRatio));
      const normalizedRandom = Math.min(1, Math.max(0, randomFn()));
      const jitter = Math.floor(backoff * normalizedJitterRatio * normalizedRandom);
      const waitMs = backoff + jitter;
      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs: waitMs, error: err });
      if (waitMs > 0) await sleep(waitMs, signal);
      if (signal?.aborted) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err, exhausted: false });
        throw err;
      }
      attempt += 1;
    }
  }
};
