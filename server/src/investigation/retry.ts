export const MAX_ATTEMPTS = 3;
export const BACKOFF_SEQUENCE_MS = [1_000, 2_000, 4_000] as const;

/** Errors that are worth another attempt (5xx, timeouts, malformed output, gate RETRY). */
export class RetryableError extends Error {
  readonly retryable = true;
  constructor(message: string) {
    super(message);
    this.name = "RetryableError";
  }
}

/** Errors that escalate immediately (4xx, hard blockers, gate FAIL, cancellation). */
export class NonRetryableError extends Error {
  readonly retryable = false;
  constructor(message: string) {
    super(message);
    this.name = "NonRetryableError";
  }
}

export class AbortedError extends NonRetryableError {
  constructor(message = "Aborted") {
    super(message);
    this.name = "AbortedError";
  }
}

export type HttpFailureClass = "client" | "server" | "other";

export function classifyHttpStatus(status: number): HttpFailureClass {
  if (status >= 500 && status < 600) return "server";
  if (status >= 400 && status < 500) return "client";
  return "other";
}

export function isRetryableHttpStatus(status: number): boolean {
  return classifyHttpStatus(status) !== "client";
}

export function isRetryable(err: unknown): boolean {
  if (err && typeof err === "object" && "retryable" in err && typeof err.retryable === "boolean") {
    return err.retryable;
  }
  if (err instanceof Error && err.name === "AbortError") return false;
  return true;
}

/** Delay before the attempt that follows `attempt` (1-based): 1s, 2s, 4s. */
export function backoffDelayMs(attempt: number, sequence: readonly number[] = BACKOFF_SEQUENCE_MS): number {
  const idx = Math.min(Math.max(attempt, 1) - 1, sequence.length - 1);
  return sequence[idx];
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const abortableSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortedError("Aborted during backoff"));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortedError("Aborted during backoff"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export type RetryInfo = {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: unknown;
};

export type RetryOptions = {
  maxAttempts?: number;
  backoffMs?: readonly number[];
  sleep?: Sleep;
  signal?: AbortSignal;
  shouldRetry?: (err: unknown) => boolean;
  onRetry?: (info: RetryInfo) => void;
};

/**
 * Runs `fn` until it resolves, a non-retryable error escapes, or attempts are
 * exhausted. The last error is rethrown unchanged.
 */
export async function retryAsync<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? MAX_ATTEMPTS);
  const backoff = options.backoffMs ?? BACKOFF_SEQUENCE_MS;
  const sleep = options.sleep ?? abortableSleep;
  const shouldRetry = options.shouldRetry ?? isRetryable;

  let lastError: unknown = new Error("retryAsync made no attempts");
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (options.signal?.aborted) throw new AbortedError();
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (!shouldRetry(err) || attempt === maxAttempts) throw err;
      const delayMs = backoffDelayMs(attempt, backoff);
      options.onRetry?.({ attempt, maxAttempts, delayMs, error: err });
      await sleep(delayMs, options.signal);
    }
  }
  throw lastError;
}
