import { describe, expect, it, vi } from "vitest";
import {
  AbortedError,
  abortableSleep,
  backoffDelayMs,
  BACKOFF_SEQUENCE_MS,
  classifyHttpStatus,
  isRetryable,
  NonRetryableError,
  retryAsync,
  RetryableError
} from "../src/investigation/retry.js";

function recordingSleep() {
  const delays: number[] = [];
  const sleep = vi.fn(async (ms: number) => {
    delays.push(ms);
  });
  return { delays, sleep };
}

describe("retry controller", () => {
  it("uses the 1s/2s/4s backoff sequence", () => {
    expect([...BACKOFF_SEQUENCE_MS]).toEqual([1000, 2000, 4000]);
    expect(backoffDelayMs(1)).toBe(1000);
    expect(backoffDelayMs(2)).toBe(2000);
    expect(backoffDelayMs(3)).toBe(4000);
    expect(backoffDelayMs(9)).toBe(4000);
  });

  it("classifies HTTP statuses", () => {
    expect(classifyHttpStatus(404)).toBe("client");
    expect(classifyHttpStatus(503)).toBe("server");
    expect(classifyHttpStatus(302)).toBe("other");
  });

  it("reads the retryable flag off errors", () => {
    expect(isRetryable(new RetryableError("x"))).toBe(true);
    expect(isRetryable(new NonRetryableError("x"))).toBe(false);
    expect(isRetryable({ retryable: false })).toBe(false);
    expect(isRetryable(new Error("plain"))).toBe(true);
  });

  it("returns the first success without sleeping", async () => {
    const { sleep } = recordingSleep();
    const fn = vi.fn(async () => "ok");
    await expect(retryAsync(fn, { sleep })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("retries retryable errors up to three attempts with backoff", async () => {
    const { delays, sleep } = recordingSleep();
    const attempts: number[] = [];
    const err = new RetryableError("flaky");
    const fn = vi.fn(async (attempt: number) => {
      attempts.push(attempt);
      throw err;
    });

    await expect(retryAsync(fn, { sleep })).rejects.toBe(err);
    expect(attempts).toEqual([1, 2, 3]);
    expect(delays).toEqual([1000, 2000]);
  });

  it("recovers when a later attempt succeeds", async () => {
    const { delays, sleep } = recordingSleep();
    const onRetry = vi.fn();
    const fn = vi.fn(async (attempt: number) => {
      if (attempt < 3) throw new RetryableError(`try ${attempt}`);
      return attempt;
    });

    await expect(retryAsync(fn, { sleep, onRetry })).resolves.toBe(3);
    expect(delays).toEqual([1000, 2000]);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls[0][0]).toMatchObject({ attempt: 1, maxAttempts: 3, delayMs: 1000 });
  });

  it("rethrows non-retryable errors immediately", async () => {
    const { sleep } = recordingSleep();
    const err = new NonRetryableError("HTTP 400");
    const fn = vi.fn(async () => {
      throw err;
    });

    await expect(retryAsync(fn, { sleep })).rejects.toBe(err);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("honours a custom shouldRetry", async () => {
    const { sleep } = recordingSleep();
    const fn = vi.fn(async () => {
      throw new Error("unexpected");
    });

    await expect(retryAsync(fn, { sleep, shouldRetry: () => false })).rejects.toThrow("unexpected");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("stops before the next attempt once the signal is aborted", async () => {
    const controller = new AbortController();
    const sleep = vi.fn(async () => {
      controller.abort();
    });
    const fn = vi.fn(async () => {
      throw new RetryableError("flaky");
    });

    await expect(retryAsync(fn, { sleep, signal: controller.signal })).rejects.toBeInstanceOf(AbortedError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("abortableSleep rejects when aborted mid-wait", async () => {
    const controller = new AbortController();
    const pending = abortableSleep(60_000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(AbortedError);
  });

  it("abortableSleep resolves after the delay", async () => {
    vi.useFakeTimers();
    try {
      const pending = abortableSleep(1000);
      await vi.advanceTimersByTimeAsync(1000);
      await expect(pending).resolves.toBeUndefined();
    } finally {
      vi.useRealTimers();
    }
  });
});
