import { describe, expect, it, vi } from "vitest";
import { InvestigationExecutor, type InvestigationRunner } from "../src/executor.js";
import type { InvestigationEvent } from "../src/investigation/events.js";
import { InMemorySessionRepository } from "../src/investigation/session_store.js";
import type { TroubleshootResponse } from "../src/investigation/types.js";
import { SessionManager } from "../src/session_manager.js";
import { TEST_REQUEST } from "./fixtures.js";

function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

async function waitFor(fn: () => boolean | Promise<boolean>, timeoutMs = 1500): Promise<void> {
  const start = Date.now();
  while (Date.now() - start < timeoutMs) {
    if (await fn()) return;
    await sleep(10);
  }
  throw new Error("timeout");
}

type Deferred = { promise: Promise<void>; resolve: () => void };

function deferred(): Deferred {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

function success(sessionId: string): TroubleshootResponse {
  return { status: "SUCCESS", session_id: sessionId, confidence: 0.9 };
}

function messages(events: InvestigationEvent[]): unknown[] {
  return events.map((e) => e.payload.message);
}

describe("InvestigationExecutor", () => {
  it("defaults concurrency to 1 and runs queued sessions in order", async () => {
    const sessions = new SessionManager(new InMemorySessionRepository());
    const a = await sessions.createSession(TEST_REQUEST);
    const b = await sessions.createSession(TEST_REQUEST);
    const gate = deferred();
    const started: string[] = [];

    const run: InvestigationRunner = async (sessionId) => {
      started.push(sessionId);
      if (sessionId === a.sessionId) await gate.promise;
      return success(sessionId);
    };
    const executor = new InvestigationExecutor(sessions, run, async () => undefined);

    executor.enqueue(a.sessionId);
    executor.enqueue(b.sessionId);

    expect(executor.isRunning(a.sessionId)).toBe(true);
    expect(executor.isQueued(b.sessionId)).toBe(true);
    expect(started).toEqual([a.sessionId]);

    gate.resolve();
    await waitFor(() => !executor.isActive(b.sessionId));
    expect(started).toEqual([a.sessionId, b.sessionId]);
  });

  it("runs up to the configured concurrency at once", async () => {
    const sessions = new SessionManager(new InMemorySessionRepository());
    const ids = await Promise.all([1, 2, 3].map(() => sessions.createSession(TEST_REQUEST)));
    const gate = deferred();
    const run: InvestigationRunner = async (sessionId) => {
      await gate.promise;
      return success(sessionId);
    };
    const executor = new InvestigationExecutor(sessions, run, async () => undefined, { concurrency: 2 });

    for (const s of ids) executor.enqueue(s.sessionId);

    expect(ids.map((s) => executor.isRunning(s.sessionId))).toEqual([true, true, false]);
    gate.resolve();
    await waitFor(() => ids.every((s) => !executor.isActive(s.sessionId)));
  });

  it("ignores a session that is already active", async () => {
    const sessions = new SessionManager(new InMemorySessionRepository());
    const s = await sessions.createSession(TEST_REQUEST);
    const gate = deferred();
    const run = vi.fn<InvestigationRunner>(async (sessionId) => {
      await gate.promise;
      return success(sessionId);
    });
    const executor = new InvestigationExecutor(sessions, run, async () => undefined);

    executor.enqueue(s.sessionId);
    executor.enqueue(s.sessionId);
    gate.resolve();
    await waitFor(() => !executor.isActive(s.sessionId));

    expect(run).toHaveBeenCalledTimes(1);
  });

  it("aborts a running session on cancel", async () => {
    const sessions = new SessionManager(new InMemorySessionRepository());
    const s = await sessions.createSession(TEST_REQUEST);
    const events: InvestigationEvent[] = [];
    sessions.subscribe(s.sessionId, (e) => events.push(e));

    const run: InvestigationRunner = (sessionId, signal) =>
      new Promise((resolve) => {
        signal.addEventListener("abort", () =>
          resolve({ status: "FAILURE", session_id: sessionId, confidence: 0, error: "Investigation cancelled by caller" })
        );
      });
    const executor = new InvestigationExecutor(sessions, run, async () => undefined);

    executor.enqueue(s.sessionId);
    expect(executor.cancel(s.sessionId)).toBe(true);
    await waitFor(() => !executor.isActive(s.sessionId));

    expect(messages(events)).toEqual([
      "Queued (max concurrency 1)",
      "Cancellation requested",
      "Investigation finished with status FAILURE"
    ]);
  });

  it("drops a queued session on cancel and records it", async () => {
    const sessions = new SessionManager(new InMemorySessionRepository());
    const first = await sessions.createSession(TEST_REQUEST);
    const queued = await sessions.createSession(TEST_REQUEST);
    const gate = deferred();
    const run = vi.fn<InvestigationRunner>(async (sessionId) => {
      await gate.promise;
      return success(sessionId);
    });
    const onQueuedCancel = vi.fn(async (_sessionId: string, _reason: string) => undefined);
    const executor = new InvestigationExecutor(sessions, run, onQueuedCancel);

    executor.enqueue(first.sessionId);
    executor.enqueue(queued.sessionId);
    expect(executor.cancel(queued.sessionId)).toBe(true);

    expect(executor.isQueued(queued.sessionId)).toBe(false);
    expect(onQueuedCancel).toHaveBeenCalledWith(queued.sessionId, "Investigation cancelled while queued");

    gate.resolve();
    await waitFor(() => !executor.isActive(first.sessionId));
    expect(run).toHaveBeenCalledTimes(1);
  });

  it("refuses to cancel sessions it does not know", async () => {
    const sessions = new SessionManager(new InMemorySessionRepository());
    const executor = new InvestigationExecutor(sessions, async (id) => success(id), async () => undefined);
    expect(executor.cancel("inv-unknown")).toBe(false);
  });

  it("reports a runner that throws as an error event and keeps draining", async () => {
    const sessions = new SessionManager(new InMemorySessionRepository());
    const bad = await sessions.createSession(TEST_REQUEST);
    const good = await sessions.createSession(TEST_REQUEST);
    const errors: InvestigationEvent[] = [];
    sessions.subscribe(bad.sessionId, (e) => {
      if (e.type === "error") errors.push(e);
    });

    const run: InvestigationRunner = async (sessionId) => {
      if (sessionId === bad.sessionId) throw new Error("Session vanished");
      return success(sessionId);
    };
    const executor = new InvestigationExecutor(sessions, run, async () => undefined);

    executor.enqueue(bad.sessionId);
    executor.enqueue(good.sessionId);
    await waitFor(() => !executor.isActive(good.sessionId));

    expect(messages(errors)).toEqual(["Session vanished"]);
  });
});
