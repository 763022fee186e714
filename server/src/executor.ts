import type { SessionManager } from "./session_manager.js";
import type { TroubleshootResponse } from "./investigation/types.js";
import { errorMessage } from "./investigation/utils.js";

export type InvestigationRunner = (sessionId: string, signal: AbortSignal) => Promise<TroubleshootResponse>;

/** Marks a session that was cancelled before it ever started. */
export type QueuedCancellation = (sessionId: string, reason: string) => Promise<void>;

/**
 * Background queue for investigations started through the jobs API. At most
 * `concurrency` sessions run at once; the rest wait in FIFO order.
 */
export class InvestigationExecutor {
  private readonly concurrency: number;
  private readonly running = new Map<string, AbortController>();
  private readonly queue: string[] = [];

  constructor(
    private readonly sessions: SessionManager,
    private readonly runInvestigation: InvestigationRunner,
    private readonly onQueuedCancel: QueuedCancellation,
    options?: {
      concurrency?: number;
    }
  ) {
    this.concurrency = Math.max(1, options?.concurrency ?? 1);
  }

  isRunning(sessionId: string): boolean {
    return this.running.has(sessionId);
  }

  isQueued(sessionId: string): boolean {
    return this.queue.includes(sessionId);
  }

  isActive(sessionId: string): boolean {
    return this.isRunning(sessionId) || this.isQueued(sessionId);
  }

  enqueue(sessionId: string): boolean {
    if (this.isActive(sessionId)) return true;
    this.queue.push(sessionId);
    this.sessions.log(sessionId, `Queued (max concurrency ${this.concurrency})`);
    this.drain();
    return true;
  }

  cancel(sessionId: string): boolean {
    const ctrl = this.running.get(sessionId);
    if (ctrl) {
      this.sessions.log(sessionId, "Cancellation requested");
      ctrl.abort();
      return true;
    }

    const idx = this.queue.indexOf(sessionId);
    if (idx !== -1) {
      this.queue.splice(idx, 1);
      this.sessions.error(sessionId, "Cancelled while queued");
      void this.onQueuedCancel(sessionId, "Investigation cancelled while queued").catch((err: unknown) =>
        console.error(`failed to record cancellation for ${sessionId}: ${errorMessage(err)}`)
      );
      return true;
    }

    return false;
  }

  private drain(): void {
    while (this.running.size < this.concurrency) {
      const next = this.queue.shift();
      if (next === undefined) return;
      void this.start(next);
    }
  }

  private async start(sessionId: string): Promise<void> {
    const controller = new AbortController();
    this.running.set(sessionId, controller);

    try {
      const result = await this.runInvestigation(sessionId, controller.signal);
      this.sessions.log(sessionId, `Investigation finished with status ${result.status}`);
    } catch (err) {
      this.sessions.error(sessionId, errorMessage(err));
    } finally {
      this.running.delete(sessionId);
      this.drain();
    }
  }
}
