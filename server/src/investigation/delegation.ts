import type { StructuredOutput } from "./schemas.js";
import { classifyHttpStatus, isRetryableHttpStatus } from "./retry.js";
import type { SessionEvidence, SpecialistRole } from "./types.js";
import { errorMessage, truncate } from "./utils.js";
import { validateSpecialistOutput } from "./validators.js";

export const DEFAULT_DELEGATION_TIMEOUT_MS = 300_000;

/** Everything a specialist sees. Specialists are stateless, so this is resent in full on every call. */
export type DelegationContext = {
  session_id: string;
  user_request: string;
  project_id: string;
  repo_url: string;
  search_window_hours: number;
  evidence: SessionEvidence;
};

export type DelegationRequest = {
  role: SpecialistRole;
  task: string;
  context: DelegationContext;
  timeoutMs: number;
};

export type DelegationResult = {
  role: SpecialistRole;
  rawText: string;
  output: StructuredOutput;
  httpStatus: number;
  latencyMs: number;
};

export type AttemptOutcomeClass =
  | "ok"
  | "malformed_output"
  | "client_error"
  | "server_error"
  | "timeout"
  | "connection_error"
  | "aborted";

export class DelegationError extends Error {
  readonly outcome: AttemptOutcomeClass;
  readonly retryable: boolean;
  readonly httpStatus?: number;
  readonly latencyMs: number;

  constructor(
    message: string,
    details: { outcome: AttemptOutcomeClass; retryable: boolean; latencyMs: number; httpStatus?: number }
  ) {
    super(message);
    this.name = "DelegationError";
    this.outcome = details.outcome;
    this.retryable = details.retryable;
    this.latencyMs = details.latencyMs;
    this.httpStatus = details.httpStatus;
  }
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type RoleEndpoints = Record<SpecialistRole, string>;

export type DelegatorOptions = {
  fetchImpl?: FetchLike;
  now?: () => number;
};

/** Specialists may answer with plain text or wrap it as `{ "response": "..." }`. */
export function unwrapResponseBody(body: string): string {
  try {
    const parsed: unknown = JSON.parse(body);
    if (parsed && typeof parsed === "object" && "response" in parsed && typeof parsed.response === "string") {
      return parsed.response;
    }
  } catch {
    return body;
  }
  return body;
}

export class Delegator {
  private readonly fetchImpl: FetchLike;
  private readonly now: () => number;

  constructor(
    private readonly endpoints: RoleEndpoints,
    options: DelegatorOptions = {}
  ) {
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
    this.now = options.now ?? Date.now;
  }

  endpointFor(role: SpecialistRole): string {
    return this.endpoints[role];
  }

  /**
   * One POST to the role endpoint. Transport failures throw a classified
   * DelegationError; a reachable specialist always yields a result, even when
   * its text holds no valid output (ParseError).
   */
  async delegate(request: DelegationRequest, signal?: AbortSignal): Promise<DelegationResult> {
    const { role, task, context, timeoutMs } = request;
    const url = this.endpointFor(role);
    const started = this.now();
    const elapsed = () => Math.max(0, this.now() - started);

    // Scoped to this call; nothing is pooled across sessions.
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onAbort = () => controller.abort();
    if (signal?.aborted) controller.abort();
    else signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const res = await this.fetchImpl(url, {
        method: "POST",
        headers: { "Content-Type": "application/json", Accept: "application/json, text/plain" },
        body: JSON.stringify({ task, context }),
        signal: controller.signal
      });
      const body = await res.text();

      if (!res.ok) {
        const failureClass = classifyHttpStatus(res.status);
        throw new DelegationError(`${role} responded HTTP ${res.status}: ${truncate(body.trim(), 300)}`, {
          outcome: failureClass === "client" ? "client_error" : "server_error",
          retryable: isRetryableHttpStatus(res.status),
          latencyMs: elapsed(),
          httpStatus: res.status
        });
      }

      const rawText = unwrapResponseBody(body);
      return {
        role,
        rawText,
        output: validateSpecialistOutput(role, rawText),
        httpStatus: res.status,
        latencyMs: elapsed()
      };
    } catch (err) {
      if (err instanceof DelegationError) throw err;
      if (timedOut) {
        throw new DelegationError(`${role} call timed out after ${timeoutMs}ms`, {
          outcome: "timeout",
          retryable: true,
          latencyMs: elapsed()
        });
      }
      if (signal?.aborted) {
        throw new DelegationError(`${role} call aborted`, { outcome: "aborted", retryable: false, latencyMs: elapsed() });
      }
      throw new DelegationError(`${role} connection error: ${errorMessage(err)}`, {
        outcome: "connection_error",
        retryable: true,
        latencyMs: elapsed()
      });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}
