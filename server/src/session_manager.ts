import { EventEmitter } from "node:events";
import { randomBytes } from "node:crypto";
import { aggregateConfidence } from "./investigation/confidence.js";
import { EVENT_TYPES, type AnalyticsSink, type InvestigationEvent, type InvestigationEventType } from "./investigation/events.js";
import type { AttemptOutcomeClass } from "./investigation/delegation.js";
import type { SessionRepository } from "./investigation/session_store.js";
import type { ArchitectOutput, InvestigatorOutput, SreOutput, TroubleshootRequest } from "./investigation/schemas.js";
import {
  canTransition,
  isTerminalPhase,
  type InvestigationPlan,
  type InvestigationSession,
  type QualityGateDecision,
  type SpecialistRole,
  type TroubleshootResponse,
  type WorkflowPhase
} from "./investigation/types.js";
import { errorMessage, nowIso } from "./investigation/utils.js";

export const DEFAULT_SEARCH_WINDOW_HOURS = 1;

const SESSION_ID_PREFIX = "inv";
const SESSION_ID_SUFFIX_LEN = 12;
const SESSION_ID_MAX_ATTEMPTS = 10;
const SESSION_ID_ALPHABET = "abcdefghijklmnopqrstuvwxyz0123456789";

function randomSessionSuffix(length: number): string {
  const bytes = randomBytes(length);
  let out = "";
  for (let i = 0; i < bytes.length; i++) {
    out += SESSION_ID_ALPHABET[bytes[i] % SESSION_ID_ALPHABET.length];
  }
  return out;
}

export class InvalidTransitionError extends Error {
  constructor(
    readonly from: WorkflowPhase,
    readonly to: WorkflowPhase
  ) {
    super(`Illegal phase transition ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
  }
}

export class SessionNotFoundError extends Error {
  constructor(sessionId: string) {
    super(`Session ${sessionId} not found`);
    this.name = "SessionNotFoundError";
  }
}

export type SessionListItem = Pick<
  InvestigationSession,
  "sessionId" | "phase" | "status" | "createdAt" | "updatedAt" | "completedAt"
> & { userRequest: string };

export type AttemptRecord = {
  attempt: number;
  maxAttempts: number;
  elapsedMs: number;
  outcome: AttemptOutcomeClass;
  httpStatus?: number;
  latencyMs?: number;
  message?: string;
};

export type CommittedEvidence =
  | { role: "sre"; data: SreOutput; confidence: number }
  | { role: "investigator"; data: InvestigatorOutput; confidence: number }
  | { role: "architect"; data: ArchitectOutput; confidence: number };

export type Findings = {
  warnings?: string[];
  limitations?: string[];
  blockers?: string[];
};

export type SessionManagerOptions = {
  sinks?: AnalyticsSink[];
  searchWindowHours?: number;
};

function appendUnique(target: string[], items: readonly string[] | undefined): string[] {
  if (!items || items.length === 0) return target;
  const out = [...target];
  for (const item of items) {
    if (!out.includes(item)) out.push(item);
  }
  return out;
}

/**
 * Owns every mutation of investigation sessions. Each mutation goes through
 * the repository's keyed update, then the matching event is emitted to
 * subscribers and analytics sinks.
 */
export class SessionManager {
  private readonly emitters = new Map<string, EventEmitter>();
  private readonly sinks: AnalyticsSink[];
  private readonly searchWindowHours: number;

  constructor(
    private readonly repo: SessionRepository,
    options: SessionManagerOptions = {}
  ) {
    this.sinks = options.sinks ?? [];
    this.searchWindowHours = options.searchWindowHours ?? DEFAULT_SEARCH_WINDOW_HOURS;
  }

  private emitterFor(sessionId: string): EventEmitter {
    const existing = this.emitters.get(sessionId);
    if (existing) return existing;
    const emitter = new EventEmitter();
    // "error" events throw when nobody listens; here they are just another stream.
    emitter.on("error", () => undefined);
    this.emitters.set(sessionId, emitter);
    return emitter;
  }

  private emit(
    sessionId: string,
    type: InvestigationEventType,
    payload: Record<string, unknown>,
    phase?: WorkflowPhase
  ): void {
    const event: InvestigationEvent = { type, session_id: sessionId, at: nowIso(), phase, payload };
    this.emitterFor(sessionId).emit(type, event);
    for (const sink of this.sinks) {
      const onSinkError = (err: unknown) => console.warn(`analytics sink failed: ${errorMessage(err)}`);
      try {
        void Promise.resolve(sink.record(event)).catch(onSinkError);
      } catch (err) {
        onSinkError(err);
      }
    }
  }

  private async mutate(
    sessionId: string,
    fn: (current: InvestigationSession) => InvestigationSession
  ): Promise<InvestigationSession> {
    const next = await this.repo.update(sessionId, (current) => ({ ...fn(current), updatedAt: nowIso() }));
    if (!next) throw new SessionNotFoundError(sessionId);
    return next;
  }

  private async nextSessionId(): Promise<string> {
    for (let attempt = 0; attempt < SESSION_ID_MAX_ATTEMPTS; attempt++) {
      const sessionId = `${SESSION_ID_PREFIX}-${randomSessionSuffix(SESSION_ID_SUFFIX_LEN)}`;
      if (!(await this.repo.get(sessionId))) return sessionId;
    }
    throw new Error("Unable to allocate unique session id after retries");
  }

  async createSession(request: TroubleshootRequest): Promise<InvestigationSession> {
    const sessionId = await this.nextSessionId();
    const createdAt = nowIso();
    const session: InvestigationSession = {
      sessionId,
      request,
      phase: "INTAKE",
      phaseTransitions: [{ phase: "INTAKE", enteredAt: createdAt }],
      retryCounts: {},
      gateDecisions: [],
      blockers: [],
      warnings: [],
      limitations: [],
      confidenceScores: {},
      evidence: {},
      searchWindowHours: this.searchWindowHours,
      searchWindowExpanded: false,
      status: "IN_PROGRESS",
      createdAt,
      updatedAt: createdAt
    };
    const created = await this.repo.create(session);
    this.emitterFor(sessionId);
    return created;
  }

  getSession(sessionId: string): Promise<InvestigationSession | null> {
    return this.repo.get(sessionId);
  }

  async listSessions(): Promise<SessionListItem[]> {
    const all = await this.repo.list();
    return all
      .map((s) => ({
        sessionId: s.sessionId,
        phase: s.phase,
        status: s.status,
        createdAt: s.createdAt,
        updatedAt: s.updatedAt,
        completedAt: s.completedAt,
        userRequest: s.request.user_request
      }))
      .sort((a, b) => (a.createdAt < b.createdAt ? 1 : -1));
  }

  async deleteSession(sessionId: string): Promise<boolean> {
    const deleted = await this.repo.delete(sessionId);
    this.dropEmitter(sessionId);
    return deleted;
  }

  private dropEmitter(sessionId: string): void {
    const emitter = this.emitters.get(sessionId);
    if (!emitter) return;
    emitter.removeAllListeners();
    this.emitters.delete(sessionId);
  }

  async transition(sessionId: string, to: WorkflowPhase, reason?: string): Promise<InvestigationSession> {
    let from: WorkflowPhase = to;
    const next = await this.mutate(sessionId, (current) => {
      from = current.phase;
      if (!canTransition(current.phase, to)) throw new InvalidTransitionError(current.phase, to);
      const at = nowIso();
      const closed = current.phaseTransitions.map((t, idx) =>
        idx === current.phaseTransitions.length - 1 && !t.exitedAt ? { ...t, exitedAt: at } : t
      );
      return { ...current, phase: to, phaseTransitions: [...closed, { phase: to, enteredAt: at, reason }] };
    });
    this.emit(sessionId, "phase_transition", { from, to, reason }, to);
    return next;
  }

  async recordAttempt(sessionId: string, phase: WorkflowPhase, record: AttemptRecord): Promise<InvestigationSession> {
    const next = await this.mutate(sessionId, (current) => ({
      ...current,
      retryCounts: { ...current.retryCounts, [phase]: record.attempt }
    }));
    this.emit(sessionId, "attempt", { ...record }, phase);
    return next;
  }

  async recordGate(
    sessionId: string,
    gate: string,
    phase: WorkflowPhase,
    attempt: number,
    decision: QualityGateDecision
  ): Promise<InvestigationSession> {
    const at = nowIso();
    const next = await this.mutate(sessionId, (current) => ({
      ...current,
      gateDecisions: [...current.gateDecisions, { gate, phase, attempt, decision: decision.decision, reason: decision.reason, at }]
    }));
    this.emit(sessionId, "gate_decision", { gate, attempt, decision: decision.decision, reason: decision.reason }, phase);
    return next;
  }

  async setPlan(sessionId: string, plan: InvestigationPlan): Promise<InvestigationSession> {
    return this.mutate(sessionId, (current) => ({ ...current, plan }));
  }

  async commitEvidence(sessionId: string, committed: CommittedEvidence): Promise<InvestigationSession> {
    return this.mutate(sessionId, (current) => {
      const confidenceScores: Partial<Record<SpecialistRole, number>> = {
        ...current.confidenceScores,
        [committed.role]: committed.confidence
      };
      switch (committed.role) {
        case "sre":
          return { ...current, confidenceScores, evidence: { ...current.evidence, sre: committed.data } };
        case "investigator":
          return { ...current, confidenceScores, evidence: { ...current.evidence, investigator: committed.data } };
        case "architect":
          return { ...current, confidenceScores, evidence: { ...current.evidence, architect: committed.data } };
      }
    });
  }

  async addFindings(sessionId: string, findings: Findings): Promise<InvestigationSession> {
    return this.mutate(sessionId, (current) => ({
      ...current,
      warnings: appendUnique(current.warnings, findings.warnings),
      limitations: appendUnique(current.limitations, findings.limitations),
      blockers: appendUnique(current.blockers, findings.blockers)
    }));
  }

  async widenSearchWindow(sessionId: string, hours: number): Promise<InvestigationSession> {
    return this.mutate(sessionId, (current) => ({ ...current, searchWindowHours: hours, searchWindowExpanded: true }));
  }

  async setRcaUrl(sessionId: string, rcaUrl: string): Promise<InvestigationSession> {
    return this.mutate(sessionId, (current) => ({ ...current, rcaUrl }));
  }

  async finish(sessionId: string, result: TroubleshootResponse): Promise<InvestigationSession> {
    const next = await this.mutate(sessionId, (current) => ({
      ...current,
      status: result.status,
      result,
      completedAt: nowIso()
    }));
    this.emit(sessionId, "completed", { status: result.status, confidence: result.confidence }, next.phase);
    return next;
  }

  log(sessionId: string, message: string, phase?: WorkflowPhase): void {
    this.emit(sessionId, "log", { message }, phase);
  }

  error(sessionId: string, message: string, phase?: WorkflowPhase): void {
    this.emit(sessionId, "error", { message }, phase);
  }

  subscribe(sessionId: string, onEvent: (event: InvestigationEvent) => void): () => void {
    const emitter = this.emitterFor(sessionId);
    const handler = (event: InvestigationEvent) => onEvent(event);
    for (const type of EVENT_TYPES) emitter.on(type, handler);
    return () => {
      for (const type of EVENT_TYPES) emitter.off(type, handler);
    };
  }

  /** Removes sessions past their TTL along with their event streams. */
  async sweepExpired(): Promise<string[]> {
    const expired = await this.repo.sweepExpired();
    for (const id of expired) this.dropEmitter(id);
    return expired;
  }

  /**
   * Sessions persisted by a previous process that never reached a terminal
   * phase cannot resume; mark them failed so clients stop waiting.
   */
  async recoverInterrupted(): Promise<string[]> {
    const recovered: string[] = [];
    for (const s of await this.repo.list()) {
      if (isTerminalPhase(s.phase) || s.status !== "IN_PROGRESS") continue;
      const error = "E000: Recovered after server restart while investigation was active";
      await this.mutate(s.sessionId, (current) => {
        const at = nowIso();
        const closed = current.phaseTransitions.map((t) => (t.exitedAt ? t : { ...t, exitedAt: at }));
        return {
          ...current,
          phase: "FAILED",
          phaseTransitions: [...closed, { phase: "FAILED", enteredAt: at, reason: error }],
          status: "FAILURE",
          blockers: appendUnique(current.blockers, [error]),
          result: {
            status: "FAILURE",
            session_id: current.sessionId,
            confidence: aggregateConfidence(current.confidenceScores),
            error,
            blockers: [error]
          },
          completedAt: at
        };
      });
      recovered.push(s.sessionId);
    }
    return recovered;
  }
}
