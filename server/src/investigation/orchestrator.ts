import type { SessionManager } from "../session_manager.js";
import type { ArtifactStore } from "./artifact_store.js";
import { rcaArtifactKey } from "./artifact_store.js";
import { aggregateConfidence, HUMAN_REVIEW_THRESHOLD, PARTIAL_THRESHOLD, terminalStatus } from "./confidence.js";
import {
  DEFAULT_DELEGATION_TIMEOUT_MS,
  DelegationError,
  type DelegationContext,
  type DelegationRequest,
  type DelegationResult
} from "./delegation.js";
import { applyRecoveries, HUMAN_REVIEW_WARNING } from "./error_codes.js";
import { defaultPlan, taskFor, type IssueTaxonomy, type Planner } from "./planner.js";
import { gatePlanningToTriage, PHASE_GATES, type EvaluatedOutput } from "./quality_gates.js";
import { buildFailureResponse, buildSuccessResponse } from "./response_builder.js";
import { abortableSleep, BACKOFF_SEQUENCE_MS, NonRetryableError, retryAsync, RetryableError, type Sleep } from "./retry.js";
import type { TroubleshootRequest } from "./schemas.js";
import {
  isTerminalPhase,
  MAX_PHASE_ATTEMPTS,
  PHASE_ROLE,
  type InvestigationPlan,
  type InvestigationSession,
  type QualityGateDecision,
  type SpecialistPhase,
  type TroubleshootResponse,
  type WorkflowPhase
} from "./types.js";
import { errorMessage } from "./utils.js";

export const DEFAULT_INVESTIGATION_BUDGET_MS = 5 * 60 * 1000;
export const DEFAULT_VERSION_PENALTY = 0.1;

const SPECIALIST_PHASES: readonly SpecialistPhase[] = ["TRIAGE", "CODE_ANALYSIS", "SYNTHESIS"];

const NEXT_PHASE: Record<SpecialistPhase, WorkflowPhase> = {
  TRIAGE: "CODE_ANALYSIS",
  CODE_ANALYSIS: "SYNTHESIS",
  SYNTHESIS: "PUBLISH"
};

function gateName(from: WorkflowPhase, to: WorkflowPhase): string {
  return `${from}->${to}`;
}

/** A gate asked for another attempt of the same phase. */
export class GateRetry extends RetryableError {
  constructor(
    readonly phase: WorkflowPhase,
    readonly decision: QualityGateDecision
  ) {
    super(decision.reason);
    this.name = "GateRetry";
  }
}

/** A gate (or an escalated failure) ended the investigation. */
export class GateFailure extends NonRetryableError {
  constructor(
    readonly phase: WorkflowPhase,
    readonly reason: string,
    readonly blockers: string[] = []
  ) {
    super(reason);
    this.name = "GateFailure";
  }
}

export class BudgetExceededError extends NonRetryableError {
  constructor(readonly budgetMs: number) {
    super(`Investigation exceeded its time budget of ${budgetMs}ms`);
    this.name = "BudgetExceededError";
  }
}

export interface SpecialistDelegator {
  delegate(request: DelegationRequest, signal?: AbortSignal): Promise<DelegationResult>;
}

export type OrchestratorSettings = {
  delegationTimeoutMs: number;
  budgetMs: number;
  versionPenalty: number;
  includeArchitectConfidence: boolean;
  planFallback: boolean;
  backoffMs: readonly number[];
};

export const DEFAULT_ORCHESTRATOR_SETTINGS: OrchestratorSettings = {
  delegationTimeoutMs: DEFAULT_DELEGATION_TIMEOUT_MS,
  budgetMs: DEFAULT_INVESTIGATION_BUDGET_MS,
  versionPenalty: DEFAULT_VERSION_PENALTY,
  includeArchitectConfidence: false,
  planFallback: true,
  backoffMs: BACKOFF_SEQUENCE_MS
};

export type OrchestratorDeps = {
  sessions: SessionManager;
  delegator: SpecialistDelegator;
  planner: Planner;
  artifacts: ArtifactStore;
  taxonomy: IssueTaxonomy;
  sleep?: Sleep;
  now?: () => number;
};

function contextFor(session: InvestigationSession): DelegationContext {
  return {
    session_id: session.sessionId,
    user_request: session.request.user_request,
    project_id: session.request.project_id,
    repo_url: session.request.repo_url,
    search_window_hours: session.searchWindowHours,
    evidence: session.evidence
  };
}

/**
 * Drives one investigation through INTAKE -> ... -> COMPLETED (or FAILED).
 * Phases run one after another; every state change goes through the
 * SessionManager so subscribers see it as it happens.
 */
export class Orchestrator {
  private readonly settings: OrchestratorSettings;
  private readonly sleep: Sleep;
  private readonly now: () => number;

  constructor(
    private readonly deps: OrchestratorDeps,
    settings: Partial<OrchestratorSettings> = {}
  ) {
    this.settings = { ...DEFAULT_ORCHESTRATOR_SETTINGS, ...settings };
    this.sleep = deps.sleep ?? abortableSleep;
    this.now = deps.now ?? Date.now;
  }

  private get sessions(): SessionManager {
    return this.deps.sessions;
  }

  /** Creates the session in INTAKE without running it. */
  open(request: TroubleshootRequest): Promise<InvestigationSession> {
    return this.sessions.createSession(request);
  }

  async investigate(request: TroubleshootRequest, signal?: AbortSignal): Promise<TroubleshootResponse> {
    const session = await this.open(request);
    return this.run(session.sessionId, signal);
  }

  /**
   * Runs an opened session to a terminal phase. Domain failures come back as
   * a FAILURE response; only a missing session throws.
   */
  async run(sessionId: string, callerSignal?: AbortSignal): Promise<TroubleshootResponse> {
    const session = await this.requireSession(sessionId);
    if (session.result) return session.result;

    const controller = new AbortController();
    let budgetExceeded = false;
    const timer = setTimeout(() => {
      budgetExceeded = true;
      controller.abort();
    }, this.settings.budgetMs);
    const onCallerAbort = () => controller.abort();
    if (callerSignal?.aborted) controller.abort();
    else callerSignal?.addEventListener("abort", onCallerAbort, { once: true });

    const signal = controller.signal;
    try {
      await this.sessions.transition(sessionId, "PLANNING", "Investigation accepted");
      const plan = await this.planPhase(session, signal);

      for (const phase of SPECIALIST_PHASES) {
        const passed = await this.specialistPhase(sessionId, phase, plan, signal);
        await this.sessions.transition(sessionId, NEXT_PHASE[phase], passed.reason);
      }

      return await this.publish(sessionId, signal);
    } catch (err) {
      const failure = budgetExceeded ? new BudgetExceededError(this.settings.budgetMs) : err;
      return await this.fail(sessionId, failure, callerSignal?.aborted === true);
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener("abort", onCallerAbort);
    }
  }

  /** Fails a session that never started running, e.g. one cancelled in the queue. */
  async abandon(sessionId: string, reason: string): Promise<void> {
    const session = await this.sessions.getSession(sessionId);
    if (!session || session.result) return;
    await this.fail(sessionId, new GateFailure(session.phase, reason), false);
  }

  private async requireSession(sessionId: string): Promise<InvestigationSession> {
    const session = await this.sessions.getSession(sessionId);
    if (!session) throw new Error(`Session ${sessionId} not found`);
    return session;
  }

  private throwIfAborted(signal: AbortSignal, phase: WorkflowPhase): void {
    if (signal.aborted) throw new GateFailure(phase, "Investigation aborted");
  }

  private async planPhase(session: InvestigationSession, signal: AbortSignal): Promise<InvestigationPlan> {
    const { sessionId, request } = session;
    const log = (message: string) => this.sessions.log(sessionId, message, "PLANNING");

    let plan: InvestigationPlan | null = null;
    let fallbackReason = "empty plan";
    try {
      plan = await this.deps.planner.plan({ sessionId, request, signal, log });
    } catch (err) {
      this.throwIfAborted(signal, "PLANNING");
      fallbackReason = `planning error: ${errorMessage(err)}`;
      this.sessions.error(sessionId, `Planner failed: ${errorMessage(err)}`, "PLANNING");
    }

    if ((!plan || plan.steps.length === 0) && this.settings.planFallback) {
      log(`Falling back to the default plan (${fallbackReason})`);
      plan = defaultPlan(request, this.deps.taxonomy, fallbackReason);
    }

    const gate = gatePlanningToTriage(plan);
    await this.sessions.recordGate(sessionId, gateName("PLANNING", "TRIAGE"), "PLANNING", 1, gate);
    if (!plan || gate.decision !== "PASS") {
      throw new GateFailure("PLANNING", gate.reason, [gate.reason]);
    }

    await this.sessions.setPlan(sessionId, plan);
    await this.sessions.transition(sessionId, "TRIAGE", gate.reason);
    return plan;
  }

  private async attempt(
    sessionId: string,
    phase: SpecialistPhase,
    plan: InvestigationPlan,
    attempt: number,
    startedAt: number,
    signal: AbortSignal
  ): Promise<{ evaluated: EvaluatedOutput; decision: QualityGateDecision }> {
    const role = PHASE_ROLE[phase];
    const session = await this.requireSession(sessionId);
    const task = taskFor(plan, role, session.request, this.deps.taxonomy);
    const elapsedMs = () => Math.max(0, this.now() - startedAt);

    let result: DelegationResult;
    try {
      result = await this.deps.delegator.delegate(
        { role, task, context: contextFor(session), timeoutMs: this.settings.delegationTimeoutMs },
        signal
      );
    } catch (err) {
      if (err instanceof DelegationError) {
        await this.sessions.recordAttempt(sessionId, phase, {
          attempt,
          maxAttempts: MAX_PHASE_ATTEMPTS,
          elapsedMs: elapsedMs(),
          outcome: err.outcome,
          httpStatus: err.httpStatus,
          latencyMs: err.latencyMs,
          message: err.message
        });
        this.sessions.error(sessionId, `${role} attempt ${attempt}/${MAX_PHASE_ATTEMPTS} failed: ${err.message}`, phase);
      }
      throw err;
    }

    const malformed = result.output.kind === "parse_error";
    const afterAttempt = await this.sessions.recordAttempt(sessionId, phase, {
      attempt,
      maxAttempts: MAX_PHASE_ATTEMPTS,
      elapsedMs: elapsedMs(),
      outcome: malformed ? "malformed_output" : "ok",
      httpStatus: result.httpStatus,
      latencyMs: result.latencyMs,
      message: result.output.kind === "parse_error" ? result.output.message : undefined
    });

    const recovery = applyRecoveries(result.output, result.rawText, afterAttempt, {
      versionPenalty: this.settings.versionPenalty
    });
    if (recovery.applied.length > 0) {
      this.sessions.log(sessionId, `Recoveries applied: ${recovery.applied.join(", ")}`, phase);
    }
    if (recovery.widenSearchWindowTo !== undefined) {
      await this.sessions.widenSearchWindow(sessionId, recovery.widenSearchWindowTo);
    }
    if (recovery.warnings.length > 0 || recovery.limitations.length > 0) {
      await this.sessions.addFindings(sessionId, { warnings: recovery.warnings, limitations: recovery.limitations });
    }

    const evaluated: EvaluatedOutput = {
      output: recovery.output,
      unresolvedBlockers: recovery.hardBlockers,
      retryReason: recovery.retryReason
    };
    const decision = PHASE_GATES[phase](afterAttempt, evaluated);
    await this.sessions.recordGate(sessionId, gateName(phase, NEXT_PHASE[phase]), phase, attempt, decision);
    return { evaluated, decision };
  }

  /**
   * Up to MAX_PHASE_ATTEMPTS delegations with backoff between them. Returns
   * the PASS decision after committing the output; anything else throws.
   */
  private async specialistPhase(
    sessionId: string,
    phase: SpecialistPhase,
    plan: InvestigationPlan,
    signal: AbortSignal
  ): Promise<QualityGateDecision> {
    const startedAt = this.now();
    let attemptsMade = 0;

    let passed: { evaluated: EvaluatedOutput; decision: QualityGateDecision };
    try {
      passed = await retryAsync(
        async (attempt) => {
          attemptsMade = attempt;
          const outcome = await this.attempt(sessionId, phase, plan, attempt, startedAt, signal);
          switch (outcome.decision.decision) {
            case "PASS":
              return outcome;
            case "RETRY":
              throw new GateRetry(phase, outcome.decision);
            case "FAIL":
              throw new GateFailure(phase, outcome.decision.reason, outcome.evaluated.unresolvedBlockers);
          }
        },
        {
          maxAttempts: MAX_PHASE_ATTEMPTS,
          backoffMs: this.settings.backoffMs,
          sleep: this.sleep,
          signal,
          shouldRetry: (err) => err instanceof GateRetry || (err instanceof DelegationError && err.retryable),
          onRetry: ({ attempt, maxAttempts, delayMs, error }) =>
            this.sessions.log(
              sessionId,
              `Retrying ${phase} in ${delayMs}ms (attempt ${attempt + 1}/${maxAttempts}): ${errorMessage(error)}`,
              phase
            )
        }
      );
    } catch (err) {
      if (err instanceof DelegationError && !signal.aborted) {
        const reason = err.retryable
          ? `${err.message} (retries exhausted after ${attemptsMade} attempts)`
          : err.message;
        const decision: QualityGateDecision = { decision: "FAIL", reason };
        await this.sessions.recordGate(sessionId, gateName(phase, NEXT_PHASE[phase]), phase, attemptsMade, decision);
        throw new GateFailure(phase, reason);
      }
      throw err;
    }

    await this.commit(sessionId, passed.evaluated);
    return passed.decision;
  }

  private async commit(sessionId: string, evaluated: EvaluatedOutput): Promise<void> {
    const { output } = evaluated;
    switch (output.kind) {
      case "sre":
        await this.sessions.commitEvidence(sessionId, { role: "sre", data: output.data, confidence: output.data.confidence });
        return;
      case "investigator":
        await this.sessions.commitEvidence(sessionId, {
          role: "investigator",
          data: output.data,
          confidence: output.data.confidence
        });
        return;
      case "architect":
        await this.sessions.commitEvidence(sessionId, {
          role: "architect",
          data: output.data,
          confidence: output.data.confidence
        });
        if (output.data.limitations.length > 0) {
          await this.sessions.addFindings(sessionId, { limitations: output.data.limitations });
        }
        return;
      case "parse_error":
        throw new Error("Gate passed a parse error");
    }
  }

  private async publish(sessionId: string, signal: AbortSignal): Promise<TroubleshootResponse> {
    this.throwIfAborted(signal, "PUBLISH");
    const gate = gateName("PUBLISH", "COMPLETED");
    const session = await this.requireSession(sessionId);
    const rca = session.evidence.architect?.rca_content;
    if (!rca) throw new GateFailure("PUBLISH", "No RCA content to publish");

    let rcaUrl: string;
    try {
      rcaUrl = await this.deps.artifacts.upload(rca, rcaArtifactKey(sessionId));
    } catch (err) {
      const reason = `E000: RCA upload failed: ${errorMessage(err)}`;
      await this.sessions.recordGate(sessionId, gate, "PUBLISH", 1, { decision: "FAIL", reason });
      throw new GateFailure("PUBLISH", reason, [reason]);
    }
    await this.sessions.setRcaUrl(sessionId, rcaUrl);
    this.sessions.log(sessionId, `RCA published to ${rcaUrl}`, "PUBLISH");

    const overall = aggregateConfidence(session.confidenceScores, {
      includeArchitect: this.settings.includeArchitectConfidence
    });
    if (overall < HUMAN_REVIEW_THRESHOLD) {
      await this.sessions.addFindings(sessionId, { warnings: [HUMAN_REVIEW_WARNING] });
    }

    const status = terminalStatus(overall, session.blockers);
    if (status === "FAILURE") {
      const reason = `Aggregate confidence ${overall} below ${PARTIAL_THRESHOLD}`;
      await this.sessions.recordGate(sessionId, gate, "PUBLISH", 1, { decision: "FAIL", reason });
      throw new GateFailure("PUBLISH", reason);
    }

    await this.sessions.recordGate(sessionId, gate, "PUBLISH", 1, {
      decision: "PASS",
      reason: `${status} with aggregate confidence ${overall}`
    });
    const completed = await this.sessions.transition(sessionId, "COMPLETED", `Investigation ${status}`);
    const response = buildSuccessResponse(completed, { status, confidence: overall, rcaUrl });
    await this.sessions.finish(sessionId, response);
    return response;
  }

  private async fail(sessionId: string, err: unknown, callerAborted: boolean): Promise<TroubleshootResponse> {
    const current = await this.sessions.getSession(sessionId);
    const phase = current?.phase ?? "INTAKE";

    let reason: string;
    let blockers: string[] = [];
    if (err instanceof BudgetExceededError) {
      reason = err.message;
    } else if (callerAborted) {
      reason = "Investigation cancelled by caller";
    } else if (err instanceof GateFailure) {
      reason = err.reason;
      blockers = err.blockers;
    } else {
      reason = `E000: Unexpected error during ${phase}: ${errorMessage(err)}`;
      blockers = [reason];
      if (current) {
        await this.sessions.recordGate(sessionId, gateName(phase, "FAILED"), phase, current.retryCounts[phase] ?? 1, {
          decision: "FAIL",
          reason
        });
      }
    }

    this.sessions.error(sessionId, reason, phase);
    if (!current) {
      return buildFailureResponse(sessionId, 0, reason, blockers);
    }

    if (blockers.length > 0) await this.sessions.addFindings(sessionId, { blockers });
    const failed =
      isTerminalPhase(current.phase)
        ? await this.requireSession(sessionId)
        : await this.sessions.transition(sessionId, "FAILED", reason);
    const confidence = aggregateConfidence(failed.confidenceScores, {
      includeArchitect: this.settings.includeArchitectConfidence
    });
    const response = buildFailureResponse(sessionId, confidence, reason, failed.blockers);
    await this.sessions.finish(sessionId, response);
    return response;
  }
}
