import type { ArchitectOutput, InvestigatorOutput, SreOutput, StructuredOutput } from "./schemas.js";
import {
  MAX_PHASE_ATTEMPTS,
  type InvestigationPlan,
  type InvestigationSession,
  type QualityGateDecision,
  type SpecialistPhase
} from "./types.js";

export const MIN_CONFIDENCE = 0.3;
export const MIN_RCA_LENGTH = 100;
export const REQUIRED_RCA_SECTIONS = ["Executive Summary", "Root Cause", "Recommended Fix"] as const;

/** A specialist output after recoveries ran, with what the gate still has to act on. */
export type EvaluatedOutput = {
  output: StructuredOutput;
  unresolvedBlockers: string[];
  retryReason?: string;
};

type GateSession = Pick<InvestigationSession, "retryCounts">;

const pass = (reason: string): QualityGateDecision => ({ decision: "PASS", reason });
const retry = (reason: string): QualityGateDecision => ({ decision: "RETRY", reason });
const fail = (reason: string): QualityGateDecision => ({ decision: "FAIL", reason });

export function gatePlanningToTriage(plan: InvestigationPlan | null | undefined): QualityGateDecision {
  if (!plan || plan.steps.length === 0) return fail("no investigation plan");
  return pass(`Valid plan with ${plan.steps.length} step${plan.steps.length === 1 ? "" : "s"} (${plan.source})`);
}

function attemptsUsed(session: GateSession, phase: SpecialistPhase): number {
  return session.retryCounts[phase] ?? 0;
}

/**
 * Shared RETRY/FAIL pattern: blockers and failed status fail at once; any
 * other shortfall retries while attempts remain.
 */
function judge(
  phase: SpecialistPhase,
  session: GateSession,
  evaluated: EvaluatedOutput,
  failedStatus: boolean,
  shortfall: string | null,
  passReason: string
): QualityGateDecision {
  const attempts = attemptsUsed(session, phase);
  const retriesRemain = attempts < MAX_PHASE_ATTEMPTS;

  if (evaluated.unresolvedBlockers.length > 0) return fail(`Blocked: ${evaluated.unresolvedBlockers[0]}`);
  if (failedStatus) return fail(`${phase} output reported FAILURE status`);

  const reason = evaluated.retryReason ?? shortfall;
  if (!reason) return pass(passReason);
  if (retriesRemain) return retry(reason);
  return fail(`${reason} (retries exhausted after ${attempts} attempts)`);
}

function judgeMalformed(phase: SpecialistPhase, session: GateSession, message: string): QualityGateDecision {
  const attempts = attemptsUsed(session, phase);
  if (attempts < MAX_PHASE_ATTEMPTS) return retry(message);
  return fail(`${message} (retries exhausted after ${attempts} attempts)`);
}

function unexpectedKind(phase: SpecialistPhase, kind: string): QualityGateDecision {
  return fail(`${phase} gate received ${kind} output`);
}

function sreShortfall(sre: SreOutput): string | null {
  if (sre.confidence < MIN_CONFIDENCE) return `Low SRE confidence (${sre.confidence})`;
  if (!sre.evidence.error_signature && !sre.evidence.stack_trace) return "No error signature or stack trace found";
  return null;
}

function investigatorShortfall(inv: InvestigatorOutput): string | null {
  if (inv.confidence < MIN_CONFIDENCE) return `Low investigator confidence (${inv.confidence})`;
  if (inv.status === "INSUFFICIENT_DATA") return "Investigator reported INSUFFICIENT_DATA";
  if (!inv.root_cause && !inv.hypothesis) return "No root cause or hypothesis provided";
  return null;
}

export function missingRcaSections(rca: string): string[] {
  const lower = rca.toLowerCase();
  return REQUIRED_RCA_SECTIONS.filter((section) => !lower.includes(section.toLowerCase()));
}

function architectShortfall(arch: ArchitectOutput): string | null {
  if (arch.rca_content.trim().length <= MIN_RCA_LENGTH) return "RCA content too short";
  const missing = missingRcaSections(arch.rca_content);
  if (missing.length > 0) return `RCA missing sections: ${missing.join(", ")}`;
  return null;
}

export function gateTriageToAnalysis(session: GateSession, evaluated: EvaluatedOutput): QualityGateDecision {
  const { output } = evaluated;
  switch (output.kind) {
    case "sre":
      return judge(
        "TRIAGE",
        session,
        evaluated,
        output.data.status === "FAILURE",
        sreShortfall(output.data),
        `Sufficient evidence for analysis (confidence ${output.data.confidence})`
      );
    case "parse_error":
      return judgeMalformed("TRIAGE", session, output.message);
    case "investigator":
    case "architect":
      return unexpectedKind("TRIAGE", output.kind);
  }
}

export function gateAnalysisToSynthesis(session: GateSession, evaluated: EvaluatedOutput): QualityGateDecision {
  const { output } = evaluated;
  switch (output.kind) {
    case "investigator":
      return judge(
        "CODE_ANALYSIS",
        session,
        evaluated,
        false,
        investigatorShortfall(output.data),
        `Analysis complete (${output.data.status}, confidence ${output.data.confidence})`
      );
    case "parse_error":
      return judgeMalformed("CODE_ANALYSIS", session, output.message);
    case "sre":
    case "architect":
      return unexpectedKind("CODE_ANALYSIS", output.kind);
  }
}

export function gateSynthesisToPublish(session: GateSession, evaluated: EvaluatedOutput): QualityGateDecision {
  const { output } = evaluated;
  switch (output.kind) {
    case "architect":
      return judge(
        "SYNTHESIS",
        session,
        evaluated,
        output.data.status === "FAILURE",
        architectShortfall(output.data),
        "RCA generated with all required sections"
      );
    case "parse_error":
      return judgeMalformed("SYNTHESIS", session, output.message);
    case "sre":
    case "investigator":
      return unexpectedKind("SYNTHESIS", output.kind);
  }
}

export const PHASE_GATES: Record<
  SpecialistPhase,
  (session: GateSession, evaluated: EvaluatedOutput) => QualityGateDecision
> = {
  TRIAGE: gateTriageToAnalysis,
  CODE_ANALYSIS: gateAnalysisToSynthesis,
  SYNTHESIS: gateSynthesisToPublish
};
