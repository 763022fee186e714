import type {
  ArchitectOutput,
  InvestigatorOutput,
  SreOutput,
  TroubleshootRequest
} from "./schemas.js";

export const PHASE_ORDER = [
  "INTAKE",
  "PLANNING",
  "TRIAGE",
  "CODE_ANALYSIS",
  "SYNTHESIS",
  "PUBLISH",
  "COMPLETED"
] as const;

export type WorkflowPhase = (typeof PHASE_ORDER)[number] | "FAILED";

export const SPECIALIST_ROLES = ["sre", "investigator", "architect"] as const;
export type SpecialistRole = (typeof SPECIALIST_ROLES)[number];

export type SpecialistPhase = "TRIAGE" | "CODE_ANALYSIS" | "SYNTHESIS";

export const PHASE_ROLE: Record<SpecialistPhase, SpecialistRole> = {
  TRIAGE: "sre",
  CODE_ANALYSIS: "investigator",
  SYNTHESIS: "architect"
};

export type SessionStatus = "IN_PROGRESS" | "SUCCESS" | "PARTIAL" | "FAILURE";

/** Attempts per specialist phase, first call included. */
export const MAX_PHASE_ATTEMPTS = 3;

export function isTerminalPhase(phase: WorkflowPhase): phase is "COMPLETED" | "FAILED" {
  return phase === "COMPLETED" || phase === "FAILED";
}

/**
 * Legal forward moves: the next phase in PHASE_ORDER, or FAILED from any
 * non-terminal phase.
 */
export function canTransition(from: WorkflowPhase, to: WorkflowPhase): boolean {
  if (isTerminalPhase(from)) return false;
  if (to === "FAILED") return true;
  const idx = PHASE_ORDER.indexOf(from);
  return idx !== -1 && PHASE_ORDER[idx + 1] === to;
}

export type PhaseTransition = {
  phase: WorkflowPhase;
  enteredAt: string;
  exitedAt?: string;
  reason?: string;
};

export type PlanStep = {
  target_role: SpecialistRole;
  task: string;
};

export type InvestigationPlan = {
  source: "planner" | "default";
  issueType: string;
  reasoning: string;
  steps: PlanStep[];
};

export type SessionEvidence = {
  sre?: SreOutput;
  investigator?: InvestigatorOutput;
  architect?: ArchitectOutput;
};

export type GateVerdict = "PASS" | "RETRY" | "FAIL";

export type QualityGateDecision = {
  decision: GateVerdict;
  reason: string;
};

export type GateRecord = {
  gate: string;
  phase: WorkflowPhase;
  attempt: number;
  decision: GateVerdict;
  reason: string;
  at: string;
};

export type SuccessResponse = {
  status: "SUCCESS" | "PARTIAL";
  session_id: string;
  confidence: number;
  rca_url?: string;
  summary?: string;
  warnings?: string[];
  recommendations?: string[];
};

export type FailureResponse = {
  status: "FAILURE";
  session_id: string;
  confidence: number;
  error: string;
  blockers?: string[];
};

export type TroubleshootResponse = SuccessResponse | FailureResponse;

export type InvestigationSession = {
  sessionId: string;
  request: TroubleshootRequest;
  phase: WorkflowPhase;
  phaseTransitions: PhaseTransition[];
  retryCounts: Partial<Record<WorkflowPhase, number>>;
  gateDecisions: GateRecord[];
  blockers: string[];
  warnings: string[];
  limitations: string[];
  confidenceScores: Partial<Record<SpecialistRole, number>>;
  evidence: SessionEvidence;
  plan?: InvestigationPlan;
  searchWindowHours: number;
  searchWindowExpanded: boolean;
  rcaUrl?: string;
  status: SessionStatus;
  result?: TroubleshootResponse;
  createdAt: string;
  updatedAt: string;
  completedAt?: string;
};
