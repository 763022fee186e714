import type { WorkflowPhase } from "./types.js";

export const EVENT_TYPES = ["phase_transition", "attempt", "gate_decision", "log", "error", "completed"] as const;
export type InvestigationEventType = (typeof EVENT_TYPES)[number];

export type InvestigationEvent = {
  type: InvestigationEventType;
  session_id: string;
  at: string;
  phase?: WorkflowPhase;
  payload: Record<string, unknown>;
};

/** Receives one event per transition, attempt and gate decision. Delivery is best-effort. */
export interface AnalyticsSink {
  record(event: InvestigationEvent): void | Promise<void>;
}

const AUDITED: ReadonlySet<InvestigationEventType> = new Set(["phase_transition", "attempt", "gate_decision", "completed"]);

export class ConsoleAnalyticsSink implements AnalyticsSink {
  constructor(private readonly write: (line: string) => void = (line) => console.log(line)) {}

  record(event: InvestigationEvent): void {
    if (!AUDITED.has(event.type)) return;
    const phase = event.phase ? ` ${event.phase}` : "";
    this.write(`[investigation ${event.session_id}] ${event.type}${phase} ${JSON.stringify(event.payload)}`);
  }
}
