import { classifyBlocker, isHardBlocker } from "./error_codes.js";
import type { SessionStatus, SpecialistRole } from "./types.js";

export const SUCCESS_THRESHOLD = 0.7;
export const PARTIAL_THRESHOLD = 0.3;
export const HUMAN_REVIEW_THRESHOLD = 0.5;

export type AggregationOptions = {
  includeArchitect?: boolean;
};

function roundScore(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/**
 * Mean of the confidences actually recorded. Values are summed in sorted
 * order so the result does not depend on which phase reported first.
 */
export function aggregateConfidence(
  scores: Partial<Record<SpecialistRole, number>>,
  options: AggregationOptions = {}
): number {
  const roles: SpecialistRole[] = options.includeArchitect ? ["sre", "investigator", "architect"] : ["sre", "investigator"];
  const values = roles
    .map((role) => scores[role])
    .filter((v): v is number => typeof v === "number" && Number.isFinite(v))
    .sort((a, b) => a - b);
  if (values.length === 0) return 0;
  const sum = values.reduce((acc, v) => acc + v, 0);
  return roundScore(Math.min(1, Math.max(0, sum / values.length)));
}

export function hasHardBlocker(blockers: readonly string[]): boolean {
  return blockers.some((b) => isHardBlocker(classifyBlocker(b)));
}

export function terminalStatus(overall: number, blockers: readonly string[]): Exclude<SessionStatus, "IN_PROGRESS"> {
  if (hasHardBlocker(blockers) || overall < PARTIAL_THRESHOLD) return "FAILURE";
  if (overall >= SUCCESS_THRESHOLD && blockers.length === 0) return "SUCCESS";
  return "PARTIAL";
}
