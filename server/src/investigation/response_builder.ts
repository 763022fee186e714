import type { FailureResponse, InvestigationSession, SuccessResponse } from "./types.js";
import { truncate } from "./utils.js";

export const SUMMARY_MAX_LENGTH = 2000;
const NO_DETAILS = "No details available.";

const SUMMARY_HEADING = /^#{1,6}\s*(?:\d+\.\s*)?Executive Summary\s*#*\s*$/im;
const ANY_HEADING = /^#{1,6}\s/m;

function firstParagraphs(text: string, count: number): string {
  return text
    .trim()
    .split(/\n\s*\n/)
    .slice(0, count)
    .join("\n\n")
    .trim();
}

/**
 * The Executive Summary section of an RCA: the body under its heading, or
 * the first two paragraphs after an inline label. Whole text otherwise.
 */
export function extractExecutiveSummary(rcaContent: string | null | undefined, maxLength = SUMMARY_MAX_LENGTH): string {
  const text = (rcaContent ?? "").trim();
  if (text.length === 0) return NO_DETAILS;

  let summary = text;
  const heading = SUMMARY_HEADING.exec(text);
  if (heading) {
    const rest = text.slice(heading.index + heading[0].length);
    const next = ANY_HEADING.exec(rest);
    summary = (next ? rest.slice(0, next.index) : rest).trim();
  } else {
    const label = text.indexOf("Executive Summary");
    if (label !== -1) {
      const rest = text.slice(label + "Executive Summary".length).replace(/^[*_:\s]+/, "");
      const next = ANY_HEADING.exec(rest);
      summary = next ? rest.slice(0, next.index).trim() : firstParagraphs(rest, 2);
    }
  }

  return truncate(summary.length > 0 ? summary : NO_DETAILS, maxLength);
}

/** Recommendations across all committed evidence, synthesis first, without duplicates. */
export function collectRecommendations(session: Pick<InvestigationSession, "evidence">): string[] {
  const { sre, investigator, architect } = session.evidence;
  const all = [...(architect?.recommendations ?? []), ...(investigator?.recommendations ?? []), ...(sre?.recommendations ?? [])];
  return [...new Set(all.map((r) => r.trim()).filter((r) => r.length > 0))];
}

export function buildSuccessResponse(
  session: Pick<InvestigationSession, "sessionId" | "evidence" | "warnings" | "limitations">,
  outcome: { status: SuccessResponse["status"]; confidence: number; rcaUrl?: string }
): SuccessResponse {
  const warnings = [...session.warnings, ...session.limitations];
  const recommendations = collectRecommendations(session);
  return {
    status: outcome.status,
    session_id: session.sessionId,
    confidence: outcome.confidence,
    ...(outcome.rcaUrl ? { rca_url: outcome.rcaUrl } : {}),
    summary: extractExecutiveSummary(session.evidence.architect?.rca_content),
    ...(warnings.length > 0 ? { warnings } : {}),
    ...(recommendations.length > 0 ? { recommendations } : {})
  };
}

export function buildFailureResponse(sessionId: string, confidence: number, error: string, blockers: string[]): FailureResponse {
  return {
    status: "FAILURE",
    session_id: sessionId,
    confidence,
    error,
    ...(blockers.length > 0 ? { blockers } : {})
  };
}
