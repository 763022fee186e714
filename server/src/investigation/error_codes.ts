import type { StructuredOutput } from "./schemas.js";
import type { InvestigationSession } from "./types.js";

export const ERROR_CODES = ["E000", "E001", "E002", "E003", "E004", "E005", "E006"] as const;
export type ErrorCode = (typeof ERROR_CODES)[number];

export type RecoveryAction =
  | "FAIL_INVESTIGATION"
  | "EXPAND_TIME_WINDOW"
  | "REQUEST_PERMISSION"
  | "VERIFY_REPO_ACCESS"
  | "USE_REGEX_EXTRACTION"
  | "FLAG_UNCERTAINTY"
  | "SUGGEST_HUMAN_REVIEW";

export type ErrorRecord = {
  code: ErrorCode;
  name: string;
  message: string;
  isBlocker: boolean;
  recoveryAction: RecoveryAction;
};

export const ERROR_DEFINITIONS: Record<ErrorCode, ErrorRecord> = {
  E000: {
    code: "E000",
    name: "INTERNAL_ERROR",
    message: "The investigation stopped on an unexpected internal error.",
    isBlocker: true,
    recoveryAction: "FAIL_INVESTIGATION"
  },
  E001: {
    code: "E001",
    name: "NO_LOGS_FOUND",
    message: "No error logs were found for the specified service and time period.",
    isBlocker: false,
    recoveryAction: "EXPAND_TIME_WINDOW"
  },
  E002: {
    code: "E002",
    name: "PERMISSION_DENIED",
    message: "Insufficient permissions to read logs or metrics. Grant roles/logging.viewer and roles/monitoring.viewer.",
    isBlocker: true,
    recoveryAction: "REQUEST_PERMISSION"
  },
  E003: {
    code: "E003",
    name: "REPO_NOT_ACCESSIBLE",
    message: "Unable to access the code repository. Verify the repository URL and access token scope.",
    isBlocker: true,
    recoveryAction: "VERIFY_REPO_ACCESS"
  },
  E004: {
    code: "E004",
    name: "STACK_TRACE_UNRECOGNIZED",
    message: "The stack trace could not be parsed. Falling back to pattern-based extraction.",
    isBlocker: false,
    recoveryAction: "USE_REGEX_EXTRACTION"
  },
  E005: {
    code: "E005",
    name: "VERSION_SHA_NOT_FOUND",
    message: "Could not determine the deployed code version. Analysis assumes the default branch.",
    isBlocker: false,
    recoveryAction: "FLAG_UNCERTAINTY"
  },
  E006: {
    code: "E006",
    name: "LOW_CONFIDENCE",
    message: "The analysis has low confidence. Human review recommended.",
    isBlocker: false,
    recoveryAction: "SUGGEST_HUMAN_REVIEW"
  }
};

export const MAX_SEARCH_WINDOW_HOURS = 24;
export const HUMAN_REVIEW_WARNING = "E006: Low confidence result - human review recommended";
export const VERSION_UNKNOWN_LIMITATION = "Production version unknown; analysis based on the default branch.";

const EXPLICIT_CODE = /^\s*\[?(E00[0-6])\]?(?=[\s:\]-]|$)/i;

// Checked in order; repository wording is matched before generic permission wording.
const CODE_PATTERNS: Array<[ErrorCode, RegExp]> = [
  [
    "E003",
    /\b(repo|repository|github|gitlab|personal access token|pat)\b.*\b(denied|not accessible|inaccessible|not found|forbidden|unauthori[sz]ed|invalid)\b|\b(cannot|could not|unable to) (access|clone|read) (the )?(repo|repository)\b/i
  ],
  ["E002", /permission denied|access denied|forbidden|\b403\b|unauthori[sz]ed|\biam\b|roles\//i],
  ["E001", /no (error )?logs? (were )?found|no log entries|logs? (are |were )?empty/i],
  ["E004", /stack ?trace.*(unrecognized|not recognized|could not be parsed|unparseable|unknown format)|unrecognized stack/i],
  [
    "E005",
    /\b(version|commit|sha)\b.*\b(not found|unknown|unresolved|could not be determined)\b|unable to determine (the )?(version|commit)/i
  ],
  ["E006", /low confidence/i]
];

/** Maps a specialist blocker string to a taxonomy code, or null when nothing matches. */
export function classifyBlocker(blocker: string): ErrorCode | null {
  const explicit = EXPLICIT_CODE.exec(blocker);
  if (explicit) {
    const upper = explicit[1].toUpperCase();
    return ERROR_CODES.find((code) => code === upper) ?? null;
  }
  for (const [code, pattern] of CODE_PATTERNS) {
    if (pattern.test(blocker)) return code;
  }
  return null;
}

export function isHardBlocker(code: ErrorCode | null): boolean {
  if (code === null) return true;
  return ERROR_DEFINITIONS[code].isBlocker;
}

export function formatBlocker(code: ErrorCode | null, message: string): string {
  const trimmed = message.trim();
  if (!code || EXPLICIT_CODE.test(trimmed)) return trimmed;
  return `${code}: ${trimmed}`;
}

const STACK_LINE =
  /^\s*(Traceback \(most recent call last\):|File ".+", line \d+.*|at [\w$.<>]+ ?\(.*:\d+(:\d+)?\)|at \S+:\d+:\d+|goroutine \d+ \[.*|[\w$.]*(Error|Exception|Panic)\b:?.*)$/;

/** Pattern-based stack trace recovery used when a specialist could not parse one itself. */
export function extractStackTrace(text: string): string | null {
  const lines = text.split(/\r?\n/).filter((line) => STACK_LINE.test(line));
  if (lines.length === 0) return null;
  return lines.map((line) => line.trimEnd()).join("\n");
}

export type RecoveryOptions = {
  versionPenalty: number;
};

export type RecoveryOutcome = {
  output: StructuredOutput;
  hardBlockers: string[];
  warnings: string[];
  limitations: string[];
  applied: ErrorCode[];
  retryReason?: string;
  widenSearchWindowTo?: number;
};

function blockersOf(output: StructuredOutput): string[] {
  switch (output.kind) {
    case "sre":
    case "investigator":
      return output.data.blockers;
    case "architect":
    case "parse_error":
      return [];
  }
}

/**
 * Classifies the blockers a specialist reported and applies the soft
 * recoveries inline. Hard (or unrecognized) blockers are returned for the gate;
 * soft ones only adjust the output, the warnings and the limitations.
 */
export function applyRecoveries(
  output: StructuredOutput,
  rawText: string,
  session: Pick<InvestigationSession, "searchWindowHours" | "searchWindowExpanded">,
  options: RecoveryOptions
): RecoveryOutcome {
  const outcome: RecoveryOutcome = { output, hardBlockers: [], warnings: [], limitations: [], applied: [] };

  for (const blocker of blockersOf(output)) {
    const code = classifyBlocker(blocker);
    if (isHardBlocker(code)) {
      outcome.hardBlockers.push(formatBlocker(code, blocker));
      continue;
    }
    if (code === null || outcome.applied.includes(code)) continue;
    outcome.applied.push(code);

    switch (code) {
      case "E001": {
        if (session.searchWindowExpanded) {
          outcome.warnings.push(`E001: No logs found even after widening the search window to ${session.searchWindowHours}h`);
          break;
        }
        const widened = Math.min(session.searchWindowHours * 2, MAX_SEARCH_WINDOW_HOURS);
        outcome.widenSearchWindowTo = widened;
        outcome.retryReason = `E001: No logs found; widening search window to ${widened}h`;
        outcome.warnings.push(outcome.retryReason);
        break;
      }
      case "E004": {
        if (outcome.output.kind !== "sre") break;
        const current = outcome.output.data;
        if (current.evidence.stack_trace) break;
        const recovered = extractStackTrace(rawText);
        outcome.warnings.push(
          recovered
            ? "E004: Stack trace recovered with pattern-based extraction"
            : "E004: Stack trace unrecognized and pattern-based extraction found nothing"
        );
        if (recovered) {
          outcome.output = { kind: "sre", data: { ...current, evidence: { ...current.evidence, stack_trace: recovered } } };
        }
        break;
      }
      case "E005": {
        outcome.limitations.push(VERSION_UNKNOWN_LIMITATION);
        outcome.warnings.push(`E005: Version unresolved; confidence reduced by ${options.versionPenalty}`);
        outcome.output = penalizeVersionUnknown(outcome.output, options.versionPenalty);
        break;
      }
      case "E006":
        outcome.warnings.push(HUMAN_REVIEW_WARNING);
        break;
      default:
        break;
    }
  }

  return outcome;
}

function penalizeVersionUnknown(output: StructuredOutput, penalty: number): StructuredOutput {
  const lower = (c: number) => Math.max(0, Math.round((c - penalty) * 1000) / 1000);
  switch (output.kind) {
    case "sre":
      return {
        kind: "sre",
        data: {
          ...output.data,
          confidence: lower(output.data.confidence),
          evidence: { ...output.data.evidence, version_sha: "unknown" }
        }
      };
    case "investigator":
      return { kind: "investigator", data: { ...output.data, confidence: lower(output.data.confidence) } };
    case "architect":
      return { kind: "architect", data: { ...output.data, confidence: lower(output.data.confidence) } };
    case "parse_error":
      return output;
  }
}
