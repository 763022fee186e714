import type { z } from "zod";
import {
  ArchitectOutputSchema,
  InvestigatorOutputSchema,
  SreOutputSchema,
  type ArchitectOutput,
  type StructuredOutput
} from "./schemas.js";
import type { SpecialistRole } from "./types.js";

export const DEGRADED_RCA_CONFIDENCE_CAP = 0.5;
export const DEGRADED_RCA_LIMITATION = "RCA output was not in the structured format; raw response used as RCA content.";

export type ExtractedJson = {
  value: Record<string, unknown>;
  source: "whole" | "fenced" | "bracket";
  start: number;
  end: number;
};

function parseObject(text: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(text);
    if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) return null;
    return Object.fromEntries(Object.entries(parsed));
  } catch {
    return null;
  }
}

/** Index just past the `}` balancing the `{` at `open`, or -1. String literals are skipped. */
function balancedEnd(text: string, open: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = open; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return -1;
}

/**
 * Finds the one JSON object a specialist embedded in its reply: the whole
 * text, then fenced code blocks, then the first balanced `{...}`.
 */
export function extractJsonObject(text: string): ExtractedJson | null {
  const whole = parseObject(text.trim());
  if (whole) return { value: whole, source: "whole", start: 0, end: text.length };

  const fence = /```[\w-]*[^\S\r\n]*\r?\n?([\s\S]*?)```/g;
  for (let m = fence.exec(text); m !== null; m = fence.exec(text)) {
    const inner = parseObject(m[1].trim());
    if (inner) return { value: inner, source: "fenced", start: m.index, end: m.index + m[0].length };
  }

  const open = text.indexOf("{");
  if (open === -1) return null;
  const end = balancedEnd(text, open);
  if (end === -1) return null;
  const bracketed = parseObject(text.slice(open, end));
  return bracketed ? { value: bracketed, source: "bracket", start: open, end } : null;
}

export function isMarkdownLike(text: string): boolean {
  return /^\s{0,3}(#{1,6}\s+\S|[-*+]\s+\S|\d+\.\s+\S|>\s)/m.test(text) || /\*\*[^*]+\*\*/.test(text);
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

function malformed(role: SpecialistRole, detail: string): StructuredOutput {
  return { kind: "parse_error", message: `Malformed ${role} output: ${detail}` };
}

const NO_JSON = "no JSON object found in response";

function degradedArchitect(rcaContent: string, base?: Omit<ArchitectOutput, "rca_content">): StructuredOutput {
  const limitations = [...(base?.limitations ?? []), DEGRADED_RCA_LIMITATION];
  return {
    kind: "architect",
    data: {
      status: base?.status ?? "PARTIAL",
      confidence: Math.min(base?.confidence ?? DEGRADED_RCA_CONFIDENCE_CAP, DEGRADED_RCA_CONFIDENCE_CAP),
      rca_content: rcaContent,
      limitations,
      recommendations: base?.recommendations ?? []
    }
  };
}

const ArchitectWithoutContentSchema = ArchitectOutputSchema.omit({ rca_content: true });

function validateArchitect(rawText: string, extracted: ExtractedJson | null): StructuredOutput {
  if (!extracted) {
    const text = rawText.trim();
    if (text.length > 0 && isMarkdownLike(text)) return degradedArchitect(text);
    return malformed("architect", NO_JSON);
  }

  const parsed = ArchitectOutputSchema.safeParse(extracted.value);
  if (parsed.success) return { kind: "architect", data: parsed.data };

  const hasContent = typeof extracted.value.rca_content === "string" && extracted.value.rca_content.length > 0;
  const rest = ArchitectWithoutContentSchema.safeParse(extracted.value);
  const remainder = `${rawText.slice(0, extracted.start)}${rawText.slice(extracted.end)}`.trim();
  if (!hasContent && rest.success && remainder.length > 0 && isMarkdownLike(remainder)) {
    return degradedArchitect(remainder, rest.data);
  }
  // Without rca_content the JSON found is most likely a snippet inside a markdown report.
  const text = rawText.trim();
  if (!hasContent && isMarkdownLike(text)) return degradedArchitect(text);
  return malformed("architect", describeIssues(parsed.error));
}

/** Turns a specialist's free-text reply into the role's structured output or a ParseError. */
export function validateSpecialistOutput(role: SpecialistRole, rawText: string): StructuredOutput {
  const extracted = extractJsonObject(rawText);
  switch (role) {
    case "sre": {
      if (!extracted) return malformed(role, NO_JSON);
      const parsed = SreOutputSchema.safeParse(extracted.value);
      return parsed.success ? { kind: "sre", data: parsed.data } : malformed(role, describeIssues(parsed.error));
    }
    case "investigator": {
      if (!extracted) return malformed(role, NO_JSON);
      const parsed = InvestigatorOutputSchema.safeParse(extracted.value);
      return parsed.success ? { kind: "investigator", data: parsed.data } : malformed(role, describeIssues(parsed.error));
    }
    case "architect":
      return validateArchitect(rawText, extracted);
  }
}
