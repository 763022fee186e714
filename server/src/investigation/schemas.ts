import { z } from "zod";

export const TroubleshootRequestSchema = z
  .object({
    user_request: z.string().trim().min(3).max(4000),
    project_id: z.string().trim().min(1).max(200),
    repo_url: z.string().trim().url(),
    user_email: z.string().trim().email().optional()
  })
  .strict();

export type TroubleshootRequest = z.infer<typeof TroubleshootRequestSchema>;

const ConfidenceSchema = z.number().min(0).max(1);
const NullableText = z.string().nullable().optional();

export const SRE_STATUSES = ["SUCCESS", "PARTIAL", "FAILURE"] as const;
export const INVESTIGATOR_STATUSES = ["ROOT_CAUSE_FOUND", "HYPOTHESIS", "INSUFFICIENT_DATA"] as const;
export const ARCHITECT_STATUSES = ["SUCCESS", "PARTIAL", "FAILURE"] as const;

export const SreOutputSchema = z.object({
  status: z.enum(SRE_STATUSES),
  confidence: ConfidenceSchema,
  evidence: z
    .object({
      timestamp: NullableText,
      error_signature: NullableText,
      stack_trace: NullableText,
      version_sha: NullableText,
      metric_anomalies: z.array(z.unknown()).default([])
    })
    .default({}),
  blockers: z.array(z.string()).default([]),
  recommendations: z.array(z.string()).default([])
});

export const RootCauseSchema = z.object({
  file: z.string().min(1),
  line: z.number().int().nonnegative().nullable().optional(),
  function: NullableText,
  defect_type: NullableText,
  evidence: NullableText
});

export const InvestigatorOutputSchema = z.object({
  status: z.enum(INVESTIGATOR_STATUSES),
  confidence: ConfidenceSchema,
  root_cause: RootCauseSchema.nullable().optional(),
  dependency_chain: z.array(z.string()).default([]),
  hypothesis: NullableText,
  blockers: z.array(z.string()).default([]),
  recommendations: z.array(z.string()).default([])
});

export const ArchitectOutputSchema = z.object({
  status: z.enum(ARCHITECT_STATUSES),
  confidence: ConfidenceSchema,
  rca_content: z.string().min(1),
  limitations: z.array(z.string()).default([]),
  recommendations: z.array(z.string()).default([])
});

export type SreOutput = z.infer<typeof SreOutputSchema>;
export type InvestigatorOutput = z.infer<typeof InvestigatorOutputSchema>;
export type ArchitectOutput = z.infer<typeof ArchitectOutputSchema>;

/**
 * Every specialist reply ends up as exactly one of these. Gates switch on
 * `kind` exhaustively.
 */
export type StructuredOutput =
  | { kind: "sre"; data: SreOutput }
  | { kind: "investigator"; data: InvestigatorOutput }
  | { kind: "architect"; data: ArchitectOutput }
  | { kind: "parse_error"; message: string };

export const PlanStepSchema = z.object({
  target_role: z.enum(["sre", "investigator", "architect"]),
  task: z.string().min(1)
});

export const PlannerOutputSchema = z.object({
  issue_type: z.string(),
  reasoning: z.string(),
  steps: z.array(PlanStepSchema)
});

export type PlannerOutput = z.infer<typeof PlannerOutputSchema>;
