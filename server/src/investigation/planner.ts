import fs from "node:fs/promises";
import path from "node:path";
import { Agent, MaxTurnsExceededError, ModelBehaviorError, Runner } from "@openai/agents";
import { z } from "zod";
import { PlannerOutputSchema, type PlannerOutput, type TroubleshootRequest } from "./schemas.js";
import type { InvestigationPlan, PlanStep, SpecialistRole } from "./types.js";
import { dataRootAbs, errorMessage } from "./utils.js";

export const DEFAULT_PLANNER_MODEL = "gpt-4.1-mini";
export const ISSUE_TAXONOMY_FILENAME = "issue_taxonomy.json";

const IssueCategorySchema = z.object({
  keywords: z.array(z.string().min(1)).min(1),
  sreStrategy: z.string().min(1),
  logFilters: z.array(z.string()).default([]),
  metrics: z.array(z.string()).default([])
});

const IssueTaxonomySchema = z
  .object({
    defaultCategory: z.string().min(1),
    categories: z.record(IssueCategorySchema)
  })
  .refine((t) => t.defaultCategory in t.categories, { message: "defaultCategory must name a category" });

export type IssueCategory = z.infer<typeof IssueCategorySchema>;
export type IssueTaxonomy = z.infer<typeof IssueTaxonomySchema>;

export async function loadIssueTaxonomy(filePath = path.join(dataRootAbs(), ISSUE_TAXONOMY_FILENAME)): Promise<IssueTaxonomy> {
  const raw = await fs.readFile(filePath, "utf8");
  const parsed = IssueTaxonomySchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Invalid issue taxonomy at ${filePath}: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
  }
  return parsed.data;
}

export type IssueClassification = {
  issueType: string;
  category: IssueCategory;
  score: number;
};

/**
 * Keyword-count classification. Ties go to the category listed first; no
 * match at all falls back to the taxonomy's default category.
 */
export function classifyIssue(userRequest: string, taxonomy: IssueTaxonomy): IssueClassification {
  const text = userRequest.toLowerCase();
  let best: IssueClassification | null = null;
  for (const [issueType, category] of Object.entries(taxonomy.categories)) {
    const score = category.keywords.filter((kw) => text.includes(kw.toLowerCase())).length;
    if (score > 0 && (!best || score > best.score)) best = { issueType, category, score };
  }
  if (best) return best;
  const fallback = taxonomy.categories[taxonomy.defaultCategory];
  return { issueType: taxonomy.defaultCategory, category: fallback, score: 0 };
}

export const DEFAULT_TASKS: Record<Exclude<SpecialistRole, "sre">, string> = {
  investigator: "Analyze the code based on the triage findings. Trace the error path and identify the defect.",
  architect: "Write the RCA document with root cause, impact and remediation steps."
};

export function triageTask(userRequest: string, category: IssueCategory): string {
  const filters = category.logFilters.length > 0 ? ` Suggested log filters: ${category.logFilters.join("; ")}.` : "";
  return `Analyze logs and metrics for: ${userRequest}. ${category.sreStrategy}${filters}`;
}

/** Fixed three-step plan, one step per specialist role, in phase order. */
export function defaultPlan(request: Pick<TroubleshootRequest, "user_request">, taxonomy: IssueTaxonomy, reason: string): InvestigationPlan {
  const { issueType, category } = classifyIssue(request.user_request, taxonomy);
  return {
    source: "default",
    issueType,
    reasoning: `Using default 3-step investigation due to ${reason}`,
    steps: [
      { target_role: "sre", task: triageTask(request.user_request, category) },
      { target_role: "investigator", task: DEFAULT_TASKS.investigator },
      { target_role: "architect", task: DEFAULT_TASKS.architect }
    ]
  };
}

/** The task the plan gives `role`, or the default task for it. */
export function taskFor(plan: InvestigationPlan, role: SpecialistRole, request: TroubleshootRequest, taxonomy: IssueTaxonomy): string {
  const steps = plan.steps.filter((s) => s.target_role === role).map((s) => s.task.trim());
  if (steps.length > 0) return steps.join("\n");
  if (role === "sre") return triageTask(request.user_request, classifyIssue(request.user_request, taxonomy).category);
  return DEFAULT_TASKS[role];
}

export type PlanningContext = {
  sessionId: string;
  request: TroubleshootRequest;
  signal: AbortSignal;
  log: (message: string) => void;
};

export interface Planner {
  /** Null (or a plan without steps) means the planner had nothing usable. */
  plan(ctx: PlanningContext): Promise<InvestigationPlan | null>;
}

/** Used when no model is configured: always the default plan. */
export class StaticPlanner implements Planner {
  constructor(private readonly taxonomy: IssueTaxonomy) {}

  async plan(ctx: PlanningContext): Promise<InvestigationPlan> {
    return defaultPlan(ctx.request, this.taxonomy, "no planning model configured");
  }
}

const PLANNER_INSTRUCTIONS = [
  "You are a principal SRE planning a production incident investigation.",
  "Three specialists are available:",
  "- sre: reads logs and metrics, returns error signatures, stack traces and the deployed version",
  "- investigator: reads the code repository and traces the defect",
  "- architect: writes the root cause analysis document",
  "Return an ordered list of steps. Each step names one specialist as target_role and gives a specific, actionable task.",
  "Put the log filters and metrics to check in the sre task. Order steps by diagnostic value.",
  "issue_type is the classified category you were given unless the request clearly says otherwise."
].join("\n");

function planningPrompt(request: TroubleshootRequest, classification: IssueClassification): string {
  const { issueType, category } = classification;
  return [
    `USER REQUEST: ${request.user_request}`,
    `PROJECT: ${request.project_id}`,
    `REPOSITORY: ${request.repo_url}`,
    "",
    `CLASSIFIED ISSUE TYPE: ${issueType}`,
    `RECOMMENDED SRE STRATEGY: ${category.sreStrategy}`,
    `SUGGESTED LOG FILTERS: ${JSON.stringify(category.logFilters)}`,
    `KEY METRICS: ${JSON.stringify(category.metrics)}`
  ].join("\n");
}

export function makePlannerAgent(model: string = DEFAULT_PLANNER_MODEL) {
  return new Agent({
    name: "Investigation Planner",
    model,
    modelSettings: { temperature: 0.2 },
    tools: [],
    outputType: PlannerOutputSchema,
    instructions: PLANNER_INSTRUCTIONS
  });
}

export type AgentPlannerOptions = {
  model?: string;
  runner?: Runner;
  deterministicRunner?: Runner;
  maxTurns?: number;
};

function toPlan(output: PlannerOutput, fallbackIssueType: string): InvestigationPlan {
  const steps: PlanStep[] = output.steps
    .map((s) => ({ target_role: s.target_role, task: s.task.trim() }))
    .filter((s) => s.task.length > 0);
  return {
    source: "planner",
    issueType: output.issue_type.trim() || fallbackIssueType,
    reasoning: output.reasoning,
    steps
  };
}

/**
 * Asks a model for the plan once. A schema failure gets one deterministic
 * retry; anything else propagates and the caller decides on a fallback.
 */
export class AgentPlanner implements Planner {
  private readonly agent: ReturnType<typeof makePlannerAgent>;
  private readonly runner: Runner;
  private readonly deterministicRunner: Runner;
  private readonly maxTurns: number;

  constructor(
    private readonly taxonomy: IssueTaxonomy,
    options: AgentPlannerOptions = {}
  ) {
    this.agent = makePlannerAgent(options.model);
    this.runner = options.runner ?? new Runner();
    this.deterministicRunner = options.deterministicRunner ?? new Runner({ modelSettings: { temperature: 0 } });
    this.maxTurns = options.maxTurns ?? 3;
  }

  private async execute(runner: Runner, prompt: string, signal: AbortSignal): Promise<PlannerOutput> {
    const result = await runner.run(this.agent, prompt, { maxTurns: this.maxTurns, signal });
    const parsed = PlannerOutputSchema.safeParse(result.finalOutput);
    if (!parsed.success) throw new Error("Planner produced no usable final output");
    return parsed.data;
  }

  async plan(ctx: PlanningContext): Promise<InvestigationPlan> {
    const classification = classifyIssue(ctx.request.user_request, this.taxonomy);
    ctx.log(`Issue classified as "${classification.issueType}" (keyword score ${classification.score})`);
    const prompt = planningPrompt(ctx.request, classification);

    try {
      return toPlan(await this.execute(this.runner, prompt, ctx.signal), classification.issueType);
    } catch (err) {
      const isSchemaFailure = err instanceof ModelBehaviorError || err instanceof MaxTurnsExceededError;
      if (!isSchemaFailure) throw err;
      ctx.log(`Planner output failed schema validation (${errorMessage(err)}). Retrying once deterministically...`);
      return toPlan(await this.execute(this.deterministicRunner, prompt, ctx.signal), classification.issueType);
    }
  }
}
