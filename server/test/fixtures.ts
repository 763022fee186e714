import { vi } from "vitest";
import type { ArtifactStore } from "../src/investigation/artifact_store.js";
import type { DelegationRequest, DelegationResult } from "../src/investigation/delegation.js";
import type { SpecialistDelegator } from "../src/investigation/orchestrator.js";
import type { IssueTaxonomy } from "../src/investigation/planner.js";
import type { SpecialistRole } from "../src/investigation/types.js";
import { validateSpecialistOutput } from "../src/investigation/validators.js";

export const TEST_REQUEST = {
  user_request: "Checkout API returns 500 with a pool timeout",
  project_id: "proj-1",
  repo_url: "https://example.com/acme/shop"
};

export const TEST_TAXONOMY: IssueTaxonomy = {
  defaultCategory: "compute",
  categories: {
    compute: { keywords: ["crash"], sreStrategy: "Look for crash loops.", logFilters: [], metrics: [] },
    database: { keywords: ["pool", "timeout"], sreStrategy: "Check the connection pool.", logFilters: [], metrics: [] }
  }
};

export const GOOD_RCA = [
  "# Incident RCA",
  "## Executive Summary",
  "Checkout failed because the database connection pool was exhausted.",
  "## Root Cause",
  "The pool size in src/db.ts was lowered to 2 in the last release.",
  "## Recommended Fix",
  "Restore the pool size and alert on pool saturation."
].join("\n");

export const SRE_OK = JSON.stringify({
  status: "SUCCESS",
  confidence: 0.9,
  evidence: { error_signature: "ConnectionPoolTimeoutError" }
});

export const INVESTIGATOR_OK = JSON.stringify({
  status: "ROOT_CAUSE_FOUND",
  confidence: 0.85,
  root_cause: { file: "src/db.ts", line: 42 }
});

export const ARCHITECT_OK = JSON.stringify({ status: "SUCCESS", confidence: 0.8, rca_content: GOOD_RCA });

/** A scripted reply: raw specialist text, or a function that throws or answers per call. */
export type ScriptedReply = string | ((request: DelegationRequest, signal?: AbortSignal) => Promise<DelegationResult>);

export function reply(role: SpecialistRole, rawText: string): DelegationResult {
  return { role, rawText, output: validateSpecialistOutput(role, rawText), httpStatus: 200, latencyMs: 5 };
}

/**
 * Answers each role from its script in order. The last entry repeats once a
 * script runs out.
 */
export class ScriptedDelegator implements SpecialistDelegator {
  readonly requests: DelegationRequest[] = [];
  private readonly calls: Record<SpecialistRole, number> = { sre: 0, investigator: 0, architect: 0 };

  constructor(private readonly scripts: Partial<Record<SpecialistRole, ScriptedReply[]>> = {}) {}

  callsFor(role: SpecialistRole): number {
    return this.requests.filter((r) => r.role === role).length;
  }

  async delegate(request: DelegationRequest, signal?: AbortSignal): Promise<DelegationResult> {
    this.requests.push(request);
    const script = this.scripts[request.role] ?? [defaultReply(request.role)];
    const idx = Math.min(this.calls[request.role], script.length - 1);
    this.calls[request.role] += 1;
    const next = script[idx];
    if (typeof next === "string") return reply(request.role, next);
    return next(request, signal);
  }
}

function defaultReply(role: SpecialistRole): string {
  switch (role) {
    case "sre":
      return SRE_OK;
    case "investigator":
      return INVESTIGATOR_OK;
    case "architect":
      return ARCHITECT_OK;
  }
}

export class MemoryArtifactStore implements ArtifactStore {
  readonly uploads = new Map<string, string>();

  async upload(content: string, key: string): Promise<string> {
    this.uploads.set(key, content);
    return `memory://${key}`;
  }
}

export function noSleep() {
  return vi.fn(async (_ms: number, _signal?: AbortSignal) => undefined);
}
