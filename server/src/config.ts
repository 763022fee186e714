import path from "node:path";
import { DEFAULT_DELEGATION_TIMEOUT_MS, type RoleEndpoints } from "./investigation/delegation.js";
import { DEFAULT_INVESTIGATION_BUDGET_MS, DEFAULT_VERSION_PENALTY } from "./investigation/orchestrator.js";
import { DEFAULT_PLANNER_MODEL } from "./investigation/planner.js";
import { DEFAULT_SESSION_TTL_MS } from "./investigation/session_store.js";
import { DEFAULT_SEARCH_WINDOW_HOURS } from "./session_manager.js";
import { sessionsRootAbs } from "./investigation/utils.js";

export const SERVICE_NAME = "incident-orchestrator";
export const DEFAULT_PORT = 5050;

export type SessionStoreKind = "memory" | "file";

export type ServerConfig = {
  port: number;
  endpoints: RoleEndpoints;
  delegationTimeoutMs: number;
  budgetMs: number;
  sessionTtlMs: number;
  maxConcurrentInvestigations: number;
  versionPenalty: number;
  includeArchitectConfidence: boolean;
  planFallback: boolean;
  searchWindowHours: number;
  sessionStore: SessionStoreKind;
  sessionsDir: string;
  publicBaseUrl: string;
  openaiApiKey?: string;
  plannerModel: string;
};

type Env = Record<string, string | undefined>;

function text(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw && raw.length > 0 ? raw : undefined;
}

function numberFromEnv(env: Env, name: string, fallback: number, bounds: { min: number; max?: number }): number {
  const raw = text(env, name);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < bounds.min) return fallback;
  return bounds.max === undefined ? value : Math.min(bounds.max, value);
}

function flagFromEnv(env: Env, name: string, fallback: boolean): boolean {
  const raw = text(env, name)?.toLowerCase();
  if (raw === undefined) return fallback;
  if (raw === "1" || raw === "true" || raw === "yes") return true;
  if (raw === "0" || raw === "false" || raw === "no") return false;
  return fallback;
}

export function loadConfig(env: Env = process.env): ServerConfig {
  const port = numberFromEnv(env, "PORT", DEFAULT_PORT, { min: 1, max: 65535 });
  const store = text(env, "IOC_SESSION_STORE")?.toLowerCase();
  const sessionsDir = text(env, "IOC_SESSIONS_DIR");
  return {
    port: Math.floor(port),
    endpoints: {
      sre: text(env, "SRE_AGENT_URL") ?? "http://localhost:8081",
      investigator: text(env, "INVESTIGATOR_AGENT_URL") ?? "http://localhost:8082",
      architect: text(env, "ARCHITECT_AGENT_URL") ?? "http://localhost:8083"
    },
    delegationTimeoutMs: numberFromEnv(env, "DELEGATION_TIMEOUT_MS", DEFAULT_DELEGATION_TIMEOUT_MS, { min: 1 }),
    budgetMs: numberFromEnv(env, "INVESTIGATION_BUDGET_MS", DEFAULT_INVESTIGATION_BUDGET_MS, { min: 1 }),
    sessionTtlMs: numberFromEnv(env, "SESSION_TTL_MS", DEFAULT_SESSION_TTL_MS, { min: 1 }),
    maxConcurrentInvestigations: Math.floor(numberFromEnv(env, "MAX_CONCURRENT_INVESTIGATIONS", 4, { min: 1 })),
    versionPenalty: numberFromEnv(env, "VERSION_UNRESOLVED_PENALTY", DEFAULT_VERSION_PENALTY, { min: 0, max: 1 }),
    includeArchitectConfidence: flagFromEnv(env, "FOLD_ARCHITECT_CONFIDENCE", false),
    planFallback: flagFromEnv(env, "PLAN_FALLBACK", true),
    searchWindowHours: numberFromEnv(env, "SEARCH_WINDOW_HOURS", DEFAULT_SEARCH_WINDOW_HOURS, { min: 1, max: 24 }),
    sessionStore: store === "file" ? "file" : "memory",
    sessionsDir: sessionsDir ? path.resolve(sessionsDir) : sessionsRootAbs(),
    publicBaseUrl: text(env, "PUBLIC_BASE_URL") ?? `http://localhost:${Math.floor(port)}`,
    openaiApiKey: text(env, "OPENAI_API_KEY"),
    plannerModel: text(env, "IOC_PLANNER_MODEL") ?? DEFAULT_PLANNER_MODEL
  };
}
