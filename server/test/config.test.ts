import path from "node:path";
import { describe, expect, it } from "vitest";
import { DEFAULT_PORT, loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    const config = loadConfig({});
    expect(config.port).toBe(DEFAULT_PORT);
    expect(config.endpoints).toEqual({
      sre: "http://localhost:8081",
      investigator: "http://localhost:8082",
      architect: "http://localhost:8083"
    });
    expect(config.delegationTimeoutMs).toBe(300_000);
    expect(config.budgetMs).toBe(300_000);
    expect(config.maxConcurrentInvestigations).toBe(4);
    expect(config.versionPenalty).toBe(0.1);
    expect(config.includeArchitectConfidence).toBe(false);
    expect(config.planFallback).toBe(true);
    expect(config.searchWindowHours).toBe(1);
    expect(config.sessionStore).toBe("memory");
    expect(config.publicBaseUrl).toBe("http://localhost:5050");
    expect(config.openaiApiKey).toBeUndefined();
    expect(config.plannerModel).toBe("gpt-4.1-mini");
  });

  it("reads overrides", () => {
    const config = loadConfig({
      PORT: "8080",
      SRE_AGENT_URL: " http://sre.internal/troubleshoot ",
      DELEGATION_TIMEOUT_MS: "1000",
      FOLD_ARCHITECT_CONFIDENCE: "true",
      PLAN_FALLBACK: "no",
      SEARCH_WINDOW_HOURS: "48",
      IOC_SESSION_STORE: "FILE",
      IOC_SESSIONS_DIR: "tmp/sessions",
      OPENAI_API_KEY: "test-key",
      IOC_PLANNER_MODEL: "gpt-4.1"
    });
    expect(config.port).toBe(8080);
    expect(config.endpoints.sre).toBe("http://sre.internal/troubleshoot");
    expect(config.delegationTimeoutMs).toBe(1000);
    expect(config.includeArchitectConfidence).toBe(true);
    expect(config.planFallback).toBe(false);
    expect(config.searchWindowHours).toBe(24);
    expect(config.sessionStore).toBe("file");
    expect(config.sessionsDir).toBe(path.resolve("tmp/sessions"));
    expect(config.publicBaseUrl).toBe("http://localhost:8080");
    expect(config.openaiApiKey).toBe("test-key");
    expect(config.plannerModel).toBe("gpt-4.1");
  });

  it("ignores values it cannot use", () => {
    const config = loadConfig({ PORT: "abc", VERSION_UNRESOLVED_PENALTY: "-1", PLAN_FALLBACK: "maybe" });
    expect(config.port).toBe(DEFAULT_PORT);
    expect(config.versionPenalty).toBe(0.1);
    expect(config.planFallback).toBe(true);
  });
});
