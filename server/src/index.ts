import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const repoRoot = path.resolve(__dirname, "../../");

dotenv.config({ path: path.resolve(repoRoot, ".env") });

// Dynamic imports so `.env` is loaded before any modules read process.env at import-time.
const { setDefaultOpenAIKey } = await import("@openai/agents");
const { loadConfig } = await import("./config.js");
const { SessionManager } = await import("./session_manager.js");
const { InvestigationExecutor } = await import("./executor.js");
const { createApp } = await import("./app.js");
const { Orchestrator } = await import("./investigation/orchestrator.js");
const { Delegator } = await import("./investigation/delegation.js");
const { FileArtifactStore } = await import("./investigation/artifact_store.js");
const { ConsoleAnalyticsSink } = await import("./investigation/events.js");
const { AgentPlanner, StaticPlanner, loadIssueTaxonomy } = await import("./investigation/planner.js");
const { FileSessionRepository, InMemorySessionRepository } = await import("./investigation/session_store.js");

const config = loadConfig();

const repo =
  config.sessionStore === "file"
    ? new FileSessionRepository(config.sessionsDir, { ttlMs: config.sessionTtlMs })
    : new InMemorySessionRepository({ ttlMs: config.sessionTtlMs });
const sessions = new SessionManager(repo, {
  sinks: [new ConsoleAnalyticsSink()],
  searchWindowHours: config.searchWindowHours
});

const recovered = await sessions.recoverInterrupted();
if (recovered.length > 0) {
  console.log(`marked ${recovered.length} interrupted investigation(s) as failed`);
}

const taxonomy = await loadIssueTaxonomy();
if (config.openaiApiKey) setDefaultOpenAIKey(config.openaiApiKey);
const planner = config.openaiApiKey
  ? new AgentPlanner(taxonomy, { model: config.plannerModel })
  : new StaticPlanner(taxonomy);
console.log(
  config.openaiApiKey ? `planner: ${config.plannerModel}` : "planner: default plan (OPENAI_API_KEY not set)"
);

const orchestrator = new Orchestrator(
  {
    sessions,
    delegator: new Delegator(config.endpoints),
    planner,
    artifacts: new FileArtifactStore({ publicBaseUrl: config.publicBaseUrl }),
    taxonomy
  },
  {
    delegationTimeoutMs: config.delegationTimeoutMs,
    budgetMs: config.budgetMs,
    versionPenalty: config.versionPenalty,
    includeArchitectConfidence: config.includeArchitectConfidence,
    planFallback: config.planFallback
  }
);

const executor = new InvestigationExecutor(
  sessions,
  (sessionId, signal) => orchestrator.run(sessionId, signal),
  (sessionId, reason) => orchestrator.abandon(sessionId, reason),
  { concurrency: config.maxConcurrentInvestigations }
);

const sweep = setInterval(
  () => {
    sessions
      .sweepExpired()
      .then((expired) => {
        if (expired.length > 0) console.log(`expired ${expired.length} session(s)`);
      })
      .catch((err: unknown) => console.error(`session sweep failed: ${err instanceof Error ? err.message : String(err)}`));
  },
  Math.min(config.sessionTtlMs, 60_000)
);
sweep.unref();

const app = createApp(sessions, orchestrator, executor);

app.listen(config.port, () => {
  console.log(`server listening on http://localhost:${config.port}`);
});
