import express from "express";
import cors from "cors";
import path from "node:path";
import fs from "node:fs/promises";
import { existsSync } from "node:fs";
import archiver from "archiver";
import { SERVICE_NAME } from "./config.js";
import type { InvestigationExecutor } from "./executor.js";
import type { Orchestrator } from "./investigation/orchestrator.js";
import { TroubleshootRequestSchema } from "./investigation/schemas.js";
import type { SessionManager } from "./session_manager.js";
import {
  artifactsRootAbs,
  errorMessage,
  isSafeArtifactName,
  SESSION_SNAPSHOT_FILENAME
} from "./investigation/utils.js";

export type InvestigationService = Pick<Orchestrator, "investigate" | "open">;
export type JobQueue = Pick<InvestigationExecutor, "enqueue" | "cancel" | "isActive">;

export type AppOptions = {
  serviceName?: string;
  /** Where the artifact store writes; defaults to the output directory's artifacts folder. */
  artifactsDir?: string;
  /** Interval between SSE keep-alive pings. */
  pingIntervalMs?: number;
};

function contentTypeFor(name: string): string {
  const lower = name.toLowerCase();
  if (lower.endsWith(".json")) return "application/json; charset=utf-8";
  if (lower.endsWith(".md")) return "text/markdown; charset=utf-8";
  return "text/plain; charset=utf-8";
}

export function createApp(
  sessions: SessionManager,
  investigations: InvestigationService,
  executor: JobQueue,
  options: AppOptions = {}
) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  const serviceName = options.serviceName ?? SERVICE_NAME;
  const artifactsDir = () => options.artifactsDir ?? artifactsRootAbs();

  app.get("/health", (_req, res) => {
    res.json({ status: "healthy", service: serviceName });
  });

  app.post("/troubleshoot", async (req, res) => {
    const parsed = TroubleshootRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    // A caller that hangs up abandons its investigation.
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) controller.abort();
    });

    try {
      const result = await investigations.investigate(parsed.data, controller.signal);
      res.json(result);
    } catch (err) {
      res.status(500).json({ status: "FAILURE", confidence: 0, error: errorMessage(err) });
    }
  });

  app.post("/troubleshoot/jobs", async (req, res) => {
    const parsed = TroubleshootRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    try {
      const session = await investigations.open(parsed.data);
      res.status(202).json({ session_id: session.sessionId });
      executor.enqueue(session.sessionId);
    } catch (err) {
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  app.get("/sessions", async (_req, res) => {
    res.json(await sessions.listSessions());
  });

  app.get("/sessions/:sessionId", async (req, res) => {
    const session = await sessions.getSession(req.params.sessionId);
    if (!session) {
      res.status(404).json({ error: "session not found" });
      return;
    }
    res.json({ ...session, active: executor.isActive(session.sessionId) });
  });

  app.delete("/sessions/:sessionId", async (req, res) => {
    const session = await sessions.getSession(req.params.sessionId);
    if (!session) {
      res.status(404).json({ error: "session not found" });
      return;
    }

    const running = executor.isActive(session.sessionId) || (session.status === "IN_PROGRESS" && session.phase !== "INTAKE");
    if (running) {
      res.status(409).json({ error: "session is currently running; cancel it first" });
      return;
    }

    await sessions.deleteSession(session.sessionId);
    await fs.rm(path.join(artifactsDir(), session.sessionId), { recursive: true, force: true });
    res.json({ ok: true });
  });

  app.post("/sessions/:sessionId/cancel", async (req, res) => {
    const session = await sessions.getSession(req.params.sessionId);
    if (!session) {
      res.status(404).json({ error: "session not found" });
      return;
    }

    const ok = executor.cancel(session.sessionId);
    if (!ok) {
      res.status(409).json({ error: "session not cancellable" });
      return;
    }

    res.json({ ok: true });
  });

  app.get("/sessions/:sessionId/events", async (req, res) => {
    const sessionId = req.params.sessionId;
    const session = await sessions.getSession(sessionId);
    if (!session) {
      res.status(404).end();
      return;
    }

    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");

    const send = (type: string, payload: unknown) => {
      res.write(`event: ${type}\ndata: ${JSON.stringify(payload)}\n\n`);
    };

    const unsubscribe = sessions.subscribe(sessionId, (event) => send(event.type, event));
    send("log", { session_id: sessionId, payload: { message: "SSE connected" }, phase: session.phase });

    const ping = setInterval(() => {
      res.write("event: ping\ndata: {}\n\n");
    }, options.pingIntervalMs ?? 15000);

    req.on("close", () => {
      clearInterval(ping);
      unsubscribe();
      res.end();
    });
  });

  app.get("/sessions/:sessionId/export", async (req, res) => {
    const sessionId = req.params.sessionId;
    const session = await sessions.getSession(sessionId);
    if (!session) {
      res.status(404).json({ error: "session not found" });
      return;
    }

    const dir = path.join(artifactsDir(), sessionId);

    res.setHeader("Content-Type", "application/zip");
    res.setHeader("Content-Disposition", `attachment; filename="investigation-${sessionId}.zip"`);

    const archive = archiver("zip", { zlib: { level: 9 } });

    archive.on("warning", (err) => {
      sessions.log(sessionId, `zip warning: ${err.message}`);
    });

    archive.on("error", (err) => {
      sessions.error(sessionId, `zip error: ${err.message}`);
      res.status(500).end();
    });

    archive.pipe(res);
    archive.append(`${JSON.stringify(session, null, 2)}\n`, { name: SESSION_SNAPSHOT_FILENAME });
    if (existsSync(dir)) archive.directory(dir, "artifacts");
    void archive.finalize();
  });

  app.get("/artifacts/:sessionId/:name", async (req, res) => {
    const { sessionId, name } = req.params;

    if (!isSafeArtifactName(sessionId) || !isSafeArtifactName(name)) {
      res.status(400).send("invalid artifact name");
      return;
    }

    try {
      const data = await fs.readFile(path.join(artifactsDir(), sessionId, name));
      res.setHeader("Content-Type", contentTypeFor(name));
      res.send(data);
    } catch {
      res.status(404).send("artifact not found");
    }
  });

  return app;
}
