import fs from "node:fs/promises";
import path from "node:path";
import type { InvestigationSession } from "./types.js";
import { ensureDir, isSafeArtifactName, tryReadJsonFile, writeJsonFile } from "./utils.js";

export const DEFAULT_SESSION_TTL_MS = 24 * 60 * 60 * 1000;

export class SessionExistsError extends Error {
  constructor(sessionId: string) {
    super(`Session ${sessionId} already exists`);
    this.name = "SessionExistsError";
  }
}

export type SessionMutator = (current: InvestigationSession) => InvestigationSession;

/**
 * Per-session state, keyed by session id. Implementations hand out copies and
 * apply updates for one key at a time, so no caller ever holds a live
 * reference into another session.
 */
export interface SessionRepository {
  create(session: InvestigationSession): Promise<InvestigationSession>;
  get(sessionId: string): Promise<InvestigationSession | null>;
  /** Applies `mutate` to a copy of the current state and stores the result. Null when the session is gone. */
  update(sessionId: string, mutate: SessionMutator): Promise<InvestigationSession | null>;
  delete(sessionId: string): Promise<boolean>;
  list(): Promise<InvestigationSession[]>;
  /** Drops sessions idle longer than the TTL and returns their ids. */
  sweepExpired(): Promise<string[]>;
}

export type SessionRepositoryOptions = {
  ttlMs?: number;
  now?: () => number;
};

/** Serializes async work per key; different keys never wait on each other. */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const prev = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = prev.then(() => held);
    this.tails.set(key, tail);

    await prev;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }
}

function lastTouchedMs(session: InvestigationSession): number {
  const ms = Date.parse(session.updatedAt);
  return Number.isFinite(ms) ? ms : 0;
}

export class InMemorySessionRepository implements SessionRepository {
  private readonly sessions = new Map<string, InvestigationSession>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: SessionRepositoryOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_SESSION_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  private isExpired(session: InvestigationSession): boolean {
    return this.now() - lastTouchedMs(session) > this.ttlMs;
  }

  async create(session: InvestigationSession): Promise<InvestigationSession> {
    if (this.sessions.has(session.sessionId)) throw new SessionExistsError(session.sessionId);
    this.sessions.set(session.sessionId, structuredClone(session));
    return structuredClone(session);
  }

  private live(sessionId: string): InvestigationSession | null {
    const s = this.sessions.get(sessionId);
    if (!s) return null;
    if (this.isExpired(s)) {
      this.sessions.delete(sessionId);
      return null;
    }
    return s;
  }

  async get(sessionId: string): Promise<InvestigationSession | null> {
    const s = this.live(sessionId);
    return s ? structuredClone(s) : null;
  }

  // Read, mutate and write run without an await in between, so updates to one session never interleave.
  async update(sessionId: string, mutate: SessionMutator): Promise<InvestigationSession | null> {
    const current = this.live(sessionId);
    if (!current) return null;
    const next = mutate(structuredClone(current));
    this.sessions.set(sessionId, structuredClone(next));
    return structuredClone(next);
  }

  async delete(sessionId: string): Promise<boolean> {
    return this.sessions.delete(sessionId);
  }

  async list(): Promise<InvestigationSession[]> {
    return [...this.sessions.values()].filter((s) => !this.isExpired(s)).map((s) => structuredClone(s));
  }

  async sweepExpired(): Promise<string[]> {
    const expired: string[] = [];
    for (const [id, s] of this.sessions) {
      if (this.isExpired(s)) expired.push(id);
    }
    for (const id of expired) this.sessions.delete(id);
    return expired;
  }
}

/** One JSON document per session under `dir`, written atomically. */
export class FileSessionRepository implements SessionRepository {
  private readonly mutex = new KeyedMutex();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(
    private readonly dir: string,
    options: SessionRepositoryOptions = {}
  ) {
    this.ttlMs = options.ttlMs ?? DEFAULT_SESSION_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  private fileFor(sessionId: string): string | null {
    if (!isSafeArtifactName(sessionId)) return null;
    return path.join(this.dir, `${sessionId}.json`);
  }

  private isExpired(session: InvestigationSession): boolean {
    return this.now() - lastTouchedMs(session) > this.ttlMs;
  }

  private async readLive(file: string): Promise<InvestigationSession | null> {
    const s = await tryReadJsonFile<InvestigationSession>(file);
    if (!s) return null;
    if (this.isExpired(s)) {
      await fs.rm(file, { force: true });
      return null;
    }
    return s;
  }

  async create(session: InvestigationSession): Promise<InvestigationSession> {
    const file = this.fileFor(session.sessionId);
    if (!file) throw new Error(`Invalid session id: ${session.sessionId}`);
    return this.mutex.run(session.sessionId, async () => {
      if (await tryReadJsonFile<InvestigationSession>(file)) throw new SessionExistsError(session.sessionId);
      await writeJsonFile(file, session);
      return structuredClone(session);
    });
  }

  async get(sessionId: string): Promise<InvestigationSession | null> {
    const file = this.fileFor(sessionId);
    if (!file) return null;
    return this.mutex.run(sessionId, () => this.readLive(file));
  }

  async update(sessionId: string, mutate: SessionMutator): Promise<InvestigationSession | null> {
    const file = this.fileFor(sessionId);
    if (!file) return null;
    return this.mutex.run(sessionId, async () => {
      const current = await this.readLive(file);
      if (!current) return null;
      const next = mutate(current);
      await writeJsonFile(file, next);
      return next;
    });
  }

  async delete(sessionId: string): Promise<boolean> {
    const file = this.fileFor(sessionId);
    if (!file) return false;
    return this.mutex.run(sessionId, async () => {
      const existed = await fs
        .stat(file)
        .then((st) => st.isFile())
        .catch(() => false);
      await fs.rm(file, { force: true });
      return existed;
    });
  }

  private async ids(): Promise<string[]> {
    await ensureDir(this.dir);
    const entries = await fs.readdir(this.dir, { withFileTypes: true });
    return entries
      .filter((ent) => ent.isFile() && ent.name.endsWith(".json"))
      .map((ent) => ent.name.slice(0, -".json".length));
  }

  async list(): Promise<InvestigationSession[]> {
    const out: InvestigationSession[] = [];
    for (const id of await this.ids()) {
      const s = await this.get(id);
      if (s) out.push(s);
    }
    return out;
  }

  async sweepExpired(): Promise<string[]> {
    const expired: string[] = [];
    for (const id of await this.ids()) {
      const file = this.fileFor(id);
      if (!file) continue;
      const removed = await this.mutex.run(id, async () => {
        const s = await tryReadJsonFile<InvestigationSession>(file);
        if (!s || !this.isExpired(s)) return false;
        await fs.rm(file, { force: true });
        return true;
      });
      if (removed) expired.push(id);
    }
    return expired;
  }
}
