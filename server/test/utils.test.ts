import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import {
  artifactsRootAbs,
  dataRootAbs,
  ensureDir,
  errorMessage,
  isSafeArtifactName,
  nowIso,
  outputRootAbs,
  readJsonFile,
  repoRoot,
  sessionsRootAbs,
  truncate,
  tryReadJsonFile,
  writeJsonFile,
  writeTextFile
} from "../src/investigation/utils.js";

let savedOutputDir: string | undefined;
let savedDataDir: string | undefined;
let tmp = "";

beforeEach(async () => {
  savedOutputDir = process.env.IOC_OUTPUT_DIR;
  savedDataDir = process.env.IOC_DATA_DIR;
  tmp = await fs.mkdtemp(path.join(os.tmpdir(), "ioc-utils-"));
});

afterEach(async () => {
  if (savedOutputDir === undefined) delete process.env.IOC_OUTPUT_DIR;
  else process.env.IOC_OUTPUT_DIR = savedOutputDir;

  if (savedDataDir === undefined) delete process.env.IOC_DATA_DIR;
  else process.env.IOC_DATA_DIR = savedDataDir;

  await fs.rm(tmp, { recursive: true, force: true });
});

describe("investigation/utils", () => {
  it("repoRoot resolves to the parent of server cwd", () => {
    expect(repoRoot()).toBe(path.resolve(process.cwd(), ".."));
  });

  it("outputRootAbs uses IOC_OUTPUT_DIR when set", () => {
    process.env.IOC_OUTPUT_DIR = tmp;
    expect(outputRootAbs()).toBe(tmp);
    expect(sessionsRootAbs()).toBe(path.join(tmp, "sessions"));
    expect(artifactsRootAbs()).toBe(path.join(tmp, "artifacts"));
  });

  it("outputRootAbs defaults under repo root when IOC_OUTPUT_DIR is blank", () => {
    process.env.IOC_OUTPUT_DIR = "  ";
    expect(outputRootAbs()).toBe(path.join(repoRoot(), "output"));
  });

  it("dataRootAbs uses IOC_DATA_DIR when set and server/data otherwise", () => {
    process.env.IOC_DATA_DIR = tmp;
    expect(dataRootAbs()).toBe(tmp);
    delete process.env.IOC_DATA_DIR;
    expect(dataRootAbs()).toBe(path.join(repoRoot(), "server", "data"));
  });

  it("ensureDir creates a directory recursively", async () => {
    const nested = path.join(tmp, "a/b/c");
    await ensureDir(nested);
    expect((await fs.stat(nested)).isDirectory()).toBe(true);
  });

  it("writeTextFile adds a trailing newline only when missing", async () => {
    const a = path.join(tmp, "a.md");
    const b = path.join(tmp, "nested", "b.md");
    await writeTextFile(a, "hello");
    await writeTextFile(b, "hello\n");
    expect(await fs.readFile(a, "utf8")).toBe("hello\n");
    expect(await fs.readFile(b, "utf8")).toBe("hello\n");
  });

  it("writeJsonFile + readJsonFile roundtrip", async () => {
    const p = path.join(tmp, "a.json");
    const at = nowIso();
    await writeJsonFile(p, { at, ok: true });
    expect(await readJsonFile<{ at: string; ok: boolean }>(p)).toEqual({ at, ok: true });
    expect(await fs.readdir(tmp)).toEqual(["a.json"]);
  });

  it("tryReadJsonFile returns null for missing or invalid json", async () => {
    expect(await tryReadJsonFile(path.join(tmp, "nope.json"))).toBeNull();
    await fs.writeFile(path.join(tmp, "bad.json"), "{not valid json", "utf8");
    expect(await tryReadJsonFile(path.join(tmp, "bad.json"))).toBeNull();
  });

  it("isSafeArtifactName rejects traversal and odd characters", () => {
    expect(isSafeArtifactName("../x.md")).toBe(false);
    expect(isSafeArtifactName("a/b.md")).toBe(false);
    expect(isSafeArtifactName("a\\b.md")).toBe(false);
    expect(isSafeArtifactName("bad name.md")).toBe(false);
    expect(isSafeArtifactName("rca_report-1.md")).toBe(true);
  });

  it("errorMessage and truncate", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage(42)).toBe("42");
    expect(truncate("abcdefghij", 8)).toBe("abcde...");
    expect(truncate("abc", 8)).toBe("abc");
  });
});
