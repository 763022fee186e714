import path from "node:path";
import { artifactsRootAbs, writeTextFile } from "./utils.js";

export const RCA_ARTIFACT_NAME = "rca_report.md";

export function rcaArtifactKey(sessionId: string): string {
  return `${sessionId}/${RCA_ARTIFACT_NAME}`;
}

export interface ArtifactStore {
  /** Stores `content` under `key` and returns a URL a client can fetch it from. */
  upload(content: string, key: string): Promise<string>;
}

export type FileArtifactStoreOptions = {
  rootDir?: string;
  publicBaseUrl?: string;
};

/**
 * Writes artifacts below the output directory; the HTTP app serves them back
 * from `/artifacts/:sessionId/:name`.
 */
export class FileArtifactStore implements ArtifactStore {
  private readonly rootDir: string;
  private readonly publicBaseUrl: string;

  constructor(options: FileArtifactStoreOptions = {}) {
    this.rootDir = options.rootDir ?? artifactsRootAbs();
    this.publicBaseUrl = (options.publicBaseUrl ?? "").replace(/\/+$/, "");
  }

  async upload(content: string, key: string): Promise<string> {
    const segments = key.split("/").filter((s) => s.length > 0);
    if (segments.length === 0 || segments.some((s) => s === "." || s === "..")) {
      throw new Error(`Invalid artifact key: ${key}`);
    }
    await writeTextFile(path.join(this.rootDir, ...segments), content);
    return `${this.publicBaseUrl}/artifacts/${segments.map(encodeURIComponent).join("/")}`;
  }
}
