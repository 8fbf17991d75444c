import * as fs from "node:fs";
import * as path from "node:path";

const FILE_BACKING_THRESHOLD = 100 * 1024; // 100KB

/** Metadata of one published artifact set */
export interface ArtifactInfo {
  id: string;
  name: string;
  jobName: string;
  jobId: number;
  /** 1 for the first set a job publishes, incremented on every retry */
  version: number;
  sizeBytes: number;
  fileCount: number;
  /** Variables from the `reports:dotenv` files */
  dotenv: Readonly<Record<string, string>>;
  createdAt: number;
  /** null means the set never expires */
  expiresAt: number | null;
  isFileBacked: boolean;
}

/** An artifact set with its file contents, keyed by relative path */
export interface ArtifactSet extends ArtifactInfo {
  files: ReadonlyMap<string, Uint8Array>;
}

export type NewArtifactSet = Pick<
  ArtifactSet,
  "name" | "jobName" | "jobId" | "dotenv" | "createdAt" | "expiresAt" | "files"
>;

/** Relative path inside a set; rejects absolute paths and `..` segments */
export function safeRelativePath(file: string): string {
  const normalized = path.posix.normalize(file.replace(/\\/g, "/"));
  if (normalized.startsWith("/") || normalized === ".." || normalized.startsWith("../")) {
    throw new Error(`Artifact path escapes the workspace: ${file}`);
  }
  return normalized;
}

/**
 * Append-only store of artifact sets keyed by (job, name, version).
 * Sets above 100KB spill to `<baseDir>/artifacts/<id>/` when a base dir is
 * given; the rest stay in memory.
 */
export class ArtifactStore {
  private sets = new Map<string, { info: ArtifactInfo; files: ReadonlyMap<string, Uint8Array> | string[] }>();
  private versions = new Map<string, number>();
  private baseDir: string | null;

  constructor(baseDir?: string) {
    this.baseDir = baseDir ?? null;
  }

  store(set: NewArtifactSet): ArtifactInfo {
    const version = (this.versions.get(set.jobName) ?? 0) + 1;
    this.versions.set(set.jobName, version);
    const id = `${set.jobId}-${set.name}-v${version}`.replace(/[^A-Za-z0-9._-]+/g, "_");

    let sizeBytes = 0;
    for (const data of set.files.values()) sizeBytes += data.byteLength;
    const isFileBacked = sizeBytes > FILE_BACKING_THRESHOLD && this.baseDir !== null;

    const info: ArtifactInfo = {
      id,
      name: set.name,
      jobName: set.jobName,
      jobId: set.jobId,
      version,
      sizeBytes,
      fileCount: set.files.size,
      dotenv: { ...set.dotenv },
      createdAt: set.createdAt,
      expiresAt: set.expiresAt,
      isFileBacked,
    };

    if (isFileBacked && this.baseDir !== null) {
      const dir = path.join(this.baseDir, "artifacts", id);
      const paths: string[] = [];
      for (const [file, data] of set.files) {
        const rel = safeRelativePath(file);
        const target = path.join(dir, rel);
        fs.mkdirSync(path.dirname(target), { recursive: true });
        fs.writeFileSync(target, data);
        paths.push(rel);
      }
      this.sets.set(id, { info, files: paths });
    } else {
      this.sets.set(id, { info, files: new Map(set.files) });
    }
    return info;
  }

  retrieve(id: string): ArtifactSet {
    const entry = this.sets.get(id);
    if (!entry) throw new Error(`Artifact set not found: ${id}`);
    if (!Array.isArray(entry.files)) {
      return { ...entry.info, files: entry.files };
    }
    const dir = path.join(this.baseDir ?? "", "artifacts", id);
    const files = new Map<string, Uint8Array>();
    for (const rel of entry.files) {
      files.set(rel, fs.readFileSync(path.join(dir, rel)));
    }
    return { ...entry.info, files };
  }

  has(id: string): boolean {
    return this.sets.has(id);
  }

  /** Most recent set published by a job */
  latest(jobName: string): ArtifactInfo | undefined {
    let found: ArtifactInfo | undefined;
    for (const { info } of this.sets.values()) {
      if (info.jobName === jobName) found = info;
    }
    return found;
  }

  list(): ArtifactInfo[] {
    return [...this.sets.values()].map((e) => e.info);
  }

  remove(id: string): void {
    const entry = this.sets.get(id);
    if (entry?.info.isFileBacked && this.baseDir !== null) {
      fs.rmSync(path.join(this.baseDir, "artifacts", id), { recursive: true, force: true });
    }
    this.sets.delete(id);
  }

  clear(): void {
    for (const id of [...this.sets.keys()]) {
      this.remove(id);
    }
  }
}
