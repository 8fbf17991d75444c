import { createHash } from "node:crypto";
import * as fs from "node:fs";
import * as path from "node:path";

export interface CacheEntry {
  key: string;
  files: ReadonlyMap<string, Uint8Array>;
  updatedAt: number;
}

/** Cache entries keyed by (expanded) cache key; shared across pipeline runs */
export interface CacheStore {
  get(key: string): CacheEntry | undefined;
  put(key: string, files: ReadonlyMap<string, Uint8Array>, now: number): void;
  keys(): string[];
}

export class MemoryCacheStore implements CacheStore {
  private entries = new Map<string, CacheEntry>();

  get(key: string): CacheEntry | undefined {
    return this.entries.get(key);
  }

  put(key: string, files: ReadonlyMap<string, Uint8Array>, now: number): void {
    this.entries.set(key, { key, files: new Map(files), updatedAt: now });
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }
}

interface StoredCacheFile {
  key: string;
  updatedAt: number;
  /** relative path -> base64 content */
  files: Record<string, string>;
}

function isStoredCacheFile(value: unknown): value is StoredCacheFile {
  if (typeof value !== "object" || value === null) return false;
  return (
    "key" in value &&
    typeof value.key === "string" &&
    "updatedAt" in value &&
    typeof value.updatedAt === "number" &&
    "files" in value &&
    typeof value.files === "object" &&
    value.files !== null
  );
}

/** One JSON file per key under `dir`, named by the key's sha256 */
export class FileCacheStore implements CacheStore {
  constructor(private dir: string) {}

  private fileFor(key: string): string {
    return path.join(this.dir, `${createHash("sha256").update(key).digest("hex")}.json`);
  }

  get(key: string): CacheEntry | undefined {
    const file = this.fileFor(key);
    if (!fs.existsSync(file)) return undefined;
    const data = readStored(file);
    if (!isStoredCacheFile(data) || data.key !== key) return undefined;
    const files = new Map<string, Uint8Array>();
    for (const [rel, content] of Object.entries(data.files)) {
      files.set(rel, Buffer.from(content, "base64"));
    }
    return { key, files, updatedAt: data.updatedAt };
  }

  put(key: string, files: ReadonlyMap<string, Uint8Array>, now: number): void {
    fs.mkdirSync(this.dir, { recursive: true });
    const stored: StoredCacheFile = { key, updatedAt: now, files: {} };
    for (const [rel, data] of files) {
      stored.files[rel] = Buffer.from(data).toString("base64");
    }
    fs.writeFileSync(this.fileFor(key), JSON.stringify(stored));
  }

  keys(): string[] {
    if (!fs.existsSync(this.dir)) return [];
    const keys: string[] = [];
    for (const name of fs.readdirSync(this.dir)) {
      if (!name.endsWith(".json")) continue;
      const data = readStored(path.join(this.dir, name));
      if (isStoredCacheFile(data)) keys.push(data.key);
    }
    return keys.sort();
  }
}

/** A truncated or unparseable file reads as no entry */
function readStored(file: string): unknown {
  try {
    return JSON.parse(fs.readFileSync(file, "utf-8"));
  } catch (err) {
    if (err instanceof SyntaxError) return undefined;
    throw err;
  }
}
