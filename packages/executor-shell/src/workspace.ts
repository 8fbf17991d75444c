import * as fs from "node:fs/promises";
import * as path from "node:path";
import { type ArtifactSet, type RestoredCache, safeRelativePath } from "@conveyor/core";
import { glob } from "glob";

export interface WorkspaceContents {
  /** Copied into the workspace first; the job starts from an empty directory without it */
  sourceDir?: string;
  /** Absolute paths under `sourceDir` left out of the copy */
  sourceExclude?: readonly string[];
  artifacts: readonly ArtifactSet[];
  caches: readonly RestoredCache[];
}

async function writeFiles(root: string, files: ReadonlyMap<string, Uint8Array>): Promise<void> {
  for (const [file, data] of files) {
    const target = path.join(root, safeRelativePath(file));
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, data);
  }
}

function isWithin(parent: string, child: string): boolean {
  const rel = path.relative(parent, child);
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}

/**
 * Copy `src` into `dest` entry by entry. The workspace itself may live
 * inside `src`; directories holding it are walked instead of copied.
 */
async function copyTree(src: string, dest: string, skip: readonly string[]): Promise<void> {
  await fs.mkdir(dest, { recursive: true });
  for (const entry of await fs.readdir(src, { withFileTypes: true })) {
    const from = path.join(src, entry.name);
    const to = path.join(dest, entry.name);
    if (skip.some((s) => isWithin(s, from))) continue;
    if (entry.isDirectory() && skip.some((s) => isWithin(from, s))) {
      await copyTree(from, to, skip);
      continue;
    }
    await fs.cp(from, to, { recursive: true, filter: (file) => !skip.some((s) => isWithin(s, file)) });
  }
}

/**
 * Create a job's working directory. Caches are restored first, then
 * upstream artifacts in order, so a later artifact overwrites an
 * earlier file of the same path.
 */
export async function prepareWorkspace(dir: string, contents: WorkspaceContents): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
  await fs.mkdir(dir, { recursive: true });
  if (contents.sourceDir) {
    const skip = [dir, ...(contents.sourceExclude ?? [])].map((p) => path.resolve(p));
    await copyTree(path.resolve(contents.sourceDir), dir, skip);
  }
  for (const cache of contents.caches) {
    await writeFiles(dir, cache.files);
  }
  for (const set of contents.artifacts) {
    await writeFiles(dir, set.files);
  }
}

/**
 * Read every file matched by `patterns` under `dir`, keyed by its path
 * relative to `dir`. A pattern that names a directory takes the whole tree.
 */
export async function collectFiles(
  dir: string,
  patterns: readonly string[],
  exclude: readonly string[] = [],
): Promise<Record<string, Uint8Array>> {
  const files: Record<string, Uint8Array> = {};
  if (patterns.length === 0) return files;

  const options = { cwd: dir, dot: true, posix: true, ignore: [...exclude] };
  const matches = await glob([...patterns], options);
  for (const match of matches.sort()) {
    const stat = await fs.stat(path.join(dir, match));
    const relatives = stat.isDirectory()
      ? await glob(`${match.replace(/\/$/, "")}/**`, { ...options, nodir: true })
      : [match];
    for (const relative of relatives.sort()) {
      const key = safeRelativePath(relative);
      if (key in files) continue;
      files[key] = new Uint8Array(await fs.readFile(path.join(dir, key)));
    }
  }
  return files;
}
