import * as os from "node:os";
import * as path from "node:path";
import type { CliOptions } from "./args.js";

/** Where a `run` keeps its logs and job workspaces */
export interface RunLayout {
  logsRoot: string;
  workRoot: string;
  sourceDir: string;
  /** Left out when the source is copied into a workspace */
  sourceExclude: string[];
}

export const RUNS_DIR = ".conveyor-runs";

/**
 * Logs go under `<cwd>/.conveyor-runs/<runId>` unless `--logs-dir` says
 * otherwise. Workspaces live in the temp directory, outside the checkout
 * they are copied from.
 */
export function runLayout(
  opts: Pick<CliOptions, "logsDir" | "workdir">,
  filePath: string,
  runId: string,
  cwd: string = process.cwd(),
  tmpDir: string = os.tmpdir(),
): RunLayout {
  const logsRoot = opts.logsDir ? path.resolve(cwd, opts.logsDir) : path.join(cwd, RUNS_DIR, runId);
  return {
    logsRoot,
    workRoot: path.join(tmpDir, `conveyor-${runId}`, "builds"),
    sourceDir: opts.workdir ? path.resolve(cwd, opts.workdir) : path.dirname(path.resolve(cwd, filePath)),
    sourceExclude: [path.join(cwd, RUNS_DIR), logsRoot],
  };
}
