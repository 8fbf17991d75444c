import { spawn } from "node:child_process";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  type ExecutionOutcome,
  type Executor,
  type JobNode,
  type ResolvedEnvironment,
  RunnerInfrastructureFailure,
  slugify,
} from "@conveyor/core";
import * as dotenv from "dotenv";
import { type EnvFilterOptions, type EnvFilterPolicy, jobEnvironment } from "./env-filter.js";
import { collectFiles, prepareWorkspace } from "./workspace.js";

export interface LocalShellExecutorOptions {
  /** Parent directory of the per-job workspaces */
  workRoot: string;
  /** Project checkout copied into every workspace */
  sourceDir?: string;
  /** Paths under `sourceDir` never copied, such as run logs kept inside the checkout */
  sourceExclude?: readonly string[];
  envFilterPolicy?: EnvFilterPolicy;
  /** Host variables passed through or withheld regardless of the policy */
  envFilter?: EnvFilterOptions;
  /** Interpreter; run as `<shell> -e -c <script>` (default bash) */
  shell?: string;
  /** Delay between SIGTERM and SIGKILL (default 2s) */
  killGraceMs?: number;
  /** Bound on `after_script` (default 5 minutes) */
  afterScriptTimeoutMs?: number;
  /** Leave workspaces on disk after the job */
  keepWorkspaces?: boolean;
  env?: NodeJS.ProcessEnv;
}

interface ScriptResult {
  exitCode: number;
  output: string;
  aborted: boolean;
}

const DEFAULT_KILL_GRACE_MS = 2_000;
const DEFAULT_AFTER_SCRIPT_TIMEOUT_MS = 5 * 60_000;
const MAX_LOG_BYTES = 4 * 1024 * 1024;

function shellQuote(text: string): string {
  return `'${text.replace(/'/g, `'\\''`)}'`;
}

/** One script with every command echoed before it runs */
export function renderScript(lines: readonly string[]): string {
  return lines.map((line) => `echo ${shellQuote(`$ ${line}`)}\n${line}`).join("\n");
}

/**
 * Runs job scripts as local bash processes, one workspace directory per
 * dispatch. Images, services and runner tags are ignored.
 */
export class LocalShellExecutor implements Executor {
  private readonly shell: string;
  private readonly killGraceMs: number;
  private readonly afterScriptTimeoutMs: number;
  private readonly envPolicy: EnvFilterPolicy;
  private readonly processes = new Map<string, () => void>();

  constructor(private opts: LocalShellExecutorOptions) {
    this.shell = opts.shell ?? "bash";
    this.killGraceMs = opts.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    this.afterScriptTimeoutMs = opts.afterScriptTimeoutMs ?? DEFAULT_AFTER_SCRIPT_TIMEOUT_MS;
    this.envPolicy = opts.envFilterPolicy ?? "inherit_all";
  }

  workspaceFor(env: ResolvedEnvironment): string {
    return path.join(this.opts.workRoot, `${env.jobId}-${slugify(env.jobName) || "job"}`);
  }

  async dispatch(job: JobNode, env: ResolvedEnvironment): Promise<ExecutionOutcome> {
    const dir = this.workspaceFor(env);
    try {
      await prepareWorkspace(dir, {
        sourceDir: this.opts.sourceDir,
        sourceExclude: this.opts.sourceExclude,
        artifacts: env.artifacts,
        caches: env.caches,
      });
    } catch (err) {
      throw new RunnerInfrastructureFailure(
        `could not prepare workspace: ${err instanceof Error ? err.message : String(err)}`,
        "runner_system_failure",
      );
    }

    try {
      const variables = jobEnvironment(
        this.opts.env ?? process.env,
        this.envPolicy,
        { ...env.variables, CI_PROJECT_DIR: dir, CI_BUILDS_DIR: this.opts.workRoot },
        this.opts.envFilter,
      );

      const main = await this.runScript(
        job.id,
        renderScript([...env.beforeScript, ...env.script]),
        dir,
        variables,
        env.signal,
      );
      let log = main.output;

      if (env.afterScript.length > 0) {
        const after = await this.runScript(
          job.id,
          renderScript(env.afterScript),
          dir,
          { ...variables, CI_JOB_STATUS: main.aborted ? "canceled" : main.exitCode === 0 ? "success" : "failed" },
          AbortSignal.timeout(this.afterScriptTimeoutMs),
        );
        log += after.output;
        if (after.exitCode !== 0) log += `after_script exited with code ${after.exitCode}\n`;
      }

      if (main.aborted) return { status: "canceled", log };

      const outcome: ExecutionOutcome =
        main.exitCode === 0
          ? { status: "success", exitCode: 0, log }
          : {
              status: "failed",
              failureReason: "script_failure",
              exitCode: main.exitCode,
              error: `script exited with code ${main.exitCode}`,
              log,
            };

      if (env.artifactSpec) {
        outcome.artifacts = await collectFiles(dir, env.artifactSpec.paths, env.artifactSpec.exclude);
        outcome.reports = { dotenv: await readDotenv(dir, env.artifactSpec.reports.dotenv) };
      }
      const cache: Record<string, Record<string, Uint8Array>> = {};
      for (const spec of env.cacheSpecs) {
        if (spec.policy === "pull") continue;
        cache[spec.key] = await collectFiles(dir, spec.paths);
      }
      outcome.cache = cache;
      return outcome;
    } finally {
      if (!this.opts.keepWorkspaces) {
        await fs.rm(dir, { recursive: true, force: true });
      }
    }
  }

  cancel(job: JobNode): void {
    this.processes.get(job.id)?.();
  }

  private runScript(
    jobName: string,
    script: string,
    cwd: string,
    env: Record<string, string>,
    signal: AbortSignal,
  ): Promise<ScriptResult> {
    return new Promise<ScriptResult>((resolve, reject) => {
      const chunks: Buffer[] = [];
      let logBytes = 0;
      let aborted = false;
      let killTimer: ReturnType<typeof setTimeout> | undefined;

      // Own process group, so the whole tree can be signalled
      const child = spawn(this.shell, ["-e", "-c", script], {
        cwd,
        env,
        detached: true,
        stdio: ["ignore", "pipe", "pipe"],
      });

      const onData = (chunk: Buffer) => {
        logBytes += chunk.length;
        if (logBytes <= MAX_LOG_BYTES) chunks.push(chunk);
      };
      child.stdout?.on("data", onData);
      child.stderr?.on("data", onData);

      const signalGroup = (sig: NodeJS.Signals) => {
        const pid = child.pid;
        if (pid === undefined) return;
        try {
          process.kill(-pid, sig);
        } catch {
          // process group already gone
        }
      };
      const terminate = () => {
        if (aborted) return;
        aborted = true;
        signalGroup("SIGTERM");
        killTimer = setTimeout(() => signalGroup("SIGKILL"), this.killGraceMs);
      };

      const cleanup = () => {
        clearTimeout(killTimer);
        signal.removeEventListener("abort", terminate);
        this.processes.delete(jobName);
      };

      this.processes.set(jobName, terminate);
      if (signal.aborted) terminate();
      else signal.addEventListener("abort", terminate, { once: true });

      child.on("error", (err) => {
        cleanup();
        reject(
          new RunnerInfrastructureFailure(`could not start ${this.shell}: ${err.message}`, "runner_system_failure"),
        );
      });
      child.on("close", (code) => {
        cleanup();
        let output = Buffer.concat(chunks).toString("utf-8");
        if (logBytes > MAX_LOG_BYTES) output += `\n[log truncated after ${MAX_LOG_BYTES} bytes]\n`;
        resolve({ exitCode: code ?? 1, output, aborted });
      });
    });
  }
}

async function readDotenv(dir: string, files: readonly string[]): Promise<Record<string, string>> {
  const variables: Record<string, string> = {};
  for (const file of files) {
    let content: Buffer;
    try {
      content = await fs.readFile(path.join(dir, file));
    } catch {
      continue; // a report the job did not write is skipped
    }
    for (const [key, value] of Object.entries(dotenv.parse(content))) {
      variables[key] = value;
    }
  }
  return variables;
}
