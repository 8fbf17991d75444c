import type { JobNode } from "../model/graph.js";
import type { ExecutionOutcome, Executor, ResolvedEnvironment } from "./types.js";

/**
 * Executor that runs nothing: every job succeeds after `delayMs`,
 * producing an empty file per artifact path and cache path.
 * Used for dry runs.
 */
export class SimulatedExecutor implements Executor {
  readonly dispatched: string[] = [];

  constructor(private delayMs = 0) {}

  async dispatch(job: JobNode, env: ResolvedEnvironment): Promise<ExecutionOutcome> {
    this.dispatched.push(job.id);
    if (this.delayMs > 0) {
      await new Promise<void>((resolve) => {
        const timer = setTimeout(resolve, this.delayMs);
        env.signal.addEventListener("abort", () => {
          clearTimeout(timer);
          resolve();
        });
      });
    }
    if (env.signal.aborted) return { status: "canceled" };

    const artifacts: Record<string, Uint8Array> = {};
    for (const file of env.artifactSpec?.paths ?? []) artifacts[file] = new Uint8Array();

    const cache: Record<string, Record<string, Uint8Array>> = {};
    for (const spec of env.cacheSpecs) {
      const files: Record<string, Uint8Array> = {};
      for (const file of spec.paths) files[file] = new Uint8Array();
      cache[spec.key] = files;
    }
    return { status: "success", exitCode: 0, artifacts, cache, log: `simulated ${job.id}\n` };
  }

  cancel(): void {
    // dispatch already stops on the abort signal
  }
}
