import type { FailureReason } from "../model/types.js";
import type { JobInstance } from "../state/job-instance.js";
import { JobState, type SkipReason } from "../state/types.js";

export type PipelineStatus = "success" | "failed" | "canceled";

export interface JobResult {
  name: string;
  stage: string;
  state: JobState;
  attempts: number;
  failureReason: FailureReason | null;
  /** Failed, but tolerated by allow_failure */
  failureAllowed: boolean;
  skipReason: SkipReason | null;
  exitCode: number | null;
  errors: string[];
  artifactIds: string[];
  startedAt: string | null;
  finishedAt: string | null;
  durationMs: number;
}

export interface PipelineResult {
  id: string;
  status: PipelineStatus;
  /** Some job failed with allow_failure */
  hasWarnings: boolean;
  exitCode: 0 | 1;
  jobs: JobResult[];
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}

export function toJobResult(instance: JobInstance, stage: string): JobResult {
  const iso = (t: number | null) => (t === null ? null : new Date(t).toISOString());
  return {
    name: instance.name,
    stage,
    state: instance.state,
    attempts: instance.attempts,
    failureReason: instance.failureReason,
    failureAllowed: instance.failureAllowed,
    skipReason: instance.skipReason,
    exitCode: instance.exitCode,
    errors: [...instance.errors],
    artifactIds: [...instance.artifactIds],
    startedAt: iso(instance.startedAt),
    finishedAt: iso(instance.finishedAt),
    durationMs: instance.durationMs,
  };
}

/**
 * Overall status: success iff every job that may not fail succeeded or was
 * legitimately skipped. A job skipped because something upstream failed
 * counts as a failure of the pipeline only through that upstream job.
 */
export function pipelineStatus(jobs: readonly JobResult[], canceled: boolean): PipelineStatus {
  if (canceled) return "canceled";
  for (const job of jobs) {
    if (job.state === JobState.FAILED && !job.failureAllowed) return "failed";
    if (job.state === JobState.CANCELED) return "failed";
  }
  return "success";
}
