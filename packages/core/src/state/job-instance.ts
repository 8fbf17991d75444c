import type { FailureReason } from "../model/types.js";
import { JobState, type SkipReason } from "./types.js";

const TRANSITIONS: Record<JobState, readonly JobState[]> = {
  [JobState.PENDING]: [JobState.READY, JobState.SKIPPED, JobState.CANCELED],
  [JobState.READY]: [JobState.RUNNING, JobState.SKIPPED, JobState.FAILED, JobState.CANCELED],
  [JobState.RUNNING]: [JobState.SUCCESS, JobState.FAILED, JobState.CANCELED],
  [JobState.FAILED]: [JobState.READY, JobState.CANCELED],
  [JobState.SUCCESS]: [],
  [JobState.SKIPPED]: [],
  [JobState.CANCELED]: [],
};

export class IllegalTransitionError extends Error {
  constructor(
    public job: string,
    public from: JobState,
    public to: JobState,
  ) {
    super(`Job '${job}' cannot move from ${from} to ${to}`);
    this.name = "IllegalTransitionError";
  }
}

/**
 * Mutable runtime record of one job in one pipeline run.
 *
 * Only the scheduler drives it; every state change goes through
 * `transition`, which rejects moves outside the lifecycle table.
 */
export class JobInstance {
  state = JobState.PENDING;
  /** Number of dispatches so far */
  attempts = 0;
  failureReason: FailureReason | null = null;
  skipReason: SkipReason | null = null;
  exitCode: number | null = null;
  /** Failed, but allowed to (does not block or fail the pipeline) */
  failureAllowed = false;
  errors: string[] = [];
  artifactIds: string[] = [];
  startedAt: number | null = null;
  finishedAt: number | null = null;

  constructor(
    readonly name: string,
    readonly id: number,
  ) {}

  transition(to: JobState): void {
    if (!TRANSITIONS[this.state].includes(to)) {
      throw new IllegalTransitionError(this.name, this.state, to);
    }
    this.state = to;
  }

  /** Move to RUNNING and count the attempt */
  start(now: number): void {
    this.transition(JobState.RUNNING);
    this.attempts++;
    this.startedAt ??= now;
    this.failureReason = null;
    this.exitCode = null;
  }

  succeed(now: number): void {
    this.transition(JobState.SUCCESS);
    this.finishedAt = now;
  }

  fail(reason: FailureReason, now: number, opts?: { exitCode?: number; error?: string }): void {
    this.transition(JobState.FAILED);
    this.failureReason = reason;
    this.exitCode = opts?.exitCode ?? null;
    if (opts?.error) this.errors.push(opts.error);
    this.finishedAt = now;
  }

  skip(reason: SkipReason, now: number): void {
    this.transition(JobState.SKIPPED);
    this.skipReason = reason;
    this.finishedAt = now;
  }

  cancel(now: number): void {
    this.transition(JobState.CANCELED);
    this.finishedAt = now;
  }

  get durationMs(): number {
    if (this.startedAt === null || this.finishedAt === null) return 0;
    return this.finishedAt - this.startedAt;
  }
}
