/** Lifecycle state of a job instance */
export enum JobState {
  PENDING = "pending",
  READY = "ready",
  RUNNING = "running",
  SUCCESS = "success",
  FAILED = "failed",
  SKIPPED = "skipped",
  CANCELED = "canceled",
}

/** Why a job was skipped without running */
export type SkipReason = "upstream_failed" | "manual" | "no_upstream_failure";

const TERMINAL_STATES = new Set<JobState>([
  JobState.SUCCESS,
  JobState.FAILED,
  JobState.SKIPPED,
  JobState.CANCELED,
]);

export function isTerminal(state: JobState): boolean {
  return TERMINAL_STATES.has(state);
}
