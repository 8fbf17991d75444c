import type { RestoredCache } from "../artifacts/broker.js";
import type { ArtifactSet } from "../artifacts/store.js";
import type { JobNode } from "../model/graph.js";
import type { ArtifactSpec, CacheSpec } from "../model/job.js";
import type { FailureReason } from "../model/types.js";

/** Everything an executor needs to run one attempt of a job */
export interface ResolvedEnvironment {
  /** Unique per dispatch (`CI_JOB_ID`) */
  jobId: number;
  jobName: string;
  stage: string;
  /** 1-based attempt number */
  attempt: number;
  image: string | null;
  tags: readonly string[];
  script: readonly string[];
  beforeScript: readonly string[];
  afterScript: readonly string[];
  /** Fully layered and expanded variables */
  variables: Readonly<Record<string, string>>;
  /** Upstream artifact sets to make available before the script runs */
  artifacts: readonly ArtifactSet[];
  caches: readonly RestoredCache[];
  /** What to collect afterwards; name and cache keys already expanded */
  artifactSpec: ArtifactSpec | null;
  cacheSpecs: readonly CacheSpec[];
  timeoutMs: number | null;
  /** Aborted on cancel and on timeout */
  signal: AbortSignal;
}

export type ExecutionStatus = "success" | "failed" | "canceled";

export interface ExecutionOutcome {
  status: ExecutionStatus;
  failureReason?: FailureReason;
  exitCode?: number;
  /** Human-readable reason for a failed outcome */
  error?: string;
  /** Files matched by `artifacts:paths`, keyed by relative path */
  artifacts?: Record<string, Uint8Array>;
  reports?: { dotenv?: Record<string, string> };
  /** Cache key -> files matched by that cache's paths */
  cache?: Record<string, Record<string, Uint8Array>>;
  log?: string;
}

/**
 * Runs job payloads. The engine treats scripts and images as opaque and
 * only interprets the outcome.
 *
 * `dispatch` may reject: a RunnerInfrastructureFailure or ExecutionFailure
 * carries its own reason, anything else counts as `runner_system_failure`.
 */
export interface Executor {
  dispatch(job: JobNode, env: ResolvedEnvironment): Promise<ExecutionOutcome>;
  cancel(job: JobNode): void | Promise<void>;
}
