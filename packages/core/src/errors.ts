import type { FailureReason } from "./model/types.js";

/** Malformed pipeline document: raised at load time, before any job runs */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public job?: string,
  ) {
    super(job ? `${job}: ${message}` : message);
    this.name = "ConfigurationError";
  }
}

/** Structural problem in the job graph (cycles, bad needs/dependencies) */
export class GraphError extends Error {
  constructor(
    message: string,
    public jobs: string[] = [],
  ) {
    super(message);
    this.name = "GraphError";
  }
}

/** A required upstream artifact set is missing or expired at dispatch time */
export class DependencyUnavailable extends Error {
  readonly reason: FailureReason = "missing_dependency_failure";

  constructor(
    public job: string,
    public upstream: string,
    public kind: "missing" | "expired",
  ) {
    super(
      kind === "expired"
        ? `Artifacts of '${upstream}' required by '${job}' have expired`
        : `Artifacts of '${upstream}' required by '${job}' are not available`,
    );
    this.name = "DependencyUnavailable";
  }
}

/** The job's own payload failed (non-zero exit, timeout) */
export class ExecutionFailure extends Error {
  constructor(
    message: string,
    public reason: FailureReason = "script_failure",
    public exitCode?: number,
  ) {
    super(message);
    this.name = "ExecutionFailure";
  }
}

/** The executor or its infrastructure failed; the payload may never have run */
export class RunnerInfrastructureFailure extends Error {
  constructor(
    message: string,
    public reason: FailureReason = "runner_system_failure",
  ) {
    super(message);
    this.name = "RunnerInfrastructureFailure";
  }
}
