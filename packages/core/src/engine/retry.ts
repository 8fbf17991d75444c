import type { AllowFailurePolicy, RetryConfig } from "../model/job.js";
import type { FailureReason } from "../model/types.js";

export type FailureClass = "infrastructure" | "execution" | "dependency" | "gate";

const INFRASTRUCTURE: ReadonlySet<FailureReason> = new Set<FailureReason>([
  "runner_system_failure",
  "api_failure",
  "stuck_or_timeout_failure",
  "scheduler_failure",
  "runner_unsupported",
  "data_integrity_failure",
]);

const DEPENDENCY: ReadonlySet<FailureReason> = new Set<FailureReason>([
  "missing_dependency_failure",
  "unmet_prerequisites",
]);

const GATE: ReadonlySet<FailureReason> = new Set<FailureReason>([
  "deployment_rejected",
  "stale_schedule",
  "archived_failure",
]);

export function classifyFailure(reason: FailureReason): FailureClass {
  if (INFRASTRUCTURE.has(reason)) return "infrastructure";
  if (DEPENDENCY.has(reason)) return "dependency";
  if (GATE.has(reason)) return "gate";
  return "execution";
}

export interface AttemptFailure {
  reason: FailureReason;
  exitCode?: number | null;
}

/**
 * Whether a failed attempt is retried. `attemptCount` is the number of
 * dispatches so far, so `max: 2` allows three dispatches in total.
 */
export function shouldRetry(
  policy: RetryConfig,
  failure: AttemptFailure,
  attemptCount: number,
): boolean {
  if (attemptCount > policy.max) return false;
  switch (classifyFailure(failure.reason)) {
    case "dependency":
    case "gate":
      return false;
    case "infrastructure":
      return true;
    case "execution":
      if (policy.when.includes("always") || policy.when.includes(failure.reason)) return true;
      return (
        failure.exitCode !== undefined &&
        failure.exitCode !== null &&
        policy.exitCodes.includes(failure.exitCode)
      );
  }
}

/** A failure is tolerated when allowed, and the exit code is listed if codes are given */
export function isFailureAllowed(policy: AllowFailurePolicy, exitCode: number | null): boolean {
  if (!policy.allowed) return false;
  if (policy.exitCodes.length === 0) return true;
  return exitCode !== null && policy.exitCodes.includes(exitCode);
}

export interface BackoffConfig {
  initialDelayMs: number;
  backoffFactor: number;
  maxDelayMs: number;
  jitter: boolean;
}

/** Preset backoff schedules between retry attempts */
export const BACKOFF_PRESETS: Record<string, BackoffConfig> = {
  none: { initialDelayMs: 0, backoffFactor: 1, maxDelayMs: 0, jitter: false },
  standard: { initialDelayMs: 200, backoffFactor: 2.0, maxDelayMs: 60000, jitter: true },
  linear: { initialDelayMs: 500, backoffFactor: 1.0, maxDelayMs: 60000, jitter: true },
  patient: { initialDelayMs: 2000, backoffFactor: 3.0, maxDelayMs: 60000, jitter: true },
};

/** Calculate delay for a retry attempt */
export function delayForAttempt(attempt: number, config: BackoffConfig): number {
  let delay = config.initialDelayMs * Math.pow(config.backoffFactor, attempt - 1);
  delay = Math.min(delay, config.maxDelayMs);
  if (config.jitter) {
    delay = delay * (0.5 + Math.random());
  }
  return Math.round(delay);
}

/** Sleep for given ms; resolves early when `signal` aborts */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
