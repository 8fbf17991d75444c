import { describe, it, expect, vi, afterEach } from "vitest";
import {
  BACKOFF_PRESETS,
  classifyFailure,
  delayForAttempt,
  isFailureAllowed,
  shouldRetry,
  sleep,
} from "../src/engine/retry.js";
import type { RetryConfig } from "../src/model/job.js";

const policy = (overrides: Partial<RetryConfig> = {}): RetryConfig => ({
  max: 2,
  when: ["always"],
  exitCodes: [],
  ...overrides,
});

describe("classifyFailure", () => {
  it.each([
    ["runner_system_failure", "infrastructure"],
    ["stuck_or_timeout_failure", "infrastructure"],
    ["data_integrity_failure", "infrastructure"],
    ["script_failure", "execution"],
    ["job_execution_timeout", "execution"],
    ["unknown_failure", "execution"],
    ["missing_dependency_failure", "dependency"],
    ["unmet_prerequisites", "dependency"],
    ["deployment_rejected", "gate"],
    ["stale_schedule", "gate"],
  ] as const)("%s is %s", (reason, expected) => {
    expect(classifyFailure(reason)).toBe(expected);
  });
});

describe("shouldRetry", () => {
  it("allows max retries after the first attempt", () => {
    const failure = { reason: "script_failure", exitCode: 1 } as const;
    expect(shouldRetry(policy(), failure, 1)).toBe(true);
    expect(shouldRetry(policy(), failure, 2)).toBe(true);
    expect(shouldRetry(policy(), failure, 3)).toBe(false);
  });

  it("never retries with max 0", () => {
    expect(shouldRetry(policy({ max: 0 }), { reason: "runner_system_failure" }, 1)).toBe(false);
  });

  it("retries only the listed reasons", () => {
    const p = policy({ when: ["stuck_or_timeout_failure", "job_execution_timeout"] });
    expect(shouldRetry(p, { reason: "job_execution_timeout" }, 1)).toBe(true);
    expect(shouldRetry(p, { reason: "script_failure", exitCode: 1 }, 1)).toBe(false);
  });

  it("retries listed exit codes even when the reason is not listed", () => {
    const p = policy({ when: ["api_failure"], exitCodes: [137] });
    expect(shouldRetry(p, { reason: "script_failure", exitCode: 137 }, 1)).toBe(true);
    expect(shouldRetry(p, { reason: "script_failure", exitCode: 1 }, 1)).toBe(false);
    expect(shouldRetry(p, { reason: "script_failure", exitCode: null }, 1)).toBe(false);
  });

  it("always retries infrastructure failures within budget", () => {
    const p = policy({ when: ["script_failure"] });
    expect(shouldRetry(p, { reason: "runner_system_failure" }, 1)).toBe(true);
  });

  it("never retries dependency or gate failures", () => {
    expect(shouldRetry(policy(), { reason: "missing_dependency_failure" }, 1)).toBe(false);
    expect(shouldRetry(policy(), { reason: "deployment_rejected" }, 1)).toBe(false);
  });
});

describe("isFailureAllowed", () => {
  it("follows the allowed flag", () => {
    expect(isFailureAllowed({ allowed: true, exitCodes: [] }, 1)).toBe(true);
    expect(isFailureAllowed({ allowed: false, exitCodes: [] }, 1)).toBe(false);
  });

  it("restricts to listed exit codes", () => {
    const p = { allowed: true, exitCodes: [3, 4] };
    expect(isFailureAllowed(p, 3)).toBe(true);
    expect(isFailureAllowed(p, 1)).toBe(false);
    expect(isFailureAllowed(p, null)).toBe(false);
  });
});

describe("delayForAttempt", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("grows exponentially and caps at the maximum", () => {
    const config = { initialDelayMs: 100, backoffFactor: 2, maxDelayMs: 500, jitter: false };
    expect(delayForAttempt(1, config)).toBe(100);
    expect(delayForAttempt(2, config)).toBe(200);
    expect(delayForAttempt(3, config)).toBe(400);
    expect(delayForAttempt(4, config)).toBe(500);
  });

  it("applies jitter between half and one and a half times", () => {
    vi.spyOn(Math, "random").mockReturnValue(0);
    expect(delayForAttempt(1, BACKOFF_PRESETS.standard)).toBe(100);
  });

  it("is zero with the none preset", () => {
    expect(delayForAttempt(3, BACKOFF_PRESETS.none)).toBe(0);
  });
});

describe("sleep", () => {
  it("resolves early when aborted", async () => {
    const controller = new AbortController();
    const start = Date.now();
    const pending = sleep(10_000, controller.signal);
    controller.abort();
    await pending;
    expect(Date.now() - start).toBeLessThan(1000);
  });
});
