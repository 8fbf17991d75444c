/** Execution policy attached to a job by `when` or a matching rule */
export type WhenAction = "on_success" | "on_failure" | "always" | "manual" | "never";

export const WHEN_ACTIONS: readonly WhenAction[] = [
  "on_success",
  "on_failure",
  "always",
  "manual",
  "never",
];

/** Result of evaluating a rule list: the action of the first match, or excluded */
export type RuleAction = Exclude<WhenAction, "never"> | "excluded";

/** Failure classification reported for a failed job attempt */
export const FAILURE_REASONS = [
  "unknown_failure",
  "script_failure",
  "api_failure",
  "stuck_or_timeout_failure",
  "runner_system_failure",
  "runner_unsupported",
  "stale_schedule",
  "job_execution_timeout",
  "archived_failure",
  "unmet_prerequisites",
  "scheduler_failure",
  "data_integrity_failure",
  "missing_dependency_failure",
  "deployment_rejected",
] as const;

export type FailureReason = (typeof FAILURE_REASONS)[number];

/** Accepted values of `retry:when` */
export type RetryWhen = FailureReason | "always";

export const RETRY_WHEN_VALUES: readonly RetryWhen[] = ["always", ...FAILURE_REASONS];

/** Stages that always exist, wrapped around the declared ones */
export const PRE_STAGE = ".pre";
export const POST_STAGE = ".post";
export const DEFAULT_STAGES = ["build", "test", "deploy"];
export const DEFAULT_JOB_STAGE = "test";

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  sec: 1000,
  secs: 1000,
  second: 1000,
  seconds: 1000,
  m: 60_000,
  min: 60_000,
  mins: 60_000,
  minute: 60_000,
  minutes: 60_000,
  h: 3_600_000,
  hr: 3_600_000,
  hrs: 3_600_000,
  hour: 3_600_000,
  hours: 3_600_000,
  d: 86_400_000,
  day: 86_400_000,
  days: 86_400_000,
  w: 604_800_000,
  wk: 604_800_000,
  week: 604_800_000,
  weeks: 604_800_000,
  mo: 2_592_000_000,
  month: 2_592_000_000,
  months: 2_592_000_000,
  y: 31_536_000_000,
  yr: 31_536_000_000,
  year: 31_536_000_000,
  years: 31_536_000_000,
};

/**
 * Duration value in milliseconds.
 *
 * Accepts compact forms (`90s`, `5h`, `1h 30m`), spelled-out forms
 * (`3 months`, `2 weeks and 1 day`) and bare numbers, which count seconds.
 */
export function parseDuration(value: string | number): number {
  if (typeof value === "number") {
    if (!Number.isFinite(value) || value < 0) throw new Error(`Invalid duration: ${value}`);
    return value * 1000;
  }
  const text = value.trim().toLowerCase();
  if (/^\d+$/.test(text)) return parseInt(text, 10) * 1000;

  const part = /(\d+(?:\.\d+)?)\s*([a-z]+)\s*(?:,\s*|and\s+)?/y;
  let total = 0;
  let pos = 0;
  while (pos < text.length) {
    part.lastIndex = pos;
    const match = part.exec(text);
    if (!match) throw new Error(`Invalid duration: ${value}`);
    const unit = UNIT_MS[match[2] ?? ""];
    if (unit === undefined) throw new Error(`Unknown duration unit '${match[2]}' in: ${value}`);
    total += parseFloat(match[1] ?? "0") * unit;
    pos = part.lastIndex;
  }
  if (pos === 0) throw new Error(`Invalid duration: ${value}`);
  return Math.round(total);
}

/** Artifact retention: `never` keeps forever (null) */
export function parseExpiry(value: string | number): number | null {
  if (typeof value === "string" && value.trim().toLowerCase() === "never") return null;
  return parseDuration(value);
}

/** Directory-safe job name (`vanilla current` → `vanilla-current`) */
export function slugify(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 63);
}

/** Recursively freeze plain objects, arrays and maps */
export function deepFreeze<T>(value: T): T {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) return value;
  if (value instanceof Map) {
    for (const entry of value.values()) deepFreeze(entry);
  } else {
    for (const entry of Object.values(value)) deepFreeze(entry);
  }
  return Object.freeze(value);
}
