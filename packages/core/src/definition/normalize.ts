import { ConditionSyntaxError } from "../conditions/lexer.js";
import { parseCondition } from "../conditions/parser.js";
import type { ParsedCondition } from "../conditions/ast.js";
import { ConfigurationError } from "../errors.js";
import type {
  AllowFailurePolicy,
  ArtifactSpec,
  CacheSpec,
  EnvironmentSpec,
  JobRule,
  JobTemplate,
  NeedSpec,
  RetryConfig,
  Workflow,
} from "../model/job.js";
import { DEFAULT_JOB_STAGE, deepFreeze, parseDuration, parseExpiry } from "../model/types.js";
import {
  checkSchema,
  JobSchema,
  KNOWN_JOB_KEYS,
  type RawCacheItem,
  type RawJob,
  type RawNeed,
  type RawRule,
  type RawVariables,
  type RawWorkflow,
} from "./schema.js";
import type { ConfigMap } from "./templates.js";

/** Artifacts without `expire_in` are kept for 30 days */
export const DEFAULT_ARTIFACT_EXPIRY_MS = 30 * 86_400_000;

export const NO_RETRY: RetryConfig = Object.freeze({ max: 0, when: [], exitCodes: [] });

export function parseRuleCondition(source: string, job?: string): ParsedCondition {
  try {
    return parseCondition(source);
  } catch (err) {
    if (err instanceof ConditionSyntaxError) {
      throw new ConfigurationError(`invalid rule expression '${source}': ${err.message}`, job);
    }
    throw err;
  }
}

function duration(value: string | number, keyword: string, job: string): number {
  try {
    return parseDuration(value);
  } catch (err) {
    throw new ConfigurationError(`${keyword}: ${err instanceof Error ? err.message : String(err)}`, job);
  }
}

export function normalizeVariables(vars: RawVariables | undefined): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(vars ?? {})) {
    result[key] = typeof value === "object" ? String(value.value) : String(value);
  }
  return result;
}

function scriptLines(value: string | (string | string[])[] | undefined): string[] {
  if (value === undefined) return [];
  if (typeof value === "string") return [value];
  return value.flat();
}

function toList<T>(value: T | T[] | undefined): T[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

function allowFailure(value: RawJob["allow_failure"]): AllowFailurePolicy | null {
  if (value === undefined) return null;
  if (typeof value === "boolean") return { allowed: value, exitCodes: [] };
  return { allowed: true, exitCodes: toList(value.exit_codes) };
}

function retry(value: RawJob["retry"]): RetryConfig {
  if (value === undefined) return NO_RETRY;
  if (typeof value === "number") return { max: value, when: ["always"], exitCodes: [] };
  const when = toList(value.when);
  return {
    max: value.max ?? 0,
    when: when.length > 0 ? when : ["always"],
    exitCodes: toList(value.exit_codes),
  };
}

/** `changes` and `exists` inspect repository files, which the engine never sees */
function rejectFileRules(rule: { changes?: unknown; exists?: unknown }, owner: string): void {
  for (const keyword of ["changes", "exists"] as const) {
    if (rule[keyword] !== undefined) {
      throw new ConfigurationError(`rules:${keyword} is not supported; use rules:if instead`, owner);
    }
  }
}

function rules(value: RawRule[] | undefined, job: string): JobRule[] | null {
  if (value === undefined) return null;
  return value.map((rule) => {
    rejectFileRules(rule, job);
    return {
      if: rule.if === undefined ? null : parseRuleCondition(rule.if, job),
      when: rule.when ?? "on_success",
      allowFailure: allowFailure(rule.allow_failure),
      variables: normalizeVariables(rule.variables),
    };
  });
}

function artifacts(value: RawJob["artifacts"], job: string): ArtifactSpec | null {
  if (value === undefined) return null;
  let expireInMs: number | null = DEFAULT_ARTIFACT_EXPIRY_MS;
  if (value.expire_in !== undefined) {
    try {
      expireInMs = parseExpiry(value.expire_in);
    } catch (err) {
      throw new ConfigurationError(
        `artifacts:expire_in: ${err instanceof Error ? err.message : String(err)}`,
        job,
      );
    }
  }
  return {
    name: value.name ?? "artifacts",
    paths: value.paths ?? [],
    exclude: value.exclude ?? [],
    when: value.when ?? "on_success",
    expireInMs,
    reports: { dotenv: toList(value.reports?.dotenv) },
  };
}

function cacheSpec(item: RawCacheItem): CacheSpec {
  return {
    key: item.key === undefined ? "default" : String(item.key),
    paths: item.paths ?? [],
    policy: item.policy ?? "pull-push",
    when: item.when ?? "on_success",
    fallbackKeys: item.fallback_keys ?? [],
  };
}

function need(value: RawNeed): NeedSpec {
  if (typeof value === "string") return { job: value, artifacts: true, optional: false };
  return { job: value.job, artifacts: value.artifacts ?? true, optional: value.optional ?? false };
}

function environment(value: RawJob["environment"]): EnvironmentSpec | null {
  if (value === undefined) return null;
  if (typeof value === "string") return { name: value, action: "start", url: null };
  return { name: value.name, action: value.action ?? "start", url: value.url ?? null };
}

function image(value: RawJob["image"]): string | null {
  if (value === undefined) return null;
  return typeof value === "string" ? value : value.name;
}

/**
 * Turn one resolved job mapping (extends and defaults applied) into an
 * immutable JobTemplate. Throws ConfigurationError on schema violations,
 * a missing script or an undeclared stage.
 */
export function normalizeJob(
  name: string,
  config: ConfigMap,
  stages: readonly string[],
): JobTemplate {
  const raw = checkSchema(JobSchema, config, "job definition", name);

  const script = scriptLines(raw.script);
  if (script.length === 0) {
    throw new ConfigurationError("config should contain a non-empty 'script'", name);
  }

  const stage = raw.stage ?? DEFAULT_JOB_STAGE;
  if (!stages.includes(stage)) {
    throw new ConfigurationError(`chosen stage '${stage}' does not exist; available stages are ${stages.join(", ")}`, name);
  }

  const job: JobTemplate = {
    name,
    stage,
    script,
    beforeScript: scriptLines(raw.before_script),
    afterScript: scriptLines(raw.after_script),
    image: image(raw.image),
    tags: raw.tags ?? [],
    rules: rules(raw.rules, name),
    when: raw.when ?? "on_success",
    allowFailure: allowFailure(raw.allow_failure),
    retry: retry(raw.retry),
    variables: normalizeVariables(raw.variables),
    artifacts: artifacts(raw.artifacts, name),
    cache: toList(raw.cache).map(cacheSpec),
    needs: raw.needs === undefined ? null : raw.needs.map(need),
    dependencies: raw.dependencies ?? null,
    environment: environment(raw.environment),
    timeoutMs: raw.timeout === undefined ? null : duration(raw.timeout, "timeout", name),
    resourceGroup: raw.resource_group ?? null,
    unknownKeys: Object.keys(config).filter((key) => !KNOWN_JOB_KEYS.has(key)),
  };
  return deepFreeze(job);
}

export function normalizeWorkflow(raw: RawWorkflow | undefined): Workflow {
  const workflow: Workflow = {
    name: raw?.name ?? null,
    rules:
      raw?.rules?.map((rule) => {
        rejectFileRules(rule, "workflow");
        return {
          if: rule.if === undefined ? null : parseRuleCondition(rule.if, "workflow"),
          when: rule.when ?? "always",
          variables: normalizeVariables(rule.variables),
        };
      }) ?? null,
  };
  return deepFreeze(workflow);
}
