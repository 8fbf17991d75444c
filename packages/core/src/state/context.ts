import { slugify } from "../model/types.js";

/** What triggered the pipeline (`CI_PIPELINE_SOURCE`) */
export type PipelineSource =
  | "push"
  | "schedule"
  | "merge_request_event"
  | "web"
  | "api"
  | "trigger"
  | "pipeline"
  | "parent_pipeline"
  | "external"
  | "chat"
  | "webide"
  | "external_pull_request_event";

export const PIPELINE_SOURCES: readonly PipelineSource[] = [
  "push",
  "schedule",
  "merge_request_event",
  "web",
  "api",
  "trigger",
  "pipeline",
  "parent_pipeline",
  "external",
  "chat",
  "webide",
  "external_pull_request_event",
];

export function isPipelineSource(value: string): value is PipelineSource {
  return PIPELINE_SOURCES.some((s) => s === value);
}

/**
 * Invocation context of a pipeline: a frozen variable map.
 *
 * Rule evaluation and graph building only read from it; layering variables
 * produces a new context.
 */
export class PipelineContext {
  private readonly values: ReadonlyMap<string, string>;

  constructor(values: Record<string, string> = {}) {
    this.values = new Map(Object.entries(values));
    Object.freeze(this);
  }

  get(key: string): string | undefined {
    return this.values.get(key);
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  get source(): string | undefined {
    return this.get("CI_PIPELINE_SOURCE");
  }

  get refName(): string | undefined {
    return this.get("CI_COMMIT_REF_NAME");
  }

  get tag(): string | undefined {
    return this.get("CI_COMMIT_TAG");
  }

  get branch(): string | undefined {
    return this.get("CI_COMMIT_BRANCH");
  }

  /** Returns a serializable snapshot of all values */
  snapshot(): Record<string, string> {
    return Object.fromEntries(this.values);
  }

  /** New context with `vars` underneath the existing values */
  withDefaults(vars: Record<string, string>): PipelineContext {
    return new PipelineContext({ ...vars, ...this.snapshot() });
  }

  /** New context with `vars` on top of the existing values */
  withOverrides(vars: Record<string, string>): PipelineContext {
    return new PipelineContext({ ...this.snapshot(), ...vars });
  }

  /** Context from a process environment, keeping only defined values */
  static fromEnv(env: Record<string, string | undefined>): PipelineContext {
    const values: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
      if (value !== undefined) values[key] = value;
    }
    return new PipelineContext(values);
  }
}

export interface ContextOptions {
  source: PipelineSource;
  refName: string;
  /** Set for tag pipelines; the ref is then a tag, not a branch */
  tag?: string;
  sha?: string;
  defaultBranch?: string;
  variables?: Record<string, string>;
}

const ZERO_SHA = "0000000000000000000000000000000000000000";

/** Build a context with the predefined `CI_*` variables derived from the ref */
export function createPipelineContext(opts: ContextOptions): PipelineContext {
  const sha = opts.sha ?? ZERO_SHA;
  const predefined: Record<string, string> = {
    CI: "true",
    CI_PIPELINE_SOURCE: opts.source,
    CI_COMMIT_REF_NAME: opts.tag ?? opts.refName,
    CI_COMMIT_REF_SLUG: slugify(opts.tag ?? opts.refName),
    CI_COMMIT_SHA: sha,
    CI_COMMIT_SHORT_SHA: sha.slice(0, 8),
    CI_DEFAULT_BRANCH: opts.defaultBranch ?? "main",
  };
  if (opts.tag !== undefined) {
    predefined.CI_COMMIT_TAG = opts.tag;
  } else {
    predefined.CI_COMMIT_BRANCH = opts.refName;
  }
  return new PipelineContext({ ...opts.variables, ...predefined });
}
