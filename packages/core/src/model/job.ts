import type { ParsedCondition } from "../conditions/ast.js";
import type { RetryWhen, WhenAction } from "./types.js";

export type CollectWhen = "on_success" | "on_failure" | "always";
export type CachePolicy = "pull" | "push" | "pull-push";

export interface AllowFailurePolicy {
  readonly allowed: boolean;
  /** When non-empty, only these exit codes count as allowed failures */
  readonly exitCodes: readonly number[];
}

export interface RetryConfig {
  /** 0..2 retries after the first attempt */
  readonly max: number;
  readonly when: readonly RetryWhen[];
  readonly exitCodes: readonly number[];
}

export interface JobRule {
  readonly if: ParsedCondition | null;
  readonly when: WhenAction;
  readonly allowFailure: AllowFailurePolicy | null;
  readonly variables: Readonly<Record<string, string>>;
}

export interface ArtifactSpec {
  /** Archive name; may reference variables (`$CI_JOB_NAME`) */
  readonly name: string;
  readonly paths: readonly string[];
  readonly exclude: readonly string[];
  readonly when: CollectWhen;
  /** null means kept forever */
  readonly expireInMs: number | null;
  readonly reports: { readonly dotenv: readonly string[] };
}

export interface CacheSpec {
  readonly key: string;
  readonly paths: readonly string[];
  readonly policy: CachePolicy;
  readonly when: CollectWhen;
  readonly fallbackKeys: readonly string[];
}

export interface NeedSpec {
  readonly job: string;
  readonly artifacts: boolean;
  readonly optional: boolean;
}

export interface EnvironmentSpec {
  readonly name: string;
  readonly action: string;
  readonly url: string | null;
}

/** Fully resolved, immutable job definition (after extends and defaults) */
export interface JobTemplate {
  readonly name: string;
  readonly stage: string;
  readonly script: readonly string[];
  readonly beforeScript: readonly string[];
  readonly afterScript: readonly string[];
  readonly image: string | null;
  readonly tags: readonly string[];
  /** null when the job has no `rules:` (its `when` decides) */
  readonly rules: readonly JobRule[] | null;
  readonly when: WhenAction;
  /** null when unset: manual jobs then may fail, all others may not */
  readonly allowFailure: AllowFailurePolicy | null;
  readonly retry: RetryConfig;
  readonly variables: Readonly<Record<string, string>>;
  readonly artifacts: ArtifactSpec | null;
  readonly cache: readonly CacheSpec[];
  /** null when the job has no `needs:`; empty when it needs nothing */
  readonly needs: readonly NeedSpec[] | null;
  readonly dependencies: readonly string[] | null;
  readonly environment: EnvironmentSpec | null;
  readonly timeoutMs: number | null;
  readonly resourceGroup: string | null;
  /** Keywords present on the job that the engine does not know */
  readonly unknownKeys: readonly string[];
}

export interface WorkflowRule {
  readonly if: ParsedCondition | null;
  readonly when: "always" | "never";
  readonly variables: Readonly<Record<string, string>>;
}

export interface Workflow {
  readonly name: string | null;
  readonly rules: readonly WorkflowRule[] | null;
}

export interface PipelineDefinition {
  /** `.pre`, declared stages, `.post` */
  readonly stages: readonly string[];
  readonly variables: Readonly<Record<string, string>>;
  readonly workflow: Workflow;
  /** Visible jobs in declaration order */
  readonly jobs: ReadonlyMap<string, JobTemplate>;
  /** Non-fatal load problems (unsupported includes and similar) */
  readonly warnings: readonly string[];
}
