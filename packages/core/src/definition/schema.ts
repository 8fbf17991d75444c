import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigurationError } from "../errors.js";
import { RETRY_WHEN_VALUES, WHEN_ACTIONS } from "../model/types.js";

// ─── Building blocks ─────────────────────────────────────────────────────────

const StringList = Type.Array(Type.String());
const StringOrList = Type.Union([Type.String(), StringList]);
/** Script lines; YAML anchors can leave one level of nesting */
const ScriptLines = Type.Union([Type.String(), Type.Array(Type.Union([Type.String(), StringList]))]);
const IntOrList = Type.Union([Type.Integer(), Type.Array(Type.Integer())]);
const Scalar = Type.Union([Type.String(), Type.Number(), Type.Boolean()]);
const Duration = Type.Union([Type.String(), Type.Number()]);

const When = Type.Union(WHEN_ACTIONS.map((w) => Type.Literal(w)));
const CollectWhen = Type.Union([
  Type.Literal("on_success"),
  Type.Literal("on_failure"),
  Type.Literal("always"),
]);

export const VariablesSchema = Type.Record(
  Type.String(),
  Type.Union([
    Scalar,
    Type.Object({
      value: Scalar,
      description: Type.Optional(Type.String()),
      expand: Type.Optional(Type.Boolean()),
      options: Type.Optional(StringList),
    }),
  ]),
);

const AllowFailure = Type.Union([Type.Boolean(), Type.Object({ exit_codes: IntOrList })]);

const RuleSchema = Type.Object({
  if: Type.Optional(Type.String()),
  when: Type.Optional(When),
  allow_failure: Type.Optional(AllowFailure),
  variables: Type.Optional(VariablesSchema),
  changes: Type.Optional(Type.Unknown()),
  exists: Type.Optional(Type.Unknown()),
});

const RetrySchema = Type.Union([
  Type.Integer({ minimum: 0, maximum: 2 }),
  Type.Object({
    max: Type.Optional(Type.Integer({ minimum: 0, maximum: 2 })),
    when: Type.Optional(
      Type.Union([
        Type.Union(RETRY_WHEN_VALUES.map((w) => Type.Literal(w))),
        Type.Array(Type.Union(RETRY_WHEN_VALUES.map((w) => Type.Literal(w)))),
      ]),
    ),
    exit_codes: Type.Optional(IntOrList),
  }),
]);

const ImageSchema = Type.Union([
  Type.String(),
  Type.Object({ name: Type.String(), entrypoint: Type.Optional(StringList) }),
]);

const ArtifactsSchema = Type.Object({
  name: Type.Optional(Type.String()),
  paths: Type.Optional(StringList),
  exclude: Type.Optional(StringList),
  when: Type.Optional(CollectWhen),
  expire_in: Type.Optional(Duration),
  expose_as: Type.Optional(Type.String()),
  untracked: Type.Optional(Type.Boolean()),
  reports: Type.Optional(
    Type.Object({ dotenv: Type.Optional(StringOrList) }, { additionalProperties: true }),
  ),
});

const CacheItemSchema = Type.Object({
  key: Type.Optional(Type.Union([Type.String(), Type.Number()])),
  paths: Type.Optional(StringList),
  policy: Type.Optional(
    Type.Union([Type.Literal("pull"), Type.Literal("push"), Type.Literal("pull-push")]),
  ),
  when: Type.Optional(CollectWhen),
  fallback_keys: Type.Optional(StringList),
  untracked: Type.Optional(Type.Boolean()),
});

const CacheSchema = Type.Union([CacheItemSchema, Type.Array(CacheItemSchema)]);

const NeedSchema = Type.Union([
  Type.String(),
  Type.Object({
    job: Type.String(),
    artifacts: Type.Optional(Type.Boolean()),
    optional: Type.Optional(Type.Boolean()),
  }),
]);

const EnvironmentSchema = Type.Union([
  Type.String(),
  Type.Object({
    name: Type.String(),
    action: Type.Optional(
      Type.Union(
        ["start", "prepare", "stop", "verify", "access"].map((a) => Type.Literal(a)),
      ),
    ),
    url: Type.Optional(Type.String()),
    deployment_tier: Type.Optional(Type.String()),
  }),
]);

// ─── Job & document ──────────────────────────────────────────────────────────

/** Keywords shared by jobs and `default:` */
const defaultKeywords = {
  image: Type.Optional(ImageSchema),
  services: Type.Optional(Type.Array(Type.Union([Type.String(), Type.Object({})]))),
  tags: Type.Optional(StringList),
  retry: Type.Optional(RetrySchema),
  cache: Type.Optional(CacheSchema),
  artifacts: Type.Optional(ArtifactsSchema),
  before_script: Type.Optional(ScriptLines),
  after_script: Type.Optional(ScriptLines),
  timeout: Type.Optional(Duration),
  interruptible: Type.Optional(Type.Boolean()),
};

export const DefaultSchema = Type.Object(defaultKeywords, { additionalProperties: false });

export const JobSchema = Type.Object(
  {
    ...defaultKeywords,
    stage: Type.Optional(Type.String()),
    extends: Type.Optional(StringOrList),
    script: Type.Optional(ScriptLines),
    rules: Type.Optional(Type.Array(RuleSchema)),
    when: Type.Optional(When),
    allow_failure: Type.Optional(AllowFailure),
    variables: Type.Optional(VariablesSchema),
    needs: Type.Optional(Type.Array(NeedSchema)),
    dependencies: Type.Optional(StringList),
    environment: Type.Optional(EnvironmentSchema),
    resource_group: Type.Optional(Type.String()),
  },
  { additionalProperties: true },
);

export const StagesSchema = StringList;

export const WorkflowSchema = Type.Object({
  name: Type.Optional(Type.String()),
  rules: Type.Optional(
    Type.Array(
      Type.Object({
        if: Type.Optional(Type.String()),
        when: Type.Optional(Type.Union([Type.Literal("always"), Type.Literal("never")])),
        variables: Type.Optional(VariablesSchema),
        changes: Type.Optional(Type.Unknown()),
        exists: Type.Optional(Type.Unknown()),
      }),
    ),
  ),
});

const IncludeItem = Type.Union([
  Type.String(),
  Type.Object({
    local: Type.Optional(Type.String()),
    template: Type.Optional(Type.String()),
    remote: Type.Optional(Type.String()),
    project: Type.Optional(Type.String()),
    file: Type.Optional(StringOrList),
    ref: Type.Optional(Type.String()),
  }),
]);

export const IncludeSchema = Type.Union([IncludeItem, Type.Array(IncludeItem)]);

export type RawJob = Static<typeof JobSchema>;
export type RawDefault = Static<typeof DefaultSchema>;
export type RawWorkflow = Static<typeof WorkflowSchema>;
export type RawInclude = Static<typeof IncludeSchema>;
export type RawVariables = Static<typeof VariablesSchema>;
export type RawRule = Static<typeof RuleSchema>;
export type RawCacheItem = Static<typeof CacheItemSchema>;
export type RawNeed = Static<typeof NeedSchema>;

/** Every keyword a job may carry; anything else is reported by lint */
export const KNOWN_JOB_KEYS = new Set([
  ...Object.keys(JobSchema.properties),
  "coverage",
  "parallel",
  "trigger",
  "inherit",
  "release",
  "pages",
  "secrets",
  "id_tokens",
  "hooks",
  "dast_configuration",
  "identity",
]);

export const RESERVED_TOP_LEVEL_KEYS = new Set([
  "stages",
  "variables",
  "default",
  "workflow",
  "include",
  "image",
  "services",
  "cache",
  "before_script",
  "after_script",
]);

/** Validate `value` against `schema`, or throw a ConfigurationError naming the first bad path */
export function checkSchema<T extends TSchema>(
  schema: T,
  value: unknown,
  where: string,
  job?: string,
): Static<T> {
  if (Value.Check(schema, value)) return value;
  const first = Value.Errors(schema, value).First();
  const detail = first ? `${first.path || "/"}: ${first.message}` : "invalid value";
  throw new ConfigurationError(`invalid ${where} (${detail})`, job);
}
