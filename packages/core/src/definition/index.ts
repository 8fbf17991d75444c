export { loadDefinition, loadDefinitionFile } from "./loader.js";
export type { LoadOptions } from "./loader.js";
export { mergeConfig, resolveTemplates, isConfigMap, DEFAULT_KEYWORDS } from "./templates.js";
export type { ConfigMap } from "./templates.js";
export {
  normalizeJob,
  normalizeVariables,
  normalizeWorkflow,
  parseRuleCondition,
  DEFAULT_ARTIFACT_EXPIRY_MS,
} from "./normalize.js";
export { JobSchema, DefaultSchema, WorkflowSchema, KNOWN_JOB_KEYS, checkSchema } from "./schema.js";
