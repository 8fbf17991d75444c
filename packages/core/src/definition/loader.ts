import * as fs from "node:fs";
import * as path from "node:path";
import { parseDocument } from "yaml";
import { ConfigurationError } from "../errors.js";
import type { JobTemplate, PipelineDefinition } from "../model/job.js";
import { DEFAULT_STAGES, deepFreeze, POST_STAGE, PRE_STAGE } from "../model/types.js";
import { normalizeJob, normalizeVariables, normalizeWorkflow } from "./normalize.js";
import {
  checkSchema,
  DefaultSchema,
  IncludeSchema,
  RESERVED_TOP_LEVEL_KEYS,
  StagesSchema,
  VariablesSchema,
  WorkflowSchema,
} from "./schema.js";
import { type ConfigMap, isConfigMap, mergeConfig, resolveTemplates } from "./templates.js";

export interface LoadOptions {
  /** Directory `include: local` paths are resolved against (default: cwd) */
  baseDir?: string;
  /** Shown in YAML error messages */
  fileName?: string;
}

/** Legacy top-level keywords that act as `default:` entries */
const LEGACY_DEFAULT_KEYS = ["image", "services", "cache", "before_script", "after_script"];
const MAX_INCLUDE_DEPTH = 100;

function parseYaml(source: string, fileName: string): ConfigMap {
  const doc = parseDocument(source, { merge: true, prettyErrors: true });
  if (doc.errors.length > 0) {
    throw new ConfigurationError(`${fileName}: invalid YAML: ${doc.errors[0].message}`);
  }
  const data: unknown = doc.toJS();
  if (data === null || data === undefined) return {};
  if (!isConfigMap(data)) {
    throw new ConfigurationError(`${fileName}: pipeline document must be a mapping`);
  }
  return data;
}

interface IncludeState {
  baseDir: string;
  seen: Set<string>;
  warnings: string[];
}

/**
 * Merge local includes beneath `doc` (included files first, in order, the
 * including document last). Non-local include kinds only produce warnings.
 */
function applyIncludes(doc: ConfigMap, state: IncludeState, depth: number): ConfigMap {
  if (doc.include === undefined) return doc;
  if (depth > MAX_INCLUDE_DEPTH) {
    throw new ConfigurationError(`maximum include depth (${MAX_INCLUDE_DEPTH}) exceeded`);
  }
  const include = checkSchema(IncludeSchema, doc.include, "include");
  const items = Array.isArray(include) ? include : [include];

  let merged: ConfigMap = {};
  for (const item of items) {
    let local: string | undefined;
    if (typeof item === "string") {
      if (/^https?:\/\//.test(item)) {
        state.warnings.push(`include '${item}' ignored: remote includes are not supported`);
        continue;
      }
      local = item;
    } else if (item.local !== undefined) {
      local = item.local;
    } else {
      const kind = item.template !== undefined ? "template" : item.remote !== undefined ? "remote" : "project";
      const target = item.template ?? item.remote ?? item.project ?? "";
      state.warnings.push(`include '${target}' ignored: ${kind} includes are not supported`);
      continue;
    }

    const file = path.resolve(state.baseDir, local.replace(/^\/+/, ""));
    if (state.seen.has(file)) {
      throw new ConfigurationError(`include '${local}' is included more than once`);
    }
    state.seen.add(file);
    let text: string;
    try {
      text = fs.readFileSync(file, "utf-8");
    } catch {
      throw new ConfigurationError(`include '${local}' could not be read`);
    }
    merged = mergeConfig(merged, applyIncludes(parseYaml(text, local), state, depth + 1));
  }

  const own = { ...doc };
  delete own.include;
  return mergeConfig(merged, own);
}

function buildStages(declared: string[] | undefined): string[] {
  const stages = (declared ?? DEFAULT_STAGES).filter((s) => s !== PRE_STAGE && s !== POST_STAGE);
  return [PRE_STAGE, ...new Set(stages), POST_STAGE];
}

/**
 * Parse a pipeline document into a PipelineDefinition: includes merged,
 * templates flattened, every visible job normalised.
 */
export function loadDefinition(source: string, opts: LoadOptions = {}): PipelineDefinition {
  const fileName = opts.fileName ?? "pipeline";
  const warnings: string[] = [];
  const doc = applyIncludes(
    parseYaml(source, fileName),
    { baseDir: opts.baseDir ?? process.cwd(), seen: new Set(), warnings },
    0,
  );

  const stages = buildStages(
    doc.stages === undefined ? undefined : checkSchema(StagesSchema, doc.stages, "stages"),
  );
  const variables = normalizeVariables(
    doc.variables === undefined ? undefined : checkSchema(VariablesSchema, doc.variables, "variables"),
  );
  const workflow = normalizeWorkflow(
    doc.workflow === undefined ? undefined : checkSchema(WorkflowSchema, doc.workflow, "workflow"),
  );

  const defaultConfig: ConfigMap = isConfigMap(doc.default) ? { ...doc.default } : {};
  if (doc.default !== undefined && !isConfigMap(doc.default)) {
    throw new ConfigurationError("'default' must be a mapping");
  }
  for (const key of LEGACY_DEFAULT_KEYS) {
    if (doc[key] !== undefined && defaultConfig[key] === undefined) defaultConfig[key] = doc[key];
  }
  checkSchema(DefaultSchema, defaultConfig, "default");

  const raw = new Map<string, ConfigMap>();
  for (const [name, value] of Object.entries(doc)) {
    if (RESERVED_TOP_LEVEL_KEYS.has(name)) continue;
    // hidden keys may hold plain YAML anchors (lists, strings)
    if (name.startsWith(".") && !isConfigMap(value)) continue;
    if (!isConfigMap(value)) {
      throw new ConfigurationError("config should be a mapping", name);
    }
    raw.set(name, value);
  }

  const resolved = resolveTemplates(raw, defaultConfig);
  const jobs = new Map<string, JobTemplate>();
  for (const [name, config] of resolved) {
    if (name.startsWith(".")) continue;
    jobs.set(name, normalizeJob(name, config, stages));
  }
  if (jobs.size === 0) {
    throw new ConfigurationError("pipeline defines no jobs");
  }

  const definition: PipelineDefinition = { stages, variables, workflow, jobs, warnings };
  return deepFreeze(definition);
}

/** Read and load a pipeline file; local includes resolve next to it */
export function loadDefinitionFile(file: string): PipelineDefinition {
  let source: string;
  try {
    source = fs.readFileSync(file, "utf-8");
  } catch {
    throw new ConfigurationError(`cannot read pipeline file '${file}'`);
  }
  return loadDefinition(source, { baseDir: path.dirname(path.resolve(file)), fileName: file });
}
