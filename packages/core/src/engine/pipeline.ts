import { loadDefinition, loadDefinitionFile } from "../definition/loader.js";
import { buildJobGraph } from "../model/builder.js";
import type { JobGraph } from "../model/graph.js";
import type { PipelineDefinition } from "../model/job.js";
import { evaluateWorkflow, type WorkflowDecision } from "../rules/index.js";
import type { PipelineContext } from "../state/context.js";
import { type Diagnostic, type LintRule, validateOrRaise } from "../validation/index.js";

export interface PrepareOptions {
  context: PipelineContext;
  /** Directory `include: local` paths resolve against */
  baseDir?: string;
  fileName?: string;
  /** Pipeline variables from the invocation (CLI --var flags, triggers) */
  variables?: Record<string, string>;
  extraRules?: LintRule[];
}

export interface PrepareResult {
  definition: PipelineDefinition;
  diagnostics: Diagnostic[];
  workflow: WorkflowDecision;
  /** null when workflow rules decided not to create the pipeline */
  graph: JobGraph | null;
}

/**
 * Load, validate and plan a pipeline document.
 * This is the primary entry point for preparing a run.
 */
export function preparePipeline(source: string, opts: PrepareOptions): PrepareResult {
  // 1. Load
  const definition = loadDefinition(source, { baseDir: opts.baseDir, fileName: opts.fileName });
  return planDefinition(definition, opts);
}

/** Same as preparePipeline, reading the document from disk */
export function preparePipelineFile(
  file: string,
  opts: Omit<PrepareOptions, "baseDir" | "fileName">,
): PrepareResult {
  // 1. Load
  const definition = loadDefinitionFile(file);
  return planDefinition(definition, opts);
}

function planDefinition(definition: PipelineDefinition, opts: PrepareOptions): PrepareResult {
  // 2. Validate
  const diagnostics = validateOrRaise(definition, opts.extraRules);

  // 3. Workflow rules
  const invocation = opts.variables ?? {};
  const workflow = evaluateWorkflow(
    definition.workflow,
    opts.context.withDefaults({ ...definition.variables, ...invocation }),
  );
  if (!workflow.created) {
    return { definition, diagnostics, workflow, graph: null };
  }

  // 4. Build graph
  const graph = buildJobGraph(definition, opts.context, {
    variables: { ...workflow.variables, ...invocation },
  });
  return { definition, diagnostics, workflow, graph };
}
