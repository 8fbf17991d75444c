export { PipelineContext, createPipelineContext, isPipelineSource, PIPELINE_SOURCES } from "./context.js";
export type { PipelineSource, ContextOptions } from "./context.js";
export { JobState, isTerminal } from "./types.js";
export type { SkipReason } from "./types.js";
export { JobInstance, IllegalTransitionError } from "./job-instance.js";
export { expandVariables, expandVariableMap } from "./expand.js";
