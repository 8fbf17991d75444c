export { Scheduler } from "./scheduler.js";
export type { RunConfig, EnvironmentGate } from "./scheduler.js";
export { preparePipeline, preparePipelineFile } from "./pipeline.js";
export type { PrepareOptions, PrepareResult } from "./pipeline.js";
export {
  classifyFailure,
  shouldRetry,
  isFailureAllowed,
  delayForAttempt,
  sleep,
  BACKOFF_PRESETS,
} from "./retry.js";
export type { FailureClass, AttemptFailure, BackoffConfig } from "./retry.js";
export { ConcurrencyLimiter } from "./limiter.js";
export type { ConcurrencyLimits } from "./limiter.js";
export { pipelineStatus, toJobResult } from "./result.js";
export type { JobResult, PipelineResult, PipelineStatus } from "./result.js";
export { RunLog } from "./run-log.js";
