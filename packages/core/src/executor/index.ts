export type { Executor, ExecutionOutcome, ExecutionStatus, ResolvedEnvironment } from "./types.js";
export { SimulatedExecutor } from "./simulated.js";
