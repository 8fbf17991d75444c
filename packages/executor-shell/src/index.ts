// Conveyor local shell executor
export { LocalShellExecutor, renderScript } from "./shell-executor.js";
export type { LocalShellExecutorOptions } from "./shell-executor.js";
export { filterEnv, jobEnvironment } from "./env-filter.js";
export type { EnvFilterPolicy, EnvFilterOptions } from "./env-filter.js";
export { prepareWorkspace, collectFiles } from "./workspace.js";
export type { WorkspaceContents } from "./workspace.js";
