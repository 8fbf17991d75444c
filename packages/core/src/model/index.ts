export { JobGraph } from "./graph.js";
export type { JobNode, JobEdge, EdgeKind, ArtifactSource } from "./graph.js";
export { buildJobGraph } from "./builder.js";
export type { BuildOptions } from "./builder.js";
export type * from "./job.js";
export * from "./types.js";
