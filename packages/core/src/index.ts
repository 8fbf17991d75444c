// Conveyor Core - staged CI pipeline engine
export * from "./errors.js";
export * from "./conditions/index.js";
export * from "./definition/index.js";
export * from "./model/index.js";
export * from "./rules/index.js";
export * from "./validation/index.js";
export * from "./state/index.js";
export * from "./artifacts/index.js";
export * from "./executor/index.js";
export * from "./engine/index.js";
export * from "./events/index.js";
