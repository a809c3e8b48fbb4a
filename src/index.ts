/**
 * toolcontract: typed tool contracts for pipeline tasks.
 *
 * A tool contract declares a tool's inputs, outputs, options and
 * resources symbolically; the resolver binds them to one invocation's
 * concrete paths, values and bounds.
 */

export * from "./schemas/index.js";
export * from "./errors/index.js";
export * from "./file-types/index.js";
export * from "./options/index.js";
export * from "./contracts/index.js";
export * from "./chunks/index.js";
export * from "./io/index.js";
export * from "./resolver/index.js";
export * from "./registry/index.js";
export * from "./events/index.js";
export * from "./config/index.js";
export * from "./service/index.js";
export { createToolProgram } from "./cli/tool-runner.js";
export type { ToolHandler, ToolProgramOptions } from "./cli/tool-runner.js";
