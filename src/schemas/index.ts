export * from "./file-type.js";
export * from "./option.js";
export * from "./tool-contract.js";
export * from "./resolved-tool-contract.js";
export * from "./chunk.js";
export * from "./event.js";
export * from "./config.js";
