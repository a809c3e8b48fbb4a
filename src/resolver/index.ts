export {
  resolveToolContract,
  resolveNproc,
  resolveMaxNchunks,
  resolveOutputFiles,
} from "./resolve.js";
export type { ResolveOptions } from "./resolve.js";
export { resolveScatterToolContract, checkScatterOutput } from "./scatter.js";
export type { ScatterResolveOptions } from "./scatter.js";
export { resolveGatherToolContract, resolveGatherFromChunks } from "./gather.js";
export { resolveContract } from "./dispatch.js";
export type { ContractResolveOptions } from "./dispatch.js";
export { synthesizeResources, taskSlug, invocationRoot } from "./resources.js";
export type { ResourceContext } from "./resources.js";
