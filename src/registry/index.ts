export { ContractRegistry, loadContractRegistry } from "./contract-registry.js";
export type { ContractFilter, ContractLoadFailure, LoadRegistryResult, LoadRegistryOptions } from "./contract-registry.js";
