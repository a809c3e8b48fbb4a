export { ResolutionService } from "./resolution-service.js";
export type { ResolutionServiceDeps, ResolveRequest } from "./resolution-service.js";
