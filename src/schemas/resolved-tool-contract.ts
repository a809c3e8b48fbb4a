/**
 * Resolved tool contract: one invocation's concrete task description.
 */

import type { OptionValues } from "./option.js";
import type { ResourceType, TaskType, ToolDriver } from "./tool-contract.js";

export type ResolvedResource = readonly [ResourceType, string];

export interface ResolvedScatter {
  chunkKeys: readonly string[];
  /** Declared ceiling resolved to a literal. */
  maxNchunks: number;
  /** Number of chunks the scatter task is asked to emit. */
  nchunks: number;
}

export interface ResolvedGather {
  chunkKey: string;
  /** Values of `chunkKey` in chunk list order. */
  chunkFiles: readonly string[];
}

export interface ResolvedToolContract {
  readonly toolContractId: string;
  readonly taskType: TaskType;
  readonly inputFiles: readonly string[];
  readonly outputFiles: readonly string[];
  readonly options: OptionValues;
  readonly nproc: number;
  readonly resources: readonly ResolvedResource[];
  readonly driver: Readonly<ToolDriver>;
  readonly scatter?: Readonly<ResolvedScatter>;
  readonly gather?: Readonly<ResolvedGather>;
}

/** Concrete paths of every resolved resource of one type, in request order. */
export function resourcePaths(rtc: ResolvedToolContract, type: ResourceType): string[] {
  return rtc.resources.filter(([kind]) => kind === type).map(([, path]) => path);
}
