/**
 * Tool contract schema: the author-time, symbolic description of a task.
 *
 * One record covers all three contract kinds: a scatter contract carries
 * `scatter`, a gather contract carries `gather`, a standard contract
 * carries neither.
 */

import { z } from "zod";
import { OptionSchema } from "./option.js";

/** Symbols resolved to concrete values at resolution time. */
export const Symbols = {
  MAX_NPROC: "$max_nproc",
  MAX_NCHUNKS: "$max_nchunks",
} as const;

/** Resource symbols a contract may request. */
export const ResourceType = z.enum(["$tmpdir", "$tmpfile", "$logfile"]);
export type ResourceType = z.infer<typeof ResourceType>;

export const ResourceTypes = {
  TMP_DIR: "$tmpdir",
  TMP_FILE: "$tmpfile",
  LOG_FILE: "$logfile",
} as const satisfies Record<string, ResourceType>;

/** Resource types that may appear more than once per contract. */
export const MULTI_VALUED_RESOURCES: ReadonlySet<ResourceType> = new Set(["$tmpdir", "$tmpfile"]);

/** Reserved prefix of routed chunk keys. */
export const CHUNK_KEY_PREFIX = "$chunk.";

/** `<namespace>.tasks.<name>` */
export const TOOL_CONTRACT_ID_REGEX = /^[A-Za-z0-9_]+\.tasks\.[A-Za-z0-9_]+$/;

export const SEMVER_REGEX = /^\d+\.\d+\.\d+(-[0-9A-Za-z.-]+)?(\+[0-9A-Za-z.-]+)?$/;

export const TaskType = z.enum(["local", "distributed"]);
export type TaskType = z.infer<typeof TaskType>;

export const InputFileType = z.object({
  fileTypeId: z.string().min(1),
  /** Slot label, e.g. "fasta_in". */
  label: z.string().min(1),
  description: z.string().default(""),
});
export type InputFileType = z.infer<typeof InputFileType>;

export const OutputFileType = z.object({
  fileTypeId: z.string().min(1),
  label: z.string().min(1),
  description: z.string().default(""),
  /** File name written under the output directory; defaults to the file type's base name. */
  defaultName: z.string().min(1).optional(),
});
export type OutputFileType = z.infer<typeof OutputFileType>;

export const Nproc = z.union([z.number().int(), z.literal(Symbols.MAX_NPROC)]);
export type Nproc = z.infer<typeof Nproc>;

export const MaxNchunks = z.union([z.number().int(), z.literal(Symbols.MAX_NCHUNKS)]);
export type MaxNchunks = z.infer<typeof MaxNchunks>;

export const ToolDriver = z.object({
  exe: z.string().min(1),
  env: z.record(z.string(), z.string()).default({}),
});
export type ToolDriver = z.infer<typeof ToolDriver>;

export const ScatterSpec = z.object({
  /** "$chunk." keys every emitted chunk will carry. */
  chunkKeys: z.array(z.string()),
  maxNchunks: MaxNchunks,
});
export type ScatterSpec = z.infer<typeof ScatterSpec>;

export const GatherSpec = z.object({
  /** The "$chunk." key whose values are merged into the single output. */
  chunkKey: z.string(),
});
export type GatherSpec = z.infer<typeof GatherSpec>;

export const ToolContract = z.object({
  toolContractId: z.string().min(1),
  name: z.string().default(""),
  description: z.string().default(""),
  version: z.string().min(1),
  taskType: TaskType.default("local"),
  inputTypes: z.array(InputFileType),
  outputTypes: z.array(OutputFileType),
  options: z.array(OptionSchema).default([]),
  nproc: Nproc.default(1),
  resourceTypes: z.array(ResourceType).default([]),
  driver: ToolDriver,
  scatter: ScatterSpec.optional(),
  gather: GatherSpec.optional(),
});
export type ToolContract = z.infer<typeof ToolContract>;
export type ToolContractInput = z.input<typeof ToolContract>;

export type ScatterToolContract = ToolContract & { scatter: ScatterSpec };
export type GatherToolContract = ToolContract & { gather: GatherSpec };

export const ContractKind = z.enum(["standard", "scatter", "gather"]);
export type ContractKind = z.infer<typeof ContractKind>;

export function contractKind(contract: ToolContract): ContractKind {
  if (contract.scatter) return "scatter";
  if (contract.gather) return "gather";
  return "standard";
}

export function isScatterContract(contract: ToolContract): contract is ScatterToolContract {
  return contract.scatter !== undefined;
}

export function isGatherContract(contract: ToolContract): contract is GatherToolContract {
  return contract.gather !== undefined;
}
