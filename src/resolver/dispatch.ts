import type { ResolvedToolContract } from "../schemas/resolved-tool-contract.js";
import type { PipelineChunk } from "../schemas/chunk.js";
import { contractKind, type ToolContract } from "../schemas/tool-contract.js";
import { ArityError, InvalidContractError, ResourceBoundError } from "../errors/index.js";
import { resolveToolContract, type ResolveOptions } from "./resolve.js";
import { resolveScatterToolContract } from "./scatter.js";
import { resolveGatherFromChunks } from "./gather.js";

export interface ContractResolveOptions extends ResolveOptions {
  /** Chunk ceiling for scatter contracts. */
  maxNchunks?: number;
  /** Requested chunk count for scatter contracts. */
  nchunks?: number;
  /** Loaded chunk list for gather contracts; inputFiles[0] is its path. */
  chunks?: readonly PipelineChunk[];
}

/** Resolve any contract kind, dispatching on its scatter/gather fields. */
export function resolveContract(
  contract: ToolContract,
  inputFiles: readonly string[],
  opts: ContractResolveOptions,
): ResolvedToolContract {
  const contractId = contract.toolContractId;

  switch (contractKind(contract)) {
    case "standard":
      return resolveToolContract(contract, inputFiles, opts);

    case "scatter":
      if (opts.maxNchunks === undefined) {
        throw new ResourceBoundError("max_nchunks", "Scatter resolution needs a max_nchunks ceiling", contractId);
      }
      return resolveScatterToolContract(contract, inputFiles, { ...opts, maxNchunks: opts.maxNchunks });

    case "gather": {
      const [chunkListPath] = inputFiles;
      if (inputFiles.length !== 1 || chunkListPath === undefined) {
        throw new ArityError("input_files", 1, inputFiles.length, contractId);
      }
      if (!opts.chunks) {
        throw new InvalidContractError("Gather resolution needs the loaded chunk list", { contractId, key: "chunks" });
      }
      return resolveGatherFromChunks(contract, chunkListPath, opts.chunks, opts);
    }
  }
}
