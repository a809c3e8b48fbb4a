/**
 * Scatter resolution and post-scatter checks.
 */

import type { ResolvedToolContract } from "../schemas/resolved-tool-contract.js";
import type { PipelineChunk } from "../schemas/chunk.js";
import { isScatterContract, type ToolContract } from "../schemas/tool-contract.js";
import { deepFreeze } from "../contracts/define.js";
import { chunkKeys, validateChunkList } from "../chunks/chunk.js";
import {
  ChunkCountExceededError,
  ChunkKeySkewError,
  InvalidChunkError,
  InvalidContractError,
  ResourceBoundError,
} from "../errors/index.js";
import { resolveBase, resolveMaxNchunks, type ResolveOptions } from "./resolve.js";

export interface ScatterResolveOptions extends ResolveOptions {
  /** Absolute chunk ceiling; `$max_nchunks` resolves to it. */
  maxNchunks: number;
  /** Chunks the scatter task should emit (default: the resolved maximum). */
  nchunks?: number;
}

/**
 * Resolve a scatter contract.
 *
 * Asking for more chunks than the contract allows is a hard failure: it
 * means the scatter strategy is misconfigured, so the count is never
 * silently capped.
 *
 * @throws ChunkCountExceededError when nchunks exceeds the resolved maximum
 */
export function resolveScatterToolContract(
  contract: ToolContract,
  inputFiles: readonly string[],
  opts: ScatterResolveOptions,
): ResolvedToolContract {
  if (!isScatterContract(contract)) {
    throw new InvalidContractError("Not a scatter contract", { contractId: contract.toolContractId, key: "scatter" });
  }
  const contractId = contract.toolContractId;

  if (contract.scatter.chunkKeys.length === 0) {
    throw new InvalidContractError("Scatter contracts must declare at least one chunk key", {
      contractId,
      key: "scatter.chunkKeys",
    });
  }

  const base = resolveBase(contract, inputFiles, opts);
  const maxNchunks = resolveMaxNchunks(contract.scatter.maxNchunks, opts.maxNchunks, contractId);
  const nchunks = opts.nchunks ?? maxNchunks;

  if (!Number.isInteger(nchunks) || nchunks < 1) {
    throw new ResourceBoundError("nchunks", `nchunks must be a positive integer, got ${nchunks}`, contractId);
  }
  if (nchunks > maxNchunks) {
    throw new ChunkCountExceededError(nchunks, maxNchunks, contractId);
  }

  return deepFreeze({
    ...base,
    scatter: { chunkKeys: [...contract.scatter.chunkKeys], maxNchunks, nchunks },
  });
}

/**
 * Check the chunk list a scatter task produced against its resolved
 * contract: count within the ceiling, list invariants hold, every
 * promised chunk key present.
 */
export function checkScatterOutput(resolved: ResolvedToolContract, chunks: readonly PipelineChunk[]): void {
  const contractId = resolved.toolContractId;
  if (!resolved.scatter) {
    throw new InvalidContractError("Not a resolved scatter contract", { contractId, key: "scatter" });
  }
  if (chunks.length === 0) {
    throw new InvalidChunkError("chunk", "Scatter task produced no chunks", contractId);
  }
  if (chunks.length > resolved.scatter.maxNchunks) {
    throw new ChunkCountExceededError(chunks.length, resolved.scatter.maxNchunks, contractId);
  }

  validateChunkList(chunks, contractId);

  for (const chunk of chunks) {
    const present = new Set(chunkKeys(chunk));
    for (const key of resolved.scatter.chunkKeys) {
      if (!present.has(key)) {
        throw new ChunkKeySkewError(key, `Chunk '${chunk.chunkId}' is missing promised key '${key}'`, {
          chunkId: chunk.chunkId,
          contractId,
        });
      }
    }
  }
}
