/**
 * Gather resolution.
 */

import type { ResolvedToolContract } from "../schemas/resolved-tool-contract.js";
import type { PipelineChunk } from "../schemas/chunk.js";
import { CHUNK_FILE_TYPE_ID } from "../schemas/file-type.js";
import { isGatherContract, type ToolContract } from "../schemas/tool-contract.js";
import { deepFreeze } from "../contracts/define.js";
import { mergeForGather, validateChunkList } from "../chunks/chunk.js";
import { loadChunks } from "../chunks/io.js";
import { InvalidChunkError, InvalidContractError, MultipleOutputsError } from "../errors/index.js";
import { resolveBase, type ResolveOptions } from "./resolve.js";

/**
 * Resolve a gather contract against an already loaded chunk list.
 *
 * The single output is resolved as usual; the chunk key's values, in
 * chunk list order, are recorded as `gather.chunkFiles`.
 *
 * @throws MultipleOutputsError when the contract declares more than one output
 */
export function resolveGatherFromChunks(
  contract: ToolContract,
  chunkListPath: string,
  chunks: readonly PipelineChunk[],
  opts: ResolveOptions,
): ResolvedToolContract {
  if (!isGatherContract(contract)) {
    throw new InvalidContractError("Not a gather contract", { contractId: contract.toolContractId, key: "gather" });
  }
  const contractId = contract.toolContractId;

  // Structurally excluded by lintToolContract; contracts loaded without linting are re-checked here.
  if (contract.outputTypes.length !== 1) {
    throw new MultipleOutputsError(contract.outputTypes.length, contractId);
  }
  const [input] = contract.inputTypes;
  if (contract.inputTypes.length !== 1 || input?.fileTypeId !== CHUNK_FILE_TYPE_ID) {
    throw new InvalidContractError(`Gather contracts take exactly one '${CHUNK_FILE_TYPE_ID}' input`, {
      contractId,
      key: "inputTypes",
    });
  }
  if (chunks.length === 0) {
    throw new InvalidChunkError("chunk", `Chunk list ${chunkListPath} is empty`, contractId);
  }

  validateChunkList(chunks, contractId);
  const chunkFiles = mergeForGather(chunks, contract.gather.chunkKey, contractId);
  const base = resolveBase(contract, [chunkListPath], opts);

  return deepFreeze({
    ...base,
    gather: { chunkKey: contract.gather.chunkKey, chunkFiles },
  });
}

/** Load the chunk list at `chunkListPath` and resolve the gather contract against it. */
export async function resolveGatherToolContract(
  contract: ToolContract,
  chunkListPath: string,
  opts: ResolveOptions,
): Promise<ResolvedToolContract> {
  const chunks = await loadChunks(chunkListPath);
  return resolveGatherFromChunks(contract, chunkListPath, chunks, opts);
}
