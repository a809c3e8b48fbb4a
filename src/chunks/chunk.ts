/**
 * Pipeline chunk helpers.
 */

import type { ChunkValue, PipelineChunk } from "../schemas/chunk.js";
import { CHUNK_KEY_PREFIX } from "../schemas/tool-contract.js";
import { ChunkKeySkewError, InvalidChunkError } from "../errors/index.js";

export function isChunkKey(key: string): boolean {
  return key.startsWith(CHUNK_KEY_PREFIX);
}

/** Add the "$chunk." prefix if it is missing. */
export function toChunkKey(key: string): string {
  return isChunkKey(key) ? key : `${CHUNK_KEY_PREFIX}${key}`;
}

/**
 * Create a chunk. Keys may be routed ("$chunk.fasta_id") or metadata
 * ("nrecords"); the chunk id itself must not look like a chunk key.
 */
export function createChunk(chunkId: string, values: Record<string, ChunkValue> = {}): PipelineChunk {
  if (chunkId.length === 0) {
    throw new InvalidChunkError("chunk_id", "Chunk id must not be empty");
  }
  if (isChunkKey(chunkId)) {
    throw new InvalidChunkError("chunk_id", `Chunk id '${chunkId}' must not start with '${CHUNK_KEY_PREFIX}'`);
  }
  if (Object.prototype.hasOwnProperty.call(values, "chunk_id")) {
    throw new InvalidChunkError("chunk_id", `Chunk '${chunkId}' uses the reserved key 'chunk_id'`);
  }
  return Object.freeze({ chunkId, values: Object.freeze({ ...values }) });
}

/** Routed keys of a chunk, in insertion order. */
export function chunkKeys(chunk: PipelineChunk): string[] {
  return Object.keys(chunk.values).filter(isChunkKey);
}

/** Pass-through (non-routed) values of a chunk. */
export function chunkMetadata(chunk: PipelineChunk): Record<string, ChunkValue> {
  return Object.fromEntries(Object.entries(chunk.values).filter(([key]) => !isChunkKey(key)));
}

/**
 * Check list invariants: chunk ids are unique and every chunk carries the
 * same set of "$chunk." keys as the first one.
 *
 * @throws InvalidChunkError on duplicate ids, ChunkKeySkewError on key skew
 */
export function validateChunkList(chunks: readonly PipelineChunk[], contractId?: string): void {
  const ids = new Set<string>();
  for (const chunk of chunks) {
    if (ids.has(chunk.chunkId)) {
      throw new InvalidChunkError("chunk_id", `Duplicate chunk id '${chunk.chunkId}'`, contractId);
    }
    ids.add(chunk.chunkId);
  }

  const [first, ...rest] = chunks;
  if (!first) return;
  const expected = new Set(chunkKeys(first));

  for (const chunk of rest) {
    const actual = new Set(chunkKeys(chunk));
    for (const key of expected) {
      if (!actual.has(key)) {
        throw new ChunkKeySkewError(key, `Chunk '${chunk.chunkId}' is missing key '${key}' present in '${first.chunkId}'`, {
          chunkId: chunk.chunkId,
          contractId,
        });
      }
    }
    for (const key of actual) {
      if (!expected.has(key)) {
        throw new ChunkKeySkewError(key, `Chunk '${chunk.chunkId}' has key '${key}' missing from '${first.chunkId}'`, {
          chunkId: chunk.chunkId,
          contractId,
        });
      }
    }
  }
}

/**
 * Values of one chunk key across a chunk list, in list order.
 *
 * The order defines how downstream tools concatenate or merge the
 * shards; chunks are never sorted here.
 *
 * @param chunkKey - with or without the "$chunk." prefix
 */
export function mergeForGather(chunks: readonly PipelineChunk[], chunkKey: string, contractId?: string): string[] {
  const key = toChunkKey(chunkKey);
  return chunks.map(chunk => {
    const value = chunk.values[key];
    if (value === undefined) {
      throw new ChunkKeySkewError(key, `Chunk '${chunk.chunkId}' has no value for '${key}'`, {
        chunkId: chunk.chunkId,
        contractId,
      });
    }
    if (typeof value !== "string") {
      throw new InvalidChunkError(key, `Chunk '${chunk.chunkId}' value for '${key}' is not a path: ${value}`, contractId);
    }
    return value;
  });
}
