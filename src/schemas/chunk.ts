/**
 * Pipeline chunk schema.
 *
 * A chunk is one shard of a scattered task: a chunk id plus loose
 * key/value data. Keys beginning "$chunk." are routed into the chunked
 * task's inputs; all other keys are pass-through metadata.
 */

import { z } from "zod";

export const ChunkValue = z.union([z.string(), z.number()]);
export type ChunkValue = z.infer<typeof ChunkValue>;

export interface PipelineChunk {
  readonly chunkId: string;
  readonly values: Readonly<Record<string, ChunkValue>>;
}

/** One entry of the on-disk chunk list: chunk_id plus flattened values. */
export const ChunkEntryDocument = z
  .object({ chunk_id: z.string().min(1) })
  .catchall(ChunkValue);
export type ChunkEntryDocument = z.infer<typeof ChunkEntryDocument>;

export const ChunkListDocument = z.object({
  chunk: z.array(ChunkEntryDocument),
  _comment: z.string().optional(),
});
export type ChunkListDocument = z.infer<typeof ChunkListDocument>;
