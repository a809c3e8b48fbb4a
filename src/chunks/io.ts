/**
 * Chunk list documents.
 *
 * On disk: { "chunk": [ { "chunk_id": "...", "$chunk.key": value, ... } ], "_comment": "..." }
 * Chunk order is preserved in both directions.
 */

import type { PipelineChunk } from "../schemas/chunk.js";
import { ChunkListDocument } from "../schemas/chunk.js";
import { parseWithSchema, readJsonDocument, writeJsonDocument } from "../io/json.js";
import { createChunk, validateChunkList } from "./chunk.js";

export function chunksToDocument(chunks: readonly PipelineChunk[], comment?: string): ChunkListDocument {
  const doc: ChunkListDocument = {
    chunk: chunks.map(c => ({ chunk_id: c.chunkId, ...c.values })),
  };
  if (comment !== undefined) {
    doc._comment = comment;
  }
  return doc;
}

/**
 * Build chunks from a parsed document and check list invariants.
 *
 * @param source - document path, used in error messages
 */
export function chunksFromDocument(raw: unknown, source: string): PipelineChunk[] {
  const doc = parseWithSchema(ChunkListDocument, raw, source);
  const chunks = doc.chunk.map(({ chunk_id, ...values }) => createChunk(chunk_id, values));
  validateChunkList(chunks);
  return chunks;
}

/**
 * Load a chunk list.
 *
 * @throws MalformedDocumentError on unreadable or ill-shaped documents
 * @throws ChunkKeySkewError when chunks disagree on their "$chunk." keys
 */
export async function loadChunks(path: string): Promise<PipelineChunk[]> {
  return chunksFromDocument(await readJsonDocument(path), path);
}

/** Validate and atomically write a chunk list. */
export async function writeChunks(chunks: readonly PipelineChunk[], path: string, comment?: string): Promise<void> {
  validateChunkList(chunks);
  await writeJsonDocument(path, chunksToDocument(chunks, comment));
}

/** Comment of a chunk list document, if it has one. */
export async function loadChunksComment(path: string): Promise<string | undefined> {
  const doc = parseWithSchema(ChunkListDocument, await readJsonDocument(path), path);
  return doc._comment;
}
