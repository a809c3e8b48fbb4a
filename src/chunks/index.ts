export {
  createChunk,
  chunkKeys,
  chunkMetadata,
  isChunkKey,
  toChunkKey,
  validateChunkList,
  mergeForGather,
} from "./chunk.js";
export { loadChunks, writeChunks, loadChunksComment, chunksToDocument, chunksFromDocument } from "./io.js";
