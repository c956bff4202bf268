/**
 * Chunker services public API
 */

export {
  TextChunker,
  type ChunkingOptions,
  computeSpans,
  reassembleChunks,
  validateChunkingOptions
} from './TextChunker.js';
