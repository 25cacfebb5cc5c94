/**
 * Chunking Module
 * Line-boundary splitting of file content
 */

export {
  computeMaxChunkBytes,
  iterateLines,
  splitAtLineBoundaries,
  splitLinesStream,
  readFileContent,
  readLines,
  buildChunks,
  exceedsCapacity,
} from './chunker.js';
export type { Chunk, ChunkSizing } from './chunking.types.js';
