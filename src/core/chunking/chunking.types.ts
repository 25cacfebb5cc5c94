/**
 * Chunking Types
 * Types for splitting file content into transport-sized chunks
 */

/**
 * One bounded-size slice of a file, before it is framed for the wire
 */
export interface Chunk {
  /** 1-based position of this chunk */
  index: number;
  /** Number of chunks the file was split into */
  total: number;
  /** Base name of the source file */
  filename: string;
  /** Plaintext body; always ends on a line boundary except for the last chunk */
  body: string;
}

/**
 * Settings that determine the per-chunk byte cap
 */
export interface ChunkSizing {
  /** Capacity of one optical symbol in bytes */
  maxPayloadBytes: number;
  /** Fraction of the capacity given to the body (the rest is framing) */
  safetyMargin: number;
}
