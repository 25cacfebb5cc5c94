/**
 * Encoding Types
 */

import type { Chunk } from '../chunking/chunking.types.js';
import type { EncodedChunk } from '../codec/codec.types.js';

/**
 * Turns one chunk into its framed record
 */
export type ChunkEncoder = (chunk: Chunk) => Promise<EncodedChunk>;

export interface EncodeFailure {
  index: number;
  error: Error;
}

/**
 * Outcome of encoding a whole chunk sequence. Successful records are always
 * sorted by index; on partial failure the failed indices are listed.
 */
export type EncodeReport =
  | { ok: true; records: EncodedChunk[] }
  | { ok: false; records: EncodedChunk[]; failures: EncodeFailure[]; failedIndices: number[] };

/**
 * Progress callback: called once per finished task, in completion order
 */
export type EncodeProgressCallback = (completed: number, total: number, index: number) => void;

export interface ParallelEncodeOptions {
  /** Worker count (default min(8, cores + 2)) */
  concurrency?: number;
  /** Sequences with at most this many chunks are encoded one at a time (default 3) */
  parallelThreshold?: number;
  onProgress?: EncodeProgressCallback;
  signal?: AbortSignal;
}
