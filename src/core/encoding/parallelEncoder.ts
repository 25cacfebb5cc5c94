/**
 * Parallel Encoder
 *
 * Encodes chunks through a bounded worker pool and gathers the results by
 * index. Encryption key derivation runs on libuv's thread pool, so chunks are
 * actually processed concurrently. The output is identical for any pool size.
 */

import type { Chunk } from '../chunking/chunking.types.js';
import type { EncodedChunk } from '../codec/codec.types.js';
import type {
  ChunkEncoder,
  EncodeFailure,
  EncodeReport,
  ParallelEncodeOptions,
} from './encoding.types.js';
import { defaultPoolSize, runPool } from './workerPool.js';
import { EncodingFailedError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { DEFAULT_PARALLEL_THRESHOLD } from '../../utils/constants.js';

const logger = createLogger('encoder');

/**
 * Chooses the worker count for a sequence of the given length
 */
export function resolvePoolSize(chunkCount: number, options: ParallelEncodeOptions = {}): number {
  const threshold = options.parallelThreshold ?? DEFAULT_PARALLEL_THRESHOLD;
  if (chunkCount <= threshold) return 1;
  return Math.max(1, options.concurrency ?? defaultPoolSize());
}

/**
 * Encodes every chunk and reports success or the list of failed indices
 */
export async function encodeAll(
  chunks: readonly Chunk[],
  encoder: ChunkEncoder,
  options: ParallelEncodeOptions = {}
): Promise<EncodeReport> {
  const poolSize = resolvePoolSize(chunks.length, options);
  let completed = 0;

  logger.debug(`Encoding ${chunks.length} chunk(s) with ${poolSize} worker(s)`);

  const outcomes = await runPool(
    chunks,
    poolSize,
    async (chunk) => {
      try {
        return await encoder(chunk);
      } finally {
        completed++;
        options.onProgress?.(completed, chunks.length, chunk.index);
      }
    },
    options.signal
  );

  const records: EncodedChunk[] = [];
  const failures: EncodeFailure[] = [];

  outcomes.forEach((outcome, position) => {
    if (outcome.ok) {
      records.push(outcome.value);
    } else {
      failures.push({ index: chunks[position].index, error: outcome.error });
    }
  });

  records.sort((a, b) => a.index - b.index);

  if (failures.length === 0) {
    return { ok: true, records };
  }

  failures.sort((a, b) => a.index - b.index);
  for (const failure of failures) {
    logger.debug(`Part ${failure.index} failed: ${failure.error.message}`);
  }

  return {
    ok: false,
    records,
    failures,
    failedIndices: failures.map((failure) => failure.index),
  };
}

/**
 * Like {@link encodeAll}, but throws {@link EncodingFailedError} unless every chunk encoded
 */
export async function encodeAllOrThrow(
  chunks: readonly Chunk[],
  encoder: ChunkEncoder,
  options: ParallelEncodeOptions = {}
): Promise<EncodedChunk[]> {
  const report = await encodeAll(chunks, encoder, options);
  if (!report.ok) {
    throw new EncodingFailedError(report.failedIndices);
  }
  return report.records;
}
