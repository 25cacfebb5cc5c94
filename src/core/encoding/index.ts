/**
 * Encoding Module
 * Concurrent production of wire records
 */

export { encodeAll, encodeAllOrThrow, resolvePoolSize } from './parallelEncoder.js';
export { runPool, defaultPoolSize, TaskAbortedError } from './workerPool.js';
export type { TaskOutcome } from './workerPool.js';
export type {
  ChunkEncoder,
  EncodeFailure,
  EncodeReport,
  EncodeProgressCallback,
  ParallelEncodeOptions,
} from './encoding.types.js';
