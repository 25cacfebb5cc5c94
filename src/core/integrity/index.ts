/**
 * Integrity Module
 * Content hashes used to verify chunks and reconstructed files
 */

export { chunkHash, createFileHasher, fileHash } from './hasher.js';
export type { FileHasher } from './hasher.js';
