import { createHash } from 'crypto';
import { CHUNK_HASH_LENGTH, HASH_ALGORITHM } from '../../utils/constants.js';

function digestHex(text: string): string {
  return createHash(HASH_ALGORITHM).update(text, 'utf8').digest('hex');
}

/**
 * Short content hash of a plaintext chunk body (first 16 hex chars of SHA-256)
 */
export function chunkHash(body: string): string {
  return digestHex(body).slice(0, CHUNK_HASH_LENGTH);
}

/**
 * Full SHA-256 hex digest of the whole plaintext file content
 */
export function fileHash(content: string): string {
  return digestHex(content);
}

export interface FileHasher {
  update(text: string): void;
  /** Hex digest of everything passed to `update`; the hasher cannot be reused */
  digest(): string;
  /** UTF-8 bytes hashed so far */
  readonly bytes: number;
}

/**
 * Incremental form of `fileHash`, for content that arrives in pieces
 */
export function createFileHasher(): FileHasher {
  const hash = createHash(HASH_ALGORITHM);
  let bytes = 0;
  return {
    update(text: string): void {
      hash.update(text, 'utf8');
      bytes += Buffer.byteLength(text, 'utf8');
    },
    digest(): string {
      return hash.digest('hex');
    },
    get bytes(): number {
      return bytes;
    },
  };
}
