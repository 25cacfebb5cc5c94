/**
 * Codec Types
 * Wire record shapes shared by the encoder, the parser and the reassembler
 */

import type { EncryptionOptions } from '../crypto/crypto.types.js';
import type { FormatError } from '../../utils/errors.js';

/**
 * Metadata carried in every record header
 */
export interface RecordMetadata {
  index: number;
  total: number;
  filename: string;
  /** Hash of the plaintext body, also for encrypted records */
  chunkHash: string;
  fileHash: string;
}

export interface PlainRecord extends RecordMetadata {
  kind: 'plain';
  /** Plaintext chunk body */
  payload: string;
}

export interface EncryptedRecord extends RecordMetadata {
  kind: 'encrypted';
  /** base64(salt || iv || ciphertext) */
  payload: string;
}

export type WireRecord = PlainRecord | EncryptedRecord;

export type RecordKind = WireRecord['kind'];

/**
 * Per-file data needed to frame a chunk
 */
export interface EncodeContext {
  fileHash: string;
  encryption?: EncryptionOptions;
}

/**
 * A framed chunk ready to be written or rendered
 */
export interface EncodedChunk {
  index: number;
  record: WireRecord;
  text: string;
}

export type ParseResult =
  | { ok: true; record: WireRecord }
  | { ok: false; error: FormatError };
