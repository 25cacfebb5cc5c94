/**
 * Reassembly Types
 */

import type { WireRecord } from '../codec/codec.types.js';
import type { CryptoEngineLike } from '../crypto/crypto.types.js';
import type { FormatError, TransferError } from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';

/**
 * collecting -> complete -> verified | failed
 */
export type ReconstructionState = 'collecting' | 'complete' | 'verified' | 'failed';

/**
 * A parsed record plus where it came from (file path, image name, ...)
 */
export interface RecordEntry {
  record: WireRecord;
  source: string;
}

/**
 * What happened to a record handed to a reconstruction set
 * - added: new index
 * - replaced: index already present, last write wins
 * - extra: index beyond the declared total, ignored
 * - conflict: metadata disagrees with earlier records, not stored
 */
export type AddOutcome = 'added' | 'replaced' | 'extra' | 'conflict';

export type IngestOutcome =
  | { ok: true; record: WireRecord; outcome: AddOutcome }
  | { ok: false; source: string; error: FormatError };

export interface VerifiedFile {
  status: 'verified';
  filename: string;
  content: string;
  fileHash: string;
  total: number;
  encrypted: boolean;
  /** UTF-8 size of the content */
  bytes: number;
}

export interface FailedFile {
  status: 'failed';
  filename: string;
  error: TransferError;
}

export type ReassemblyResult = VerifiedFile | FailedFile;

export interface ReassemblySummary {
  results: ReassemblyResult[];
  verified: VerifiedFile[];
  failed: FailedFile[];
}

/**
 * Supplies the decryption password; `attempt` starts at 1 and grows when the
 * previous password was rejected by the first encrypted record
 */
export type PasswordProvider = (attempt: number) => Promise<string>;

export interface ReassemblerOptions {
  /** Needed only when encrypted records are present */
  crypto?: CryptoEngineLike;
  logger?: Logger;
}

export interface DecryptionSessionOptions {
  /** Password prompts allowed before the run stops (default 3) */
  maxAttempts?: number;
  logger?: Logger;
}
