/**
 * Shared error handling utilities and the transfer error taxonomy
 */

/**
 * Formats error message from unknown error type
 */
export function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wraps error with additional context
 */
export function wrapError(context: string, error: unknown): Error {
  const message = formatError(error);
  return new Error(`${context}: ${message}`, { cause: error });
}

// ============================================================================
// Transfer Errors
// ============================================================================

export type TransferErrorCode =
  | 'FORMAT'
  | 'MISSING_PARTS'
  | 'INCONSISTENT_METADATA'
  | 'CHUNK_INTEGRITY'
  | 'FILE_INTEGRITY'
  | 'DECRYPTION'
  | 'TRANSPORT_DECODE'
  | 'ENCODING_FAILED'
  | 'OUTPUT_EXISTS'
  | 'INPUT'
  | 'WEAK_PASSWORD'
  | 'PASSWORD_MISMATCH';

/**
 * Base class for every failure the chunk protocol reports
 */
export abstract class TransferError extends Error {
  abstract readonly code: TransferErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A record matches neither grammar, or its header and footer disagree
 */
export class FormatError extends TransferError {
  readonly code = 'FORMAT';
}

/**
 * Declared total not covered by the observed indices
 */
export class MissingPartsError extends TransferError {
  readonly code = 'MISSING_PARTS';

  constructor(
    readonly filename: string,
    readonly missing: number[],
    readonly total: number
  ) {
    super(`${filename}: missing parts [${missing.join(', ')}] of ${total}`);
  }
}

export type MetadataField = 'total' | 'file_hash' | 'encrypted';

/**
 * Records for the same filename disagree on total, file hash or encryption
 */
export class InconsistentMetadataError extends TransferError {
  readonly code = 'INCONSISTENT_METADATA';

  constructor(
    readonly filename: string,
    readonly field: MetadataField,
    readonly expected: string,
    readonly actual: string,
    readonly index: number
  ) {
    super(
      `${filename}: part ${index} declares ${field} ${actual}, other parts declare ${expected}`
    );
  }
}

export class ChunkIntegrityError extends TransferError {
  readonly code = 'CHUNK_INTEGRITY';

  constructor(
    readonly filename: string,
    readonly index: number,
    readonly expected: string,
    readonly actual: string
  ) {
    super(`${filename}: part ${index} hash mismatch (expected ${expected}, got ${actual})`);
  }
}

/**
 * Concatenated plaintext does not hash to the declared file hash
 */
export class FileIntegrityError extends TransferError {
  readonly code = 'FILE_INTEGRITY';

  constructor(
    readonly filename: string,
    readonly expected: string,
    readonly actual: string
  ) {
    super(`${filename}: file hash mismatch (expected ${expected}, got ${actual})`);
  }
}

/**
 * Wrong password or corrupted ciphertext. Detected through padding or UTF-8
 * failures; CBC without a tag cannot tell the two apart.
 */
export class DecryptionError extends TransferError {
  readonly code = 'DECRYPTION';
}

export class TransportDecodeError extends TransferError {
  readonly code = 'TRANSPORT_DECODE';
}

export class EncodingFailedError extends TransferError {
  readonly code = 'ENCODING_FAILED';

  constructor(readonly failedIndices: number[]) {
    super(`Failed to encode parts [${failedIndices.join(', ')}]`);
  }
}

export class OutputExistsError extends TransferError {
  readonly code = 'OUTPUT_EXISTS';

  constructor(readonly path: string) {
    super(`Output file already exists: ${path}`);
  }
}

/**
 * Input or configuration problems that make the whole operation meaningless
 */
export class InputError extends TransferError {
  readonly code = 'INPUT';
}

export class WeakPasswordError extends TransferError {
  readonly code = 'WEAK_PASSWORD';
}

export class PasswordMismatchError extends TransferError {
  readonly code = 'PASSWORD_MISMATCH';

  constructor() {
    super('Passwords do not match');
  }
}

export function isTransferError(error: unknown): error is TransferError {
  return error instanceof TransferError;
}
