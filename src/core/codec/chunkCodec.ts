/**
 * Chunk Codec
 * Frames chunks into wire records (the format every chunk must obey)
 */

import type { Chunk } from '../chunking/chunking.types.js';
import type { EncodeContext, EncodedChunk, WireRecord } from './codec.types.js';
import { chunkHash } from '../integrity/hasher.js';
import { InputError } from '../../utils/errors.js';
import {
  ENCRYPTED_MARKER,
  FIELD_CHUNK_HASH,
  FIELD_FILE,
  FIELD_FILE_HASH,
  MARKER_CLOSE,
  PART_NUMBER_WIDTH,
  PART_PREFIX,
  PART_SEPARATOR,
  RECORD_BEGIN,
  RECORD_END,
} from '../../utils/constants.js';

/**
 * Zero-pads a part number to at least two digits (100 and above widen naturally)
 */
export function formatPartNumber(value: number): string {
  return String(value).padStart(PART_NUMBER_WIDTH, '0');
}

/**
 * Serializes a record to its exact wire text
 */
export function formatRecord(record: WireRecord): string {
  const marker = record.kind === 'encrypted' ? ENCRYPTED_MARKER : '';
  const part = formatPartNumber(record.index);

  const header =
    `${RECORD_BEGIN}${marker}${PART_PREFIX}${part}${PART_SEPARATOR}${formatPartNumber(record.total)}` +
    `${FIELD_FILE}${record.filename}` +
    `${FIELD_CHUNK_HASH}${record.chunkHash}` +
    `${FIELD_FILE_HASH}${record.fileHash}${MARKER_CLOSE}\n`;
  const footer = `${RECORD_END}${marker}${PART_PREFIX}${part}${MARKER_CLOSE}`;

  return header + record.payload + footer;
}

function assertFramable(chunk: Chunk): void {
  if (chunk.filename.length === 0 || /[\r\n]/.test(chunk.filename)) {
    throw new InputError(`Filename cannot be empty or contain line breaks: ${JSON.stringify(chunk.filename)}`);
  }
  if (!Number.isInteger(chunk.index) || chunk.index < 1 || chunk.index > chunk.total) {
    throw new InputError(`Part ${chunk.index} of ${chunk.total} is out of range`);
  }
}

/**
 * Builds the structured record for a chunk, encrypting the body when asked
 *
 * The chunk hash is always taken over the plaintext body.
 */
export async function buildWireRecord(chunk: Chunk, context: EncodeContext): Promise<WireRecord> {
  assertFramable(chunk);

  const metadata = {
    index: chunk.index,
    total: chunk.total,
    filename: chunk.filename,
    chunkHash: chunkHash(chunk.body),
    fileHash: context.fileHash,
  };

  if (!context.encryption) {
    return { kind: 'plain', ...metadata, payload: chunk.body };
  }

  const { engine, password } = context.encryption;
  const encrypted = await engine.encrypt(chunk.body, password);
  return { kind: 'encrypted', ...metadata, payload: engine.encodeForTransport(encrypted) };
}

/**
 * Frames one chunk: builds its record and the wire text
 */
export async function encodeChunk(chunk: Chunk, context: EncodeContext): Promise<EncodedChunk> {
  const record = await buildWireRecord(chunk, context);
  return { index: record.index, record, text: formatRecord(record) };
}
