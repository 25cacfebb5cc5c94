/**
 * Codec Module
 * Wire record framing and parsing
 */

export { formatPartNumber, formatRecord, buildWireRecord, encodeChunk } from './chunkCodec.js';
export { parseRecord, tryParseRecord, splitRecords } from './recordParser.js';
export type {
  RecordMetadata,
  PlainRecord,
  EncryptedRecord,
  WireRecord,
  RecordKind,
  EncodeContext,
  EncodedChunk,
  ParseResult,
} from './codec.types.js';
