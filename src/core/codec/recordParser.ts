/**
 * Record Parser
 *
 * Reads a wire record into a tagged {@link WireRecord}. The two shapes are
 * enumerated explicitly; anything that does not match one of them in full is a
 * FormatError. Hashes are not verified here.
 *
 *   --BEGIN [ENCRYPTED ]part_II_of_TT file: NAME chunk_hash: H16 file_hash: H64--\n
 *   PAYLOAD
 *   --END [ENCRYPTED ]part_II--
 */

import type { ParseResult, RecordKind, WireRecord } from './codec.types.js';
import { FormatError } from '../../utils/errors.js';
import {
  CHUNK_HASH_LENGTH,
  ENCRYPTED_MARKER,
  FIELD_CHUNK_HASH,
  FIELD_FILE,
  FIELD_FILE_HASH,
  FILE_HASH_LENGTH,
  MARKER_CLOSE,
  MAX_PARTS,
  PART_PREFIX,
  PART_SEPARATOR,
  RECORD_BEGIN,
  RECORD_END,
  UTF8_BOM,
} from '../../utils/constants.js';

const HEX_PATTERN = /^[0-9a-f]+$/;
const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;
const FOOTER_PATTERN = /--END (?:ENCRYPTED )?part_\d+--/g;
const RECORD_BOUNDARY = /\s*(?:--BEGIN |$)/y;

/**
 * Sequential reader over one header or footer line
 */
class LineReader {
  private position = 0;

  constructor(
    private readonly line: string,
    private readonly what: string
  ) {}

  get rest(): string {
    return this.line.slice(this.position);
  }

  tryConsume(literal: string): boolean {
    if (this.line.startsWith(literal, this.position)) {
      this.position += literal.length;
      return true;
    }
    return false;
  }

  expect(literal: string): void {
    if (!this.tryConsume(literal)) {
      throw new FormatError(
        `Malformed ${this.what}: expected "${literal.trim()}" at column ${this.position + 1}`
      );
    }
  }

  readNumber(field: string): number {
    const start = this.position;
    while (this.position < this.line.length && isDigit(this.line[this.position])) {
      this.position++;
    }
    if (this.position === start) {
      throw new FormatError(`Malformed ${this.what}: ${field} is not a number`);
    }
    return parseInt(this.line.slice(start, this.position), 10);
  }

  expectEnd(): void {
    if (this.position !== this.line.length) {
      throw new FormatError(`Malformed ${this.what}: unexpected text "${this.rest}"`);
    }
  }
}

function isDigit(char: string): boolean {
  return char >= '0' && char <= '9';
}

function readKind(reader: LineReader): RecordKind {
  return reader.tryConsume(ENCRYPTED_MARKER) ? 'encrypted' : 'plain';
}

function assertHash(value: string, length: number, field: string): void {
  if (value.length !== length || !HEX_PATTERN.test(value)) {
    throw new FormatError(`Malformed header: ${field} must be ${length} lowercase hex characters`);
  }
}

interface ParsedHeader {
  kind: RecordKind;
  index: number;
  total: number;
  filename: string;
  chunkHash: string;
  fileHash: string;
}

function parseHeader(line: string): ParsedHeader {
  const reader = new LineReader(line, 'header');
  reader.expect(RECORD_BEGIN);
  const kind = readKind(reader);
  reader.expect(PART_PREFIX);
  const index = reader.readNumber('part number');
  reader.expect(PART_SEPARATOR);
  const total = reader.readNumber('part total');
  reader.expect(FIELD_FILE);

  // Filenames may contain spaces, so the hash fields are located from the right
  const fields = reader.rest;
  if (!fields.endsWith(MARKER_CLOSE)) {
    throw new FormatError('Malformed header: missing closing "--"');
  }
  const inner = fields.slice(0, -MARKER_CLOSE.length);
  const fileHashAt = inner.lastIndexOf(FIELD_FILE_HASH);
  const chunkHashAt = fileHashAt > 0 ? inner.lastIndexOf(FIELD_CHUNK_HASH, fileHashAt - 1) : -1;
  if (fileHashAt === -1 || chunkHashAt === -1) {
    throw new FormatError('Malformed header: missing chunk_hash or file_hash');
  }

  const filename = inner.slice(0, chunkHashAt);
  const chunkHash = inner.slice(chunkHashAt + FIELD_CHUNK_HASH.length, fileHashAt);
  const fileHash = inner.slice(fileHashAt + FIELD_FILE_HASH.length);

  if (filename.length === 0) {
    throw new FormatError('Malformed header: empty filename');
  }
  assertHash(chunkHash, CHUNK_HASH_LENGTH, 'chunk_hash');
  assertHash(fileHash, FILE_HASH_LENGTH, 'file_hash');
  if (index < 1 || total < 1 || index > MAX_PARTS || total > MAX_PARTS) {
    throw new FormatError(`Malformed header: part ${index} of ${total} is out of range`);
  }

  return { kind, index, total, filename, chunkHash, fileHash };
}

function parseFooter(line: string): { kind: RecordKind; index: number } {
  const reader = new LineReader(line, 'footer');
  reader.expect(RECORD_END);
  const kind = readKind(reader);
  reader.expect(PART_PREFIX);
  const index = reader.readNumber('part number');
  reader.expect(MARKER_CLOSE);
  reader.expectEnd();
  return { kind, index };
}

/**
 * Parses one wire record
 *
 * Surrounding whitespace (as left by text files and scanners) is ignored; the
 * payload is the exact span between the header line and the footer.
 *
 * @throws FormatError when the text matches neither record shape
 */
export function parseRecord(text: string): WireRecord {
  const source = (text.startsWith(UTF8_BOM) ? text.slice(UTF8_BOM.length) : text).trim();

  if (!source.startsWith(RECORD_BEGIN)) {
    throw new FormatError('Not a chunk record: missing "--BEGIN" header');
  }

  const headerEnd = source.indexOf('\n');
  if (headerEnd === -1) {
    throw new FormatError('Malformed record: header is not followed by a newline');
  }
  const headerLine = source.slice(0, headerEnd).replace(/\r$/, '');
  const header = parseHeader(headerLine);

  const bodyStart = headerEnd + 1;
  const footerStart = source.lastIndexOf(RECORD_END);
  if (footerStart < bodyStart) {
    throw new FormatError('Malformed record: missing "--END" footer');
  }
  const footer = parseFooter(source.slice(footerStart));

  if (footer.kind !== header.kind) {
    throw new FormatError(
      `Malformed record: ${header.kind} header closed by ${footer.kind} footer`
    );
  }
  if (footer.index !== header.index) {
    throw new FormatError(
      `Part number mismatch: header says ${header.index}, footer says ${footer.index}`
    );
  }

  const payload = source.slice(bodyStart, footerStart);
  const metadata = {
    index: header.index,
    total: header.total,
    filename: header.filename,
    chunkHash: header.chunkHash,
    fileHash: header.fileHash,
  };

  if (header.kind === 'encrypted') {
    const compact = payload.trim();
    if (!BASE64_PATTERN.test(compact.replace(/\s+/g, ''))) {
      throw new FormatError(`Part ${header.index}: encrypted payload is not base64`);
    }
    return { kind: 'encrypted', ...metadata, payload: compact };
  }

  return { kind: 'plain', ...metadata, payload };
}

/**
 * Result-returning form of {@link parseRecord}
 */
export function tryParseRecord(text: string): ParseResult {
  try {
    return { ok: true, record: parseRecord(text) };
  } catch (error) {
    if (error instanceof FormatError) {
      return { ok: false, error };
    }
    throw error;
  }
}

/**
 * Cuts a text dump holding several records (one scanner session, say) into
 * individual record texts
 *
 * A record ends at a footer that is followed by nothing or by the next
 * "--BEGIN". Text with no recognisable footer is returned as-is so the caller
 * reports it as a FormatError.
 */
export function splitRecords(dump: string): string[] {
  const pieces: string[] = [];
  let start = 0;

  for (const match of dump.matchAll(FOOTER_PATTERN)) {
    const end = (match.index ?? 0) + match[0].length;
    RECORD_BOUNDARY.lastIndex = end;
    if (RECORD_BOUNDARY.test(dump)) {
      pieces.push(dump.slice(start, end));
      start = end;
    }
  }
  pieces.push(dump.slice(start));

  return pieces
    .map((piece) => {
      const begin = piece.indexOf(RECORD_BEGIN);
      return (begin > 0 ? piece.slice(begin) : piece).trim();
    })
    .filter((piece) => piece.length > 0);
}
