import { createReadStream } from 'fs';
import { readFile } from 'fs/promises';
import { StringDecoder } from 'string_decoder';
import type { Chunk, ChunkSizing } from './chunking.types.js';
import { InputError } from '../../utils/errors.js';
import {
  DEFAULT_CAPACITY_THRESHOLD,
  DEFAULT_MAX_PAYLOAD_BYTES,
  DEFAULT_SAFETY_MARGIN,
  UTF8_BOM,
} from '../../utils/constants.js';

const LINE_TERMINATOR = '\n';

function utf8Length(text: string): number {
  return Buffer.byteLength(text, 'utf8');
}

function assertValidCap(maxBytes: number): void {
  if (!Number.isInteger(maxBytes) || maxBytes < 1) {
    throw new InputError(`Chunk size must be a positive integer, got ${maxBytes}`);
  }
}

function stripBom(text: string): string {
  return text.startsWith(UTF8_BOM) ? text.slice(UTF8_BOM.length) : text;
}

/**
 * Derives the per-chunk byte cap from the symbol capacity
 *
 * @param sizing - Symbol capacity and the fraction reserved for the body
 * @returns Byte cap (defaults: 2953 * 0.8 = 2362)
 */
export function computeMaxChunkBytes(
  sizing: ChunkSizing = {
    maxPayloadBytes: DEFAULT_MAX_PAYLOAD_BYTES,
    safetyMargin: DEFAULT_SAFETY_MARGIN,
  }
): number {
  const cap = Math.floor(sizing.maxPayloadBytes * sizing.safetyMargin);
  assertValidCap(cap);
  return cap;
}

/**
 * Yields the lines of a string; each line keeps its terminating newline
 */
export function* iterateLines(content: string): Generator<string> {
  let start = 0;
  while (start < content.length) {
    const newline = content.indexOf(LINE_TERMINATOR, start);
    const end = newline === -1 ? content.length : newline + 1;
    yield content.slice(start, end);
    start = end;
  }
}

/**
 * Line accumulator shared by the in-memory and streaming splitters
 */
class ChunkAccumulator {
  private parts: string[] = [];
  private bytes = 0;

  constructor(private readonly maxBytes: number) {}

  /**
   * Adds a line; returns the completed chunk when the line did not fit
   */
  push(line: string): string | undefined {
    const lineBytes = utf8Length(line);
    let flushed: string | undefined;

    // An oversized line still goes in whole; it is never truncated
    if (this.bytes + lineBytes > this.maxBytes && this.parts.length > 0) {
      flushed = this.flush();
    }

    this.parts.push(line);
    this.bytes += lineBytes;
    return flushed;
  }

  flush(): string | undefined {
    if (this.parts.length === 0) return undefined;
    const chunk = this.parts.join('');
    this.parts = [];
    this.bytes = 0;
    return chunk;
  }
}

/**
 * Splits text into chunks of at most `maxBytes` UTF-8 bytes at line boundaries
 *
 * A single line larger than the cap becomes its own oversized chunk.
 *
 * @param content - Decoded file content
 * @param maxBytes - Per-chunk byte cap
 * @returns Chunk bodies in order; concatenated they equal `content`
 */
export function splitAtLineBoundaries(content: string, maxBytes: number): string[] {
  assertValidCap(maxBytes);

  const chunks: string[] = [];
  const accumulator = new ChunkAccumulator(maxBytes);

  for (const line of iterateLines(content)) {
    const completed = accumulator.push(line);
    if (completed !== undefined) chunks.push(completed);
  }

  const last = accumulator.flush();
  if (last !== undefined) chunks.push(last);

  return chunks;
}

/**
 * Streaming form of {@link splitAtLineBoundaries}: one forward pass over lines
 */
export async function* splitLinesStream(
  lines: AsyncIterable<string> | Iterable<string>,
  maxBytes: number
): AsyncGenerator<string> {
  assertValidCap(maxBytes);
  const accumulator = new ChunkAccumulator(maxBytes);

  for await (const line of lines) {
    const completed = accumulator.push(line);
    if (completed !== undefined) yield completed;
  }

  const last = accumulator.flush();
  if (last !== undefined) yield last;
}

/**
 * Reads a file as text: strips a UTF-8 BOM and replaces invalid bytes with U+FFFD
 */
export async function readFileContent(filePath: string): Promise<string> {
  const raw = await readFile(filePath);
  return stripBom(raw.toString('utf8'));
}

/**
 * Streams a file line by line without holding it in memory
 *
 * Decoding matches {@link readFileContent}: BOM stripped, invalid bytes replaced,
 * multi-byte characters split across reads are reassembled.
 */
export async function* readLines(
  filePath: string,
  highWaterMark: number = 1024 * 1024
): AsyncGenerator<string> {
  const decoder = new StringDecoder('utf8');
  let pending = '';
  let first = true;

  for await (const buffer of createReadStream(filePath, { highWaterMark })) {
    let text = decoder.write(Buffer.isBuffer(buffer) ? buffer : Buffer.from(String(buffer)));
    if (first && text.length > 0) {
      text = stripBom(text);
      first = false;
    }
    pending += text;

    let newline = pending.indexOf(LINE_TERMINATOR);
    while (newline !== -1) {
      yield pending.slice(0, newline + 1);
      pending = pending.slice(newline + 1);
      newline = pending.indexOf(LINE_TERMINATOR);
    }
  }

  let tail = decoder.end();
  if (first && tail.length > 0) tail = stripBom(tail);
  pending += tail;
  if (pending.length > 0) yield pending;
}

/**
 * Wraps ordered bodies as chunks with 1-based indices
 */
export function buildChunks(filename: string, bodies: string[]): Chunk[] {
  return bodies.map((body, i) => ({
    index: i + 1,
    total: bodies.length,
    filename,
    body,
  }));
}

/**
 * True when the chunk count is large enough to need operator confirmation
 */
export function exceedsCapacity(
  totalChunks: number,
  threshold: number = DEFAULT_CAPACITY_THRESHOLD
): boolean {
  return totalChunks > threshold;
}
