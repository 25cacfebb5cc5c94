/**
 * Transfer Generator
 *
 * Source file -> chunks -> framed records -> one chunk file per record.
 * Every input check runs before any chunk work starts.
 */

import { stat } from 'fs/promises';
import { basename, join, parse } from 'path';
import {
  buildChunks,
  computeMaxChunkBytes,
  exceedsCapacity,
  readFileContent,
  readLines,
  splitAtLineBoundaries,
  splitLinesStream,
} from '../chunking/index.js';
import { encodeChunk, formatPartNumber } from '../codec/index.js';
import type { EncodeContext } from '../codec/index.js';
import { validatePassword } from '../crypto/index.js';
import { encodeAllOrThrow } from '../encoding/index.js';
import { createFileHasher, fileHash } from '../integrity/index.js';
import { defaultSymbolOptions } from '../symbols/index.js';
import type { GenerateCallbacks, GenerateOptions, GenerateResult } from './orchestration.types.js';
import { InputError } from '../../utils/errors.js';
import { writeFileAtomic } from '../../utils/files.js';
import { createLogger } from '../../utils/logger.js';
import {
  CHUNK_FILE_EXTENSION,
  DEFAULT_CAPACITY_THRESHOLD,
  ENCRYPTED_STEM_SUFFIX,
  MAX_PARTS,
  PART_PREFIX,
  PART_SEPARATOR,
  STREAMING_THRESHOLD_BYTES,
} from '../../utils/constants.js';

/**
 * Name of the chunk file holding one record
 *
 * @example chunkFileName('notes.txt', 2, 12, false) // 'notes_part_02_of_12.txt'
 */
export function chunkFileName(
  filename: string,
  index: number,
  total: number,
  encrypted: boolean
): string {
  const stem = parse(filename).name + (encrypted ? ENCRYPTED_STEM_SUFFIX : '');
  return (
    `${stem}_${PART_PREFIX}${formatPartNumber(index)}` +
    `${PART_SEPARATOR}${formatPartNumber(total)}${CHUNK_FILE_EXTENSION}`
  );
}

/**
 * Resolves to the size of a readable regular file; throws `InputError` for
 * anything else
 */
export async function checkSourceFile(sourcePath: string): Promise<number> {
  try {
    const info = await stat(sourcePath);
    if (!info.isFile()) {
      throw new InputError(`Not a file: ${sourcePath}`);
    }
    return info.size;
  } catch (error) {
    if (error instanceof InputError) throw error;
    throw new InputError(`Source file not found: ${sourcePath}`, { cause: error });
  }
}

function buildEncodeContext(options: GenerateOptions, hash: string): EncodeContext {
  if (!options.encrypt) return { fileHash: hash };
  if (!options.crypto || options.password === undefined) {
    throw new InputError('Encryption requested but no crypto engine or password was provided');
  }
  return { fileHash: hash, encryption: { engine: options.crypto, password: options.password } };
}

interface SplitSource {
  bodies: string[];
  hash: string;
  bytes: number;
}

async function splitSource(sourcePath: string, size: number, maxBytes: number): Promise<SplitSource> {
  if (size <= STREAMING_THRESHOLD_BYTES) {
    const content = await readFileContent(sourcePath);
    return {
      bodies: splitAtLineBoundaries(content, maxBytes),
      hash: fileHash(content),
      bytes: Buffer.byteLength(content, 'utf8'),
    };
  }

  const hasher = createFileHasher();
  const bodies: string[] = [];
  for await (const body of splitLinesStream(readLines(sourcePath), maxBytes)) {
    hasher.update(body);
    bodies.push(body);
  }
  return { bodies, hash: hasher.digest(), bytes: hasher.bytes };
}

function imagePathFor(chunkPath: string, extension: string): string {
  return chunkPath.slice(0, -CHUNK_FILE_EXTENSION.length) + extension;
}

/**
 * Splits a file into chunk files ready for rendering
 */
export async function generateTransfer(
  options: GenerateOptions,
  callbacks?: GenerateCallbacks
): Promise<GenerateResult> {
  const logger = options.logger ?? createLogger('generate');
  const encrypted = options.encrypt ?? false;

  const size = await checkSourceFile(options.sourcePath);
  if (encrypted) {
    if (!options.crypto) {
      throw new InputError('Encryption requested but no crypto engine is available');
    }
    validatePassword(options.password ?? '');
  }

  const maxChunkBytes = options.maxChunkBytes ?? computeMaxChunkBytes(options.sizing);
  const filename = basename(options.sourcePath);

  callbacks?.onReadStart?.(options.sourcePath, size);
  const { bodies, hash, bytes } = await splitSource(options.sourcePath, size, maxChunkBytes);
  const chunks = buildChunks(filename, bodies);

  callbacks?.onChunksPlanned?.(chunks.length, maxChunkBytes);
  logger.debug(`${filename}: ${chunks.length} chunk(s), cap ${maxChunkBytes} bytes, hash ${hash}`);

  if (chunks.length === 0) {
    throw new InputError(`${filename} is empty; nothing to transfer`);
  }
  if (chunks.length > MAX_PARTS) {
    throw new InputError(
      `${filename} needs ${chunks.length} parts; at most ${MAX_PARTS} fit the record format`
    );
  }

  const oversized = chunks
    .filter((chunk) => Buffer.byteLength(chunk.body, 'utf8') > maxChunkBytes)
    .map((chunk) => chunk.index);
  if (oversized.length > 0) {
    logger.warn(
      `${filename}: part(s) ${oversized.join(', ')} hold a single line longer than ${maxChunkBytes} bytes`
    );
  }

  const threshold = options.capacityThreshold ?? DEFAULT_CAPACITY_THRESHOLD;
  if (exceedsCapacity(chunks.length, threshold)) {
    logger.warn(`${filename} needs ${chunks.length} codes (over ${threshold})`);
    if (callbacks?.confirmCapacity && !(await callbacks.confirmCapacity(chunks.length, threshold))) {
      return { status: 'cancelled', filename, totalChunks: chunks.length };
    }
  }

  const context = buildEncodeContext(options, hash);
  const records = await encodeAllOrThrow(chunks, (chunk) => encodeChunk(chunk, context), {
    concurrency: options.concurrency,
    parallelThreshold: options.parallelThreshold,
    signal: options.signal,
    onProgress: (completed, total) => callbacks?.onEncodeProgress?.(completed, total),
  });

  const { renderer } = options;
  const symbolOptions = options.symbolOptions ?? defaultSymbolOptions();
  const files: string[] = [];
  const images: string[] = [];
  for (const encoded of records) {
    const path = join(
      options.outputDir,
      chunkFileName(filename, encoded.index, chunks.length, encrypted)
    );
    await writeFileAtomic(path, encoded.text);
    files.push(path);
    callbacks?.onChunkWritten?.(path, encoded.index, chunks.length);

    if (renderer) {
      const imagePath = imagePathFor(path, renderer.extension);
      await writeFileAtomic(imagePath, await renderer.encodeSymbol(encoded.text, symbolOptions));
      images.push(imagePath);
      callbacks?.onImageWritten?.(imagePath, encoded.index, chunks.length);
    }
  }

  return {
    status: 'written',
    filename,
    fileHash: hash,
    encrypted,
    bytes,
    totalChunks: chunks.length,
    maxChunkBytes,
    oversized,
    files,
    images,
  };
}
