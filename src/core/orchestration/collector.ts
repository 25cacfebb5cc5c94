import { readdir, readFile, stat } from 'fs/promises';
import { join } from 'path';
import { splitRecords } from '../codec/index.js';
import { Reassembler } from '../reassembly/index.js';
import type { CollectStats } from './orchestration.types.js';
import { InputError } from '../../utils/errors.js';
import { CHUNK_FILE_EXTENSION } from '../../utils/constants.js';

async function listChunkFiles(dir: string): Promise<string[]> {
  let entries: string[];
  try {
    const info = await stat(dir);
    if (!info.isDirectory()) {
      throw new InputError(`Not a directory: ${dir}`);
    }
    entries = await readdir(dir);
  } catch (error) {
    if (error instanceof InputError) throw error;
    throw new InputError(`Chunk directory not found: ${dir}`, { cause: error });
  }

  const files = entries
    .filter((name) => name.toLowerCase().endsWith(CHUNK_FILE_EXTENSION) && !name.startsWith('.'))
    .sort()
    .map((name) => join(dir, name));

  if (files.length === 0) {
    throw new InputError(`No ${CHUNK_FILE_EXTENSION} chunk files in ${dir}`);
  }
  return files;
}

/**
 * Feeds every chunk file of a directory into a reassembler
 *
 * A file may hold one record or several appended ones.
 */
export async function collectChunkDirectory(
  dir: string,
  reassembler: Reassembler = new Reassembler()
): Promise<{ reassembler: Reassembler; stats: CollectStats }> {
  const files = await listChunkFiles(dir);
  const stats: CollectStats = { files: files.length, records: 0, rejected: [] };

  for (const file of files) {
    const text = await readFile(file, 'utf-8');
    for (const piece of splitRecords(text)) {
      const outcome = reassembler.ingest(piece, file);
      if (outcome.ok) {
        stats.records++;
      } else {
        stats.rejected.push(outcome.error);
      }
    }
  }

  return { reassembler, stats };
}
