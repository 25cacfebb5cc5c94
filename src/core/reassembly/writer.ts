import { basename, join } from 'path';
import { pathExists, writeFileAtomic } from '../../utils/files.js';
import { InputError, OutputExistsError } from '../../utils/errors.js';

export interface WriteOptions {
  overwrite?: boolean;
}

/**
 * Writes verified content; refuses to replace an existing file unless told to
 */
export async function writeReconstructedFile(
  destination: string,
  content: string,
  options: WriteOptions = {}
): Promise<void> {
  if (!options.overwrite && (await pathExists(destination))) {
    throw new OutputExistsError(destination);
  }
  await writeFileAtomic(destination, content);
}

/**
 * Output path for a filename taken from the wire; directory parts are dropped
 */
export function resolveOutputPath(outputDir: string, filename: string): string {
  const name = basename(filename.replace(/\\/g, '/'));
  if (name === '' || name === '.' || name === '..') {
    throw new InputError(`Cannot derive an output filename from "${filename}"`);
  }
  return join(outputDir, name);
}
