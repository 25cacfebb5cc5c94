/**
 * File system helpers
 */

import { randomBytes } from 'crypto';
import { access, mkdir, rename, rm, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';

export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Writes through a temporary sibling file and renames it into place, so the
 * destination never holds a half-written file
 */
export async function writeFileAtomic(
  destination: string,
  content: string | Uint8Array
): Promise<void> {
  const dir = dirname(destination);
  await mkdir(dir, { recursive: true });

  const temp = join(dir, `.${basename(destination)}.${randomBytes(6).toString('hex')}.tmp`);
  try {
    await writeFile(temp, content, 'utf-8');
    await rename(temp, destination);
  } catch (error) {
    await rm(temp, { force: true });
    throw error;
  }
}
