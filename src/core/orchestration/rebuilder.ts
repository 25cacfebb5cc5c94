/**
 * Transfer Rebuilder
 *
 * Chunk directory -> verified files. Each file is judged on its own; only
 * files whose every chunk hash and whole-file hash match are written.
 */

import { CryptoEngine } from '../crypto/index.js';
import {
  DecryptionSession,
  Reassembler,
  resolveOutputPath,
  writeReconstructedFile,
} from '../reassembly/index.js';
import type { VerifiedFile } from '../reassembly/index.js';
import { collectChunkDirectory } from './collector.js';
import type {
  DecryptionOptions,
  RebuildCallbacks,
  RebuildOptions,
  RebuildSummary,
  WriteCallbacks,
  WriteFailure,
  WriteSummary,
} from './orchestration.types.js';
import { pathExists } from '../../utils/files.js';
import { createLogger, type Logger } from '../../utils/logger.js';

export function createReassembler(options: DecryptionOptions, logger?: Logger): Reassembler {
  return new Reassembler({ crypto: options.crypto ?? new CryptoEngine(), logger });
}

export function createDecryptionSession(
  options: DecryptionOptions,
  logger?: Logger
): DecryptionSession {
  return new DecryptionSession(options.passwordProvider, {
    maxAttempts: options.maxPasswordAttempts,
    logger,
  });
}

/**
 * Writes verified files into a directory, asking before replacing anything
 * unless `force` is set. A file that cannot be written is reported in
 * `writeFailed` and the rest are still written.
 */
export async function writeVerifiedFiles(
  files: readonly VerifiedFile[],
  outputDir: string,
  force: boolean,
  callbacks?: WriteCallbacks,
  logger: Logger = createLogger('write')
): Promise<WriteSummary> {
  const summary: WriteSummary = { written: [], skipped: [], writeFailed: [] };

  const recordFailure = (file: VerifiedFile, error: unknown, path?: string): void => {
    const failure: WriteFailure = {
      filename: file.filename,
      path,
      error: error instanceof Error ? error : new Error(String(error)),
    };
    logger.warn(`Could not write ${path ?? file.filename}: ${failure.error.message}`);
    summary.writeFailed.push(failure);
    callbacks?.onFileWriteFailed?.(failure);
  };

  for (const file of files) {
    let destination: string;
    try {
      destination = resolveOutputPath(outputDir, file.filename);
    } catch (error) {
      recordFailure(file, error);
      continue;
    }

    let overwrite = force;
    if (!overwrite && (await pathExists(destination))) {
      overwrite = (await callbacks?.confirmOverwrite?.(destination)) ?? false;
      if (!overwrite) {
        summary.skipped.push(destination);
        callbacks?.onFileSkipped?.(destination, file);
        continue;
      }
    }

    try {
      await writeReconstructedFile(destination, file.content, { overwrite });
    } catch (error) {
      recordFailure(file, error, destination);
      continue;
    }
    summary.written.push(destination);
    callbacks?.onFileWritten?.(destination, file);
  }

  return summary;
}

/**
 * Reassembles every file found in a chunk directory
 */
export async function rebuildTransfer(
  options: RebuildOptions,
  callbacks?: RebuildCallbacks
): Promise<RebuildSummary> {
  const logger = options.logger ?? createLogger('rebuild');
  const { reassembler, stats } = await collectChunkDirectory(
    options.chunkDir,
    createReassembler(options, options.logger)
  );
  const filenames = reassembler.filenames();
  callbacks?.onCollected?.(stats, filenames);
  logger.debug(`Collected ${stats.records} record(s) for ${filenames.length} file(s)`);

  const session = createDecryptionSession(options, options.logger);
  try {
    const summary = await reassembler.reassembleAll(session);

    for (const result of summary.results) {
      if (result.status === 'verified') {
        callbacks?.onFileVerified?.(result);
      } else {
        callbacks?.onFileFailed?.(result);
      }
      reassembler.discard(result.filename);
    }

    const written: WriteSummary = options.verifyOnly
      ? { written: [], skipped: [], writeFailed: [] }
      : await writeVerifiedFiles(
          summary.verified,
          options.outputDir,
          options.force ?? false,
          callbacks,
          logger
        );

    return { ...summary, ...written, collected: stats };
  } finally {
    session.close();
  }
}
