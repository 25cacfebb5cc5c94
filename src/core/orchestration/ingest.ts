/**
 * Symbol Ingestion
 *
 * Scanned sources -> records grouped per file -> chunk files and a scan
 * report, optionally followed by reconstruction of every complete file.
 */

import { join, parse } from 'path';
import { formatRecord } from '../codec/index.js';
import type { SymbolDecoder } from '../symbols/index.js';
import { createDecryptionSession, createReassembler, writeVerifiedFiles } from './rebuilder.js';
import type {
  IncompleteFile,
  IngestCallbacks,
  IngestOptions,
  IngestResult,
  ScanReport,
  ScanStats,
} from './orchestration.types.js';
import type { FailedFile, ReassemblyResult, VerifiedFile } from '../reassembly/index.js';
import { formatError } from '../../utils/errors.js';
import { writeFileAtomic } from '../../utils/files.js';
import { createLogger } from '../../utils/logger.js';
import {
  CHUNK_FILE_EXTENSION,
  SCAN_REPORT_FILENAME,
  SCANNED_CHUNK_INFIX,
  SCANNED_CHUNK_NUMBER_WIDTH,
} from '../../utils/constants.js';

/**
 * @example scannedChunkFileName('notes.txt', 7) // 'notes_chunk_007.txt'
 */
export function scannedChunkFileName(filename: string, index: number): string {
  const number = String(index).padStart(SCANNED_CHUNK_NUMBER_WIDTH, '0');
  return `${parse(filename).name}${SCANNED_CHUNK_INFIX}${number}${CHUNK_FILE_EXTENSION}`;
}

/**
 * Decodes every source and saves what was found
 */
export async function ingestSymbols(
  sources: readonly string[],
  decoder: SymbolDecoder,
  options: IngestOptions,
  callbacks?: IngestCallbacks
): Promise<IngestResult> {
  const logger = options.logger ?? createLogger('ingest');
  const reassembler = createReassembler(options, options.logger);
  const stats: ScanStats = { sourcesProcessed: 0, symbolsFound: 0, validRecords: 0, errors: 0 };

  for (const [position, source] of sources.entries()) {
    callbacks?.onSourceStart?.(source, position + 1, sources.length);

    let symbols: string[];
    try {
      symbols = await decoder.decodeSymbols(source);
    } catch (error) {
      stats.errors++;
      logger.warn(`Could not decode ${source}: ${formatError(error)}`);
      callbacks?.onSourceFailed?.(source, error instanceof Error ? error : new Error(String(error)));
      continue;
    }

    stats.sourcesProcessed++;
    stats.symbolsFound += symbols.length;
    for (const symbol of symbols) {
      if (reassembler.ingest(symbol, source).ok) {
        stats.validRecords++;
      } else {
        stats.errors++;
      }
    }
  }

  const report: ScanReport = {
    scanSummary: stats,
    filesFound: {},
    incompleteFiles: {},
    timestamp: new Date().toISOString(),
  };
  const complete: string[] = [];
  const incomplete: IncompleteFile[] = [];
  const savedChunks: string[] = [];

  for (const filename of reassembler.filenames()) {
    const set = reassembler.get(filename);
    if (!set) continue;

    if (!set.isComplete()) {
      const missing = set.missingParts();
      incomplete.push({ filename, total: set.total, missing });
      report.incompleteFiles[filename] = { totalParts: set.total, missing };
      logger.warn(`${filename}: missing parts [${missing.join(', ')}] of ${set.total}`);
      callbacks?.onFileIncomplete?.(filename, missing, set.total);
      continue;
    }

    let estimatedSize = 0;
    for (const { record } of set.orderedEntries()) {
      const path = join(options.outputDir, scannedChunkFileName(filename, record.index));
      await writeFileAtomic(path, formatRecord(record));
      savedChunks.push(path);
      estimatedSize += Buffer.byteLength(record.payload, 'utf8');
    }

    complete.push(filename);
    report.filesFound[filename] = {
      totalParts: set.total,
      parts: set.presentParts(),
      estimatedSize,
    };
    callbacks?.onFileComplete?.(filename, set.total);
  }

  const reportPath = join(options.outputDir, SCAN_REPORT_FILENAME);
  await writeFileAtomic(reportPath, JSON.stringify(report, null, 2));
  logger.debug(`Scan report written to ${reportPath}`);

  const result: IngestResult = { stats, complete, incomplete, savedChunks, reportPath };
  if (!options.autoReconstruct || complete.length === 0) {
    return result;
  }

  const session = createDecryptionSession(options, options.logger);
  try {
    const results: ReassemblyResult[] = [];
    for (const filename of complete) {
      results.push(await reassembler.reassemble(filename, session));
    }
    const verified = results.filter((r): r is VerifiedFile => r.status === 'verified');
    const failed = results.filter((r): r is FailedFile => r.status === 'failed');
    for (const failure of failed) {
      logger.warn(`Reconstruction failed: ${formatError(failure.error)}`);
    }

    const written = await writeVerifiedFiles(
      verified,
      options.outputDir,
      options.force ?? false,
      callbacks,
      logger
    );
    return { ...result, reconstruction: { results, verified, failed, ...written } };
  } finally {
    session.close();
  }
}
