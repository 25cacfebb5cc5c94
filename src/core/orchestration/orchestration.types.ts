/**
 * Orchestration Domain Types
 */

import type { ChunkSizing } from '../chunking/index.js';
import type { CryptoEngineLike } from '../crypto/index.js';
import type {
  FailedFile,
  PasswordProvider,
  ReassemblySummary,
  VerifiedFile,
} from '../reassembly/index.js';
import type { SymbolEncoder, SymbolOptions } from '../symbols/index.js';
import type { FormatError } from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';

// ============================================================================
// Generate
// ============================================================================

export interface GenerateOptions {
  /** File to split */
  sourcePath: string;
  /** Directory that receives one `.txt` file per record */
  outputDir: string;
  /** Encrypt every chunk body */
  encrypt?: boolean;
  /** Required when `encrypt` is set; never stored */
  password?: string;
  /** Required when `encrypt` is set */
  crypto?: CryptoEngineLike;
  /** Symbol capacity and margin (default 2953 * 0.8) */
  sizing?: ChunkSizing;
  /** Explicit byte cap; wins over `sizing` */
  maxChunkBytes?: number;
  /** Chunk count above which confirmation is asked (default 100) */
  capacityThreshold?: number;
  /** Worker count (default min(8, cores + 2)) */
  concurrency?: number;
  /** Chunk counts at or below this are encoded sequentially (default 3) */
  parallelThreshold?: number;
  /** Renders each record to an image written beside its chunk file */
  renderer?: SymbolEncoder;
  /** Passed to `renderer` (default box 10, border 4, level L) */
  symbolOptions?: SymbolOptions;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface GenerateCallbacks {
  onReadStart?: (sourcePath: string, bytes: number) => void;
  onChunksPlanned?: (total: number, maxChunkBytes: number) => void;
  /** Asked when the chunk count is over the threshold; false cancels */
  confirmCapacity?: (total: number, threshold: number) => Promise<boolean>;
  onEncodeProgress?: (completed: number, total: number) => void;
  onChunkWritten?: (path: string, index: number, total: number) => void;
  onImageWritten?: (path: string, index: number, total: number) => void;
}

export interface GeneratedTransfer {
  status: 'written';
  filename: string;
  fileHash: string;
  encrypted: boolean;
  /** UTF-8 size of the decoded content */
  bytes: number;
  totalChunks: number;
  maxChunkBytes: number;
  /** Indices of chunks larger than the cap (a single over-long line) */
  oversized: number[];
  /** Written chunk files in index order */
  files: string[];
  /** Rendered images in index order; empty without a renderer */
  images: string[];
}

export interface CancelledTransfer {
  status: 'cancelled';
  filename: string;
  totalChunks: number;
}

export type GenerateResult = GeneratedTransfer | CancelledTransfer;

// ============================================================================
// Rebuild
// ============================================================================

export interface CollectStats {
  /** `.txt` files read */
  files: number;
  /** Records accepted into the reassembler */
  records: number;
  /** Texts that did not parse */
  rejected: FormatError[];
}

export interface DecryptionOptions {
  crypto?: CryptoEngineLike;
  passwordProvider?: PasswordProvider;
  /** Password prompts before giving up (default 3) */
  maxPasswordAttempts?: number;
}

export interface RebuildOptions extends DecryptionOptions {
  chunkDir: string;
  outputDir: string;
  /** Verify only; write nothing */
  verifyOnly?: boolean;
  /** Replace existing outputs without asking */
  force?: boolean;
  logger?: Logger;
}

export interface WriteCallbacks {
  /** Asked when a destination exists and `force` is off; false skips it */
  confirmOverwrite?: (path: string) => Promise<boolean>;
  onFileWritten?: (path: string, file: VerifiedFile) => void;
  onFileSkipped?: (path: string, file: VerifiedFile) => void;
  onFileWriteFailed?: (failure: WriteFailure) => void;
}

export interface RebuildCallbacks extends WriteCallbacks {
  onCollected?: (stats: CollectStats, filenames: string[]) => void;
  onFileVerified?: (file: VerifiedFile) => void;
  onFileFailed?: (file: FailedFile) => void;
}

/**
 * A verified file that could not be written; the others still are
 */
export interface WriteFailure {
  filename: string;
  /** Absent when no output path could be derived from the filename */
  path?: string;
  error: Error;
}

export interface WriteSummary {
  written: string[];
  skipped: string[];
  writeFailed: WriteFailure[];
}

export interface RebuildSummary extends ReassemblySummary, WriteSummary {
  collected: CollectStats;
}

// ============================================================================
// Ingest
// ============================================================================

export interface ScanStats {
  sourcesProcessed: number;
  symbolsFound: number;
  validRecords: number;
  errors: number;
}

export interface IngestOptions extends DecryptionOptions {
  /** Directory for the scanned chunk files and the scan report */
  outputDir: string;
  /** Reassemble complete files right after scanning */
  autoReconstruct?: boolean;
  /** Replace existing reconstructed files without asking */
  force?: boolean;
  logger?: Logger;
}

export interface IngestCallbacks extends WriteCallbacks {
  onSourceStart?: (source: string, current: number, total: number) => void;
  onSourceFailed?: (source: string, error: Error) => void;
  onFileComplete?: (filename: string, total: number) => void;
  onFileIncomplete?: (filename: string, missing: number[], total: number) => void;
}

export interface IncompleteFile {
  filename: string;
  total: number;
  missing: number[];
}

export interface ScanReport {
  scanSummary: ScanStats;
  filesFound: Record<string, { totalParts: number; parts: number[]; estimatedSize: number }>;
  incompleteFiles: Record<string, { totalParts: number; missing: number[] }>;
  timestamp: string;
}

export interface IngestResult {
  stats: ScanStats;
  complete: string[];
  incomplete: IncompleteFile[];
  /** Chunk files written for complete files */
  savedChunks: string[];
  reportPath: string;
  /** Present when auto-reconstruction ran */
  reconstruction?: ReassemblySummary & WriteSummary;
}
