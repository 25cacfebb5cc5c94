/**
 * Orchestration Module
 * End-to-end generate, ingest and rebuild pipelines
 */

export { generateTransfer, chunkFileName, checkSourceFile } from './generator.js';
export { collectChunkDirectory } from './collector.js';
export {
  rebuildTransfer,
  writeVerifiedFiles,
  createReassembler,
  createDecryptionSession,
} from './rebuilder.js';
export { ingestSymbols, scannedChunkFileName } from './ingest.js';
export type {
  GenerateOptions,
  GenerateCallbacks,
  GeneratedTransfer,
  CancelledTransfer,
  GenerateResult,
  CollectStats,
  DecryptionOptions,
  RebuildOptions,
  WriteCallbacks,
  RebuildCallbacks,
  WriteSummary,
  WriteFailure,
  RebuildSummary,
  ScanStats,
  IngestOptions,
  IngestCallbacks,
  IncompleteFile,
  ScanReport,
  IngestResult,
} from './orchestration.types.js';
