/**
 * Reassembly Module
 *
 * Groups records by filename, verifies them and rebuilds file content.
 */

export { Reassembler } from './reassembler.js';
export { ReconstructionSet } from './reconstructionSet.js';
export { DecryptionSession, staticPassword } from './decryptionSession.js';
export { writeReconstructedFile, resolveOutputPath } from './writer.js';
export type { WriteOptions } from './writer.js';
export type {
  ReconstructionState,
  RecordEntry,
  AddOutcome,
  IngestOutcome,
  VerifiedFile,
  FailedFile,
  ReassemblyResult,
  ReassemblySummary,
  PasswordProvider,
  ReassemblerOptions,
  DecryptionSessionOptions,
} from './reassembly.types.js';
