/**
 * Reassembler
 *
 * Collects wire records in any order and from any source, groups them by
 * filename, and turns each complete group into verified file content.
 *
 * Per file: missing parts, metadata conflicts, a bad chunk hash or a bad file
 * hash fail that file only. Nothing partial is ever returned as content.
 */

import type { WireRecord } from '../codec/codec.types.js';
import type { CryptoEngineLike } from '../crypto/crypto.types.js';
import type {
  AddOutcome,
  FailedFile,
  IngestOutcome,
  ReassemblerOptions,
  ReassemblyResult,
  ReassemblySummary,
  ReconstructionState,
  VerifiedFile,
} from './reassembly.types.js';
import { ReconstructionSet } from './reconstructionSet.js';
import { DecryptionSession } from './decryptionSession.js';
import { tryParseRecord } from '../codec/recordParser.js';
import { chunkHash, fileHash } from '../integrity/hasher.js';
import {
  ChunkIntegrityError,
  FileIntegrityError,
  InputError,
  MissingPartsError,
  isTransferError,
} from '../../utils/errors.js';
import { createLogger, type Logger } from '../../utils/logger.js';

export class Reassembler {
  private readonly sets = new Map<string, ReconstructionSet>();
  private readonly crypto: CryptoEngineLike | undefined;
  private readonly logger: Logger;

  constructor(options: ReassemblerOptions = {}) {
    this.crypto = options.crypto;
    this.logger = options.logger ?? createLogger('reassembler');
  }

  /**
   * Parses and adds one record text; unparseable text is logged and skipped
   */
  ingest(text: string, source: string): IngestOutcome {
    const parsed = tryParseRecord(text);
    if (!parsed.ok) {
      this.logger.warn(`Skipping unusable record from ${source}: ${parsed.error.message}`);
      return { ok: false, source, error: parsed.error };
    }
    return { ok: true, record: parsed.record, outcome: this.add(parsed.record, source) };
  }

  add(record: WireRecord, source: string): AddOutcome {
    let set = this.sets.get(record.filename);
    if (!set) {
      set = new ReconstructionSet(record.filename);
      this.sets.set(record.filename, set);
    }

    const outcome = set.add(record, source);

    switch (outcome) {
      case 'replaced':
        this.logger.warn(
          `${record.filename}: duplicate part ${record.index} from ${source} replaces the earlier copy`
        );
        break;
      case 'extra':
        this.logger.warn(
          `${record.filename}: extra part ${record.index} beyond declared total ${set.total} ignored (${source})`
        );
        break;
      case 'conflict':
        this.logger.warn(`${set.conflicts[set.conflicts.length - 1].message} (${source})`);
        break;
      case 'added':
        this.logger.debug(`${record.filename}: part ${record.index}/${record.total} from ${source}`);
        break;
    }

    return outcome;
  }

  /**
   * Filenames seen so far, sorted
   */
  filenames(): string[] {
    return [...this.sets.keys()].sort();
  }

  get(filename: string): ReconstructionSet | undefined {
    return this.sets.get(filename);
  }

  status(filename: string): ReconstructionState | undefined {
    return this.sets.get(filename)?.state;
  }

  missingParts(filename: string): number[] {
    return this.sets.get(filename)?.missingParts() ?? [];
  }

  hasEncryptedRecords(): boolean {
    return [...this.sets.values()].some((set) => set.encrypted);
  }

  /**
   * Forgets a filename once its result has been written or reported
   */
  discard(filename: string): void {
    this.sets.delete(filename);
  }

  /**
   * Verifies and concatenates one file
   *
   * @param session - Password holder shared by every file of the run
   */
  async reassemble(filename: string, session: DecryptionSession): Promise<ReassemblyResult> {
    const set = this.sets.get(filename);
    if (!set) {
      return { status: 'failed', filename, error: new InputError(`No records for ${filename}`) };
    }

    try {
      const verified = await this.verify(set, session);
      set.markOutcome('verified');
      return verified;
    } catch (error) {
      if (!isTransferError(error)) throw error;
      set.markOutcome('failed');
      this.logger.debug(`${filename}: ${error.message}`);
      return { status: 'failed', filename, error };
    }
  }

  /**
   * Reassembles every filename; one file failing does not stop the others
   */
  async reassembleAll(session: DecryptionSession): Promise<ReassemblySummary> {
    const results: ReassemblyResult[] = [];
    for (const filename of this.filenames()) {
      results.push(await this.reassemble(filename, session));
    }

    return {
      results,
      verified: results.filter((r): r is VerifiedFile => r.status === 'verified'),
      failed: results.filter((r): r is FailedFile => r.status === 'failed'),
    };
  }

  private async verify(set: ReconstructionSet, session: DecryptionSession): Promise<VerifiedFile> {
    const [conflict] = set.conflicts;
    if (conflict) throw conflict;

    const missing = set.missingParts();
    if (missing.length > 0) {
      throw new MissingPartsError(set.filename, missing, set.total);
    }

    const bodies: string[] = [];
    for (const { record } of set.orderedEntries()) {
      const body = await this.plaintextOf(record, session);
      const actual = chunkHash(body);
      if (actual !== record.chunkHash) {
        throw new ChunkIntegrityError(set.filename, record.index, record.chunkHash, actual);
      }
      bodies.push(body);
    }

    const content = bodies.join('');
    const expected = set.fileHash ?? '';
    const actual = fileHash(content);
    if (actual !== expected) {
      throw new FileIntegrityError(set.filename, expected, actual);
    }

    return {
      status: 'verified',
      filename: set.filename,
      content,
      fileHash: actual,
      total: set.total,
      encrypted: set.encrypted,
      bytes: Buffer.byteLength(content, 'utf8'),
    };
  }

  private async plaintextOf(record: WireRecord, session: DecryptionSession): Promise<string> {
    if (record.kind === 'plain') return record.payload;

    if (!this.crypto) {
      throw new InputError(
        `${record.filename} is encrypted but no crypto engine is available to decrypt it`
      );
    }
    return session.decrypt(this.crypto, record);
  }
}
