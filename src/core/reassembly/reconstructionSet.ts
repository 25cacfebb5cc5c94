import type { RecordKind, WireRecord } from '../codec/codec.types.js';
import type { AddOutcome, RecordEntry, ReconstructionState } from './reassembly.types.js';
import { InconsistentMetadataError } from '../../utils/errors.js';

interface Declaration {
  total: number;
  fileHash: string;
  kind: RecordKind;
}

/**
 * Records collected for one filename, keyed by part index
 *
 * The first record fixes the declared total, file hash and encryption kind;
 * later records that disagree are kept out and reported as conflicts.
 */
export class ReconstructionSet {
  private readonly parts = new Map<number, RecordEntry>();
  private readonly extraEntries: RecordEntry[] = [];
  private readonly conflictErrors: InconsistentMetadataError[] = [];
  private declaration: Declaration | undefined;
  private outcome: 'verified' | 'failed' | undefined;

  constructor(readonly filename: string) {}

  add(record: WireRecord, source: string): AddOutcome {
    const declared = this.declare(record);
    const conflict = this.findConflict(declared, record);
    if (conflict) {
      this.conflictErrors.push(conflict);
      return 'conflict';
    }

    // New data re-opens a set that was already judged
    this.outcome = undefined;

    if (record.index > declared.total) {
      this.extraEntries.push({ record, source });
      return 'extra';
    }

    const replaced = this.parts.has(record.index);
    this.parts.set(record.index, { record, source });
    return replaced ? 'replaced' : 'added';
  }

  private declare(record: WireRecord): Declaration {
    if (!this.declaration) {
      this.declaration = { total: record.total, fileHash: record.fileHash, kind: record.kind };
    }
    return this.declaration;
  }

  private findConflict(
    declared: Declaration,
    record: WireRecord
  ): InconsistentMetadataError | undefined {
    if (record.total !== declared.total) {
      return new InconsistentMetadataError(
        this.filename,
        'total',
        String(declared.total),
        String(record.total),
        record.index
      );
    }
    if (record.fileHash !== declared.fileHash) {
      return new InconsistentMetadataError(
        this.filename,
        'file_hash',
        declared.fileHash,
        record.fileHash,
        record.index
      );
    }
    if (record.kind !== declared.kind) {
      return new InconsistentMetadataError(
        this.filename,
        'encrypted',
        String(declared.kind === 'encrypted'),
        String(record.kind === 'encrypted'),
        record.index
      );
    }
    return undefined;
  }

  get total(): number {
    return this.declaration?.total ?? 0;
  }

  get fileHash(): string | undefined {
    return this.declaration?.fileHash;
  }

  get encrypted(): boolean {
    return this.declaration?.kind === 'encrypted';
  }

  get conflicts(): readonly InconsistentMetadataError[] {
    return this.conflictErrors;
  }

  get extras(): readonly RecordEntry[] {
    return this.extraEntries;
  }

  /**
   * Indices in 1..total with no record, ascending
   */
  missingParts(): number[] {
    const missing: number[] = [];
    for (let index = 1; index <= this.total; index++) {
      if (!this.parts.has(index)) missing.push(index);
    }
    return missing;
  }

  presentParts(): number[] {
    return [...this.parts.keys()].sort((a, b) => a - b);
  }

  isComplete(): boolean {
    return this.total > 0 && this.parts.size === this.total;
  }

  get state(): ReconstructionState {
    if (this.outcome) return this.outcome;
    return this.isComplete() ? 'complete' : 'collecting';
  }

  markOutcome(outcome: 'verified' | 'failed'): void {
    this.outcome = outcome;
  }

  /**
   * Entries for 1..total in order; only meaningful once complete
   */
  orderedEntries(): RecordEntry[] {
    const entries: RecordEntry[] = [];
    for (let index = 1; index <= this.total; index++) {
      const entry = this.parts.get(index);
      if (entry) entries.push(entry);
    }
    return entries;
  }
}
