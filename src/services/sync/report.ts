import type { DuplicateOrigin } from "./dedup.js";
import type { MappingNote, RequiredField } from "./field-mapping.js";

// ============================================================================
// Types
// ============================================================================

export type SkipEntry =
  | {
      kind: "MISSING_REQUIRED_FIELD";
      recordId: string;
      reason: string;
      missing: RequiredField[];
    }
  | {
      kind: "DUPLICATE_PUBLICATION";
      recordId: string;
      reason: string;
      origin: DuplicateOrigin;
    };

export interface MappingGap {
  recordId: string;
  field: string;
  value: string;
}

export interface SyncWarning {
  kind: "UNFORMATTABLE_AUTHOR_NAME";
  recordId: string;
  field: string;
  value: string;
}

export interface SyncReport {
  readonly processed: number;
  /** New rows found; equals `inserted` unless this was a dry run */
  readonly accepted: number;
  readonly inserted: number;
  readonly skippedDuplicate: number;
  readonly skippedInvalid: number;
  readonly skips: readonly SkipEntry[];
  readonly mappingGaps: readonly MappingGap[];
  readonly warnings: readonly SyncWarning[];
  readonly rowsBefore: number;
  readonly rowsAfter: number;
  readonly firstPubId: number | null;
  readonly lastPubId: number | null;
  readonly dryRun: boolean;
  readonly startedAt: string;
  readonly finishedAt: string;
}

// ============================================================================
// Report Builder
// ============================================================================

/**
 * Accumulates counts during a run; `complete()` returns the frozen report.
 */
export class SyncReportBuilder {
  private processed = 0;
  private readonly acceptedIds: number[] = [];
  private skippedDuplicate = 0;
  private skippedInvalid = 0;
  private readonly skips: SkipEntry[] = [];
  private readonly mappingGaps: MappingGap[] = [];
  private readonly warnings: SyncWarning[] = [];
  private rowsBefore = 0;
  private readonly startedAt: Date;

  constructor(private readonly dryRun: boolean, now: Date = new Date()) {
    this.startedAt = now;
  }

  setRowsBefore(count: number): void {
    this.rowsBefore = count;
  }

  recordProcessed(): void {
    this.processed++;
  }

  recordAccepted(pubId: number): void {
    this.acceptedIds.push(pubId);
  }

  recordInvalid(recordId: string, missing: RequiredField[]): void {
    this.skippedInvalid++;
    this.skips.push({
      kind: "MISSING_REQUIRED_FIELD",
      recordId,
      reason: `Missing required field(s): ${missing.join(", ")}`,
      missing,
    });
  }

  recordDuplicate(
    recordId: string,
    title: string,
    year: number,
    origin: DuplicateOrigin
  ): void {
    const publication = `"${title}" (${String(year)})`;
    this.skippedDuplicate++;
    this.skips.push({
      kind: "DUPLICATE_PUBLICATION",
      recordId,
      reason:
        origin === "CRISTIN"
          ? `Already in Cristin: ${publication}`
          : `Duplicate of an earlier staging record: ${publication}`,
      origin,
    });
  }

  recordNotes(recordId: string, notes: readonly MappingNote[]): void {
    for (const note of notes) {
      switch (note.kind) {
        case "UNRECOGNIZED_LANGUAGE_CODE":
          this.mappingGaps.push({
            recordId,
            field: note.field,
            value: note.value,
          });
          break;
        case "UNFORMATTABLE_AUTHOR_NAME":
          this.warnings.push({
            kind: note.kind,
            recordId,
            field: note.field,
            value: note.value,
          });
          break;
      }
    }
  }

  complete(rowsAfter: number, now: Date = new Date()): SyncReport {
    const report: SyncReport = {
      processed: this.processed,
      accepted: this.acceptedIds.length,
      inserted: this.dryRun ? 0 : this.acceptedIds.length,
      skippedDuplicate: this.skippedDuplicate,
      skippedInvalid: this.skippedInvalid,
      skips: Object.freeze([...this.skips]),
      mappingGaps: Object.freeze([...this.mappingGaps]),
      warnings: Object.freeze([...this.warnings]),
      rowsBefore: this.rowsBefore,
      rowsAfter,
      firstPubId: this.acceptedIds[0] ?? null,
      lastPubId: this.acceptedIds.at(-1) ?? null,
      dryRun: this.dryRun,
      startedAt: this.startedAt.toISOString(),
      finishedAt: now.toISOString(),
    };
    return Object.freeze(report);
  }
}
