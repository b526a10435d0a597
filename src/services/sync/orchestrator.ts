import { DEFAULT_REGISTRATION_BASE_URL } from "../../config.js";
import {
  PersistenceError,
  SourceUnavailableError,
  SyncAbortedError,
  TargetUnavailableError,
  errorMessage,
} from "../../errors.js";
import { syncLogger } from "../../logger.js";
import { AuthorNameFormatter } from "./authors.js";
import { Deduplicator, type IdentityKey } from "./dedup.js";
import { IdAllocator } from "./id-allocator.js";
import { LanguageCodeResolver } from "./language.js";
import { SchemaMapper } from "./mapper.js";
import { SyncReportBuilder, type SyncReport } from "./report.js";

import type { NewCristinRow } from "../../db/schema.js";
import type { StagingRecord } from "./field-path.js";

// ============================================================================
// Types
// ============================================================================

/** Read access to the harvested NVA records */
export interface StagingSource {
  loadRecords(): Promise<StagingRecord[]>;
}

/** Read/write access to the Cristin publication table */
export interface CristinTarget {
  loadIdentityKeys(): Promise<IdentityKey[]>;
  maxPubId(): Promise<number>;
  countRows(): Promise<number>;
  /** Persist every row or none of them */
  insertRows(rows: readonly NewCristinRow[]): Promise<void>;
}

export type SyncState =
  | "INIT"
  | "LOADING"
  | "MAPPING"
  | "WRITING"
  | "REPORTED"
  | "FAILED";

const TRANSITIONS: Readonly<Record<SyncState, readonly SyncState[]>> = {
  INIT: ["LOADING", "FAILED"],
  LOADING: ["MAPPING", "FAILED"],
  MAPPING: ["WRITING", "FAILED"],
  WRITING: ["REPORTED", "FAILED"],
  REPORTED: [],
  FAILED: [],
};

export interface SyncProgress {
  phase: SyncState;
  current: number;
  total: number;
  currentItem?: string;
}

export interface SyncOptions {
  /** Map and deduplicate without writing to Cristin */
  dryRun?: boolean;
  registrationBaseUrl?: string;
  /** Honored until WRITING starts; after that the write runs to completion */
  signal?: AbortSignal;
  onProgress?: (progress: SyncProgress) => void;
  onStateChange?: (state: SyncState, previous: SyncState) => void;
}

interface RunContext {
  rowsBefore: number;
  mapper: SchemaMapper;
  deduplicator: Deduplicator;
  allocator: IdAllocator;
  report: SyncReportBuilder;
}

// ============================================================================
// Sync Orchestrator
// ============================================================================

/**
 * One NVA → Cristin merge pass.
 *
 * INIT → LOADING → MAPPING → WRITING → REPORTED, or FAILED from any of the
 * non-terminal states. Allocator and deduplicator are seeded from Cristin at
 * INIT and discarded with the instance, so each run uses a fresh snapshot.
 */
export class SyncOrchestrator {
  private currentState: SyncState = "INIT";
  private started = false;

  constructor(
    private readonly source: StagingSource,
    private readonly target: CristinTarget,
    private readonly options: SyncOptions = {}
  ) {}

  get state(): SyncState {
    return this.currentState;
  }

  async run(): Promise<SyncReport> {
    if (this.started) {
      throw new Error("A SyncOrchestrator can only run once");
    }
    this.started = true;

    try {
      const context = await this.initialize();

      this.transition("LOADING");
      const records = await this.load();

      this.transition("MAPPING");
      const pending = this.mapRecords(records, context);

      this.throwIfAborted();
      this.transition("WRITING");
      const rowsAfter = await this.write(pending, context.rowsBefore);

      const report = context.report.complete(rowsAfter);
      this.transition("REPORTED");

      syncLogger.info(
        {
          processed: report.processed,
          inserted: report.inserted,
          skippedDuplicate: report.skippedDuplicate,
          skippedInvalid: report.skippedInvalid,
          mappingGaps: report.mappingGaps.length,
          rowsBefore: report.rowsBefore,
          rowsAfter: report.rowsAfter,
          dryRun: report.dryRun,
        },
        "NVA to Cristin sync completed"
      );
      return report;
    } catch (error) {
      syncLogger.error(
        { state: this.currentState, error: errorMessage(error) },
        "NVA to Cristin sync failed"
      );
      if (TRANSITIONS[this.currentState].includes("FAILED")) {
        this.transition("FAILED");
      }
      throw error;
    }
  }

  // ==========================================================================
  // Phases
  // ==========================================================================

  private async initialize(): Promise<RunContext> {
    this.throwIfAborted();
    const report = new SyncReportBuilder(this.options.dryRun === true);

    let maxPubId: number;
    let identityKeys: IdentityKey[];
    let rowsBefore: number;
    try {
      [maxPubId, identityKeys, rowsBefore] = await Promise.all([
        this.target.maxPubId(),
        this.target.loadIdentityKeys(),
        this.target.countRows(),
      ]);
    } catch (error) {
      throw new TargetUnavailableError(
        `Cannot read Cristin state: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    report.setRowsBefore(rowsBefore);
    syncLogger.info(
      { maxPubId, existingKeys: identityKeys.length, rowsBefore },
      "Seeded from Cristin"
    );

    return {
      rowsBefore,
      mapper: new SchemaMapper({
        registrationBaseUrl:
          this.options.registrationBaseUrl ?? DEFAULT_REGISTRATION_BASE_URL,
        languages: new LanguageCodeResolver(),
        authors: new AuthorNameFormatter(),
      }),
      deduplicator: new Deduplicator(identityKeys),
      allocator: new IdAllocator(maxPubId),
      report,
    };
  }

  private async load(): Promise<StagingRecord[]> {
    let records: StagingRecord[];
    try {
      records = await this.source.loadRecords();
    } catch (error) {
      if (error instanceof SourceUnavailableError) {
        throw error;
      }
      throw new SourceUnavailableError(
        `Cannot read NVA staging data: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    syncLogger.info({ records: records.length }, "Loaded NVA staging records");
    return records;
  }

  private mapRecords(
    records: readonly StagingRecord[],
    { mapper, deduplicator, allocator, report }: RunContext
  ): NewCristinRow[] {
    const pending: NewCristinRow[] = [];
    const total = records.length;

    for (const [index, record] of records.entries()) {
      this.throwIfAborted();
      report.recordProcessed();

      const outcome = mapper.mapRecord(record);
      report.recordNotes(outcome.recordId, outcome.notes);

      this.options.onProgress?.({
        phase: "MAPPING",
        current: index + 1,
        total,
        currentItem: outcome.recordId,
      });

      if (!outcome.ok) {
        syncLogger.warn(
          { recordId: outcome.recordId, missing: outcome.missing },
          "Skipping record without required fields"
        );
        report.recordInvalid(outcome.recordId, outcome.missing);
        continue;
      }

      if (deduplicator.admit(outcome.identity) === "DUPLICATE") {
        const origin = deduplicator.origin(outcome.identity) ?? "STAGING";
        syncLogger.debug(
          { recordId: outcome.recordId, title: outcome.row.Tittel, origin },
          "Duplicate publication skipped"
        );
        report.recordDuplicate(
          outcome.recordId,
          outcome.row.Tittel,
          outcome.row.Publiseringsaar,
          origin
        );
        continue;
      }

      const pubId = allocator.allocate();
      pending.push({ PubID: pubId, ...outcome.row });
      report.recordAccepted(pubId);
    }

    syncLogger.info(
      { processed: total, pending: pending.length },
      "Mapped NVA records"
    );
    return pending;
  }

  /**
   * Persist the pending rows and return the Cristin row count afterwards.
   *
   * Once the transaction has committed the run no longer fails: an
   * unreadable count falls back to rowsBefore + inserted.
   */
  private async write(
    pending: readonly NewCristinRow[],
    rowsBefore: number
  ): Promise<number> {
    if (this.options.dryRun === true) {
      syncLogger.info(
        { pending: pending.length },
        "Dry run, nothing written to Cristin"
      );
      return await this.countAfter();
    }
    if (pending.length === 0) {
      syncLogger.info("No new publications to insert");
      return await this.countAfter();
    }

    this.options.onProgress?.({
      phase: "WRITING",
      current: 0,
      total: pending.length,
    });
    try {
      await this.target.insertRows(pending);
    } catch (error) {
      if (error instanceof PersistenceError) {
        throw error;
      }
      throw new PersistenceError(
        `Writing ${String(pending.length)} publications failed: ${errorMessage(error)}`,
        pending.length,
        { cause: error }
      );
    }
    this.options.onProgress?.({
      phase: "WRITING",
      current: pending.length,
      total: pending.length,
    });
    syncLogger.info({ inserted: pending.length }, "Inserted new publications");

    const expected = rowsBefore + pending.length;
    try {
      return await this.target.countRows();
    } catch (error) {
      syncLogger.warn(
        { error: errorMessage(error), rowsAfter: expected },
        "Cannot count Cristin rows after commit, using expected count"
      );
      return expected;
    }
  }

  /**
   * Row count when nothing was committed; failure here leaves Cristin as it was.
   */
  private async countAfter(): Promise<number> {
    try {
      return await this.target.countRows();
    } catch (error) {
      throw new TargetUnavailableError(
        `Cannot count Cristin rows: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  // ==========================================================================
  // State
  // ==========================================================================

  private transition(next: SyncState): void {
    const previous = this.currentState;
    if (!TRANSITIONS[previous].includes(next)) {
      throw new Error(`Illegal sync state transition ${previous} -> ${next}`);
    }
    this.currentState = next;
    syncLogger.debug({ from: previous, to: next }, "Sync state changed");
    this.options.onStateChange?.(next, previous);
  }

  private throwIfAborted(): void {
    if (this.options.signal?.aborted === true) {
      throw new SyncAbortedError(
        `Sync aborted during ${this.currentState}`,
        { cause: this.options.signal.reason }
      );
    }
  }
}

/**
 * Run one merge pass of the staging records into Cristin.
 */
export async function synchronize(
  source: StagingSource,
  target: CristinTarget,
  options: SyncOptions = {}
): Promise<SyncReport> {
  return await new SyncOrchestrator(source, target, options).run();
}
