/**
 * Cristin Store - Kysely access to the Cristin publication table
 *
 * Works against the SQLite copy and the PostgreSQL warehouse alike.
 * New rows are written in chunks inside a single transaction, so a failed
 * batch leaves the table exactly as it was.
 */

import { PersistenceError, errorMessage } from "../errors.js";
import { dbLogger } from "../logger.js";
import { identityKey, type IdentityKey } from "../services/sync/dedup.js";

import type { CristinDatabase, NewCristinRow } from "./schema.js";
import type { CristinTarget } from "../services/sync/orchestrator.js";
import type { Kysely } from "kysely";

// ============================================================================
// Types
// ============================================================================

export interface CristinStoreOptions {
  /** Rows per INSERT statement inside the transaction */
  batchSize?: number;
}

const DEFAULT_BATCH_SIZE = 200;

// ============================================================================
// Cristin Store
// ============================================================================

export class CristinStore implements CristinTarget {
  private readonly batchSize: number;

  constructor(
    private readonly db: Kysely<CristinDatabase>,
    options: CristinStoreOptions = {}
  ) {
    const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new RangeError(
        `batchSize must be a positive integer, got ${String(batchSize)}`
      );
    }
    this.batchSize = batchSize;
  }

  /**
   * (normalized title, year) of every titled publication
   */
  async loadIdentityKeys(): Promise<IdentityKey[]> {
    const rows = await this.db
      .selectFrom("Cristin")
      .select(["Tittel", "Publiseringsaar"])
      .where("Tittel", "is not", null)
      .execute();

    const keys: IdentityKey[] = [];
    for (const row of rows) {
      if (row.Tittel !== null) {
        keys.push(identityKey(row.Tittel, row.Publiseringsaar));
      }
    }
    return keys;
  }

  async maxPubId(): Promise<number> {
    const result = await this.db
      .selectFrom("Cristin")
      .select((eb) => eb.fn.max<number | null>("PubID").as("max_id"))
      .executeTakeFirst();

    return Number(result?.max_id ?? 0);
  }

  async countRows(): Promise<number> {
    const result = await this.db
      .selectFrom("Cristin")
      .select((eb) => eb.fn.countAll<number>().as("count"))
      .executeTakeFirst();

    return Number(result?.count ?? 0);
  }

  /**
   * Insert all rows in one transaction.
   *
   * Throws PersistenceError after rollback when any chunk fails.
   */
  async insertRows(rows: readonly NewCristinRow[]): Promise<void> {
    if (rows.length === 0) {
      return;
    }

    try {
      await this.db.transaction().execute(async (trx) => {
        for (let i = 0; i < rows.length; i += this.batchSize) {
          const batch = rows.slice(i, i + this.batchSize);
          await trx.insertInto("Cristin").values(batch).execute();

          const written = Math.min(i + this.batchSize, rows.length);
          if (written % 1000 < this.batchSize || written === rows.length) {
            dbLogger.debug(
              { written, total: rows.length },
              "Inserting publications"
            );
          }
        }
      });
    } catch (error) {
      dbLogger.error(
        { error: errorMessage(error), rows: rows.length },
        "Cristin insert rolled back"
      );
      throw new PersistenceError(
        `Insert of ${String(rows.length)} publications rolled back: ${errorMessage(error)}`,
        rows.length,
        { cause: error }
      );
    }

    dbLogger.info({ inserted: rows.length }, "Publications committed");
  }
}
