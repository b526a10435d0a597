import { sql, type CreateTableBuilder, type Kysely } from "kysely";

import { dbLogger } from "../logger.js";
import { CRISTIN_COLUMNS, type CristinDatabase } from "./schema.js";

// ============================================================================
// Migration Functions
// ============================================================================

/**
 * Create the Cristin publication table if it does not exist yet.
 *
 * On a replicated Pbase copy the table is already there and this is a no-op.
 */
export async function ensureCristinTable(
  db: Kysely<CristinDatabase>
): Promise<void> {
  let builder: CreateTableBuilder<"Cristin", string> = db.schema
    .createTable("Cristin")
    .ifNotExists();

  for (const column of CRISTIN_COLUMNS) {
    builder =
      column.name === "PubID"
        ? builder.addColumn(column.name, column.type, (col) =>
            col.primaryKey().notNull()
          )
        : builder.addColumn(column.name, column.type);
  }

  await builder.execute();

  await db.schema
    .createIndex("cristin_title_year_idx")
    .ifNotExists()
    .on("Cristin")
    .columns(["Publiseringsaar", "Tittel"])
    .execute();

  dbLogger.info("Cristin table ready");
}

/**
 * Whether the Cristin table exists
 */
export async function hasCristinTable(
  db: Kysely<CristinDatabase>
): Promise<boolean> {
  const tables = await db.introspection.getTables();
  return tables.some((table) => table.name === "Cristin");
}

/**
 * Drop the Cristin table (local development databases only)
 */
export async function dropCristinTable(
  db: Kysely<CristinDatabase>
): Promise<void> {
  await sql`DROP TABLE IF EXISTS ${sql.table("Cristin")}`.execute(db);
  dbLogger.warn("Cristin table dropped");
}
