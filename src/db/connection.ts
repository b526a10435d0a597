import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import SQLite from "better-sqlite3";
import { Kysely, PostgresDialect, SqliteDialect, type Dialect } from "kysely";
import pg from "pg";

import { SourceUnavailableError, errorMessage } from "../errors.js";
import { dbLogger } from "../logger.js";

import type { CristinDatabase, NvaDatabase } from "./schema.js";

const { Pool, types } = pg;

// COUNT(*) and MAX() on integer columns come back as int8 strings otherwise
types.setTypeParser(types.builtins.INT8, (val: string) => Number(val));

// ============================================================================
// Configuration
// ============================================================================

const poolConfig: Omit<pg.PoolConfig, "connectionString"> = {
  max: 5,
  idleTimeoutMillis: 30_000, // Close idle connections after 30s
  connectionTimeoutMillis: 5000,
};

export function isPostgresUrl(url: string): boolean {
  return /^postgres(ql)?:\/\//i.test(url);
}

// ============================================================================
// Kysely Instances
// ============================================================================

/**
 * Open the Cristin database.
 *
 * A postgres:// URL connects to the warehouse; anything else is treated as
 * a SQLite file path (created if missing).
 */
export function openCristinDatabase(url: string): Kysely<CristinDatabase> {
  let dialect: Dialect;

  if (isPostgresUrl(url)) {
    dialect = new PostgresDialect({
      pool: new Pool({ ...poolConfig, connectionString: url }),
    });
  } else {
    // Ensure data directory exists
    const dataDir = dirname(url);
    if (url !== ":memory:" && !existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
    }
    dialect = new SqliteDialect({ database: new SQLite(url) });
  }

  dbLogger.debug({ target: describeDatabaseUrl(url) }, "Opened Cristin database");
  return new Kysely<CristinDatabase>({ dialect });
}

/**
 * Open the harvested NVA staging file read-only.
 */
export function openStagingDatabase(path: string): Kysely<NvaDatabase> {
  let database: SQLite.Database;
  try {
    database = new SQLite(path, { readonly: true, fileMustExist: true });
  } catch (error) {
    throw new SourceUnavailableError(
      `Cannot open NVA staging database at ${path}: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  dbLogger.debug({ path }, "Opened NVA staging database");
  return new Kysely<NvaDatabase>({
    dialect: new SqliteDialect({ database }),
  });
}

// ============================================================================
// Connection Management
// ============================================================================

/**
 * Gracefully close a database opened by this module
 */
export async function closeDatabase<DB>(db: Kysely<DB>): Promise<void> {
  try {
    await db.destroy();
    dbLogger.debug("Database connection closed");
  } catch (error) {
    dbLogger.error({ error }, "Error closing database connection");
    throw error;
  }
}

/**
 * Get a database URL for display, with password masked
 */
export function describeDatabaseUrl(url: string): string {
  if (!isPostgresUrl(url)) {
    return url;
  }
  const parsed = new URL(url);
  if (parsed.password !== "") {
    parsed.password = "****";
  }
  return parsed.toString();
}
