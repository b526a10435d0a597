import ora from "ora";

import {
  closeDatabase,
  describeDatabaseUrl,
  isPostgresUrl,
  openCristinDatabase,
  openStagingDatabase,
} from "../../db/connection.js";
import { CristinStore } from "../../db/cristin-store.js";
import {
  dropCristinTable,
  ensureCristinTable,
  hasCristinTable,
} from "../../db/migrate.js";
import { NvaStagingSource } from "../../db/nva-staging.js";
import { errorMessage } from "../../errors.js";
import { printWarning } from "../utils/display.js";
import { printErrorDetails, resolveConfig } from "../utils/options.js";

import type { CristinDatabase, NvaDatabase } from "../../db/schema.js";
import type { Command } from "commander";
import type { Kysely } from "kysely";

// ============================================================================
// Database Commands
// ============================================================================

export function registerDbCommand(program: Command): void {
  const db = program.command("db").description("Database management commands");

  // db init
  db.command("init")
    .description("Create the Cristin publication table if it is missing")
    .option("--cristin <url>", "Cristin database: postgres:// URL or SQLite path")
    .option("--fresh", "Drop the table first (SQLite copies only, destructive!)")
    .action(async (options: { cristin?: string; fresh?: boolean }) => {
      const spinner = ora("Initializing Cristin table...").start();
      let cristin: Kysely<CristinDatabase> | undefined;

      try {
        const config = resolveConfig(options);
        cristin = openCristinDatabase(config.cristinDatabaseUrl);

        if (options.fresh === true) {
          if (isPostgresUrl(config.cristinDatabaseUrl)) {
            throw new Error("--fresh is only allowed on a SQLite Cristin copy");
          }
          spinner.text = "Dropping existing Cristin table...";
          await dropCristinTable(cristin);
        }

        await ensureCristinTable(cristin);
        spinner.succeed(
          `Cristin table ready in ${describeDatabaseUrl(config.cristinDatabaseUrl)}`
        );
      } catch (error) {
        spinner.fail(`Init failed: ${errorMessage(error)}`);
        printErrorDetails(error);
        process.exitCode = 1;
      } finally {
        if (cristin !== undefined) await closeDatabase(cristin);
      }
    });

  // db status
  db.command("status")
    .description("Show Cristin and NVA staging statistics")
    .option("--cristin <url>", "Cristin database: postgres:// URL or SQLite path")
    .option("--staging <path>", "NVA staging SQLite file")
    .action(async (options: { cristin?: string; staging?: string }) => {
      const spinner = ora("Checking databases...").start();
      let cristin: Kysely<CristinDatabase> | undefined;
      let staging: Kysely<NvaDatabase> | undefined;

      try {
        const config = resolveConfig(options);
        cristin = openCristinDatabase(config.cristinDatabaseUrl);

        if (!(await hasCristinTable(cristin))) {
          spinner.warn("Cristin table not initialized (run 'db init')");
        } else {
          const store = new CristinStore(cristin);
          const [rows, maxPubId] = await Promise.all([
            store.countRows(),
            store.maxPubId(),
          ]);
          spinner.succeed("Cristin database connected");
          console.log(
            `\nCristin: ${describeDatabaseUrl(config.cristinDatabaseUrl)}`
          );
          console.log(`  Publications: ${String(rows)}`);
          console.log(`  Highest PubID: ${String(maxPubId)}`);
        }

        try {
          staging = openStagingDatabase(config.stagingDbPath);
          const records = await new NvaStagingSource(staging).countRecords();
          console.log(`\nNVA staging: ${config.stagingDbPath}`);
          console.log(`  Records: ${String(records)}`);
        } catch (error) {
          printWarning(errorMessage(error));
        }
      } catch (error) {
        spinner.fail(`Error: ${errorMessage(error)}`);
        printErrorDetails(error);
        process.exitCode = 1;
      } finally {
        if (staging !== undefined) await closeDatabase(staging);
        if (cristin !== undefined) await closeDatabase(cristin);
      }
    });
}
