import ora from "ora";

import {
  closeDatabase,
  describeDatabaseUrl,
  openCristinDatabase,
  openStagingDatabase,
} from "../../db/connection.js";
import { CristinStore } from "../../db/cristin-store.js";
import { hasCristinTable } from "../../db/migrate.js";
import { NvaStagingSource } from "../../db/nva-staging.js";
import { TargetUnavailableError, errorMessage } from "../../errors.js";
import { cliLogger } from "../../logger.js";
import { synchronize } from "../../services/sync/orchestrator.js";
import {
  displaySyncDetails,
  displaySyncSummary,
  printError,
  printSuccess,
  printWarning,
} from "../utils/display.js";
import {
  printErrorDetails,
  resolveConfig,
  type DatabaseOptions,
} from "../utils/options.js";

import type { CristinDatabase, NvaDatabase } from "../../db/schema.js";
import type { Command } from "commander";
import type { Kysely } from "kysely";

// ============================================================================
// Sync Command
// ============================================================================

interface SyncCommandOptions extends DatabaseOptions {
  dryRun?: boolean;
  json?: boolean;
}

export function registerSyncCommand(program: Command): void {
  program
    .command("sync")
    .description("Merge harvested NVA publications into the Cristin table")
    .option("--dry-run", "Map and deduplicate without writing to Cristin")
    .option("--staging <path>", "NVA staging SQLite file (NVA_STAGING_DB)")
    .option(
      "--cristin <url>",
      "Cristin database: postgres:// URL or SQLite path (CRISTIN_DATABASE_URL)"
    )
    .option(
      "--batch-size <n>",
      "Rows per INSERT inside the transaction (SYNC_BATCH_SIZE)"
    )
    .option("--json", "Print the sync report as JSON")
    .addHelpText(
      "after",
      `
Records already in Cristin (same title and publication year) are skipped,
so running the command again on the same staging data inserts nothing.
New rows are written in a single transaction: either all of them or none.
`
    )
    .action(async (options: SyncCommandOptions) => {
      const json = options.json === true;
      const spinner = ora({ text: "Preparing sync...", isSilent: json }).start();

      const controller = new AbortController();
      const onSigint = (): void => {
        controller.abort(new Error("Interrupted"));
      };
      process.once("SIGINT", onSigint);

      let staging: Kysely<NvaDatabase> | undefined;
      let cristin: Kysely<CristinDatabase> | undefined;

      try {
        const config = resolveConfig(options);
        cliLogger.debug(
          {
            staging: config.stagingDbPath,
            cristin: describeDatabaseUrl(config.cristinDatabaseUrl),
            dryRun: options.dryRun === true,
          },
          "Starting sync"
        );

        staging = openStagingDatabase(config.stagingDbPath);
        cristin = openCristinDatabase(config.cristinDatabaseUrl);

        if (!(await hasCristinTable(cristin))) {
          throw new TargetUnavailableError(
            `No Cristin table in ${describeDatabaseUrl(config.cristinDatabaseUrl)} (run 'db init')`
          );
        }

        const report = await synchronize(
          new NvaStagingSource(staging),
          new CristinStore(cristin, { batchSize: config.batchSize }),
          {
            dryRun: options.dryRun === true,
            registrationBaseUrl: config.registrationBaseUrl,
            signal: controller.signal,
            onStateChange: (state) => {
              spinner.text = `Sync: ${state.toLowerCase()}...`;
            },
            onProgress: (progress) => {
              spinner.text = `Sync ${progress.phase.toLowerCase()}: ${String(progress.current)}/${String(progress.total)}${progress.currentItem !== undefined ? ` (${progress.currentItem})` : ""}`;
            },
          }
        );

        if (json) {
          console.log(JSON.stringify(report, null, 2));
          return;
        }

        if (report.dryRun) {
          spinner.info(
            `Dry run: ${String(report.accepted)} new publications found, nothing written`
          );
        } else {
          spinner.succeed(
            `Inserted ${String(report.inserted)} of ${String(report.processed)} NVA records`
          );
        }

        displaySyncSummary(report);
        displaySyncDetails(report);

        if (report.mappingGaps.length > 0) {
          printWarning(
            "Some language codes are not mapped; extend LANGUAGE_CODES to cover them"
          );
        }
        if (!report.dryRun && report.inserted > 0) {
          printSuccess(
            `Cristin now holds ${String(report.rowsAfter)} publications`
          );
        }
      } catch (error) {
        if (json) {
          printError(errorMessage(error));
        } else {
          spinner.fail(`Sync failed: ${errorMessage(error)}`);
        }
        printErrorDetails(error);
        process.exitCode = 1;
      } finally {
        process.off("SIGINT", onSigint);
        if (staging !== undefined) await closeDatabase(staging);
        if (cristin !== undefined) await closeDatabase(cristin);
      }
    });
}
