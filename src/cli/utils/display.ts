/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type { SyncReport } from "../../services/sync/report.js";

const MAX_LISTED = 20;

/**
 * Display the counts of a finished sync run
 */
export function displaySyncSummary(report: SyncReport): void {
  const table = new CliTable3({
    head: [chalk.cyan("Metric"), chalk.cyan("Value")],
    colWidths: [26, 30],
  });

  const idRange =
    report.firstPubId !== null && report.lastPubId !== null
      ? `${String(report.firstPubId)}-${String(report.lastPubId)}`
      : chalk.gray("none");

  table.push(
    ["Records processed", String(report.processed)],
    [
      report.dryRun ? "Would insert" : "Inserted",
      chalk.green(String(report.accepted)),
    ],
    ["Skipped (duplicate)", String(report.skippedDuplicate)],
    ["Skipped (invalid)", String(report.skippedInvalid)],
    ["Unmapped language codes", String(report.mappingGaps.length)],
    ["Author warnings", String(report.warnings.length)],
    ["PubID range", idRange],
    ["Cristin rows before", String(report.rowsBefore)],
    ["Cristin rows after", String(report.rowsAfter)]
  );

  console.log(chalk.bold(report.dryRun ? "\nDry run summary:\n" : "\nSync summary:\n"));
  console.log(table.toString());
}

/**
 * Display skip reasons, language gaps and warnings of a run
 */
export function displaySyncDetails(report: SyncReport): void {
  const invalid = report.skips.filter(
    (skip) => skip.kind === "MISSING_REQUIRED_FIELD"
  );
  if (invalid.length > 0) {
    console.log(chalk.bold(`\nSkipped records (${String(invalid.length)}):`));
    for (const skip of invalid.slice(0, MAX_LISTED)) {
      console.log(`  ${chalk.yellow(skip.recordId)} ${skip.reason}`);
    }
    printRemaining(invalid.length);
  }

  if (report.mappingGaps.length > 0) {
    const uris = new Map<string, number>();
    for (const gap of report.mappingGaps) {
      uris.set(gap.value, (uris.get(gap.value) ?? 0) + 1);
    }

    const table = new CliTable3({
      head: [chalk.cyan("Unmapped language URI"), chalk.cyan("Records")],
      colWidths: [60, 10],
    });
    for (const [uri, count] of uris) {
      table.push([uri, String(count)]);
    }
    console.log(chalk.bold("\nLanguage mapping gaps:"));
    console.log(table.toString());
  }

  if (report.warnings.length > 0) {
    console.log(
      chalk.bold(`\nAuthor name warnings (${String(report.warnings.length)}):`)
    );
    for (const warning of report.warnings.slice(0, MAX_LISTED)) {
      console.log(
        `  ${chalk.yellow(warning.recordId)} kept as-is: ${warning.value}`
      );
    }
    printRemaining(report.warnings.length);
  }
}

function printRemaining(total: number): void {
  if (total > MAX_LISTED) {
    console.log(chalk.gray(`  ... and ${String(total - MAX_LISTED)} more`));
  }
}

/**
 * Print error message
 */
export function printError(message: string): void {
  console.error(chalk.red("Error:"), message);
}

/**
 * Print success message
 */
export function printSuccess(message: string): void {
  console.log(chalk.green("Success:"), message);
}

/**
 * Print warning message
 */
export function printWarning(message: string): void {
  console.log(chalk.yellow("Warning:"), message);
}
