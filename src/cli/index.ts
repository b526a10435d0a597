#!/usr/bin/env node

/**
 * NVA to Cristin sync CLI
 *
 * Merges publications harvested from NVA into the Cristin publication table.
 */

import { Command } from "commander";

import { registerDbCommand } from "./commands/db.js";
import { registerSyncCommand } from "./commands/sync.js";

const program = new Command();

program
  .name("nva-cristin")
  .description("Merge harvested NVA publications into the Cristin table")
  .version("0.1.0");

registerDbCommand(program);
registerSyncCommand(program);

program.action(() => {
  program.outputHelp();
});

await program.parseAsync();
