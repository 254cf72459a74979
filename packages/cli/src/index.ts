#!/usr/bin/env node
/**
 * @worklog/cli
 *
 * CLI for worklog.
 * Commands: timer, records (list, edit, delete), export
 */

import { Command } from "commander";
import { timerCommand } from "./commands/timer.js";
import {
  recordsListCommand,
  recordsEditCommand,
  recordsDeleteCommand,
} from "./commands/records.js";
import { exportCommand } from "./commands/export.js";

const program = new Command();

program
  .name("worklog")
  .description("Track work hours, edit sessions and export them to a spreadsheet")
  .version("0.1.0");

program
  .command("timer")
  .description("Open the interactive timer (start, pause, resume, stop)")
  .option("-f, --file <path>", "Data file (default ~/.worklog/time_records.json)")
  .action(async (options) => {
    await timerCommand(options);
  });

// Records subcommand group
const records = program.command("records").description("Manage time records");

records
  .command("list")
  .description("List all records with their index")
  .option("-f, --file <path>", "Data file")
  .action(async (options) => {
    await recordsListCommand(options);
  });

records
  .command("edit <index>")
  .description("Edit a record; omitted fields keep their value")
  .option("-s, --start <time>", "Start time (YYYY-MM-DD HH:MM:SS)")
  .option("-e, --end <time>", "End time (YYYY-MM-DD HH:MM:SS)")
  .option("-c, --comment <text>", "Comment")
  .option("-f, --file <path>", "Data file")
  .action(async (index, options) => {
    await recordsEditCommand(index, options);
  });

records
  .command("delete <index>")
  .description("Delete a record")
  .option("-f, --file <path>", "Data file")
  .action(async (index, options) => {
    await recordsDeleteCommand(index, options);
  });

program
  .command("export")
  .description("Export records started within a date range to .xlsx")
  .requiredOption("--from <date>", "First day (YYYY-MM-DD)")
  .requiredOption("--to <date>", "Last day, inclusive (YYYY-MM-DD)")
  .requiredOption("-o, --out <file>", "Destination .xlsx file")
  .option("-f, --file <path>", "Data file")
  .action(async (options) => {
    await exportCommand(options);
  });

await program.parseAsync();
