#!/usr/bin/env tsx

/**
 * CLI entry point: publishes paired meeting summaries and transcripts as
 * Bear notes.
 */

import { Command } from "commander";
import { createLogger } from "@pairsync/core-application";
import { reportFatalError } from "./fatal";
import { initCommand } from "./commands/init";
import { listCommand } from "./commands/list";
import { runCommand } from "./commands/run";

const program = new Command();

program
  .name("pairsync")
  .description("Turn matching summary and transcript PDFs into Bear notes")
  .version("0.1.0")
  .option("-c, --config <path>", "Path to a config file (highest priority)")
  .option("-v, --verbose", "Log at debug level");

program
  .command("init")
  .description("Write the default configuration to ./.pairsync/config.json")
  .option("-f, --force", "Overwrite an existing config file")
  .action(async (_opts, command: Command) => {
    process.exitCode = await initCommand(command.optsWithGlobals());
  });

program
  .command("run")
  .description("Scan both folders once, or keep watching with --watch")
  .option("--summary <path>", "Process this summary file only (needs --transcript)")
  .option("--transcript <path>", "Process this transcript file only (needs --summary)")
  .option("-w, --watch", "Keep running until SIGINT/SIGTERM")
  .action(async (_opts, command: Command) => {
    process.exitCode = await runCommand(command.optsWithGlobals());
  });

program
  .command("list")
  .description("Show processed pairs from the state file")
  .action(async (_opts, command: Command) => {
    process.exitCode = await listCommand(command.optsWithGlobals());
  });

// the config, and so the configured logger, may be what failed
const fatalLogger = createLogger({ level: "error" });

program.parseAsync().catch((error: unknown) => {
  reportFatalError(error, fatalLogger);
  process.exit(1);
});
