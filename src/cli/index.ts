#!/usr/bin/env node

/**
 * Pendency CLI
 * Reconciles master and revisit survey submissions into a household pendency list
 */

import { Command, Option } from "commander";
import chalk from "chalk";
import { initCommand } from "./commands/init.js";
import { validateCommand } from "./commands/validate.js";
import { refreshCommand } from "./commands/refresh.js";
import { syncCommand } from "./commands/sync.js";
import { historyCommand } from "./commands/history.js";
import { cancelRun, globalOptions, parseCount } from "./context.js";
import { formatErrorLines } from "./format.js";
import { createLogger, setLogLevel } from "../utils/logger.js";

const logger = createLogger("cli");

// Create the main program
const program = new Command();

program
  .name("pendency")
  .description("Track which surveyed households still need a field visit")
  .version("0.1.0")
  .option("-c, --config <path>", "Path to the project configuration file")
  .option("-d, --debug", "Enable debug logging")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  })
  .hook("preAction", (_program, actionCommand) => {
    if (globalOptions(actionCommand).debug) {
      setLogLevel("debug");
    }
  });

// =============================================================================
// Commands
// =============================================================================

program
  .command("init")
  .description("Write a starting configuration for this project")
  .option("-f, --force", "Overwrite an existing configuration")
  .option("-n, --name <name>", "Project name (defaults to the directory name)")
  .option("--master <formId>", "Master form id")
  .option("--revisit <formId>", "Revisit form id")
  .option("--url <baseUrl>", "Survey service URL")
  .action(initCommand);

program
  .command("validate")
  .description("Check the configuration and that both forms can be reached")
  .action(validateCommand);

program
  .command("refresh")
  .description("Fetch both forms, reconcile and write the pendency report")
  .option("-o, --output <path>", "Report file (defaults to .pendency/reports/)")
  .addOption(
    new Option("-f, --format <format>", "Report format when no output path is given")
      .choices(["xlsx", "csv"])
      .default("xlsx")
  )
  .option("--json", "Print the full result as JSON")
  .action(refreshCommand);

program
  .command("sync")
  .description("Refresh, then publish tracking submissions to the revisit form")
  .option("--media", "Also replace the pendency list attached to the revisit form")
  .option("--json", "Print the full result as JSON")
  .action(syncCommand);

program
  .command("history")
  .description("Show past refresh runs")
  .option("-l, --limit <count>", "Number of runs to show", parseCount)
  .option("--json", "Print entries as JSON")
  .action(historyCommand);

// =============================================================================
// Global Error Handling
// =============================================================================

/**
 * Print a fatal error as `[code] message` and exit
 */
function handleError(error: unknown): void {
  logger.error({ err: error }, "CLI error occurred");
  const [first, ...rest] = formatErrorLines(error);
  console.error(chalk.red(`\nError: ${first}`));
  for (const line of rest) {
    console.error(chalk.red(line));
  }
  if (error instanceof Error && (process.env.DEBUG || process.env.NODE_ENV === "development")) {
    console.error(chalk.dim(error.stack));
  }
  process.exit(1);
}

// Handle unhandled promise rejections
process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

// Handle uncaught exceptions
process.on("uncaughtException", (error) => {
  logger.error({ err: error }, "Uncaught exception");
  handleError(error);
});

// =============================================================================
// Signal Handlers
// =============================================================================

/**
 * First signal cancels the running command; a second one exits at once
 */
function shutdown(signal: string): void {
  if (!cancelRun(`Received ${signal}`)) {
    logger.warn("Forced shutdown");
    process.exit(1);
  }

  logger.info({ signal }, "Received shutdown signal");
  console.log(chalk.dim(`\nReceived ${signal}, stopping after in-flight requests...`));

  setTimeout(() => {
    logger.warn("Shutdown timeout, forcing exit");
    process.exit(1);
  }, 5000).unref();
}

// Handle SIGINT (Ctrl+C)
process.on("SIGINT", () => shutdown("SIGINT"));

// Handle SIGTERM (kill command)
process.on("SIGTERM", () => shutdown("SIGTERM"));

// =============================================================================
// Parse and Execute
// =============================================================================

program.parseAsync(process.argv).catch(handleError);
