/**
 * history command - Show past refresh runs for the project
 */

import chalk from "chalk";
import type { Command } from "commander";
import { HistoryStore, formatRate } from "../../core/index.js";
import { getHistoryPath } from "../../utils/index.js";
import { loadProjectConfig } from "../context.js";

export interface HistoryOptions {
  limit?: number;
  json?: boolean;
}

export async function historyCommand(options: HistoryOptions, command: Command): Promise<void> {
  const config = loadProjectConfig(command);
  const entries = new HistoryStore(getHistoryPath()).list(config.name, options.limit);

  if (options.json) {
    console.log(JSON.stringify(entries, null, 2));
    return;
  }

  if (entries.length === 0) {
    console.log(chalk.yellow(`No runs recorded for ${config.name} yet.`));
    console.log(chalk.dim("Run"), chalk.white("pendency refresh"), chalk.dim("to record one."));
    return;
  }

  console.log(chalk.cyan.bold(`Run history for ${config.name}`));
  console.log(chalk.dim("─".repeat(40)));
  for (const entry of entries) {
    const { stats } = entry;
    console.log(
      `  ${chalk.white(entry.timestamp)}  ${String(stats.total).padStart(6)} households  ` +
        `${String(stats.pending).padStart(6)} pending  ${formatRate(stats.completionRate).padStart(6)} complete` +
        (entry.warningCount > 0 ? chalk.yellow(`  ${entry.warningCount} warning(s)`) : "")
    );
  }
}
