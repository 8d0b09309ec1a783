/**
 * refresh command - Fetch both forms, reconcile and write the pendency report
 */

import chalk from "chalk";
import ora from "ora";
import type { Command } from "commander";
import {
  createPendencyService,
  writeReport,
  type RefreshResult,
  type ReportFormat,
} from "../../core/index.js";
import { createLogger, getHistoryPath, getReportsDir } from "../../utils/index.js";
import { loadProjectConfig, runToken } from "../context.js";
import { defaultReportPath, formatStatsLines, formatWarning } from "../format.js";

const logger = createLogger("refresh");

/** Warnings printed before the rest are summarized */
const WARNING_PREVIEW = 10;

export interface RefreshOptions {
  output?: string;
  format?: ReportFormat;
  json?: boolean;
}

export function printRefresh(result: RefreshResult): void {
  console.log();
  console.log(chalk.cyan.bold(`Pendencies for ${result.project}`));
  console.log(chalk.dim("─".repeat(40)));
  for (const line of formatStatsLines(result.stats)) {
    console.log(line);
  }

  const { master, revisit } = result.sources;
  console.log();
  console.log(
    chalk.dim(
      `  Sources: ${master.submissions} master, ${revisit.submissions} revisit submissions` +
        ` (${result.counts.trackingExcluded} tracking rows excluded)`
    )
  );

  if (result.warnings.length > 0) {
    console.log();
    console.log(chalk.yellow.bold(`Data quality warnings (${result.warnings.length})`));
    for (const warning of result.warnings.slice(0, WARNING_PREVIEW)) {
      console.log(chalk.yellow(`  ${formatWarning(warning)}`));
    }
    if (result.warnings.length > WARNING_PREVIEW) {
      console.log(chalk.dim(`  ...and ${result.warnings.length - WARNING_PREVIEW} more (use --json)`));
    }
  }
}

export async function refreshCommand(options: RefreshOptions, command: Command): Promise<void> {
  const config = loadProjectConfig(command);
  const service = createPendencyService(config, { historyPath: getHistoryPath() });

  const spinner = options.json ? null : ora(`Fetching submissions for ${config.name}...`).start();
  let result: RefreshResult;
  try {
    result = await service.refresh(config, { token: runToken() });
  } catch (error) {
    spinner?.fail(chalk.red("Refresh failed"));
    throw error;
  }

  const outputPath =
    options.output ?? defaultReportPath(getReportsDir(), config.name, result.finishedAt, options.format);
  await writeReport(outputPath, result.report);
  logger.info({ outputPath, rows: result.report.rows.length }, "Report written");
  spinner?.succeed(chalk.green(`Report written to ${outputPath}`));

  if (options.json) {
    console.log(JSON.stringify({ ...result, reportPath: outputPath }, null, 2));
    return;
  }
  printRefresh(result);
}
