/**
 * validate command - Check the configuration and that both forms are reachable
 */

import chalk from "chalk";
import ora from "ora";
import type { Command } from "commander";
import { ErrorCode, PendencyError, createPendencyService } from "../../core/index.js";
import { createLogger } from "../../utils/index.js";
import { loadProjectConfig } from "../context.js";

const logger = createLogger("validate");

export async function validateCommand(_options: Record<string, never>, command: Command): Promise<void> {
  const config = loadProjectConfig(command);
  console.log(chalk.green("✓"), `Configuration for ${chalk.cyan(config.name)} is valid`);

  const spinner = ora(`Connecting to ${config.survey.baseUrl}...`).start();
  const checks = await createPendencyService(config).validateConnection(config);
  spinner.stop();

  for (const check of checks) {
    if (check.asset) {
      console.log(
        chalk.green("✓"),
        `${check.form.padEnd(8)} ${chalk.white(check.asset.name)}`,
        chalk.dim(`(${check.formId}, ${check.asset.submissionCount ?? "?"} submissions)`)
      );
    } else {
      console.log(chalk.red("✗"), `${check.form.padEnd(8)} form ${check.formId} not found`);
    }
  }

  const missing = checks.filter((check) => check.asset === null).map((check) => check.formId);
  if (missing.length > 0) {
    logger.warn({ missing }, "Forms not found");
    throw new PendencyError(`Forms not found: ${missing.join(", ")}`, ErrorCode.CONFIG_INVALID, {
      missing,
    });
  }
}
