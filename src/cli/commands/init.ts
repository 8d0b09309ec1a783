/**
 * init command - Write a starting configuration for a survey project
 */

import chalk from "chalk";
import ora from "ora";
import * as path from "node:path";
import type { Command } from "commander";
import { ENV_TOKEN, writeConfigTemplate } from "../../core/index.js";
import { createLogger, getProjectRoot } from "../../utils/index.js";
import { globalOptions } from "../context.js";

const logger = createLogger("init");

export interface InitOptions {
  force?: boolean;
  name?: string;
  master?: string;
  revisit?: string;
  url?: string;
}

export async function initCommand(options: InitOptions, command: Command): Promise<void> {
  logger.info({ options }, "Starting initialization");

  const spinner = ora("Writing configuration...").start();
  const result = writeConfigTemplate({
    name: options.name ?? path.basename(getProjectRoot()),
    baseUrl: options.url,
    masterFormId: options.master,
    revisitFormId: options.revisit,
    configPath: globalOptions(command).config,
    force: options.force,
  });

  if (!result.created) {
    spinner.warn(chalk.yellow(`A configuration already exists at ${result.configPath}`));
    console.log(chalk.dim("Use --force to overwrite it."));
    return;
  }

  spinner.succeed(chalk.green("Configuration written"));
  console.log(chalk.dim(`  ${result.configPath}`));

  console.log();
  console.log(chalk.cyan("Next steps:"));
  console.log(chalk.dim("  1. Fill in the form ids, field paths and status codes"));
  console.log(chalk.dim("  2. Export"), chalk.white(ENV_TOKEN), chalk.dim("with your API token"));
  console.log(chalk.dim("  3. Run"), chalk.white("pendency validate"), chalk.dim("to check the connection"));
}
