/**
 * sync command - Refresh, then publish tracking submissions to the Revisit form
 */

import chalk from "chalk";
import ora from "ora";
import type { Command } from "commander";
import { ErrorCode, PendencyError, createPendencyService, type SyncResult } from "../../core/index.js";
import { createLogger, getHistoryPath } from "../../utils/index.js";
import { loadProjectConfig, runToken } from "../context.js";
import { formatPublishSummary } from "../format.js";
import { printRefresh } from "./refresh.js";

const logger = createLogger("sync");

export interface SyncCommandOptions {
  media?: boolean;
  json?: boolean;
}

export async function syncCommand(options: SyncCommandOptions, command: Command): Promise<void> {
  const config = loadProjectConfig(command);
  const service = createPendencyService(config, { historyPath: getHistoryPath() });

  const spinner = options.json ? null : ora(`Syncing ${config.name}...`).start();
  let result: SyncResult;
  try {
    result = await service.sync(config, { token: runToken(), media: options.media });
  } catch (error) {
    spinner?.fail(chalk.red("Sync failed"));
    throw error;
  }

  const { publish, media } = result;
  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    const summary = formatPublishSummary(publish);
    if (publish.failed > 0) {
      spinner?.warn(chalk.yellow(`Published with failures: ${summary}`));
    } else {
      spinner?.succeed(chalk.green(`Published: ${summary}`));
    }
    for (const outcome of publish.outcomes) {
      if (outcome.status === "failed") {
        console.log(chalk.red(`  ${outcome.householdId}: ${outcome.error.message}`));
      }
    }
    if (media) {
      console.log(chalk.dim(`  Form media ${media.uploaded.fileName} replaced (${media.deleted} removed)`));
    }
    printRefresh(result.refresh);
  }

  if (publish.failed > 0) {
    logger.warn({ failed: publish.failed }, "Some tracking submissions were not written");
    throw new PendencyError(
      `${publish.failed} tracking submission(s) could not be written`,
      ErrorCode.PUBLISH_ITEM_FAILED,
      { failed: publish.failed }
    );
  }
}
