/**
 * State shared by every command: global options and the run's
 * cancellation source.
 */

import { InvalidArgumentError, type Command } from "commander";
import { loadConfig } from "../core/index.js";
import type { ProjectConfig } from "../utils/validation.js";
import { CancellationTokenSource, type CancellationToken } from "../utils/async.js";

export type GlobalOptions = {
  config?: string;
  debug?: boolean;
};

const cancellation = new CancellationTokenSource();

export function globalOptions(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}

export function loadProjectConfig(command: Command): ProjectConfig {
  return loadConfig({ configPath: globalOptions(command).config });
}

/**
 * Token cancelled by the first SIGINT/SIGTERM
 */
export function runToken(): CancellationToken {
  return cancellation.token;
}

/**
 * Cancels the current run; returns false when it was already cancelled
 */
export function cancelRun(reason: string): boolean {
  if (cancellation.token.cancelled) return false;
  cancellation.cancel(reason);
  return true;
}

/**
 * Option parser for positive integer counts
 */
export function parseCount(value: string): number {
  const count = Number(value);
  if (!Number.isInteger(count) || count < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return count;
}
