/**
 * Shared utilities
 */

import * as fs from "node:fs";
import * as path from "node:path";

export * from "./logger.js";

// =============================================================================
// Configuration Paths
// =============================================================================

export const CONFIG_DIR = ".pendency";
export const CONFIG_FILE = "config.json";
export const HISTORY_FILE = "history.json";

export function getProjectRoot(): string {
  return process.cwd();
}

export function getConfigDir(projectRoot: string = getProjectRoot()): string {
  return path.join(projectRoot, CONFIG_DIR);
}

export function getConfigPath(projectRoot: string = getProjectRoot()): string {
  return path.join(getConfigDir(projectRoot), CONFIG_FILE);
}

export function getHistoryPath(projectRoot: string = getProjectRoot()): string {
  return path.join(getConfigDir(projectRoot), HISTORY_FILE);
}

export function getReportsDir(projectRoot: string = getProjectRoot()): string {
  return path.join(getConfigDir(projectRoot), "reports");
}

// =============================================================================
// Basic File Operations
// =============================================================================

export function ensureDir(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}

export function fileExists(filePath: string): boolean {
  return fs.existsSync(filePath);
}

/**
 * Reads and parses a JSON file. Returns null when the file is missing;
 * malformed JSON propagates as a SyntaxError.
 */
export function readJson(filePath: string): unknown {
  if (!fs.existsSync(filePath)) return null;
  const content = fs.readFileSync(filePath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return parsed;
}

export function writeJson(filePath: string, data: unknown): void {
  ensureDir(path.dirname(filePath));
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2) + "\n");
}

/**
 * Writes through a temporary file and renames it into place
 */
export function writeFileAtomic(filePath: string, content: string | Uint8Array): void {
  ensureDir(path.dirname(filePath));
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  fs.writeFileSync(tmpPath, content);
  fs.renameSync(tmpPath, filePath);
}
