/**
 * Processing History
 *
 * Bounded per-project log of past refresh runs, kept in a JSON file next
 * to the project configuration.
 *
 * @module
 */

import { z } from "zod";
import { getHistoryPath, readJson, writeFileAtomic } from "../../utils/index.js";
import { createLogger } from "../../utils/logger.js";
import type { PendencyStats } from "../statistics/index.js";

const logger = createLogger("history");

export const DEFAULT_HISTORY_LIMIT = 100;

// =============================================================================
// Schema
// =============================================================================

const CountSchema = z.number().int().nonnegative();

const PendencyStatsSchema: z.ZodType<PendencyStats> = z.object({
  total: CountSchema,
  byStatus: z.object({
    NO_MASTER: CountSchema,
    PENDING_FIRST_VISIT: CountSchema,
    PENDING_REVISIT: CountSchema,
    COMPLETE: CountSchema,
  }),
  pending: CountSchema,
  completionRate: z.number().min(0).max(1),
});

export const HistoryEntrySchema = z.object({
  /** ISO timestamp of the run */
  timestamp: z.string(),
  stats: PendencyStatsSchema,
  warningCount: CountSchema,
  /** Submissions fetched per form */
  sources: z.object({ master: CountSchema, revisit: CountSchema }),
});

export type HistoryEntry = z.infer<typeof HistoryEntrySchema>;

const HistoryFileSchema = z.object({
  version: z.literal(1),
  /** Newest first */
  projects: z.record(z.array(HistoryEntrySchema)),
});

type HistoryFile = z.infer<typeof HistoryFileSchema>;

// =============================================================================
// Store
// =============================================================================

export class HistoryStore {
  constructor(
    private readonly filePath: string = getHistoryPath(),
    private readonly limit: number = DEFAULT_HISTORY_LIMIT
  ) {}

  append(project: string, entry: HistoryEntry): void {
    const file = this.read();
    const entries = [entry, ...(file.projects[project] ?? [])].slice(0, this.limit);
    file.projects[project] = entries;
    writeFileAtomic(this.filePath, JSON.stringify(file, null, 2) + "\n");
    logger.debug({ project, entries: entries.length }, "History entry appended");
  }

  /**
   * Entries for a project, newest first
   */
  list(project: string, limit: number = this.limit): HistoryEntry[] {
    return (this.read().projects[project] ?? []).slice(0, Math.max(0, limit));
  }

  private read(): HistoryFile {
    let raw: unknown;
    try {
      raw = readJson(this.filePath);
    } catch (error) {
      logger.warn(
        { filePath: this.filePath, error: error instanceof Error ? error.message : String(error) },
        "History file is unreadable, starting empty"
      );
      return { version: 1, projects: {} };
    }
    if (raw === null) return { version: 1, projects: {} };

    const parsed = HistoryFileSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn({ filePath: this.filePath }, "History file has an unexpected shape, starting empty");
      return { version: 1, projects: {} };
    }
    return parsed.data;
  }
}
