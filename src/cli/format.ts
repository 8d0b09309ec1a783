/**
 * Plain-text formatting for command output. Colors are applied by the
 * commands, so these helpers stay testable.
 */

import * as path from "node:path";
import {
  ConfigError,
  PENDENCY_STATUSES,
  formatRate,
  isPendencyError,
  statusLabel,
  type DataQualityWarning,
  type PendencyStats,
  type PublishReport,
  type ReportFormat,
} from "../core/index.js";

const LABEL_WIDTH = 22;

function row(label: string, value: string | number): string {
  return `  ${`${label}:`.padEnd(LABEL_WIDTH)}${value}`;
}

export function formatStatsLines(stats: PendencyStats): string[] {
  return [
    row("Households", stats.total),
    ...PENDENCY_STATUSES.map((status) => row(statusLabel(status), stats.byStatus[status])),
    row("Pending", stats.pending),
    row("Completion rate", formatRate(stats.completionRate)),
  ];
}

export function formatWarning(warning: DataQualityWarning): string {
  const subject = warning.householdId ?? warning.submissionId ?? "-";
  return `${warning.form} ${subject}: ${warning.message}`;
}

export function formatPublishSummary(report: PublishReport): string {
  const parts = [`${report.written} written`, `${report.skipped} unchanged`, `${report.failed} failed`];
  if (report.cancelled > 0) parts.push(`${report.cancelled} cancelled`);
  return parts.join(", ");
}

/**
 * Lines describing a fatal error: `[code] message`, then any issues
 */
export function formatErrorLines(error: unknown): string[] {
  if (error instanceof ConfigError) {
    return [`[${error.code}] ${error.message}`, ...error.issues.map((issue) => `  - ${issue}`)];
  }
  if (isPendencyError(error)) {
    return [`[${error.code}] ${error.message}`];
  }
  if (error instanceof Error) {
    return [error.message];
  }
  return ["An unexpected error occurred"];
}

/**
 * Report file name for a run, e.g. `survey-a-2024-03-01T10-20-30Z.xlsx`
 */
export function defaultReportPath(
  reportsDir: string,
  project: string,
  finishedAt: string,
  format: ReportFormat = "xlsx"
): string {
  const stamp = finishedAt.replace(/\.\d+Z$/, "Z").replace(/:/g, "-");
  return path.join(reportsDir, `${project}-${stamp}.${format}`);
}
