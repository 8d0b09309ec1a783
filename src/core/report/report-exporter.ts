/**
 * Report Exporter
 *
 * Builds the tabular pendency report and the revisit form's choice list,
 * writes them as CSV or a one-sheet xlsx workbook and reads them back.
 *
 * @module
 */

import * as fs from "node:fs";
import * as path from "node:path";
import ExcelJS from "exceljs";
import { ErrorCode, ReportError } from "../errors.js";
import {
  PENDENCY_STATUSES,
  compareText,
  type PendencyRecord,
  type PendencyStatus,
} from "../reconciliation/index.js";
import { writeFileAtomic } from "../../utils/index.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("report");

// =============================================================================
// Report Shape
// =============================================================================

export const REPORT_COLUMNS = [
  "household_id",
  "address",
  "status",
  "last_master_visit_at",
  "last_revisit_at",
  "attempts",
] as const;

export type ReportColumn = (typeof REPORT_COLUMNS)[number];
export type ReportRow = Record<ReportColumn, string>;

export interface TabularReport<C extends string = ReportColumn> {
  columns: readonly C[];
  rows: Array<Record<C, string>>;
}

/**
 * Columns of the choice list attached to the revisit form: `name` is the
 * value a `select_one_from_file` question stores, `label` what it shows.
 */
export const MEDIA_COLUMNS = ["name", "label", ...REPORT_COLUMNS] as const;

export type MediaColumn = (typeof MEDIA_COLUMNS)[number];

export type ReportFormat = "csv" | "xlsx";

export const REPORT_SHEET_NAME = "Pendências";

export const STATUS_LABELS: Readonly<Record<PendencyStatus, string>> = {
  NO_MASTER: "No master visit",
  PENDING_FIRST_VISIT: "Pending first visit",
  PENDING_REVISIT: "Pending revisit",
  COMPLETE: "Complete",
};

export function statusLabel(status: PendencyStatus): string {
  return STATUS_LABELS[status];
}

/**
 * Inverse of {@link statusLabel}; null for unknown labels
 */
export function statusFromLabel(label: string): PendencyStatus | null {
  const wanted = label.trim().toLowerCase();
  return PENDENCY_STATUSES.find((status) => STATUS_LABELS[status].toLowerCase() === wanted) ?? null;
}

const STATUS_RANK = new Map<PendencyStatus, number>(
  PENDENCY_STATUSES.map((status, index) => [status, index])
);

// =============================================================================
// Export
// =============================================================================

function sortForReport(records: readonly PendencyRecord[]): PendencyRecord[] {
  return [...records].sort(
    (a, b) =>
      (STATUS_RANK.get(a.status) ?? 0) - (STATUS_RANK.get(b.status) ?? 0) ||
      compareText(a.householdId, b.householdId)
  );
}

function reportRow(record: PendencyRecord): ReportRow {
  return {
    household_id: record.householdId,
    address: record.address ?? "",
    status: statusLabel(record.status),
    last_master_visit_at: record.lastMasterVisitAt ?? "",
    last_revisit_at: record.lastRevisitAt ?? "",
    attempts: String(record.attempts),
  };
}

export function exportReport(records: readonly PendencyRecord[]): TabularReport {
  return {
    columns: REPORT_COLUMNS,
    rows: sortForReport(records).map(reportRow),
  };
}

/**
 * Choice list for the revisit form. A household is selected by its master
 * submission id, or by its household id when it has no master visit.
 */
export function exportMediaList(records: readonly PendencyRecord[]): TabularReport<MediaColumn> {
  return {
    columns: MEDIA_COLUMNS,
    rows: sortForReport(records).map((record) => {
      const name = record.masterSubmissionId ?? record.householdId;
      return {
        name,
        label: record.address ? `${name} — ${record.address}` : name,
        ...reportRow(record),
      };
    }),
  };
}

// =============================================================================
// CSV
// =============================================================================

function csvEscape(value: string): string {
  if (/[",\n\r]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Serializes with a header row, RFC 4180 quoting and `\n` line endings
 */
export function toCsv<C extends string>(report: TabularReport<C>): string {
  const lines = [report.columns.map(csvEscape).join(",")];
  for (const row of report.rows) {
    lines.push(report.columns.map((column) => csvEscape(row[column])).join(","));
  }
  return lines.join("\n") + "\n";
}

function parseCsvRows(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let quoted = false;
  let i = 0;

  while (i < text.length) {
    const char = text.charAt(i);

    if (quoted) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        quoted = false;
      } else {
        field += char;
      }
      i++;
      continue;
    }

    if (char === '"' && field.length === 0) {
      quoted = true;
    } else if (char === ",") {
      row.push(field);
      field = "";
    } else if (char === "\n" || char === "\r") {
      row.push(field);
      rows.push(row);
      row = [];
      field = "";
      if (char === "\r" && text[i + 1] === "\n") i++;
    } else {
      field += char;
    }
    i++;
  }

  if (quoted) {
    throw new ReportError("Unterminated quoted field", ErrorCode.REPORT_PARSE_FAILED);
  }
  if (field.length > 0 || row.length > 0) {
    row.push(field);
    rows.push(row);
  }
  return rows;
}

function isReportColumn(value: string): value is ReportColumn {
  return (REPORT_COLUMNS as readonly string[]).includes(value);
}

function reportFromRows(table: string[][]): TabularReport {
  const [header, ...body] = table;
  if (!header) {
    throw new ReportError("Report is empty", ErrorCode.REPORT_PARSE_FAILED);
  }

  const columns = header.filter(isReportColumn);
  if (columns.length !== REPORT_COLUMNS.length || header.some((name, i) => name !== REPORT_COLUMNS[i])) {
    throw new ReportError(`Unexpected report header: ${header.join(",")}`, ErrorCode.REPORT_PARSE_FAILED, {
      expected: REPORT_COLUMNS.join(","),
    });
  }

  const rows = body.map((cells, index) => {
    if (cells.length !== columns.length) {
      throw new ReportError(
        `Row ${index + 2} has ${cells.length} fields, expected ${columns.length}`,
        ErrorCode.REPORT_PARSE_FAILED
      );
    }
    const row: ReportRow = {
      household_id: "",
      address: "",
      status: "",
      last_master_visit_at: "",
      last_revisit_at: "",
      attempts: "",
    };
    columns.forEach((column, i) => {
      row[column] = cells[i] ?? "";
    });
    return row;
  });

  return { columns, rows };
}

/**
 * Reads a report written by {@link toCsv}. The header must list the report
 * columns in order.
 */
export function parseCsv(text: string): TabularReport {
  return reportFromRows(parseCsvRows(text));
}

// =============================================================================
// XLSX
// =============================================================================

/**
 * One-sheet workbook with a header row, every cell stored as text
 */
export async function toXlsx<C extends string>(report: TabularReport<C>): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(REPORT_SHEET_NAME);
  sheet.addRow([...report.columns]);
  for (const row of report.rows) {
    sheet.addRow(report.columns.map((column) => row[column]));
  }
  return Buffer.from(await workbook.xlsx.writeBuffer());
}

/**
 * Reads the report sheet of a workbook written by {@link toXlsx}
 */
export async function parseXlsx(filePath: string): Promise<TabularReport> {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.readFile(filePath);
  } catch (error) {
    throw new ReportError(
      `Cannot read workbook ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.REPORT_PARSE_FAILED,
      { filePath }
    );
  }
  const sheet = workbook.getWorksheet(REPORT_SHEET_NAME);
  if (!sheet) {
    throw new ReportError(`Workbook has no "${REPORT_SHEET_NAME}" sheet`, ErrorCode.REPORT_PARSE_FAILED, {
      filePath,
    });
  }

  const width = sheet.getRow(1).cellCount;
  const table: string[][] = [];
  sheet.eachRow((row) => {
    const cells: string[] = [];
    for (let column = 1; column <= width; column++) {
      cells.push(row.getCell(column).text);
    }
    table.push(cells);
  });
  return reportFromRows(table);
}

// =============================================================================
// Artifact
// =============================================================================

export function reportFormat(filePath: string): ReportFormat {
  return path.extname(filePath).toLowerCase() === ".xlsx" ? "xlsx" : "csv";
}

/**
 * Writes the artifact, as xlsx when the path ends in `.xlsx` and CSV
 * otherwise
 */
export async function writeReport<C extends string>(filePath: string, report: TabularReport<C>): Promise<void> {
  const format = reportFormat(filePath);
  try {
    writeFileAtomic(filePath, format === "xlsx" ? await toXlsx(report) : toCsv(report));
  } catch (error) {
    throw new ReportError(
      `Failed to write report to ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.REPORT_WRITE_FAILED,
      { filePath }
    );
  }
  logger.info({ filePath, format, rows: report.rows.length }, "Report written");
}

/**
 * Reads a report written by {@link writeReport}
 */
export async function readReport(filePath: string): Promise<TabularReport> {
  if (reportFormat(filePath) === "xlsx") {
    return parseXlsx(filePath);
  }
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ReportError(
      `Cannot read report ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.REPORT_PARSE_FAILED,
      { filePath }
    );
  }
  return parseCsv(text);
}
