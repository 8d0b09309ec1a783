/**
 * Visit Record Extraction
 *
 * Turns raw submissions into typed visit records through the field
 * mapping, and defines household id normalization and recency order.
 */

import {
  FieldResolver,
  resolvePathText,
  type SurveySubmission,
} from "../../fields/index.js";
import type { FieldMapping } from "../../../utils/validation.js";
import type { DataQualityWarning, FormKind, VisitRecord } from "../interfaces/IReconciliation.js";

// =============================================================================
// Normalization
// =============================================================================

/**
 * Join key for a household id: NFKC, trimmed, lower-cased
 */
export function normalizeHouseholdId(raw: string): string {
  return raw.normalize("NFKC").trim().toLowerCase();
}

const LOCAL_DATE_TIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

/**
 * Parses a submission timestamp to epoch milliseconds. Date-times without
 * an offset are read as UTC.
 */
export function parseTimestamp(value: string | number): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;

  const text = value.trim();
  if (text.length === 0) return null;
  const ms = Date.parse(LOCAL_DATE_TIME.test(text) ? `${text}Z` : text);
  return Number.isNaN(ms) ? null : ms;
}

function compareSubmissionIds(a: string, b: string): number {
  if (/^\d+$/.test(a) && /^\d+$/.test(b)) {
    const left = BigInt(a);
    const right = BigInt(b);
    return left === right ? 0 : left > right ? 1 : -1;
  }
  return a === b ? 0 : a > b ? 1 : -1;
}

/**
 * Positive when `a` is more recent than `b`: later submittedAt, then the
 * higher submission id.
 */
export function compareRecency(
  a: Pick<VisitRecord, "submittedAt" | "submissionId">,
  b: Pick<VisitRecord, "submittedAt" | "submissionId">
): number {
  if (a.submittedAt !== b.submittedAt) return a.submittedAt > b.submittedAt ? 1 : -1;
  return compareSubmissionIds(a.submissionId, b.submissionId);
}

/**
 * Code-unit string order, independent of locale
 */
export function compareText(a: string, b: string): number {
  return a === b ? 0 : a < b ? -1 : 1;
}

function detailsKey(details: Readonly<Record<string, string>>): string {
  return JSON.stringify(Object.keys(details).sort(compareText).map((key) => [key, details[key]]));
}

/**
 * Total order over visit records: {@link compareRecency}, then content, so
 * two copies of one submission with different values still pick the same
 * winner whatever order they arrive in.
 */
export function compareVisits(a: VisitRecord, b: VisitRecord): number {
  return (
    compareRecency(a, b) ||
    compareText(a.status ?? "", b.status ?? "") ||
    compareText(a.householdId, b.householdId) ||
    compareText(a.address ?? "", b.address ?? "") ||
    compareText(detailsKey(a.details), detailsKey(b.details))
  );
}

// =============================================================================
// Extraction
// =============================================================================

export interface ExtractOptions {
  /** Submissions with a value at this path are excluded silently */
  markerField?: string;
}

export interface ExtractedRecords {
  records: VisitRecord[];
  warnings: DataQualityWarning[];
  skipped: number;
  trackingExcluded: number;
}

type CoreField = "householdId" | "status" | "submissionId" | "submittedAt";

export function extractRecords(
  form: FormKind,
  submissions: readonly SurveySubmission[],
  mapping: FieldMapping,
  options: ExtractOptions = {}
): ExtractedRecords {
  const fields = new FieldResolver<CoreField>(mapping);
  const records: VisitRecord[] = [];
  const warnings: DataQualityWarning[] = [];
  let skipped = 0;
  let trackingExcluded = 0;

  for (const submission of submissions) {
    if (options.markerField && resolvePathText(submission, options.markerField) !== null) {
      trackingExcluded++;
      continue;
    }

    const submissionId = fields.resolveText("submissionId", submission);
    const householdId = fields.resolveText("householdId", submission);

    if (householdId === null) {
      skipped++;
      warnings.push({
        kind: "missing-household-id",
        form,
        ...(submissionId !== null ? { submissionId } : {}),
        message: `No household id at "${mapping.householdId}"`,
      });
      continue;
    }

    if (submissionId === null) {
      skipped++;
      warnings.push({
        kind: "missing-submission-id",
        form,
        householdId,
        message: `No submission id at "${mapping.submissionId}"`,
      });
      continue;
    }

    const timestamp = fields.resolve("submittedAt", submission);
    const rawTime = timestamp.found ? timestamp.value : null;
    const submittedAt =
      typeof rawTime === "string" || typeof rawTime === "number" ? parseTimestamp(rawTime) : null;
    if (submittedAt === null) {
      skipped++;
      warnings.push({
        kind: "invalid-timestamp",
        form,
        submissionId,
        householdId,
        message: timestamp.found
          ? `Unparseable timestamp ${JSON.stringify(timestamp.value)} at "${mapping.submittedAt}"`
          : `No timestamp at "${mapping.submittedAt}"`,
      });
      continue;
    }

    const addressParts = mapping.address
      .map((path) => resolvePathText(submission, path))
      .filter((part): part is string => part !== null);

    const details: Record<string, string> = {};
    for (const [label, path] of Object.entries(mapping.details)) {
      const value = resolvePathText(submission, path);
      if (value !== null) details[label] = value;
    }

    records.push({
      form,
      householdId,
      householdKey: normalizeHouseholdId(householdId),
      submissionId,
      status: fields.resolveText("status", submission),
      submittedAt,
      address: addressParts.length > 0 ? addressParts.join(", ") : null,
      details,
    });
  }

  return { records, warnings, skipped, trackingExcluded };
}
