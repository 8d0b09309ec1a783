/**
 * Reconciliation Engine Interface
 *
 * Defines the records the engine extracts from Master and Revisit
 * submissions, the pendency records it derives, and the data-quality
 * warnings it reports alongside.
 */

import type { SurveySubmission } from "../../fields/index.js";
import type { FormConfig, StatusVocabularyConfig } from "../../../utils/validation.js";

// =============================================================================
// Statuses
// =============================================================================

/**
 * Derived household statuses, in report priority order
 */
export const PENDENCY_STATUSES = [
  "NO_MASTER",
  "PENDING_FIRST_VISIT",
  "PENDING_REVISIT",
  "COMPLETE",
] as const;

export type PendencyStatus = (typeof PENDENCY_STATUSES)[number];

/**
 * Statuses that require field action
 */
export const ACTIONABLE_STATUSES: ReadonlySet<PendencyStatus> = new Set<PendencyStatus>([
  "NO_MASTER",
  "PENDING_FIRST_VISIT",
  "PENDING_REVISIT",
]);

export function isActionable(status: PendencyStatus): boolean {
  return ACTIONABLE_STATUSES.has(status);
}

// =============================================================================
// Source Records
// =============================================================================

export type FormKind = "master" | "revisit";

/**
 * One usable Master or Revisit submission
 */
export interface VisitRecord {
  form: FormKind;
  /** Trimmed raw id, used for display */
  householdId: string;
  /** Normalized id, used for joining */
  householdKey: string;
  submissionId: string;
  /** Raw status value, null when the submission has none */
  status: string | null;
  /** Epoch milliseconds */
  submittedAt: number;
  address: string | null;
  details: Record<string, string>;
}

export type MasterRecord = VisitRecord & { form: "master" };
export type RevisitRecord = VisitRecord & { form: "revisit" };

// =============================================================================
// Data Quality Warnings
// =============================================================================

export type WarningKind =
  | "missing-household-id"
  | "missing-submission-id"
  | "invalid-timestamp"
  | "orphan-revisit"
  | "unrecognized-status";

/**
 * A problem with the source data. Returned with results, never thrown.
 */
export interface DataQualityWarning {
  kind: WarningKind;
  form: FormKind;
  submissionId?: string;
  householdId?: string;
  message: string;
}

// =============================================================================
// Pendency Records
// =============================================================================

/**
 * Derived status of one household
 */
export interface PendencyRecord {
  readonly householdId: string;
  readonly householdKey: string;
  /** Submission id of the latest Master visit, null only for NO_MASTER */
  readonly masterSubmissionId: string | null;
  readonly address: string | null;
  readonly status: PendencyStatus;
  /** ISO timestamp of the latest Master visit, null only for NO_MASTER */
  readonly lastMasterVisitAt: string | null;
  readonly lastRevisitAt: string | null;
  /** Number of Revisit submissions */
  readonly attempts: number;
  readonly details: Readonly<Record<string, string>>;
}

// =============================================================================
// Engine Contract
// =============================================================================

export interface ReconciliationConfig {
  forms: { master: FormConfig; revisit: FormConfig };
  statusVocabulary: { master: StatusVocabularyConfig; revisit: StatusVocabularyConfig };
  /** Revisit submissions carrying this field are tracking rows, not visits */
  markerField?: string;
}

export interface ReconciliationInput {
  master: readonly SurveySubmission[] | null | undefined;
  revisit: readonly SurveySubmission[] | null | undefined;
}

export interface ReconciliationCounts {
  masterSubmissions: number;
  revisitSubmissions: number;
  /** Submissions skipped with a warning */
  skipped: number;
  /** Tracking submissions left out of the Revisit set */
  trackingExcluded: number;
  households: number;
}

export interface ReconciliationResult {
  /** One record per household, sorted by householdKey */
  records: readonly PendencyRecord[];
  warnings: readonly DataQualityWarning[];
  counts: ReconciliationCounts;
}

export interface IReconciliationEngine {
  /**
   * Joins both submission sets and classifies every household.
   * Throws ReconciliationError only when an input set is missing.
   */
  reconcile(input: ReconciliationInput): ReconciliationResult;
}
