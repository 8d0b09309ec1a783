/**
 * Sync-Back Publisher
 *
 * Writes one tracking submission per household onto the Revisit form so
 * field teams see pendencies in their collection app. Publishing is
 * idempotent: unchanged households are skipped, changed ones updated.
 *
 * @module
 */

import {
  resolvePath,
  resolvePathText,
  type JsonObject,
  type SurveySubmission,
} from "../fields/index.js";
import type { FormMediaFile, ISurveyClient } from "../survey/index.js";
import { SubmissionFetcher, isTransientFailure } from "../fetcher/index.js";
import {
  compareRecency,
  compareText,
  isActionable,
  normalizeHouseholdId,
  parseTimestamp,
  type PendencyRecord,
} from "../reconciliation/index.js";
import { ErrorCode, PendencyError, PublishItemFailure } from "../errors.js";
import type { FieldMapping } from "../../utils/validation.js";
import {
  CancellationToken,
  DEFAULT_RETRY_POLICY,
  RetryExhaustedError,
  mapConcurrent,
  retry,
  type RetryPolicy,
} from "../../utils/async.js";
import { fromPromiseWith } from "../../types/result.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("sync");

// =============================================================================
// Types
// =============================================================================

export interface PublisherConfig {
  /** Revisit form field mapping; the household id is written at its path */
  revisitFields: FieldMapping;
  markerField: string;
  concurrency: number;
  mediaFileName: string;
  retry?: RetryPolicy;
}

export interface PublishOptions {
  token?: CancellationToken;
}

export type PublishOutcome =
  | {
      householdId: string;
      status: "written";
      operation: "create" | "update";
      submissionId: string;
    }
  | { householdId: string; status: "skipped"; submissionId: string }
  | { householdId: string; status: "failed"; error: PublishItemFailure }
  | { householdId: string; status: "cancelled" };

export interface PublishReport {
  formId: string;
  outcomes: PublishOutcome[];
  written: number;
  skipped: number;
  failed: number;
  cancelled: number;
}

export interface MediaPublishResult {
  deleted: number;
  uploaded: FormMediaFile;
}

interface WriteTarget {
  householdId: string;
  desired: Record<string, string>;
  existing: TrackingRow | undefined;
}

interface TrackingRow {
  householdId: string;
  submissionId: string;
  submittedAt: number;
  payload: SurveySubmission;
}

// =============================================================================
// Tracking Payload
// =============================================================================

export const TRACKING_FIELDS = {
  status: "pendency/status",
  address: "pendency/address",
  attempts: "pendency/attempts",
  lastMasterVisitAt: "pendency/last_master_visit_at",
  lastRevisitAt: "pendency/last_revisit_at",
} as const;

/** Tracking status for households no longer present in either form */
export const REMOVED_STATUS = "REMOVED";

/**
 * Desired tracking submission content for a household. Keys are payload
 * paths; every value is text.
 */
export function trackingPayload(
  record: PendencyRecord,
  householdIdPath: string,
  markerField: string
): Record<string, string> {
  return {
    [markerField]: "1",
    [householdIdPath]: record.householdId,
    [TRACKING_FIELDS.status]: record.status,
    [TRACKING_FIELDS.address]: record.address ?? "",
    [TRACKING_FIELDS.attempts]: String(record.attempts),
    [TRACKING_FIELDS.lastMasterVisitAt]: record.lastMasterVisitAt ?? "",
    [TRACKING_FIELDS.lastRevisitAt]: record.lastRevisitAt ?? "",
  };
}

/**
 * Retires a tracking submission whose household has left the result. Other
 * tracked fields keep their last values.
 */
export function removedPayload(
  householdId: string,
  householdIdPath: string,
  markerField: string
): Record<string, string> {
  return {
    [markerField]: "1",
    [householdIdPath]: householdId,
    [TRACKING_FIELDS.status]: REMOVED_STATUS,
  };
}

/**
 * Whether a stored submission already carries every desired value
 */
export function matchesPayload(stored: SurveySubmission, desired: Record<string, string>): boolean {
  return Object.entries(desired).every(
    ([path, value]) => (resolvePathText(stored, path) ?? "") === value
  );
}

function summarize(formId: string, outcomes: PublishOutcome[]): PublishReport {
  const count = (status: PublishOutcome["status"]): number =>
    outcomes.filter((outcome) => outcome.status === status).length;
  return {
    formId,
    outcomes,
    written: count("written"),
    skipped: count("skipped"),
    failed: count("failed"),
    cancelled: count("cancelled"),
  };
}

// =============================================================================
// Publisher
// =============================================================================

export class SyncBackPublisher {
  private readonly policy: RetryPolicy;
  private readonly fetcher: SubmissionFetcher;

  constructor(
    private readonly client: ISurveyClient,
    private readonly config: PublisherConfig
  ) {
    this.policy = config.retry ?? DEFAULT_RETRY_POLICY;
    this.fetcher = new SubmissionFetcher(client, this.policy);
  }

  /**
   * Upserts tracking submissions for every actionable household and every
   * household that already has one, and marks tracking submissions of
   * vanished households as removed. Resolves once all items settle.
   */
  async publish(
    records: readonly PendencyRecord[],
    revisitFormId: string,
    options: PublishOptions = {}
  ): Promise<PublishReport> {
    const token = options.token ?? CancellationToken.none;
    const tracking = await this.loadTracking(revisitFormId, token);

    const { householdId: householdIdPath } = this.config.revisitFields;
    const marker = this.config.markerField;
    const present = new Set(records.map((record) => record.householdKey));

    const targets: WriteTarget[] = records
      .filter((record) => isActionable(record.status) || tracking.has(record.householdKey))
      .map((record) => ({
        householdId: record.householdId,
        desired: trackingPayload(record, householdIdPath, marker),
        existing: tracking.get(record.householdKey),
      }));
    const removed = [...tracking.entries()]
      .filter(([key]) => !present.has(key))
      .sort(([a], [b]) => compareText(a, b))
      .map(([, row]) => ({
        householdId: row.householdId,
        desired: removedPayload(row.householdId, householdIdPath, marker),
        existing: row,
      }));
    logger.info(
      {
        formId: revisitFormId,
        targets: targets.length,
        removed: removed.length,
        existing: tracking.size,
      },
      "Publishing tracking submissions"
    );

    const outcomes = await mapConcurrent(
      [...targets, ...removed],
      (target) => this.publishOne(target, revisitFormId, token),
      this.config.concurrency
    );

    const report = summarize(revisitFormId, outcomes);
    logger.info(
      {
        formId: revisitFormId,
        written: report.written,
        skipped: report.skipped,
        failed: report.failed,
        cancelled: report.cancelled,
      },
      "Publish finished"
    );
    return report;
  }

  /**
   * Replaces the pendency list attached to the form as a media file
   */
  async publishMedia(csv: string, revisitFormId: string): Promise<MediaPublishResult> {
    const fileName = this.config.mediaFileName;
    try {
      const existing = await this.withRetry(() => this.client.listFormMedia(revisitFormId));
      const stale = existing.filter((file) => file.fileName === fileName);
      for (const file of stale) {
        await this.withRetry(() => this.client.deleteFormMedia(revisitFormId, file.uid));
      }

      const uploaded = await this.withRetry(() =>
        this.client.uploadFormMedia(revisitFormId, {
          fileName,
          content: csv,
          contentType: "text/csv",
        })
      );
      logger.info({ formId: revisitFormId, fileName, deleted: stale.length }, "Form media replaced");
      return { deleted: stale.length, uploaded };
    } catch (error) {
      const cause = error instanceof RetryExhaustedError ? error.lastError : error;
      throw new PendencyError(
        `Failed to publish ${fileName} to form ${revisitFormId}: ${
          cause instanceof Error ? cause.message : String(cause)
        }`,
        ErrorCode.PUBLISH_MEDIA_FAILED,
        { formId: revisitFormId, fileName }
      );
    }
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private withRetry<T>(fn: () => Promise<T>): Promise<T> {
    return retry(fn, this.policy, { retryIf: isTransientFailure });
  }

  /**
   * Existing tracking submissions keyed by normalized household id, latest wins
   */
  private async loadTracking(
    formId: string,
    token: CancellationToken
  ): Promise<Map<string, TrackingRow>> {
    const fields = this.config.revisitFields;
    const { submissions } = await this.fetcher.fetchAll(formId, {
      token,
      submissionIdPath: fields.submissionId,
    });

    const rows = new Map<string, TrackingRow>();
    for (const submission of submissions) {
      if (resolvePathText(submission, this.config.markerField) === null) continue;

      const householdId = resolvePathText(submission, fields.householdId);
      const submissionId = resolvePathText(submission, fields.submissionId);
      if (householdId === null || submissionId === null) continue;

      const time = resolvePath(submission, fields.submittedAt);
      const parsed =
        time.found && (typeof time.value === "string" || typeof time.value === "number")
          ? parseTimestamp(time.value)
          : null;
      const row: TrackingRow = { householdId, submissionId, submittedAt: parsed ?? 0, payload: submission };

      const key = normalizeHouseholdId(householdId);
      const current = rows.get(key);
      if (!current || compareRecency(row, current) > 0) rows.set(key, row);
    }
    return rows;
  }

  private async publishOne(
    { householdId, desired, existing }: WriteTarget,
    formId: string,
    token: CancellationToken
  ): Promise<PublishOutcome> {
    if (token.cancelled) return { householdId, status: "cancelled" };

    if (existing && matchesPayload(existing.payload, desired)) {
      return { householdId, status: "skipped", submissionId: existing.submissionId };
    }

    const payload: JsonObject = { ...desired };
    let attempts = 0;
    const result = await fromPromiseWith(
      retry(
        (attempt) => {
          attempts = attempt;
          return this.client.upsertSubmission(formId, {
            householdId,
            ...(existing ? { submissionId: existing.submissionId } : {}),
            payload,
          });
        },
        this.policy,
        { retryIf: isTransientFailure }
      ),
      (error) => (error instanceof RetryExhaustedError ? error.lastError : error)
    );

    if (result.ok) {
      return {
        householdId,
        status: "written",
        operation: result.value.operation,
        submissionId: result.value.submissionId,
      };
    }

    const message = result.error instanceof Error ? result.error.message : String(result.error);
    logger.warn({ formId, householdId, attempts, error: message }, "Tracking write failed");
    return {
      householdId,
      status: "failed",
      error: new PublishItemFailure(
        `Failed to write tracking submission for ${householdId}: ${message}`,
        ErrorCode.PUBLISH_ITEM_FAILED,
        { householdId, attempts, formId, cause: result.error }
      ),
    };
  }
}
