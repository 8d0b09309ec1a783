/**
 * Statistics Aggregator
 *
 * Summary counts and completion rate over reconciled pendency records.
 *
 * @module
 */

import {
  PENDENCY_STATUSES,
  isActionable,
  type PendencyRecord,
  type PendencyStatus,
} from "../reconciliation/index.js";

export interface PendencyStats {
  total: number;
  /** Every status, zero-filled */
  byStatus: Record<PendencyStatus, number>;
  /** Households that still need field action */
  pending: number;
  /** COMPLETE / total, 0 when there are no households */
  completionRate: number;
}

export function emptyStatusCounts(): Record<PendencyStatus, number> {
  return { NO_MASTER: 0, PENDING_FIRST_VISIT: 0, PENDING_REVISIT: 0, COMPLETE: 0 };
}

export function aggregate(records: readonly PendencyRecord[]): PendencyStats {
  const byStatus = emptyStatusCounts();
  for (const record of records) {
    byStatus[record.status]++;
  }

  const total = records.length;
  const pending = PENDENCY_STATUSES.filter(isActionable).reduce(
    (sum, status) => sum + byStatus[status],
    0
  );

  return {
    total,
    byStatus,
    pending,
    completionRate: total === 0 ? 0 : byStatus.COMPLETE / total,
  };
}

/**
 * Completion rate as a percentage with one decimal, e.g. "66.7%"
 */
export function formatRate(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}
