/**
 * Reconciliation Engine
 *
 * Joins Master and Revisit submissions by household and classifies each
 * household. Pure: the same inputs in any order give identical outputs.
 */

import type { SurveySubmission } from "../../fields/index.js";
import { ErrorCode, ReconciliationError } from "../../errors.js";
import type { ProjectConfig } from "../../../utils/validation.js";
import { createLogger } from "../../../utils/logger.js";
import type {
  DataQualityWarning,
  FormKind,
  IReconciliationEngine,
  PendencyRecord,
  PendencyStatus,
  ReconciliationConfig,
  ReconciliationInput,
  ReconciliationResult,
  VisitRecord,
} from "../interfaces/IReconciliation.js";
import { compareText, compareVisits, extractRecords } from "../models/visit-records.js";
import { StatusVocabulary } from "../status/status-vocabulary.js";

const logger = createLogger("reconciliation");

interface HouseholdVisits {
  master: VisitRecord | null;
  revisit: VisitRecord | null;
  attempts: number;
}

function compareWarnings(a: DataQualityWarning, b: DataQualityWarning): number {
  return (
    compareText(a.form, b.form) ||
    compareText(a.kind, b.kind) ||
    compareText(a.householdId ?? "", b.householdId ?? "") ||
    compareText(a.submissionId ?? "", b.submissionId ?? "") ||
    compareText(a.message, b.message)
  );
}

function toIso(ms: number): string {
  return new Date(ms).toISOString();
}

function requireSet(
  value: readonly SurveySubmission[] | null | undefined,
  form: FormKind
): readonly SurveySubmission[] {
  if (!Array.isArray(value)) {
    throw new ReconciliationError(
      `The ${form} submission set is missing`,
      ErrorCode.RECONCILIATION_INPUT_MISSING,
      { form, received: value === null ? "null" : typeof value }
    );
  }
  return value;
}

/**
 * Engine settings taken from a project configuration
 */
export function reconciliationConfigFrom(config: ProjectConfig): ReconciliationConfig {
  return {
    forms: config.forms,
    statusVocabulary: config.statusVocabulary,
    markerField: config.sync.markerField,
  };
}

export class ReconciliationEngine implements IReconciliationEngine {
  private readonly masterStatuses: StatusVocabulary;
  private readonly revisitStatuses: StatusVocabulary;

  constructor(private readonly config: ReconciliationConfig) {
    this.masterStatuses = new StatusVocabulary(config.statusVocabulary.master);
    this.revisitStatuses = new StatusVocabulary(config.statusVocabulary.revisit);
  }

  reconcile(input: ReconciliationInput): ReconciliationResult {
    const masterSet = requireSet(input.master, "master");
    const revisitSet = requireSet(input.revisit, "revisit");

    const master = extractRecords("master", masterSet, this.config.forms.master.fields);
    const revisit = extractRecords("revisit", revisitSet, this.config.forms.revisit.fields, {
      markerField: this.config.markerField,
    });
    const warnings: DataQualityWarning[] = [...master.warnings, ...revisit.warnings];

    const households = this.group(master.records, revisit.records);
    const records: PendencyRecord[] = [];

    for (const key of [...households.keys()].sort(compareText)) {
      const visits = households.get(key);
      if (!visits) continue;
      records.push(this.classify(key, visits, warnings));
    }

    warnings.sort(compareWarnings);

    const result: ReconciliationResult = {
      records,
      warnings,
      counts: {
        masterSubmissions: masterSet.length,
        revisitSubmissions: revisitSet.length,
        skipped: master.skipped + revisit.skipped,
        trackingExcluded: revisit.trackingExcluded,
        households: records.length,
      },
    };

    logger.debug({ ...result.counts, warnings: warnings.length }, "Reconciled submissions");
    return result;
  }

  private group(
    masters: readonly VisitRecord[],
    revisits: readonly VisitRecord[]
  ): Map<string, HouseholdVisits> {
    const households = new Map<string, HouseholdVisits>();
    const entry = (key: string): HouseholdVisits => {
      let visits = households.get(key);
      if (!visits) {
        visits = { master: null, revisit: null, attempts: 0 };
        households.set(key, visits);
      }
      return visits;
    };

    for (const record of masters) {
      const visits = entry(record.householdKey);
      if (!visits.master || compareVisits(record, visits.master) > 0) visits.master = record;
    }

    for (const record of revisits) {
      const visits = entry(record.householdKey);
      visits.attempts++;
      if (!visits.revisit || compareVisits(record, visits.revisit) > 0) visits.revisit = record;
    }

    return households;
  }

  private classify(
    householdKey: string,
    visits: HouseholdVisits,
    warnings: DataQualityWarning[]
  ): PendencyRecord {
    const { master, revisit } = visits;
    let status: PendencyStatus;

    if (!master) {
      status = "NO_MASTER";
      if (revisit) {
        warnings.push({
          kind: "orphan-revisit",
          form: "revisit",
          householdId: revisit.householdId,
          submissionId: revisit.submissionId,
          message: `Household ${revisit.householdId} has ${visits.attempts} revisit(s) but no master visit`,
        });
      }
    } else if (this.outcome(master, this.masterStatuses, warnings) === "incomplete") {
      status = "PENDING_FIRST_VISIT";
    } else if (!revisit || this.outcome(revisit, this.revisitStatuses, warnings) === "incomplete") {
      status = "PENDING_REVISIT";
    } else {
      status = "COMPLETE";
    }

    const display = master ?? revisit;
    return Object.freeze({
      householdId: display?.householdId ?? householdKey,
      householdKey,
      masterSubmissionId: master?.submissionId ?? null,
      address: master?.address ?? revisit?.address ?? null,
      status,
      lastMasterVisitAt: master ? toIso(master.submittedAt) : null,
      lastRevisitAt: revisit ? toIso(revisit.submittedAt) : null,
      attempts: visits.attempts,
      details: Object.freeze({ ...revisit?.details, ...master?.details }),
    });
  }

  private outcome(
    record: VisitRecord,
    vocabulary: StatusVocabulary,
    warnings: DataQualityWarning[]
  ): "complete" | "incomplete" {
    const { outcome, recognized } = vocabulary.classify(record.status);
    if (!recognized) {
      warnings.push({
        kind: "unrecognized-status",
        form: record.form,
        householdId: record.householdId,
        submissionId: record.submissionId,
        message:
          record.status === null
            ? `No status value; treated as ${outcome}`
            : `Unrecognized status "${record.status}"; treated as ${outcome}`,
      });
    }
    return outcome;
  }
}

/**
 * Reconciles both submission sets under a project configuration
 */
export function reconcile(input: ReconciliationInput, config: ProjectConfig): ReconciliationResult {
  return new ReconciliationEngine(reconciliationConfigFrom(config)).reconcile(input);
}
