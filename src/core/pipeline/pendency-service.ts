/**
 * Pendency Service
 *
 * Runs the "refresh" and "sync to remote" triggers: fetch both forms,
 * reconcile, aggregate, export, and optionally publish back.
 *
 * @module
 */

import { createSurveyClient, type ISurveyClient, type SurveyAsset } from "../survey/index.js";
import { SubmissionFetcher, type FetchedForm } from "../fetcher/index.js";
import {
  ReconciliationEngine,
  isActionable,
  reconciliationConfigFrom,
  type DataQualityWarning,
  type FormKind,
  type PendencyRecord,
  type ReconciliationCounts,
} from "../reconciliation/index.js";
import { aggregate, type PendencyStats } from "../statistics/index.js";
import { exportMediaList, exportReport, toCsv, type TabularReport } from "../report/index.js";
import {
  SyncBackPublisher,
  type MediaPublishResult,
  type PublishReport,
} from "../sync/index.js";
import { HistoryStore } from "../history/index.js";
import { ErrorCode, FetchError, wrapError } from "../errors.js";
import type { ProjectConfig } from "../../utils/validation.js";
import { CancellationToken } from "../../utils/async.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("pipeline");

// =============================================================================
// Types
// =============================================================================

export interface RunOptions {
  token?: CancellationToken;
}

export interface SyncOptions extends RunOptions {
  /** Also replace the pendency list attached to the Revisit form */
  media?: boolean;
}

export interface SourceSummary {
  formId: string;
  submissions: number;
  pages: number;
  duplicatesDropped: number;
}

export interface RefreshResult {
  project: string;
  startedAt: string;
  finishedAt: string;
  sources: Record<FormKind, SourceSummary>;
  /** Every household, sorted by household key */
  records: readonly PendencyRecord[];
  /** Households that still need field action */
  pendencies: readonly PendencyRecord[];
  warnings: readonly DataQualityWarning[];
  counts: ReconciliationCounts;
  stats: PendencyStats;
  /** Tabular report of the pendency list */
  report: TabularReport;
}

export interface SyncResult {
  refresh: RefreshResult;
  publish: PublishReport;
  media: MediaPublishResult | null;
}

export interface ConnectionCheck {
  form: FormKind;
  formId: string;
  asset: SurveyAsset | null;
}

function summarizeSource(fetched: FetchedForm): SourceSummary {
  return {
    formId: fetched.formId,
    submissions: fetched.submissions.length,
    pages: fetched.pages,
    duplicatesDropped: fetched.duplicatesDropped,
  };
}

// =============================================================================
// Service
// =============================================================================

export class PendencyService {
  constructor(
    private readonly client: ISurveyClient,
    private readonly history: HistoryStore | null = null
  ) {}

  async refresh(config: ProjectConfig, options: RunOptions = {}): Promise<RefreshResult> {
    const token = options.token ?? CancellationToken.none;
    const startedAt = new Date().toISOString();
    const { master: masterForm, revisit: revisitForm } = config.forms;
    const fetcher = new SubmissionFetcher(this.client, config.retry);

    logger.info(
      { project: config.name, master: masterForm.formId, revisit: revisitForm.formId },
      "Refresh started"
    );

    const [master, revisit] = await Promise.allSettled([
      fetcher.fetchAll(masterForm.formId, { token, submissionIdPath: masterForm.fields.submissionId }),
      fetcher.fetchAll(revisitForm.formId, { token, submissionIdPath: revisitForm.fields.submissionId }),
    ]);

    if (master.status === "rejected" || revisit.status === "rejected") {
      const outcomes = [master, revisit];
      const completedForms = outcomes.flatMap((outcome) =>
        outcome.status === "fulfilled" ? [outcome.value.formId] : []
      );
      const failed = outcomes.find(
        (outcome): outcome is PromiseRejectedResult => outcome.status === "rejected"
      );
      throw this.fetchFailure(failed?.reason, completedForms);
    }

    const engine = new ReconciliationEngine(reconciliationConfigFrom(config));
    const { records, warnings, counts } = engine.reconcile({
      master: master.value.submissions,
      revisit: revisit.value.submissions,
    });
    token.throwIfCancelled();

    const pendencies = records.filter((record) => isActionable(record.status));
    const stats = aggregate(records);
    const result: RefreshResult = {
      project: config.name,
      startedAt,
      finishedAt: new Date().toISOString(),
      sources: { master: summarizeSource(master.value), revisit: summarizeSource(revisit.value) },
      records,
      pendencies,
      warnings,
      counts,
      stats,
      report: exportReport(pendencies),
    };

    this.history?.append(config.name, {
      timestamp: result.finishedAt,
      stats,
      warningCount: warnings.length,
      sources: { master: result.sources.master.submissions, revisit: result.sources.revisit.submissions },
    });

    logger.info(
      { project: config.name, households: stats.total, pending: stats.pending, warnings: warnings.length },
      "Refresh finished"
    );
    return result;
  }

  async sync(config: ProjectConfig, options: SyncOptions = {}): Promise<SyncResult> {
    const refresh = await this.refresh(config, options);
    const publisher = new SyncBackPublisher(this.client, {
      revisitFields: config.forms.revisit.fields,
      markerField: config.sync.markerField,
      concurrency: config.sync.concurrency,
      mediaFileName: config.sync.mediaFileName,
      retry: config.retry,
    });
    const formId = config.forms.revisit.formId;

    const token = options.token ?? CancellationToken.none;

    const publish = await publisher.publish(refresh.records, formId, { token });
    if (!options.media) {
      return { refresh, publish, media: null };
    }
    if (token.cancelled) {
      logger.warn({ formId, reason: token.reason }, "Run cancelled, form media left unchanged");
      return { refresh, publish, media: null };
    }

    const media = await publisher.publishMedia(toCsv(exportMediaList(refresh.pendencies)), formId);
    return { refresh, publish, media };
  }

  /**
   * Looks up both forms; an entry with a null asset was not found
   */
  async validateConnection(config: ProjectConfig): Promise<ConnectionCheck[]> {
    const forms: FormKind[] = ["master", "revisit"];
    return Promise.all(
      forms.map(async (form) => {
        const formId = config.forms[form].formId;
        return { form, formId, asset: await this.client.getAsset(formId) };
      })
    );
  }

  private fetchFailure(reason: unknown, completedForms: string[]): Error {
    if (!(reason instanceof FetchError)) {
      return wrapError(reason, "Fetching submissions failed", ErrorCode.FETCH_FAILED);
    }
    logger.error({ formId: reason.formId, completedForms, code: reason.code }, "Refresh aborted");
    return new FetchError(reason.message, reason.code, {
      ...reason.context,
      formId: reason.formId,
      attempts: reason.attempts,
      cause: reason.lastCause,
      completedForms,
    });
  }
}

export interface ServiceOptions {
  /** History file; history is not recorded when omitted */
  historyPath?: string;
}

/**
 * Creates a service talking to the project's survey service
 */
export function createPendencyService(config: ProjectConfig, options: ServiceOptions = {}): PendencyService {
  return new PendencyService(
    createSurveyClient(config.survey),
    options.historyPath ? new HistoryStore(options.historyPath) : null
  );
}
