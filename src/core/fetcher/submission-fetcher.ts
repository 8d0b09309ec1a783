/**
 * Submission Fetcher
 *
 * Retrieves every submission of a form across pagination, retrying
 * transient page failures and dropping duplicate submission ids.
 *
 * @module
 */

import { resolvePathText, type SurveySubmission } from "../fields/index.js";
import type { ISurveyClient, SubmissionPage } from "../survey/index.js";
import { ErrorCode, FetchError, SurveyApiError } from "../errors.js";
import {
  CancellationToken,
  DEFAULT_RETRY_POLICY,
  RetryExhaustedError,
  retry,
  type RetryPolicy,
} from "../../utils/async.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("fetcher");

// =============================================================================
// Types
// =============================================================================

export interface FetchOptions {
  /** Checked between pages */
  token?: CancellationToken;
  /** Path of the submission id used for deduplication */
  submissionIdPath?: string;
}

export interface FetchedPage extends SubmissionPage {
  /** 1-based page number */
  page: number;
}

export interface FetchedForm {
  formId: string;
  submissions: SurveySubmission[];
  pages: number;
  duplicatesDropped: number;
}

/**
 * Whether a failure is worth another attempt
 */
export function isTransientFailure(error: unknown): boolean {
  return error instanceof SurveyApiError && error.transient;
}

// =============================================================================
// Fetcher
// =============================================================================

export class SubmissionFetcher {
  constructor(
    private readonly client: ISurveyClient,
    private readonly policy: RetryPolicy = DEFAULT_RETRY_POLICY
  ) {}

  /**
   * Lazily walks the pages of a form. Each iteration starts over from the
   * first page.
   */
  async *pages(formId: string, options: FetchOptions = {}): AsyncGenerator<FetchedPage> {
    const token = options.token ?? CancellationToken.none;
    const seen = new Set<string>();
    let cursor: string | null = null;
    let page = 0;

    do {
      if (token.cancelled) {
        throw new FetchError(`Fetch of form ${formId} was cancelled`, ErrorCode.FETCH_CANCELLED, {
          formId,
          page: page + 1,
          reason: token.reason,
        });
      }

      page++;
      const result: SubmissionPage = await this.fetchPage(formId, cursor, page);
      yield { page, ...result };

      cursor = result.nextCursor;
      if (cursor !== null) {
        if (seen.has(cursor)) {
          throw new FetchError(
            `Form ${formId} returned cursor ${cursor} twice`,
            ErrorCode.FETCH_PAGINATION_LOOP,
            { formId, page, cursor }
          );
        }
        seen.add(cursor);
      }
    } while (cursor !== null);
  }

  /**
   * Fetches all submissions of a form. The first occurrence of a
   * submission id wins; records without an id are kept.
   */
  async fetchAll(formId: string, options: FetchOptions = {}): Promise<FetchedForm> {
    const idPath = options.submissionIdPath ?? "_id";
    const ids = new Set<string>();
    const submissions: SurveySubmission[] = [];
    let duplicatesDropped = 0;
    let pages = 0;

    for await (const page of this.pages(formId, options)) {
      pages = page.page;
      for (const record of page.records) {
        const id = resolvePathText(record, idPath);
        if (id !== null) {
          if (ids.has(id)) {
            duplicatesDropped++;
            continue;
          }
          ids.add(id);
        }
        submissions.push(record);
      }
    }

    if (duplicatesDropped > 0) {
      logger.warn({ formId, duplicatesDropped }, "Dropped duplicate submissions");
    }
    logger.info({ formId, pages, submissions: submissions.length }, "Fetched form");

    return { formId, submissions, pages, duplicatesDropped };
  }

  private async fetchPage(
    formId: string,
    cursor: string | null,
    page: number
  ): Promise<SubmissionPage> {
    try {
      return await retry(() => this.client.listSubmissions(formId, cursor), this.policy, {
        retryIf: isTransientFailure,
        onRetry: (error, attempt, delayMs) => {
          logger.warn(
            { formId, page, attempt, delayMs, error: error instanceof Error ? error.message : String(error) },
            "Page request failed, retrying"
          );
        },
      });
    } catch (error) {
      if (!(error instanceof RetryExhaustedError)) throw error;

      const cause = error.lastError;
      const message = cause instanceof Error ? cause.message : String(cause);
      const exhausted = isTransientFailure(cause);
      throw new FetchError(
        exhausted
          ? `Gave up on form ${formId} page ${page} after ${error.attempts} attempts: ${message}`
          : `Form ${formId} page ${page} failed: ${message}`,
        exhausted ? ErrorCode.FETCH_RETRIES_EXHAUSTED : ErrorCode.FETCH_FAILED,
        { formId, page, attempts: error.attempts, cause }
      );
    }
  }
}
