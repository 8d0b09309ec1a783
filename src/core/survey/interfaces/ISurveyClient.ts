/**
 * Survey Service Client Interface
 *
 * The boundary to the external survey-collection service. Everything the
 * tracker reads from or writes to the service goes through this contract.
 */

import type { JsonObject, SurveySubmission } from "../../fields/index.js";

// =============================================================================
// Submissions
// =============================================================================

/**
 * One page of submissions plus the cursor for the next page (null at the end)
 */
export interface SubmissionPage {
  records: SurveySubmission[];
  nextCursor: string | null;
}

/**
 * A tracking submission to create, or to update when `submissionId` is set
 */
export interface SubmissionWrite {
  householdId: string;
  submissionId?: string;
  payload: JsonObject;
}

export interface SubmissionWriteResult {
  submissionId: string;
  operation: "create" | "update";
}

// =============================================================================
// Assets & Media
// =============================================================================

export interface SurveyAsset {
  uid: string;
  name: string;
  submissionCount: number | null;
}

export interface FormMediaFile {
  uid: string;
  fileName: string;
}

export interface FormMediaUpload {
  fileName: string;
  content: string;
  contentType: string;
  description?: string;
}

// =============================================================================
// Client Interface
// =============================================================================

export interface ISurveyClient {
  /**
   * List one page of a form's submissions. A null cursor requests the first page.
   */
  listSubmissions(formId: string, cursor: string | null): Promise<SubmissionPage>;

  /**
   * Create a submission, or update an existing one when `write.submissionId` is set
   */
  upsertSubmission(formId: string, write: SubmissionWrite): Promise<SubmissionWriteResult>;

  /**
   * Look up a form; null when it does not exist or is not visible to the token
   */
  getAsset(formId: string): Promise<SurveyAsset | null>;

  listFormMedia(formId: string): Promise<FormMediaFile[]>;

  deleteFormMedia(formId: string, uid: string): Promise<void>;

  uploadFormMedia(formId: string, file: FormMediaUpload): Promise<FormMediaFile>;
}
