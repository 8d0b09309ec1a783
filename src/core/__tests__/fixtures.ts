/**
 * Shared test fixtures: a project configuration and submission builders
 * shaped like survey service exports (group paths flattened into keys).
 */

import type { JsonObject, SurveySubmission } from "../fields/index.js";
import {
  ProjectConfigSchema,
  type ProjectConfig,
  type ProjectConfigInput,
} from "../../utils/validation.js";

export const MASTER_FORM = "aMaster";
export const REVISIT_FORM = "aRevisit";

export function testConfigInput(): ProjectConfigInput {
  return {
    name: "test-project",
    survey: { baseUrl: "https://kobo.test", token: "test-secret" },
    forms: {
      master: {
        formId: MASTER_FORM,
        fields: {
          householdId: "info/household_id",
          status: "info/status",
          address: ["address/street", "address/number"],
          details: { interviewer: "meta/interviewer" },
        },
      },
      revisit: {
        formId: REVISIT_FORM,
        fields: {
          householdId: "household_id",
          status: "revisit/status",
        },
      },
    },
    statusVocabulary: {
      master: { complete: ["01"], incomplete: ["02", "03"] },
      revisit: { complete: ["01", "04", "05"], incomplete: ["02", "03"] },
    },
    retry: { maxAttempts: 3, initialDelayMs: 0, maxDelayMs: 0 },
  };
}

export function testConfig(): ProjectConfig {
  return ProjectConfigSchema.parse(testConfigInput());
}

export function masterSubmission(
  id: number,
  householdId: string,
  status: string,
  submittedAt: string,
  extra: JsonObject = {}
): SurveySubmission {
  return {
    _id: id,
    "info/household_id": householdId,
    "info/status": status,
    _submission_time: submittedAt,
    ...extra,
  };
}

export function revisitSubmission(
  id: number,
  householdId: string,
  status: string,
  submittedAt: string,
  extra: JsonObject = {}
): SurveySubmission {
  return {
    _id: id,
    household_id: householdId,
    "revisit/status": status,
    _submission_time: submittedAt,
    ...extra,
  };
}
