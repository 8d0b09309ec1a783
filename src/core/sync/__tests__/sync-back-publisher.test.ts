/**
 * Sync-Back Publisher Tests
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  SyncBackPublisher,
  matchesPayload,
  removedPayload,
  trackingPayload,
  type PublisherConfig,
} from "../sync-back-publisher.js";
import { InMemorySurveyClient } from "../../survey/__tests__/in-memory-survey-client.js";
import type { SubmissionWrite, SubmissionWriteResult } from "../../survey/index.js";
import { REVISIT_FORM, testConfig } from "../../__tests__/fixtures.js";
import type { PendencyRecord, PendencyStatus } from "../../reconciliation/index.js";
import { ErrorCode, PendencyError, PublishItemFailure, SurveyApiError } from "../../errors.js";
import { CancellationTokenSource, type RetryPolicy } from "../../../utils/async.js";

const NO_DELAY: RetryPolicy = { maxAttempts: 3, initialDelayMs: 0, maxDelayMs: 0, backoffFactor: 2 };

const config = testConfig();

function publisherConfig(overrides: Partial<PublisherConfig> = {}): PublisherConfig {
  return {
    revisitFields: config.forms.revisit.fields,
    markerField: "pendency_tracking",
    concurrency: 2,
    mediaFileName: "pendencias.csv",
    retry: NO_DELAY,
    ...overrides,
  };
}

function record(
  householdId: string,
  status: PendencyStatus,
  overrides: Partial<PendencyRecord> = {}
): PendencyRecord {
  return {
    householdId,
    householdKey: householdId.toLowerCase(),
    masterSubmissionId: status === "NO_MASTER" ? null : "1",
    address: null,
    status,
    lastMasterVisitAt: status === "NO_MASTER" ? null : "2024-03-01T10:00:00.000Z",
    lastRevisitAt: null,
    attempts: 0,
    details: {},
    ...overrides,
  };
}

describe("SyncBackPublisher.publish", () => {
  let client: InMemorySurveyClient;
  let publisher: SyncBackPublisher;

  beforeEach(() => {
    client = new InMemorySurveyClient(2).addForm(REVISIT_FORM);
    publisher = new SyncBackPublisher(client, publisherConfig());
  });

  it("should create tracking submissions for actionable households only", async () => {
    const report = await publisher.publish(
      [record("H1", "PENDING_REVISIT"), record("H2", "COMPLETE")],
      REVISIT_FORM
    );

    expect(report).toMatchObject({ formId: REVISIT_FORM, written: 1, skipped: 0, failed: 0, cancelled: 0 });
    expect(report.outcomes).toEqual([
      { householdId: "H1", status: "written", operation: "create", submissionId: "9000" },
    ]);
    expect(client.submissions(REVISIT_FORM)).toEqual([
      {
        pendency_tracking: "1",
        household_id: "H1",
        "pendency/status": "PENDING_REVISIT",
        "pendency/address": "",
        "pendency/attempts": "0",
        "pendency/last_master_visit_at": "2024-03-01T10:00:00.000Z",
        "pendency/last_revisit_at": "",
        _id: 9000,
        _submission_time: "2024-06-01T12:00:00",
      },
    ]);
  });

  it("should skip everything when published twice without changes", async () => {
    const records = [record("H1", "PENDING_REVISIT"), record("H3", "NO_MASTER")];

    await publisher.publish(records, REVISIT_FORM);
    const second = await publisher.publish(records, REVISIT_FORM);

    expect(second.outcomes).toEqual([
      { householdId: "H1", status: "skipped", submissionId: "9000" },
      { householdId: "H3", status: "skipped", submissionId: "9001" },
    ]);
    expect(second.written).toBe(0);
    expect(client.writes).toHaveLength(2);
  });

  it("should update the existing submission when a household changes", async () => {
    await publisher.publish([record("H1", "PENDING_REVISIT")], REVISIT_FORM);

    const report = await publisher.publish(
      [record("H1", "PENDING_REVISIT", { attempts: 1, lastRevisitAt: "2024-03-05T09:00:00.000Z" })],
      REVISIT_FORM
    );

    expect(report.outcomes).toEqual([
      { householdId: "H1", status: "written", operation: "update", submissionId: "9000" },
    ]);
    expect(client.submissions(REVISIT_FORM)).toHaveLength(1);
    expect(client.submissions(REVISIT_FORM)[0]).toMatchObject({
      "pendency/attempts": "1",
      "pendency/last_revisit_at": "2024-03-05T09:00:00.000Z",
    });
  });

  it("should mark tracked households complete once, then skip them", async () => {
    await publisher.publish([record("H1", "PENDING_REVISIT")], REVISIT_FORM);

    const completed = await publisher.publish([record("H1", "COMPLETE")], REVISIT_FORM);
    const again = await publisher.publish([record("H1", "COMPLETE")], REVISIT_FORM);

    expect(completed.outcomes[0]).toMatchObject({ status: "written", operation: "update" });
    expect(client.submissions(REVISIT_FORM)[0]?.["pendency/status"]).toBe("COMPLETE");
    expect(again.outcomes[0]).toMatchObject({ status: "skipped" });
  });

  it("should match existing tracking rows by normalized household id", async () => {
    client.addForm(REVISIT_FORM, [
      { _id: 40, household_id: "H1", "revisit/status": "02", _submission_time: "2024-04-01T00:00:00" },
      {
        _id: 500,
        household_id: " h1 ",
        pendency_tracking: "1",
        "pendency/status": "PENDING_FIRST_VISIT",
        _submission_time: "2024-05-01T00:00:00",
      },
    ]);

    const report = await publisher.publish([record("H1", "PENDING_REVISIT")], REVISIT_FORM);

    expect(report.outcomes).toEqual([
      { householdId: "H1", status: "written", operation: "update", submissionId: "500" },
    ]);
  });

  it("should mark tracking rows of vanished households as removed, once", async () => {
    await publisher.publish([record("H1", "PENDING_REVISIT"), record("H2", "PENDING_FIRST_VISIT")], REVISIT_FORM);

    const report = await publisher.publish([record("H2", "PENDING_FIRST_VISIT")], REVISIT_FORM);
    const again = await publisher.publish([record("H2", "PENDING_FIRST_VISIT")], REVISIT_FORM);

    expect(report.outcomes).toEqual([
      { householdId: "H2", status: "skipped", submissionId: "9001" },
      { householdId: "H1", status: "written", operation: "update", submissionId: "9000" },
    ]);
    expect(client.submissions(REVISIT_FORM)[0]).toMatchObject({
      household_id: "H1",
      "pendency/status": "REMOVED",
      "pendency/attempts": "0",
    });
    expect(again.outcomes[1]).toEqual({ householdId: "H1", status: "skipped", submissionId: "9000" });
  });

  it("should keep the underlying error of a failed write", async () => {
    const cause = new SurveyApiError("HTTP 400", ErrorCode.SURVEY_HTTP_ERROR, { status: 400, transient: false });
    client.failNext("upsert", cause);

    const report = await publisher.publish([record("H1", "PENDING_REVISIT")], REVISIT_FORM);

    const failed = report.outcomes[0];
    expect(failed?.status).toBe("failed");
    if (failed?.status === "failed") {
      expect(failed.error.context?.["cause"]).toBe(cause);
    }
  });

  it("should isolate a failing household", async () => {
    publisher = new SyncBackPublisher(client, publisherConfig({ concurrency: 1 }));
    client.failNext("upsert", new Error("validation failed"));

    const report = await publisher.publish(
      [record("H1", "PENDING_REVISIT"), record("H2", "PENDING_FIRST_VISIT")],
      REVISIT_FORM
    );

    expect(report).toMatchObject({ written: 1, failed: 1 });
    const failed = report.outcomes[0];
    expect(failed?.status).toBe("failed");
    if (failed?.status === "failed") {
      expect(failed.error).toBeInstanceOf(PublishItemFailure);
      expect(failed.error).toMatchObject({
        householdId: "H1",
        attempts: 1,
        code: ErrorCode.PUBLISH_ITEM_FAILED,
      });
    }
    expect(report.outcomes[1]).toMatchObject({ householdId: "H2", status: "written" });
  });

  it("should retry transient write failures", async () => {
    client.failNext(
      "upsert",
      new SurveyApiError("HTTP 502", ErrorCode.SURVEY_HTTP_ERROR, { status: 502, transient: true })
    );

    const report = await publisher.publish([record("H1", "PENDING_REVISIT")], REVISIT_FORM);

    expect(report.written).toBe(1);
    expect(client.writes).toHaveLength(1);
  });

  it("should not start new writes after cancellation", async () => {
    const source = new CancellationTokenSource();
    class CancellingClient extends InMemorySurveyClient {
      override async upsertSubmission(formId: string, write: SubmissionWrite): Promise<SubmissionWriteResult> {
        source.cancel("stop");
        return super.upsertSubmission(formId, write);
      }
    }
    const cancelling = new CancellingClient(2).addForm(REVISIT_FORM);
    publisher = new SyncBackPublisher(cancelling, publisherConfig({ concurrency: 1 }));

    const report = await publisher.publish(
      [record("H1", "PENDING_REVISIT"), record("H2", "PENDING_REVISIT"), record("H3", "NO_MASTER")],
      REVISIT_FORM,
      { token: source.token }
    );

    expect(report.outcomes.map((outcome) => outcome.status)).toEqual([
      "written",
      "cancelled",
      "cancelled",
    ]);
    expect(cancelling.writes).toHaveLength(1);
  });

  it("should keep writes within the concurrency limit", async () => {
    let inFlight = 0;
    let peak = 0;
    class SlowClient extends InMemorySurveyClient {
      override async upsertSubmission(formId: string, write: SubmissionWrite): Promise<SubmissionWriteResult> {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 5));
        inFlight--;
        return super.upsertSubmission(formId, write);
      }
    }
    const slow = new SlowClient(10).addForm(REVISIT_FORM);
    publisher = new SyncBackPublisher(slow, publisherConfig({ concurrency: 2 }));

    const records = ["H1", "H2", "H3", "H4", "H5"].map((id) => record(id, "PENDING_REVISIT"));
    const report = await publisher.publish(records, REVISIT_FORM);

    expect(report.written).toBe(5);
    expect(peak).toBe(2);
  });
});

describe("SyncBackPublisher.publishMedia", () => {
  let client: InMemorySurveyClient;
  let publisher: SyncBackPublisher;

  beforeEach(() => {
    client = new InMemorySurveyClient().addForm(REVISIT_FORM);
    publisher = new SyncBackPublisher(client, publisherConfig());
  });

  it("should replace the pendency list and keep other media", async () => {
    client.addMedia(REVISIT_FORM, "pendencias.csv", "old");
    client.addMedia(REVISIT_FORM, "other.csv", "keep");

    const result = await publisher.publishMedia("household_id\nH1\n", REVISIT_FORM);

    expect(result).toEqual({ deleted: 1, uploaded: { uid: "media-3", fileName: "pendencias.csv" } });
    expect(client.deletedMedia).toEqual(["media-1"]);
    expect(client.mediaContent(REVISIT_FORM)).toEqual([
      { fileName: "other.csv", content: "keep" },
      { fileName: "pendencias.csv", content: "household_id\nH1\n" },
    ]);
  });

  it("should report media failures with their own code", async () => {
    client.failNext("media", new Error("denied"));

    const error = await publisher.publishMedia("x", REVISIT_FORM).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PendencyError);
    expect(error).toMatchObject({
      code: ErrorCode.PUBLISH_MEDIA_FAILED,
      message: `Failed to publish pendencias.csv to form ${REVISIT_FORM}: denied`,
    });
  });
});

describe("tracking payload", () => {
  it("should retire a household with only its identity and status", () => {
    expect(removedPayload("H9", "household_id", "pendency_tracking")).toEqual({
      pendency_tracking: "1",
      household_id: "H9",
      "pendency/status": "REMOVED",
    });
  });

  it("should render every value as text", () => {
    const desired = trackingPayload(record("H1", "PENDING_REVISIT", { attempts: 3 }), "household_id", "pendency_tracking");

    expect(desired).toEqual({
      pendency_tracking: "1",
      household_id: "H1",
      "pendency/status": "PENDING_REVISIT",
      "pendency/address": "",
      "pendency/attempts": "3",
      "pendency/last_master_visit_at": "2024-03-01T10:00:00.000Z",
      "pendency/last_revisit_at": "",
    });
  });

  it("should compare stored values as text, nested or flattened", () => {
    const desired = { "pendency/attempts": "3", "pendency/address": "" };

    expect(matchesPayload({ pendency: { attempts: 3 } }, desired)).toBe(true);
    expect(matchesPayload({ "pendency/attempts": "3", "pendency/address": null }, desired)).toBe(true);
    expect(matchesPayload({ "pendency/attempts": "4" }, desired)).toBe(false);
  });
});
