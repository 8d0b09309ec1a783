/**
 * CLI Formatting Tests
 */

import { describe, it, expect } from "vitest";
import * as path from "node:path";
import { InvalidArgumentError } from "commander";
import {
  defaultReportPath,
  formatErrorLines,
  formatPublishSummary,
  formatStatsLines,
  formatWarning,
} from "../format.js";
import { parseCount } from "../context.js";
import { ConfigError, ErrorCode, FetchError } from "../../core/index.js";

describe("formatStatsLines", () => {
  it("should list totals, every status and the completion rate", () => {
    const lines = formatStatsLines({
      total: 3,
      byStatus: { NO_MASTER: 0, PENDING_FIRST_VISIT: 1, PENDING_REVISIT: 0, COMPLETE: 2 },
      pending: 1,
      completionRate: 2 / 3,
    });

    expect(lines).toEqual([
      "  Households:           3",
      "  No master visit:      0",
      "  Pending first visit:  1",
      "  Pending revisit:      0",
      "  Complete:             2",
      "  Pending:              1",
      "  Completion rate:      66.7%",
    ]);
  });
});

describe("formatWarning", () => {
  it("should name the household when known", () => {
    expect(
      formatWarning({
        kind: "orphan-revisit",
        form: "revisit",
        householdId: "H3",
        message: "Household H3 has 1 revisit(s) but no master visit",
      })
    ).toBe("revisit H3: Household H3 has 1 revisit(s) but no master visit");
  });

  it("should fall back to the submission id", () => {
    expect(
      formatWarning({
        kind: "missing-household-id",
        form: "master",
        submissionId: "17",
        message: 'No household id at "info/household_id"',
      })
    ).toBe('master 17: No household id at "info/household_id"');
  });
});

describe("formatPublishSummary", () => {
  it("should mention cancellations only when there are some", () => {
    const report = { formId: "aRevisit", outcomes: [], written: 2, skipped: 5, failed: 1, cancelled: 0 };

    expect(formatPublishSummary(report)).toBe("2 written, 5 unchanged, 1 failed");
    expect(formatPublishSummary({ ...report, cancelled: 3 })).toBe(
      "2 written, 5 unchanged, 1 failed, 3 cancelled"
    );
  });
});

describe("formatErrorLines", () => {
  it("should prefix pendency errors with their code", () => {
    const error = new FetchError("Fetching aMaster failed", ErrorCode.FETCH_FAILED, { formId: "aMaster" });

    expect(formatErrorLines(error)).toEqual([`[${ErrorCode.FETCH_FAILED}] Fetching aMaster failed`]);
  });

  it("should list configuration issues", () => {
    const error = new ConfigError("Invalid project configuration (1 issue(s))", ErrorCode.CONFIG_INVALID, {
      issues: ["name: Required"],
    });

    expect(formatErrorLines(error)).toEqual([
      `[${ErrorCode.CONFIG_INVALID}] Invalid project configuration (1 issue(s))`,
      "  - name: Required",
    ]);
  });

  it("should handle plain errors and other values", () => {
    expect(formatErrorLines(new Error("boom"))).toEqual(["boom"]);
    expect(formatErrorLines("boom")).toEqual(["An unexpected error occurred"]);
  });
});

describe("defaultReportPath", () => {
  it("should stamp the file name with a filesystem-safe time", () => {
    expect(defaultReportPath("/tmp/reports", "survey-a", "2024-03-01T10:20:30.123Z")).toBe(
      path.join("/tmp/reports", "survey-a-2024-03-01T10-20-30Z.xlsx")
    );
  });

  it("should use the requested format as extension", () => {
    expect(defaultReportPath("/tmp/reports", "survey-a", "2024-03-01T10:20:30Z", "csv")).toBe(
      path.join("/tmp/reports", "survey-a-2024-03-01T10-20-30Z.csv")
    );
  });
});

describe("parseCount", () => {
  it("should accept positive integers", () => {
    expect(parseCount("5")).toBe(5);
  });

  it("should reject anything else", () => {
    expect(() => parseCount("0")).toThrow(InvalidArgumentError);
    expect(() => parseCount("2.5")).toThrow(InvalidArgumentError);
    expect(() => parseCount("abc")).toThrow(InvalidArgumentError);
  });
});
