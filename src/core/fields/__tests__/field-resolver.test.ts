/**
 * Field Resolver Tests
 */

import { describe, it, expect } from "vitest";
import {
  FieldResolver,
  resolvePath,
  resolvePathText,
  toText,
  type SurveySubmission,
} from "../field-resolver.js";

describe("resolvePath", () => {
  it("should read a flattened group key literally", () => {
    const payload: SurveySubmission = { "info_gerais/status": "01" };
    expect(resolvePath(payload, "info_gerais/status")).toEqual({ found: true, value: "01" });
  });

  it("should descend nested objects with either separator", () => {
    const payload: SurveySubmission = { info: { household: { id: "H-7" } } };
    expect(resolvePath(payload, "info/household/id")).toEqual({ found: true, value: "H-7" });
    expect(resolvePath(payload, "info.household.id")).toEqual({ found: true, value: "H-7" });
  });

  it("should mix literal keys and nesting", () => {
    const payload: SurveySubmission = { "group/inner": { field: 3 } };
    expect(resolvePath(payload, "group/inner/field")).toEqual({ found: true, value: 3 });
  });

  it("should fall back to a shorter key when the longest one leads nowhere", () => {
    const payload: SurveySubmission = {
      "a/b": { other: 1 },
      a: { b: { c: "deep" } },
    };
    expect(resolvePath(payload, "a/b/c")).toEqual({ found: true, value: "deep" });
  });

  it("should index arrays with numeric segments", () => {
    const payload: SurveySubmission = { visits: [{ n: 1 }, { n: 2 }] };
    expect(resolvePath(payload, "visits/1/n")).toEqual({ found: true, value: 2 });
    expect(resolvePath(payload, "visits/5/n")).toEqual({ found: false, reason: "absent" });
  });

  it("should report absent for missing keys and null values", () => {
    const payload: SurveySubmission = { present: null };
    expect(resolvePath(payload, "missing")).toEqual({ found: false, reason: "absent" });
    expect(resolvePath(payload, "present")).toEqual({ found: false, reason: "absent" });
  });

  it("should report not-traversable when walking into a scalar", () => {
    const payload: SurveySubmission = { status: "01" };
    expect(resolvePath(payload, "status/code")).toEqual({
      found: false,
      reason: "not-traversable",
    });
  });

  it("should report not-traversable for a named segment on an array", () => {
    const payload: SurveySubmission = { visits: [{ n: 1 }] };
    expect(resolvePath(payload, "visits/n")).toEqual({ found: false, reason: "not-traversable" });
  });

  it("should never throw on odd paths", () => {
    expect(resolvePath({ a: 1 }, "")).toEqual({ found: false, reason: "absent" });
    expect(resolvePath({ a: 1 }, "//")).toEqual({ found: false, reason: "absent" });
  });
});

describe("toText / resolvePathText", () => {
  it("should render scalars", () => {
    expect(toText("x")).toBe("x");
    expect(toText(42)).toBe("42");
    expect(toText(false)).toBe("false");
  });

  it("should not render containers or null", () => {
    expect(toText(null)).toBeNull();
    expect(toText([1])).toBeNull();
    expect(toText({ a: 1 })).toBeNull();
  });

  it("should trim text and treat blank as missing", () => {
    const payload: SurveySubmission = { id: "  H1 ", blank: "   ", n: 7 };
    expect(resolvePathText(payload, "id")).toBe("H1");
    expect(resolvePathText(payload, "blank")).toBeNull();
    expect(resolvePathText(payload, "n")).toBe("7");
    expect(resolvePathText(payload, "nope")).toBeNull();
  });
});

describe("FieldResolver", () => {
  const fields = new FieldResolver<"householdId" | "status" | "address">({
    householdId: "household_id",
    status: "info/status",
  });

  it("should resolve mapped logical names", () => {
    const payload: SurveySubmission = { household_id: "H1", info: { status: "02" } };
    expect(fields.resolve("householdId", payload)).toEqual({ found: true, value: "H1" });
    expect(fields.resolveText("status", payload)).toBe("02");
  });

  it("should report unmapped names without throwing", () => {
    expect(fields.resolve("address", { address: "x" })).toEqual({
      found: false,
      reason: "unmapped",
    });
    expect(fields.resolveText("address", { address: "x" })).toBeNull();
    expect(fields.pathOf("address")).toBeUndefined();
  });

  it("should expose configured paths", () => {
    expect(fields.pathOf("status")).toBe("info/status");
  });
});
