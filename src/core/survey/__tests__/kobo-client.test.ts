/**
 * KoboToolbox Client Tests
 *
 * Exercises the HTTP client against a stubbed global fetch.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { KoboSurveyClient, nestXPaths, trackingInstanceId } from "../impl/KoboSurveyClient.js";
import { ErrorCode, SurveyApiError } from "../../errors.js";

const BASE = "https://kobo.test";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("KoboSurveyClient", () => {
  const fetchMock = vi.fn<(input: string, init?: RequestInit) => Promise<Response>>();
  let client: KoboSurveyClient;

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
    client = new KoboSurveyClient({
      baseUrl: `${BASE}/`,
      token: "test-secret",
      pageSize: 50,
      timeoutMs: 1000,
    });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  // ===========================================================================
  // Submissions
  // ===========================================================================

  describe("listSubmissions", () => {
    it("should request the first page with token auth", async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ results: [{ _id: 1 }, { _id: 2 }], next: `${BASE}/page-2` })
      );

      const page = await client.listSubmissions("aMaster", null);

      expect(page).toEqual({ records: [{ _id: 1 }, { _id: 2 }], nextCursor: `${BASE}/page-2` });
      const [url, init] = fetchMock.mock.calls[0]!;
      expect(url).toBe(`${BASE}/api/v2/assets/aMaster/data/?format=json&page_size=50`);
      expect(init?.headers).toMatchObject({ Authorization: "Token test-secret" });
    });

    it("should follow the cursor URL verbatim", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ results: [], next: null }));

      const page = await client.listSubmissions("aMaster", `${BASE}/page-2`);

      expect(page.nextCursor).toBeNull();
      expect(fetchMock.mock.calls[0]![0]).toBe(`${BASE}/page-2`);
    });

    it("should mark server errors as transient", async () => {
      fetchMock.mockResolvedValueOnce(new Response("unavailable", { status: 503 }));

      const error = await client.listSubmissions("aMaster", null).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SurveyApiError);
      expect(error).toMatchObject({ status: 503, transient: true, code: ErrorCode.SURVEY_HTTP_ERROR });
    });

    it("should mark client errors as permanent", async () => {
      fetchMock.mockResolvedValueOnce(new Response("denied", { status: 403 }));

      await expect(client.listSubmissions("aMaster", null)).rejects.toMatchObject({
        status: 403,
        transient: false,
      });
    });

    it("should treat a missing form as a permanent error", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ detail: "Not found." }, 404));

      await expect(client.listSubmissions("nope", null)).rejects.toMatchObject({
        status: 404,
        transient: false,
      });
    });

    it("should map network failures to transient errors", async () => {
      fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));

      await expect(client.listSubmissions("aMaster", null)).rejects.toMatchObject({
        code: ErrorCode.SURVEY_NETWORK_ERROR,
        transient: true,
      });
    });

    it("should reject bodies that are not JSON", async () => {
      fetchMock.mockResolvedValueOnce(new Response("<html>", { status: 200 }));

      await expect(client.listSubmissions("aMaster", null)).rejects.toMatchObject({
        code: ErrorCode.SURVEY_INVALID_RESPONSE,
        transient: false,
      });
    });

    it("should reject pages without a results array", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ count: 3 }));

      await expect(client.listSubmissions("aMaster", null)).rejects.toMatchObject({
        code: ErrorCode.SURVEY_INVALID_RESPONSE,
      });
    });
  });

  describe("upsertSubmission", () => {
    it("should create through the submission endpoint with a stable instance id", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ message: "Successful submission." }, 201));

      const result = await client.upsertSubmission("aRevisit", {
        householdId: "H1",
        payload: {
          pendency_tracking: "1",
          "info/household_id": "H1",
          "pendency/status": "PENDING_REVISIT",
          "pendency/attempts": "0",
        },
      });

      const instanceId = trackingInstanceId("aRevisit", "H1");
      expect(result).toEqual({ submissionId: instanceId, operation: "create" });

      const [url, init] = fetchMock.mock.calls[0]!;
      expect(url).toBe(`${BASE}/api/v1/submissions`);
      expect(init?.method).toBe("POST");
      expect(JSON.parse(String(init?.body))).toEqual({
        id: "aRevisit",
        submission: {
          pendency_tracking: "1",
          info: { household_id: "H1" },
          pendency: { status: "PENDING_REVISIT", attempts: "0" },
          meta: { instanceID: instanceId },
        },
      });
    });

    it("should update through the bulk endpoint", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ successes: 1, failures: 0 }));

      const result = await client.upsertSubmission("aRevisit", {
        householdId: "H1",
        submissionId: "77",
        payload: { "pendency/status": "PENDING_REVISIT" },
      });

      expect(result).toEqual({ submissionId: "77", operation: "update" });
      const [url, init] = fetchMock.mock.calls[0]!;
      expect(url).toBe(`${BASE}/api/v2/assets/aRevisit/data/bulk/`);
      expect(init?.method).toBe("PATCH");
      expect(JSON.parse(String(init?.body))).toEqual({
        payload: { submission_ids: [77], data: { "pendency/status": "PENDING_REVISIT" } },
      });
    });
  });

  // ===========================================================================
  // Assets & Media
  // ===========================================================================

  describe("getAsset", () => {
    it("should map the asset summary", async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ uid: "aMaster", name: "Master", deployment__submission_count: 12 })
      );

      await expect(client.getAsset("aMaster")).resolves.toEqual({
        uid: "aMaster",
        name: "Master",
        submissionCount: 12,
      });
      expect(fetchMock.mock.calls[0]![0]).toBe(`${BASE}/api/v2/assets/aMaster/`);
    });

    it("should return null for an unknown form", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ detail: "Not found." }, 404));

      await expect(client.getAsset("nope")).resolves.toBeNull();
    });
  });

  describe("form media", () => {
    it("should list only form media files", async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({
          results: [
            { uid: "af1", file_type: "form_media", metadata: { filename: "pendencias.csv" } },
            { uid: "af2", file_type: "map_layer", metadata: { filename: "area.geojson" } },
          ],
        })
      );

      await expect(client.listFormMedia("aRevisit")).resolves.toEqual([
        { uid: "af1", fileName: "pendencias.csv" },
      ]);
    });

    it("should delete by uid", async () => {
      fetchMock.mockResolvedValueOnce(new Response(null, { status: 204 }));

      await client.deleteFormMedia("aRevisit", "af1");

      const [url, init] = fetchMock.mock.calls[0]!;
      expect(url).toBe(`${BASE}/api/v2/assets/aRevisit/files/af1/`);
      expect(init?.method).toBe("DELETE");
    });

    it("should upload as multipart form data", async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ uid: "af9", metadata: { filename: "pendencias.csv" } }, 201)
      );

      const uploaded = await client.uploadFormMedia("aRevisit", {
        fileName: "pendencias.csv",
        content: "household_id\nH1\n",
        contentType: "text/csv",
      });

      expect(uploaded).toEqual({ uid: "af9", fileName: "pendencias.csv" });
      const body = fetchMock.mock.calls[0]![1]?.body;
      expect(body).toBeInstanceOf(FormData);
    });
  });
});

describe("trackingInstanceId", () => {
  it("should be stable per form and household", () => {
    expect(trackingInstanceId("f", "H1")).toBe(trackingInstanceId("f", "H1"));
    expect(trackingInstanceId("f", "H1")).not.toBe(trackingInstanceId("f", "H2"));
    expect(trackingInstanceId("f", "H1")).toMatch(
      /^uuid:[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-a[0-9a-f]{3}-[0-9a-f]{12}$/
    );
  });
});

describe("nestXPaths", () => {
  it("should merge keys that share a group and keep top-level keys", () => {
    expect(
      nestXPaths({
        marker: "1",
        "a/b/c": "x",
        "a/b/d": 2,
        "a/e": null,
      })
    ).toEqual({ marker: "1", a: { b: { c: "x", d: 2 }, e: null } });
  });
});
