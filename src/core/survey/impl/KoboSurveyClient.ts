/**
 * KoboToolbox Survey Client
 *
 * HTTP implementation of ISurveyClient against the KoboToolbox REST API.
 */

import { createHash } from "node:crypto";
import { z } from "zod";
import { isJsonObject, type JsonObject, type JsonValue } from "../../fields/index.js";
import { ErrorCode, SurveyApiError } from "../../errors.js";
import { createLogger } from "../../../utils/logger.js";
import type {
  FormMediaFile,
  FormMediaUpload,
  ISurveyClient,
  SubmissionPage,
  SubmissionWrite,
  SubmissionWriteResult,
  SurveyAsset,
} from "../interfaces/ISurveyClient.js";

const logger = createLogger("kobo-client");

export interface KoboClientConfig {
  baseUrl: string;
  token: string;
  pageSize?: number;
  timeoutMs?: number;
}

// =============================================================================
// Response Schemas
// =============================================================================

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

const DataPageSchema = z.object({
  results: z.array(z.record(JsonValueSchema)),
  next: z.string().nullable().optional(),
});

const AssetSchema = z.object({
  uid: z.string(),
  name: z.string().default(""),
  deployment__submission_count: z.number().nullable().optional(),
});

const MediaItemSchema = z.object({
  uid: z.string().optional(),
  id: z.union([z.string(), z.number()]).optional(),
  file_type: z.string().optional(),
  data_type: z.string().optional(),
  filename: z.string().optional(),
  metadata: z.object({ filename: z.string().optional() }).passthrough().nullable().optional(),
});

const MediaListSchema = z.object({
  results: z.array(MediaItemSchema),
});

type MediaItem = z.infer<typeof MediaItemSchema>;

// =============================================================================
// Helpers
// =============================================================================

function isTransientStatus(status: number): boolean {
  return status >= 500 || status === 429 || status === 408;
}

/**
 * Expands xpath keys such as `"pendency/status"` into nested groups, the
 * shape the JSON submission endpoint turns into instance XML
 */
export function nestXPaths(payload: JsonObject): JsonObject {
  const root: JsonObject = {};
  for (const [key, value] of Object.entries(payload)) {
    const segments = key.split("/").filter((segment) => segment.length > 0);
    const leaf = segments.pop();
    if (leaf === undefined) continue;

    let group = root;
    for (const segment of segments) {
      const child = group[segment];
      if (child !== undefined && isJsonObject(child)) {
        group = child;
      } else {
        const created: JsonObject = {};
        group[segment] = created;
        group = created;
      }
    }
    group[leaf] = value;
  }
  return root;
}

/**
 * Stable instance id per (form, household), so a retried create is
 * recognised by the service as the same submission.
 */
export function trackingInstanceId(formId: string, householdId: string): string {
  const hex = createHash("sha256").update(`${formId}\u0000${householdId}`).digest("hex");
  return `uuid:${hex.slice(0, 8)}-${hex.slice(8, 12)}-5${hex.slice(13, 16)}-a${hex.slice(17, 20)}-${hex.slice(20, 32)}`;
}

function mediaFromItem(item: MediaItem): FormMediaFile | null {
  const type = item.file_type ?? item.data_type;
  if (type !== "form_media") return null;
  const uid = item.uid ?? (item.id !== undefined ? String(item.id) : undefined);
  const fileName = item.metadata?.filename ?? item.filename;
  if (!uid || !fileName) return null;
  return { uid, fileName: fileName.trim() };
}

// =============================================================================
// Client
// =============================================================================

export class KoboSurveyClient implements ISurveyClient {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly pageSize: number;
  private readonly timeoutMs: number;

  constructor(config: KoboClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.token = config.token;
    this.pageSize = config.pageSize ?? 10000;
    this.timeoutMs = config.timeoutMs ?? 60000;
  }

  private assetUrl(formId: string, suffix = ""): string {
    return `${this.baseUrl}/api/v2/assets/${encodeURIComponent(formId)}/${suffix}`;
  }

  private async request(url: string, init: RequestInit = {}): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    const method = init.method ?? "GET";

    try {
      const response = await fetch(url, {
        ...init,
        headers: {
          Authorization: `Token ${this.token}`,
          Accept: "application/json",
          ...init.headers,
        },
        signal: controller.signal,
      });

      if (!response.ok && response.status !== 404) {
        const body = await response.text().catch(() => "");
        throw new SurveyApiError(
          `${method} ${url} failed with HTTP ${response.status}`,
          ErrorCode.SURVEY_HTTP_ERROR,
          {
            status: response.status,
            transient: isTransientStatus(response.status),
            body: body.slice(0, 500),
          }
        );
      }

      return response;
    } catch (error) {
      if (error instanceof SurveyApiError) throw error;
      if (error instanceof Error && error.name === "AbortError") {
        throw new SurveyApiError(
          `${method} ${url} timed out after ${this.timeoutMs}ms`,
          ErrorCode.SURVEY_TIMEOUT,
          { transient: true }
        );
      }
      throw new SurveyApiError(
        `${method} ${url} failed: ${error instanceof Error ? error.message : String(error)}`,
        ErrorCode.SURVEY_NETWORK_ERROR,
        { transient: true }
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async json<T>(
    response: Response,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    url: string
  ): Promise<T> {
    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new SurveyApiError(`Response from ${url} is not JSON`, ErrorCode.SURVEY_INVALID_RESPONSE, {
        status: response.status,
      });
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new SurveyApiError(
        `Unexpected response shape from ${url}`,
        ErrorCode.SURVEY_INVALID_RESPONSE,
        { status: response.status, issues: parsed.error.issues.slice(0, 5) }
      );
    }
    return parsed.data;
  }

  private notFound(url: string): SurveyApiError {
    return new SurveyApiError(`${url} returned HTTP 404`, ErrorCode.SURVEY_HTTP_ERROR, {
      status: 404,
      transient: false,
    });
  }

  // ===========================================================================
  // Submissions
  // ===========================================================================

  async listSubmissions(formId: string, cursor: string | null): Promise<SubmissionPage> {
    const url =
      cursor ?? `${this.assetUrl(formId, "data/")}?format=json&page_size=${this.pageSize}`;

    logger.debug({ formId, url }, "Requesting submissions page");
    const response = await this.request(url);
    if (response.status === 404) throw this.notFound(url);

    const page = await this.json(response, DataPageSchema, url);
    return { records: page.results, nextCursor: page.next ?? null };
  }

  async upsertSubmission(formId: string, write: SubmissionWrite): Promise<SubmissionWriteResult> {
    if (write.submissionId !== undefined) {
      const url = this.assetUrl(formId, "data/bulk/");
      const id = /^\d+$/.test(write.submissionId) ? Number(write.submissionId) : write.submissionId;
      const response = await this.request(url, {
        method: "PATCH",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ payload: { submission_ids: [id], data: write.payload } }),
      });
      if (response.status === 404) throw this.notFound(url);
      return { submissionId: write.submissionId, operation: "update" };
    }

    const instanceId = trackingInstanceId(formId, write.householdId);
    const url = `${this.baseUrl}/api/v1/submissions`;
    const response = await this.request(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        id: formId,
        submission: { ...nestXPaths(write.payload), meta: { instanceID: instanceId } },
      }),
    });
    if (response.status === 404) throw this.notFound(url);
    return { submissionId: instanceId, operation: "create" };
  }

  // ===========================================================================
  // Assets & Media
  // ===========================================================================

  async getAsset(formId: string): Promise<SurveyAsset | null> {
    const url = this.assetUrl(formId);
    const response = await this.request(url);
    if (response.status === 404) return null;

    const asset = await this.json(response, AssetSchema, url);
    return {
      uid: asset.uid,
      name: asset.name,
      submissionCount: asset.deployment__submission_count ?? null,
    };
  }

  async listFormMedia(formId: string): Promise<FormMediaFile[]> {
    const url = `${this.assetUrl(formId, "files/")}?file_type=form_media`;
    const response = await this.request(url);
    if (response.status === 404) throw this.notFound(url);

    const list = await this.json(response, MediaListSchema, url);
    const files: FormMediaFile[] = [];
    for (const item of list.results) {
      const file = mediaFromItem(item);
      if (file) files.push(file);
    }
    return files;
  }

  async deleteFormMedia(formId: string, uid: string): Promise<void> {
    const url = this.assetUrl(formId, `files/${encodeURIComponent(uid)}/`);
    await this.request(url, { method: "DELETE" });
  }

  async uploadFormMedia(formId: string, file: FormMediaUpload): Promise<FormMediaFile> {
    const url = this.assetUrl(formId, "files/");
    const form = new FormData();
    form.append("file_type", "form_media");
    form.append("description", file.description ?? "Pendency list");
    form.append("metadata", JSON.stringify({ filename: file.fileName }));
    form.append("content", new Blob([file.content], { type: file.contentType }), file.fileName);

    const response = await this.request(url, { method: "POST", body: form });
    if (response.status === 404) throw this.notFound(url);

    const item = await this.json(response, MediaItemSchema, url);
    const uploaded = mediaFromItem({ file_type: "form_media", ...item });
    return uploaded ?? { uid: item.uid ?? "", fileName: file.fileName };
  }
}
