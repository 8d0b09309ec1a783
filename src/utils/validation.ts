/**
 * Runtime Validation Schemas
 *
 * Zod schemas for validating project configuration at load time.
 * Provides type-safe validation with automatic TypeScript type inference.
 *
 * @module
 */

import { z } from "zod";

// =============================================================================
// Field Mapping Schema
// =============================================================================

/**
 * A payload path such as `info_gerais/status` or `household.id`
 */
export const FieldPathSchema = z
  .string()
  .trim()
  .min(1, "path must not be empty")
  .refine((value) => !/[/.]{2}|^[/.]|[/.]$/.test(value), {
    message: "path must not start, end or repeat a separator",
  });

/**
 * Logical field name → payload path, per form
 */
export const FieldMappingSchema = z.object({
  /** Household identifier (join key) */
  householdId: FieldPathSchema,

  /** Raw visit status */
  status: FieldPathSchema,

  /** Unique submission id assigned by the survey service */
  submissionId: FieldPathSchema.default("_id"),

  /** Submission timestamp */
  submittedAt: FieldPathSchema.default("_submission_time"),

  /** Address parts, joined with ", " for display */
  address: z.array(FieldPathSchema).default([]),

  /** Extra display fields carried onto pendency records */
  details: z.record(z.string().min(1), FieldPathSchema).default({}),
});

export type FieldMapping = z.infer<typeof FieldMappingSchema>;

export const FormConfigSchema = z.object({
  /** Form (asset) id on the survey service */
  formId: z.string().trim().min(1),
  fields: FieldMappingSchema,
});

export type FormConfig = z.infer<typeof FormConfigSchema>;

// =============================================================================
// Status Vocabulary Schema
// =============================================================================

/**
 * Raw status values → complete/incomplete outcome for one form
 */
export const StatusVocabularySchema = z
  .object({
    complete: z.array(z.string().trim().min(1)).min(1, "at least one complete value is required"),
    incomplete: z.array(z.string().trim().min(1)).default([]),
    /** Outcome for values listed in neither set */
    unknownAs: z.enum(["complete", "incomplete"]).default("incomplete"),
  })
  .superRefine((vocabulary, ctx) => {
    const complete = new Set(vocabulary.complete.map((value) => value.toLowerCase()));
    for (const value of vocabulary.incomplete) {
      if (complete.has(value.toLowerCase())) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["incomplete"],
          message: `"${value}" is listed as both complete and incomplete`,
        });
      }
    }
  });

export type StatusVocabularyConfig = z.infer<typeof StatusVocabularySchema>;

// =============================================================================
// Survey Service Schema
// =============================================================================

export const SurveyServiceSchema = z.object({
  /** Instance URL, e.g. https://kf.kobotoolbox.org */
  baseUrl: z.string().url(),

  /** API token */
  token: z.string().min(1),

  /** Submissions requested per page */
  pageSize: z.number().int().positive().max(30000).default(10000),

  /** Request timeout in milliseconds */
  timeoutMs: z.number().int().positive().default(60000),
});

export type SurveyServiceConfig = z.infer<typeof SurveyServiceSchema>;

// =============================================================================
// Retry & Sync Schemas
// =============================================================================

export const RetryPolicySchema = z.object({
  maxAttempts: z.number().int().min(1).max(10).default(3),
  initialDelayMs: z.number().int().nonnegative().default(500),
  maxDelayMs: z.number().int().nonnegative().default(5000),
  backoffFactor: z.number().min(1).default(2),
});

export const SyncSchema = z.object({
  /** Field set on every tracking submission written by the publisher */
  markerField: FieldPathSchema.default("pendency_tracking"),

  /** Maximum concurrent remote writes */
  concurrency: z.number().int().min(1).max(32).default(4),

  /** File name of the pendency list uploaded as form media */
  mediaFileName: z.string().trim().min(1).default("pendencias.csv"),
});

export type SyncConfig = z.infer<typeof SyncSchema>;

// =============================================================================
// Project Configuration Schema
// =============================================================================

/**
 * Project configuration schema
 */
export const ProjectConfigSchema = z.object({
  /** Project name (history key) */
  name: z.string().trim().min(1),

  survey: SurveyServiceSchema,

  forms: z
    .object({
      master: FormConfigSchema,
      revisit: FormConfigSchema,
    })
    .refine((forms) => forms.master.formId !== forms.revisit.formId, {
      message: "master and revisit forms must be different",
      path: ["revisit", "formId"],
    }),

  statusVocabulary: z.object({
    master: StatusVocabularySchema,
    revisit: StatusVocabularySchema,
  }),

  retry: RetryPolicySchema.default({}),

  sync: SyncSchema.default({}),
});

/** Config file shape, before defaults are applied */
export type ProjectConfigInput = z.input<typeof ProjectConfigSchema>;
export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

// =============================================================================
// Validation Utilities
// =============================================================================

/**
 * Validation result type
 */
export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: z.ZodError };

/**
 * Safely validate data against a schema (returns result object)
 */
export function safeValidate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): ValidationResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
