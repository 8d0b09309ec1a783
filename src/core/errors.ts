/**
 * Error Classes for the pendency tracker
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Configuration errors (1xxx)
  CONFIG_INVALID = "E1000",
  CONFIG_NOT_FOUND = "E1001",
  CONFIG_UNREADABLE = "E1002",

  // Fetch errors (2xxx)
  FETCH_FAILED = "E2000",
  FETCH_RETRIES_EXHAUSTED = "E2001",
  FETCH_PAGINATION_LOOP = "E2002",
  FETCH_CANCELLED = "E2003",

  // Survey API errors (3xxx)
  SURVEY_HTTP_ERROR = "E3000",
  SURVEY_TIMEOUT = "E3001",
  SURVEY_NETWORK_ERROR = "E3002",
  SURVEY_INVALID_RESPONSE = "E3003",

  // Reconciliation errors (4xxx)
  RECONCILIATION_INPUT_MISSING = "E4000",

  // Publish errors (5xxx)
  PUBLISH_ITEM_FAILED = "E5000",
  PUBLISH_MEDIA_FAILED = "E5001",

  // Report errors (6xxx)
  REPORT_WRITE_FAILED = "E6000",
  REPORT_PARSE_FAILED = "E6001",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
}

/**
 * Base error class for all pendency tracker errors
 */
export class PendencyError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "PendencyError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * Missing or invalid project configuration. Aborts a run before any fetch.
 */
export class ConfigError extends PendencyError {
  public readonly issues: string[];

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONFIG_INVALID,
    context?: Record<string, unknown> & { issues?: string[] }
  ) {
    super(message, code, context);
    this.name = "ConfigError";
    this.issues = context?.issues ?? [];
  }

  toString(): string {
    const details = this.issues.length > 0 ? `\n  - ${this.issues.join("\n  - ")}` : "";
    return `[${this.code}] ${this.name}: ${this.message}${details}`;
  }
}

/**
 * HTTP-level failure talking to the survey service
 */
export class SurveyApiError extends PendencyError {
  public readonly status?: number;
  /** Whether another attempt may succeed (timeouts, network, 5xx, 429) */
  public readonly transient: boolean;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.SURVEY_HTTP_ERROR,
    context?: Record<string, unknown> & { status?: number; transient?: boolean }
  ) {
    super(message, code, context);
    this.name = "SurveyApiError";
    this.status = context?.status;
    this.transient = context?.transient ?? false;
  }
}

/**
 * Remote retrieval of a form's submissions failed for good
 */
export class FetchError extends PendencyError {
  public readonly formId: string;
  public readonly attempts: number;
  public readonly lastCause: unknown;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.FETCH_FAILED,
    context: Record<string, unknown> & { formId: string; attempts?: number; cause?: unknown }
  ) {
    super(message, code, context);
    this.name = "FetchError";
    this.formId = context.formId;
    this.attempts = context.attempts ?? 0;
    this.lastCause = context.cause;
  }

  toString(): string {
    const cause = this.lastCause instanceof Error ? ` (cause: ${this.lastCause.message})` : "";
    return `[${this.code}] ${this.name}: ${this.message} [form ${this.formId}]${cause}`;
  }
}

/**
 * Caller contract breach in the reconciliation engine
 */
export class ReconciliationError extends PendencyError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.RECONCILIATION_INPUT_MISSING,
    context?: Record<string, unknown>
  ) {
    super(message, code, context);
    this.name = "ReconciliationError";
  }
}

/**
 * Remote write for one household failed during sync-back. Never aborts
 * the publish; collected into the report instead.
 */
export class PublishItemFailure extends PendencyError {
  public readonly householdId: string;
  public readonly attempts: number;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.PUBLISH_ITEM_FAILED,
    context: Record<string, unknown> & { householdId: string; attempts?: number }
  ) {
    super(message, code, context);
    this.name = "PublishItemFailure";
    this.householdId = context.householdId;
    this.attempts = context.attempts ?? 0;
  }
}

/**
 * Report artifact could not be written or read back
 */
export class ReportError extends PendencyError {
  public readonly filePath?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.REPORT_WRITE_FAILED,
    context?: Record<string, unknown> & { filePath?: string }
  ) {
    super(message, code, context);
    this.name = "ReportError";
    this.filePath = context?.filePath;
  }
}

/**
 * Check if an error is a PendencyError
 */
export function isPendencyError(error: unknown): error is PendencyError {
  return error instanceof PendencyError;
}

/**
 * Wrap an unknown error in a PendencyError
 */
export function wrapError(
  error: unknown,
  defaultMessage: string = "An unexpected error occurred",
  code: ErrorCode = ErrorCode.UNKNOWN_ERROR
): PendencyError {
  if (isPendencyError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new PendencyError(error.message || defaultMessage, code, {
      originalError: error.name,
      originalStack: error.stack,
    });
  }

  return new PendencyError(
    typeof error === "string" ? error : defaultMessage,
    code
  );
}
