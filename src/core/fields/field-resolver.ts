/**
 * Field Resolver
 *
 * Maps logical field names to paths inside heterogeneous submission
 * payloads and walks those paths over a JSON tree. Absence is reported as
 * an explicit result, never as an exception.
 *
 * @module
 */

// =============================================================================
// JSON Tree Types
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * One raw submission as returned by the survey service
 */
export type SurveySubmission = JsonObject;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// =============================================================================
// Resolution Result
// =============================================================================

export type MissingReason =
  /** The logical name has no configured path */
  | "unmapped"
  /** Nothing (or null) at the path */
  | "absent"
  /** The walk hit a scalar or a non-numeric array index before the path ended */
  | "not-traversable";

export type Resolution =
  | { found: true; value: Exclude<JsonValue, null> }
  | { found: false; reason: MissingReason };

const ABSENT: Resolution = { found: false, reason: "absent" };
const NOT_TRAVERSABLE: Resolution = { found: false, reason: "not-traversable" };
const UNMAPPED: Resolution = { found: false, reason: "unmapped" };

// =============================================================================
// Path Walking
// =============================================================================

interface PathToken {
  text: string;
  start: number;
  end: number;
}

function tokenize(path: string): PathToken[] {
  const tokens: PathToken[] = [];
  const pattern = /[^/.]+/g;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(path)) !== null) {
    tokens.push({ text: match[0], start: match.index, end: match.index + match[0].length });
  }
  return tokens;
}

function walk(
  node: JsonValue | undefined,
  path: string,
  tokens: readonly PathToken[],
  from: number
): Resolution {
  if (node === undefined || node === null) return ABSENT;
  if (from >= tokens.length) return { found: true, value: node };

  const head = tokens[from];
  if (head === undefined) return ABSENT;

  if (Array.isArray(node)) {
    if (!/^\d+$/.test(head.text)) return NOT_TRAVERSABLE;
    return walk(node[Number(head.text)], path, tokens, from + 1);
  }

  if (!isJsonObject(node)) return NOT_TRAVERSABLE;

  // Survey services flatten group names into keys ("group/field"), so the
  // longest literal key matching the remaining path wins over descending.
  let result: Resolution = ABSENT;
  for (let end = tokens.length; end > from; end--) {
    const last = tokens[end - 1];
    if (last === undefined) continue;
    const key = path.slice(head.start, last.end);
    if (!Object.hasOwn(node, key)) continue;

    const candidate = walk(node[key], path, tokens, end);
    if (candidate.found) return candidate;
    if (candidate.reason === "not-traversable") result = candidate;
  }
  return result;
}

/**
 * Resolves a `/`- or `.`-separated path against a payload.
 *
 * @example
 * ```typescript
 * resolvePath({ "info/status": "01" }, "info/status"); // { found: true, value: "01" }
 * resolvePath({ info: { status: "01" } }, "info.status"); // { found: true, value: "01" }
 * resolvePath({ visits: [{ n: 2 }] }, "visits/0/n"); // { found: true, value: 2 }
 * ```
 */
export function resolvePath(payload: JsonValue, path: string): Resolution {
  const tokens = tokenize(path);
  if (tokens.length === 0) return ABSENT;
  return walk(payload, path, tokens, 0);
}

/**
 * Renders a scalar as text. Objects and arrays have no text form.
 */
export function toText(value: JsonValue): string | null {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return null;
}

/**
 * Resolves a path and renders the value as trimmed text. Empty text counts
 * as missing.
 */
export function resolvePathText(payload: JsonValue, path: string): string | null {
  const resolution = resolvePath(payload, path);
  if (!resolution.found) return null;
  const text = toText(resolution.value)?.trim();
  return text ? text : null;
}

// =============================================================================
// Field Resolver
// =============================================================================

/**
 * Resolves logical field names through a configured name → path mapping.
 *
 * @example
 * ```typescript
 * const fields = new FieldResolver({ householdId: "household_id", status: "info/status" });
 * fields.resolveText("householdId", submission);
 * ```
 */
export class FieldResolver<F extends string = string> {
  private readonly mapping: ReadonlyMap<string, string>;

  constructor(mapping: Readonly<Partial<Record<F, string>>>) {
    const entries = new Map<string, string>();
    for (const [name, path] of Object.entries(mapping)) {
      if (typeof path === "string" && path.length > 0) entries.set(name, path);
    }
    this.mapping = entries;
  }

  /** Configured path for a logical name */
  pathOf(name: F): string | undefined {
    return this.mapping.get(name);
  }

  resolve(name: F, payload: JsonValue): Resolution {
    const path = this.mapping.get(name);
    if (path === undefined) return UNMAPPED;
    return resolvePath(payload, path);
  }

  /**
   * Resolves a field as trimmed, non-empty text, or null when missing
   */
  resolveText(name: F, payload: JsonValue): string | null {
    const path = this.mapping.get(name);
    if (path === undefined) return null;
    return resolvePathText(payload, path);
  }
}
