// app/src/core/patch/PatchRequest.ts
// Patch requests: one declarative edit each, addressed by line number or by regex.
// Typed callers build these directly; untyped sources (fix files, history, CLI
// --patches files) go through parsePatchRequest first.

import { z } from "zod";
import { PatchError } from "./errors";

interface PatchRequestBase {
  /** Free text shown in previews and history. */
  readonly description?: string;
}

export interface InsertAtLineRequest extends PatchRequestBase {
  readonly kind: "insert_at_line";
  /** 1-based; lineCount + 1 inserts at end of file */
  readonly lineNumber: number;
  readonly code: readonly string[];
}

export interface ReplaceRangeRequest extends PatchRequestBase {
  readonly kind: "replace_range";
  /** 1-based inclusive */
  readonly startLine: number;
  /** 1-based inclusive */
  readonly endLine: number;
  readonly code: readonly string[];
}

export interface ReplacePatternRequest extends PatchRequestBase {
  readonly kind: "replace_pattern";
  readonly pattern: string;
  readonly code: readonly string[];
  /** When set, the pattern must match at exactly this 1-based line. */
  readonly matchLine?: number;
}

export interface ReplacePatternAllRequest extends PatchRequestBase {
  readonly kind: "replace_pattern_all";
  readonly pattern: string;
  readonly code: readonly string[];
}

export interface InsertAfterRequest extends PatchRequestBase {
  readonly kind: "insert_after";
  readonly pattern: string;
  readonly code: readonly string[];
}

export interface InsertBeforeRequest extends PatchRequestBase {
  readonly kind: "insert_before";
  readonly pattern: string;
  readonly code: readonly string[];
}

export interface AppendRequest extends PatchRequestBase {
  readonly kind: "append";
  readonly code: readonly string[];
}

export interface DeleteRangeRequest extends PatchRequestBase {
  readonly kind: "delete_range";
  readonly startLine: number;
  readonly endLine: number;
}

export type PatchRequest =
  | InsertAtLineRequest
  | ReplaceRangeRequest
  | ReplacePatternRequest
  | ReplacePatternAllRequest
  | InsertAfterRequest
  | InsertBeforeRequest
  | AppendRequest
  | DeleteRangeRequest;

export type PatchRequestKind = PatchRequest["kind"];

export type PatternRequest = Extract<PatchRequest, { pattern: string }>;
export type RangeRequest = ReplaceRangeRequest | DeleteRangeRequest;

export const PATCH_REQUEST_KINDS: readonly PatchRequestKind[] = [
  "insert_at_line",
  "replace_range",
  "replace_pattern",
  "replace_pattern_all",
  "insert_after",
  "insert_before",
  "append",
  "delete_range",
];

/**
 * Line-anchored requests run first, bottom-up, so an edit never shifts the lines
 * a not-yet-applied edit points at. Scan requests re-read the buffer as it is
 * when their turn comes and run afterwards in submission order.
 */
export type PatchPhase = "anchored" | "scan";

export function patchPhase(request: PatchRequest): PatchPhase {
  switch (request.kind) {
    case "insert_at_line":
    case "replace_range":
    case "delete_range":
      return "anchored";
    default:
      return "scan";
  }
}

/** Primary line anchor of an anchored request; null for scan requests. */
export function patchAnchor(request: PatchRequest): number | null {
  switch (request.kind) {
    case "insert_at_line":
      return request.lineNumber;
    case "replace_range":
    case "delete_range":
      return request.startLine;
    default:
      return null;
  }
}

export function isPatternRequest(request: PatchRequest): request is PatternRequest {
  return "pattern" in request;
}

export function isRangeRequest(request: PatchRequest): request is RangeRequest {
  return request.kind === "replace_range" || request.kind === "delete_range";
}

/** One-line label, e.g. `replace_range 3-5 (2 lines)`. */
export function describePatchRequest(request: PatchRequest): string {
  const lines = (n: number) => `${n} line${n === 1 ? "" : "s"}`;
  switch (request.kind) {
    case "insert_at_line":
      return `insert_at_line ${request.lineNumber} (${lines(request.code.length)})`;
    case "replace_range":
      return `replace_range ${request.startLine}-${request.endLine} (${lines(request.code.length)})`;
    case "delete_range":
      return `delete_range ${request.startLine}-${request.endLine}`;
    case "replace_pattern":
      return request.matchLine !== undefined
        ? `replace_pattern /${request.pattern}/ at line ${request.matchLine} (${lines(request.code.length)})`
        : `replace_pattern /${request.pattern}/ (${lines(request.code.length)})`;
    case "replace_pattern_all":
    case "insert_after":
    case "insert_before":
      return `${request.kind} /${request.pattern}/ (${lines(request.code.length)})`;
    case "append":
      return `append (${lines(request.code.length)})`;
    default: {
      const _exhaustive: never = request;
      return String(_exhaustive);
    }
  }
}

// ---------------------------------------------------------------------------
// Untyped input
// ---------------------------------------------------------------------------

const codeSchema = z.union([z.array(z.string()), z.string()]);

/**
 * Raw request shape. Accepts this project's camelCase keys and the older
 * snake_case dictionaries (`type`, `line_number`, `after`, `replacement`, ...).
 */
const rawPatchRequestSchema = z
  .object({
    kind: z.string().optional(),
    type: z.string().optional(),
    description: z.string().optional(),
    lineNumber: z.number().optional(),
    line_number: z.number().optional(),
    startLine: z.number().optional(),
    start_line: z.number().optional(),
    endLine: z.number().optional(),
    end_line: z.number().optional(),
    matchLine: z.number().nullable().optional(),
    match_line: z.number().nullable().optional(),
    pattern: z.string().optional(),
    after: z.string().optional(),
    before: z.string().optional(),
    code: codeSchema.optional(),
    replacement: codeSchema.optional(),
  })
  .passthrough();

type RawPatchRequest = z.infer<typeof rawPatchRequestSchema>;

export type ParsePatchRequestResult =
  | { ok: true; value: PatchRequest }
  | { ok: false; error: PatchError };

function toCodeLines(value: string | string[]): string[] {
  return typeof value === "string" ? value.split(/\r?\n/) : [...value];
}

function isKind(value: string): value is PatchRequestKind {
  return (PATCH_REQUEST_KINDS as readonly string[]).includes(value);
}

function missing(kind: string, field: string): ParsePatchRequestResult {
  return { ok: false, error: new PatchError("MissingField", `${kind}: missing ${field}`) };
}

export function parsePatchRequest(input: unknown): ParsePatchRequestResult {
  if (!input || typeof input !== "object" || Array.isArray(input)) {
    return { ok: false, error: new PatchError("ValidationFailed", "patch request must be an object") };
  }

  const parsed = rawPatchRequestSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join(".") || "request";
    return {
      ok: false,
      error: new PatchError("ValidationFailed", `${where}: ${issue?.message ?? "invalid value"}`),
    };
  }
  const raw: RawPatchRequest = parsed.data;

  const kindRaw = raw.kind ?? raw.type;
  if (kindRaw === undefined) {
    return { ok: false, error: new PatchError("MissingField", "patch request must have a kind") };
  }
  if (!isKind(kindRaw)) {
    return { ok: false, error: new PatchError("ValidationFailed", `unknown patch kind: ${kindRaw}`) };
  }

  const description = raw.description;
  const codeRaw = raw.code ?? raw.replacement;
  const code = codeRaw === undefined ? undefined : toCodeLines(codeRaw);
  const lineNumber = raw.lineNumber ?? raw.line_number;
  const startLine = raw.startLine ?? raw.start_line;
  const endLine = raw.endLine ?? raw.end_line;
  const matchLine = raw.matchLine ?? raw.match_line ?? undefined;

  switch (kindRaw) {
    case "insert_at_line":
      if (lineNumber === undefined) return missing(kindRaw, "lineNumber");
      if (code === undefined) return missing(kindRaw, "code");
      return { ok: true, value: { kind: kindRaw, lineNumber, code, description } };
    case "replace_range":
      if (startLine === undefined) return missing(kindRaw, "startLine");
      if (endLine === undefined) return missing(kindRaw, "endLine");
      if (code === undefined) return missing(kindRaw, "code");
      return { ok: true, value: { kind: kindRaw, startLine, endLine, code, description } };
    case "delete_range":
      if (startLine === undefined) return missing(kindRaw, "startLine");
      if (endLine === undefined) return missing(kindRaw, "endLine");
      return { ok: true, value: { kind: kindRaw, startLine, endLine, description } };
    case "replace_pattern": {
      if (raw.pattern === undefined) return missing(kindRaw, "pattern");
      if (code === undefined) return missing(kindRaw, "code");
      const value: ReplacePatternRequest =
        matchLine === undefined
          ? { kind: kindRaw, pattern: raw.pattern, code, description }
          : { kind: kindRaw, pattern: raw.pattern, code, matchLine, description };
      return { ok: true, value };
    }
    case "replace_pattern_all":
      if (raw.pattern === undefined) return missing(kindRaw, "pattern");
      if (code === undefined) return missing(kindRaw, "code");
      return { ok: true, value: { kind: kindRaw, pattern: raw.pattern, code, description } };
    case "insert_after": {
      const pattern = raw.pattern ?? raw.after;
      if (pattern === undefined) return missing(kindRaw, "pattern");
      if (code === undefined) return missing(kindRaw, "code");
      return { ok: true, value: { kind: kindRaw, pattern, code, description } };
    }
    case "insert_before": {
      const pattern = raw.pattern ?? raw.before;
      if (pattern === undefined) return missing(kindRaw, "pattern");
      if (code === undefined) return missing(kindRaw, "code");
      return { ok: true, value: { kind: kindRaw, pattern, code, description } };
    }
    case "append":
      if (code === undefined) return missing(kindRaw, "code");
      return { ok: true, value: { kind: kindRaw, code, description } };
    default: {
      const _exhaustive: never = kindRaw;
      return { ok: false, error: new PatchError("ValidationFailed", `unknown patch kind: ${String(_exhaustive)}`) };
    }
  }
}

/** Parse a list of raw requests; stops at the first bad entry and reports its index. */
export function parsePatchRequests(
  input: unknown
): { ok: true; value: PatchRequest[] } | { ok: false; index: number; error: PatchError } {
  if (!Array.isArray(input)) {
    return { ok: false, index: -1, error: new PatchError("ValidationFailed", "patch list must be an array") };
  }
  const out: PatchRequest[] = [];
  for (let i = 0; i < input.length; i++) {
    const r = parsePatchRequest(input[i]);
    if (!r.ok) return { ok: false, index: i, error: r.error };
    out.push(r.value);
  }
  return { ok: true, value: out };
}
