// app/src/core/patch/PatchValidator.ts
// Pre-flight checks over a whole batch. Any failure rejects the batch before
// the buffer is touched; a malformed request is a caller bug, not a runtime miss.

import { PatchError } from "./errors";
import type { PatchRequest } from "./PatchRequest";
import { isPatternRequest, isRangeRequest, parsePatchRequest } from "./PatchRequest";
import { PatternMatcher } from "./PatternMatcher";

/** The part of FileInfo the validator needs. */
export interface LineCountInfo {
  lineCount: number;
}

export type ValidationResult = { ok: true } | { ok: false; error: PatchError };

export type BatchValidationResult =
  | { ok: true }
  | { ok: false; errors: { index: number; error: PatchError }[] };

export interface PatchConflict {
  /** 0-based index into the submitted batch */
  first: number;
  second: number;
  reason: string;
}

const defaultMatcher = new PatternMatcher();

function fail(code: "MissingField" | "OutOfRange" | "InvalidPattern" | "ValidationFailed", message: string): ValidationResult {
  return { ok: false, error: new PatchError(code, message) };
}

function checkLineNumber(name: string, value: number): ValidationResult {
  if (!Number.isInteger(value) || value < 1) {
    return fail("ValidationFailed", `${name} must be a positive integer, got ${value}`);
  }
  return { ok: true };
}

function checkRange(startLine: number, endLine: number, fileInfo?: LineCountInfo): ValidationResult {
  const s = checkLineNumber("startLine", startLine);
  if (!s.ok) return s;
  const e = checkLineNumber("endLine", endLine);
  if (!e.ok) return e;
  if (startLine > endLine) {
    return fail("ValidationFailed", `startLine ${startLine} must be less than or equal to endLine ${endLine}`);
  }
  if (fileInfo) {
    if (startLine > fileInfo.lineCount) {
      return fail("OutOfRange", `startLine ${startLine} exceeds file length ${fileInfo.lineCount}`);
    }
    if (endLine > fileInfo.lineCount) {
      return fail("OutOfRange", `endLine ${endLine} exceeds file length ${fileInfo.lineCount}`);
    }
  }
  return { ok: true };
}

function checkCode(request: { kind: string; code?: readonly string[] }, requireNonEmpty: boolean): ValidationResult {
  if (!Array.isArray(request.code)) return fail("MissingField", `${request.kind}: missing code`);
  if (requireNonEmpty && request.code.length === 0) return fail("MissingField", `${request.kind}: code must not be empty`);
  if (request.code.some((line) => typeof line !== "string")) {
    return fail("ValidationFailed", `${request.kind}: code lines must be strings`);
  }
  return { ok: true };
}

function checkPattern(pattern: unknown, matcher: PatternMatcher): ValidationResult {
  if (typeof pattern !== "string") return fail("MissingField", "missing pattern");
  if (pattern === "") return fail("ValidationFailed", "pattern must not be empty");
  const compiled = matcher.compile(pattern);
  return compiled.ok ? { ok: true } : { ok: false, error: compiled.error };
}

export function validatePatchRequest(
  request: PatchRequest,
  fileInfo?: LineCountInfo,
  matcher: PatternMatcher = defaultMatcher
): ValidationResult {
  switch (request.kind) {
    case "insert_at_line": {
      const n = checkLineNumber("lineNumber", request.lineNumber);
      if (!n.ok) return n;
      const c = checkCode(request, true);
      if (!c.ok) return c;
      if (fileInfo && request.lineNumber > fileInfo.lineCount + 1) {
        return fail("OutOfRange", `lineNumber ${request.lineNumber} exceeds file length ${fileInfo.lineCount}`);
      }
      return { ok: true };
    }
    case "replace_range": {
      const c = checkCode(request, false);
      if (!c.ok) return c;
      return checkRange(request.startLine, request.endLine, fileInfo);
    }
    case "delete_range":
      return checkRange(request.startLine, request.endLine, fileInfo);
    case "replace_pattern": {
      const p = checkPattern(request.pattern, matcher);
      if (!p.ok) return p;
      if (request.matchLine !== undefined) {
        const h = checkLineNumber("matchLine", request.matchLine);
        if (!h.ok) return h;
        if (fileInfo && request.matchLine > fileInfo.lineCount) {
          return fail("OutOfRange", `matchLine ${request.matchLine} exceeds file length ${fileInfo.lineCount}`);
        }
      }
      return checkCode(request, false);
    }
    case "replace_pattern_all":
    case "insert_after":
    case "insert_before": {
      const p = checkPattern(request.pattern, matcher);
      if (!p.ok) return p;
      return checkCode(request, false);
    }
    case "append":
      return checkCode(request, true);
    default: {
      const _exhaustive: never = request;
      return fail("ValidationFailed", `unknown patch kind: ${String(_exhaustive)}`);
    }
  }
}

/** Parse then validate input from an untyped source. */
export function validateRawPatchRequest(
  raw: unknown,
  fileInfo?: LineCountInfo,
  matcher: PatternMatcher = defaultMatcher
): { ok: true; value: PatchRequest } | { ok: false; error: PatchError } {
  const parsed = parsePatchRequest(raw);
  if (!parsed.ok) return parsed;
  const v = validatePatchRequest(parsed.value, fileInfo, matcher);
  if (!v.ok) return v;
  return { ok: true, value: parsed.value };
}

/** Validate every request; all failures are collected, not just the first. */
export function validateBatch(
  requests: readonly PatchRequest[],
  fileInfo?: LineCountInfo,
  matcher: PatternMatcher = defaultMatcher
): BatchValidationResult {
  const errors: { index: number; error: PatchError }[] = [];
  requests.forEach((request, index) => {
    const r = validatePatchRequest(request, fileInfo, matcher);
    if (!r.ok) errors.push({ index, error: r.error });
  });
  return errors.length === 0 ? { ok: true } : { ok: false, errors };
}

/** Human-readable summary of a rejected batch. */
export function formatValidationErrors(errors: { index: number; error: PatchError }[]): string {
  return errors.map(({ index, error }) => `patch ${index + 1}: ${error.message}`).join("; ");
}

function spanOf(request: PatchRequest): [number, number] | null {
  switch (request.kind) {
    case "replace_range":
    case "delete_range":
      return [request.startLine, request.endLine];
    case "insert_at_line":
      return [request.lineNumber, request.lineNumber + Math.max(request.code.length, 1) - 1];
    default:
      return null;
  }
}

function overlaps(a: [number, number], b: [number, number]): boolean {
  return !(a[1] < b[0] || b[1] < a[0]);
}

/**
 * Advisory collision check: overlapping line spans where at least one side is a
 * range edit, and pattern edits sharing an identical pattern string.
 */
export function detectConflicts(requests: readonly PatchRequest[]): PatchConflict[] {
  const conflicts: PatchConflict[] = [];
  for (let i = 0; i < requests.length; i++) {
    for (let j = i + 1; j < requests.length; j++) {
      const a = requests[i];
      const b = requests[j];

      if (isRangeRequest(a) || isRangeRequest(b)) {
        const sa = spanOf(a);
        const sb = spanOf(b);
        if (sa && sb && overlaps(sa, sb)) {
          conflicts.push({
            first: i,
            second: j,
            reason: `Overlapping line ranges: ${sa[0]}-${sa[1]} and ${sb[0]}-${sb[1]}`,
          });
          continue;
        }
      }

      if (isPatternRequest(a) && isPatternRequest(b) && a.pattern === b.pattern) {
        conflicts.push({ first: i, second: j, reason: `Same pattern used by multiple patches: ${a.pattern}` });
      }
    }
  }
  return conflicts;
}
