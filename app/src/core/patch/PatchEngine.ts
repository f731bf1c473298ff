/**
 * PatchEngine: apply a batch of patch requests to one file.
 *
 * applyPatchRequests is the pure core (lines in, lines + outcomes out).
 * The PatchEngine class wraps it with validation, backup, an all-or-nothing
 * write and a per-path lock.
 */

import type { LineFormat, LoadedFile, PatchConfig } from "../types";
import type { BackupService } from "../backup/BackupService";
import type { WorkspaceService } from "../workspace/WorkspaceService";
import { DEFAULT_CONFIG } from "../project/patchConfig";
import { unifiedDiff } from "./diff";
import { PatchError, errorMessage } from "./errors";
import type { PatchErrorInfo } from "./errors";
import { applyIndent, detectContextIndent, detectLineIndent } from "./indentation";
import type { PatchRequest } from "./PatchRequest";
import { patchAnchor, patchPhase } from "./PatchRequest";
import type { MatchInfo } from "./PatternMatcher";
import { PatternMatcher } from "./PatternMatcher";
import type { PatchConflict } from "./PatchValidator";
import { detectConflicts, formatValidationErrors, validateBatch } from "./PatchValidator";

export type PatchOutcome =
  | { status: "applied"; index: number; request: PatchRequest; message: string; changes: number }
  | { status: "failed"; index: number; request: PatchRequest; error: PatchErrorInfo };

export interface ApplyLinesResult {
  lines: string[];
  /** In submission order, whatever order the requests ran in */
  outcomes: PatchOutcome[];
  successfulCount: number;
  failedCount: number;
}

type StepResult = { ok: true; message: string; changes: number } | { ok: false; error: PatchError };

const sharedMatcher = new PatternMatcher();

const plural = (n: number) => `${n} line${n === 1 ? "" : "s"}`;

/**
 * Indices in application order: anchored requests first, descending by anchor
 * (ties keep submission order), then scan requests in submission order.
 */
export function applicationOrder(requests: readonly PatchRequest[]): number[] {
  const anchored: number[] = [];
  const scan: number[] = [];
  requests.forEach((r, i) => (patchPhase(r) === "anchored" ? anchored : scan).push(i));
  anchored.sort((a, b) => (patchAnchor(requests[b]) ?? 0) - (patchAnchor(requests[a]) ?? 0) || a - b);
  return [...anchored, ...scan];
}

function outOfRange(start: number, end: number, length: number): StepResult | null {
  if (start < 1 || end < start || end > length) {
    return { ok: false, error: new PatchError("OutOfRange", `Lines ${start}-${end} out of range (file has ${length} lines)`) };
  }
  return null;
}

function notFound(pattern: string): StepResult {
  return { ok: false, error: new PatchError("PatternNotFound", `Pattern not found: ${pattern}`) };
}

/** Apply one request to `buf` in place. */
function applyOne(buf: string[], request: PatchRequest, matcher: PatternMatcher): StepResult {
  let regex: RegExp | null = null;
  if ("pattern" in request) {
    const compiled = matcher.compile(request.pattern);
    if (!compiled.ok) return { ok: false, error: compiled.error };
    regex = compiled.regex;
  }

  switch (request.kind) {
    case "insert_at_line": {
      if (!Number.isInteger(request.lineNumber) || request.lineNumber < 1) {
        return { ok: false, error: new PatchError("OutOfRange", `Line ${request.lineNumber} out of range`) };
      }
      const pos = Math.min(request.lineNumber - 1, buf.length);
      const code = applyIndent(request.code, detectContextIndent(buf, pos));
      buf.splice(pos, 0, ...code);
      return { ok: true, message: `Inserted ${plural(code.length)} at line ${request.lineNumber}`, changes: 1 };
    }

    case "replace_range": {
      const bad = outOfRange(request.startLine, request.endLine, buf.length);
      if (bad) return bad;
      const code = applyIndent(request.code, detectLineIndent(buf[request.startLine - 1]));
      buf.splice(request.startLine - 1, request.endLine - request.startLine + 1, ...code);
      return { ok: true, message: `Replaced lines ${request.startLine}-${request.endLine} with ${plural(code.length)}`, changes: 1 };
    }

    case "delete_range": {
      const bad = outOfRange(request.startLine, request.endLine, buf.length);
      if (bad) return bad;
      buf.splice(request.startLine - 1, request.endLine - request.startLine + 1);
      return { ok: true, message: `Deleted lines ${request.startLine}-${request.endLine}`, changes: 1 };
    }

    case "replace_pattern": {
      if (!regex) return notFound(request.pattern);
      let idx: number;
      if (request.matchLine !== undefined) {
        idx = request.matchLine - 1;
        if (idx < 0 || idx >= buf.length || !regex.test(buf[idx])) {
          return {
            ok: false,
            error: new PatchError("PatternNotFoundAtHint", `Pattern not found at line ${request.matchLine}: ${request.pattern}`),
          };
        }
      } else {
        idx = matcher.findFirstMatch(buf, regex);
        if (idx < 0) return notFound(request.pattern);
      }
      buf.splice(idx, 1, ...applyIndent(request.code, detectLineIndent(buf[idx])));
      return { ok: true, message: `Replaced pattern at line ${idx + 1}`, changes: 1 };
    }

    case "replace_pattern_all": {
      if (!regex) return notFound(request.pattern);
      let count = 0;
      let i = 0;
      while (i < buf.length) {
        if (!regex.test(buf[i])) {
          i++;
          continue;
        }
        const code = applyIndent(request.code, detectLineIndent(buf[i]));
        buf.splice(i, 1, ...code);
        count++;
        // resume after the inserted block so it is never re-matched
        i += code.length;
      }
      if (count === 0) return notFound(request.pattern);
      return { ok: true, message: `Replaced pattern at ${count} location${count === 1 ? "" : "s"}`, changes: count };
    }

    case "insert_after": {
      if (!regex) return notFound(request.pattern);
      const idx = matcher.findFirstMatch(buf, regex);
      if (idx < 0) return notFound(request.pattern);
      buf.splice(idx + 1, 0, ...applyIndent(request.code, detectContextIndent(buf, idx + 1)));
      return { ok: true, message: `Inserted after pattern at line ${idx + 1}`, changes: 1 };
    }

    case "insert_before": {
      if (!regex) return notFound(request.pattern);
      const idx = matcher.findFirstMatch(buf, regex);
      if (idx < 0) return notFound(request.pattern);
      buf.splice(idx, 0, ...applyIndent(request.code, detectContextIndent(buf, idx)));
      return { ok: true, message: `Inserted before pattern at line ${idx + 1}`, changes: 1 };
    }

    case "append": {
      const indent = buf.length > 0 ? detectLineIndent(buf[buf.length - 1]) : "";
      const code = applyIndent(request.code, indent);
      buf.push(...code);
      return { ok: true, message: `Appended ${plural(code.length)} to end of file`, changes: 1 };
    }

    default: {
      const _exhaustive: never = request;
      return { ok: false, error: new PatchError("ValidationFailed", `unknown patch kind: ${String(_exhaustive)}`) };
    }
  }
}

/**
 * Apply requests to a copy of `lines`. A failed request is recorded and the
 * rest continue against the buffer as it stands. Neither argument is mutated.
 */
export function applyPatchRequests(
  lines: readonly string[],
  requests: readonly PatchRequest[],
  matcher: PatternMatcher = sharedMatcher
): ApplyLinesResult {
  const buf = [...lines];
  const outcomes: PatchOutcome[] = new Array<PatchOutcome>(requests.length);

  for (const index of applicationOrder(requests)) {
    const request = requests[index];
    const r = applyOne(buf, request, matcher);
    outcomes[index] = r.ok
      ? { status: "applied", index, request, message: r.message, changes: r.changes }
      : { status: "failed", index, request, error: r.error.toInfo() };
  }

  const successfulCount = outcomes.filter((o) => o.status === "applied").length;
  return { lines: buf, outcomes, successfulCount, failedCount: outcomes.length - successfulCount };
}

// ---------------------------------------------------------------------------
// File-level engine
// ---------------------------------------------------------------------------

export interface PatchResult {
  ok: boolean;
  /** Workspace-relative */
  filePath: string;
  originalLineCount: number;
  newLineCount: number;
  successfulCount: number;
  failedCount: number;
  outcomes: PatchOutcome[];
  diff: string[];
  backupPath: string | null;
  conflicts: PatchConflict[];
  /** True once the new content is on disk */
  written: boolean;
  validationErrors?: { index: number; error: PatchErrorInfo }[];
  error?: PatchErrorInfo;
}

export interface ApplyOptions {
  /** Run every step except backup and write */
  dryRun?: boolean;
  /** Override config.autoBackup for this call */
  backup?: boolean;
}

export type LineWriter = (filePath: string, lines: readonly string[], format: LineFormat) => Promise<void>;

export interface PatchEngineDeps {
  workspace: WorkspaceService;
  backups: BackupService;
  config?: PatchConfig;
  matcher?: PatternMatcher;
  /** Defaults to workspace.writeLines */
  writer?: LineWriter;
}

export class PatchEngine {
  readonly workspace: WorkspaceService;
  readonly backups: BackupService;
  readonly matcher: PatternMatcher;
  config: PatchConfig;
  private readonly writer: LineWriter;
  private locks = new Map<string, Promise<void>>();

  constructor(deps: PatchEngineDeps) {
    this.workspace = deps.workspace;
    this.backups = deps.backups;
    this.config = deps.config ?? { ...DEFAULT_CONFIG };
    this.matcher = deps.matcher ?? new PatternMatcher();
    this.writer = deps.writer ?? ((p, lines, format) => this.workspace.writeLines(p, lines, format));
  }

  /** Apply, back up and write. Calls for the same file run one at a time. */
  async apply(filePath: string, requests: readonly PatchRequest[], options: ApplyOptions = {}): Promise<PatchResult> {
    return this.withLock(this.workspace.resolvePath(filePath), () => this.run(filePath, requests, options));
  }

  /** The would-be result and diff; never backs up or writes. */
  async preview(filePath: string, requests: readonly PatchRequest[]): Promise<PatchResult> {
    return this.run(filePath, requests, { dryRun: true });
  }

  /** Lines matching `pattern` in a file, with surrounding context. */
  async findCodeBlocks(filePath: string, pattern: string, contextLines = 3): Promise<MatchInfo[]> {
    const { lines } = await this.workspace.loadFile(filePath);
    return this.matcher.findMatches(lines, pattern, contextLines);
  }

  private async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const prev = this.locks.get(key) ?? Promise.resolve();
    const run = prev.then(fn);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.locks.set(key, tail);
    try {
      return await run;
    } finally {
      if (this.locks.get(key) === tail) this.locks.delete(key);
    }
  }

  private async run(filePath: string, requests: readonly PatchRequest[], options: ApplyOptions): Promise<PatchResult> {
    const result: PatchResult = {
      ok: false,
      filePath: this.workspace.relativePath(filePath),
      originalLineCount: 0,
      newLineCount: 0,
      successfulCount: 0,
      failedCount: 0,
      outcomes: [],
      diff: [],
      backupPath: null,
      conflicts: [],
      written: false,
    };

    let loaded: LoadedFile;
    try {
      loaded = await this.workspace.loadFile(filePath, { maxBytes: this.config.maxFileSizeMb * 1024 * 1024 });
    } catch (e) {
      const err = e instanceof PatchError ? e : new PatchError("ReadFailure", errorMessage(e));
      return { ...result, error: err.toInfo() };
    }
    const { info, lines } = loaded;
    result.originalLineCount = info.lineCount;
    result.newLineCount = info.lineCount;

    const validation = validateBatch(requests, info, this.matcher);
    if (!validation.ok) {
      return {
        ...result,
        validationErrors: validation.errors.map(({ index, error }) => ({ index, error: error.toInfo() })),
        error: { code: "ValidationFailed", message: formatValidationErrors(validation.errors) },
      };
    }

    result.conflicts = detectConflicts(requests);
    for (const c of result.conflicts) {
      console.warn(`[PatchEngine] ${result.filePath}: patches ${c.first + 1} and ${c.second + 1} may conflict: ${c.reason}`);
    }

    const applied = applyPatchRequests(lines, requests, this.matcher);
    result.outcomes = applied.outcomes;
    result.successfulCount = applied.successfulCount;
    result.failedCount = applied.failedCount;

    if (applied.successfulCount === 0) {
      return { ...result, error: { code: "NoChangesApplied", message: "No patches were applied" } };
    }

    result.newLineCount = applied.lines.length;
    result.diff = unifiedDiff(lines, applied.lines, result.filePath, this.config.diffContextLines);
    if (options.dryRun) return { ...result, ok: true };

    if (options.backup ?? this.config.autoBackup) {
      try {
        result.backupPath = await this.backups.createBackup(filePath);
      } catch (e) {
        const msg = errorMessage(e);
        if (this.config.requireBackup) {
          return { ...result, error: { code: "BackupFailure", message: msg } };
        }
        console.warn(`[PatchEngine] continuing without backup: ${msg}`);
      }
    }

    try {
      await this.writer(filePath, applied.lines, info.format);
    } catch (e) {
      await this.rollback(filePath, result.backupPath, lines, info.format);
      return {
        ...result,
        error: { code: "WriteFailure", message: `Could not write ${result.filePath}: ${errorMessage(e)}` },
      };
    }

    this.workspace.addToHistory(filePath);
    return { ...result, ok: true, written: true };
  }

  private async rollback(filePath: string, backupPath: string | null, original: readonly string[], format: LineFormat): Promise<void> {
    try {
      if (backupPath) await this.backups.restoreFrom(backupPath, filePath);
      else await this.workspace.writeLines(filePath, original, format);
    } catch (e) {
      console.error(`[PatchEngine] rollback of ${this.workspace.relativePath(filePath)} failed: ${errorMessage(e)}`);
    }
  }
}
