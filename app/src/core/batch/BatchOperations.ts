/**
 * BatchOperations: search, find/replace and patch application across files
 * selected by glob. Files run a few at a time; writes to one path stay serial
 * through the engine's per-path lock.
 */

import path from "node:path";
import type { PatchHistory } from "../history/PatchHistory";
import type { PatchEngine, PatchResult } from "../patch/PatchEngine";
import { errorMessage } from "../patch/errors";
import type { PatchRequest } from "../patch/PatchRequest";
import type { MatchInfo } from "../patch/PatternMatcher";
import type { BatchFileResult, BatchOperationKind, BatchRecord, LoadedFile } from "../types";

export const DEFAULT_BATCH_CONCURRENCY = 4;

export interface FileMatches {
  filePath: string;
  matches: MatchInfo[];
}

export interface BatchSummary {
  kind: BatchOperationKind;
  results: BatchFileResult[];
  filesProcessed: number;
  filesChanged: number;
  changesApplied: number;
}

export interface FilePreview {
  filePath: string;
  diff: string[];
  changes: number;
}

export interface ExtensionStats {
  files: number;
  lines: number;
}

export interface WorkspaceAnalysis {
  files: number;
  totalLines: number;
  totalBytes: number;
  byExtension: Record<string, ExtensionStats>;
  /** Matching lines per pattern */
  patternCounts: Record<string, number>;
}

export interface BatchOptions {
  concurrency?: number;
  now?: () => Date;
}

/** Run `fn` over `items` with at most `limit` in flight; results keep input order. */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  const runNext = async (): Promise<void> => {
    const index = next++;
    if (index >= items.length) return;
    results[index] = await fn(items[index], index);
    await runNext();
  };
  const slots = Math.min(Math.max(1, Math.floor(limit)), items.length);
  const running: Promise<void>[] = [];
  for (let i = 0; i < slots; i++) running.push(runNext());
  await Promise.all(running);
  return results;
}

function changesOf(result: PatchResult): number {
  let n = 0;
  for (const o of result.outcomes) if (o.status === "applied") n += o.changes;
  return n;
}

function toFileResult(filePath: string, result: PatchResult): BatchFileResult {
  // a file the requests do not touch is skipped, not failed
  const untouched = result.error?.code === "NoChangesApplied";
  return {
    filePath,
    ok: result.ok || untouched,
    changed: result.written,
    successfulCount: result.successfulCount,
    failedCount: result.failedCount,
    changes: result.written ? changesOf(result) : 0,
    error: result.ok || untouched ? undefined : result.error?.message,
  };
}

export class BatchOperations {
  private records: BatchRecord[] = [];
  private readonly concurrency: number;
  private readonly now: () => Date;

  constructor(
    private readonly engine: PatchEngine,
    private readonly patchHistory: PatchHistory,
    options: BatchOptions = {}
  ) {
    this.concurrency = options.concurrency ?? DEFAULT_BATCH_CONCURRENCY;
    this.now = options.now ?? (() => new Date());
  }

  private files(globs: readonly string[], baseDir?: string): Promise<string[]> {
    return this.engine.workspace.findFiles(globs, baseDir);
  }

  /** Files with at least one matching line. Throws InvalidPattern on a bad regex. */
  async search(pattern: string, globs: readonly string[], baseDir?: string, contextLines = 2): Promise<FileMatches[]> {
    this.engine.matcher.compileOrThrow(pattern);
    const files = await this.files(globs, baseDir);
    const found = await mapWithConcurrency(files, this.concurrency, async (filePath) => {
      try {
        return { filePath, matches: await this.engine.findCodeBlocks(filePath, pattern, contextLines) };
      } catch (e) {
        console.warn(`[BatchOperations] skipping ${filePath}: ${errorMessage(e)}`);
        return { filePath, matches: [] };
      }
    });
    return found.filter((f) => f.matches.length > 0);
  }

  /** Replace every line matching `pattern` with `replacement` in each file. */
  async findReplace(
    pattern: string,
    replacement: readonly string[],
    globs: readonly string[],
    baseDir?: string
  ): Promise<BatchSummary> {
    const request: PatchRequest = { kind: "replace_pattern_all", pattern, code: [...replacement] };
    return this.run("find_replace", `replace /${pattern}/`, [request], globs, baseDir);
  }

  async applyToFiles(requests: readonly PatchRequest[], globs: readonly string[], baseDir?: string): Promise<BatchSummary> {
    return this.run("apply_patches", `${requests.length} patch${requests.length === 1 ? "" : "es"}`, requests, globs, baseDir);
  }

  /** Diffs a findReplace would produce; nothing is written. */
  async previewFindReplace(
    pattern: string,
    replacement: readonly string[],
    globs: readonly string[],
    baseDir?: string
  ): Promise<FilePreview[]> {
    const request: PatchRequest = { kind: "replace_pattern_all", pattern, code: [...replacement] };
    const files = await this.files(globs, baseDir);
    const previews = await mapWithConcurrency(files, this.concurrency, async (filePath) => {
      const result = await this.engine.preview(filePath, [request]);
      return { filePath, diff: result.diff, changes: result.ok ? changesOf(result) : 0 };
    });
    return previews.filter((p) => p.changes > 0);
  }

  async analyze(globs: readonly string[], patterns: readonly string[] = [], baseDir?: string): Promise<WorkspaceAnalysis> {
    const regexes = patterns.map((p) => this.engine.matcher.compileOrThrow(p));
    const analysis: WorkspaceAnalysis = { files: 0, totalLines: 0, totalBytes: 0, byExtension: {}, patternCounts: {} };
    for (const p of patterns) analysis.patternCounts[p] = 0;

    for (const filePath of await this.files(globs, baseDir)) {
      let loaded: LoadedFile;
      try {
        loaded = await this.engine.workspace.loadFile(filePath, {
          maxBytes: this.engine.config.maxFileSizeMb * 1024 * 1024,
        });
      } catch (e) {
        console.warn(`[BatchOperations] skipping ${filePath}: ${errorMessage(e)}`);
        continue;
      }
      const { info, lines } = loaded;
      analysis.files++;
      analysis.totalLines += info.lineCount;
      analysis.totalBytes += info.size;
      const ext = info.extension || path.basename(filePath);
      const stats = analysis.byExtension[ext] ?? { files: 0, lines: 0 };
      stats.files++;
      stats.lines += info.lineCount;
      analysis.byExtension[ext] = stats;
      patterns.forEach((p, i) => {
        analysis.patternCounts[p] += lines.filter((line) => regexes[i].test(line)).length;
      });
    }
    return analysis;
  }

  history(): BatchRecord[] {
    return [...this.records];
  }

  private async run(
    kind: BatchOperationKind,
    label: string,
    requests: readonly PatchRequest[],
    globs: readonly string[],
    baseDir?: string
  ): Promise<BatchSummary> {
    const files = await this.files(globs, baseDir);
    const results = await mapWithConcurrency(files, this.concurrency, async (filePath) =>
      toFileResult(filePath, await this.patchHistory.applyAndRecord(filePath, requests))
    );

    const summary: BatchSummary = {
      kind,
      results,
      filesProcessed: results.length,
      filesChanged: results.filter((r) => r.changed).length,
      changesApplied: results.reduce((sum, r) => sum + r.changes, 0),
    };
    this.records.push({
      kind,
      timestamp: this.now().toISOString(),
      label,
      filesProcessed: summary.filesProcessed,
      filesChanged: summary.filesChanged,
      changesApplied: summary.changesApplied,
    });
    return summary;
  }
}
