/**
 * PreviewRenderer: plain-text views of files, diffs, patch queues, search hits
 * and apply results. Colour comes from chalk; pass a level-0 instance for plain text.
 */

import chalk from "chalk";
import { diffArrays } from "diff";
import type { FileMatches } from "../batch/BatchOperations";
import { detectIndentStyle, isBlank } from "../patch/indentation";
import type { PatchResult } from "../patch/PatchEngine";
import type { PatchRequest } from "../patch/PatchRequest";
import { describePatchRequest } from "../patch/PatchRequest";
import type { FileInfo } from "../types";

const COMMENT_PREFIXES = ["#", "//", "/*", "*", "--", "<!--"];

export interface RendererOptions {
  color?: chalk.Chalk;
  maxPreviewLines?: number;
}

interface SideBySideRow {
  left: string | null;
  right: string | null;
  kind: "same" | "removed" | "added" | "changed";
}

/** Pair up runs of removed and added lines so a changed line sits beside its replacement. */
function sideBySideRows(oldLines: readonly string[], newLines: readonly string[]): SideBySideRow[] {
  const rows: SideBySideRow[] = [];
  let removed: string[] = [];
  let added: string[] = [];
  const flush = () => {
    const n = Math.max(removed.length, added.length);
    for (let i = 0; i < n; i++) {
      const left = removed[i] ?? null;
      const right = added[i] ?? null;
      rows.push({ left, right, kind: left === null ? "added" : right === null ? "removed" : "changed" });
    }
    removed = [];
    added = [];
  };

  for (const part of diffArrays([...oldLines], [...newLines])) {
    if (part.removed) removed.push(...part.value);
    else if (part.added) added.push(...part.value);
    else {
      flush();
      for (const line of part.value) rows.push({ left: line, right: line, kind: "same" });
    }
  }
  flush();
  return rows;
}

export function formatBytes(size: number): string {
  if (size < 1024) return `${size} B`;
  if (size < 1024 * 1024) return `${(size / 1024).toFixed(1)} KB`;
  return `${(size / (1024 * 1024)).toFixed(1)} MB`;
}

export class PreviewRenderer {
  private readonly c: chalk.Chalk;
  maxPreviewLines: number;

  constructor(options: RendererOptions = {}) {
    this.c = options.color ?? chalk;
    this.maxPreviewLines = options.maxPreviewLines ?? 50;
  }

  /** Numbered window of a file starting at 1-based `start`. */
  renderFilePreview(info: FileInfo, lines: readonly string[], start = 1, count = this.maxPreviewLines): string[] {
    const from = Math.max(1, start);
    const to = Math.min(lines.length, from + Math.max(0, count) - 1);
    const width = String(Math.max(to, 1)).length;
    const out = [this.c.bold(`${info.relativePath} (${info.lineCount} lines, ${info.language})`)];
    for (let n = from; n <= to; n++) {
      out.push(`${this.c.gray(String(n).padStart(width))} | ${lines[n - 1]}`);
    }
    if (to < lines.length) out.push(this.c.gray(`... ${lines.length - to} more lines`));
    return out;
  }

  renderDiff(diffLines: readonly string[]): string[] {
    if (diffLines.length === 0) return [this.c.gray("No changes")];
    return diffLines.map((line) => {
      if (line.startsWith("+++ ") || line.startsWith("--- ")) return this.c.bold(line);
      if (line.startsWith("@@")) return this.c.cyan(line);
      if (line.startsWith("+")) return this.c.green(line);
      if (line.startsWith("-")) return this.c.red(line);
      return line;
    });
  }

  /**
   * Original and modified text in two columns. Lines longer than `maxWidth`
   * are cut to fit and end in `...`; at most maxPreviewLines rows are shown.
   */
  renderSideBySideDiff(oldLines: readonly string[], newLines: readonly string[], filePath: string, maxWidth = 40): string[] {
    const width = Math.max(4, maxWidth);
    const fit = (text: string) => (text.length > width ? `${text.slice(0, width - 3)}...` : text);
    const cell = (mark: string, text: string | null) => (text === null ? "" : `${mark} ${fit(text)}`);
    const column = width + 2;

    const rows = sideBySideRows(oldLines, newLines);
    const out = [this.c.bold(`Side-by-side: ${filePath}`), `${"ORIGINAL".padEnd(column)} | MODIFIED`];
    for (const row of rows.slice(0, this.maxPreviewLines)) {
      const same = row.kind === "same";
      const left = cell(same ? " " : "-", row.left).padEnd(column);
      const right = cell(same ? " " : "+", row.right);
      out.push(
        `${same ? left : this.c.red(left)} |${right === "" ? "" : ` ${same ? right : this.c.green(right)}`}`
      );
    }
    if (rows.length > this.maxPreviewLines) out.push(this.c.gray(`... ${rows.length - this.maxPreviewLines} more rows`));
    return out;
  }

  renderPatchQueue(requests: readonly PatchRequest[]): string[] {
    if (requests.length === 0) return [this.c.gray("No patches queued")];
    const out: string[] = [];
    requests.forEach((r, i) => {
      out.push(`${i + 1}. ${describePatchRequest(r)}`);
      if (r.description) out.push(`   ${this.c.gray(r.description)}`);
    });
    return out;
  }

  renderSearchResults(results: readonly FileMatches[]): string[] {
    if (results.length === 0) return [this.c.gray("No matches")];
    const out: string[] = [];
    let total = 0;
    for (const { filePath, matches } of results) {
      out.push(this.c.bold(filePath));
      for (const m of matches) {
        out.push(`  ${this.c.yellow(`Line ${m.lineNumber}`)}: ${m.fullLine.trim()}`);
        total++;
      }
    }
    out.push(`${total} match${total === 1 ? "" : "es"} in ${results.length} file${results.length === 1 ? "" : "s"}`);
    return out;
  }

  renderFileStatistics(info: FileInfo, lines: readonly string[]): string[] {
    const blank = lines.filter(isBlank).length;
    const comments = lines.filter((l) => COMMENT_PREFIXES.some((p) => l.trimStart().startsWith(p))).length;
    const longest = lines.reduce((max, l) => Math.max(max, l.length), 0);
    const style = detectIndentStyle(lines);
    return [
      this.c.bold(info.relativePath),
      `Language:     ${info.language}`,
      `Size:         ${formatBytes(info.size)}`,
      `Lines:        ${lines.length} (${lines.length - blank} code/comment, ${blank} blank)`,
      `Comments:     ${comments}`,
      `Longest line: ${longest}`,
      `Indentation:  ${style.kind === "tabs" ? "tabs" : `${style.size} spaces`}`,
      `Line endings: ${info.format.eol === "\r\n" ? "CRLF" : "LF"}${info.format.trailingNewline ? "" : " (no final newline)"}`,
      `MD5:          ${info.hash}`,
    ];
  }

  renderApplyResult(result: PatchResult): string[] {
    const total = result.successfulCount + result.failedCount;
    const out: string[] = [];
    if (result.ok) {
      const verb = result.written ? "Applied" : "Would apply";
      out.push(this.c.green(`${verb} ${result.successfulCount}/${total} patches to ${result.filePath}`));
    } else {
      out.push(this.c.red(`Failed to patch ${result.filePath}: ${result.error?.message ?? "unknown error"}`));
    }

    for (const v of result.validationErrors ?? []) {
      out.push(`  ${this.c.red("[invalid]")} patch ${v.index + 1}: ${v.error.message}`);
    }
    for (const o of result.outcomes) {
      out.push(
        o.status === "applied"
          ? `  ${this.c.green("[ok]")} ${o.message}`
          : `  ${this.c.red("[failed]")} ${o.error.code}: ${o.error.message}`
      );
    }
    for (const c of result.conflicts) {
      out.push(`  ${this.c.yellow("[conflict]")} patches ${c.first + 1} and ${c.second + 1}: ${c.reason}`);
    }
    if (result.written) {
      out.push(`Lines: ${result.originalLineCount} -> ${result.newLineCount}`);
      if (result.backupPath) out.push(`Backup: ${result.backupPath}`);
    }
    return out;
  }
}
