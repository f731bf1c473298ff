/**
 * Line buffer <-> file text. Lines are stored without terminators; the file's
 * terminator convention (LF or CRLF, trailing newline or not) is kept so a write
 * reproduces it.
 */

import type { LineEnding, LineFormat } from "../types";

export interface SplitContent {
  lines: string[];
  format: LineFormat;
}

export const DEFAULT_LINE_FORMAT: LineFormat = { eol: "\n", trailingNewline: true };

export function detectLineEnding(content: string): LineEnding {
  // the first terminator decides
  const lf = content.indexOf("\n");
  return lf > 0 && content[lf - 1] === "\r" ? "\r\n" : "\n";
}

export function splitLines(content: string): SplitContent {
  if (content === "") {
    return { lines: [], format: { ...DEFAULT_LINE_FORMAT } };
  }
  const eol = detectLineEnding(content);
  const trailingNewline = content.endsWith("\n");
  const lines = content.split(/\r?\n/);
  if (trailingNewline) lines.pop();
  return { lines, format: { eol, trailingNewline } };
}

export function joinLines(lines: readonly string[], format: LineFormat = DEFAULT_LINE_FORMAT): string {
  if (lines.length === 0) return "";
  return lines.join(format.eol) + (format.trailingNewline ? format.eol : "");
}
