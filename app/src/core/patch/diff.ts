/**
 * Unified diff generation between two line buffers.
 * Reading and applying .patch files is out of scope (see applyPatchFile).
 */

import { writeFile } from "node:fs/promises";
import { structuredPatch } from "diff";
import { PatchError } from "./errors";

export const DEFAULT_DIFF_CONTEXT = 3;

export interface DiffStats {
  additions: number;
  deletions: number;
  hunks: number;
}

function toText(lines: readonly string[]): string {
  return lines.length === 0 ? "" : lines.join("\n") + "\n";
}

function formatRange(start: number, length: number): string {
  if (length === 1) return `${start}`;
  // a zero-length range points at the line before it
  return `${length === 0 ? start - 1 : start},${length}`;
}

/**
 * Diff lines with `--- a/<path>` / `+++ b/<path>` headers and `@@` hunks.
 * Identical buffers give an empty array.
 */
export function unifiedDiff(
  oldLines: readonly string[],
  newLines: readonly string[],
  filePath: string,
  contextLines = DEFAULT_DIFF_CONTEXT
): string[] {
  const path = filePath.replace(/\\/g, "/").replace(/^\/+/, "");
  const patch = structuredPatch(`a/${path}`, `b/${path}`, toText(oldLines), toText(newLines), undefined, undefined, {
    context: Math.max(0, contextLines),
  });
  if (patch.hunks.length === 0) return [];

  const out = [`--- a/${path}`, `+++ b/${path}`];
  for (const hunk of patch.hunks) {
    out.push(`@@ -${formatRange(hunk.oldStart, hunk.oldLines)} +${formatRange(hunk.newStart, hunk.newLines)} @@`);
    for (const line of hunk.lines) {
      if (line.startsWith("\\")) continue;
      out.push(line);
    }
  }
  return out;
}

export function diffStats(diffLines: readonly string[]): DiffStats {
  let additions = 0;
  let deletions = 0;
  let hunks = 0;
  for (const line of diffLines) {
    if (line.startsWith("+++ ") || line.startsWith("--- ")) continue;
    if (line.startsWith("@@")) hunks++;
    else if (line.startsWith("+")) additions++;
    else if (line.startsWith("-")) deletions++;
  }
  return { additions, deletions, hunks };
}

/** Export a diff as a standard .patch file. */
export async function writePatchFile(targetPath: string, diffLines: readonly string[]): Promise<void> {
  await writeFile(targetPath, diffLines.length === 0 ? "" : diffLines.join("\n") + "\n", "utf8");
}

export function applyPatchFile(_patchText: string): never {
  throw new PatchError("Unsupported", "Applying unified diff files is not supported; use patch requests instead");
}
