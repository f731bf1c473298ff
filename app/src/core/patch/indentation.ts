/**
 * Indentation inference for injected code: inserted lines take the prefix of
 * their surroundings.
 */

export function isBlank(line: string): boolean {
  return line.trim() === "";
}

/** Leading whitespace of a line; "" for blank lines. */
export function detectLineIndent(line: string): string {
  if (isBlank(line)) return "";
  const m = /^[ \t]*/.exec(line);
  return m ? m[0] : "";
}

/**
 * Indent of the nearest non-blank line before `position` (0-based insertion
 * index); failing that, the nearest one at or after it; "" if every line is blank.
 */
export function detectContextIndent(lines: readonly string[], position: number): string {
  for (let i = Math.min(position, lines.length) - 1; i >= 0; i--) {
    if (!isBlank(lines[i])) return detectLineIndent(lines[i]);
  }
  for (let i = Math.max(position, 0); i < lines.length; i++) {
    if (!isBlank(lines[i])) return detectLineIndent(lines[i]);
  }
  return "";
}

/** Prefix every non-blank line with `indent`; blank lines pass through untouched. */
export function applyIndent(codeLines: readonly string[], indent: string): string[] {
  if (!indent) return [...codeLines];
  return codeLines.map((line) => (isBlank(line) ? line : indent + line));
}

export interface IndentStyle {
  kind: "spaces" | "tabs";
  /** spaces per level; 1 for tabs */
  size: number;
}

/** Dominant indent style over the first `sampleSize` indented lines. */
export function detectIndentStyle(lines: readonly string[], sampleSize = 50): IndentStyle {
  let tabs = 0;
  let spaces = 0;
  const widths = new Map<number, number>();
  let sampled = 0;

  for (const line of lines) {
    if (sampled >= sampleSize) break;
    const indent = detectLineIndent(line);
    if (!indent) continue;
    sampled++;
    if (indent.startsWith("\t")) {
      tabs++;
    } else {
      spaces++;
      widths.set(indent.length, (widths.get(indent.length) ?? 0) + 1);
    }
  }

  if (tabs > spaces) return { kind: "tabs", size: 1 };
  if (widths.size === 0) return { kind: "spaces", size: 4 };

  // smallest width that divides most of the observed widths
  for (const candidate of [2, 4, 8, 3]) {
    let covered = 0;
    for (const [width, count] of widths) if (width % candidate === 0) covered += count;
    if (covered >= spaces * 0.8 && [...widths.keys()].includes(candidate)) return { kind: "spaces", size: candidate };
  }
  return { kind: "spaces", size: Math.min(...widths.keys()) };
}
