/**
 * PatternMatcher: compile + cache regexes, find matching lines with context,
 * multi-line and block matching, fuzzy line similarity.
 */

import { diffChars } from "diff";
import { PatchError, errorMessage } from "./errors";

export const DEFAULT_CACHE_CAPACITY = 256;
export const DEFAULT_FUZZY_THRESHOLD = 0.8;

export type CompileResult = { ok: true; regex: RegExp } | { ok: false; error: PatchError };

export interface ContextLine {
  lineNumber: number;
  content: string;
}

export interface MatchInfo {
  /** 1-based */
  lineNumber: number;
  /** 0-based */
  lineIndex: number;
  matchedText: string;
  fullLine: string;
  /** 1-based, inclusive */
  contextStart: number;
  /** 1-based, inclusive */
  contextEnd: number;
  contextLines: ContextLine[];
  captureGroups: (string | undefined)[];
  /** 1-based position among all matches */
  matchIndex: number;
}

export interface MultilineMatch {
  startLine: number;
  endLine: number;
  matchedText: string;
  captureGroups: (string | undefined)[];
  contextStart: number;
  contextEnd: number;
}

export interface CodeBlock {
  startLine: number;
  endLine: number;
  lines: string[];
}

export interface FuzzyHit {
  text: string;
  score: number;
  lineIndex: number;
}

export interface MatcherStats {
  hits: number;
  misses: number;
  errors: number;
  size: number;
}

/** Strip flags that make RegExp.test stateful. */
function normalizeFlags(flags: string): string {
  return [...new Set(flags.replace(/[gy]/g, ""))].sort().join("");
}

export class PatternMatcher {
  private cache = new Map<string, RegExp>();
  private counters = { hits: 0, misses: 0, errors: 0 };

  constructor(private capacity = DEFAULT_CACHE_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`cache capacity must be a positive integer, got ${capacity}`);
    }
  }

  /** Compile with LRU caching. Invalid syntax is returned, never thrown. */
  compile(pattern: string, flags = ""): CompileResult {
    const normalized = normalizeFlags(flags);
    const key = `${pattern}|${normalized}`;
    const cached = this.cache.get(key);
    if (cached) {
      this.counters.hits++;
      // refresh recency
      this.cache.delete(key);
      this.cache.set(key, cached);
      return { ok: true, regex: cached };
    }

    let regex: RegExp;
    try {
      regex = new RegExp(pattern, normalized);
    } catch (e) {
      this.counters.errors++;
      return { ok: false, error: new PatchError("InvalidPattern", `Invalid regex pattern /${pattern}/: ${errorMessage(e)}`) };
    }

    this.counters.misses++;
    this.cache.set(key, regex);
    if (this.cache.size > this.capacity) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) this.cache.delete(oldest.value);
    }
    return { ok: true, regex };
  }

  /** Compile or throw; for callers that already validated the pattern. */
  compileOrThrow(pattern: string, flags = ""): RegExp {
    const r = this.compile(pattern, flags);
    if (!r.ok) throw r.error;
    return r.regex;
  }

  isValid(pattern: string): boolean {
    return this.compile(pattern).ok;
  }

  /** Index of the first line at or after `fromIndex` matching `regex`, or -1. */
  findFirstMatch(lines: readonly string[], regex: RegExp, fromIndex = 0): number {
    for (let i = Math.max(0, fromIndex); i < lines.length; i++) {
      if (regex.test(lines[i])) return i;
    }
    return -1;
  }

  /** Scan top-to-bottom, one search per line. */
  findMatches(lines: readonly string[], pattern: string, contextLines = 3): MatchInfo[] {
    const regex = this.compileOrThrow(pattern);
    const ctx = Math.max(0, contextLines);
    const out: MatchInfo[] = [];

    for (let i = 0; i < lines.length; i++) {
      const m = regex.exec(lines[i]);
      if (!m) continue;
      const start = Math.max(0, i - ctx);
      const end = Math.min(lines.length, i + ctx + 1);
      const context: ContextLine[] = [];
      for (let j = start; j < end; j++) context.push({ lineNumber: j + 1, content: lines[j] });
      out.push({
        lineNumber: i + 1,
        lineIndex: i,
        matchedText: m[0],
        fullLine: lines[i],
        contextStart: start + 1,
        contextEnd: end,
        contextLines: context,
        captureGroups: m.slice(1),
        matchIndex: out.length + 1,
      });
    }
    return out;
  }

  /**
   * Match across line boundaries: lines are joined with `joiner`, matched with
   * multiline + dotAll, and character offsets are mapped back to 1-based lines.
   */
  findMultilineMatches(
    lines: readonly string[],
    pattern: string,
    options: { joiner?: string; contextLines?: number } = {}
  ): MultilineMatch[] {
    const joiner = options.joiner ?? "\n";
    if (joiner === "") throw new RangeError("joiner must not be empty");
    const ctx = Math.max(0, options.contextLines ?? 0);
    const text = lines.join(joiner);
    const regex = new RegExp(this.compileOrThrow(pattern, "ms").source, "gms");

    // starts[k] = character offset where line k begins
    const starts: number[] = [];
    let offset = 0;
    for (const line of lines) {
      starts.push(offset);
      offset += line.length + joiner.length;
    }
    const lineAt = (pos: number): number => {
      let lo = 0;
      let hi = starts.length - 1;
      while (lo < hi) {
        const mid = (lo + hi + 1) >> 1;
        if (starts[mid] <= pos) lo = mid;
        else hi = mid - 1;
      }
      return lo;
    };

    const out: MultilineMatch[] = [];
    if (lines.length === 0) return out;
    for (const m of text.matchAll(regex)) {
      const startPos = m.index ?? 0;
      const endPos = startPos + Math.max(0, m[0].length - 1);
      const startIdx = lineAt(startPos);
      const endIdx = lineAt(endPos);
      out.push({
        startLine: startIdx + 1,
        endLine: endIdx + 1,
        matchedText: m[0],
        captureGroups: m.slice(1),
        contextStart: Math.max(0, startIdx - ctx) + 1,
        contextEnd: Math.min(lines.length, endIdx + ctx + 1),
      });
      if (m[0].length === 0) regex.lastIndex++;
    }
    return out;
  }

  /** Blocks from a start-pattern line to the next end-pattern line. */
  findCodeBlocks(lines: readonly string[], startPattern: string, endPattern: string, inclusive = true): CodeBlock[] {
    const start = this.compileOrThrow(startPattern);
    const end = this.compileOrThrow(endPattern);
    const blocks: CodeBlock[] = [];
    let i = 0;
    while (i < lines.length) {
      const s = this.findFirstMatch(lines, start, i);
      if (s < 0) break;
      const e = this.findFirstMatch(lines, end, s + 1);
      if (e < 0) break;
      blocks.push({
        startLine: s + 1,
        endLine: e + 1,
        lines: inclusive ? lines.slice(s, e + 1) : lines.slice(s + 1, e),
      });
      i = e + 1;
    }
    return blocks;
  }

  stats(): MatcherStats {
    return { ...this.counters, size: this.cache.size };
  }

  clear(): void {
    this.cache.clear();
    this.counters = { hits: 0, misses: 0, errors: 0 };
  }
}

// ---------------------------------------------------------------------------
// Fuzzy matching
// ---------------------------------------------------------------------------

/** Case-insensitive similarity in [0, 1]: 2 * shared chars / total chars. */
export function similarity(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  let shared = 0;
  for (const part of diffChars(a.toLowerCase(), b.toLowerCase())) {
    if (!part.added && !part.removed) shared += part.value.length;
  }
  return (2 * shared) / total;
}

/** Lines scoring at or above `threshold`, best first. */
export function fuzzySearch(
  target: string,
  lines: readonly string[],
  threshold = DEFAULT_FUZZY_THRESHOLD
): FuzzyHit[] {
  if (threshold < 0 || threshold > 1) throw new RangeError("threshold must be between 0 and 1");
  const hits: FuzzyHit[] = [];
  lines.forEach((text, lineIndex) => {
    const score = similarity(target, text);
    if (score >= threshold) hits.push({ text, score, lineIndex });
  });
  return hits.sort((x, y) => y.score - x.score || x.lineIndex - y.lineIndex);
}

export function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Whole-word pattern for a literal word. */
export function wordPattern(word: string): string {
  return `\\b${escapeRegex(word)}\\b`;
}
