import { describe, expect, it } from "vitest";
import { PatternMatcher, escapeRegex, fuzzySearch, similarity, wordPattern } from "./PatternMatcher";

describe("PatternMatcher", () => {
  it("caches compiled patterns and evicts the least recently used", () => {
    const m = new PatternMatcher(2);
    m.compile("a");
    m.compile("b");
    m.compile("a");
    m.compile("c");
    const again = m.compile("a");
    expect(again.ok).toBe(true);
    expect(m.stats()).toEqual({ hits: 2, misses: 3, errors: 0, size: 2 });

    m.compile("b");
    expect(m.stats().misses).toBe(4);
  });

  it("returns the same RegExp for a cached pattern and drops stateful flags", () => {
    const m = new PatternMatcher();
    const first = m.compileOrThrow("x", "gi");
    expect(first.flags).toBe("i");
    expect(m.compileOrThrow("x", "i")).toBe(first);
  });

  it("reports invalid syntax without throwing", () => {
    const m = new PatternMatcher();
    const r = m.compile("(unclosed");
    expect(r.ok).toBe(false);
    if (!r.ok) {
      expect(r.error.code).toBe("InvalidPattern");
      expect(r.error.message.startsWith("Invalid regex pattern /(unclosed/: ")).toBe(true);
    }
    expect(m.stats().errors).toBe(1);
    expect(() => m.compileOrThrow("(unclosed")).toThrow(/Invalid regex pattern/);
    expect(m.isValid("ok+")).toBe(true);
  });

  it("rejects a non-positive capacity", () => {
    expect(() => new PatternMatcher(0)).toThrow(RangeError);
  });

  it("finds matches with clamped context and capture groups", () => {
    const lines = ["import os", "x = 1", "import sys", "y = 2"];
    const matches = new PatternMatcher().findMatches(lines, "^import (\\w+)", 1);
    expect(matches.map((m) => [m.lineNumber, m.contextStart, m.contextEnd, m.matchIndex])).toEqual([
      [1, 1, 2, 1],
      [3, 2, 4, 2],
    ]);
    expect(matches[1].captureGroups).toEqual(["sys"]);
    expect(matches[1].contextLines).toEqual([
      { lineNumber: 2, content: "x = 1" },
      { lineNumber: 3, content: "import sys" },
      { lineNumber: 4, content: "y = 2" },
    ]);
  });

  it("maps multi-line matches back to line numbers", () => {
    const lines = ["a", "start", "x", "end", "b"];
    const [match, ...rest] = new PatternMatcher().findMultilineMatches(lines, "start.*?end");
    expect(rest).toEqual([]);
    expect(match).toEqual({
      startLine: 2,
      endLine: 4,
      matchedText: "start\nx\nend",
      captureGroups: [],
      contextStart: 2,
      contextEnd: 4,
    });
  });

  it("collects blocks between start and end lines", () => {
    const lines = ["begin", "  a", "end", "noise", "begin", "  b", "end", "begin"];
    const m = new PatternMatcher();
    expect(m.findCodeBlocks(lines, "^begin", "^end")).toEqual([
      { startLine: 1, endLine: 3, lines: ["begin", "  a", "end"] },
      { startLine: 5, endLine: 7, lines: ["begin", "  b", "end"] },
    ]);
    expect(m.findCodeBlocks(lines, "^begin", "^end", false)[0].lines).toEqual(["  a"]);
  });
});

describe("fuzzy matching", () => {
  it("scores shared characters case-insensitively", () => {
    expect(similarity("Return X", "return x")).toBe(1);
    expect(similarity("", "")).toBe(1);
    expect(similarity("abcd", "abxd")).toBeCloseTo(0.75);
  });

  it("ranks lines at or above the threshold", () => {
    const hits = fuzzySearch("return x", ["foo()", "return y", "return x"], 0.8);
    expect(hits.map((h) => h.lineIndex)).toEqual([2, 1]);
    expect(hits[1].score).toBeCloseTo(0.875);
    expect(() => fuzzySearch("a", [], 2)).toThrow(RangeError);
  });
});

describe("escapeRegex", () => {
  it("matches the literal text", () => {
    const literal = "a.b*(c)[d]";
    expect(new RegExp(escapeRegex(literal)).test(`x${literal}y`)).toBe(true);
    expect(new RegExp(escapeRegex(literal)).test("aXb*(c)[d]")).toBe(false);
    expect(new RegExp(wordPattern("foo")).test("foobar")).toBe(false);
  });
});
