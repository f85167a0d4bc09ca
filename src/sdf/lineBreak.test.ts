import { describe, it, expect } from "vitest";
import { breakLines, isUnbounded } from "./lineBreak";

// Every character is 10px wide
const measure = (line: string) => line.length * 10;

describe("isUnbounded", () => {
  it("treats Infinity, huge and non-positive widths as unbounded", () => {
    expect(isUnbounded(Infinity)).toBe(true);
    expect(isUnbounded(1e6)).toBe(true);
    expect(isUnbounded(0)).toBe(true);
    expect(isUnbounded(-5)).toBe(true);
    expect(isUnbounded(NaN)).toBe(true);
  });

  it("treats positive widths below the limit as bounded", () => {
    expect(isUnbounded(1)).toBe(false);
    expect(isUnbounded(999999)).toBe(false);
  });
});

describe("breakLines", () => {
  it("returns no lines for empty text", () => {
    expect(breakLines("", 100, measure)).toEqual([]);
    expect(breakLines("", Infinity, measure)).toEqual([]);
  });

  it("splits only at mandatory breaks when unbounded", () => {
    expect(breakLines("hello world", Infinity, measure)).toEqual(["hello world"]);
    expect(breakLines("a\r\nb", Infinity, measure)).toEqual(["a", "b"]);
    expect(breakLines("a\nb\u2028c", 0, measure)).toEqual(["a", "b", "c"]);
  });

  it("keeps empty paragraphs", () => {
    expect(breakLines("a\n\nb", 100, measure)).toEqual(["a", "", "b"]);
  });

  it("wraps at spaces", () => {
    expect(breakLines("hello world", 50, measure)).toEqual(["hello", "world"]);
  });

  it("keeps a line that is exactly the width", () => {
    expect(breakLines("hello world", 110, measure)).toEqual(["hello world"]);
    expect(breakLines("hello world", 109, measure)).toEqual(["hello", "world"]);
  });

  it("wraps after tabs", () => {
    expect(breakLines("a\tb", 10, measure)).toEqual(["a", "b"]);
  });

  it("breaks after hyphens", () => {
    expect(breakLines("well-known", 50, measure)).toEqual(["well-", "known"]);
  });

  it("breaks long words between characters", () => {
    expect(breakLines("abcdefgh", 30, measure)).toEqual(["abc", "def", "gh"]);
  });

  it("places at least one character per line", () => {
    expect(breakLines("ab", 5, measure)).toEqual(["a", "b"]);
  });

  it("trims trailing spaces from wrapped lines", () => {
    expect(breakLines("ab   ", 100, measure)).toEqual(["ab"]);
    expect(breakLines("ab   cd", 40, measure)).toEqual(["ab", "cd"]);
  });
});
