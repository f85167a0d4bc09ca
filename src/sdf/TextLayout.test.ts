import { describe, it, expect } from "vitest";
import { GlyphMetricsCache } from "./GlyphMetricsCache";
import { TextLayout } from "./TextLayout";
import type { LayoutFont } from "./TextLayout";
import { FakeFontFace } from "../testing/fakes";

const ALL_GLYPHS = [1, 2, 3, 4, 5, 6];

function createLayout(size = 32, glyphs: number[] = ALL_GLYPHS) {
  const face = new FakeFontFace();
  // ascent 26, descent 6, leading 2
  const font: LayoutFont = {
    getSize: () => size,
    getAscent: () => 26,
    getDescent: () => 6,
    getLeading: () => 2,
    getGlyphChar: (ch) => face.glyphIndex(ch.codePointAt(0) ?? 0),
  };
  return new TextLayout(font, new GlyphMetricsCache(face, size, glyphs));
}

describe("TextLayout", () => {
  describe("layout", () => {
    it("places glyphs along the pen with a half pixel bias", () => {
      const layout = createLayout();

      expect(layout.layout("AB", Infinity)).toEqual([
        { glyph: 2, position: [0.5, 0] },
        { glyph: 3, position: [20.5, 0] },
      ]);
    });

    it("returns no placements for empty text", () => {
      expect(createLayout().layout("", Infinity)).toEqual([]);
    });

    it("advances lines by the line height", () => {
      const placements = createLayout().layout("A\nB", Infinity);

      expect(placements[1]).toEqual({ glyph: 3, position: [0.5, 34] });
    });

    it("adds extra leading to the line height", () => {
      const placements = createLayout().layout("A\nB", Infinity, 4);

      expect(placements[1].position[1]).toBe(38);
    });

    it("scales advances and line height with the point size", () => {
      const layout = createLayout(64);

      expect(layout.layout("AB", Infinity)[1].position).toEqual([40.5, 0]);
      expect(layout.getLineHeight()).toBe(68);
    });

    it("wraps at the maximum width", () => {
      const placements = createLayout().layout("AB AB", 38);

      expect(placements.map((p) => p.position)).toEqual([
        [0.5, 0],
        [20.5, 0],
        [0.5, 34],
        [20.5, 34],
      ]);
    });

    it("returns the same placements on repeated calls", () => {
      const layout = createLayout();

      expect(layout.layout("AB\nBA", 100)).toEqual(layout.layout("AB\nBA", 100));
    });

    it("throws when a glyph's metrics were never cached", () => {
      const layout = createLayout(32, [2]);

      expect(() => layout.layout("AB", Infinity)).toThrow("No cached metrics for glyph 3");
    });
  });

  describe("measureLine", () => {
    it("sums advances in whole pixels", () => {
      expect(createLayout().measureLine("AB")).toBe(38);
    });
  });

  describe("breakLines", () => {
    it("breaks with measured advances", () => {
      const layout = createLayout();

      expect(layout.breakLines("AB AB", 38)).toEqual(["AB", "AB"]);
      expect(layout.breakLines("AB", 37)).toEqual(["A", "B"]);
    });
  });

  describe("getLineHeight", () => {
    it("sums ascent, descent and leading", () => {
      expect(createLayout().getLineHeight()).toBe(34);
      expect(createLayout().getLineHeight(2)).toBe(36);
    });
  });
});
