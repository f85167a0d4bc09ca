/**
 * Text Layout Engine
 *
 * Breaks text into lines and places glyphs left to right using cached glyph
 * advances.
 */

import type { Glyph } from "../font/types";
import type { GlyphMetricsCache } from "./GlyphMetricsCache";
import { breakLines } from "./lineBreak";
import { REFERENCE_FONT_SIZE } from "./types";
import type { GlyphPlacement } from "./types";

/** Font values layout reads; `Font` provides all of them */
export interface LayoutFont {
  getSize(): number;
  getAscent(): number;
  getDescent(): number;
  getLeading(): number;
  getGlyphChar(char: string): Glyph;
}

/**
 * Text layout engine for SDF text rendering.
 *
 * Positions are in pixels relative to the text origin: x from the pen (with a
 * half-pixel bias), y from the line index times the line height.
 */
export class TextLayout {
  private font: LayoutFont;
  private metrics: GlyphMetricsCache;

  constructor(font: LayoutFont, metrics: GlyphMetricsCache) {
    this.font = font;
    this.metrics = metrics;
  }

  /**
   * Lay out text.
   *
   * @param text - Text to place
   * @param maxWidth - Wrap width in pixels; Infinity, values of 1e6 or more, or 0 never wrap
   * @param leading - Extra line spacing added to the font's leading
   */
  layout(text: string, maxWidth: number, leading = 0): GlyphPlacement[] {
    const placements: GlyphPlacement[] = [];
    const lineHeight = this.getLineHeight(leading);

    let lineY = 0;
    for (const line of this.breakLines(text, maxWidth)) {
      let penX = 0;
      for (const ch of line) {
        const glyph = this.font.getGlyphChar(ch);
        const advance = this.metrics.get(glyph);
        placements.push({ glyph, position: [penX / 64 + 0.5, lineY] });
        penX += advance[0];
      }
      lineY += lineHeight;
    }

    return placements;
  }

  breakLines(text: string, maxWidth: number): string[] {
    return breakLines(text, maxWidth, (line) => this.measureLine(line));
  }

  /**
   * Width of a single line in whole pixels.
   */
  measureLine(text: string): number {
    let penX = 0;
    for (const ch of text) {
      penX += this.metrics.get(this.font.getGlyphChar(ch))[0];
    }
    return penX >> 6;
  }

  /**
   * Distance between consecutive baselines in pixels.
   */
  getLineHeight(leading = 0): number {
    const fontSizeScale = this.font.getSize() / REFERENCE_FONT_SIZE;
    return (
      fontSizeScale *
      (this.font.getAscent() + this.font.getDescent() + this.font.getLeading() + leading)
    );
  }
}
