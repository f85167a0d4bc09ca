/**
 * SDF Text
 *
 * A font bound to a cached atlas. Lays out strings with the font's advances
 * and draws them through the context's rendering backend.
 */

import { unwrap } from "../errors";
import type { Result } from "../errors";
import { Font } from "../font/Font";
import { rectHeight, rectWidth, upperLeft } from "../math/rect";
import type { Rect } from "../math/rect";
import { add } from "../math/vec2";
import { withDefaults } from "../options";
import type { Vec2 } from "../math/vec2";
import type { Color } from "../types/color";
import { batchGlyphs } from "./batchGlyphs";
import type { BatchOrigin, BatchSource } from "./batchGlyphs";
import { GlyphMetricsCache } from "./GlyphMetricsCache";
import type { SdfTextContext } from "./SdfTextContext";
import { TextLayout } from "./TextLayout";
import { DEFAULT_ATLAS_FORMAT, REFERENCE_FONT_SIZE, resolveDrawOptions } from "./types";
import type { Atlas, AtlasFormat, DrawOptions, GlyphPlacement } from "./types";

const DEFAULT_CHARS =
  "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz1234567890().?!,:;'\"&*=+-/\\@#_[]<>%^llflfiphridséáèà";

export class SdfText<TTexture, TProgram> {
  private readonly context: SdfTextContext<TTexture, TProgram>;
  private readonly font: Font;
  private readonly format: AtlasFormat;
  private readonly atlas: Atlas<TTexture>;
  private readonly metrics: GlyphMetricsCache;
  private readonly layout: TextLayout;

  private constructor(
    context: SdfTextContext<TTexture, TProgram>,
    font: Font,
    format: AtlasFormat,
    chars: string
  ) {
    this.context = context;
    this.font = font;
    this.format = format;
    this.atlas = context.atlases.getAtlas(font.getFace(), chars, format);
    this.metrics = new GlyphMetricsCache(font.getFace(), font.getSize(), this.atlas.charMap.values());
    this.layout = new TextLayout(font, this.metrics);
  }

  /**
   * Create text for `font`, building the atlas for `supportedChars` unless an
   * identical one is cached. A failed font result is thrown.
   *
   * The text holds its own reference to the font's face; call `release()`
   * when done.
   */
  static create<TTexture, TProgram>(
    context: SdfTextContext<TTexture, TProgram>,
    font: Font | Result<Font>,
    format: Partial<AtlasFormat> = {},
    supportedChars: string = SdfText.defaultChars()
  ): SdfText<TTexture, TProgram> {
    const source = font instanceof Font ? font : unwrap(font);
    const handle = source.withSize(source.getSize());
    try {
      return new SdfText(context, handle, withDefaults(DEFAULT_ATLAS_FORMAT, format), supportedChars);
    } catch (e) {
      handle.release();
      throw e;
    }
  }

  static defaultChars(): string {
    return DEFAULT_CHARS;
  }

  getFont(): Font {
    return this.font;
  }

  getFormat(): AtlasFormat {
    return this.format;
  }

  getNumTextures(): number {
    return this.atlas.pages.length;
  }

  getTexture(n: number): TTexture | null {
    return this.atlas.pages[n] ?? null;
  }

  /** Drop this text's reference to the font face */
  release(): void {
    this.font.release();
  }

  // Layout

  getGlyphPlacements(str: string, options: Partial<DrawOptions<TProgram>> = {}): GlyphPlacement[] {
    return this.place(str, Infinity, options);
  }

  /** Placements for text drawn into `fitRect`; lines are not wrapped */
  getGlyphPlacementsInRect(
    str: string,
    _fitRect: Rect,
    options: Partial<DrawOptions<TProgram>> = {}
  ): GlyphPlacement[] {
    return this.place(str, Infinity, options);
  }

  /** Placements wrapped at the width of `fitRect` */
  getGlyphPlacementsWrapped(
    str: string,
    fitRect: Rect,
    options: Partial<DrawOptions<TProgram>> = {}
  ): GlyphPlacement[] {
    return this.place(str, rectWidth(fitRect), options);
  }

  /**
   * Extent of a single unwrapped string: the last glyph's position plus its
   * origin offset and cell size. (0, 0) for empty text.
   */
  measureString(str: string, options: Partial<DrawOptions<TProgram>> = {}): Vec2 {
    const placements = this.getGlyphPlacements(str, options);
    const last = placements[placements.length - 1];
    if (!last) return [0, 0];

    const result: Vec2 = [last.position[0], last.position[1]];
    const info = this.atlas.glyphInfo.get(last.glyph);
    if (info) {
      return add(result, [
        info.originOffset[0] + rectWidth(info.texCoords),
        info.originOffset[1] + rectHeight(info.texCoords),
      ]);
    }
    return result;
  }

  // Drawing

  drawString(str: string, baseline: Vec2, options: Partial<DrawOptions<TProgram>> = {}): void {
    this.drawGlyphs(this.getGlyphPlacements(str, options), baseline, options);
  }

  /** Draw unwrapped text anchored at `fitRect`'s upper left plus `offset`, clipped to `fitRect` */
  drawStringInRect(
    str: string,
    fitRect: Rect,
    offset: Vec2 = [0, 0],
    options: Partial<DrawOptions<TProgram>> = {}
  ): void {
    const position = add(upperLeft(fitRect), offset);
    this.drawGlyphsInRect(this.getGlyphPlacementsInRect(str, fitRect, options), fitRect, position, options);
  }

  /** Draw text wrapped at `fitRect`'s width with its baseline at the upper left plus `offset` */
  drawStringWrapped(
    str: string,
    fitRect: Rect,
    offset: Vec2 = [0, 0],
    options: Partial<DrawOptions<TProgram>> = {}
  ): void {
    const baseline = add(upperLeft(fitRect), offset);
    this.drawGlyphs(this.getGlyphPlacementsWrapped(str, fitRect, options), baseline, options);
  }

  drawGlyphs(
    placements: GlyphPlacement[],
    baseline: Vec2,
    options: Partial<DrawOptions<TProgram>> = {},
    colors: Color[] | null = null
  ): void {
    this.submit(placements, { mode: "baseline", baseline }, options, colors);
  }

  /**
   * Draw placed glyphs with their upper left at `position`, clipped to `clip`.
   * `position` is absolute; `drawStringInRect` passes the rectangle's upper
   * left plus its offset.
   */
  drawGlyphsInRect(
    placements: GlyphPlacement[],
    clip: Rect,
    position: Vec2,
    options: Partial<DrawOptions<TProgram>> = {},
    colors: Color[] | null = null
  ): void {
    this.submit(placements, { mode: "rect", clip, position }, options, colors);
  }

  private place(
    str: string,
    maxWidth: number,
    options: Partial<DrawOptions<TProgram>>
  ): GlyphPlacement[] {
    const opts = resolveDrawOptions(options);
    const text = opts.ligate ? str.normalize("NFC") : str;

    // Glyphs outside the atlas character set still need advances
    for (const ch of text) {
      this.metrics.ensure(this.font.getGlyphChar(ch));
    }
    return this.layout.layout(text, maxWidth, opts.leading);
  }

  private submit(
    placements: GlyphPlacement[],
    origin: BatchOrigin,
    options: Partial<DrawOptions<TProgram>>,
    colors: Color[] | null
  ): void {
    if (this.atlas.pages.length === 0) return;

    const opts = resolveDrawOptions(options);
    const source: BatchSource = {
      glyphInfo: this.atlas.glyphInfo,
      pageCount: this.atlas.pages.length,
      pageWidth: this.format.pageWidth,
      pageHeight: this.format.pageHeight,
      sdfBitmapHeight: this.atlas.sdfBitmapHeight,
      sdfPadding: this.format.sdfPadding,
      fontSizeScale: this.font.getSize() / REFERENCE_FONT_SIZE,
    };
    const batches = batchGlyphs(placements, source, origin, opts, colors);
    if (batches.length === 0) return;

    const program = opts.program ?? this.context.getDefaultProgram();
    if (program === null) return;
    const fgColor = opts.program === null ? opts.color : null;

    for (const batch of batches) {
      this.context.backend.draw(program, this.atlas.pages[batch.pageIndex], batch, { fgColor });
    }
  }
}
