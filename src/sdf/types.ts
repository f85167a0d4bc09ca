/**
 * SDF Text Types
 *
 * Atlas, layout and batch types for signed distance field text rendering.
 */

import type { Glyph } from "../font/types";
import type { Rect } from "../math/rect";
import type { Vec2 } from "../math/vec2";
import { withDefaults } from "../options";
import type { Color } from "../types/color";
import { WHITE } from "../types/color";

/** Point size at which atlas bitmaps are generated */
export const REFERENCE_FONT_SIZE = 32;

/** Widths at or above this are treated as unbounded by layout */
export const MAX_LAYOUT_WIDTH = 1e6;

/** Page and distance-field configuration for an atlas */
export interface AtlasFormat {
  /** Page texture width (pixels) */
  pageWidth: number;
  /** Page texture height (pixels) */
  pageHeight: number;
  /** Bitmap scale, 1 = reference size */
  sdfScale: number;
  /** Padding around each glyph (pixels) */
  sdfPadding: number;
  /** Distance range handed to the rasterizer (pixels) */
  sdfRange: number;
}

export const DEFAULT_ATLAS_FORMAT: AtlasFormat = {
  pageWidth: 2048,
  pageHeight: 2048,
  sdfScale: 1,
  sdfPadding: 2,
  sdfRange: 4,
};

/** Where a glyph lives in an atlas */
export interface GlyphInfo {
  pageIndex: number;
  /** Cell rectangle within the page (pixels) */
  texCoords: Rect;
  /** Lower-left of the glyph's ink bounds (reference units) */
  originOffset: Vec2;
}

/** A built atlas: page textures plus glyph lookup tables */
export interface Atlas<TTexture> {
  pages: TTexture[];
  /** Code point to glyph, for every requested character */
  charMap: Map<number, Glyph>;
  /** Glyph to cell, for every glyph that was rasterized */
  glyphInfo: Map<Glyph, GlyphInfo>;
  /** Uniform cell size (pixels) */
  sdfBitmapWidth: number;
  sdfBitmapHeight: number;
  /** Largest ink ascent and descent over the glyph set (reference units) */
  maxAscent: number;
  maxDescent: number;
}

/** Identity of a built atlas */
export interface CacheKey {
  familyName: string;
  styleName: string;
  utf8Chars: string;
  pageWidth: number;
  pageHeight: number;
  sdfBitmapWidth: number;
  sdfBitmapHeight: number;
}

/** A glyph positioned by layout, relative to the text origin */
export interface GlyphPlacement {
  glyph: Glyph;
  position: Vec2;
}

/** Options for layout and drawing */
export interface DrawOptions<TProgram = unknown> {
  /** Uniform multiplier on destination geometry */
  scale: number;
  /** Snap destination coordinates to whole pixels */
  pixelSnap: boolean;
  clipHorizontal: boolean;
  clipVertical: boolean;
  /** Extra spacing between lines (reference units) */
  leading: number;
  /** Compose the text to NFC before layout */
  ligate: boolean;
  /** Caller program; null uses the built-in one */
  program: TProgram | null;
  /** Foreground colour for the built-in program */
  color: Color;
}

export const DEFAULT_DRAW_OPTIONS: DrawOptions<never> = {
  scale: 1,
  pixelSnap: true,
  clipHorizontal: true,
  clipVertical: true,
  leading: 0,
  ligate: false,
  program: null,
  color: WHITE,
};

export function resolveDrawOptions<TProgram>(
  options: Partial<DrawOptions<TProgram>> = {}
): DrawOptions<TProgram> {
  return withDefaults<DrawOptions<TProgram>>(DEFAULT_DRAW_OPTIONS, options);
}

/** Geometry for one atlas page */
export interface TextBatch {
  pageIndex: number;
  /** x, y per vertex */
  positions: Float32Array;
  /** u, v per vertex, normalized to the page */
  texCoords: Float32Array;
  /** r, g, b, a per vertex, or null when no colours were given */
  colors: Uint8Array | null;
  indices: Uint32Array;
}
