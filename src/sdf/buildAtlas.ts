/**
 * Atlas Builder
 *
 * Packs a character set into fixed-size pages of multi-channel distance field
 * bitmaps. Every glyph gets the same cell size (the largest glyph plus
 * padding), cells are laid out row-major with a 1-pixel gutter.
 */

import { SdfTextError } from "../errors";
import type { FontFace, Glyph, GlyphOutline, SdfRasterizer } from "../font/types";
import { rect } from "../math/rect";
import type { Vec2 } from "../math/vec2";
import type { Atlas, AtlasFormat, GlyphInfo } from "./types";

/** Measured glyph set for a character string */
export interface GlyphSet {
  charMap: Map<number, Glyph>;
  /** Distinct glyphs with outlines, ascending by glyph index */
  outlines: GlyphOutline[];
  /** Largest glyph width and height (reference units) */
  maxGlyphSize: Vec2;
  maxAscent: number;
  maxDescent: number;
}

export interface AtlasGrid {
  columns: number;
  rows: number;
  glyphsPerPage: number;
}

/** Append a space unless the string already has one */
export function withImplicitSpace(chars: string): string {
  return chars.includes(" ") ? chars : chars + " ";
}

/**
 * Map every code point of `chars` (plus the implicit space) to its glyph and
 * load the outline of each distinct glyph. Glyphs the face has no outline for
 * are left out of `outlines` but keep their char map entry.
 */
export function measureGlyphSet(face: FontFace, chars: string): GlyphSet {
  const charMap = new Map<number, Glyph>();
  const glyphs = new Set<Glyph>();

  for (const ch of withImplicitSpace(chars)) {
    const codePoint = ch.codePointAt(0) ?? 0;
    const glyph = face.glyphIndex(codePoint);
    charMap.set(codePoint, glyph);
    glyphs.add(glyph);
  }

  const outlines: GlyphOutline[] = [];
  let maxWidth = 0;
  let maxHeight = 0;
  let maxAscent = 0;
  let maxDescent = 0;

  for (const glyph of [...glyphs].sort((a, b) => a - b)) {
    const outline = face.loadOutline(glyph);
    if (!outline) continue;

    const { left, bottom, right, top } = outline.bounds;
    maxWidth = Math.max(maxWidth, right - left);
    maxHeight = Math.max(maxHeight, top - bottom);
    maxAscent = Math.max(maxAscent, top);
    maxDescent = Math.max(maxDescent, Math.abs(bottom));
    outlines.push(outline);
  }

  return { charMap, outlines, maxGlyphSize: [maxWidth, maxHeight], maxAscent, maxDescent };
}

/** Uniform cell size for a glyph set */
export function calculateSdfBitmapSize(maxGlyphSize: Vec2, format: AtlasFormat): Vec2 {
  const pad = 2 * format.sdfPadding;
  return [
    Math.ceil(format.sdfScale * (maxGlyphSize[0] + pad)),
    Math.ceil(format.sdfScale * (maxGlyphSize[1] + pad)),
  ];
}

function cellsAlong(pageSize: number, cellSize: number): number {
  // One cell of margin, and every cell plus its gutter inside the page
  return Math.min(Math.floor(pageSize / cellSize) - 1, Math.floor(pageSize / (cellSize + 1)));
}

export function planAtlasGrid(bitmapSize: Vec2, format: AtlasFormat): AtlasGrid {
  const columns = cellsAlong(format.pageWidth, bitmapSize[0]);
  const rows = cellsAlong(format.pageHeight, bitmapSize[1]);

  if (columns <= 0 || rows <= 0) {
    throw new SdfTextError(
      "FatalConfig",
      `Glyph bitmap ${bitmapSize[0]}x${bitmapSize[1]} does not fit a ${format.pageWidth}x${format.pageHeight} page`
    );
  }
  return { columns, rows, glyphsPerPage: columns * rows };
}

function toByte(v: number): number {
  return (Math.min(1, Math.max(0, v)) * 255 + 0.5) | 0;
}

/**
 * Rasterize a measured glyph set into atlas pages.
 *
 * @param createTexture - Finalizes a filled RGB page
 */
export function buildAtlas<TTexture>(
  glyphSet: GlyphSet,
  format: AtlasFormat,
  rasterizer: SdfRasterizer,
  createTexture: (width: number, height: number, rgb: Uint8Array) => TTexture
): Atlas<TTexture> {
  const [bitmapW, bitmapH] = calculateSdfBitmapSize(glyphSet.maxGlyphSize, format);
  const { columns, glyphsPerPage } = planAtlasGrid([bitmapW, bitmapH], format);

  const { pageWidth, pageHeight, sdfPadding, sdfScale, sdfRange } = format;
  const surface = new Uint8Array(pageWidth * pageHeight * 3);
  const pages: TTexture[] = [];
  const glyphInfo = new Map<Glyph, GlyphInfo>();

  glyphSet.outlines.forEach((outline, i) => {
    const slot = i % glyphsPerPage;
    const cellX = (slot % columns) * (bitmapW + 1);
    const cellY = Math.floor(slot / columns) * (bitmapH + 1);
    const { left, bottom } = outline.bounds;

    const bitmap = rasterizer.rasterize(
      outline,
      bitmapW,
      bitmapH,
      sdfRange,
      [sdfScale, sdfScale],
      [sdfPadding - left, sdfPadding - bottom]
    );

    for (let row = 0; row < bitmapH; row++) {
      let dst = ((cellY + row) * pageWidth + cellX) * 3;
      let src = row * bitmapW * 3;
      for (let n = 0; n < bitmapW * 3; n++) {
        surface[dst++] = toByte(bitmap[src++]);
      }
    }

    glyphInfo.set(outline.glyph, {
      pageIndex: pages.length,
      texCoords: rect(cellX, cellY, cellX + bitmapW, cellY + bitmapH),
      originOffset: [left, bottom],
    });

    if (slot === glyphsPerPage - 1 || i === glyphSet.outlines.length - 1) {
      pages.push(createTexture(pageWidth, pageHeight, surface.slice()));
      surface.fill(0);
    }
  });

  return {
    pages,
    charMap: glyphSet.charMap,
    glyphInfo,
    sdfBitmapWidth: bitmapW,
    sdfBitmapHeight: bitmapH,
    maxAscent: glyphSet.maxAscent,
    maxDescent: glyphSet.maxDescent,
  };
}
