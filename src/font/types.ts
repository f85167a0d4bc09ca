/**
 * Font collaborator interfaces.
 *
 * Font parsing, outline extraction, distance-field rasterization and platform
 * font enumeration live behind these interfaces. Units:
 * - outline coordinates and bounds are reference units: pixels at the 32-px
 *   reference size, y up
 * - advances are 1/64 pixel at the requested point size
 * - face metrics are 1/64 reference units
 */

import type { Result } from "../errors";
import type { Vec2 } from "../math/vec2";

/** Font-scoped glyph identifier */
export type Glyph = number;

export interface GlyphBounds {
  left: number;
  bottom: number;
  right: number;
  top: number;
}

export type OutlineCommand =
  | { type: "M"; x: number; y: number }
  | { type: "L"; x: number; y: number }
  | { type: "Q"; x1: number; y1: number; x: number; y: number }
  | { type: "C"; x1: number; y1: number; x2: number; y2: number; x: number; y: number }
  | { type: "Z" };

/** Vector outline of one glyph */
export interface GlyphOutline {
  glyph: Glyph;
  bounds: GlyphBounds;
  commands: OutlineCommand[];
}

export interface FaceMetrics {
  ascender: number;
  descender: number;
  height: number;
}

/** A parsed font face */
export interface FontFace {
  readonly familyName: string;
  readonly styleName: string;
  /** Full name from the naming table, null when the face has none */
  readonly fullName: string | null;

  /** Glyph for a code point; 0 when the face has no mapping */
  glyphIndex(codePoint: number): Glyph;
  /** Outline of a glyph, null when the face cannot produce one */
  loadOutline(glyph: Glyph): GlyphOutline | null;
  /** Advance vector in 1/64 px at `pointSize` */
  advance(glyph: Glyph, pointSize: number): Vec2;
  faceMetrics(): FaceMetrics;
  /** Release parser resources */
  dispose(): void;
}

/** Loads faces from raw font file bytes */
export interface FontResource {
  loadFace(bytes: Uint8Array): Result<FontFace>;
}

/**
 * Multi-channel signed distance field rasterizer.
 *
 * Produces `width * height` RGB float triples in [0, 1], 0.5 on the edge, rows
 * top-down. A shape point p lands on pixel `(p + translate) * scale` with y
 * inverted.
 */
export interface SdfRasterizer {
  rasterize(
    outline: GlyphOutline,
    width: number,
    height: number,
    range: number,
    scale: Vec2,
    translate: Vec2
  ): Float32Array;
}

/** A font known to the platform */
export interface FontInfo {
  /** Lowercased lookup key */
  key: string;
  /** Display name */
  name: string;
  /** Font file path */
  path: string;
}

/** Lists installed fonts; may return an empty list transiently */
export type FontEnumerator = () => FontInfo[];
