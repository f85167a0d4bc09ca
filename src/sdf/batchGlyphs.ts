/**
 * Draw Batcher
 *
 * Turns glyph placements into one indexed quad batch per atlas page.
 */

import { SdfTextError } from "../errors";
import type { Glyph } from "../font/types";
import { rectHeight, rectWidth } from "../math/rect";
import type { Rect } from "../math/rect";
import { floor } from "../math/vec2";
import type { Vec2 } from "../math/vec2";
import type { Color } from "../types/color";
import { colorToBytes } from "../types/color";
import type { DrawOptions, GlyphInfo, GlyphPlacement, TextBatch } from "./types";

/** Atlas values the batcher reads */
export interface BatchSource {
  glyphInfo: ReadonlyMap<Glyph, GlyphInfo>;
  pageCount: number;
  pageWidth: number;
  pageHeight: number;
  sdfBitmapHeight: number;
  sdfPadding: number;
  /** Font size over the reference size */
  fontSizeScale: number;
}

/**
 * Baseline mode anchors the first line's baseline at `baseline`. Rectangle
 * mode anchors the text's upper left at `position` and clips to `clip`.
 */
export type BatchOrigin =
  | { mode: "baseline"; baseline: Vec2 }
  | { mode: "rect"; clip: Rect; position: Vec2 };

export type BatchOptions = Pick<DrawOptions, "scale" | "pixelSnap" | "clipHorizontal" | "clipVertical">;

/**
 * Build per-page quad batches.
 *
 * Placements whose glyph has no atlas cell are skipped. Pages with no
 * surviving quads produce no batch.
 *
 * @param colors - One colour per placement, or null/empty for none
 */
export function batchGlyphs(
  placements: GlyphPlacement[],
  source: BatchSource,
  origin: BatchOrigin,
  options: BatchOptions,
  colors: Color[] | null = null
): TextBatch[] {
  const colorBytes = colors && colors.length > 0 ? colors.map(colorToBytes) : null;
  if (colorBytes && colorBytes.length !== placements.length) {
    throw new SdfTextError(
      "PreconditionViolation",
      `Expected ${placements.length} colors, got ${colorBytes.length}`
    );
  }

  const { fontSizeScale: fs, sdfPadding: pad, pageWidth, pageHeight } = source;
  const { scale } = options;
  const clip = origin.mode === "rect" ? origin.clip : null;

  let base: Vec2;
  let padding: Vec2;
  if (origin.mode === "baseline") {
    base = [origin.baseline[0], origin.baseline[1]];
    padding = [-pad * fs, pad * fs];
  } else {
    base = [origin.position[0], origin.position[1]];
    padding = [-pad * fs, -pad * fs];
  }
  if (options.pixelSnap) {
    base = floor(base);
  }
  if (origin.mode === "baseline") {
    base[1] -= source.sdfBitmapHeight * fs;
  }

  const batches: TextBatch[] = [];

  for (let pageIndex = 0; pageIndex < source.pageCount; pageIndex++) {
    const positions: number[] = [];
    const texCoords: number[] = [];
    const vertexColors: number[] = [];
    const indices: number[] = [];
    let vertexCount = 0;

    placements.forEach((placement, i) => {
      const info = source.glyphInfo.get(placement.glyph);
      if (!info || info.pageIndex !== pageIndex) return;

      const src = info.texCoords;
      const width = rectWidth(src) * fs * scale;
      const height = rectHeight(src) * fs * scale;

      let x1 =
        placement.position[0] * scale +
        base[0] +
        Math.floor(info.originOffset[0] * fs + 0.5) * scale +
        padding[0];
      let y1 =
        placement.position[1] * scale +
        base[1] +
        Math.floor(-info.originOffset[1] * fs) * scale +
        padding[1];
      if (options.pixelSnap) {
        x1 = Math.floor(x1);
        y1 = Math.floor(y1);
      }
      const dest: Rect = { x1, y1, x2: x1 + width, y2: y1 + height };

      let quad = dest;
      let uv = src;
      if (clip) {
        quad = {
          x1: options.clipHorizontal ? Math.max(dest.x1, clip.x1) : dest.x1,
          x2: options.clipHorizontal ? Math.min(dest.x2, clip.x2) : dest.x2,
          y1: options.clipVertical ? Math.max(dest.y1, clip.y1) : dest.y1,
          y2: options.clipVertical ? Math.min(dest.y2, clip.y2) : dest.y2,
        };
        if (quad.x1 >= quad.x2 || quad.y1 >= quad.y2) return;

        // Keep texels per pixel constant across the clipped part
        const sx = rectWidth(src) / rectWidth(dest);
        const sy = rectHeight(src) / rectHeight(dest);
        const u1 = src.x1 + (quad.x1 - dest.x1) * sx;
        const v1 = src.y1 + (quad.y1 - dest.y1) * sy;
        uv = {
          x1: u1,
          y1: v1,
          x2: u1 + (quad.x2 - quad.x1) * sx,
          y2: v1 + (quad.y2 - quad.y1) * sy,
        };
      }

      positions.push(quad.x2, quad.y1, quad.x1, quad.y1, quad.x2, quad.y2, quad.x1, quad.y2);

      const u1 = uv.x1 / pageWidth;
      const u2 = uv.x2 / pageWidth;
      const v1 = uv.y1 / pageHeight;
      const v2 = uv.y2 / pageHeight;
      texCoords.push(u2, v1, u1, v1, u2, v2, u1, v2);

      if (colorBytes) {
        const rgba = colorBytes[i];
        for (let v = 0; v < 4; v++) vertexColors.push(...rgba);
      }

      indices.push(vertexCount, vertexCount + 1, vertexCount + 2);
      indices.push(vertexCount + 2, vertexCount + 1, vertexCount + 3);
      vertexCount += 4;
    });

    if (vertexCount === 0) continue;

    batches.push({
      pageIndex,
      positions: new Float32Array(positions),
      texCoords: new Float32Array(texCoords),
      colors: colorBytes ? new Uint8Array(vertexColors) : null,
      indices: new Uint32Array(indices),
    });
  }

  return batches;
}
