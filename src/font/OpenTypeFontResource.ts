/**
 * opentype.js font collaborator
 *
 * Parses font files with opentype.js and exposes outlines and metrics in the
 * units the atlas builder and layout expect.
 */

import * as opentype from "opentype.js";

import { SdfTextError, err, ok } from "../errors";
import type { Result } from "../errors";
import type { Vec2 } from "../math/vec2";
import { REFERENCE_FONT_SIZE } from "../sdf/types";
import type {
  FaceMetrics,
  FontFace,
  FontResource,
  Glyph,
  GlyphBounds,
  GlyphOutline,
  OutlineCommand,
} from "./types";

export class OpenTypeFontFace implements FontFace {
  readonly familyName: string;
  readonly styleName: string;
  readonly fullName: string | null;
  private readonly font: opentype.Font;
  /** Font units to reference pixels */
  private readonly unitScale: number;
  private disposed = false;

  constructor(font: opentype.Font) {
    this.font = font;
    this.unitScale = REFERENCE_FONT_SIZE / font.unitsPerEm;
    this.familyName = englishName(font, "fontFamily") ?? "(Unknown)";
    this.styleName = englishName(font, "fontSubfamily") ?? "Regular";
    this.fullName = englishName(font, "fullName");
  }

  glyphIndex(codePoint: number): Glyph {
    return this.font.charToGlyphIndex(String.fromCodePoint(codePoint)) ?? 0;
  }

  loadOutline(glyph: Glyph): GlyphOutline | null {
    if (this.disposed || glyph < 0 || glyph >= this.font.glyphs.length) {
      return null;
    }

    const s = this.unitScale;
    const commands: OutlineCommand[] = [];
    for (const cmd of this.font.glyphs.get(glyph).path.commands) {
      switch (cmd.type) {
        case "M":
        case "L":
          commands.push({ type: cmd.type, x: cmd.x * s, y: cmd.y * s });
          break;
        case "Q":
          commands.push({ type: "Q", x1: cmd.x1 * s, y1: cmd.y1 * s, x: cmd.x * s, y: cmd.y * s });
          break;
        case "C":
          commands.push({
            type: "C",
            x1: cmd.x1 * s,
            y1: cmd.y1 * s,
            x2: cmd.x2 * s,
            y2: cmd.y2 * s,
            x: cmd.x * s,
            y: cmd.y * s,
          });
          break;
        case "Z":
          commands.push({ type: "Z" });
          break;
      }
    }

    return { glyph, bounds: outlineBounds(commands), commands };
  }

  advance(glyph: Glyph, pointSize: number): Vec2 {
    if (glyph < 0 || glyph >= this.font.glyphs.length) return [0, 0];
    const width = this.font.glyphs.get(glyph).advanceWidth ?? 0;
    return [Math.round((width * pointSize * 64) / this.font.unitsPerEm), 0];
  }

  faceMetrics(): FaceMetrics {
    const lineGap: unknown = this.font.tables.hhea?.lineGap;
    const gap = typeof lineGap === "number" ? lineGap : 0;
    const toUnits = (v: number) => Math.round(v * this.unitScale * 64);

    return {
      ascender: toUnits(this.font.ascender),
      descender: toUnits(this.font.descender),
      height: toUnits(this.font.ascender - this.font.descender + gap),
    };
  }

  dispose(): void {
    this.disposed = true;
  }
}

/** English entry of a name table record; null when absent or blank */
export function englishName(font: opentype.Font, name: string): string | null {
  // undefined at runtime when the record is missing
  const value: string | undefined = font.getEnglishName(name);
  return value && value.trim() !== "" ? value : null;
}

/** Control-point bounding box of an outline; all zero for an empty one */
export function outlineBounds(commands: OutlineCommand[]): GlyphBounds {
  let left = Infinity;
  let bottom = Infinity;
  let right = -Infinity;
  let top = -Infinity;

  const include = (x: number, y: number) => {
    left = Math.min(left, x);
    right = Math.max(right, x);
    bottom = Math.min(bottom, y);
    top = Math.max(top, y);
  };

  for (const cmd of commands) {
    if (cmd.type === "Z") continue;
    include(cmd.x, cmd.y);
    if (cmd.type === "Q" || cmd.type === "C") include(cmd.x1, cmd.y1);
    if (cmd.type === "C") include(cmd.x2, cmd.y2);
  }

  if (left === Infinity) {
    return { left: 0, bottom: 0, right: 0, top: 0 };
  }
  return { left, bottom, right, top };
}

export class OpenTypeFontResource implements FontResource {
  loadFace(bytes: Uint8Array): Result<FontFace> {
    const buffer = bytes.buffer.slice(bytes.byteOffset, bytes.byteOffset + bytes.byteLength);
    try {
      return ok(new OpenTypeFontFace(opentype.parse(buffer)));
    } catch (e) {
      return err(new SdfTextError("FatalConfig", "Failed to load font data", { cause: e }));
    }
  }
}
