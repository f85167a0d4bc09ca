import { SdfTextError } from "../errors";
import type { FontFace, Glyph } from "../font/types";
import type { Vec2 } from "../math/vec2";

/**
 * Per-text cache of glyph advances (1/64 px at the font's point size).
 */
export class GlyphMetricsCache {
  private readonly face: FontFace;
  private readonly pointSize: number;
  private readonly advances = new Map<Glyph, Vec2>();

  constructor(face: FontFace, pointSize: number, glyphs: Iterable<Glyph> = []) {
    this.face = face;
    this.pointSize = pointSize;
    for (const glyph of glyphs) {
      this.ensure(glyph);
    }
  }

  get size(): number {
    return this.advances.size;
  }

  has(glyph: Glyph): boolean {
    return this.advances.has(glyph);
  }

  /** Cached advance; throws if the glyph was never cached */
  get(glyph: Glyph): Vec2 {
    const advance = this.advances.get(glyph);
    if (!advance) {
      throw new SdfTextError("PreconditionViolation", `No cached metrics for glyph ${glyph}`);
    }
    return advance;
  }

  /** Cache the glyph's advance if it is not cached yet */
  ensure(glyph: Glyph): Vec2 {
    let advance = this.advances.get(glyph);
    if (!advance) {
      advance = this.face.advance(glyph, this.pointSize);
      this.advances.set(glyph, advance);
    }
    return advance;
  }
}
