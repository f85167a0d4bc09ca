/**
 * Font Handle
 *
 * A parsed face at a point size. Handles share the face through a reference
 * counted tracker entry; the face is disposed when the last handle is released.
 */

import { SdfTextError, err, ok } from "../errors";
import type { Result } from "../errors";
import type { FaceTracker, TrackedFace } from "./FaceTracker";
import type { FontRegistry } from "./FontRegistry";
import type { FaceMetrics, FontFace, FontResource, Glyph } from "./types";

/** What a font needs from its owning context */
export interface FontLoader {
  readonly fontResource: FontResource;
  readonly faces: FaceTracker;
  readonly fonts: FontRegistry;
  /** Read a font file; throws when it cannot be read */
  readFontFile(path: string): Uint8Array;
}

export class Font {
  private readonly tracked: TrackedFace;
  private readonly name: string;
  private readonly size: number;
  private readonly metrics: FaceMetrics;
  private released = false;

  private constructor(tracked: TrackedFace, name: string, size: number) {
    this.tracked = tracked;
    this.name = name;
    this.size = size;
    this.metrics = tracked.face.faceMetrics();
    tracked.retain();
  }

  /** Load a font from raw file bytes */
  static fromData(loader: FontLoader, bytes: Uint8Array, size: number): Result<Font> {
    const face = loader.fontResource.loadFace(bytes);
    if (!face.ok) return face;

    const tracked = loader.faces.track(face.value);
    return ok(new Font(tracked, face.value.fullName ?? "(Unknown)", size));
  }

  /** Load a font by name, resolved through the loader's registry */
  static fromName(loader: FontLoader, name: string, size: number): Result<Font> {
    const info = loader.fonts.resolve(name);
    if (!info) {
      return err(new SdfTextError("MissingResource", `Font "${name}" not found`));
    }

    let bytes: Uint8Array;
    try {
      bytes = loader.readFontFile(info.path);
    } catch (e) {
      if (e instanceof SdfTextError) return err(e);
      return err(
        new SdfTextError("FatalConfig", `Failed to read font file ${info.path}`, { cause: e })
      );
    }

    const face = loader.fontResource.loadFace(bytes);
    if (!face.ok) return face;

    const tracked = loader.faces.track(face.value);
    return ok(new Font(tracked, info.name, size));
  }

  /** Another handle on the same face at a different size */
  withSize(size: number): Font {
    if (this.released) {
      throw new SdfTextError("PreconditionViolation", `Font "${this.name}" has been released`);
    }
    return new Font(this.tracked, this.name, size);
  }

  get isReleased(): boolean {
    return this.released;
  }

  /** Drop this handle's reference to the face. Safe to call twice. */
  release(): void {
    if (this.released) return;
    this.released = true;
    this.tracked.release();
  }

  getFace(): FontFace {
    return this.tracked.face;
  }

  getName(): string {
    return this.name;
  }

  getSize(): number {
    return this.size;
  }

  getFamilyName(): string {
    return this.tracked.face.familyName;
  }

  getStyleName(): string {
    return this.tracked.face.styleName;
  }

  // Metrics below are reference-size pixels

  getAscent(): number {
    return Math.abs(this.metrics.ascender) / 64;
  }

  getDescent(): number {
    return Math.abs(this.metrics.descender) / 64;
  }

  getHeight(): number {
    return this.metrics.height / 64;
  }

  getLeading(): number {
    const { ascender, descender, height } = this.metrics;
    return (height - (Math.abs(ascender) + Math.abs(descender))) / 64;
  }

  /** Glyph for the first code point of `char` */
  getGlyphChar(char: string): Glyph {
    return this.tracked.face.glyphIndex(char.codePointAt(0) ?? 0);
  }

  /** One glyph per code point, in order */
  getGlyphs(text: string): Glyph[] {
    const face = this.tracked.face;
    return Array.from(text, (ch) => face.glyphIndex(ch.codePointAt(0) ?? 0));
  }

  getGlyphIndex(index: number): Glyph {
    return index;
  }
}
