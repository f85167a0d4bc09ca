/**
 * Atlas Cache
 *
 * Built atlases keyed by font identity, literal character string, page size
 * and cell size. Lookup is a linear scan in insertion order; entries live
 * until the cache is cleared.
 */

import type { FontFace, SdfRasterizer } from "../font/types";
import type { RenderBackend } from "./backend";
import { buildAtlas, calculateSdfBitmapSize, measureGlyphSet } from "./buildAtlas";
import type { Atlas, AtlasFormat, CacheKey } from "./types";

export function cacheKeyEquals(a: CacheKey, b: CacheKey): boolean {
  return (
    a.familyName === b.familyName &&
    a.styleName === b.styleName &&
    a.utf8Chars === b.utf8Chars &&
    a.pageWidth === b.pageWidth &&
    a.pageHeight === b.pageHeight &&
    a.sdfBitmapWidth === b.sdfBitmapWidth &&
    a.sdfBitmapHeight === b.sdfBitmapHeight
  );
}

export class AtlasCache<TTexture, TProgram = unknown> {
  private readonly backend: RenderBackend<TTexture, TProgram>;
  private readonly rasterizer: SdfRasterizer;
  private entries: { key: CacheKey; atlas: Atlas<TTexture> }[] = [];
  private builds = 0;

  constructor(backend: RenderBackend<TTexture, TProgram>, rasterizer: SdfRasterizer) {
    this.backend = backend;
    this.rasterizer = rasterizer;
  }

  /** Number of atlases built so far */
  get buildCount(): number {
    return this.builds;
  }

  get size(): number {
    return this.entries.length;
  }

  find(key: CacheKey): Atlas<TTexture> | null {
    for (const entry of this.entries) {
      if (cacheKeyEquals(entry.key, key)) return entry.atlas;
    }
    return null;
  }

  /**
   * Return the atlas for `chars` in `face` at `format`, building and storing
   * it on a miss.
   */
  getAtlas(face: FontFace, chars: string, format: AtlasFormat): Atlas<TTexture> {
    const glyphSet = measureGlyphSet(face, chars);
    const [sdfBitmapWidth, sdfBitmapHeight] = calculateSdfBitmapSize(glyphSet.maxGlyphSize, format);

    const key: CacheKey = {
      familyName: face.familyName,
      styleName: face.styleName,
      utf8Chars: chars,
      pageWidth: format.pageWidth,
      pageHeight: format.pageHeight,
      sdfBitmapWidth,
      sdfBitmapHeight,
    };

    const cached = this.find(key);
    if (cached) return cached;

    const atlas = buildAtlas(glyphSet, format, this.rasterizer, (w, h, rgb) =>
      this.backend.createTexture(w, h, rgb)
    );
    this.builds++;
    this.entries.push({ key, atlas });
    return atlas;
  }

  /** Release every page texture and forget all atlases */
  clear(): void {
    for (const { atlas } of this.entries) {
      for (const page of atlas.pages) {
        this.backend.destroyTexture(page);
      }
    }
    this.entries = [];
  }
}
