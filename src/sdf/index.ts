/**
 * SDF Text Module
 *
 * Multi-channel signed distance field text: atlas building and caching,
 * layout, and per-page batching.
 */

export { SdfText } from "./SdfText";
export { SdfTextContext, type SdfTextContextOptions } from "./SdfTextContext";
export { AtlasCache, cacheKeyEquals } from "./AtlasCache";
export {
  buildAtlas,
  measureGlyphSet,
  calculateSdfBitmapSize,
  planAtlasGrid,
  withImplicitSpace,
  type GlyphSet,
  type AtlasGrid,
} from "./buildAtlas";
export { GlyphMetricsCache } from "./GlyphMetricsCache";
export { TextLayout, type LayoutFont } from "./TextLayout";
export { breakLines, isUnbounded } from "./lineBreak";
export { batchGlyphs, type BatchSource, type BatchOrigin, type BatchOptions } from "./batchGlyphs";
export type { RenderBackend, DrawUniforms } from "./backend";
export { sdfVertexShader, sdfFragmentShader } from "./shaders";
export {
  DEFAULT_ATLAS_FORMAT,
  DEFAULT_DRAW_OPTIONS,
  MAX_LAYOUT_WIDTH,
  REFERENCE_FONT_SIZE,
  resolveDrawOptions,
  type Atlas,
  type AtlasFormat,
  type CacheKey,
  type DrawOptions,
  type GlyphInfo,
  type GlyphPlacement,
  type TextBatch,
} from "./types";
