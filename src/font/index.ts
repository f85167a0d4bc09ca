/**
 * Font handles and the font collaborators behind them.
 */

export { Font, type FontLoader } from "./Font";
export { FaceTracker, TrackedFace } from "./FaceTracker";
export {
  FontRegistry,
  DEFAULT_FONT_REGISTRY_OPTIONS,
  type FontRegistryOptions,
} from "./FontRegistry";
export { OpenTypeFontResource, OpenTypeFontFace, outlineBounds } from "./OpenTypeFontResource";
export type {
  FaceMetrics,
  FontEnumerator,
  FontFace,
  FontInfo,
  FontResource,
  Glyph,
  GlyphBounds,
  GlyphOutline,
  OutlineCommand,
  SdfRasterizer,
} from "./types";
