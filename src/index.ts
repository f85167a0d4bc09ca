/**
 * sdftype - multi-channel signed distance field text rendering
 */

export const VERSION = "0.1.0";

export * from "./sdf";
export * from "./font";
export * from "./gl";
export { SdfTextError, ok, err, unwrap, type Result, type SdfTextErrorKind } from "./errors";
export { WHITE, colorToBytes, type Color } from "./types/color";
export { rect, rectWidth, rectHeight, upperLeft, rectsOverlap, type Rect } from "./math/rect";
export type { Vec2 } from "./math/vec2";
