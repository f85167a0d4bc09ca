/**
 * 2D vector utilities for glyph placement
 */

/** 2D vector as [x, y] tuple */
export type Vec2 = [number, number];

export function add(a: Vec2, b: Vec2): Vec2 {
  return [a[0] + b[0], a[1] + b[1]];
}

/** Floor both components (pixel snapping) */
export function floor(v: Vec2): Vec2 {
  return [Math.floor(v[0]), Math.floor(v[1])];
}
