/**
 * Axis-aligned rectangle helpers.
 * Rectangles are stored as corners; y grows downward (screen convention).
 */

import type { Vec2 } from "./vec2";

export interface Rect {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export function rect(x1: number, y1: number, x2: number, y2: number): Rect {
  return { x1, y1, x2, y2 };
}

export function rectWidth(r: Rect): number {
  return r.x2 - r.x1;
}

export function rectHeight(r: Rect): number {
  return r.y2 - r.y1;
}

export function upperLeft(r: Rect): Vec2 {
  return [r.x1, r.y1];
}

/** True if the rectangles share any interior area */
export function rectsOverlap(a: Rect, b: Rect): boolean {
  return a.x1 < b.x2 && b.x1 < a.x2 && a.y1 < b.y2 && b.y1 < a.y2;
}
