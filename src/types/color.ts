/**
 * Colour value types shared by the text pipeline.
 */

/** RGBA colour, each component in [0, 1] */
export type Color = [number, number, number, number];

export const WHITE: Color = [1, 1, 1, 1];

function toByte(v: number): number {
  v = Math.min(1, Math.max(0, v));
  return (v * 255 + 0.5) | 0;
}

/**
 * Convert a colour to 8-bit RGBA components.
 */
export function colorToBytes(color: Color): [number, number, number, number] {
  return [toByte(color[0]), toByte(color[1]), toByte(color[2]), toByte(color[3])];
}
