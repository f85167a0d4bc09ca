/**
 * Rendering backend collaborator.
 *
 * Text code never touches a graphics API directly: page textures, programs and
 * draw calls go through this interface. `WebGLTextBackend` implements it for
 * WebGL2.
 */

import type { Color } from "../types/color";
import type { TextBatch } from "./types";

/** Per-draw uniform values */
export interface DrawUniforms {
  /** Foreground colour, or null when the program is the caller's */
  fgColor: Color | null;
}

export interface RenderBackend<TTexture, TProgram> {
  /** Upload a tightly packed RGB8 image as a page texture */
  createTexture(width: number, height: number, rgb: Uint8Array): TTexture;
  destroyTexture(texture: TTexture): void;
  /** Compile and link a program; throws on failure */
  createProgram(vertexSource: string, fragmentSource: string): TProgram;
  /** Draw one batch as an indexed triangle list */
  draw(program: TProgram, texture: TTexture, batch: TextBatch, uniforms: DrawUniforms): void;
}
