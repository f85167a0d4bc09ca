/**
 * WebGL2 rendering backend for SDF text.
 *
 * Owns one reusable `Geometry` that each batch is streamed into. Positions
 * are in pixels with the origin at the top left of the viewport.
 */

import type { DrawUniforms, RenderBackend } from "../sdf/backend";
import type { TextBatch } from "../sdf/types";
import { createProgram } from "./compile";
import { Geometry } from "./Geometry";

interface ProgramUniforms {
  matrix: WebGLUniformLocation | null;
  atlas: WebGLUniformLocation | null;
  fgColor: WebGLUniformLocation | null;
  bgColor: WebGLUniformLocation | null;
}

/** Pixel space to clip space, y down (column-major mat3) */
export function pixelProjection(width: number, height: number): Float32Array {
  return new Float32Array([2 / width, 0, 0, 0, -2 / height, 0, -1, 1, 1]);
}

export class WebGLTextBackend implements RenderBackend<WebGLTexture, WebGLProgram> {
  readonly gl: WebGL2RenderingContext;
  private geometry: Geometry | null = null;
  private projection: Float32Array;
  private uniformCache = new Map<WebGLProgram, ProgramUniforms>();
  private _destroyed = false;

  constructor(gl: WebGL2RenderingContext, width = 1, height = 1) {
    this.gl = gl;
    this.projection = pixelProjection(width, height);
  }

  /** Set the pixel size of the render target */
  setViewport(width: number, height: number): void {
    this.projection = pixelProjection(width, height);
  }

  createTexture(width: number, height: number, rgb: Uint8Array): WebGLTexture {
    const gl = this.gl;
    const texture = gl.createTexture();
    if (!texture) throw new Error("Failed to create atlas page texture");

    gl.bindTexture(gl.TEXTURE_2D, texture);
    // Rows of RGB8 are not 4-byte aligned in general
    gl.pixelStorei(gl.UNPACK_ALIGNMENT, 1);
    gl.texImage2D(gl.TEXTURE_2D, 0, gl.RGB8, width, height, 0, gl.RGB, gl.UNSIGNED_BYTE, rgb);
    gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_WRAP_S, gl.CLAMP_TO_EDGE);
    gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_WRAP_T, gl.CLAMP_TO_EDGE);
    gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_MIN_FILTER, gl.LINEAR);
    gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_MAG_FILTER, gl.LINEAR);

    return texture;
  }

  destroyTexture(texture: WebGLTexture): void {
    this.gl.deleteTexture(texture);
  }

  createProgram(vertexSource: string, fragmentSource: string): WebGLProgram {
    return createProgram(this.gl, vertexSource, fragmentSource);
  }

  draw(program: WebGLProgram, texture: WebGLTexture, batch: TextBatch, uniforms: DrawUniforms): void {
    if (this._destroyed) return;

    const gl = this.gl;
    const locations = this.getUniforms(program);
    if (!this.geometry) {
      this.geometry = new Geometry(gl);
    }

    gl.enable(gl.BLEND);
    gl.blendFunc(gl.SRC_ALPHA, gl.ONE_MINUS_SRC_ALPHA);

    gl.useProgram(program);
    gl.uniformMatrix3fv(locations.matrix, false, this.projection);
    gl.activeTexture(gl.TEXTURE0);
    gl.bindTexture(gl.TEXTURE_2D, texture);
    gl.uniform1i(locations.atlas, 0);
    if (uniforms.fgColor) {
      gl.uniform4fv(locations.fgColor, uniforms.fgColor);
      gl.uniform4f(locations.bgColor, 0, 0, 0, 0);
    }

    this.geometry.update(batch);
    this.geometry.draw();

    gl.disable(gl.BLEND);
  }

  destroy(): void {
    if (this._destroyed) return;
    this.geometry?.destroy();
    this.geometry = null;
    this.uniformCache.clear();
    this._destroyed = true;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }

  private getUniforms(program: WebGLProgram): ProgramUniforms {
    let uniforms = this.uniformCache.get(program);
    if (!uniforms) {
      const gl = this.gl;
      uniforms = {
        matrix: gl.getUniformLocation(program, "u_matrix"),
        atlas: gl.getUniformLocation(program, "u_atlas"),
        fgColor: gl.getUniformLocation(program, "u_fgColor"),
        bgColor: gl.getUniformLocation(program, "u_bgColor"),
      };
      this.uniformCache.set(program, uniforms);
    }
    return uniforms;
  }
}
