/**
 * Geometry wrapper combining a VAO with separate position, texture coordinate
 * and colour streams plus a 32-bit index buffer
 */

import type { TextBatch } from "../sdf/types";
import { Buffer } from "./Buffer";
import { ATTRIB_LOCATIONS } from "./compile";

// WebGL constants (avoid referencing WebGL2RenderingContext at module load time for testing)
const GL_FLOAT = 0x1406;
const GL_UNSIGNED_BYTE = 0x1401;
const GL_UNSIGNED_INT = 0x1405;
const GL_TRIANGLES = 0x0004;

export class Geometry {
  readonly gl: WebGL2RenderingContext;
  readonly vao: WebGLVertexArrayObject;
  readonly positionBuffer: Buffer;
  readonly texCoordBuffer: Buffer;
  readonly colorBuffer: Buffer;
  readonly indexBuffer: Buffer;

  private _indexCount = 0;
  private _destroyed = false;

  constructor(gl: WebGL2RenderingContext) {
    this.gl = gl;

    const vao = gl.createVertexArray();
    if (!vao) {
      throw new Error("Failed to create VAO");
    }
    this.vao = vao;

    this.positionBuffer = new Buffer(gl, "array");
    this.texCoordBuffer = new Buffer(gl, "array");
    this.colorBuffer = new Buffer(gl, "array");
    this.indexBuffer = new Buffer(gl, "element");

    gl.bindVertexArray(this.vao);

    this.positionBuffer.bind();
    gl.enableVertexAttribArray(ATTRIB_LOCATIONS.a_position);
    gl.vertexAttribPointer(ATTRIB_LOCATIONS.a_position, 2, GL_FLOAT, false, 0, 0);

    this.texCoordBuffer.bind();
    gl.enableVertexAttribArray(ATTRIB_LOCATIONS.a_texCoord);
    gl.vertexAttribPointer(ATTRIB_LOCATIONS.a_texCoord, 2, GL_FLOAT, false, 0, 0);

    this.colorBuffer.bind();
    gl.vertexAttribPointer(ATTRIB_LOCATIONS.a_color, 4, GL_UNSIGNED_BYTE, true, 0, 0);

    this.indexBuffer.bind();
    gl.bindVertexArray(null);
  }

  get indexCount(): number {
    return this._indexCount;
  }

  /**
   * Upload a batch. Without per-vertex colours the colour attribute reads a
   * constant opaque white.
   */
  update(batch: TextBatch): void {
    if (this._destroyed) {
      throw new Error("Cannot update destroyed geometry");
    }
    const gl = this.gl;
    gl.bindVertexArray(this.vao);

    this.positionBuffer.upload(batch.positions);
    this.texCoordBuffer.upload(batch.texCoords);

    if (batch.colors) {
      this.colorBuffer.upload(batch.colors);
      gl.enableVertexAttribArray(ATTRIB_LOCATIONS.a_color);
    } else {
      gl.disableVertexAttribArray(ATTRIB_LOCATIONS.a_color);
      gl.vertexAttrib4f(ATTRIB_LOCATIONS.a_color, 1, 1, 1, 1);
    }

    this.indexBuffer.upload(batch.indices);
    this._indexCount = batch.indices.length;

    gl.bindVertexArray(null);
  }

  /** Draw the last uploaded batch */
  draw(): void {
    if (this._destroyed) {
      throw new Error("Cannot draw destroyed geometry");
    }
    if (this._indexCount === 0) return;

    this.gl.bindVertexArray(this.vao);
    this.gl.drawElements(GL_TRIANGLES, this._indexCount, GL_UNSIGNED_INT, 0);
    this.gl.bindVertexArray(null);
  }

  /** Delete all buffers and the VAO */
  destroy(): void {
    if (this._destroyed) return;

    this.positionBuffer.destroy();
    this.texCoordBuffer.destroy();
    this.colorBuffer.destroy();
    this.indexBuffer.destroy();
    this.gl.deleteVertexArray(this.vao);

    this._destroyed = true;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }
}
