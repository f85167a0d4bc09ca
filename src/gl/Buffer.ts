/**
 * WebGL buffer holding one vertex stream or the index list of a text batch.
 *
 * Text batches change every draw, so storage is reallocated only when a
 * batch outgrows it and otherwise overwritten in place.
 */

export type BufferTarget = "array" | "element";

// WebGL constants (avoid referencing WebGL2RenderingContext at module load time for testing)
const GL_ARRAY_BUFFER = 0x8892;
const GL_ELEMENT_ARRAY_BUFFER = 0x8893;
const GL_DYNAMIC_DRAW = 0x88e8;

const TARGET_MAP: Record<BufferTarget, GLenum> = {
  array: GL_ARRAY_BUFFER,
  element: GL_ELEMENT_ARRAY_BUFFER,
};

export class Buffer {
  readonly gl: WebGL2RenderingContext;
  readonly handle: WebGLBuffer;
  readonly target: GLenum;

  /** Bytes of storage currently allocated */
  private capacity = 0;
  private _destroyed = false;

  constructor(gl: WebGL2RenderingContext, target: BufferTarget = "array") {
    this.gl = gl;
    this.target = TARGET_MAP[target];

    const handle = gl.createBuffer();
    if (!handle) {
      throw new Error("Failed to create WebGL buffer");
    }
    this.handle = handle;
  }

  bind(): void {
    if (this._destroyed) {
      throw new Error("Cannot bind destroyed buffer");
    }
    this.gl.bindBuffer(this.target, this.handle);
  }

  /** Upload `data`, growing the storage if it does not fit */
  upload(data: ArrayBufferView): void {
    this.bind();
    if (data.byteLength > this.capacity) {
      this.gl.bufferData(this.target, data, GL_DYNAMIC_DRAW);
      this.capacity = data.byteLength;
    } else {
      this.gl.bufferSubData(this.target, 0, data);
    }
  }

  get byteCapacity(): number {
    return this.capacity;
  }

  destroy(): void {
    if (this._destroyed) return;
    this.gl.deleteBuffer(this.handle);
    this.capacity = 0;
    this._destroyed = true;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }
}
