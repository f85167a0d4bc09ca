import { describe, it, expect, vi } from "vitest";
import { Buffer } from "./Buffer";

function createMockGL(): WebGL2RenderingContext {
  return {
    createBuffer: vi.fn(() => ({})),
    deleteBuffer: vi.fn(),
    bindBuffer: vi.fn(),
    bufferData: vi.fn(),
    bufferSubData: vi.fn(),
    ARRAY_BUFFER: 0x8892,
    ELEMENT_ARRAY_BUFFER: 0x8893,
    DYNAMIC_DRAW: 0x88e8,
  } as unknown as WebGL2RenderingContext;
}

describe("Buffer", () => {
  describe("constructor", () => {
    it("creates an array buffer by default", () => {
      const gl = createMockGL();
      const buffer = new Buffer(gl);

      expect(gl.createBuffer).toHaveBeenCalled();
      expect(buffer.target).toBe(gl.ARRAY_BUFFER);
      expect(buffer.byteCapacity).toBe(0);
    });

    it("creates an element buffer when specified", () => {
      const gl = createMockGL();
      const buffer = new Buffer(gl, "element");

      expect(buffer.target).toBe(gl.ELEMENT_ARRAY_BUFFER);
    });

    it("throws if buffer creation fails", () => {
      const gl = createMockGL();
      (gl.createBuffer as ReturnType<typeof vi.fn>).mockReturnValue(null);

      expect(() => new Buffer(gl)).toThrow("Failed to create WebGL buffer");
    });
  });

  describe("upload", () => {
    it("allocates storage on first upload", () => {
      const gl = createMockGL();
      const buffer = new Buffer(gl);
      const data = new Float32Array([1, 2, 3]);

      buffer.upload(data);

      expect(gl.bindBuffer).toHaveBeenCalledWith(gl.ARRAY_BUFFER, buffer.handle);
      expect(gl.bufferData).toHaveBeenCalledWith(gl.ARRAY_BUFFER, data, gl.DYNAMIC_DRAW);
      expect(buffer.byteCapacity).toBe(12);
    });

    it("overwrites in place when the data fits", () => {
      const gl = createMockGL();
      const buffer = new Buffer(gl);
      buffer.upload(new Float32Array([1, 2, 3]));
      const smaller = new Float32Array([4]);

      buffer.upload(smaller);

      expect(gl.bufferData).toHaveBeenCalledTimes(1);
      expect(gl.bufferSubData).toHaveBeenCalledWith(gl.ARRAY_BUFFER, 0, smaller);
      expect(buffer.byteCapacity).toBe(12);
    });

    it("grows when the data does not fit", () => {
      const gl = createMockGL();
      const buffer = new Buffer(gl, "element");
      buffer.upload(new Uint32Array([0, 1, 2]));

      buffer.upload(new Uint32Array([0, 1, 2, 2, 1, 3]));

      expect(gl.bufferData).toHaveBeenCalledTimes(2);
      expect(buffer.byteCapacity).toBe(24);
    });
  });

  describe("destroy", () => {
    it("deletes the buffer", () => {
      const gl = createMockGL();
      const buffer = new Buffer(gl);

      buffer.destroy();

      expect(gl.deleteBuffer).toHaveBeenCalledWith(buffer.handle);
      expect(buffer.destroyed).toBe(true);
    });

    it("is idempotent", () => {
      const gl = createMockGL();
      const buffer = new Buffer(gl);

      buffer.destroy();
      buffer.destroy();

      expect(gl.deleteBuffer).toHaveBeenCalledTimes(1);
    });

    it("refuses to bind afterwards", () => {
      const gl = createMockGL();
      const buffer = new Buffer(gl);
      buffer.destroy();

      expect(() => buffer.upload(new Float32Array([1]))).toThrow("Cannot bind destroyed buffer");
    });
  });
});
