import { describe, it, expect, vi } from "vitest";
import type { TextBatch } from "../sdf/types";
import { Geometry } from "./Geometry";

function createMockGL(): WebGL2RenderingContext {
  return {
    createBuffer: vi.fn(() => ({})),
    deleteBuffer: vi.fn(),
    bindBuffer: vi.fn(),
    bufferData: vi.fn(),
    bufferSubData: vi.fn(),
    createVertexArray: vi.fn(() => ({})),
    deleteVertexArray: vi.fn(),
    bindVertexArray: vi.fn(),
    enableVertexAttribArray: vi.fn(),
    disableVertexAttribArray: vi.fn(),
    vertexAttribPointer: vi.fn(),
    vertexAttrib4f: vi.fn(),
    drawElements: vi.fn(),
    ARRAY_BUFFER: 0x8892,
    ELEMENT_ARRAY_BUFFER: 0x8893,
    DYNAMIC_DRAW: 0x88e8,
    FLOAT: 0x1406,
    UNSIGNED_BYTE: 0x1401,
    UNSIGNED_INT: 0x1405,
    TRIANGLES: 0x0004,
  } as unknown as WebGL2RenderingContext;
}

function quadBatch(colors: Uint8Array | null = null): TextBatch {
  return {
    pageIndex: 0,
    positions: new Float32Array([16, 0, 0, 0, 16, 32, 0, 32]),
    texCoords: new Float32Array([0.125, 0, 0, 0, 0.125, 0.25, 0, 0.25]),
    colors,
    indices: new Uint32Array([0, 1, 2, 2, 1, 3]),
  };
}

describe("Geometry", () => {
  describe("constructor", () => {
    it("creates a VAO and four buffers", () => {
      const gl = createMockGL();

      const geo = new Geometry(gl);

      expect(gl.createVertexArray).toHaveBeenCalledTimes(1);
      expect(gl.createBuffer).toHaveBeenCalledTimes(4);
      expect(geo.indexCount).toBe(0);
    });

    it("sets up the vertex streams", () => {
      const gl = createMockGL();

      new Geometry(gl);

      expect(gl.vertexAttribPointer).toHaveBeenCalledWith(0, 2, gl.FLOAT, false, 0, 0);
      expect(gl.vertexAttribPointer).toHaveBeenCalledWith(1, 2, gl.FLOAT, false, 0, 0);
      expect(gl.vertexAttribPointer).toHaveBeenCalledWith(2, 4, gl.UNSIGNED_BYTE, true, 0, 0);
      expect(gl.enableVertexAttribArray).toHaveBeenCalledWith(0);
      expect(gl.enableVertexAttribArray).toHaveBeenCalledWith(1);
      expect(gl.enableVertexAttribArray).not.toHaveBeenCalledWith(2);
    });

    it("throws if VAO creation fails", () => {
      const gl = createMockGL();
      (gl.createVertexArray as ReturnType<typeof vi.fn>).mockReturnValue(null);

      expect(() => new Geometry(gl)).toThrow("Failed to create VAO");
    });
  });

  describe("update", () => {
    it("uploads the streams and reads constant white without colours", () => {
      const gl = createMockGL();
      const geo = new Geometry(gl);
      const batch = quadBatch();

      geo.update(batch);

      expect(gl.bufferData).toHaveBeenCalledWith(gl.ARRAY_BUFFER, batch.positions, gl.DYNAMIC_DRAW);
      expect(gl.bufferData).toHaveBeenCalledWith(gl.ARRAY_BUFFER, batch.texCoords, gl.DYNAMIC_DRAW);
      expect(gl.bufferData).toHaveBeenCalledWith(gl.ELEMENT_ARRAY_BUFFER, batch.indices, gl.DYNAMIC_DRAW);
      expect(gl.disableVertexAttribArray).toHaveBeenCalledWith(2);
      expect(gl.vertexAttrib4f).toHaveBeenCalledWith(2, 1, 1, 1, 1);
      expect(geo.indexCount).toBe(6);
    });

    it("enables the colour stream when the batch has colours", () => {
      const gl = createMockGL();
      const geo = new Geometry(gl);
      const batch = quadBatch(new Uint8Array(16).fill(255));

      geo.update(batch);

      expect(gl.bufferData).toHaveBeenCalledWith(gl.ARRAY_BUFFER, batch.colors, gl.DYNAMIC_DRAW);
      expect(gl.enableVertexAttribArray).toHaveBeenCalledWith(2);
      expect(gl.vertexAttrib4f).not.toHaveBeenCalled();
    });

    it("throws after destroy", () => {
      const gl = createMockGL();
      const geo = new Geometry(gl);
      geo.destroy();

      expect(() => geo.update(quadBatch())).toThrow("Cannot update destroyed geometry");
    });
  });

  describe("draw", () => {
    it("draws the uploaded triangles", () => {
      const gl = createMockGL();
      const geo = new Geometry(gl);
      geo.update(quadBatch());

      geo.draw();

      expect(gl.bindVertexArray).toHaveBeenCalledWith(geo.vao);
      expect(gl.drawElements).toHaveBeenCalledWith(gl.TRIANGLES, 6, gl.UNSIGNED_INT, 0);
    });

    it("draws nothing before the first update", () => {
      const gl = createMockGL();
      const geo = new Geometry(gl);

      geo.draw();

      expect(gl.drawElements).not.toHaveBeenCalled();
    });

    it("throws after destroy", () => {
      const gl = createMockGL();
      const geo = new Geometry(gl);
      geo.destroy();

      expect(() => geo.draw()).toThrow("Cannot draw destroyed geometry");
    });
  });

  describe("destroy", () => {
    it("deletes the buffers and the VAO once", () => {
      const gl = createMockGL();
      const geo = new Geometry(gl);

      geo.destroy();
      geo.destroy();

      expect(gl.deleteBuffer).toHaveBeenCalledTimes(4);
      expect(gl.deleteVertexArray).toHaveBeenCalledTimes(1);
      expect(geo.destroyed).toBe(true);
    });
  });
});
