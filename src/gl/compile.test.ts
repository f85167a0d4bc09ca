import { describe, it, expect, vi } from "vitest";
import { compileShader, createProgram } from "./compile";

function createMockGL(): WebGL2RenderingContext {
  return {
    createShader: vi.fn(() => ({})),
    shaderSource: vi.fn(),
    compileShader: vi.fn(),
    getShaderParameter: vi.fn(() => true),
    getShaderInfoLog: vi.fn(() => ""),
    deleteShader: vi.fn(),
    createProgram: vi.fn(() => ({})),
    attachShader: vi.fn(),
    bindAttribLocation: vi.fn(),
    linkProgram: vi.fn(),
    getProgramParameter: vi.fn(() => true),
    getProgramInfoLog: vi.fn(() => ""),
    deleteProgram: vi.fn(),
    VERTEX_SHADER: 0x8b31,
    FRAGMENT_SHADER: 0x8b30,
    COMPILE_STATUS: 0x8b81,
    LINK_STATUS: 0x8b82,
  } as unknown as WebGL2RenderingContext;
}

describe("compileShader", () => {
  it("compiles the source", () => {
    const gl = createMockGL();

    const shader = compileShader(gl, gl.VERTEX_SHADER, "void main() {}");

    expect(gl.createShader).toHaveBeenCalledWith(gl.VERTEX_SHADER);
    expect(gl.shaderSource).toHaveBeenCalledWith(shader, "void main() {}");
    expect(gl.compileShader).toHaveBeenCalledWith(shader);
  });

  it("throws with the info log on failure", () => {
    const gl = createMockGL();
    (gl.getShaderParameter as ReturnType<typeof vi.fn>).mockReturnValue(false);
    (gl.getShaderInfoLog as ReturnType<typeof vi.fn>).mockReturnValue("syntax error");

    expect(() => compileShader(gl, gl.VERTEX_SHADER, "bad")).toThrow(
      "Shader compilation failed: syntax error"
    );
    expect(gl.deleteShader).toHaveBeenCalledTimes(1);
  });
});

describe("createProgram", () => {
  it("binds the vertex attributes before linking", () => {
    const gl = createMockGL();

    const program = createProgram(gl, "vs", "fs");

    expect(gl.bindAttribLocation).toHaveBeenCalledWith(program, 0, "a_position");
    expect(gl.bindAttribLocation).toHaveBeenCalledWith(program, 1, "a_texCoord");
    expect(gl.bindAttribLocation).toHaveBeenCalledWith(program, 2, "a_color");
    expect(gl.linkProgram).toHaveBeenCalledWith(program);
    expect(gl.deleteShader).toHaveBeenCalledTimes(2);
  });

  it("deletes the vertex shader when the fragment shader fails", () => {
    const gl = createMockGL();
    (gl.getShaderParameter as ReturnType<typeof vi.fn>).mockReturnValueOnce(true).mockReturnValueOnce(false);
    (gl.getShaderInfoLog as ReturnType<typeof vi.fn>).mockReturnValue("bad fragment");

    expect(() => createProgram(gl, "vs", "fs")).toThrow("Shader compilation failed: bad fragment");
    expect(gl.deleteShader).toHaveBeenCalledTimes(2);
    expect(gl.createProgram).not.toHaveBeenCalled();
  });

  it("throws with the link log when linking fails", () => {
    const gl = createMockGL();
    (gl.getProgramParameter as ReturnType<typeof vi.fn>).mockReturnValue(false);
    (gl.getProgramInfoLog as ReturnType<typeof vi.fn>).mockReturnValue("varying mismatch");

    expect(() => createProgram(gl, "vs", "fs")).toThrow("Program linking failed: varying mismatch");
    expect(gl.deleteProgram).toHaveBeenCalledTimes(1);
  });
});
