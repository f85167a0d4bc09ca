export { WebGLTextBackend, pixelProjection } from "./WebGLTextBackend";
export { Geometry } from "./Geometry";
export { Buffer, type BufferTarget } from "./Buffer";
export { createProgram, compileShader, ATTRIB_LOCATIONS } from "./compile";
