/**
 * SDF Shaders
 *
 * Built-in program for multi-channel distance field text. The signed distance
 * is the median of the three channels; coverage is derived from its screen
 * space derivative, so edges stay one pixel wide at any scale.
 */

/**
 * Vertex shader.
 *
 * Attributes:
 * - a_position: Pixel position
 * - a_texCoord: Atlas coordinates (normalized)
 * - a_color: Per-vertex colour, constant white when the batch has none
 *
 * Uniforms:
 * - u_matrix: Pixel to clip space (mat3)
 */
export const sdfVertexShader = `#version 300 es
precision highp float;

in vec2 a_position;
in vec2 a_texCoord;
in vec4 a_color;

uniform mat3 u_matrix;

out vec2 v_texCoord;
out vec4 v_color;

void main() {
  v_texCoord = a_texCoord;
  v_color = a_color;

  vec3 clip = u_matrix * vec3(a_position, 1.0);
  gl_Position = vec4(clip.xy, 0.0, 1.0);
}
`;

/**
 * Fragment shader.
 *
 * Uniforms:
 * - u_atlas: Atlas page (sampler2D)
 * - u_fgColor: Text colour (vec4)
 * - u_bgColor: Colour outside the glyph (vec4)
 */
export const sdfFragmentShader = `#version 300 es
precision mediump float;

uniform sampler2D u_atlas;
uniform vec4 u_fgColor;
uniform vec4 u_bgColor;

in vec2 v_texCoord;
in vec4 v_color;

out vec4 fragColor;

float median(float r, float g, float b) {
  return max(min(r, g), min(max(r, g), b));
}

void main() {
  vec3 msdf = texture(u_atlas, v_texCoord).rgb;
  float sigDist = median(msdf.r, msdf.g, msdf.b) - 0.5;
  float opacity = clamp(sigDist / max(fwidth(sigDist), 1e-4) + 0.5, 0.0, 1.0);
  fragColor = mix(u_bgColor, u_fgColor * v_color, opacity);
}
`;
