/**
 * Textured, tinted quad shaders
 */

export const quadVertexShader = `#version 300 es
precision highp float;

in vec2 a_position;
in vec2 a_texCoord;
in vec4 a_color;

uniform mat3 u_matrix;

out vec2 v_texCoord;
out vec4 v_color;

void main() {
  vec3 pos = u_matrix * vec3(a_position, 1.0);
  gl_Position = vec4(pos.xy, 0.0, 1.0);
  v_texCoord = a_texCoord;
  v_color = a_color;
}
`;

export const quadFragmentShader = `#version 300 es
precision mediump float;

uniform sampler2D u_texture;

in vec2 v_texCoord;
in vec4 v_color;

out vec4 fragColor;

void main() {
  fragColor = texture(u_texture, v_texCoord) * v_color;
}
`;
