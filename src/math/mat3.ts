/**
 * 3x3 matrix utilities for the 2D batch projection
 * Matrices are stored in column-major order (WebGL convention)
 */

import type { Vec2 } from "./vec2";

export type Mat3 = Float32Array;

/**
 * Orthographic projection from screen pixels to clip space.
 * (0, 0) is the top-left corner and (width, height) the bottom-right,
 * so Y grows downwards like a canvas.
 */
export function projection(width: number, height: number): Mat3 {
  const m = new Float32Array(9);
  m[0] = 2 / width;
  m[4] = -2 / height;
  m[6] = -1;
  m[7] = 1;
  m[8] = 1;
  return m;
}

/** Transform a point by a matrix (w = 1). */
export function transformPoint(m: Mat3, p: Vec2): Vec2 {
  const x = p[0];
  const y = p[1];
  return [
    m[0]! * x + m[3]! * y + m[6]!,
    m[1]! * x + m[4]! * y + m[7]!,
  ];
}
