/**
 * 2D vector utilities for primitive geometry
 */

/** 2D point or vector as an immutable [x, y] tuple */
export type Vec2 = readonly [number, number];

/** The origin / zero vector */
export const ZERO: Vec2 = [0, 0];

/** Component-wise sum of two vectors. */
export function add(a: Vec2, b: Vec2): Vec2 {
  return [a[0] + b[0], a[1] + b[1]];
}

/** Euclidean distance between two points. */
export function distance(a: Vec2, b: Vec2): number {
  const dx = b[0] - a[0];
  const dy = b[1] - a[1];
  return Math.sqrt(dx * dx + dy * dy);
}

/**
 * Angle of the vector from `a` to `b`, in radians (atan2 convention,
 * positive angles turn from +X towards +Y).
 */
export function angle(a: Vec2, b: Vec2): number {
  return Math.atan2(b[1] - a[1], b[0] - a[0]);
}

/**
 * Rotate a vector by `radians` around the origin.
 */
export function rotate(v: Vec2, radians: number): Vec2 {
  const cos = Math.cos(radians);
  const sin = Math.sin(radians);
  return [v[0] * cos - v[1] * sin, v[0] * sin + v[1] * cos];
}

/** Check if two vectors are equal within `epsilon`. */
export function equals(a: Vec2, b: Vec2, epsilon: number = 1e-9): boolean {
  return Math.abs(a[0] - b[0]) <= epsilon && Math.abs(a[1] - b[1]) <= epsilon;
}
