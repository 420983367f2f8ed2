/**
 * Circle and arc outline generation
 */

import { GeometryError } from "../errors";
import type { Vec2 } from "../math/vec2";
import type { PointSequence } from "./types";

const TWO_PI = Math.PI * 2;

/** Throw a GeometryError unless (radius, sides) can describe a circle. */
export function validateCircle(radius: number, sides: number): void {
  if (!Number.isInteger(sides) || sides < 1) {
    throw new GeometryError("sides", sides, "must be an integer >= 1");
  }
  if (!Number.isFinite(radius) || radius <= 0) {
    throw new GeometryError("radius", radius, "must be a finite number > 0");
  }
}

/**
 * Create the outline of a circle centered on the origin.
 *
 * Points start at (radius, 0) and advance by `2π / sides`. The first point is
 * repeated at the end so that connecting consecutive points closes the loop.
 *
 * @returns `sides + 1` points
 */
export function createCircle(radius: number, sides: number): Vec2[] {
  validateCircle(radius, sides);

  const step = TWO_PI / sides;
  const points: Vec2[] = [];

  for (let i = 0; i < sides; i++) {
    const theta = i * step;
    points.push([radius * Math.cos(theta), radius * Math.sin(theta)]);
  }

  points.push(points[0]!);
  return points;
}

/**
 * Index of the ring point nearest to `startingAngle`.
 * A start that sits exactly halfway between two points keeps the earlier one.
 * Starts past a full turn wrap around; negative starts stay at index 0.
 */
export function arcStartIndex(
  startingAngle: number,
  sides: number
): number {
  const anglePerSide = TWO_PI / sides;
  const steps = Math.max(0, Math.ceil(startingAngle / anglePerSide - 0.5));
  return steps % sides;
}

/**
 * Number of circle sides covered by a sweep of `radians`, rounded half up.
 */
export function sidesInArc(radians: number, sides: number): number {
  const anglePerSide = TWO_PI / sides;
  return Math.trunc(radians / anglePerSide + 0.5);
}

/**
 * Cut an arc out of a closed circle outline.
 *
 * @param circle - Closed outline as returned by {@link createCircle}
 * @param startingAngle - Start of the arc, 0 pointing along +X
 * @param radians - Sweep from the starting angle, in the direction the circle's
 *   points advance
 * @returns `sidesInArc + 1` points; a full sweep ends on its first point
 */
export function arcFromCircle(
  circle: PointSequence,
  startingAngle: number,
  radians: number
): Vec2[] {
  const sides = circle.length - 1;
  if (sides < 1) {
    throw new GeometryError("sides", sides, "must be an integer >= 1");
  }
  if (!Number.isFinite(startingAngle)) {
    throw new GeometryError("startingAngle", startingAngle, "must be finite");
  }
  if (!Number.isFinite(radians) || radians < 0) {
    throw new GeometryError("radians", radians, "must be a finite number >= 0");
  }

  const count = sidesInArc(radians, sides);
  if (count > sides) {
    throw new GeometryError(
      "radians",
      radians,
      `sweeps ${count} sides but the circle only has ${sides}`
    );
  }

  // The ring is the circle without its closing point; indexing modulo
  // `sides` rotates it without copying.
  const start = arcStartIndex(startingAngle, sides);
  const points: Vec2[] = [];
  for (let i = 0; i <= count; i++) {
    points.push(circle[(start + i) % sides]!);
  }
  return points;
}

/**
 * Create an arc outline without going through a cache.
 */
export function createArc(
  radius: number,
  sides: number,
  startingAngle: number,
  radians: number
): Vec2[] {
  return arcFromCircle(createCircle(radius, sides), startingAngle, radians);
}
