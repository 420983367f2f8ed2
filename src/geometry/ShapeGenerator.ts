/**
 * Shape Generator
 *
 * Produces circle and arc point sequences, reading circles through a
 * CircleCache. Pass a shared cache to reuse outlines between renderers.
 */

import { CircleCache } from "./CircleCache";
import { arcFromCircle } from "./circle";
import type { Vec2 } from "../math/vec2";
import type { PointSequence } from "./types";

export class ShapeGenerator {
  readonly cache: CircleCache;

  constructor(cache: CircleCache = new CircleCache()) {
    this.cache = cache;
  }

  /** Closed circle outline (`sides + 1` points), cached. */
  circle(radius: number, sides: number): PointSequence {
    return this.cache.getOrCreate(radius, sides);
  }

  /**
   * Arc outline cut from the cached circle. The arc itself is not cached and
   * a new array is returned on every call.
   */
  arc(
    radius: number,
    sides: number,
    startingAngle: number,
    radians: number
  ): Vec2[] {
    return arcFromCircle(this.circle(radius, sides), startingAngle, radians);
  }
}
