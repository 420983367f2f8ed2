/**
 * Circle Cache
 *
 * Memoizes circle outlines by (radius, sides) so the trigonometry for a given
 * circle runs once per cache.
 */

import { createCircle, validateCircle } from "./circle";
import type { PointSequence } from "./types";

export class CircleCache {
  // radius -> sides -> outline
  private circles: Map<number, Map<number, PointSequence>> = new Map();
  private count = 0;

  /**
   * Get the outline for (radius, sides), generating it on first request.
   *
   * The returned sequence is frozen and shared by every caller that asks for
   * the same key.
   */
  getOrCreate(radius: number, sides: number): PointSequence {
    validateCircle(radius, sides);

    let bySides = this.circles.get(radius);
    if (!bySides) {
      bySides = new Map();
      this.circles.set(radius, bySides);
    }

    const cached = bySides.get(sides);
    if (cached) return cached;

    const circle = Object.freeze(createCircle(radius, sides));
    bySides.set(sides, circle);
    this.count++;
    return circle;
  }

  /** Check whether an outline for (radius, sides) has been generated. */
  has(radius: number, sides: number): boolean {
    return this.circles.get(radius)?.has(sides) ?? false;
  }

  /** Number of cached outlines */
  get size(): number {
    return this.count;
  }
}
