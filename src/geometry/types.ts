/**
 * Geometry generation types
 */

import type { Vec2 } from "../math/vec2";

/** Ordered outline; consecutive points are connected by line segments */
export type PointSequence = ReadonlyArray<Vec2>;
