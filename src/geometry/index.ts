/**
 * Circle and arc geometry
 */

export type { PointSequence } from "./types";
export {
  createCircle,
  createArc,
  arcFromCircle,
  arcStartIndex,
  sidesInArc,
  validateCircle,
} from "./circle";
export { CircleCache } from "./CircleCache";
export { ShapeGenerator } from "./ShapeGenerator";
