/**
 * mapgen-primitives - circles, arcs and lines drawn as stretched pixels on WebGL2
 */

export const VERSION = "0.1.0";

export {
  PrimitiveRenderer,
  withPrimitiveRenderer,
  type PrimitiveRendererOptions,
} from "./PrimitiveRenderer";
export { Harness, drawDemoScene, CORNFLOWER_BLUE, type HarnessOptions, type SceneDrawer } from "./Harness";
export { GeometryError, DependencyError } from "./errors";
export * from "./geometry/index";
export * from "./batch/index";
export { PixelTexture } from "./texture/PixelTexture";
export * as vec2 from "./math/vec2";
export * as mat3 from "./math/mat3";
export type { Vec2 } from "./math/vec2";
