/**
 * Quad Batching Module
 *
 * Textured quads drawn in as few draw calls as possible.
 */

export {
  QuadBatch,
  sortQuads,
  groupByTexture,
  MAX_QUADS_PER_FLUSH,
  type QuadBatchOptions,
  type TextureRun,
} from "./QuadBatch";
export {
  quadCorners,
  quadTexCoords,
  writeQuadVertices,
  createQuadIndices,
  type QuadCorners,
} from "./quad";
export type {
  Color,
  Rect,
  QuadEffects,
  SortMode,
  QuadTexture,
  QuadDrawCall,
  QuadSubmitter,
  QuadBatchStats,
} from "./types";
