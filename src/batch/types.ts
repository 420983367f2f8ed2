/**
 * Quad Batch Types
 *
 * Types for submitting textured quads to a batch.
 */

import type { Vec2 } from "../math/vec2";

/** RGBA color as [r, g, b, a] with values 0-1; alpha is the quad's opacity */
export type Color = readonly [number, number, number, number];

/** Axis-aligned rectangle in texture pixels */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Mirroring applied to a quad's texture coordinates */
export type QuadEffects = "none" | "flipHorizontal" | "flipVertical" | "flipBoth";

/** Order in which queued quads are drawn */
export type SortMode = "deferred" | "backToFront" | "frontToBack";

/** A texture that can be drawn as a quad */
export interface QuadTexture {
  readonly handle: WebGLTexture;
  /** Width in pixels */
  readonly width: number;
  /** Height in pixels */
  readonly height: number;
}

/** One textured quad */
export interface QuadDrawCall {
  texture: QuadTexture;
  /** Screen position of the origin */
  position: Vec2;
  /** Region of the texture to draw (null = whole texture) */
  sourceRect: Rect | null;
  /** Tint multiplied with the texture color */
  color: Color;
  /** Rotation around the origin, in radians */
  rotation: number;
  /** Pivot in unscaled texture pixels */
  origin: Vec2;
  /** Scale applied to the source size */
  scale: Vec2;
  effects: QuadEffects;
  /** Sort depth, used by the depth sort modes */
  depth: number;
}

/**
 * Accepts quads for the current frame's batch.
 * `gl` is the device that textures submitted here must belong to.
 */
export interface QuadSubmitter {
  readonly gl: WebGL2RenderingContext;
  draw(quad: QuadDrawCall): void;
}

/** Counters for the last completed frame */
export interface QuadBatchStats {
  quads: number;
  drawCalls: number;
  flushes: number;
}
