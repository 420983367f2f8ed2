/**
 * Quad geometry
 *
 * Corner positions and texture coordinates for a single batched quad.
 */

import { rotate, type Vec2 } from "../math/vec2";
import type { QuadDrawCall, Rect } from "./types";

/** Corners in drawing order: top-left, top-right, bottom-right, bottom-left */
export type QuadCorners = [Vec2, Vec2, Vec2, Vec2];

/**
 * Compute the four corners of a quad in screen space.
 *
 * The unscaled quad is the source rectangle (or the whole texture). `origin`
 * is in those unscaled units and is the point placed at `position`; rotation
 * and scale both pivot around it.
 */
export function quadCorners(quad: QuadDrawCall): QuadCorners {
  const width = quad.sourceRect ? quad.sourceRect.width : quad.texture.width;
  const height = quad.sourceRect ? quad.sourceRect.height : quad.texture.height;

  const corner = (cx: number, cy: number): Vec2 => {
    const local: Vec2 = [
      (cx - quad.origin[0]) * quad.scale[0],
      (cy - quad.origin[1]) * quad.scale[1],
    ];
    const [x, y] = quad.rotation === 0 ? local : rotate(local, quad.rotation);
    return [quad.position[0] + x, quad.position[1] + y];
  };

  return [corner(0, 0), corner(width, 0), corner(width, height), corner(0, height)];
}

/**
 * Texture coordinates matching {@link quadCorners}, mirrored by the quad's
 * effects.
 */
export function quadTexCoords(quad: QuadDrawCall): QuadCorners {
  const rect: Rect = quad.sourceRect ?? {
    x: 0,
    y: 0,
    width: quad.texture.width,
    height: quad.texture.height,
  };

  let u0 = rect.x / quad.texture.width;
  let v0 = rect.y / quad.texture.height;
  let u1 = (rect.x + rect.width) / quad.texture.width;
  let v1 = (rect.y + rect.height) / quad.texture.height;

  if (quad.effects === "flipHorizontal" || quad.effects === "flipBoth") {
    [u0, u1] = [u1, u0];
  }
  if (quad.effects === "flipVertical" || quad.effects === "flipBoth") {
    [v0, v1] = [v1, v0];
  }

  return [
    [u0, v0],
    [u1, v0],
    [u1, v1],
    [u0, v1],
  ];
}

/** Floats per vertex: x, y, u, v, r, g, b, a */
export const FLOATS_PER_VERTEX = 8;
/** Floats per quad (4 vertices) */
export const FLOATS_PER_QUAD = FLOATS_PER_VERTEX * 4;

/**
 * Write a quad's four interleaved vertices into `out` starting at `offset`.
 *
 * @returns Offset just past the written vertices
 */
export function writeQuadVertices(
  quad: QuadDrawCall,
  out: Float32Array,
  offset: number
): number {
  const corners = quadCorners(quad);
  const uvs = quadTexCoords(quad);
  const [r, g, b, a] = quad.color;

  let o = offset;
  for (let i = 0; i < 4; i++) {
    const p = corners[i]!;
    const uv = uvs[i]!;
    out[o++] = p[0];
    out[o++] = p[1];
    out[o++] = uv[0];
    out[o++] = uv[1];
    out[o++] = r;
    out[o++] = g;
    out[o++] = b;
    out[o++] = a;
  }
  return o;
}

/**
 * Index data for `quadCount` quads, two triangles each.
 */
export function createQuadIndices(quadCount: number): Uint16Array {
  const indices = new Uint16Array(quadCount * 6);
  for (let q = 0; q < quadCount; q++) {
    const v = q * 4;
    const i = q * 6;
    indices[i] = v;
    indices[i + 1] = v + 1;
    indices[i + 2] = v + 2;
    indices[i + 3] = v;
    indices[i + 4] = v + 2;
    indices[i + 5] = v + 3;
  }
  return indices;
}
