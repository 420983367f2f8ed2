/**
 * Primitive Renderer
 *
 * Draws lines, polylines, circles and arcs by stretching a single opaque
 * pixel between points. Every segment is one quad submitted to a QuadSubmitter.
 */

import { DependencyError } from "./errors";
import { ShapeGenerator } from "./geometry/ShapeGenerator";
import { PixelTexture } from "./texture/PixelTexture";
import { add, angle, distance, ZERO, type Vec2 } from "./math/vec2";
import type { Color, QuadSubmitter } from "./batch/types";
import type { PointSequence } from "./geometry/types";

export interface PrimitiveRendererOptions {
  /** Batch that receives one quad per line segment */
  batch: QuadSubmitter;
  /** Shape source; share one to share its circle cache (default: a new generator) */
  shapes?: ShapeGenerator;
}

export class PrimitiveRenderer {
  readonly batch: QuadSubmitter;
  readonly shapes: ShapeGenerator;

  private pixel: PixelTexture;
  private destroyed = false;

  constructor(options: PrimitiveRendererOptions) {
    const batch = options?.batch;
    if (!batch) {
      throw new DependencyError("batch", "is required");
    }
    if (!batch.gl) {
      throw new DependencyError("batch.gl", "must be a WebGL2 rendering context");
    }

    this.batch = batch;
    this.shapes = options.shapes ?? new ShapeGenerator();
    this.pixel = new PixelTexture(batch.gl);
  }

  /**
   * Draw a line from `point1` to `point2`.
   *
   * @param thickness - Line width in pixels. The line is not centered: it
   *   extends to the right of its direction of travel on a Y-down screen
   */
  drawLine(point1: Vec2, point2: Vec2, color: Color, thickness: number): void {
    this.assertUsable();

    this.batch.draw({
      texture: this.pixel,
      position: point1,
      sourceRect: null,
      color,
      rotation: angle(point1, point2),
      origin: ZERO,
      scale: [distance(point1, point2), thickness],
      effects: "none",
      depth: 0,
    });
  }

  /**
   * Connect consecutive points with lines, offset by `position`.
   * Fewer than two points draws nothing.
   */
  drawPoints(
    position: Vec2,
    points: PointSequence,
    color: Color,
    thickness: number
  ): void {
    this.assertUsable();
    if (points.length < 2) return;

    for (let i = 1; i < points.length; i++) {
      this.drawLine(
        add(points[i - 1]!, position),
        add(points[i]!, position),
        color,
        thickness
      );
    }
  }

  /** Draw a circle outline approximated by `sides` segments. */
  drawCircle(
    center: Vec2,
    radius: number,
    sides: number,
    color: Color,
    thickness: number
  ): void {
    this.assertUsable();
    this.drawPoints(center, this.shapes.circle(radius, sides), color, thickness);
  }

  /**
   * Draw an arc cut from a `sides`-sided circle.
   *
   * @param startingAngle - Start of the arc in radians, 0 pointing east and
   *   increasing clockwise on a Y-down screen
   * @param radians - Sweep from the starting angle, clockwise on a Y-down screen
   */
  drawArc(
    center: Vec2,
    radius: number,
    sides: number,
    startingAngle: number,
    radians: number,
    color: Color,
    thickness: number
  ): void {
    this.assertUsable();
    const arc = this.shapes.arc(radius, sides, startingAngle, radians);
    this.drawPoints(center, arc, color, thickness);
  }

  private assertUsable(): void {
    if (this.destroyed) {
      throw new Error("Cannot draw with destroyed PrimitiveRenderer");
    }
  }

  /**
   * Release the pixel texture. Safe to call more than once.
   */
  destroy(): void {
    if (this.destroyed) return;
    this.pixel.destroy();
    this.destroyed = true;
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }
}

/**
 * Run `fn` with a renderer that is destroyed when `fn` returns or throws.
 */
export function withPrimitiveRenderer<T>(
  options: PrimitiveRendererOptions,
  fn: (renderer: PrimitiveRenderer) => T
): T {
  const renderer = new PrimitiveRenderer(options);
  try {
    return fn(renderer);
  } finally {
    renderer.destroy();
  }
}
