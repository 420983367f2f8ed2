/**
 * Harness - canvas, frame loop and demo scene for the primitive renderer
 */

import { QuadBatch, type QuadBatchOptions } from "./batch/QuadBatch";
import { PrimitiveRenderer } from "./PrimitiveRenderer";
import { projection } from "./math/mat3";
import type { Color } from "./batch/types";

/** Draws one frame's content between batch begin and end */
export type SceneDrawer = (
  primitives: PrimitiveRenderer,
  width: number,
  height: number
) => void;

export interface HarnessOptions {
  canvas: HTMLCanvasElement;
  /** Background color (default: cornflower blue) */
  clearColor?: Color;
  /** Milliseconds between stats log lines (default: 1000) */
  logIntervalMs?: number;
  /** Scene to draw each frame (default: demo shapes) */
  draw?: SceneDrawer;
  /** Batch settings */
  batch?: QuadBatchOptions;
  /** Receives keydown events; Escape stops the harness (default: window) */
  keyTarget?: EventTarget;
  /** Polled once per frame; Back on any pad stops the harness (default: navigator.getGamepads) */
  gamepads?: () => ReadonlyArray<Gamepad | null>;
}

/** Back/Select in the standard gamepad mapping */
const GAMEPAD_BACK = 8;

function readGamepads(): ReadonlyArray<Gamepad | null> {
  return globalThis.navigator?.getGamepads?.() ?? [];
}

export const CORNFLOWER_BLUE: Color = [100 / 255, 149 / 255, 237 / 255, 1];

const WHITE: Color = [1, 1, 1, 1];
const YELLOW: Color = [1, 0.85, 0.2, 1];
const TRANSLUCENT_RED: Color = [0.9, 0.1, 0.1, 0.5];

/** Circles, arcs and lines laid out relative to the canvas center */
export const drawDemoScene: SceneDrawer = (primitives, width, height) => {
  const cx = width / 2;
  const cy = height / 2;
  const radius = Math.min(width, height) / 4;

  primitives.drawCircle([cx, cy], radius, 64, WHITE, 2);
  primitives.drawCircle([cx, cy], radius / 2, 6, YELLOW, 3);
  primitives.drawArc([cx, cy], radius * 1.2, 48, 0, Math.PI, TRANSLUCENT_RED, 4);
  primitives.drawLine([cx - radius, cy], [cx + radius, cy], WHITE, 1);
  primitives.drawLine([cx, cy - radius], [cx, cy + radius], WHITE, 1);
};

export class Harness {
  readonly canvas: HTMLCanvasElement;
  readonly gl: WebGL2RenderingContext;
  readonly batch: QuadBatch;
  readonly primitives: PrimitiveRenderer;

  private clearColor: Color;
  private logIntervalMs: number;
  private drawScene: SceneDrawer;
  private keyTarget: EventTarget | null;
  private gamepads: () => ReadonlyArray<Gamepad | null>;

  private animationId: number | null = null;
  private frameCount = 0;
  private lastLogTime = 0;
  private destroyed = false;

  constructor(options: HarnessOptions) {
    this.canvas = options.canvas;
    this.clearColor = options.clearColor ?? CORNFLOWER_BLUE;
    this.logIntervalMs = options.logIntervalMs ?? 1000;
    this.drawScene = options.draw ?? drawDemoScene;

    const gl = this.canvas.getContext("webgl2", { antialias: true });
    if (!gl) {
      throw new Error("WebGL2 not supported");
    }
    this.gl = gl;

    this.batch = new QuadBatch(gl, options.batch);
    try {
      this.primitives = new PrimitiveRenderer({ batch: this.batch });
    } catch (err) {
      this.batch.destroy();
      throw err;
    }

    this.gamepads = options.gamepads ?? readGamepads;

    this.keyTarget = options.keyTarget ?? globalThis.window ?? null;
    this.keyTarget?.addEventListener("keydown", this.onKeyDown);

    this.resize();
  }

  private onKeyDown = (event: Event): void => {
    if ("key" in event && event.key === "Escape") {
      this.exit();
    }
  };

  private backPressed(): boolean {
    return this.gamepads().some(
      (pad) => pad?.buttons[GAMEPAD_BACK]?.pressed === true
    );
  }

  private exit(): void {
    this.destroy();
    console.log("[Harness] stopped");
  }

  /** Resize the canvas to match display size */
  resize(): void {
    const dpr = globalThis.devicePixelRatio || 1;
    const width = Math.round(this.canvas.clientWidth * dpr);
    const height = Math.round(this.canvas.clientHeight * dpr);

    if (this.canvas.width !== width || this.canvas.height !== height) {
      this.canvas.width = width;
      this.canvas.height = height;
      this.gl.viewport(0, 0, width, height);
    }
  }

  /** Clear, draw the scene and flush the batch */
  render(): void {
    if (this.destroyed) {
      throw new Error("Cannot render destroyed harness");
    }

    const gl = this.gl;
    const width = this.canvas.width;
    const height = this.canvas.height;

    const [r, g, b, a] = this.clearColor;
    gl.clearColor(r, g, b, a);
    gl.clear(gl.COLOR_BUFFER_BIT);

    this.batch.begin(projection(width, height));
    try {
      this.drawScene(this.primitives, width, height);
    } finally {
      this.batch.end();
    }

    this.frameCount++;
    const now = Date.now();
    if (now - this.lastLogTime >= this.logIntervalMs) {
      const stats = this.batch.getStats();
      console.log(
        `[Harness] frame=${this.frameCount}, quads=${stats.quads}, drawCalls=${stats.drawCalls}`
      );
      this.lastLogTime = now;
    }
  }

  /** Start the render loop */
  start(): void {
    if (this.animationId !== null || this.destroyed) return;

    const loop = () => {
      // This frame has fired; a throwing render must leave the loop restartable
      this.animationId = null;
      if (this.backPressed()) {
        this.exit();
        return;
      }
      this.resize();
      this.render();
      this.animationId = requestAnimationFrame(loop);
    };

    this.animationId = requestAnimationFrame(loop);
  }

  /** Stop the render loop */
  stop(): void {
    if (this.animationId !== null) {
      cancelAnimationFrame(this.animationId);
      this.animationId = null;
    }
  }

  get running(): boolean {
    return this.animationId !== null;
  }

  /** Stop the loop and release GPU resources. Safe to call more than once. */
  destroy(): void {
    if (this.destroyed) return;

    this.stop();
    this.keyTarget?.removeEventListener("keydown", this.onKeyDown);
    this.primitives.destroy();
    this.batch.destroy();
    this.destroyed = true;
  }
}
