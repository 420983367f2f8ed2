/**
 * Quad Batch
 *
 * Collects textured quads for a frame and draws them with as few draw calls
 * as possible. Quads are expanded to vertices on the CPU, uploaded into one
 * dynamic vertex buffer and drawn against a static index buffer; consecutive
 * quads that share a texture go out in a single drawElements call.
 */

import { createProgram } from "../shaders/compile";
import { quadVertexShader, quadFragmentShader } from "../shaders/quad";
import {
  createQuadIndices,
  writeQuadVertices,
  FLOATS_PER_QUAD,
  FLOATS_PER_VERTEX,
} from "./quad";
import type { Mat3 } from "../math/mat3";
import type {
  QuadBatchStats,
  QuadDrawCall,
  QuadSubmitter,
  QuadTexture,
  SortMode,
} from "./types";

// WebGL constants
const GL_ARRAY_BUFFER = 0x8892;
const GL_ELEMENT_ARRAY_BUFFER = 0x8893;
const GL_STATIC_DRAW = 0x88e4;
const GL_DYNAMIC_DRAW = 0x88e8;
const GL_FLOAT = 0x1406;
const GL_UNSIGNED_SHORT = 0x1403;
const GL_TRIANGLES = 0x0004;
const GL_TEXTURE_2D = 0x0de1;
const GL_TEXTURE0 = 0x84c0;
const GL_BLEND = 0x0be2;
const GL_SRC_ALPHA = 0x0302;
const GL_ONE_MINUS_SRC_ALPHA = 0x0303;

/** Largest batch whose vertices are addressable with 16-bit indices */
export const MAX_QUADS_PER_FLUSH = 16384;

export interface QuadBatchOptions {
  /** Quads uploaded per flush (default: 2048) */
  maxQuads?: number;
  /** Draw order of queued quads (default: "deferred") */
  sortMode?: SortMode;
}

const DEFAULT_OPTIONS: Required<QuadBatchOptions> = {
  maxQuads: 2048,
  sortMode: "deferred",
};

/** A run of consecutive quads drawn with one texture */
export interface TextureRun {
  texture: QuadTexture;
  start: number;
  count: number;
}

/**
 * Order quads for drawing. The sort is stable, so quads at equal depth keep
 * their submission order.
 */
export function sortQuads(
  quads: readonly QuadDrawCall[],
  sortMode: SortMode
): QuadDrawCall[] {
  switch (sortMode) {
    case "deferred":
      return quads.slice();
    case "backToFront":
      return quads.slice().sort((a, b) => b.depth - a.depth);
    case "frontToBack":
      return quads.slice().sort((a, b) => a.depth - b.depth);
  }
}

/**
 * Split quads into runs that share a texture handle.
 */
export function groupByTexture(quads: readonly QuadDrawCall[]): TextureRun[] {
  const runs: TextureRun[] = [];
  let current: TextureRun | null = null;

  for (let i = 0; i < quads.length; i++) {
    const texture = quads[i]!.texture;
    if (current && current.texture.handle === texture.handle) {
      current.count++;
    } else {
      current = { texture, start: i, count: 1 };
      runs.push(current);
    }
  }

  return runs;
}

export class QuadBatch implements QuadSubmitter {
  readonly gl: WebGL2RenderingContext;
  readonly maxQuads: number;
  readonly sortMode: SortMode;

  private program: WebGLProgram;
  private vao: WebGLVertexArrayObject;
  private vertexBuffer: WebGLBuffer;
  private indexBuffer: WebGLBuffer;
  private vertexData: Float32Array;

  private uniforms: {
    matrix: WebGLUniformLocation | null;
    texture: WebGLUniformLocation | null;
  };

  private queue: QuadDrawCall[] = [];
  private matrix: Mat3 | null = null;
  private inFrame = false;
  private _destroyed = false;

  private frameStats: QuadBatchStats = { quads: 0, drawCalls: 0, flushes: 0 };
  private lastStats: QuadBatchStats = { quads: 0, drawCalls: 0, flushes: 0 };

  constructor(gl: WebGL2RenderingContext, options: QuadBatchOptions = {}) {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    if (
      !Number.isInteger(opts.maxQuads) ||
      opts.maxQuads < 1 ||
      opts.maxQuads > MAX_QUADS_PER_FLUSH
    ) {
      throw new Error(
        `maxQuads must be an integer between 1 and ${MAX_QUADS_PER_FLUSH}, got ${opts.maxQuads}`
      );
    }

    this.gl = gl;
    this.maxQuads = opts.maxQuads;
    this.sortMode = opts.sortMode;
    this.vertexData = new Float32Array(this.maxQuads * FLOATS_PER_QUAD);

    this.program = createProgram(gl, quadVertexShader, quadFragmentShader);
    this.uniforms = {
      matrix: gl.getUniformLocation(this.program, "u_matrix"),
      texture: gl.getUniformLocation(this.program, "u_texture"),
    };

    const vertexBuffer = gl.createBuffer();
    const indexBuffer = gl.createBuffer();
    const vao = gl.createVertexArray();
    if (!vertexBuffer || !indexBuffer || !vao) {
      throw new Error("Failed to create quad batch buffers");
    }
    this.vertexBuffer = vertexBuffer;
    this.indexBuffer = indexBuffer;
    this.vao = vao;

    this.setupVao();
  }

  private setupVao(): void {
    const gl = this.gl;
    gl.bindVertexArray(this.vao);

    gl.bindBuffer(GL_ARRAY_BUFFER, this.vertexBuffer);
    gl.bufferData(GL_ARRAY_BUFFER, this.vertexData.byteLength, GL_DYNAMIC_DRAW);

    // Stride: 8 floats = 32 bytes (x, y, u, v, r, g, b, a)
    const stride = FLOATS_PER_VERTEX * 4;
    const layout: Array<[name: string, size: number, offset: number]> = [
      ["a_position", 2, 0],
      ["a_texCoord", 2, 8],
      ["a_color", 4, 16],
    ];
    for (const [name, size, offset] of layout) {
      const location = gl.getAttribLocation(this.program, name);
      if (location < 0) continue;
      gl.enableVertexAttribArray(location);
      gl.vertexAttribPointer(location, size, GL_FLOAT, false, stride, offset);
    }

    gl.bindBuffer(GL_ELEMENT_ARRAY_BUFFER, this.indexBuffer);
    gl.bufferData(
      GL_ELEMENT_ARRAY_BUFFER,
      createQuadIndices(this.maxQuads),
      GL_STATIC_DRAW
    );

    gl.bindVertexArray(null);
  }

  /**
   * Begin a new frame. Must be called before any quads are drawn.
   *
   * @param matrix - Screen-to-clip projection, e.g. mat3.projection()
   */
  begin(matrix: Mat3): void {
    if (this._destroyed) {
      throw new Error("Cannot begin destroyed quad batch");
    }
    if (this.inFrame) {
      throw new Error("Already in frame - call end() first");
    }

    this.matrix = matrix;
    this.inFrame = true;
    this.queue = [];
    this.frameStats = { quads: 0, drawCalls: 0, flushes: 0 };
  }

  /** Queue a quad for the current frame. */
  draw(quad: QuadDrawCall): void {
    if (this._destroyed) {
      throw new Error("Cannot draw with destroyed quad batch");
    }
    if (!this.inFrame) {
      throw new Error("Not in frame - call begin() first");
    }

    // Vertices are written at flush time; copy what the caller may reuse
    const [r, g, b, a] = quad.color;
    this.queue.push({
      ...quad,
      color: [r, g, b, a],
      sourceRect: quad.sourceRect && { ...quad.sourceRect },
    });
    this.frameStats.quads++;

    // Sorted modes need the whole frame before anything is drawn
    if (this.sortMode === "deferred" && this.queue.length >= this.maxQuads) {
      this.flush();
    }
  }

  /**
   * End the frame and draw everything still queued.
   */
  end(): void {
    if (!this.inFrame) {
      throw new Error("Not in frame - call begin() first");
    }

    this.flush();
    this.inFrame = false;
    this.matrix = null;
    this.lastStats = this.frameStats;
  }

  private flush(): void {
    if (this.queue.length === 0 || !this.matrix) return;

    const gl = this.gl;
    const quads = sortQuads(this.queue, this.sortMode);
    this.queue = [];

    gl.useProgram(this.program);
    gl.uniformMatrix3fv(this.uniforms.matrix, false, this.matrix);
    gl.uniform1i(this.uniforms.texture, 0);
    gl.activeTexture(GL_TEXTURE0);

    gl.enable(GL_BLEND);
    gl.blendFunc(GL_SRC_ALPHA, GL_ONE_MINUS_SRC_ALPHA);

    gl.bindVertexArray(this.vao);
    gl.bindBuffer(GL_ARRAY_BUFFER, this.vertexBuffer);

    for (let first = 0; first < quads.length; first += this.maxQuads) {
      const chunk = quads.slice(first, first + this.maxQuads);

      let offset = 0;
      for (const quad of chunk) {
        offset = writeQuadVertices(quad, this.vertexData, offset);
      }
      gl.bufferSubData(GL_ARRAY_BUFFER, 0, this.vertexData.subarray(0, offset));

      for (const run of groupByTexture(chunk)) {
        gl.bindTexture(GL_TEXTURE_2D, run.texture.handle);
        // 6 indices per quad, 2 bytes per index
        gl.drawElements(GL_TRIANGLES, run.count * 6, GL_UNSIGNED_SHORT, run.start * 12);
        this.frameStats.drawCalls++;
      }
      this.frameStats.flushes++;
    }

    gl.bindVertexArray(null);
    gl.bindTexture(GL_TEXTURE_2D, null);
    gl.disable(GL_BLEND);
  }

  /** Counters for the last completed frame */
  getStats(): QuadBatchStats {
    return { ...this.lastStats };
  }

  /**
   * Clean up GPU resources. Safe to call more than once.
   */
  destroy(): void {
    if (this._destroyed) return;

    const gl = this.gl;
    gl.deleteProgram(this.program);
    gl.deleteVertexArray(this.vao);
    gl.deleteBuffer(this.vertexBuffer);
    gl.deleteBuffer(this.indexBuffer);

    this.queue = [];
    this.inFrame = false;
    this.matrix = null;
    this._destroyed = true;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }
}
