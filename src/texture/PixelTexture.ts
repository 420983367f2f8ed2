/**
 * Single opaque white texel, stretched and tinted to draw lines
 */

import type { QuadTexture } from "../batch/types";

// WebGL constants (avoid referencing WebGL2RenderingContext at module load time for testing)
const GL_TEXTURE_2D = 0x0de1;
const GL_RGBA = 0x1908;
const GL_UNSIGNED_BYTE = 0x1401;
const GL_TEXTURE_WRAP_S = 0x2802;
const GL_TEXTURE_WRAP_T = 0x2803;
const GL_TEXTURE_MIN_FILTER = 0x2801;
const GL_TEXTURE_MAG_FILTER = 0x2800;
const GL_CLAMP_TO_EDGE = 0x812f;
const GL_NEAREST = 0x2600;

const WHITE = new Uint8Array([255, 255, 255, 255]);

export class PixelTexture implements QuadTexture {
  readonly gl: WebGL2RenderingContext;
  readonly handle: WebGLTexture;
  readonly width = 1;
  readonly height = 1;

  private _destroyed = false;

  constructor(gl: WebGL2RenderingContext) {
    this.gl = gl;

    const handle = gl.createTexture();
    if (!handle) {
      throw new Error("Failed to create pixel texture");
    }
    this.handle = handle;

    gl.bindTexture(GL_TEXTURE_2D, handle);
    gl.texImage2D(GL_TEXTURE_2D, 0, GL_RGBA, 1, 1, 0, GL_RGBA, GL_UNSIGNED_BYTE, WHITE);
    gl.texParameteri(GL_TEXTURE_2D, GL_TEXTURE_WRAP_S, GL_CLAMP_TO_EDGE);
    gl.texParameteri(GL_TEXTURE_2D, GL_TEXTURE_WRAP_T, GL_CLAMP_TO_EDGE);
    gl.texParameteri(GL_TEXTURE_2D, GL_TEXTURE_MIN_FILTER, GL_NEAREST);
    gl.texParameteri(GL_TEXTURE_2D, GL_TEXTURE_MAG_FILTER, GL_NEAREST);
    gl.bindTexture(GL_TEXTURE_2D, null);
  }

  /** Delete the texture. Safe to call more than once. */
  destroy(): void {
    if (this._destroyed) return;
    this.gl.deleteTexture(this.handle);
    this._destroyed = true;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }
}
