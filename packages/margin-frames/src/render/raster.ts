/**
 * In-memory raster handles
 *
 * Pipeline stages hand images to each other as `Raster` handles instead of
 * files. A stage that consumes a raster releases it; any later access throws.
 * Persisting to disk is opt-in (`writePng`).
 *
 * @module render/raster
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { createCanvas, type Canvas, type SKRSContext2D } from '@napi-rs/canvas';
import { RasterReleasedError } from '../core/errors.js';

/**
 * Owned image buffer
 */
export class Raster {
  private canvas: Canvas | null;

  constructor(
    canvas: Canvas,
    public readonly label: string
  ) {
    this.canvas = canvas;
  }

  /**
   * Allocate a blank raster, optionally filled with a background color
   */
  static create(width: number, height: number, label: string, background?: string): Raster {
    const canvas = createCanvas(width, height);
    if (background !== undefined) {
      const ctx = canvas.getContext('2d');
      ctx.fillStyle = background;
      ctx.fillRect(0, 0, width, height);
    }
    return new Raster(canvas, label);
  }

  get released(): boolean {
    return this.canvas === null;
  }

  get width(): number {
    return this.surface().width;
  }

  get height(): number {
    return this.surface().height;
  }

  /**
   * Underlying canvas
   *
   * @throws RasterReleasedError after release
   */
  surface(): Canvas {
    if (this.canvas === null) {
      throw new RasterReleasedError(this.label);
    }
    return this.canvas;
  }

  context(): SKRSContext2D {
    return this.surface().getContext('2d');
  }

  /**
   * RGBA pixels of the whole image
   */
  pixels(): Uint8ClampedArray {
    const canvas = this.surface();
    return this.context().getImageData(0, 0, canvas.width, canvas.height).data;
  }

  encodePng(): Buffer {
    return this.surface().toBuffer('image/png');
  }

  /**
   * Drop the buffer. Idempotent.
   */
  release(): void {
    this.canvas = null;
  }
}

/**
 * Run `fn` with a raster and release it afterwards, also on failure
 */
export async function withRaster<T>(
  raster: Raster,
  fn: (raster: Raster) => T | Promise<T>
): Promise<T> {
  try {
    return await fn(raster);
  } finally {
    raster.release();
  }
}

/**
 * Write a raster to disk as PNG, creating parent directories
 */
export async function writePng(raster: Raster, path: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, raster.encodePng());
}
