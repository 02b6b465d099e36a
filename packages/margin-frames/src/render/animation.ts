/**
 * Animation Assembler
 *
 * Encodes a state's frames, in order, into a looping GIF.
 *
 * @module render/animation
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { GIFEncoder, applyPalette, quantize } from 'gifenc';
import { DEFAULT_FRAME_DURATION_MS } from '../core/constants.js';
import type { Raster } from './raster.js';

/**
 * Frame sink for an animated image format
 */
export interface AnimationEncoder {
  writeFrame(rgba: Uint8ClampedArray, width: number, height: number, delayMs: number): void;
  finish(): Uint8Array;
}

/**
 * Looping GIF encoder; each frame gets its own 256-color palette
 */
export class GifAnimationEncoder implements AnimationEncoder {
  private readonly encoder = GIFEncoder();

  writeFrame(rgba: Uint8ClampedArray, width: number, height: number, delayMs: number): void {
    const palette = quantize(rgba, 256);
    const index = applyPalette(rgba, palette);
    this.encoder.writeFrame(index, width, height, {
      palette,
      delay: delayMs,
      repeat: 0,
    });
  }

  finish(): Uint8Array {
    this.encoder.finish();
    return this.encoder.bytes();
  }
}

export interface AssembleOptions {
  /** Display time of each frame */
  readonly frameDurationMs?: number;
  /** Release frames after encoding, also when encoding fails (default true) */
  readonly releaseFrames?: boolean;
  readonly encoder?: AnimationEncoder;
}

/**
 * Encode frames in input order
 *
 * @returns encoded animation bytes
 */
export function assembleAnimation(
  frames: readonly Raster[],
  options: AssembleOptions = {}
): Uint8Array {
  const encoder = options.encoder ?? new GifAnimationEncoder();
  const delay = options.frameDurationMs ?? DEFAULT_FRAME_DURATION_MS;

  try {
    for (const frame of frames) {
      encoder.writeFrame(frame.pixels(), frame.width, frame.height, delay);
    }
    return encoder.finish();
  } finally {
    if (options.releaseFrames ?? true) {
      for (const frame of frames) {
        frame.release();
      }
    }
  }
}

/**
 * Write animation bytes, creating parent directories
 */
export async function writeAnimation(bytes: Uint8Array, path: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, bytes);
}
