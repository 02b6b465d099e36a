/**
 * Frame Compositor
 *
 * Concatenates rasters left to right and draws captions onto frames.
 *
 * @module render/compositor
 */

import { DEFAULT_FRAME_BACKGROUND } from '../core/constants.js';
import type { TextStyle } from '../core/types.js';
import { fontSpec } from './fonts.js';
import { Raster } from './raster.js';

export interface ConcatOptions {
  /** Fill of the area below shorter images */
  readonly background?: string;
  /** Release the input rasters once pasted (default true) */
  readonly release?: boolean;
  readonly label?: string;
}

/**
 * Paste rasters side by side, top-aligned.
 *
 * The result is `(sum of widths) x (max height)`.
 */
export function concatRasters(rasters: readonly Raster[], options: ConcatOptions = {}): Raster {
  const width = rasters.reduce((sum, raster) => sum + raster.width, 0);
  const height = rasters.reduce((max, raster) => Math.max(max, raster.height), 0);
  const combined = Raster.create(
    width,
    height,
    options.label ?? rasters.map((raster) => raster.label).join('+'),
    options.background ?? DEFAULT_FRAME_BACKGROUND
  );

  const ctx = combined.context();
  let offset = 0;
  for (const raster of rasters) {
    ctx.drawImage(raster.surface(), offset, 0);
    offset += raster.width;
  }

  if (options.release ?? true) {
    for (const raster of rasters) {
      raster.release();
    }
  }
  return combined;
}

/**
 * Draw text in place with its top-left corner at `style.position`
 */
export function drawCaption(raster: Raster, text: string, style: TextStyle): Raster {
  const ctx = raster.context();
  ctx.font = fontSpec(style.fontFamily, style.size);
  ctx.fillStyle = style.fill;
  ctx.textAlign = 'left';
  ctx.textBaseline = 'top';
  ctx.fillText(text, style.position.x, style.position.y);
  return raster;
}

/**
 * Map and chart side by side with the caption on top
 */
export function composeFrame(
  map: Raster,
  chart: Raster,
  caption: string,
  style: TextStyle,
  background?: string
): Raster {
  const frame = concatRasters([map, chart], { background, label: caption });
  return drawCaption(frame, caption, style);
}
