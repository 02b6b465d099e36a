/**
 * Margin Classification
 *
 * Turns a signed margin into a ramp color and greys out subdivisions that
 * belong to a state other than the highlighted one.
 *
 * Both functions are pure: palette and bands are passed in, never read
 * from module state.
 */

import { ClassificationError } from '../core/errors.js';
import type { Palette, ThresholdBands } from '../core/types.js';

/**
 * Classify a margin into one of the palette's ramp colors.
 *
 * The side-A ramp is used for negative margins, side B otherwise. The ramp
 * index is the band `(thresholds[i], thresholds[i + 1]]` containing
 * `|value|`; magnitudes beyond the last threshold take the last color.
 *
 * @throws ClassificationError when `|value|` is at or below the first
 *   threshold and the palette has no toss-up color, or when value is not finite
 *
 * @example
 * ```typescript
 * classifyMargin(51.3, DEFAULT_PALETTE, DEFAULT_THRESHOLDS);  // '#E27F90'
 * classifyMargin(-65.7, DEFAULT_PALETTE, DEFAULT_THRESHOLDS); // '#4389E3'
 * ```
 */
export function classifyMargin(
  value: number,
  palette: Palette,
  thresholds: ThresholdBands
): string {
  if (!Number.isFinite(value)) {
    throw new ClassificationError(value);
  }

  const ramp = value < 0 ? palette.sideA : palette.sideB;
  const magnitude = Math.abs(value);

  for (let i = 0; i < thresholds.length - 1; i++) {
    if (thresholds[i] < magnitude && magnitude <= thresholds[i + 1]) {
      return ramp[i];
    }
  }

  if (magnitude > thresholds[thresholds.length - 1]) {
    return ramp[ramp.length - 1];
  }

  if (palette.tossup !== undefined) {
    return palette.tossup;
  }
  throw new ClassificationError(value);
}

/**
 * Keep `color` for subdivisions of the highlighted state, grey out the rest
 */
export function highlightRegion(
  owner: string,
  color: string,
  highlighted: string,
  neutral: string
): string {
  return owner === highlighted ? color : neutral;
}
