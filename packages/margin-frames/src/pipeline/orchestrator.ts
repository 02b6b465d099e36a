/**
 * Animation Orchestrator
 *
 * Runs the whole batch: loads the table and the boundaries once, then for
 * every configured state renders one frame per year (map + chart +
 * caption) and encodes the frames into `{output}/{state}.gif`.
 *
 * Strictly sequential. Any failure aborts the run; frames already built for
 * the failing state are released before the error propagates.
 *
 * @module pipeline/orchestrator
 */

import { join } from 'node:path';
import type { FeatureCollection } from 'geojson';
import { FONT_FAMILY } from '../core/constants.js';
import type { SubdivisionRow, TextStyle } from '../core/types.js';
import type { MarginFramesConfig } from '../cli/lib/config.js';
import type { CLILogger } from '../cli/lib/logger.js';
import { loadBoundaries } from '../data/boundary-loader.js';
import { loadResultsTable } from '../data/table-loader.js';
import { assembleAnimation, writeAnimation, type AnimationEncoder } from '../render/animation.js';
import { renderResultChart } from '../render/bar-chart.js';
import { composeFrame } from '../render/compositor.js';
import { registerFont } from '../render/fonts.js';
import { renderMap } from '../render/map-renderer.js';
import { type Raster, withRaster, writePng } from '../render/raster.js';
import { extractResultSeries } from '../transform/result-series.js';
import { filterStateRows } from '../transform/state-filter.js';

// ============================================================================
// Types
// ============================================================================

export interface RenderContext {
  readonly config: MarginFramesConfig;
  readonly logger: CLILogger;
  /** Fresh encoder per state; GIF by default */
  readonly createEncoder?: () => AnimationEncoder;
}

/**
 * Inputs shared by every state of a run
 */
export interface RenderInputs {
  readonly rows: readonly SubdivisionRow[];
  readonly boundaries: FeatureCollection;
  readonly fontFamily: string;
}

export interface StateAnimationResult {
  readonly state: string;
  readonly outputPath: string;
  readonly frameCount: number;
  readonly bytes: number;
}

export interface RenderSummary {
  readonly animations: readonly StateAnimationResult[];
  readonly durationMs: number;
}

// ============================================================================
// Frames
// ============================================================================

/**
 * Caption shown on each frame
 */
export function frameCaption(state: string, year: number): string {
  return `${state}, ${year}`;
}

/**
 * Register the configured font, or fall back to the system sans-serif
 */
export function resolveFontFamily(fontPath: string | null): string {
  if (fontPath === null) {
    return 'sans-serif';
  }
  registerFont(fontPath, FONT_FAMILY);
  return FONT_FAMILY;
}

/**
 * Render one frame per configured year for `state`, in year order.
 *
 * Intermediates are written under `{intermediates}/{state}/` when
 * `keepIntermediates` is set.
 */
export async function renderStateFrames(
  config: MarginFramesConfig,
  inputs: RenderInputs,
  state: string,
  logger: CLILogger
): Promise<Raster[]> {
  const stateRows = filterStateRows(
    inputs.rows,
    state,
    config.years,
    config.palette,
    config.thresholds
  );
  const series = extractResultSeries(inputs.rows, state, config.years);
  const captionStyle: TextStyle = {
    fontFamily: inputs.fontFamily,
    size: config.caption.size,
    fill: config.caption.fill,
    position: config.caption.position,
  };
  const keepDir = join(config.paths.intermediates, state);

  const frames: Raster[] = [];
  try {
    for (const [index, year] of config.years.entries()) {
      // Map and chart are released once composed, or when anything before fails
      const map = renderMap(inputs.boundaries, stateRows, year, config.map);
      const frame = await withRaster(map, () =>
        withRaster(
          renderResultChart(series, index, {
            colors: config.chart,
            fontFamily: inputs.fontFamily,
            textSize: config.annotationSize,
          }),
          async (chart) => {
            if (config.keepIntermediates) {
              await writePng(map, join(keepDir, `${year}-map.png`));
              await writePng(chart, join(keepDir, `${year}-chart.png`));
            }
            return composeFrame(
              map,
              chart,
              frameCaption(state, year),
              captionStyle,
              config.frameBackground
            );
          }
        )
      );
      frames.push(frame);

      if (config.keepIntermediates) {
        await writePng(frame, join(keepDir, `${year}.png`));
      }
      logger.debug('Frame rendered', { state, year, width: frame.width, height: frame.height });
    }
  } catch (error) {
    for (const frame of frames) {
      frame.release();
    }
    throw error;
  }

  return frames;
}

// ============================================================================
// Run
// ============================================================================

/**
 * Render, encode and write the animation of one state
 */
export async function renderStateAnimation(
  context: RenderContext,
  inputs: RenderInputs,
  state: string
): Promise<StateAnimationResult> {
  const { config, logger } = context;
  const frames = await renderStateFrames(config, inputs, state, logger);
  const frameCount = frames.length;

  const bytes = assembleAnimation(frames, {
    frameDurationMs: config.frameDurationMs,
    encoder: context.createEncoder?.(),
  });
  const outputPath = join(config.paths.output, `${state}.gif`);
  await writeAnimation(bytes, outputPath);

  return { state, outputPath, frameCount, bytes: bytes.byteLength };
}

/**
 * Run the full batch over every configured state
 */
export async function renderAnimations(context: RenderContext): Promise<RenderSummary> {
  const { config, logger } = context;
  const startTime = Date.now();

  const fontFamily = resolveFontFamily(config.paths.font);
  const boundaries = await loadBoundaries(config.paths.boundaries);
  const rows = await loadResultsTable(config.paths.table);
  logger.info('Inputs loaded', {
    rows: rows.length,
    features: boundaries.features.length,
    states: config.states.length,
    years: config.years.length,
  });

  const inputs: RenderInputs = { rows, boundaries, fontFamily };
  const animations: StateAnimationResult[] = [];
  for (const [index, state] of config.states.entries()) {
    const result = await renderStateAnimation(context, inputs, state);
    animations.push(result);
    logger.info(`${state} done`, { frames: result.frameCount, output: result.outputPath });
    logger.progress({ total: config.states.length, current: index + 1, label: state });
  }

  const durationMs = Date.now() - startTime;
  logger.info(`${(durationMs / 1000).toFixed(2)} seconds`, { duration_ms: durationMs });
  return { animations, durationMs };
}
