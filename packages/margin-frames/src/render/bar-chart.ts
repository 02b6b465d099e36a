/**
 * Stacked Result Bar Chart
 *
 * One horizontal bar per year, split into a side-A segment starting at 0
 * and a side-B segment starting where side A ends. One year is highlighted
 * in accent colors and annotated with both shares; every other segment is
 * muted.
 *
 * GEOMETRY (figure 12in x 12in at 100 dpi):
 * - plot area at left/right/bottom/top fractions 0.125/0.9/0.11/0.88
 * - bars 0.8 category-units tall, zero axis margins
 * - first year at the top, year labels to the right of the plot
 * - no spines, no ticks, no x labels
 *
 * Segment index = side * years + yearIndex: 0 is the side-A segment of the
 * first year, 2 * years - 1 the side-B segment of the last.
 *
 * @module render/bar-chart
 */

import { IndexOutOfRangeError } from '../core/errors.js';
import type { ChartColors, StateResultSeries } from '../core/types.js';
import { fontSpec } from './fonts.js';
import { Raster } from './raster.js';

// ============================================================================
// Types
// ============================================================================

export interface ChartFigure {
  /** Inches */
  readonly widthIn: number;
  readonly heightIn: number;
  readonly dpi: number;
  /** Plot area as figure fractions, bottom/top measured from the bottom edge */
  readonly left: number;
  readonly right: number;
  readonly bottom: number;
  readonly top: number;
  /** Bar thickness in category units */
  readonly barHeight: number;
}

export interface Rect {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

export type ChartSide = 'A' | 'B';

export interface ChartSegment extends Rect {
  readonly index: number;
  readonly side: ChartSide;
  readonly yearIndex: number;
  readonly value: number;
}

export interface ChartLabel {
  readonly text: string;
  readonly x: number;
  readonly y: number;
}

export interface ChartLayout {
  readonly width: number;
  readonly height: number;
  readonly dpi: number;
  readonly plot: Rect;
  readonly segments: readonly ChartSegment[];
  readonly labels: readonly ChartLabel[];
}

export interface ChartTextStyle {
  readonly fontFamily: string;
  /** Points */
  readonly size: number;
  readonly fill: string;
}

export interface ResultChartOptions {
  readonly colors: ChartColors;
  readonly fontFamily: string;
  /** Points, for both year labels and annotations */
  readonly textSize: number;
  readonly figure?: ChartFigure;
}

export const DEFAULT_CHART_FIGURE: ChartFigure = {
  widthIn: 12,
  heightIn: 12,
  dpi: 100,
  left: 0.125,
  right: 0.9,
  bottom: 0.11,
  top: 0.88,
  barHeight: 0.8,
};

/** Tick label padding in points */
const LABEL_PAD_PT = 3.5;

// ============================================================================
// Layout
// ============================================================================

/**
 * Points to pixels at the figure resolution
 */
export function pointsToPixels(points: number, dpi: number): number {
  return (points * dpi) / 72;
}

/**
 * Compute pixel geometry of every segment and year label
 */
export function layoutBarChart(
  series: StateResultSeries,
  figure: ChartFigure = DEFAULT_CHART_FIGURE
): ChartLayout {
  const width = Math.round(figure.widthIn * figure.dpi);
  const height = Math.round(figure.heightIn * figure.dpi);
  const plot: Rect = {
    x: figure.left * width,
    y: (1 - figure.top) * height,
    width: (figure.right - figure.left) * width,
    height: (figure.top - figure.bottom) * height,
  };

  const count = series.years.length;
  const halfBar = figure.barHeight / 2;
  // Zero margins: x spans exactly the widest stacked bar, y the bar extent
  const xMax = Math.max(...series.sideA.map((a, i) => a + (series.sideB[i] ?? 0)));
  const ySpan = count - 1 + figure.barHeight;
  const xScale = xMax > 0 ? plot.width / xMax : 0;
  const yScale = plot.height / ySpan;
  // Inverted axis: category 0 sits at the top
  const yOf = (value: number): number => plot.y + (value + halfBar) * yScale;

  const segments: ChartSegment[] = [];
  const sides: readonly [ChartSide, readonly number[]][] = [
    ['A', series.sideA],
    ['B', series.sideB],
  ];
  sides.forEach(([side, values], sideIndex) => {
    for (let i = 0; i < count; i++) {
      const value = values[i] ?? 0;
      const left = sideIndex === 0 ? 0 : series.sideA[i] ?? 0;
      segments.push({
        index: sideIndex * count + i,
        side,
        yearIndex: i,
        value,
        x: plot.x + left * xScale,
        y: yOf(i - halfBar),
        width: value * xScale,
        height: figure.barHeight * yScale,
      });
    }
  });

  const labelX = plot.x + plot.width + pointsToPixels(LABEL_PAD_PT, figure.dpi);
  const labels = series.years.map((year, i) => ({ text: String(year), x: labelX, y: yOf(i) }));

  return { width, height, dpi: figure.dpi, plot, segments, labels };
}

/**
 * Per-segment colors: accent for `rowIndex`, muted elsewhere
 *
 * @throws IndexOutOfRangeError if rowIndex is not a year index
 */
export function segmentColors(count: number, rowIndex: number, colors: ChartColors): string[] {
  if (!Number.isInteger(rowIndex) || rowIndex < 0 || rowIndex >= count) {
    throw new IndexOutOfRangeError(rowIndex, count, 'Chart row');
  }
  const sideA = Array.from({ length: count }, (_, i) =>
    i === rowIndex ? colors.sideAAccent : colors.sideAMuted
  );
  const sideB = Array.from({ length: count }, (_, i) =>
    i === rowIndex ? colors.sideBAccent : colors.sideBMuted
  );
  return [...sideA, ...sideB];
}

/**
 * Share rounded to two decimals, keeping at least one: 34.29999 -> "34.3%",
 * 50 -> "50.0%"
 */
export function formatShare(value: number): string {
  const rounded = Math.round(value * 100) / 100;
  return `${Number.isInteger(rounded) ? rounded.toFixed(1) : String(rounded)}%`;
}

/**
 * Segment annotation: the share, led by three spaces that nudge it right of center
 */
export function shareAnnotation(value: number): string {
  return `   ${formatShare(value)}`;
}

// ============================================================================
// Drawing
// ============================================================================

/**
 * Fill every segment with its color
 */
export function drawBarChart(
  raster: Raster,
  layout: ChartLayout,
  colors: readonly string[]
): Raster {
  const ctx = raster.context();
  for (const segment of layout.segments) {
    ctx.fillStyle = colors[segment.index] ?? '#000000';
    ctx.fillRect(segment.x, segment.y, segment.width, segment.height);
  }
  return raster;
}

/**
 * Draw year labels to the right of the plot area
 */
export function drawYearLabels(raster: Raster, layout: ChartLayout, style: ChartTextStyle): Raster {
  const ctx = raster.context();
  ctx.font = fontSpec(style.fontFamily, pointsToPixels(style.size, layout.dpi));
  ctx.fillStyle = style.fill;
  ctx.textAlign = 'left';
  ctx.textBaseline = 'middle';
  for (const label of layout.labels) {
    ctx.fillText(label.text, label.x, label.y);
  }
  return raster;
}

/**
 * Center `text` on a segment
 *
 * @throws IndexOutOfRangeError if the segment does not exist
 */
export function annotateSegment(
  raster: Raster,
  layout: ChartLayout,
  segmentIndex: number,
  text: string,
  style: ChartTextStyle
): Raster {
  const segment = layout.segments[segmentIndex];
  if (segment === undefined) {
    throw new IndexOutOfRangeError(segmentIndex, layout.segments.length, 'Chart segment');
  }

  const ctx = raster.context();
  ctx.font = fontSpec(style.fontFamily, pointsToPixels(style.size, layout.dpi));
  ctx.fillStyle = style.fill;
  ctx.textAlign = 'center';
  ctx.textBaseline = 'middle';
  ctx.fillText(text, segment.x + segment.width / 2, segment.y + segment.height / 2);
  return raster;
}

/**
 * Render the full result chart with year `rowIndex` highlighted.
 *
 * Every call draws on a fresh raster.
 *
 * @throws IndexOutOfRangeError if rowIndex is not a year index
 */
export function renderResultChart(
  series: StateResultSeries,
  rowIndex: number,
  options: ResultChartOptions
): Raster {
  const count = series.years.length;
  const colors = segmentColors(count, rowIndex, options.colors);
  const layout = layoutBarChart(series, options.figure);
  const style: ChartTextStyle = {
    fontFamily: options.fontFamily,
    size: options.textSize,
    fill: options.colors.label,
  };

  const raster = Raster.create(
    layout.width,
    layout.height,
    `chart-${series.state}-${series.years[rowIndex] ?? rowIndex}`,
    options.colors.background
  );
  drawBarChart(raster, layout, colors);
  drawYearLabels(raster, layout, style);
  annotateSegment(raster, layout, rowIndex, shareAnnotation(series.sideA[rowIndex] ?? 0), style);
  annotateSegment(
    raster,
    layout,
    rowIndex + count,
    shareAnnotation(series.sideB[rowIndex] ?? 0),
    style
  );
  return raster;
}
