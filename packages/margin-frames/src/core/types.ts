/**
 * Margin Frames Core Types
 *
 * Shared data model for the transform layer (table rows, palettes,
 * threshold bands, result series) and the render layer options.
 *
 * @module core/types
 */

// ============================================================================
// Table Rows
// ============================================================================

/**
 * Election year label (e.g. 2000, 2004, ...)
 */
export type ElectionYear = number;

/**
 * One row of the source results table.
 *
 * Margins are signed percentages: negative favors side A,
 * positive favors side B.
 */
export interface SubdivisionRow {
  /** Subdivision identifier (or the state name on an aggregate row) */
  readonly unit: string;
  /** Owning state name */
  readonly state: string;
  /** True on the state-level aggregate row */
  readonly isState: boolean;
  /** Map-join key, matched against boundary feature identifiers */
  readonly code: string;
  /** Margin per election year */
  readonly margins: ReadonlyMap<ElectionYear, number>;
}

/**
 * A row after classification and highlighting: one color per year.
 */
export interface ColoredRow {
  readonly unit: string;
  readonly state: string;
  readonly isState: boolean;
  readonly code: string;
  readonly colors: ReadonlyMap<ElectionYear, string>;
}

// ============================================================================
// Classification
// ============================================================================

/**
 * Five-step color ramp, ordered from the weakest band to the strongest
 */
export type ColorRamp = readonly [string, string, string, string, string];

/**
 * Immutable palette used by the classifier and the highlighter.
 */
export interface Palette {
  readonly sideA: ColorRamp;
  readonly sideB: ColorRamp;
  /** Color of subdivisions outside the highlighted state */
  readonly neutral: string;
  /**
   * Color for margins at or below the lowest threshold.
   * When absent, such margins are a classification error.
   */
  readonly tossup?: string;
}

/**
 * Six increasing magnitude boundaries defining five `(low, high]` bands
 */
export type ThresholdBands = readonly [number, number, number, number, number, number];

// ============================================================================
// Result Series
// ============================================================================

/**
 * Per-side percentage series for one state, one entry per year.
 *
 * INVARIANT: sideA[i] + sideB[i] === 100 (up to float rounding)
 */
export interface StateResultSeries {
  readonly state: string;
  readonly years: readonly ElectionYear[];
  readonly sideA: readonly number[];
  readonly sideB: readonly number[];
}

// ============================================================================
// Rendering
// ============================================================================

/**
 * Screen position in pixels, origin top-left
 */
export interface Point {
  readonly x: number;
  readonly y: number;
}

/**
 * Text drawing options. Only what the frames actually use.
 */
export interface TextStyle {
  readonly fontFamily: string;
  readonly size: number;
  readonly fill: string;
  /** Top-left corner of the text box */
  readonly position: Point;
}

/**
 * Accent and muted colors of the result chart
 */
export interface ChartColors {
  readonly sideAAccent: string;
  readonly sideBAccent: string;
  readonly sideAMuted: string;
  readonly sideBMuted: string;
  readonly label: string;
  readonly background: string;
}

/**
 * Fixed map view: Web Mercator centred on `center` at a 512-px-tile zoom
 */
export interface MapView {
  readonly width: number;
  readonly height: number;
  /** [longitude, latitude]; bbox centre of the boundaries when null */
  readonly center: readonly [number, number] | null;
  readonly zoom: number;
  readonly background: string;
  readonly borderColor: string;
  readonly borderWidth: number;
  /** Feature property holding the join key; feature `id` when null */
  readonly featureIdProperty: string | null;
}
