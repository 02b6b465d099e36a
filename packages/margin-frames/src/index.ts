/**
 * Margin Frames - Animated election margin maps
 *
 * margin-frames provides:
 * - Results table and boundary loading with schema validation
 * - Margin classification into side color ramps
 * - Choropleth map and stacked bar chart rendering
 * - Frame composition and GIF animation assembly
 *
 * @packageDocumentation
 */

// Domain types
export type {
    ElectionYear,
    SubdivisionRow,
    ColoredRow,
    ColorRamp,
    Palette,
    ThresholdBands,
    StateResultSeries,
    Point,
    TextStyle,
    ChartColors,
    MapView,
} from './core/types.js';

// Defaults
export {
    DEFAULT_PALETTE,
    DEFAULT_THRESHOLDS,
    DEFAULT_YEARS,
    DEFAULT_STATES,
    DEFAULT_CHART_COLORS,
    DEFAULT_MAP_VIEW,
    DEFAULT_CAPTION_STYLE,
    DEFAULT_ANNOTATION_SIZE,
    DEFAULT_FRAME_DURATION_MS,
    DEFAULT_FRAME_BACKGROUND,
    FONT_FAMILY,
} from './core/constants.js';

// Errors
export {
    MarginFramesError,
    InputMissingError,
    SchemaMismatchError,
    ClassificationError,
    IndexOutOfRangeError,
    RasterReleasedError,
    ConfigError,
    isMarginFramesError,
    formatError,
    type MarginFramesErrorKind,
} from './core/errors.js';

// Inputs
export { parseResultsTable, loadResultsTable } from './data/table-loader.js';
export {
    isBoundaryCollection,
    validateBoundaries,
    loadBoundaries,
    featureKey,
    indexFeatures,
} from './data/boundary-loader.js';

// Transforms
export { classifyMargin, highlightRegion } from './transform/classify.js';
export { isDrawnForState, filterStateRows } from './transform/state-filter.js';
export { splitMargin, findAggregateRow, extractResultSeries } from './transform/result-series.js';

// Rendering
export { Raster, withRaster, writePng } from './render/raster.js';
export { registerFont, fontSpec } from './render/fonts.js';
export { boundaryCenter, createProjection, renderMap } from './render/map-renderer.js';
export {
    DEFAULT_CHART_FIGURE,
    pointsToPixels,
    layoutBarChart,
    segmentColors,
    formatShare,
    shareAnnotation,
    drawBarChart,
    drawYearLabels,
    annotateSegment,
    renderResultChart,
    type ChartFigure,
    type ChartLayout,
    type ChartSegment,
    type ChartLabel,
    type ChartSide,
    type ChartTextStyle,
    type Rect,
    type ResultChartOptions,
} from './render/bar-chart.js';
export { concatRasters, drawCaption, composeFrame, type ConcatOptions } from './render/compositor.js';
export {
    GifAnimationEncoder,
    assembleAnimation,
    writeAnimation,
    type AnimationEncoder,
    type AssembleOptions,
} from './render/animation.js';

// Pipeline
export {
    frameCaption,
    resolveFontFamily,
    renderStateFrames,
    renderStateAnimation,
    renderAnimations,
    type RenderContext,
    type RenderInputs,
    type StateAnimationResult,
    type RenderSummary,
} from './pipeline/orchestrator.js';

// Configuration and logging
export {
    loadConfig,
    DEFAULT_CONFIG,
    type MarginFramesConfig,
    type LoadConfigOptions,
} from './cli/lib/config.js';
export { CLILogger, createCLILogger, createQuietLogger } from './cli/lib/logger.js';
