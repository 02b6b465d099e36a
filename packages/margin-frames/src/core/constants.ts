/**
 * Default palette, bands and view settings
 *
 * @module core/constants
 */

import type {
  ChartColors,
  ElectionYear,
  MapView,
  Palette,
  TextStyle,
  ThresholdBands,
} from './types.js';

export const DEFAULT_PALETTE: Palette = {
  sideA: ['#86B6F2', '#4389E3', '#1666CB', '#0645B4', '#002B84'],
  sideB: ['#E27F90', '#CC2F4A', '#D40000', '#AA0000', '#800000'],
  neutral: '#D6D6D6',
};

export const DEFAULT_THRESHOLDS: ThresholdBands = [50, 60, 70, 80, 90, 100];

/**
 * 2000 through 2020, one general election every four years
 */
export const DEFAULT_YEARS: readonly ElectionYear[] = [2000, 2004, 2008, 2012, 2016, 2020];

export const DEFAULT_STATES: readonly string[] = [
  'El Norte',
  'Gulfland',
  'New Texas',
  'Plainland',
  'Trinity',
];

export const DEFAULT_CHART_COLORS: ChartColors = {
  sideAAccent: '#4389E3',
  sideBAccent: '#CC2F4A',
  sideAMuted: '#CBCFDC',
  sideBMuted: '#DEB3B3',
  label: '#000000',
  background: '#FFFFFF',
};

export const DEFAULT_MAP_VIEW: MapView = {
  width: 1200,
  height: 1200,
  center: [-99.7707, 31.3915],
  zoom: 5.75,
  background: '#FFFFFF',
  borderColor: '#FFFFFF',
  borderWidth: 2,
  featureIdProperty: null,
};

/**
 * Family alias under which the configured font file is registered
 */
export const FONT_FAMILY = 'MarginFramesSans';

export const DEFAULT_CAPTION_STYLE: TextStyle = {
  fontFamily: FONT_FAMILY,
  size: 40,
  fill: '#000000',
  position: { x: 1100, y: 50 },
};

export const DEFAULT_ANNOTATION_SIZE = 17;

export const DEFAULT_FRAME_DURATION_MS = 1000;

/**
 * Fresh RGB canvases start black
 */
export const DEFAULT_FRAME_BACKGROUND = '#000000';
