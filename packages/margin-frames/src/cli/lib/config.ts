/**
 * Margin Frames Configuration Management
 *
 * Loads configuration from .margin-framesrc (YAML or JSON) with environment
 * variable overrides and defaults. Palette, bands and view settings end up
 * in one immutable value handed to the pipeline.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (MARGIN_FRAMES_*)
 * 3. Config file (.margin-framesrc or --config path)
 * 4. Default values
 *
 * Relative paths from the config file resolve against the file's directory;
 * all others against the working directory.
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
  DEFAULT_ANNOTATION_SIZE,
  DEFAULT_CAPTION_STYLE,
  DEFAULT_CHART_COLORS,
  DEFAULT_FRAME_BACKGROUND,
  DEFAULT_FRAME_DURATION_MS,
  DEFAULT_MAP_VIEW,
  DEFAULT_PALETTE,
  DEFAULT_STATES,
  DEFAULT_THRESHOLDS,
  DEFAULT_YEARS,
} from '../../core/constants.js';
import { ConfigError } from '../../core/errors.js';
import type {
  ChartColors,
  ElectionYear,
  MapView,
  Palette,
  Point,
  ThresholdBands,
} from '../../core/types.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Paths configuration
 */
export interface PathsConfig {
  /** Results table (CSV) */
  readonly table: string;
  /** Boundary collection (GeoJSON) */
  readonly boundaries: string;
  /** Directory receiving `{state}.gif` */
  readonly output: string;
  /** Directory receiving map/chart/frame PNGs when kept */
  readonly intermediates: string;
  /** TrueType font for caption and annotations; system sans-serif when null */
  readonly font: string | null;
}

/**
 * Caption placement and look; the font family comes from `paths.font`
 */
export interface CaptionConfig {
  readonly position: Point;
  readonly size: number;
  readonly fill: string;
}

/**
 * Full configuration
 */
export interface MarginFramesConfig {
  readonly version: number;
  readonly paths: PathsConfig;
  readonly states: readonly string[];
  readonly years: readonly ElectionYear[];
  readonly palette: Palette;
  readonly thresholds: ThresholdBands;
  readonly chart: ChartColors;
  readonly map: MapView;
  readonly caption: CaptionConfig;
  /** Chart label and annotation size in points */
  readonly annotationSize: number;
  readonly frameDurationMs: number;
  readonly frameBackground: string;
  readonly keepIntermediates: boolean;

  // Runtime overrides (from CLI flags)
  /** Enable verbose output */
  readonly verbose: boolean;
  /** Output as JSON */
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

// ============================================================================
// Config File Schema
// ============================================================================

const HexColorSchema = z
  .string()
  .regex(/^#[0-9a-fA-F]{6}$/, 'expected a #RRGGBB color');

const RampSchema = z.tuple([
  HexColorSchema,
  HexColorSchema,
  HexColorSchema,
  HexColorSchema,
  HexColorSchema,
]);

const ThresholdSchema = z
  .tuple([z.number(), z.number(), z.number(), z.number(), z.number(), z.number()])
  .refine(
    (bands) => bands.every((band, i) => i === 0 || band > (bands[i - 1] ?? band)),
    'thresholds must be strictly increasing'
  );

/**
 * The only config file layout this release reads
 */
export const CONFIG_VERSION = 1;

const ConfigFileSchema = z
  .object({
    version: z
      .number()
      .refine(
        (version) => version === CONFIG_VERSION,
        (version) => ({ message: `Unsupported config version: ${version}. Expected ${CONFIG_VERSION}.` })
      ),
    paths: z
      .object({
        table: z.string().min(1),
        boundaries: z.string().min(1),
        output: z.string().min(1),
        intermediates: z.string().min(1),
        font: z.string().min(1).nullable(),
      })
      .partial()
      .strict(),
    states: z.array(z.string().min(1)).min(1),
    years: z.array(z.number().int()).min(1),
    thresholds: ThresholdSchema,
    palette: z
      .object({
        sideA: RampSchema,
        sideB: RampSchema,
        neutral: HexColorSchema,
        tossup: HexColorSchema,
      })
      .partial()
      .strict(),
    chart: z
      .object({
        sideAAccent: HexColorSchema,
        sideBAccent: HexColorSchema,
        sideAMuted: HexColorSchema,
        sideBMuted: HexColorSchema,
        label: HexColorSchema,
        background: HexColorSchema,
      })
      .partial()
      .strict(),
    map: z
      .object({
        width: z.number().int().positive(),
        height: z.number().int().positive(),
        center: z
          .object({ lat: z.number().min(-90).max(90), lon: z.number().min(-180).max(180) })
          .nullable(),
        zoom: z.number().min(0).max(22),
        background: HexColorSchema,
        borderColor: HexColorSchema,
        borderWidth: z.number().min(0),
        featureIdProperty: z.string().min(1).nullable(),
      })
      .partial()
      .strict(),
    caption: z
      .object({
        x: z.number(),
        y: z.number(),
        size: z.number().positive(),
        fill: HexColorSchema,
      })
      .partial()
      .strict(),
    annotationSize: z.number().positive(),
    frameDurationMs: z.number().int().positive(),
    frameBackground: HexColorSchema,
    keepIntermediates: z.boolean(),
  })
  .partial()
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: Omit<MarginFramesConfig, 'verbose' | 'json' | 'configPath'> = {
  version: CONFIG_VERSION,

  paths: {
    table: './data/results.csv',
    boundaries: './data/boundaries.geojson',
    output: './output',
    intermediates: './output/frames',
    font: null,
  },

  states: DEFAULT_STATES,
  years: DEFAULT_YEARS,
  palette: DEFAULT_PALETTE,
  thresholds: DEFAULT_THRESHOLDS,
  chart: DEFAULT_CHART_COLORS,
  map: DEFAULT_MAP_VIEW,
  caption: {
    position: DEFAULT_CAPTION_STYLE.position,
    size: DEFAULT_CAPTION_STYLE.size,
    fill: DEFAULT_CAPTION_STYLE.fill,
  },
  annotationSize: DEFAULT_ANNOTATION_SIZE,
  frameDurationMs: DEFAULT_FRAME_DURATION_MS,
  frameBackground: DEFAULT_FRAME_BACKGROUND,
  keepIntermediates: false,
};

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
const CONFIG_FILE_NAMES = [
  '.margin-framesrc',
  '.margin-framesrc.yaml',
  '.margin-framesrc.yml',
  '.margin-framesrc.json',
];

const ENV_PREFIX = 'MARGIN_FRAMES_';

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Find config file in the start directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * Parse and validate config file content
 *
 * @throws ConfigError on unreadable YAML or schema violations
 */
export function parseConfigFile(filePath: string): ConfigFile {
  let raw: unknown;
  try {
    // YAML parser also handles plain JSON
    raw = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      `Cannot read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  // An empty file parses to null
  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(
      `Invalid config file ${filePath}`,
      result.error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Numeric environment variable
 *
 * @throws ConfigError when set but not a positive integer
 */
function getEnvNumber(env: Env, name: string): number | undefined {
  const value = env[`${ENV_PREFIX}${name}`];
  if (value === undefined) return undefined;
  const num = parseInt(value, 10);
  if (isNaN(num) || num <= 0) {
    throw new ConfigError(`${ENV_PREFIX}${name} must be a positive integer, got "${value}"`);
  }
  return num;
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory to start the config search from (default: cwd) */
  cwd?: string;
  /** Environment (default: process.env) */
  env?: Env;
  /** CLI flag overrides */
  overrides?: {
    verbose?: boolean;
    json?: boolean;
    states?: readonly string[];
    output?: string;
    keepIntermediates?: boolean;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigError if an explicit config file is missing or any layer is invalid
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<MarginFramesConfig> {
  const cwd = resolve(options.cwd ?? process.cwd());
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};

  // Find config file
  let configPath: string | null = null;
  const explicitPath = options.configPath ?? env[`${ENV_PREFIX}CONFIG`];
  if (explicitPath) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
  } else {
    configPath = findConfigFile(cwd);
  }
  const file: ConfigFile = configPath ? parseConfigFile(configPath) : {};
  const fileDir = configPath ? dirname(configPath) : cwd;

  const fromFile = (path: string | undefined): string | undefined =>
    path === undefined ? undefined : resolve(fileDir, path);
  const fromCwd = (path: string | undefined): string | undefined =>
    path === undefined ? undefined : resolve(cwd, path);

  const fontFromEnv = env[`${ENV_PREFIX}FONT`];
  const fileFont = file.paths?.font;
  const font =
    fontFromEnv !== undefined
      ? resolve(cwd, fontFromEnv)
      : fileFont === undefined
        ? DEFAULT_CONFIG.paths.font
        : fileFont === null
          ? null
          : resolve(fileDir, fileFont);

  const fileCenter = file.map?.center;
  const center: MapView['center'] =
    fileCenter === undefined
      ? DEFAULT_CONFIG.map.center
      : fileCenter === null
        ? null
        : [fileCenter.lon, fileCenter.lat];

  const fileIdProperty = file.map?.featureIdProperty;
  const fileCaption = file.caption ?? {};
  const palette: Palette = { ...DEFAULT_CONFIG.palette, ...file.palette };

  // Merge configuration layers
  return {
    version: file.version ?? DEFAULT_CONFIG.version,

    paths: {
      table:
        fromCwd(env[`${ENV_PREFIX}TABLE`]) ??
        fromFile(file.paths?.table) ??
        resolve(cwd, DEFAULT_CONFIG.paths.table),
      boundaries:
        fromCwd(env[`${ENV_PREFIX}BOUNDARIES`]) ??
        fromFile(file.paths?.boundaries) ??
        resolve(cwd, DEFAULT_CONFIG.paths.boundaries),
      output:
        fromCwd(overrides.output) ??
        fromCwd(env[`${ENV_PREFIX}OUTPUT_DIR`]) ??
        fromFile(file.paths?.output) ??
        resolve(cwd, DEFAULT_CONFIG.paths.output),
      intermediates:
        fromFile(file.paths?.intermediates) ?? resolve(cwd, DEFAULT_CONFIG.paths.intermediates),
      font,
    },

    states: overrides.states && overrides.states.length > 0
      ? overrides.states
      : file.states ?? DEFAULT_CONFIG.states,
    years: file.years ?? DEFAULT_CONFIG.years,
    palette,
    thresholds: file.thresholds ?? DEFAULT_CONFIG.thresholds,
    chart: { ...DEFAULT_CONFIG.chart, ...file.chart },
    map: {
      width: file.map?.width ?? DEFAULT_CONFIG.map.width,
      height: file.map?.height ?? DEFAULT_CONFIG.map.height,
      center,
      zoom: file.map?.zoom ?? DEFAULT_CONFIG.map.zoom,
      background: file.map?.background ?? DEFAULT_CONFIG.map.background,
      borderColor: file.map?.borderColor ?? DEFAULT_CONFIG.map.borderColor,
      borderWidth: file.map?.borderWidth ?? DEFAULT_CONFIG.map.borderWidth,
      featureIdProperty:
        fileIdProperty === undefined ? DEFAULT_CONFIG.map.featureIdProperty : fileIdProperty,
    },
    caption: {
      position: {
        x: fileCaption.x ?? DEFAULT_CONFIG.caption.position.x,
        y: fileCaption.y ?? DEFAULT_CONFIG.caption.position.y,
      },
      size: fileCaption.size ?? DEFAULT_CONFIG.caption.size,
      fill: fileCaption.fill ?? DEFAULT_CONFIG.caption.fill,
    },
    annotationSize: file.annotationSize ?? DEFAULT_CONFIG.annotationSize,
    frameDurationMs:
      getEnvNumber(env, 'FRAME_DURATION_MS') ??
      file.frameDurationMs ??
      DEFAULT_CONFIG.frameDurationMs,
    frameBackground: file.frameBackground ?? DEFAULT_CONFIG.frameBackground,
    keepIntermediates:
      overrides.keepIntermediates ?? file.keepIntermediates ?? DEFAULT_CONFIG.keepIntermediates,

    verbose: overrides.verbose ?? false,
    json: overrides.json ?? false,
    configPath,
  };
}
