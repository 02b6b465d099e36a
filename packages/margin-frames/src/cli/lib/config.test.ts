/**
 * Tests for layered configuration loading
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { DEFAULT_CONFIG, findConfigFile, loadConfig, parseConfigFile } from './config.js';
import { ConfigError } from '../../core/errors.js';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'margin-frames-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should fall back to defaults without a config file', async () => {
    const config = await loadConfig({ cwd: dir, env: {} });

    expect(config.configPath).toBeNull();
    expect(config.version).toBe(1);
    expect(config.states).toEqual(['El Norte', 'Gulfland', 'New Texas', 'Plainland', 'Trinity']);
    expect(config.years).toEqual([2000, 2004, 2008, 2012, 2016, 2020]);
    expect(config.thresholds).toEqual([50, 60, 70, 80, 90, 100]);
    expect(config.map.center).toEqual([-99.7707, 31.3915]);
    expect(config.map.zoom).toBe(5.75);
    expect(config.caption).toEqual({ position: { x: 1100, y: 50 }, size: 40, fill: '#000000' });
    expect(config.frameDurationMs).toBe(1000);
    expect(config.keepIntermediates).toBe(false);
    expect(config.paths.table).toBe(join(dir, 'data', 'results.csv'));
    expect(config.paths.font).toBeNull();
  });

  it('should read a YAML file found in a parent directory', async () => {
    await writeFile(
      join(dir, '.margin-framesrc.yaml'),
      [
        'states: [Northmark, Southvale]',
        'years: [2000, 2004]',
        'paths:',
        '  table: inputs/results.csv',
        '  font: fonts/Sans.ttf',
        'palette:',
        '  tossup: "#EEEEEE"',
        'map:',
        '  center: null',
        '  featureIdProperty: code',
        'caption:',
        '  size: 24',
      ].join('\n')
    );
    const nested = join(dir, 'work', 'deep');
    await mkdir(nested, { recursive: true });

    const config = await loadConfig({ cwd: nested, env: {} });

    expect(config.configPath).toBe(join(dir, '.margin-framesrc.yaml'));
    expect(config.states).toEqual(['Northmark', 'Southvale']);
    expect(config.years).toEqual([2000, 2004]);
    expect(config.paths.table).toBe(join(dir, 'inputs', 'results.csv'));
    expect(config.paths.font).toBe(join(dir, 'fonts', 'Sans.ttf'));
    expect(config.paths.output).toBe(join(nested, 'output'));
    expect(config.palette.tossup).toBe('#EEEEEE');
    expect(config.palette.sideA).toEqual(DEFAULT_CONFIG.palette.sideA);
    expect(config.map.center).toBeNull();
    expect(config.map.featureIdProperty).toBe('code');
    expect(config.caption.size).toBe(24);
    expect(config.caption.position).toEqual({ x: 1100, y: 50 });
  });

  it('should let environment override the file and flags override both', async () => {
    const path = join(dir, 'frames.json');
    await writeFile(path, JSON.stringify({ frameDurationMs: 500, paths: { output: 'gifs' } }));

    const config = await loadConfig({
      cwd: dir,
      configPath: 'frames.json',
      env: {
        MARGIN_FRAMES_FRAME_DURATION_MS: '750',
        MARGIN_FRAMES_OUTPUT_DIR: 'env-gifs',
      },
      overrides: { output: 'cli-gifs', states: ['Northmark'], keepIntermediates: true, json: true },
    });

    expect(config.frameDurationMs).toBe(750);
    expect(config.paths.output).toBe(join(dir, 'cli-gifs'));
    expect(config.states).toEqual(['Northmark']);
    expect(config.keepIntermediates).toBe(true);
    expect(config.json).toBe(true);
  });

  it('should reject a missing explicit config file', async () => {
    await expect(loadConfig({ cwd: dir, env: {}, configPath: 'absent.yaml' })).rejects.toBeInstanceOf(
      ConfigError
    );
  });

  it('should report schema violations with their path', async () => {
    await writeFile(
      join(dir, '.margin-framesrc'),
      'thresholds: [50, 70, 60, 80, 90, 100]\npalette:\n  neutral: grey\n'
    );

    await expect(loadConfig({ cwd: dir, env: {} })).rejects.toThrow(
      'palette.neutral: expected a #RRGGBB color'
    );
  });

  it('should reject an unsupported config version', async () => {
    await writeFile(join(dir, '.margin-framesrc.yaml'), 'version: 2\n');

    await expect(loadConfig({ cwd: dir, env: {} })).rejects.toThrow(
      'version: Unsupported config version: 2. Expected 1.'
    );
  });

  it('should reject unknown keys', async () => {
    await writeFile(join(dir, '.margin-framesrc'), 'colour: red\n');

    await expect(loadConfig({ cwd: dir, env: {} })).rejects.toBeInstanceOf(ConfigError);
  });

  it('should reject a non-numeric frame duration from the environment', async () => {
    await expect(
      loadConfig({ cwd: dir, env: { MARGIN_FRAMES_FRAME_DURATION_MS: 'fast' } })
    ).rejects.toThrow('MARGIN_FRAMES_FRAME_DURATION_MS must be a positive integer, got "fast"');
  });
});

describe('findConfigFile', () => {
  it('should return null when nothing is found up to the root', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'margin-frames-empty-'));
    try {
      const found = findConfigFile(dir);
      // A config file above the temp dir would be picked up; none is expected there
      expect(found === null || !found.startsWith(dir)).toBe(true);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe('parseConfigFile', () => {
  it('should accept the shipped example configuration', () => {
    const example = fileURLToPath(
      new URL('../../../examples/margin-frames.example.yaml', import.meta.url)
    );
    const file = parseConfigFile(example);

    expect(file.states).toEqual(DEFAULT_CONFIG.states);
    expect(file.map?.center).toEqual({ lat: 31.3915, lon: -99.7707 });
    expect(file.palette?.tossup).toBeUndefined();
    expect(file.paths?.table).toBe('./data/results.csv');
  });
});
