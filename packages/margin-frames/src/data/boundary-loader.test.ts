/**
 * Tests for the GeoJSON boundary loader
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  featureKey,
  indexFeatures,
  loadBoundaries,
  validateBoundaries,
} from './boundary-loader.js';
import { InputMissingError, SchemaMismatchError } from '../core/errors.js';
import { createTestBoundaries, squareFeature } from '../__tests__/utils/fixtures.js';

describe('validateBoundaries', () => {
  it('should accept a FeatureCollection', () => {
    const boundaries = createTestBoundaries();

    expect(validateBoundaries(boundaries)).toBe(boundaries);
  });

  it('should reject a single Feature', () => {
    expect(() => validateBoundaries(squareFeature('NM', 0, 0))).toThrow(
      'Expected a FeatureCollection'
    );
  });

  it('should reject a collection holding a non-feature', () => {
    const data = { type: 'FeatureCollection', features: [{ type: 'Polygon', coordinates: [] }] };

    expect(() => validateBoundaries(data)).toThrow(
      'FeatureCollection contains an invalid feature'
    );
  });

  it('should reject non-objects', () => {
    expect(() => validateBoundaries('FeatureCollection')).toThrow(SchemaMismatchError);
  });
});

describe('featureKey', () => {
  it('should read the feature id by default', () => {
    expect(featureKey(squareFeature('NM-01', 0, 0), null)).toBe('NM-01');
  });

  it('should read a named property', () => {
    const feature = { ...squareFeature('x', 0, 0), properties: { fips: 48001 } };

    expect(featureKey(feature, 'fips')).toBe('48001');
  });

  it('should return null when the key is absent', () => {
    expect(featureKey(squareFeature('x', 0, 0), 'fips')).toBeNull();
  });
});

describe('indexFeatures', () => {
  it('should index every feature by key', () => {
    const index = indexFeatures(createTestBoundaries(), 'code');

    expect([...index.keys()]).toEqual(['NM', 'NM-01', 'NM-02', 'SV', 'SV-01', 'SV-02']);
  });
});

describe('loadBoundaries', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'margin-frames-geo-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should read a GeoJSON file', async () => {
    const path = join(dir, 'boundaries.geojson');
    await writeFile(path, JSON.stringify(createTestBoundaries()));

    const boundaries = await loadBoundaries(path);

    expect(boundaries.features).toHaveLength(6);
  });

  it('should reject malformed JSON', async () => {
    const path = join(dir, 'broken.geojson');
    await writeFile(path, '{"type":');

    await expect(loadBoundaries(path)).rejects.toBeInstanceOf(SchemaMismatchError);
  });

  it('should raise InputMissingError for an absent file', async () => {
    await expect(loadBoundaries(join(dir, 'none.geojson'))).rejects.toBeInstanceOf(
      InputMissingError
    );
  });
});
