/**
 * Boundary Loader
 *
 * Reads the GeoJSON boundary collection whose feature identifiers match
 * the results table's `code` column, and resolves the join key of a feature.
 *
 * @module data/boundary-loader
 */

import { readFile } from 'node:fs/promises';
import type { Feature, FeatureCollection } from 'geojson';
import { InputMissingError, SchemaMismatchError } from '../core/errors.js';

/**
 * Structural check of a parsed boundary document.
 *
 * Every feature must be a `Feature` whose geometry is an object or null.
 */
export function isBoundaryCollection(data: unknown): data is FeatureCollection {
  if (typeof data !== 'object' || data === null) return false;
  if (!('type' in data) || data.type !== 'FeatureCollection') return false;
  if (!('features' in data) || !Array.isArray(data.features)) return false;

  return data.features.every(
    (feature: unknown) =>
      typeof feature === 'object' &&
      feature !== null &&
      'type' in feature &&
      feature.type === 'Feature' &&
      'geometry' in feature &&
      typeof feature.geometry === 'object'
  );
}

/**
 * Validate a parsed boundary document
 *
 * @throws SchemaMismatchError naming the first structural problem
 */
export function validateBoundaries(data: unknown): FeatureCollection {
  if (isBoundaryCollection(data)) {
    return data;
  }

  if (typeof data !== 'object' || data === null) {
    throw new SchemaMismatchError('boundaries', 'Boundary GeoJSON must be an object');
  }
  if (!('type' in data) || data.type !== 'FeatureCollection') {
    throw new SchemaMismatchError('boundaries', 'Expected a FeatureCollection');
  }
  throw new SchemaMismatchError('boundaries', 'FeatureCollection contains an invalid feature');
}

/**
 * Read the boundary collection from disk
 *
 * @throws InputMissingError if the file cannot be read
 * @throws SchemaMismatchError if it is not a valid FeatureCollection
 */
export async function loadBoundaries(path: string): Promise<FeatureCollection> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new InputMissingError(path, { cause: error });
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new SchemaMismatchError(
      'boundaries',
      `Boundary file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return validateBoundaries(data);
}

/**
 * Join key of a feature: its `id`, or the named property when given
 */
export function featureKey(feature: Feature, property: string | null): string | null {
  const raw = property === null ? feature.id : feature.properties?.[property];
  if (typeof raw === 'string' || typeof raw === 'number') {
    return String(raw);
  }
  return null;
}

/**
 * Index features by join key. Features without a key are skipped.
 */
export function indexFeatures(
  collection: FeatureCollection,
  property: string | null
): Map<string, Feature> {
  const index = new Map<string, Feature>();
  for (const feature of collection.features) {
    const key = featureKey(feature, property);
    if (key !== null) {
      index.set(key, feature);
    }
  }
  return index;
}
