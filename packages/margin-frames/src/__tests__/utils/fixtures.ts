/**
 * Test Fixtures
 *
 * Small synthetic tables and boundary collections. Two states, "Northmark"
 * and "Southvale", each with two subdivisions and one aggregate row.
 */

import type { Feature, FeatureCollection, Polygon } from 'geojson';
import type { ElectionYear, SubdivisionRow } from '../../core/types.js';

export const TEST_YEARS: readonly ElectionYear[] = [2000, 2004];

/**
 * Build a row from a margin list aligned with `years`
 */
export function makeRow(
  unit: string,
  state: string,
  isState: boolean,
  code: string,
  margins: readonly number[],
  years: readonly ElectionYear[] = TEST_YEARS
): SubdivisionRow {
  return {
    unit,
    state,
    isState,
    code,
    margins: new Map(years.map((year, i) => [year, margins[i] ?? Number.NaN])),
  };
}

export function createTestRows(): SubdivisionRow[] {
  return [
    makeRow('Northmark', 'Northmark', true, 'NM', [-65.7, -58.2]),
    makeRow('Alder', 'Northmark', false, 'NM-01', [-72.4, -61]),
    makeRow('Birch', 'Northmark', false, 'NM-02', [55, 52.5]),
    makeRow('Southvale', 'Southvale', true, 'SV', [51.3, 63.9]),
    makeRow('Cedar', 'Southvale', false, 'SV-01', [91, 88.8]),
    makeRow('Dune', 'Southvale', false, 'SV-02', [-54.1, 57]),
  ];
}

/**
 * Axis-aligned square polygon feature with the given id
 */
export function squareFeature(
  id: string,
  lon: number,
  lat: number,
  size = 0.5
): Feature<Polygon> {
  return {
    type: 'Feature',
    id,
    properties: { code: id },
    geometry: {
      type: 'Polygon',
      coordinates: [
        [
          [lon, lat],
          [lon + size, lat],
          [lon + size, lat + size],
          [lon, lat + size],
          [lon, lat],
        ],
      ],
    },
  };
}

/**
 * Boundaries for every code of `createTestRows()`, laid out on a grid
 */
export function createTestBoundaries(): FeatureCollection<Polygon> {
  const codes = ['NM', 'NM-01', 'NM-02', 'SV', 'SV-01', 'SV-02'];
  return {
    type: 'FeatureCollection',
    features: codes.map((code, i) => squareFeature(code, -100 + (i % 3), 31 + Math.floor(i / 3))),
  };
}
