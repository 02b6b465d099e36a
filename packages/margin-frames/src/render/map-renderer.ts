/**
 * Choropleth Map Renderer
 *
 * Draws one year's colored subdivisions onto a fixed Web Mercator view.
 * Colors arrive pre-resolved on each row; the renderer maps every literal
 * color to itself.
 *
 * VIEW:
 * - Web Mercator centred on `view.center` (bbox centre when null)
 * - zoom follows the 512-px tile convention: world width = 512 * 2^zoom px
 * - no legend, no margins, borders drawn between regions
 *
 * d3-geo reads polygons as spherical, clockwise exterior rings; GeoJSON
 * rings are counter-clockwise, so each drawn feature is rewound first.
 *
 * @module render/map-renderer
 */

import { geoMercator, geoPath, type GeoProjection } from 'd3-geo';
import { bbox, rewind } from '@turf/turf';
import type { FeatureCollection } from 'geojson';
import { SchemaMismatchError } from '../core/errors.js';
import type { ColoredRow, ElectionYear, MapView } from '../core/types.js';
import { indexFeatures } from '../data/boundary-loader.js';
import { Raster } from './raster.js';

const TILE_SIZE = 512;

/**
 * Centre of the boundaries' bounding box as [lon, lat]
 */
export function boundaryCenter(boundaries: FeatureCollection): [number, number] {
  const [minX, minY, maxX, maxY] = bbox(boundaries);
  return [(minX + maxX) / 2, (minY + maxY) / 2];
}

/**
 * Mercator projection matching a slippy-map view at the given zoom
 */
export function createProjection(
  view: MapView,
  boundaries: FeatureCollection
): GeoProjection {
  const center = view.center ?? boundaryCenter(boundaries);
  const worldWidth = TILE_SIZE * Math.pow(2, view.zoom);

  return geoMercator()
    .center([center[0], center[1]])
    .scale(worldWidth / (2 * Math.PI))
    .translate([view.width / 2, view.height / 2]);
}

/**
 * Render the choropleth of `year`.
 *
 * Only features with a row are drawn, in row order. Features with a null
 * geometry are matched but leave the background untouched.
 *
 * @throws SchemaMismatchError if a row's code has no boundary feature or
 *   the row has no color for `year`
 */
export function renderMap(
  boundaries: FeatureCollection,
  rows: readonly ColoredRow[],
  year: ElectionYear,
  view: MapView
): Raster {
  const features = indexFeatures(boundaries, view.featureIdProperty);
  const raster = Raster.create(view.width, view.height, `map-${year}`, view.background);
  const ctx = raster.context();
  const path = geoPath(createProjection(view, boundaries), ctx);

  ctx.strokeStyle = view.borderColor;
  ctx.lineWidth = view.borderWidth;
  ctx.lineJoin = 'round';

  for (const row of rows) {
    const feature = features.get(row.code);
    if (feature === undefined) {
      raster.release();
      throw new SchemaMismatchError(
        `code ${row.code}`,
        `No boundary feature for code "${row.code}" (${row.unit})`
      );
    }
    const color = row.colors.get(year);
    if (color === undefined) {
      raster.release();
      throw new SchemaMismatchError(
        `year ${year}`,
        `Row "${row.unit}" has no color for ${year}`
      );
    }

    // A feature without geometry has nothing to draw
    if (feature.geometry === null) {
      continue;
    }

    ctx.beginPath();
    path(rewind(feature, { reverse: true }));
    ctx.fillStyle = color;
    ctx.fill();
    if (view.borderWidth > 0) {
      ctx.stroke();
    }
  }

  return raster;
}
