/**
 * State Data Filter
 *
 * Selects the rows drawn on one state's map and resolves every year's
 * margin to a literal color.
 */

import { SchemaMismatchError } from '../core/errors.js';
import type {
  ColoredRow,
  ElectionYear,
  Palette,
  SubdivisionRow,
  ThresholdBands,
} from '../core/types.js';
import { classifyMargin, highlightRegion } from './classify.js';

/**
 * Whether a row appears on the given state's map.
 *
 * Subdivisions of the state and every state aggregate are drawn, except the
 * state's own aggregate, whose area its subdivisions already cover.
 */
export function isDrawnForState(row: SubdivisionRow, state: string): boolean {
  return (row.state === state || row.isState) && row.unit !== state;
}

/**
 * Filter the table for one state and color each year column.
 *
 * Returns new rows; the input table is left untouched.
 *
 * @throws SchemaMismatchError if a selected row has no margin for a requested year
 * @throws ClassificationError from the classifier
 */
export function filterStateRows(
  rows: readonly SubdivisionRow[],
  state: string,
  years: readonly ElectionYear[],
  palette: Palette,
  thresholds: ThresholdBands
): ColoredRow[] {
  return rows
    .filter((row) => isDrawnForState(row, state))
    .map((row) => {
      const colors = new Map<ElectionYear, string>();
      for (const year of years) {
        const margin = row.margins.get(year);
        if (margin === undefined) {
          throw new SchemaMismatchError(
            `year ${year}`,
            `Column "${year}" missing on row "${row.unit}"`
          );
        }
        const color = classifyMargin(margin, palette, thresholds);
        colors.set(year, highlightRegion(row.state, color, state, palette.neutral));
      }

      return {
        unit: row.unit,
        state: row.state,
        isState: row.isState,
        code: row.code,
        colors,
      };
    });
}
