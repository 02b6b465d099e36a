/**
 * Result Series Extraction
 *
 * Converts a state's aggregate margins into two percentage series, one per
 * side, for the stacked result chart.
 */

import { SchemaMismatchError } from '../core/errors.js';
import type { ElectionYear, StateResultSeries, SubdivisionRow } from '../core/types.js';

/**
 * Split a signed margin into the two sides' shares.
 *
 * A negative margin `m` means side A won with `|m|` percent; a positive one
 * means side B won with `m` percent. The loser gets the remainder.
 */
export function splitMargin(margin: number): { readonly sideA: number; readonly sideB: number } {
  if (margin < 0) {
    return { sideA: Math.abs(margin), sideB: 100 + margin };
  }
  return { sideA: 100 - margin, sideB: margin };
}

/**
 * Locate the single aggregate row of a state
 *
 * @throws SchemaMismatchError unless exactly one row is flagged `isState`
 *   with `unit === state`
 */
export function findAggregateRow(
  rows: readonly SubdivisionRow[],
  state: string
): SubdivisionRow {
  const matches = rows.filter((row) => row.isState && row.unit === state);
  const [match] = matches;
  if (matches.length !== 1 || match === undefined) {
    throw new SchemaMismatchError(
      `state ${state}`,
      `Expected exactly one aggregate row for "${state}", found ${matches.length}`
    );
  }
  return match;
}

/**
 * Extract the per-side series for one state across the given years.
 *
 * @throws SchemaMismatchError if the aggregate row is missing, duplicated,
 *   or lacks a year column
 *
 * @example
 * ```typescript
 * const series = extractResultSeries(rows, 'Gulfland', [2000]);
 * // margin -65.7 -> series.sideA = [65.7], series.sideB = [34.3]
 * ```
 */
export function extractResultSeries(
  rows: readonly SubdivisionRow[],
  state: string,
  years: readonly ElectionYear[]
): StateResultSeries {
  const aggregate = findAggregateRow(rows, state);
  const sideA: number[] = [];
  const sideB: number[] = [];

  for (const year of years) {
    const margin = aggregate.margins.get(year);
    if (margin === undefined) {
      throw new SchemaMismatchError(
        `year ${year}`,
        `Column "${year}" missing on aggregate row "${state}"`
      );
    }
    const shares = splitMargin(margin);
    sideA.push(shares.sideA);
    sideB.push(shares.sideB);
  }

  return { state, years: [...years], sideA, sideB };
}
