/**
 * Tests for result series extraction
 */

import { describe, it, expect } from 'vitest';
import { extractResultSeries, findAggregateRow, splitMargin } from './result-series.js';
import { SchemaMismatchError } from '../core/errors.js';
import { createTestRows, makeRow, TEST_YEARS } from '../__tests__/utils/fixtures.js';

describe('splitMargin', () => {
  it('should give side A the magnitude of a negative margin', () => {
    const shares = splitMargin(-65.7);

    expect(shares.sideA).toBeCloseTo(65.7, 9);
    expect(shares.sideB).toBeCloseTo(34.3, 9);
  });

  it('should give side B a positive margin', () => {
    const shares = splitMargin(51.3);

    expect(shares.sideA).toBeCloseTo(48.7, 9);
    expect(shares.sideB).toBeCloseTo(51.3, 9);
  });
});

describe('extractResultSeries', () => {
  const rows = createTestRows();

  it('should read the aggregate row of each state', () => {
    const northmark = extractResultSeries(rows, 'Northmark', [2000]);
    const southvale = extractResultSeries(rows, 'Southvale', [2000]);

    expect(northmark.sideA[0]).toBeCloseTo(65.7, 9);
    expect(northmark.sideB[0]).toBeCloseTo(34.3, 9);
    expect(southvale.sideA[0]).toBeCloseTo(48.7, 9);
    expect(southvale.sideB[0]).toBeCloseTo(51.3, 9);
  });

  it('should keep the year order', () => {
    const series = extractResultSeries(rows, 'Southvale', TEST_YEARS);

    expect(series.years).toEqual([2000, 2004]);
    expect(series.sideB[1]).toBeCloseTo(63.9, 9);
  });

  it('should sum to 100 for every year', () => {
    const years = [2000, 2004, 2008, 2012, 2016, 2020];
    const margins = [-99.99, -50.01, 0, 12.5, 73.25, 100];
    const table = [makeRow('Eastport', 'Eastport', true, 'EP', margins, years)];

    const series = extractResultSeries(table, 'Eastport', years);

    for (let i = 0; i < years.length; i++) {
      expect(Math.abs(series.sideA[i] + series.sideB[i] - 100)).toBeLessThanOrEqual(1e-9);
    }
  });

  it('should reject a missing aggregate row', () => {
    expect(() => extractResultSeries(rows, 'Eastport', TEST_YEARS)).toThrow(SchemaMismatchError);
  });

  it('should not take a subdivision row named after a state as its aggregate', () => {
    const table = [
      makeRow('Westmoor', 'Northmark', false, 'NM-03', [-61, -62]),
      ...rows,
    ];

    expect(() => findAggregateRow(table, 'Westmoor')).toThrow(
      'Expected exactly one aggregate row for "Westmoor", found 0'
    );
    expect(findAggregateRow(rows, 'Northmark').code).toBe('NM');
  });

  it('should reject duplicated aggregate rows', () => {
    const duplicated = [...rows, makeRow('Northmark', 'Northmark', true, 'NM2', [-60, -60])];

    expect(() => findAggregateRow(duplicated, 'Northmark')).toThrow(
      'Expected exactly one aggregate row for "Northmark", found 2'
    );
  });

  it('should reject a missing year', () => {
    expect(() => extractResultSeries(rows, 'Northmark', [2024])).toThrow(SchemaMismatchError);
  });
});
