/**
 * Results Table Loader
 *
 * Reads the subdivision results table (CSV) into typed rows. Expected
 * columns: `unit`, `state`, `is_state` (0/1), `code`, plus one column per
 * election year whose header is the four-digit year. Any other column
 * (such as a leading index) is ignored.
 *
 * @module data/table-loader
 */

import { readFile } from 'node:fs/promises';
import Papa from 'papaparse';
import { z } from 'zod';
import { InputMissingError, SchemaMismatchError } from '../core/errors.js';
import type { ElectionYear, SubdivisionRow } from '../core/types.js';

// ============================================================================
// Schemas
// ============================================================================

const REQUIRED_COLUMNS = ['unit', 'state', 'is_state', 'code'] as const;

const YEAR_HEADER = /^\d{4}$/;

const RowIdentitySchema = z.object({
  unit: z.string().trim().min(1, 'unit is empty'),
  state: z.string().trim().min(1, 'state is empty'),
  is_state: z
    .string()
    .trim()
    .toLowerCase()
    .refine((v) => ['0', '1', 'true', 'false'].includes(v), 'is_state must be 0 or 1')
    .transform((v) => v === '1' || v === 'true'),
  code: z.string().trim().min(1, 'code is empty'),
});

const MarginSchema = z
  .string()
  .trim()
  .min(1, 'margin is empty')
  .transform((v) => Number(v))
  .refine((v) => Number.isFinite(v), 'margin is not a number');

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse CSV text into subdivision rows.
 *
 * @throws SchemaMismatchError on a missing required column, a table without
 *   year columns, or a row failing validation (reported with its line number)
 */
export function parseResultsTable(text: string): SubdivisionRow[] {
  const parsed = Papa.parse<Record<string, string>>(text, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
  });

  const firstError = parsed.errors[0];
  if (firstError) {
    throw new SchemaMismatchError(
      'table',
      `CSV parse error on row ${firstError.row ?? '?'}: ${firstError.message}`
    );
  }

  const fields = parsed.meta.fields ?? [];
  for (const column of REQUIRED_COLUMNS) {
    if (!fields.includes(column)) {
      throw new SchemaMismatchError(`column ${column}`, `Results table has no "${column}" column`);
    }
  }

  const yearColumns = fields.filter((field) => YEAR_HEADER.test(field));
  if (yearColumns.length === 0) {
    throw new SchemaMismatchError('year columns', 'Results table has no year columns');
  }

  return parsed.data.map((record, index) => {
    // Header is line 1
    const line = index + 2;
    const identity = RowIdentitySchema.safeParse(record);
    if (!identity.success) {
      throw new SchemaMismatchError(
        `line ${line}`,
        `Invalid row on line ${line}: ${identity.error.errors.map((e) => e.message).join(', ')}`
      );
    }

    const margins = new Map<ElectionYear, number>();
    for (const column of yearColumns) {
      const margin = MarginSchema.safeParse(record[column] ?? '');
      if (!margin.success) {
        throw new SchemaMismatchError(
          `line ${line}`,
          `Invalid ${column} margin on line ${line}: ${margin.error.errors[0]?.message ?? 'invalid'}`
        );
      }
      margins.set(Number(column), margin.data);
    }

    return {
      unit: identity.data.unit,
      state: identity.data.state,
      isState: identity.data.is_state,
      code: identity.data.code,
      margins,
    };
  });
}

/**
 * Read and parse the results table from disk
 *
 * @throws InputMissingError if the file cannot be read
 */
export async function loadResultsTable(path: string): Promise<SubdivisionRow[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new InputMissingError(path, { cause: error });
  }
  return parseResultsTable(text);
}
