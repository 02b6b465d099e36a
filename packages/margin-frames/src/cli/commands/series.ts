/**
 * Series Command
 *
 * Print the per-year result shares of one state.
 *
 * Usage:
 *   margin-frames series <state> [--json]
 *
 * Examples:
 *   margin-frames series "New Texas"
 *   margin-frames series Gulfland --json
 */

import type { Command } from 'commander';
import { loadConfig } from '../lib/config.js';
import { loadResultsTable } from '../../data/table-loader.js';
import { formatShare } from '../../render/bar-chart.js';
import { extractResultSeries } from '../../transform/result-series.js';
import type { StateResultSeries } from '../../core/types.js';

export type SeriesOptions = {
  readonly config?: string;
  readonly json?: boolean;
};

/**
 * Register the series command
 */
export function registerSeriesCommand(parent: Command): void {
  parent
    .command('series')
    .description('Print the result shares of one state per year')
    .argument('<state>', 'State name as it appears in the unit column')
    .action(async (state: string, _options: SeriesOptions, command: Command) => {
      const options = command.optsWithGlobals<SeriesOptions>();
      const series = await executeSeries(state, options);
      const lines = options.json ? [JSON.stringify(series, null, 2)] : formatSeriesTable(series);
      for (const line of lines) {
        console.log(line);
      }
    });
}

/**
 * Load the configured table and extract one state's series
 */
export async function executeSeries(
  state: string,
  options: SeriesOptions
): Promise<StateResultSeries> {
  const config = await loadConfig({
    configPath: options.config,
    overrides: { json: options.json },
  });
  const rows = await loadResultsTable(config.paths.table);
  return extractResultSeries(rows, state, config.years);
}

/**
 * Human-readable rows: one line per year
 */
export function formatSeriesTable(series: StateResultSeries): string[] {
  const lines = [series.state, `${'year'.padEnd(6)}${'A'.padStart(8)}${'B'.padStart(8)}`];
  series.years.forEach((year, i) => {
    const sideA = formatShare(series.sideA[i] ?? Number.NaN);
    const sideB = formatShare(series.sideB[i] ?? Number.NaN);
    lines.push(`${String(year).padEnd(6)}${sideA.padStart(8)}${sideB.padStart(8)}`);
  });
  return lines;
}
