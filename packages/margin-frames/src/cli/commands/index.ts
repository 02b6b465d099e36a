/**
 * CLI Commands Index
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerRenderCommand } from './render.js';
import { registerSeriesCommand } from './series.js';

export { executeRender, registerRenderCommand, type RenderOptions } from './render.js';
export {
  executeSeries,
  formatSeriesTable,
  registerSeriesCommand,
  type SeriesOptions,
} from './series.js';

/**
 * Register every command on the program
 */
export function registerCommands(program: Command): void {
  registerRenderCommand(program);
  registerSeriesCommand(program);
}
