/**
 * Render Command
 *
 * Render the animation of every configured state.
 *
 * Usage:
 *   margin-frames render [options]
 *
 * Options:
 *   --state <name...>       Limit the run to the named states
 *   --output <dir>          Directory receiving `{state}.gif`
 *   --keep-intermediates    Also write map, chart and frame PNGs
 *
 * Global options (--config, --verbose, --json) apply.
 */

import type { Command } from 'commander';
import { loadConfig } from '../lib/config.js';
import { createCLILogger } from '../lib/logger.js';
import { formatError } from '../../core/errors.js';
import { renderAnimations, type RenderSummary } from '../../pipeline/orchestrator.js';

/**
 * Render options from CLI, merged with the global flags
 */
export type RenderOptions = {
  readonly config?: string;
  readonly verbose?: boolean;
  readonly json?: boolean;
  readonly state?: readonly string[];
  readonly output?: string;
  readonly keepIntermediates?: boolean;
};

/**
 * Register the render command
 */
export function registerRenderCommand(parent: Command): void {
  parent
    .command('render')
    .description('Render one animated map per state')
    .option('--state <name...>', 'Only render these states')
    .option('-o, --output <dir>', 'Output directory for animations')
    .option('--keep-intermediates', 'Keep map, chart and frame images')
    .action(async (_options: RenderOptions, command: Command) => {
      await executeRender(command.optsWithGlobals<RenderOptions>());
    });
}

/**
 * Execute the render command
 *
 * @throws whatever the configuration or the pipeline throws, after logging it
 */
export async function executeRender(options: RenderOptions): Promise<RenderSummary> {
  const config = await loadConfig({
    configPath: options.config,
    overrides: {
      verbose: options.verbose,
      json: options.json,
      states: options.state,
      output: options.output,
      keepIntermediates: options.keepIntermediates,
    },
  });

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });
  logger.commandStart('render', {
    config: config.configPath ?? '(defaults)',
    states: config.states.length,
    years: config.years.length,
    output: config.paths.output,
  });

  try {
    const summary = await renderAnimations({ config, logger });
    logger.commandEnd(true, { animations: summary.animations.length });
    return summary;
  } catch (error) {
    logger.commandEnd(false, { error: formatError(error) });
    throw error;
  }
}
