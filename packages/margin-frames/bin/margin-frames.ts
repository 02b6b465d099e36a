#!/usr/bin/env tsx
/**
 * Margin Frames CLI Entry Point
 *
 * @module margin-frames-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { registerCommands } from '../src/cli/commands/index.js';
import { EXIT_CODES, exitCodeFor } from '../src/cli/lib/exit-codes.js';
import { formatError } from '../src/core/errors.js';

const PackageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  const packageJsonPath = join(__dirname, '..', 'package.json');
  try {
    const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('margin-frames')
    .description('Render per-state election margin maps and charts as animations')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .margin-framesrc)');

  registerCommands(program);
  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    console.error(`Error: ${formatError(error)}`);
    process.exit(exitCodeFor(error));
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
