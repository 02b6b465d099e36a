/**
 * Margin Frames CLI
 *
 * @module cli
 */

// Re-export library utilities
export * from './lib/index.js';

// Re-export commands
export * from './commands/index.js';

export const CLI_NAME = 'margin-frames';
