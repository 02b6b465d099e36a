/**
 * CLI Library Index
 *
 * Exports shared CLI utilities.
 *
 * @module cli/lib
 */

// Configuration
export {
  type PathsConfig,
  type CaptionConfig,
  type MarginFramesConfig,
  type LoadConfigOptions,
  CONFIG_VERSION,
  DEFAULT_CONFIG,
  findConfigFile,
  parseConfigFile,
  loadConfig,
} from './config.js';

// Logging
export {
  type LogLevel,
  type LogMetadata,
  type StructuredLogEntry,
  type CLILoggerConfig,
  type ProgressOptions,
  CLILogger,
  createCLILogger,
  createQuietLogger,
} from './logger.js';

// Exit codes
export { EXIT_CODES, type ExitCode, exitCodeFor } from './exit-codes.js';
