/**
 * Margin Frames Structured Logging
 *
 * Structured logging with JSON output for machine consumption and
 * human-readable output for interactive use. Includes timestamp,
 * command context, and duration tracking.
 *
 * @module cli/lib/logger
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Log levels in order of severity
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log entry metadata
 */
export interface LogMetadata {
  readonly [key: string]: unknown;
}

/**
 * Structured log entry for JSON output
 */
export interface StructuredLogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly message: string;
  readonly command?: string;
  readonly duration_ms?: number;
  readonly [key: string]: unknown;
}

/**
 * Logger configuration
 */
export interface CLILoggerConfig {
  /** Minimum log level to output */
  readonly level: LogLevel;
  /** Output as JSON */
  readonly json: boolean;
  /** Command name for context */
  readonly command?: string;
  /** Service name */
  readonly service?: string;
  /** Fields added to every entry */
  readonly context?: LogMetadata;
}

/**
 * Progress tracking options
 */
export interface ProgressOptions {
  total: number;
  current: number;
  label?: string;
  metadata?: LogMetadata;
}

// ============================================================================
// Constants
// ============================================================================

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * ANSI color codes for terminal output
 */
const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.gray,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

// ============================================================================
// CLI Logger Class
// ============================================================================

/**
 * CLI Logger with structured JSON and human-readable output
 */
export class CLILogger {
  private readonly config: CLILoggerConfig;
  private startTime: number;
  private commandContext: string | null;

  constructor(config: CLILoggerConfig) {
    this.config = {
      service: 'margin-frames',
      ...config,
    };
    this.commandContext = config.command ?? null;
    this.startTime = Date.now();
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  /**
   * Elapsed time since start or last reset
   */
  getElapsedMs(): number {
    return Date.now() - this.startTime;
  }

  private merge(metadata?: LogMetadata): LogMetadata {
    return { ...this.config.context, ...metadata };
  }

  private formatJson(level: LogLevel, message: string, metadata: LogMetadata): string {
    const entry: StructuredLogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(this.config.service ? { service: this.config.service } : {}),
      ...(this.commandContext ? { command: this.commandContext } : {}),
      ...metadata,
    };
    return JSON.stringify(entry);
  }

  private formatHuman(level: LogLevel, message: string, metadata: LogMetadata): string {
    let line = `${COLORS.dim}${new Date().toISOString()}${COLORS.reset} `;
    line += `${LEVEL_COLORS[level]}${LEVEL_LABELS[level]}${COLORS.reset} `;
    line += message;

    if (Object.keys(metadata).length > 0) {
      const metaStr = Object.entries(metadata)
        .map(([key, value]) => {
          const valueStr = typeof value === 'object' ? JSON.stringify(value) : String(value);
          return `${COLORS.cyan}${key}${COLORS.reset}=${valueStr}`;
        })
        .join(' ');
      line += ` ${COLORS.dim}(${metaStr})${COLORS.reset}`;
    }

    return line;
  }

  private log(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog(level)) return;

    const merged = this.merge(metadata);
    const formatted = this.config.json
      ? this.formatJson(level, message, merged)
      : this.formatHuman(level, message, merged);

    switch (level) {
      case 'debug':
        console.debug(formatted);
        break;
      case 'info':
        console.info(formatted);
        break;
      case 'warn':
        console.warn(formatted);
        break;
      case 'error':
        console.error(formatted);
        break;
    }
  }

  /**
   * Set command context for subsequent log entries
   */
  setCommand(command: string): void {
    this.commandContext = command;
    this.startTime = Date.now();
  }

  resetTimer(): void {
    this.startTime = Date.now();
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', message, metadata);
  }

  /**
   * Log command start
   */
  commandStart(command: string, options?: LogMetadata): void {
    this.setCommand(command);
    this.info(`Starting ${command}`, options);
  }

  /**
   * Log command completion with duration
   */
  commandEnd(success: boolean, metadata?: LogMetadata): void {
    const baseMetadata = { duration_ms: this.getElapsedMs(), ...metadata };

    if (success) {
      this.info('Command completed', baseMetadata);
    } else {
      this.error('Command failed', baseMetadata);
    }
  }

  /**
   * Log progress for long-running operations
   */
  progress(options: ProgressOptions): void {
    const { total, current, label, metadata } = options;
    const percent = total > 0 ? Math.round((current / total) * 100) : 0;

    if (this.config.json) {
      this.info('Progress', { current, total, percent, label, ...metadata });
      return;
    }

    const barWidth = 30;
    const filled = total > 0 ? Math.round((current / total) * barWidth) : 0;
    const bar = `[${'='.repeat(filled)}${' '.repeat(barWidth - filled)}]`;
    const labelStr = label ? ` ${label}` : '';
    process.stdout.write(
      `\r${COLORS.dim}${bar}${COLORS.reset} ${percent}% (${current}/${total})${labelStr}`
    );

    // Clear line when complete
    if (current >= total) {
      process.stdout.write('\n');
    }
  }

  /**
   * Create a child logger whose entries carry `context`
   */
  child(context: LogMetadata): CLILogger {
    const childLogger = new CLILogger({
      ...this.config,
      context: this.merge(context),
    });
    childLogger.commandContext = this.commandContext;
    childLogger.startTime = this.startTime;
    return childLogger;
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Create a CLI logger with the given configuration
 */
export function createCLILogger(config: Partial<CLILoggerConfig> = {}): CLILogger {
  return new CLILogger({
    level: config.level ?? 'info',
    json: config.json ?? false,
    command: config.command,
    service: config.service ?? 'margin-frames',
    context: config.context,
  });
}

/**
 * Logger that drops everything below `error`; for library callers and tests
 */
export function createQuietLogger(): CLILogger {
  return createCLILogger({ level: 'error', json: true });
}
