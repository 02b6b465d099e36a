/**
 * Margin Frames Error Types
 *
 * Every failure in the pipeline is fatal for the run. The classes below
 * carry enough structure for the CLI to pick an exit code and for the
 * logger to print what went wrong.
 */

/**
 * Error categories
 */
export type MarginFramesErrorKind =
  | 'input-missing'
  | 'schema-mismatch'
  | 'classification-undefined'
  | 'index-out-of-range'
  | 'raster-released'
  | 'config';

/**
 * Base class for all pipeline errors
 */
export abstract class MarginFramesError extends Error {
  abstract readonly kind: MarginFramesErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A required file (table, boundaries, font) is absent or unreadable
 */
export class InputMissingError extends MarginFramesError {
  readonly kind = 'input-missing' as const;

  constructor(
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(`Required input not found or unreadable: ${path}`, options);
  }
}

/**
 * An expected column, row or feature is missing from the data
 *
 * @example
 * ```typescript
 * throw new SchemaMismatchError('year 2024', 'Column "2024" missing on row "Adams"');
 * ```
 */
export class SchemaMismatchError extends MarginFramesError {
  readonly kind = 'schema-mismatch' as const;

  constructor(
    public readonly subject: string,
    message: string
  ) {
    super(message);
  }
}

/**
 * A margin has no color: at or below the lowest threshold with no
 * toss-up color configured, or not a finite number.
 */
export class ClassificationError extends MarginFramesError {
  readonly kind = 'classification-undefined' as const;

  constructor(public readonly value: number) {
    super(`Margin ${value} falls outside every threshold band`);
  }
}

/**
 * A chart row or segment index does not exist
 */
export class IndexOutOfRangeError extends MarginFramesError {
  readonly kind = 'index-out-of-range' as const;

  constructor(
    public readonly index: number,
    public readonly size: number,
    what: string
  ) {
    super(`${what} index ${index} out of range [0, ${size - 1}]`);
  }
}

/**
 * A raster was used after its owner released it
 */
export class RasterReleasedError extends MarginFramesError {
  readonly kind = 'raster-released' as const;

  constructor(public readonly label: string) {
    super(`Raster "${label}" was already released`);
  }
}

/**
 * Configuration file or overrides failed validation
 */
export class ConfigError extends MarginFramesError {
  readonly kind = 'config' as const;

  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message);
  }
}

/**
 * Type guard for pipeline errors
 */
export function isMarginFramesError(error: unknown): error is MarginFramesError {
  return error instanceof MarginFramesError;
}

/**
 * Render any thrown value as a single log-friendly string
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
