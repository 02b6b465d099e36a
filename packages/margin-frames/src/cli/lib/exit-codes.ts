/**
 * CLI exit codes and the mapping from pipeline errors onto them
 *
 * @module cli/lib/exit-codes
 */

import { isMarginFramesError, type MarginFramesErrorKind } from '../../core/errors.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  DATA_INTEGRITY_ERROR: 5,
  INPUT_MISSING: 6,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

const KIND_EXIT_CODES: Record<MarginFramesErrorKind, ExitCode> = {
  'input-missing': EXIT_CODES.INPUT_MISSING,
  'schema-mismatch': EXIT_CODES.DATA_INTEGRITY_ERROR,
  'classification-undefined': EXIT_CODES.DATA_INTEGRITY_ERROR,
  'index-out-of-range': EXIT_CODES.DATA_INTEGRITY_ERROR,
  'raster-released': EXIT_CODES.ERRORS,
  config: EXIT_CODES.CONFIG_ERROR,
};

/**
 * Exit code for a thrown value; anything outside the taxonomy is a generic error
 */
export function exitCodeFor(error: unknown): ExitCode {
  return isMarginFramesError(error) ? KIND_EXIT_CODES[error.kind] : EXIT_CODES.ERRORS;
}
