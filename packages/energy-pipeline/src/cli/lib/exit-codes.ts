/**
 * CLI exit codes and the mapping from pipeline errors onto them.
 *
 * @module cli/lib/exit-codes
 */

import { isPipelineError } from '../../core/errors.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  WARNINGS: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  DATA_INTEGRITY_ERROR: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Exit code for an error thrown by a command.
 *
 * Source problems (unreadable, malformed, failing invariants) are data
 * integrity errors; a rejected filter is a plain usage error.
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (!isPipelineError(error)) {
    return EXIT_CODES.ERRORS;
  }
  switch (error.stage) {
    case 'config':
      return EXIT_CODES.CONFIG_ERROR;
    case 'filter':
      return EXIT_CODES.ERRORS;
    case 'load':
    case 'format':
    case 'schema':
    case 'clean':
    case 'transform':
    case 'geo':
      return EXIT_CODES.DATA_INTEGRITY_ERROR;
  }
}

/**
 * Rendered output of a read command and the code to exit with
 */
export interface CommandResult {
  readonly output: string;
  readonly exitCode: ExitCode;
}
