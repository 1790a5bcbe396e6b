import { NotFoundError, ParseError, SchemaError } from '@trustledger/core';

/**
 * Semantic exit codes for the CLI.
 */
export const ExitCodes = {
  /** Successful execution */
  SUCCESS: 0,

  /** General error (catch-all) */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options */
  INVALID_ARGS: 2,

  /** Transactions file or reference dataset not found */
  NOT_FOUND: 4,

  /** Input data failed column or literal validation */
  VALIDATION_ERROR: 8,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * Map a failure to the exit code the shell sees.
 */
export function exitCodeForError(error: Error): ExitCode {
  if (error instanceof NotFoundError) {
    return ExitCodes.NOT_FOUND;
  }
  if (error instanceof SchemaError || error instanceof ParseError) {
    return ExitCodes.VALIDATION_ERROR;
  }
  return ExitCodes.GENERAL_ERROR;
}

/**
 * Exit the process with a specific exit code.
 * Use this instead of process.exit() for better tracking.
 */
export function exitWithCode(code: ExitCode): never {
  process.exit(code);
}
