import { isDevelopment } from '@trustledger/env';
import { closeLoggers } from '@trustledger/logger';
import pc from 'picocolors';

import { ExitCodes, exitWithCode, type ExitCode } from './exit-codes.js';

/**
 * Tips shown after error messages, keyed by exit code.
 */
const ERROR_TIPS: Partial<Record<ExitCode, string>> = {
  [ExitCodes.INVALID_ARGS]: 'Check your command arguments and try again. Run with --help for usage information.',
  [ExitCodes.NOT_FOUND]:
    'Check the file path, the symbol and --tax-year. Reference datasets live under --data-dir/<tax-year>/.',
  [ExitCodes.VALIDATION_ERROR]: 'Fix the reported column or value in the input file and run again.',
};

/**
 * Format an error for stderr, followed by a tip for its exit code.
 */
export function formatCliError(command: string, error: Error, exitCode: ExitCode, showStack = false): string {
  let text = `${pc.red('✗')} ${command}: ${error.message}\n`;

  const tip = ERROR_TIPS[exitCode];
  if (tip) {
    text += `${pc.dim(tip)}\n`;
  }

  if (showStack && error.stack) {
    text += `\n${pc.dim(error.stack)}\n`;
  }

  return text;
}

/**
 * Display a CLI error on stderr and exit. Stdout stays reserved for the CSV ledger.
 */
export function displayCliError(command: string, error: Error, exitCode: ExitCode): never {
  closeLoggers();
  process.stderr.write(formatCliError(command, error, exitCode, isDevelopment()));
  exitWithCode(exitCode);
}
