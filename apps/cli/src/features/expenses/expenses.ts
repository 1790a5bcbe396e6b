import { getReferenceDataDirectory } from '@trustledger/env';
import { closeLoggers, setupLogger } from '@trustledger/logger';
import type { Command } from 'commander';

import { displayCliError } from '../shared/cli-error.js';
import { ExitCodes, exitCodeForError } from '../shared/exit-codes.js';
import { ExpensesCommandOptionsSchema } from '../shared/schemas.js';

import { ExpensesHandler } from './expenses-handler.js';
import { buildExpensesParamsFromFlags } from './expenses-utils.js';

/**
 * Register the expenses command. It is the default, so `trustledger GLD trades.csv` runs it.
 */
export function registerExpensesCommand(program: Command): void {
  program
    .command('expenses', { isDefault: true })
    .description('Allocate trust expenses against a position and print the ledger as CSV')
    .argument('<symbol>', 'Trust ticker symbol, e.g. GLD')
    .argument('<transactions-file>', 'CSV with date, instruction, quantity and optional price columns')
    .option('-s, --split <ratio>', 'Share-split ratio: quantity × ratio, price ÷ ratio')
    .option('-y, --tax-year <year>', 'Tax year of the reference dataset (default: current year)')
    .option('--data-dir <dir>', 'Reference dataset root (default: $TRUSTLEDGER_DATA_DIR or ./gross_proceeds)')
    .option('--verbose', 'Write debug logs to stderr')
    .action((symbol: string, transactionsFile: string, rawOptions: unknown) => {
      executeExpensesCommand(symbol, transactionsFile, rawOptions);
    });
}

/**
 * Execute the expenses command.
 */
function executeExpensesCommand(symbol: string, transactionsFile: string, rawOptions: unknown): void {
  // Validate options at CLI boundary with Zod
  const validationResult = ExpensesCommandOptionsSchema.safeParse(rawOptions);
  if (!validationResult.success) {
    const firstError = validationResult.error.issues[0];
    return displayCliError('expenses', new Error(firstError?.message ?? 'Invalid options'), ExitCodes.INVALID_ARGS);
  }

  const options = validationResult.data;
  if (options.verbose) {
    setupLogger({ level: 'debug' });
  }

  const paramsResult = buildExpensesParamsFromFlags(symbol, transactionsFile, options, getReferenceDataDirectory);
  if (paramsResult.isErr()) {
    return displayCliError('expenses', paramsResult.error, ExitCodes.INVALID_ARGS);
  }

  const result = new ExpensesHandler().execute(paramsResult.value);
  if (result.isErr()) {
    return displayCliError('expenses', result.error, exitCodeForError(result.error));
  }

  process.stdout.write(result.value.content);
  closeLoggers();
}
