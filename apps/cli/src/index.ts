#!/usr/bin/env node
import { getErrorMessage } from '@trustledger/core';
import { setupLogger } from '@trustledger/logger';
import { Command } from 'commander';

import { registerExpensesCommand } from './features/expenses/expenses.js';
import { displayCliError } from './features/shared/cli-error.js';
import { ExitCodes } from './features/shared/exit-codes.js';

const program = new Command();

async function main() {
  setupLogger();

  program
    .name('trustledger')
    .description('Commodity-trust expense allocation for shareholders')
    .version('0.1.0');

  // Expenses command - default; reconciles trades against the sponsor's gross-proceeds table
  registerExpensesCommand(program);

  await program.parseAsync();
}

function toError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(getErrorMessage(reason));
}

// Handle unhandled rejections
process.on('unhandledRejection', (reason) => {
  displayCliError('trustledger', toError(reason), ExitCodes.GENERAL_ERROR);
});

main().catch((error: unknown) => {
  displayCliError('trustledger', toError(error), ExitCodes.GENERAL_ERROR);
});
