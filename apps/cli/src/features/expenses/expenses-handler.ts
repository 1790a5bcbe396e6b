import { reconcileExpenses, type ExpenseReport } from '@trustledger/accounting';
import { loadReference, loadTransactions } from '@trustledger/ingestion';
import { getLogger } from '@trustledger/logger';
import { err, ok, type Result } from 'neverthrow';

import type { ExpensesHandlerParams } from './expenses-utils.js';
import { convertToCSV } from './expenses-utils.js';

// Re-export for convenience
export type { ExpensesHandlerParams };

const logger = getLogger('ExpensesHandler');

/**
 * Result of the expenses operation.
 */
export interface ExpensesResult {
  report: ExpenseReport;

  /** Rendered CSV ledger, header included */
  content: string;
}

/**
 * Expenses handler: load both inputs, fold, render.
 * Any load failure aborts before reconciliation, so there is never partial output.
 */
export class ExpensesHandler {
  execute(params: ExpensesHandlerParams): Result<ExpensesResult, Error> {
    logger.debug(
      {
        symbol: params.symbol,
        transactionsPath: params.transactionsPath,
        taxYear: params.taxYear,
        dataDir: params.dataDir,
        split: params.split?.toString(),
      },
      'Starting expense allocation'
    );

    const transactionsResult = loadTransactions(params.transactionsPath, { split: params.split });
    if (transactionsResult.isErr()) {
      return err(transactionsResult.error);
    }

    const referenceResult = loadReference({
      dataDir: params.dataDir,
      symbol: params.symbol,
      taxYear: params.taxYear,
    });
    if (referenceResult.isErr()) {
      return err(referenceResult.error);
    }

    const report = reconcileExpenses(params.symbol, transactionsResult.value, referenceResult.value);
    return ok({ report, content: convertToCSV(report.rows) });
  }
}
