/**
 * @trustledger/accounting
 *
 * Running-position fold over a shareholder's trades and the trust sponsor's
 * reference table, producing the per-date expense ledger.
 */

export {
  INITIAL_POSITION,
  allocateExpense,
  applyTransaction,
  buildTimeline,
  foldPositions,
  isLedgerRow,
  reconcileExpenses,
  summarizeExpenses,
  toExpenseRow,
} from './expenses/position-reconciler.js';
export type {
  ExpenseAllocation,
  ExpenseReport,
  ExpenseRow,
  ExpenseSummary,
  MergedRow,
  PositionState,
  TimelineEntry,
} from './expenses/types.js';
