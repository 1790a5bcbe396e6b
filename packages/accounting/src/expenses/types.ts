import type { CalendarDate, ReferenceRecord, TransactionRecord } from '@trustledger/core';
import type { Decimal } from 'decimal.js';

/**
 * One step of the merged timeline. A date with several transactions yields one
 * entry per transaction; the date's reference record rides on the last of them.
 */
export interface TimelineEntry {
  date: CalendarDate;
  transaction?: TransactionRecord | undefined;
  reference?: ReferenceRecord | undefined;
}

/**
 * Fold accumulator: the open position after a timeline entry
 */
export interface PositionState {
  /** Net shares held; negative after selling more than was bought */
  runningQuantity: Decimal;
  /** Signed sum of quantity × price */
  runningBasis: Decimal;
}

export interface ExpenseAllocation {
  /** Gold ounces backing the position */
  oz: Decimal;
  /** Ounces liquidated for the position to pay trust expenses */
  ozSold: Decimal;
  /** Slice of basis consumed by the liquidation, in cents */
  costSold: Decimal;
  /** Dollar expense recognized, in cents; absent without a proceeds figure */
  expense: Decimal | undefined;
}

export type MergedRow = TimelineEntry & PositionState & ExpenseAllocation;

/**
 * Output row of the expense ledger
 */
export interface ExpenseRow extends PositionState, ExpenseAllocation {
  symbol: string;
  date: CalendarDate;
  ouncesPerShare: Decimal | undefined;
  ouncesSoldToCoverExpenses: Decimal | undefined;
  proceedsPerShare: Decimal | undefined;
}

export interface ExpenseSummary {
  rowCount: number;
  totalCostSold: Decimal;
  totalExpense: Decimal;
}

export interface ExpenseReport {
  symbol: string;
  rows: ExpenseRow[];
  summary: ExpenseSummary;
}
