import {
  ZERO,
  isPresentNonZero,
  roundCents,
  type CalendarDate,
  type ReferenceRecord,
  type TransactionRecord,
} from '@trustledger/core';
import { getLogger } from '@trustledger/logger';

import type {
  ExpenseAllocation,
  ExpenseReport,
  ExpenseRow,
  ExpenseSummary,
  MergedRow,
  PositionState,
  TimelineEntry,
} from './types.js';

const logger = getLogger('PositionReconciler');

export const INITIAL_POSITION: PositionState = {
  runningQuantity: ZERO,
  runningBasis: ZERO,
};

function groupByDate<T extends { readonly date: CalendarDate }>(records: readonly T[]): Map<CalendarDate, T[]> {
  const groups = new Map<CalendarDate, T[]>();
  for (const record of records) {
    const group = groups.get(record.date);
    if (group) {
      group.push(record);
    } else {
      groups.set(record.date, [record]);
    }
  }
  return groups;
}

/**
 * Outer-join transactions and reference records on date.
 *
 * Every date present in either input appears in the timeline. Same-date
 * transactions keep their input order and each gets its own entry; the date's
 * reference record attaches to the last of them, so all of a date's trades are
 * folded before that date's expense is computed.
 */
export function buildTimeline(
  transactions: readonly TransactionRecord[],
  reference: readonly ReferenceRecord[]
): TimelineEntry[] {
  const transactionsByDate = groupByDate(transactions);
  const referenceByDate = groupByDate(reference);
  const dates = [...new Set([...transactionsByDate.keys(), ...referenceByDate.keys()])].sort();

  const timeline: TimelineEntry[] = [];
  for (const date of dates) {
    const trades = transactionsByDate.get(date) ?? [];
    const references = referenceByDate.get(date) ?? [];

    if (references.length > 1) {
      logger.warn({ date, count: references.length }, 'Multiple reference records share a date');
    }

    trades.forEach((transaction, index) => {
      const isLast = index === trades.length - 1;
      timeline.push({ date, transaction, reference: isLast ? references[0] : undefined });
    });

    const unattached = trades.length > 0 ? references.slice(1) : references;
    for (const record of unattached) {
      timeline.push({ date, reference: record });
    }
  }

  return timeline;
}

/**
 * Apply one entry's trade to the position. Entries without a trade pass the state through.
 * A trade without a price moves the share count but not the basis.
 */
export function applyTransaction(state: PositionState, transaction: TransactionRecord | undefined): PositionState {
  if (!transaction) {
    return state;
  }

  const signedQuantity = transaction.instruction === 'BUY' ? transaction.quantity : transaction.quantity.negated();
  const basisDelta = transaction.price ? signedQuantity.times(transaction.price) : ZERO;

  return {
    runningQuantity: state.runningQuantity.plus(signedQuantity),
    runningBasis: state.runningBasis.plus(basisDelta),
  };
}

/**
 * Derive the expense figures of one entry from its post-trade position.
 * Cost is only allocated against a positive ounce holding.
 */
export function allocateExpense(state: PositionState, reference: ReferenceRecord | undefined): ExpenseAllocation {
  const { runningQuantity, runningBasis } = state;
  const ouncesSold = reference?.ouncesSoldToCoverExpenses;
  const proceeds = reference?.proceedsPerShare;

  const oz = runningQuantity.times(reference?.ouncesPerShare ?? ZERO);
  const ozSold = isPresentNonZero(ouncesSold) ? runningQuantity.times(ouncesSold) : ZERO;
  const costSold =
    isPresentNonZero(ouncesSold) && oz.greaterThan(ZERO) ? roundCents(ozSold.div(oz).times(runningBasis)) : ZERO;
  const expense = isPresentNonZero(proceeds) ? roundCents(runningQuantity.times(proceeds)) : undefined;

  return { oz, ozSold, costSold, expense };
}

/**
 * Left fold over the whole timeline, starting from an empty position.
 * Each row depends only on the previous row's state and its own fields.
 */
export function foldPositions(
  timeline: readonly TimelineEntry[],
  initial: PositionState = INITIAL_POSITION
): MergedRow[] {
  const rows: MergedRow[] = [];
  let state = initial;

  for (const entry of timeline) {
    state = applyTransaction(state, entry.transaction);
    rows.push({ ...entry, ...state, ...allocateExpense(state, entry.reference) });
  }

  return rows;
}

/**
 * Whether a folded row belongs in the ledger: it must carry a trade or an
 * expense event, and recognize a non-zero expense or cost.
 */
export function isLedgerRow(row: MergedRow): boolean {
  const carriesEvent = row.transaction !== undefined || row.reference?.ouncesSoldToCoverExpenses !== undefined;
  if (!carriesEvent) {
    return false;
  }
  return isPresentNonZero(row.expense) || !row.costSold.isZero();
}

export function toExpenseRow(symbol: string, row: MergedRow): ExpenseRow {
  return {
    symbol,
    date: row.date,
    ouncesPerShare: row.reference?.ouncesPerShare,
    ouncesSoldToCoverExpenses: row.reference?.ouncesSoldToCoverExpenses,
    proceedsPerShare: row.reference?.proceedsPerShare,
    runningQuantity: row.runningQuantity,
    runningBasis: row.runningBasis,
    oz: row.oz,
    ozSold: row.ozSold,
    costSold: row.costSold,
    expense: row.expense,
  };
}

export function summarizeExpenses(rows: readonly ExpenseRow[]): ExpenseSummary {
  return rows.reduce<ExpenseSummary>(
    (summary, row) => ({
      rowCount: summary.rowCount + 1,
      totalCostSold: summary.totalCostSold.plus(row.costSold),
      totalExpense: summary.totalExpense.plus(row.expense ?? ZERO),
    }),
    { rowCount: 0, totalCostSold: ZERO, totalExpense: ZERO }
  );
}

/**
 * Reconcile a position's trades against the sponsor's reference table and
 * produce the expense ledger. Filtering happens only after the fold has seen every row.
 */
export function reconcileExpenses(
  symbol: string,
  transactions: readonly TransactionRecord[],
  reference: readonly ReferenceRecord[]
): ExpenseReport {
  const timeline = buildTimeline(transactions, reference);
  const folded = foldPositions(timeline);
  const rows = folded.filter(isLedgerRow).map((row) => toExpenseRow(symbol, row));
  const summary = summarizeExpenses(rows);

  logger.info(
    {
      symbol,
      timelineEntries: timeline.length,
      ledgerRows: summary.rowCount,
      totalCostSold: summary.totalCostSold.toFixed(2),
      totalExpense: summary.totalExpense.toFixed(2),
    },
    'Reconciled expenses'
  );

  return { symbol, rows, summary };
}
