import type { ReferenceRecord, TransactionRecord } from '@trustledger/core';
import { d } from '@trustledger/core/test-utils';
import { describe, expect, it } from 'vitest';

import {
  INITIAL_POSITION,
  allocateExpense,
  applyTransaction,
  buildTimeline,
  foldPositions,
  isLedgerRow,
  reconcileExpenses,
  summarizeExpenses,
} from '../position-reconciler.js';

function trade(date: string, instruction: 'BUY' | 'SELL', quantity: string, price?: string): TransactionRecord {
  return { date, instruction, quantity: d(quantity), price: price === undefined ? undefined : d(price) };
}

function ref(date: string, ouncesPerShare?: string, ouncesSold?: string, proceeds?: string): ReferenceRecord {
  return {
    date,
    ouncesPerShare: ouncesPerShare === undefined ? undefined : d(ouncesPerShare),
    ouncesSoldToCoverExpenses: ouncesSold === undefined ? undefined : d(ouncesSold),
    proceedsPerShare: proceeds === undefined ? undefined : d(proceeds),
  };
}

describe('buildTimeline', () => {
  it('should include every date from either side in date order', () => {
    const timeline = buildTimeline(
      [trade('2020-01-02', 'BUY', '10', '150'), trade('2020-03-01', 'SELL', '1', '160')],
      [ref('2020-01-15', '0.1', '0.001', '0.15'), ref('2020-03-01', '0.1')]
    );

    expect(timeline.map((entry) => entry.date)).toEqual(['2020-01-02', '2020-01-15', '2020-03-01']);
    expect(timeline[0]?.reference).toBeUndefined();
    expect(timeline[1]?.transaction).toBeUndefined();
    expect(timeline[2]?.transaction?.instruction).toBe('SELL');
    expect(timeline[2]?.reference?.ouncesPerShare?.toString()).toBe('0.1');
  });

  it('should keep one entry per same-date transaction and attach the reference to the last', () => {
    const first = trade('2020-01-15', 'BUY', '10', '150');
    const second = trade('2020-01-15', 'SELL', '4', '155');
    const reference = ref('2020-01-15', '0.1', '0.001', '0.15');

    const timeline = buildTimeline([first, second], [reference]);

    expect(timeline).toHaveLength(2);
    expect(timeline[0]).toEqual({ date: '2020-01-15', transaction: first, reference: undefined });
    expect(timeline[1]).toEqual({ date: '2020-01-15', transaction: second, reference });
  });

  it('should give duplicate reference dates their own entries', () => {
    const timeline = buildTimeline([], [ref('2020-01-15', '0.1'), ref('2020-01-15', '0.2')]);

    expect(timeline).toHaveLength(2);
    expect(timeline.every((entry) => entry.transaction === undefined)).toBe(true);
  });

  it('should return an empty timeline for empty inputs', () => {
    expect(buildTimeline([], [])).toEqual([]);
  });
});

describe('applyTransaction', () => {
  it('should add buys and subtract sells', () => {
    const afterBuy = applyTransaction(INITIAL_POSITION, trade('2020-01-02', 'BUY', '10', '150.00'));
    const afterSell = applyTransaction(afterBuy, trade('2020-01-03', 'SELL', '4', '160'));

    expect(afterBuy.runningQuantity.toString()).toBe('10');
    expect(afterBuy.runningBasis.toString()).toBe('1500');
    expect(afterSell.runningQuantity.toString()).toBe('6');
    expect(afterSell.runningBasis.toString()).toBe('860');
  });

  it('should pass the state through when there is no trade', () => {
    const state = { runningQuantity: d(3), runningBasis: d(300) };

    expect(applyTransaction(state, undefined)).toBe(state);
  });

  it('should move shares but not basis for a trade without a price', () => {
    const state = applyTransaction(INITIAL_POSITION, trade('2020-01-02', 'BUY', '10'));

    expect(state.runningQuantity.toString()).toBe('10');
    expect(state.runningBasis.isZero()).toBe(true);
  });
});

describe('allocateExpense', () => {
  const position = { runningQuantity: d(10), runningBasis: d(1500) };

  it('should allocate basis in proportion to ounces sold', () => {
    const allocation = allocateExpense(position, ref('2020-01-15', '0.1', '0.001', '0.15'));

    expect(allocation.oz.toString()).toBe('1');
    expect(allocation.ozSold.toString()).toBe('0.01');
    expect(allocation.costSold.toFixed(2)).toBe('15.00');
    expect(allocation.expense?.toFixed(2)).toBe('1.50');
  });

  it('should not allocate cost when ounces per share is absent', () => {
    const allocation = allocateExpense(position, ref('2020-01-15', undefined, '0.001', '0.15'));

    expect(allocation.oz.isZero()).toBe(true);
    expect(allocation.costSold.isZero()).toBe(true);
    expect(allocation.expense?.toFixed(2)).toBe('1.50');
  });

  it('should leave expense absent when proceeds are absent or zero', () => {
    expect(allocateExpense(position, ref('2020-01-15', '0.1', '0.001')).expense).toBeUndefined();
    expect(allocateExpense(position, ref('2020-01-15', '0.1', '0.001', '0')).expense).toBeUndefined();
  });

  it('should treat zero ounces sold like absent for the allocation', () => {
    const allocation = allocateExpense(position, ref('2020-01-15', '0.1', '0', '0.15'));

    expect(allocation.ozSold.isZero()).toBe(true);
    expect(allocation.costSold.isZero()).toBe(true);
  });

  it('should round costs and expenses half to even', () => {
    const unit = { runningQuantity: d(1), runningBasis: d(1) };

    const allocation = allocateExpense(unit, ref('2020-01-15', '1', '0.125', '0.125'));

    expect(allocation.costSold.toFixed(2)).toBe('0.12');
    expect(allocation.expense?.toFixed(2)).toBe('0.12');
  });

  it('should not divide by a negative ounce holding', () => {
    const short = { runningQuantity: d(-5), runningBasis: d(-900) };

    const allocation = allocateExpense(short, ref('2020-01-15', '0.1', '0.001', '0.15'));

    expect(allocation.oz.toString()).toBe('-0.5');
    expect(allocation.costSold.isZero()).toBe(true);
    expect(allocation.expense?.toFixed(2)).toBe('-0.75');
  });

  it('should return zeros for an entry without reference data', () => {
    const allocation = allocateExpense(position, undefined);

    expect(allocation.oz.isZero()).toBe(true);
    expect(allocation.ozSold.isZero()).toBe(true);
    expect(allocation.costSold.isZero()).toBe(true);
    expect(allocation.expense).toBeUndefined();
  });
});

describe('foldPositions', () => {
  it('should visit every timeline entry, including reference-only ones', () => {
    const timeline = buildTimeline(
      [trade('2020-01-02', 'BUY', '10', '150'), trade('2020-02-01', 'BUY', '5', '160')],
      [ref('2020-01-10', '0.1'), ref('2020-01-15', '0.1', '0.001', '0.15')]
    );

    const rows = foldPositions(timeline);

    expect(rows).toHaveLength(4);
    expect(rows.map((row) => row.runningQuantity.toString())).toEqual(['10', '10', '10', '15']);
    expect(rows.map((row) => row.runningBasis.toString())).toEqual(['1500', '1500', '1500', '2300']);
  });

  it('should start from an explicit initial position', () => {
    const rows = foldPositions([{ date: '2020-01-02', transaction: trade('2020-01-02', 'SELL', '1', '100') }], {
      runningQuantity: d(2),
      runningBasis: d(200),
    });

    expect(rows[0]?.runningQuantity.toString()).toBe('1');
    expect(rows[0]?.runningBasis.toString()).toBe('100');
  });
});

describe('isLedgerRow', () => {
  it('should drop rows without a trade or an expense event even when proceeds are present', () => {
    const [row] = foldPositions([{ date: '2020-01-15', reference: ref('2020-01-15', '0.1', undefined, '0.15') }], {
      runningQuantity: d(10),
      runningBasis: d(1500),
    });

    expect(row?.expense?.toFixed(2)).toBe('1.50');
    expect(row && isLedgerRow(row)).toBe(false);
  });

  it('should drop trade rows that recognize nothing', () => {
    const [row] = foldPositions([{ date: '2020-01-02', transaction: trade('2020-01-02', 'BUY', '10', '150') }]);

    expect(row && isLedgerRow(row)).toBe(false);
  });

  it('should drop expense events with zero proceeds and zero cost', () => {
    const [row] = foldPositions([{ date: '2020-01-15', reference: ref('2020-01-15', '0.1', '0', '0') }], {
      runningQuantity: d(10),
      runningBasis: d(1500),
    });

    expect(row && isLedgerRow(row)).toBe(false);
  });
});

describe('reconcileExpenses', () => {
  it('should produce the single expense row of a buy followed by an expense event', () => {
    const report = reconcileExpenses(
      'GLD',
      [trade('2020-01-02', 'BUY', '10', '150.00')],
      [ref('2020-01-15', '0.1', '0.001', '0.15')]
    );

    expect(report.rows).toHaveLength(1);
    const [row] = report.rows;
    expect(row?.symbol).toBe('GLD');
    expect(row?.date).toBe('2020-01-15');
    expect(row?.runningQuantity.toString()).toBe('10');
    expect(row?.runningBasis.toFixed(2)).toBe('1500.00');
    expect(row?.oz.toString()).toBe('1');
    expect(row?.ozSold.toString()).toBe('0.01');
    expect(row?.costSold.toFixed(2)).toBe('15.00');
    expect(row?.expense?.toFixed(2)).toBe('1.50');
  });

  it('should keep an expense row for a short position with zero cost sold', () => {
    const report = reconcileExpenses(
      'GLD',
      [trade('2020-01-02', 'BUY', '10', '150'), trade('2020-01-10', 'SELL', '15', '160')],
      [ref('2020-01-15', '0.1', '0.001', '0.15')]
    );

    expect(report.rows).toHaveLength(1);
    expect(report.rows[0]?.runningQuantity.toString()).toBe('-5');
    expect(report.rows[0]?.runningBasis.toString()).toBe('-900');
    expect(report.rows[0]?.costSold.isZero()).toBe(true);
    expect(report.rows[0]?.expense?.toFixed(2)).toBe('-0.75');
  });

  it('should fold all same-date trades before the expense of that date', () => {
    const report = reconcileExpenses(
      'GLD',
      [trade('2020-01-15', 'BUY', '10', '150'), trade('2020-01-15', 'BUY', '10', '160')],
      [ref('2020-01-15', '0.1', '0.001', '0.15')]
    );

    expect(report.rows).toHaveLength(1);
    expect(report.rows[0]?.runningQuantity.toString()).toBe('20');
    expect(report.rows[0]?.runningBasis.toString()).toBe('3100');
    expect(report.rows[0]?.costSold.toFixed(2)).toBe('31.00');
    expect(report.rows[0]?.expense?.toFixed(2)).toBe('3.00');
  });

  it('should carry the reference fields and drop trade-only rows', () => {
    const report = reconcileExpenses(
      'IAU',
      [trade('2020-01-02', 'BUY', '100', '15'), trade('2020-02-20', 'BUY', '100', '16')],
      [ref('2020-01-31', '0.0095', '0.0000035', '0.0055'), ref('2020-02-28', '0.0095', '0.0000035', '0.0056')]
    );

    expect(report.rows.map((row) => row.date)).toEqual(['2020-01-31', '2020-02-28']);
    expect(report.rows[1]?.proceedsPerShare?.toString()).toBe('0.0056');
    expect(report.rows[1]?.runningQuantity.toString()).toBe('200');
  });

  it('should summarize the ledger', () => {
    const report = reconcileExpenses(
      'GLD',
      [trade('2020-01-02', 'BUY', '10', '150.00')],
      [ref('2020-01-15', '0.1', '0.001', '0.15'), ref('2020-02-14', '0.1', '0.001', '0.15')]
    );

    expect(report.summary.rowCount).toBe(2);
    expect(report.summary.totalExpense.toFixed(2)).toBe('3.00');
    expect(report.summary.totalCostSold.toFixed(2)).toBe('30.00');
  });
});

describe('summarizeExpenses', () => {
  it('should return zero totals for an empty ledger', () => {
    const summary = summarizeExpenses([]);

    expect(summary.rowCount).toBe(0);
    expect(summary.totalCostSold.isZero()).toBe(true);
    expect(summary.totalExpense.isZero()).toBe(true);
  });
});
