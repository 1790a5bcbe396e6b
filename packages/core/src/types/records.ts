import type { Decimal } from 'decimal.js';

import type { CalendarDate } from '../utils/date-utils.js';

const INSTRUCTIONS = ['BUY', 'SELL'] as const;

export type Instruction = (typeof INSTRUCTIONS)[number];

/**
 * One investor trade, as read from the transactions file
 */
export interface TransactionRecord {
  readonly date: CalendarDate;
  readonly instruction: Instruction;
  /** Shares traded, always positive; the instruction carries the sign */
  readonly quantity: Decimal;
  /** Per-share price; absent when the file has no price for the trade */
  readonly price: Decimal | undefined;
}

/**
 * One sponsor-published row of per-share gold figures.
 * Absent and zero are distinct: absent fields never trigger an expense event.
 */
export interface ReferenceRecord {
  readonly date: CalendarDate;
  readonly ouncesPerShare: Decimal | undefined;
  readonly ouncesSoldToCoverExpenses: Decimal | undefined;
  readonly proceedsPerShare: Decimal | undefined;
}

export function isInstruction(value: string): value is Instruction {
  return INSTRUCTIONS.some((instruction) => instruction === value);
}
