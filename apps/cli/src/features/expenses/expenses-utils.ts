// Pure utility functions for the expenses command

import path from 'node:path';

import type { ExpenseRow } from '@trustledger/accounting';
import { formatCents, formatDecimal, parseDecimal } from '@trustledger/core';
import type { Decimal } from 'decimal.js';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { z } from 'zod';

import type { ExpensesCommandOptionsSchema } from '../shared/schemas.js';

/**
 * Expenses command options validated by Zod at CLI boundary
 */
export type ExpensesCommandOptions = z.infer<typeof ExpensesCommandOptionsSchema>;

/**
 * Expenses handler parameters.
 */
export interface ExpensesHandlerParams {
  /** Trust ticker, e.g. GLD */
  symbol: string;

  /** Investor's transactions CSV */
  transactionsPath: string;

  /** Share-split ratio applied to every transaction */
  split?: Decimal | undefined;

  /** Selects `<dataDir>/<taxYear>/gross-proceeds-<symbol>.csv` */
  taxYear: number;

  /** Root of the reference datasets */
  dataDir: string;
}

/**
 * Ledger columns, in output order. The reference columns keep the names of the sponsor's file.
 */
export const EXPENSE_CSV_HEADERS = [
  'symbol',
  'date',
  'ounces_per_share',
  'per_share_ounces_sold_to_cover_expenses',
  'proceeds_per_share',
  'running_quantity',
  'running_basis',
  'oz',
  'oz_sold',
  'cost_sold',
  'expense',
] as const;

/**
 * Build expenses parameters from validated CLI arguments and flags.
 *
 * @param resolveDefaultDataDir - consulted only when --data-dir is absent
 */
export function buildExpensesParamsFromFlags(
  symbol: string,
  transactionsFile: string,
  options: ExpensesCommandOptions,
  resolveDefaultDataDir: () => string,
  today: Date = new Date()
): Result<ExpensesHandlerParams, Error> {
  const trimmedSymbol = symbol.trim();
  if (!trimmedSymbol) {
    return err(new Error('Symbol must not be empty'));
  }

  let split: Decimal | undefined;
  if (options.split !== undefined) {
    const splitResult = parseDecimal(options.split, 'split');
    if (splitResult.isErr()) {
      return err(splitResult.error);
    }
    if (!splitResult.value.greaterThan(0)) {
      return err(new Error(`Split ratio must be positive: ${options.split}`));
    }
    split = splitResult.value;
  }

  return ok({
    symbol: trimmedSymbol,
    transactionsPath: path.resolve(transactionsFile),
    split,
    taxYear: options.taxYear === undefined ? today.getFullYear() : Number(options.taxYear),
    dataDir: options.dataDir === undefined ? resolveDefaultDataDir() : path.resolve(options.dataDir),
  });
}

function escapeCsvValue(value: string): string {
  // RFC 4180: quote fields containing commas, quotes, or newlines and double internal quotes
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replaceAll('"', '""')}"`;
  }
  return value;
}

/**
 * Convert ledger rows to CSV. The header line is always present.
 */
export function convertToCSV(rows: readonly ExpenseRow[]): string {
  const csvLines: string[] = [EXPENSE_CSV_HEADERS.join(',')];

  for (const row of rows) {
    const values = [
      row.symbol,
      row.date,
      formatDecimal(row.ouncesPerShare),
      formatDecimal(row.ouncesSoldToCoverExpenses),
      formatDecimal(row.proceedsPerShare),
      formatDecimal(row.runningQuantity),
      formatDecimal(row.runningBasis),
      formatDecimal(row.oz),
      formatDecimal(row.ozSold),
      formatCents(row.costSold),
      formatCents(row.expense),
    ];

    csvLines.push(values.map(escapeCsvValue).join(','));
  }

  return csvLines.join('\n') + '\n';
}
