import {
  ParseError,
  SchemaError,
  isInstruction,
  parseCalendarDate,
  parseDecimal,
  parseOptionalDecimal,
  type TransactionRecord,
} from '@trustledger/core';
import { getLogger } from '@trustledger/logger';
import type { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { atRow, findMissingColumns, readCsvFile, type CsvTable } from '../csv/csv-parser-utils.js';
import { sortByDate } from '../shared/record-utils.js';

const logger = getLogger('TransactionLoader');

export const REQUIRED_TRANSACTION_COLUMNS = ['date', 'instruction', 'quantity'] as const;

export interface TransactionLoadOptions {
  /**
   * Share-split ratio. Every record is rescaled to post-split terms:
   * quantity × split, price ÷ split.
   */
  split?: Decimal | undefined;
}

function parseTransactionRow(row: Record<string, string>): Result<TransactionRecord, ParseError> {
  const dateResult = parseCalendarDate(row['date'] ?? '');
  if (dateResult.isErr()) {
    return err(dateResult.error);
  }

  const instruction = row['instruction'] ?? '';
  if (!isInstruction(instruction)) {
    return err(new ParseError(`Invalid instruction ${JSON.stringify(instruction)}; expected BUY or SELL`, instruction));
  }

  const quantityLiteral = row['quantity'] ?? '';
  const quantityResult = parseDecimal(quantityLiteral, 'quantity');
  if (quantityResult.isErr()) {
    return err(quantityResult.error);
  }
  const quantity = quantityResult.value;
  if (quantity.isZero() || quantity.isNegative()) {
    return err(new ParseError(`Quantity must be positive: ${JSON.stringify(quantityLiteral)}`, quantityLiteral));
  }

  const priceResult = parseOptionalDecimal(row['price'], 'price');
  if (priceResult.isErr()) {
    return err(priceResult.error);
  }

  return ok({ date: dateResult.value, instruction, quantity, price: priceResult.value });
}

/**
 * Rescale a record to post-split share terms
 */
export function applySplit(record: TransactionRecord, split: Decimal): TransactionRecord {
  return {
    ...record,
    quantity: record.quantity.times(split),
    price: record.price?.div(split),
  };
}

/**
 * Convert an already-read transactions table into date-sorted records.
 * Column validation happens before any row is converted.
 */
export function parseTransactionTable(
  table: CsvTable,
  options: TransactionLoadOptions = {}
): Result<TransactionRecord[], SchemaError | ParseError> {
  const missing = findMissingColumns(table.headers, REQUIRED_TRANSACTION_COLUMNS);
  if (missing.length > 0) {
    return err(
      new SchemaError(`Missing required columns in transactions: ${missing.join(', ')}`, missing, {
        additionalContext: { headers: table.headers },
      })
    );
  }

  const { split } = options;
  if (split && (split.isZero() || split.isNegative())) {
    return err(new ParseError(`Split ratio must be positive: ${split.toString()}`, split.toString()));
  }

  const records: TransactionRecord[] = [];
  for (const [index, row] of table.rows.entries()) {
    const result = parseTransactionRow(row);
    if (result.isErr()) {
      return err(atRow(result.error, index));
    }
    records.push(split ? applySplit(result.value, split) : result.value);
  }

  const missingPrices = records.filter((record) => record.price === undefined).length;
  if (missingPrices > 0) {
    logger.warn({ missingPrices }, 'Transactions without a price contribute no cost basis');
  }

  logger.debug({ count: records.length, split: split?.toString() }, 'Parsed transactions');
  return ok(sortByDate(records));
}

/**
 * Load the investor's transactions CSV (columns date, instruction, quantity, optional price)
 */
export function loadTransactions(
  filePath: string,
  options: TransactionLoadOptions = {}
): Result<TransactionRecord[], Error> {
  const tableResult = readCsvFile(filePath);
  if (tableResult.isErr()) {
    return err(tableResult.error);
  }

  logger.info({ filePath, rows: tableResult.value.rows.length }, 'Loaded transactions file');
  return parseTransactionTable(tableResult.value, options);
}
