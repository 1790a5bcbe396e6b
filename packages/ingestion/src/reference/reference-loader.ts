import fs from 'node:fs';
import path from 'node:path';

import {
  NotFoundError,
  ParseError,
  SchemaError,
  parseCalendarDate,
  parseOptionalDecimal,
  type ReferenceRecord,
} from '@trustledger/core';
import { getLogger } from '@trustledger/logger';
import { err, ok, type Result } from 'neverthrow';

import { atRow, findMissingColumns, readCsvFile, type CsvTable } from '../csv/csv-parser-utils.js';
import { sortByDate } from '../shared/record-utils.js';

const logger = getLogger('ReferenceLoader');

/** Header names of the sponsor's gross proceeds files */
export const REFERENCE_COLUMNS = {
  date: 'date',
  ouncesPerShare: 'ounces_per_share',
  ouncesSoldToCoverExpenses: 'per_share_ounces_sold_to_cover_expenses',
  proceedsPerShare: 'proceeds_per_share',
} as const;

const REQUIRED_REFERENCE_COLUMNS = Object.values(REFERENCE_COLUMNS);

const SYMBOL_PATTERN = /^[A-Za-z0-9][A-Za-z0-9.-]*$/;

/**
 * Identifies one reference dataset: `<dataDir>/[<taxYear>/]gross-proceeds-<symbol>.csv`
 */
export interface ReferenceDatasetLocator {
  dataDir: string;
  symbol: string;
  /** Omit for the flat, year-less layout */
  taxYear?: number | undefined;
}

export function resolveReferencePath(locator: ReferenceDatasetLocator): Result<string, ParseError> {
  const { dataDir, symbol, taxYear } = locator;
  if (!SYMBOL_PATTERN.test(symbol)) {
    return err(new ParseError(`Invalid symbol ${JSON.stringify(symbol)}`, symbol));
  }

  const fileName = `gross-proceeds-${symbol}.csv`;
  return ok(taxYear === undefined ? path.join(dataDir, fileName) : path.join(dataDir, String(taxYear), fileName));
}

function parseReferenceRow(row: Record<string, string>): Result<ReferenceRecord, ParseError> {
  const dateResult = parseCalendarDate(row[REFERENCE_COLUMNS.date] ?? '');
  if (dateResult.isErr()) {
    return err(dateResult.error);
  }

  const ouncesPerShare = parseOptionalDecimal(row[REFERENCE_COLUMNS.ouncesPerShare], REFERENCE_COLUMNS.ouncesPerShare);
  if (ouncesPerShare.isErr()) return err(ouncesPerShare.error);

  const ouncesSold = parseOptionalDecimal(
    row[REFERENCE_COLUMNS.ouncesSoldToCoverExpenses],
    REFERENCE_COLUMNS.ouncesSoldToCoverExpenses
  );
  if (ouncesSold.isErr()) return err(ouncesSold.error);

  const proceeds = parseOptionalDecimal(row[REFERENCE_COLUMNS.proceedsPerShare], REFERENCE_COLUMNS.proceedsPerShare);
  if (proceeds.isErr()) return err(proceeds.error);

  return ok({
    date: dateResult.value,
    ouncesPerShare: ouncesPerShare.value,
    ouncesSoldToCoverExpenses: ouncesSold.value,
    proceedsPerShare: proceeds.value,
  });
}

/**
 * Convert an already-read gross proceeds table into date-sorted records
 */
export function parseReferenceTable(table: CsvTable): Result<ReferenceRecord[], SchemaError | ParseError> {
  const missing = findMissingColumns(table.headers, REQUIRED_REFERENCE_COLUMNS);
  if (missing.length > 0) {
    return err(
      new SchemaError(`Missing required columns in reference data: ${missing.join(', ')}`, missing, {
        additionalContext: { headers: table.headers },
      })
    );
  }

  const records: ReferenceRecord[] = [];
  for (const [index, row] of table.rows.entries()) {
    const result = parseReferenceRow(row);
    if (result.isErr()) {
      return err(atRow(result.error, index));
    }
    records.push(result.value);
  }

  return ok(sortByDate(records));
}

/**
 * Locate and parse the sponsor reference dataset for one symbol (and tax year)
 */
export function loadReference(locator: ReferenceDatasetLocator): Result<ReferenceRecord[], Error> {
  const pathResult = resolveReferencePath(locator);
  if (pathResult.isErr()) {
    return err(pathResult.error);
  }

  const filePath = pathResult.value;
  if (!fs.existsSync(filePath)) {
    const scope = locator.taxYear === undefined ? '' : ` (tax year ${locator.taxYear})`;
    return err(
      new NotFoundError(`No reference dataset for ${locator.symbol}${scope}: ${filePath}`, filePath, {
        additionalContext: { symbol: locator.symbol, taxYear: locator.taxYear },
      })
    );
  }

  const tableResult = readCsvFile(filePath);
  if (tableResult.isErr()) {
    return err(tableResult.error);
  }

  const recordsResult = parseReferenceTable(tableResult.value);
  if (recordsResult.isOk()) {
    logger.info(
      { symbol: locator.symbol, taxYear: locator.taxYear, records: recordsResult.value.length },
      'Loaded reference dataset'
    );
  }
  return recordsResult;
}
