import fs from 'node:fs';

import { NotFoundError, ParseError, getErrorMessage, isNodeError, wrapError } from '@trustledger/core';
import { parse } from 'csv-parse/sync';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

/**
 * Header-keyed rows of a CSV file. Cells are trimmed strings; short rows omit trailing keys.
 */
export interface CsvTable {
  headers: string[];
  rows: Record<string, string>[];
}

const CsvRowsSchema = z.array(z.record(z.string(), z.string()));

/**
 * Parse CSV text with a header row into a CsvTable
 * @param source Label for error messages (usually the file path)
 */
export function parseCsvContent(content: string, source: string): Result<CsvTable, ParseError> {
  const cleanContent = content.replace(/^\uFEFF/, ''); // Remove BOM
  let headers: string[] = [];

  let records: unknown;
  try {
    records = parse(cleanContent, {
      columns: (header: string[]) => {
        headers = header.map((column) => column.trim());
        return headers;
      },
      relax_column_count: true,
      skip_empty_lines: true,
      trim: true,
    });
  } catch (error) {
    return err(new ParseError(`Malformed CSV in ${source}: ${getErrorMessage(error)}`, source, { cause: error }));
  }

  const rows = CsvRowsSchema.safeParse(records);
  if (!rows.success) {
    return err(new ParseError(`Unexpected CSV structure in ${source}`, source, { cause: rows.error }));
  }

  return ok({ headers, rows: rows.data });
}

/**
 * Read and parse a CSV file synchronously. The file handle is released before returning.
 */
export function readCsvFile(filePath: string): Result<CsvTable, Error> {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      return err(new NotFoundError(`File not found: ${filePath}`, filePath, { cause: error }));
    }
    return wrapError(error, `Failed to read ${filePath}`);
  }

  return parseCsvContent(content, filePath);
}

/**
 * Columns from `required` that the header row lacks, in `required` order
 */
export function findMissingColumns(headers: readonly string[], required: readonly string[]): string[] {
  const present = new Set(headers);
  return required.filter((column) => !present.has(column));
}

/**
 * Re-raise a row error with the 1-based data row it came from
 */
export function atRow(error: ParseError, rowIndex: number): ParseError {
  const row = rowIndex + 1;
  return new ParseError(`${error.message} (row ${row})`, error.literal, {
    additionalContext: { row },
    cause: error,
  });
}
