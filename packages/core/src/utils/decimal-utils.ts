import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { ParseError } from '../errors/index.js';

// 28 significant digits and half-even rounding for every intermediate result,
// so a multi-year fold does not drift.
Decimal.set({
  maxE: 9e15,
  minE: -9e15,
  modulo: Decimal.ROUND_HALF_EVEN,
  precision: 28,
  rounding: Decimal.ROUND_HALF_EVEN,
  toExpNeg: -7,
  toExpPos: 21,
});

export const ZERO = new Decimal(0);

/** Decimal places of a monetary output column */
export const CENTS_PLACES = 2;

const DECIMAL_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Try to parse a plain base-10 literal into a Decimal.
 * Rejects hex/binary literals, NaN and Infinity, which decimal.js would accept.
 */
export function tryParseDecimal(value: string, out?: { value: Decimal }): boolean {
  const trimmed = value.trim();
  if (!DECIMAL_LITERAL.test(trimmed)) {
    return false;
  }

  const decimal = new Decimal(trimmed);
  if (out) out.value = decimal;
  return true;
}

/**
 * Parse a required decimal literal.
 *
 * @param field - column or option name echoed in the error
 */
export function parseDecimal(value: string, field: string): Result<Decimal, ParseError> {
  const out = { value: ZERO };
  if (!tryParseDecimal(value, out)) {
    return err(new ParseError(`Invalid decimal for ${field}: ${JSON.stringify(value)}`, value));
  }
  return ok(out.value);
}

/**
 * Parse an optional decimal cell. Empty or missing cells are absent, never zero.
 */
export function parseOptionalDecimal(
  value: string | undefined,
  field: string
): Result<Decimal | undefined, ParseError> {
  if (value === undefined || value.trim() === '') {
    return ok(undefined);
  }
  return parseDecimal(value, field);
}

/**
 * Round a monetary amount to cents using banker's rounding
 */
export function roundCents(value: Decimal): Decimal {
  return value.toDecimalPlaces(CENTS_PLACES, Decimal.ROUND_HALF_EVEN);
}

/**
 * Truthiness of an optional decimal: absent and zero both count as "no value"
 */
export function isPresentNonZero(value: Decimal | undefined): value is Decimal {
  return value !== undefined && !value.isZero();
}

/**
 * Convert Decimal to string in plain notation (never exponential)
 */
export function formatDecimal(value: Decimal | undefined): string {
  if (!value) return '';
  return value.toFixed();
}

/**
 * Convert a monetary Decimal to a string with exactly two decimal places
 */
export function formatCents(value: Decimal | undefined): string {
  if (!value) return '';
  return value.toFixed(CENTS_PLACES);
}
