import { tryParseDecimal } from '@trustledger/core';
import { Decimal } from 'decimal.js';
import { z } from 'zod';

export const MIN_TAX_YEAR = 1900;
export const MAX_TAX_YEAR = 2100;

export const VerboseFlagSchema = z.object({
  verbose: z.boolean().optional(),
});

function isPositiveDecimal(value: string): boolean {
  const out = { value: new Decimal(0) };
  return tryParseDecimal(value, out) && out.value.greaterThan(0);
}

/**
 * Expenses command options (commander hands every value over as a string)
 */
export const ExpensesCommandOptionsSchema = z
  .object({
    split: z
      .string()
      .refine(isPositiveDecimal, (value) => ({ message: `Split ratio must be a positive decimal, got "${value}"` }))
      .optional(),
    taxYear: z
      .string()
      .regex(/^\d{4}$/, 'Tax year must be a four-digit year')
      .refine((value) => Number(value) >= MIN_TAX_YEAR && Number(value) <= MAX_TAX_YEAR, {
        message: `Tax year must be between ${MIN_TAX_YEAR} and ${MAX_TAX_YEAR}`,
      })
      .optional(),
    dataDir: z.string().min(1, 'Data directory must not be empty').optional(),
  })
  .extend(VerboseFlagSchema.shape);
