import { Decimal } from 'decimal.js';
import { z } from 'zod';

import { tryParseDecimal } from '../utils/decimal-utils.js';

// Decimal schema - accepts string, number, or Decimal instance, transforms to Decimal.
// Used for ledger and price documents (strings keep full precision) and in-memory values.
export const DecimalSchema = z
  .union([z.string(), z.number(), z.instanceof(Decimal)])
  .transform((val, ctx) => {
    if (val instanceof Decimal) return val;
    const out = { value: new Decimal(0) };
    if (val === '' || !tryParseDecimal(val, out)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Must be a valid numeric string or number' });
      return z.NEVER;
    }
    return out.value;
  });

export const PositiveDecimalSchema = DecimalSchema.refine((val) => val.greaterThan(0), {
  message: 'Must be greater than zero',
});

export const NonNegativeDecimalSchema = DecimalSchema.refine((val) => val.greaterThanOrEqualTo(0), {
  message: 'Must not be negative',
});

const IsoDateTimeSchema = z.string().datetime({ offset: true });
const IsoDateSchema = z.string().date();

// Date schema - accepts Unix timestamp in milliseconds, ISO 8601 string, or Date instance, transforms to Date.
// Date-times must carry `Z` or an offset so they never fall back to the host's time zone.
export const DateSchema = z
  .union([
    z.number().int().positive(),
    z
      .string()
      .refine((val) => IsoDateTimeSchema.safeParse(val).success || IsoDateSchema.safeParse(val).success, {
        message: 'Must be an ISO 8601 date, or a date-time with Z or a UTC offset',
      }),
    z.date(),
  ])
  .transform((val) => {
    if (typeof val === 'number' || typeof val === 'string') {
      return new Date(val);
    }
    return val;
  });

// Symbol schema - coin or currency code, upper-cased
export const SymbolSchema = z
  .string()
  .trim()
  .min(1, 'Symbol must not be empty')
  .transform((val) => val.toUpperCase());
