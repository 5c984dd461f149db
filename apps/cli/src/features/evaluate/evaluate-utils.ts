import type { CostBasisMethod, TaxationConfigInput, TaxEvaluation } from '@coinreckon/accounting';
import type { TaxationEnvDefaults } from '@coinreckon/env';
import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

const DEFAULT_JURISDICTION = 'DE';
const DEFAULT_METHOD = 'fifo';
const DEFAULT_FIAT_CURRENCY = 'EUR';

/**
 * Options of the evaluate command (validated at the CLI boundary)
 */
export const EvaluateCommandOptionsSchema = z.object({
  ledger: z.string().min(1, 'A ledger file is required (--ledger <file>)'),
  prices: z.string().min(1, 'A price file is required (--prices <file>)'),
  taxYear: z.string().optional(),
  country: z.string().optional(),
  method: z.string().optional(),
  fiat: z.string().optional(),
  multiDepot: z.boolean().optional(),
  airdropsAreGifts: z.boolean().optional(),
  json: z.boolean().optional(),
});

export type EvaluateCommandOptions = z.infer<typeof EvaluateCommandOptionsSchema>;

/**
 * Handler parameters for a tax evaluation
 */
export interface EvaluateHandlerParams {
  ledgerPath: string;
  pricesPath: string;
  config: TaxationConfigInput;
}

function parseTaxYear(year: string): Result<number, Error> {
  if (!/^\d{4}$/.test(year.trim())) {
    return err(new Error(`Invalid tax year '${year}'. Must be a four-digit year (e.g., 2023)`));
  }
  return ok(parseInt(year, 10));
}

function parseMethod(method: string): Result<CostBasisMethod, Error> {
  const normalized = method.trim().toLowerCase();
  if (normalized === 'fifo' || normalized === 'lifo') {
    return ok(normalized);
  }
  return err(new Error(`Invalid method '${method}'. Must be one of: fifo, lifo`));
}

/**
 * Merge command flags over environment defaults over built-in defaults.
 * The tax year falls back to the last completed calendar year.
 */
export function buildEvaluateParamsFromFlags(
  options: EvaluateCommandOptions,
  envDefaults: TaxationEnvDefaults,
  now: Date = new Date()
): Result<EvaluateHandlerParams, Error> {
  let taxYear = envDefaults.taxYear ?? now.getUTCFullYear() - 1;
  if (options.taxYear !== undefined) {
    const parsed = parseTaxYear(options.taxYear);
    if (parsed.isErr()) {
      return err(parsed.error);
    }
    taxYear = parsed.value;
  }

  let method: CostBasisMethod = envDefaults.method ?? DEFAULT_METHOD;
  if (options.method !== undefined) {
    const parsed = parseMethod(options.method);
    if (parsed.isErr()) {
      return err(parsed.error);
    }
    method = parsed.value;
  }

  return ok({
    ledgerPath: options.ledger,
    pricesPath: options.prices,
    config: {
      jurisdiction: (options.country ?? envDefaults.jurisdiction ?? DEFAULT_JURISDICTION).toUpperCase(),
      method,
      fiatCurrency: (options.fiat ?? envDefaults.fiatCurrency ?? DEFAULT_FIAT_CURRENCY).toUpperCase(),
      taxYear,
      multiDepot: options.multiDepot ?? envDefaults.multiDepot ?? false,
      allAirdropsAreGifts: options.airdropsAreGifts ?? envDefaults.allAirdropsAreGifts ?? false,
      evaluatedAt: now,
    },
  });
}

/**
 * Plain JSON value: decimals as fixed-point strings, dates as ISO strings
 */
export function toJsonValue(value: unknown): unknown {
  if (value instanceof Decimal) {
    return value.toFixed();
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map((item) => toJsonValue(item));
  }
  if (typeof value === 'object' && value !== null) {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      if (item !== undefined) {
        result[key] = toJsonValue(item);
      }
    }
    return result;
  }
  return value;
}

/**
 * JSON document of a whole evaluation
 */
export function serializeEvaluation(evaluation: TaxEvaluation): unknown {
  return toJsonValue({
    taxYear: evaluation.taxYear,
    fiatCurrency: evaluation.fiatCurrency,
    period: evaluation.period,
    entries: evaluation.entries,
    portfolio: evaluation.portfolio.entries(),
    warnings: evaluation.warnings,
  });
}
