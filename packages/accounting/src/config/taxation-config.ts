import { DateSchema, SymbolSchema } from '@coinreckon/core';
import { z } from 'zod';

export const CostBasisMethodSchema = z.enum(['fifo', 'lifo']);

export const TaxationConfigSchema = z.object({
  /** Country code selecting the taxation rules (e.g. 'DE') */
  jurisdiction: SymbolSchema,
  /** Lot consumption order */
  method: CostBasisMethodSchema,
  /** Reporting currency */
  fiatCurrency: SymbolSchema,
  taxYear: z.number().int().min(2009).max(2100),
  /** Keep one balance per platform and coin instead of one per coin */
  multiDepot: z.boolean().default(false),
  /** Report every airdrop as a gift instead of income */
  allAirdropsAreGifts: z.boolean().default(false),
  /** Moment of the evaluation; caps the deadline for a running year. Defaults to now. */
  evaluatedAt: DateSchema.optional(),
});

export type CostBasisMethod = z.infer<typeof CostBasisMethodSchema>;
export type TaxationConfig = z.infer<typeof TaxationConfigSchema>;
export type TaxationConfigInput = z.input<typeof TaxationConfigSchema>;

export interface TaxPeriod {
  start: Date;
  deadline: Date;
}

/**
 * The calendar year in UTC, ending early when the year is still running.
 */
export function getTaxPeriod(taxYear: number, evaluatedAt: Date = new Date()): TaxPeriod {
  const start = new Date(Date.UTC(taxYear, 0, 1, 0, 0, 0, 0));
  const endOfYear = new Date(Date.UTC(taxYear, 11, 31, 23, 59, 59, 0));

  return {
    start,
    deadline: evaluatedAt.getTime() < endOfYear.getTime() ? evaluatedAt : endOfYear,
  };
}

export function isInTaxPeriod(timestamp: Date, period: TaxPeriod): boolean {
  const time = timestamp.getTime();
  return time >= period.start.getTime() && time <= period.deadline.getTime();
}
