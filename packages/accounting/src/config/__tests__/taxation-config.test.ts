import { describe, expect, it } from 'vitest';

import { getTaxPeriod, isInTaxPeriod, TaxationConfigSchema } from '../taxation-config.js';

describe('getTaxPeriod', () => {
  it('should cover the whole calendar year once it has ended', () => {
    const period = getTaxPeriod(2022, new Date('2023-03-01T00:00:00Z'));

    expect(period.start.toISOString()).toBe('2022-01-01T00:00:00.000Z');
    expect(period.deadline.toISOString()).toBe('2022-12-31T23:59:59.000Z');
  });

  it('should end at the evaluation time for a running year', () => {
    const period = getTaxPeriod(2023, new Date('2023-07-15T12:00:00Z'));

    expect(period.deadline.toISOString()).toBe('2023-07-15T12:00:00.000Z');
  });
});

describe('isInTaxPeriod', () => {
  const period = getTaxPeriod(2022, new Date('2023-03-01T00:00:00Z'));

  it('should include both boundaries', () => {
    expect(isInTaxPeriod(new Date('2022-01-01T00:00:00Z'), period)).toBe(true);
    expect(isInTaxPeriod(new Date('2022-12-31T23:59:59Z'), period)).toBe(true);
  });

  it('should exclude timestamps outside the year', () => {
    expect(isInTaxPeriod(new Date('2021-12-31T23:59:59Z'), period)).toBe(false);
    expect(isInTaxPeriod(new Date('2023-01-01T00:00:00Z'), period)).toBe(false);
  });
});

describe('TaxationConfigSchema', () => {
  it('should reject unknown cost basis methods', () => {
    const result = TaxationConfigSchema.safeParse({
      jurisdiction: 'DE',
      method: 'average-cost',
      fiatCurrency: 'EUR',
      taxYear: 2023,
    });

    expect(result.success).toBe(false);
  });
});
