import type { ITaxationRules } from './base-rules.js';

const OTHER_INCOME = 'Sonstige Einkünfte';
const CAPITAL_INCOME = 'Einkünfte aus Kapitalvermögen';
const OTHER_SERVICES_INCOME = 'Einkünfte aus sonstigen Leistungen';
const GIFT = 'Schenkung';

/**
 * Germany taxation rules
 *
 * Key features:
 * - Private disposals are taxable only within the speculation period: coins
 *   held for more than one year are sold tax-free
 * - Disposal gains are declared as other income ("Sonstige Einkünfte")
 * - Interest paid in fiat is capital income; crypto rewards, commissions and
 *   airdrops count as income from other services, unless the airdrop is a gift
 */
export class GermanyRules implements ITaxationRules {
  getJurisdiction(): string {
    return 'DE';
  }

  isDisposalTaxable(acquiredAt: Date, disposedAt: Date): boolean {
    return addUtcYears(acquiredAt, 1).getTime() >= disposedAt.getTime();
  }

  classifyDisposal(): string {
    return OTHER_INCOME;
  }

  classifyInterest(source: 'coin-lend' | 'staking', coinIsFiat: boolean): string {
    return source === 'coin-lend' && coinIsFiat ? CAPITAL_INCOME : OTHER_SERVICES_INCOME;
  }

  classifyAirdrop(isGift: boolean): string {
    return isGift ? GIFT : OTHER_SERVICES_INCOME;
  }

  classifyCommission(): string {
    return OTHER_SERVICES_INCOME;
  }
}

/**
 * Same instant `years` later; Feb 29 becomes Feb 28 in non-leap years.
 */
export function addUtcYears(date: Date, years: number): Date {
  const year = date.getUTCFullYear() + years;
  const month = date.getUTCMonth();
  const lastDayOfMonth = new Date(Date.UTC(year, month + 1, 0)).getUTCDate();

  return new Date(
    Date.UTC(
      year,
      month,
      Math.min(date.getUTCDate(), lastDayOfMonth),
      date.getUTCHours(),
      date.getUTCMinutes(),
      date.getUTCSeconds(),
      date.getUTCMilliseconds()
    )
  );
}
