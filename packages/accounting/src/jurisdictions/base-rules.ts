/**
 * Jurisdiction-specific taxation rules
 *
 * This interface allows pluggable jurisdiction-specific logic for:
 * - Whether a disposal is taxable at all (e.g. holding-period exemptions)
 * - The income category each kind of report entry is declared under
 */
export interface ITaxationRules {
  /**
   * Get the jurisdiction code (ISO 3166-1 alpha-2)
   */
  getJurisdiction(): string;

  /**
   * Whether the gain of coins acquired at `acquiredAt` and disposed of at
   * `disposedAt` is taxable
   */
  isDisposalTaxable(acquiredAt: Date, disposedAt: Date): boolean;

  /**
   * Income category of realized and unrealized disposals
   */
  classifyDisposal(): string;

  /**
   * Income category of lending or staking rewards
   * @param coinIsFiat - whether the reward is paid in a fiat currency
   */
  classifyInterest(source: 'coin-lend' | 'staking', coinIsFiat: boolean): string;

  classifyAirdrop(isGift: boolean): string;

  classifyCommission(): string;
}
