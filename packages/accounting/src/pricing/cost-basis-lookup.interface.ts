/**
 * Interface for valuing coin amounts in the reporting currency
 *
 * The taxation engine defines what it needs; the CLI or a caller provides the
 * implementation (price table, exchange API, cache).
 */

import type { Decimal } from 'decimal.js';
import type { Result } from 'neverthrow';

import type { Fee } from '../domain/schemas.js';

/**
 * Something that moved `change` coins on a platform at a point in time
 */
export interface PricedItem {
  platform: string;
  coin: string;
  change: Decimal;
  timestamp: Date;
}

export interface ICostBasisLookup {
  /**
   * Fiat value of the whole item at its timestamp
   */
  getCost(item: PricedItem): Promise<Result<Decimal, Error>>;

  /**
   * Fiat value of `proportion` of the item at its timestamp
   */
  getPartialCost(item: PricedItem, proportion: Decimal): Promise<Result<Decimal, Error>>;
}

/**
 * A fee valued on the platform and at the time of the operation that paid it
 */
export function toPricedFee(fee: Fee, operation: { platform: string; timestamp: Date }): PricedItem {
  return {
    platform: operation.platform,
    coin: fee.coin,
    change: fee.change,
    timestamp: operation.timestamp,
  };
}
