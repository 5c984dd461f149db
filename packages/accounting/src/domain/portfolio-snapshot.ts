import { Decimal } from 'decimal.js';

export interface PortfolioHolding {
  platform: string;
  coin: string;
  amount: Decimal;
}

/**
 * Holdings at the evaluation deadline, platform → coin → amount.
 * Unknown platforms or coins read as zero.
 */
export class PortfolioSnapshot {
  private readonly holdings = new Map<string, Map<string, Decimal>>();

  add(platform: string, coin: string, amount: Decimal): void {
    let coins = this.holdings.get(platform);
    if (!coins) {
      coins = new Map();
      this.holdings.set(platform, coins);
    }
    coins.set(coin, (coins.get(coin) ?? new Decimal(0)).plus(amount));
  }

  get(platform: string, coin: string): Decimal {
    return this.holdings.get(platform)?.get(coin) ?? new Decimal(0);
  }

  /**
   * Amount of a coin summed over every platform
   */
  getTotal(coin: string): Decimal {
    let total = new Decimal(0);
    for (const coins of this.holdings.values()) {
      total = total.plus(coins.get(coin) ?? 0);
    }
    return total;
  }

  platforms(): string[] {
    return [...this.holdings.keys()];
  }

  /**
   * Holdings in insertion order
   */
  entries(): PortfolioHolding[] {
    const result: PortfolioHolding[] = [];
    for (const [platform, coins] of this.holdings) {
      for (const [coin, amount] of coins) {
        result.push({ platform, coin, amount });
      }
    }
    return result;
  }

  isEmpty(): boolean {
    return this.holdings.size === 0;
  }
}
