import { normalizeSymbol } from '@coinreckon/core';
import { getLogger } from '@coinreckon/logger';
import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import type { PriceQuote } from '../domain/schemas.js';
import { PriceUnavailableError } from '../errors.js';

import type { ICostBasisLookup, PricedItem } from './cost-basis-lookup.interface.js';

/**
 * Cost basis lookup over a fixed list of quotes.
 *
 * The reporting currency is always worth 1. Any other coin takes the latest
 * quote at or before the requested time, from the requested platform if it
 * has one and from the platform-less quotes otherwise.
 */
export class InMemoryPriceTable implements ICostBasisLookup {
  private readonly logger = getLogger('InMemoryPriceTable');
  private readonly quotesByCoin = new Map<string, PriceQuote[]>();
  private readonly fiatCurrency: string;

  constructor(quotes: readonly PriceQuote[], fiatCurrency: string) {
    this.fiatCurrency = normalizeSymbol(fiatCurrency);

    for (const quote of quotes) {
      const coin = normalizeSymbol(quote.coin);
      const list = this.quotesByCoin.get(coin) ?? [];
      list.push(quote);
      this.quotesByCoin.set(coin, list);
    }
    for (const list of this.quotesByCoin.values()) {
      list.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
    }

    this.logger.debug({ coins: this.quotesByCoin.size, quotes: quotes.length }, 'Price table loaded');
  }

  getPrice(platform: string, coin: string, at: Date): Result<Decimal, Error> {
    const symbol = normalizeSymbol(coin);
    if (symbol === this.fiatCurrency) {
      return ok(new Decimal(1));
    }

    const quotes = this.quotesByCoin.get(symbol) ?? [];
    const quote =
      findLatest(quotes, at, (candidate) => candidate.platform === platform) ??
      findLatest(quotes, at, (candidate) => candidate.platform === undefined);

    if (!quote) {
      return err(new PriceUnavailableError(platform, symbol, at, this.fiatCurrency));
    }
    return ok(quote.price);
  }

  getCost(item: PricedItem): Promise<Result<Decimal, Error>> {
    return Promise.resolve(
      this.getPrice(item.platform, item.coin, item.timestamp).map((price) => price.times(item.change))
    );
  }

  getPartialCost(item: PricedItem, proportion: Decimal): Promise<Result<Decimal, Error>> {
    return Promise.resolve(
      this.getPrice(item.platform, item.coin, item.timestamp).map((price) =>
        price.times(item.change).times(proportion)
      )
    );
  }
}

function findLatest(
  sortedQuotes: PriceQuote[],
  at: Date,
  matches: (quote: PriceQuote) => boolean
): PriceQuote | undefined {
  for (let index = sortedQuotes.length - 1; index >= 0; index--) {
    const quote = sortedQuotes[index];
    if (quote && quote.timestamp.getTime() <= at.getTime() && matches(quote)) {
      return quote;
    }
  }
  return undefined;
}
