import { ValidationError } from '@coinreckon/core';
import { Decimal } from 'decimal.js';
import { beforeEach, describe, expect, it } from 'vitest';

import {
  createAirdrop,
  createBuy,
  createCoinLendInterest,
  createCommission,
  createDeposit,
  createSell,
  createStakingInterest,
  createWithdrawal,
  resetOperationIds,
} from '../../__tests__/test-utils.js';
import type { TaxationConfigInput } from '../../config/taxation-config.js';
import type { SellReportEntry, TaxReportEntry, TransferReportEntry } from '../../domain/report-entries.js';
import type { Operation, PriceQuote } from '../../domain/schemas.js';
import {
  InsufficientBalanceError,
  PostDeadlineOperationError,
  PriceUnavailableError,
  UnsupportedJurisdictionError,
  UnsupportedOperationError,
} from '../../errors.js';
import type { PricedItem } from '../../pricing/cost-basis-lookup.interface.js';
import { InMemoryPriceTable } from '../../pricing/in-memory-price-table.js';
import { TaxationEngine } from '../taxation-engine.js';

const baseConfig: TaxationConfigInput = {
  jurisdiction: 'DE',
  method: 'fifo',
  fiatCurrency: 'EUR',
  taxYear: 2023,
  evaluatedAt: new Date('2024-06-01T00:00:00Z'),
};

function quote(coin: string, timestamp: string, price: string, platform?: string): PriceQuote {
  return { coin, timestamp: new Date(timestamp), price: new Decimal(price), ...(platform ? { platform } : {}) };
}

async function evaluate(operations: Operation[], quotes: PriceQuote[], config: Partial<TaxationConfigInput> = {}) {
  const engine = TaxationEngine.create({ ...baseConfig, ...config }, new InMemoryPriceTable(quotes, 'EUR'));
  return engine._unsafeUnwrap().evaluate(operations);
}

function sells(entries: TaxReportEntry[]): SellReportEntry[] {
  return entries.filter((entry): entry is SellReportEntry => entry.kind === 'sell');
}

function transfers(entries: TaxReportEntry[]): TransferReportEntry[] {
  return entries.filter((entry): entry is TransferReportEntry => entry.kind === 'transfer');
}

describe('TaxationEngine', () => {
  beforeEach(() => {
    resetOperationIds();
  });

  describe('create', () => {
    it('should reject unknown jurisdictions', () => {
      const result = TaxationEngine.create({ ...baseConfig, jurisdiction: 'XX' }, new InMemoryPriceTable([], 'EUR'));

      expect(result._unsafeUnwrapErr()).toBeInstanceOf(UnsupportedJurisdictionError);
    });

    it('should reject an invalid configuration', () => {
      const result = TaxationEngine.create({ ...baseConfig, taxYear: 1999 }, new InMemoryPriceTable([], 'EUR'));

      const error = result._unsafeUnwrapErr();
      expect(error).toBeInstanceOf(ValidationError);
      expect(error.message).toBe('Invalid taxation configuration: taxYear: Number must be greater than or equal to 2009');
    });

    it('should normalize codes and apply defaults', () => {
      const engine = TaxationEngine.create(
        { ...baseConfig, jurisdiction: 'de', fiatCurrency: 'eur' },
        new InMemoryPriceTable([], 'EUR')
      )._unsafeUnwrap();

      expect(engine.getConfig().jurisdiction).toBe('DE');
      expect(engine.getConfig().fiatCurrency).toBe('EUR');
      expect(engine.getConfig().multiDepot).toBe(false);
      expect(engine.getConfig().allAirdropsAreGifts).toBe(false);
    });
  });

  describe('evaluate', () => {
    it('should report the gain of a realized sell', async () => {
      const buy = createBuy('1', '2023-01-01T00:00:00Z');
      const sell = createSell('1', '2023-01-02T00:00:00Z');

      const evaluation = (
        await evaluate([sell, buy], [quote('BTC', '2023-01-01T00:00:00Z', '100'), quote('BTC', '2023-01-02T00:00:00Z', '150')])
      )._unsafeUnwrap();

      expect(evaluation.entries).toHaveLength(1);
      const [entry] = sells(evaluation.entries);
      expect(entry!.realized).toBe(true);
      expect(entry!.buyValueInFiat.toFixed()).toBe('100');
      expect(entry!.sellValueInFiat.toFixed()).toBe('150');
      expect(entry!.gainInFiat.toFixed()).toBe('50');
      expect(entry!.isTaxable).toBe(true);
      expect(entry!.taxableGainInFiat.toFixed()).toBe('50');
      expect(entry!.taxationType).toBe('Sonstige Einkünfte');
      expect(evaluation.portfolio.isEmpty()).toBe(true);
      expect(evaluation.warnings).toEqual([]);
    });

    it('should value held coins as unrealized sells at the deadline', async () => {
      const buy = createBuy('1', '2023-01-01T00:00:00Z');

      const evaluation = (
        await evaluate([buy], [quote('BTC', '2023-01-01T00:00:00Z', '100'), quote('BTC', '2023-06-01T00:00:00Z', '200')])
      )._unsafeUnwrap();

      const [entry] = sells(evaluation.entries);
      expect(entry!.realized).toBe(false);
      expect(entry!.sellTimestamp.toISOString()).toBe('2023-12-31T23:59:59.000Z');
      expect(entry!.gainInFiat.toFixed()).toBe('100');
      expect(entry!.taxableGainInFiat.toFixed()).toBe('100');
      expect(evaluation.portfolio.get('kraken', 'BTC').toFixed()).toBe('1');
      expect(evaluation.period.deadline.toISOString()).toBe('2023-12-31T23:59:59.000Z');
    });

    it('should match FIFO and LIFO lots differently', async () => {
      const operations = (): Operation[] => [
        createBuy('1', '2023-01-01T00:00:00Z'),
        createBuy('1', '2023-01-02T00:00:00Z'),
        createSell('1', '2023-01-03T00:00:00Z'),
      ];
      const quotes = [
        quote('BTC', '2023-01-01T00:00:00Z', '100'),
        quote('BTC', '2023-01-02T00:00:00Z', '120'),
        quote('BTC', '2023-01-03T00:00:00Z', '150'),
      ];

      const fifo = (await evaluate(operations(), quotes))._unsafeUnwrap();
      const lifo = (await evaluate(operations(), quotes, { method: 'lifo' }))._unsafeUnwrap();

      expect(sells(fifo.entries).filter((entry) => entry.realized)[0]!.gainInFiat.toFixed()).toBe('50');
      expect(sells(lifo.entries).filter((entry) => entry.realized)[0]!.gainInFiat.toFixed()).toBe('30');
    });

    it('should deduct disposal fees and keep fiat lots out of the unrealized entries', async () => {
      const operations = [
        createBuy('1', '2023-01-01T00:00:00Z'),
        createBuy('150', '2023-01-02T00:00:00Z', { coin: 'EUR' }),
        createSell('1', '2023-01-02T00:00:00Z', { fees: [{ coin: 'EUR', change: '3' }] }),
      ];

      const evaluation = (
        await evaluate(operations, [quote('BTC', '2023-01-01T00:00:00Z', '100'), quote('BTC', '2023-01-02T00:00:00Z', '150')])
      )._unsafeUnwrap();

      expect(evaluation.entries).toHaveLength(1);
      const [entry] = sells(evaluation.entries);
      expect(entry!.fees.map((fee) => [fee.coin, fee.amount.toFixed(), fee.inFiat.toFixed()])).toEqual([
        ['EUR', '3', '3'],
      ]);
      expect(entry!.gainInFiat.toFixed()).toBe('47');
      expect(evaluation.portfolio.get('kraken', 'EUR').toFixed()).toBe('147');
    });

    it('should split sell fees over matched lots without changing their total', async () => {
      const fees = [
        { coin: 'EUR', change: '4' },
        { coin: 'BNB', change: '0.5' },
      ];
      const feeCoins = (): Operation[] => [
        createBuy('10', '2023-01-01T00:00:00Z', { coin: 'EUR' }),
        createBuy('1', '2023-01-01T00:00:00Z', { coin: 'BNB' }),
      ];
      const quotes = [
        quote('BTC', '2023-01-01T00:00:00Z', '100'),
        quote('BTC', '2023-01-03T00:00:00Z', '150'),
        quote('BNB', '2023-01-01T00:00:00Z', '20'),
      ];
      const feeTotals = (entries: SellReportEntry[]) => {
        const totals = new Map<string, [Decimal, Decimal]>();
        for (const fee of entries.flatMap((entry) => entry.fees)) {
          const [amount, inFiat] = totals.get(fee.coin) ?? [new Decimal(0), new Decimal(0)];
          totals.set(fee.coin, [amount.plus(fee.amount), inFiat.plus(fee.inFiat)]);
        }
        return [...totals].map(([coin, [amount, inFiat]]) => [coin, amount.toFixed(), inFiat.toFixed()]);
      };

      const split = (
        await evaluate(
          [
            ...feeCoins(),
            createBuy('1', '2023-01-01T00:00:00Z'),
            createBuy('1', '2023-01-02T00:00:00Z'),
            createSell('2', '2023-01-03T00:00:00Z', { fees }),
          ],
          quotes
        )
      )._unsafeUnwrap();
      const whole = (
        await evaluate(
          [...feeCoins(), createBuy('2', '2023-01-01T00:00:00Z'), createSell('2', '2023-01-03T00:00:00Z', { fees })],
          quotes
        )
      )._unsafeUnwrap();

      const splitSells = sells(split.entries).filter((entry) => entry.realized);
      const wholeSells = sells(whole.entries).filter((entry) => entry.realized);
      expect(splitSells).toHaveLength(2);
      expect(wholeSells).toHaveLength(1);
      expect(feeTotals(splitSells)).toEqual([
        ['EUR', '4', '4'],
        ['BNB', '0.5', '10'],
      ]);
      expect(feeTotals(splitSells)).toEqual(feeTotals(wholeSells));
    });

    it('should add buy fees to the cost basis', async () => {
      const operations = [
        createBuy('1', '2023-01-01T00:00:00Z', { fees: [{ coin: 'EUR', change: '2' }] }),
        createSell('1', '2023-01-02T00:00:00Z'),
      ];

      const evaluation = (
        await evaluate(operations, [quote('BTC', '2023-01-01T00:00:00Z', '100'), quote('BTC', '2023-01-02T00:00:00Z', '150')])
      )._unsafeUnwrap();

      const [entry] = sells(evaluation.entries);
      expect(entry!.buyValueInFiat.toFixed()).toBe('102');
      expect(entry!.fees).toEqual([]);
      expect(entry!.gainInFiat.toFixed()).toBe('48');
    });

    it('should trace a transferred sell exactly when the amounts do not divide evenly', async () => {
      const operations = [
        createBuy('1.4', '2023-01-01T00:00:00Z', { id: 'b1' }),
        createWithdrawal('1.4', '2023-02-01T00:00:00Z', { id: 'w1' }),
        createDeposit('1.4', '2023-02-02T00:00:00Z', { id: 'd1', linkId: 'w1', platform: 'binance' }),
        createSell('0.2', '2023-03-01T00:00:00Z', { platform: 'binance', fees: [{ coin: 'BTC', change: '0.001' }] }),
      ];

      const evaluation = (
        await evaluate(
          operations,
          [quote('BTC', '2023-01-01T00:00:00Z', '100'), quote('BTC', '2023-03-01T00:00:00Z', '150')],
          { multiDepot: true }
        )
      )._unsafeUnwrap();

      const [sell] = sells(evaluation.entries).filter((entry) => entry.realized);
      expect(sell!.buyPlatform).toBe('kraken');
      expect(sell!.amount.toFixed()).toBe('0.2');
      expect(sell!.sellValueInFiat.toFixed()).toBe('30');
      expect(sell!.fees.map((fee) => [fee.coin, fee.amount.toFixed(), fee.inFiat.toFixed()])).toEqual([
        ['BTC', '0.001', '0.15'],
      ]);
      expect(evaluation.portfolio.get('binance', 'BTC').toFixed()).toBe('1.199');
    });

    it('should trace transferred coins to their original purchase', async () => {
      const operations = [
        createBuy('1', '2023-01-01T00:00:00Z', { id: 'b1' }),
        createWithdrawal('1', '2023-02-01T00:00:00Z', { id: 'w1' }),
        createDeposit('0.9', '2023-02-02T00:00:00Z', { id: 'd1', linkId: 'w1', platform: 'binance' }),
        createSell('0.9', '2023-03-01T00:00:00Z', { platform: 'binance' }),
      ];

      const evaluation = (
        await evaluate(
          operations,
          [quote('BTC', '2023-01-01T00:00:00Z', '100'), quote('BTC', '2023-03-01T00:00:00Z', '150')],
          { multiDepot: true }
        )
      )._unsafeUnwrap();

      expect(evaluation.entries.map((entry) => entry.kind)).toEqual(['transfer', 'sell']);
      const [transfer] = transfers(evaluation.entries);
      expect(transfer!.depositPlatform).toBe('binance');
      expect(transfer!.withdrawalPlatform).toBe('kraken');
      expect(transfer!.feeAmount.toFixed()).toBe('0.1');
      expect(transfer!.feeInFiat.toFixed()).toBe('10');
      expect(transfer!.isTaxable).toBe(false);

      const [sell] = sells(evaluation.entries);
      expect(sell!.buyPlatform).toBe('kraken');
      expect(sell!.sellPlatform).toBe('binance');
      expect(sell!.buyTimestamp.toISOString()).toBe('2023-01-01T00:00:00.000Z');
      expect(sell!.amount.toFixed()).toBe('0.9');
      expect(sell!.buyValueInFiat.toFixed()).toBe('90');
      expect(sell!.sellValueInFiat.toFixed()).toBe('135');
      expect(sell!.gainInFiat.toFixed()).toBe('45');
      expect(sell!.excludedTransferFee.toFixed()).toBe('0.1');
      expect(evaluation.warnings.map((warning) => warning.code)).toEqual(['transfer-fee-excluded']);
    });

    it('should report income from interest, airdrops and commissions', async () => {
      const operations = [
        createStakingInterest('0.5', '2023-04-01T00:00:00Z', { coin: 'ETH' }),
        createCoinLendInterest('2', '2023-04-02T00:00:00Z', { coin: 'EUR' }),
        createAirdrop('100', '2023-04-03T00:00:00Z', { coin: 'XYZ' }),
        createCommission('0.1', '2023-04-04T00:00:00Z', { coin: 'ETH' }),
      ];

      const evaluation = (
        await evaluate(
          operations,
          [quote('ETH', '2023-01-01T00:00:00Z', '10'), quote('XYZ', '2023-01-01T00:00:00Z', '0.5')],
          { allAirdropsAreGifts: true }
        )
      )._unsafeUnwrap();

      const income = evaluation.entries
        .filter((entry) => entry.kind !== 'sell')
        .map((entry) => [entry.kind, entry.taxationType, entry.taxableGainInFiat.toFixed()]);
      expect(income).toEqual([
        ['interest', 'Einkünfte aus sonstigen Leistungen', '5'],
        ['interest', 'Einkünfte aus Kapitalvermögen', '2'],
        ['airdrop', 'Schenkung', '50'],
        ['commission', 'Einkünfte aus sonstigen Leistungen', '1'],
      ]);
      expect(sells(evaluation.entries).map((entry) => entry.coin)).toEqual(['ETH', 'ETH', 'XYZ']);
    });

    it('should warn once about untracked lending', async () => {
      const operations = [
        createBuy('1', '2023-01-01T00:00:00Z'),
        { ...createBuy('0.5', '2023-01-02T00:00:00Z'), kind: 'coin-lend' as const },
        { ...createBuy('0.5', '2023-01-03T00:00:00Z'), kind: 'coin-lend-end' as const },
      ];

      const evaluation = (await evaluate(operations, [quote('BTC', '2023-01-01T00:00:00Z', '100')]))._unsafeUnwrap();

      expect(evaluation.warnings.map((warning) => warning.code)).toEqual(['lending-not-tracked']);
      expect(evaluation.portfolio.get('kraken', 'BTC').toFixed()).toBe('1');
    });

    it('should not report sells before the tax year', async () => {
      const operations = [createBuy('2', '2022-01-01T00:00:00Z'), createSell('1', '2022-06-01T00:00:00Z')];

      const evaluation = (
        await evaluate(operations, [quote('BTC', '2022-01-01T00:00:00Z', '100'), quote('BTC', '2022-06-01T00:00:00Z', '120')])
      )._unsafeUnwrap();

      const entries = sells(evaluation.entries);
      expect(entries).toHaveLength(1);
      expect(entries[0]!.realized).toBe(false);
      expect(entries[0]!.isTaxable).toBe(false);
      expect(entries[0]!.taxableGainInFiat.toFixed()).toBe('0');
      expect(evaluation.portfolio.get('kraken', 'BTC').toFixed()).toBe('1');
    });

    it('should value unrealized coins with the price of their platform', async () => {
      const evaluation = (
        await evaluate(
          [createBuy('1', '2023-01-01T00:00:00Z', { coin: 'ABC' })],
          [quote('ABC', '2023-01-01T00:00:00Z', '3'), quote('ABC', '2023-01-01T00:00:00Z', '4', 'kraken')]
        )
      )._unsafeUnwrap();

      const [entry] = sells(evaluation.entries);
      expect(entry!.buyValueInFiat.toFixed()).toBe('4');
      expect(entry!.sellValueInFiat.toFixed()).toBe('4');
      expect(evaluation.warnings).toEqual([]);
    });

    it('should degrade a missing deadline price to zero', async () => {
      const buy = createBuy('1', '2023-11-01T00:00:00Z', { coin: 'ABC', id: 'b1' });
      const prices = new InMemoryPriceTable([quote('ABC', '2023-11-01T00:00:00Z', '5')], 'EUR');
      const failingAtDeadline = {
        getCost: prices.getCost.bind(prices),
        getPartialCost: (item: PricedItem, proportion: Decimal) =>
          item.timestamp.getTime() === new Date('2023-12-31T23:59:59Z').getTime()
            ? prices.getPartialCost({ ...item, coin: 'MISSING' }, proportion)
            : prices.getPartialCost(item, proportion),
      };

      const engine = TaxationEngine.create(baseConfig, failingAtDeadline)._unsafeUnwrap();
      const evaluation = (await engine.evaluate([buy]))._unsafeUnwrap();

      const [entry] = sells(evaluation.entries);
      expect(entry!.sellValueInFiat.toFixed()).toBe('0');
      expect(entry!.gainInFiat.toFixed()).toBe('-5');
      expect(evaluation.warnings.map((warning) => [warning.code, warning.operationId])).toEqual([
        ['unrealized-price-unavailable', 'b1'],
      ]);
    });

    it('should fail when a realized sell has no price', async () => {
      const operations = [createBuy('1', '2023-01-01T00:00:00Z'), createSell('1', '2023-01-02T00:00:00Z')];

      const result = await evaluate(operations, []);

      expect(result._unsafeUnwrapErr()).toBeInstanceOf(PriceUnavailableError);
    });

    it('should fail on selling more than was acquired', async () => {
      const operations = [createBuy('1', '2023-01-01T00:00:00Z'), createSell('2', '2023-01-02T00:00:00Z')];

      const result = await evaluate(operations, [quote('BTC', '2023-01-01T00:00:00Z', '100')]);

      expect(result._unsafeUnwrapErr()).toBeInstanceOf(InsufficientBalanceError);
    });

    it('should reject operations after the deadline', async () => {
      const operations = [createBuy('1', '2024-01-01T00:00:00Z', { id: 'late' })];

      const error = (await evaluate(operations, []))._unsafeUnwrapErr();

      expect(error).toBeInstanceOf(PostDeadlineOperationError);
      expect(error.message).toBe(
        'Operation late at 2024-01-01T00:00:00.000Z happens after the evaluation deadline 2023-12-31T23:59:59.000Z'
      );
    });

    it('should reject unsupported operation kinds', async () => {
      const unknown = Object.assign(createBuy('1', '2023-01-01T00:00:00Z', { id: 'odd' }), { kind: 'margin-call' });

      const error = (await evaluate([unknown], []))._unsafeUnwrapErr();

      expect(error).toBeInstanceOf(UnsupportedOperationError);
      expect(error.message).toBe('Unable to evaluate operation of kind "margin-call"');
    });
  });
});
