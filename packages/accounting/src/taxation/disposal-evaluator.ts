import { sumDecimals } from '@coinreckon/core';
import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import type { ConsumedLot, TracedLot } from '../domain/lot.js';
import { createSellReportEntry, type AllocatedFee, type SellReportEntry } from '../domain/report-entries.js';
import type { Sell } from '../domain/schemas.js';
import { InvalidAmountError, PriceUnavailableError } from '../errors.js';
import { allocateAcquisitionFees, allocateDisposalFees } from '../fees/fee-allocator.js';
import type { ITaxationRules } from '../jurisdictions/base-rules.js';
import type { TransferLinker } from '../linking/transfer-linker.js';
import type { ICostBasisLookup } from '../pricing/cost-basis-lookup.interface.js';
import type { WarningCollector } from '../warnings/evaluation-warnings.js';

export interface DisposalEvaluatorDeps {
  lookup: ICostBasisLookup;
  rules: ITaxationRules;
  linker: TransferLinker;
  warnings: WarningCollector;
}

/**
 * Turns consumed lots of a disposal into sell report entries, one per
 * acquisition the coins trace back to.
 */
export class DisposalEvaluator {
  constructor(private readonly deps: DisposalEvaluatorDeps) {}

  /**
   * Evaluate a sell from the ledger. The consumed lots must add up to the sold amount.
   */
  async evaluateSell(sell: Sell, consumedLots: ConsumedLot[]): Promise<Result<SellReportEntry[], Error>> {
    const consumedTotal = sumDecimals(consumedLots.map((lot) => lot.amount));
    if (!consumedTotal.eq(sell.change)) {
      return err(
        new InvalidAmountError(
          `Sell ${sell.id} of ${sell.change.toFixed()} ${sell.coin} consumed ${consumedTotal.toFixed()} from its lots`,
          { consumed: consumedTotal.toFixed(), operationId: sell.id, sold: sell.change.toFixed() }
        )
      );
    }

    return this.evaluateLots(sell, consumedLots, true);
  }

  /**
   * Value a lot still held at the deadline as if it were sold on its
   * platform at that moment.
   */
  async evaluateUnrealized(lot: ConsumedLot, deadline: Date): Promise<Result<SellReportEntry[], Error>> {
    const disposal: Sell = {
      kind: 'sell',
      id: `unrealized:${lot.source.id}`,
      platform: lot.source.platform,
      coin: lot.source.coin,
      change: lot.amount,
      timestamp: deadline,
    };

    return this.evaluateLots(disposal, [lot], false);
  }

  private async evaluateLots(
    disposal: Sell,
    consumedLots: ConsumedLot[],
    realized: boolean
  ): Promise<Result<SellReportEntry[], Error>> {
    const entries: SellReportEntry[] = [];

    for (const consumed of consumedLots) {
      const tracedResult = this.deps.linker.traceOrigins(consumed);
      if (tracedResult.isErr()) {
        return err(tracedResult.error);
      }

      for (const traced of tracedResult.value) {
        const entryResult = await this.evaluateTracedLot(disposal, traced, realized);
        if (entryResult.isErr()) {
          return err(entryResult.error);
        }
        entries.push(entryResult.value);
      }
    }

    return ok(entries);
  }

  private async evaluateTracedLot(
    disposal: Sell,
    traced: TracedLot,
    realized: boolean
  ): Promise<Result<SellReportEntry, Error>> {
    const { lookup, rules, warnings } = this.deps;
    const { source, amount } = traced.consumed;
    const proportion = amount.div(disposal.change);

    const fees: Result<AllocatedFee[], Error> = disposal.fees?.length
      ? await allocateDisposalFees(disposal, proportion, lookup)
      : ok([]);
    if (fees.isErr()) {
      return err(fees.error);
    }

    const acquisitionFees = await allocateAcquisitionFees(source, amount, lookup);
    if (acquisitionFees.isErr()) {
      return err(acquisitionFees.error);
    }

    const acquisitionCost = await lookup.getPartialCost(source, amount.div(source.change));
    if (acquisitionCost.isErr()) {
      return err(acquisitionCost.error);
    }

    // Transfer fees stay out of the cost basis; only reported on the entry.
    const additionalFee = new Decimal(0);
    const buyValueInFiat = acquisitionCost.value.plus(acquisitionFees.value).plus(additionalFee);

    const saleValue = await lookup.getPartialCost(disposal, proportion);
    let sellValueInFiat: Decimal;
    if (saleValue.isOk()) {
      sellValueInFiat = saleValue.value;
    } else if (!realized && saleValue.error instanceof PriceUnavailableError) {
      warnings.add(
        'unrealized-price-unavailable',
        `No price for ${disposal.coin} on ${disposal.platform} at the deadline; unrealized value set to zero`,
        source.id
      );
      sellValueInFiat = new Decimal(0);
    } else {
      return err(saleValue.error);
    }

    if (traced.transferFee.gt(0)) {
      warnings.add(
        'transfer-fee-excluded',
        `${traced.transferFee.toFixed()} ${disposal.coin} paid as transfer fees are not deducted from the gain`,
        source.id
      );
    }

    return ok(
      createSellReportEntry({
        realized,
        sellPlatform: disposal.platform,
        buyPlatform: source.platform,
        coin: disposal.coin,
        amount,
        sellTimestamp: disposal.timestamp,
        buyTimestamp: source.timestamp,
        fees: fees.value,
        buyValueInFiat,
        sellValueInFiat,
        excludedTransferFee: traced.transferFee,
        isTaxable: rules.isDisposalTaxable(source.timestamp, disposal.timestamp),
        taxationType: rules.classifyDisposal(),
        remark: disposal.remark,
      })
    );
  }
}
