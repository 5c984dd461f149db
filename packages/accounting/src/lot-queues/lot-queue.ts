import { sumDecimals } from '@coinreckon/core';
import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import type { ConsumedLot, Lot } from '../domain/lot.js';
import type { AcquisitionOperation } from '../domain/schemas.js';
import { InsufficientBalanceError, InvalidAmountError, NegativeBalanceError } from '../errors.js';

/**
 * Balance of one coin (or one platform and coin) kept as a queue of lots.
 *
 * Subclasses only decide which end of the queue is consumed first. Lots are
 * always appended in ledger order.
 */
export abstract class LotQueue {
  protected readonly lots: Lot[] = [];

  constructor(readonly coin: string) {}

  /**
   * Index of the lot consumed next
   */
  protected abstract nextIndex(): number;

  abstract getName(): 'fifo' | 'lifo';

  add(operation: AcquisitionOperation): void {
    this.lots.push({ source: operation, remaining: new Decimal(operation.change) });
  }

  getBalance(): Decimal {
    return sumDecimals(this.lots.map((lot) => lot.remaining));
  }

  isEmpty(): boolean {
    return this.lots.length === 0;
  }

  /**
   * Consume lots totalling exactly `amount`. Nothing is mutated on failure.
   */
  remove(amount: Decimal): Result<ConsumedLot[], Error> {
    const sanity = this.sanityCheck();
    if (sanity.isErr()) {
      return err(sanity.error);
    }

    if (!amount.isFinite() || amount.lte(0)) {
      return err(
        new InvalidAmountError(`Amount to remove from ${this.coin} must be positive, got ${amount.toFixed()}`, {
          amount: amount.toFixed(),
          coin: this.coin,
        })
      );
    }

    const balance = this.getBalance();
    if (balance.lt(amount)) {
      return err(new InsufficientBalanceError(this.coin, amount, balance));
    }

    const consumed: ConsumedLot[] = [];
    let outstanding = amount;

    while (outstanding.gt(0)) {
      const index = this.nextIndex();
      const lot = this.lots[index];
      if (!lot) {
        // Unreachable after the balance check
        return err(new InsufficientBalanceError(this.coin, amount, balance));
      }

      if (lot.remaining.isZero()) {
        this.lots.splice(index, 1);
        continue;
      }

      const take = Decimal.min(lot.remaining, outstanding);
      consumed.push({ source: lot.source, amount: take });
      lot.remaining = lot.remaining.minus(take);
      outstanding = outstanding.minus(take);

      if (lot.remaining.isZero()) {
        this.lots.splice(index, 1);
      }
    }

    return ok(consumed);
  }

  /**
   * Like `remove`, but a zero fee consumes nothing.
   */
  removeFee(amount: Decimal): Result<ConsumedLot[], Error> {
    if (amount.isZero()) {
      return ok([]);
    }
    return this.remove(amount);
  }

  /**
   * Drain every lot in accounting order.
   */
  removeAll(): ConsumedLot[] {
    const consumed: ConsumedLot[] = [];
    while (this.lots.length > 0) {
      const index = this.nextIndex();
      const [lot] = this.lots.splice(index, 1);
      if (lot && !lot.remaining.isZero()) {
        consumed.push({ source: lot.source, amount: lot.remaining });
      }
    }
    return consumed;
  }

  sanityCheck(): Result<void, Error> {
    for (const lot of this.lots) {
      if (lot.remaining.isNegative()) {
        return err(new NegativeBalanceError(this.coin, lot.remaining, lot.source.id));
      }
    }
    return ok(undefined);
  }
}
