import { sumDecimals } from '@coinreckon/core';
import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import type { AllocatedFee } from '../domain/report-entries.js';
import type { AcquisitionOperation, Fee, Operation } from '../domain/schemas.js';
import { InvalidAmountError, UnsupportedFeeStructureError } from '../errors.js';
import { toPricedFee, type ICostBasisLookup } from '../pricing/cost-basis-lookup.interface.js';

export const MAX_FEE_COINS = 2;

/**
 * The parts of an operation that fee allocation reads
 */
export type FeePayer = Pick<Operation, 'id' | 'platform' | 'timestamp' | 'fees'>;

/**
 * Merge fees paid in the same coin, keeping first-appearance order.
 * Fails when more than MAX_FEE_COINS distinct coins remain.
 */
export function mergeFeesByCoin(operation: FeePayer): Result<Fee[], Error> {
  const merged = new Map<string, Decimal>();
  for (const fee of operation.fees ?? []) {
    merged.set(fee.coin, (merged.get(fee.coin) ?? new Decimal(0)).plus(fee.change));
  }

  if (merged.size > MAX_FEE_COINS) {
    return err(new UnsupportedFeeStructureError(operation.id, [...merged.keys()]));
  }

  return ok([...merged].map(([coin, change]) => ({ coin, change })));
}

/**
 * Share `proportion` of a disposal's fees, each valued in fiat at the
 * disposal's platform and time.
 */
export async function allocateDisposalFees(
  operation: FeePayer,
  proportion: Decimal,
  lookup: ICostBasisLookup
): Promise<Result<AllocatedFee[], Error>> {
  if (proportion.lte(0) || proportion.gt(1)) {
    return err(
      new InvalidAmountError(`Fee proportion must be in (0, 1], got ${proportion.toFixed()}`, {
        operationId: operation.id,
        proportion: proportion.toFixed(),
      })
    );
  }

  const feesResult = mergeFeesByCoin(operation);
  if (feesResult.isErr()) {
    return err(feesResult.error);
  }

  const allocated: AllocatedFee[] = [];
  for (const fee of feesResult.value) {
    const inFiat = await lookup.getPartialCost(toPricedFee(fee, operation), proportion);
    if (inFiat.isErr()) {
      return err(inFiat.error);
    }
    allocated.push({ coin: fee.coin, amount: fee.change.times(proportion), inFiat: inFiat.value });
  }

  return ok(allocated);
}

/**
 * Fiat value of the acquisition fees attributable to `consumedAmount` of the
 * acquired coins. Becomes part of the cost basis.
 */
export async function allocateAcquisitionFees(
  source: AcquisitionOperation,
  consumedAmount: Decimal,
  lookup: ICostBasisLookup
): Promise<Result<Decimal, Error>> {
  const feesResult = mergeFeesByCoin(source);
  if (feesResult.isErr()) {
    return err(feesResult.error);
  }
  if (feesResult.value.length === 0) {
    return ok(new Decimal(0));
  }

  const proportion = consumedAmount.div(source.change);
  const values: Decimal[] = [];
  for (const fee of feesResult.value) {
    const inFiat = await lookup.getPartialCost(toPricedFee(fee, source), proportion);
    if (inFiat.isErr()) {
      return err(inFiat.error);
    }
    values.push(inFiat.value);
  }

  return ok(sumDecimals(values));
}
