import { getLogger } from '@coinreckon/logger';
import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import type { ConsumedLot, TracedLot } from '../domain/lot.js';
import type { Deposit, Operation, Withdrawal } from '../domain/schemas.js';
import { InvalidTransferLinkError } from '../errors.js';
import type { WarningCollector } from '../warnings/evaluation-warnings.js';

/**
 * Pairs deposits with the withdrawals that sent their coins and traces
 * deposited coins back to the lots the withdrawal consumed.
 *
 * Links may be declared on either side (`linkId` on the deposit, on the
 * withdrawal, or both). The lots a withdrawal consumed are kept in a
 * side-table instead of on the operation.
 */
export class TransferLinker {
  private readonly logger = getLogger('TransferLinker');
  private readonly withdrawnLots = new Map<string, ConsumedLot[]>();

  private constructor(
    private readonly withdrawalByDepositId: Map<string, Withdrawal>,
    private readonly warnings: WarningCollector
  ) {}

  /**
   * Index every declared link. Fails on dangling, mismatched or conflicting links.
   */
  static create(operations: readonly Operation[], warnings: WarningCollector): Result<TransferLinker, Error> {
    const byId = new Map<string, Operation>();
    for (const operation of operations) {
      byId.set(operation.id, operation);
    }

    const withdrawalByDepositId = new Map<string, Withdrawal>();
    const depositByWithdrawalId = new Map<string, Deposit>();

    const pair = (deposit: Deposit, withdrawal: Withdrawal, declaredBy: Operation): Result<void, Error> => {
      if (deposit.coin !== withdrawal.coin) {
        return err(
          new InvalidTransferLinkError(
            `Linked transfer moves ${withdrawal.coin} out but ${deposit.coin} in (withdrawal ${withdrawal.id}, deposit ${deposit.id})`,
            declaredBy.id
          )
        );
      }
      if (withdrawal.change.lt(deposit.change)) {
        return err(
          new InvalidTransferLinkError(
            `Withdrawal ${withdrawal.id} (${withdrawal.change.toFixed()}) is smaller than its deposit ${deposit.id} (${deposit.change.toFixed()})`,
            declaredBy.id
          )
        );
      }

      const knownWithdrawal = withdrawalByDepositId.get(deposit.id);
      const knownDeposit = depositByWithdrawalId.get(withdrawal.id);
      if ((knownWithdrawal && knownWithdrawal.id !== withdrawal.id) || (knownDeposit && knownDeposit.id !== deposit.id)) {
        return err(
          new InvalidTransferLinkError(
            `Conflicting links between withdrawal ${withdrawal.id} and deposit ${deposit.id}`,
            declaredBy.id
          )
        );
      }

      withdrawalByDepositId.set(deposit.id, withdrawal);
      depositByWithdrawalId.set(withdrawal.id, deposit);
      return ok(undefined);
    };

    for (const operation of operations) {
      if ((operation.kind !== 'deposit' && operation.kind !== 'withdrawal') || operation.linkId === undefined) {
        continue;
      }

      const target = byId.get(operation.linkId);
      if (!target) {
        return err(
          new InvalidTransferLinkError(
            `Operation ${operation.id} links to unknown operation ${operation.linkId}`,
            operation.id
          )
        );
      }

      let result: Result<void, Error>;
      if (operation.kind === 'deposit' && target.kind === 'withdrawal') {
        result = pair(operation, target, operation);
      } else if (operation.kind === 'withdrawal' && target.kind === 'deposit') {
        result = pair(target, operation, operation);
      } else {
        result = err(
          new InvalidTransferLinkError(
            `A ${operation.kind} can only link to a ${operation.kind === 'deposit' ? 'withdrawal' : 'deposit'}, ${target.id} is a ${target.kind}`,
            operation.id
          )
        );
      }

      if (result.isErr()) {
        return err(result.error);
      }
    }

    return ok(new TransferLinker(withdrawalByDepositId, warnings));
  }

  findWithdrawal(deposit: Deposit): Withdrawal | undefined {
    return this.withdrawalByDepositId.get(deposit.id);
  }

  recordWithdrawal(withdrawal: Withdrawal, consumedLots: ConsumedLot[]): void {
    this.withdrawnLots.set(withdrawal.id, consumedLots);
  }

  getWithdrawnLots(withdrawal: Withdrawal): ConsumedLot[] | undefined {
    return this.withdrawnLots.get(withdrawal.id);
  }

  /**
   * Follow a consumed lot through linked deposits to the acquisitions that
   * paid for it. The traced amounts sum to `consumed.amount`; coins lost to
   * transfer fees are reported separately per lot.
   */
  traceOrigins(consumed: ConsumedLot): Result<TracedLot[], Error> {
    return this.trace(consumed, new Decimal(0), new Set());
  }

  private trace(consumed: ConsumedLot, transferFee: Decimal, visited: Set<string>): Result<TracedLot[], Error> {
    const source = consumed.source;
    if (source.kind !== 'deposit') {
      return ok([{ consumed, transferFee }]);
    }

    const withdrawal = this.withdrawalByDepositId.get(source.id);
    if (!withdrawal) {
      this.warnings.add(
        'missing-deposit-link',
        `${consumed.amount.toFixed()} ${source.coin} were deposited onto ${source.platform} from an unknown origin; ` +
          'the deposit time is used as acquisition time',
        source.id
      );
      return ok([{ consumed, transferFee }]);
    }

    if (visited.has(source.id)) {
      return err(new InvalidTransferLinkError(`Transfer chain through deposit ${source.id} is circular`, source.id));
    }

    const withdrawnLots = this.withdrawnLots.get(withdrawal.id);
    if (!withdrawnLots) {
      return err(
        new InvalidTransferLinkError(
          `Deposit ${source.id} links to withdrawal ${withdrawal.id}, which has not been processed before it`,
          source.id
        )
      );
    }

    const feeShare = withdrawal.change.minus(source.change).times(consumed.amount).div(source.change);
    const totalFee = transferFee.plus(feeShare);

    this.logger.debug(
      { depositId: source.id, lots: withdrawnLots.length, withdrawalId: withdrawal.id },
      'Tracing deposited coins to withdrawn lots'
    );

    const nextVisited = new Set(visited).add(source.id);
    const traced: TracedLot[] = [];
    let assignedAmount = new Decimal(0);
    let assignedFee = new Decimal(0);
    for (const [index, lot] of withdrawnLots.entries()) {
      // Multiply before dividing; the last lot takes the remainder so the shares add up exactly.
      const isLast = index === withdrawnLots.length - 1;
      const amount = isLast
        ? consumed.amount.minus(assignedAmount)
        : lot.amount.times(consumed.amount).div(withdrawal.change);
      const fee = isLast ? totalFee.minus(assignedFee) : totalFee.times(lot.amount).div(withdrawal.change);
      assignedAmount = assignedAmount.plus(amount);
      assignedFee = assignedFee.plus(fee);

      const result = this.trace({ source: lot.source, amount }, fee, nextVisited);
      if (result.isErr()) {
        return err(result.error);
      }
      traced.push(...result.value);
    }

    return ok(traced);
  }
}
