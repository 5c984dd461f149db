import { DomainError } from '@coinreckon/core';
import type { Decimal } from 'decimal.js';

/**
 * Coins were disposed of that the ledger never recorded as acquired.
 */
export class InsufficientBalanceError extends DomainError {
  readonly code = 'INSUFFICIENT_BALANCE';

  constructor(
    public readonly coin: string,
    public readonly requested: Decimal,
    public readonly available: Decimal
  ) {
    super(
      `Insufficient ${coin} balance: tried to remove ${requested.toFixed()} but only ${available.toFixed()} is available`,
      { context: { available: available.toFixed(), coin, requested: requested.toFixed() } }
    );
  }
}

/**
 * A lot queue holds a lot with a negative remaining amount.
 */
export class NegativeBalanceError extends DomainError {
  readonly code = 'NEGATIVE_BALANCE';

  constructor(
    public readonly coin: string,
    public readonly remaining: Decimal,
    operationId: string
  ) {
    super(`Negative ${coin} lot (${remaining.toFixed()}) created by operation ${operationId}`, {
      context: { coin, remaining: remaining.toFixed() },
      operationId,
    });
  }
}

export class InvalidAmountError extends DomainError {
  readonly code = 'INVALID_AMOUNT';

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, { context });
  }
}

/**
 * An operation carries fees in more than two distinct coins.
 */
export class UnsupportedFeeStructureError extends DomainError {
  readonly code = 'UNSUPPORTED_FEE_STRUCTURE';

  constructor(operationId: string, feeCoins: string[]) {
    super(`More than two fee coins are not supported (operation ${operationId}: ${feeCoins.join(', ')})`, {
      context: { feeCoins },
      operationId,
    });
  }
}

export class UnsupportedOperationError extends DomainError {
  readonly code = 'UNSUPPORTED_OPERATION';

  constructor(kind: string, operationId: string) {
    super(`Unable to evaluate operation of kind "${kind}"`, { context: { kind }, operationId });
  }
}

/**
 * The ledger contains an operation after the end of the evaluated tax period.
 */
export class PostDeadlineOperationError extends DomainError {
  readonly code = 'POST_DEADLINE_OPERATION';

  constructor(operationId: string, timestamp: Date, deadline: Date) {
    super(
      `Operation ${operationId} at ${timestamp.toISOString()} happens after the evaluation deadline ${deadline.toISOString()}`,
      { context: { deadline: deadline.toISOString(), timestamp: timestamp.toISOString() }, operationId }
    );
  }
}

export class PriceUnavailableError extends DomainError {
  readonly code = 'PRICE_UNAVAILABLE';

  constructor(
    public readonly platform: string,
    public readonly coin: string,
    public readonly at: Date,
    public readonly fiatCurrency: string
  ) {
    super(`No ${coin}/${fiatCurrency} price available on ${platform} at ${at.toISOString()}`, {
      context: { at: at.toISOString(), coin, fiatCurrency, platform },
    });
  }
}

/**
 * A deposit/withdrawal link points at nothing, at the wrong kind of operation,
 * or cannot be resolved at the time it is needed.
 */
export class InvalidTransferLinkError extends DomainError {
  readonly code = 'INVALID_TRANSFER_LINK';

  constructor(message: string, operationId: string) {
    super(message, { operationId });
  }
}

export class UnsupportedJurisdictionError extends DomainError {
  readonly code = 'UNSUPPORTED_JURISDICTION';

  constructor(jurisdiction: string) {
    super(`Unable to evaluate taxation for jurisdiction "${jurisdiction}"`, { context: { jurisdiction } });
  }
}
