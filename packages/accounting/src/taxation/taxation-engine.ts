import { isFiat, validateWithSchema } from '@coinreckon/core';
import { getLogger } from '@coinreckon/logger';
import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import {
  getTaxPeriod,
  isInTaxPeriod,
  TaxationConfigSchema,
  type TaxationConfig,
  type TaxationConfigInput,
  type TaxPeriod,
} from '../config/taxation-config.js';
import type { PortfolioSnapshot } from '../domain/portfolio-snapshot.js';
import {
  createAirdropReportEntry,
  createCommissionReportEntry,
  createInterestReportEntry,
  createTransferReportEntry,
  type TaxReportEntry,
} from '../domain/report-entries.js';
import type {
  Airdrop,
  CoinLendInterest,
  Commission,
  Deposit,
  Operation,
  Sell,
  StakingInterest,
  Withdrawal,
} from '../domain/schemas.js';
import { PostDeadlineOperationError, PriceUnavailableError, UnsupportedOperationError } from '../errors.js';
import { mergeFeesByCoin } from '../fees/fee-allocator.js';
import type { ITaxationRules } from '../jurisdictions/base-rules.js';
import { getTaxationRules } from '../jurisdictions/jurisdiction-factory.js';
import { TransferLinker } from '../linking/transfer-linker.js';
import { getLotQueueFactory, type LotQueueFactory } from '../lot-queues/lot-queue-factory.js';
import { LotQueueRegistry } from '../lot-queues/lot-queue-registry.js';
import type { ICostBasisLookup } from '../pricing/cost-basis-lookup.interface.js';
import { WarningCollector, type EvaluationWarning } from '../warnings/evaluation-warnings.js';

import { liquidateAtDeadline } from './deadline-liquidation.js';
import { DisposalEvaluator } from './disposal-evaluator.js';

/**
 * Result of one evaluation run
 */
export interface TaxEvaluation {
  taxYear: number;
  period: TaxPeriod;
  fiatCurrency: string;
  entries: TaxReportEntry[];
  portfolio: PortfolioSnapshot;
  warnings: EvaluationWarning[];
}

/**
 * Mutable state of a single `evaluate` call
 */
interface EvaluationRun {
  period: TaxPeriod;
  registry: LotQueueRegistry;
  linker: TransferLinker;
  warnings: WarningCollector;
  evaluator: DisposalEvaluator;
  entries: TaxReportEntry[];
}

/**
 * Replays a ledger in time order through per-coin lot queues and produces the
 * tax report of one year.
 *
 * Configuration, lot-queue class and jurisdiction rules are fixed at
 * construction; every `evaluate` call starts from empty balances.
 */
export class TaxationEngine {
  private readonly logger = getLogger('TaxationEngine');

  private constructor(
    private readonly config: TaxationConfig,
    private readonly rules: ITaxationRules,
    private readonly createQueue: LotQueueFactory,
    private readonly lookup: ICostBasisLookup
  ) {}

  static create(input: TaxationConfigInput, lookup: ICostBasisLookup): Result<TaxationEngine, Error> {
    const configResult = validateWithSchema(TaxationConfigSchema, input, 'taxation configuration');
    if (configResult.isErr()) {
      return err(configResult.error);
    }
    const config = configResult.value;

    const rulesResult = getTaxationRules(config.jurisdiction);
    if (rulesResult.isErr()) {
      return err(rulesResult.error);
    }

    return ok(new TaxationEngine(config, rulesResult.value, getLotQueueFactory(config.method), lookup));
  }

  getConfig(): TaxationConfig {
    return this.config;
  }

  async evaluate(operations: readonly Operation[]): Promise<Result<TaxEvaluation, Error>> {
    try {
      return await this.run(operations);
    } catch (error) {
      this.logger.error({ error }, 'Tax evaluation failed unexpectedly');
      return err(error instanceof Error ? error : new Error(String(error)));
    }
  }

  private async run(operations: readonly Operation[]): Promise<Result<TaxEvaluation, Error>> {
    const { config } = this;
    const period = getTaxPeriod(config.taxYear, config.evaluatedAt);

    for (const operation of operations) {
      if (operation.timestamp.getTime() > period.deadline.getTime()) {
        return err(new PostDeadlineOperationError(operation.id, operation.timestamp, period.deadline));
      }
    }

    const warnings = new WarningCollector();
    const linkerResult = TransferLinker.create(operations, warnings);
    if (linkerResult.isErr()) {
      return err(linkerResult.error);
    }
    const linker = linkerResult.value;

    const state: EvaluationRun = {
      period,
      registry: new LotQueueRegistry(this.createQueue, config.multiDepot),
      linker,
      warnings,
      evaluator: new DisposalEvaluator({ linker, lookup: this.lookup, rules: this.rules, warnings }),
      entries: [],
    };

    this.logger.info(
      {
        jurisdiction: this.rules.getJurisdiction(),
        method: config.method,
        multiDepot: config.multiDepot,
        operations: operations.length,
        taxYear: config.taxYear,
      },
      'Starting tax evaluation'
    );

    const sorted = [...operations].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
    for (const operation of sorted) {
      const result = await this.processOperation(operation, state);
      if (result.isErr()) {
        this.logger.error({ error: result.error, operationId: operation.id }, 'Operation could not be evaluated');
        return err(result.error);
      }
    }

    const liquidation = await liquidateAtDeadline(
      state.registry,
      state.evaluator,
      period.deadline,
      config.fiatCurrency
    );
    if (liquidation.isErr()) {
      return err(liquidation.error);
    }
    state.entries.push(...liquidation.value.unrealizedEntries);

    this.logger.info(
      { entries: state.entries.length, warnings: warnings.list().length },
      'Tax evaluation complete'
    );

    return ok({
      taxYear: config.taxYear,
      period,
      fiatCurrency: config.fiatCurrency,
      entries: state.entries,
      portfolio: liquidation.value.portfolio,
      warnings: warnings.list(),
    });
  }

  private async processOperation(operation: Operation, state: EvaluationRun): Promise<Result<void, Error>> {
    const { id, kind } = operation;
    this.logger.debug({ coin: operation.coin, kind, operationId: id }, 'Processing operation');

    switch (operation.kind) {
      case 'buy': {
        state.registry.get(operation.platform, operation.coin).add(operation);
        return ok(undefined);
      }
      case 'sell': {
        return this.processSell(operation, state);
      }
      case 'coin-lend':
      case 'coin-lend-end': {
        state.warnings.addOnce(
          'lending-not-tracked',
          'Lent coins are not tracked; they stay in the balance and may be matched against sells',
          id
        );
        return ok(undefined);
      }
      case 'staking':
      case 'staking-end': {
        state.warnings.addOnce(
          'staking-not-tracked',
          'Staked coins are not tracked; they stay in the balance and may be matched against sells',
          id
        );
        return ok(undefined);
      }
      case 'coin-lend-interest':
      case 'staking-interest': {
        return this.processInterest(operation, state);
      }
      case 'airdrop': {
        return this.processAirdrop(operation, state);
      }
      case 'commission': {
        return this.processCommission(operation, state);
      }
      case 'deposit': {
        return this.processDeposit(operation, state);
      }
      case 'withdrawal': {
        return this.processWithdrawal(operation, state);
      }
      default: {
        // Compile-time check that every operation kind has a branch
        const unhandled: never = operation;
        this.logger.warn({ operation: unhandled }, 'Operation kind is not supported');
        return err(new UnsupportedOperationError(kind, id));
      }
    }
  }

  private async processSell(sell: Sell, state: EvaluationRun): Promise<Result<void, Error>> {
    const fees = mergeFeesByCoin(sell);
    if (fees.isErr()) {
      return err(fees.error);
    }

    const consumed = state.registry.get(sell.platform, sell.coin).remove(sell.change);
    if (consumed.isErr()) {
      return err(consumed.error);
    }

    for (const fee of fees.value) {
      const feeLots = state.registry.get(sell.platform, fee.coin).removeFee(fee.change);
      if (feeLots.isErr()) {
        return err(feeLots.error);
      }
    }

    if (sell.coin === this.config.fiatCurrency || !isInTaxPeriod(sell.timestamp, state.period)) {
      return ok(undefined);
    }

    const entries = await state.evaluator.evaluateSell(sell, consumed.value);
    if (entries.isErr()) {
      return err(entries.error);
    }
    state.entries.push(...entries.value);
    return ok(undefined);
  }

  private async processInterest(
    operation: CoinLendInterest | StakingInterest,
    state: EvaluationRun
  ): Promise<Result<void, Error>> {
    state.registry.get(operation.platform, operation.coin).add(operation);
    if (!isInTaxPeriod(operation.timestamp, state.period)) {
      return ok(undefined);
    }

    const value = await this.lookup.getCost(operation);
    if (value.isErr()) {
      return err(value.error);
    }

    const source = operation.kind === 'coin-lend-interest' ? 'coin-lend' : 'staking';
    state.entries.push(
      createInterestReportEntry({
        source,
        platform: operation.platform,
        coin: operation.coin,
        amount: operation.change,
        timestamp: operation.timestamp,
        valueInFiat: value.value,
        taxationType: this.rules.classifyInterest(source, isFiat(operation.coin)),
        remark: operation.remark,
      })
    );
    return ok(undefined);
  }

  private async processAirdrop(operation: Airdrop, state: EvaluationRun): Promise<Result<void, Error>> {
    state.registry.get(operation.platform, operation.coin).add(operation);
    if (!isInTaxPeriod(operation.timestamp, state.period)) {
      return ok(undefined);
    }

    const value = await this.lookup.getCost(operation);
    if (value.isErr()) {
      return err(value.error);
    }

    state.entries.push(
      createAirdropReportEntry({
        platform: operation.platform,
        coin: operation.coin,
        amount: operation.change,
        timestamp: operation.timestamp,
        valueInFiat: value.value,
        taxationType: this.rules.classifyAirdrop(this.config.allAirdropsAreGifts),
        remark: operation.remark,
      })
    );
    return ok(undefined);
  }

  private async processCommission(operation: Commission, state: EvaluationRun): Promise<Result<void, Error>> {
    state.registry.get(operation.platform, operation.coin).add(operation);
    if (!isInTaxPeriod(operation.timestamp, state.period)) {
      return ok(undefined);
    }

    const value = await this.lookup.getCost(operation);
    if (value.isErr()) {
      return err(value.error);
    }

    state.entries.push(
      createCommissionReportEntry({
        platform: operation.platform,
        coin: operation.coin,
        amount: operation.change,
        timestamp: operation.timestamp,
        valueInFiat: value.value,
        taxationType: this.rules.classifyCommission(),
        remark: operation.remark,
      })
    );
    return ok(undefined);
  }

  private async processDeposit(deposit: Deposit, state: EvaluationRun): Promise<Result<void, Error>> {
    state.registry.get(deposit.platform, deposit.coin).add(deposit);

    const withdrawal = state.linker.findWithdrawal(deposit);
    if (!withdrawal) {
      return ok(undefined);
    }

    const feeAmount = withdrawal.change.minus(deposit.change);
    let feeInFiat = new Decimal(0);
    if (feeAmount.gt(0)) {
      const feeValue = await this.lookup.getCost({
        platform: deposit.platform,
        coin: deposit.coin,
        change: feeAmount,
        timestamp: deposit.timestamp,
      });
      if (feeValue.isOk()) {
        feeInFiat = feeValue.value;
      } else if (feeValue.error instanceof PriceUnavailableError) {
        state.warnings.add(
          'transfer-fee-price-unavailable',
          `No price for the ${feeAmount.toFixed()} ${deposit.coin} transfer fee on ${deposit.platform}; fee valued at zero`,
          deposit.id
        );
      } else {
        return err(feeValue.error);
      }
    }

    state.entries.push(
      createTransferReportEntry({
        depositPlatform: deposit.platform,
        withdrawalPlatform: withdrawal.platform,
        coin: deposit.coin,
        amount: deposit.change,
        depositTimestamp: deposit.timestamp,
        withdrawalTimestamp: withdrawal.timestamp,
        feeAmount,
        feeInFiat,
        remark: deposit.remark,
      })
    );
    return ok(undefined);
  }

  private processWithdrawal(withdrawal: Withdrawal, state: EvaluationRun): Result<void, Error> {
    const consumed = state.registry.get(withdrawal.platform, withdrawal.coin).remove(withdrawal.change);
    if (consumed.isErr()) {
      return err(consumed.error);
    }
    state.linker.recordWithdrawal(withdrawal, consumed.value);
    return ok(undefined);
  }
}
