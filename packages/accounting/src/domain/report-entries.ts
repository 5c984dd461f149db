import { sumDecimals } from '@coinreckon/core';
import { Decimal } from 'decimal.js';

/**
 * A fee share attributed to one report entry
 */
export interface AllocatedFee {
  coin: string;
  amount: Decimal;
  inFiat: Decimal;
}

interface TaxableFields {
  /** Fiat gain before the taxability decision */
  gainInFiat: Decimal;
  isTaxable: boolean;
  /** Equals gainInFiat when taxable, zero otherwise */
  taxableGainInFiat: Decimal;
  taxationType: string;
  remark?: string | undefined;
}

/**
 * Disposal of coins matched against one (traced) acquisition lot.
 * Unrealized entries come from deadline liquidation.
 */
export interface SellReportEntry extends TaxableFields {
  kind: 'sell';
  realized: boolean;
  sellPlatform: string;
  buyPlatform: string;
  coin: string;
  amount: Decimal;
  sellTimestamp: Date;
  buyTimestamp: Date;
  fees: AllocatedFee[];
  buyValueInFiat: Decimal;
  sellValueInFiat: Decimal;
  /** Transfer fee (in `coin`) attributable to this lot; not part of the gain */
  excludedTransferFee: Decimal;
}

export interface InterestReportEntry extends TaxableFields {
  kind: 'interest';
  source: 'coin-lend' | 'staking';
  platform: string;
  coin: string;
  amount: Decimal;
  timestamp: Date;
  valueInFiat: Decimal;
}

export interface AirdropReportEntry extends TaxableFields {
  kind: 'airdrop';
  platform: string;
  coin: string;
  amount: Decimal;
  timestamp: Date;
  valueInFiat: Decimal;
}

export interface CommissionReportEntry extends TaxableFields {
  kind: 'commission';
  platform: string;
  coin: string;
  amount: Decimal;
  timestamp: Date;
  valueInFiat: Decimal;
}

/**
 * Informational record of an internal transfer between two platforms
 */
export interface TransferReportEntry {
  kind: 'transfer';
  depositPlatform: string;
  withdrawalPlatform: string;
  coin: string;
  amount: Decimal;
  depositTimestamp: Date;
  withdrawalTimestamp: Date;
  feeAmount: Decimal;
  feeInFiat: Decimal;
  isTaxable: false;
  taxableGainInFiat: Decimal;
  taxationType?: undefined;
  remark?: string | undefined;
}

export type TaxReportEntry =
  | SellReportEntry
  | InterestReportEntry
  | AirdropReportEntry
  | CommissionReportEntry
  | TransferReportEntry;

export type SellReportEntryInput = Omit<SellReportEntry, 'kind' | 'gainInFiat' | 'taxableGainInFiat'>;

export function createSellReportEntry(input: SellReportEntryInput): SellReportEntry {
  const feesInFiat = sumDecimals(input.fees.map((fee) => fee.inFiat));
  const gainInFiat = input.sellValueInFiat.minus(input.buyValueInFiat).minus(feesInFiat);

  return {
    kind: 'sell',
    ...input,
    gainInFiat,
    taxableGainInFiat: input.isTaxable ? gainInFiat : new Decimal(0),
  };
}

type IncomeInput<T> = Omit<T, 'kind' | 'gainInFiat' | 'isTaxable' | 'taxableGainInFiat'>;

// Received coins count with their full fiat value at receipt.
function incomeFields(valueInFiat: Decimal): Pick<TaxableFields, 'gainInFiat' | 'isTaxable' | 'taxableGainInFiat'> {
  return { gainInFiat: valueInFiat, isTaxable: true, taxableGainInFiat: valueInFiat };
}

export function createInterestReportEntry(input: IncomeInput<InterestReportEntry>): InterestReportEntry {
  return { kind: 'interest', ...input, ...incomeFields(input.valueInFiat) };
}

export function createAirdropReportEntry(input: IncomeInput<AirdropReportEntry>): AirdropReportEntry {
  return { kind: 'airdrop', ...input, ...incomeFields(input.valueInFiat) };
}

export function createCommissionReportEntry(input: IncomeInput<CommissionReportEntry>): CommissionReportEntry {
  return { kind: 'commission', ...input, ...incomeFields(input.valueInFiat) };
}

export function createTransferReportEntry(
  input: Omit<TransferReportEntry, 'kind' | 'isTaxable' | 'taxableGainInFiat'>
): TransferReportEntry {
  return {
    kind: 'transfer',
    ...input,
    isTaxable: false,
    taxableGainInFiat: new Decimal(0),
  };
}

export function isUnrealizedSell(entry: TaxReportEntry): entry is SellReportEntry {
  return entry.kind === 'sell' && !entry.realized;
}
