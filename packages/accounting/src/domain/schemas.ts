import { DateSchema, NonNegativeDecimalSchema, PositiveDecimalSchema, SymbolSchema } from '@coinreckon/core';
import { z } from 'zod';

/**
 * Zod schemas for ledger operations. The domain types are inferred from them,
 * so a parsed ledger document and an in-memory operation share one shape.
 */

export const FeeSchema = z.object({
  coin: SymbolSchema,
  change: NonNegativeDecimalSchema,
});

export const OperationSourceSchema = z.object({
  filePath: z.string().min(1),
  lines: z.array(z.number().int().nonnegative()),
});

const BaseOperationSchema = z.object({
  id: z.string().trim().min(1),
  platform: z.string().trim().min(1),
  coin: SymbolSchema,
  change: PositiveDecimalSchema,
  timestamp: DateSchema,
  fees: z.array(FeeSchema).optional(),
  source: OperationSourceSchema.optional(),
  remark: z.string().optional(),
});

const transferFields = {
  /** Id of the paired operation on the counterpart platform */
  linkId: z.string().trim().min(1).optional(),
};

export const BuySchema = BaseOperationSchema.extend({ kind: z.literal('buy') });
export const SellSchema = BaseOperationSchema.extend({ kind: z.literal('sell') });
export const DepositSchema = BaseOperationSchema.extend({ kind: z.literal('deposit'), ...transferFields });
export const WithdrawalSchema = BaseOperationSchema.extend({ kind: z.literal('withdrawal'), ...transferFields });
export const CoinLendSchema = BaseOperationSchema.extend({ kind: z.literal('coin-lend') });
export const CoinLendEndSchema = BaseOperationSchema.extend({ kind: z.literal('coin-lend-end') });
export const CoinLendInterestSchema = BaseOperationSchema.extend({ kind: z.literal('coin-lend-interest') });
export const StakingSchema = BaseOperationSchema.extend({ kind: z.literal('staking') });
export const StakingEndSchema = BaseOperationSchema.extend({ kind: z.literal('staking-end') });
export const StakingInterestSchema = BaseOperationSchema.extend({ kind: z.literal('staking-interest') });
export const AirdropSchema = BaseOperationSchema.extend({ kind: z.literal('airdrop') });
export const CommissionSchema = BaseOperationSchema.extend({ kind: z.literal('commission') });

export const OperationSchema = z.discriminatedUnion('kind', [
  BuySchema,
  SellSchema,
  DepositSchema,
  WithdrawalSchema,
  CoinLendSchema,
  CoinLendEndSchema,
  CoinLendInterestSchema,
  StakingSchema,
  StakingEndSchema,
  StakingInterestSchema,
  AirdropSchema,
  CommissionSchema,
]);

export const LedgerDocumentSchema = z.object({
  operations: z.array(OperationSchema),
});

export const PriceQuoteSchema = z.object({
  coin: SymbolSchema,
  platform: z.string().trim().min(1).optional(),
  timestamp: DateSchema,
  price: NonNegativeDecimalSchema,
});

export const PriceDocumentSchema = z.object({
  quotes: z.array(PriceQuoteSchema),
});

/**
 * Type exports inferred from schemas
 */
export type Fee = z.infer<typeof FeeSchema>;
export type OperationSource = z.infer<typeof OperationSourceSchema>;
export type Buy = z.infer<typeof BuySchema>;
export type Sell = z.infer<typeof SellSchema>;
export type Deposit = z.infer<typeof DepositSchema>;
export type Withdrawal = z.infer<typeof WithdrawalSchema>;
export type CoinLend = z.infer<typeof CoinLendSchema>;
export type CoinLendEnd = z.infer<typeof CoinLendEndSchema>;
export type CoinLendInterest = z.infer<typeof CoinLendInterestSchema>;
export type Staking = z.infer<typeof StakingSchema>;
export type StakingEnd = z.infer<typeof StakingEndSchema>;
export type StakingInterest = z.infer<typeof StakingInterestSchema>;
export type Airdrop = z.infer<typeof AirdropSchema>;
export type Commission = z.infer<typeof CommissionSchema>;
export type Operation = z.infer<typeof OperationSchema>;
export type OperationKind = Operation['kind'];
export type PriceQuote = z.infer<typeof PriceQuoteSchema>;

/** Operations that add a lot to a balance */
export type AcquisitionOperation = Buy | Deposit | CoinLendInterest | StakingInterest | Airdrop | Commission;
