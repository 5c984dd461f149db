/**
 * @coinreckon/accounting
 *
 * Lot-based tax evaluation of a crypto ledger: FIFO/LIFO balances, fee
 * allocation, transfer tracing, and jurisdiction-specific taxability.
 */

// Configuration
export type { CostBasisMethod, TaxationConfig, TaxationConfigInput, TaxPeriod } from './config/taxation-config.js';
export {
  CostBasisMethodSchema,
  getTaxPeriod,
  isInTaxPeriod,
  TaxationConfigSchema,
} from './config/taxation-config.js';

// Domain
export * from './domain/schemas.js';
export type { ConsumedLot, Lot, TracedLot } from './domain/lot.js';
export { PortfolioSnapshot } from './domain/portfolio-snapshot.js';
export type { PortfolioHolding } from './domain/portfolio-snapshot.js';
export type {
  AirdropReportEntry,
  AllocatedFee,
  CommissionReportEntry,
  InterestReportEntry,
  SellReportEntry,
  TaxReportEntry,
  TransferReportEntry,
} from './domain/report-entries.js';
export { isUnrealizedSell } from './domain/report-entries.js';

// Errors
export * from './errors.js';

// Lot queues
export { LotQueue } from './lot-queues/lot-queue.js';
export { FifoLotQueue } from './lot-queues/fifo-lot-queue.js';
export { LifoLotQueue } from './lot-queues/lifo-lot-queue.js';
export { getLotQueueFactory } from './lot-queues/lot-queue-factory.js';
export type { LotQueueFactory } from './lot-queues/lot-queue-factory.js';
export { LotQueueRegistry } from './lot-queues/lot-queue-registry.js';

// Pricing
export type { ICostBasisLookup, PricedItem } from './pricing/cost-basis-lookup.interface.js';
export { InMemoryPriceTable } from './pricing/in-memory-price-table.js';

// Jurisdiction rules
export type { ITaxationRules } from './jurisdictions/base-rules.js';
export { GermanyRules } from './jurisdictions/germany-rules.js';
export { getTaxationRules } from './jurisdictions/jurisdiction-factory.js';

// Taxation
export { TaxationEngine } from './taxation/taxation-engine.js';
export type { TaxEvaluation } from './taxation/taxation-engine.js';
export type { EvaluationWarning, EvaluationWarningCode } from './warnings/evaluation-warnings.js';

// Ledger and reports
export { parseLedger, parsePriceQuotes } from './ledger/ledger-loader.js';
export { formatEvaluationSummary, summarizeEvaluation } from './reports/evaluation-summary.js';
export type { EvaluationSummary, TaxableGainByType } from './reports/evaluation-summary.js';
