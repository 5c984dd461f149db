import { err, ok, type Result } from 'neverthrow';

import { PortfolioSnapshot } from '../domain/portfolio-snapshot.js';
import type { SellReportEntry } from '../domain/report-entries.js';
import type { LotQueueRegistry } from '../lot-queues/lot-queue-registry.js';

import type { DisposalEvaluator } from './disposal-evaluator.js';

export interface DeadlineLiquidation {
  portfolio: PortfolioSnapshot;
  unrealizedEntries: SellReportEntry[];
}

/**
 * Drain every lot queue at the deadline. Remaining lots make up the
 * portfolio; lots of coins other than the reporting currency are also valued
 * as unrealized sells.
 */
export async function liquidateAtDeadline(
  registry: LotQueueRegistry,
  evaluator: DisposalEvaluator,
  deadline: Date,
  fiatCurrency: string
): Promise<Result<DeadlineLiquidation, Error>> {
  const portfolio = new PortfolioSnapshot();
  const unrealizedEntries: SellReportEntry[] = [];

  for (const queue of registry.all()) {
    const sanity = queue.sanityCheck();
    if (sanity.isErr()) {
      return err(sanity.error);
    }

    for (const lot of queue.removeAll()) {
      portfolio.add(lot.source.platform, lot.source.coin, lot.amount);

      if (lot.source.coin === fiatCurrency) {
        continue;
      }

      const entries = await evaluator.evaluateUnrealized(lot, deadline);
      if (entries.isErr()) {
        return err(entries.error);
      }
      unrealizedEntries.push(...entries.value);
    }
  }

  return ok({ portfolio, unrealizedEntries });
}
