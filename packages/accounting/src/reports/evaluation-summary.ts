import { sumDecimals } from '@coinreckon/core';
import { Decimal } from 'decimal.js';

import type { PortfolioHolding } from '../domain/portfolio-snapshot.js';
import { isUnrealizedSell } from '../domain/report-entries.js';
import type { TaxEvaluation } from '../taxation/taxation-engine.js';

export interface TaxableGainByType {
  taxationType: string;
  taxableGainInFiat: Decimal;
}

export interface EvaluationSummary {
  taxYear: number;
  deadline: Date;
  fiatCurrency: string;
  /** Realized taxable gain per taxation type, in order of first appearance */
  taxableGains: TaxableGainByType[];
  unrealizedGainInFiat: Decimal;
  unrealizedTaxableGainInFiat: Decimal;
  portfolio: PortfolioHolding[];
  warningCount: number;
}

const SEPARATOR = '-'.repeat(40);

export function summarizeEvaluation(evaluation: TaxEvaluation): EvaluationSummary {
  const gainsByType = new Map<string, Decimal>();
  for (const entry of evaluation.entries) {
    if (entry.taxationType === undefined) {
      continue;
    }
    const current = gainsByType.get(entry.taxationType) ?? new Decimal(0);
    gainsByType.set(
      entry.taxationType,
      isUnrealizedSell(entry) ? current : current.plus(entry.taxableGainInFiat)
    );
  }

  const unrealized = evaluation.entries.filter(isUnrealizedSell);

  return {
    taxYear: evaluation.taxYear,
    deadline: evaluation.period.deadline,
    fiatCurrency: evaluation.fiatCurrency,
    taxableGains: [...gainsByType].map(([taxationType, taxableGainInFiat]) => ({ taxationType, taxableGainInFiat })),
    unrealizedGainInFiat: sumDecimals(unrealized.map((entry) => entry.gainInFiat)),
    unrealizedTaxableGainInFiat: sumDecimals(unrealized.map((entry) => entry.taxableGainInFiat)),
    portfolio: evaluation.portfolio.entries(),
    warningCount: evaluation.warnings.length,
  };
}

/**
 * Plain-text summary; fiat amounts with two decimals, coin amounts with eight.
 */
export function formatEvaluationSummary(summary: EvaluationSummary): string {
  const fiat = summary.fiatCurrency;
  const deadline = summary.deadline.toISOString().slice(0, 10);

  const lines = [`Tax evaluation for ${summary.taxYear} (deadline ${deadline}):`, ''];
  for (const { taxationType, taxableGainInFiat } of summary.taxableGains) {
    lines.push(`${taxationType}: ${taxableGainInFiat.toFixed(2)} ${fiat}`);
  }

  lines.push(
    SEPARATOR,
    `Unrealized gain: ${summary.unrealizedGainInFiat.toFixed(2)} ${fiat}`,
    `Unrealized taxable gain at deadline: ${summary.unrealizedTaxableGainInFiat.toFixed(2)} ${fiat}`,
    SEPARATOR,
    `Portfolio at ${deadline}:`
  );
  for (const holding of summary.portfolio) {
    lines.push(`${holding.platform} ${holding.coin}: ${holding.amount.toFixed(8)}`);
  }

  if (summary.warningCount > 0) {
    lines.push(SEPARATOR, `${summary.warningCount} warning(s) were raised during the evaluation`);
  }

  return lines.join('\n');
}
