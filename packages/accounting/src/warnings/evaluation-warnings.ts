import { getLogger } from '@coinreckon/logger';

export type EvaluationWarningCode =
  | 'missing-deposit-link'
  | 'unrealized-price-unavailable'
  | 'transfer-fee-excluded'
  | 'transfer-fee-price-unavailable'
  | 'lending-not-tracked'
  | 'staking-not-tracked';

/**
 * A condition that lowers the accuracy of an evaluation without stopping it
 */
export interface EvaluationWarning {
  code: EvaluationWarningCode;
  message: string;
  operationId?: string | undefined;
}

/**
 * Collects the warnings of one evaluation run and logs each at `warn` level.
 */
export class WarningCollector {
  private readonly logger = getLogger('EvaluationWarnings');
  private readonly warnings: EvaluationWarning[] = [];
  private readonly seenCodes = new Set<EvaluationWarningCode>();

  add(code: EvaluationWarningCode, message: string, operationId?: string): void {
    this.warnings.push({ code, message, operationId });
    this.seenCodes.add(code);
    this.logger.warn({ code, operationId }, message);
  }

  /**
   * Record the warning only if no warning with this code exists yet.
   */
  addOnce(code: EvaluationWarningCode, message: string, operationId?: string): void {
    if (!this.seenCodes.has(code)) {
      this.add(code, message, operationId);
    }
  }

  list(): EvaluationWarning[] {
    return [...this.warnings];
  }
}
