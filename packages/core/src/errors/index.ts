/**
 * Base class for every expected failure of the domain.
 *
 * Carries a stable machine-readable code and structured context so callers can
 * branch on `code` and loggers can serialize the error without losing detail.
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;

  readonly timestamp: string;
  readonly operationId?: string | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(
    message: string,
    options?: {
      context?: Record<string, unknown> | undefined;
      operationId?: string | undefined;
    }
  ) {
    super(message);
    this.timestamp = new Date().toISOString();
    this.operationId = options?.operationId;
    this.context = options?.context;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
      operationId: this.operationId,
      timestamp: this.timestamp,
    };
  }
}

/**
 * Input failed schema validation at a boundary (ledger file, price file, config)
 */
export class ValidationError extends DomainError {
  readonly code = 'VALIDATION_ERROR';

  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(message, { context: { issues } });
  }
}
