import { ValidationError, validateWithSchema } from '@coinreckon/core';
import { getLogger } from '@coinreckon/logger';
import { err, ok, type Result } from 'neverthrow';

import {
  LedgerDocumentSchema,
  PriceDocumentSchema,
  type Operation,
  type PriceQuote,
} from '../domain/schemas.js';

const logger = getLogger('LedgerLoader');

/**
 * Validate a parsed ledger document (`{ operations: [...] }`).
 * Operation ids must be unique within the ledger.
 */
export function parseLedger(document: unknown): Result<Operation[], ValidationError> {
  const parsed = validateWithSchema(LedgerDocumentSchema, document, 'ledger');
  if (parsed.isErr()) {
    return err(parsed.error);
  }

  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const operation of parsed.value.operations) {
    if (seen.has(operation.id)) {
      duplicates.add(operation.id);
    }
    seen.add(operation.id);
  }

  if (duplicates.size > 0) {
    const issues = [...duplicates].map((id) => `operations: duplicate operation id "${id}"`);
    return err(new ValidationError(`Invalid ledger: ${issues.join('; ')}`, issues));
  }

  logger.debug({ operations: parsed.value.operations.length }, 'Ledger parsed');
  return ok(parsed.value.operations);
}

/**
 * Validate a parsed price document (`{ quotes: [...] }`).
 */
export function parsePriceQuotes(document: unknown): Result<PriceQuote[], ValidationError> {
  return validateWithSchema(PriceDocumentSchema, document, 'price document').map((value) => {
    logger.debug({ quotes: value.quotes.length }, 'Price quotes parsed');
    return value.quotes;
  });
}
