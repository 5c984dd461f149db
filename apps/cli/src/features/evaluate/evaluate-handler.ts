import {
  InMemoryPriceTable,
  parseLedger,
  parsePriceQuotes,
  TaxationEngine,
  type TaxEvaluation,
} from '@coinreckon/accounting';
import { getLogger } from '@coinreckon/logger';
import { err, type Result } from 'neverthrow';

import { readJsonFile } from '../shared/file-utils.js';

import type { EvaluateHandlerParams } from './evaluate-utils.js';

export type JsonFileReader = (filePath: string) => Promise<Result<unknown, Error>>;

/**
 * Loads the ledger and price files and runs one tax evaluation.
 */
export class EvaluateHandler {
  private readonly logger = getLogger('EvaluateHandler');

  constructor(private readonly readJson: JsonFileReader = readJsonFile) {}

  async execute(params: EvaluateHandlerParams): Promise<Result<TaxEvaluation, Error>> {
    const ledgerDocument = await this.readJson(params.ledgerPath);
    if (ledgerDocument.isErr()) {
      return err(ledgerDocument.error);
    }
    const operations = parseLedger(ledgerDocument.value);
    if (operations.isErr()) {
      return err(operations.error);
    }

    const priceDocument = await this.readJson(params.pricesPath);
    if (priceDocument.isErr()) {
      return err(priceDocument.error);
    }
    const quotes = parsePriceQuotes(priceDocument.value);
    if (quotes.isErr()) {
      return err(quotes.error);
    }

    this.logger.info(
      { ledger: params.ledgerPath, operations: operations.value.length, quotes: quotes.value.length },
      'Loaded ledger and prices'
    );

    const lookup = new InMemoryPriceTable(quotes.value, params.config.fiatCurrency);
    const engine = TaxationEngine.create(params.config, lookup);
    if (engine.isErr()) {
      return err(engine.error);
    }

    return engine.value.evaluate(operations.value);
  }
}
