import { formatEvaluationSummary, summarizeEvaluation, type TaxEvaluation } from '@coinreckon/accounting';
import { getTaxationEnvDefaults, type TaxationEnvDefaults } from '@coinreckon/env';
import { getLogger, setLoggerTransports } from '@coinreckon/logger';
import type { Command } from 'commander';

import { ExitCodes } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';

import { EvaluateHandler } from './evaluate-handler.js';
import {
  buildEvaluateParamsFromFlags,
  EvaluateCommandOptionsSchema,
  serializeEvaluation,
  type EvaluateHandlerParams,
} from './evaluate-utils.js';

const logger = getLogger('EvaluateCommand');

/**
 * Register the evaluate command.
 */
export function registerEvaluateCommand(program: Command): void {
  program
    .command('evaluate')
    .description('Evaluate the taxable gains of a ledger for one tax year')
    .requiredOption('--ledger <file>', 'JSON ledger of operations')
    .requiredOption('--prices <file>', 'JSON price quotes in the fiat currency')
    .option('--tax-year <year>', 'Tax year to evaluate (e.g., 2024)')
    .option('--country <code>', 'Tax jurisdiction: DE')
    .option('--method <method>', 'Lot accounting method: fifo, lifo')
    .option('--fiat <currency>', 'Fiat currency of the report (e.g., EUR)')
    .option('--multi-depot', 'Keep separate balances per platform')
    .option('--airdrops-are-gifts', 'Treat every airdrop as a gift')
    .option('--json', 'Output results in JSON format')
    .action(async (rawOptions: unknown) => {
      await executeEvaluateCommand(rawOptions);
    });
}

async function executeEvaluateCommand(rawOptions: unknown): Promise<void> {
  const isJsonMode =
    typeof rawOptions === 'object' && rawOptions !== null && 'json' in rawOptions && rawOptions.json === true;

  const parseResult = EvaluateCommandOptionsSchema.safeParse(rawOptions);
  if (!parseResult.success) {
    const output = new OutputManager(isJsonMode ? 'json' : 'text');
    output.error('evaluate', new Error(parseResult.error.issues[0]?.message ?? 'Invalid options'), ExitCodes.INVALID_ARGS);
    return;
  }

  const options = parseResult.data;
  const output = new OutputManager(options.json ? 'json' : 'text');
  if (output.isTextMode()) {
    // clack owns the terminal in text mode
    setLoggerTransports({ console: false });
  }

  let envDefaults: TaxationEnvDefaults;
  try {
    envDefaults = getTaxationEnvDefaults();
  } catch (error) {
    output.error('evaluate', error instanceof Error ? error : new Error(String(error)), ExitCodes.INVALID_ARGS);
    return;
  }

  const params = buildEvaluateParamsFromFlags(options, envDefaults);
  if (params.isErr()) {
    output.error('evaluate', params.error, ExitCodes.INVALID_ARGS);
    return;
  }

  output.intro(`coinreckon | tax year ${params.value.config.taxYear}`);

  const handler = new EvaluateHandler();
  const result = await handler.execute(params.value);
  if (result.isErr()) {
    logger.error({ error: result.error }, 'Evaluation failed');
    output.error('evaluate', result.error, ExitCodes.GENERAL_ERROR);
    return;
  }

  handleEvaluateSuccess(output, result.value, params.value);
}

function handleEvaluateSuccess(output: OutputManager, evaluation: TaxEvaluation, params: EvaluateHandlerParams): void {
  if (output.isTextMode()) {
    for (const warning of evaluation.warnings) {
      output.warn(warning.message);
    }
    output.note(formatEvaluationSummary(summarizeEvaluation(evaluation)), 'Tax report');
    output.outro('Evaluation complete');
    return;
  }

  output.json('evaluate', serializeEvaluation(evaluation), {
    jurisdiction: params.config.jurisdiction,
    method: params.config.method,
  });
}
