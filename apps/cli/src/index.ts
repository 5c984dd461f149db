#!/usr/bin/env node
import { getLogger } from '@coinreckon/logger';
import { Command } from 'commander';

import { registerEvaluateCommand } from './features/evaluate/evaluate.js';

const logger = getLogger('CLI');
const program = new Command();

async function main(): Promise<void> {
  program.name('coinreckon').description('Tax evaluation of crypto ledgers').version('0.1.0');

  // Evaluate command - taxable gains and deadline portfolio of one tax year
  registerEvaluateCommand(program);

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  logger.error({ error }, 'CLI failed');
  process.exit(1);
});
