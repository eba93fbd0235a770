#!/usr/bin/env node
import './env-setup.js';

import { getLogger } from '@spendlog/logger';

import { ExitCodes, exitWithCode } from './features/shared/exit-codes.js';
import { createProgram } from './program.js';

const logger = getLogger('CLI');

async function main() {
  await createProgram().parseAsync();
}

// Handle unhandled rejections
process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled rejection');
  process.stderr.write(`Unhandled rejection: ${String(reason)}\n`);
  exitWithCode(ExitCodes.GENERAL_ERROR);
});

main().catch((error: unknown) => {
  logger.error({ error }, 'CLI failed');
  process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
  exitWithCode(ExitCodes.GENERAL_ERROR);
});
