import { setLoggerTransports } from '@spendlog/logger';
import { Command } from 'commander';

import { registerAddCommand } from './features/add/add.js';
import { registerClearCommand } from './features/clear/clear.js';
import { registerDeleteCommand } from './features/delete/delete.js';
import { registerHelpCommand } from './features/help/help.js';
import { registerListCommand } from './features/list/list.js';
import { registerSearchCommand } from './features/search/search.js';
import { DASH_ARGUMENT_TIP } from './features/shared/output.js';

/**
 * Build the spendlog command tree.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('spendlog')
    .description('An expense recording system')
    .version('1.0.0')
    .option('--verbose', 'Log debug output to stderr')
    .showHelpAfterError(DASH_ARGUMENT_TIP);

  program.hook('preAction', (thisCommand) => {
    if (thisCommand.opts<{ verbose?: boolean }>().verbose) {
      setLoggerTransports({ console: true, level: 'debug' });
    }
  });

  registerHelpCommand(program);
  registerAddCommand(program);
  registerListCommand(program);
  registerSearchCommand(program);
  registerDeleteCommand(program);
  registerClearCommand(program);

  return program;
}
