import type { Command } from 'commander';

import { firstIssueMessage } from '../shared/command-execution.js';
import { withExpenseRepository } from '../shared/database-utils.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { toExpenseView } from '../shared/expense-view.js';
import { OutputManager } from '../shared/output.js';
import { AddCommandSchema } from '../shared/schemas.js';

import { AddHandler } from './add-handler.js';
import { buildNewExpense } from './add-utils.js';

/**
 * Register the add command.
 */
export function registerAddCommand(program: Command): void {
  program
    .command('add')
    .description('record a new expense')
    .argument('[amount]', 'amount with up to two decimal places')
    .argument('[memo]', 'what the money was spent on')
    .argument('[date]', 'date of the expense (YYYY-MM-DD), defaults to today')
    .option('--json', 'Output results in JSON format')
    .action(async (amount: unknown, memo: unknown, date: unknown, rawOptions: unknown) => {
      await executeAddCommand({ amount, memo, date, options: rawOptions });
    });
}

/**
 * Execute the add command. Prints nothing in text mode.
 */
export async function executeAddCommand(rawInput: unknown): Promise<void> {
  const validationResult = AddCommandSchema.safeParse(rawInput);
  if (!validationResult.success) {
    const output = new OutputManager('text');
    output.error('add', new Error(firstIssueMessage(validationResult.error)), ExitCodes.INVALID_ARGS);
    return;
  }

  const { options, ...args } = validationResult.data;
  const output = new OutputManager(options.json ? 'json' : 'text');

  const result = await withExpenseRepository((repo) => new AddHandler(repo).execute(buildNewExpense(args)));
  if (result.isErr()) {
    output.error('add', result.error, ExitCodes.DATABASE_ERROR);
    return;
  }

  output.json('add', { expense: toExpenseView(result.value) });
}
