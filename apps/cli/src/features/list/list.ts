import type { Command } from 'commander';

import { firstIssueMessage } from '../shared/command-execution.js';
import { withExpenseRepository } from '../shared/database-utils.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { formatTotal, renderExpenseTable, toExpenseView } from '../shared/expense-view.js';
import { OutputManager } from '../shared/output.js';
import { ListCommandSchema } from '../shared/schemas.js';

import { ListHandler } from './list-handler.js';

export const NO_EXPENSES_MESSAGE = 'There are no expenses.';

/**
 * Register the list command.
 */
export function registerListCommand(program: Command): void {
  program
    .command('list')
    .description('list all expenses')
    .option('--json', 'Output results in JSON format')
    .action(async (rawOptions: unknown) => {
      await executeListCommand(rawOptions);
    });
}

/**
 * Execute the list command.
 */
export async function executeListCommand(rawOptions: unknown): Promise<void> {
  const validationResult = ListCommandSchema.safeParse({ options: rawOptions });
  if (!validationResult.success) {
    const output = new OutputManager('text');
    output.error('list', new Error(firstIssueMessage(validationResult.error)), ExitCodes.INVALID_ARGS);
    return;
  }

  const { options } = validationResult.data;
  const output = new OutputManager(options.json ? 'json' : 'text');

  const result = await withExpenseRepository((repo) => new ListHandler(repo).execute());
  if (result.isErr()) {
    output.error('list', result.error, ExitCodes.DATABASE_ERROR);
    return;
  }

  const expenses = result.value;
  if (output.isJsonMode()) {
    output.json(
      'list',
      { expenses: expenses.map(toExpenseView), total: formatTotal(expenses) },
      { count: expenses.length }
    );
    return;
  }

  output.lines(expenses.length === 0 ? [NO_EXPENSES_MESSAGE] : renderExpenseTable(expenses));
}
