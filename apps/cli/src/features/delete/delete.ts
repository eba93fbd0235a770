import type { Command } from 'commander';

import { firstIssueMessage } from '../shared/command-execution.js';
import { withExpenseRepository } from '../shared/database-utils.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { formatExpenseRow, formatTotalLines, toExpenseView } from '../shared/expense-view.js';
import { OutputManager } from '../shared/output.js';
import { DeleteCommandSchema } from '../shared/schemas.js';

import { DeleteHandler } from './delete-handler.js';

/**
 * Register the delete command.
 */
export function registerDeleteCommand(program: Command): void {
  program
    .command('delete')
    .description('remove expense with id NUMBER')
    .argument('[id]', 'id of the expense to remove')
    .option('--json', 'Output results in JSON format')
    .action(async (id: unknown, rawOptions: unknown) => {
      await executeDeleteCommand({ id, options: rawOptions });
    });
}

/**
 * Execute the delete command.
 *
 * The id is passed to the database as typed; anything Postgres does not
 * accept as an integer surfaces as a database error.
 */
export async function executeDeleteCommand(rawInput: unknown): Promise<void> {
  const validationResult = DeleteCommandSchema.safeParse(rawInput);
  if (!validationResult.success) {
    const output = new OutputManager('text');
    output.error('delete', new Error(firstIssueMessage(validationResult.error)), ExitCodes.INVALID_ARGS);
    return;
  }

  const { id, options } = validationResult.data;
  const output = new OutputManager(options.json ? 'json' : 'text');

  const result = await withExpenseRepository((repo) => new DeleteHandler(repo).execute({ id }));
  if (result.isErr()) {
    output.error('delete', result.error, ExitCodes.DATABASE_ERROR);
    return;
  }

  const outcome = result.value;
  if (outcome.status === 'not-found') {
    output.json('delete', { id, deleted: null });
    output.lines([`There is no expense with the id '${id}'.`]);
    return;
  }

  output.json('delete', { id, deleted: toExpenseView(outcome.expense) });
  output.lines([
    'The following expense has been deleted:',
    formatExpenseRow(outcome.expense),
    ...formatTotalLines([outcome.expense]),
  ]);
}
