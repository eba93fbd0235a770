import type { Command } from 'commander';

import { firstIssueMessage } from '../shared/command-execution.js';
import { withExpenseRepository } from '../shared/database-utils.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { formatTotal, renderExpenseTable, toExpenseView } from '../shared/expense-view.js';
import { OutputManager } from '../shared/output.js';
import { SearchCommandSchema } from '../shared/schemas.js';

import { SearchHandler } from './search-handler.js';

/**
 * Register the search command.
 */
export function registerSearchCommand(program: Command): void {
  program
    .command('search')
    .description('list expenses with a matching memo field')
    .argument('[query]', 'text to look for in the memo')
    .option('--json', 'Output results in JSON format')
    .action(async (query: unknown, rawOptions: unknown) => {
      await executeSearchCommand({ query, options: rawOptions });
    });
}

/**
 * Execute the search command. No matches prints nothing at all.
 */
export async function executeSearchCommand(rawInput: unknown): Promise<void> {
  const validationResult = SearchCommandSchema.safeParse(rawInput);
  if (!validationResult.success) {
    const output = new OutputManager('text');
    output.error('search', new Error(firstIssueMessage(validationResult.error)), ExitCodes.INVALID_ARGS);
    return;
  }

  const { query, options } = validationResult.data;
  const output = new OutputManager(options.json ? 'json' : 'text');

  const result = await withExpenseRepository((repo) => new SearchHandler(repo).execute({ query }));
  if (result.isErr()) {
    output.error('search', result.error, ExitCodes.DATABASE_ERROR);
    return;
  }

  const expenses = result.value;
  if (output.isJsonMode()) {
    output.json(
      'search',
      { query, expenses: expenses.map(toExpenseView), total: formatTotal(expenses) },
      { count: expenses.length }
    );
    return;
  }

  output.lines(renderExpenseTable(expenses));
}
