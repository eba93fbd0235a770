import type { Expense } from '@spendlog/core';
import type { ExpenseRepository } from '@spendlog/data';
import type { Result } from 'neverthrow';

import type { CommandHandler } from '../shared/command-execution.js';

export interface SearchHandlerParams {
  query: string;
}

/**
 * Finds expenses whose memo contains the query, ignoring case.
 * `%` and `_` in the query act as wildcards.
 */
export class SearchHandler implements CommandHandler<SearchHandlerParams, Expense[]> {
  constructor(private readonly expenseRepository: ExpenseRepository) {}

  execute(params: SearchHandlerParams): Promise<Result<Expense[], Error>> {
    return this.expenseRepository.search(params.query);
  }
}
