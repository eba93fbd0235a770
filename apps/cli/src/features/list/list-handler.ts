import type { Expense } from '@spendlog/core';
import type { ExpenseRepository } from '@spendlog/data';
import type { Result } from 'neverthrow';

import type { CommandHandler } from '../shared/command-execution.js';

export class ListHandler implements CommandHandler<void, Expense[]> {
  constructor(private readonly expenseRepository: ExpenseRepository) {}

  execute(): Promise<Result<Expense[], Error>> {
    return this.expenseRepository.findAll();
  }
}
