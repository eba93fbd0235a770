import type { Expense, NewExpense } from '@spendlog/core';
import type { ExpenseRepository } from '@spendlog/data';
import type { Result } from 'neverthrow';

import type { CommandHandler } from '../shared/command-execution.js';

/**
 * Records a single expense.
 */
export class AddHandler implements CommandHandler<NewExpense, Expense> {
  constructor(private readonly expenseRepository: ExpenseRepository) {}

  execute(params: NewExpense): Promise<Result<Expense, Error>> {
    return this.expenseRepository.add(params);
  }
}
