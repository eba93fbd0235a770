import type { ExpenseRepository } from '@spendlog/data';
import type { Result } from 'neverthrow';

import type { CommandHandler } from '../shared/command-execution.js';

/**
 * Result of the clear operation.
 */
export interface ClearResult {
  deleted: number;
}

/**
 * Clear handler - removes every expense. Confirmation happens before it runs.
 */
export class ClearHandler implements CommandHandler<void, ClearResult> {
  constructor(private readonly expenseRepository: ExpenseRepository) {}

  async execute(): Promise<Result<ClearResult, Error>> {
    const result = await this.expenseRepository.deleteAll();
    return result.map((deleted) => ({ deleted }));
  }
}
