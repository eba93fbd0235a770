import type { Expense } from '@spendlog/core';
import type { ExpenseRepository } from '@spendlog/data';
import { getLogger } from '@spendlog/logger';
import { err, ok, type Result } from 'neverthrow';

import type { CommandHandler } from '../shared/command-execution.js';

const logger = getLogger('DeleteHandler');

export interface DeleteHandlerParams {
  id: string;
}

export type DeleteExpenseResult = { expense: Expense; status: 'deleted' } | { status: 'not-found' };

/**
 * Deletes one expense by id.
 *
 * The row is looked up first so a missing id is reported without issuing
 * the DELETE at all.
 */
export class DeleteHandler implements CommandHandler<DeleteHandlerParams, DeleteExpenseResult> {
  constructor(private readonly expenseRepository: ExpenseRepository) {}

  async execute(params: DeleteHandlerParams): Promise<Result<DeleteExpenseResult, Error>> {
    const existing = await this.expenseRepository.findById(params.id);
    if (existing.isErr()) {
      return err(existing.error);
    }
    if (existing.value === undefined) {
      logger.debug({ id: params.id }, 'No expense to delete');
      return ok({ status: 'not-found' });
    }

    const deleted = await this.expenseRepository.deleteById(params.id);
    if (deleted.isErr()) {
      return err(deleted.error);
    }

    // Removed by another session between the lookup and the delete
    if (deleted.value === undefined) {
      return ok({ status: 'not-found' });
    }

    return ok({ status: 'deleted', expense: deleted.value });
  }
}
