import type { Expense, NewExpense } from '@spendlog/core';
import { wrapError } from '@spendlog/core';
import { Decimal } from 'decimal.js';
import { sql } from 'kysely';
import type { Result } from 'neverthrow';
import { ok } from 'neverthrow';

import type { KyselyDB } from '../storage/database.js';

import { BaseRepository } from './base-repository.js';

interface ExpenseRow {
  id: number;
  amount: string;
  memo: string;
  created_on: string;
}

// Cast in SQL so values never pass through the driver's numeric/date parsers
const amountText = sql<string>`amount::text`.as('amount');
const createdOnText = sql<string>`to_char(created_on, 'YYYY-MM-DD')`.as('created_on');

function toExpense(row: ExpenseRow): Expense {
  return {
    id: row.id,
    amount: new Decimal(row.amount),
    memo: row.memo,
    createdOn: row.created_on,
  };
}

/**
 * Repository for the expenses table.
 *
 * Driver failures (bad numeric input, overflow, lost connection) come back
 * as Err values carrying the driver's message; nothing is retried.
 */
export class ExpenseRepository extends BaseRepository {
  constructor(db: KyselyDB) {
    super(db, 'ExpenseRepository');
  }

  /**
   * Insert an expense dated `createdOn`, or today's date on the database server.
   */
  async add(expense: NewExpense): Promise<Result<Expense, Error>> {
    try {
      const row = await this.db
        .insertInto('expenses')
        .values({
          amount: expense.amount,
          memo: expense.memo,
          created_on: expense.createdOn ?? sql<string>`CURRENT_DATE`,
        })
        .returning(['id', amountText, 'memo', createdOnText])
        .executeTakeFirstOrThrow();

      this.logger.debug({ id: row.id }, 'Recorded expense');
      return ok(toExpense(row));
    } catch (error) {
      this.logger.error({ error }, 'Failed to add expense');
      return wrapError(error, 'Failed to add expense');
    }
  }

  /**
   * All expenses, most recent first.
   */
  async findAll(): Promise<Result<Expense[], Error>> {
    try {
      const rows = await this.selectExpenses()
        .orderBy('expenses.created_on', 'desc')
        .orderBy('expenses.id', 'desc')
        .execute();
      return ok(rows.map(toExpense));
    } catch (error) {
      this.logger.error({ error }, 'Failed to list expenses');
      return wrapError(error, 'Failed to list expenses');
    }
  }

  /**
   * Expenses whose memo contains `query`, ignoring case.
   */
  async search(query: string): Promise<Result<Expense[], Error>> {
    try {
      const rows = await this.selectExpenses()
        .where('memo', 'ilike', `%${query}%`)
        .orderBy('expenses.created_on', 'desc')
        .orderBy('expenses.id', 'desc')
        .execute();

      this.logger.debug({ query, matches: rows.length }, 'Searched expenses');
      return ok(rows.map(toExpense));
    } catch (error) {
      this.logger.error({ error, query }, 'Failed to search expenses');
      return wrapError(error, 'Failed to search expenses');
    }
  }

  /**
   * Look up one expense. `id` is bound as text and parsed by Postgres, so
   * anything that is not an integer literal fails as a database error.
   */
  async findById(id: string): Promise<Result<Expense | undefined, Error>> {
    try {
      const row = await this.selectExpenses().where('id', '=', sql<number>`${id}`).executeTakeFirst();
      return ok(row ? toExpense(row) : undefined);
    } catch (error) {
      this.logger.error({ error, id }, 'Failed to find expense');
      return wrapError(error, 'Failed to find expense');
    }
  }

  /**
   * Delete one expense. Returns the deleted row, or undefined if no row had that id.
   */
  async deleteById(id: string): Promise<Result<Expense | undefined, Error>> {
    try {
      const row = await this.db
        .deleteFrom('expenses')
        .where('id', '=', sql<number>`${id}`)
        .returning(['id', amountText, 'memo', createdOnText])
        .executeTakeFirst();

      this.logger.debug({ id, deleted: row !== undefined }, 'Deleted expense');
      return ok(row ? toExpense(row) : undefined);
    } catch (error) {
      this.logger.error({ error, id }, 'Failed to delete expense');
      return wrapError(error, 'Failed to delete expense');
    }
  }

  /**
   * Delete every expense. Returns the number of rows removed.
   */
  async deleteAll(): Promise<Result<number, Error>> {
    try {
      const result = await this.db.deleteFrom('expenses').executeTakeFirst();
      const deleted = Number(result.numDeletedRows);

      this.logger.info({ deleted }, 'Deleted all expenses');
      return ok(deleted);
    } catch (error) {
      this.logger.error({ error }, 'Failed to delete all expenses');
      return wrapError(error, 'Failed to delete all expenses');
    }
  }

  private selectExpenses() {
    return this.db.selectFrom('expenses').select(['id', amountText, 'memo', createdOnText]);
  }
}
