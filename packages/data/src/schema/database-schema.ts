import type { ColumnType, Generated } from 'kysely';

/**
 * expenses table.
 *
 * amount and created_on are always selected through a text cast, so their
 * select type is string.
 */
export interface ExpensesTable {
  id: Generated<number>;
  amount: ColumnType<string, string, never>;
  memo: ColumnType<string, string, never>;
  created_on: ColumnType<string, string | undefined, never>;
}

export interface DatabaseSchema {
  expenses: ExpensesTable;
}
