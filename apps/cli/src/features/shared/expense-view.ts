import type { Expense } from '@spendlog/core';
import { formatFixed2, sumDecimals } from '@spendlog/core';

export const TOTAL_SEPARATOR = '-'.repeat(50);

/**
 * Plain-data shape of an expense for --json output.
 */
export interface ExpenseView {
  id: number;
  createdOn: string;
  amount: string;
  memo: string;
}

export function toExpenseView(expense: Expense): ExpenseView {
  return {
    id: expense.id,
    createdOn: expense.createdOn,
    amount: formatFixed2(expense.amount),
    memo: expense.memo,
  };
}

/**
 * `  1 | 2024-03-15 |        12.50 | Coffee`
 */
export function formatExpenseRow(expense: Expense): string {
  return [
    String(expense.id).padStart(3),
    expense.createdOn.padStart(10),
    formatFixed2(expense.amount).padStart(12),
    expense.memo,
  ].join(' | ');
}

export function formatTotal(expenses: readonly Expense[]): string {
  return formatFixed2(sumDecimals(expenses.map((expense) => expense.amount)));
}

export function formatTotalLines(expenses: readonly Expense[]): string[] {
  return [TOTAL_SEPARATOR, `Total${formatTotal(expenses).padStart(25)}`];
}

/**
 * Count line; there is none for an empty result.
 */
export function formatCountLine(count: number): string | undefined {
  return count > 0 ? `There are ${count} expenses.` : undefined;
}

/**
 * Count line, one row per expense, then the total. Empty for no expenses.
 */
export function renderExpenseTable(expenses: readonly Expense[]): string[] {
  const countLine = formatCountLine(expenses.length);
  if (countLine === undefined) return [];

  return [countLine, ...expenses.map(formatExpenseRow), ...formatTotalLines(expenses)];
}
