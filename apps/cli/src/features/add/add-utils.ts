import type { IsoDate, NewExpense } from '@spendlog/core';

export interface AddCommandArgs {
  amount: string;
  memo: string;
  date?: IsoDate | undefined;
}

/**
 * Map validated `add` arguments to the repository's insert shape.
 * Without a date the row takes the database server's current date.
 */
export function buildNewExpense(args: AddCommandArgs): NewExpense {
  return {
    amount: args.amount,
    memo: args.memo,
    ...(args.date !== undefined ? { createdOn: args.date } : {}),
  };
}
