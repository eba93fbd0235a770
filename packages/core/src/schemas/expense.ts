import type { Decimal } from 'decimal.js';
import { z } from 'zod';

/**
 * Calendar date without a time component, as `YYYY-MM-DD`.
 */
export const IsoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, { message: 'Date must be in YYYY-MM-DD format' })
  .refine(
    (value) => {
      const time = Date.parse(`${value}T00:00:00Z`);
      // Some engines roll 2024-02-30 over into March instead of rejecting it
      return !Number.isNaN(time) && new Date(time).toISOString().slice(0, 10) === value;
    },
    { message: 'Date is not a valid calendar date' }
  );

export type IsoDate = z.infer<typeof IsoDateSchema>;

/**
 * A recorded expense.
 *
 * `amount` keeps the two-digit scale the database stores (numeric(6,2)),
 * `createdOn` is the stored calendar date rendered as `YYYY-MM-DD`.
 */
export interface Expense {
  id: number;
  amount: Decimal;
  memo: string;
  createdOn: IsoDate;
}

/**
 * Input for recording an expense.
 *
 * `amount` is passed to the database as typed by the user; the database
 * decides whether it is a valid numeric(6,2) value.
 */
export interface NewExpense {
  amount: string;
  memo: string;
  createdOn?: IsoDate | undefined;
}
