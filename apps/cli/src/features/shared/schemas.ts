import { IsoDateSchema } from '@spendlog/core';
import { z } from 'zod';

/**
 * A positional argument that must be present and not empty.
 * The value itself is passed on untouched.
 */
const requiredArgument = (message: string) =>
  z.string({ required_error: message, invalid_type_error: message }).refine((value) => value.length > 0, {
    message,
  });

export const JsonFlagSchema = z.object({
  json: z.boolean().optional(),
});

/**
 * add AMOUNT MEMO [DATE]
 *
 * AMOUNT is not checked for being numeric; the database decides.
 */
export const AddCommandSchema = z.object({
  amount: requiredArgument('You must provide an amount and memo.'),
  memo: requiredArgument('You must provide an amount and memo.'),
  date: IsoDateSchema.optional(),
  options: JsonFlagSchema,
});

export const ListCommandSchema = z.object({
  options: JsonFlagSchema,
});

export const SearchCommandSchema = z.object({
  query: requiredArgument('You must provide a search query.'),
  options: JsonFlagSchema,
});

/**
 * delete ID
 *
 * ID is not checked for being an integer; the database decides.
 */
export const DeleteCommandSchema = z.object({
  id: requiredArgument('You must provide an id of an expense to delete.'),
  options: JsonFlagSchema,
});

export const ClearCommandSchema = z.object({
  options: JsonFlagSchema.extend({
    confirm: z.boolean().optional(),
  }),
});
