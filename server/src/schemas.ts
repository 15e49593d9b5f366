import * as z from 'zod/v4';
import { isCategoryOf, TX_TYPES } from '../../src/domain/categories.js';
import { INVALID_DATE } from '../../src/domain/types.js';
import { parseStoredDate } from './ledgerFile.js';

export const nonEmptyString = z.string().trim().min(1);
export const dateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, { message: 'Date must be YYYY-MM-DD' })
  // same rule the loader applies, so an accepted date reads back unchanged
  .refine((value) => parseStoredDate(value) !== INVALID_DATE, { message: 'Date is not a calendar date' });

export const transactionInputSchema = z
  .object({
    date: dateSchema,
    type: z.enum([TX_TYPES.INCOME, TX_TYPES.EXPENSE]),
    category: z.string(),
    description: nonEmptyString,
    amount: z.number().positive(),
  })
  .refine((input) => isCategoryOf(input.type, input.category), {
    message: 'Category is not offered for this type',
    path: ['category'],
  });
