import { z } from 'zod';

import { amountSchema, currencySchema, isoDateSchema } from '@/lib/validation';

// -------------------------------------------
// Database row shapes (snake_case, as stored). Numeric columns may come back as strings.
// -------------------------------------------

const optionalInt = z.preprocess(
  (value) => (value === null || value === undefined ? undefined : typeof value === 'string' ? Number(value) : value),
  z.number().int().optional(),
);

const nullableText = z
  .string()
  .nullable()
  .optional()
  .transform((value) => value ?? null);

const nullableDate = z.preprocess((value) => (value === null ? undefined : value), isoDateSchema.optional());

export const obligationRowSchema = z.object({
  id: z.coerce.string(),
  user_id: nullableText,
  kind: z.enum(['transaction', 'transfer']).default('transaction'),
  account_id: z.coerce.string(),
  destination_account_id: nullableText,
  amount: amountSchema,
  currency: currencySchema,
  description: z.string(),
  category_id: nullableText,
  frequency: z.string(),
  interval: optionalInt,
  day_of_month: optionalInt,
  day_of_week: optionalInt,
  month_of_year: optionalInt,
  start_date: isoDateSchema,
  end_date: nullableDate,
  is_active: z.boolean().default(true),
  next_occurrence: nullableDate,
});

export const exceptionRowSchema = z.object({
  obligation_id: z.coerce.string(),
  original_date: isoDateSchema,
  kind: z.enum(['skip', 'modify']),
  modified_amount: z.preprocess((value) => (value === null ? undefined : value), amountSchema.optional()),
  modified_description: nullableText,
  modified_date: nullableDate,
});

export const transactionRowSchema = z.object({
  id: z.coerce.string(),
  account_id: z.coerce.string(),
  date: isoDateSchema,
  amount: amountSchema,
  currency: currencySchema,
  description: nullableText,
  recurring_obligation_id: nullableText,
  recurring_instance_date: nullableDate,
});

export type ObligationRow = z.output<typeof obligationRowSchema>;
export type ExceptionRow = z.output<typeof exceptionRowSchema>;
