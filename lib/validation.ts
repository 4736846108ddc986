import { z } from 'zod';

import { ValidationError } from '@/lib/errors';
import { isIsoDate, toIsoDate } from '@/lib/dates';
import { money } from '@/lib/money';
import { frequencies } from '@/models/recurrence';
import type { RecurrencePattern } from '@/models/recurrence';

const numberFromString = (value: unknown): unknown => {
  if (typeof value !== 'string') return value;
  const trimmed = value.trim();
  if (trimmed.length === 0) return value;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : value;
};

const blankToUndefined = (value: unknown): unknown => {
  if (value === null) return undefined;
  if (typeof value !== 'string') return value;
  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
};

const nullToUndefined = (value: unknown): unknown => (value === null ? undefined : value);

export const isoDateSchema = z.preprocess(
  (value) => {
    if (value instanceof Date) return Number.isNaN(value.getTime()) ? value : toIsoDate(value);
    if (typeof value === 'string') {
      const trimmed = value.trim();
      return trimmed.length > 10 && trimmed[10] === 'T' ? trimmed.slice(0, 10) : trimmed;
    }
    return value;
  },
  z
    .string({ required_error: 'date is required', invalid_type_error: 'date must be a YYYY-MM-DD string' })
    .refine(isIsoDate, { message: 'must be a valid YYYY-MM-DD date' }),
);

/**
 * Account ids are interpolated into PostgREST `or` filters.
 */
export const accountIdSchema = z
  .string({ required_error: 'accountId is required', invalid_type_error: 'accountId must be a string' })
  .regex(/^[A-Za-z0-9_-]+$/, { message: "accountId may only contain letters, digits, '-' and '_'" });

export const currencySchema = z
  .string()
  .trim()
  .regex(/^[A-Za-z]{3}$/, 'currency must be a 3-letter ISO code')
  .transform((value) => value.toUpperCase());

export const amountSchema = z.preprocess(
  numberFromString,
  z.number({ required_error: 'amount is required', invalid_type_error: 'amount must be a number' }).finite(),
);

export const moneySchema = z
  .object({
    currency: currencySchema,
    amount: amountSchema,
  })
  .transform((value) => money(value.amount, value.currency));

/** A bare number (currency supplied by context) or a full money value. */
export const amountOrMoneySchema = z.union([moneySchema, amountSchema]);

const weekdaySchema = z.union([
  z.literal(0),
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
  z.literal(5),
  z.literal(6),
], { errorMap: () => ({ message: 'dayOfWeek must be an integer between 0 (Sunday) and 6 (Saturday)' }) });

export const recurrencePatternSchema = z
  .object({
    frequency: z.enum(frequencies, {
      errorMap: () => ({ message: `frequency must be one of: ${frequencies.join(', ')}` }),
    }),
    interval: z.preprocess(
      nullToUndefined,
      z.number().int('interval must be an integer').min(1, 'interval must be at least 1').optional(),
    ),
    dayOfMonth: z.preprocess(
      nullToUndefined,
      z
        .number()
        .int('dayOfMonth must be an integer')
        .min(1, 'dayOfMonth must be between 1 and 31')
        .max(31, 'dayOfMonth must be between 1 and 31')
        .optional(),
    ),
    dayOfWeek: z.preprocess(nullToUndefined, weekdaySchema.optional()),
    monthOfYear: z.preprocess(
      nullToUndefined,
      z
        .number()
        .int('monthOfYear must be an integer')
        .min(1, 'monthOfYear must be between 1 and 12')
        .max(12, 'monthOfYear must be between 1 and 12')
        .optional(),
    ),
  })
  .superRefine((value, ctx) => {
    const forbid = (field: 'dayOfMonth' | 'dayOfWeek' | 'monthOfYear') => {
      if (value[field] !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [field],
          message: `${field} is not used by ${value.frequency} patterns`,
        });
      }
    };
    const require = (field: 'dayOfMonth' | 'dayOfWeek' | 'monthOfYear') => {
      if (value[field] === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [field],
          message: `${field} is required for ${value.frequency} patterns`,
        });
      }
    };

    switch (value.frequency) {
      case 'daily':
        forbid('dayOfMonth');
        forbid('dayOfWeek');
        forbid('monthOfYear');
        break;
      case 'weekly':
      case 'biweekly':
        require('dayOfWeek');
        forbid('dayOfMonth');
        forbid('monthOfYear');
        if (value.frequency === 'biweekly' && value.interval !== undefined && value.interval !== 2) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['interval'],
            message: 'biweekly patterns always recur every 2 weeks (interval 2)',
          });
        }
        break;
      case 'monthly':
      case 'quarterly':
        require('dayOfMonth');
        forbid('dayOfWeek');
        forbid('monthOfYear');
        break;
      case 'yearly':
        require('dayOfMonth');
        require('monthOfYear');
        forbid('dayOfWeek');
        break;
    }
  })
  .transform((value): RecurrencePattern => {
    const pattern: RecurrencePattern = {
      frequency: value.frequency,
      interval: value.interval ?? (value.frequency === 'biweekly' ? 2 : 1),
      ...(value.dayOfMonth !== undefined ? { dayOfMonth: value.dayOfMonth } : {}),
      ...(value.dayOfWeek !== undefined ? { dayOfWeek: value.dayOfWeek } : {}),
      ...(value.monthOfYear !== undefined ? { monthOfYear: value.monthOfYear } : {}),
    };
    return Object.freeze(pattern);
  });

export const exceptionOverridesSchema = z.object({
  modifiedAmount: z.preprocess(nullToUndefined, amountOrMoneySchema.optional()),
  modifiedDescription: z.preprocess(blankToUndefined, z.string().max(240).optional()),
  modifiedDate: z.preprocess(nullToUndefined, isoDateSchema.optional()),
});

export const exceptionInputSchema = z.discriminatedUnion('kind', [
  z
    .object({
      kind: z.literal('skip'),
      originalDate: isoDateSchema,
    })
    .strict('skip exceptions carry no override fields'),
  exceptionOverridesSchema.extend({
    kind: z.literal('modify'),
    originalDate: isoDateSchema,
  }),
]);

export const obligationInputSchema = z
  .object({
    id: z.string().trim().min(1, 'id is required'),
    kind: z.enum(['transaction', 'transfer']).default('transaction'),
    accountId: z.string().trim().min(1, 'accountId is required'),
    destinationAccountId: z.preprocess(blankToUndefined, z.string().optional()),
    amount: amountOrMoneySchema,
    currency: z.preprocess(nullToUndefined, currencySchema.optional()),
    description: z
      .string({ required_error: 'description is required' })
      .trim()
      .min(1, 'description is required')
      .max(240),
    categoryId: z.preprocess(blankToUndefined, z.string().optional()),
    pattern: recurrencePatternSchema,
    startDate: isoDateSchema,
    endDate: z.preprocess(nullToUndefined, isoDateSchema.optional()),
    isActive: z.boolean().default(true),
    nextOccurrence: z.preprocess(nullToUndefined, isoDateSchema.optional()),
    exceptions: z.array(exceptionInputSchema).default([]),
  })
  .superRefine((value, ctx) => {
    if (value.endDate !== undefined && value.endDate < value.startDate) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['endDate'],
        message: 'endDate must be on or after startDate',
      });
    }
    if (value.kind === 'transfer') {
      if (value.destinationAccountId === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['destinationAccountId'],
          message: 'destinationAccountId is required for transfers',
        });
      } else if (value.destinationAccountId === value.accountId) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['destinationAccountId'],
          message: 'source and destination accounts must differ',
        });
      }
    } else if (value.destinationAccountId !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['destinationAccountId'],
        message: 'destinationAccountId is only used by transfers',
      });
    }
  });

export const payEventSchema = z.object({
  date: isoDateSchema,
  netAmount: amountOrMoneySchema,
  currency: z.preprocess(nullToUndefined, currencySchema.optional()),
  description: z.preprocess(blankToUndefined, z.string().optional()),
  sourceObligationId: z.preprocess(blankToUndefined, z.string().optional()),
});

/**
 * Format a Zod error list into a compact string for logging.
 * @param error - zod error to flatten
 * @returns - human readable string
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`).join('; ');
}

/**
 * Parse untrusted input or throw a ValidationError listing every issue.
 * @param schema - zod schema
 * @param payload - raw value
 * @param context - prefix for the error message
 * @returns - parsed value
 */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, payload: unknown, context: string): z.output<S> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`);
    throw new ValidationError(`${context}: ${formatZodError(result.error)}`, issues);
  }
  return result.data;
}
