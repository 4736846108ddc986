import type { IsoDate, RecurrencePattern } from '@/models/recurrence';

/**
 * Amount in a single currency, rounded to 2 decimal places.
 * Sign convention: negative = outflow, positive = inflow.
 */
export interface Money {
  currency: string;
  amount: number;
}

export const DEFAULT_CURRENCY = 'EUR';

export type ObligationKind = 'transaction' | 'transfer';

/**
 * Override that removes one scheduled instance.
 */
export interface SkipException {
  kind: 'skip';
  originalDate: IsoDate;
}

/**
 * Override that changes one scheduled instance. At least one field is set.
 */
export interface ModifyException {
  kind: 'modify';
  originalDate: IsoDate;
  modifiedAmount?: Money;
  modifiedDescription?: string;
  modifiedDate?: IsoDate;
}

export type ObligationException = SkipException | ModifyException;

export type ExceptionKind = ObligationException['kind'];

/**
 * Fields a caller may override on a single instance.
 */
export interface ExceptionOverrides {
  modifiedAmount?: Money | number | null;
  modifiedDescription?: string | null;
  modifiedDate?: IsoDate | null;
}

/**
 * Plain, serialisable view of a series.
 */
export interface ObligationSnapshot {
  id: string;
  kind: ObligationKind;
  accountId: string;
  destinationAccountId: string | null;
  amount: Money;
  description: string;
  categoryId: string | null;
  pattern: RecurrencePattern;
  startDate: IsoDate;
  endDate: IsoDate | null;
  isActive: boolean;
  nextOccurrence: IsoDate | null;
  exceptions: ObligationException[];
}
