import type { Money } from '@/models/obligation';
import type { Frequency, IsoDate } from '@/models/recurrence';

/**
 * Default look-ahead when a caller does not give an allocation horizon.
 */
export const DEFAULT_PLANNING_HORIZON_DAYS = 60;

/**
 * Single income occurrence used as a funding source.
 */
export interface PayEvent {
  date: IsoDate;
  netAmount: Money;
  description?: string;
  sourceObligationId?: string | null;
}

/**
 * Snapshot of a bill for allocation. `amount` is always a positive magnitude.
 */
export interface BillInfo {
  description: string;
  amount: Money;
  frequency: Frequency;
  sourceObligationId?: string | null;
}

/**
 * One due date of a bill.
 */
export interface BillOccurrence {
  bill: BillInfo;
  dueDate: IsoDate;
  amount: Money;
  /** Scheduled date before exceptions, when the occurrence comes from a series. */
  originalDate?: IsoDate;
}

export interface BillAllocation {
  occurrence: BillOccurrence;
  amount: Money;
}

export interface PayEventAllocation {
  payEvent: PayEvent;
  allocations: BillAllocation[];
  allocated: Money;
  remaining: Money;
}

export interface Shortfall {
  occurrence: BillOccurrence;
  /** Largest remaining capacity among pay events dated on or before the due date. */
  available: Money;
  shortfall: Money;
}

export interface AllocationTotals {
  income: Money;
  allocated: Money;
  shortfall: Money;
  unallocated: Money;
}

export interface AllocationResult {
  payEvents: PayEventAllocation[];
  shortfalls: Shortfall[];
  totals: AllocationTotals;
}

export interface AllocationOptions {
  /** First due date considered; defaults to the first pay event date. */
  from?: IsoDate;
  signal?: AbortSignal;
}

export type AllocationWarningType =
  | 'no_bills_configured'
  | 'no_income_configured'
  | 'insufficient_income'
  | 'cannot_reconcile';

export interface AllocationWarning {
  type: AllocationWarningType;
  message: string;
  amount: Money | null;
}

/**
 * Average set-aside per paycheck for one bill.
 */
export interface PaycheckAllocation {
  bill: BillInfo;
  amountPerPaycheck: Money;
  annualAmount: Money;
}

export interface PaycheckAllocationSummary {
  allocations: PaycheckAllocation[];
  totalPerPaycheck: Money;
  totalAnnualBills: Money;
  paycheckFrequency: Frequency;
  paycheckAmount: Money | null;
  annualIncome: Money | null;
  remainingPerPaycheck: Money | null;
  warnings: AllocationWarning[];
}
