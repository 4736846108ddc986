import { ValidationError, describeError } from '@/lib/errors';
import { compareIsoDates, daysBetween, maxDate, minDate } from '@/lib/dates';
import { negateMoney } from '@/lib/money';
import type { RecurringObligation } from '@/lib/obligation';
import { nextAfter, nextOnOrAfter } from '@/lib/recurrence';
import { isoDateSchema, parseOrThrow } from '@/lib/validation';
import type { Money } from '@/models/obligation';
import {
  MAX_PROJECTION_SPAN_DAYS,
  type BatchProjection,
  type InstanceLeg,
  type ProjectedInstance,
  type ProjectionFailure,
  type ProjectionOptions,
} from '@/models/projection';
import type { IsoDate } from '@/models/recurrence';

/**
 * Check a requested window before any walking happens.
 * @returns - normalised [start, end]
 */
export function validateRange(rangeStart: IsoDate, rangeEnd: IsoDate): [IsoDate, IsoDate] {
  const start = parseOrThrow(isoDateSchema, rangeStart, 'Invalid rangeStart');
  const end = parseOrThrow(isoDateSchema, rangeEnd, 'Invalid rangeEnd');
  if (start > end) {
    throw new ValidationError(`range: rangeStart ${start} is after rangeEnd ${end}`);
  }
  if (daysBetween(start, end) > MAX_PROJECTION_SPAN_DAYS) {
    throw new ValidationError(`range: projection window exceeds ${MAX_PROJECTION_SPAN_DAYS} days`);
  }
  return [start, end];
}

function buildLegs(obligation: RecurringObligation, amount: Money): InstanceLeg[] {
  if (obligation.kind === 'transfer' && obligation.destinationAccountId !== null) {
    return [
      { accountId: obligation.accountId, amount: negateMoney(amount) },
      { accountId: obligation.destinationAccountId, amount },
    ];
  }
  return [{ accountId: obligation.accountId, amount }];
}

/**
 * Stable order: effective date, then original date, then series id.
 */
export function compareInstances(a: ProjectedInstance, b: ProjectedInstance): number {
  return (
    compareIsoDates(a.effectiveDate, b.effectiveDate) ||
    compareIsoDates(a.originalDate, b.originalDate) ||
    (a.obligationId === b.obligationId ? 0 : a.obligationId < b.obligationId ? -1 : 1)
  );
}

/**
 * Pattern dates of a series inside a window, before exceptions are applied.
 * @param obligation - series to walk
 * @param rangeStart - inclusive lower bound
 * @param rangeEnd - inclusive upper bound
 * @param options - abort signal checked on every step
 * @returns - ascending occurrence dates
 */
export function occurrencesBetween(
  obligation: RecurringObligation,
  rangeStart: IsoDate,
  rangeEnd: IsoDate,
  options: ProjectionOptions = {},
): IsoDate[] {
  const start = maxDate(obligation.startDate, rangeStart);
  const end = obligation.endDate === null ? rangeEnd : minDate(obligation.endDate, rangeEnd);
  const dates: IsoDate[] = [];
  if (start > end) return dates;

  let current = nextOnOrAfter(obligation.pattern, obligation.startDate, start);
  while (current <= end) {
    options.signal?.throwIfAborted();
    dates.push(current);
    current = nextAfter(obligation.pattern, obligation.startDate, current);
  }
  return dates;
}

/**
 * Concrete instances of one series inside a window, with the exception overlay applied.
 * Instances are selected by their original (pattern) date; a modified date outside the
 * window is kept as-is.
 * @param obligation - series to project
 * @param rangeStart - inclusive lower bound
 * @param rangeEnd - inclusive upper bound
 * @param options - abort signal
 * @returns - instances sorted by effective date
 */
export function projectObligation(
  obligation: RecurringObligation,
  rangeStart: IsoDate,
  rangeEnd: IsoDate,
  options: ProjectionOptions = {},
): ProjectedInstance[] {
  const [start, end] = validateRange(rangeStart, rangeEnd);
  if (!obligation.isActive) return [];

  const instances: ProjectedInstance[] = [];
  for (const originalDate of occurrencesBetween(obligation, start, end, options)) {
    const exception = obligation.getException(originalDate);
    if (exception?.kind === 'skip') continue;

    const modify = exception?.kind === 'modify' ? exception : undefined;
    const amount = modify?.modifiedAmount ?? obligation.amount;
    instances.push({
      obligationId: obligation.id,
      kind: obligation.kind,
      originalDate,
      effectiveDate: modify?.modifiedDate ?? originalDate,
      amount,
      description: modify?.modifiedDescription ?? obligation.description,
      categoryId: obligation.categoryId,
      isModified: modify !== undefined,
      legs: buildLegs(obligation, amount),
    });
  }

  return instances.sort(compareInstances);
}

/**
 * Group instances by effective date, keys in ascending order.
 */
export function groupByDate(instances: ProjectedInstance[]): Map<IsoDate, ProjectedInstance[]> {
  const byDate = new Map<IsoDate, ProjectedInstance[]>();
  for (const instance of [...instances].sort(compareInstances)) {
    const list = byDate.get(instance.effectiveDate);
    if (list) {
      list.push(instance);
    } else {
      byDate.set(instance.effectiveDate, [instance]);
    }
  }
  return byDate;
}

/**
 * Project several series at once. A series that fails is reported in `failures`
 * and does not stop the others; an abort stops the whole batch.
 * @param obligations - series to project
 * @param rangeStart - inclusive lower bound
 * @param rangeEnd - inclusive upper bound
 * @param options - abort signal
 * @returns - instances per date, flat sorted list and failures
 */
export function projectAll(
  obligations: readonly RecurringObligation[],
  rangeStart: IsoDate,
  rangeEnd: IsoDate,
  options: ProjectionOptions = {},
): BatchProjection {
  const [start, end] = validateRange(rangeStart, rangeEnd);
  const instances: ProjectedInstance[] = [];
  const failures: ProjectionFailure[] = [];

  for (const obligation of obligations) {
    options.signal?.throwIfAborted();
    try {
      instances.push(...projectObligation(obligation, start, end, options));
    } catch (error) {
      if (options.signal?.aborted) throw error;
      const message = describeError(error);
      console.warn('[projector] Skipping obligation that failed to project', obligation.id, message);
      failures.push({ obligationId: obligation.id, message });
    }
  }

  instances.sort(compareInstances);
  return { byDate: groupByDate(instances), instances, failures };
}
