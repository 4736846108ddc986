import { ValidationError } from '@/lib/errors';
import { absMoney, money, moneyFromCents, toCents } from '@/lib/money';
import type { RecurringObligation } from '@/lib/obligation';
import { projectObligation } from '@/lib/projector';
import { isoDateSchema, parseOrThrow, payEventSchema } from '@/lib/validation';
import type {
  AllocationOptions,
  AllocationResult,
  BillAllocation,
  BillInfo,
  BillOccurrence,
  PayEvent,
  Shortfall,
} from '@/models/allocation';
import { DEFAULT_CURRENCY, type Money } from '@/models/obligation';
import type { IsoDate } from '@/models/recurrence';

/**
 * Snapshot of a series for allocation; the amount becomes a positive magnitude.
 * @throws ValidationError when the description is blank
 */
export function createBillInfo(
  description: string,
  amount: Money,
  frequency: BillInfo['frequency'],
  sourceObligationId: string | null = null,
): BillInfo {
  const trimmed = description.trim();
  if (trimmed.length === 0) {
    throw new ValidationError('bill: description is required');
  }
  return { description: trimmed, amount: absMoney(amount), frequency, sourceObligationId };
}

export function billInfoFromObligation(obligation: RecurringObligation): BillInfo {
  return createBillInfo(obligation.description, obligation.amount, obligation.pattern.frequency, obligation.id);
}

/**
 * Validate a raw pay event. Bare numbers use `currency` (or the default currency).
 */
export function createPayEvent(input: unknown): PayEvent {
  const parsed = parseOrThrow(payEventSchema, input, 'Invalid pay event');
  const netAmount =
    typeof parsed.netAmount === 'number' ? money(parsed.netAmount, parsed.currency) : parsed.netAmount;
  if (netAmount.amount < 0) {
    throw new ValidationError(`pay event ${parsed.date}: net amount must not be negative`);
  }
  return {
    date: parsed.date,
    netAmount,
    ...(parsed.description !== undefined ? { description: parsed.description } : {}),
    sourceObligationId: parsed.sourceObligationId ?? null,
  };
}

/**
 * Expand bills into concrete due dates using the projector (skips removed, modifications applied).
 * @param bills - series to treat as bills
 * @param from - first due date considered
 * @param horizonEnd - last due date considered
 * @param options - abort signal
 * @returns - occurrences sorted by due date
 */
export function expandBills(
  bills: readonly RecurringObligation[],
  from: IsoDate,
  horizonEnd: IsoDate,
  options: Pick<AllocationOptions, 'signal'> = {},
): BillOccurrence[] {
  const occurrences: BillOccurrence[] = [];
  for (const obligation of bills) {
    const bill = billInfoFromObligation(obligation);
    for (const instance of projectObligation(obligation, from, horizonEnd, options)) {
      occurrences.push({
        bill,
        dueDate: instance.effectiveDate,
        amount: absMoney(instance.amount),
        originalDate: instance.originalDate,
      });
    }
  }
  return sortOccurrences(occurrences);
}

function sortOccurrences(occurrences: BillOccurrence[]): BillOccurrence[] {
  // Array#sort is stable, so equal due dates keep the caller's order.
  return occurrences.sort((a, b) => (a.dueDate === b.dueDate ? 0 : a.dueDate < b.dueDate ? -1 : 1));
}

function validatePayEvents(payEvents: readonly PayEvent[]): void {
  payEvents.forEach((event, index) => {
    parseOrThrow(isoDateSchema, event.date, `Invalid pay event #${index}`);
    if (!Number.isFinite(event.netAmount.amount) || event.netAmount.amount < 0) {
      throw new ValidationError(`pay event #${index}: net amount must not be negative`);
    }
    const previous = payEvents[index - 1];
    if (previous && previous.date > event.date) {
      throw new ValidationError(`pay event #${index}: pay events must be sorted by date ascending`);
    }
  });
}

function validateOccurrences(occurrences: readonly BillOccurrence[]): void {
  occurrences.forEach((occurrence, index) => {
    parseOrThrow(isoDateSchema, occurrence.dueDate, `Invalid bill occurrence #${index}`);
    if (!Number.isFinite(occurrence.amount.amount) || toCents(occurrence.amount.amount) <= 0) {
      throw new ValidationError(`bill ${occurrence.bill.description}: amount must be greater than 0`);
    }
  });
}

/**
 * Single currency shared by every input; conversion is out of scope.
 */
function resolveCurrency(payEvents: readonly PayEvent[], occurrences: readonly BillOccurrence[]): string | null {
  const currencies = new Set<string>([
    ...payEvents.map((event) => event.netAmount.currency),
    ...occurrences.map((occurrence) => occurrence.amount.currency),
  ]);
  if (currencies.size > 1) {
    throw new ValidationError(`allocation: mixed currencies are not supported (${[...currencies].join(', ')})`);
  }
  const [currency] = currencies;
  return currency ?? null;
}

/**
 * Earliest-deadline-first allocation with latest-feasible funding.
 * Bills are taken in due-date order; each is funded by the latest pay event dated on or
 * before its due date that still has enough capacity. When none has, the bill is reported
 * as a shortfall (amount minus the best remaining capacity) and nothing is deducted.
 * @param payEvents - income events sorted by date ascending
 * @param billOccurrences - due dates to fund, any order
 * @returns - allocations per pay event, shortfalls and totals
 * @throws ValidationError on negative pay amounts, unsorted pay events, non-positive bills or mixed currencies
 */
export function allocateOccurrences(
  payEvents: readonly PayEvent[],
  billOccurrences: readonly BillOccurrence[],
  options: Pick<AllocationOptions, 'signal'> = {},
): AllocationResult {
  validatePayEvents(payEvents);
  validateOccurrences(billOccurrences);
  const currency = resolveCurrency(payEvents, billOccurrences) ?? DEFAULT_CURRENCY;

  // Integer cents keep the running capacities exact.
  const remaining = payEvents.map((event) => toCents(event.netAmount.amount));
  const allocations: BillAllocation[][] = payEvents.map(() => []);
  const shortfalls: Shortfall[] = [];
  let shortfallCents = 0;

  for (const occurrence of sortOccurrences([...billOccurrences])) {
    options.signal?.throwIfAborted();
    const needed = toCents(occurrence.amount.amount);

    let lastEligible = -1;
    for (let i = 0; i < payEvents.length && payEvents[i].date <= occurrence.dueDate; i += 1) {
      lastEligible = i;
    }

    let chosen = -1;
    let bestAvailable = 0;
    for (let i = lastEligible; i >= 0; i -= 1) {
      if (remaining[i] >= needed) {
        chosen = i;
        break;
      }
      bestAvailable = Math.max(bestAvailable, remaining[i]);
    }

    if (chosen === -1) {
      shortfalls.push({
        occurrence,
        available: moneyFromCents(bestAvailable, currency),
        shortfall: moneyFromCents(needed - bestAvailable, currency),
      });
      shortfallCents += needed - bestAvailable;
      continue;
    }

    remaining[chosen] -= needed;
    allocations[chosen].push({ occurrence, amount: moneyFromCents(needed, currency) });
  }

  const incomeCents = payEvents.reduce((sum, event) => sum + toCents(event.netAmount.amount), 0);
  const unallocatedCents = remaining.reduce((sum, value) => sum + value, 0);

  return {
    payEvents: payEvents.map((payEvent, index) => ({
      payEvent,
      allocations: allocations[index],
      allocated: moneyFromCents(toCents(payEvent.netAmount.amount) - remaining[index], currency),
      remaining: moneyFromCents(remaining[index], currency),
    })),
    shortfalls,
    totals: {
      income: moneyFromCents(incomeCents, currency),
      allocated: moneyFromCents(incomeCents - unallocatedCents, currency),
      shortfall: moneyFromCents(shortfallCents, currency),
      unallocated: moneyFromCents(unallocatedCents, currency),
    },
  };
}

/**
 * Plan which paycheck funds which bill occurrence up to the horizon.
 * @param payEvents - income events sorted by date ascending
 * @param bills - series to fund; each is expanded with its own recurrence
 * @param horizonEnd - last due date considered
 * @param options - `from` (defaults to the first pay event date) and abort signal
 * @returns - allocation result; unfundable bills appear in `shortfalls`
 */
export function allocate(
  payEvents: readonly PayEvent[],
  bills: readonly RecurringObligation[],
  horizonEnd: IsoDate,
  options: AllocationOptions = {},
): AllocationResult {
  validatePayEvents(payEvents);
  const end = parseOrThrow(isoDateSchema, horizonEnd, 'Invalid horizonEnd');
  const from = parseOrThrow(isoDateSchema, options.from ?? payEvents[0]?.date ?? end, 'Invalid allocation start');
  if (from > end) {
    throw new ValidationError(`allocation: start ${from} is after horizon ${end}`);
  }

  const occurrences = expandBills(bills, from, end, options);
  return allocateOccurrences(payEvents, occurrences, options);
}
