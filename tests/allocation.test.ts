import { describe, expect, it } from 'vitest';

import { allocate, allocateOccurrences, createBillInfo, createPayEvent, expandBills } from '@/lib/allocation';
import { ValidationError } from '@/lib/errors';
import { RecurringObligation } from '@/lib/obligation';
import type { BillOccurrence, PayEvent } from '@/models/allocation';

const pay = (date: string, netAmount: number): PayEvent => createPayEvent({ date, netAmount, currency: 'USD' });

const due = (description: string, dueDate: string, amount: number): BillOccurrence => ({
  bill: createBillInfo(description, { currency: 'USD', amount }, 'monthly'),
  dueDate,
  amount: { currency: 'USD', amount },
});

const createRent = (overrides: Record<string, unknown> = {}) =>
  RecurringObligation.create({
    id: 'rent',
    accountId: 'acc-1',
    amount: -1800,
    currency: 'USD',
    description: 'Rent',
    pattern: { frequency: 'monthly', dayOfMonth: 1 },
    startDate: '2026-02-01',
    ...overrides,
  });

describe('createPayEvent', () => {
  it('normalises the pay event', () => {
    expect(createPayEvent({ date: '2026-01-15T09:00:00Z', netAmount: '3500', currency: 'usd' })).toEqual({
      date: '2026-01-15',
      netAmount: { currency: 'USD', amount: 3500 },
      sourceObligationId: null,
    });
  });

  it('rejects a negative net amount', () => {
    expect(() => pay('2026-01-15', -1)).toThrow('net amount must not be negative');
  });
});

describe('createBillInfo', () => {
  it('stores the magnitude and rejects a blank description', () => {
    expect(createBillInfo(' Rent ', { currency: 'USD', amount: -1800 }, 'monthly')).toEqual({
      description: 'Rent',
      amount: { currency: 'USD', amount: 1800 },
      frequency: 'monthly',
      sourceObligationId: null,
    });
    expect(() => createBillInfo(' ', { currency: 'USD', amount: -1 }, 'monthly')).toThrow(ValidationError);
  });
});

describe('allocate', () => {
  it('funds a bill from the latest paycheck before its due date', () => {
    const result = allocate([pay('2026-01-01', 3500), pay('2026-01-15', 3500)], [createRent()], '2026-02-01');

    expect(result.payEvents[0].allocations).toEqual([]);
    expect(result.payEvents[0].remaining).toEqual({ currency: 'USD', amount: 3500 });
    expect(result.payEvents[1].allocations).toHaveLength(1);
    expect(result.payEvents[1].allocations[0].amount).toEqual({ currency: 'USD', amount: 1800 });
    expect(result.payEvents[1].allocations[0].occurrence.dueDate).toBe('2026-02-01');
    expect(result.payEvents[1].remaining).toEqual({ currency: 'USD', amount: 1700 });
    expect(result.shortfalls).toEqual([]);
    expect(result.totals).toEqual({
      income: { currency: 'USD', amount: 7000 },
      allocated: { currency: 'USD', amount: 1800 },
      shortfall: { currency: 'USD', amount: 0 },
      unallocated: { currency: 'USD', amount: 5200 },
    });
  });

  it('expands bills with their exceptions', () => {
    const rent = createRent({ startDate: '2026-01-01' });
    rent.addOrUpdateException('2026-02-01', 'skip');
    rent.addOrUpdateException('2026-03-01', 'modify', { modifiedAmount: -1500 });

    const occurrences = expandBills([rent], '2026-01-01', '2026-03-31');
    expect(occurrences.map((occurrence) => [occurrence.dueDate, occurrence.amount.amount])).toEqual([
      ['2026-01-01', 1800],
      ['2026-03-01', 1500],
    ]);
    expect(occurrences[0].bill.sourceObligationId).toBe('rent');
  });

  it('starts at the given date instead of the first paycheck', () => {
    const rent = createRent({ startDate: '2026-01-01' });
    const result = allocate([pay('2026-01-01', 3500)], [rent], '2026-01-31', { from: '2026-01-02' });
    expect(result.totals.allocated).toEqual({ currency: 'USD', amount: 0 });
  });

  it('rejects a start after the horizon', () => {
    expect(() => allocate([pay('2026-03-01', 100)], [createRent()], '2026-02-01')).toThrow(
      'allocation: start 2026-03-01 is after horizon 2026-02-01',
    );
  });
});

describe('allocateOccurrences', () => {
  it('reports a shortfall when no paycheck can cover the bill', () => {
    const result = allocateOccurrences([pay('2026-01-01', 3500)], [due('Tuition', '2026-01-20', 5000)]);

    expect(result.shortfalls).toHaveLength(1);
    expect(result.shortfalls[0].available).toEqual({ currency: 'USD', amount: 3500 });
    expect(result.shortfalls[0].shortfall).toEqual({ currency: 'USD', amount: 1500 });
    expect(result.payEvents[0].allocations).toEqual([]);
    expect(result.payEvents[0].remaining).toEqual({ currency: 'USD', amount: 3500 });
    expect(result.totals.shortfall).toEqual({ currency: 'USD', amount: 1500 });
  });

  it('reports the full amount when the bill is due before any paycheck', () => {
    const result = allocateOccurrences([pay('2026-01-15', 3500)], [due('Rent', '2026-01-01', 1800)]);

    expect(result.shortfalls[0].available).toEqual({ currency: 'USD', amount: 0 });
    expect(result.shortfalls[0].shortfall).toEqual({ currency: 'USD', amount: 1800 });
  });

  it('falls back to an earlier paycheck when the latest one is short', () => {
    const result = allocateOccurrences(
      [pay('2026-01-01', 1000), pay('2026-01-15', 500)],
      [due('Insurance', '2026-01-20', 800)],
    );

    expect(result.payEvents.map((entry) => entry.remaining.amount)).toEqual([200, 500]);
  });

  it('funds bills in due date order whatever the input order', () => {
    const result = allocateOccurrences(
      [pay('2026-01-01', 1000), pay('2026-01-15', 500)],
      [due('Car', '2026-01-25', 700), due('Phone', '2026-01-16', 400)],
    );

    expect(result.payEvents[1].allocations.map((entry) => entry.occurrence.bill.description)).toEqual(['Phone']);
    expect(result.payEvents[0].allocations.map((entry) => entry.occurrence.bill.description)).toEqual(['Car']);
    expect(result.payEvents.map((entry) => entry.remaining.amount)).toEqual([300, 100]);
    expect(result.payEvents.map((entry) => entry.allocated.amount)).toEqual([700, 400]);
  });

  it('prefers the later of two paychecks on the same date', () => {
    const result = allocateOccurrences(
      [
        createPayEvent({ date: '2026-01-15', netAmount: 500, currency: 'USD', description: 'Job A' }),
        createPayEvent({ date: '2026-01-15', netAmount: 500, currency: 'USD', description: 'Job B' }),
      ],
      [due('Phone', '2026-01-20', 300)],
    );

    expect(result.payEvents[1].allocations).toHaveLength(1);
    expect(result.payEvents[0].allocations).toHaveLength(0);
  });

  it('keeps cents exact across many allocations', () => {
    const bills = Array.from({ length: 10 }, (_, index) => due(`Bill ${index}`, '2026-01-20', 0.1));
    const result = allocateOccurrences([pay('2026-01-01', 1)], bills);

    expect(result.payEvents[0].remaining).toEqual({ currency: 'USD', amount: 0 });
    expect(result.shortfalls).toEqual([]);
  });

  it('rejects unsorted pay events', () => {
    expect(() => allocateOccurrences([pay('2026-01-15', 100), pay('2026-01-01', 100)], [])).toThrow(
      'pay events must be sorted by date ascending',
    );
  });

  it('rejects negative pay events built by hand', () => {
    const negative: PayEvent = { date: '2026-01-01', netAmount: { currency: 'USD', amount: -5 } };
    expect(() => allocateOccurrences([negative], [])).toThrow(ValidationError);
  });

  it('rejects non-positive bill amounts', () => {
    expect(() => allocateOccurrences([pay('2026-01-01', 100)], [due('Free', '2026-01-02', 0)])).toThrow(
      'bill Free: amount must be greater than 0',
    );
  });

  it('rejects mixed currencies', () => {
    const euroPay = createPayEvent({ date: '2026-01-01', netAmount: 100, currency: 'EUR' });
    expect(() => allocateOccurrences([euroPay], [due('Phone', '2026-01-20', 30)])).toThrow(
      'mixed currencies are not supported',
    );
  });

  it('returns empty totals without input', () => {
    const result = allocateOccurrences([], []);
    expect(result.totals.income).toEqual({ currency: 'EUR', amount: 0 });
    expect(result.payEvents).toEqual([]);
  });
});
