import { describe, expect, it } from 'vitest';

import {
  addDays,
  daysBetween,
  daysInMonth,
  fromMonthIndex,
  isIsoDate,
  toIsoDate,
  todayUtc,
  weekdayOf,
} from '@/lib/dates';
import { formatMoney, money, negateMoney, toCents } from '@/lib/money';

describe('dates', () => {
  it('validates calendar dates', () => {
    expect(isIsoDate('2028-02-29')).toBe(true);
    expect(isIsoDate('2026-02-29')).toBe(false);
    expect(isIsoDate('2026-1-01')).toBe(false);
    expect(isIsoDate(20260101)).toBe(false);
  });

  it('keeps the UTC day of timestamps', () => {
    expect(toIsoDate('2026-03-10T08:30:00Z')).toBe('2026-03-10');
    expect(toIsoDate(new Date(Date.UTC(2026, 0, 31, 23, 59)))).toBe('2026-01-31');
    expect(todayUtc(new Date('2026-07-04T01:00:00Z'))).toBe('2026-07-04');
    expect(() => toIsoDate('2026-04-31')).toThrow('Invalid date value: 2026-04-31');
  });

  it('does calendar arithmetic across month and year ends', () => {
    expect(addDays('2026-12-31', 1)).toBe('2027-01-01');
    expect(addDays('2028-03-01', -1)).toBe('2028-02-29');
    expect(daysBetween('2026-01-01', '2027-01-01')).toBe(365);
    expect(daysInMonth(2100, 2)).toBe(28);
    expect(daysInMonth(2000, 2)).toBe(29);
  });

  it('computes weekdays', () => {
    expect(weekdayOf('1970-01-01')).toBe(4);
    expect(weekdayOf('2026-01-01')).toBe(4);
    expect(weekdayOf('2026-01-04')).toBe(0);
  });

  it('clamps the preferred day to the month length', () => {
    expect(fromMonthIndex(2026 * 12 + 1, 31)).toBe('2026-02-28');
    expect(fromMonthIndex(2026 * 12 + 11, 31)).toBe('2026-12-31');
  });
});

describe('money', () => {
  it('rounds to cents and normalises the currency', () => {
    expect(money(10.005 + 0.001, 'usd')).toEqual({ currency: 'USD', amount: 10.01 });
    expect(money(-0.001, 'EUR').amount).toBe(0);
    expect(Object.is(negateMoney(money(0, 'EUR')).amount, 0)).toBe(true);
    expect(toCents(19.99)).toBe(1999);
  });

  it('formats amounts', () => {
    expect(formatMoney({ currency: 'USD', amount: 1234.5 })).toBe('$1,234.50');
  });
});
