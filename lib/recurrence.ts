import {
  addDays,
  fromMonthIndex,
  maxDate,
  toEpochDay,
  toMonthIndex,
  weekdayOf,
} from '@/lib/dates';
import { parseOrThrow, recurrencePatternSchema } from '@/lib/validation';
import { WEEKDAY_NAMES, type Frequency, type IsoDate, type RecurrencePattern, type Weekday } from '@/models/recurrence';

/**
 * Validate a raw pattern definition.
 * @param input - untrusted pattern payload
 * @returns - frozen recurrence pattern
 * @throws ValidationError when the interval, anchors or their combination are invalid
 */
export function createRecurrencePattern(input: unknown): RecurrencePattern {
  return parseOrThrow(recurrencePatternSchema, input, 'Invalid recurrence pattern');
}

export const daily = (interval = 1) => createRecurrencePattern({ frequency: 'daily', interval });

export const weekly = (dayOfWeek: Weekday, interval = 1) =>
  createRecurrencePattern({ frequency: 'weekly', interval, dayOfWeek });

export const biweekly = (dayOfWeek: Weekday) => createRecurrencePattern({ frequency: 'biweekly', dayOfWeek });

export const monthly = (dayOfMonth: number, interval = 1) =>
  createRecurrencePattern({ frequency: 'monthly', interval, dayOfMonth });

export const quarterly = (dayOfMonth: number, interval = 1) =>
  createRecurrencePattern({ frequency: 'quarterly', interval, dayOfMonth });

export const yearly = (monthOfYear: number, dayOfMonth: number, interval = 1) =>
  createRecurrencePattern({ frequency: 'yearly', interval, dayOfMonth, monthOfYear });

/**
 * Days between two consecutive occurrences for day-based frequencies.
 */
function dayStep(pattern: RecurrencePattern): number {
  switch (pattern.frequency) {
    case 'daily':
      return pattern.interval;
    case 'weekly':
    case 'biweekly':
      return 7 * pattern.interval;
    default:
      throw new Error(`${pattern.frequency} is not a day-based frequency`);
  }
}

/**
 * Months between two consecutive occurrences for calendar-based frequencies.
 */
function monthStep(pattern: RecurrencePattern): number {
  switch (pattern.frequency) {
    case 'monthly':
      return pattern.interval;
    case 'quarterly':
      return 3 * pattern.interval;
    case 'yearly':
      return 12 * pattern.interval;
    default:
      throw new Error(`${pattern.frequency} is not a month-based frequency`);
  }
}

function requireAnchor(value: number | undefined, field: string, pattern: RecurrencePattern): number {
  if (value === undefined) {
    throw new Error(`${pattern.frequency} pattern is missing ${field}`);
  }
  return value;
}

/**
 * First occurrence of a day-based series: the series start, or for weekday-anchored
 * patterns the first matching weekday on or after it.
 */
function firstDayBasedOccurrence(pattern: RecurrencePattern, seriesStart: IsoDate): IsoDate {
  if (pattern.frequency === 'daily') return seriesStart;
  const weekday = requireAnchor(pattern.dayOfWeek, 'dayOfWeek', pattern);
  const offset = (weekday - weekdayOf(seriesStart) + 7) % 7;
  return addDays(seriesStart, offset);
}

/**
 * Earliest occurrence of the series that is on or after `date`.
 * Occurrences are counted from `seriesStart`, so the result is never before it either.
 * @param pattern - validated recurrence pattern
 * @param seriesStart - first day the series may occur
 * @param date - lower bound (inclusive)
 * @returns - occurrence date, always >= date
 */
export function nextOnOrAfter(pattern: RecurrencePattern, seriesStart: IsoDate, date: IsoDate): IsoDate {
  const target = maxDate(seriesStart, date);

  if (pattern.frequency === 'daily' || pattern.frequency === 'weekly' || pattern.frequency === 'biweekly') {
    const first = firstDayBasedOccurrence(pattern, seriesStart);
    if (first >= target) return first;
    const step = dayStep(pattern);
    const steps = Math.ceil((toEpochDay(target) - toEpochDay(first)) / step);
    return addDays(first, steps * step);
  }

  const dayOfMonth = requireAnchor(pattern.dayOfMonth, 'dayOfMonth', pattern);
  const step = monthStep(pattern);
  const startIndex = toMonthIndex(seriesStart);
  const baseIndex =
    pattern.frequency === 'yearly'
      ? startIndex - (startIndex % 12) + (requireAnchor(pattern.monthOfYear, 'monthOfYear', pattern) - 1)
      : startIndex;

  let steps = Math.max(0, Math.ceil((toMonthIndex(target) - baseIndex) / step));
  let candidate = fromMonthIndex(baseIndex + steps * step, dayOfMonth);
  // The target month may hold an occurrence earlier in the month than the target day.
  while (candidate < target) {
    steps += 1;
    candidate = fromMonthIndex(baseIndex + steps * step, dayOfMonth);
  }
  return candidate;
}

/**
 * Occurrence strictly after `date`.
 */
export function nextAfter(pattern: RecurrencePattern, seriesStart: IsoDate, date: IsoDate): IsoDate {
  return nextOnOrAfter(pattern, seriesStart, addDays(date, 1));
}

/**
 * Number of occurrences a frequency produces in a year at interval 1.
 */
export function occurrencesPerYear(frequency: Frequency): number {
  switch (frequency) {
    case 'daily':
      return 365;
    case 'weekly':
      return 52;
    case 'biweekly':
      return 26;
    case 'monthly':
      return 12;
    case 'quarterly':
      return 4;
    case 'yearly':
      return 1;
  }
}

/**
 * Human readable label, e.g. "Every 2 weeks on Thursday".
 */
export function describePattern(pattern: RecurrencePattern): string {
  const weekday = pattern.dayOfWeek !== undefined ? WEEKDAY_NAMES[pattern.dayOfWeek] : '';
  switch (pattern.frequency) {
    case 'daily':
      return pattern.interval === 1 ? 'Daily' : `Every ${pattern.interval} days`;
    case 'weekly':
      return pattern.interval === 1 ? `Weekly on ${weekday}` : `Every ${pattern.interval} weeks on ${weekday}`;
    case 'biweekly':
      return `Every 2 weeks on ${weekday}`;
    case 'monthly':
      return pattern.interval === 1
        ? `Monthly on day ${pattern.dayOfMonth}`
        : `Every ${pattern.interval} months on day ${pattern.dayOfMonth}`;
    case 'quarterly':
      return pattern.interval === 1
        ? `Quarterly on day ${pattern.dayOfMonth}`
        : `Every ${3 * pattern.interval} months on day ${pattern.dayOfMonth}`;
    case 'yearly':
      return pattern.interval === 1
        ? `Yearly on ${pattern.monthOfYear}/${pattern.dayOfMonth}`
        : `Every ${pattern.interval} years on ${pattern.monthOfYear}/${pattern.dayOfMonth}`;
  }
}
