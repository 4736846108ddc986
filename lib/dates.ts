import type { IsoDate, Weekday } from '@/models/recurrence';

const MS_PER_DAY = 86_400_000;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const WEEKDAYS: readonly Weekday[] = [0, 1, 2, 3, 4, 5, 6];

interface DateParts {
  year: number;
  month: number; // 1-12
  day: number;
}

// Date.UTC maps years 0-99 to 1900+, setUTCFullYear does not.
const utcTime = (year: number, monthIndex0: number, day: number): number => {
  const date = new Date(0);
  date.setUTCFullYear(year, monthIndex0, day);
  return date.getTime();
};

const pad = (value: number, width = 2) => String(value).padStart(width, '0');

/**
 * Split a YYYY-MM-DD string into its parts, or null when it is not a real calendar date.
 */
function splitIsoDate(value: string): DateParts | null {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) return null;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  return { year, month, day };
}

/**
 * True when the value is a YYYY-MM-DD string naming an existing day.
 */
export function isIsoDate(value: unknown): value is IsoDate {
  return typeof value === 'string' && splitIsoDate(value) !== null;
}

/**
 * Parse a YYYY-MM-DD string.
 * @param value - date string
 * @returns - year, month (1-12) and day
 */
export function parseIsoDate(value: IsoDate): DateParts {
  const parts = splitIsoDate(value);
  if (!parts) {
    throw new Error(`Invalid date value: ${value}`);
  }
  return parts;
}

/**
 * Accept a date-only string, an ISO timestamp or a Date and keep only the UTC calendar day.
 * @param value - raw date input
 * @returns - YYYY-MM-DD
 */
export function toIsoDate(value: string | Date): IsoDate {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) throw new Error('Invalid date value');
    return `${pad(value.getUTCFullYear(), 4)}-${pad(value.getUTCMonth() + 1)}-${pad(value.getUTCDate())}`;
  }
  const trimmed = value.trim();
  const datePart = trimmed.length > 10 && trimmed[10] === 'T' ? trimmed.slice(0, 10) : trimmed;
  parseIsoDate(datePart);
  return datePart;
}

export function daysInMonth(year: number, month: number): number {
  return new Date(utcTime(year, month, 0)).getUTCDate();
}

/**
 * Whole days since 1970-01-01.
 */
export function toEpochDay(value: IsoDate): number {
  const { year, month, day } = parseIsoDate(value);
  return Math.round(utcTime(year, month - 1, day) / MS_PER_DAY);
}

export function fromEpochDay(epochDay: number): IsoDate {
  return toIsoDate(new Date(epochDay * MS_PER_DAY));
}

export function addDays(value: IsoDate, days: number): IsoDate {
  return fromEpochDay(toEpochDay(value) + days);
}

/**
 * Signed number of days from `from` to `to`.
 */
export function daysBetween(from: IsoDate, to: IsoDate): number {
  return toEpochDay(to) - toEpochDay(from);
}

export function weekdayOf(value: IsoDate): Weekday {
  // 1970-01-01 was a Thursday.
  return WEEKDAYS[(((toEpochDay(value) + 4) % 7) + 7) % 7];
}

/**
 * Months since year 0, used for month-step arithmetic.
 */
export function toMonthIndex(value: IsoDate): number {
  const { year, month } = parseIsoDate(value);
  return year * 12 + (month - 1);
}

/**
 * Build the date for a month index, clamping the preferred day to the month length.
 * @param monthIndex - months since year 0
 * @param preferredDay - day of month (1-31)
 * @returns - YYYY-MM-DD
 */
export function fromMonthIndex(monthIndex: number, preferredDay: number): IsoDate {
  const year = Math.floor(monthIndex / 12);
  const month = monthIndex - year * 12 + 1;
  const day = Math.min(preferredDay, daysInMonth(year, month));
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

export function compareIsoDates(a: IsoDate, b: IsoDate): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function maxDate(a: IsoDate, b: IsoDate): IsoDate {
  return a >= b ? a : b;
}

export function minDate(a: IsoDate, b: IsoDate): IsoDate {
  return a <= b ? a : b;
}

/**
 * Today's calendar day in UTC, so server timezone never shifts "past due".
 */
export function todayUtc(now: Date = new Date()): IsoDate {
  return toIsoDate(now);
}
