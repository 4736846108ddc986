/**
 * Calendar date without time, formatted as YYYY-MM-DD.
 */
export type IsoDate = string;

export const frequencies = ['daily', 'weekly', 'biweekly', 'monthly', 'quarterly', 'yearly'] as const;

export type Frequency = (typeof frequencies)[number];

/** 0 = Sunday … 6 = Saturday, same numbering as `Date#getUTCDay`. */
export type Weekday = 0 | 1 | 2 | 3 | 4 | 5 | 6;

/**
 * Immutable frequency rule. Which anchor fields are set depends on the frequency:
 * weekly/biweekly use `dayOfWeek`, monthly/quarterly use `dayOfMonth`,
 * yearly uses `dayOfMonth` + `monthOfYear`, daily uses none.
 */
export interface RecurrencePattern {
  readonly frequency: Frequency;
  readonly interval: number;
  readonly dayOfMonth?: number;
  readonly dayOfWeek?: Weekday;
  readonly monthOfYear?: number;
}

export const WEEKDAY_NAMES = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'] as const;
