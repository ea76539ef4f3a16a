/**
 * Calendar parsing for sales data and API query params.
 * All dates are date-only values at 00:00 UTC; no local time zone is involved.
 */

const ISO_DATE_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/;
const US_DATE_REGEX = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const CLOCK_TIME_REGEX = /^(\d{1,2}):(\d{2})$/;

export const WEEKDAY_NAMES = [
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
  'Sunday',
] as const;

export type WeekdayName = (typeof WEEKDAY_NAMES)[number];

export const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const;

export type MonthName = (typeof MONTH_NAMES)[number];

export type ClockTime = { hour: number; minute: number };

export class InvalidIsoDateError extends Error {
  constructor(public readonly input: string) {
    super(`Invalid ISO date (expected YYYY-MM-DD): ${input}`);
    this.name = 'InvalidIsoDateError';
  }
}

function utcDateOrNull(year: number, month: number, day: number): Date | null {
  if (!Number.isFinite(year) || !Number.isFinite(month) || !Number.isFinite(day)) return null;
  if (month < 1 || month > 12) return null;
  const lastDay = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day < 1 || day > lastDay) return null;
  return new Date(Date.UTC(year, month - 1, day, 0, 0, 0, 0));
}

/**
 * Parse strict "YYYY-MM-DD" string. Returns Date at 00:00 UTC for that calendar day.
 * Throws InvalidIsoDateError if format is wrong or date is invalid.
 */
export function parseIsoDateOrThrow(input: string): Date {
  if (input == null || typeof input !== 'string') {
    throw new InvalidIsoDateError(String(input));
  }
  const trimmed = input.trim();
  const match = trimmed.match(ISO_DATE_REGEX);
  if (!match) throw new InvalidIsoDateError(trimmed);
  const [, yStr, mStr, dStr] = match;
  const date = utcDateOrNull(Number(yStr), Number(mStr), Number(dStr));
  if (!date) throw new InvalidIsoDateError(trimmed);
  return date;
}

/** "M/D/YYYY" (month first, 1-2 digit month/day) → Date at 00:00 UTC, or null. */
export function parseUsDateOrNull(input: string): Date | null {
  const match = String(input ?? '').trim().match(US_DATE_REGEX);
  if (!match) return null;
  const [, mStr, dStr, yStr] = match;
  return utcDateOrNull(Number(yStr), Number(mStr), Number(dStr));
}

/** 24-hour "H:MM" / "HH:MM" → { hour, minute }, or null. */
export function parseClockTimeOrNull(input: string): ClockTime | null {
  const match = String(input ?? '').trim().match(CLOCK_TIME_REGEX);
  if (!match) return null;
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour < 0 || hour > 23 || minute < 0 || minute > 59) return null;
  return { hour, minute };
}

/** Format a Date as "YYYY-MM-DD" (UTC calendar day). */
export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** "MM/DD/YYYY", the format sales files use. */
export function formatUsDate(date: Date): string {
  const m = String(date.getUTCMonth() + 1).padStart(2, '0');
  const d = String(date.getUTCDate()).padStart(2, '0');
  return `${m}/${d}/${date.getUTCFullYear()}`;
}

export function formatClockTime(time: ClockTime): string {
  return `${String(time.hour).padStart(2, '0')}:${String(time.minute).padStart(2, '0')}`;
}

/** English weekday name; getUTCDay() is Sunday-based, the list is Monday-based. */
export function weekdayName(date: Date): WeekdayName {
  return WEEKDAY_NAMES[(date.getUTCDay() + 6) % 7];
}

export function monthName(date: Date): MonthName {
  return MONTH_NAMES[date.getUTCMonth()];
}

export function isMonthName(value: string): value is MonthName {
  return (MONTH_NAMES as readonly string[]).includes(value);
}
