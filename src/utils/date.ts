export type Weekday =
  | 'Monday'
  | 'Tuesday'
  | 'Wednesday'
  | 'Thursday'
  | 'Friday'
  | 'Saturday'
  | 'Sunday';

// getUTCDay() order (Sunday first).
const WEEKDAY_BY_UTC_DAY: readonly Weekday[] = [
  'Sunday',
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
];

const MONTH_NAMES = [
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

const DAY_MS = 24 * 3600 * 1000;
const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})/;

export function isoNow(): string {
  return new Date().toISOString();
}

function normalizeToDay(date: Date): Date {
  const d = new Date(date);
  d.setUTCHours(0, 0, 0, 0);
  return d;
}

/**
 * Parses an input date string safely.
 *
 * Supports:
 * - "YYYY-MM-DD" (date-only input, interpreted as UTC midnight); a trailing
 *   time part such as "2025-01-15 10:30:00" is ignored
 * - Any ISO datetime string supported by JS Date
 *
 * Returns null if invalid.
 */
export function parseDateInput(value?: string | null): Date | null {
  const s = String(value ?? '').trim();
  if (!s) return null;

  const m = DATE_ONLY.exec(s);
  if (m) {
    const y = Number(m[1]);
    const mo = Number(m[2]);
    const d = Number(m[3]);
    const dt = new Date(Date.UTC(y, mo - 1, d));
    // Reject overflowed dates like 2025-02-30.
    if (dt.getUTCFullYear() !== y || dt.getUTCMonth() !== mo - 1 || dt.getUTCDate() !== d) return null;
    return dt;
  }

  const dt = new Date(s);
  if (Number.isNaN(dt.getTime())) return null;
  return normalizeToDay(dt);
}

/** Calendar day as "YYYY-MM-DD" (UTC). */
function isoDay(d: Date): string {
  return normalizeToDay(d).toISOString().slice(0, 10);
}

/** Normalizes a date-like input to "YYYY-MM-DD", or null when it cannot be dated. */
export function toDateOnly(value: string | Date | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : isoDay(value);
  const parsed = parseDateInput(value);
  return parsed ? isoDay(parsed) : null;
}

function requireDay(day: string): Date {
  const parsed = parseDateInput(day);
  if (!parsed) {
    throw Object.assign(new Error(`invalid date: ${day}`), { statusCode: 400 });
  }
  return parsed;
}

export function addDays(day: string, days: number): string {
  const d = requireDay(day);
  d.setUTCDate(d.getUTCDate() + days);
  return isoDay(d);
}

/** Whole days from `from` to `to` (negative when `to` is earlier). */
export function daysBetween(from: string, to: string): number {
  return Math.round((requireDay(to).getTime() - requireDay(from).getTime()) / DAY_MS);
}

export function weekdayOf(day: string): Weekday {
  return WEEKDAY_BY_UTC_DAY[requireDay(day).getUTCDay()] ?? 'Monday';
}

export function monthNameOf(day: string): string {
  return MONTH_NAMES[requireDay(day).getUTCMonth()] ?? '';
}

export function dayOfMonth(day: string): number {
  return requireDay(day).getUTCDate();
}

/** "YYYY-MM" bucket for monthly grouping. */
export function monthKey(day: string): string {
  return day.slice(0, 7);
}
