/**
 * Calendar-day arithmetic in UTC.
 *
 * A CalendarDay is an ISO date string ('YYYY-MM-DD'). Lexicographic order of
 * valid CalendarDays equals chronological order, so plain string comparison
 * is used throughout the evaluator.
 */
export type CalendarDay = string;

const DAY_MS = 24 * 60 * 60 * 1000;
const CALENDAR_DAY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export function isCalendarDay(value: string): boolean {
  const match = CALENDAR_DAY_PATTERN.exec(value);
  if (!match) {
    return false;
  }
  const date = new Date(
    Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])),
  );
  return date.toISOString().slice(0, 10) === value;
}

/**
 * Truncate an instant (or validate a day string) to its UTC calendar day.
 */
export function toCalendarDay(value: Date | string): CalendarDay {
  if (typeof value === 'string') {
    if (isCalendarDay(value)) {
      return value;
    }
    const parsed = new Date(value);
    if (Number.isNaN(parsed.getTime())) {
      throw new RangeError(`Invalid date: ${value}`);
    }
    return parsed.toISOString().slice(0, 10);
  }
  if (Number.isNaN(value.getTime())) {
    throw new RangeError('Invalid date');
  }
  return value.toISOString().slice(0, 10);
}

function toEpochDay(day: CalendarDay): number {
  return Math.floor(Date.parse(`${toCalendarDay(day)}T00:00:00Z`) / DAY_MS);
}

export function addDays(day: CalendarDay, days: number): CalendarDay {
  if (!Number.isInteger(days)) {
    throw new RangeError(`Day count must be an integer, got ${days}`);
  }
  return new Date((toEpochDay(day) + days) * DAY_MS).toISOString().slice(0, 10);
}

/**
 * Whole days from `from` to `to` (negative when `to` is earlier).
 */
export function daysBetween(from: CalendarDay, to: CalendarDay): number {
  return toEpochDay(to) - toEpochDay(from);
}

export function compareDays(a: CalendarDay, b: CalendarDay): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
