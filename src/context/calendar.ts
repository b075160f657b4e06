/**
 * Calendar helpers for ISO (YYYY-MM-DD) date strings.
 *
 * All arithmetic is done on calendar dates in UTC so results do not depend
 * on the host timezone.
 */

import { formatCalendarDate, isValidCalendarDate } from '../parsing/index.js';
import type { CalendarDate } from '../parsing/index.js';

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

export function parseIsoDate(value: string): CalendarDate | undefined {
  const match = ISO_DATE_RE.exec(value);
  if (!match) return undefined;
  const date = { year: Number(match[1]), month: Number(match[2]), day: Number(match[3]) };
  return isValidCalendarDate(date) ? date : undefined;
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/**
 * Add whole years to an ISO date. 29 February falls back to 28 February in
 * non-leap target years.
 */
export function addYears(value: string, years: number): string | undefined {
  const date = parseIsoDate(value);
  if (!date) return undefined;
  const year = date.year + years;
  const day = date.month === 2 && date.day === 29 && !isLeapYear(year) ? 28 : date.day;
  return formatCalendarDate({ year, month: date.month, day });
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Add whole months to an ISO date. The day is clamped to the last day of
 * the target month (31 January + 1 month is 28 or 29 February).
 */
export function addMonths(value: string, months: number): string | undefined {
  const date = parseIsoDate(value);
  if (!date) return undefined;
  const index = date.month - 1 + months;
  const year = date.year + Math.floor(index / 12);
  const month = (((index % 12) + 12) % 12) + 1;
  return formatCalendarDate({ year, month, day: Math.min(date.day, daysInMonth(year, month)) });
}

/** Shift an ISO date by a number of days (negative moves backwards). */
export function addDays(value: string, days: number): string | undefined {
  const date = parseIsoDate(value);
  if (!date) return undefined;
  const shifted = new Date(Date.UTC(date.year, date.month - 1, date.day + days));
  return toIsoDate(shifted);
}

/**
 * Whole number of years from start to end, when end is exactly start plus
 * that many years. Undefined otherwise.
 */
export function wholeYearsBetween(start: string, end: string): number | undefined {
  const from = parseIsoDate(start);
  const to = parseIsoDate(end);
  if (!from || !to) return undefined;
  const years = to.year - from.year;
  if (years <= 0) return undefined;
  return addYears(start, years) === end ? years : undefined;
}

/** UTC calendar date of a Date as YYYY-MM-DD */
export function toIsoDate(date: Date): string {
  return formatCalendarDate({
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
  });
}
