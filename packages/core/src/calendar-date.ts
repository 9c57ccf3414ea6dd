import { isClinicDateText } from '@periorecord/types';
import { ValidationError } from './errors.js';
import type { CalendarDate } from './types/branded.js';

/**
 * Calendar-date helpers
 *
 * Every date that enters the system is written YYYYMMDD. Dates are kept in
 * that form (branded) so they compare, sort and serialize without a
 * time zone ever getting involved.
 */

/**
 * Type guard for canonical YYYYMMDD text naming an existing day
 */
export function isCalendarDate(value: unknown): value is CalendarDate {
  return typeof value === 'string' && isClinicDateText(value);
}

/**
 * Parse YYYYMMDD text (or the same digits as an integer) into a CalendarDate
 *
 * @throws {ValidationError} when the input is not an existing calendar day
 */
export function parseCalendarDate(input: string | number, field = 'date'): CalendarDate {
  const text = typeof input === 'number' ? String(input) : input;
  if (!isCalendarDate(text)) {
    throw new ValidationError(`Invalid ${field}: expected YYYYMMDD, received "${text}"`, {
      field,
      received: text,
    });
  }
  return text;
}

/**
 * Calendar date of `now` in local time
 */
export function calendarDateOf(now: Date): CalendarDate {
  const year = String(now.getFullYear()).padStart(4, '0');
  const month = String(now.getMonth() + 1).padStart(2, '0');
  const day = String(now.getDate()).padStart(2, '0');
  return parseCalendarDate(`${year}${month}${day}`);
}

/**
 * YYYY-MM-DD rendering for messages
 */
export function formatIsoDate(date: CalendarDate): string {
  return `${date.slice(0, 4)}-${date.slice(4, 6)}-${date.slice(6, 8)}`;
}

/**
 * Chronological comparator for sorting
 */
export function compareCalendarDates(a: CalendarDate, b: CalendarDate): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}
