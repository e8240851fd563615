import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import timezone from 'dayjs/plugin/timezone';
import { DateString } from './types';

dayjs.extend(utc);
dayjs.extend(timezone);

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function formatDate(date: Date): DateString {
  return dayjs.utc(date).format('YYYY-MM-DD') as DateString;
}

/**
 * Parses a `YYYY-MM-DD` string into a UTC-midnight Date
 *
 * @param date - Calendar date string
 * @throws Error if the string is not a real calendar date (e.g. `2023-02-30`)
 */
export function parseDate(date: string): Date {
  if (!DATE_PATTERN.test(date)) {
    throw new Error(`Invalid date '${date}'`);
  }
  const d = dayjs.utc(date);
  if (!d.isValid() || d.format('YYYY-MM-DD') !== date) {
    throw new Error(`Invalid date '${date}'`);
  }
  return d.toDate();
}

export function isDateString(value: string): value is DateString {
  try {
    parseDate(value);
    return true;
  } catch {
    return false;
  }
}

/**
 * Narrows a stored calendar date to {@link DateString}
 *
 * @throws Error if `value` is not a `YYYY-MM-DD` calendar date
 */
export function toDateString(value: string): DateString {
  if (!isDateString(value)) {
    throw new Error(`Invalid date '${value}'`);
  }
  return value;
}

/** UTC `YYYY-MM-DD HH:mm:ss`, the form SQL timestamp columns take */
export function formatTimestamp(date: Date): string {
  return dayjs.utc(date).format('YYYY-MM-DD HH:mm:ss');
}

/** Reads a UTC `YYYY-MM-DD HH:mm:ss` timestamp column */
export function parseTimestamp(value: string): Date {
  const d = dayjs.utc(value);
  if (!d.isValid()) {
    throw new Error(`Invalid timestamp '${value}'`);
  }
  return d.toDate();
}

export function addDays(date: Date, days: number): Date {
  return dayjs.utc(date).add(days, 'day').toDate();
}

/**
 * Returns the current calendar day in the given IANA timezone, as a UTC-midnight Date
 *
 * @param tz - IANA timezone name (e.g. `Europe/London`)
 * @param now - Instant to read the calendar day from
 */
export function todayInTimezone(tz: string, now: Date = new Date()): Date {
  return parseDate(dayjs(now).tz(tz).format('YYYY-MM-DD'));
}

export function isValidTimezone(tz: string): boolean {
  try {
    Intl.DateTimeFormat(undefined, { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

export function isBefore(date1: Date, date2: Date): boolean {
  return dayjs.utc(date1).isBefore(dayjs.utc(date2), 'day');
}

export function isSame(date1: Date, date2: Date): boolean {
  return dayjs.utc(date1).isSame(dayjs.utc(date2), 'day');
}

export function isBeforeOrSame(date1: Date, date2: Date): boolean {
  return isBefore(date1, date2) || isSame(date1, date2);
}
