import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';

dayjs.extend(utc);

/**
 * Adds whole months to a date, clamping the day to the last day of the target month
 *
 * Jan 31 + 1 month is Feb 28 (Feb 29 in a leap year); Mar 31 + 1 month is Apr 30.
 */
function addMonthsClamped(current: Date, months: number): Date {
  const start = dayjs.utc(current);
  const targetMonth = start.startOf('month').add(months, 'month');
  const day = Math.min(start.date(), targetMonth.daysInMonth());
  return targetMonth.date(day).toDate();
}

/**
 * Computes a rule's next due date from its current one
 *
 * - `daily`: `intervalN` days later
 * - `weekly`: `7 * intervalN` days later
 * - `monthly`: `intervalN` months later, day clamped to the month's length
 * - `yearly`: `intervalN` years later, Feb 29 clamped to Feb 28 outside leap years
 *
 * An unrecognised frequency returns `current` unchanged.
 *
 * @param current - Current due date (UTC midnight)
 * @param frequency - Rule frequency as stored
 * @param intervalN - Number of periods to advance, a positive integer
 * @throws RangeError if `intervalN` is not a positive integer
 */
export function advanceDueDate(current: Date, frequency: string, intervalN: number): Date {
  if (!Number.isInteger(intervalN) || intervalN < 1) {
    throw new RangeError(`Interval must be a positive integer, got ${intervalN}`);
  }

  switch (frequency) {
    case 'daily':
      return dayjs.utc(current).add(intervalN, 'day').toDate();
    case 'weekly':
      return dayjs.utc(current).add(7 * intervalN, 'day').toDate();
    case 'monthly':
      return addMonthsClamped(current, intervalN);
    case 'yearly':
      return addMonthsClamped(current, 12 * intervalN);
    default:
      return current;
  }
}
