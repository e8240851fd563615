import { describe, it, expect } from 'vitest';
import { advanceDueDate } from './advance';
import { formatDate, parseDate } from '../date/date';

function advance(date: string, frequency: string, intervalN: number): string {
  return formatDate(advanceDueDate(parseDate(date), frequency, intervalN));
}

const DAYS_IN_MONTH_2025 = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];
const DAYS_IN_MONTH_2024 = [31, 29, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function pad(n: number): string {
  return n.toString().padStart(2, '0');
}

describe('advanceDueDate', () => {
  describe('daily', () => {
    it('should add the interval in days', () => {
      expect(advance('2025-01-01', 'daily', 1)).toBe('2025-01-02');
      expect(advance('2025-01-01', 'daily', 2)).toBe('2025-01-03');
    });

    it('should cross month, year and leap day boundaries', () => {
      expect(advance('2025-01-31', 'daily', 1)).toBe('2025-02-01');
      expect(advance('2024-12-31', 'daily', 1)).toBe('2025-01-01');
      expect(advance('2024-02-28', 'daily', 1)).toBe('2024-02-29');
      expect(advance('2025-02-28', 'daily', 1)).toBe('2025-03-01');
      expect(advance('2024-01-01', 'daily', 366)).toBe('2025-01-01');
    });
  });

  describe('weekly', () => {
    it('should add seven days per interval', () => {
      expect(advance('2025-01-01', 'weekly', 1)).toBe('2025-01-08');
      expect(advance('2025-01-01', 'weekly', 2)).toBe('2025-01-15');
    });

    it('should cross February in leap and non-leap years', () => {
      expect(advance('2024-02-26', 'weekly', 1)).toBe('2024-03-04');
      expect(advance('2025-02-26', 'weekly', 1)).toBe('2025-03-05');
      expect(advance('2025-12-29', 'weekly', 1)).toBe('2026-01-05');
    });
  });

  describe('monthly', () => {
    it('should keep the day of month when it fits', () => {
      expect(advance('2025-01-15', 'monthly', 1)).toBe('2025-02-15');
      expect(advance('2025-01-15', 'monthly', 3)).toBe('2025-04-15');
      expect(advance('2025-02-28', 'monthly', 1)).toBe('2025-03-28');
      expect(advance('2024-02-29', 'monthly', 1)).toBe('2024-03-29');
    });

    it('should clamp to the end of February', () => {
      expect(advance('2025-01-31', 'monthly', 1)).toBe('2025-02-28');
      expect(advance('2024-01-31', 'monthly', 1)).toBe('2024-02-29');
      expect(advance('2025-01-29', 'monthly', 1)).toBe('2025-02-28');
      expect(advance('2025-01-30', 'monthly', 1)).toBe('2025-02-28');
      expect(advance('2024-01-29', 'monthly', 1)).toBe('2024-02-29');
      expect(advance('2024-01-30', 'monthly', 1)).toBe('2024-02-29');
      expect(advance('2025-01-28', 'monthly', 1)).toBe('2025-02-28');
    });

    it('should clamp the 31st into 30-day months', () => {
      expect(advance('2025-03-31', 'monthly', 1)).toBe('2025-04-30');
      expect(advance('2025-05-31', 'monthly', 1)).toBe('2025-06-30');
      expect(advance('2025-08-31', 'monthly', 1)).toBe('2025-09-30');
      expect(advance('2025-10-31', 'monthly', 1)).toBe('2025-11-30');
    });

    it('should roll over the year', () => {
      expect(advance('2025-12-31', 'monthly', 1)).toBe('2026-01-31');
      expect(advance('2025-11-30', 'monthly', 3)).toBe('2026-02-28');
      expect(advance('2023-11-30', 'monthly', 3)).toBe('2024-02-29');
      expect(advance('2025-01-31', 'monthly', 12)).toBe('2026-01-31');
      expect(advance('2025-01-31', 'monthly', 13)).toBe('2026-02-28');
    });

    it('should continue from the clamped day on the next advance', () => {
      const feb = advance('2025-01-31', 'monthly', 1);

      expect(feb).toBe('2025-02-28');
      expect(advance(feb, 'monthly', 1)).toBe('2025-03-28');
    });

    describe('every month end in a non-leap year', () => {
      DAYS_IN_MONTH_2025.forEach((days, monthIdx) => {
        const from = `2025-${pad(monthIdx + 1)}-31`;
        if (days < 31) {
          return;
        }
        const nextMonthIdx = (monthIdx + 1) % 12;
        const nextYear = monthIdx === 11 ? 2026 : 2025;
        const expectedDay = monthIdx === 11 ? 31 : DAYS_IN_MONTH_2025[nextMonthIdx];
        const expected = `${nextYear}-${pad(nextMonthIdx + 1)}-${pad(expectedDay)}`;

        it(`should advance ${from} to ${expected}`, () => {
          expect(advance(from, 'monthly', 1)).toBe(expected);
        });
      });
    });

    describe('every month end in a leap year', () => {
      DAYS_IN_MONTH_2024.forEach((days, monthIdx) => {
        if (monthIdx === 11) {
          return;
        }
        const from = `2024-${pad(monthIdx + 1)}-${pad(days)}`;
        const nextDays = DAYS_IN_MONTH_2024[monthIdx + 1];
        const expected = `2024-${pad(monthIdx + 2)}-${pad(Math.min(days, nextDays))}`;

        it(`should advance ${from} to ${expected}`, () => {
          expect(advance(from, 'monthly', 1)).toBe(expected);
        });
      });
    });
  });

  describe('yearly', () => {
    it('should add the interval in years', () => {
      expect(advance('2025-01-15', 'yearly', 1)).toBe('2026-01-15');
      expect(advance('2025-01-15', 'yearly', 2)).toBe('2027-01-15');
    });

    it('should clamp Feb 29 outside leap years', () => {
      expect(advance('2020-02-29', 'yearly', 1)).toBe('2021-02-28');
      expect(advance('2020-02-29', 'yearly', 2)).toBe('2022-02-28');
      expect(advance('2020-02-29', 'yearly', 4)).toBe('2024-02-29');
    });

    it('should follow the Gregorian century rule', () => {
      expect(advance('2096-02-29', 'yearly', 4)).toBe('2100-02-28');
      expect(advance('1996-02-29', 'yearly', 4)).toBe('2000-02-29');
    });

    it('should keep Feb 28 and Mar 1 unchanged', () => {
      expect(advance('2023-02-28', 'yearly', 1)).toBe('2024-02-28');
      expect(advance('2024-03-01', 'yearly', 1)).toBe('2025-03-01');
    });
  });

  describe('ordering', () => {
    const starts = ['2024-01-31', '2024-02-29', '2025-02-28', '2025-12-31', '2025-06-15'];
    const frequencies = ['daily', 'weekly', 'monthly', 'yearly'];

    it('should always move strictly later for supported frequencies', () => {
      for (const start of starts) {
        for (const frequency of frequencies) {
          for (const intervalN of [1, 2, 5, 12]) {
            const current = parseDate(start);
            const next = advanceDueDate(current, frequency, intervalN);

            expect(next.getTime()).toBeGreaterThan(current.getTime());
          }
        }
      }
    });
  });

  describe('unsupported input', () => {
    it('should return the date unchanged for an unknown frequency', () => {
      expect(advance('2025-01-15', 'fortnightly', 1)).toBe('2025-01-15');
      expect(advance('2025-01-15', 'Monthly', 1)).toBe('2025-01-15');
    });

    it('should reject an interval below one', () => {
      expect(() => advanceDueDate(parseDate('2025-01-15'), 'daily', 0)).toThrow(
        'Interval must be a positive integer, got 0',
      );
      expect(() => advanceDueDate(parseDate('2025-01-15'), 'monthly', -1)).toThrow(RangeError);
    });

    it('should reject a fractional interval', () => {
      expect(() => advanceDueDate(parseDate('2025-01-15'), 'weekly', 1.5)).toThrow(RangeError);
    });

    it('should not mutate the input date', () => {
      const current = parseDate('2025-01-31');
      advanceDueDate(current, 'monthly', 1);

      expect(formatDate(current)).toBe('2025-01-31');
    });
  });
});
