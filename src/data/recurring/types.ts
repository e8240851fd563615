import { DateString } from '../../utils/date/types';

export const FREQUENCIES = ['daily', 'weekly', 'monthly', 'yearly'] as const;

export type Frequency = (typeof FREQUENCIES)[number];

export type RecurringRuleData = {
  id: number;
  userId: number;
  /** Signed, in minor currency units */
  amount: number;
  description: string;
  /** Stored as free text; rows written before validation may hold other values */
  frequency: string;
  intervalN: number;
  firstDueDate: DateString;
  nextDueDate: DateString;
  endDate: DateString | null;
  active: boolean;
  createdAt: string;
  tagIds: number[];
};
