import { formatDate, isBefore, isBeforeOrSame, parseDate } from '../../utils/date/date';
import { FREQUENCIES, Frequency, RecurringRuleData } from './types';

export function isFrequency(value: string): value is Frequency {
  return FREQUENCIES.some((frequency) => frequency === value);
}

/**
 * A stored template for a periodic ledger entry (subscription, salary, bill)
 * The recurrence engine turns each due occurrence into a ledger transaction
 */
export class RecurringRule {
  id: number;
  userId: number;
  amount: number;
  description: string;

  frequency: string;
  intervalN: number;

  firstDueDate: Date;
  nextDueDate: Date;
  endDate: Date | null;

  active: boolean;
  createdAt: Date;
  tagIds: number[];

  /**
   * Creates a new RecurringRule instance
   * @param data - Rule data object
   */
  constructor(data: RecurringRuleData) {
    this.id = data.id;
    this.userId = data.userId;
    this.amount = data.amount;
    this.description = data.description;

    this.frequency = data.frequency;
    this.intervalN = data.intervalN;

    this.firstDueDate = parseDate(data.firstDueDate);
    this.nextDueDate = parseDate(data.nextDueDate);
    this.endDate = data.endDate ? parseDate(data.endDate) : null;

    this.active = data.active;
    this.createdAt = new Date(data.createdAt);
    this.tagIds = [...new Set(data.tagIds)].sort((a, b) => a - b);
  }

  /**
   * Whether the engine should pick this rule up on a run for `asOf`
   */
  isDue(asOf: Date): boolean {
    return this.active && isBeforeOrSame(this.nextDueDate, asOf);
  }

  /**
   * Whether the rule's end date has passed as of `asOf`
   * A rule whose end date equals `asOf` has not ended yet.
   */
  hasEnded(asOf: Date): boolean {
    return this.endDate !== null && isBefore(this.endDate, asOf);
  }

  /**
   * Serializes the rule to a plain object for storage and API responses
   */
  serialize(): RecurringRuleData {
    return {
      id: this.id,
      userId: this.userId,
      amount: this.amount,
      description: this.description,
      frequency: this.frequency,
      intervalN: this.intervalN,
      firstDueDate: formatDate(this.firstDueDate),
      nextDueDate: formatDate(this.nextDueDate),
      endDate: this.endDate ? formatDate(this.endDate) : null,
      active: this.active,
      createdAt: this.createdAt.toISOString(),
      tagIds: [...this.tagIds],
    };
  }
}
