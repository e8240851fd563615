import { RecurringRule } from '../../data/recurring/recurringRule';
import { Frequency } from '../../data/recurring/types';
import { LedgerTransaction } from '../../data/transaction/ledgerTransaction';
import { TagData } from '../../data/tag/types';
import { DateString } from '../date/types';

export type NewRecurringRule = {
  userId: number;
  amount: number;
  description: string;
  frequency: Frequency;
  intervalN: number;
  firstDueDate: DateString;
  endDate: DateString | null;
  tagIds: number[];
};

/** External edits; the engine-owned fields (`nextDueDate`, `active`) are not editable here */
export type RecurringRuleChanges = Partial<
  Pick<NewRecurringRule, 'amount' | 'description' | 'frequency' | 'intervalN' | 'endDate' | 'tagIds'>
>;

export type NewLedgerTransaction = {
  userId: number;
  amount: number;
  date: DateString;
  note: string | null;
  tagIds: number[];
};

export type DateRange = {
  startDate: DateString | null;
  endDate: DateString | null;
};

export type InsertOccurrenceResult = { created: true; transactionId: number } | { created: false };

/**
 * Store handle valid for a single unit of work
 *
 * Handed to the callback of {@link UnitOfWork.withExclusiveTransaction} and must not be kept
 * after the callback settles.
 */
export interface LedgerScope {
  /** Active rules with `nextDueDate <= date`, by `nextDueDate` then `id` */
  findActiveRulesDueBy(date: Date): Promise<RecurringRule[]>;
  /**
   * Inserts the occurrence of `rule` on `date` unless one already exists
   * (live or soft-deleted). The uniqueness check is enforced by the storage layer.
   */
  insertTransactionIfAbsent(rule: RecurringRule, date: Date): Promise<InsertOccurrenceResult>;
  copyRuleTagsToTransaction(ruleId: number, transactionId: number): Promise<void>;
  advanceRuleNextDue(ruleId: number, nextDueDate: Date): Promise<void>;
  deactivateRule(ruleId: number): Promise<void>;
  /** Hard-deletes rows whose `deletedAt` is before `cutoff`; returns how many went */
  purgeSoftDeletedBefore(cutoff: Date): Promise<number>;
}

export interface UnitOfWork {
  /**
   * Runs `work` inside one exclusive, all-or-nothing transaction
   * Commits when `work` resolves and rolls back when it rejects.
   */
  withExclusiveTransaction<T>(work: (scope: LedgerScope) => Promise<T>): Promise<T>;
}

export interface LedgerStore extends UnitOfWork {
  listRules(userId: number): Promise<RecurringRule[]>;
  getRule(id: number): Promise<RecurringRule | null>;
  createRule(input: NewRecurringRule): Promise<RecurringRule>;
  updateRule(id: number, changes: RecurringRuleChanges): Promise<RecurringRule>;
  setRuleActive(id: number, active: boolean): Promise<RecurringRule>;

  /** Live (not soft-deleted) transactions, newest date first */
  listTransactions(userId: number, range: DateRange): Promise<LedgerTransaction[]>;
  /** Returns soft-deleted rows too; callers decide whether to show them */
  getTransaction(id: number): Promise<LedgerTransaction | null>;
  createTransaction(input: NewLedgerTransaction): Promise<LedgerTransaction>;
  softDeleteTransaction(id: number, at: Date): Promise<void>;
  restoreTransaction(id: number): Promise<void>;

  listTags(): Promise<TagData[]>;
  createTag(name: string): Promise<TagData>;

  close(): Promise<void>;
}
