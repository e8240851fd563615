import { RecurringRule } from '../../data/recurring/recurringRule';
import { RecurringRuleData } from '../../data/recurring/types';
import { LedgerTransaction } from '../../data/transaction/ledgerTransaction';
import { LedgerTransactionData } from '../../data/transaction/types';
import { TagData } from '../../data/tag/types';
import { formatDate, parseDate } from '../date/date';
import { DateString } from '../date/types';
import { DuplicateOccurrenceError, NotFoundError, ValidationError } from './errors';
import {
  DateRange,
  InsertOccurrenceResult,
  LedgerScope,
  LedgerStore,
  NewLedgerTransaction,
  NewRecurringRule,
  RecurringRuleChanges,
} from './types';

type MemoryState = {
  rules: Map<number, RecurringRuleData>;
  transactions: Map<number, LedgerTransactionData>;
  tags: Map<number, TagData>;
  /** `ruleId|date` of every materialized row, live or soft-deleted */
  occurrences: Map<string, number>;
  nextIds: { rule: number; transaction: number; tag: number };
};

function emptyState(): MemoryState {
  return {
    rules: new Map(),
    transactions: new Map(),
    tags: new Map(),
    occurrences: new Map(),
    nextIds: { rule: 1, transaction: 1, tag: 1 },
  };
}

function occurrenceKey(ruleId: number, date: DateString): string {
  return `${ruleId}|${date}`;
}

// Mirrors the CHECK on recurring.interval_n
function assertValidInterval(intervalN: number) {
  if (!Number.isInteger(intervalN) || intervalN < 1) {
    throw new ValidationError(`Interval must be a positive integer, got ${intervalN}`);
  }
}

function assertTagsExist(state: MemoryState, tagIds: number[]) {
  const missing = tagIds.filter((tagId) => !state.tags.has(tagId));
  if (missing.length > 0) {
    throw new ValidationError(`Unknown tag ids: ${missing.join(', ')}`);
  }
}

/**
 * Inserts a transaction row, enforcing the `(sourceRule, date)` uniqueness the way a
 * database unique key would
 */
function insertTransactionRow(state: MemoryState, row: Omit<LedgerTransactionData, 'id'>): LedgerTransactionData {
  if (row.sourceRule !== null) {
    const key = occurrenceKey(row.sourceRule, row.date);
    if (state.occurrences.has(key)) {
      throw new DuplicateOccurrenceError(row.sourceRule, row.date);
    }
  }
  const inserted: LedgerTransactionData = { id: state.nextIds.transaction++, ...row };
  state.transactions.set(inserted.id, inserted);
  if (inserted.sourceRule !== null) {
    state.occurrences.set(occurrenceKey(inserted.sourceRule, inserted.date), inserted.id);
  }
  return inserted;
}

function deleteTransactionRow(state: MemoryState, row: LedgerTransactionData) {
  state.transactions.delete(row.id);
  if (row.sourceRule !== null) {
    state.occurrences.delete(occurrenceKey(row.sourceRule, row.date));
  }
}

function requireRule(state: MemoryState, id: number): RecurringRuleData {
  const rule = state.rules.get(id);
  if (!rule) {
    throw new NotFoundError(`Recurring rule ${id} not found`);
  }
  return rule;
}

/**
 * Unit-of-work view over a private copy of the store state
 */
export class MemoryLedgerScope implements LedgerScope {
  constructor(
    private readonly draft: MemoryState,
    private readonly now: () => Date,
  ) {}

  async findActiveRulesDueBy(date: Date): Promise<RecurringRule[]> {
    return [...this.draft.rules.values()]
      .map((data) => new RecurringRule(data))
      .filter((rule) => rule.isDue(date))
      .sort((a, b) => a.nextDueDate.getTime() - b.nextDueDate.getTime() || a.id - b.id);
  }

  async insertTransactionIfAbsent(rule: RecurringRule, date: Date): Promise<InsertOccurrenceResult> {
    try {
      const inserted = insertTransactionRow(this.draft, {
        userId: rule.userId,
        amount: rule.amount,
        date: formatDate(date),
        note: rule.description,
        createdAt: this.now().toISOString(),
        sourceRule: rule.id,
        deletedAt: null,
        tagIds: [],
      });
      return { created: true, transactionId: inserted.id };
    } catch (e) {
      if (e instanceof DuplicateOccurrenceError) {
        return { created: false };
      }
      throw e;
    }
  }

  async copyRuleTagsToTransaction(ruleId: number, transactionId: number): Promise<void> {
    const rule = requireRule(this.draft, ruleId);
    const transaction = this.draft.transactions.get(transactionId);
    if (!transaction) {
      throw new NotFoundError(`Transaction ${transactionId} not found`);
    }
    transaction.tagIds = [...new Set([...transaction.tagIds, ...rule.tagIds])];
  }

  async advanceRuleNextDue(ruleId: number, nextDueDate: Date): Promise<void> {
    requireRule(this.draft, ruleId).nextDueDate = formatDate(nextDueDate);
  }

  async deactivateRule(ruleId: number): Promise<void> {
    requireRule(this.draft, ruleId).active = false;
  }

  async purgeSoftDeletedBefore(cutoff: Date): Promise<number> {
    let purged = 0;
    for (const row of [...this.draft.transactions.values()]) {
      if (row.deletedAt !== null && new Date(row.deletedAt).getTime() < cutoff.getTime()) {
        deleteTransactionRow(this.draft, row);
        purged++;
      }
    }
    return purged;
  }
}

/**
 * Process-local ledger store
 *
 * Units of work and writes are serialized through one queue. A unit of work runs
 * against a copy of the state that replaces the live state only when it resolves.
 */
export class MemoryLedgerStore implements LedgerStore {
  private state: MemoryState = emptyState();
  private queue: Promise<void> = Promise.resolve();
  private readonly now: () => Date;

  constructor(options: { now?: () => Date } = {}) {
    this.now = options.now ?? (() => new Date());
  }

  private exclusive<T>(work: () => Promise<T>): Promise<T> {
    const run = this.queue.then(work);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  withExclusiveTransaction<T>(work: (scope: LedgerScope) => Promise<T>): Promise<T> {
    return this.exclusive(async () => {
      const draft = structuredClone(this.state);
      const result = await work(new MemoryLedgerScope(draft, this.now));
      this.state = draft;
      return result;
    });
  }

  async listRules(userId: number): Promise<RecurringRule[]> {
    return [...this.state.rules.values()]
      .filter((rule) => rule.userId === userId)
      .map((data) => new RecurringRule(data))
      .sort((a, b) => a.nextDueDate.getTime() - b.nextDueDate.getTime() || a.id - b.id);
  }

  async getRule(id: number): Promise<RecurringRule | null> {
    const data = this.state.rules.get(id);
    return data ? new RecurringRule(data) : null;
  }

  createRule(input: NewRecurringRule): Promise<RecurringRule> {
    return this.exclusive(async () => {
      parseDate(input.firstDueDate);
      assertValidInterval(input.intervalN);
      assertTagsExist(this.state, input.tagIds);
      const data: RecurringRuleData = {
        id: this.state.nextIds.rule++,
        userId: input.userId,
        amount: input.amount,
        description: input.description,
        frequency: input.frequency,
        intervalN: input.intervalN,
        firstDueDate: input.firstDueDate,
        nextDueDate: input.firstDueDate,
        endDate: input.endDate,
        active: true,
        createdAt: this.now().toISOString(),
        tagIds: [...new Set(input.tagIds)],
      };
      this.state.rules.set(data.id, data);
      return new RecurringRule(data);
    });
  }

  updateRule(id: number, changes: RecurringRuleChanges): Promise<RecurringRule> {
    return this.exclusive(async () => {
      const data = requireRule(this.state, id);
      if (changes.intervalN !== undefined) {
        assertValidInterval(changes.intervalN);
      }
      if (changes.tagIds) {
        assertTagsExist(this.state, changes.tagIds);
      }
      const updated: RecurringRuleData = {
        ...data,
        amount: changes.amount ?? data.amount,
        description: changes.description ?? data.description,
        frequency: changes.frequency ?? data.frequency,
        intervalN: changes.intervalN ?? data.intervalN,
        endDate: changes.endDate !== undefined ? changes.endDate : data.endDate,
        tagIds: changes.tagIds ? [...new Set(changes.tagIds)] : data.tagIds,
      };
      this.state.rules.set(id, updated);
      return new RecurringRule(updated);
    });
  }

  setRuleActive(id: number, active: boolean): Promise<RecurringRule> {
    return this.exclusive(async () => {
      const data = requireRule(this.state, id);
      data.active = active;
      return new RecurringRule(data);
    });
  }

  async listTransactions(userId: number, range: DateRange): Promise<LedgerTransaction[]> {
    return [...this.state.transactions.values()]
      .filter(
        (row) =>
          row.userId === userId &&
          row.deletedAt === null &&
          (range.startDate === null || row.date >= range.startDate) &&
          (range.endDate === null || row.date <= range.endDate),
      )
      .map((row) => new LedgerTransaction(row))
      .sort((a, b) => b.date.getTime() - a.date.getTime() || b.id - a.id);
  }

  async getTransaction(id: number): Promise<LedgerTransaction | null> {
    const row = this.state.transactions.get(id);
    return row ? new LedgerTransaction(row) : null;
  }

  createTransaction(input: NewLedgerTransaction): Promise<LedgerTransaction> {
    return this.exclusive(async () => {
      parseDate(input.date);
      assertTagsExist(this.state, input.tagIds);
      const row = insertTransactionRow(this.state, {
        userId: input.userId,
        amount: input.amount,
        date: input.date,
        note: input.note,
        createdAt: this.now().toISOString(),
        sourceRule: null,
        deletedAt: null,
        tagIds: [...new Set(input.tagIds)],
      });
      return new LedgerTransaction(row);
    });
  }

  softDeleteTransaction(id: number, at: Date): Promise<void> {
    return this.exclusive(async () => {
      const row = this.state.transactions.get(id);
      if (!row || row.deletedAt !== null) {
        throw new NotFoundError(`Transaction ${id} not found`);
      }
      row.deletedAt = at.toISOString();
    });
  }

  restoreTransaction(id: number): Promise<void> {
    return this.exclusive(async () => {
      const row = this.state.transactions.get(id);
      if (!row || row.deletedAt === null) {
        throw new NotFoundError(`Deleted transaction ${id} not found`);
      }
      row.deletedAt = null;
    });
  }

  async listTags(): Promise<TagData[]> {
    return [...this.state.tags.values()].map((tag) => ({ ...tag })).sort((a, b) => a.name.localeCompare(b.name));
  }

  createTag(name: string): Promise<TagData> {
    return this.exclusive(async () => {
      const existing = [...this.state.tags.values()].find((tag) => tag.name === name);
      if (existing) {
        throw new ValidationError(`Tag '${name}' already exists`);
      }
      const tag: TagData = { id: this.state.nextIds.tag++, name };
      this.state.tags.set(tag.id, tag);
      return { ...tag };
    });
  }

  async close(): Promise<void> {
    await this.queue;
  }
}
