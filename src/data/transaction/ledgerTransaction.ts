import { formatDate, parseDate } from '../../utils/date/date';
import { LedgerTransactionData } from './types';

/**
 * A single ledger row, either entered by hand or materialized from a recurring rule
 */
export class LedgerTransaction {
  id: number;
  userId: number;
  amount: number;
  date: Date;
  note: string | null;
  createdAt: Date;
  sourceRule: number | null;
  deletedAt: Date | null;
  tagIds: number[];

  constructor(data: LedgerTransactionData) {
    this.id = data.id;
    this.userId = data.userId;
    this.amount = data.amount;
    this.date = parseDate(data.date);
    this.note = data.note;
    this.createdAt = new Date(data.createdAt);
    this.sourceRule = data.sourceRule;
    this.deletedAt = data.deletedAt ? new Date(data.deletedAt) : null;
    this.tagIds = [...new Set(data.tagIds)].sort((a, b) => a - b);
  }

  isDeleted(): boolean {
    return this.deletedAt !== null;
  }

  serialize(): LedgerTransactionData {
    return {
      id: this.id,
      userId: this.userId,
      amount: this.amount,
      date: formatDate(this.date),
      note: this.note,
      createdAt: this.createdAt.toISOString(),
      sourceRule: this.sourceRule,
      deletedAt: this.deletedAt ? this.deletedAt.toISOString() : null,
      tagIds: [...this.tagIds],
    };
  }
}
