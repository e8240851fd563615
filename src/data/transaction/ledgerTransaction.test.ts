import { describe, it, expect } from 'vitest';
import { LedgerTransaction } from './ledgerTransaction';
import { LedgerTransactionData } from './types';

describe('LedgerTransaction', () => {
  const mockData: LedgerTransactionData = {
    id: 10,
    userId: 1,
    amount: -1599,
    date: '2025-02-28',
    note: 'Gym membership',
    createdAt: '2025-02-28T06:00:00.000Z',
    sourceRule: 3,
    deletedAt: null,
    tagIds: [4, 1],
  };

  it('should expose the source rule of a materialized row', () => {
    const transaction = new LedgerTransaction(mockData);

    expect(transaction.sourceRule).toBe(3);
    expect(transaction.date.toISOString()).toBe('2025-02-28T00:00:00.000Z');
    expect(transaction.tagIds).toEqual([1, 4]);
  });

  it('should treat a row without source rule as manual', () => {
    expect(new LedgerTransaction({ ...mockData, sourceRule: null }).serialize().sourceRule).toBeNull();
  });

  it('should report the soft-delete marker', () => {
    const deleted = new LedgerTransaction({ ...mockData, deletedAt: '2025-03-01T12:00:00.000Z' });

    expect(deleted.isDeleted()).toBe(true);
    expect(deleted.deletedAt?.toISOString()).toBe('2025-03-01T12:00:00.000Z');
    expect(new LedgerTransaction(mockData).isDeleted()).toBe(false);
  });

  it('should serialize back to plain data', () => {
    expect(new LedgerTransaction(mockData).serialize()).toEqual({ ...mockData, tagIds: [1, 4] });
  });
});
