import { describe, it, expect } from 'vitest';
import { purgeSoftDeletedBefore, retentionCutoff } from './purge';
import { formatDate, parseDate } from '../date/date';
import { createTestStore, newTransaction } from '../test/mockData';

describe('retentionCutoff', () => {
  it('should default to thirty days before asOf', () => {
    expect(formatDate(retentionCutoff(parseDate('2025-03-31')))).toBe('2025-03-01');
  });

  it('should take a custom window', () => {
    expect(formatDate(retentionCutoff(parseDate('2025-03-01'), 7))).toBe('2025-02-22');
    expect(formatDate(retentionCutoff(parseDate('2025-03-01'), 0))).toBe('2025-03-01');
  });
});

describe('purgeSoftDeletedBefore', () => {
  it('should remove only rows deleted strictly before the cutoff', async () => {
    const store = createTestStore();
    const old = await store.createTransaction(newTransaction());
    const edge = await store.createTransaction(newTransaction());
    const live = await store.createTransaction(newTransaction());
    await store.softDeleteTransaction(old.id, new Date('2025-01-31T23:59:59Z'));
    await store.softDeleteTransaction(edge.id, parseDate('2025-02-01'));

    const purged = await store.withExclusiveTransaction((scope) =>
      purgeSoftDeletedBefore(scope, parseDate('2025-02-01')),
    );

    expect(purged).toBe(1);
    expect(await store.getTransaction(old.id)).toBeNull();
    expect((await store.getTransaction(edge.id))?.isDeleted()).toBe(true);
    expect(await store.getTransaction(live.id)).not.toBeNull();
  });
});
