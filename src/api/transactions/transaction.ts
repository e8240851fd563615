import { Request } from 'express';
import { LedgerTransaction } from '../../data/transaction/ledgerTransaction';
import { LedgerTransactionData } from '../../data/transaction/types';
import { getIdParam, getUserId } from '../../utils/net/request';
import { NotFoundError } from '../../utils/store/errors';
import { LedgerStore } from '../../utils/store/types';

async function getOwnedTransaction(request: Request, store: LedgerStore): Promise<LedgerTransaction> {
  const transactionId = getIdParam(request, 'transactionId');
  const transaction = await store.getTransaction(transactionId);
  if (!transaction || transaction.userId !== getUserId(request)) {
    throw new NotFoundError(`Transaction ${transactionId} not found`);
  }
  return transaction;
}

export async function getTransaction(request: Request, store: LedgerStore): Promise<LedgerTransactionData> {
  const transaction = await getOwnedTransaction(request, store);
  if (transaction.isDeleted()) {
    throw new NotFoundError(`Transaction ${transaction.id} not found`);
  }
  return transaction.serialize();
}

/**
 * Soft-deletes a transaction. It stays restorable until the retention window passes,
 * and a materialized occurrence is not generated again meanwhile.
 */
export async function deleteTransaction(
  request: Request,
  store: LedgerStore,
  now: Date = new Date(),
): Promise<{ id: number }> {
  const transaction = await getOwnedTransaction(request, store);
  await store.softDeleteTransaction(transaction.id, now);
  return { id: transaction.id };
}

export async function restoreTransaction(request: Request, store: LedgerStore): Promise<LedgerTransactionData> {
  const transaction = await getOwnedTransaction(request, store);
  await store.restoreTransaction(transaction.id);
  const restored = await store.getTransaction(transaction.id);
  if (!restored) {
    throw new NotFoundError(`Transaction ${transaction.id} not found`);
  }
  return restored.serialize();
}
