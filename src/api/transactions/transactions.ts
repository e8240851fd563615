import { Request } from 'express';
import { LedgerTransactionData } from '../../data/transaction/types';
import { getDateRange, getUserId, parseBody } from '../../utils/net/request';
import { LedgerStore } from '../../utils/store/types';
import { CreateTransactionSchema } from './transactions.schema';

/**
 * Lists the caller's live transactions, newest first, within `?startDate&endDate` when given
 */
export async function getTransactions(request: Request, store: LedgerStore): Promise<LedgerTransactionData[]> {
  const transactions = await store.listTransactions(getUserId(request), getDateRange(request));
  return transactions.map((transaction) => transaction.serialize());
}

export async function addTransaction(request: Request, store: LedgerStore): Promise<{ id: number }> {
  const body = parseBody(CreateTransactionSchema, request.body);
  const transaction = await store.createTransaction({ ...body, userId: getUserId(request) });
  return { id: transaction.id };
}
