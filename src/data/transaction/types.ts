import { DateString } from '../../utils/date/types';

export type LedgerTransactionData = {
  id: number;
  userId: number;
  /** Signed, in minor currency units */
  amount: number;
  date: DateString;
  note: string | null;
  createdAt: string;
  /** Rule that materialized this row, null for manual entries */
  sourceRule: number | null;
  /** Soft-delete marker, null while the row is live */
  deletedAt: string | null;
  tagIds: number[];
};
