import { z } from 'zod';
import { dateStringSchema } from '../../utils/net/request';

/** Body of `PUT /api/transactions`, a manual ledger entry */
export const CreateTransactionSchema = z.object({
  amount: z.number().int(),
  date: dateStringSchema,
  note: z.string().max(255).nullable().default(null),
  tagIds: z.array(z.number().int().positive()).default([]),
});
