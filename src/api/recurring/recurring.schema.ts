import { z } from 'zod';
import { FREQUENCIES } from '../../data/recurring/types';
import { dateStringSchema } from '../../utils/net/request';

const tagIdsSchema = z.array(z.number().int().positive());

/**
 * Body of `PUT /api/recurring`
 * - amount: signed minor units, negative for money going out
 * - intervalN: every n periods of `frequency`, at least 1
 * - endDate: last day the rule may fire, inclusive
 */
export const CreateRecurringRuleSchema = z
  .object({
    amount: z.number().int(),
    description: z.string().max(255).default(''),
    frequency: z.enum(FREQUENCIES),
    intervalN: z.number().int().min(1).default(1),
    firstDueDate: dateStringSchema,
    endDate: dateStringSchema.nullable().default(null),
    tagIds: tagIdsSchema.default([]),
  })
  .refine((rule) => rule.endDate === null || rule.endDate >= rule.firstDueDate, {
    message: 'endDate must not be before firstDueDate',
    path: ['endDate'],
  });

/** Body of `POST /api/recurring/:ruleId`; the due date and active flag are not editable here */
export const UpdateRecurringRuleSchema = z
  .object({
    amount: z.number().int().optional(),
    description: z.string().max(255).optional(),
    frequency: z.enum(FREQUENCIES).optional(),
    intervalN: z.number().int().min(1).optional(),
    endDate: dateStringSchema.nullable().optional(),
    tagIds: tagIdsSchema.optional(),
  })
  .strict();

export const SetRuleActiveSchema = z.object({
  active: z.boolean(),
});
