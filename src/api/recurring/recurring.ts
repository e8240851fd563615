import { Request } from 'express';
import { RecurringRuleData } from '../../data/recurring/types';
import { getUserId, parseBody } from '../../utils/net/request';
import { LedgerStore } from '../../utils/store/types';
import { CreateRecurringRuleSchema } from './recurring.schema';

/**
 * Lists the caller's recurring rules, soonest due first
 */
export async function getRecurringRules(request: Request, store: LedgerStore): Promise<RecurringRuleData[]> {
  const rules = await store.listRules(getUserId(request));
  return rules.map((rule) => rule.serialize());
}

/**
 * Creates a recurring rule for the caller; it first fires on `firstDueDate`
 *
 * @returns Id of the new rule
 */
export async function addRecurringRule(request: Request, store: LedgerStore): Promise<{ id: number }> {
  const body = parseBody(CreateRecurringRuleSchema, request.body);
  const rule = await store.createRule({ ...body, userId: getUserId(request) });
  return { id: rule.id };
}
