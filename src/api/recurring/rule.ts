import { Request } from 'express';
import { RecurringRule } from '../../data/recurring/recurringRule';
import { RecurringRuleData } from '../../data/recurring/types';
import { getIdParam, getUserId, parseBody } from '../../utils/net/request';
import { isBefore, parseDate } from '../../utils/date/date';
import { NotFoundError, ValidationError } from '../../utils/store/errors';
import { LedgerStore } from '../../utils/store/types';
import { SetRuleActiveSchema, UpdateRecurringRuleSchema } from './recurring.schema';

// Rules of other users answer exactly like missing ones
async function getOwnedRule(request: Request, store: LedgerStore): Promise<RecurringRule> {
  const ruleId = getIdParam(request, 'ruleId');
  const rule = await store.getRule(ruleId);
  if (!rule || rule.userId !== getUserId(request)) {
    throw new NotFoundError(`Recurring rule ${ruleId} not found`);
  }
  return rule;
}

export async function getRecurringRule(request: Request, store: LedgerStore): Promise<RecurringRuleData> {
  return (await getOwnedRule(request, store)).serialize();
}

/**
 * Edits amount, description, schedule, end date or tags of a rule
 *
 * A changed frequency or interval applies from the rule's current next due date on.
 */
export async function updateRecurringRule(request: Request, store: LedgerStore): Promise<RecurringRuleData> {
  const rule = await getOwnedRule(request, store);
  const changes = parseBody(UpdateRecurringRuleSchema, request.body);
  if (changes.endDate && isBefore(parseDate(changes.endDate), rule.firstDueDate)) {
    throw new ValidationError('endDate: endDate must not be before firstDueDate');
  }
  return (await store.updateRule(rule.id, changes)).serialize();
}

/**
 * Turns a rule on or off. Reactivating a rule whose end date has passed is allowed;
 * the next run deactivates it again.
 */
export async function setRecurringRuleActive(request: Request, store: LedgerStore): Promise<RecurringRuleData> {
  const rule = await getOwnedRule(request, store);
  const { active } = parseBody(SetRuleActiveSchema, request.body);
  return (await store.setRuleActive(rule.id, active)).serialize();
}
