import { v4 as uuidv4 } from 'uuid';
import { RecurringRule, isFrequency } from '../../data/recurring/recurringRule';
import { formatDate, parseDate } from '../date/date';
import { createLogger, Logger } from '../log';
import { LedgerScope, UnitOfWork } from '../store/types';
import { advanceDueDate } from './advance';
import { DEFAULT_RETENTION_DAYS, purgeSoftDeletedBefore, retentionCutoff } from './purge';

const defaultLogger = createLogger('recurrence');

export type RecurrenceRunOptions = {
  /** Minimum age of a soft-deleted row before it is purged */
  retentionDays?: number;
  /** Aborting rolls the run back; checked before each rule and before the purge */
  signal?: AbortSignal;
  logger?: Logger;
};

export type RecurrenceRunResult = {
  /** Rules found due, including ones deactivated or already materialized */
  processedCount: number;
};

type RunStats = {
  created: number;
  duplicates: number;
  deactivated: number;
  purged: number;
};

type RuleOutcome = 'created' | 'duplicate' | 'deactivated';

async function materializeRule(
  scope: LedgerScope,
  rule: RecurringRule,
  asOf: Date,
  logger: Logger,
): Promise<RuleOutcome> {
  if (rule.hasEnded(asOf)) {
    await scope.deactivateRule(rule.id);
    logger.debug('rule ended, deactivated', { ruleId: rule.id, endDate: rule.endDate });
    return 'deactivated';
  }

  const insert = await scope.insertTransactionIfAbsent(rule, rule.nextDueDate);
  if (insert.created) {
    await scope.copyRuleTagsToTransaction(rule.id, insert.transactionId);
  }

  // Advances after a duplicate as well; see DESIGN.md on runs with an earlier asOf
  if (!isFrequency(rule.frequency)) {
    logger.warn('unsupported frequency, due date left unchanged', { ruleId: rule.id, frequency: rule.frequency });
  }
  const nextDue = advanceDueDate(rule.nextDueDate, rule.frequency, rule.intervalN);
  await scope.advanceRuleNextDue(rule.id, nextDue);

  logger.debug(insert.created ? 'occurrence created' : 'occurrence already materialized', {
    ruleId: rule.id,
    date: formatDate(rule.nextDueDate),
    nextDue: formatDate(nextDue),
  });
  return insert.created ? 'created' : 'duplicate';
}

/**
 * Materializes every recurring rule due on or before `asOf` and purges expired
 * soft-deleted rows, all in one exclusive unit of work
 *
 * Rules are processed by `nextDueDate` then id. Each due rule yields at most one
 * transaction per run, dated at its current `nextDueDate`, and then moves to its
 * next due date. A rule whose end date is before `asOf` is deactivated instead.
 * Any failure rolls the whole run back; the caller owns retries.
 *
 * @param unitOfWork - Store able to open an exclusive transaction
 * @param asOf - Calendar day of the run; any time of day is ignored
 * @param options - Retention window, cancellation signal and logger
 *
 * @example
 * ```typescript
 * const { processedCount } = await runRecurrence(store, parseDate('2025-03-01'));
 * ```
 */
export async function runRecurrence(
  unitOfWork: UnitOfWork,
  asOf: Date,
  options: RecurrenceRunOptions = {},
): Promise<RecurrenceRunResult> {
  const { signal, retentionDays = DEFAULT_RETENTION_DAYS, logger = defaultLogger } = options;
  const runId = uuidv4();
  const day = parseDate(formatDate(asOf));
  const stats: RunStats = { created: 0, duplicates: 0, deactivated: 0, purged: 0 };

  const processedCount = await unitOfWork.withExclusiveTransaction(async (scope) => {
    signal?.throwIfAborted();
    const rules = await scope.findActiveRulesDueBy(day);

    for (const rule of rules) {
      signal?.throwIfAborted();
      const outcome = await materializeRule(scope, rule, day, logger);
      if (outcome === 'created') {
        stats.created++;
      } else if (outcome === 'duplicate') {
        stats.duplicates++;
      } else {
        stats.deactivated++;
      }
    }

    signal?.throwIfAborted();
    stats.purged = await purgeSoftDeletedBefore(scope, retentionCutoff(day, retentionDays));
    return rules.length;
  });

  logger.log('run finished', { runId, asOf: formatDate(day), processed: processedCount, ...stats });
  return { processedCount };
}
