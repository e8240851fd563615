import { Request } from 'express';
import { LedgerConfig } from '../../utils/config/config';
import { parseDate, todayInTimezone } from '../../utils/date/date';
import { getDateQuery } from '../../utils/net/request';
import { runRecurrence } from '../../utils/recurrence/engine';
import { UnitOfWork } from '../../utils/store/types';

export type SchedulerSettings = Pick<LedgerConfig, 'timezone' | 'retentionDays'>;

/**
 * Runs the recurrence engine once, for `?asOf=YYYY-MM-DD` or today in the ledger timezone
 *
 * @returns Number of due rules the run processed
 */
export async function runScheduler(
  request: Request,
  store: UnitOfWork,
  settings: SchedulerSettings,
  now: Date = new Date(),
): Promise<{ processed: number }> {
  const asOf = getDateQuery(request, 'asOf');
  const day = asOf ? parseDate(asOf) : todayInTimezone(settings.timezone, now);
  const { processedCount } = await runRecurrence(store, day, { retentionDays: settings.retentionDays });
  return { processed: processedCount };
}
