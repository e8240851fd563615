import { LedgerConfig } from '../config/config';
import { formatDate, todayInTimezone } from '../date/date';
import { createLogger, Logger } from '../log';
import { UnitOfWork } from '../store/types';
import { runRecurrence } from './engine';

const defaultLogger = createLogger('recurrence-timer');

export type RecurrenceTimerConfig = Pick<LedgerConfig, 'timezone' | 'retentionDays' | 'schedulerIntervalMinutes'>;

export type RecurrenceTimerOptions = {
  now?: () => Date;
  logger?: Logger;
};

export type RecurrenceTimer = {
  stop(): void;
};

/**
 * Runs the recurrence engine every `schedulerIntervalMinutes`, for today in the ledger timezone
 *
 * A tick that arrives while the previous run is still going is skipped. Failed runs are
 * logged and the timer carries on.
 *
 * @returns A handle to stop the timer, or `null` when the interval is 0
 */
export function startRecurrenceTimer(
  unitOfWork: UnitOfWork,
  config: RecurrenceTimerConfig,
  options: RecurrenceTimerOptions = {},
): RecurrenceTimer | null {
  const { now = () => new Date(), logger = defaultLogger } = options;
  if (config.schedulerIntervalMinutes === 0) {
    logger.log('timer disabled');
    return null;
  }

  let running = false;
  const tick = () => {
    if (running) {
      logger.warn('previous run still in progress, tick skipped');
      return;
    }
    running = true;
    const asOf = todayInTimezone(config.timezone, now());
    logger.debug('tick', { asOf: formatDate(asOf) });
    void runRecurrence(unitOfWork, asOf, { retentionDays: config.retentionDays })
      .catch((error: unknown) => logger.err('scheduled run failed', { asOf: formatDate(asOf), error }))
      .finally(() => {
        running = false;
      });
  };

  const handle = setInterval(tick, config.schedulerIntervalMinutes * 60 * 1000);
  logger.log('timer started', { everyMinutes: config.schedulerIntervalMinutes, timezone: config.timezone });

  return {
    stop: () => clearInterval(handle),
  };
}
