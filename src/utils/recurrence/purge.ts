import { addDays } from '../date/date';
import { LedgerScope } from '../store/types';

export const DEFAULT_RETENTION_DAYS = 30;

/**
 * Oldest `deletedAt` a soft-deleted row may have and still survive a run for `asOf`
 */
export function retentionCutoff(asOf: Date, retentionDays: number = DEFAULT_RETENTION_DAYS): Date {
  return addDays(asOf, -retentionDays);
}

/**
 * Permanently removes ledger rows soft-deleted before `cutoff`
 *
 * @param scope - Store handle of the current unit of work
 * @param cutoff - Rows with `deletedAt` strictly before this instant are removed
 * @returns Number of rows removed
 */
export function purgeSoftDeletedBefore(scope: LedgerScope, cutoff: Date): Promise<number> {
  return scope.purgeSoftDeletedBefore(cutoff);
}
