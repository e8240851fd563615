import { readFileSync } from 'fs';
import path from 'path';
import { RecurringRule } from '../../data/recurring/recurringRule';
import { LedgerTransaction } from '../../data/transaction/ledgerTransaction';
import { TagData } from '../../data/tag/types';
import { formatDate, formatTimestamp, parseTimestamp, toDateString } from '../date/date';
import { createLogger } from '../log';
import { DuplicateOccurrenceError, NotFoundError, StoreUnavailableError, ValidationError } from './errors';
import { isDuplicateEntry, OkPacket, SqlConnection, SqlConnectionFactory } from './mysqlConnection';
import {
  DateRange,
  InsertOccurrenceResult,
  LedgerScope,
  LedgerStore,
  NewLedgerTransaction,
  NewRecurringRule,
  RecurringRuleChanges,
} from './types';

const logger = createLogger('mysql');

export const SCHEMA_FILE = path.join(__dirname, '../../../sql/schema.sql');
export const RUN_LOCK_NAME = 'ledger_recurrence_run';

type RecurringRow = {
  id: number;
  user_id: number;
  amount_pence: number;
  description: string;
  frequency: string;
  interval_n: number;
  first_due_date: string;
  next_due_date: string;
  end_date: string | null;
  active: number;
  created_at: string;
};

type TransactionRow = {
  id: number;
  user_id: number;
  amount_pence: number;
  t_date: string;
  note: string | null;
  created_at: string;
  source_recurring: number | null;
  deleted_at: string | null;
};

type TagLinkRow = {
  owner_id: number;
  tag_id: number;
};

function groupTagLinks(links: TagLinkRow[]): Map<number, number[]> {
  const grouped = new Map<number, number[]>();
  for (const link of links) {
    grouped.set(link.owner_id, [...(grouped.get(link.owner_id) ?? []), link.tag_id]);
  }
  return grouped;
}

function toRule(row: RecurringRow, tagIds: number[]): RecurringRule {
  return new RecurringRule({
    id: row.id,
    userId: row.user_id,
    amount: row.amount_pence,
    description: row.description,
    frequency: row.frequency,
    intervalN: row.interval_n,
    firstDueDate: toDateString(row.first_due_date),
    nextDueDate: toDateString(row.next_due_date),
    endDate: row.end_date ? toDateString(row.end_date) : null,
    active: row.active === 1,
    createdAt: parseTimestamp(row.created_at).toISOString(),
    tagIds,
  });
}

function toTransaction(row: TransactionRow, tagIds: number[]): LedgerTransaction {
  return new LedgerTransaction({
    id: row.id,
    userId: row.user_id,
    amount: row.amount_pence,
    date: toDateString(row.t_date),
    note: row.note,
    createdAt: parseTimestamp(row.created_at).toISOString(),
    sourceRule: row.source_recurring,
    deletedAt: row.deleted_at ? parseTimestamp(row.deleted_at).toISOString() : null,
    tagIds,
  });
}

async function loadRules(connection: SqlConnection, rows: RecurringRow[]): Promise<RecurringRule[]> {
  if (rows.length === 0) {
    return [];
  }
  const links = await connection.query<TagLinkRow[]>(
    'SELECT recurring_id AS owner_id, tag_id FROM recurring_tags WHERE recurring_id IN (?)',
    [rows.map((row) => row.id)],
  );
  const tagsByRule = groupTagLinks(links);
  return rows.map((row) => toRule(row, tagsByRule.get(row.id) ?? []));
}

async function loadTransactions(connection: SqlConnection, rows: TransactionRow[]): Promise<LedgerTransaction[]> {
  if (rows.length === 0) {
    return [];
  }
  const links = await connection.query<TagLinkRow[]>(
    'SELECT transaction_id AS owner_id, tag_id FROM transaction_tags WHERE transaction_id IN (?)',
    [rows.map((row) => row.id)],
  );
  const tagsByTransaction = groupTagLinks(links);
  return rows.map((row) => toTransaction(row, tagsByTransaction.get(row.id) ?? []));
}

async function replaceTagLinks(
  connection: SqlConnection,
  table: 'recurring_tags' | 'transaction_tags',
  column: 'recurring_id' | 'transaction_id',
  ownerId: number,
  tagIds: number[],
) {
  await connection.query(`DELETE FROM ${table} WHERE ${column} = ?`, [ownerId]);
  const unique = [...new Set(tagIds)];
  if (unique.length > 0) {
    await connection.query(`INSERT INTO ${table} (${column}, tag_id) VALUES ?`, [
      unique.map((tagId) => [ownerId, tagId]),
    ]);
  }
}

async function rollbackAfter(connection: SqlConnection, error: unknown): Promise<never> {
  try {
    await connection.rollback();
  } catch (rollbackError) {
    logger.warn('rollback failed', { error: rollbackError });
  }
  throw error;
}

/**
 * Runs `work` in a plain transaction on `connection`
 */
async function inTransaction<T>(connection: SqlConnection, work: () => Promise<T>): Promise<T> {
  await connection.beginTransaction();
  let result: T;
  try {
    result = await work();
  } catch (e) {
    return rollbackAfter(connection, e);
  }
  await connection.commit();
  return result;
}

/**
 * Unit-of-work view over one connection inside an open serializable transaction
 */
export class MysqlLedgerScope implements LedgerScope {
  constructor(private readonly connection: SqlConnection) {}

  async findActiveRulesDueBy(date: Date): Promise<RecurringRule[]> {
    const rows = await this.connection.query<RecurringRow[]>(
      'SELECT * FROM recurring WHERE active = 1 AND next_due_date <= ? ORDER BY next_due_date ASC, id ASC FOR UPDATE',
      [formatDate(date)],
    );
    return loadRules(this.connection, rows);
  }

  async insertTransactionIfAbsent(rule: RecurringRule, date: Date): Promise<InsertOccurrenceResult> {
    try {
      const transactionId = await this.insertOccurrence(rule, date);
      return { created: true, transactionId };
    } catch (e) {
      if (e instanceof DuplicateOccurrenceError) {
        return { created: false };
      }
      throw e;
    }
  }

  private async insertOccurrence(rule: RecurringRule, date: Date): Promise<number> {
    try {
      const result = await this.connection.query<OkPacket>(
        'INSERT INTO transactions (user_id, amount_pence, t_date, note, source_recurring) VALUES (?, ?, ?, ?, ?)',
        [rule.userId, rule.amount, formatDate(date), rule.description, rule.id],
      );
      return result.insertId;
    } catch (e) {
      if (isDuplicateEntry(e)) {
        throw new DuplicateOccurrenceError(rule.id, formatDate(date), { cause: e });
      }
      throw e;
    }
  }

  async copyRuleTagsToTransaction(ruleId: number, transactionId: number): Promise<void> {
    await this.connection.query(
      'INSERT IGNORE INTO transaction_tags (transaction_id, tag_id) SELECT ?, tag_id FROM recurring_tags WHERE recurring_id = ?',
      [transactionId, ruleId],
    );
  }

  async advanceRuleNextDue(ruleId: number, nextDueDate: Date): Promise<void> {
    await this.connection.query('UPDATE recurring SET next_due_date = ? WHERE id = ?', [
      formatDate(nextDueDate),
      ruleId,
    ]);
  }

  async deactivateRule(ruleId: number): Promise<void> {
    await this.connection.query('UPDATE recurring SET active = 0 WHERE id = ?', [ruleId]);
  }

  async purgeSoftDeletedBefore(cutoff: Date): Promise<number> {
    const result = await this.connection.query<OkPacket>(
      'DELETE FROM transactions WHERE deleted_at IS NOT NULL AND deleted_at < ?',
      [formatTimestamp(cutoff)],
    );
    return result.affectedRows;
  }
}

export type MysqlLedgerStoreOptions = {
  openConnection: SqlConnectionFactory;
  /** How long a run waits for another run's lock before giving up */
  lockTimeoutSeconds?: number;
};

/**
 * Ledger store on MySQL, opening one connection per call the way the rest of the server does
 */
export class MysqlLedgerStore implements LedgerStore {
  private readonly openConnection: SqlConnectionFactory;
  private readonly lockTimeoutSeconds: number;

  constructor(options: MysqlLedgerStoreOptions) {
    this.openConnection = options.openConnection;
    this.lockTimeoutSeconds = options.lockTimeoutSeconds ?? 10;
  }

  private async withConnection<T>(work: (connection: SqlConnection) => Promise<T>): Promise<T> {
    const connection = this.openConnection();
    try {
      await connection.connect();
      return await work(connection);
    } finally {
      await connection.end().catch((e: unknown) => logger.warn('closing connection failed', { error: e }));
    }
  }

  /**
   * Creates the tables from `sql/schema.sql` when they are missing
   */
  async ensureSchema(schemaFile: string = SCHEMA_FILE): Promise<void> {
    const statements = readFileSync(schemaFile, 'utf8')
      .split('\n')
      .filter((line) => !line.trim().startsWith('--'))
      .join('\n')
      .split(';')
      .map((statement) => statement.trim())
      .filter((statement) => statement.length > 0);

    await this.withConnection(async (connection) => {
      for (const statement of statements) {
        await connection.query(statement);
      }
    });
    logger.log('schema ready', { statements: statements.length });
  }

  withExclusiveTransaction<T>(work: (scope: LedgerScope) => Promise<T>): Promise<T> {
    return this.withConnection(async (connection) => {
      const [lock] = await connection.query<{ acquired: number | null }[]>('SELECT GET_LOCK(?, ?) AS acquired', [
        RUN_LOCK_NAME,
        this.lockTimeoutSeconds,
      ]);
      if (!lock || lock.acquired !== 1) {
        throw new StoreUnavailableError(`Timed out waiting for lock '${RUN_LOCK_NAME}'`);
      }

      try {
        await connection.query('SET TRANSACTION ISOLATION LEVEL SERIALIZABLE');
        return await inTransaction(connection, () => work(new MysqlLedgerScope(connection)));
      } finally {
        await connection
          .query('SELECT RELEASE_LOCK(?)', [RUN_LOCK_NAME])
          .catch((e: unknown) => logger.warn('releasing run lock failed', { error: e }));
      }
    });
  }

  listRules(userId: number): Promise<RecurringRule[]> {
    return this.withConnection(async (connection) => {
      const rows = await connection.query<RecurringRow[]>(
        'SELECT * FROM recurring WHERE user_id = ? ORDER BY next_due_date ASC, id ASC',
        [userId],
      );
      return loadRules(connection, rows);
    });
  }

  getRule(id: number): Promise<RecurringRule | null> {
    return this.withConnection((connection) => this.findRule(connection, id));
  }

  private async findRule(connection: SqlConnection, id: number): Promise<RecurringRule | null> {
    const rows = await connection.query<RecurringRow[]>('SELECT * FROM recurring WHERE id = ?', [id]);
    const [rule] = await loadRules(connection, rows);
    return rule ?? null;
  }

  private async requireRule(connection: SqlConnection, id: number): Promise<RecurringRule> {
    const rule = await this.findRule(connection, id);
    if (!rule) {
      throw new NotFoundError(`Recurring rule ${id} not found`);
    }
    return rule;
  }

  createRule(input: NewRecurringRule): Promise<RecurringRule> {
    return this.withConnection((connection) =>
      inTransaction(connection, async () => {
        const result = await connection.query<OkPacket>(
          `INSERT INTO recurring
             (user_id, amount_pence, description, frequency, interval_n, first_due_date, next_due_date, end_date, active)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, 1)`,
          [
            input.userId,
            input.amount,
            input.description,
            input.frequency,
            input.intervalN,
            input.firstDueDate,
            input.firstDueDate,
            input.endDate,
          ],
        );
        await replaceTagLinks(connection, 'recurring_tags', 'recurring_id', result.insertId, input.tagIds);
        return this.requireRule(connection, result.insertId);
      }),
    );
  }

  updateRule(id: number, changes: RecurringRuleChanges): Promise<RecurringRule> {
    return this.withConnection((connection) =>
      inTransaction(connection, async () => {
        await this.requireRule(connection, id);
        const columns: Record<string, string | number | null> = {};
        if (changes.amount !== undefined) columns.amount_pence = changes.amount;
        if (changes.description !== undefined) columns.description = changes.description;
        if (changes.frequency !== undefined) columns.frequency = changes.frequency;
        if (changes.intervalN !== undefined) columns.interval_n = changes.intervalN;
        if (changes.endDate !== undefined) columns.end_date = changes.endDate;

        if (Object.keys(columns).length > 0) {
          await connection.query('UPDATE recurring SET ? WHERE id = ?', [columns, id]);
        }
        if (changes.tagIds) {
          await replaceTagLinks(connection, 'recurring_tags', 'recurring_id', id, changes.tagIds);
        }
        return this.requireRule(connection, id);
      }),
    );
  }

  setRuleActive(id: number, active: boolean): Promise<RecurringRule> {
    return this.withConnection(async (connection) => {
      const result = await connection.query<OkPacket>('UPDATE recurring SET active = ? WHERE id = ?', [
        active ? 1 : 0,
        id,
      ]);
      if (result.affectedRows === 0) {
        throw new NotFoundError(`Recurring rule ${id} not found`);
      }
      return this.requireRule(connection, id);
    });
  }

  listTransactions(userId: number, range: DateRange): Promise<LedgerTransaction[]> {
    return this.withConnection(async (connection) => {
      const rows = await connection.query<TransactionRow[]>(
        `SELECT * FROM transactions
         WHERE user_id = ? AND deleted_at IS NULL
           AND (? IS NULL OR t_date >= ?)
           AND (? IS NULL OR t_date <= ?)
         ORDER BY t_date DESC, id DESC`,
        [userId, range.startDate, range.startDate, range.endDate, range.endDate],
      );
      return loadTransactions(connection, rows);
    });
  }

  getTransaction(id: number): Promise<LedgerTransaction | null> {
    return this.withConnection(async (connection) => {
      const rows = await connection.query<TransactionRow[]>('SELECT * FROM transactions WHERE id = ?', [id]);
      const [transaction] = await loadTransactions(connection, rows);
      return transaction ?? null;
    });
  }

  createTransaction(input: NewLedgerTransaction): Promise<LedgerTransaction> {
    return this.withConnection((connection) =>
      inTransaction(connection, async () => {
        const result = await connection.query<OkPacket>(
          'INSERT INTO transactions (user_id, amount_pence, t_date, note, source_recurring) VALUES (?, ?, ?, ?, NULL)',
          [input.userId, input.amount, input.date, input.note],
        );
        await replaceTagLinks(connection, 'transaction_tags', 'transaction_id', result.insertId, input.tagIds);
        const rows = await connection.query<TransactionRow[]>('SELECT * FROM transactions WHERE id = ?', [
          result.insertId,
        ]);
        const [transaction] = await loadTransactions(connection, rows);
        if (!transaction) {
          throw new NotFoundError(`Transaction ${result.insertId} not found`);
        }
        return transaction;
      }),
    );
  }

  softDeleteTransaction(id: number, at: Date): Promise<void> {
    return this.withConnection(async (connection) => {
      const result = await connection.query<OkPacket>(
        'UPDATE transactions SET deleted_at = ? WHERE id = ? AND deleted_at IS NULL',
        [formatTimestamp(at), id],
      );
      if (result.affectedRows === 0) {
        throw new NotFoundError(`Transaction ${id} not found`);
      }
    });
  }

  restoreTransaction(id: number): Promise<void> {
    return this.withConnection(async (connection) => {
      const result = await connection.query<OkPacket>(
        'UPDATE transactions SET deleted_at = NULL WHERE id = ? AND deleted_at IS NOT NULL',
        [id],
      );
      if (result.affectedRows === 0) {
        throw new NotFoundError(`Deleted transaction ${id} not found`);
      }
    });
  }

  listTags(): Promise<TagData[]> {
    return this.withConnection((connection) =>
      connection.query<TagData[]>('SELECT id, name FROM tags ORDER BY name ASC'),
    );
  }

  createTag(name: string): Promise<TagData> {
    return this.withConnection(async (connection) => {
      try {
        const result = await connection.query<OkPacket>('INSERT INTO tags (name) VALUES (?)', [name]);
        return { id: result.insertId, name };
      } catch (e) {
        if (isDuplicateEntry(e)) {
          throw new ValidationError(`Tag '${name}' already exists`);
        }
        throw e;
      }
    });
  }

  async close(): Promise<void> {
    // Connections are per call; nothing stays open
  }
}
