import mysql, { ConnectionConfig, MysqlError } from 'mysql';
import { StoreUnavailableError, ValidationError } from './errors';

/**
 * The slice of a MySQL connection the ledger store needs, with promises in place of callbacks
 */
export interface SqlConnection {
  connect(): Promise<void>;
  query<T>(sql: string, values?: unknown[]): Promise<T>;
  beginTransaction(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  end(): Promise<void>;
}

export type SqlConnectionFactory = () => SqlConnection;

/** Shape of `INSERT`/`UPDATE`/`DELETE` results */
export type OkPacket = {
  affectedRows: number;
  insertId: number;
};

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'PROTOCOL_CONNECTION_LOST',
  'PROTOCOL_SEQUENCE_TIMEOUT',
  'ER_ACCESS_DENIED_ERROR',
  'ER_CON_COUNT_ERROR',
]);

/**
 * Maps driver errors onto the store's error classes
 * Transport failures become {@link StoreUnavailableError}; broken foreign keys and failed
 * CHECK constraints become {@link ValidationError}. Everything else, duplicate keys included,
 * passes through.
 */
export function translateMysqlError(error: MysqlError): Error {
  if (error.fatal || CONNECTION_ERROR_CODES.has(error.code)) {
    return new StoreUnavailableError(`MySQL unavailable: ${error.code}`, { cause: error });
  }
  if (error.code === 'ER_NO_REFERENCED_ROW_2' || error.code === 'ER_NO_REFERENCED_ROW') {
    return new ValidationError('Referenced tag or rule does not exist');
  }
  if (error.code === 'ER_CHECK_CONSTRAINT_VIOLATED') {
    return new ValidationError('Interval must be a positive integer');
  }
  return error;
}

export function isDuplicateEntry(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ER_DUP_ENTRY';
}

/**
 * Opens a connection with `mysql`, reading DATE/TIMESTAMP columns as strings in UTC
 */
export function openMysqlConnection(config: ConnectionConfig): SqlConnection {
  const connection = mysql.createConnection({ ...config, dateStrings: true, timezone: 'Z' });

  const settle = (start: (callback: (err?: MysqlError | null) => void) => void) =>
    new Promise<void>((resolve, reject) => {
      start((err) => (err ? reject(translateMysqlError(err)) : resolve()));
    });

  return {
    connect: async () => {
      await settle((callback) => connection.connect(callback));
      await settle((callback) => connection.query("SET time_zone = '+00:00'", callback));
    },
    query: <T>(sql: string, values: unknown[] = []) =>
      new Promise<T>((resolve, reject) => {
        connection.query({ sql, values }, (error, results) => {
          if (error) {
            reject(translateMysqlError(error));
            return;
          }
          resolve(results);
        });
      }),
    beginTransaction: () => settle((callback) => connection.beginTransaction(callback)),
    commit: () => settle((callback) => connection.commit(callback)),
    rollback: () => settle((callback) => connection.rollback(callback)),
    end: () => settle((callback) => connection.end(callback)),
  };
}
