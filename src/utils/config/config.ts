import { isValidTimezone } from '../date/date';
import { isLogLevel, LogLevel } from '../log';
import { DEFAULT_RETENTION_DAYS } from '../recurrence/purge';

export type StoreDriver = 'mysql' | 'memory';

export type MysqlSettings = {
  host?: string;
  user?: string;
  password?: string;
  database?: string;
  lockTimeoutSeconds: number;
};

export type LedgerConfig = {
  port: number;
  jwtSecret: string;
  timezone: string;
  retentionDays: number;
  /** Minutes between timer runs; 0 leaves the timer off */
  schedulerIntervalMinutes: number;
  storeDriver: StoreDriver;
  mysql: MysqlSettings;
  logLevel: LogLevel;
};

type Env = Record<string, string | undefined>;

function readInteger(env: Env, name: string, fallback: number, minimum: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < minimum) {
    throw new Error(`${name} must be an integer >= ${minimum}, got '${raw}'`);
  }
  return value;
}

function readStoreDriver(env: Env): StoreDriver {
  const raw = env.STORE_DRIVER ?? 'mysql';
  if (raw !== 'mysql' && raw !== 'memory') {
    throw new Error(`STORE_DRIVER must be 'mysql' or 'memory', got '${raw}'`);
  }
  return raw;
}

/**
 * Reads server settings from the environment, failing fast on anything malformed
 *
 * @param env - Variables to read; `process.env` once `dotenv/config` has filled it
 */
export function loadConfig(env: Env = process.env): LedgerConfig {
  const jwtSecret = env.JWT_SECRET;
  if (!jwtSecret) {
    throw new Error('JWT_SECRET is required');
  }

  const timezone = env.LEDGER_TIMEZONE || 'UTC';
  if (!isValidTimezone(timezone)) {
    throw new Error(`LEDGER_TIMEZONE '${timezone}' is not a known timezone`);
  }

  const logLevel = env.LOG_LEVEL || LogLevel.LOG;
  if (!isLogLevel(logLevel)) {
    throw new Error(`LOG_LEVEL must be one of ${Object.values(LogLevel).join(', ')}, got '${logLevel}'`);
  }

  return {
    port: readInteger(env, 'PORT', 5002, 1),
    jwtSecret,
    timezone,
    retentionDays: readInteger(env, 'RETENTION_DAYS', DEFAULT_RETENTION_DAYS, 0),
    schedulerIntervalMinutes: readInteger(env, 'SCHEDULER_INTERVAL_MINUTES', 0, 0),
    storeDriver: readStoreDriver(env),
    mysql: {
      host: env.MYSQL_HOST,
      user: env.MYSQL_USERNAME,
      password: env.MYSQL_PASSWORD,
      database: env.MYSQL_DATABASE,
      lockTimeoutSeconds: readInteger(env, 'MYSQL_LOCK_TIMEOUT_SECONDS', 10, 0),
    },
    logLevel,
  };
}
