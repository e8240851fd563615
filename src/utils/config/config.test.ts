import { describe, it, expect } from 'vitest';
import { loadConfig } from './config';
import { LogLevel } from '../log';

describe('loadConfig', () => {
  it('should apply defaults when only the secret is set', () => {
    expect(loadConfig({ JWT_SECRET: 'test-secret' })).toEqual({
      port: 5002,
      jwtSecret: 'test-secret',
      timezone: 'UTC',
      retentionDays: 30,
      schedulerIntervalMinutes: 0,
      storeDriver: 'mysql',
      mysql: {
        host: undefined,
        user: undefined,
        password: undefined,
        database: undefined,
        lockTimeoutSeconds: 10,
      },
      logLevel: LogLevel.LOG,
    });
  });

  it('should read every setting', () => {
    const config = loadConfig({
      PORT: '8080',
      JWT_SECRET: 'test-secret',
      LEDGER_TIMEZONE: 'Europe/London',
      RETENTION_DAYS: '7',
      SCHEDULER_INTERVAL_MINUTES: '60',
      STORE_DRIVER: 'memory',
      MYSQL_HOST: 'db',
      MYSQL_USERNAME: 'ledger',
      MYSQL_PASSWORD: 'test-password',
      MYSQL_DATABASE: 'ledger',
      MYSQL_LOCK_TIMEOUT_SECONDS: '2',
      LOG_LEVEL: 'DEBUG',
    });

    expect(config.port).toBe(8080);
    expect(config.timezone).toBe('Europe/London');
    expect(config.retentionDays).toBe(7);
    expect(config.schedulerIntervalMinutes).toBe(60);
    expect(config.storeDriver).toBe('memory');
    expect(config.mysql).toEqual({
      host: 'db',
      user: 'ledger',
      password: 'test-password',
      database: 'ledger',
      lockTimeoutSeconds: 2,
    });
    expect(config.logLevel).toBe(LogLevel.DEBUG);
  });

  it('should require a secret', () => {
    expect(() => loadConfig({})).toThrow('JWT_SECRET is required');
  });

  it('should reject malformed numbers', () => {
    expect(() => loadConfig({ JWT_SECRET: 'test-secret', RETENTION_DAYS: 'thirty' })).toThrow(
      "RETENTION_DAYS must be an integer >= 0, got 'thirty'",
    );
    expect(() => loadConfig({ JWT_SECRET: 'test-secret', PORT: '0' })).toThrow("PORT must be an integer >= 1, got '0'");
    expect(() => loadConfig({ JWT_SECRET: 'test-secret', SCHEDULER_INTERVAL_MINUTES: '1.5' })).toThrow(
      'SCHEDULER_INTERVAL_MINUTES',
    );
  });

  it('should reject unknown timezones, drivers and levels', () => {
    expect(() => loadConfig({ JWT_SECRET: 'test-secret', LEDGER_TIMEZONE: 'Mars/Olympus_Mons' })).toThrow(
      "LEDGER_TIMEZONE 'Mars/Olympus_Mons' is not a known timezone",
    );
    expect(() => loadConfig({ JWT_SECRET: 'test-secret', STORE_DRIVER: 'sqlite' })).toThrow(
      "STORE_DRIVER must be 'mysql' or 'memory', got 'sqlite'",
    );
    expect(() => loadConfig({ JWT_SECRET: 'test-secret', LOG_LEVEL: 'TRACE' })).toThrow(
      "LOG_LEVEL must be one of DEBUG, LOG, WARN, ERROR, got 'TRACE'",
    );
  });
});
