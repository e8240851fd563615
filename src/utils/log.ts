export enum LogLevel {
  DEBUG = 'DEBUG',
  LOG = 'LOG',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.LOG]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

export type ExtraInformation = Record<string, unknown>;

export interface Logger {
  debug(message: string, extraInformation?: ExtraInformation): void;
  log(message: string, extraInformation?: ExtraInformation): void;
  warn(message: string, extraInformation?: ExtraInformation): void;
  err(message: string, extraInformation?: ExtraInformation): void;
}

let minimumLevel: LogLevel = LogLevel.LOG;

export function setLogLevel(level: LogLevel) {
  minimumLevel = level;
}

export function getLogLevel(): LogLevel {
  return minimumLevel;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.values<string>(LogLevel).includes(value);
}

function formatValue(value: unknown): string {
  if (value instanceof Error) {
    return value.message;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'object' && value !== null) {
    return JSON.stringify(value);
  }
  return String(value);
}

function formatExtraInformation(extraInformation: ExtraInformation): string {
  return Object.entries(extraInformation)
    .map(([key, value]) => `${key}: ${formatValue(value)}`)
    .join(' | ');
}

/**
 * Builds a single log line: `LEVEL | scope | message | key: value | ...`
 */
export function formatLogLine(
  level: LogLevel,
  scope: string,
  message: string,
  extraInformation?: ExtraInformation,
): string {
  const parts: string[] = [level, scope, message];
  if (extraInformation && Object.keys(extraInformation).length > 0) {
    parts.push(formatExtraInformation(extraInformation));
  }
  return parts.join(' | ');
}

function logMessage(level: LogLevel, scope: string, message: string, extraInformation?: ExtraInformation): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel]) {
    return;
  }

  const fullOutput = formatLogLine(level, scope, message, extraInformation);

  switch (level) {
    case LogLevel.DEBUG:
      console.debug(fullOutput);
      break;
    case LogLevel.LOG:
      console.log(fullOutput);
      break;
    case LogLevel.WARN:
      console.warn(fullOutput);
      break;
    case LogLevel.ERROR:
      console.error(fullOutput);
      break;
  }
}

/**
 * Creates a logger whose lines are tagged with `scope`
 *
 * @param scope - Short name of the emitting module (e.g. `recurrence`)
 *
 * @example
 * ```typescript
 * const logger = createLogger('recurrence');
 * logger.log('run finished', { processed: 3 });
 * // LOG | recurrence | run finished | processed: 3
 * ```
 */
export function createLogger(scope: string): Logger {
  return {
    debug: (message, extraInformation) => logMessage(LogLevel.DEBUG, scope, message, extraInformation),
    log: (message, extraInformation) => logMessage(LogLevel.LOG, scope, message, extraInformation),
    warn: (message, extraInformation) => logMessage(LogLevel.WARN, scope, message, extraInformation),
    err: (message, extraInformation) => logMessage(LogLevel.ERROR, scope, message, extraInformation),
  };
}
