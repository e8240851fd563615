/**
 * The store could not be reached, or the exclusive run lock could not be taken.
 * Aborts the unit of work; nothing it did is committed.
 */
export class StoreUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreUnavailableError';
  }
}

/**
 * A rule already has an occurrence on this date.
 */
export class DuplicateOccurrenceError extends Error {
  readonly ruleId: number;
  readonly date: string;

  constructor(ruleId: number, date: string, options?: { cause?: unknown }) {
    super(`Rule ${ruleId} already has an occurrence on ${date}`, options);
    this.name = 'DuplicateOccurrenceError';
    this.ruleId = ruleId;
    this.date = date;
  }
}

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}
