import { Request } from 'express';
import { z, ZodType, ZodTypeDef } from 'zod';
import { DateString } from '../date/types';
import { isDateString } from '../date/date';
import { DateRange } from '../store/types';
import { ValidationError } from '../store/errors';

/**
 * Id of the authenticated caller, set by the token middleware
 */
export function getUserId(request: Request): number {
  if (request.userId === undefined) {
    throw new ValidationError('Missing authenticated user');
  }
  return request.userId;
}

/**
 * Reads a positive integer route parameter such as `:ruleId`
 */
export function getIdParam(request: Request, name: string): number {
  const raw = request.params[name];
  const id = Number(raw);
  if (!raw || !Number.isInteger(id) || id < 1) {
    throw new ValidationError(`Invalid ${name} '${raw ?? ''}'`);
  }
  return id;
}

/**
 * Reads an optional `YYYY-MM-DD` query parameter
 */
export function getDateQuery(request: Request, name: string): DateString | null {
  const raw = request.query[name];
  if (raw === undefined || raw === '') {
    return null;
  }
  if (typeof raw !== 'string' || !isDateString(raw)) {
    throw new ValidationError(`Invalid ${name}, expected YYYY-MM-DD`);
  }
  return raw;
}

/**
 * Extracts the optional `startDate`/`endDate` filter from the query string
 */
export function getDateRange(request: Request): DateRange {
  const startDate = getDateQuery(request, 'startDate');
  const endDate = getDateQuery(request, 'endDate');
  if (startDate && endDate && startDate > endDate) {
    throw new ValidationError('startDate must not be after endDate');
  }
  return { startDate, endDate };
}

/**
 * Validates a request body against `schema`, joining every issue into one message
 */
export function parseBody<Output, Input>(schema: ZodType<Output, ZodTypeDef, Input>, body: unknown): Output {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new ValidationError(
      result.error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; '),
    );
  }
  return result.data;
}

/** `YYYY-MM-DD` that is also a real calendar day */
export const dateStringSchema = z
  .string()
  .refine((value): value is DateString => isDateString(value), 'Expected a YYYY-MM-DD date');
