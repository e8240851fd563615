import { Request, RequestHandler, Response } from 'express';
import { createLogger } from '../log';
import { NotFoundError, StoreUnavailableError, ValidationError } from '../store/errors';

const logger = createLogger('http');

export type HttpError = {
  status: number;
  message: string;
};

/**
 * Maps an error onto the status and message sent to the client; unexpected errors
 * are reported as a generic 500
 */
export function toHttpError(error: unknown): HttpError {
  if (error instanceof ValidationError) {
    return { status: 400, message: error.message };
  }
  if (error instanceof NotFoundError) {
    return { status: 404, message: error.message };
  }
  if (error instanceof StoreUnavailableError) {
    return { status: 503, message: 'Store unavailable, try again later' };
  }
  return { status: 500, message: 'Internal server error' };
}

/**
 * Wraps a handler returning JSON-able data into an Express route handler
 */
export function respond<T>(handler: (request: Request) => Promise<T>): RequestHandler {
  return async (req: Request, res: Response) => {
    try {
      res.json(await handler(req));
    } catch (e) {
      const { status, message } = toHttpError(e);
      if (status >= 500) {
        logger.err(`${req.method} ${req.path} failed`, { error: e });
      }
      res.status(status).json({ message });
    }
  };
}
