import { describe, it, expect, vi } from 'vitest';
import { Response } from 'express';
import { respond, toHttpError } from './respond';
import { NotFoundError, StoreUnavailableError, ValidationError } from '../store/errors';
import { createMockRequest } from '../test/mockData';

function createMockResponse() {
  const response = { status: vi.fn(), json: vi.fn() };
  response.status.mockReturnValue(response);
  return response;
}

describe('toHttpError', () => {
  it('should map store errors to status codes', () => {
    expect(toHttpError(new ValidationError('amount: Required'))).toEqual({ status: 400, message: 'amount: Required' });
    expect(toHttpError(new NotFoundError('Transaction 4 not found'))).toEqual({
      status: 404,
      message: 'Transaction 4 not found',
    });
    expect(toHttpError(new StoreUnavailableError("Timed out waiting for lock 'ledger_recurrence_run'"))).toEqual({
      status: 503,
      message: 'Store unavailable, try again later',
    });
  });

  it('should hide the details of unexpected errors', () => {
    expect(toHttpError(new RangeError('Interval must be a positive integer, got 0'))).toEqual({
      status: 500,
      message: 'Internal server error',
    });
  });
});

describe('respond', () => {
  it('should send the handler result as JSON', async () => {
    const response = createMockResponse();
    const next = vi.fn();

    await respond(async () => ({ processed: 2 }))(createMockRequest(), response as unknown as Response, next);

    expect(response.json).toHaveBeenCalledWith({ processed: 2 });
    expect(response.status).not.toHaveBeenCalled();
  });

  it('should send mapped errors with their status', async () => {
    const response = createMockResponse();
    const next = vi.fn();
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await respond(async () => {
      throw new Error('socket hang up');
    })(createMockRequest({ method: 'GET', path: '/api/tags' }), response as unknown as Response, next);

    expect(response.status).toHaveBeenCalledWith(500);
    expect(response.json).toHaveBeenCalledWith({ message: 'Internal server error' });
    expect(consoleError).toHaveBeenCalledWith('ERROR | http | GET /api/tags failed | error: socket hang up');
    consoleError.mockRestore();
  });
});
