import { describe, it, expect, vi } from 'vitest';
import { toErrorResponse } from '../../../src/api/errorHandler.js';
import {
  AlreadyDecidedError,
  ScanInProgressError,
  StaleVersionError,
  ValidationError,
} from '../../../src/domain/errors.js';

vi.mock('../../../src/infra/logger.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../src/infra/logger.js')>()),
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

const PRODUCTION = { NODE_ENV: 'production' } as const;

describe('toErrorResponse', () => {
  it('should name the approval request a decision conflicted on', () => {
    expect(toErrorResponse(new AlreadyDecidedError('req-1', 'approved'), PRODUCTION)).toEqual({
      status: 409,
      body: {
        error: 'ALREADY_DECIDED',
        message: 'Approval request req-1 was already approved',
        retryable: false,
        requestId: 'req-1',
        details: { requestId: 'req-1', status: 'approved' },
      },
    });
  });

  it('should mark a stale device commit as retryable and name the device', () => {
    expect(toErrorResponse(new StaleVersionError('DEV-1', 3, 4), PRODUCTION)).toEqual({
      status: 409,
      body: {
        error: 'STALE_VERSION',
        message: 'Device DEV-1 changed concurrently (expected version 3, found 4)',
        retryable: true,
        deviceId: 'DEV-1',
        details: { deviceId: 'DEV-1', expectedVersion: 3, actualVersion: 4 },
      },
    });
  });

  it('should answer a scan request during a running pass without details', () => {
    const { status, body } = toErrorResponse(new ScanInProgressError(), PRODUCTION);

    expect(status).toBe(409);
    expect(body).toEqual({
      error: 'SCAN_IN_PROGRESS',
      message: 'A scan pass is already running',
      retryable: true,
    });
    expect('details' in body).toBe(false);
  });

  it('should redact secrets in details', () => {
    const { body } = toErrorResponse(
      new ValidationError('Invalid webhook settings', { token: 'test-secret' }),
      PRODUCTION
    );

    expect(body.details).toEqual({ token: '***REDACTED***' });
  });

  it('should hide unexpected error messages outside development', () => {
    const error = new Error('disk I/O error');

    expect(toErrorResponse(error, PRODUCTION)).toEqual({
      status: 500,
      body: {
        error: 'INTERNAL_SERVER_ERROR',
        message: 'An unexpected error occurred',
        retryable: false,
      },
    });
    expect(toErrorResponse(error, { NODE_ENV: 'development' }).body.message).toBe('disk I/O error');
  });

  it('should report an unparsable request body', () => {
    const error = Object.assign(new SyntaxError('Unexpected token } in JSON'), { body: '{"verdict":}' });

    expect(toErrorResponse(error, PRODUCTION)).toEqual({
      status: 400,
      body: { error: 'INVALID_JSON', message: 'Invalid JSON in request body', retryable: false },
    });
  });
});
