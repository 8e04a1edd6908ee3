import type { Request, Response, NextFunction } from 'express';
import { isAppError } from '../domain/errors.js';
import { logger, redactSecrets } from '../infra/logger.js';
import type { Env } from '../infra/env.js';

/**
 * Failures that clear up on their own: a concurrent commit, a scan pass that
 * is still running, a device share that is offline.
 */
const RETRYABLE_CODES: ReadonlySet<string> = new Set([
  'STALE_VERSION',
  'SCAN_IN_PROGRESS',
  'PATH_UNAVAILABLE',
]);

export type ErrorBody = {
  error: string;
  message: string;
  retryable: boolean;
  deviceId?: string;
  requestId?: string;
  details?: unknown;
};

export type ErrorResponse = {
  status: number;
  body: ErrorBody;
};

function stringField(details: unknown, key: 'deviceId' | 'requestId'): string | undefined {
  if (typeof details !== 'object' || details === null) {
    return undefined;
  }
  const value: unknown = Reflect.get(details, key);
  return typeof value === 'string' ? value : undefined;
}

function isBodyParseError(err: Error): boolean {
  return err.name === 'SyntaxError' && 'body' in err;
}

/**
 * Maps a thrown error to the status and JSON body the API answers with.
 * The device or approval request an error concerns is lifted to the top level
 * so clients can route the failure without reading `details`.
 */
export function toErrorResponse(err: Error, env: Pick<Env, 'NODE_ENV'>): ErrorResponse {
  if (isAppError(err)) {
    const deviceId = stringField(err.details, 'deviceId');
    const requestId = stringField(err.details, 'requestId');
    return {
      status: err.statusCode,
      body: {
        error: err.code,
        message: err.message,
        retryable: RETRYABLE_CODES.has(err.code),
        ...(deviceId ? { deviceId } : {}),
        ...(requestId ? { requestId } : {}),
        ...(err.details ? { details: redactSecrets(err.details) } : {}),
      },
    };
  }

  if (isBodyParseError(err)) {
    return {
      status: 400,
      body: { error: 'INVALID_JSON', message: 'Invalid JSON in request body', retryable: false },
    };
  }

  return {
    status: 500,
    body: {
      error: 'INTERNAL_SERVER_ERROR',
      message: env.NODE_ENV === 'development' ? err.message : 'An unexpected error occurred',
      retryable: false,
    },
  };
}

export function createErrorHandler(env: Pick<Env, 'NODE_ENV'>) {
  return (err: Error, req: Request, res: Response, _next: NextFunction): void => {
    const { status, body } = toErrorResponse(err, env);
    const context = {
      method: req.method,
      path: req.path,
      code: body.error,
      deviceId: body.deviceId,
      requestId: body.requestId,
    };

    if (status >= 500) {
      logger.error(isAppError(err) ? 'Request failed' : 'Unexpected error', {
        ...context,
        message: err.message,
        details: body.details,
        stack: err.stack,
      });
    } else {
      // Rejected decisions and stale commits are routine for an approval queue
      logger.warn('Request rejected', { ...context, message: err.message });
    }

    res.status(status).json(body);
  };
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: 'NOT_FOUND',
    message: `No route for ${req.method} ${req.path}`,
    retryable: false,
  });
}
