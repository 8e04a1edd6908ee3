/**
 * Application error types
 * Each error type maps to a specific HTTP status code and client action
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Device directory could not be read: missing, permission denied,
 * network share unreachable or enumeration timed out (503)
 */
export class PathUnavailableError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'PATH_UNAVAILABLE', 503, details);
  }
}

/**
 * Filesystem entry with an unexpected shape (500)
 */
export class MalformedSnapshotError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'MALFORMED_SNAPSHOT', 500, details);
  }
}

/**
 * Optimistic concurrency conflict on a device record (409, retryable)
 */
export class StaleVersionError extends AppError {
  constructor(
    public readonly deviceId: string,
    public readonly expectedVersion: number,
    public readonly actualVersion: number | null
  ) {
    super(
      `Device ${deviceId} changed concurrently (expected version ${expectedVersion}, found ${
        actualVersion ?? 'none'
      })`,
      'STALE_VERSION',
      409,
      { deviceId, expectedVersion, actualVersion }
    );
  }
}

export class UnknownRequestError extends AppError {
  constructor(requestId: string) {
    super(`Approval request ${requestId} not found`, 'UNKNOWN_REQUEST', 404, { requestId });
  }
}

export class AlreadyDecidedError extends AppError {
  constructor(requestId: string, status: string) {
    super(`Approval request ${requestId} was already ${status}`, 'ALREADY_DECIDED', 409, {
      requestId,
      status,
    });
  }
}

/**
 * State conflicts such as a second pending request for one device (409)
 */
export class ConflictError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFLICT', 409, details);
  }
}

/**
 * Invalid thresholds, unreadable configuration or unknown device reference.
 * Fail fast on startup (500)
 */
export class ConfigurationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', 500, details);
  }
}

export class ScanInProgressError extends AppError {
  constructor() {
    super('A scan pass is already running', 'SCAN_IN_PROGRESS', 409);
  }
}

/**
 * Database operation errors (500 Internal Server Error)
 */
export class DatabaseError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'DATABASE_ERROR', 500, details);
  }
}

/**
 * Validation errors from user input (400 Bad Request)
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

/**
 * Resource not found errors (404 Not Found)
 */
export class NotFoundError extends AppError {
  constructor(resource: string, id: string) {
    super(`${resource} with id ${id} not found`, 'NOT_FOUND', 404, { resource, id });
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
