import type { FailureReason } from '../types.js';

export class HttpError extends Error {
  readonly status: number;
  readonly details?: unknown;

  constructor(status: number, message: string, details?: unknown) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
    this.details = details;
  }
}

export class ValidationError extends HttpError {
  constructor(message: string, details?: unknown) {
    super(400, message, details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends HttpError {
  constructor(message: string) {
    super(404, message);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends HttpError {
  readonly reason: FailureReason;

  constructor(reason: FailureReason, message: string) {
    super(409, message, { reason });
    this.name = 'ConflictError';
    this.reason = reason;
  }
}

/**
 * Stored state breaks an invariant the service cannot repair on its own
 * (for example zero or several current hunts). Needs an operator.
 */
export class IntegrityError extends HttpError {
  constructor(message: string, details?: unknown) {
    super(500, message, details);
    this.name = 'IntegrityError';
  }
}

export function isHttpError(error: unknown): error is HttpError {
  return error instanceof HttpError;
}

export function isConflict(error: unknown, reason?: FailureReason): error is ConflictError {
  return error instanceof ConflictError && (reason === undefined || error.reason === reason);
}
