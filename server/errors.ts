/**
 * Quote Desk Error Taxonomy
 *
 * Errors raised by the service layer. Each carries a stable code and the HTTP
 * status the route layer answers with. Per-item bulk failures are not errors:
 * they are returned in the bulk result's `failed` list.
 */

export type QuoteDeskErrorCode = 'NOT_FOUND' | 'FORBIDDEN' | 'INVALID_ARGUMENT' | 'NO_OP_TRANSITION' | 'TERMINAL_STATE' | 'UNAUTHENTICATED';

export class QuoteDeskError extends Error {
  constructor(
    message: string,
    public readonly code: QuoteDeskErrorCode,
    public readonly httpStatus: number
  ) {
    super(message);
    this.name = 'QuoteDeskError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NotFoundError extends QuoteDeskError {
  constructor(resource: string = 'Quote') {
    super(`${resource} not found`, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

/**
 * No valid identity on the request
 */
export class UnauthenticatedError extends QuoteDeskError {
  constructor(message: string = 'Authentication required') {
    super(message, 'UNAUTHENTICATED', 401);
    this.name = 'UnauthenticatedError';
  }
}

/**
 * Authenticated but not authorized. Never used for a missing identity.
 */
export class ForbiddenError extends QuoteDeskError {
  constructor(message: string = 'Access denied') {
    super(message, 'FORBIDDEN', 403);
    this.name = 'ForbiddenError';
  }
}

export class InvalidArgumentError extends QuoteDeskError {
  constructor(message: string, code: QuoteDeskErrorCode = 'INVALID_ARGUMENT') {
    super(message, code, 400);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Requested status equals the current status
 */
export class NoOpTransitionError extends InvalidArgumentError {
  constructor(status: string) {
    super(`Quote is already in ${status} status`, 'NO_OP_TRANSITION');
    this.name = 'NoOpTransitionError';
  }
}

export function isQuoteDeskError(error: unknown): error is QuoteDeskError {
  return error instanceof QuoteDeskError;
}

/**
 * Maps any thrown value to a status and a message that is safe to return.
 * Unknown errors never leak their message.
 */
export function toHttpError(error: unknown, fallbackMessage: string = 'Internal Server Error'): { status: number; message: string; code?: QuoteDeskErrorCode } {
  if (isQuoteDeskError(error)) {
    return { status: error.httpStatus, message: error.message, code: error.code };
  }
  return { status: 500, message: fallbackMessage };
}
