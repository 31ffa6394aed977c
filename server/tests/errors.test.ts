/**
 * Error Taxonomy Tests
 */

import { describe, it, expect } from '@jest/globals';
import {
  ForbiddenError,
  InvalidArgumentError,
  NoOpTransitionError,
  NotFoundError,
  QuoteDeskError,
  UnauthenticatedError,
  isQuoteDeskError,
  toHttpError,
} from '../errors';

describe('QuoteDeskError subclasses', () => {
  it('carry code and status', () => {
    expect(toHttpError(new NotFoundError('Company'))).toEqual({ status: 404, message: 'Company not found', code: 'NOT_FOUND' });
    expect(toHttpError(new ForbiddenError())).toEqual({ status: 403, message: 'Access denied', code: 'FORBIDDEN' });
    expect(toHttpError(new UnauthenticatedError())).toEqual({
      status: 401,
      message: 'Authentication required',
      code: 'UNAUTHENTICATED',
    });
    expect(toHttpError(new NoOpTransitionError('draft'))).toEqual({
      status: 400,
      message: 'Quote is already in draft status',
      code: 'NO_OP_TRANSITION',
    });
  });

  it('keep instanceof working through the hierarchy', () => {
    const error = new NoOpTransitionError('sent');
    expect(error).toBeInstanceOf(InvalidArgumentError);
    expect(error).toBeInstanceOf(QuoteDeskError);
    expect(isQuoteDeskError(error)).toBe(true);
    expect(error.name).toBe('NoOpTransitionError');
  });

  it('never leaks the message of an unknown error', () => {
    expect(toHttpError(new Error('relation "quotes" does not exist'), 'Failed to update quote')).toEqual({
      status: 500,
      message: 'Failed to update quote',
    });
    expect(isQuoteDeskError('nope')).toBe(false);
  });
});
