/**
 * Request Context
 *
 * Per-request fields read by the logger and route handlers:
 * - requestId: correlation id, taken from X-Request-Id or generated
 * - identity: set by the bearer token middleware
 */

import { randomUUID } from 'crypto';
import type { NextFunction, Request, Response } from 'express';
import type { Identity } from '../../shared/types';

declare global {
  namespace Express {
    interface Request {
      identity?: Identity;
      requestId?: string;
    }
  }
}

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{1,64}$/;

export function assignRequestId(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.get('x-request-id');
  req.requestId = incoming && REQUEST_ID_PATTERN.test(incoming) ? incoming : randomUUID();
  res.setHeader('X-Request-Id', req.requestId);
  next();
}
