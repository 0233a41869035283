import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { ConflictError } from '../../../application/errors.js';
import { statusNameOf } from '../../../application/httpStatus.js';
import { sendError } from '../respond.js';

/**
 * Client errors raised by express.json() (http-errors): too large, bad charset,
 * bad encoding, unparsable body.
 */
interface ExposedClientError extends Error {
  status: number;
  expose: true;
  type?: string;
}

function isExposedClientError(err: Error): err is ExposedClientError {
  return (
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500 &&
    'expose' in err &&
    err.expose === true
  );
}

/**
 * Last middleware in the chain. Every error leaves as an ApiResponse envelope.
 */
export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof ZodError) {
    sendError(res, 'BAD_REQUEST', 'Validation failed', {
      issues: err.errors.map((e) => ({
        path: e.path.join('.'),
        message: e.message,
      })),
    });
    return;
  }

  if (isExposedClientError(err)) {
    if (err.type === 'entity.parse.failed') {
      sendError(res, 'BAD_REQUEST', 'Malformed JSON body');
      return;
    }
    sendError(res, statusNameOf(err.status) ?? 'BAD_REQUEST', err.message);
    return;
  }

  if (err instanceof ConflictError) {
    sendError(res, 'CONFLICT', err.message);
    return;
  }

  console.error('Error:', err);
  sendError(res, 'INTERNAL_SERVER_ERROR', 'Internal server error');
}
