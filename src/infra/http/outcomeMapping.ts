import type { Response } from 'express';
import { UserFailureKind, UserOutcome } from '../../application/users/outcome.js';
import { HttpStatusName } from '../../application/httpStatus.js';
import { sendEnvelope, sendError } from './respond.js';

export const FAILURE_STATUS: Record<UserFailureKind, HttpStatusName> = {
  invalid_credentials: 'BAD_REQUEST',
  not_found: 'NOT_FOUND',
  unauthorized: 'UNAUTHORIZED',
};

export function sendOutcome(res: Response, outcome: UserOutcome): void {
  if (outcome.kind === 'success') {
    sendEnvelope(res, outcome.response);
    return;
  }
  sendError(res, FAILURE_STATUS[outcome.kind], outcome.message);
}
