import { ApiResponse } from '../apiResponse.js';
import { User } from '../../domain/users/user.js';

export type UserData = { user: User };

export type UserFailureKind = 'invalid_credentials' | 'not_found' | 'unauthorized';

export interface UserFailure {
  kind: UserFailureKind;
  message: string;
}

/**
 * Result of one user service operation. Failures carry the message the
 * caller sees; the HTTP layer picks the status from `kind`.
 */
export type UserOutcome =
  | { kind: 'success'; response: ApiResponse<UserData> }
  | UserFailure;

export function succeeded(response: ApiResponse<UserData>): UserOutcome {
  return { kind: 'success', response };
}

export function failed(kind: UserFailureKind, message: string): UserOutcome {
  return { kind, message };
}
