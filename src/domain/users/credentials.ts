export type CredentialsCheck =
  | { ok: true; username: string; password: string }
  | { ok: false; reason: 'MISSING_USERNAME' | 'MISSING_PASSWORD' };

/**
 * Presence check only: both fields must be non-null and non-blank.
 * No length or character-set rules apply.
 */
export function validateCredentials(
  username: string | null | undefined,
  password: string | null | undefined
): CredentialsCheck {
  if (username == null || username.trim() === '') {
    return { ok: false, reason: 'MISSING_USERNAME' };
  }
  if (password == null || password.trim() === '') {
    return { ok: false, reason: 'MISSING_PASSWORD' };
  }
  return { ok: true, username, password };
}
