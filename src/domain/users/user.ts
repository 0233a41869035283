/**
 * User entity as owned by the store.
 * `password` is whatever the store keeps (a hash for the shipped stores).
 */
export interface User {
  readonly id: string;
  readonly username: string;
  readonly password: string;
}

/**
 * What the service hands to the store; the store assigns the id.
 */
export type NewUser = Omit<User, 'id'>;

/**
 * Inbound create/login payload. Either field may be missing or null on the wire.
 */
export interface UserRequest {
  username?: string | null;
  password?: string | null;
}
