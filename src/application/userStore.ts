import { NewUser, User } from '../domain/users/user.js';

/**
 * Persistence the user service delegates to. Implementations own id
 * assignment and the password-match policy.
 */
export interface UserStore {
  save(user: NewUser): Promise<User>;
  findById(id: string): Promise<User | null>;
  findByUsername(username: string): Promise<User | null>;
  findByCredentials(username: string, password: string): Promise<User | null>;
  /** Resolves when the backing store is reachable. */
  ping(): Promise<void>;
}
