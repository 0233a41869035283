import { randomUUID } from 'crypto';
import { NewUser, User } from '../../domain/users/user.js';
import { argon2Hasher, PasswordHasher } from '../../domain/users/password.js';
import { UserStore } from '../../application/userStore.js';
import { ConflictError } from '../../application/errors.js';

/**
 * Process-local store used when no DATABASE_URL is configured, and by tests.
 * Mirrors PgUserStore: usernames are unique and passwords are kept hashed.
 */
export class InMemoryUserStore implements UserStore {
  private readonly users = new Map<string, User>();

  constructor(
    private readonly hasher: PasswordHasher = argon2Hasher,
    private readonly generateId: () => string = randomUUID
  ) {}

  async save(user: NewUser): Promise<User> {
    const passwordHash = await this.hasher.hash(user.password);

    // check and insert without an await in between
    if (this.lookupByUsername(user.username)) {
      throw new ConflictError(`Username ${user.username} is already taken`);
    }

    const saved: User = {
      id: this.generateId(),
      username: user.username,
      password: passwordHash,
    };
    this.users.set(saved.id, saved);
    return saved;
  }

  async findById(id: string): Promise<User | null> {
    return this.users.get(id) ?? null;
  }

  async findByUsername(username: string): Promise<User | null> {
    return this.lookupByUsername(username);
  }

  async findByCredentials(username: string, password: string): Promise<User | null> {
    const user = await this.findByUsername(username);
    if (!user) {
      return null;
    }

    const matches = await this.hasher.verify(password, user.password);
    return matches ? user : null;
  }

  async ping(): Promise<void> {}

  private lookupByUsername(username: string): User | null {
    for (const user of this.users.values()) {
      if (user.username === username) {
        return user;
      }
    }
    return null;
  }
}
