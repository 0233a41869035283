import pg from 'pg';
import { z } from 'zod';
import { DbPool } from './pool.js';
import { NewUser, User } from '../../domain/users/user.js';
import { argon2Hasher, PasswordHasher } from '../../domain/users/password.js';
import { UserStore } from '../../application/userStore.js';
import { ConflictError } from '../../application/errors.js';

type UserRow = {
  id: string;
  username: string;
  password_hash: string;
};

const UNIQUE_VIOLATION = '23505';

const uuidSchema = z.string().uuid();

function toUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    password: row.password_hash,
  };
}

export class PgUserStore implements UserStore {
  constructor(
    private readonly pool: DbPool,
    private readonly hasher: PasswordHasher = argon2Hasher
  ) {}

  async save(user: NewUser): Promise<User> {
    const passwordHash = await this.hasher.hash(user.password);

    try {
      const result = await this.pool.query<UserRow>(
        `INSERT INTO users (username, password_hash)
         VALUES ($1, $2)
         RETURNING id, username, password_hash`,
        [user.username, passwordHash]
      );
      return toUser(result.rows[0]);
    } catch (error) {
      if (error instanceof pg.DatabaseError && error.code === UNIQUE_VIOLATION) {
        throw new ConflictError(`Username ${user.username} is already taken`);
      }
      throw error;
    }
  }

  async findById(id: string): Promise<User | null> {
    // ids are uuids; anything else cannot match and would make pg raise 22P02
    if (!uuidSchema.safeParse(id).success) {
      return null;
    }

    const result = await this.pool.query<UserRow>(
      'SELECT id, username, password_hash FROM users WHERE id = $1',
      [id]
    );

    if (result.rows.length === 0) {
      return null;
    }
    return toUser(result.rows[0]);
  }

  async findByUsername(username: string): Promise<User | null> {
    const result = await this.pool.query<UserRow>(
      'SELECT id, username, password_hash FROM users WHERE username = $1',
      [username]
    );

    if (result.rows.length === 0) {
      return null;
    }
    return toUser(result.rows[0]);
  }

  async findByCredentials(username: string, password: string): Promise<User | null> {
    const user = await this.findByUsername(username);
    if (!user) {
      return null;
    }

    const matches = await this.hasher.verify(password, user.password);
    return matches ? user : null;
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }
}
