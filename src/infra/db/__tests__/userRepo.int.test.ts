import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import { createPool, DbPool } from '../pool.js';
import { runMigrations } from '../migrate.js';
import { PgUserStore } from '../userRepo.js';
import { ConflictError } from '../../../application/errors.js';

const describeDb = process.env.DATABASE_URL ? describe : describe.skip;

describeDb('PgUserStore', () => {
  let pool: DbPool;
  let store: PgUserStore;
  const uniqueUsername = (label: string) =>
    `vitest-${label}-${Date.now()}-${Math.random().toString(16).slice(2)}`;

  beforeAll(async () => {
    pool = createPool(process.env.DATABASE_URL ?? '');
    await runMigrations(pool);
    store = new PgUserStore(pool);
  });

  afterEach(async () => {
    await pool.query("DELETE FROM users WHERE username LIKE 'vitest-%'");
  });

  afterAll(async () => {
    await pool.end();
  });

  it('saves a user with a generated uuid and hashed password', async () => {
    const username = uniqueUsername('save');
    const saved = await store.save({ username, password: 'testPass' });

    expect(saved.username).toBe(username);
    expect(saved.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(saved.password).not.toBe('testPass');
    await expect(store.findById(saved.id)).resolves.toEqual(saved);
  });

  it('returns null for ids that are not uuids', async () => {
    await expect(store.findById('1234')).resolves.toBeNull();
  });

  it('maps duplicate usernames to ConflictError', async () => {
    const username = uniqueUsername('dup');
    await store.save({ username, password: 'testPass' });

    await expect(store.save({ username, password: 'testPass' })).rejects.toBeInstanceOf(
      ConflictError
    );
  });

  it('matches credentials against the stored hash', async () => {
    const username = uniqueUsername('login');
    const saved = await store.save({ username, password: 'testPass' });

    await expect(store.findByCredentials(username, 'testPass')).resolves.toEqual(saved);
    await expect(store.findByCredentials(username, 'wrongPass')).resolves.toBeNull();
  });

  it('answers ping', async () => {
    await expect(store.ping()).resolves.toBeUndefined();
  });
});
