import pg from 'pg';
import type { Pool as PgPool } from 'pg';

const { Pool } = pg;

export type DbPool = PgPool;

export function createPool(connectionString: string): DbPool {
  const pool = new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('error', (err) => {
    console.error('Unexpected database error:', err);
  });

  return pool;
}
