import { Pool } from 'pg';

let pool: Pool | null = null;

export function getPool(connectionString: string) {
  if (!pool) {
    pool = new Pool({ connectionString });
  }
  return pool;
}

export async function closePool() {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
