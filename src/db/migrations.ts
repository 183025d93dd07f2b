import { Pool } from 'pg';
import { logger } from '../utils/logger';

const TABLES: Array<{ name: string; ddl: string }> = [
  {
    name: 'grid_levels',
    ddl: `CREATE TABLE grid_levels (
      id SERIAL PRIMARY KEY,
      symbol TEXT NOT NULL,
      level_index INTEGER NOT NULL,
      side TEXT NOT NULL,
      amount NUMERIC NOT NULL,
      price NUMERIC NOT NULL,
      order_ref TEXT,
      status TEXT NOT NULL DEFAULT 'pending',
      pinned BOOLEAN NOT NULL DEFAULT FALSE,
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );`,
  },
  {
    name: 'grid_fills',
    ddl: `CREATE TABLE grid_fills (
      id SERIAL PRIMARY KEY,
      symbol TEXT NOT NULL,
      level_index INTEGER NOT NULL,
      side TEXT NOT NULL,
      price NUMERIC NOT NULL,
      amount NUMERIC NOT NULL,
      order_ref TEXT,
      filled_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );`,
  },
];

const INDEX_QUERIES: string[] = [`CREATE INDEX IF NOT EXISTS idx_grid_fills_symbol ON grid_fills(symbol);`];

// earlier ledgers lacked these columns, stored raw venue statuses and had no uniqueness constraint
const LEGACY_COLUMNS: Array<{ column: string; ddl: string }> = [
  { column: 'order_ref', ddl: `ALTER TABLE grid_levels ADD COLUMN order_ref TEXT` },
  { column: 'pinned', ddl: `ALTER TABLE grid_levels ADD COLUMN pinned BOOLEAN NOT NULL DEFAULT FALSE` },
  { column: 'updated_at', ddl: `ALTER TABLE grid_levels ADD COLUMN updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()` },
];

const LEGACY_QUERIES: string[] = [
  `UPDATE grid_levels SET side = LOWER(side) WHERE side <> LOWER(side)`,
  `UPDATE grid_levels SET status = 'filled' WHERE status = 'closed'`,
  `UPDATE grid_levels SET status = 'cancelled' WHERE status IN ('canceled', 'expired', 'rejected')`,
  `UPDATE grid_levels SET status = 'active' WHERE status = 'open'`,
];

async function tableExists(pool: Pool, table: string) {
  const res = await pool.query(`SELECT table_name FROM information_schema.tables WHERE table_name = $1`, [table]);
  return res.rows.length > 0;
}

async function columnExists(pool: Pool, table: string, column: string) {
  const res = await pool.query(
    `SELECT column_name FROM information_schema.columns WHERE table_name = $1 AND column_name = $2`,
    [table, column]
  );
  return res.rows.length > 0;
}

const UNIQUE_IDENTITY_INDEX = `CREATE UNIQUE INDEX IF NOT EXISTS uq_grid_levels_identity ON grid_levels (symbol, level_index, side)`;

interface IdentityRow {
  id: number;
  symbol: string;
  level_index: number;
  side: string;
}

/**
 * Keeps the most recently written row per (symbol, level_index, side) and
 * deletes the rest. Must run before the unique index can be created.
 */
export async function compactLevelDuplicates(pool: Pool) {
  const res = await pool.query<IdentityRow>(
    `SELECT id, symbol, level_index, side
     FROM grid_levels
     ORDER BY updated_at DESC, id DESC`
  );
  const seen = new Set<string>();
  const stale: number[] = [];
  for (const row of res.rows) {
    const key = `${row.symbol}#${Number(row.level_index)}#${row.side}`;
    if (seen.has(key)) {
      stale.push(Number(row.id));
    } else {
      seen.add(key);
    }
  }
  for (const id of stale) {
    await pool.query(`DELETE FROM grid_levels WHERE id = $1`, [id]);
  }
  if (stale.length > 0) {
    logger.warn('ledger_duplicates_compacted', {
      event: 'ledger_duplicates_compacted',
      removed: stale.length,
      identities: seen.size,
    });
  }
  return stale.length;
}

const ranPools = new WeakSet<Pool>();

export async function runMigrations(pool: Pool) {
  if (ranPools.has(pool)) return;
  for (const table of TABLES) {
    if (!(await tableExists(pool, table.name))) {
      await pool.query(table.ddl);
    }
  }
  for (const query of INDEX_QUERIES) {
    await pool.query(query);
  }
  for (const legacy of LEGACY_COLUMNS) {
    if (!(await columnExists(pool, 'grid_levels', legacy.column))) {
      logger.info('ledger_column_added', { event: 'ledger_column_added', column: legacy.column });
      await pool.query(legacy.ddl);
    }
  }
  for (const query of LEGACY_QUERIES) {
    await pool.query(query);
  }
  await compactLevelDuplicates(pool);
  await pool.query(UNIQUE_IDENTITY_INDEX);
  ranPools.add(pool);
}
