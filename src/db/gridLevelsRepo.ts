import { Pool } from 'pg';
import { PersistenceError } from '../errors';
import {
  compareLevels,
  GridLevel,
  isLevelStatus,
  isOrderSide,
  LevelKey,
  LevelStatus,
} from '../strategies/types';

interface LevelRow {
  symbol: string;
  level_index: number | string;
  side: string;
  amount: number | string;
  price: number | string;
  order_ref: string | null;
  status: string;
  pinned: boolean | null;
  updated_at: Date | string | null;
}

interface CountRow {
  symbol: string;
  status: string;
  level_count: number | string;
}

export interface UpsertOptions {
  /** Keep the incoming status, orderRef and pinned flag instead of resetting to pending. */
  preserveOrder?: boolean;
}

export type StatusCounts = Record<LevelStatus, number>;

export interface SymbolLevelCounts extends StatusCounts {
  symbol: string;
  total: number;
}

function toLevel(row: LevelRow): GridLevel {
  if (!isOrderSide(row.side) || !isLevelStatus(row.status)) {
    throw new PersistenceError('load', {
      cause: `row ${row.symbol}#${row.level_index} has side=${row.side} status=${row.status}`,
    });
  }
  return {
    symbol: row.symbol,
    levelIndex: Number(row.level_index),
    side: row.side,
    price: Number(row.price),
    baseAmount: Number(row.amount),
    orderRef: row.order_ref ?? null,
    status: row.status,
    pinned: row.pinned === true,
    updatedAt: row.updated_at === null ? undefined : new Date(row.updated_at),
  };
}

function emptyCounts(): StatusCounts {
  return { pending: 0, active: 0, filled: 0, cancelled: 0 };
}

/**
 * Durable grid levels keyed by (symbol, level_index, side). Every write is
 * awaited; failures surface as PersistenceError.
 */
export class GridLevelsRepository {
  constructor(private pool: Pool) {}

  async upsertLevel(level: GridLevel, options: UpsertOptions = {}): Promise<GridLevel> {
    const preserve = options.preserveOrder === true;
    const res = await this.run('upsert', () =>
      this.pool.query<LevelRow>(
        `INSERT INTO grid_levels (symbol, level_index, side, amount, price, order_ref, status, pinned, updated_at)
         VALUES ($1,$2,$3,$4,$5,$6,$7,$8,NOW())
         ON CONFLICT (symbol, level_index, side) DO UPDATE
         SET amount = EXCLUDED.amount,
             price = EXCLUDED.price,
             order_ref = EXCLUDED.order_ref,
             status = EXCLUDED.status,
             pinned = EXCLUDED.pinned,
             updated_at = NOW()
         RETURNING *`,
        [
          level.symbol,
          level.levelIndex,
          level.side,
          level.baseAmount,
          level.price,
          preserve ? level.orderRef : null,
          preserve ? level.status : 'pending',
          preserve ? level.pinned : false,
        ]
      )
    );
    const row = res.rows[0];
    if (!row) {
      throw new PersistenceError('upsert', { cause: 'no row returned' });
    }
    return toLevel(row);
  }

  async loadGrids(): Promise<Map<string, GridLevel[]>> {
    const res = await this.run('load', () =>
      this.pool.query<LevelRow>(
        `SELECT symbol, level_index, side, amount, price, order_ref, status, pinned, updated_at
         FROM grid_levels
         ORDER BY symbol, level_index, side`
      )
    );
    const grids = new Map<string, GridLevel[]>();
    for (const row of res.rows) {
      const level = toLevel(row);
      const grid = grids.get(level.symbol) ?? [];
      grid.push(level);
      grids.set(level.symbol, grid);
    }
    for (const grid of grids.values()) {
      grid.sort(compareLevels);
    }
    return grids;
  }

  async updateStatus(symbol: string, levelIndex: number, side: GridLevel['side'], status: LevelStatus) {
    const res = await this.run('update_status', () =>
      this.pool.query(
        `UPDATE grid_levels
         SET status = $4,
             updated_at = NOW()
         WHERE symbol = $1 AND level_index = $2 AND side = $3
         RETURNING id`,
        [symbol, levelIndex, side, status]
      )
    );
    this.assertTouched('update_status', res.rows.length, { symbol, levelIndex, side });
  }

  async updateOrder(
    symbol: string,
    levelIndex: number,
    side: GridLevel['side'],
    price: number,
    orderRef: string | null,
    status: LevelStatus,
    pinned = false
  ) {
    const res = await this.run('update_order', () =>
      this.pool.query(
        `UPDATE grid_levels
         SET price = $4,
             order_ref = $5,
             status = $6,
             pinned = $7,
             updated_at = NOW()
         WHERE symbol = $1 AND level_index = $2 AND side = $3
         RETURNING id`,
        [symbol, levelIndex, side, price, orderRef, status, pinned]
      )
    );
    this.assertTouched('update_order', res.rows.length, { symbol, levelIndex, side });
  }

  async countBySymbol(): Promise<SymbolLevelCounts[]> {
    const res = await this.run('count', () =>
      this.pool.query<CountRow>(
        `SELECT symbol, status, COUNT(*) AS level_count
         FROM grid_levels
         GROUP BY symbol, status
         ORDER BY symbol`
      )
    );
    const bySymbol = new Map<string, SymbolLevelCounts>();
    for (const row of res.rows) {
      const entry = bySymbol.get(row.symbol) ?? { symbol: row.symbol, total: 0, ...emptyCounts() };
      const count = Number(row.level_count);
      if (isLevelStatus(row.status)) {
        entry[row.status] += count;
      }
      entry.total += count;
      bySymbol.set(row.symbol, entry);
    }
    return [...bySymbol.values()];
  }

  async clear(symbol?: string): Promise<number> {
    const res = await this.run('clear', () =>
      symbol === undefined
        ? this.pool.query(`DELETE FROM grid_levels RETURNING id`)
        : this.pool.query(`DELETE FROM grid_levels WHERE symbol = $1 RETURNING id`, [symbol])
    );
    return res.rows.length;
  }

  private assertTouched(operation: string, touched: number, key: LevelKey) {
    if (touched === 0) {
      throw new PersistenceError(operation, {
        cause: `level ${key.symbol}#${key.levelIndex}#${key.side} is not in the ledger`,
      });
    }
  }

  private async run<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (error instanceof PersistenceError) throw error;
      throw new PersistenceError(operation, { cause: error });
    }
  }
}
