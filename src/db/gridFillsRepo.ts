import { Pool } from 'pg';
import { PersistenceError } from '../errors';
import type { OrderSide } from '../strategies/types';

export interface FillRecord {
  symbol: string;
  levelIndex: number;
  side: OrderSide;
  price: number;
  amount: number;
  orderRef: string | null;
  filledAt?: Date;
}

export interface FillSummary {
  symbol: string;
  side: OrderSide;
  fills: number;
  volume: number;
  notional: number;
}

interface SummaryRow {
  symbol: string;
  side: string;
  fill_count: number | string;
  volume: number | string | null;
  notional: number | string | null;
}

/** Append-only journal of observed fills. */
export class GridFillsRepository {
  constructor(private pool: Pool) {}

  async recordFill(fill: FillRecord) {
    try {
      await this.pool.query(
        `INSERT INTO grid_fills (symbol, level_index, side, price, amount, order_ref, filled_at)
         VALUES ($1,$2,$3,$4,$5,$6,$7)`,
        [
          fill.symbol,
          fill.levelIndex,
          fill.side,
          fill.price,
          fill.amount,
          fill.orderRef,
          fill.filledAt ?? new Date(),
        ]
      );
    } catch (error) {
      throw new PersistenceError('record_fill', { cause: error });
    }
  }

  async summarize(): Promise<FillSummary[]> {
    let rows: SummaryRow[];
    try {
      const res = await this.pool.query<SummaryRow>(
        `SELECT symbol, side, COUNT(*) AS fill_count, SUM(amount) AS volume, SUM(amount * price) AS notional
         FROM grid_fills
         GROUP BY symbol, side
         ORDER BY symbol, side`
      );
      rows = res.rows;
    } catch (error) {
      throw new PersistenceError('summarize_fills', { cause: error });
    }
    const summaries: FillSummary[] = [];
    for (const row of rows) {
      if (row.side !== 'buy' && row.side !== 'sell') continue;
      summaries.push({
        symbol: row.symbol,
        side: row.side,
        fills: Number(row.fill_count),
        volume: Number(row.volume ?? 0),
        notional: Number(row.notional ?? 0),
      });
    }
    return summaries;
  }

  async clear(symbol?: string): Promise<number> {
    try {
      const res =
        symbol === undefined
          ? await this.pool.query(`DELETE FROM grid_fills RETURNING id`)
          : await this.pool.query(`DELETE FROM grid_fills WHERE symbol = $1 RETURNING id`, [symbol]);
      return res.rows.length;
    } catch (error) {
      throw new PersistenceError('clear_fills', { cause: error });
    }
  }
}
