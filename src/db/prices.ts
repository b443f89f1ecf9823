/**
 * Read-only price queries for the REST API.
 */

import type pg from "pg";
import type { EodPrice, LatestPrice, PriceRepository } from "../types/prices.js";

interface EodRow {
  close_price: string;
  recorded_at: string;
}

interface LatestRow {
  ticker: string;
  price: string;
  updated_at: Date;
}

export class PgPriceRepository implements PriceRepository {
  constructor(private readonly pool: pg.Pool) {}

  /**
   * Closing price for `ticker` on `date` (YYYY-MM-DD), or null when the day
   * has no row.
   */
  async getEodPrice(ticker: string, date: string): Promise<EodPrice | null> {
    const result = await this.pool.query<EodRow>(
      `SELECT close_price, recorded_at::text AS recorded_at
         FROM historical_prices
        WHERE ticker = $1 AND recorded_at = $2::date`,
      [ticker, date]
    );

    const row = result.rows[0];
    if (!row) {
      return null;
    }
    return {
      ticker,
      date: row.recorded_at,
      price: Number(row.close_price),
    };
  }

  async getLatestPrice(ticker: string): Promise<LatestPrice | null> {
    const result = await this.pool.query<LatestRow>(
      `SELECT ticker, price, updated_at
         FROM stock_prices
        WHERE ticker = $1`,
      [ticker]
    );

    const row = result.rows[0];
    if (!row) {
      return null;
    }
    return {
      ticker: row.ticker,
      price: Number(row.price),
      updated_at: row.updated_at.toISOString(),
    };
  }
}
