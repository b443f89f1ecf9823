/**
 * Price types shared by the listener, the broadcaster and the REST API.
 */

/** One live price change, parsed from an upstream notification. */
export interface PriceNotification {
  ticker: string;
  price: number;
  updated_at: Date;
}

/** What every admitted session receives, one per live event. */
export interface PriceUpdateMessage {
  ticker: string;
  price: number;
  updated_at: string; // ISO-8601, UTC
}

/** End-of-day close for a ticker. */
export interface EodPrice {
  ticker: string;
  date: string; // YYYY-MM-DD
  price: number;
}

/** Most recent live price for a ticker. */
export interface LatestPrice {
  ticker: string;
  price: number;
  updated_at: string;
}

/**
 * Read-only price lookups backing the REST endpoints.
 */
export interface PriceRepository {
  getEodPrice(ticker: string, date: string): Promise<EodPrice | null>;
  getLatestPrice(ticker: string): Promise<LatestPrice | null>;
}
