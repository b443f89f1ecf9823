import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ApiServer, isIsoDate } from "./server.js";
import type { EodPrice, LatestPrice, PriceRepository } from "../types/prices.js";
import type { ListenerHealth } from "../types/listener.js";

class FakePriceRepository implements PriceRepository {
  eod: EodPrice[] = [{ ticker: "TRG", date: "2026-01-12", price: 72.45 }];
  latest: LatestPrice[] = [{ ticker: "TRG", price: 72.5, updated_at: "2026-01-12T08:11:00.000Z" }];
  failure: Error | null = null;

  async getEodPrice(ticker: string, date: string): Promise<EodPrice | null> {
    if (this.failure) {
      throw this.failure;
    }
    return this.eod.find((row) => row.ticker === ticker && row.date === date) ?? null;
  }

  async getLatestPrice(ticker: string): Promise<LatestPrice | null> {
    if (this.failure) {
      throw this.failure;
    }
    return this.latest.find((row) => row.ticker === ticker) ?? null;
  }
}

function listenerHealth(overrides: Partial<ListenerHealth> = {}): ListenerHealth {
  return {
    state: "subscribed",
    isSubscribed: true,
    channel: "stock_updates",
    reconnectCount: 0,
    notificationCount: 0,
    malformedCount: 0,
    lastNotificationTime: null,
    lastError: null,
    ...overrides,
  };
}

describe("ApiServer", () => {
  let prices: FakePriceRepository;
  let health: ListenerHealth;
  let server: ApiServer;
  let baseUrl: string;

  beforeEach(async () => {
    prices = new FakePriceRepository();
    health = listenerHealth();
    server = new ApiServer({
      port: 0,
      host: "127.0.0.1",
      prices,
      getListenerHealth: () => health,
      getClientCount: () => 3,
    });
    await server.start();
    baseUrl = `http://127.0.0.1:${server.getPort()}`;
  });

  afterEach(async () => {
    await server.stop();
  });

  describe("GET /api/eod", () => {
    it("returns the close for a ticker and date", async () => {
      const res = await fetch(`${baseUrl}/api/eod?ticker=TRG&date=2026-01-12`);

      expect(res.status).toBe(200);
      await expect(res.json()).resolves.toEqual({ ticker: "TRG", date: "2026-01-12", price: 72.45 });
    });

    it("rejects a malformed date", async () => {
      const res = await fetch(`${baseUrl}/api/eod?ticker=TRG&date=12-01-2026`);

      expect(res.status).toBe(400);
      await expect(res.json()).resolves.toEqual({ error: "Invalid date format. Use YYYY-MM-DD" });
    });

    it("rejects a request without a ticker", async () => {
      const res = await fetch(`${baseUrl}/api/eod?date=2026-01-12`);

      expect(res.status).toBe(400);
      await expect(res.json()).resolves.toEqual({ error: "ticker and date are required" });
    });

    it("returns 404 when there is no close for that day", async () => {
      const res = await fetch(`${baseUrl}/api/eod?ticker=TRG&date=2026-01-13`);

      expect(res.status).toBe(404);
      await expect(res.json()).resolves.toEqual({ error: "No data found for TRG on 2026-01-13" });
    });

    it("returns 500 when the database query fails", async () => {
      prices.failure = new Error("connect ECONNREFUSED 127.0.0.1:5432");

      const res = await fetch(`${baseUrl}/api/eod?ticker=TRG&date=2026-01-12`);

      expect(res.status).toBe(500);
      await expect(res.json()).resolves.toEqual({ error: "Database connection failed" });
    });
  });

  describe("GET /api/prices/latest", () => {
    it("returns the latest price", async () => {
      const res = await fetch(`${baseUrl}/api/prices/latest?ticker=TRG`);

      expect(res.status).toBe(200);
      await expect(res.json()).resolves.toEqual({
        ticker: "TRG",
        price: 72.5,
        updated_at: "2026-01-12T08:11:00.000Z",
      });
    });

    it("returns 404 for an unknown ticker", async () => {
      const res = await fetch(`${baseUrl}/api/prices/latest?ticker=ZZZ`);

      expect(res.status).toBe(404);
      await expect(res.json()).resolves.toEqual({ error: "No price found for ZZZ" });
    });

    it("requires a ticker", async () => {
      const res = await fetch(`${baseUrl}/api/prices/latest`);

      expect(res.status).toBe(400);
      await expect(res.json()).resolves.toEqual({ error: "ticker is required" });
    });
  });

  describe("GET /health", () => {
    it("reports ok while the listener is subscribed", async () => {
      const res = await fetch(`${baseUrl}/health`);

      expect(res.status).toBe(200);
      await expect(res.json()).resolves.toMatchObject({
        status: "ok",
        clients: 3,
        listener: { state: "subscribed", channel: "stock_updates" },
      });
    });

    it("reports degraded while the listener is backing off", async () => {
      health = listenerHealth({
        state: "backoff",
        isSubscribed: false,
        lastError: { code: "ENOTFOUND", message: "Failed to subscribe to stock_updates", timestamp: 1 },
      });

      const res = await fetch(`${baseUrl}/health`);

      expect(res.status).toBe(503);
      await expect(res.json()).resolves.toMatchObject({
        status: "degraded",
        listener: { isSubscribed: false, lastError: { code: "ENOTFOUND" } },
      });
    });
  });

  it("describes the API at the root", async () => {
    const res = await fetch(`${baseUrl}/`);

    expect(res.status).toBe(200);
    await expect(res.json()).resolves.toMatchObject({ endpoints: { stream: "/ws?token=<api key>" } });
  });

  it("returns 404 for unknown paths", async () => {
    const res = await fetch(`${baseUrl}/api/unknown`);

    expect(res.status).toBe(404);
    await expect(res.json()).resolves.toEqual({ error: "Not found" });
  });

  it("rejects methods other than GET", async () => {
    const res = await fetch(`${baseUrl}/health`, { method: "POST" });

    expect(res.status).toBe(405);
    expect(res.headers.get("access-control-allow-origin")).toBe("*");
  });
});

describe("isIsoDate", () => {
  it.each(["2026-01-12", "2024-02-29"])("accepts %s", (value) => {
    expect(isIsoDate(value)).toBe(true);
  });

  it.each(["2026-1-12", "12-01-2026", "2025-02-29", "2026-13-01", "2026-01-12T00:00:00Z", ""])(
    "rejects %s",
    (value) => {
      expect(isIsoDate(value)).toBe(false);
    }
  );
});
