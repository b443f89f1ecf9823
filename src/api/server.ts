/**
 * Simple HTTP API Server
 *
 * Provides health and price lookup endpoints, and hosts the WebSocket
 * upgrade path.
 */

import { createServer, IncomingMessage, ServerResponse } from "http";
import { URL } from "url";
import { logger } from "../utils/logger.js";
import { toError } from "../utils/errors.js";
import type { PriceRepository } from "../types/prices.js";
import type { ListenerHealth } from "../types/listener.js";

const log = logger.child({ component: "api" });

interface ApiServerOptions {
  port: number;
  host?: string;
  prices: PriceRepository;
  getListenerHealth: () => ListenerHealth;
  getClientCount: () => number;
}

class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
  }
}

/**
 * Strict YYYY-MM-DD check that also rejects impossible days like 2025-02-30.
 */
export function isIsoDate(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    return false;
  }
  const date = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(date.getTime()) && date.toISOString().slice(0, 10) === value;
}

export class ApiServer {
  private server: ReturnType<typeof createServer>;
  private port: number;
  private host: string | undefined;
  private prices: PriceRepository;
  private getListenerHealth: () => ListenerHealth;
  private getClientCount: () => number;

  constructor(options: ApiServerOptions) {
    this.port = options.port;
    this.host = options.host;
    this.prices = options.prices;
    this.getListenerHealth = options.getListenerHealth;
    this.getClientCount = options.getClientCount;

    this.server = createServer((req, res) => {
      this.handleRequest(req, res);
    });
  }

  /**
   * The underlying HTTP server, for attaching the WebSocket API.
   */
  getHttpServer(): ReturnType<typeof createServer> {
    return this.server;
  }

  /**
   * Start the API server.
   */
  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const onError = (error: NodeJS.ErrnoException) => {
        if (error.code === "EADDRINUSE") {
          log.error(`Port ${this.port} is already in use`, error);
        } else {
          log.error("API server error", error);
        }
        reject(error);
      };

      this.server.once("error", onError);
      this.server.listen(this.port, this.host, () => {
        this.server.off("error", onError);
        log.info("API server started", { port: this.getPort() });
        resolve();
      });
    });
  }

  /**
   * Stop the API server.
   */
  stop(): Promise<void> {
    return new Promise((resolve) => {
      if (!this.server.listening) {
        resolve();
        return;
      }
      this.server.close(() => {
        log.info("API server stopped");
        resolve();
      });
      this.server.closeAllConnections();
    });
  }

  /**
   * Port actually bound, which differs from the configured one when it is 0.
   */
  getPort(): number {
    const address = this.server.address();
    return address !== null && typeof address === "object" ? address.port : this.port;
  }

  /**
   * Handle incoming HTTP request.
   */
  private handleRequest(req: IncomingMessage, res: ServerResponse): void {
    const startTime = Date.now();
    const url = new URL(req.url || "/", `http://${req.headers.host ?? "localhost"}`);

    // Enable CORS
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");

    if (req.method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }

    void this.route(req, res, url)
      .catch((error: unknown) => this.handleError(res, error))
      .finally(() => {
        log.debug("API request", {
          method: req.method,
          path: url.pathname,
          status: res.statusCode,
          durationMs: Date.now() - startTime,
        });
      });
  }

  private async route(req: IncomingMessage, res: ServerResponse, url: URL): Promise<void> {
    if (req.method !== "GET") {
      sendJson(res, 405, { error: "Method not allowed" });
      return;
    }

    switch (url.pathname) {
      case "/":
        this.handleRoot(res);
        return;
      case "/health":
        this.handleHealth(res);
        return;
      case "/api/eod":
        await this.handleEod(res, url);
        return;
      case "/api/prices/latest":
        await this.handleLatest(res, url);
        return;
      default:
        sendJson(res, 404, { error: "Not found" });
    }
  }

  /**
   * Root endpoint - API information.
   */
  private handleRoot(res: ServerResponse): void {
    sendJson(res, 200, {
      name: "Price Stream API",
      version: "0.1.0",
      endpoints: {
        health: "/health",
        eod: {
          path: "/api/eod",
          example: "/api/eod?ticker=TRG&date=2026-01-12",
        },
        latest: {
          path: "/api/prices/latest",
          example: "/api/prices/latest?ticker=TRG",
        },
        stream: "/ws?token=<api key>",
      },
    });
  }

  /**
   * Health check endpoint. Degraded until the listener is subscribed, so a
   * listener stuck in backoff shows up without the process going down.
   */
  private handleHealth(res: ServerResponse): void {
    const listener = this.getListenerHealth();
    const healthy = listener.isSubscribed;

    sendJson(res, healthy ? 200 : 503, {
      status: healthy ? "ok" : "degraded",
      timestamp: Date.now(),
      listener,
      clients: this.getClientCount(),
    });
  }

  /**
   * End-of-day close for a ticker on a date.
   */
  private async handleEod(res: ServerResponse, url: URL): Promise<void> {
    const ticker = url.searchParams.get("ticker");
    const date = url.searchParams.get("date");

    if (!ticker || !date) {
      throw new HttpError(400, "ticker and date are required");
    }
    if (!isIsoDate(date)) {
      throw new HttpError(400, "Invalid date format. Use YYYY-MM-DD");
    }

    const price = await this.query(() => this.prices.getEodPrice(ticker, date));
    if (!price) {
      throw new HttpError(404, `No data found for ${ticker} on ${date}`);
    }

    sendJson(res, 200, price);
  }

  /**
   * Latest live price for a ticker.
   */
  private async handleLatest(res: ServerResponse, url: URL): Promise<void> {
    const ticker = url.searchParams.get("ticker");
    if (!ticker) {
      throw new HttpError(400, "ticker is required");
    }

    const price = await this.query(() => this.prices.getLatestPrice(ticker));
    if (!price) {
      throw new HttpError(404, `No price found for ${ticker}`);
    }

    sendJson(res, 200, price);
  }

  private async query<T>(run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      log.error("Price query failed", toError(error));
      throw new HttpError(500, "Database connection failed");
    }
  }

  /**
   * Handle errors.
   */
  private handleError(res: ServerResponse, error: unknown): void {
    if (error instanceof HttpError) {
      sendJson(res, error.status, { error: error.message });
      return;
    }

    log.error("API error", toError(error));
    if (res.headersSent) {
      res.end();
      return;
    }
    sendJson(res, 500, { error: "Internal server error" });
  }
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body, null, 2));
}
