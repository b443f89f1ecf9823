/**
 * WebSocket API Server
 *
 * Admits clients that present a valid API key and keeps their sessions in
 * the connection registry, where the broadcaster finds them. The channel is
 * push-only: inbound messages only count as proof of life.
 */

import { WebSocketServer, WebSocket } from "ws";
import EventEmitter from "eventemitter3";
import type { IncomingMessage, Server } from "http";
import type { Duplex } from "stream";
import { logger } from "../utils/logger.js";
import { AuthRejectedError, DuplicateSessionError, toError } from "../utils/errors.js";
import { createSession } from "../realtime/registry.js";
import type { ConnectionRegistry } from "../realtime/registry.js";
import type { AuthGate } from "../auth/gate.js";
import { CLOSE_GOING_AWAY, CLOSE_INTERNAL_ERROR } from "../types/websocket.js";
import type { Session } from "../types/websocket.js";

const log = logger.child({ component: "websocket" });

export interface WebSocketAPIOptions {
  path: string;
  pingIntervalMs: number;
  registry: ConnectionRegistry;
  authGate: AuthGate;
}

interface WebSocketAPIEvents {
  admitted: (session: Session) => void;
  rejected: (reason: string) => void;
}

export class WebSocketAPI extends EventEmitter<WebSocketAPIEvents> {
  private wss: WebSocketServer | null = null;
  private server: Server | null = null;
  private pingInterval: NodeJS.Timeout | null = null;
  private readonly path: string;
  private readonly pingIntervalMs: number;
  private readonly registry: ConnectionRegistry;
  private readonly authGate: AuthGate;

  constructor(options: WebSocketAPIOptions) {
    super();
    this.path = options.path;
    this.pingIntervalMs = options.pingIntervalMs;
    this.registry = options.registry;
    this.authGate = options.authGate;
  }

  /**
   * Start accepting upgrades on an existing HTTP server.
   */
  start(server: Server): void {
    if (this.wss) {
      logger.warn("WebSocket server already started");
      return;
    }

    // noServer: upgrades are authenticated before ws sees them.
    this.wss = new WebSocketServer({ noServer: true, clientTracking: false });
    this.server = server;
    server.on("upgrade", this.onUpgrade);

    this.pingInterval = setInterval(() => {
      this.pingClients();
    }, this.pingIntervalMs);

    log.info("WebSocket server started", { path: this.path });
  }

  /**
   * Stop accepting upgrades and close every admitted session.
   */
  async stop(): Promise<void> {
    if (this.pingInterval) {
      clearInterval(this.pingInterval);
      this.pingInterval = null;
    }

    if (this.server) {
      this.server.off("upgrade", this.onUpgrade);
      this.server = null;
    }

    this.registry.closeAll(CLOSE_GOING_AWAY, "Server shutting down");

    const wss = this.wss;
    this.wss = null;
    if (wss) {
      await new Promise<void>((resolve) => wss.close(() => resolve()));
    }

    log.info("WebSocket server stopped");
  }

  // ══════════════════════════════════════════════════════════════════════
  // ADMISSION
  // ══════════════════════════════════════════════════════════════════════

  private onUpgrade = (req: IncomingMessage, socket: Duplex, head: Buffer): void => {
    socket.on("error", onSocketError);

    this.admit(req, socket, head).catch((error: unknown) => {
      log.error("WebSocket admission failed", toError(error));
      socket.destroy();
    });
  };

  /**
   * Validate the credential before the upgrade completes; a refused client
   * never gets a session.
   */
  private async admit(req: IncomingMessage, socket: Duplex, head: Buffer): Promise<void> {
    const url = new URL(req.url ?? "/", "http://localhost");

    if (url.pathname !== this.path) {
      rejectUpgrade(socket, 404, "Not Found");
      return;
    }

    const token = url.searchParams.get("token");
    const decision = await this.authGate.validate(token);

    if (decision === "rejected") {
      const rejection = new AuthRejectedError(token ? "invalid credential" : "missing credential");
      log.debug(rejection.message, { remoteAddress: req.socket.remoteAddress });
      rejectUpgrade(socket, 401, "Unauthorized");
      this.emit("rejected", rejection.message);
      return;
    }

    // The client may have gone away, or we may be shutting down, while the
    // credential lookup was in flight.
    const wss = this.wss;
    if (!wss || socket.destroyed) {
      socket.destroy();
      return;
    }

    socket.removeListener("error", onSocketError);
    wss.handleUpgrade(req, socket, head, (ws) => {
      this.handleConnection(ws, req);
    });
  }

  private handleConnection(ws: WebSocket, req: IncomingMessage): void {
    const session = createSession(ws);

    try {
      this.registry.add(session);
    } catch (error) {
      if (error instanceof DuplicateSessionError) {
        log.error("Refusing duplicate session", error, error.context);
      } else {
        log.error("Failed to register session", toError(error));
      }
      ws.close(CLOSE_INTERNAL_ERROR, "Session registration failed");
      return;
    }

    ws.on("message", () => {
      session.isAlive = true;
    });

    ws.on("pong", () => {
      session.isAlive = true;
    });

    ws.on("close", () => {
      if (this.registry.remove(session)) {
        log.debug("WebSocket client disconnected", {
          sessionId: session.id,
          remainingClients: this.registry.size,
        });
      }
    });

    ws.on("error", (error) => {
      log.debug("WebSocket error", { sessionId: session.id, error: error.message });
      this.registry.remove(session);
    });

    log.debug("WebSocket client connected", {
      sessionId: session.id,
      clientCount: this.registry.size,
      origin: req.headers.origin,
    });
    this.emit("admitted", session);
  }

  // ══════════════════════════════════════════════════════════════════════
  // KEEPALIVE
  // ══════════════════════════════════════════════════════════════════════

  /**
   * Ping all sessions; terminate those that stayed silent since the last round.
   */
  private pingClients(): void {
    for (const session of this.registry.snapshot()) {
      if (!session.isAlive) {
        log.debug("Closing inactive WebSocket connection", { sessionId: session.id });
        this.registry.remove(session);
        session.transport.terminate();
        continue;
      }

      session.isAlive = false;
      if (session.transport.readyState === WebSocket.OPEN) {
        try {
          session.transport.ping();
        } catch (error) {
          log.debug("Ping failed", { sessionId: session.id, error: toError(error).message });
        }
      }
    }
  }
}

function onSocketError(error: Error): void {
  log.debug("Socket error during upgrade", { error: error.message });
}

/**
 * Refuse an upgrade with a plain HTTP response before the handshake completes.
 */
function rejectUpgrade(socket: Duplex, status: number, statusText: string): void {
  if (socket.destroyed || !socket.writable) {
    socket.destroy();
    return;
  }
  socket.once("finish", () => socket.destroy());
  socket.end(`HTTP/1.1 ${status} ${statusText}\r\nConnection: close\r\nContent-Length: 0\r\n\r\n`);
}
