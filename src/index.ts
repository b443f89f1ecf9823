/**
 * Entry point for the price stream server.
 *
 * Starts the upstream listener and the broadcast loop, then the HTTP and
 * WebSocket APIs, and tears them down in reverse on SIGINT/SIGTERM.
 */

import { logger } from "./utils/logger.js";
import { getConfig } from "./utils/config.js";
import { toError } from "./utils/errors.js";
import { createPool, connectionOptions } from "./db/pool.js";
import { pgUpstreamFactory } from "./db/upstream.js";
import { PgPriceRepository } from "./db/prices.js";
import { PgCredentialStore, StaticCredentialStore } from "./auth/credentials.js";
import type { CredentialStore } from "./auth/credentials.js";
import { AuthGate } from "./auth/gate.js";
import { ConnectionRegistry } from "./realtime/registry.js";
import { Broadcaster } from "./realtime/broadcaster.js";
import { NotificationListener } from "./realtime/listener.js";
import { ApiServer } from "./api/server.js";
import { WebSocketAPI } from "./api/websocket.js";
import { shutdownServices } from "./shutdown.js";

const HEALTH_LOG_INTERVAL_MS = 30000;

async function main() {
  const config = getConfig();
  logger.setLevel(config.logging.level);

  logger.info("Starting price stream server", {
    port: config.server.port,
    channel: config.listener.channel,
    authMode: config.auth.mode,
    backoff: config.listener.backoff,
  });

  const pool = createPool(config.database);

  const credentialStore: CredentialStore =
    config.auth.mode === "static" ? new StaticCredentialStore(config.auth.apiKeys) : new PgCredentialStore(pool);

  const registry = new ConnectionRegistry();
  const broadcaster = new Broadcaster(registry, {
    deliveryTimeoutMs: config.server.deliveryTimeoutMs,
  });
  const listener = new NotificationListener(
    pgUpstreamFactory(connectionOptions(config.database)),
    broadcaster,
    config.listener
  );

  const apiServer = new ApiServer({
    port: config.server.port,
    prices: new PgPriceRepository(pool),
    getListenerHealth: () => listener.getHealth(),
    getClientCount: () => registry.size,
  });
  const webSocketApi = new WebSocketAPI({
    path: config.server.wsPath,
    pingIntervalMs: config.server.pingIntervalMs,
    registry,
    authGate: new AuthGate(credentialStore),
  });

  listener.on("state", (state) => {
    logger.info("Listener state changed", { state });
  });

  // The listener runs independently of client traffic.
  broadcaster.start();
  listener.start();

  await apiServer.start();
  webSocketApi.start(apiServer.getHttpServer());

  logger.info("System initialized and running", { apiPort: apiServer.getPort() });

  const healthInterval = setInterval(() => {
    const health = listener.getHealth();
    logger.info("System health", {
      listener: {
        state: health.state,
        reconnectCount: health.reconnectCount,
        notifications: health.notificationCount,
        malformed: health.malformedCount,
      },
      clients: registry.size,
      broadcast: broadcaster.getStats(),
    });
  }, HEALTH_LOG_INTERVAL_MS);

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down gracefully`);

    clearInterval(healthInterval);

    await shutdownServices({ listener, broadcaster, webSocketApi, apiServer, pool });

    logger.info("Shutdown complete");
  };

  const onSignal = (signal: string) => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error("Error during shutdown", toError(error));
        process.exit(1);
      });
  };

  process.on("SIGINT", () => onSignal("SIGINT"));
  process.on("SIGTERM", () => onSignal("SIGTERM"));
}

// Start the application
main().catch((error: unknown) => {
  logger.error("Fatal error in main", toError(error));
  process.exit(1);
});
