/**
 * PostgreSQL connection settings and the shared query pool.
 */

import pg from "pg";
import type { ClientConfig } from "pg";
import type { SystemConfig } from "../utils/config.js";
import { logger } from "../utils/logger.js";

const log = logger.child({ component: "db" });

export function connectionOptions(database: SystemConfig["database"]): ClientConfig {
  if (database.url) {
    return { connectionString: database.url };
  }
  return {
    host: database.host,
    port: database.port,
    user: database.user,
    password: database.password,
    database: database.database,
  };
}

/**
 * Pool for request/response queries. The listener does not use it: LISTEN
 * needs a dedicated connection that stays checked out.
 */
export function createPool(database: SystemConfig["database"]): pg.Pool {
  const pool = new pg.Pool({
    ...connectionOptions(database),
    max: database.poolSize,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
  });

  // Idle clients can fail when the server restarts; pg drops them from the pool.
  pool.on("error", (error) => {
    log.warn("Idle database client error", { error: error.message });
  });

  return pool;
}
