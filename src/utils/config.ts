/**
 * Configuration system for the price stream server.
 * Loads configuration from a JSON file and environment variables.
 */

import { readFileSync } from "fs";
import { join } from "path";
import { z } from "zod";
import { logger } from "./logger.js";
import { ConfigurationError } from "./errors.js";

// ══════════════════════════════════════════════════════════════════════
// CONFIGURATION SCHEMA
// ══════════════════════════════════════════════════════════════════════

const positiveInt = z.number().int().positive();

const configSchema = z
  .object({
    server: z.object({
      port: z.number().int().min(0).max(65535),
      wsPath: z.string().startsWith("/"),
      pingIntervalMs: positiveInt,
      deliveryTimeoutMs: positiveInt,
    }),

    // Either `url` or the discrete fields; `url` wins when both are set.
    database: z.object({
      url: z.string().min(1).optional(),
      host: z.string().min(1),
      port: z.number().int().min(1).max(65535),
      user: z.string().optional(),
      password: z.string().optional(),
      database: z.string().optional(),
      poolSize: positiveInt,
    }),

    listener: z.object({
      channel: z.string().min(1),
      reconnectDelayMs: positiveInt,         // Default: 5000
      backoff: z.enum(["fixed", "exponential"]),
      maxReconnectDelayMs: positiveInt,      // Only used by "exponential"
      livenessIntervalMs: positiveInt,       // Default: 60000
    }),

    auth: z.object({
      mode: z.enum(["database", "static"]),
      apiKeys: z.array(z.string().min(1)),
    }),

    logging: z.object({
      level: z.enum(["debug", "info", "warn", "error"]),
    }),
  })
  .superRefine((config, ctx) => {
    if (config.auth.mode === "static" && config.auth.apiKeys.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["auth", "apiKeys"],
        message: "static auth mode needs at least one API key",
      });
    }
    if (config.listener.maxReconnectDelayMs < config.listener.reconnectDelayMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["listener", "maxReconnectDelayMs"],
        message: "must not be smaller than reconnectDelayMs",
      });
    }
  });

export type SystemConfig = z.infer<typeof configSchema>;
export type BackoffStrategy = SystemConfig["listener"]["backoff"];

// ══════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ══════════════════════════════════════════════════════════════════════

const DEFAULT_CONFIG: SystemConfig = {
  server: {
    port: 8000,
    wsPath: "/ws",
    pingIntervalMs: 30000,
    deliveryTimeoutMs: 10000,
  },
  database: {
    host: "localhost",
    port: 5432,
    poolSize: 10,
  },
  listener: {
    channel: "stock_updates",
    reconnectDelayMs: 5000,
    backoff: "fixed",
    maxReconnectDelayMs: 30000,
    livenessIntervalMs: 60000,
  },
  auth: {
    mode: "database",
    apiKeys: [],
  },
  logging: {
    level: "info",
  },
};

// ══════════════════════════════════════════════════════════════════════
// CONFIGURATION LOADER
// ══════════════════════════════════════════════════════════════════════

type Env = Record<string, string | undefined>;
type PlainObject = Record<string, unknown>;

/**
 * Build a validated configuration from defaults, an optional JSON file and
 * environment variables, in that order of precedence (env wins).
 */
export function loadConfig(env: Env = process.env, configPath?: string): SystemConfig {
  const path = configPath ?? env.CONFIG_PATH ?? join(process.cwd(), "config", "default.json");
  const fileConfig = readConfigFile(path);

  const merged = deepMerge(deepMerge(DEFAULT_CONFIG, fileConfig), envOverrides(env));

  const result = configSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, { path, issues });
  }
  return result.data;
}

function readConfigFile(path: string): PlainObject {
  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      logger.warn("Configuration file not found, using defaults", { path });
      return {};
    }
    throw new ConfigurationError("Failed to read configuration file", { path });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    throw new ConfigurationError("Configuration file is not valid JSON", { path });
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError("Configuration file must contain a JSON object", { path });
  }

  logger.info("Configuration loaded from file", { path });
  return parsed;
}

/**
 * Map environment variables onto the config tree. Numbers are converted
 * here and left for the schema to reject when they are not numeric.
 */
function envOverrides(env: Env): PlainObject {
  const num = (value: string | undefined): number | undefined =>
    value === undefined || value === "" ? undefined : Number(value);

  const apiKeys = env.AUTH_API_KEYS?.split(",")
    .map((key) => key.trim())
    .filter((key) => key.length > 0);

  return {
    server: {
      port: num(env.PORT),
      wsPath: env.WS_PATH,
      pingIntervalMs: num(env.WS_PING_INTERVAL_MS),
      deliveryTimeoutMs: num(env.WS_DELIVERY_TIMEOUT_MS),
    },
    database: {
      url: env.DATABASE_URL || undefined,
      host: env.POSTGRES_HOST,
      port: num(env.POSTGRES_PORT),
      user: env.POSTGRES_USER,
      password: env.POSTGRES_PASSWORD,
      database: env.POSTGRES_DB,
      poolSize: num(env.POSTGRES_POOL_SIZE),
    },
    listener: {
      channel: env.NOTIFY_CHANNEL,
      reconnectDelayMs: num(env.LISTENER_RECONNECT_DELAY_MS),
      backoff: env.LISTENER_BACKOFF,
      maxReconnectDelayMs: num(env.LISTENER_MAX_RECONNECT_DELAY_MS),
      livenessIntervalMs: num(env.LISTENER_LIVENESS_INTERVAL_MS),
    },
    auth: {
      mode: env.AUTH_MODE,
      apiKeys,
    },
    logging: {
      level: env.LOG_LEVEL?.toLowerCase(),
    },
  };
}

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. `undefined` in the source never overwrites.
 */
function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const output: PlainObject = { ...target };

  for (const key of Object.keys(source)) {
    const value = source[key];
    if (value === undefined) {
      continue;
    }
    const existing = output[key];
    output[key] = isPlainObject(value) && isPlainObject(existing) ? deepMerge(existing, value) : value;
  }

  return output;
}

class ConfigManager {
  private config: SystemConfig | null = null;

  /**
   * Get the current configuration, loading it on first use.
   */
  getConfig(): SystemConfig {
    if (!this.config) {
      this.config = loadConfig();
    }
    return this.config;
  }
}

// Singleton instance
const configManager = new ConfigManager();

export function getConfig(): SystemConfig {
  return configManager.getConfig();
}
