/**
 * Structured logging infrastructure.
 * Provides consistent logging with levels, timestamps, and context.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogContext {
  [key: string]: unknown;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

interface LevelRef {
  current: LogLevel;
}

class Logger {
  private level: LevelRef;
  private context: LogContext;

  constructor(minLevel: LogLevel | LevelRef = "info", baseContext: LogContext = {}) {
    this.level = typeof minLevel === "string" ? { current: minLevel } : minLevel;
    this.context = baseContext;
  }

  /**
   * Create a child logger with additional context.
   * Children share the parent's level, so `setLevel` on any of them applies to all.
   */
  child(additionalContext: LogContext): Logger {
    return new Logger(this.level, { ...this.context, ...additionalContext });
  }

  /**
   * Set minimum log level.
   */
  setLevel(level: LogLevel): void {
    this.level.current = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level.current);
  }

  private formatMessage(level: LogLevel, message: string, context?: LogContext, error?: Error): string {
    const timestamp = new Date().toISOString();
    const levelUpper = level.toUpperCase().padEnd(5);
    const merged = { ...this.context, ...context };
    const contextStr = Object.keys(merged).length > 0 ? ` ${JSON.stringify(merged)}` : "";
    const errorStr = error ? ` Error: ${error.message}${error.stack ? `\n${error.stack}` : ""}` : "";
    return `[${timestamp}] ${levelUpper} ${message}${contextStr}${errorStr}`;
  }

  private log(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const formatted = this.formatMessage(level, message, context, error);

    switch (level) {
      case "debug":
        console.debug(formatted);
        break;
      case "info":
        console.info(formatted);
        break;
      case "warn":
        console.warn(formatted);
        break;
      case "error":
        console.error(formatted);
        break;
    }
  }

  debug(message: string, context?: LogContext): void {
    this.log("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log("warn", message, context);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.log("error", message, context, error);
  }
}

const envLevel = process.env.LOG_LEVEL?.toLowerCase() ?? "";

// Default logger instance
export const logger = new Logger(isLogLevel(envLevel) ? envLevel : "info", {
  service: "price-stream-server",
});

export { Logger };
