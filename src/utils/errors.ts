/**
 * Error taxonomy for the price stream.
 *
 * Every failure the fan-out path can hit has its own class so callers can
 * route it to the right log level and recovery path. None of these are
 * meant to reach the top of the process except ConfigurationError at startup.
 */

export type ErrorCode =
  | "AUTH_REJECTED"
  | "UPSTREAM_CONNECTION"
  | "MALFORMED_PAYLOAD"
  | "DELIVERY_FAILED"
  | "DUPLICATE_SESSION"
  | "CONFIGURATION";

export class PriceStreamError extends Error {
  readonly code: ErrorCode;
  readonly context: Record<string, unknown>;
  readonly timestamp: number;

  constructor(code: ErrorCode, message: string, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.context = context;
    this.timestamp = Date.now();
    this.name = new.target.name;
  }
}

/** Missing or unknown credential at admission. Expected traffic, not a fault. */
export class AuthRejectedError extends PriceStreamError {
  constructor(reason: string) {
    super("AUTH_REJECTED", `Connection refused: ${reason}`, { reason });
  }
}

export class UpstreamConnectionError extends PriceStreamError {
  constructor(message: string, cause?: unknown, context: Record<string, unknown> = {}) {
    super("UPSTREAM_CONNECTION", message, { ...context, ...causeContext(cause) }, { cause });
  }
}

export class MalformedPayloadError extends PriceStreamError {
  constructor(message: string, payload: string) {
    // Truncated so a runaway payload does not flood the log line.
    super("MALFORMED_PAYLOAD", message, { payload: payload.substring(0, 200) });
  }
}

export class DeliveryError extends PriceStreamError {
  constructor(sessionId: string, cause?: unknown) {
    super("DELIVERY_FAILED", `Delivery to session ${sessionId} failed`, { sessionId, ...causeContext(cause) }, { cause });
  }
}

export class DuplicateSessionError extends PriceStreamError {
  constructor(sessionId: string) {
    super("DUPLICATE_SESSION", `Session ${sessionId} is already registered`, { sessionId });
  }
}

export class ConfigurationError extends PriceStreamError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super("CONFIGURATION", message, context);
  }
}

/**
 * Normalize anything thrown into an Error.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(String(value));
}

function causeContext(cause: unknown): Record<string, unknown> {
  if (cause === undefined) {
    return {};
  }
  const error = toError(cause);
  const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
  return code ? { cause: error.message, causeCode: code } : { cause: error.message };
}
