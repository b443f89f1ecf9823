/**
 * WebSocket session types for the real-time API
 */

/**
 * The slice of a `ws` WebSocket the fan-out path uses. Kept narrow so the
 * registry and broadcaster can run against in-memory transports.
 */
export interface SessionTransport {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
  ping(): void;
}

export interface Session {
  readonly id: string;
  readonly transport: SessionTransport;
  readonly admittedAt: Date;
  /** Cleared on every keepalive ping, set again on pong or inbound message. */
  isAlive: boolean;
}

export interface DeliveryReport {
  attempted: number;
  delivered: number;
  failed: number;
}

export const CLOSE_GOING_AWAY = 1001;
export const CLOSE_INTERNAL_ERROR = 1011;
