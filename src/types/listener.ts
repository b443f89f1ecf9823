/**
 * Upstream listener states, health, and the connection it drives.
 */

import type EventEmitter from "eventemitter3";

export type ListenerState =
  | "disconnected"
  | "connecting"
  | "subscribed"
  | "backoff"
  | "shutting_down";

export interface ListenerError {
  code: string;
  message: string;
  timestamp: number;
}

export interface ListenerHealth {
  state: ListenerState;
  isSubscribed: boolean;
  channel: string;
  reconnectCount: number;
  notificationCount: number;
  malformedCount: number;
  lastNotificationTime: number | null;
  lastError: ListenerError | null;
}

/** Raw notification as delivered by the upstream driver. */
export interface UpstreamNotification {
  channel: string;
  payload?: string;
}

export interface UpstreamEvents {
  notification: (notification: UpstreamNotification) => void;
  error: (error: Error) => void;
  end: () => void;
}

/**
 * One LISTEN-capable connection to the upstream store. A fresh instance is
 * created for every connect attempt and discarded after it fails.
 */
export interface UpstreamConnection extends EventEmitter<UpstreamEvents> {
  connect(): Promise<void>;
  listen(channel: string): Promise<void>;
  /** Round trip used as the liveness check; rejects when the connection is gone. */
  ping(): Promise<void>;
  close(): Promise<void>;
}

export type UpstreamConnectionFactory = () => UpstreamConnection;
