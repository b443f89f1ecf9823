/**
 * Broadcaster
 *
 * Fans each price notification out to every admitted session. Notifications
 * are queued by the listener and drained by a single loop, one delivery at a
 * time, so sessions see them in the order the upstream sent them.
 */

import { WebSocket } from "ws";
import { logger } from "../utils/logger.js";
import { DeliveryError, toError } from "../utils/errors.js";
import { serializeNotification } from "./notification.js";
import type { ConnectionRegistry } from "./registry.js";
import type { PriceNotification } from "../types/prices.js";
import type { DeliveryReport, Session } from "../types/websocket.js";

const log = logger.child({ component: "broadcaster" });

export interface BroadcasterOptions {
  /** A write that has not completed in this time counts as failed. */
  deliveryTimeoutMs?: number;
}

/** Where the listener hands parsed notifications. */
export interface NotificationSink {
  enqueue(notification: PriceNotification): boolean;
}

export class Broadcaster implements NotificationSink {
  private queue: PriceNotification[] = [];
  private wake: (() => void) | null = null;
  private loop: Promise<void> | null = null;
  private stopped = false;
  private readonly deliveryTimeoutMs: number;
  private stats = {
    notifications: 0,
    delivered: 0,
    failed: 0,
  };

  constructor(
    private readonly registry: ConnectionRegistry,
    options: BroadcasterOptions = {}
  ) {
    this.deliveryTimeoutMs = options.deliveryTimeoutMs ?? 10000;
  }

  /**
   * Start the broadcast loop.
   */
  start(): void {
    if (this.loop || this.stopped) {
      return;
    }
    this.loop = this.run();
    log.info("Broadcast loop started");
  }

  /**
   * Stop the loop and drop anything still queued. Nothing is delivered
   * once this has been called.
   */
  async stop(): Promise<void> {
    if (this.stopped) {
      await this.loop;
      return;
    }
    this.stopped = true;

    const dropped = this.queue.length;
    this.queue = [];
    this.wake?.();

    await this.loop;
    log.info("Broadcast loop stopped", { dropped });
  }

  /**
   * Queue a notification for delivery. Returns false after `stop()`.
   */
  enqueue(notification: PriceNotification): boolean {
    if (this.stopped) {
      return false;
    }
    this.queue.push(notification);
    this.wake?.();
    return true;
  }

  /**
   * Deliver one notification to every session in the registry snapshot
   * taken when this call starts. Sessions whose write fails are removed
   * and terminated; the others are unaffected.
   */
  async deliver(notification: PriceNotification): Promise<DeliveryReport> {
    if (this.stopped) {
      return { attempted: 0, delivered: 0, failed: 0 };
    }

    const message = serializeNotification(notification);
    const recipients = this.registry.snapshot();

    const results = await Promise.all(recipients.map((session) => this.write(session, message)));

    const delivered = results.filter(Boolean).length;
    const report: DeliveryReport = {
      attempted: recipients.length,
      delivered,
      failed: recipients.length - delivered,
    };

    this.stats.notifications++;
    this.stats.delivered += report.delivered;
    this.stats.failed += report.failed;

    if (report.attempted > 0) {
      log.debug("Broadcast notification", { ticker: notification.ticker, ...report });
    }
    return report;
  }

  getStats(): { queued: number; notifications: number; delivered: number; failed: number } {
    return { queued: this.queue.length, ...this.stats };
  }

  private async run(): Promise<void> {
    while (!this.stopped) {
      const next = this.queue.shift();
      if (!next) {
        await new Promise<void>((resolve) => {
          this.wake = resolve;
        });
        this.wake = null;
        continue;
      }
      await this.deliver(next);
    }
  }

  /**
   * Write to one session. Resolves true once `ws` reports the frame written,
   * false on any failure; never rejects.
   */
  private write(session: Session, message: string): Promise<boolean> {
    return new Promise((resolve) => {
      let settled = false;
      let timer: NodeJS.Timeout | null = null;

      const settle = (error?: unknown) => {
        if (settled) {
          return;
        }
        settled = true;
        if (timer) {
          clearTimeout(timer);
        }
        if (error === undefined) {
          resolve(true);
          return;
        }
        this.drop(session, error);
        resolve(false);
      };

      if (session.transport.readyState !== WebSocket.OPEN) {
        settle(new Error("transport is not open"));
        return;
      }

      timer = setTimeout(() => settle(new Error("write timed out")), this.deliveryTimeoutMs);

      try {
        session.transport.send(message, (error) => settle(error ?? undefined));
      } catch (error) {
        settle(error ?? new Error("send failed"));
      }
    });
  }

  private drop(session: Session, cause: unknown): void {
    if (!this.registry.remove(session)) {
      return;
    }

    const failure = new DeliveryError(session.id, cause);
    log.debug(failure.message, failure.context);

    try {
      session.transport.terminate();
    } catch (error) {
      log.debug("Failed to terminate session", { sessionId: session.id, error: toError(error).message });
    }
  }
}
