/**
 * Notification Listener
 *
 * Keeps a LISTEN subscription open on the upstream change channel for the
 * life of the process, hands every well-formed payload to the broadcaster,
 * and reconnects after a delay whenever the connection fails.
 *
 *   disconnected → connecting → subscribed
 *                      ↑             │ failure
 *                      └── backoff ←─┘
 *
 * `stop()` moves to shutting_down from any state.
 */

import EventEmitter from "eventemitter3";
import { logger } from "../utils/logger.js";
import { sleep, whenAborted } from "../utils/async.js";
import { MalformedPayloadError, UpstreamConnectionError, toError } from "../utils/errors.js";
import { parseNotification } from "./notification.js";
import type { NotificationSink } from "./broadcaster.js";
import type { BackoffStrategy } from "../utils/config.js";
import type { PriceNotification } from "../types/prices.js";
import type {
  ListenerError,
  ListenerHealth,
  ListenerState,
  UpstreamConnection,
  UpstreamConnectionFactory,
  UpstreamNotification,
} from "../types/listener.js";

const log = logger.child({ component: "listener" });

// A dead socket can make end() wait forever; give up on it after this long.
const CLOSE_TIMEOUT_MS = 2000;

export interface NotificationListenerOptions {
  channel: string;
  reconnectDelayMs: number;
  backoff: BackoffStrategy;
  maxReconnectDelayMs: number;
  livenessIntervalMs: number;
}

interface ListenerEvents {
  state: (state: ListenerState) => void;
}

/**
 * Delay before reconnect attempt number `failures` (1-based). Fixed by
 * default; "exponential" doubles per consecutive failure up to `max`.
 */
export function computeBackoffDelay(strategy: BackoffStrategy, base: number, max: number, failures: number): number {
  if (strategy === "fixed") {
    return base;
  }
  const attempt = Math.max(failures, 1);
  return Math.min(base * Math.pow(2, attempt - 1), max);
}

export class NotificationListener extends EventEmitter<ListenerEvents> {
  private state: ListenerState = "disconnected";
  private readonly shutdown = new AbortController();
  private loop: Promise<void> | null = null;
  private connection: UpstreamConnection | null = null;
  private consecutiveFailures = 0;
  private reconnectCount = 0;
  private notificationCount = 0;
  private malformedCount = 0;
  private lastNotificationTime: number | null = null;
  private lastError: ListenerError | null = null;

  constructor(
    private readonly createConnection: UpstreamConnectionFactory,
    private readonly sink: NotificationSink,
    private readonly options: NotificationListenerOptions
  ) {
    super();
  }

  /**
   * Begin subscribing in the background. Calling it again is a no-op.
   */
  start(): void {
    if (this.loop || this.shutdown.signal.aborted) {
      return;
    }
    log.info("Starting notification listener", { channel: this.options.channel });
    this.loop = this.run();
  }

  /**
   * Cancel any wait, close the upstream connection and stop delivering.
   * Resolves once the background loop has exited.
   */
  async stop(): Promise<void> {
    if (!this.shutdown.signal.aborted) {
      this.setState("shutting_down");
      this.shutdown.abort();
    }
    await this.loop;
  }

  getState(): ListenerState {
    return this.state;
  }

  isSubscribed(): boolean {
    return this.state === "subscribed";
  }

  getHealth(): ListenerHealth {
    return {
      state: this.state,
      isSubscribed: this.isSubscribed(),
      channel: this.options.channel,
      reconnectCount: this.reconnectCount,
      notificationCount: this.notificationCount,
      malformedCount: this.malformedCount,
      lastNotificationTime: this.lastNotificationTime,
      lastError: this.lastError,
    };
  }

  // ══════════════════════════════════════════════════════════════════════
  // PRIVATE METHODS
  // ══════════════════════════════════════════════════════════════════════

  private async run(): Promise<void> {
    const signal = this.shutdown.signal;

    while (!signal.aborted) {
      try {
        await this.subscribe(signal);
      } catch (error) {
        if (signal.aborted) {
          break;
        }
        this.recordFailure(error);
      }

      if (signal.aborted) {
        break;
      }
      await this.backoff(signal);
    }

    log.info("Notification listener stopped", { channel: this.options.channel });
  }

  /**
   * One connection's lifetime: connect, LISTEN, then watch it until it fails
   * or shutdown begins. Returns on shutdown, throws UpstreamConnectionError
   * on failure.
   */
  private async subscribe(signal: AbortSignal): Promise<void> {
    const { channel } = this.options;

    // Aborted when this subscription ends for any reason, which also
    // releases its timers and abort listeners.
    const scope = new AbortController();
    const cancelScope = () => scope.abort();
    signal.addEventListener("abort", cancelScope, { once: true });

    this.setState("connecting");
    const connection = this.createConnection();
    this.connection = connection;

    const lost = new Promise<UpstreamConnectionError>((resolve) => {
      connection.on("error", (error) => {
        resolve(new UpstreamConnectionError("Upstream connection error", error, { channel }));
      });
      connection.on("end", () => {
        resolve(new UpstreamConnectionError("Upstream connection closed", undefined, { channel }));
      });
    });
    connection.on("notification", (notification) => {
      this.handleNotification(connection, notification);
    });

    try {
      const setup = connection
        .connect()
        .then(() => connection.listen(channel))
        .then(
          () => null,
          (error: unknown) => new UpstreamConnectionError(`Failed to subscribe to ${channel}`, error, { channel })
        );

      const setupFailure = await Promise.race([setup, lost, whenAborted(scope.signal).then(() => null)]);
      if (setupFailure) {
        throw setupFailure;
      }
      if (signal.aborted) {
        return;
      }

      this.consecutiveFailures = 0;
      this.setState("subscribed");
      log.info("Listening for upstream notifications", { channel });

      await this.supervise(connection, lost, scope.signal);
    } finally {
      signal.removeEventListener("abort", cancelScope);
      scope.abort();
      this.connection = null;
      await this.closeConnection(connection);
    }
  }

  /**
   * Idle while subscribed. Every liveness interval the connection gets a
   * round trip; quiet periods are normal, only a failed round trip or a
   * connection error/end ends the subscription. Resolves on abort.
   */
  private supervise(
    connection: UpstreamConnection,
    lost: Promise<UpstreamConnectionError>,
    signal: AbortSignal
  ): Promise<void> {
    const { channel, livenessIntervalMs } = this.options;

    return new Promise<void>((resolve, reject) => {
      let timer: NodeJS.Timeout | null = null;
      let done = false;

      const finish = (failure: UpstreamConnectionError | null) => {
        if (done) {
          return;
        }
        done = true;
        if (timer) {
          clearTimeout(timer);
        }
        signal.removeEventListener("abort", onAbort);
        if (failure) {
          reject(failure);
        } else {
          resolve();
        }
      };
      const onAbort = () => finish(null);

      const check = () => {
        timer = null;
        void connection.ping().then(
          () => {
            if (!done) {
              log.debug("Liveness check passed", { channel });
              schedule();
            }
          },
          (error: unknown) => finish(new UpstreamConnectionError("Liveness check failed", error, { channel }))
        );
      };
      const schedule = () => {
        timer = setTimeout(check, livenessIntervalMs);
      };

      if (signal.aborted) {
        finish(null);
        return;
      }
      signal.addEventListener("abort", onAbort, { once: true });
      void lost.then(finish);
      schedule();
    });
  }

  private handleNotification(connection: UpstreamConnection, notification: UpstreamNotification): void {
    if (connection !== this.connection || this.state !== "subscribed") {
      return;
    }
    if (notification.channel !== this.options.channel) {
      return;
    }

    let parsed: PriceNotification;
    try {
      parsed = parseNotification(notification.payload);
    } catch (error) {
      this.malformedCount++;
      if (error instanceof MalformedPayloadError) {
        log.warn("Discarding malformed notification", { error: error.message, ...error.context });
      } else {
        log.error("Failed to parse notification", toError(error));
      }
      return;
    }

    this.notificationCount++;
    this.lastNotificationTime = Date.now();
    this.sink.enqueue(parsed);
  }

  private async backoff(signal: AbortSignal): Promise<void> {
    const delay = this.nextDelay();
    this.setState("backoff");
    log.info("Scheduling reconnect", {
      attempt: this.consecutiveFailures,
      delayMs: delay,
    });

    await sleep(delay, signal);
    if (!signal.aborted) {
      this.reconnectCount++;
    }
  }

  private nextDelay(): number {
    const { backoff, reconnectDelayMs, maxReconnectDelayMs } = this.options;
    return computeBackoffDelay(backoff, reconnectDelayMs, maxReconnectDelayMs, this.consecutiveFailures);
  }

  private recordFailure(error: unknown): void {
    this.consecutiveFailures++;

    const failure =
      error instanceof UpstreamConnectionError
        ? error
        : new UpstreamConnectionError("Unexpected listener failure", error, { channel: this.options.channel });
    const causeCode = typeof failure.context.causeCode === "string" ? failure.context.causeCode : undefined;

    this.lastError = {
      code: causeCode ?? failure.code,
      message: failure.message,
      timestamp: failure.timestamp,
    };

    // The host cannot be resolved at all: retrying will not help until the
    // configuration changes, but the process stays up and /health shows it.
    if (causeCode === "ENOTFOUND") {
      log.error("Upstream host cannot be resolved", failure, failure.context);
      return;
    }
    log.warn(failure.message, { ...failure.context, consecutiveFailures: this.consecutiveFailures });
  }

  private async closeConnection(connection: UpstreamConnection): Promise<void> {
    const closed = connection.close().then(
      () => undefined,
      (error: unknown) => {
        log.debug("Error while closing upstream connection", { error: toError(error).message });
      }
    );

    const timeout = new AbortController();
    await Promise.race([closed, sleep(CLOSE_TIMEOUT_MS, timeout.signal)]);
    timeout.abort();
  }

  private setState(newState: ListenerState): void {
    if (this.state === "shutting_down" || this.state === newState) {
      return;
    }
    const oldState = this.state;
    this.state = newState;
    log.debug("Listener state changed", { from: oldState, to: newState });
    this.emit("state", newState);
  }
}
