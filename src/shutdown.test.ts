import { describe, expect, it, vi } from "vitest";

import { shutdownServices } from "./shutdown.js";
import { Broadcaster } from "./realtime/broadcaster.js";
import { ConnectionRegistry, createSession } from "./realtime/registry.js";
import { NotificationListener } from "./realtime/listener.js";
import { FakeTransport, FakeUpstream } from "./testing/fakes.js";

function payload(price: number): string {
  return JSON.stringify({ ticker: "TRG", price, updated_at: "2026-01-12T08:10:00.000Z" });
}

describe("shutdownServices", () => {
  it("delivers nothing queued once shutdown begins, even while the upstream is slow to close", async () => {
    const registry = new ConnectionRegistry();
    const transport = new FakeTransport();
    registry.add(createSession(transport));

    const broadcaster = new Broadcaster(registry);
    const upstream = new FakeUpstream();
    const listener = new NotificationListener(upstream.factory, broadcaster, {
      channel: "stock_updates",
      reconnectDelayMs: 20,
      backoff: "fixed",
      maxReconnectDelayMs: 1000,
      livenessIntervalMs: 60000,
    });
    broadcaster.start();
    listener.start();
    await vi.waitFor(() => expect(listener.isSubscribed()).toBe(true));

    const connection = upstream.latest;
    if (connection) {
      connection.closeDelayMs = 100;
    }
    connection?.notify(payload(72.45));
    connection?.notify(payload(72.5));
    connection?.notify(payload(72.55));

    const order: string[] = [];
    await shutdownServices({
      listener,
      broadcaster,
      webSocketApi: { stop: async () => void order.push("websocket") },
      apiServer: { stop: async () => void order.push("api") },
      pool: { end: async () => void order.push("pool") },
    });

    expect(transport.sent).toEqual([]);
    expect(connection?.closed).toBe(true);
    expect(listener.getState()).toBe("shutting_down");
    expect(broadcaster.getStats()).toEqual({ queued: 0, notifications: 0, delivered: 0, failed: 0 });
    expect(order).toEqual(["websocket", "api", "pool"]);
  });

  it("stops the listener before closing the client-facing servers", async () => {
    const order: string[] = [];
    const target = (name: string) => ({
      stop: async () => {
        order.push(name);
      },
    });

    await shutdownServices({
      listener: target("listener"),
      broadcaster: target("broadcaster"),
      webSocketApi: target("websocket"),
      apiServer: target("api"),
      pool: { end: async () => void order.push("pool") },
    });

    expect(order).toEqual(["broadcaster", "listener", "websocket", "api", "pool"]);
  });
});
