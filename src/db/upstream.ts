/**
 * pg-backed upstream connection for the notification listener.
 */

import EventEmitter from "eventemitter3";
import pg from "pg";
import type { ClientConfig } from "pg";
import type { UpstreamConnection, UpstreamEvents, UpstreamConnectionFactory } from "../types/listener.js";

export class PgUpstreamConnection extends EventEmitter<UpstreamEvents> implements UpstreamConnection {
  private client: pg.Client;

  constructor(options: ClientConfig) {
    super();
    this.client = new pg.Client(options);

    this.client.on("notification", (message) => {
      this.emit("notification", { channel: message.channel, payload: message.payload });
    });
    this.client.on("error", (error) => {
      this.emit("error", error);
    });
    this.client.on("end", () => {
      this.emit("end");
    });
  }

  async connect(): Promise<void> {
    await this.client.connect();
  }

  async listen(channel: string): Promise<void> {
    await this.client.query(`LISTEN ${this.client.escapeIdentifier(channel)}`);
  }

  async ping(): Promise<void> {
    await this.client.query("SELECT 1");
  }

  /**
   * Detach our listeners and end the client. The client's own "error"
   * handler stays registered so a late socket error cannot go unhandled.
   */
  async close(): Promise<void> {
    this.removeAllListeners();
    await this.client.end();
  }
}

export function pgUpstreamFactory(options: ClientConfig): UpstreamConnectionFactory {
  return () => new PgUpstreamConnection(options);
}
