/**
 * Registry of admitted WebSocket sessions.
 *
 * The only place membership changes. Each call runs to completion on the
 * event loop, so add/remove/snapshot never observe a half-applied update;
 * broadcasts iterate a snapshot instead of the live map so admissions during
 * a delivery do not affect it.
 */

import { randomUUID } from "crypto";
import { logger } from "../utils/logger.js";
import { DuplicateSessionError, toError } from "../utils/errors.js";
import type { Session, SessionTransport } from "../types/websocket.js";

const log = logger.child({ component: "registry" });

export function createSession(transport: SessionTransport, now: Date = new Date()): Session {
  return {
    id: randomUUID(),
    transport,
    admittedAt: now,
    isAlive: true,
  };
}

export class ConnectionRegistry {
  private sessions: Map<string, Session> = new Map();

  /**
   * Register a newly admitted session.
   *
   * @throws DuplicateSessionError if a session with the same id is registered.
   */
  add(session: Session): void {
    if (this.sessions.has(session.id)) {
      throw new DuplicateSessionError(session.id);
    }
    this.sessions.set(session.id, session);
    log.debug("Session admitted", { sessionId: session.id, sessionCount: this.sessions.size });
  }

  /**
   * Unregister a session. Returns false when it was not registered.
   */
  remove(session: Session): boolean {
    if (this.sessions.get(session.id) !== session) {
      return false;
    }
    this.sessions.delete(session.id);
    log.debug("Session removed", { sessionId: session.id, sessionCount: this.sessions.size });
    return true;
  }

  has(session: Session): boolean {
    return this.sessions.get(session.id) === session;
  }

  get(id: string): Session | undefined {
    return this.sessions.get(id);
  }

  /**
   * Point-in-time copy of the current members.
   */
  snapshot(): readonly Session[] {
    return Object.freeze(Array.from(this.sessions.values()));
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Remove every session and close its transport. Used at shutdown.
   */
  closeAll(code: number, reason: string): number {
    const sessions = this.snapshot();
    this.sessions.clear();

    for (const session of sessions) {
      try {
        session.transport.close(code, reason);
      } catch (error) {
        log.warn("Failed to close session", { sessionId: session.id, error: toError(error).message });
      }
    }

    if (sessions.length > 0) {
      log.info("Closed all sessions", { count: sessions.length, code });
    }
    return sessions.length;
  }
}
