/**
 * Admission check for WebSocket connections.
 */

import type { CredentialStore } from "./credentials.js";
import { logger } from "../utils/logger.js";
import { toError } from "../utils/errors.js";

export type AuthDecision = "accepted" | "rejected";

const log = logger.child({ component: "auth" });

export class AuthGate {
  constructor(private readonly store: CredentialStore) {}

  /**
   * Decide whether a connection presenting `credential` may be admitted.
   * Never throws: a store failure is logged and rejects the connection.
   */
  async validate(credential: string | null | undefined): Promise<AuthDecision> {
    if (!credential) {
      log.debug("Credential missing");
      return "rejected";
    }

    try {
      if (await this.store.isValid(credential)) {
        return "accepted";
      }
    } catch (error) {
      log.error("Credential store lookup failed", toError(error));
      return "rejected";
    }

    log.debug("Credential not recognized");
    return "rejected";
  }
}
