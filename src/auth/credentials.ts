/**
 * Credential stores consulted by the AuthGate.
 */

import { createHash, timingSafeEqual } from "crypto";
import type pg from "pg";

export interface CredentialStore {
  isValid(credential: string): Promise<boolean>;
}

/**
 * API keys are stored as SHA-256 hex digests.
 */
export function hashApiKey(key: string): string {
  return createHash("sha256").update(key, "utf8").digest("hex");
}

/**
 * Looks keys up in the `api_keys` table. Revoked keys are invalid.
 */
export class PgCredentialStore implements CredentialStore {
  constructor(private readonly pool: pg.Pool) {}

  async isValid(credential: string): Promise<boolean> {
    const result = await this.pool.query(
      `SELECT 1
         FROM api_keys
        WHERE key_hash = $1 AND revoked_at IS NULL
        LIMIT 1`,
      [hashApiKey(credential)]
    );
    return (result.rowCount ?? 0) > 0;
  }
}

/**
 * Fixed key list from configuration, for local development.
 */
export class StaticCredentialStore implements CredentialStore {
  private readonly digests: Buffer[];

  constructor(keys: readonly string[]) {
    this.digests = keys.map((key) => Buffer.from(hashApiKey(key), "hex"));
  }

  async isValid(credential: string): Promise<boolean> {
    const candidate = Buffer.from(hashApiKey(credential), "hex");
    // Digests are fixed-length, so timingSafeEqual never sees a length mismatch.
    return this.digests.some((digest) => timingSafeEqual(digest, candidate));
  }
}
