/**
 * Revoked session token ids
 *
 * Entries live until the token would have expired anyway. Revocations are
 * written to the shared cache when one is reachable and always kept
 * in-process, so a logout on this instance holds even while the cache is down.
 */

import type { GuardedCache } from "../cache/guarded";
import { createLogger } from "../logging";

const log = createLogger("auth");

const KEY_PREFIX = "revoked:";

export class TokenDenylist {
  private readonly local = new Map<string, number>();

  constructor(
    private readonly cache: GuardedCache | null,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * @param expiresAtMs - When the token expires; nothing is stored past it
   */
  async revoke(jti: string, expiresAtMs: number): Promise<void> {
    const ttlMs = expiresAtMs - this.now();
    if (ttlMs <= 0) return;

    this.prune();
    this.local.set(jti, expiresAtMs);

    if (this.cache) {
      try {
        await this.cache.run("revoke token", (c) => c.setWithTtl(KEY_PREFIX + jti, "1", ttlMs));
      } catch (error) {
        log.warn("Revocation kept in-process only", { tokenId: jti, error: toError(error) });
      }
    }
  }

  async isRevoked(jti: string): Promise<boolean> {
    const localExpiry = this.local.get(jti);
    if (localExpiry !== undefined) {
      if (localExpiry > this.now()) return true;
      this.local.delete(jti);
    }

    if (!this.cache) return false;
    try {
      return await this.cache.run("check revocation", (c) => c.exists(KEY_PREFIX + jti));
    } catch (error) {
      log.debug("Revocation check skipped shared cache", { tokenId: jti, error: toError(error) });
      return false;
    }
  }

  get size(): number {
    return this.local.size;
  }

  private prune(): void {
    const now = this.now();
    for (const [jti, expiresAt] of this.local) {
      if (expiresAt <= now) this.local.delete(jti);
    }
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
