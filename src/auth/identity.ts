/**
 * Identity Resolver
 *
 * Turns a raw credential into a Principal. The credential's shape alone picks
 * the validator; both validators report failures in one vocabulary so the
 * HTTP layer can answer every failure identically.
 */

import { TIMEOUTS, withTimeout } from "../api/timeout";
import { createLogger } from "../logging";
import { API_KEY_PREFIX, toAuthResult, type ApiKeyService } from "./api-keys";
import type { AuthResult } from "./principal";
import type { SessionTokenService } from "./session-token";

const log = createLogger("auth");

const TOKEN_SHAPE = /^[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+$/;

export type CredentialKind = "api_key" | "session" | "malformed";

export function classifyCredential(raw: string): CredentialKind {
  if (raw.startsWith(API_KEY_PREFIX)) return "api_key";
  if (TOKEN_SHAPE.test(raw)) return "session";
  return "malformed";
}

export interface IdentityResolverOptions {
  sessions: SessionTokenService;
  apiKeys: ApiKeyService;
  /** Budget for one resolution, store lookups included */
  timeoutMs?: number;
}

export class IdentityResolver {
  private readonly timeoutMs: number;

  constructor(private readonly options: IdentityResolverOptions) {
    this.timeoutMs = options.timeoutMs ?? TIMEOUTS.AUTH;
  }

  /**
   * @throws TimeoutError when resolution exceeds its budget
   */
  async resolve(raw: string | null | undefined): Promise<AuthResult> {
    const credential = raw?.trim();
    if (!credential) {
      return { ok: false, failure: "MissingCredential" };
    }

    const result = await withTimeout(this.resolveCredential(credential), this.timeoutMs, "Credential resolution");

    if (result.ok) {
      log.debug("Credential resolved", { source: result.principal.source, userId: result.principal.userId });
    } else {
      log.debug("Credential rejected", { failure: result.failure });
    }
    return result;
  }

  private async resolveCredential(credential: string): Promise<AuthResult> {
    switch (classifyCredential(credential)) {
      case "api_key": {
        const validation = await this.options.apiKeys.validate(credential);
        if (validation.ok) {
          this.options.apiKeys.recordUsage(validation.key.id);
        }
        return toAuthResult(validation);
      }
      case "session":
        return this.options.sessions.validate(credential);
      case "malformed":
        return { ok: false, failure: "Malformed" };
    }
  }
}
