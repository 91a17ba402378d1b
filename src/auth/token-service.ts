/**
 * Auth service wiring
 *
 * Builds the token services, resolver and authorizer over one credential
 * store, secret and clock.
 */

import type { GuardedCache } from "../cache/guarded";
import type { Storage } from "../storage/types";
import { ApiKeyService } from "./api-keys";
import { Authorizer } from "./authorizer";
import { TokenDenylist } from "./denylist";
import { IdentityResolver } from "./identity";
import { createPasswordHasher, type PasswordHasher } from "./passwords";
import { SessionTokenService } from "./session-token";

export interface AuthServicesOptions {
  storage: Storage;
  secret: string;
  sessionTtlSeconds: number;
  bcryptRounds: number;
  authTimeoutMs: number;
  cache: GuardedCache | null;
  now?: () => number;
}

export interface AuthServices {
  passwords: PasswordHasher;
  sessions: SessionTokenService;
  apiKeys: ApiKeyService;
  denylist: TokenDenylist;
  resolver: IdentityResolver;
  authorizer: Authorizer;
}

export function createAuthServices(options: AuthServicesOptions): AuthServices {
  const now = options.now ?? Date.now;
  const denylist = new TokenDenylist(options.cache, now);
  const sessions = new SessionTokenService({
    secret: options.secret,
    ttlSeconds: options.sessionTtlSeconds,
    users: options.storage.users,
    denylist,
    now,
  });
  const apiKeys = new ApiKeyService({ apiKeys: options.storage.apiKeys, users: options.storage.users, now });

  return {
    passwords: createPasswordHasher(options.bcryptRounds),
    sessions,
    apiKeys,
    denylist,
    resolver: new IdentityResolver({ sessions, apiKeys, timeoutMs: options.authTimeoutMs }),
    authorizer: new Authorizer(options.storage.groups),
  };
}
