/**
 * Resolved identity
 *
 * Handlers only ever see a Principal; the credential that produced it is
 * recorded in `source` and decides whether scopes apply.
 */

import type { ApiKeyScope } from "../storage/types";

interface PrincipalBase {
  userId: string;
  username: string;
  isAdmin: boolean;
}

export interface SessionPrincipal extends PrincipalBase {
  source: "session";
  tokenId: string;
  /** Unix seconds */
  expiresAt: number;
}

export interface ApiKeyPrincipal extends PrincipalBase {
  source: "api_key";
  keyId: string;
  scopes: readonly ApiKeyScope[];
}

export type Principal = SessionPrincipal | ApiKeyPrincipal;

export type AuthFailure =
  | "MissingCredential"
  | "Malformed"
  | "InvalidSignature"
  | "KeyNotFound"
  | "Expired"
  | "Inactive"
  | "Revoked";

export type AuthResult<P extends Principal = Principal> =
  | { ok: true; principal: P }
  | { ok: false; failure: AuthFailure };
