/**
 * Session tokens
 *
 * Stateless HS256 tokens naming a user. The signature is checked before
 * anything touches the credential store, and the denylist before the user
 * row; both are only consulted for tokens this server actually issued.
 */

import { nanoid } from "nanoid";
import type { UserRecord, UserRepository } from "../storage/types";
import type { TokenDenylist } from "./denylist";
import { signJWT, verifyJWT, type JWTFailure, type JWTPayload } from "./jwt";
import type { AuthFailure, AuthResult, SessionPrincipal } from "./principal";

const JWT_FAILURES: Record<JWTFailure, AuthFailure> = {
  malformed: "Malformed",
  invalid_signature: "InvalidSignature",
  expired: "Expired",
};

export interface IssuedSessionToken {
  token: string;
  jti: string;
  expiresAt: Date;
}

export interface SessionTokenServiceOptions {
  secret: string;
  ttlSeconds: number;
  users: Pick<UserRepository, "findById">;
  denylist: TokenDenylist;
  now?: () => number;
}

export class SessionTokenService {
  private readonly now: () => number;

  constructor(private readonly options: SessionTokenServiceOptions) {
    this.now = options.now ?? Date.now;
  }

  async issue(user: Pick<UserRecord, "id">): Promise<IssuedSessionToken> {
    const jti = nanoid();
    const { token, payload } = await signJWT(
      { sub: user.id, jti },
      { secret: this.options.secret, expiresInSeconds: this.options.ttlSeconds, now: this.now }
    );
    return { token, jti, expiresAt: new Date(payload.exp * 1000) };
  }

  /**
   * Signature, expiry and issuer only; no store access
   */
  async verify(token: string): Promise<JWTPayload | null> {
    const result = await verifyJWT(token, { secret: this.options.secret, now: this.now });
    return result.valid ? result.payload : null;
  }

  async validate(token: string): Promise<AuthResult<SessionPrincipal>> {
    const result = await verifyJWT(token, { secret: this.options.secret, now: this.now });
    if (!result.valid) {
      return { ok: false, failure: JWT_FAILURES[result.reason] };
    }

    const { payload } = result;
    if (await this.options.denylist.isRevoked(payload.jti)) {
      return { ok: false, failure: "Revoked" };
    }
    const user = await this.options.users.findById(payload.sub);
    if (!user || !user.isActive) {
      return { ok: false, failure: "Inactive" };
    }

    return {
      ok: true,
      principal: {
        source: "session",
        userId: user.id,
        username: user.username,
        isAdmin: user.isAdmin,
        tokenId: payload.jti,
        expiresAt: payload.exp,
      },
    };
  }

  /**
   * Deny a token for the rest of its lifetime
   *
   * @returns false when the token does not verify
   */
  async revoke(token: string): Promise<boolean> {
    const payload = await this.verify(token);
    if (!payload) return false;
    await this.options.denylist.revoke(payload.jti, payload.exp * 1000);
    return true;
  }
}
