/**
 * Dependencies shared by the route modules
 */

import type { Context } from "hono";
import { ForbiddenError } from "../../auth/errors";
import { getPrincipal } from "../../auth/middleware";
import { scopesCapabilities, type Action, type ResourceType } from "../../auth/permissions";
import type { Principal } from "../../auth/principal";
import type { AuthServices } from "../../auth/token-service";
import type { Storage, UserRecord } from "../../storage/types";
import { ApiError } from "../error-codes";
import { apiError } from "../middleware";

export interface RouteDeps {
  storage: Storage;
  auth: AuthServices;
  session: {
    /** Signs session tokens and derives CSRF tokens */
    secret: string;
    ttlSeconds: number;
    /** Mark cookies Secure (production, behind TLS) */
    secureCookies: boolean;
  };
}

export interface PublicUser {
  id: string;
  username: string;
  email: string;
  fullName: string | null;
  isActive: boolean;
  isAdmin: boolean;
  createdAt: string;
  updatedAt: string;
}

export function toPublicUser(user: UserRecord): PublicUser {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    fullName: user.fullName,
    isActive: user.isActive,
    isAdmin: user.isAdmin,
    createdAt: user.createdAt,
    updatedAt: user.updatedAt,
  };
}

/**
 * The signed-in user's current row
 *
 * @throws APIError NOT_FOUND when the row disappeared after authentication
 */
export async function currentUser(c: Context, storage: Storage): Promise<UserRecord> {
  const user = await storage.users.findById(getPrincipal(c).userId);
  if (!user) {
    throw apiError(ApiError.NOT_FOUND, "User not found");
  }
  return user;
}

/**
 * Scope cap for routes with no single resource to authorize against, such
 * as listings. Session principals pass; their rows are filtered by role.
 *
 * @throws ForbiddenError
 */
export function assertScopeAllows(principal: Principal, action: Action, resourceType: ResourceType): void {
  if (principal.source === "api_key" && !scopesCapabilities(principal.scopes, resourceType).has(action)) {
    throw new ForbiddenError(action, resourceType);
  }
}

/**
 * Creating something new has no resource to check yet; API keys still need
 * a scope that would allow writing that kind of resource.
 *
 * @throws ForbiddenError
 */
export function assertMayCreate(principal: Principal, resourceType: ResourceType): void {
  assertScopeAllows(principal, "write", resourceType);
}
