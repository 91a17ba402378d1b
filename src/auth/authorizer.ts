/**
 * Authorization Engine
 *
 * Looks up the one membership a decision needs, then defers to the pure
 * capability rules in permissions.ts.
 */

import { createLogger } from "../logging";
import type { MembershipLookup } from "../storage/types";
import { ForbiddenError } from "./errors";
import {
  effectiveCapabilities,
  governingGroup,
  resourceId,
  type Action,
  type CapabilitySet,
  type ResourceRef,
} from "./permissions";
import type { Principal } from "./principal";

const log = createLogger("authz");

export class Authorizer {
  constructor(private readonly memberships: MembershipLookup) {}

  async capabilities(principal: Principal, resource: ResourceRef): Promise<CapabilitySet> {
    const groupId = principal.isAdmin ? null : governingGroup(resource);
    const role = groupId ? await this.memberships.getRole(groupId, principal.userId) : null;
    return effectiveCapabilities(principal, resource, role);
  }

  async authorize(principal: Principal, resource: ResourceRef, action: Action): Promise<boolean> {
    return (await this.capabilities(principal, resource)).has(action);
  }

  /**
   * @throws ForbiddenError naming the resource when the action is not allowed
   */
  async assertAuthorized(principal: Principal, resource: ResourceRef, action: Action): Promise<void> {
    if (await this.authorize(principal, resource, action)) {
      return;
    }

    log.info("Access denied", {
      userId: principal.userId,
      source: principal.source,
      action,
      resourceType: resource.type,
      resourceId: resourceId(resource),
    });
    throw new ForbiddenError(action, resource.type, resourceId(resource));
  }
}
