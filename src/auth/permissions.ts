/**
 * Capability model for boards, groups, docs and user administration
 *
 * Everything here is pure: the caller looks up the principal's group role
 * (if any) and passes it in. A principal's role decides what it could do;
 * an API key's scopes cap that further.
 *
 * Precedence:
 * - Administrators hold every action on every resource
 * - A personal board's owner holds every action on it
 * - Group boards and groups follow the member's group role
 * - Any authenticated principal may read docs
 * - Nothing else is allowed (orphaned boards included)
 */

import type { ApiKeyScope, BoardRecord, GroupRole } from "../storage/types";
import type { Principal } from "./principal";

export const ACTIONS = ["read", "write", "manage", "manage_members", "delete"] as const;
export type Action = (typeof ACTIONS)[number];

export const RESOURCE_TYPES = ["board", "group", "docs", "system"] as const;
export type ResourceType = (typeof RESOURCE_TYPES)[number];

export type CapabilitySet = ReadonlySet<Action>;

export type ResourceRef =
  | { type: "board"; board: Pick<BoardRecord, "id" | "ownerId" | "groupId"> }
  | { type: "group"; groupId: string }
  | { type: "docs" }
  | { type: "system" };

const capabilities = (...actions: Action[]): CapabilitySet => new Set(actions);

export const NO_CAPABILITIES: CapabilitySet = capabilities();
export const ALL_CAPABILITIES: CapabilitySet = capabilities(...ACTIONS);

export const BOARD_ROLE_CAPABILITIES: Record<GroupRole, CapabilitySet> = {
  owner: ALL_CAPABILITIES,
  admin: ALL_CAPABILITIES,
  member: capabilities("read", "write"),
};

/** Group `write` means creating boards inside the group */
export const GROUP_ROLE_CAPABILITIES: Record<GroupRole, CapabilitySet> = {
  owner: ALL_CAPABILITIES,
  admin: capabilities("read", "write", "manage", "manage_members"),
  member: capabilities("read", "write"),
};

/**
 * What one scope permits on a resource type
 *
 * Only `admin` reaches `system`; `docs` reaches nothing but docs.
 */
export function scopeCapabilities(scope: ApiKeyScope, resourceType: ResourceType): CapabilitySet {
  switch (scope) {
    case "admin":
      return ALL_CAPABILITIES;
    case "read":
      return resourceType === "system" ? NO_CAPABILITIES : capabilities("read");
    case "write":
      return resourceType === "system"
        ? NO_CAPABILITIES
        : capabilities("write", "manage", "manage_members", "delete");
    case "docs":
      return resourceType === "docs" ? capabilities("read") : NO_CAPABILITIES;
  }
}

export function scopesCapabilities(scopes: readonly ApiKeyScope[], resourceType: ResourceType): CapabilitySet {
  const union = new Set<Action>();
  for (const scope of scopes) {
    for (const action of scopeCapabilities(scope, resourceType)) {
      union.add(action);
    }
  }
  return union;
}

export function intersectCapabilities(a: CapabilitySet, b: CapabilitySet): CapabilitySet {
  const result = new Set<Action>();
  for (const action of a) {
    if (b.has(action)) result.add(action);
  }
  return result;
}

/**
 * The group whose membership decides access, if any
 */
export function governingGroup(resource: ResourceRef): string | null {
  switch (resource.type) {
    case "board":
      return resource.board.ownerId === null ? resource.board.groupId : null;
    case "group":
      return resource.groupId;
    default:
      return null;
  }
}

/**
 * Capabilities the principal's user holds, before any scope cap
 *
 * @param groupRole - The user's role in `governingGroup(resource)`, or null
 */
export function roleCapabilities(
  principal: Pick<Principal, "userId" | "isAdmin">,
  resource: ResourceRef,
  groupRole: GroupRole | null
): CapabilitySet {
  if (principal.isAdmin) {
    return ALL_CAPABILITIES;
  }

  switch (resource.type) {
    case "board": {
      const { ownerId, groupId } = resource.board;
      if (ownerId !== null) {
        return ownerId === principal.userId ? ALL_CAPABILITIES : NO_CAPABILITIES;
      }
      if (groupId !== null && groupRole) {
        return BOARD_ROLE_CAPABILITIES[groupRole];
      }
      return NO_CAPABILITIES;
    }
    case "group":
      return groupRole ? GROUP_ROLE_CAPABILITIES[groupRole] : NO_CAPABILITIES;
    case "docs":
      return capabilities("read");
    case "system":
      return NO_CAPABILITIES;
  }
}

/**
 * Role capabilities, capped by scopes for API-key principals
 */
export function effectiveCapabilities(
  principal: Principal,
  resource: ResourceRef,
  groupRole: GroupRole | null
): CapabilitySet {
  const fromRole = roleCapabilities(principal, resource, groupRole);
  if (principal.source === "session") {
    return fromRole;
  }
  return intersectCapabilities(fromRole, scopesCapabilities(principal.scopes, resource.type));
}

export function resourceId(resource: ResourceRef): string | null {
  switch (resource.type) {
    case "board":
      return resource.board.id;
    case "group":
      return resource.groupId;
    default:
      return null;
  }
}
