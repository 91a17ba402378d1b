/**
 * Groups and memberships
 *
 * Granting or revoking `owner` takes owner-level control of the group
 * (the `delete` capability); any member may leave on their own.
 */

import { Hono, type Context } from "hono";
import { z } from "zod";
import { getPrincipal, requireAuth } from "../../auth/middleware";
import type { ResourceRef } from "../../auth/permissions";
import { createLogger } from "../../logging";
import { GROUP_ROLES, type GroupRecord, type MembershipChange } from "../../storage/types";
import { ApiError } from "../error-codes";
import { apiError, validateBody, validateId } from "../middleware";
import { listResponse } from "../responses";
import { assertMayCreate, assertScopeAllows, type RouteDeps } from "./deps";

const log = createLogger("group-routes");

const createGroupSchema = z.object({
  name: z.string().trim().min(1).max(255),
  description: z.string().max(1000).nullish(),
});

const updateGroupSchema = z.object({
  name: z.string().trim().min(1).max(255).optional(),
  description: z.string().max(1000).nullable().optional(),
});

const addMemberSchema = z.object({
  userId: z.string().min(1),
  role: z.enum(GROUP_ROLES).default("member"),
});

const changeRoleSchema = z.object({
  role: z.enum(GROUP_ROLES),
});

function groupRef(group: GroupRecord): ResourceRef {
  return { type: "group", groupId: group.id };
}

/**
 * @throws APIError NOT_FOUND or LAST_OWNER
 */
function assertChanged(result: MembershipChange): void {
  if (result === "not_member") {
    throw apiError(ApiError.NOT_FOUND, "User is not a member of this group");
  }
  if (result === "last_owner") {
    throw apiError(ApiError.LAST_OWNER);
  }
}

export function groupRoutes(deps: RouteDeps): Hono {
  const { storage, auth } = deps;
  const { authorizer } = auth;
  const app = new Hono();
  app.use("*", requireAuth(auth.resolver));

  const loadGroup = async (c: Context): Promise<GroupRecord> => {
    const id = validateId(c.req.param("id"), "Group ID");
    const group = await storage.groups.findById(id);
    if (!group) {
      throw apiError(ApiError.NOT_FOUND, "Group not found");
    }
    return group;
  };

  app.get("/", async (c) => {
    const principal = getPrincipal(c);
    assertScopeAllows(principal, "read", "group");
    const groups = await storage.groups.listForUser(principal.userId);
    return listResponse(c, groups);
  });

  app.post("/", async (c) => {
    const principal = getPrincipal(c);
    assertMayCreate(principal, "group");
    const body = await validateBody(c, createGroupSchema);

    const group = await storage.groups.create({
      name: body.name,
      description: body.description ?? null,
      createdBy: principal.userId,
    });
    log.info("Group created", { groupId: group.id, userId: principal.userId });
    return c.json({ ...group, role: "owner", memberCount: 1 }, 201);
  });

  app.get("/:id", async (c) => {
    const principal = getPrincipal(c);
    const group = await loadGroup(c);
    await authorizer.assertAuthorized(principal, groupRef(group), "read");

    const role = await storage.groups.getRole(group.id, principal.userId);
    return c.json({ ...group, role });
  });

  app.patch("/:id", async (c) => {
    const group = await loadGroup(c);
    await authorizer.assertAuthorized(getPrincipal(c), groupRef(group), "manage");
    const body = await validateBody(c, updateGroupSchema);

    const updated = await storage.groups.update(group.id, body);
    if (!updated) {
      throw apiError(ApiError.NOT_FOUND, "Group not found");
    }
    return c.json(updated);
  });

  app.delete("/:id", async (c) => {
    const principal = getPrincipal(c);
    const group = await loadGroup(c);
    await authorizer.assertAuthorized(principal, groupRef(group), "delete");

    await storage.groups.delete(group.id);
    log.info("Group deleted", { groupId: group.id, userId: principal.userId });
    return c.body(null, 204);
  });

  app.get("/:id/members", async (c) => {
    const group = await loadGroup(c);
    await authorizer.assertAuthorized(getPrincipal(c), groupRef(group), "read");

    const members = await storage.groups.listMembers(group.id);
    return listResponse(c, members);
  });

  app.post("/:id/members", async (c) => {
    const principal = getPrincipal(c);
    const group = await loadGroup(c);
    await authorizer.assertAuthorized(principal, groupRef(group), "manage_members");
    const body = await validateBody(c, addMemberSchema);
    if (body.role === "owner") {
      await authorizer.assertAuthorized(principal, groupRef(group), "delete");
    }

    const user = await storage.users.findById(body.userId);
    if (!user) {
      throw apiError(ApiError.NOT_FOUND, "User not found");
    }

    if ((await storage.groups.addMember(group.id, user.id, body.role)) === "already_member") {
      throw apiError(ApiError.ALREADY_EXISTS, "User is already a member of this group");
    }
    log.info("Member added", { groupId: group.id, memberId: user.id, role: body.role, by: principal.userId });
    return c.json({ groupId: group.id, userId: user.id, role: body.role }, 201);
  });

  app.put("/:id/members/:userId", async (c) => {
    const principal = getPrincipal(c);
    const group = await loadGroup(c);
    const memberId = validateId(c.req.param("userId"), "User ID");
    await authorizer.assertAuthorized(principal, groupRef(group), "manage_members");
    const body = await validateBody(c, changeRoleSchema);

    const currentRole = await storage.groups.getRole(group.id, memberId);
    if (body.role === "owner" || currentRole === "owner") {
      await authorizer.assertAuthorized(principal, groupRef(group), "delete");
    }

    assertChanged(await storage.groups.changeRole(group.id, memberId, body.role));
    log.info("Member role changed", { groupId: group.id, memberId, role: body.role, by: principal.userId });
    return c.json({ groupId: group.id, userId: memberId, role: body.role });
  });

  app.delete("/:id/members/:userId", async (c) => {
    const principal = getPrincipal(c);
    const group = await loadGroup(c);
    const memberId = validateId(c.req.param("userId"), "User ID");

    if (memberId === principal.userId) {
      await authorizer.assertAuthorized(principal, groupRef(group), "write");
    } else {
      await authorizer.assertAuthorized(principal, groupRef(group), "manage_members");
      if ((await storage.groups.getRole(group.id, memberId)) === "owner") {
        await authorizer.assertAuthorized(principal, groupRef(group), "delete");
      }
    }

    assertChanged(await storage.groups.removeMember(group.id, memberId));
    log.info("Member removed", { groupId: group.id, memberId, by: principal.userId });
    return c.body(null, 204);
  });

  return app;
}
