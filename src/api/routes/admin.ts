/**
 * User administration, gated on the `system` resource
 */

import { Hono, type Context } from "hono";
import { z } from "zod";
import { getPrincipal, requireAuth } from "../../auth/middleware";
import { createLogger } from "../../logging";
import type { UserRecord } from "../../storage/types";
import { parsePagination } from "../../utils/pagination";
import { ApiError } from "../error-codes";
import { apiError, validateBody, validateId } from "../middleware";
import { paginatedResponse } from "../responses";
import { toPublicUser, type RouteDeps } from "./deps";

const log = createLogger("admin-routes");

const setAdminSchema = z.object({
  isAdmin: z.boolean(),
});

export function adminRoutes(deps: RouteDeps): Hono {
  const { storage, auth } = deps;
  const { authorizer } = auth;
  const app = new Hono();
  app.use("*", requireAuth(auth.resolver));

  const targetId = (c: Context): string => validateId(c.req.param("id"), "User ID");

  const found = (user: UserRecord | null): UserRecord => {
    if (!user) {
      throw apiError(ApiError.NOT_FOUND, "User not found");
    }
    return user;
  };

  app.get("/users", async (c) => {
    await authorizer.assertAuthorized(getPrincipal(c), { type: "system" }, "read");
    const { limit, offset } = parsePagination(c.req.query("limit"), c.req.query("offset"));

    const { items, total } = await storage.users.list({ limit, offset });
    return paginatedResponse(c, items.map(toPublicUser), total, offset, limit);
  });

  app.put("/users/:id/activate", async (c) => {
    const principal = getPrincipal(c);
    await authorizer.assertAuthorized(principal, { type: "system" }, "manage");

    const user = found(await storage.users.setActive(targetId(c), true));
    log.info("User activated", { userId: user.id, by: principal.userId });
    return c.json(toPublicUser(user));
  });

  app.put("/users/:id/deactivate", async (c) => {
    const principal = getPrincipal(c);
    await authorizer.assertAuthorized(principal, { type: "system" }, "manage");
    const id = targetId(c);
    if (id === principal.userId) {
      throw apiError(ApiError.SELF_ACTION, "You cannot deactivate your own account");
    }

    const user = found(await storage.users.setActive(id, false));
    log.info("User deactivated", { userId: user.id, by: principal.userId });
    return c.json(toPublicUser(user));
  });

  app.put("/users/:id/admin", async (c) => {
    const principal = getPrincipal(c);
    await authorizer.assertAuthorized(principal, { type: "system" }, "manage");
    const id = targetId(c);
    const body = await validateBody(c, setAdminSchema);
    if (id === principal.userId && !body.isAdmin) {
      throw apiError(ApiError.SELF_ACTION, "You cannot remove your own administrator role");
    }

    const user = found(await storage.users.setAdmin(id, body.isAdmin));
    log.info("Administrator role changed", { userId: user.id, isAdmin: user.isAdmin, by: principal.userId });
    return c.json(toPublicUser(user));
  });

  return app;
}
