import { Hono } from "hono";
import { getPrincipal, requireAuth } from "../../auth/middleware";
import { listErrorCodes } from "../error-codes";
import { listResponse } from "../responses";
import type { RouteDeps } from "./deps";

/**
 * Reference material for API clients; readable by any principal, including
 * `docs`-scoped keys
 */
export function docsRoutes(deps: RouteDeps): Hono {
  const { auth } = deps;
  const app = new Hono();
  app.use("*", requireAuth(auth.resolver));

  app.get("/errors", async (c) => {
    await auth.authorizer.assertAuthorized(getPrincipal(c), { type: "docs" }, "read");
    const errors = listErrorCodes();
    return listResponse(c, errors);
  });

  return app;
}
