/**
 * API key management: a principal only ever sees its own user's keys
 *
 * Listing and inspecting keys takes a `read` or `admin` scope; creating,
 * editing and revoking keys takes a session login or an `admin`-scoped key,
 * so a narrow key cannot mint a broader one.
 */

import { Hono, type Context } from "hono";
import { z } from "zod";
import { createApiKeySchema, summarizeKeyUsage, toKeyInfo } from "../../auth/api-keys";
import { ForbiddenError } from "../../auth/errors";
import { getPrincipal, requireAuth } from "../../auth/middleware";
import type { Principal } from "../../auth/principal";
import { createLogger } from "../../logging";
import type { ApiKeyRecord } from "../../storage/types";
import { ApiError } from "../error-codes";
import { apiError, validateBody, validateId } from "../middleware";
import { listResponse } from "../responses";
import { currentUser, type RouteDeps } from "./deps";

const log = createLogger("api-key-routes");

const updateApiKeySchema = z
  .object({
    name: z.string().trim().min(1).max(255).optional(),
    description: z.string().max(1000).nullable().optional(),
    isActive: z.boolean().optional(),
  })
  .strict();

function assertMayReadKeys(principal: Principal): void {
  if (principal.source === "api_key" && !principal.scopes.some((scope) => scope === "read" || scope === "admin")) {
    throw new ForbiddenError("read", "api_key");
  }
}

function assertMayManageKeys(principal: Principal): void {
  if (principal.source === "api_key" && !principal.scopes.includes("admin")) {
    throw new ForbiddenError("manage", "api_key");
  }
}

export function apiKeyRoutes(deps: RouteDeps): Hono {
  const { storage, auth } = deps;
  const app = new Hono();
  app.use("*", requireAuth(auth.resolver));

  const ownKey = async (c: Context): Promise<ApiKeyRecord> => {
    const principal = getPrincipal(c);
    assertMayReadKeys(principal);
    const id = validateId(c.req.param("id"), "API key ID");
    const key = await storage.apiKeys.findForUser(id, principal.userId);
    if (!key) {
      throw apiError(ApiError.NOT_FOUND, "API key not found");
    }
    return key;
  };

  app.get("/", async (c) => {
    const principal = getPrincipal(c);
    assertMayReadKeys(principal);
    const keys = await storage.apiKeys.listForUser(principal.userId);
    return listResponse(c, keys.map(toKeyInfo));
  });

  app.post("/", async (c) => {
    assertMayManageKeys(getPrincipal(c));
    const body = await validateBody(c, createApiKeySchema);
    const user = await currentUser(c, storage);

    const { apiKey, key } = await auth.apiKeys.issue(user, body);
    return c.json(
      {
        apiKey,
        keyInfo: toKeyInfo(key),
        warning: "Store this API key securely. It will not be shown again.",
      },
      201
    );
  });

  app.get("/stats/usage", async (c) => {
    const principal = getPrincipal(c);
    assertMayReadKeys(principal);
    const keys = await storage.apiKeys.listForUser(principal.userId);
    return c.json(summarizeKeyUsage(keys, Date.now()));
  });

  app.get("/:id", async (c) => {
    return c.json(toKeyInfo(await ownKey(c)));
  });

  app.put("/:id", async (c) => {
    assertMayManageKeys(getPrincipal(c));
    const key = await ownKey(c);
    const body = await validateBody(c, updateApiKeySchema);

    const updated = await storage.apiKeys.update(key.id, body);
    if (!updated) {
      throw apiError(ApiError.NOT_FOUND, "API key not found");
    }
    log.info("API key updated", { userId: key.userId, keyId: key.id, isActive: updated.isActive });
    return c.json(toKeyInfo(updated));
  });

  app.delete("/:id", async (c) => {
    assertMayManageKeys(getPrincipal(c));
    const key = await ownKey(c);

    await storage.apiKeys.update(key.id, { isActive: false });
    log.info("API key revoked", { userId: key.userId, keyId: key.id });
    return c.body(null, 204);
  });

  return app;
}
