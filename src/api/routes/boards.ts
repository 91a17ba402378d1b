/**
 * Boards: personal (one owner) or group-owned
 */

import { Hono, type Context } from "hono";
import { z } from "zod";
import { getPrincipal, requireAuth } from "../../auth/middleware";
import type { ResourceRef } from "../../auth/permissions";
import { createLogger } from "../../logging";
import type { BoardRecord } from "../../storage/types";
import { ApiError } from "../error-codes";
import { apiError, validateBody, validateId } from "../middleware";
import { listResponse } from "../responses";
import { assertMayCreate, assertScopeAllows, type RouteDeps } from "./deps";

const log = createLogger("board-routes");

const createBoardSchema = z.object({
  name: z.string().trim().min(1).max(255),
  description: z.string().max(1000).nullish(),
  /** Omit for a personal board */
  groupId: z.string().min(1).nullish(),
});

const updateBoardSchema = z.object({
  name: z.string().trim().min(1).max(255).optional(),
  description: z.string().max(1000).nullable().optional(),
});

function boardRef(board: BoardRecord): ResourceRef {
  return { type: "board", board: { id: board.id, ownerId: board.ownerId, groupId: board.groupId } };
}

export function boardRoutes(deps: RouteDeps): Hono {
  const { storage, auth } = deps;
  const { authorizer } = auth;
  const app = new Hono();
  app.use("*", requireAuth(auth.resolver));

  const loadBoard = async (c: Context): Promise<BoardRecord> => {
    const id = validateId(c.req.param("id"), "Board ID");
    const board = await storage.boards.findById(id);
    if (!board) {
      throw apiError(ApiError.NOT_FOUND, "Board not found");
    }
    return board;
  };

  app.get("/", async (c) => {
    const principal = getPrincipal(c);
    assertScopeAllows(principal, "read", "board");

    const boards = principal.isAdmin
      ? await storage.boards.listAll()
      : await storage.boards.listAccessible(principal.userId);
    return listResponse(c, boards);
  });

  app.post("/", async (c) => {
    const principal = getPrincipal(c);
    const body = await validateBody(c, createBoardSchema);
    const fields = { name: body.name, description: body.description ?? null };

    let board: BoardRecord;
    if (body.groupId) {
      const group = await storage.groups.findById(body.groupId);
      if (!group) {
        throw apiError(ApiError.NOT_FOUND, "Group not found");
      }
      await authorizer.assertAuthorized(principal, { type: "group", groupId: group.id }, "write");
      board = await storage.boards.create({ ...fields, groupId: group.id });
    } else {
      assertMayCreate(principal, "board");
      board = await storage.boards.create({ ...fields, ownerId: principal.userId });
    }

    log.info("Board created", { boardId: board.id, groupId: board.groupId, userId: principal.userId });
    return c.json(board, 201);
  });

  app.get("/:id", async (c) => {
    const board = await loadBoard(c);
    await authorizer.assertAuthorized(getPrincipal(c), boardRef(board), "read");
    return c.json(board);
  });

  app.patch("/:id", async (c) => {
    const board = await loadBoard(c);
    await authorizer.assertAuthorized(getPrincipal(c), boardRef(board), "write");
    const body = await validateBody(c, updateBoardSchema);

    const updated = await storage.boards.update(board.id, body);
    if (!updated) {
      throw apiError(ApiError.NOT_FOUND, "Board not found");
    }
    return c.json(updated);
  });

  app.delete("/:id", async (c) => {
    const principal = getPrincipal(c);
    const board = await loadBoard(c);
    await authorizer.assertAuthorized(principal, boardRef(board), "delete");

    await storage.boards.delete(board.id);
    log.info("Board deleted", { boardId: board.id, userId: principal.userId });
    return c.body(null, 204);
  });

  return app;
}
