import { nanoid } from "nanoid";
import { timestamp, type SqliteDatabase } from "./db";
import type { BoardOwner, BoardRecord, BoardRepository } from "./types";

interface BoardRow {
  id: string;
  name: string;
  description: string | null;
  owner_id: string | null;
  group_id: string | null;
  created_at: string;
  updated_at: string;
}

function toBoard(row: BoardRow): BoardRecord {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    ownerId: row.owner_id,
    groupId: row.group_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class SqliteBoardRepository implements BoardRepository {
  constructor(private readonly db: SqliteDatabase) {}

  async create(board: { name: string; description: string | null } & BoardOwner): Promise<BoardRecord> {
    const id = nanoid(12);
    const now = timestamp();
    const ownerId = "ownerId" in board ? board.ownerId : null;
    const groupId = "groupId" in board ? board.groupId : null;

    this.db
      .prepare(
        `INSERT INTO boards (id, name, description, owner_id, group_id, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(id, board.name, board.description, ownerId, groupId, now, now);

    const created = await this.findById(id);
    if (!created) {
      throw new Error(`Board ${id} vanished after insert`);
    }
    return created;
  }

  async findById(id: string): Promise<BoardRecord | null> {
    const row = this.db.prepare<[string], BoardRow>("SELECT * FROM boards WHERE id = ?").get(id);
    return row ? toBoard(row) : null;
  }

  async listAccessible(userId: string): Promise<BoardRecord[]> {
    return this.db
      .prepare<[string, string], BoardRow>(
        `SELECT * FROM boards
         WHERE owner_id = ?
            OR group_id IN (SELECT group_id FROM group_memberships WHERE user_id = ?)
         ORDER BY created_at, id`
      )
      .all(userId, userId)
      .map(toBoard);
  }

  async listAll(): Promise<BoardRecord[]> {
    return this.db.prepare<[], BoardRow>("SELECT * FROM boards ORDER BY created_at, id").all().map(toBoard);
  }

  async update(id: string, changes: { name?: string; description?: string | null }): Promise<BoardRecord | null> {
    const current = await this.findById(id);
    if (!current) return null;

    this.db
      .prepare("UPDATE boards SET name = ?, description = ?, updated_at = ? WHERE id = ?")
      .run(
        changes.name ?? current.name,
        changes.description !== undefined ? changes.description : current.description,
        timestamp(),
        id
      );
    return this.findById(id);
  }

  async delete(id: string): Promise<boolean> {
    return this.db.prepare("DELETE FROM boards WHERE id = ?").run(id).changes > 0;
  }
}
