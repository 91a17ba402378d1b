/**
 * Groups and memberships
 *
 * Every membership change that could strip a group of its last owner runs
 * inside a transaction, so two concurrent demotions cannot both pass the
 * owner count check.
 */

import { nanoid } from "nanoid";
import { timestamp, type SqliteDatabase } from "./db";
import {
  GROUP_ROLES,
  type GroupRecord,
  type GroupRepository,
  type GroupRole,
  type GroupWithRole,
  type MembershipChange,
  type MembershipRecord,
} from "./types";

interface GroupRow {
  id: string;
  name: string;
  description: string | null;
  created_by: string | null;
  created_at: string;
  updated_at: string;
}

interface GroupWithRoleRow extends GroupRow {
  role: string;
  member_count: number;
}

interface MemberRow {
  group_id: string;
  user_id: string;
  role: string;
  username: string;
  full_name: string | null;
  email: string;
  created_at: string;
}

function toRole(value: string): GroupRole {
  const role = GROUP_ROLES.find((r) => r === value);
  if (!role) {
    throw new Error(`Unknown group role in store: ${value}`);
  }
  return role;
}

function toGroup(row: GroupRow): GroupRecord {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    createdBy: row.created_by,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class SqliteGroupRepository implements GroupRepository {
  constructor(private readonly db: SqliteDatabase) {}

  async getRole(groupId: string, userId: string): Promise<GroupRole | null> {
    const row = this.db
      .prepare<[string, string], { role: string }>(
        "SELECT role FROM group_memberships WHERE group_id = ? AND user_id = ?"
      )
      .get(groupId, userId);
    return row ? toRole(row.role) : null;
  }

  async create(group: { name: string; description: string | null; createdBy: string }): Promise<GroupRecord> {
    const id = nanoid(12);
    const now = timestamp();

    this.db.transaction(() => {
      this.db
        .prepare(
          "INSERT INTO groups (id, name, description, created_by, created_at, updated_at) VALUES (?, ?, ?, ?, ?, ?)"
        )
        .run(id, group.name, group.description, group.createdBy, now, now);
      this.db
        .prepare(
          "INSERT INTO group_memberships (group_id, user_id, role, created_at, updated_at) VALUES (?, ?, 'owner', ?, ?)"
        )
        .run(id, group.createdBy, now, now);
    })();

    const created = await this.findById(id);
    if (!created) {
      throw new Error(`Group ${id} vanished after insert`);
    }
    return created;
  }

  async findById(id: string): Promise<GroupRecord | null> {
    const row = this.db.prepare<[string], GroupRow>("SELECT * FROM groups WHERE id = ?").get(id);
    return row ? toGroup(row) : null;
  }

  async listForUser(userId: string): Promise<GroupWithRole[]> {
    const rows = this.db
      .prepare<[string], GroupWithRoleRow>(
        `SELECT g.*, m.role,
           (SELECT COUNT(*) FROM group_memberships c WHERE c.group_id = g.id) AS member_count
         FROM groups g
         JOIN group_memberships m ON m.group_id = g.id
         WHERE m.user_id = ?
         ORDER BY g.name, g.id`
      )
      .all(userId);

    return rows.map((row) => ({
      ...toGroup(row),
      role: toRole(row.role),
      memberCount: row.member_count,
    }));
  }

  async update(id: string, changes: { name?: string; description?: string | null }): Promise<GroupRecord | null> {
    const current = await this.findById(id);
    if (!current) return null;

    this.db
      .prepare("UPDATE groups SET name = ?, description = ?, updated_at = ? WHERE id = ?")
      .run(
        changes.name ?? current.name,
        changes.description !== undefined ? changes.description : current.description,
        timestamp(),
        id
      );
    return this.findById(id);
  }

  async delete(id: string): Promise<boolean> {
    // Boards are unlinked by ON DELETE SET NULL; memberships cascade
    const result = this.db.prepare("DELETE FROM groups WHERE id = ?").run(id);
    return result.changes > 0;
  }

  async listMembers(groupId: string): Promise<MembershipRecord[]> {
    const rows = this.db
      .prepare<[string], MemberRow>(
        `SELECT m.group_id, m.user_id, m.role, u.username, u.full_name, u.email, m.created_at
         FROM group_memberships m
         JOIN users u ON u.id = m.user_id
         WHERE m.group_id = ?
         ORDER BY CASE m.role WHEN 'owner' THEN 0 WHEN 'admin' THEN 1 ELSE 2 END, u.username`
      )
      .all(groupId);

    return rows.map((row) => ({
      groupId: row.group_id,
      userId: row.user_id,
      role: toRole(row.role),
      username: row.username,
      fullName: row.full_name,
      email: row.email,
      createdAt: row.created_at,
    }));
  }

  async addMember(groupId: string, userId: string, role: GroupRole): Promise<"ok" | "already_member"> {
    const now = timestamp();
    const result = this.db
      .prepare(
        `INSERT INTO group_memberships (group_id, user_id, role, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT (group_id, user_id) DO NOTHING`
      )
      .run(groupId, userId, role, now, now);
    return result.changes > 0 ? "ok" : "already_member";
  }

  async changeRole(groupId: string, userId: string, role: GroupRole): Promise<MembershipChange> {
    return this.db.transaction((): MembershipChange => {
      const current = this.currentRole(groupId, userId);
      if (!current) return "not_member";
      if (current === "owner" && role !== "owner" && this.ownerCount(groupId) <= 1) {
        return "last_owner";
      }

      this.db
        .prepare("UPDATE group_memberships SET role = ?, updated_at = ? WHERE group_id = ? AND user_id = ?")
        .run(role, timestamp(), groupId, userId);
      return "ok";
    }).immediate();
  }

  async removeMember(groupId: string, userId: string): Promise<MembershipChange> {
    return this.db.transaction((): MembershipChange => {
      const current = this.currentRole(groupId, userId);
      if (!current) return "not_member";
      if (current === "owner" && this.ownerCount(groupId) <= 1) {
        return "last_owner";
      }

      this.db.prepare("DELETE FROM group_memberships WHERE group_id = ? AND user_id = ?").run(groupId, userId);
      return "ok";
    }).immediate();
  }

  private currentRole(groupId: string, userId: string): GroupRole | null {
    const row = this.db
      .prepare<[string, string], { role: string }>(
        "SELECT role FROM group_memberships WHERE group_id = ? AND user_id = ?"
      )
      .get(groupId, userId);
    return row ? toRole(row.role) : null;
  }

  private ownerCount(groupId: string): number {
    const row = this.db
      .prepare<[string], { owners: number }>(
        "SELECT COUNT(*) AS owners FROM group_memberships WHERE group_id = ? AND role = 'owner'"
      )
      .get(groupId);
    return row?.owners ?? 0;
  }
}
