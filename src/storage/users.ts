/**
 * User accounts
 *
 * Accounts are deactivated, never deleted, so keys, memberships and board
 * ownership keep pointing at a real row.
 */

import { nanoid } from "nanoid";
import { timestamp, type SqliteDatabase } from "./db";
import type { NewUser, Page, UserRecord, UserRepository } from "./types";

interface UserRow {
  id: string;
  username: string;
  email: string;
  password_hash: string;
  full_name: string | null;
  is_active: number;
  is_admin: number;
  created_at: string;
  updated_at: string;
}

function toUser(row: UserRow): UserRecord {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    fullName: row.full_name,
    isActive: row.is_active === 1,
    isAdmin: row.is_admin === 1,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class SqliteUserRepository implements UserRepository {
  constructor(private readonly db: SqliteDatabase) {}

  async create(user: NewUser): Promise<UserRecord> {
    const now = timestamp();
    const id = nanoid(12);
    this.db
      .prepare(
        `INSERT INTO users (id, username, email, password_hash, full_name, is_active, is_admin, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, 1, ?, ?, ?)`
      )
      .run(id, user.username, user.email, user.passwordHash, user.fullName ?? null, user.isAdmin ? 1 : 0, now, now);
    return this.require(id);
  }

  async findById(id: string): Promise<UserRecord | null> {
    const row = this.db.prepare<[string], UserRow>("SELECT * FROM users WHERE id = ?").get(id);
    return row ? toUser(row) : null;
  }

  async findByLogin(login: string): Promise<UserRecord | null> {
    const row = this.db
      .prepare<[string, string], UserRow>(
        "SELECT * FROM users WHERE username = ? OR lower(email) = lower(?) LIMIT 1"
      )
      .get(login, login);
    return row ? toUser(row) : null;
  }

  async existsWithUsernameOrEmail(
    username: string,
    email: string
  ): Promise<{ username: boolean; email: boolean }> {
    const row = this.db
      .prepare<[string, string], { username_taken: number; email_taken: number }>(
        `SELECT
           EXISTS(SELECT 1 FROM users WHERE username = ?) AS username_taken,
           EXISTS(SELECT 1 FROM users WHERE lower(email) = lower(?)) AS email_taken`
      )
      .get(username, email);
    return { username: row?.username_taken === 1, email: row?.email_taken === 1 };
  }

  async list(page: Page): Promise<{ items: UserRecord[]; total: number }> {
    const rows = this.db
      .prepare<[number, number], UserRow>("SELECT * FROM users ORDER BY created_at, id LIMIT ? OFFSET ?")
      .all(page.limit, page.offset);
    const count = this.db.prepare<[], { total: number }>("SELECT COUNT(*) AS total FROM users").get();
    return { items: rows.map(toUser), total: count?.total ?? 0 };
  }

  async updateProfile(
    id: string,
    changes: { fullName?: string | null; email?: string }
  ): Promise<UserRecord | null> {
    const current = await this.findById(id);
    if (!current) return null;

    this.db
      .prepare("UPDATE users SET full_name = ?, email = ?, updated_at = ? WHERE id = ?")
      .run(
        changes.fullName !== undefined ? changes.fullName : current.fullName,
        changes.email ?? current.email,
        timestamp(),
        id
      );
    return this.findById(id);
  }

  async updatePassword(id: string, passwordHash: string): Promise<void> {
    this.db
      .prepare("UPDATE users SET password_hash = ?, updated_at = ? WHERE id = ?")
      .run(passwordHash, timestamp(), id);
  }

  async setActive(id: string, isActive: boolean): Promise<UserRecord | null> {
    this.db
      .prepare("UPDATE users SET is_active = ?, updated_at = ? WHERE id = ?")
      .run(isActive ? 1 : 0, timestamp(), id);
    return this.findById(id);
  }

  async setAdmin(id: string, isAdmin: boolean): Promise<UserRecord | null> {
    this.db
      .prepare("UPDATE users SET is_admin = ?, updated_at = ? WHERE id = ?")
      .run(isAdmin ? 1 : 0, timestamp(), id);
    return this.findById(id);
  }

  private async require(id: string): Promise<UserRecord> {
    const user = await this.findById(id);
    if (!user) {
      throw new Error(`User ${id} vanished after insert`);
    }
    return user;
  }
}
