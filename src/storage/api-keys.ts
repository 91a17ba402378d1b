/**
 * API key rows
 *
 * Only digests are stored. Scopes live in one comma-separated column.
 */

import { nanoid } from "nanoid";
import { timestamp, type SqliteDatabase } from "./db";
import {
  API_KEY_SCOPES,
  type ApiKeyRecord,
  type ApiKeyRepository,
  type ApiKeyScope,
  type ApiKeyUpdate,
  type NewApiKey,
} from "./types";

interface ApiKeyRow {
  id: string;
  user_id: string;
  name: string;
  description: string | null;
  key_prefix: string;
  lookup_hash: string;
  secret_hash: string;
  salt: string;
  scopes: string;
  expires_at: string | null;
  is_active: number;
  last_used_at: string | null;
  usage_count: number;
  created_at: string;
  updated_at: string;
}

function isScope(value: string): value is ApiKeyScope {
  return (API_KEY_SCOPES as readonly string[]).includes(value);
}

/** Unknown scope names in a row are dropped rather than trusted */
function parseScopes(column: string): ApiKeyScope[] {
  return column
    .split(",")
    .map((s) => s.trim())
    .filter(isScope);
}

function toApiKey(row: ApiKeyRow): ApiKeyRecord {
  return {
    id: row.id,
    userId: row.user_id,
    name: row.name,
    description: row.description,
    keyPrefix: row.key_prefix,
    lookupHash: row.lookup_hash,
    secretHash: row.secret_hash,
    salt: row.salt,
    scopes: parseScopes(row.scopes),
    expiresAt: row.expires_at,
    isActive: row.is_active === 1,
    lastUsedAt: row.last_used_at,
    usageCount: row.usage_count,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class SqliteApiKeyRepository implements ApiKeyRepository {
  constructor(private readonly db: SqliteDatabase) {}

  async create(key: NewApiKey): Promise<ApiKeyRecord> {
    const id = nanoid(12);
    const now = timestamp();
    this.db
      .prepare(
        `INSERT INTO api_keys
           (id, user_id, name, description, key_prefix, lookup_hash, secret_hash, salt, scopes, expires_at, is_active, usage_count, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 1, 0, ?, ?)`
      )
      .run(
        id,
        key.userId,
        key.name,
        key.description,
        key.keyPrefix,
        key.lookupHash,
        key.secretHash,
        key.salt,
        key.scopes.join(","),
        key.expiresAt,
        now,
        now
      );

    const created = this.findRow(id);
    if (!created) {
      throw new Error(`API key ${id} vanished after insert`);
    }
    return created;
  }

  async findByLookupHash(lookupHash: string): Promise<ApiKeyRecord[]> {
    return this.db
      .prepare<[string], ApiKeyRow>("SELECT * FROM api_keys WHERE lookup_hash = ?")
      .all(lookupHash)
      .map(toApiKey);
  }

  async findForUser(id: string, userId: string): Promise<ApiKeyRecord | null> {
    const row = this.db
      .prepare<[string, string], ApiKeyRow>("SELECT * FROM api_keys WHERE id = ? AND user_id = ?")
      .get(id, userId);
    return row ? toApiKey(row) : null;
  }

  async listForUser(userId: string): Promise<ApiKeyRecord[]> {
    return this.db
      .prepare<[string], ApiKeyRow>("SELECT * FROM api_keys WHERE user_id = ? ORDER BY created_at DESC, id")
      .all(userId)
      .map(toApiKey);
  }

  async update(id: string, changes: ApiKeyUpdate): Promise<ApiKeyRecord | null> {
    const current = this.findRow(id);
    if (!current) return null;

    this.db
      .prepare("UPDATE api_keys SET name = ?, description = ?, is_active = ?, updated_at = ? WHERE id = ?")
      .run(
        changes.name ?? current.name,
        changes.description !== undefined ? changes.description : current.description,
        (changes.isActive ?? current.isActive) ? 1 : 0,
        timestamp(),
        id
      );
    return this.findRow(id);
  }

  async recordUsage(id: string, usedAt: string): Promise<void> {
    this.db
      .prepare("UPDATE api_keys SET last_used_at = ?, usage_count = usage_count + 1 WHERE id = ?")
      .run(usedAt, id);
  }

  private findRow(id: string): ApiKeyRecord | null {
    const row = this.db.prepare<[string], ApiKeyRow>("SELECT * FROM api_keys WHERE id = ?").get(id);
    return row ? toApiKey(row) : null;
  }
}
