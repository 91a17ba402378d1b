/**
 * Credential store wiring
 */

import type { SqliteDatabase } from "./db";
import { SqliteApiKeyRepository } from "./api-keys";
import { SqliteBoardRepository } from "./boards";
import { SqliteGroupRepository } from "./groups";
import type { Storage } from "./types";
import { SqliteUserRepository } from "./users";

export function createStorage(db: SqliteDatabase): Storage {
  return {
    users: new SqliteUserRepository(db),
    apiKeys: new SqliteApiKeyRepository(db),
    groups: new SqliteGroupRepository(db),
    boards: new SqliteBoardRepository(db),
    async ping() {
      db.prepare("SELECT 1").get();
    },
    close() {
      db.close();
    },
  };
}

export { openDatabase, timestamp } from "./db";
export type { SqliteDatabase } from "./db";
export * from "./types";
