/**
 * Shared test fixtures
 */

import type { GuardedCache } from "../cache/guarded";
import { createAuthServices, type AuthServices } from "../auth/token-service";
import { createStorage, openDatabase } from "../storage";
import type { Storage, UserRecord } from "../storage/types";

export const TEST_SECRET = "test-secret-test-secret-test-secret-0000";

export function createTestStorage(): Storage {
  return createStorage(openDatabase(":memory:"));
}

export async function createTestUser(
  storage: Storage,
  username: string,
  options: { isAdmin?: boolean; isActive?: boolean; passwordHash?: string } = {}
): Promise<UserRecord> {
  const user = await storage.users.create({
    username,
    email: `${username}@example.com`,
    passwordHash: options.passwordHash ?? "not-a-real-hash",
    isAdmin: options.isAdmin ?? false,
  });
  if (options.isActive === false) {
    const inactive = await storage.users.setActive(user.id, false);
    if (!inactive) throw new Error(`User ${username} vanished`);
    return inactive;
  }
  return user;
}

export function createTestAuth(
  storage: Storage,
  options: { now?: () => number; cache?: GuardedCache | null; authTimeoutMs?: number } = {}
): AuthServices {
  return createAuthServices({
    storage,
    secret: TEST_SECRET,
    sessionTtlSeconds: 3_600,
    bcryptRounds: 4,
    authTimeoutMs: options.authTimeoutMs ?? 5_000,
    cache: options.cache ?? null,
    now: options.now,
  });
}
