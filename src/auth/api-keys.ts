/**
 * API key issuance and validation
 *
 * Format: sk_<43 base64url chars> (256 bits of entropy)
 *
 * - The plaintext is returned once and never stored
 * - lookup_hash (16 hex chars of the unsalted SHA-256) narrows the search
 * - secret_hash (salted SHA-256) is compared in constant time
 */

import { createHash, randomBytes, timingSafeEqual } from "node:crypto";
import { z } from "zod";
import { createLogger } from "../logging";
import {
  API_KEY_SCOPES,
  type ApiKeyRecord,
  type ApiKeyRepository,
  type ApiKeyScope,
  type UserRecord,
  type UserRepository,
} from "../storage/types";
import { InvalidScopesError } from "./errors";
import type { ApiKeyPrincipal, AuthResult } from "./principal";

const log = createLogger("auth");

export const API_KEY_PREFIX = "sk_";
const SECRET_BYTES = 32;
const KEY_PATTERN = /^sk_[A-Za-z0-9_-]{43}$/;
const DAY_MS = 24 * 60 * 60 * 1000;

export const createApiKeySchema = z.object({
  name: z.string().trim().min(1).max(255),
  description: z.string().max(1000).nullish(),
  scopes: z.array(z.enum(API_KEY_SCOPES)).default([]),
  expiresInDays: z.number().int().min(1).max(365).nullish(),
});

export type CreateApiKeyInput = z.input<typeof createApiKeySchema>;

export type ApiKeyValidationFailure = "NotFound" | "Expired" | "Inactive" | "OwnerInactive";

export type ApiKeyValidation =
  | { ok: true; principal: ApiKeyPrincipal; key: ApiKeyRecord }
  | { ok: false; failure: ApiKeyValidationFailure };

/** Key fields safe to show the owner */
export interface ApiKeyInfo {
  id: string;
  name: string;
  description: string | null;
  keyPrefix: string;
  scopes: ApiKeyScope[];
  expiresAt: string | null;
  isActive: boolean;
  lastUsedAt: string | null;
  usageCount: number;
  createdAt: string;
  updatedAt: string;
}

export function generateApiKeySecret(): string {
  return API_KEY_PREFIX + randomBytes(SECRET_BYTES).toString("base64url");
}

export function isApiKeyFormat(value: string): boolean {
  return KEY_PATTERN.test(value);
}

export function lookupHashOf(plaintext: string): string {
  return createHash("sha256").update(plaintext).digest("hex").slice(0, 16);
}

export function hashSecret(plaintext: string, salt: string): string {
  return createHash("sha256").update(salt).update(plaintext).digest("hex");
}

/**
 * Drop duplicates keeping first occurrence; nothing requested means read-only
 */
export function normalizeScopes(scopes: readonly ApiKeyScope[]): ApiKeyScope[] {
  const unique = [...new Set(scopes)];
  return unique.length > 0 ? unique : ["read"];
}

export function toKeyInfo(key: ApiKeyRecord): ApiKeyInfo {
  return {
    id: key.id,
    name: key.name,
    description: key.description,
    keyPrefix: key.keyPrefix,
    scopes: key.scopes,
    expiresAt: key.expiresAt,
    isActive: key.isActive,
    lastUsedAt: key.lastUsedAt,
    usageCount: key.usageCount,
    createdAt: key.createdAt,
    updatedAt: key.updatedAt,
  };
}

export function isKeyExpired(key: Pick<ApiKeyRecord, "expiresAt">, now: number): boolean {
  return key.expiresAt !== null && Date.parse(key.expiresAt) <= now;
}

function digestsMatch(a: string, b: string): boolean {
  const left = Buffer.from(a, "hex");
  const right = Buffer.from(b, "hex");
  return left.length === right.length && timingSafeEqual(left, right);
}

// Compared against when no row matches, so a miss costs one comparison too
const DUMMY_SALT = randomBytes(16).toString("hex");
const DUMMY_HASH = hashSecret("sk_dummy", DUMMY_SALT);

export interface ApiKeyServiceOptions {
  apiKeys: ApiKeyRepository;
  users: Pick<UserRepository, "findById">;
  now?: () => number;
}

export class ApiKeyService {
  private readonly now: () => number;

  constructor(private readonly options: ApiKeyServiceOptions) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Create a key for `user`
   *
   * @throws InvalidScopesError when a non-administrator asks for `admin`
   * @throws ZodError when the input is out of range
   */
  async issue(user: UserRecord, input: CreateApiKeyInput): Promise<{ apiKey: string; key: ApiKeyRecord }> {
    const parsed = createApiKeySchema.parse(input);
    const scopes = normalizeScopes(parsed.scopes);
    if (scopes.includes("admin") && !user.isAdmin) {
      throw new InvalidScopesError(["admin"]);
    }

    const apiKey = generateApiKeySecret();
    const salt = randomBytes(16).toString("hex");
    const expiresAt = parsed.expiresInDays
      ? new Date(this.now() + parsed.expiresInDays * DAY_MS).toISOString()
      : null;

    const key = await this.options.apiKeys.create({
      userId: user.id,
      name: parsed.name,
      description: parsed.description ?? null,
      keyPrefix: apiKey.slice(0, 8),
      lookupHash: lookupHashOf(apiKey),
      secretHash: hashSecret(apiKey, salt),
      salt,
      scopes,
      expiresAt,
    });

    log.info("API key created", { userId: user.id, keyId: key.id, scopes });
    return { apiKey, key };
  }

  async validate(plaintext: string): Promise<ApiKeyValidation> {
    if (!isApiKeyFormat(plaintext)) {
      digestsMatch(hashSecret(plaintext, DUMMY_SALT), DUMMY_HASH);
      return { ok: false, failure: "NotFound" };
    }

    const candidates = await this.options.apiKeys.findByLookupHash(lookupHashOf(plaintext));
    const key = candidates.find((c) => digestsMatch(hashSecret(plaintext, c.salt), c.secretHash));
    if (candidates.length === 0) {
      digestsMatch(hashSecret(plaintext, DUMMY_SALT), DUMMY_HASH);
    }
    if (!key) {
      return { ok: false, failure: "NotFound" };
    }

    if (isKeyExpired(key, this.now())) {
      return { ok: false, failure: "Expired" };
    }
    if (!key.isActive) {
      return { ok: false, failure: "Inactive" };
    }

    const owner = await this.options.users.findById(key.userId);
    if (!owner || !owner.isActive) {
      return { ok: false, failure: "OwnerInactive" };
    }

    return {
      ok: true,
      key,
      principal: {
        source: "api_key",
        userId: owner.id,
        username: owner.username,
        isAdmin: owner.isAdmin,
        keyId: key.id,
        scopes: [...key.scopes],
      },
    };
  }

  /**
   * Owning user id of a live key, for rate-limit keying. Skips the owner
   * lookup and records no usage; full validation still follows.
   */
  async ownerOf(plaintext: string): Promise<string | null> {
    if (!isApiKeyFormat(plaintext)) return null;

    const candidates = await this.options.apiKeys.findByLookupHash(lookupHashOf(plaintext));
    const key = candidates.find((c) => digestsMatch(hashSecret(plaintext, c.salt), c.secretHash));
    if (!key || !key.isActive || isKeyExpired(key, this.now())) return null;
    return key.userId;
  }

  /**
   * Best-effort usage bookkeeping; never fails the caller
   */
  recordUsage(keyId: string): void {
    void this.options.apiKeys.recordUsage(keyId, new Date(this.now()).toISOString()).catch((error: unknown) => {
      log.warn("Failed to record API key usage", {
        keyId,
        error: error instanceof Error ? error : new Error(String(error)),
      });
    });
  }
}

/**
 * Map key validation onto the resolver's failure vocabulary
 */
export function toAuthResult(result: ApiKeyValidation): AuthResult<ApiKeyPrincipal> {
  if (result.ok) return { ok: true, principal: result.principal };
  switch (result.failure) {
    case "NotFound":
      return { ok: false, failure: "KeyNotFound" };
    case "Expired":
      return { ok: false, failure: "Expired" };
    case "Inactive":
    case "OwnerInactive":
      return { ok: false, failure: "Inactive" };
  }
}

export interface ApiKeyUsageStats {
  totalKeys: number;
  /** Active and not expired */
  activeKeys: number;
  expiredKeys: number;
  mostUsedKey: ApiKeyInfo | null;
  /** Up to five most used keys that have been used at all */
  recentUsage: Array<{ keyName: string; lastUsed: string; usageCount: number }>;
  totalRequests: number;
  /** Keys used since midnight UTC */
  keysUsedToday: number;
}

export function summarizeKeyUsage(keys: readonly ApiKeyRecord[], now: number): ApiKeyUsageStats {
  const byUsage = [...keys].sort((a, b) => b.usageCount - a.usageCount);
  const mostUsed = byUsage[0];
  const todayStart = new Date(now);
  todayStart.setUTCHours(0, 0, 0, 0);

  const recentUsage: ApiKeyUsageStats["recentUsage"] = [];
  for (const key of byUsage.slice(0, 5)) {
    if (key.lastUsedAt) {
      recentUsage.push({ keyName: key.name, lastUsed: key.lastUsedAt, usageCount: key.usageCount });
    }
  }

  return {
    totalKeys: keys.length,
    activeKeys: keys.filter((k) => k.isActive && !isKeyExpired(k, now)).length,
    expiredKeys: keys.filter((k) => isKeyExpired(k, now)).length,
    mostUsedKey: mostUsed && mostUsed.usageCount > 0 ? toKeyInfo(mostUsed) : null,
    recentUsage,
    totalRequests: keys.reduce((sum, k) => sum + k.usageCount, 0),
    keysUsedToday: keys.filter((k) => k.lastUsedAt !== null && Date.parse(k.lastUsedAt) >= todayStart.getTime())
      .length,
  };
}
