/**
 * Redis-backed shared cache
 *
 * Sliding windows live in sorted sets scored by timestamp. The trim, count
 * and insert happen in one Lua script so concurrent instances never see a
 * half-applied hit.
 */

import IORedis from "ioredis";
import { nanoid } from "nanoid";
import { z } from "zod";
import { createLogger } from "../logging";
import type { SharedCache, SlidingWindowCount, SlidingWindowHit } from "./types";

const log = createLogger("cache");

const SLIDING_WINDOW_HIT = `
local key = KEYS[1]
local now = tonumber(ARGV[1])
local window = tonumber(ARGV[2])
local limit = tonumber(ARGV[3])
redis.call('ZREMRANGEBYSCORE', key, '-inf', now - window)
local count = redis.call('ZCARD', key)
local allowed = 0
if count < limit then
  redis.call('ZADD', key, now, ARGV[4])
  redis.call('PEXPIRE', key, window)
  count = count + 1
  allowed = 1
end
local first = redis.call('ZRANGE', key, 0, 0, 'WITHSCORES')
local oldest = -1
if first[2] then oldest = tonumber(first[2]) end
return {allowed, count, oldest}
`;

const SLIDING_WINDOW_COUNT = `
local key = KEYS[1]
local floor = tonumber(ARGV[1]) - tonumber(ARGV[2])
local count = redis.call('ZCOUNT', key, '(' .. floor, '+inf')
local first = redis.call('ZRANGEBYSCORE', key, '(' .. floor, '+inf', 'WITHSCORES', 'LIMIT', 0, 1)
local oldest = -1
if first[2] then oldest = tonumber(first[2]) end
return {count, oldest}
`;

const hitReply = z.tuple([z.number(), z.number(), z.number()]);
const countReply = z.tuple([z.number(), z.number()]);

function oldestOrNull(score: number): number | null {
  return score < 0 ? null : score;
}

export class RedisSharedCache implements SharedCache {
  constructor(private readonly client: IORedis) {}

  async slidingWindowHit(key: string, now: number, windowMs: number, limit: number): Promise<SlidingWindowHit> {
    const reply = await this.client.eval(SLIDING_WINDOW_HIT, 1, key, now, windowMs, limit, `${now}-${nanoid(8)}`);
    const [allowed, count, oldest] = hitReply.parse(reply);
    return { allowed: allowed === 1, count, oldest: oldestOrNull(oldest) };
  }

  async slidingWindowCount(key: string, now: number, windowMs: number): Promise<SlidingWindowCount> {
    const reply = await this.client.eval(SLIDING_WINDOW_COUNT, 1, key, now, windowMs);
    const [count, oldest] = countReply.parse(reply);
    return { count, oldest: oldestOrNull(oldest) };
  }

  async setWithTtl(key: string, value: string, ttlMs: number): Promise<void> {
    await this.client.set(key, value, "PX", Math.max(1, Math.ceil(ttlMs)));
  }

  async exists(key: string): Promise<boolean> {
    return (await this.client.exists(key)) > 0;
  }

  async ping(): Promise<void> {
    await this.client.ping();
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}

/**
 * Connect to the shared cache
 *
 * Commands issued while disconnected fail immediately instead of queueing,
 * so callers fall back to in-process state without waiting.
 */
export function createRedisCache(url: string): RedisSharedCache {
  const client = new IORedis(url, {
    enableOfflineQueue: false,
    maxRetriesPerRequest: 1,
  });

  client.on("error", (err) => {
    log.warn("Redis connection error", { error: err });
  });

  client.on("connect", () => {
    log.info("Connected to Redis");
  });

  return new RedisSharedCache(client);
}
