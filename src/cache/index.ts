/**
 * Shared cache module
 */

export { GuardedCache, type GuardedCacheOptions } from "./guarded";
export { RedisSharedCache, createRedisCache } from "./redis";
export type { SharedCache, SlidingWindowCount, SlidingWindowHit } from "./types";
