export { RateLimiter, createRateLimitStore } from "./limiter";
export { MemoryRateLimitStore, type MemoryStoreOptions } from "./memory-store";
export { CacheRateLimitStore } from "./cache-store";
export type {
  RateLimitConfig,
  RateLimitMode,
  RateLimitResult,
  RateLimitStatus,
  RateLimitStore,
} from "./types";
