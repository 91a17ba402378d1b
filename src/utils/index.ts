/**
 * Utility functions and patterns
 */

// Circuit breaker guarding calls to the shared cache
export {
  CircuitBreaker,
  CircuitBreakerError,
  type CircuitBreakerConfig,
  type CircuitBreakerStats,
  type CircuitState,
} from "./circuit-breaker";

// Client IP extraction behind trusted proxies
export { createProxyTrust, normalizeIP, parseCIDR, DEFAULT_TRUSTED_CIDRS, type CIDR, type ProxyTrust } from "./ip-trust";

export { parsePagination, type PaginationConfig, type PaginationParams } from "./pagination";
