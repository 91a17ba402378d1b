/**
 * API Module
 * Middleware, helpers, and utilities for API endpoints
 */

export * from "./middleware";
export * from "./responses";
export * from "./timeout";
export { ApiError, errorFromCode, listErrorCodes, type ErrorDefinition } from "./error-codes";
export { bodyLimit, DEFAULT_BODY_LIMIT } from "./body-limit";
export { createHealthCheck, type HealthResponse, type HealthStatus } from "./health";
export { rateLimit, resolveClientKey, DEFAULT_EXEMPT_PATHS } from "./rate-limiter";
export { requestContext, getRequestContext, REQUEST_ID_HEADER } from "./request-context";
export { securityHeaders } from "./security-headers";
export { gracefulShutdown, installShutdownHandlers, onShutdown, shutdownMiddleware } from "./shutdown";
